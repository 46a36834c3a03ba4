import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { ZodError } from 'zod';
import { RobotRuntime } from '../../src/application/robot-runtime.js';
import { CustomObjectsInUseError } from '../../src/domain/errors.js';
import type { WorldEvent } from '../../src/domain/world-events.js';
import { CHARGER, CUSTOM_TYPE_01, objectEvent, observedFace, observedObject } from '../helpers/envelopes.js';
import { captureLogger } from '../helpers/logger.js';

function setup() {
  const logs = captureLogger();
  let now = 10_000;
  const runtime = new RobotRuntime({ log: logs.log, nowFn: () => now });
  const seen: WorldEvent[] = [];
  runtime.world.events.subscribeAll((e) => seen.push(e));
  const types = () => seen.map((e) => e.type);
  const advance = (ms: number) => {
    now += ms;
    vi.advanceTimersByTime(ms);
  };
  return { logs, runtime, world: runtime.world, seen, types, advance };
}

describe('WorldRegistry', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('visibility', () => {
    it('announces a new object, then its appearance, then the observation', () => {
      const { runtime, world, types, seen } = setup();

      runtime.ingest(observedObject(4));

      expect(types()).toEqual(['object_added', 'object_appeared', 'object_observed']);
      const cube = world.getObject(4);
      expect(cube?.objectType).toBe('light_cube');
      expect(cube?.isVisible).toBe(true);
      expect(seen.every((e) => e.object === cube)).toBe(true);
    });

    it('stays visible while observations keep arriving', () => {
      const { runtime, world, types, advance } = setup();

      runtime.ingest(observedObject(4));
      advance(500);
      runtime.ingest(observedObject(4));
      advance(500);

      expect(world.getObject(4)?.isVisible).toBe(true);
      expect(types()).toEqual(['object_added', 'object_appeared', 'object_observed', 'object_observed']);

      advance(300);
      expect(world.getObject(4)?.isVisible).toBe(false);
      expect(types().at(-1)).toBe('object_disappeared');
    });

    it('disappears once after the timeout and appears again on the next observation', () => {
      const { runtime, world, types, advance } = setup();

      runtime.ingest(observedObject(4));
      advance(800);
      advance(2000);

      expect(types().filter((t) => t === 'object_disappeared')).toHaveLength(1);

      runtime.ingest(observedObject(4));
      expect(types().slice(-2)).toEqual(['object_appeared', 'object_observed']);
      expect(world.getObject(4)?.isVisible).toBe(true);
      expect(world.objects()).toHaveLength(1);
    });

    it('records pose, image rect and times from the observation', () => {
      const { runtime, world } = setup();

      runtime.ingest(observedObject(4));

      const cube = world.lightCube;
      expect(cube?.pose.position).toEqual({ x: 100, y: 50, z: 0 });
      expect(cube?.lastImageRect).toEqual({ xTopLeft: 10, yTopLeft: 20, width: 30, height: 40 });
      expect(cube?.lastObservedTime).toBe(10_000);
      expect(cube?.lastObservedTimestamp).toBe(1000);
      expect(cube?.topFaceOrientationRad).toBe(0.5);
    });

    it('ignores observations of unsupported object types', () => {
      const { runtime, world, types, logs } = setup();

      runtime.ingest(observedObject(8, 99));

      expect(world.objects()).toEqual([]);
      expect(types()).toEqual([]);
      expect(logs.messages('warn')).toEqual(['Ignoring observation of unsupported object type']);
    });

    it('stops disappear timers on teardown and leaves nothing visible', () => {
      const { runtime, world, types, advance } = setup();

      runtime.ingest(observedObject(4));
      runtime.ingest(observedFace(7));
      const cube = world.getObject(4);
      const face = world.getFace(7);
      runtime.teardown();

      expect(cube?.isVisible).toBe(false);
      expect(face?.isVisible).toBe(false);

      advance(1000);
      expect(types()).not.toContain('object_disappeared');
      expect(world.objects()).toEqual([]);
      expect(world.faces()).toEqual([]);
    });
  });

  describe('faces', () => {
    it('announces known faces when they appear', () => {
      const { runtime, types } = setup();

      runtime.ingest(observedFace(5, 'Ada'));

      expect(types()).toEqual(['object_added', 'object_appeared', 'known_face_appeared', 'object_observed']);
    });

    it('does not announce a face without a name as known', () => {
      const { runtime, types, world } = setup();

      runtime.ingest(observedFace(5, '  '));

      expect(types()).toEqual(['object_added', 'object_appeared', 'object_observed']);
      expect(world.getFace(5)?.expression).toBe('happiness');
    });

    it('re-keys a face in place when the robot changes its id', () => {
      const { runtime, world, seen, advance } = setup();

      runtime.ingest(observedFace(5, 'Ada'));
      const face = world.getFace(5);
      runtime.ingest({ kind: 'robot_changed_observed_face_id', payload: { old_id: 5, new_id: 9 } });

      expect(world.getFace(5)).toBeUndefined();
      expect(world.getFace(9)).toBe(face);
      expect(face?.faceId).toBe(9);
      expect(seen.at(-1)).toMatchObject({ type: 'face_id_changed', object: face });

      advance(800);
      expect(face?.isVisible).toBe(false);
    });

    it('drops a face id change for an unknown face', () => {
      const { runtime, world, logs } = setup();

      runtime.ingest({ kind: 'robot_changed_observed_face_id', payload: { old_id: 1, new_id: 2 } });

      expect(world.faces()).toEqual([]);
      expect(logs.messages('debug')).toContain('Face id change for unknown face ignored');
    });

    it('drops a face id change onto an id that is already tracked', () => {
      const { runtime, world, types, logs } = setup();

      runtime.ingest(observedFace(5));
      runtime.ingest(observedFace(9));
      runtime.ingest({ kind: 'robot_changed_observed_face_id', payload: { old_id: 5, new_id: 9 } });

      expect(world.getFace(5)?.faceId).toBe(5);
      expect(world.getFace(9)?.faceId).toBe(9);
      expect(types()).not.toContain('face_id_changed');
      expect(logs.messages('warn')).toEqual(['Face id change onto an existing face dropped']);
    });
  });

  describe('cube events', () => {
    it('creates a placeholder cube for an unseen id', () => {
      const { runtime, world, types, logs } = setup();

      runtime.ingest(objectEvent('object_tapped', { object_id: 3, timestamp: 77 }));

      expect(types()).toEqual(['object_added', 'object_tapped']);
      const cube = world.getObject(3);
      expect(cube?.objectType).toBe('light_cube');
      expect(cube?.isVisible).toBe(false);
      expect(logs.messages('warn')).toEqual(['Cube event for unseen object, created placeholder']);
    });

    it('measures the move from the first moved report to the stop', () => {
      const { runtime, seen, advance } = setup();

      runtime.ingest(observedObject(1));
      runtime.ingest(objectEvent('object_moved', { object_id: 1, timestamp: 10 }));
      advance(200);
      runtime.ingest(objectEvent('object_moved', { object_id: 1, timestamp: 20 }));
      advance(300);
      runtime.ingest(objectEvent('object_stopped_moving', { object_id: 1, timestamp: 30 }));

      expect(seen.at(-1)).toMatchObject({ type: 'object_finished_moving', moveDurationMs: 500 });
    });

    it('publishes nothing when a cube that was not moving stops', () => {
      const { runtime, world, types } = setup();

      runtime.ingest(observedObject(1));
      const stopped = world.onStoppedMoving({
        kind: 'object_event',
        type: 'object_stopped_moving',
        objectEventType: 'object_stopped_moving',
        objectId: 1,
        robotTimestamp: 30,
      });

      expect(stopped).toBe(0);
      expect(types()).not.toContain('object_finished_moving');
    });

    it('records the up axis', () => {
      const { runtime, world, seen } = setup();

      runtime.ingest(objectEvent('object_up_axis_changed', { object_id: 1, timestamp: 5, up_axis: 6 }));

      expect(world.lightCube?.upAxis).toBe('z_positive');
      expect(seen.at(-1)).toMatchObject({ type: 'object_up_axis_changed', upAxis: 'z_positive' });
    });

    it('ignores cube events for an object that is not a cube', () => {
      const { runtime, world, types, logs } = setup();

      runtime.ingest(observedObject(2, CHARGER));
      runtime.ingest(objectEvent('object_tapped', { object_id: 2 }));

      expect(world.charger?.objectId).toBe(2);
      expect(types()).not.toContain('object_tapped');
      expect(logs.messages('warn')).toEqual(['Cube event for non-cube object ignored']);
    });

    it('tracks connection state and disconnects every cube when the link drops', () => {
      const { runtime, world, seen } = setup();

      runtime.ingest(objectEvent('object_available', { factory_id: 'aa:bb' }));
      runtime.ingest(
        objectEvent('object_connection_state', { object_id: 1, factory_id: 'aa:bb', object_type: 2, connected: true }),
      );

      expect(world.availableCubes()).toEqual(['aa:bb']);
      expect(world.isCubeConnected).toBe(true);
      expect(world.lightCube?.factoryId).toBe('aa:bb');
      expect(seen.map((e) => e.type)).toEqual(['object_added', 'object_connected']);

      runtime.ingest(objectEvent('cube_connection_lost', {}));

      expect(world.isCubeConnected).toBe(false);
      expect(seen.at(-1)).toMatchObject({ type: 'object_disconnected', source: null });
    });
  });

  describe('custom objects', () => {
    const cubeArchetype = {
      shape: 'cube',
      marker: 'circles_2',
      sizeMm: 50,
      markerWidthMm: 40,
      markerHeightMm: 40,
    } as const;

    it('binds a defined archetype to new custom objects', () => {
      const { runtime, world } = setup();

      const definition = world.defineCustomObject(3, cubeArchetype);
      runtime.ingest(observedObject(20, CUSTOM_TYPE_01 + 2));

      const object = world.getObject(20);
      if (object?.objectType !== 'custom_object') throw new Error('expected a custom object');
      expect(object.customType).toBe(3);
      expect(object.archetype).toBe(definition);
      expect(definition.isUnique).toBe(true);
    });

    it('rebinds existing custom objects when their type is defined later', () => {
      const { runtime, world } = setup();

      runtime.ingest(observedObject(20, CUSTOM_TYPE_01));
      world.defineCustomObject(1, { ...cubeArchetype, isUnique: false });

      const object = world.getObject(20);
      if (object?.objectType !== 'custom_object') throw new Error('expected a custom object');
      expect(object.archetype?.shape).toBe('cube');
      expect(object.archetype?.isUnique).toBe(false);

      expect(() => world.deleteCustomObjectArchetypes()).toThrow(CustomObjectsInUseError);
      expect(world.archetypeFor(1)).toBe(object.archetype);

      expect(world.deleteCustomObjects()).toBe(1);
      expect(world.getObject(20)).toBeUndefined();
      world.deleteCustomObjectArchetypes();
      expect(world.archetypeFor(1)).toBeNull();
    });

    it('marks deleted custom objects disappeared and drops their timers', () => {
      const { runtime, world, types, advance } = setup();

      runtime.ingest(observedObject(20, CUSTOM_TYPE_01));
      runtime.ingest(observedObject(4));
      const held = world.getObject(20);
      expect(held?.isVisible).toBe(true);

      expect(world.deleteCustomObjects()).toBe(1);
      expect(held?.isVisible).toBe(false);
      expect(types().at(-1)).toBe('object_disappeared');
      expect(world.visibleObjects().map((o) => o.objectType)).toEqual(['light_cube']);

      advance(10_000);
      expect(held?.isVisible).toBe(false);
      expect(types().filter((t) => t === 'object_disappeared')).toHaveLength(2);
    });

    it('rejects invalid definitions', () => {
      const { world } = setup();

      expect(() => world.defineCustomObject(21, cubeArchetype)).toThrow(ZodError);
      expect(() =>
        world.defineCustomObject(1, {
          shape: 'box',
          markerFront: 'circles_2',
          markerBack: 'circles_2',
          markerTop: 'circles_3',
          markerBottom: 'circles_4',
          markerLeft: 'circles_5',
          markerRight: 'diamonds_2',
          depthMm: 10,
          widthMm: 10,
          heightMm: 10,
          markerWidthMm: 8,
          markerHeightMm: 8,
        }),
      ).toThrow('Box sides must use distinct markers');
      expect(world.archetypeFor(1)).toBeNull();
    });
  });
});
