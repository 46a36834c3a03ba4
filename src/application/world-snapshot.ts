import type { WorldEvent } from '../domain/world-events.js';
import type { WorldObject } from '../domain/world-objects.js';

/**
 * JSON-safe views of world state, used by the HTTP read API and the
 * world-event relay. Keys are snake_case like every other payload this
 * service puts on the wire.
 */
export type ObjectSnapshot = Record<string, unknown> & {
  object_type: WorldObject['objectType'];
  is_visible: boolean;
};

export interface WorldEventSnapshot {
  type: WorldEvent['type'];
  object: ObjectSnapshot;
  move_duration_ms?: number;
  up_axis?: string;
}

export function snapshotObject(object: WorldObject): ObjectSnapshot {
  const common = {
    is_visible: object.isVisible,
    pose: {
      x: object.pose.position.x,
      y: object.pose.position.y,
      z: object.pose.position.z,
      q0: object.pose.rotation.q0,
      q1: object.pose.rotation.q1,
      q2: object.pose.rotation.q2,
      q3: object.pose.rotation.q3,
      origin_id: object.pose.originId,
    },
    last_observed_time: object.lastObservedTime,
    last_event_time: object.lastEventTime,
  };

  switch (object.objectType) {
    case 'light_cube':
      return {
        object_type: object.objectType,
        object_id: object.objectId,
        factory_id: object.factoryId,
        is_connected: object.isConnected,
        is_moving: object.isMoving,
        up_axis: object.upAxis,
        last_tapped_time: object.lastTappedTime,
        ...common,
      };
    case 'charger':
      return { object_type: object.objectType, object_id: object.objectId, ...common };
    case 'custom_object':
      return {
        object_type: object.objectType,
        object_id: object.objectId,
        custom_type: object.customType,
        archetype: object.archetype?.shape ?? null,
        ...common,
      };
    case 'face':
      return {
        object_type: object.objectType,
        face_id: object.faceId,
        name: object.name,
        expression: object.expression,
        ...common,
      };
  }
}

export function snapshotWorldEvent(event: WorldEvent): WorldEventSnapshot {
  const snapshot: WorldEventSnapshot = { type: event.type, object: snapshotObject(event.object) };
  if (event.type === 'object_finished_moving') snapshot.move_duration_ms = event.moveDurationMs;
  if (event.type === 'object_up_axis_changed') snapshot.up_axis = event.upAxis;
  return snapshot;
}
