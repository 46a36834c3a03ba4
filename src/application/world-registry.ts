import type { Logger } from 'pino';
import type {
  CubeConnectionLostEvent,
  ObjectAvailableEvent,
  ObjectConnectionStateEvent,
  ObjectMovedEvent,
  ObjectStoppedMovingEvent,
  ObjectTappedEvent,
  ObjectUpAxisChangedEvent,
  RobotChangedObservedFaceIdEvent,
  RobotEvent,
  RobotObservedFaceEvent,
  RobotObservedObjectEvent,
} from '../domain/robot-events.js';
import { CustomObjectsInUseError } from '../domain/errors.js';
import type { WorldEvent } from '../domain/world-events.js';
import type {
  Charger,
  CustomObjectArchetype,
  Face,
  LightCube,
  Mutable,
  ObjectWithId,
  WorldObject,
} from '../domain/world-objects.js';
import { customArchetypeSchema, customTypeSchema, type CustomArchetypeInput } from './custom-archetype-schema.js';
import type { ErrorChannel } from './error-channel.js';
import { EventDispatcher } from './event-dispatcher.js';
import { GenerationTimers } from './generation-timers.js';
import {
  createCharger,
  createCustomObject,
  createFace,
  createLightCube,
  markConnection,
  markDisappeared,
  markFaceDetails,
  markMoved,
  markObserved,
  markStoppedMoving,
  markTapped,
  markUpAxis,
} from './object-lifecycle.js';
import type { SerialQueue } from './serial-queue.js';

export const DEFAULT_VISIBILITY_TIMEOUT_MS = 800;

export interface WorldRegistryOptions {
  log: Logger;
  queue: SerialQueue;
  errors: ErrorChannel;
  /** Delay without observations after which an object is no longer visible. */
  visibilityTimeoutMs?: number;
  nowFn?: () => number;
}

type TrackedObject = Mutable<ObjectWithId>;

/**
 * World object registry.
 *
 * Maps robot object ids and face ids to long-lived object records, infers
 * visibility from intermittent observations and republishes object events
 * bound to the resolved object on `events`.
 *
 * Must only be driven from the serial queue: every handler assumes it is
 * the single writer. Disappear timers re-enter through that queue.
 */
export class WorldRegistry {
  readonly events: EventDispatcher<WorldEvent>;

  private readonly objectsById = new Map<number, TrackedObject>();
  private readonly facesById = new Map<number, Mutable<Face>>();
  private readonly archetypes = new Map<number, CustomObjectArchetype>();
  private readonly availableFactoryIds = new Set<string>();
  private readonly timers: GenerationTimers<object>;
  private readonly log: Logger;
  private readonly visibilityTimeoutMs: number;
  private readonly nowFn: () => number;

  constructor(options: WorldRegistryOptions) {
    this.log = options.log;
    this.visibilityTimeoutMs = options.visibilityTimeoutMs ?? DEFAULT_VISIBILITY_TIMEOUT_MS;
    this.nowFn = options.nowFn ?? Date.now;
    this.timers = new GenerationTimers<object>(options.queue, options.log, 'disappear');
    this.events = new EventDispatcher<WorldEvent>({ name: 'world', log: options.log, errors: options.errors });
  }

  /** Subscribes the registry to robot events. Returns the matching unsubscribe. */
  bind(dispatcher: EventDispatcher<RobotEvent>): () => void {
    const subscriptions = [
      dispatcher.subscribe('robot_observed_object', (e) => {
        this.onObserved(e);
      }),
      dispatcher.subscribe('robot_observed_face', (e) => {
        this.onFaceObserved(e);
      }),
      dispatcher.subscribe('robot_changed_observed_face_id', (e) => {
        this.onFaceIdChanged(e);
      }),
      dispatcher.subscribe('object_available', (e) => {
        this.onObjectAvailable(e);
      }),
      dispatcher.subscribe('object_connection_state', (e) => {
        this.onConnectionStateChanged(e);
      }),
      dispatcher.subscribe('cube_connection_lost', (e) => {
        this.onCubeConnectionLost(e);
      }),
      dispatcher.subscribe('object_moved', (e) => {
        this.onMoved(e);
      }),
      dispatcher.subscribe('object_stopped_moving', (e) => {
        this.onStoppedMoving(e);
      }),
      dispatcher.subscribe('object_tapped', (e) => {
        this.onTapped(e);
      }),
      dispatcher.subscribe('object_up_axis_changed', (e) => {
        this.onUpAxisChanged(e);
      }),
    ];
    return () => {
      for (const unsubscribe of subscriptions) unsubscribe();
    };
  }

  // ── Observations ───────────────────────────────────────────────────

  /**
   * Looks up or creates the observed object, marks it visible and re-arms
   * its disappear timer. Returns null for object types this client does
   * not model.
   */
  onObserved(event: RobotObservedObjectEvent): ObjectWithId | null {
    let object = this.objectsById.get(event.objectId);
    let added = false;

    if (object === undefined) {
      const created = this.createObject(event);
      if (created === null) {
        this.log.warn({ objectId: event.objectId, objectKind: event.objectKind }, 'Ignoring observation of unsupported object type');
        return null;
      }
      object = created;
      this.objectsById.set(event.objectId, object);
      added = true;
    }

    const appeared = markObserved(
      object,
      { pose: event.pose, imageRect: event.imageRect, robotTimestamp: event.robotTimestamp },
      this.nowFn(),
    );
    if (object.objectType === 'light_cube') object.topFaceOrientationRad = event.topFaceOrientationRad;
    this.armDisappear(object);

    if (added) this.announceAdded(object);
    if (appeared) this.events.publish({ type: 'object_appeared', object, source: event });
    this.events.publish({ type: 'object_observed', object, source: event });
    return object;
  }

  onFaceObserved(event: RobotObservedFaceEvent): Face {
    let face = this.facesById.get(event.faceId);
    let added = false;

    if (face === undefined) {
      face = createFace(event.faceId);
      this.facesById.set(event.faceId, face);
      added = true;
    }

    const appeared = markObserved(
      face,
      { pose: event.pose, imageRect: event.imageRect, robotTimestamp: event.robotTimestamp },
      this.nowFn(),
    );
    markFaceDetails(face, event);
    this.armDisappear(face);

    if (added) this.announceAdded(face);
    if (appeared) {
      this.events.publish({ type: 'object_appeared', object: face, source: event });
      if (face.name.trim() !== '') {
        this.events.publish({ type: 'known_face_appeared', object: face, source: event });
      }
    }
    this.events.publish({ type: 'object_observed', object: face, source: event });
    return face;
  }

  /**
   * Runs when an object's current disappear timer fires. Superseded timers
   * never get here; the generation check in the timer set drops them.
   */
  private onDisappearTimeout(object: Mutable<WorldObject>): void {
    if (!markDisappeared(object)) return;
    this.log.debug({ object: describe(object) }, 'Object disappeared');
    this.events.publish({ type: 'object_disappeared', object });
  }

  private armDisappear(object: Mutable<WorldObject>): void {
    this.timers.arm(object, this.visibilityTimeoutMs, () => {
      this.onDisappearTimeout(object);
    });
  }

  // ── Cube events ────────────────────────────────────────────────────

  onMoved(event: ObjectMovedEvent): LightCube | null {
    const cube = this.cubeFor(event.objectId, false);
    if (cube === null) return null;
    markMoved(cube, event.robotTimestamp, this.nowFn());
    this.events.publish({ type: 'object_moving', object: cube, source: event });
    return cube;
  }

  /**
   * Returns the move duration in milliseconds; 0 when the cube was not
   * moving, in which case nothing is published.
   */
  onStoppedMoving(event: ObjectStoppedMovingEvent): number {
    const cube = this.cubeFor(event.objectId, false);
    if (cube === null || !cube.isMoving) return 0;
    const moveDurationMs = markStoppedMoving(cube, event.robotTimestamp, this.nowFn());
    this.events.publish({ type: 'object_finished_moving', object: cube, source: event, moveDurationMs });
    return moveDurationMs;
  }

  onTapped(event: ObjectTappedEvent): LightCube | null {
    const cube = this.cubeFor(event.objectId, false);
    if (cube === null) return null;
    markTapped(cube, event.robotTimestamp, this.nowFn());
    this.events.publish({ type: 'object_tapped', object: cube, source: event });
    return cube;
  }

  onUpAxisChanged(event: ObjectUpAxisChangedEvent): LightCube | null {
    const cube = this.cubeFor(event.objectId, false);
    if (cube === null) return null;
    markUpAxis(cube, event.upAxis, event.robotTimestamp, this.nowFn());
    this.events.publish({ type: 'object_up_axis_changed', object: cube, source: event, upAxis: event.upAxis });
    return cube;
  }

  onConnectionStateChanged(event: ObjectConnectionStateEvent): LightCube | null {
    const cube = this.cubeFor(event.objectId, true);
    if (cube === null) return null;
    markConnection(cube, event.connected, event.factoryId, this.nowFn());
    this.log.info({ objectId: cube.objectId, factoryId: cube.factoryId, connected: event.connected }, 'Cube connection state changed');
    if (event.connected) {
      this.events.publish({ type: 'object_connected', object: cube, source: event });
    } else {
      this.events.publish({ type: 'object_disconnected', object: cube, source: event });
    }
    return cube;
  }

  onObjectAvailable(event: ObjectAvailableEvent): void {
    if (event.factoryId === '') return;
    if (!this.availableFactoryIds.has(event.factoryId)) {
      this.log.debug({ factoryId: event.factoryId }, 'Cube available');
    }
    this.availableFactoryIds.add(event.factoryId);
  }

  /** Marks every connected cube disconnected. Returns the cubes affected. */
  onCubeConnectionLost(_event: CubeConnectionLostEvent): LightCube[] {
    const now = this.nowFn();
    const lost: LightCube[] = [];
    for (const object of this.objectsById.values()) {
      if (object.objectType !== 'light_cube' || !object.isConnected) continue;
      markConnection(object, false, '', now);
      lost.push(object);
      this.events.publish({ type: 'object_disconnected', object, source: null });
    }
    if (lost.length > 0) this.log.info({ count: lost.length }, 'Cube connection lost');
    return lost;
  }

  // ── Faces ──────────────────────────────────────────────────────────

  /**
   * Re-keys a face in place: the same object is afterwards reachable under
   * `newId` only. Unknown old ids and changes onto an id that is already
   * taken are dropped.
   */
  onFaceIdChanged(event: RobotChangedObservedFaceIdEvent): Face | null {
    const { oldId, newId } = event;
    const face = this.facesById.get(oldId);
    if (face === undefined) {
      this.log.debug({ oldId, newId }, 'Face id change for unknown face ignored');
      return null;
    }
    if (oldId === newId) return face;
    if (this.facesById.has(newId)) {
      this.log.warn({ oldId, newId }, 'Face id change onto an existing face dropped');
      return null;
    }

    this.facesById.delete(oldId);
    face.faceId = newId;
    this.facesById.set(newId, face);
    this.events.publish({ type: 'face_id_changed', object: face, source: event });
    return face;
  }

  // ── Custom objects ─────────────────────────────────────────────────

  /**
   * Binds an archetype to a custom type number. Custom objects of that type
   * already in the registry are rebound.
   *
   * @throws {ZodError} for an out-of-range type or an invalid archetype
   */
  defineCustomObject(customType: number, archetype: CustomArchetypeInput): CustomObjectArchetype {
    const type = customTypeSchema.parse(customType);
    const definition = customArchetypeSchema.parse(archetype);
    this.archetypes.set(type, definition);
    for (const object of this.objectsById.values()) {
      if (object.objectType === 'custom_object' && object.customType === type) object.archetype = definition;
    }
    this.log.info({ customType: type, shape: definition.shape }, 'Custom object defined');
    return definition;
  }

  archetypeFor(customType: number): CustomObjectArchetype | null {
    return this.archetypes.get(customType) ?? null;
  }

  /**
   * Forgets every custom object. Visible ones are marked disappeared first,
   * so held references never stay visible without a timer. Returns how many
   * were removed.
   */
  deleteCustomObjects(): number {
    let removed = 0;
    for (const [id, object] of this.objectsById) {
      if (object.objectType !== 'custom_object') continue;
      this.timers.cancel(object);
      this.objectsById.delete(id);
      if (markDisappeared(object)) this.events.publish({ type: 'object_disappeared', object });
      removed++;
    }
    return removed;
  }

  /** @throws {CustomObjectsInUseError} while any custom object is still tracked */
  deleteCustomObjectArchetypes(): void {
    const inUse = this.objects().filter((object) => object.objectType === 'custom_object').length;
    if (inUse > 0) throw new CustomObjectsInUseError(inUse);
    this.archetypes.clear();
  }

  // ── Read-only view ─────────────────────────────────────────────────

  getObject(objectId: number): ObjectWithId | undefined {
    return this.objectsById.get(objectId);
  }

  getFace(faceId: number): Face | undefined {
    return this.facesById.get(faceId);
  }

  objects(): ObjectWithId[] {
    return [...this.objectsById.values()];
  }

  faces(): Face[] {
    return [...this.facesById.values()];
  }

  visibleObjects(): WorldObject[] {
    const all: WorldObject[] = [...this.objectsById.values(), ...this.facesById.values()];
    return all.filter((o) => o.isVisible);
  }

  /** First light cube the registry learned about, if any. */
  get lightCube(): LightCube | null {
    for (const object of this.objectsById.values()) {
      if (object.objectType === 'light_cube') return object;
    }
    return null;
  }

  get charger(): Charger | null {
    for (const object of this.objectsById.values()) {
      if (object.objectType === 'charger') return object;
    }
    return null;
  }

  get isCubeConnected(): boolean {
    return this.lightCube?.isConnected ?? false;
  }

  /** Factory ids of cubes the robot reported as available for connection. */
  availableCubes(): string[] {
    return [...this.availableFactoryIds];
  }

  /**
   * Cancels pending disappear timers, marks everything not visible and
   * forgets all objects, faces and archetypes. Publishes nothing.
   */
  teardown(): void {
    this.timers.cancelAll();
    for (const object of this.objectsById.values()) markDisappeared(object);
    for (const face of this.facesById.values()) markDisappeared(face);
    this.objectsById.clear();
    this.facesById.clear();
    this.archetypes.clear();
    this.availableFactoryIds.clear();
  }

  // ── Internals ──────────────────────────────────────────────────────

  private createObject(event: RobotObservedObjectEvent): TrackedObject | null {
    switch (event.objectKind) {
      case 'light_cube':
        return createLightCube(event.objectId);
      case 'charger':
        return createCharger(event.objectId);
      case 'custom_object':
        return createCustomObject(event.objectId, event.customType, this.archetypeFor(event.customType));
      case 'unknown':
        return null;
    }
  }

  /**
   * Resolves the cube a cube event refers to. An id never seen before gets
   * a placeholder cube; `expected` says whether that is normal for the
   * event (connection reports precede observations) or an ordering anomaly.
   */
  private cubeFor(objectId: number, expected: boolean): Mutable<LightCube> | null {
    const existing = this.objectsById.get(objectId);
    if (existing === undefined) {
      const cube = createLightCube(objectId);
      this.objectsById.set(objectId, cube);
      if (expected) {
        this.log.debug({ objectId }, 'Created cube from connection report');
      } else {
        this.log.warn({ objectId }, 'Cube event for unseen object, created placeholder');
      }
      this.announceAdded(cube);
      return cube;
    }
    if (existing.objectType !== 'light_cube') {
      this.log.warn({ objectId, objectType: existing.objectType }, 'Cube event for non-cube object ignored');
      return null;
    }
    return existing;
  }

  private announceAdded(object: WorldObject): void {
    this.log.info({ object: describe(object) }, 'Object added');
    this.events.publish({ type: 'object_added', object });
  }
}

function describe(object: WorldObject): string {
  return object.objectType === 'face' ? `face:${object.faceId}` : `${object.objectType}:${object.objectId}`;
}
