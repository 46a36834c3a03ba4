import type {
  ObjectConnectionStateEvent,
  ObjectMovedEvent,
  ObjectStoppedMovingEvent,
  ObjectTappedEvent,
  ObjectUpAxisChangedEvent,
  RobotChangedObservedFaceIdEvent,
  RobotObservedFaceEvent,
  RobotObservedObjectEvent,
} from './robot-events.js';
import type { Face, LightCube, WorldObject } from './world-objects.js';
import type { UpAxis } from './vocabulary.js';

/**
 * Object-bound events published by the world registry.
 *
 * Each pairs the raw robot event (when there is one) with the resolved
 * object reference, so subscribers never look the object up by id.
 */
export interface ObjectAddedEvent {
  readonly type: 'object_added';
  readonly object: WorldObject;
}

export interface ObjectAppearedEvent {
  readonly type: 'object_appeared';
  readonly object: WorldObject;
  readonly source: RobotObservedObjectEvent | RobotObservedFaceEvent;
}

export interface ObjectObservedEvent {
  readonly type: 'object_observed';
  readonly object: WorldObject;
  readonly source: RobotObservedObjectEvent | RobotObservedFaceEvent;
}

export interface ObjectDisappearedEvent {
  readonly type: 'object_disappeared';
  readonly object: WorldObject;
}

export interface ObjectConnectedEvent {
  readonly type: 'object_connected';
  readonly object: LightCube;
  readonly source: ObjectConnectionStateEvent;
}

export interface ObjectDisconnectedEvent {
  readonly type: 'object_disconnected';
  readonly object: LightCube;
  /** `null` when the disconnect came from `cube_connection_lost`. */
  readonly source: ObjectConnectionStateEvent | null;
}

export interface ObjectMovingEvent {
  readonly type: 'object_moving';
  readonly object: LightCube;
  readonly source: ObjectMovedEvent;
}

export interface ObjectFinishedMovingEvent {
  readonly type: 'object_finished_moving';
  readonly object: LightCube;
  readonly source: ObjectStoppedMovingEvent;
  readonly moveDurationMs: number;
}

export interface ObjectTappedWorldEvent {
  readonly type: 'object_tapped';
  readonly object: LightCube;
  readonly source: ObjectTappedEvent;
}

export interface ObjectUpAxisChangedWorldEvent {
  readonly type: 'object_up_axis_changed';
  readonly object: LightCube;
  readonly source: ObjectUpAxisChangedEvent;
  readonly upAxis: UpAxis;
}

export interface KnownFaceAppearedEvent {
  readonly type: 'known_face_appeared';
  readonly object: Face;
  readonly source: RobotObservedFaceEvent;
}

export interface FaceIdChangedEvent {
  readonly type: 'face_id_changed';
  readonly object: Face;
  readonly source: RobotChangedObservedFaceIdEvent;
}

export type WorldEvent =
  | ObjectAddedEvent
  | ObjectAppearedEvent
  | ObjectObservedEvent
  | ObjectDisappearedEvent
  | ObjectConnectedEvent
  | ObjectDisconnectedEvent
  | ObjectMovingEvent
  | ObjectFinishedMovingEvent
  | ObjectTappedWorldEvent
  | ObjectUpAxisChangedWorldEvent
  | KnownFaceAppearedEvent
  | FaceIdChangedEvent;

export type WorldEventType = WorldEvent['type'];
