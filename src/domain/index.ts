export type { Envelope, EventKind, ObjectEventType, StatusType, WakeWordEventType } from './envelope.js';
export { EVENT_KINDS, OBJECT_EVENT_TYPES, STATUS_TYPES, WAKE_WORD_EVENT_TYPES, isEventKind } from './envelope.js';
export { CustomObjectsInUseError, DecodeError, EnvelopeMismatchError, UnknownAnimationError } from './errors.js';
export type { DecodeFailureReason } from './errors.js';
export type { Position, Quaternion, Pose, ImageRect, Point } from './geometry.js';
export { ORIGIN_POSE, EMPTY_IMAGE_RECT } from './geometry.js';
export type { RobotStatus, RobotStatusFlag } from './robot-status.js';
export { decodeRobotStatus, encodeRobotStatus } from './robot-status.js';
export type { RobotEvent, RobotEventType, ObjectEvent, StatusEvent, WakeWordEvent } from './robot-events.js';
export type { WorldEvent, WorldEventType } from './world-events.js';
export type {
  LightCube,
  Charger,
  CustomObject,
  CustomObjectArchetype,
  CustomObjectMarker,
  Face,
  ObjectWithId,
  WorldObject,
} from './world-objects.js';
export { CUSTOM_OBJECT_MARKERS, INVALID_OBJECT_ID } from './world-objects.js';
export * from './vocabulary.js';
