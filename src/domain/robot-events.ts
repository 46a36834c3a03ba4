import type { EventKind, ObjectEventType, StatusType, WakeWordEventType } from './envelope.js';
import type { ImageRect, Point, Pose } from './geometry.js';
import type { RobotStatus } from './robot-status.js';
import type {
  AlexaAuthState,
  AttentionTransferReason,
  CubeBatteryLevel,
  FaceEnrollmentResult,
  FacialExpression,
  JdocType,
  ObjectKind,
  UnexpectedMovementSide,
  UnexpectedMovementType,
  UpAxis,
  UpdateStatus,
} from './vocabulary.js';

/**
 * Typed robot events.
 *
 * One closed tagged union. `type` is the leaf discriminant used as the
 * dispatch key; `kind` is the primary (envelope) discriminant. Compound
 * categories add their secondary discriminant, which always equals `type`.
 * Records are built once by the event factory and never mutated.
 */
interface EventBase<K extends EventKind, T extends string> {
  readonly kind: K;
  readonly type: T;
}

type SimpleEvent<K extends EventKind> = EventBase<K, K>;

// ── Object events ────────────────────────────────────────────────────

interface ObjectEventBase<T extends ObjectEventType> extends EventBase<'object_event', T> {
  readonly objectEventType: T;
}

export interface ObjectAvailableEvent extends ObjectEventBase<'object_available'> {
  readonly factoryId: string;
}

export interface ObjectConnectionStateEvent extends ObjectEventBase<'object_connection_state'> {
  readonly objectId: number;
  readonly factoryId: string;
  readonly objectKind: ObjectKind;
  readonly customType: number;
  readonly connected: boolean;
}

export interface ObjectMovedEvent extends ObjectEventBase<'object_moved'> {
  readonly objectId: number;
  readonly robotTimestamp: number;
}

export interface ObjectStoppedMovingEvent extends ObjectEventBase<'object_stopped_moving'> {
  readonly objectId: number;
  readonly robotTimestamp: number;
}

export interface ObjectUpAxisChangedEvent extends ObjectEventBase<'object_up_axis_changed'> {
  readonly objectId: number;
  readonly robotTimestamp: number;
  readonly upAxis: UpAxis;
}

export interface ObjectTappedEvent extends ObjectEventBase<'object_tapped'> {
  readonly objectId: number;
  readonly robotTimestamp: number;
}

export interface RobotObservedObjectEvent extends ObjectEventBase<'robot_observed_object'> {
  readonly objectId: number;
  readonly objectKind: ObjectKind;
  readonly customType: number;
  readonly pose: Pose;
  readonly imageRect: ImageRect;
  readonly robotTimestamp: number;
  readonly isActive: boolean;
  readonly topFaceOrientationRad: number;
}

export type CubeConnectionLostEvent = ObjectEventBase<'cube_connection_lost'>;

export type ObjectEvent =
  | ObjectAvailableEvent
  | ObjectConnectionStateEvent
  | ObjectMovedEvent
  | ObjectStoppedMovingEvent
  | ObjectUpAxisChangedEvent
  | ObjectTappedEvent
  | RobotObservedObjectEvent
  | CubeConnectionLostEvent;

// ── Time-stamped status events ───────────────────────────────────────

interface StatusEventBase<T extends StatusType> extends EventBase<'time_stamped_status', T> {
  readonly statusType: T;
  /** Robot-reported UTC time, epoch milliseconds. */
  readonly timestamp: number;
}

export interface FeatureStatusEvent extends StatusEventBase<'feature_status'> {
  readonly featureName: string;
  readonly source: string;
}

export type FaceScanStartedEvent = StatusEventBase<'face_scan_started'>;

export type FaceScanCompleteEvent = StatusEventBase<'face_scan_complete'>;

export interface FaceEnrollmentCompletedEvent extends StatusEventBase<'face_enrollment_completed'> {
  readonly result: FaceEnrollmentResult;
  readonly faceId: number;
  readonly name: string;
}

export type StatusEvent =
  | FeatureStatusEvent
  | FaceScanStartedEvent
  | FaceScanCompleteEvent
  | FaceEnrollmentCompletedEvent;

// ── Wake word events ─────────────────────────────────────────────────

interface WakeWordEventBase<T extends WakeWordEventType> extends EventBase<'wake_word', T> {
  readonly wakeWordEventType: T;
}

export type WakeWordBeginEvent = WakeWordEventBase<'wake_word_begin'>;

export interface WakeWordEndEvent extends WakeWordEventBase<'wake_word_end'> {
  readonly intentHeard: boolean;
  readonly intentJson: string;
}

export type WakeWordEvent = WakeWordBeginEvent | WakeWordEndEvent;

// ── Single-case events ───────────────────────────────────────────────

export interface RobotObservedFaceEvent extends SimpleEvent<'robot_observed_face'> {
  readonly faceId: number;
  readonly pose: Pose;
  readonly imageRect: ImageRect;
  readonly robotTimestamp: number;
  readonly name: string;
  readonly expression: FacialExpression;
  readonly expressionValues: readonly number[];
  readonly leftEye: readonly Point[];
  readonly rightEye: readonly Point[];
  readonly nose: readonly Point[];
  readonly mouth: readonly Point[];
}

export interface RobotChangedObservedFaceIdEvent extends SimpleEvent<'robot_changed_observed_face_id'> {
  readonly oldId: number;
  readonly newId: number;
}

export interface StimulationInfoEvent extends SimpleEvent<'stimulation_info'> {
  readonly emotionEvents: readonly string[];
  readonly value: number;
  readonly velocity: number;
  readonly acceleration: number;
  readonly valueBeforeEvent: number;
  readonly minValue: number;
  readonly maxValue: number;
}

export interface PhotoTakenEvent extends SimpleEvent<'photo_taken'> {
  readonly photoId: number;
}

export interface Vector3 {
  readonly x: number;
  readonly y: number;
  readonly z: number;
}

export interface ProximityReading {
  readonly distanceMm: number;
  readonly signalQuality: number;
  readonly unobstructed: boolean;
  readonly foundObject: boolean;
  readonly isLiftInFov: boolean;
}

export interface TouchReading {
  readonly rawTouchValue: number;
  readonly isBeingTouched: boolean;
}

export interface RobotStateEvent extends SimpleEvent<'robot_state'> {
  readonly pose: Pose;
  readonly poseAngleRad: number;
  readonly posePitchRad: number;
  readonly leftWheelSpeedMmps: number;
  readonly rightWheelSpeedMmps: number;
  readonly headAngleRad: number;
  readonly liftHeightMm: number;
  readonly acceleration: Vector3;
  readonly gyro: Vector3;
  readonly carryingObjectId: number;
  readonly carryingObjectOnTopId: number;
  readonly headTrackingObjectId: number;
  readonly localizedToObjectId: number;
  readonly lastImageTimestamp: number;
  readonly status: RobotStatus;
  readonly proximity: ProximityReading;
  readonly touch: TouchReading;
}

export interface CubeBatteryEvent extends SimpleEvent<'cube_battery'> {
  readonly level: CubeBatteryLevel;
  readonly factoryId: string;
  readonly batteryVolts: number;
  readonly timeSinceLastReadingSec: number;
}

export type KeepAliveEvent = SimpleEvent<'keep_alive'>;

export interface ConnectionResponseEvent extends SimpleEvent<'connection_response'> {
  readonly isPrimary: boolean;
}

export type MirrorModeDisabledEvent = SimpleEvent<'mirror_mode_disabled'>;

export type VisionModesAutoDisabledEvent = SimpleEvent<'vision_modes_auto_disabled'>;

export interface UserIntentEvent extends SimpleEvent<'user_intent'> {
  readonly intentCode: number;
  /** Intent name, or `unknown` when the code is newer than this client. */
  readonly intent: string;
  readonly intentData: string;
}

export interface AlexaAuthEvent extends SimpleEvent<'alexa_auth_event'> {
  readonly authState: AlexaAuthState;
  readonly extra: string;
}

export interface AttentionTransferEvent extends SimpleEvent<'attention_transfer'> {
  readonly reason: AttentionTransferReason;
  readonly secondsAgo: number;
}

export interface CameraSettingsUpdateEvent extends SimpleEvent<'camera_settings_update'> {
  readonly autoExposureEnabled: boolean;
  readonly exposureMs: number;
  readonly gain: number;
}

export interface CheckUpdateStatusEvent extends SimpleEvent<'check_update_status_response'> {
  readonly updateStatus: UpdateStatus;
  readonly expected: number;
  readonly progress: number;
  readonly updateVersion: string;
}

export interface JdocsChangedEvent extends SimpleEvent<'jdocs_changed'> {
  readonly changedJdocs: readonly JdocType[];
}

export interface RobotErasedEnrolledFaceEvent extends SimpleEvent<'robot_erased_enrolled_face'> {
  readonly faceId: number;
  readonly name: string;
}

export interface RobotRenamedEnrolledFaceEvent extends SimpleEvent<'robot_renamed_enrolled_face'> {
  readonly faceId: number;
  readonly name: string;
}

export interface MotionRegion {
  readonly area: number;
  readonly x: number;
  readonly y: number;
}

export interface RobotObservedMotionEvent extends SimpleEvent<'robot_observed_motion'> {
  readonly robotTimestamp: number;
  readonly image: MotionRegion;
  readonly ground: MotionRegion;
  readonly top: MotionRegion;
  readonly bottom: MotionRegion;
  readonly left: MotionRegion;
  readonly right: MotionRegion;
}

export interface UnexpectedMovementEvent extends SimpleEvent<'unexpected_movement'> {
  readonly robotTimestamp: number;
  readonly movementType: UnexpectedMovementType;
  readonly movementSide: UnexpectedMovementSide;
}

export type RobotEvent =
  | ObjectEvent
  | StatusEvent
  | WakeWordEvent
  | RobotObservedFaceEvent
  | RobotChangedObservedFaceIdEvent
  | StimulationInfoEvent
  | PhotoTakenEvent
  | RobotStateEvent
  | CubeBatteryEvent
  | KeepAliveEvent
  | ConnectionResponseEvent
  | MirrorModeDisabledEvent
  | VisionModesAutoDisabledEvent
  | UserIntentEvent
  | AlexaAuthEvent
  | AttentionTransferEvent
  | CameraSettingsUpdateEvent
  | CheckUpdateStatusEvent
  | JdocsChangedEvent
  | RobotErasedEnrolledFaceEvent
  | RobotRenamedEnrolledFaceEvent
  | RobotObservedMotionEvent
  | UnexpectedMovementEvent;

/** Leaf discriminant of every typed robot event. */
export type RobotEventType = RobotEvent['type'];
