import type { ZodType, ZodTypeDef } from 'zod';
import {
  OBJECT_EVENT_TYPES,
  WAKE_WORD_EVENT_TYPES,
  isEventKind,
  type Envelope,
  type EventKind,
  type ObjectEventType,
  type StatusType,
  type WakeWordEventType,
} from '../domain/envelope.js';
import { DecodeError, EnvelopeMismatchError } from '../domain/errors.js';
import type { ImageRect, Point, Pose } from '../domain/geometry.js';
import { decodeRobotStatus } from '../domain/robot-status.js';
import type {
  ObjectEvent,
  RobotEvent,
  StatusEvent,
  WakeWordEvent,
} from '../domain/robot-events.js';
import {
  ALEXA_AUTH_STATES,
  ATTENTION_TRANSFER_REASONS,
  CUBE_BATTERY_LEVELS,
  FACE_ENROLLMENT_RESULTS,
  FACIAL_EXPRESSIONS,
  JDOC_TYPES,
  UNEXPECTED_MOVEMENT_SIDES,
  UNEXPECTED_MOVEMENT_TYPES,
  UPDATE_STATUSES,
  UP_AXES,
  fromCode,
  objectKindFromCode,
} from '../domain/vocabulary.js';
import {
  alexaAuthSchema,
  attentionTransferSchema,
  cameraSettingsUpdateSchema,
  checkUpdateStatusSchema,
  connectionResponseSchema,
  cubeBatterySchema,
  emptySchema,
  enrolledFaceSchema,
  faceEnrollmentCompletedSchema,
  featureStatusSchema,
  jdocsChangedSchema,
  messageSchema,
  objectAvailableSchema,
  objectConnectionStateSchema,
  objectTimestampSchema,
  objectUpAxisChangedSchema,
  photoTakenSchema,
  robotChangedObservedFaceIdSchema,
  robotObservedFaceSchema,
  robotObservedMotionSchema,
  robotObservedObjectSchema,
  robotStateSchema,
  stimulationInfoSchema,
  timeStampedStatusSchema,
  unexpectedMovementSchema,
  userIntentSchema,
  wakeWordEndSchema,
  type ImageRectInput,
  type PointInput,
  type PoseInput,
} from './envelope-schema.js';
import { userIntentName } from './user-intents.js';

/**
 * Typed event factory.
 *
 * Turns a wire envelope into exactly one typed event, or a `DecodeError`.
 * Pure: no logging, no registry access. The caller decides how failures
 * are surfaced.
 */
export type DecodeResult<E> = { ok: true; event: E } | { ok: false; error: DecodeError };

type Parsed<T> = { ok: true; value: T } | { ok: false; error: DecodeError };

type WireSchema<T> = ZodType<T, ZodTypeDef, unknown>;

function parse<T>(kind: string, schema: WireSchema<T>, payload: unknown): Parsed<T> {
  const result = schema.safeParse(payload);
  if (result.success) return { ok: true, value: result.data };
  const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
  return {
    ok: false,
    error: new DecodeError('invalid_payload', kind, `Invalid '${kind}' payload`, issues),
  };
}

function build<T, E extends RobotEvent>(
  kind: string,
  schema: WireSchema<T>,
  payload: unknown,
  toEvent: (body: T) => E,
): DecodeResult<E> {
  const parsed = parse(kind, schema, payload);
  if (!parsed.ok) return parsed;
  return { ok: true, event: toEvent(parsed.value) };
}

function toPose(pose: PoseInput): Pose {
  return {
    position: { x: pose.x, y: pose.y, z: pose.z },
    rotation: { q0: pose.q0, q1: pose.q1, q2: pose.q2, q3: pose.q3 },
    originId: pose.origin_id,
  };
}

function toImageRect(rect: ImageRectInput): ImageRect {
  return {
    xTopLeft: rect.x_top_left,
    yTopLeft: rect.y_top_left,
    width: rect.width,
    height: rect.height,
  };
}

function toPoints(points: readonly PointInput[]): Point[] {
  return points.map(({ x, y }) => ({ x, y }));
}

// ── Oneof containers ─────────────────────────────────────────────────

type Branch<T extends string> = { ok: true; type: T; body: unknown } | { ok: false; error: DecodeError };

/**
 * Picks the single populated branch of a protobuf-JSON oneof container.
 * `branches` maps wire keys to secondary discriminants; keys not in it are
 * ignored unless nothing else is set.
 */
function selectBranch<T extends string>(
  kind: string,
  container: Record<string, unknown>,
  branches: ReadonlyMap<string, T>,
): Branch<T> {
  const present = Object.entries(container).filter(([, body]) => body !== undefined && body !== null);
  if (present.length === 0) {
    return { ok: false, error: new DecodeError('missing_payload', kind, `'${kind}' envelope has no nested event`) };
  }

  const matches = present.flatMap(([key, body]) => {
    const type = branches.get(key);
    return type === undefined ? [] : [{ type, body }];
  });

  const match = matches[0];
  if (match === undefined) {
    const keys = present.map(([key]) => key);
    return {
      ok: false,
      error: new DecodeError('unknown_subtype', kind, `Unknown '${kind}' subtype: ${keys.join(', ')}`, keys),
    };
  }
  if (matches.length > 1) {
    const keys = matches.map((m) => m.type);
    return {
      ok: false,
      error: new DecodeError('invalid_payload', kind, `'${kind}' envelope sets more than one subtype`, keys),
    };
  }
  return { ok: true, type: match.type, body: match.body };
}

function identityBranches<T extends string>(types: readonly T[]): ReadonlyMap<string, T> {
  return new Map(types.map((type): [string, T] => [type, type]));
}

// ── object_event ─────────────────────────────────────────────────────

const OBJECT_BRANCHES = identityBranches(OBJECT_EVENT_TYPES);

type ObjectDecoders = {
  [T in ObjectEventType]: (body: unknown) => DecodeResult<Extract<ObjectEvent, { type: T }>>;
};

const objectDecoders: ObjectDecoders = {
  object_available: (body) =>
    build('object_event', objectAvailableSchema, body, (b) => ({
      kind: 'object_event',
      type: 'object_available',
      objectEventType: 'object_available',
      factoryId: b.factory_id,
    })),
  object_connection_state: (body) =>
    build('object_event', objectConnectionStateSchema, body, (b) => {
      const { kind: objectKind, customType } = objectKindFromCode(b.object_type);
      return {
        kind: 'object_event',
        type: 'object_connection_state',
        objectEventType: 'object_connection_state',
        objectId: b.object_id,
        factoryId: b.factory_id,
        objectKind,
        customType,
        connected: b.connected,
      };
    }),
  object_moved: (body) =>
    build('object_event', objectTimestampSchema, body, (b) => ({
      kind: 'object_event',
      type: 'object_moved',
      objectEventType: 'object_moved',
      objectId: b.object_id,
      robotTimestamp: b.timestamp,
    })),
  object_stopped_moving: (body) =>
    build('object_event', objectTimestampSchema, body, (b) => ({
      kind: 'object_event',
      type: 'object_stopped_moving',
      objectEventType: 'object_stopped_moving',
      objectId: b.object_id,
      robotTimestamp: b.timestamp,
    })),
  object_up_axis_changed: (body) =>
    build('object_event', objectUpAxisChangedSchema, body, (b) => ({
      kind: 'object_event',
      type: 'object_up_axis_changed',
      objectEventType: 'object_up_axis_changed',
      objectId: b.object_id,
      robotTimestamp: b.timestamp,
      upAxis: fromCode(UP_AXES, b.up_axis, 'invalid_axis'),
    })),
  object_tapped: (body) =>
    build('object_event', objectTimestampSchema, body, (b) => ({
      kind: 'object_event',
      type: 'object_tapped',
      objectEventType: 'object_tapped',
      objectId: b.object_id,
      robotTimestamp: b.timestamp,
    })),
  robot_observed_object: (body) =>
    build('object_event', robotObservedObjectSchema, body, (b) => {
      const { kind: objectKind, customType } = objectKindFromCode(b.object_type);
      return {
        kind: 'object_event',
        type: 'robot_observed_object',
        objectEventType: 'robot_observed_object',
        objectId: b.object_id,
        objectKind,
        customType,
        pose: toPose(b.pose),
        imageRect: toImageRect(b.img_rect),
        robotTimestamp: b.timestamp,
        isActive: b.is_active !== 0,
        topFaceOrientationRad: b.top_face_orientation_rad,
      };
    }),
  cube_connection_lost: (body) =>
    build('object_event', emptySchema, body, () => ({
      kind: 'object_event',
      type: 'cube_connection_lost',
      objectEventType: 'cube_connection_lost',
    })),
};

function decodeObjectEvent(payload: unknown): DecodeResult<ObjectEvent> {
  const container = parse('object_event', messageSchema, payload);
  if (!container.ok) return container;
  const branch = selectBranch('object_event', container.value, OBJECT_BRANCHES);
  if (!branch.ok) return branch;
  return objectDecoders[branch.type](branch.body);
}

// ── time_stamped_status ──────────────────────────────────────────────

const STATUS_BRANCHES: ReadonlyMap<string, StatusType> = new Map<string, StatusType>([
  ['feature_status', 'feature_status'],
  ['meet_victor_face_scan_started', 'face_scan_started'],
  ['meet_victor_face_scan_complete', 'face_scan_complete'],
  ['face_enrollment_completed', 'face_enrollment_completed'],
]);

type StatusDecoders = {
  [T in StatusType]: (body: unknown, timestamp: number) => DecodeResult<Extract<StatusEvent, { type: T }>>;
};

const statusDecoders: StatusDecoders = {
  feature_status: (body, timestamp) =>
    build('time_stamped_status', featureStatusSchema, body, (b) => ({
      kind: 'time_stamped_status',
      type: 'feature_status',
      statusType: 'feature_status',
      timestamp,
      featureName: b.feature_name,
      source: b.source,
    })),
  face_scan_started: (body, timestamp) =>
    build('time_stamped_status', emptySchema, body, () => ({
      kind: 'time_stamped_status',
      type: 'face_scan_started',
      statusType: 'face_scan_started',
      timestamp,
    })),
  face_scan_complete: (body, timestamp) =>
    build('time_stamped_status', emptySchema, body, () => ({
      kind: 'time_stamped_status',
      type: 'face_scan_complete',
      statusType: 'face_scan_complete',
      timestamp,
    })),
  face_enrollment_completed: (body, timestamp) =>
    build('time_stamped_status', faceEnrollmentCompletedSchema, body, (b) => ({
      kind: 'time_stamped_status',
      type: 'face_enrollment_completed',
      statusType: 'face_enrollment_completed',
      timestamp,
      result: fromCode(FACE_ENROLLMENT_RESULTS, b.result, 'unknown_failure'),
      faceId: b.face_id,
      name: b.name,
    })),
};

function decodeStatusEvent(payload: unknown): DecodeResult<StatusEvent> {
  const outer = parse('time_stamped_status', timeStampedStatusSchema, payload);
  if (!outer.ok) return outer;
  const { status, timestamp_utc } = outer.value;
  if (status === undefined) {
    return {
      ok: false,
      error: new DecodeError('missing_payload', 'time_stamped_status', "'time_stamped_status' envelope has no status"),
    };
  }
  const branch = selectBranch('time_stamped_status', status, STATUS_BRANCHES);
  if (!branch.ok) return branch;
  return statusDecoders[branch.type](branch.body, timestamp_utc * 1000);
}

// ── wake_word ────────────────────────────────────────────────────────

const WAKE_WORD_BRANCHES = identityBranches(WAKE_WORD_EVENT_TYPES);

type WakeWordDecoders = {
  [T in WakeWordEventType]: (body: unknown) => DecodeResult<Extract<WakeWordEvent, { type: T }>>;
};

const wakeWordDecoders: WakeWordDecoders = {
  wake_word_begin: (body) =>
    build('wake_word', emptySchema, body, () => ({
      kind: 'wake_word',
      type: 'wake_word_begin',
      wakeWordEventType: 'wake_word_begin',
    })),
  wake_word_end: (body) =>
    build('wake_word', wakeWordEndSchema, body, (b) => ({
      kind: 'wake_word',
      type: 'wake_word_end',
      wakeWordEventType: 'wake_word_end',
      intentHeard: b.intent_heard,
      intentJson: b.intent_json,
    })),
};

function decodeWakeWordEvent(payload: unknown): DecodeResult<WakeWordEvent> {
  const container = parse('wake_word', messageSchema, payload);
  if (!container.ok) return container;
  const branch = selectBranch('wake_word', container.value, WAKE_WORD_BRANCHES);
  if (!branch.ok) return branch;
  return wakeWordDecoders[branch.type](branch.body);
}

// ── Kind table ───────────────────────────────────────────────────────

type KindDecoders = {
  [K in EventKind]: (payload: unknown) => DecodeResult<Extract<RobotEvent, { kind: K }>>;
};

const kindDecoders: KindDecoders = {
  object_event: decodeObjectEvent,
  time_stamped_status: decodeStatusEvent,
  wake_word: decodeWakeWordEvent,

  robot_observed_face: (payload) =>
    build('robot_observed_face', robotObservedFaceSchema, payload, (b) => ({
      kind: 'robot_observed_face',
      type: 'robot_observed_face',
      faceId: b.face_id,
      pose: toPose(b.pose),
      imageRect: toImageRect(b.img_rect),
      robotTimestamp: b.timestamp,
      name: b.name,
      expression: fromCode(FACIAL_EXPRESSIONS, b.expression, 'unknown'),
      expressionValues: b.expression_values,
      leftEye: toPoints(b.left_eye),
      rightEye: toPoints(b.right_eye),
      nose: toPoints(b.nose),
      mouth: toPoints(b.mouth),
    })),

  robot_changed_observed_face_id: (payload) =>
    build('robot_changed_observed_face_id', robotChangedObservedFaceIdSchema, payload, (b) => ({
      kind: 'robot_changed_observed_face_id',
      type: 'robot_changed_observed_face_id',
      oldId: b.old_id,
      newId: b.new_id,
    })),

  stimulation_info: (payload) =>
    build('stimulation_info', stimulationInfoSchema, payload, (b) => ({
      kind: 'stimulation_info',
      type: 'stimulation_info',
      emotionEvents: b.emotion_events,
      value: b.value,
      velocity: b.velocity,
      acceleration: b.accel,
      valueBeforeEvent: b.value_before_event,
      minValue: b.min_value,
      maxValue: b.max_value,
    })),

  photo_taken: (payload) =>
    build('photo_taken', photoTakenSchema, payload, (b) => ({
      kind: 'photo_taken',
      type: 'photo_taken',
      photoId: b.photo_id,
    })),

  robot_state: (payload) =>
    build('robot_state', robotStateSchema, payload, (b) => ({
      kind: 'robot_state',
      type: 'robot_state',
      pose: toPose(b.pose),
      poseAngleRad: b.pose_angle_rad,
      posePitchRad: b.pose_pitch_rad,
      leftWheelSpeedMmps: b.left_wheel_speed_mmps,
      rightWheelSpeedMmps: b.right_wheel_speed_mmps,
      headAngleRad: b.head_angle_rad,
      liftHeightMm: b.lift_height_mm,
      acceleration: { x: b.accel.x, y: b.accel.y, z: b.accel.z },
      gyro: { x: b.gyro.x, y: b.gyro.y, z: b.gyro.z },
      carryingObjectId: b.carrying_object_id,
      carryingObjectOnTopId: b.carrying_object_on_top_id,
      headTrackingObjectId: b.head_tracking_object_id,
      localizedToObjectId: b.localized_to_object_id,
      lastImageTimestamp: b.last_image_time_stamp,
      status: decodeRobotStatus(b.status),
      proximity: {
        distanceMm: b.prox_data.distance_mm,
        signalQuality: b.prox_data.signal_quality,
        unobstructed: b.prox_data.unobstructed,
        foundObject: b.prox_data.found_object,
        isLiftInFov: b.prox_data.is_lift_in_fov,
      },
      touch: {
        rawTouchValue: b.touch_data.raw_touch_value,
        isBeingTouched: b.touch_data.is_being_touched,
      },
    })),

  cube_battery: (payload) =>
    build('cube_battery', cubeBatterySchema, payload, (b) => ({
      kind: 'cube_battery',
      type: 'cube_battery',
      level: fromCode(CUBE_BATTERY_LEVELS, b.level, 'normal'),
      factoryId: b.factory_id,
      batteryVolts: b.battery_volts,
      timeSinceLastReadingSec: b.time_since_last_reading_sec,
    })),

  keep_alive: (payload) =>
    build('keep_alive', emptySchema, payload, () => ({ kind: 'keep_alive', type: 'keep_alive' })),

  connection_response: (payload) =>
    build('connection_response', connectionResponseSchema, payload, (b) => ({
      kind: 'connection_response',
      type: 'connection_response',
      isPrimary: b.is_primary,
    })),

  mirror_mode_disabled: (payload) =>
    build('mirror_mode_disabled', emptySchema, payload, () => ({
      kind: 'mirror_mode_disabled',
      type: 'mirror_mode_disabled',
    })),

  vision_modes_auto_disabled: (payload) =>
    build('vision_modes_auto_disabled', emptySchema, payload, () => ({
      kind: 'vision_modes_auto_disabled',
      type: 'vision_modes_auto_disabled',
    })),

  user_intent: (payload) =>
    build('user_intent', userIntentSchema, payload, (b) => ({
      kind: 'user_intent',
      type: 'user_intent',
      intentCode: b.intent_id,
      intent: userIntentName(b.intent_id),
      intentData: b.json_data,
    })),

  alexa_auth_event: (payload) =>
    build('alexa_auth_event', alexaAuthSchema, payload, (b) => ({
      kind: 'alexa_auth_event',
      type: 'alexa_auth_event',
      authState: fromCode(ALEXA_AUTH_STATES, b.auth_state, 'invalid'),
      extra: b.extra,
    })),

  attention_transfer: (payload) =>
    build('attention_transfer', attentionTransferSchema, payload, (b) => ({
      kind: 'attention_transfer',
      type: 'attention_transfer',
      reason: fromCode(ATTENTION_TRANSFER_REASONS, b.reason, 'invalid'),
      secondsAgo: b.seconds_ago,
    })),

  camera_settings_update: (payload) =>
    build('camera_settings_update', cameraSettingsUpdateSchema, payload, (b) => ({
      kind: 'camera_settings_update',
      type: 'camera_settings_update',
      autoExposureEnabled: b.auto_exposure_enabled,
      exposureMs: b.exposure_ms,
      gain: b.gain,
    })),

  check_update_status_response: (payload) =>
    build('check_update_status_response', checkUpdateStatusSchema, payload, (b) => ({
      kind: 'check_update_status_response',
      type: 'check_update_status_response',
      updateStatus: fromCode(UPDATE_STATUSES, b.update_status, 'no_update'),
      expected: b.expected,
      progress: b.progress,
      updateVersion: b.update_version,
    })),

  jdocs_changed: (payload) =>
    build('jdocs_changed', jdocsChangedSchema, payload, (b) => ({
      kind: 'jdocs_changed',
      type: 'jdocs_changed',
      // unknown document types are dropped rather than mislabelled
      changedJdocs: b.jdoc_types.flatMap((code) => {
        const jdoc = JDOC_TYPES[code];
        return jdoc === undefined ? [] : [jdoc];
      }),
    })),

  robot_erased_enrolled_face: (payload) =>
    build('robot_erased_enrolled_face', enrolledFaceSchema, payload, (b) => ({
      kind: 'robot_erased_enrolled_face',
      type: 'robot_erased_enrolled_face',
      faceId: b.face_id,
      name: b.name,
    })),

  robot_renamed_enrolled_face: (payload) =>
    build('robot_renamed_enrolled_face', enrolledFaceSchema, payload, (b) => ({
      kind: 'robot_renamed_enrolled_face',
      type: 'robot_renamed_enrolled_face',
      faceId: b.face_id,
      name: b.name,
    })),

  robot_observed_motion: (payload) =>
    build('robot_observed_motion', robotObservedMotionSchema, payload, (b) => ({
      kind: 'robot_observed_motion',
      type: 'robot_observed_motion',
      robotTimestamp: b.timestamp,
      image: { area: b.img_area, x: b.img_x, y: b.img_y },
      ground: { area: b.ground_area, x: b.ground_x, y: b.ground_y },
      top: { area: b.top_img_area, x: b.top_img_x, y: b.top_img_y },
      bottom: { area: b.bottom_img_area, x: b.bottom_img_x, y: b.bottom_img_y },
      left: { area: b.left_img_area, x: b.left_img_x, y: b.left_img_y },
      right: { area: b.right_img_area, x: b.right_img_x, y: b.right_img_y },
    })),

  unexpected_movement: (payload) =>
    build('unexpected_movement', unexpectedMovementSchema, payload, (b) => ({
      kind: 'unexpected_movement',
      type: 'unexpected_movement',
      robotTimestamp: b.timestamp,
      movementType: fromCode(UNEXPECTED_MOVEMENT_TYPES, b.movement_type, 'turned_but_stopped'),
      movementSide: fromCode(UNEXPECTED_MOVEMENT_SIDES, b.movement_side, 'unknown'),
    })),
};

function missingPayload(kind: string): DecodeResult<never> {
  return { ok: false, error: new DecodeError('missing_payload', kind, `'${kind}' envelope has no payload`) };
}

/**
 * Decodes one envelope. Never throws: unknown kinds, unknown subtypes and
 * malformed payloads come back as a `DecodeError`.
 */
export function decodeEnvelope(envelope: Envelope): DecodeResult<RobotEvent> {
  const { kind, payload } = envelope;
  if (!isEventKind(kind)) {
    return { ok: false, error: new DecodeError('unknown_kind', kind, `Unknown event kind '${kind}'`) };
  }
  if (payload === undefined || payload === null) return missingPayload(kind);
  return kindDecoders[kind](payload);
}

function requireKind(envelope: Envelope, expected: EventKind): void {
  if (envelope.kind !== expected) throw new EnvelopeMismatchError(expected, envelope.kind);
}

/** @throws {EnvelopeMismatchError} when `envelope.kind` is not `object_event` */
export function objectEventFromEnvelope(envelope: Envelope): DecodeResult<ObjectEvent> {
  requireKind(envelope, 'object_event');
  if (envelope.payload === undefined || envelope.payload === null) return missingPayload(envelope.kind);
  return decodeObjectEvent(envelope.payload);
}

/** @throws {EnvelopeMismatchError} when `envelope.kind` is not `time_stamped_status` */
export function statusEventFromEnvelope(envelope: Envelope): DecodeResult<StatusEvent> {
  requireKind(envelope, 'time_stamped_status');
  if (envelope.payload === undefined || envelope.payload === null) return missingPayload(envelope.kind);
  return decodeStatusEvent(envelope.payload);
}

/** @throws {EnvelopeMismatchError} when `envelope.kind` is not `wake_word` */
export function wakeWordEventFromEnvelope(envelope: Envelope): DecodeResult<WakeWordEvent> {
  requireKind(envelope, 'wake_word');
  if (envelope.payload === undefined || envelope.payload === null) return missingPayload(envelope.kind);
  return decodeWakeWordEvent(envelope.payload);
}
