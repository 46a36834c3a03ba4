import { z } from 'zod';

/**
 * Zod schemas for envelope payloads.
 *
 * Payloads arrive in protobuf-JSON shape with the proto field names kept
 * (snake_case). Scalars equal to their default value are omitted on the
 * wire, so every scalar here carries a `.default()`. Enumerations travel as
 * integers and are mapped to names by the event factory.
 */

const int = () => z.number().int().default(0);
const float = () => z.number().default(0);
const text = () => z.string().default('');
const flag = () => z.boolean().default(false);

export const poseSchema = z.object({
  x: float(),
  y: float(),
  z: float(),
  q0: float(),
  q1: float(),
  q2: float(),
  q3: float(),
  origin_id: int(),
});

export const imageRectSchema = z.object({
  x_top_left: float(),
  y_top_left: float(),
  width: float(),
  height: float(),
});

export const pointSchema = z.object({
  x: float(),
  y: float(),
});

const vectorSchema = z.object({
  x: float(),
  y: float(),
  z: float(),
});

/** Any JSON object; used to read oneof containers before the branch is known. */
export const messageSchema = z.record(z.string(), z.unknown());

export const emptySchema = z.object({});

// ── object_event branches ────────────────────────────────────────────

export const objectAvailableSchema = z.object({
  factory_id: text(),
});

export const objectConnectionStateSchema = z.object({
  object_id: int(),
  factory_id: text(),
  object_type: int(),
  connected: flag(),
});

export const objectTimestampSchema = z.object({
  timestamp: int(),
  object_id: int(),
});

export const objectUpAxisChangedSchema = objectTimestampSchema.extend({
  up_axis: int(),
});

export const robotObservedObjectSchema = z.object({
  timestamp: int(),
  object_family: int(),
  object_type: int(),
  object_id: int(),
  img_rect: imageRectSchema.default({}),
  pose: poseSchema.default({}),
  top_face_orientation_rad: float(),
  is_active: int(),
});

// ── time_stamped_status branches ─────────────────────────────────────

export const timeStampedStatusSchema = z.object({
  /** Robot UTC clock, seconds. */
  timestamp_utc: int(),
  status: messageSchema.optional(),
});

export const featureStatusSchema = z.object({
  feature_name: text(),
  source: text(),
});

export const faceEnrollmentCompletedSchema = z.object({
  result: int(),
  face_id: int(),
  name: text(),
});

// ── wake_word branches ───────────────────────────────────────────────

export const wakeWordEndSchema = z.object({
  intent_heard: flag(),
  intent_json: text(),
});

// ── single-case kinds ────────────────────────────────────────────────

export const robotObservedFaceSchema = z.object({
  face_id: int(),
  timestamp: int(),
  pose: poseSchema.default({}),
  img_rect: imageRectSchema.default({}),
  name: text(),
  expression: int(),
  expression_values: z.array(z.number().int()).default([]),
  left_eye: z.array(pointSchema).default([]),
  right_eye: z.array(pointSchema).default([]),
  nose: z.array(pointSchema).default([]),
  mouth: z.array(pointSchema).default([]),
});

export const robotChangedObservedFaceIdSchema = z.object({
  old_id: int(),
  new_id: int(),
});

export const stimulationInfoSchema = z.object({
  emotion_events: z.array(z.string()).default([]),
  value: float(),
  velocity: float(),
  accel: float(),
  value_before_event: float(),
  min_value: float(),
  max_value: float(),
});

export const photoTakenSchema = z.object({
  photo_id: int(),
});

export const robotStateSchema = z.object({
  pose: poseSchema.default({}),
  pose_angle_rad: float(),
  pose_pitch_rad: float(),
  left_wheel_speed_mmps: float(),
  right_wheel_speed_mmps: float(),
  head_angle_rad: float(),
  lift_height_mm: float(),
  accel: vectorSchema.default({}),
  gyro: vectorSchema.default({}),
  carrying_object_id: int(),
  carrying_object_on_top_id: int(),
  head_tracking_object_id: int(),
  localized_to_object_id: int(),
  last_image_time_stamp: int(),
  status: int(),
  prox_data: z
    .object({
      distance_mm: float(),
      signal_quality: float(),
      unobstructed: flag(),
      found_object: flag(),
      is_lift_in_fov: flag(),
    })
    .default({}),
  touch_data: z
    .object({
      raw_touch_value: int(),
      is_being_touched: flag(),
    })
    .default({}),
});

export const cubeBatterySchema = z.object({
  level: int(),
  factory_id: text(),
  battery_volts: float(),
  time_since_last_reading_sec: float(),
});

export const connectionResponseSchema = z.object({
  is_primary: flag(),
});

export const userIntentSchema = z.object({
  intent_id: int(),
  json_data: text(),
});

export const alexaAuthSchema = z.object({
  auth_state: int(),
  extra: text(),
});

export const attentionTransferSchema = z.object({
  reason: int(),
  seconds_ago: float(),
});

export const cameraSettingsUpdateSchema = z.object({
  gain: float(),
  exposure_ms: int(),
  auto_exposure_enabled: flag(),
});

export const checkUpdateStatusSchema = z.object({
  update_status: int(),
  progress: int(),
  expected: int(),
  update_version: text(),
});

export const jdocsChangedSchema = z.object({
  jdoc_types: z.array(z.number().int()).default([]),
});

export const enrolledFaceSchema = z.object({
  face_id: int(),
  name: text(),
});

export const robotObservedMotionSchema = z.object({
  timestamp: int(),
  img_area: float(),
  img_x: float(),
  img_y: float(),
  ground_area: float(),
  ground_x: float(),
  ground_y: float(),
  top_img_area: float(),
  top_img_x: float(),
  top_img_y: float(),
  bottom_img_area: float(),
  bottom_img_x: float(),
  bottom_img_y: float(),
  left_img_area: float(),
  left_img_x: float(),
  left_img_y: float(),
  right_img_area: float(),
  right_img_x: float(),
  right_img_y: float(),
});

export const unexpectedMovementSchema = z.object({
  timestamp: int(),
  movement_type: int(),
  movement_side: int(),
});

export type PoseInput = z.infer<typeof poseSchema>;
export type ImageRectInput = z.infer<typeof imageRectSchema>;
export type PointInput = z.infer<typeof pointSchema>;
