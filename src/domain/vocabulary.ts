/**
 * Enumerations carried by typed events.
 *
 * The wire sends integers; each table below is indexed by that integer.
 * Values outside a table map to the table's fallback (see `fromCode`).
 */

export const UP_AXES = [
  'invalid_axis',
  'x_negative',
  'x_positive',
  'y_negative',
  'y_positive',
  'z_negative',
  'z_positive',
] as const;
export type UpAxis = (typeof UP_AXES)[number];

export const FACIAL_EXPRESSIONS = [
  'unknown',
  'neutral',
  'happiness',
  'surprise',
  'anger',
  'sadness',
] as const;
export type FacialExpression = (typeof FACIAL_EXPRESSIONS)[number];

export const CUBE_BATTERY_LEVELS = ['low', 'normal'] as const;
export type CubeBatteryLevel = (typeof CUBE_BATTERY_LEVELS)[number];

export const FACE_ENROLLMENT_RESULTS = [
  'success',
  'saw_wrong_face',
  'saw_multiple_faces',
  'timed_out',
  'save_failed',
  'incomplete',
  'cancelled',
  'name_in_use',
  'name_storage_full',
  'unknown_failure',
] as const;
export type FaceEnrollmentResult = (typeof FACE_ENROLLMENT_RESULTS)[number];

export const ALEXA_AUTH_STATES = [
  'invalid',
  'uninitialized',
  'requesting_auth',
  'waiting_for_code',
  'authorized',
] as const;
export type AlexaAuthState = (typeof ALEXA_AUTH_STATES)[number];

export const ATTENTION_TRANSFER_REASONS = [
  'invalid',
  'no_cloud_connection',
  'no_wifi',
  'unmatched_intent',
] as const;
export type AttentionTransferReason = (typeof ATTENTION_TRANSFER_REASONS)[number];

export const UPDATE_STATUSES = ['no_update', 'ready_to_install', 'in_progress_download'] as const;
export type UpdateStatus = (typeof UPDATE_STATUSES)[number];

export const JDOC_TYPES = [
  'robot_settings',
  'robot_lifetime_stats',
  'account_settings',
  'user_entitlements',
] as const;
export type JdocType = (typeof JDOC_TYPES)[number];

export const UNEXPECTED_MOVEMENT_SIDES = ['unknown', 'front', 'back', 'left', 'right'] as const;
export type UnexpectedMovementSide = (typeof UNEXPECTED_MOVEMENT_SIDES)[number];

export const UNEXPECTED_MOVEMENT_TYPES = [
  'turned_but_stopped',
  'turned_in_same_direction',
  'turned_in_opposite_direction',
  'rotating_without_motors',
] as const;
export type UnexpectedMovementType = (typeof UNEXPECTED_MOVEMENT_TYPES)[number];

/**
 * Kind of a robot-recognized object. Custom marker objects share one kind
 * and are told apart by their custom type number (1..20).
 */
export type ObjectKind = 'light_cube' | 'charger' | 'custom_object' | 'unknown';

const WIRE_LIGHT_CUBE = 2;
const WIRE_CHARGER = 6;
const WIRE_FIRST_CUSTOM_TYPE = 15;
export const MAX_CUSTOM_TYPE = 20;

/** Maps the wire object-type integer to an object kind plus custom type (0 = none). */
export function objectKindFromCode(code: number): { kind: ObjectKind; customType: number } {
  if (code === WIRE_LIGHT_CUBE) return { kind: 'light_cube', customType: 0 };
  if (code === WIRE_CHARGER) return { kind: 'charger', customType: 0 };
  if (code >= WIRE_FIRST_CUSTOM_TYPE && code < WIRE_FIRST_CUSTOM_TYPE + MAX_CUSTOM_TYPE) {
    return { kind: 'custom_object', customType: code - WIRE_FIRST_CUSTOM_TYPE + 1 };
  }
  return { kind: 'unknown', customType: 0 };
}

/** Looks up `code` in `table`, returning `fallback` when it is out of range. */
export function fromCode<T extends string>(table: readonly T[], code: number, fallback: T): T {
  return table[code] ?? fallback;
}
