/**
 * Wire-level envelope for one event received from the robot.
 *
 * The transport hands over `{ kind, payload }` pairs where `kind` is the
 * primary discriminant and `payload` is the still-unvalidated message body
 * for that kind. `kind` stays a plain string here: a newer robot firmware
 * may send kinds this client does not know yet, and those must reach the
 * factory so they can be dropped with a diagnostic.
 */
export interface Envelope {
  readonly kind: string;
  readonly payload: unknown;
}

export const EVENT_KINDS = [
  'time_stamped_status',
  'wake_word',
  'robot_observed_face',
  'robot_changed_observed_face_id',
  'object_event',
  'stimulation_info',
  'photo_taken',
  'robot_state',
  'cube_battery',
  'keep_alive',
  'connection_response',
  'mirror_mode_disabled',
  'vision_modes_auto_disabled',
  'user_intent',
  'alexa_auth_event',
  'attention_transfer',
  'camera_settings_update',
  'check_update_status_response',
  'jdocs_changed',
  'robot_erased_enrolled_face',
  'robot_renamed_enrolled_face',
  'robot_observed_motion',
  'unexpected_movement',
] as const;

/** Closed set of primary discriminants this client understands. */
export type EventKind = (typeof EVENT_KINDS)[number];

/** Secondary discriminant of `object_event` envelopes. */
export const OBJECT_EVENT_TYPES = [
  'object_available',
  'object_connection_state',
  'object_moved',
  'object_stopped_moving',
  'object_up_axis_changed',
  'object_tapped',
  'robot_observed_object',
  'cube_connection_lost',
] as const;

export type ObjectEventType = (typeof OBJECT_EVENT_TYPES)[number];

/** Secondary discriminant of `time_stamped_status` envelopes. */
export const STATUS_TYPES = [
  'feature_status',
  'face_scan_started',
  'face_scan_complete',
  'face_enrollment_completed',
] as const;

export type StatusType = (typeof STATUS_TYPES)[number];

/** Secondary discriminant of `wake_word` envelopes. */
export const WAKE_WORD_EVENT_TYPES = ['wake_word_begin', 'wake_word_end'] as const;

export type WakeWordEventType = (typeof WAKE_WORD_EVENT_TYPES)[number];

const KNOWN_KINDS: ReadonlySet<string> = new Set(EVENT_KINDS);

export function isEventKind(kind: string): kind is EventKind {
  return KNOWN_KINDS.has(kind);
}
