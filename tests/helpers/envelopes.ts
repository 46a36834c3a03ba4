import type { Envelope } from '../../src/domain/envelope.js';

/** Wire object-type code for a light cube. */
export const LIGHT_CUBE = 2;
export const CHARGER = 6;
/** Wire code of custom type 1; custom type n is CUSTOM_TYPE_01 + n - 1. */
export const CUSTOM_TYPE_01 = 15;

export function observedObject(
  objectId: number,
  objectType = LIGHT_CUBE,
  extra: Record<string, unknown> = {},
): Envelope {
  return {
    kind: 'object_event',
    payload: {
      robot_observed_object: {
        timestamp: 1000,
        object_family: 3,
        object_type: objectType,
        object_id: objectId,
        img_rect: { x_top_left: 10, y_top_left: 20, width: 30, height: 40 },
        pose: { x: 100, y: 50, z: 0, q0: 1, origin_id: 1 },
        top_face_orientation_rad: 0.5,
        ...extra,
      },
    },
  };
}

export function observedFace(faceId: number, name = '', extra: Record<string, unknown> = {}): Envelope {
  return {
    kind: 'robot_observed_face',
    payload: { face_id: faceId, timestamp: 2000, name, expression: 2, ...extra },
  };
}

export function objectEvent(branch: string, body: Record<string, unknown>): Envelope {
  return { kind: 'object_event', payload: { [branch]: body } };
}

export function robotState(status: number): Envelope {
  return { kind: 'robot_state', payload: { status } };
}
