/**
 * Spatial value types shared by typed events and world objects.
 *
 * Plain readonly records: they are copied out of decoded envelopes and
 * never mutated afterwards.
 */

export interface Position {
  readonly x: number;
  readonly y: number;
  readonly z: number;
}

/** Unit quaternion, scalar component first. */
export interface Quaternion {
  readonly q0: number;
  readonly q1: number;
  readonly q2: number;
  readonly q3: number;
}

/**
 * A pose in the robot's world frame.
 *
 * `originId` identifies the coordinate frame; poses with different origins
 * are not comparable (the robot re-localized in between).
 */
export interface Pose {
  readonly position: Position;
  readonly rotation: Quaternion;
  readonly originId: number;
}

/** Bounding box of an observation in camera image coordinates. */
export interface ImageRect {
  readonly xTopLeft: number;
  readonly yTopLeft: number;
  readonly width: number;
  readonly height: number;
}

/** Landmark point in image coordinates. */
export interface Point {
  readonly x: number;
  readonly y: number;
}

export const ORIGIN_POSE: Pose = {
  position: { x: 0, y: 0, z: 0 },
  rotation: { q0: 1, q1: 0, q2: 0, q3: 0 },
  originId: 0,
};

export const EMPTY_IMAGE_RECT: ImageRect = {
  xTopLeft: 0,
  yTopLeft: 0,
  width: 0,
  height: 0,
};
