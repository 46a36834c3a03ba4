import type { ImageRect, Point, Pose } from './geometry.js';
import type { FacialExpression, UpAxis } from './vocabulary.js';

/**
 * Local state of robot-recognized physical entities.
 *
 * The read-only interfaces below are what subscribers and HTTP handlers see.
 * Only the world registry holds the writable form (`Mutable<T>`), and only it
 * mutates, always from inside the serial work queue.
 *
 * Wall-clock times are epoch milliseconds from the registry's clock; robot
 * timestamps are the robot's own monotonic counter. Both are `null` until the
 * corresponding event has been seen.
 */
export interface ObservableObject {
  readonly isVisible: boolean;
  readonly pose: Pose;
  readonly lastImageRect: ImageRect;
  readonly lastObservedTime: number | null;
  readonly lastObservedTimestamp: number | null;
  /** Wall-clock time of the last event of any kind about this object. */
  readonly lastEventTime: number | null;
}

export interface LightCube extends ObservableObject {
  readonly objectType: 'light_cube';
  readonly objectId: number;
  readonly factoryId: string;
  readonly isConnected: boolean;
  readonly isMoving: boolean;
  readonly lastMovedTime: number | null;
  readonly lastMovedTimestamp: number | null;
  readonly lastMovedStartTime: number | null;
  readonly lastMovedStartTimestamp: number | null;
  readonly upAxis: UpAxis;
  readonly lastUpAxisTime: number | null;
  readonly lastUpAxisTimestamp: number | null;
  readonly lastTappedTime: number | null;
  readonly lastTappedTimestamp: number | null;
  readonly topFaceOrientationRad: number;
}

export interface Charger extends ObservableObject {
  readonly objectType: 'charger';
  readonly objectId: number;
}

export const CUSTOM_OBJECT_MARKERS = [
  'circles_2',
  'circles_3',
  'circles_4',
  'circles_5',
  'diamonds_2',
  'diamonds_3',
  'diamonds_4',
  'diamonds_5',
  'hexagons_2',
  'hexagons_3',
  'hexagons_4',
  'hexagons_5',
  'triangles_2',
  'triangles_3',
  'triangles_4',
  'triangles_5',
] as const;
export type CustomObjectMarker = (typeof CUSTOM_OBJECT_MARKERS)[number];

interface ArchetypeBase {
  readonly markerWidthMm: number;
  readonly markerHeightMm: number;
  /** Only one instance of this object exists in the world. */
  readonly isUnique: boolean;
}

export interface CustomBoxArchetype extends ArchetypeBase {
  readonly shape: 'box';
  readonly markerFront: CustomObjectMarker;
  readonly markerBack: CustomObjectMarker;
  readonly markerTop: CustomObjectMarker;
  readonly markerBottom: CustomObjectMarker;
  readonly markerLeft: CustomObjectMarker;
  readonly markerRight: CustomObjectMarker;
  readonly depthMm: number;
  readonly widthMm: number;
  readonly heightMm: number;
}

export interface CustomCubeArchetype extends ArchetypeBase {
  readonly shape: 'cube';
  readonly marker: CustomObjectMarker;
  readonly sizeMm: number;
}

export interface CustomWallArchetype extends ArchetypeBase {
  readonly shape: 'wall';
  readonly marker: CustomObjectMarker;
  readonly widthMm: number;
  readonly heightMm: number;
}

export type CustomObjectArchetype = CustomBoxArchetype | CustomCubeArchetype | CustomWallArchetype;

export interface CustomObject extends ObservableObject {
  readonly objectType: 'custom_object';
  readonly objectId: number;
  /** 1..20 */
  readonly customType: number;
  readonly archetype: CustomObjectArchetype | null;
}

export interface Face extends ObservableObject {
  readonly objectType: 'face';
  /** Can change over the object's lifetime when the robot re-identifies the face. */
  readonly faceId: number;
  readonly name: string;
  readonly expression: FacialExpression;
  readonly expressionValues: readonly number[];
  readonly leftEye: readonly Point[];
  readonly rightEye: readonly Point[];
  readonly nose: readonly Point[];
  readonly mouth: readonly Point[];
}

/** Objects identified by a stable robot-assigned object id. */
export type ObjectWithId = LightCube | Charger | CustomObject;

export type WorldObject = ObjectWithId | Face;

export type Mutable<T> = { -readonly [K in keyof T]: T[K] };

/** Object id the robot uses for "no object". */
export const INVALID_OBJECT_ID = -1;
