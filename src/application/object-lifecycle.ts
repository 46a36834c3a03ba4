import { EMPTY_IMAGE_RECT, ORIGIN_POSE, type ImageRect, type Point, type Pose } from '../domain/geometry.js';
import type { FacialExpression, UpAxis } from '../domain/vocabulary.js';
import type {
  Charger,
  CustomObject,
  CustomObjectArchetype,
  Face,
  LightCube,
  Mutable,
  ObservableObject,
} from '../domain/world-objects.js';

/**
 * Per-object state transitions.
 *
 * Plain functions over the registry's writable objects. They never arm
 * timers or publish anything; the registry decides what a transition means
 * for the rest of the world.
 */

function observableDefaults(): Mutable<ObservableObject> {
  return {
    isVisible: false,
    pose: ORIGIN_POSE,
    lastImageRect: EMPTY_IMAGE_RECT,
    lastObservedTime: null,
    lastObservedTimestamp: null,
    lastEventTime: null,
  };
}

export function createLightCube(objectId: number): Mutable<LightCube> {
  return {
    ...observableDefaults(),
    objectType: 'light_cube',
    objectId,
    factoryId: '',
    isConnected: false,
    isMoving: false,
    lastMovedTime: null,
    lastMovedTimestamp: null,
    lastMovedStartTime: null,
    lastMovedStartTimestamp: null,
    upAxis: 'invalid_axis',
    lastUpAxisTime: null,
    lastUpAxisTimestamp: null,
    lastTappedTime: null,
    lastTappedTimestamp: null,
    topFaceOrientationRad: 0,
  };
}

export function createCharger(objectId: number): Mutable<Charger> {
  return { ...observableDefaults(), objectType: 'charger', objectId };
}

export function createCustomObject(
  objectId: number,
  customType: number,
  archetype: CustomObjectArchetype | null,
): Mutable<CustomObject> {
  return { ...observableDefaults(), objectType: 'custom_object', objectId, customType, archetype };
}

export function createFace(faceId: number): Mutable<Face> {
  return {
    ...observableDefaults(),
    objectType: 'face',
    faceId,
    name: '',
    expression: 'unknown',
    expressionValues: [],
    leftEye: [],
    rightEye: [],
    nose: [],
    mouth: [],
  };
}

export interface Observation {
  pose: Pose;
  imageRect: ImageRect;
  robotTimestamp: number;
}

/** Records an observation. Returns true when the object was not visible before. */
export function markObserved(object: Mutable<ObservableObject>, observation: Observation, now: number): boolean {
  const appeared = !object.isVisible;
  object.isVisible = true;
  object.pose = observation.pose;
  object.lastImageRect = observation.imageRect;
  object.lastObservedTime = now;
  object.lastObservedTimestamp = observation.robotTimestamp;
  object.lastEventTime = now;
  return appeared;
}

/** Returns true when the object was visible until now. */
export function markDisappeared(object: Mutable<ObservableObject>): boolean {
  const wasVisible = object.isVisible;
  object.isVisible = false;
  return wasVisible;
}

export interface FaceDetails {
  name: string;
  expression: FacialExpression;
  expressionValues: readonly number[];
  leftEye: readonly Point[];
  rightEye: readonly Point[];
  nose: readonly Point[];
  mouth: readonly Point[];
}

export function markFaceDetails(face: Mutable<Face>, details: FaceDetails): void {
  face.name = details.name;
  face.expression = details.expression;
  face.expressionValues = details.expressionValues;
  face.leftEye = details.leftEye;
  face.rightEye = details.rightEye;
  face.nose = details.nose;
  face.mouth = details.mouth;
}

/**
 * Records a "moved" report. The move start is only recorded on the
 * transition into moving; repeated reports extend the same move.
 * Returns true on that transition.
 */
export function markMoved(cube: Mutable<LightCube>, robotTimestamp: number, now: number): boolean {
  const startedMoving = !cube.isMoving;
  cube.isMoving = true;
  cube.lastEventTime = now;
  cube.lastMovedTime = now;
  cube.lastMovedTimestamp = robotTimestamp;
  if (startedMoving) {
    cube.lastMovedStartTime = now;
    cube.lastMovedStartTimestamp = robotTimestamp;
  }
  return startedMoving;
}

/**
 * Records a "stopped moving" report and returns how long the move lasted in
 * milliseconds. A cube that was not moving is left as it is and yields 0.
 */
export function markStoppedMoving(cube: Mutable<LightCube>, robotTimestamp: number, now: number): number {
  if (!cube.isMoving) return 0;
  const startedAt = cube.lastMovedStartTime ?? now;
  cube.isMoving = false;
  cube.lastEventTime = now;
  cube.lastMovedTime = now;
  cube.lastMovedTimestamp = robotTimestamp;
  return Math.max(0, now - startedAt);
}

export function markUpAxis(cube: Mutable<LightCube>, upAxis: UpAxis, robotTimestamp: number, now: number): void {
  cube.upAxis = upAxis;
  cube.lastUpAxisTime = now;
  cube.lastUpAxisTimestamp = robotTimestamp;
  cube.lastEventTime = now;
}

export function markTapped(cube: Mutable<LightCube>, robotTimestamp: number, now: number): void {
  cube.lastTappedTime = now;
  cube.lastTappedTimestamp = robotTimestamp;
  cube.lastEventTime = now;
}

/** Returns true when the connected flag actually changed. */
export function markConnection(cube: Mutable<LightCube>, connected: boolean, factoryId: string, now: number): boolean {
  const changed = cube.isConnected !== connected;
  cube.isConnected = connected;
  if (factoryId !== '') cube.factoryId = factoryId;
  cube.lastEventTime = now;
  return changed;
}
