/**
 * Named view of the robot-state status bit field.
 */
export interface RobotStatus {
  readonly raw: number;
  readonly areMotorsMoving: boolean;
  readonly isCarryingBlock: boolean;
  readonly isDockingToMarker: boolean;
  readonly isPickedUp: boolean;
  readonly isButtonPressed: boolean;
  readonly isFalling: boolean;
  readonly isAnimating: boolean;
  readonly isPathing: boolean;
  readonly isLiftInPos: boolean;
  readonly isHeadInPos: boolean;
  readonly isInCalmPowerMode: boolean;
  readonly isOnCharger: boolean;
  readonly isCharging: boolean;
  readonly isCliffDetected: boolean;
  readonly areWheelsMoving: boolean;
  readonly isBeingHeld: boolean;
  readonly isRobotMoving: boolean;
}

const STATUS_BITS = {
  areMotorsMoving: 0x1,
  isCarryingBlock: 0x2,
  isDockingToMarker: 0x4,
  isPickedUp: 0x8,
  isButtonPressed: 0x10,
  isFalling: 0x20,
  isAnimating: 0x40,
  isPathing: 0x80,
  isLiftInPos: 0x100,
  isHeadInPos: 0x200,
  isInCalmPowerMode: 0x400,
  // 0x800 is unused on the wire
  isOnCharger: 0x1000,
  isCharging: 0x2000,
  isCliffDetected: 0x4000,
  areWheelsMoving: 0x8000,
  isBeingHeld: 0x10000,
  isRobotMoving: 0x20000,
} as const;

export type RobotStatusFlag = keyof typeof STATUS_BITS;

export function decodeRobotStatus(raw: number): RobotStatus {
  const has = (flag: RobotStatusFlag): boolean => (raw & STATUS_BITS[flag]) !== 0;
  return {
    raw,
    areMotorsMoving: has('areMotorsMoving'),
    isCarryingBlock: has('isCarryingBlock'),
    isDockingToMarker: has('isDockingToMarker'),
    isPickedUp: has('isPickedUp'),
    isButtonPressed: has('isButtonPressed'),
    isFalling: has('isFalling'),
    isAnimating: has('isAnimating'),
    isPathing: has('isPathing'),
    isLiftInPos: has('isLiftInPos'),
    isHeadInPos: has('isHeadInPos'),
    isInCalmPowerMode: has('isInCalmPowerMode'),
    isOnCharger: has('isOnCharger'),
    isCharging: has('isCharging'),
    isCliffDetected: has('isCliffDetected'),
    areWheelsMoving: has('areWheelsMoving'),
    isBeingHeld: has('isBeingHeld'),
    isRobotMoving: has('isRobotMoving'),
  };
}

/** Inverse of `decodeRobotStatus` for the given flags. Used by fixtures and tools. */
export function encodeRobotStatus(flags: readonly RobotStatusFlag[]): number {
  let raw = 0;
  for (const flag of flags) raw |= STATUS_BITS[flag];
  return raw;
}
