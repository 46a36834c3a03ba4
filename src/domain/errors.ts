export type DecodeFailureReason =
  | 'unknown_kind'
  | 'unknown_subtype'
  | 'missing_payload'
  | 'invalid_payload';

/**
 * An envelope could not be turned into a typed event.
 *
 * Never fatal: the envelope is dropped and the error is surfaced on the
 * error channel.
 */
export class DecodeError extends Error {
  override readonly name = 'DecodeError';

  constructor(
    readonly reason: DecodeFailureReason,
    readonly kind: string,
    message: string,
    readonly issues: readonly string[] = [],
  ) {
    super(message);
  }
}

/**
 * A category constructor was handed an envelope of another kind.
 * This is a caller bug, so it is thrown rather than returned.
 */
export class EnvelopeMismatchError extends Error {
  override readonly name = 'EnvelopeMismatchError';

  constructor(
    readonly expected: string,
    readonly actual: string,
  ) {
    super(`Expected a '${expected}' envelope, got '${actual}'`);
  }
}

export class UnknownAnimationError extends Error {
  override readonly name = 'UnknownAnimationError';

  constructor(
    readonly animation: string,
    readonly catalog: 'animation' | 'trigger',
  ) {
    super(`Unknown ${catalog} '${animation}'`);
  }
}

/** Archetypes cannot be dropped while custom objects still refer to them. */
export class CustomObjectsInUseError extends Error {
  override readonly name = 'CustomObjectsInUseError';

  constructor(readonly count: number) {
    super(`Cannot delete custom object archetypes while ${count} custom object(s) are tracked; delete the objects first`);
  }
}
