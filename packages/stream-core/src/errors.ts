/**
 * Errors raised by the stream primitives.
 * Every failure is a violated precondition, detected before any state changes.
 */

export type PreconditionCode = 'INVALID_PARAMETER' | 'SHAPE_MISMATCH' | 'HASH_MISMATCH';

/** Error when a call's arguments break the operation's contract. */
export class PreconditionError extends Error {
  constructor(
    message: string,
    public readonly code: PreconditionCode,
    public readonly details: Readonly<Record<string, unknown>> = {},
  ) {
    super(message);
    this.name = 'PreconditionError';
  }
}

/** Check if an error is a {@link PreconditionError}. */
export function isPreconditionError(error: unknown): error is PreconditionError {
  return error instanceof PreconditionError;
}
