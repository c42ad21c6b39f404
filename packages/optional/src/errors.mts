/**
 * @module errors
 * @description The single fault the core defines. Absence is a value (`None`)
 * and never surfaces as an error; `AbsentValueError` only reports that a
 * caller unwrapped an option, or a nullable, without checking it first.
 */

export type AbsentValueContext = Record<string, unknown>;

/**
 * Thrown by `unwrap` and `unwrapNullable` when there is no value.
 *
 * @example
 * try {
 *   unwrap(none());
 * } catch (error) {
 *   if (isAbsentValueError(error)) {
 *     console.error(`[${error.code}] ${error.message}`);
 *   }
 * }
 */
export class AbsentValueError extends Error {
  readonly code = 'ABSENT_VALUE';

  constructor(
    message = 'tried to unwrap an absent value',
    public readonly context?: AbsentValueContext,
  ) {
    super(message);
    this.name = 'AbsentValueError';

    // keep the throw site on top of the stack
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

export const isAbsentValueError = (error: unknown): error is AbsentValueError =>
  error instanceof AbsentValueError;
