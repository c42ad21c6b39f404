/**
 * @module nullable
 * @description The same absence rules for the raw representation used at
 * JavaScript boundaries, where "no value" is `null` or `undefined`.
 *
 * These helpers never wrap values. They exist for code that receives nullable
 * values from an API, a DOM lookup or a JSON document and wants the lifting
 * and folding semantics without converting to `Option` first.
 *
 * @example
 * ```typescript
 * import { liftNullable, unwrapNullable } from '@liftwise/optional';
 *
 * const add = liftNullable((a: number, b: number) => a + b);
 * add(1, 2);    // => 3
 * add(1, null); // => null
 *
 * unwrapNullable(map.get('key')); // throws AbsentValueError if missing
 * ```
 *
 * @category Interop
 */

import { AbsentValueError } from './errors.mjs';

export type Nullish = null | undefined;

export type NullableArgs<T extends readonly unknown[]> = {
  [K in keyof T]: T[K] | Nullish;
};

export const isNullish = (value: unknown): value is Nullish =>
  value === null || value === undefined;

/**
 * Returns `value` unless it is `null` or `undefined`, in which case it throws
 * `AbsentValueError`, the same fault `unwrap` raises for `None`.
 *
 * @throws {AbsentValueError}
 */
export const unwrapNullable = <T,>(value: T | Nullish): T => {
  if (isNullish(value)) {
    throw new AbsentValueError('tried to unwrap a null or undefined value', {
      received: value === null ? 'null' : 'undefined',
    });
  }
  return value;
};

/**
 * Lifts a function over nullable arguments: `null` if any argument is
 * nullish, otherwise the function's own result (which may itself be `null`).
 */
export function liftNullable<Args extends readonly unknown[], R>(
  fn: (...args: Args) => R | Nullish,
): (...args: NullableArgs<Args>) => R | null;
export function liftNullable(
  fn: (...args: unknown[]) => unknown,
): (...args: unknown[]) => unknown {
  return (...args) => (args.some(isNullish) ? null : (fn(...args) ?? null));
}

/**
 * `fold` for nullable values: nullish entries are dropped, an empty list gives
 * `null`, a single value is returned as is, and otherwise `op` runs left to
 * right until it answers nullish.
 */
export const foldNullable = <T,>(
  op: (accumulator: T, value: T) => T | Nullish,
  ...args: (T | Nullish)[]
): T | null => {
  let accumulator: T | null = null;
  for (const value of args) {
    if (isNullish(value)) {
      continue;
    }
    if (accumulator === null) {
      accumulator = value;
      continue;
    }
    const next = op(accumulator, value);
    if (isNullish(next)) {
      return null;
    }
    accumulator = next;
  }
  return accumulator;
};

/**
 * Wraps a throwing function so it answers `null` instead.
 *
 * @example
 * const parse = catchToNull((text: string): unknown => JSON.parse(text));
 * parse('[1]');   // => [1]
 * parse('oops');  // => null
 */
export const catchToNull =
  <Args extends unknown[], R>(fn: (...args: Args) => R) =>
  (...args: Args): R | null => {
    try {
      return fn(...args);
    } catch {
      return null;
    }
  };

/**
 * Namespace containing the nullable helpers.
 *
 * @category Namespace
 */
export const Nullable = {
  isNullish,
  unwrap: unwrapNullable,
  lift: liftNullable,
  fold: foldNullable,
  catchToNull,
} as const;
