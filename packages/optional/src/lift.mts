/**
 * @module lift
 * @description Turns functions over plain values into functions over options.
 *
 * A lifted function returns `None` as soon as any argument is `None` and only
 * calls the base function when every argument is present. Base functions that
 * already answer with an Option are lifted with `liftOption`, whose result is
 * passed through rather than nested.
 *
 * Lifting is pure: lifting the same base function twice gives two functions
 * that agree on every input, so callers are free to cache lifted functions.
 *
 * @example
 * ```typescript
 * import { lift, liftOption, some, none } from '@liftwise/optional';
 *
 * const add = lift((a: number, b: number) => a + b);
 * add(some(2), some(3)); // => Some(5)
 * add(some(2), none());  // => None
 *
 * const safeSqrt = liftOption((x: number) => (x < 0 ? none() : some(Math.sqrt(x))));
 * safeSqrt(some(-1));    // => None (not Some(None))
 * ```
 *
 * @category Lifting
 */

import { isNone, map, flatMap, none, some, unwrap } from './option.mjs';

import type { Option } from './option.mjs';

/**
 * Maps a tuple of argument types to the tuple of their options.
 *
 * @example
 * type T = Options<[number, string]>; // => [Option<number>, Option<string>]
 */
export type Options<T extends readonly unknown[]> = {
  [K in keyof T]: Option<T[K]>;
};

/**
 * Tuple form of `sequence`: `Some` of the tuple of values when every argument
 * is present, `None` otherwise. Arguments are inspected left to right and the
 * scan stops at the first `None`.
 *
 * @category Combinations
 * @example
 * sequenceT(some(1), some('a')); // => Some([1, 'a'])
 * sequenceT(some(1), none());    // => None
 */
export function sequenceT<T extends readonly unknown[]>(
  ...options: Options<T>
): Option<T>;
export function sequenceT(
  ...options: readonly Option<unknown>[]
): Option<unknown[]> {
  const values: unknown[] = [];
  for (const option of options) {
    if (isNone(option)) {
      return none();
    }
    values.push(unwrap(option));
  }
  return some(values);
}

/**
 * Lifts an n-ary function. The result is `None` if any argument is `None`,
 * otherwise `Some(fn(...values))`.
 *
 * @category Lifting
 * @example
 * const hypot = lift((a: number, b: number) => Math.sqrt(a * a + b * b));
 * hypot(some(3), some(4)); // => Some(5)
 */
export function lift<Args extends readonly unknown[], R>(
  fn: (...args: Args) => R,
): (...options: Options<Args>) => Option<R>;
export function lift(
  fn: (...args: unknown[]) => unknown,
): (...options: Option<unknown>[]) => Option<unknown> {
  return (...options) =>
    map((values: readonly unknown[]) => fn(...values))(sequenceT(...options));
}

/**
 * Lifts an n-ary function that itself answers with an Option. Its result is
 * returned as is, so the outcome is never an option of an option.
 *
 * @category Lifting
 * @example
 * const divide = liftOption((a: number, b: number) =>
 *   b === 0 ? none() : some(a / b),
 * );
 * divide(some(10), some(2)); // => Some(5)
 * divide(some(10), some(0)); // => None
 * divide(none(), some(2));   // => None
 */
export function liftOption<Args extends readonly unknown[], R>(
  fn: (...args: Args) => Option<R>,
): (...options: Options<Args>) => Option<R>;
export function liftOption(
  fn: (...args: unknown[]) => Option<unknown>,
): (...options: Option<unknown>[]) => Option<unknown> {
  return (...options) =>
    flatMap((values: readonly unknown[]) => fn(...values))(sequenceT(...options));
}

/**
 * Lifts a one-argument function. Same as `map`, in the argument order of the
 * other lifting combinators.
 *
 * @category Lifting
 */
export const liftUnary =
  <T, R>(fn: (value: T) => R) =>
  (option: Option<T>): Option<R> =>
    map(fn)(option);

/**
 * Lifts a binary operator.
 *
 * @category Lifting
 * @example
 * const concat = liftBinary((a: string, b: string) => a + b);
 * concat(some('ab'), some('cd')); // => Some('abcd')
 */
export const liftBinary =
  <A, B, R>(fn: (a: A, b: B) => R) =>
  (optionA: Option<A>, optionB: Option<B>): Option<R> =>
    isNone(optionA) || isNone(optionB)
      ? none()
      : some(fn(unwrap(optionA), unwrap(optionB)));

/**
 * Lifts a binary operator that answers with an Option, such as a division
 * that has no answer for a zero divisor.
 *
 * @category Lifting
 */
export const liftBinaryOption =
  <A, B, R>(fn: (a: A, b: B) => Option<R>) =>
  (optionA: Option<A>, optionB: Option<B>): Option<R> =>
    isNone(optionA) || isNone(optionB)
      ? none()
      : fn(unwrap(optionA), unwrap(optionB));

/**
 * Namespace containing the lifting combinators.
 *
 * @category Namespace
 */
export const Lift = {
  lift,
  liftOption,
  liftUnary,
  liftBinary,
  liftBinaryOption,
  sequenceT,
} as const;
