/**
 * @module composition
 * @description Left-to-right composition for the curried Option combinators.
 *
 * Most combinators in this package take their configuration first and the
 * option last (`map(fn)(option)`), so they slot straight into `pipe`.
 *
 * @example
 * ```typescript
 * import { pipe, flow, some, map, filter, unwrapOr } from '@liftwise/optional';
 *
 * pipe(
 *   some(9),
 *   map(Math.sqrt),
 *   filter((n: number) => n > 2),
 *   unwrapOr(0),
 * ); // => 3
 *
 * const describe = flow(map((n: number) => n * 2), unwrapOr(-1));
 * describe(some(4)); // => 8
 * ```
 *
 * @category Core
 */

/**
 * Applies functions to a value from left to right.
 *
 * @category Core
 */
export function pipe<A>(value: A): A;
export function pipe<A, B>(value: A, fn1: (a: A) => B): B;
export function pipe<A, B, C>(value: A, fn1: (a: A) => B, fn2: (b: B) => C): C;
export function pipe<A, B, C, D>(
  value: A,
  fn1: (a: A) => B,
  fn2: (b: B) => C,
  fn3: (c: C) => D,
): D;
export function pipe<A, B, C, D, E>(
  value: A,
  fn1: (a: A) => B,
  fn2: (b: B) => C,
  fn3: (c: C) => D,
  fn4: (d: D) => E,
): E;
export function pipe<A, B, C, D, E, F>(
  value: A,
  fn1: (a: A) => B,
  fn2: (b: B) => C,
  fn3: (c: C) => D,
  fn4: (d: D) => E,
  fn5: (e: E) => F,
): F;
export function pipe(
  value: unknown,
  ...fns: ((arg: unknown) => unknown)[]
): unknown {
  return fns.reduce((acc, fn) => fn(acc), value);
}

/**
 * Composes unary functions from left to right into a reusable function.
 *
 * @category Core
 */
export function flow<A, B>(fn1: (a: A) => B): (a: A) => B;
export function flow<A, B, C>(fn1: (a: A) => B, fn2: (b: B) => C): (a: A) => C;
export function flow<A, B, C, D>(
  fn1: (a: A) => B,
  fn2: (b: B) => C,
  fn3: (c: C) => D,
): (a: A) => D;
export function flow<A, B, C, D, E>(
  fn1: (a: A) => B,
  fn2: (b: B) => C,
  fn3: (c: C) => D,
  fn4: (d: D) => E,
): (a: A) => E;
export function flow(
  ...fns: ((arg: unknown) => unknown)[]
): (arg: unknown) => unknown {
  return (arg) => fns.reduce((acc, fn) => fn(acc), arg);
}

/**
 * @category Utilities
 */
export const identity = <T,>(x: T): T => x;
