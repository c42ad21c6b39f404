/**
 * @module array-utils
 * @description Checked access to arrays. Reading past either end, or failing
 * to find a match, is an expected outcome and answers `None` rather than
 * `undefined` or an exception.
 *
 * ### Decision Tree
 * - Index known up front? `at(items, index)`.
 * - Index fixed, array varies (inside a pipeline)? `get(index)`.
 * - Looking for the first match? `findSafe(predicate)`.
 * - Transform and drop the misses in one pass? `filterMap(fn)`.
 * - Already holding a list of options? `compact(options)`.
 *
 * @example
 * ```typescript
 * import { at, get, pipe, map } from '@liftwise/optional';
 *
 * const readings = [5.7, 2.1, 3.0];
 * at(readings, 1); // => Some(2.1)
 * at(readings, 5); // => None
 *
 * pipe(readings, get(0), map(Math.round)); // => Some(6)
 * ```
 *
 * @category Utilities
 */

import { isSome, none, some, unwrap } from './option.mjs';

import type { Option } from './option.mjs';

/**
 * `Some(items[index])` when `0 <= index < items.length`, `None` otherwise.
 * Negative indexes are out of range; they do not count from the end.
 *
 * @category Access
 */
export const at = <T,>(items: readonly T[], index: number): Option<T> => {
  if (!Number.isInteger(index) || index < 0 || index >= items.length) {
    return none();
  }
  return some(items[index] as T);
};

/**
 * Curried form of `at`, for pipelines.
 *
 * @category Access
 */
export const get =
  (index: number) =>
  <T,>(items: readonly T[]): Option<T> =>
    at(items, index);

/**
 * The first element satisfying `predicate`, or `None`.
 *
 * @category Access
 * @example
 * findSafe((n: number) => n > 3)([1, 5, 7]); // => Some(5)
 * findSafe((n: number) => n > 9)([1, 5, 7]); // => None
 */
export const findSafe =
  <T,>(predicate: (item: T) => boolean) =>
  (items: readonly T[]): Option<T> =>
    at(items, items.findIndex(predicate));

/**
 * Maps each element to an option and keeps the present results, in order.
 *
 * @category Transformation
 * @example
 * const parse = (s: string) => {
 *   const n = Number.parseInt(s, 10);
 *   return Number.isNaN(n) ? none() : some(n);
 * };
 * filterMap(parse)(['1', 'a', '2']); // => [1, 2]
 */
export const filterMap =
  <T, U>(fn: (item: T, index: number) => Option<U>) =>
  (items: readonly T[]): U[] =>
    items.reduce((acc: U[], item, index) => {
      const result = fn(item, index);
      if (isSome(result)) {
        acc.push(unwrap(result));
      }
      return acc;
    }, []);

/**
 * The present values of a list of options, in order.
 *
 * @category Transformation
 */
export const compact = <T,>(options: readonly Option<T>[]): T[] =>
  filterMap((option: Option<T>) => option)(options);
