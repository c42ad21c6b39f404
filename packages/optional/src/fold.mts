/**
 * @module fold
 * @description Left folds over sequences of options.
 *
 * Two policies, picked by the caller:
 *
 * - `fold` skips absent inputs. `None` entries are dropped first and the
 *   remaining values are combined left to right. If the operator itself
 *   answers `None`, the whole fold is `None` and no further pairs are
 *   combined.
 * - `foldStrict` is annihilating like every lifted function: one absent
 *   input makes the result `None`.
 *
 * @example
 * ```typescript
 * import { fold, minimum, ordNumber, some, none } from '@liftwise/optional';
 *
 * const smaller = (a: number, b: number) => some(Math.min(a, b));
 * fold(smaller, none(), some(3), none(), some(1)); // => Some(1)
 * fold(smaller);                                   // => None
 *
 * minimum(ordNumber)([some(4), none(), some(2)]);  // => Some(2)
 * ```
 *
 * @category Folds
 */

import { isNone, isSome, none, some, unwrap } from './option.mjs';

import type { Ord } from './capabilities.mjs';
import type { Option } from './option.mjs';

export type FoldOperator<T> = (accumulator: T, value: T) => Option<T>;

const foldPresent = <T,>(op: FoldOperator<T>, values: readonly T[]): Option<T> => {
  let accumulator: Option<T> = none();
  for (const [index, value] of values.entries()) {
    if (index === 0) {
      accumulator = some(value);
      continue;
    }
    accumulator = op(unwrap(accumulator), value);
    if (isNone(accumulator)) {
      return none();
    }
  }
  return accumulator;
};

/**
 * Folds the present values of `args` with `op`, skipping absent ones.
 *
 * 1. `None` entries are discarded; the rest keep their order.
 * 2. Nothing left: `None`.
 * 3. One value left: `Some` of it; `op` is not called.
 * 4. Otherwise `op` runs left to right, and the first `None` it returns is
 *    the result.
 *
 * @category Folds
 * @example
 * const safeDiv = (a: number, b: number) => (b === 0 ? none() : some(a / b));
 * fold(safeDiv, some(8), none(), some(2)); // => Some(4)
 * fold(safeDiv, some(8), some(0), some(2)); // => None, 8/0 stops the fold
 */
export const fold = <T,>(op: FoldOperator<T>, ...args: Option<T>[]): Option<T> =>
  foldPresent(op, args.filter(isSome).map(unwrap));

/**
 * Curried, array-taking form of `fold`.
 *
 * @category Folds
 */
export const foldWith =
  <T,>(op: FoldOperator<T>) =>
  (options: readonly Option<T>[]): Option<T> =>
    fold(op, ...options);

/**
 * Annihilating fold: `None` if any input is `None` or if there are no
 * inputs; otherwise the same left fold as `fold`.
 *
 * @category Folds
 * @example
 * const add = (a: number, b: number) => some(a + b);
 * foldStrict(add, some(1), some(2)); // => Some(3)
 * foldStrict(add, some(1), none());  // => None
 */
export const foldStrict = <T,>(
  op: FoldOperator<T>,
  ...args: Option<T>[]
): Option<T> => {
  const values: T[] = [];
  for (const option of args) {
    if (isNone(option)) {
      return none();
    }
    values.push(unwrap(option));
  }
  return foldPresent(op, values);
};

/**
 * The least present candidate, or `None` when every candidate is absent.
 * The earlier candidate wins a tie.
 *
 * @category Folds
 */
export const minimum =
  <T,>(ord: Ord<T>) =>
  (candidates: readonly Option<T>[]): Option<T> =>
    fold((a: T, b: T) => some(ord.lessThan(b, a) ? b : a), ...candidates);

/**
 * The greatest present candidate. See `minimum`.
 *
 * @category Folds
 */
export const maximum =
  <T,>(ord: Ord<T>) =>
  (candidates: readonly Option<T>[]): Option<T> =>
    fold((a: T, b: T) => some(ord.lessThan(a, b) ? b : a), ...candidates);
