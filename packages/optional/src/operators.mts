/**
 * @module operators
 * @description Lifted comparison and arithmetic operators, built from the
 * capability dictionaries in `capabilities`.
 *
 * Every operator answers `None` when any operand is `None`. Comparisons
 * therefore yield `Option<boolean>`, which has to be collapsed explicitly
 * (`unwrapOr(false)`, `match`) before it can decide a branch. Division and
 * floor division also yield `None` for a zero divisor instead of throwing or
 * producing Infinity.
 *
 * Operator sets are cached per dictionary, so `arithmetic(numericNumber)`
 * returns the same functions on every call.
 *
 * @example
 * ```typescript
 * import { arithmetic, comparisons, numericNumber, ordNumber, some } from '@liftwise/optional';
 *
 * const { div, add } = arithmetic(numericNumber);
 * div(some(10), some(2)); // => Some(5)
 * div(some(10), some(0)); // => None
 *
 * const { lt } = comparisons(ordNumber);
 * lt(some(1), none());    // => None
 * ```
 *
 * @category Operators
 */

import {
  numericNumber,
  ordNumber,
} from './capabilities.mjs';
import { liftBinary, liftBinaryOption, liftUnary } from './lift.mjs';
import { none, some } from './option.mjs';

import type { Numeric, Ord } from './capabilities.mjs';
import type { Option } from './option.mjs';

export type LiftedBinary<A, R = A> = (a: Option<A>, b: Option<A>) => Option<R>;
export type LiftedUnary<A, R = A> = (a: Option<A>) => Option<R>;

export interface LiftedComparisons<A> {
  readonly lt: LiftedBinary<A, boolean>;
  readonly gt: LiftedBinary<A, boolean>;
  readonly le: LiftedBinary<A, boolean>;
  readonly ge: LiftedBinary<A, boolean>;
  readonly eq: LiftedBinary<A, boolean>;
}

export interface LiftedArithmetic<A> {
  readonly neg: LiftedUnary<A>;
  readonly add: LiftedBinary<A>;
  readonly sub: LiftedBinary<A>;
  readonly mul: LiftedBinary<A>;
  readonly pow: LiftedBinary<A>;
  /** `None` when the divisor equals `zero()`. */
  readonly div: LiftedBinary<A>;
  /** `None` when the divisor equals `zero()`. */
  readonly floorDiv: LiftedBinary<A>;
}

// keyed by dictionary; the public overloads restore the element type
const comparisonCache = new WeakMap<Ord<unknown>, LiftedComparisons<unknown>>();
const arithmeticCache = new WeakMap<
  Numeric<unknown>,
  LiftedArithmetic<unknown>
>();

const buildComparisons = <A,>(ord: Ord<A>): LiftedComparisons<A> => ({
  lt: liftBinary((a: A, b: A) => ord.lessThan(a, b)),
  gt: liftBinary((a: A, b: A) => ord.lessThan(b, a)),
  le: liftBinary((a: A, b: A) => ord.lessThan(a, b) || ord.equals(a, b)),
  ge: liftBinary((a: A, b: A) => ord.lessThan(b, a) || ord.equals(a, b)),
  eq: liftBinary((a: A, b: A) => ord.equals(a, b)),
});

const buildArithmetic = <A,>(num: Numeric<A>): LiftedArithmetic<A> => {
  const guardZero =
    (op: (a: A, b: A) => A) =>
    (a: A, b: A): Option<A> =>
      num.equals(b, num.zero()) ? none() : some(op(a, b));

  return {
    neg: liftUnary((a: A) => num.negate(a)),
    add: liftBinary((a: A, b: A) => num.add(a, b)),
    sub: liftBinary((a: A, b: A) => num.sub(a, b)),
    mul: liftBinary((a: A, b: A) => num.mul(a, b)),
    pow: liftBinary((a: A, b: A) => num.pow(a, b)),
    div: liftBinaryOption(guardZero((a, b) => num.div(a, b))),
    floorDiv: liftBinaryOption(guardZero((a, b) => num.floorDiv(a, b))),
  };
};

const cached = <K extends object, V>(
  cache: WeakMap<K, V>,
  key: K,
  build: () => V,
): V => {
  const hit = cache.get(key);
  if (hit !== undefined) {
    return hit;
  }
  const built = build();
  cache.set(key, built);
  return built;
};

/**
 * The lifted comparisons for a type with an `Ord` instance.
 * `le`/`ge` use `lessThan || equals`, so they stay partial for partial orders.
 *
 * @category Operators
 */
export function comparisons<A>(ord: Ord<A>): LiftedComparisons<A>;
export function comparisons(ord: Ord<unknown>): LiftedComparisons<unknown> {
  return cached(comparisonCache, ord, () => buildComparisons(ord));
}

/**
 * The lifted arithmetic operators for a type with a `Numeric` instance.
 *
 * @category Operators
 */
export function arithmetic<A>(num: Numeric<A>): LiftedArithmetic<A>;
export function arithmetic(
  num: Numeric<unknown>,
): LiftedArithmetic<unknown> {
  return cached(arithmeticCache, num, () => buildArithmetic(num));
}

/**
 * Lifted operators over `number`.
 *
 * @category Operators
 * @example
 * const { add, mul, div } = numberOps;
 * div(add(some(1), some(3)), mul(some(2), some(0))); // => None
 */
export const numberOps: LiftedComparisons<number> & LiftedArithmetic<number> = {
  ...comparisons(ordNumber),
  ...arithmetic(numericNumber),
};
