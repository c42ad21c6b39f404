/**
 * @module capabilities
 * @description Capability dictionaries that gate which lifted operators exist
 * for a wrapped type.
 *
 * TypeScript has no operator overloading, so `<` or `+` over a user type is
 * expressed as an instance of `Ord<A>` or `Numeric<A>` handed to the lifting
 * layer. A type without an instance cannot be passed to `comparisons` or
 * `arithmetic`: the gate is checked by the compiler where the operator set is
 * built, not when it is called.
 *
 * @example
 * ```typescript
 * import { comparisons, ordBy, ordNumber, some } from '@liftwise/optional';
 *
 * interface Point { x: number; y: number }
 * const byX = ordBy((p: Point) => p.x, ordNumber);
 * comparisons(byX).lt(some({ x: 1, y: 5 }), some({ x: 2, y: 0 }));
 * // => Some(true)
 * ```
 *
 * @category Capabilities
 */

/**
 * Types with an equality relation.
 */
export interface Eq<A> {
  equals(a: A, b: A): boolean;
}

/**
 * Types with a less-than relation to themselves.
 * The relation may be partial: `lessThan(a, b)` and `lessThan(b, a)` can both
 * be false for values that are not equal (NaN, for instance).
 */
export interface Ord<A> extends Eq<A> {
  lessThan(a: A, b: A): boolean;
}

/**
 * Types closed under the arithmetic operators.
 * `div` is true division where the type has one; `floorDiv` rounds toward
 * negative infinity. Both are total here: the lifted versions are the ones
 * that turn a zero divisor into absence.
 */
export interface Numeric<A> extends Eq<A> {
  zero(): A;
  negate(a: A): A;
  add(a: A, b: A): A;
  sub(a: A, b: A): A;
  mul(a: A, b: A): A;
  pow(a: A, b: A): A;
  div(a: A, b: A): A;
  floorDiv(a: A, b: A): A;
}

/**
 * Structural capability for class types that carry their own ordering,
 * the way a value object exposes `lessThan(other)`.
 */
export interface Comparable<A> {
  lessThan(other: A): boolean;
}

export const ordNumber: Ord<number> = {
  equals: (a, b) => a === b,
  lessThan: (a, b) => a < b,
};

export const ordBigInt: Ord<bigint> = {
  equals: (a, b) => a === b,
  lessThan: (a, b) => a < b,
};

export const ordString: Ord<string> = {
  equals: (a, b) => a === b,
  lessThan: (a, b) => a < b,
};

export const numericNumber: Numeric<number> = {
  equals: (a, b) => a === b,
  zero: () => 0,
  negate: (a) => -a,
  add: (a, b) => a + b,
  sub: (a, b) => a - b,
  mul: (a, b) => a * b,
  pow: (a, b) => a ** b,
  div: (a, b) => a / b,
  floorDiv: (a, b) => Math.floor(a / b),
};

/**
 * bigint has no fractional values: `div` truncates toward zero like the
 * native `/`, `floorDiv` rounds toward negative infinity.
 * `pow` with a negative exponent throws the native RangeError.
 */
export const numericBigInt: Numeric<bigint> = {
  equals: (a, b) => a === b,
  zero: () => 0n,
  negate: (a) => -a,
  add: (a, b) => a + b,
  sub: (a, b) => a - b,
  mul: (a, b) => a * b,
  pow: (a, b) => a ** b,
  div: (a, b) => a / b,
  floorDiv: (a, b) => {
    const quotient = a / b;
    return a < 0n !== b < 0n && a % b !== 0n ? quotient - 1n : quotient;
  },
};

/**
 * Builds an `Ord` from the `lessThan` method of a `Comparable` type.
 * Equality is derived: neither value is less than the other.
 */
export const ordFromComparable = <A extends Comparable<A>,>(): Ord<A> => ({
  equals: (a, b) => !a.lessThan(b) && !b.lessThan(a),
  lessThan: (a, b) => a.lessThan(b),
});

/**
 * Orders values by a projection.
 *
 * @example
 * const byLength = ordBy((s: string) => s.length, ordNumber);
 * byLength.lessThan('ab', 'abc'); // => true
 */
export const ordBy = <A, B>(project: (value: A) => B, ord: Ord<B>): Ord<A> => ({
  equals: (a, b) => ord.equals(project(a), project(b)),
  lessThan: (a, b) => ord.lessThan(project(a), project(b)),
});

/**
 * Reverses an ordering.
 */
export const reverse = <A,>(ord: Ord<A>): Ord<A> => ({
  equals: ord.equals,
  lessThan: (a, b) => ord.lessThan(b, a),
});

const hasMethods = (value: unknown, names: readonly string[]): boolean => {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  return names.every((name) => typeof Reflect.get(value, name) === 'function');
};

const ORD_METHODS = ['equals', 'lessThan'] as const;
const NUMERIC_METHODS = [
  'equals',
  'zero',
  'negate',
  'add',
  'sub',
  'mul',
  'pow',
  'div',
  'floorDiv',
] as const;

/**
 * Runtime check for a dictionary that arrives untyped (from configuration or
 * a plugin). Statically typed callers never need it.
 */
export const isOrd = (value: unknown): value is Ord<unknown> =>
  hasMethods(value, ORD_METHODS);

/**
 * Runtime check for a `Numeric` dictionary. See `isOrd`.
 */
export const isNumeric = (value: unknown): value is Numeric<unknown> =>
  hasMethods(value, NUMERIC_METHODS);
