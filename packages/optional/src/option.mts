/**
 * @module option
 * @description The Option type: a value that is either present (`Some`) or
 * absent (`None`). Absence is an ordinary outcome carried through
 * computations, not an exception and not a `null` hidden inside every type.
 *
 * `unwrap` is the one accessor that reads the payload, and it throws
 * `AbsentValueError` on `None`. Everything else in this module is written in
 * terms of `isNone`/`isSome` and `unwrap`.
 *
 * An Option is an object, so its truthiness never depends on the payload:
 * `some(0)` and `some(false)` are both truthy, as is `none()`. Branch on
 * `isSome`, `match` or `unwrapOr`, never on the option itself.
 *
 * @example
 * ```typescript
 * import { some, none, map, unwrapOr, pipe } from '@liftwise/optional';
 *
 * const half = (n: number) => n / 2;
 *
 * pipe(some(10), map(half), unwrapOr(0)); // => 5
 * pipe(none(), map(half), unwrapOr(0));   // => 0
 * ```
 *
 * @category Core
 */

import { AbsentValueError } from './errors.mjs';

import type { Eq } from './capabilities.mjs';

/**
 * A value of type `T` that may be absent.
 * Exactly one of two variants, discriminated by `_tag`.
 *
 * `T` should not itself encode absence (`null`, `undefined` or another
 * Option); use `fromNullable` and `flatMap` to collapse those.
 *
 * @category Core Types
 */
export type Option<T> = Some<T> | None;

/**
 * The present variant.
 *
 * @category Core Types
 */
export interface Some<T> {
  readonly _tag: 'Some';
  readonly value: T;
}

/**
 * The absent variant. It carries no data and has no identity beyond its tag.
 *
 * @category Core Types
 */
export interface None {
  readonly _tag: 'None';
}

/**
 * Wraps a present value. Never fails.
 *
 * @category Constructors
 * @example
 * some(42); // => { _tag: 'Some', value: 42 }
 */
export const some = <T,>(value: T): Option<T> => ({
  _tag: 'Some',
  value,
});

/**
 * The absent value. Every call returns an equal, data-free object; compare
 * options with `isNone` or `getEq`, never by reference.
 *
 * @category Constructors
 */
export const none = (): Option<never> => ({
  _tag: 'None',
});

/**
 * @category Type Guards
 */
export const isSome = <T,>(option: Option<T>): option is Some<T> =>
  option._tag === 'Some';

/**
 * @category Type Guards
 */
export const isNone = <T,>(option: Option<T>): option is None =>
  option._tag === 'None';

/**
 * Structural check for values that crossed an untyped boundary.
 *
 * @category Type Guards
 * @example
 * isOption(JSON.parse('{"_tag":"None"}')); // => true
 * isOption({ value: 1 });                   // => false
 */
export const isOption = (value: unknown): value is Option<unknown> => {
  if (typeof value !== 'object' || value === null || !('_tag' in value)) {
    return false;
  }
  return value._tag === 'None' || (value._tag === 'Some' && 'value' in value);
};

/**
 * Returns the contained value, or throws `AbsentValueError` for `None`.
 *
 * Reach for it only where absence is a bug in the caller: tests, and values
 * that were checked with `isSome` a moment earlier. Everywhere else prefer
 * `unwrapOr`, `match` or the lifted combinators.
 *
 * @category Extractors
 * @throws {AbsentValueError} If the option is `None`
 */
export const unwrap = <T,>(option: Option<T>): T => {
  if (isSome(option)) {
    return option.value;
  }
  throw new AbsentValueError();
};

/**
 * Returns the contained value, or `defaultValue` for `None`. Total.
 *
 * @category Extractors
 * @example
 * // collapsing a lifted comparison before branching on it
 * if (unwrapOr(false)(lt(left, right))) { swap(); }
 */
export const unwrapOr =
  <T,>(defaultValue: T) =>
  (option: Option<T>): T =>
    isNone(option) ? defaultValue : unwrap(option);

/**
 * Lazy form of `unwrapOr`: the default is only computed for `None`.
 *
 * @category Extractors
 */
export const getOrElse =
  <T,>(defaultValue: () => T) =>
  (option: Option<T>): T =>
    isNone(option) ? defaultValue() : unwrap(option);

/**
 * `None` for `null` and `undefined`, `Some` for everything else
 * (including `0`, `""` and `false`).
 *
 * @category Constructors
 * @example
 * fromNullable(process.env.LOG_LEVEL); // => Some('debug') or None
 */
export const fromNullable = <T,>(value: T | null | undefined): Option<T> =>
  value === null || value === undefined ? none() : some(value);

/**
 * @category Constructors
 * @example
 * const nonNegative = fromPredicate((n: number) => n >= 0);
 * nonNegative(4);  // => Some(4)
 * nonNegative(-4); // => None
 */
export const fromPredicate =
  <T,>(predicate: (value: T) => boolean) =>
  (value: T): Option<T> =>
    predicate(value) ? some(value) : none();

/**
 * Runs `fn` and turns a thrown exception into `None`.
 *
 * The exception is discarded; use it for functions whose only
 * failure mode is "no answer" (a parse, a domain error in a math routine).
 *
 * @category Constructors
 * @example
 * tryCatch(() => JSON.parse('{"a":1}')); // => Some({ a: 1 })
 * tryCatch(() => JSON.parse('nope'));    // => None
 */
export const tryCatch = <T,>(fn: () => T): Option<T> => {
  try {
    return some(fn());
  } catch {
    return none();
  }
};

/**
 * Applies `fn` to a present value; `None` stays `None`.
 *
 * @category Transformations
 * @example
 * map((n: number) => n * 2)(some(5)); // => Some(10)
 */
export const map =
  <A, B>(fn: (value: A) => B) =>
  (option: Option<A>): Option<B> =>
    isNone(option) ? none() : some(fn(unwrap(option)));

/**
 * Applies an option-returning `fn` to a present value, without nesting.
 * Also known as bind.
 *
 * @category Transformations
 * @example
 * const reciprocal = (n: number) => (n === 0 ? none() : some(1 / n));
 * flatMap(reciprocal)(some(4)); // => Some(0.25)
 * flatMap(reciprocal)(some(0)); // => None
 */
export const flatMap =
  <A, B>(fn: (value: A) => Option<B>) =>
  (option: Option<A>): Option<B> =>
    isNone(option) ? none() : fn(unwrap(option));

/**
 * Alias for flatMap.
 *
 * @category Transformations
 * @see flatMap
 */
export const chain = flatMap;

/**
 * Keeps `option` if it is present, otherwise evaluates the alternative.
 *
 * @category Combinations
 * @example
 * pipe(fromCache(key), orElse(() => fromDisk(key)));
 */
export const orElse =
  <T,>(alternative: () => Option<T>) =>
  (option: Option<T>): Option<T> =>
    isNone(option) ? alternative() : option;

/**
 * Keeps a present value only if it satisfies the predicate.
 * A type-guard predicate narrows the result.
 *
 * @category Refinements
 */
export function filter<T, S extends T>(
  predicate: (value: T) => value is S,
): (option: Option<T>) => Option<S>;
export function filter<T>(
  predicate: (value: T) => boolean,
): (option: Option<T>) => Option<T>;
export function filter<T>(predicate: (value: T) => boolean) {
  return (option: Option<T>): Option<T> =>
    isSome(option) && predicate(unwrap(option)) ? option : none();
}

/**
 * Exhaustive case analysis.
 *
 * @category Pattern Matching
 * @example
 * match({
 *   some: (root: number) => `x = ${root}`,
 *   none: () => 'no real root',
 * })(sqrt(-1)); // => 'no real root'
 */
export const match =
  <T, A, B>(patterns: { some: (value: T) => A; none: () => B }) =>
  (option: Option<T>): A | B =>
    isNone(option) ? patterns.none() : patterns.some(unwrap(option));

/**
 * Runs a side effect on a present value and returns the option unchanged.
 *
 * @category Side Effects
 */
export const tap =
  <T,>(fn: (value: T) => void) =>
  (option: Option<T>): Option<T> => {
    if (isSome(option)) {
      fn(unwrap(option));
    }
    return option;
  };

/**
 * @category Conversions
 */
export const toNullable = <T,>(option: Option<T>): T | null =>
  isNone(option) ? null : unwrap(option);

/**
 * @category Conversions
 */
export const toUndefined = <T,>(option: Option<T>): T | undefined =>
  isNone(option) ? undefined : unwrap(option);

/**
 * Equality of options, available only when the payload type has an `Eq`.
 * `None` equals `None`; two `Some` are equal when their values are.
 *
 * @category Instances
 * @example
 * const eq = getEq(ordNumber);
 * eq.equals(some(1), some(1)); // => true
 * eq.equals(none(), none());   // => true
 * eq.equals(some(1), none());  // => false
 */
export const getEq = <T,>(eq: Eq<T>): Eq<Option<T>> => ({
  equals: (a, b) => {
    if (isNone(a) || isNone(b)) {
      return isNone(a) && isNone(b);
    }
    return eq.equals(unwrap(a), unwrap(b));
  },
});

/**
 * All-or-nothing: `Some` of every value, or `None` if any entry is absent.
 *
 * @category Combinations
 * @example
 * sequence([some(1), some(2)]);  // => Some([1, 2])
 * sequence([some(1), none()]);   // => None
 */
export const sequence = <T,>(options: readonly Option<T>[]): Option<T[]> => {
  const values: T[] = [];
  for (const option of options) {
    if (isNone(option)) {
      return none();
    }
    values.push(unwrap(option));
  }
  return some(values);
};

/**
 * Record form of `sequence`.
 *
 * @category Combinations
 * @example
 * sequenceS({ a: some(1), b: some('x') }); // => Some({ a: 1, b: 'x' })
 */
export function sequenceS<T extends Record<string, Option<unknown>>>(
  struct: T,
): Option<{ [K in keyof T]: T[K] extends Option<infer U> ? U : never }>;
export function sequenceS(
  struct: Record<string, Option<unknown>>,
): Option<Record<string, unknown>> {
  const values: Record<string, unknown> = {};
  for (const [key, option] of Object.entries(struct)) {
    if (isNone(option)) {
      return none();
    }
    values[key] = unwrap(option);
  }
  return some(values);
}

/**
 * Applies an optional function to an optional argument.
 *
 * @category Apply
 */
export const ap =
  <A, B>(optionFn: Option<(a: A) => B>) =>
  (optionA: Option<A>): Option<B> =>
    isNone(optionFn) || isNone(optionA)
      ? none()
      : some(unwrap(optionFn)(unwrap(optionA)));

/**
 * Namespace containing the Option utilities.
 *
 * @category Namespace
 */
export const Option = {
  some,
  none,
  isSome,
  isNone,
  isOption,
  unwrap,
  unwrapOr,
  getOrElse,
  fromNullable,
  fromPredicate,
  tryCatch,
  map,
  flatMap,
  chain,
  orElse,
  filter,
  match,
  tap,
  toNullable,
  toUndefined,
  getEq,
  sequence,
  sequenceS,
  ap,
} as const;
