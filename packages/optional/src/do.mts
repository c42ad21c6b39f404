/**
 * @module do
 * @description Do notation for Option: a builder that runs a sequence of
 * dependent steps and stops at the first absent one.
 *
 * Each step sees the scope built so far and adds one named value to it.
 * `bind` steps answer with an Option; `let` steps answer with a plain value,
 * which is wrapped in `Some`. Steps run eagerly, in the order they are
 * written. Once a step yields `None` the builder is spent: later step
 * callbacks are never invoked and the final result is `None`.
 *
 * @example
 * ```typescript
 * import { Do, some, none } from '@liftwise/optional';
 *
 * const inv = (x: number) => (x === 0 ? none() : some(1 / x));
 *
 * Do.bind('a', () => some(44))
 *   .bind('b', () => some(2))
 *   .map(({ a, b }) => a - b);
 * // => Some(42)
 *
 * Do.bind('x', () => some(4))
 *   .bind('i', ({ x }) => inv(x - 4))
 *   .let('never', () => expensive())   // not called
 *   .map(({ i }) => i);
 * // => None
 * ```
 *
 * @category Sequencing
 */

import { flatMap, isNone, map, none, some, unwrap } from './option.mjs';

import type { Option } from './option.mjs';

type Extend<S, K extends string, V> = S & { readonly [P in K]: V };

/**
 * A scope under construction. Immutable: every step returns a new builder.
 */
export class DoOption<S extends object> {
  constructor(private readonly scope: Option<S>) {}

  /**
   * Adds `name` bound to the value of an option-returning step.
   */
  bind<K extends string, V>(
    name: Exclude<K, keyof S>,
    step: (scope: S) => Option<V>,
  ): DoOption<Extend<S, K, V>>;
  bind(name: string, step: (scope: S) => Option<unknown>): DoOption<object> {
    return this.extend(name, step);
  }

  /**
   * Adds `name` bound to a plain value, wrapped as `Some`.
   */
  let<K extends string, V>(
    name: Exclude<K, keyof S>,
    step: (scope: S) => V,
  ): DoOption<Extend<S, K, V>>;
  let(name: string, step: (scope: S) => unknown): DoOption<object> {
    return this.extend(name, (scope) => some(step(scope)));
  }

  /**
   * Finishes with a plain value computed from the scope.
   */
  map<R>(fn: (scope: S) => R): Option<R> {
    return map(fn)(this.scope);
  }

  /**
   * Finishes with an option computed from the scope; it is passed through
   * as is.
   */
  flatMap<R>(fn: (scope: S) => Option<R>): Option<R> {
    return flatMap(fn)(this.scope);
  }

  /**
   * The scope itself.
   */
  done(): Option<S> {
    return this.scope;
  }

  private extend(
    name: string,
    step: (scope: S) => Option<unknown>,
  ): DoOption<object> {
    if (isNone(this.scope)) {
      return new DoOption(none());
    }
    const current = unwrap(this.scope);
    const next = step(current);
    if (isNone(next)) {
      return new DoOption(none());
    }
    return new DoOption(some({ ...current, [name]: unwrap(next) }));
  }
}

/**
 * The empty scope every Do block starts from.
 */
export const Do: DoOption<object> = new DoOption(some({}));

/**
 * Starts a scope from an existing option.
 *
 * @example
 * bindTo('user')(findUser(id)).bind('team', ({ user }) => findTeam(user.teamId));
 */
export function bindTo<K extends string>(
  name: K,
): <V>(option: Option<V>) => DoOption<{ readonly [P in K]: V }>;
export function bindTo(
  name: string,
): (option: Option<unknown>) => DoOption<object> {
  return (option) =>
    new DoOption(map((value: unknown) => ({ [name]: value }))(option));
}

/**
 * Positional sequencing over an ordered list of step closures. Each step
 * receives the previous step's value; the first receives nothing.
 *
 * @example
 * steps(
 *   () => some(16),
 *   (x) => (x < 0 ? none() : some(Math.sqrt(x))),
 *   (root) => some(root + 1),
 * ); // => Some(5)
 */
export function steps<A>(first: () => Option<A>): Option<A>;
export function steps<A, B>(
  first: () => Option<A>,
  second: (a: A) => Option<B>,
): Option<B>;
export function steps<A, B, C>(
  first: () => Option<A>,
  second: (a: A) => Option<B>,
  third: (b: B) => Option<C>,
): Option<C>;
export function steps<A, B, C, D>(
  first: () => Option<A>,
  second: (a: A) => Option<B>,
  third: (b: B) => Option<C>,
  fourth: (c: C) => Option<D>,
): Option<D>;
export function steps<A, B, C, D, E>(
  first: () => Option<A>,
  second: (a: A) => Option<B>,
  third: (b: B) => Option<C>,
  fourth: (c: C) => Option<D>,
  fifth: (d: D) => Option<E>,
): Option<E>;
export function steps(
  first: () => Option<unknown>,
  ...rest: ((value: unknown) => Option<unknown>)[]
): Option<unknown> {
  let current = first();
  for (const step of rest) {
    if (isNone(current)) {
      return current;
    }
    current = step(unwrap(current));
  }
  return current;
}
