/**
 * @module do.test-d
 * Type tests for the scope tracked by the Do builder
 */

import { describe, it, expectTypeOf } from 'vitest';

import { bindTo, Do } from './do.mjs';
import { some } from './option.mjs';

import type { Option } from './option.mjs';

describe('Do scope types', () => {
  it('should add the type of each bound name to the scope', () => {
    const result = Do.bind('a', () => some(1))
      .bind('b', ({ a }) => some(String(a)))
      .done();
    expectTypeOf(result).toMatchTypeOf<
      Option<{ readonly a: number; readonly b: string }>
    >();
  });

  it('should type let steps by their plain value', () => {
    const result = Do.let('n', () => 1)
      .let('flag', ({ n }) => n > 0)
      .done();
    expectTypeOf(result).toMatchTypeOf<
      Option<{ readonly n: number; readonly flag: boolean }>
    >();
  });

  it('should type the scope started by bindTo', () => {
    const result = bindTo('user')(some({ id: 7 }))
      .let('label', ({ user }) => `#${user.id}`)
      .done();
    expectTypeOf(result).toMatchTypeOf<
      Option<{ readonly user: { id: number }; readonly label: string }>
    >();
  });

  it('should type the finishing map by its callback', () => {
    expectTypeOf(Do.let('n', () => 2).map(({ n }) => n * 2)).toEqualTypeOf<
      Option<number>
    >();
  });

  it('should reject a name that is already bound', () => {
    Do.bind('a', () => some(1))
      // @ts-expect-error 'a' is already in scope
      .bind('a', () => some(2));
    Do.let('a', () => 1)
      // @ts-expect-error 'a' is already in scope
      .let('a', () => 2);
  });

  it('should reject reading a name that is not yet bound', () => {
    // @ts-expect-error 'missing' is not in scope
    Do.bind('a', () => some(1)).map((scope) => scope.missing);
  });
});
