/**
 * @module lift.test-d
 * Type tests for the lifting combinators
 */

import { describe, it, expectTypeOf } from 'vitest';

import { lift, liftOption, sequenceT } from './lift.mjs';
import { none, some } from './option.mjs';

import type { Option } from './option.mjs';

describe('lifted signatures', () => {
  it('lift should take one Option per parameter', () => {
    const repeat = lift((text: string, times: number) => text.repeat(times));
    expectTypeOf(repeat).parameters.toEqualTypeOf<[Option<string>, Option<number>]>();
    expectTypeOf(repeat).returns.toEqualTypeOf<Option<string>>();
  });

  it('liftOption should not nest the result', () => {
    const divide = liftOption((a: number, b: number) =>
      b === 0 ? none() : some(a / b),
    );
    expectTypeOf(divide).returns.toEqualTypeOf<Option<number>>();
  });

  it('sequenceT should keep the tuple shape', () => {
    expectTypeOf(sequenceT(some(1), some('a'))).toEqualTypeOf<
      Option<[number, string]>
    >();
  });

  it('should reject an argument of the wrong type', () => {
    const negate = lift((n: number) => -n);
    // @ts-expect-error a string option where a number option is expected
    negate(some('1'));
  });
});
