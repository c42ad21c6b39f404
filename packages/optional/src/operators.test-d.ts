/**
 * @module operators.test-d
 * Type tests for the capability gate on lifted operators
 */

import { describe, it, expectTypeOf } from 'vitest';

import {
  numericBigInt,
  numericNumber,
  ordNumber,
  ordString,
} from './capabilities.mjs';
import { arithmetic, comparisons } from './operators.mjs';
import { some } from './option.mjs';

import type { Option } from './option.mjs';

describe('capability gate', () => {
  it('should build comparisons for a type with an Ord', () => {
    expectTypeOf(comparisons(ordString).lt).parameters.toEqualTypeOf<
      [Option<string>, Option<string>]
    >();
    expectTypeOf(comparisons(ordString).lt).returns.toEqualTypeOf<Option<boolean>>();
  });

  it('should build arithmetic for a type with a Numeric', () => {
    expectTypeOf(arithmetic(numericBigInt).div).parameters.toEqualTypeOf<
      [Option<bigint>, Option<bigint>]
    >();
    expectTypeOf(arithmetic(numericNumber).neg).returns.toEqualTypeOf<Option<number>>();
  });

  it('should reject comparisons for a dictionary without lessThan', () => {
    const equalityOnly = { equals: (a: number, b: number) => a === b };
    // @ts-expect-error equality alone is not an ordering
    comparisons(equalityOnly);
    // @ts-expect-error a Numeric has no lessThan
    comparisons(numericNumber);
  });

  it('should reject arithmetic for a type that is only ordered', () => {
    // @ts-expect-error an Ord has no arithmetic operations
    arithmetic(ordNumber);
  });

  it('should not mix operand types', () => {
    const { add } = arithmetic(numericNumber);
    // @ts-expect-error bigint operands on number arithmetic
    add(some(1n), some(2n));
  });
});
