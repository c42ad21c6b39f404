/**
 * @module operators.test
 * Tests for the lifted comparison and arithmetic operators
 */

import { describe, it, expect } from 'vitest';

import {
  numericBigInt,
  numericNumber,
  ordBy,
  ordNumber,
  ordString,
} from './capabilities.mjs';
import { arithmetic, comparisons, numberOps } from './operators.mjs';
import { none, some, unwrapOr } from './option.mjs';

describe('Lifted Operators', () => {
  describe('comparisons', () => {
    const { lt, gt, le, ge, eq } = comparisons(ordNumber);

    it('should compare present values', () => {
      expect(lt(some(1), some(2))).toEqual(some(true));
      expect(gt(some(1), some(2))).toEqual(some(false));
      expect(le(some(2), some(2))).toEqual(some(true));
      expect(ge(some(1), some(2))).toEqual(some(false));
      expect(eq(some(3), some(3))).toEqual(some(true));
    });

    it('should give None, not false, when an operand is absent', () => {
      expect(lt(none(), some(2))).toEqual(none());
      expect(gt(some(1), none())).toEqual(none());
      expect(eq(none(), none())).toEqual(none());
    });

    it('should need an explicit collapse to drive a branch', () => {
      const atLeastTen = (value: number | null) =>
        unwrapOr(false)(ge(value === null ? none() : some(value), some(10)));
      expect(atLeastTen(12)).toBe(true);
      expect(atLeastTen(3)).toBe(false);
      expect(atLeastTen(null)).toBe(false);
    });

    it('should keep partial orders partial', () => {
      expect(lt(some(Number.NaN), some(1))).toEqual(some(false));
      expect(ge(some(Number.NaN), some(1))).toEqual(some(false));
    });

    it('should work for any Ord instance', () => {
      const strings = comparisons(ordString);
      expect(strings.lt(some('apple'), some('banana'))).toEqual(some(true));

      const byAge = comparisons(ordBy((p: { age: number }) => p.age, ordNumber));
      expect(byAge.gt(some({ age: 40 }), some({ age: 30 }))).toEqual(some(true));
    });

    it('should return the same operator set for the same dictionary', () => {
      expect(comparisons(ordNumber)).toBe(comparisons(ordNumber));
      expect(comparisons(ordNumber).lt).toBe(lt);
    });
  });

  describe('arithmetic over number', () => {
    const { neg, add, sub, mul, pow, div, floorDiv } = arithmetic(numericNumber);

    it('should compute with present values', () => {
      expect(neg(some(3))).toEqual(some(-3));
      expect(add(some(2), some(3))).toEqual(some(5));
      expect(sub(some(2), some(3))).toEqual(some(-1));
      expect(mul(some(4), some(2.5))).toEqual(some(10));
      expect(pow(some(2), some(10))).toEqual(some(1024));
      expect(div(some(10), some(2))).toEqual(some(5));
      expect(floorDiv(some(-7), some(2))).toEqual(some(-4));
    });

    it('should annihilate on an absent operand', () => {
      expect(neg(none())).toEqual(none());
      expect(add(none(), some(3))).toEqual(none());
      expect(mul(some(3), none())).toEqual(none());
      expect(pow(none(), none())).toEqual(none());
    });

    it('should answer None for a zero divisor', () => {
      expect(div(some(10), some(0))).toEqual(none());
      expect(floorDiv(some(10), some(0))).toEqual(none());
      expect(div(some(0), some(5))).toEqual(some(0));
    });

    it('should let absence flow through a whole expression', () => {
      // (1 + 3) / (2 * 0)
      expect(div(add(some(1), some(3)), mul(some(2), some(0)))).toEqual(none());
      // (1 + 3) / (2 * 1)
      expect(div(add(some(1), some(3)), mul(some(2), some(1)))).toEqual(some(2));
    });

    it('should return the same operator set for the same dictionary', () => {
      expect(arithmetic(numericNumber)).toBe(arithmetic(numericNumber));
    });
  });

  describe('arithmetic over bigint', () => {
    const { div, floorDiv, neg } = arithmetic(numericBigInt);

    it('should truncate div and floor floorDiv', () => {
      expect(div(some(7n), some(2n))).toEqual(some(3n));
      expect(div(some(-7n), some(2n))).toEqual(some(-3n));
      expect(floorDiv(some(-7n), some(2n))).toEqual(some(-4n));
      expect(floorDiv(some(7n), some(2n))).toEqual(some(3n));
      expect(floorDiv(some(-8n), some(2n))).toEqual(some(-4n));
    });

    it('should answer None for a zero divisor', () => {
      expect(div(some(7n), some(0n))).toEqual(none());
      expect(floorDiv(some(7n), some(0n))).toEqual(none());
    });

    it('should negate', () => {
      expect(neg(some(5n))).toEqual(some(-5n));
    });
  });

  describe('numberOps', () => {
    it('should combine comparisons and arithmetic for numbers', () => {
      const { add, lt, div } = numberOps;
      expect(lt(add(some(1), some(1)), some(3))).toEqual(some(true));
      expect(div(some(1), some(0))).toEqual(none());
    });
  });
});
