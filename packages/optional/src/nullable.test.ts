/**
 * @module nullable.test
 * Tests for the nullable helpers
 */

import { describe, it, expect, vi } from 'vitest';

import { AbsentValueError } from './errors.mjs';
import {
  Nullable,
  catchToNull,
  foldNullable,
  isNullish,
  liftNullable,
  unwrapNullable,
} from './nullable.mjs';

describe('Nullable helpers', () => {
  describe('isNullish', () => {
    it('should only match null and undefined', () => {
      expect(isNullish(null)).toBe(true);
      expect(isNullish(undefined)).toBe(true);
      expect(isNullish(0)).toBe(false);
      expect(isNullish('')).toBe(false);
      expect(isNullish(false)).toBe(false);
    });
  });

  describe('unwrapNullable', () => {
    it('should return present values, falsy ones included', () => {
      expect(unwrapNullable(0)).toBe(0);
      expect(unwrapNullable('')).toBe('');
    });

    it('should throw AbsentValueError naming what it received', () => {
      let caught: unknown;
      try {
        unwrapNullable(null);
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(AbsentValueError);
      expect(caught).toMatchObject({
        message: 'tried to unwrap a null or undefined value',
        context: { received: 'null' },
      });
      expect(() => unwrapNullable(undefined)).toThrow(AbsentValueError);
    });
  });

  describe('liftNullable', () => {
    const add = liftNullable((a: number, b: number) => a + b);

    it('should apply the function when every argument is present', () => {
      expect(add(1, 2)).toBe(3);
      expect(add(0, 0)).toBe(0);
    });

    it('should give null when any argument is nullish', () => {
      const base = vi.fn((a: number) => a);
      const lifted = liftNullable(base);
      expect(add(1, null)).toBeNull();
      expect(add(undefined, 2)).toBeNull();
      expect(lifted(null)).toBeNull();
      expect(base).not.toHaveBeenCalled();
    });

    it('should normalise an undefined result to null', () => {
      const lookup = liftNullable((key: string) => new Map([['a', 1]]).get(key));
      expect(lookup('a')).toBe(1);
      expect(lookup('b')).toBeNull();
    });
  });

  describe('foldNullable', () => {
    const smaller = (a: number, b: number) => Math.min(a, b);

    it('should skip nullish entries', () => {
      expect(foldNullable(smaller, null, 3, undefined, 1)).toBe(1);
    });

    it('should give null for nothing present', () => {
      expect(foldNullable(smaller)).toBeNull();
      expect(foldNullable(smaller, null, undefined)).toBeNull();
    });

    it('should return a single value without calling the operator', () => {
      const op = vi.fn(smaller);
      expect(foldNullable(op, null, 0)).toBe(0);
      expect(op).not.toHaveBeenCalled();
    });

    it('should stop when the operator answers nullish', () => {
      const safeDiv = vi.fn((a: number, b: number) => (b === 0 ? null : a / b));
      expect(foldNullable(safeDiv, 8, 0, 2)).toBeNull();
      expect(safeDiv).toHaveBeenCalledTimes(1);
      expect(foldNullable(safeDiv, 8, null, 2)).toBe(4);
    });
  });

  describe('catchToNull', () => {
    it('should turn a throw into null', () => {
      const parse = catchToNull((text: string): unknown => JSON.parse(text));
      expect(parse('[1]')).toEqual([1]);
      expect(parse('oops')).toBeNull();
    });
  });

  it('should expose the helpers on the Nullable namespace', () => {
    expect(Nullable.unwrap).toBe(unwrapNullable);
    expect(Nullable.lift).toBe(liftNullable);
    expect(Nullable.fold).toBe(foldNullable);
  });
});
