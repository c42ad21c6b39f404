/**
 * @module composition.test
 * Tests for pipe, flow and identity
 */

import { describe, it, expect } from 'vitest';

import { flow, identity, pipe } from './composition.mjs';
import { filter, map, none, some, unwrapOr } from './option.mjs';

describe('Composition', () => {
  it('pipe should thread a value through the functions left to right', () => {
    expect(pipe(2)).toBe(2);
    expect(pipe(2, (n: number) => n + 1, (n: number) => n * 10)).toBe(30);
  });

  it('pipe should chain curried Option combinators', () => {
    const result = pipe(
      some(9),
      map(Math.sqrt),
      filter((n: number) => n > 2),
      unwrapOr(0),
    );
    expect(result).toBe(3);
  });

  it('flow should build a reusable function', () => {
    const doubleOr = flow(map((n: number) => n * 2), unwrapOr(-1));
    expect(doubleOr(some(4))).toBe(8);
    expect(doubleOr(none())).toBe(-1);
  });

  it('identity should return its argument', () => {
    const value = { id: 1 };
    expect(identity(value)).toBe(value);
  });
});
