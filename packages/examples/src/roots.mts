/**
 * Roots of `ax² + bx + c`, written three ways over `@liftwise/optional`.
 *
 * - `roots`: lifted operators; each root is absent on its own.
 * - `rootsDo`: Do notation; the pair is absent as a whole.
 * - `rootsCatching`: plain arithmetic that throws, collapsed by `tryCatch`.
 *
 * A zero leading coefficient or a negative discriminant gives no roots.
 */

import {
  Do,
  arithmetic,
  none,
  numericNumber,
  some,
  tryCatch,
} from "@liftwise/optional";

import type { Option } from "@liftwise/optional";

export type RootPair = readonly [number, number];

const { neg, add, sub, mul, div } = arithmetic(numericNumber);

export const sqrt = (x: number): Option<number> =>
  x >= 0 ? some(Math.sqrt(x)) : none();

export const inv = (x: number): Option<number> =>
  x === 0 ? none() : some(1 / x);

/**
 * Both roots, smaller-numerator first: `(-b - √d) / 2a`, then `(-b + √d) / 2a`.
 */
export const roots = (
  a: number,
  b: number,
  c: number,
): readonly [Option<number>, Option<number>] => {
  const sq = sqrt(b ** 2 - 4 * a * c);
  const minusB = neg(some(b));
  const twoA = mul(some(2), some(a));
  return [div(sub(minusB, sq), twoA), div(add(minusB, sq), twoA)];
};

export const rootsDo = (a: number, b: number, c: number): Option<RootPair> =>
  Do.bind("i", () => inv(2 * a))
    .bind("sq", () => sqrt(b ** 2 - 4 * a * c))
    .map(({ i, sq }): RootPair => [(-b - sq) * i, (-b + sq) * i]);

export const rootsCatching = (
  a: number,
  b: number,
  c: number,
): Option<RootPair> =>
  tryCatch((): RootPair => {
    const discriminant = b ** 2 - 4 * a * c;
    if (discriminant < 0) {
      throw new RangeError(`negative discriminant ${discriminant}`);
    }
    if (a === 0) {
      throw new RangeError("leading coefficient is zero");
    }
    const sq = Math.sqrt(discriminant);
    return [(-b - sq) / (2 * a), (-b + sq) / (2 * a)];
  });
