import { describe, expect, it } from 'vitest';

import { lift } from './lift.mjs';
import { ap, flatMap, map, none, some } from './option.mjs';

import type { Option } from './option.mjs';

/**
 * Functor, applicative and monad laws for Option, checked on both variants.
 */

describe('Option Laws', () => {
  const id = <T,>(x: T): T => x;
  const samples: Option<number>[] = [some(10), some(0), none()];

  describe('Functor Laws', () => {
    it('identity: map(id) ≅ id', () => {
      for (const option of samples) {
        expect(map(id)(option)).toEqual(option);
      }
    });

    it('composition: map(g∘f) ≅ map(g)∘map(f)', () => {
      const f = (n: number) => n * 2;
      const g = (n: number) => `${n}!`;
      for (const option of samples) {
        expect(map((x: number) => g(f(x)))(option)).toEqual(
          map(g)(map(f)(option)),
        );
      }
    });
  });

  describe('Monad Laws', () => {
    const f = (n: number): Option<number> => (n === 0 ? none() : some(100 / n));
    const g = (n: number): Option<number> => (n > 5 ? some(n - 5) : none());

    it('left identity: flatMap(f)(some(x)) ≅ f(x)', () => {
      for (const x of [10, 0, 50]) {
        expect(flatMap(f)(some(x))).toEqual(f(x));
      }
    });

    it('right identity: flatMap(some)(m) ≅ m', () => {
      for (const option of samples) {
        expect(flatMap((n: number) => some(n))(option)).toEqual(option);
      }
    });

    it('associativity: flatMap(g)(flatMap(f)(m)) ≅ flatMap(x => flatMap(g)(f(x)))(m)', () => {
      for (const option of samples) {
        expect(flatMap(g)(flatMap(f)(option))).toEqual(
          flatMap((x: number) => flatMap(g)(f(x)))(option),
        );
      }
    });
  });

  describe('Applicative Laws', () => {
    it('identity: ap(some(id))(v) ≅ v', () => {
      for (const option of samples) {
        expect(ap(some((n: number) => id(n)))(option)).toEqual(option);
      }
    });

    it('homomorphism: ap(some(f))(some(x)) ≅ some(f(x))', () => {
      const f = (n: number) => n + 1;
      expect(ap(some(f))(some(41))).toEqual(some(f(41)));
    });

    it('lift agrees with map for unary functions', () => {
      const f = (n: number) => n * 3;
      for (const option of samples) {
        expect(lift(f)(option)).toEqual(map(f)(option));
      }
    });
  });
});
