/**
 * A bounds-checked list and the min-heap sift built on it.
 *
 * Reads outside the list answer `None`, so a parent with one child or none
 * needs no special casing: the lifted comparisons see an absent sibling and
 * `unwrapOr` decides what that means.
 */

import {
  at,
  comparisons,
  isSome,
  none,
  some,
  unwrap,
  unwrapOr,
} from "@liftwise/optional";

import type { Option, Ord } from "@liftwise/optional";

/**
 * Wraps an array without copying it; writes go through to the caller's array.
 */
export class CheckedList<T> {
  constructor(private readonly items: T[]) {}

  get length(): number {
    return this.items.length;
  }

  get(index: number): Option<T> {
    return at(this.items, index);
  }

  /**
   * Writes only a present value at an index in range; anything else is a no-op.
   */
  set(index: number, value: Option<T>): void {
    if (isSome(this.get(index)) && isSome(value)) {
      this.items[index] = unwrap(value);
    }
  }

  toArray(): T[] {
    return [...this.items];
  }
}

const swap = <T,>(list: CheckedList<T>, i: number, j: number): void => {
  const first = list.get(i);
  list.set(i, list.get(j));
  list.set(j, first);
};

/**
 * One sift step for the node at `parent`. Swaps it with the smaller child
 * when that child is smaller than it; the left child wins a tie.
 *
 * @returns the index the parent moved to, or `None` when it stayed
 */
export const swapDown = <T,>(
  parent: number,
  list: CheckedList<T>,
  ord: Ord<T>,
): Option<number> => {
  const { lt } = comparisons(ord);
  const leftIndex = 2 * parent + 1;
  const rightIndex = 2 * parent + 2;
  const me = list.get(parent);
  const left = list.get(leftIndex);
  const right = list.get(rightIndex);

  if (
    unwrapOr(false)(lt(left, me)) &&
    !unwrapOr(false)(lt(right, left))
  ) {
    swap(list, parent, leftIndex);
    return some(leftIndex);
  }
  if (unwrapOr(false)(lt(right, me)) && unwrapOr(true)(lt(right, left))) {
    swap(list, parent, rightIndex);
    return some(rightIndex);
  }
  return none();
};

/**
 * Moves the node at `parent` down until neither child is smaller.
 */
export const siftDown = <T,>(
  parent: number,
  list: CheckedList<T>,
  ord: Ord<T>,
): void => {
  let moved = swapDown(parent, list, ord);
  while (isSome(moved)) {
    moved = swapDown(unwrap(moved), list, ord);
  }
};

/**
 * Rearranges the list into a min-heap in place.
 */
export const heapify = <T,>(list: CheckedList<T>, ord: Ord<T>): void => {
  for (let parent = Math.floor(list.length / 2) - 1; parent >= 0; parent--) {
    siftDown(parent, list, ord);
  }
};
