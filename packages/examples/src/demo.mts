import { at, match, minimum, ordNumber } from "@liftwise/optional";

import { CheckedList, heapify } from "./heap.mjs";
import { roots, rootsDo } from "./roots.mjs";

import type { BaseLogger } from "@liftwise/logger";
import type { Option } from "@liftwise/optional";
import type { RootPair } from "./roots.mjs";

export type Rendered = number | string;

export interface DemoRecord {
  readonly message: string;
  readonly meta: Readonly<Record<string, Rendered>>;
}

export const ABSENT = "absent";

const QUADRATICS: readonly (readonly [number, number, number])[] = [
  [1, 0, -4],
  [1, -2, 1],
  [2, -2, -12],
  [1, 0, 4],
  [0, 5, 10],
];

const HEAP_INPUT = [5, 4, 3, 2, 1];

const READINGS = [5.7, 2.1, 3.0];
const READING_INDEXES = [0, 5, 2];

const renderNumber = match({
  some: (value: number): Rendered => value,
  none: (): Rendered => ABSENT,
});

const renderPair = match({
  some: ([first, second]: RootPair): Rendered => `${first},${second}`,
  none: (): Rendered => ABSENT,
});

const solve = ([a, b, c]: readonly [number, number, number]): DemoRecord => {
  const [first, second] = roots(a, b, c);
  return {
    message: "roots",
    meta: {
      a,
      b,
      c,
      first: renderNumber(first),
      second: renderNumber(second),
      pair: renderPair(rootsDo(a, b, c)),
    },
  };
};

const sortHeap = (values: readonly number[]): DemoRecord => {
  const list = new CheckedList([...values]);
  heapify(list, ordNumber);
  return {
    message: "heapify",
    meta: { input: values.join(","), heap: list.toArray().join(",") },
  };
};

const smallestReading = (
  readings: readonly number[],
  indexes: readonly number[],
): DemoRecord => {
  const candidates: Option<number>[] = indexes.map((index) => at(readings, index));
  return {
    message: "minimum",
    meta: {
      indexes: indexes.join(","),
      minimum: renderNumber(minimum(ordNumber)(candidates)),
    },
  };
};

/**
 * Runs the example computations, logging each outcome at `info`.
 *
 * @returns the logged records, in order
 */
export const runDemo = (logger: BaseLogger): DemoRecord[] => {
  logger.debug("demo starting", { quadratics: QUADRATICS.length });

  const records = [
    ...QUADRATICS.map(solve),
    sortHeap(HEAP_INPUT),
    smallestReading(READINGS, READING_INDEXES),
  ];
  for (const record of records) {
    logger.info(record.message, record.meta);
  }
  return records;
};
