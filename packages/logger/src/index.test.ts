import { describe, expect, it, vi } from "vitest";

import { isLoggerLevel, loggerFactory } from "./index.mjs";

import type { DestinationStream } from "pino";

const captureLines = () => {
  const lines: string[] = [];
  const destination: DestinationStream = {
    write: (line: string) => {
      lines.push(line);
    },
  };
  const parsed = (): unknown[] =>
    lines.map((line): unknown => JSON.parse(line));
  return { destination, lines, parsed };
};

it("should create a logger", () => {
  const { logger, pinoLogger } = loggerFactory({
    destination: captureLines().destination,
  });
  expect(logger).toBeDefined();
  expect(pinoLogger.level).toBe("info");
});

it("should error if using methods that do not conform to standard", () => {
  const { logger } = loggerFactory({ destination: captureLines().destination });

  //@ts-expect-error testing for error
  // eslint-disable-next-line @typescript-eslint/no-unsafe-return, @typescript-eslint/no-unsafe-call
  expect(() => logger.what("info", "message")).toThrowError();
});

it("should have all logger methods defined", () => {
  const { logger } = loggerFactory({ destination: captureLines().destination });
  expect(logger.trace).toBeDefined();
  expect(logger.debug).toBeDefined();
  expect(logger.info).toBeDefined();
  expect(logger.warn).toBeDefined();
  expect(logger.error).toBeDefined();
  expect(logger.fatal).toBeDefined();
});

it("should route level methods through logMessage", () => {
  const { logger } = loggerFactory({ destination: captureLines().destination });
  const spy = vi.spyOn(logger, "logMessage");

  logger.warn("test message", { key: "value" });

  expect(spy).toHaveBeenCalledWith("warn", "test message", { key: "value" });
});

describe("output", () => {
  it("should write one JSON line with the message and metadata", () => {
    const capture = captureLines();
    const { logger } = loggerFactory({
      name: "roots",
      destination: capture.destination,
    });

    logger.info("solved", { a: 1, first: "absent" });

    expect(capture.parsed()).toEqual([
      expect.objectContaining({
        level: 30,
        name: "roots",
        msg: "solved",
        a: 1,
        first: "absent",
      }),
    ]);
  });

  it("should log an Error under err", () => {
    const capture = captureLines();
    const { logger } = loggerFactory({ destination: capture.destination });

    logger.error(new RangeError("out of range"), { index: 5 });

    expect(capture.parsed()).toEqual([
      expect.objectContaining({
        level: 50,
        msg: "out of range",
        index: 5,
        err: expect.objectContaining({
          type: "RangeError",
          message: "out of range",
        }),
      }),
    ]);
  });

  it("should drop lines below the configured level", () => {
    const capture = captureLines();
    const { logger } = loggerFactory({
      level: "warn",
      destination: capture.destination,
    });

    logger.debug("hidden");
    logger.info("hidden");
    logger.warn("shown");

    expect(capture.lines).toHaveLength(1);
    expect(capture.parsed()[0]).toMatchObject({ level: 40, msg: "shown" });
  });

  it("should add base fields to every line", () => {
    const capture = captureLines();
    const { logger } = loggerFactory({
      base: { service: "demo" },
      destination: capture.destination,
    });

    logger.info("one");
    logger.fatal("two");

    expect(capture.parsed()).toEqual([
      expect.objectContaining({ service: "demo", msg: "one" }),
      expect.objectContaining({ service: "demo", msg: "two", level: 60 }),
    ]);
  });
});

describe("isLoggerLevel", () => {
  it("should accept the six levels only", () => {
    expect(isLoggerLevel("trace")).toBe(true);
    expect(isLoggerLevel("fatal")).toBe(true);
    expect(isLoggerLevel("verbose")).toBe(false);
    expect(isLoggerLevel(undefined)).toBe(false);
  });
});
