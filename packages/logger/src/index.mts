import { pino } from "pino";

import type { DestinationStream, Logger, LoggerOptions } from "pino";

export const LOGGER_LEVELS = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
] as const;

export type LoggerLevels = (typeof LOGGER_LEVELS)[number];
export type LoggerMessage = string | Error;
export type LoggerMeta = Record<string, unknown>;

export type BaseLogger = Record<
  LoggerLevels,
  (message: LoggerMessage, meta?: LoggerMeta) => void
>;

export type LevelLogger = BaseLogger & {
  logMessage: (
    level: LoggerLevels,
    message: LoggerMessage,
    meta?: LoggerMeta,
  ) => void;
};

export interface LoggerFactoryOptions {
  name?: string;
  level?: LoggerLevels;
  /** Formats lines with pino-pretty. Ignored when `destination` is set. */
  pretty?: boolean;
  /** Where lines are written. Defaults to stdout. */
  destination?: DestinationStream;
  /** Fields added to every line. */
  base?: LoggerMeta;
}

export const isLoggerLevel = (value: unknown): value is LoggerLevels =>
  LOGGER_LEVELS.some((level) => level === value);

const createPino = (options: LoggerFactoryOptions): Logger => {
  const pinoOptions: LoggerOptions = {
    level: options.level ?? "info",
    ...(options.name === undefined ? {} : { name: options.name }),
    ...(options.base === undefined ? {} : { base: options.base }),
  };

  if (options.destination !== undefined) {
    return pino(pinoOptions, options.destination);
  }
  if (options.pretty === true) {
    return pino({
      ...pinoOptions,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "HH:MM:ss",
          ignore: "pid,hostname",
        },
      },
    });
  }
  return pino(pinoOptions);
};

/**
 * Builds a leveled logger. `logger` is the narrow interface the rest of the
 * workspace codes against; `pinoLogger` is the underlying instance for
 * callers that need child loggers or flushing.
 *
 * An `Error` message is logged under `err` so pino's serializer records its
 * type and stack.
 */
export const loggerFactory = (options: LoggerFactoryOptions = {}) => {
  const pinoLogger = createPino(options);

  const logger: LevelLogger = {
    logMessage(level, message, meta) {
      if (message instanceof Error) {
        pinoLogger[level]({ ...meta, err: message }, message.message);
        return;
      }
      pinoLogger[level](meta ?? {}, message);
    },
    trace: function (message, meta?) {
      this.logMessage("trace", message, meta);
    },
    debug: function (message, meta?) {
      this.logMessage("debug", message, meta);
    },
    info: function (message, meta?) {
      this.logMessage("info", message, meta);
    },
    warn: function (message, meta?) {
      this.logMessage("warn", message, meta);
    },
    error: function (message, meta?) {
      this.logMessage("error", message, meta);
    },
    fatal: function (message, meta?) {
      this.logMessage("fatal", message, meta);
    },
  };

  return { logger, pinoLogger };
};

export default loggerFactory;
