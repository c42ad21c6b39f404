import { isLoggerLevel } from "@liftwise/logger";
import {
  filter,
  fromNullable,
  map,
  pipe,
  unwrapOr,
} from "@liftwise/optional";

import type { LoggerLevels } from "@liftwise/logger";

export type DemoEnv = Readonly<Record<string, string | undefined>>;

export interface DemoConfig {
  readonly logLevel: LoggerLevels;
  readonly logPretty: boolean;
}

/**
 * Reads the demo settings from environment variables.
 *
 * - `LOG_LEVEL`: one of the logger levels, case-insensitive. Missing or
 *   unknown values fall back to `info`.
 * - `LOG_PRETTY`: `"true"` or `"1"` turns on pino-pretty output.
 */
export const loadDemoConfig = (env: DemoEnv): DemoConfig => ({
  logLevel: pipe(
    fromNullable(env.LOG_LEVEL),
    map((value: string) => value.trim().toLowerCase()),
    filter(isLoggerLevel),
    unwrapOr<LoggerLevels>("info"),
  ),
  logPretty: pipe(
    fromNullable(env.LOG_PRETTY),
    map((value: string) => value === "true" || value === "1"),
    unwrapOr(false),
  ),
});
