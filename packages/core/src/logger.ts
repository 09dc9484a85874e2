/**
 * Scoped console logger.
 *
 * Lines are prefixed with `[scope]`. The default level is read from
 * CROSSLINK_LOG_LEVEL and falls back to "warn".
 */

import { z } from "zod";

export const LogLevelSchema = z.enum(["debug", "info", "warn", "error", "silent"]);

export type LogLevel = z.infer<typeof LogLevelSchema>;

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export function resolveLogLevel(
  env: Record<string, string | undefined> = process.env,
): LogLevel {
  const parsed = LogLevelSchema.safeParse(env.CROSSLINK_LOG_LEVEL?.toLowerCase());
  return parsed.success ? parsed.data : "warn";
}

export function createLogger(scope: string, level: LogLevel = resolveLogLevel()): Logger {
  const enabled = (target: LogLevel) => LEVEL_RANK[target] >= LEVEL_RANK[level];
  const prefix = `[${scope}]`;

  return {
    debug: (message, ...details) => {
      if (enabled("debug")) console.debug(`${prefix} ${message}`, ...details);
    },
    info: (message, ...details) => {
      if (enabled("info")) console.info(`${prefix} ${message}`, ...details);
    },
    warn: (message, ...details) => {
      if (enabled("warn")) console.warn(`${prefix} ${message}`, ...details);
    },
    error: (message, ...details) => {
      if (enabled("error")) console.error(`${prefix} ${message}`, ...details);
    },
  };
}
