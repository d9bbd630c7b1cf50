/**
 * Structured logging via pino.
 *
 * Components take an optional `Logger`; when none is given they derive a
 * child of the package logger bound to their module name.
 */

import { pino, type Logger, type LevelWithSilent } from "pino";

export type { Logger } from "pino";

export interface LoggerConfig {
  level?: LevelWithSilent;
  base?: Record<string, unknown>;
}

const LEVELS: ReadonlySet<string> = new Set([
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
  "silent",
]);

function isLevel(value: string): value is LevelWithSilent {
  return LEVELS.has(value);
}

function levelFromEnv(): LevelWithSilent {
  const level = process.env["LOG_LEVEL"];
  return level !== undefined && isLevel(level) ? level : "info";
}

export function createLogger(config: LoggerConfig = {}): Logger {
  return pino({
    level: config.level ?? levelFromEnv(),
    base: config.base ?? { service: "function-invocation" },
  });
}

let defaultLogger: Logger | null = null;

export function getLogger(): Logger {
  if (!defaultLogger) {
    defaultLogger = createLogger();
  }
  return defaultLogger;
}

export function setLogger(logger: Logger): void {
  defaultLogger = logger;
}

export function moduleLogger(module: string, parent?: Logger): Logger {
  return (parent ?? getLogger()).child({ module });
}
