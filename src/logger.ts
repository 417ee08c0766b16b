// logger.ts: Process-wide pino logger (JSON lines on stderr)
// Level: UTTERD_LOG_LEVEL, then the "log-level" config key once the daemon has read it.

import pino from "pino";

const LEVELS = new Set(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);

export function isLogLevel(value: string): value is pino.LevelWithSilent {
  return LEVELS.has(value);
}

const envLevel = process.env.UTTERD_LOG_LEVEL ?? "info";

export const logger = pino(
  { name: "utterd", level: isLogLevel(envLevel) ? envLevel : "info" },
  pino.destination(2),
);

export function setLogLevel(level: string): void {
  if (!isLogLevel(level)) throw new Error(`Invalid log level "${level}"`);
  // the environment wins over config so a debugging session is not silenced by a file
  if (process.env.UTTERD_LOG_LEVEL) return;
  logger.level = level;
}

export type { Logger } from "pino";
