import { type Logger, pino } from "pino";

import type { LogLevel } from "./config/types.js";

export type SubsystemLogger = Pick<Logger, "debug" | "info" | "warn" | "error">;

const LOG_LEVELS: readonly LogLevel[] = ["fatal", "error", "warn", "info", "debug", "trace"];

let rootLogger: Logger | null = null;

export function normalizeLogLevel(raw?: string | null): LogLevel | undefined {
  const value = raw?.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === value);
}

export function getLogger(): Logger {
  if (!rootLogger) {
    rootLogger = pino({
      name: "matrix-greeter",
      level: normalizeLogLevel(process.env.LOG_LEVEL) ?? "info",
    });
  }
  return rootLogger;
}

/** Children copy the root level when created, so set the level before creating them. */
export function setLogLevel(level: LogLevel): void {
  getLogger().level = level;
}

export function getChildLogger(bindings: Record<string, unknown>): Logger {
  return getLogger().child(bindings);
}
