// packages/decision/src/logger.ts
import { pino, type Logger } from "pino";
import type { LogLevel } from "./config.js";

export type { Logger } from "pino";

export function createLogger(opts: { level?: LogLevel; component?: string } = {}): Logger {
  return pino({
    level: opts.level ?? "info",
    base: { component: opts.component ?? "decision-trace" },
  });
}

/**
 * Logger that drops everything. Default for tests and for callers that pass none.
 */
export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
