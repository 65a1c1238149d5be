import { pino } from "pino";
import type { Logger } from "pino";

export type { Logger };

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";

export const LOG_LEVELS: readonly LogLevel[] = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

export function createLogger(level: LogLevel): Logger {
  return pino({
    level,
    base: { service: "url-service" }
  });
}
