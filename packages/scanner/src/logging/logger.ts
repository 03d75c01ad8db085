import pino from "pino";
import type { LogLevel } from "../config/config.js";

export type Logger = pino.Logger;

export interface LoggerOptions {
  level?: LogLevel;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({ name: "codeguard", level: options.level ?? "warn" }, pino.destination(2));
}

const defaults = new Map<LogLevel, Logger>();

/** Shared stderr logger per level, used when a scan is given no logger. */
export function defaultLogger(level: LogLevel): Logger {
  let logger = defaults.get(level);
  if (!logger) {
    logger = createLogger({ level });
    defaults.set(level, logger);
  }
  return logger;
}
