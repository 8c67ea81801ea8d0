import { pino, type Logger } from "pino";
import type { LogLevel } from "../config/env.js";

export type { Logger };

const loggers = new Map<LogLevel, Logger>();

/** Shared library logger per level, created on first use. */
export function createLogger(level: LogLevel): Logger {
  let logger = loggers.get(level);
  if (!logger) {
    logger = pino({ name: "request-forge", level });
    loggers.set(level, logger);
  }
  return logger;
}
