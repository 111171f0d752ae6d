import pino from "pino";
import type { LogLevel } from "./config";

export type Logger = {
  info(obj: object, msg?: string): void;
  debug(obj: object, msg?: string): void;
  error(obj: object, msg?: string): void;
  fatal(obj: object, msg?: string): void;
};

function resolveLevel(level?: LogLevel): LogLevel | undefined {
  if (process.env.NODE_ENV === "test") {
    return "silent";
  }
  return level;
}

/**
 * Structured logger on stderr, so demo output on stdout stays readable.
 * Without a level, pino's default (info) applies.
 */
export function createLogger(level?: LogLevel): Logger {
  return pino({ name: "demos", level: resolveLevel(level) }, pino.destination(2));
}
