import { pino, destination, type DestinationStream, type Logger } from "pino";
import type { LogLevel } from "@agentdeck/types";

export type { Logger } from "pino";

export interface LoggerOptions {
  level?: LogLevel | "silent";
  /** Logger name, bound to every entry. */
  name?: string;
  /** Where entries are written. Defaults to stderr so chat output owns stdout. */
  stream?: DestinationStream;
}

/**
 * Create the process logger. Components bind their own context with
 * `logger.child({ component })` instead of creating new roots.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  return pino(
    {
      name: options.name ?? "agentdeck",
      level: options.level ?? "info",
      base: undefined,
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    options.stream ?? destination(2)
  );
}

/** A logger that drops everything. Used by tests and as a default. */
export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}
