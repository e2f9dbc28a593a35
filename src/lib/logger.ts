import pino from "pino";
import type { DestinationStream, Logger } from "pino";

export type { Logger } from "pino";

interface CreateLoggerOptions {
  level?: string;
  /** Defaults to stdout */
  destination?: DestinationStream;
}

export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const level = options.level ?? process.env.LOG_LEVEL ?? "info";
  // JSON lines only, no transports or pretty-printing
  const settings = { level, base: { service: "star-relay" } };
  return options.destination ? pino(settings, options.destination) : pino(settings);
}

/** Scope a logger to one delivery so every line carries its ids. */
export function createChildLogger(
  logger: Logger,
  context: { requestId?: string; eventName?: string; [key: string]: unknown },
): Logger {
  return logger.child(context);
}
