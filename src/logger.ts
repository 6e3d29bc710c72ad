import pino from "pino";
import type { Logger } from "pino";

export type { Logger } from "pino";

// JSON to stderr so stdout stays clean for CLI output and --json
export function createLogger(level: string = process.env.LOG_LEVEL ?? "info"): Logger {
  return pino({ level }, pino.destination(2));
}

export function createChildLogger(logger: Logger, context: { module: string; [key: string]: unknown }): Logger {
  return logger.child(context);
}

export const silentLogger: Logger = pino({ level: "silent" });
