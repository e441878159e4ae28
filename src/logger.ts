import pino from "pino";
import type { DestinationStream } from "pino";

/**
 * Creates the structured JSON logger shared by the coordinator and the host.
 *
 * - Level labels as strings, ISO 8601 timestamps
 * - Level from `LOG_LEVEL`, defaults to `info`
 * - Writes to stdout unless a destination is given
 */
export function createLogger(
  level?: string,
  destination?: DestinationStream,
): pino.Logger {
  const options: pino.LoggerOptions = {
    level: level ?? process.env["LOG_LEVEL"] ?? "info",
    formatters: {
      level(label: string) {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  return destination ? pino(options, destination) : pino(options);
}
