import type pino from "pino";
import { createLogger } from "../logger";

export type LogLine = {
  readonly level: string;
  readonly msg: string;
  readonly [field: string]: unknown;
};

/**
 * Creates a logger whose JSON lines are parsed into `lines` as they are written.
 * @param level - Minimum level to record, defaults to "debug".
 */
export function createCapturingLogger(level = "debug"): {
  readonly logger: pino.Logger;
  readonly lines: LogLine[];
} {
  const lines: LogLine[] = [];
  const logger = createLogger(level, {
    write: (msg: string) => {
      const parsed: LogLine = JSON.parse(msg);
      lines.push(parsed);
    },
  });
  return { logger, lines };
}

/** Creates a logger that discards everything. */
export function createSilentLogger(): pino.Logger {
  return createLogger("silent");
}
