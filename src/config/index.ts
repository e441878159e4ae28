import type { Logger } from "pino";
import {
  DEFAULT_SHUTDOWN_DEADLINE_SECONDS,
  SHUTDOWN_DEADLINE_ENV,
  shutdownEnvSchema,
} from "./schema";
import type { ShutdownConfig } from "./schema";

/**
 * Resolves the shutdown deadline from environment-style values.
 *
 * Never throws: an absent value silently falls back to the default, an
 * unparsable one falls back too but is reported on `logger` when given.
 */
export function loadShutdownConfig(
  env: Readonly<Record<string, string | undefined>>,
  logger?: Logger,
): ShutdownConfig {
  const result = shutdownEnvSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    logger?.warn(
      {
        key: SHUTDOWN_DEADLINE_ENV,
        value: env[SHUTDOWN_DEADLINE_ENV],
        issues,
        defaultSeconds: DEFAULT_SHUTDOWN_DEADLINE_SECONDS,
      },
      "invalid shutdown deadline, using default",
    );
    return { deadlineMs: DEFAULT_SHUTDOWN_DEADLINE_SECONDS * 1000 };
  }

  const seconds =
    result.data[SHUTDOWN_DEADLINE_ENV] ?? DEFAULT_SHUTDOWN_DEADLINE_SECONDS;
  return { deadlineMs: Math.round(seconds * 1000) };
}

export {
  DEFAULT_SHUTDOWN_DEADLINE_SECONDS,
  MAX_SHUTDOWN_DEADLINE_SECONDS,
  SHUTDOWN_DEADLINE_ENV,
} from "./schema";
export type { ShutdownConfig };
