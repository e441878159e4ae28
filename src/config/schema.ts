import { z } from "zod";

/** Deadline used when `SHUTDOWN_DEADLINE` is unset or invalid. */
export const DEFAULT_SHUTDOWN_DEADLINE_SECONDS = 5;

/** Largest deadline a Node timer can hold, in whole seconds. */
export const MAX_SHUTDOWN_DEADLINE_SECONDS = 2_147_483;

export const SHUTDOWN_DEADLINE_ENV = "SHUTDOWN_DEADLINE";

export const shutdownEnvSchema = z.object({
  [SHUTDOWN_DEADLINE_ENV]: z.coerce
    .number()
    .finite()
    .positive()
    .max(MAX_SHUTDOWN_DEADLINE_SECONDS)
    .optional(),
});

export type ShutdownEnv = z.infer<typeof shutdownEnvSchema>;

export type ShutdownConfig = {
  readonly deadlineMs: number;
};
