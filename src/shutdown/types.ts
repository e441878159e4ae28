// pattern: Functional Core

/**
 * A unit of cleanup work run once during shutdown.
 * Returned promises are awaited; any other return value is ignored.
 */
export type ShutdownCallback = () => void | Promise<void>;

export type ShutdownState = "idle" | "in-progress" | "completed";

/**
 * How a shutdown ended.
 * - `completed`: every callback settled before the deadline
 * - `deadline-exceeded`: the deadline fired first, pending callbacks abandoned
 * - `escalated`: a repeated signal forced the exit while callbacks were running
 * - `failed`: the coordinator itself threw, the exit was forced
 */
export type ShutdownOutcome =
  | "completed"
  | "deadline-exceeded"
  | "escalated"
  | "failed";

/** What a repeated trigger does while a shutdown is already in progress. */
export type RepeatedSignalPolicy = "force-exit" | "ignore";

export const EXIT_CODE_GRACEFUL = 0;
export const EXIT_CODE_FORCED = 1;

export type ExitFn = (code: number) => void;

/** The two signals conventionally used to ask a server to stop. */
export const SHUTDOWN_SIGNALS = ["SIGINT", "SIGTERM"] as const;

export type ShutdownSignal = (typeof SHUTDOWN_SIGNALS)[number];

/**
 * Port over `process.on` for the shutdown signals, so tests never
 * deliver real signals to the runner.
 */
export type ProcessSignals = {
  readonly on: (
    signal: ShutdownSignal,
    listener: (signal: ShutdownSignal) => void,
  ) => void;
};

/** Posts a task onto the event loop. */
export type ScheduleFn = (task: () => void) => void;
