// pattern: Imperative Shell
import type { Logger } from "pino";
import { EXIT_CODE_FORCED, EXIT_CODE_GRACEFUL } from "./types";
import type {
  ExitFn,
  RepeatedSignalPolicy,
  ShutdownCallback,
  ShutdownOutcome,
  ShutdownState,
} from "./types";

export type ShutdownCoordinator = {
  readonly register: (callback: ShutdownCallback) => void;
  readonly trigger: (signal?: string) => Promise<ShutdownOutcome>;
  readonly state: () => ShutdownState;
};

/**
 * Dependencies for the shutdown coordinator.
 */
export type CoordinatorDeps = {
  readonly deadlineMs: number;
  readonly logger: Logger;
  readonly exit?: ExitFn;
  readonly repeatedSignal?: RepeatedSignalPolicy;
};

type Countdown = {
  readonly expired: Promise<"deadline-exceeded">;
  readonly cancel: () => void;
};

function startCountdown(ms: number): Countdown {
  let cancel = (): void => undefined;
  const expired = new Promise<"deadline-exceeded">((resolve) => {
    const handle = setTimeout(() => resolve("deadline-exceeded"), ms);
    cancel = () => clearTimeout(handle);
  });
  return { expired, cancel };
}

/**
 * Creates the coordinator that owns the cleanup callbacks of one process.
 *
 * On the first `trigger` the registered callbacks run one after another in
 * registration order while a deadline timer counts down. Whichever finishes
 * first decides the exit: code 0 when every callback settled, code 1 when
 * the deadline fired. Callbacks that throw or reject are logged and skipped.
 *
 * Callbacks must yield to the event loop. A synchronous callback that never
 * returns starves the deadline timer too, and the process will not exit.
 */
export function createShutdownCoordinator(
  deps: CoordinatorDeps,
): ShutdownCoordinator {
  const exit: ExitFn = deps.exit ?? ((code) => process.exit(code));
  const repeatedSignal = deps.repeatedSignal ?? "force-exit";
  const { logger, deadlineMs } = deps;

  const callbacks: ShutdownCallback[] = [];
  let state: ShutdownState = "idle";
  let running: Promise<ShutdownOutcome> | null = null;
  let escalate = (): void => undefined;

  const runCallbacks = async (
    snapshot: ReadonlyArray<ShutdownCallback>,
  ): Promise<"completed"> => {
    for (const [index, callback] of snapshot.entries()) {
      try {
        await callback();
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        logger.error(
          { callback: index, error: message },
          "shutdown callback failed",
        );
      }
    }
    return "completed";
  };

  const run = async (): Promise<ShutdownOutcome> => {
    const snapshot = [...callbacks];
    logger.warn(
      { callbacks: snapshot.length, deadlineMs },
      "shutdown initiated",
    );

    const countdown = startCountdown(deadlineMs);
    const escalated = new Promise<"escalated">((resolve) => {
      escalate = () => resolve("escalated");
    });

    const outcome = await Promise.race([
      runCallbacks(snapshot),
      countdown.expired,
      escalated,
    ]);
    countdown.cancel();

    switch (outcome) {
      case "completed":
        state = "completed";
        logger.warn("shutdown complete");
        exit(EXIT_CODE_GRACEFUL);
        break;
      case "deadline-exceeded":
        logger.warn({ deadlineMs }, "deadline passed, forcing exit");
        exit(EXIT_CODE_FORCED);
        break;
      case "escalated":
        // exit already requested by the repeated trigger
        break;
    }
    return outcome;
  };

  return {
    register(callback) {
      if (state !== "idle") {
        logger.warn(
          { state },
          "callback registered after shutdown started, it will not run",
        );
      }
      callbacks.push(callback);
    },

    trigger(signal) {
      if (running) {
        if (state === "in-progress") {
          if (repeatedSignal === "force-exit") {
            logger.warn({ signal }, "shutdown requested again, forcing exit");
            escalate();
            exit(EXIT_CODE_FORCED);
          } else {
            logger.warn({ signal }, "shutdown already in progress, ignoring");
          }
        }
        return running;
      }

      state = "in-progress";
      running = run().catch((err: unknown) => {
        const message = err instanceof Error ? err.message : String(err);
        logger.fatal({ error: message }, "shutdown failed, forcing exit");
        exit(EXIT_CODE_FORCED);
        return "failed" as const;
      });
      return running;
    },

    state: () => state,
  };
}
