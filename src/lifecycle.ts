// pattern: Imperative Shell
import type { Logger } from "pino";
import { loadShutdownConfig } from "./config";
import { createShutdownCoordinator, createSignalInterceptor } from "./shutdown";
import type {
  ExitFn,
  ProcessSignals,
  RepeatedSignalPolicy,
  ScheduleFn,
  ShutdownCallback,
  ShutdownOutcome,
  ShutdownState,
} from "./shutdown";

/**
 * The shutdown context of one process. Created once by the entry point and
 * handed to every component that needs to register cleanup.
 */
export type Shutdown = {
  readonly deadlineMs: number;
  readonly register: (callback: ShutdownCallback) => void;
  readonly installHandlers: () => void;
  readonly trigger: (signal?: string) => Promise<ShutdownOutcome>;
  readonly state: () => ShutdownState;
};

/**
 * Dependencies for the shutdown context.
 */
export type ShutdownDeps = {
  readonly logger: Logger;
  readonly env?: Readonly<Record<string, string | undefined>>;
  readonly exit?: ExitFn;
  readonly signals?: ProcessSignals;
  readonly schedule?: ScheduleFn;
  readonly repeatedSignal?: RepeatedSignalPolicy;
};

/**
 * Builds the coordinator and the signal interceptor for this process.
 *
 * - Deadline read once from `SHUTDOWN_DEADLINE` (seconds), default 5
 * - `register` callbacks during startup, then `installHandlers` before serving
 * - Exits 0 when every callback settled, 1 when the deadline or a repeated
 *   signal forced the exit
 */
export function createShutdown(deps: ShutdownDeps): Shutdown {
  const { logger } = deps;
  const { deadlineMs } = loadShutdownConfig(deps.env ?? process.env, logger);

  const coordinator = createShutdownCoordinator({
    deadlineMs,
    logger,
    exit: deps.exit,
    repeatedSignal: deps.repeatedSignal,
  });

  const interceptor = createSignalInterceptor({
    coordinator,
    logger,
    signals: deps.signals,
    schedule: deps.schedule,
  });

  return {
    deadlineMs,
    register: coordinator.register,
    installHandlers: interceptor.installHandlers,
    trigger: coordinator.trigger,
    state: coordinator.state,
  };
}
