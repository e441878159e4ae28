// pattern: Imperative Shell
import type { Logger } from "pino";
import type { ShutdownCoordinator } from "./coordinator";
import { SHUTDOWN_SIGNALS } from "./types";
import type { ProcessSignals, ScheduleFn, ShutdownSignal } from "./types";

export type SignalInterceptor = {
  readonly installHandlers: () => void;
};

/**
 * Dependencies for the signal interceptor.
 */
export type InterceptorDeps = {
  readonly coordinator: Pick<ShutdownCoordinator, "trigger">;
  readonly logger: Logger;
  readonly signals?: ProcessSignals;
  readonly schedule?: ScheduleFn;
};

export const processSignals: ProcessSignals = {
  on: (signal, listener) => {
    process.on(signal, () => listener(signal));
  },
};

/**
 * Binds SIGINT and SIGTERM to the coordinator's trigger.
 *
 * The listener does no shutdown work itself: it logs the signal and posts
 * a shutdown request onto the event loop, where the coordinator picks it up.
 * Every delivery is forwarded; the coordinator decides what a repeat means.
 */
export function createSignalInterceptor(
  deps: InterceptorDeps,
): SignalInterceptor {
  const signals = deps.signals ?? processSignals;
  const schedule: ScheduleFn =
    deps.schedule ?? ((task) => void setImmediate(task));
  const { coordinator, logger } = deps;

  let installed = false;

  const requestShutdown = (signal: ShutdownSignal): void => {
    logger.warn({ signal }, "shutdown signal received");
    schedule(() => {
      void coordinator.trigger(signal);
    });
  };

  return {
    installHandlers() {
      if (installed) {
        logger.debug("signal handlers already installed");
        return;
      }

      for (const signal of SHUTDOWN_SIGNALS) {
        signals.on(signal, requestShutdown);
      }
      installed = true;
    },
  };
}
