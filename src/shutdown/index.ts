export { createShutdownCoordinator } from "./coordinator";
export type { ShutdownCoordinator, CoordinatorDeps } from "./coordinator";

export { createSignalInterceptor, processSignals } from "./interceptor";
export type { SignalInterceptor, InterceptorDeps } from "./interceptor";

export {
  EXIT_CODE_FORCED,
  EXIT_CODE_GRACEFUL,
  SHUTDOWN_SIGNALS,
} from "./types";
export type {
  ExitFn,
  ProcessSignals,
  RepeatedSignalPolicy,
  ScheduleFn,
  ShutdownCallback,
  ShutdownOutcome,
  ShutdownSignal,
  ShutdownState,
} from "./types";
