import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import type { Mock } from "vitest";
import { createShutdown } from "./lifecycle";
import type { ShutdownDeps } from "./lifecycle";
import type { ProcessSignals, ShutdownSignal } from "./shutdown";
import { createCapturingLogger, createSilentLogger } from "./test-utils/logger";

describe("createShutdown", () => {
  let exit: Mock<(code: number) => void>;
  let handlers: Map<ShutdownSignal, (signal: ShutdownSignal) => void>;
  let signals: ProcessSignals;

  const deliver = (signal: ShutdownSignal) => {
    handlers.get(signal)?.(signal);
  };

  const build = (overrides?: Partial<ShutdownDeps>) =>
    createShutdown({
      logger: createSilentLogger(),
      env: {},
      exit,
      signals,
      schedule: (task) => task(),
      ...overrides,
    });

  beforeEach(() => {
    vi.useFakeTimers();
    exit = vi.fn<(code: number) => void>();
    handlers = new Map();
    signals = {
      on: (signal, listener) => {
        handlers.set(signal, listener);
      },
    };
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("should not subscribe to signals until installHandlers is called", () => {
    build();

    expect(handlers.size).toBe(0);
  });

  it("should run registered callbacks and exit 0 on SIGTERM", async () => {
    const closeServer = vi.fn();
    const flushQueue = vi.fn();
    const shutdown = build();
    shutdown.register(closeServer);
    shutdown.register(flushQueue);
    shutdown.installHandlers();

    deliver("SIGTERM");
    await vi.advanceTimersByTimeAsync(0);

    expect(closeServer).toHaveBeenCalledTimes(1);
    expect(flushQueue).toHaveBeenCalledTimes(1);
    expect(shutdown.state()).toBe("completed");
    expect(exit).toHaveBeenCalledWith(0);
  });

  it("should run registered callbacks and exit 0 on SIGINT", async () => {
    const closeServer = vi.fn();
    const shutdown = build();
    shutdown.register(closeServer);
    shutdown.installHandlers();

    deliver("SIGINT");
    await vi.advanceTimersByTimeAsync(0);

    expect(closeServer).toHaveBeenCalledTimes(1);
    expect(exit).toHaveBeenCalledWith(0);
  });

  it("should run callbacks once and force exit on a second SIGINT", async () => {
    const closeServer = vi.fn(
      () =>
        new Promise<void>(() => {
          // stuck draining connections
        }),
    );
    const shutdown = build();
    shutdown.register(closeServer);
    shutdown.installHandlers();

    deliver("SIGINT");
    deliver("SIGINT");
    await vi.advanceTimersByTimeAsync(0);

    expect(closeServer).toHaveBeenCalledTimes(1);
    expect(exit).toHaveBeenCalledTimes(1);
    expect(exit).toHaveBeenCalledWith(1);
  });

  it("should run callbacks once and keep waiting on a second SIGINT when ignoring repeats", async () => {
    const closeServer = vi.fn(
      () => new Promise<void>((resolve) => setTimeout(resolve, 100)),
    );
    const shutdown = build({ repeatedSignal: "ignore" });
    shutdown.register(closeServer);
    shutdown.installHandlers();

    deliver("SIGINT");
    deliver("SIGINT");
    await vi.advanceTimersByTimeAsync(99);
    expect(exit).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(1);
    expect(closeServer).toHaveBeenCalledTimes(1);
    expect(exit).toHaveBeenCalledTimes(1);
    expect(exit).toHaveBeenCalledWith(0);
  });

  it("should read the deadline from SHUTDOWN_DEADLINE", async () => {
    const shutdown = build({ env: { SHUTDOWN_DEADLINE: "2" } });
    shutdown.register(() => new Promise<void>(() => undefined));
    shutdown.installHandlers();

    expect(shutdown.deadlineMs).toBe(2000);

    deliver("SIGTERM");
    await vi.advanceTimersByTimeAsync(1999);
    expect(exit).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(1);
    expect(exit).toHaveBeenCalledWith(1);
  });

  it("should fall back to the 5 second default for an invalid deadline", async () => {
    const { logger, lines } = createCapturingLogger("warn");
    const shutdown = build({ logger, env: { SHUTDOWN_DEADLINE: "soon" } });
    shutdown.register(() => new Promise<void>(() => undefined));
    shutdown.installHandlers();

    expect(shutdown.deadlineMs).toBe(5000);
    expect(lines[0]?.msg).toBe("invalid shutdown deadline, using default");

    deliver("SIGTERM");
    await vi.advanceTimersByTimeAsync(4999);
    expect(exit).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(1);
    expect(exit).toHaveBeenCalledWith(1);
  });

  it("should exit without waiting when nothing was registered", async () => {
    const shutdown = build();
    shutdown.installHandlers();

    deliver("SIGTERM");
    await vi.advanceTimersByTimeAsync(0);

    expect(exit).toHaveBeenCalledWith(0);
  });

  it("should log shutdown phases", async () => {
    const { logger, lines } = createCapturingLogger("info");
    const shutdown = build({ logger });
    shutdown.register(() => undefined);
    shutdown.installHandlers();

    deliver("SIGTERM");
    await vi.advanceTimersByTimeAsync(0);

    expect(lines.map((l) => l.msg)).toEqual([
      "shutdown signal received",
      "shutdown initiated",
      "shutdown complete",
    ]);
  });

  it("should let trigger start a shutdown without a signal", async () => {
    const cleanup = vi.fn();
    const shutdown = build();
    shutdown.register(cleanup);

    await expect(shutdown.trigger()).resolves.toBe("completed");
    expect(cleanup).toHaveBeenCalledTimes(1);
    expect(exit).toHaveBeenCalledWith(0);
  });
});
