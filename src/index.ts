import { createLogger } from "./logger";
import { createShutdown } from "./lifecycle";
import { createDemoServer, listenWithShutdown } from "./api/server";

const PORT = parseInt(process.env["PORT"] ?? "8888", 10);

async function main(): Promise<void> {
  const logger = createLogger();

  const shutdown = createShutdown({ logger });
  logger.info(
    { deadlineMs: shutdown.deadlineMs },
    "graceful-halt demo starting",
  );

  shutdown.installHandlers();

  const app = createDemoServer(logger);
  await listenWithShutdown(app, PORT, { register: shutdown.register, logger });

  logger.info({ pid: process.pid }, "send SIGINT or SIGTERM to stop");
}

main().catch((err) => {
  console.error("fatal startup error:", err);
  process.exit(1);
});
