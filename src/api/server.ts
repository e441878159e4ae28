// pattern: Imperative Shell
import type { Server } from "node:http";
import express from "express";
import type { Logger } from "pino";

/**
 * Creates the minimal Express app used in standalone mode to try the
 * shutdown sequence by hand (`kill -2 <pid>` or `kill -15 <pid>`).
 *
 * @returns Configured Express app instance (not started — caller decides port)
 */
export function createDemoServer(logger: Logger): express.Express {
  const app = express();

  app.get("/", (_req, res) => {
    logger.debug("hello requested");
    res.type("text/plain").send("Hello, world");
  });

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  return app;
}

/**
 * Returns a shutdown callback that stops the server accepting connections
 * and resolves once the open ones have closed.
 */
export function stopListening(server: Server): () => Promise<void> {
  return () =>
    new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
}

/**
 * Starts the demo app on `port` and registers its close routine as a
 * shutdown callback.
 */
export function listenWithShutdown(
  app: express.Express,
  port: number,
  deps: {
    readonly register: (callback: () => Promise<void>) => void;
    readonly logger: Logger;
  },
): Promise<Server> {
  return new Promise<Server>((resolve, reject) => {
    const server = app.listen(port);
    server.once("error", reject);
    server.once("listening", () => {
      deps.register(stopListening(server));
      const address = server.address();
      deps.logger.info(
        { port: typeof address === "object" && address ? address.port : port },
        "demo server listening",
      );
      resolve(server);
    });
  });
}
