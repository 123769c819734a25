// pattern: Imperative Shell
import type { Server } from "node:http";
import type { Logger } from "pino";

export type Stoppable = {
  readonly stop: () => void;
};

export type ShutdownDeps = {
  readonly schedulers: ReadonlyArray<Stoppable>;
  readonly closeServer: () => Promise<void>;
  readonly logger: Logger;
};

/**
 * Closes an HTTP server, resolving once in-flight requests have ended.
 * Idle keep-alive sockets are closed right away.
 */
export function closeHttpServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
    server.closeIdleConnections();
  });
}

/**
 * Registers SIGTERM and SIGINT handlers for graceful shutdown.
 *
 * - A repeated signal while shutting down is ignored
 * - The timer stops first so no scheduled run starts during shutdown
 * - The HTTP server then drains; a manual run in flight finishes first
 * - Exits with 0 once both steps have run, whether or not they failed
 */
export function registerShutdownHandlers(deps: ShutdownDeps): void {
  let shuttingDown = false;

  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;

    deps.logger.info({ signal }, "shutdown signal received");

    for (const scheduler of deps.schedulers) {
      try {
        scheduler.stop();
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        deps.logger.error({ error: message }, "error stopping scheduler");
      }
    }

    try {
      await deps.closeServer();
      deps.logger.info("http server closed");
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      deps.logger.error({ error: message }, "error closing http server");
    }

    deps.logger.info("shutdown complete");
    process.exit(0);
  };

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));
}
