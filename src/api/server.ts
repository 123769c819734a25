// pattern: Imperative Shell
import express from "express";
import type { Request, Response } from "express";
import { createExpressMiddleware } from "@trpc/server/adapters/express";
import { appRouter } from "./router";
import type { AppContext } from "./context";
import { describeStatus, toTriggerResponse } from "./presenters";

/**
 * Creates the express app: the status root, `/trigger`, `/health`, and the
 * tRPC router at `/api/trpc`.
 *
 * `/trigger` awaits the run it starts. The run only awaits network calls, so
 * the server keeps answering other requests (including a second `/trigger`,
 * which gets 409) while it is in progress.
 *
 * @returns Configured Express app instance (not started; caller decides port)
 */
export function createApiServer(context: AppContext): express.Express {
  const app = express();

  app.use(
    "/api/trpc",
    createExpressMiddleware({
      router: appRouter,
      createContext: () => context,
    }),
  );

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.get("/", (_req, res) => {
    res.json(describeStatus(context));
  });

  const handleTrigger = async (_req: Request, res: Response): Promise<void> => {
    try {
      const outcome = await context.runner.trigger("manual");
      const { statusCode, body } = toTriggerResponse(outcome);
      res.status(statusCode).json(body);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      context.logger.error({ error: message }, "manual trigger failed unexpectedly");
      res.status(500).json({ status: "failure", error: message });
    }
  };

  app.get("/trigger", (req, res) => void handleTrigger(req, res));
  app.post("/trigger", (req, res) => void handleTrigger(req, res));

  return app;
}
