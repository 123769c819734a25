import { resolve } from "node:path";
import { createLogger } from "./logger";
import { loadConfig, loadEnvironment } from "./config";
import type { AppConfig, AppEnvironment } from "./config";
import { createLlmClient } from "./llm/client";
import { buildDestinations, createDigestRunner } from "./digest";
import { createDigestScheduler } from "./scheduler";
import { createApiServer } from "./api/server";
import { closeHttpServer, registerShutdownHandlers } from "./lifecycle";

const CONFIG_PATH = process.env["CONFIG_PATH"] ?? "./config.yaml";

async function main(): Promise<void> {
  const logger = createLogger();

  logger.info("feed-digest starting");

  let config: AppConfig;
  let env: AppEnvironment;
  try {
    config = loadConfig(resolve(CONFIG_PATH));
    env = loadEnvironment(process.env);
  } catch (err) {
    logger.fatal(
      { error: err instanceof Error ? err.message : String(err) },
      "configuration error",
    );
    process.exit(1);
  }

  logger.info(
    { provider: config.llm.provider, model: config.llm.model, feedCount: config.feeds.length },
    "config loaded",
  );

  const destinations = buildDestinations(env, config, logger);
  if (destinations.length === 0) {
    logger.warn("no delivery destinations configured, every run will fail delivery");
  }

  const runner = createDigestRunner({
    config,
    logger,
    model: createLlmClient(config, logger),
    destinations,
  });

  const scheduler = createDigestScheduler(runner, config, logger);
  logger.info(
    { time: config.schedule.time, timezone: config.schedule.timezone ?? "local" },
    "daily digest scheduler started",
  );

  const app = createApiServer({ config, logger, runner });
  const server = app.listen(env.PORT, () => {
    logger.info({ port: env.PORT }, "api server listening");
  });

  registerShutdownHandlers({
    schedulers: [scheduler],
    closeServer: () => closeHttpServer(server),
    logger,
  });
}

main().catch((err) => {
  console.error("fatal startup error:", err);
  process.exit(1);
});
