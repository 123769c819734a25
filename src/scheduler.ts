import cron from "node-cron";
import type { ScheduledTask } from "node-cron";
import type { Logger } from "pino";
import type { AppConfig } from "./config";
import type { DigestRunner } from "./digest/orchestrator";

export type DigestScheduler = {
  readonly stop: () => void;
};

/**
 * Converts an `HH:MM` time of day into a daily cron expression.
 */
export function toCronExpression(timeOfDay: string): string {
  const match = /^(\d{2}):(\d{2})$/.exec(timeOfDay);
  if (!match) {
    throw new Error(`invalid time of day: ${timeOfDay}`);
  }
  const [, hours, minutes] = match;
  return `${Number(minutes)} ${Number(hours)} * * *`;
}

/**
 * Creates and starts the daily timer. Each tick calls the same
 * `runner.trigger` entry point as the HTTP trigger, with source `scheduled`.
 *
 * @param runner - The run orchestrator shared with the HTTP surface
 * @param config - Application configuration including schedule.time and schedule.timezone
 * @param logger - Logger instance for recording scheduled runs
 * @returns A DigestScheduler with a stop() method to halt the timer
 */
export function createDigestScheduler(
  runner: DigestRunner,
  config: AppConfig,
  logger: Logger,
): DigestScheduler {
  const expression = toCronExpression(config.schedule.time);
  const { timezone } = config.schedule;

  const tick = async (): Promise<void> => {
    try {
      const outcome = await runner.trigger("scheduled");
      if (!outcome.accepted) {
        logger.warn(
          { runId: outcome.runId, stage: outcome.stage },
          "scheduled run skipped, a run is already active",
        );
        return;
      }
      logger.info(
        { runId: outcome.result.runId, status: outcome.result.status },
        "scheduled run complete",
      );
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.error({ error: message }, "scheduled run failed unexpectedly");
    }
  };

  const task: ScheduledTask = timezone
    ? cron.schedule(expression, tick, { timezone })
    : cron.schedule(expression, tick);

  return {
    stop: () => {
      task.stop();
    },
  };
}
