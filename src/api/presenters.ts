// pattern: Functional Core
import type { AppContext } from "./context";
import type {
  DigestResult,
  RunStatus,
  TriggerOutcome,
} from "../digest/orchestrator";

export type RunSummary = {
  readonly runId: string;
  readonly trigger: DigestResult["trigger"];
  readonly status: RunStatus;
  readonly startedAt: string;
  readonly finishedAt: string;
  readonly articleCount: number;
  readonly summarizedCount: number;
  readonly summarization: DigestResult["summarization"];
  readonly feedFailures: DigestResult["feedFailures"];
  readonly deliveries: ReadonlyArray<{
    readonly destination: string;
    readonly success: boolean;
    readonly error: string | null;
  }>;
  readonly error: string | null;
  readonly text: string | null;
};

export function toRunSummary(result: DigestResult): RunSummary {
  return {
    runId: result.runId,
    trigger: result.trigger,
    status: result.status,
    startedAt: result.startedAt.toISOString(),
    finishedAt: result.finishedAt.toISOString(),
    articleCount: result.articles.length,
    summarizedCount: result.articles.filter((a) => a.summaryStatus === "ok").length,
    summarization: result.summarization,
    feedFailures: result.feedFailures,
    deliveries: (result.delivery?.outcomes ?? []).map(({ destination, result: sent }) => ({
      destination,
      success: sent.success,
      error: sent.success ? null : sent.error,
    })),
    error: result.error,
    text: result.text,
  };
}

export type TriggerResponse = {
  readonly statusCode: number;
  readonly body:
    | { readonly status: "already_running"; readonly runId: string; readonly stage: string; readonly startedAt: string }
    | RunSummary;
};

/**
 * Maps a trigger outcome to the HTTP answer: 409 while a run is active,
 * 500 for a failed run, 200 otherwise.
 */
export function toTriggerResponse(outcome: TriggerOutcome): TriggerResponse {
  if (!outcome.accepted) {
    return {
      statusCode: 409,
      body: {
        status: "already_running",
        runId: outcome.runId,
        stage: outcome.stage,
        startedAt: outcome.startedAt.toISOString(),
      },
    };
  }
  return {
    statusCode: outcome.result.status === "failure" ? 500 : 200,
    body: toRunSummary(outcome.result),
  };
}

export function describeStatus(context: AppContext) {
  const state = context.runner.getState();
  const lastResult = context.runner.getLastResult();
  return {
    status: "ok" as const,
    service: "feed-digest",
    run: {
      stage: state.stage,
      active: state.active,
      runId: state.runId,
      startedAt: state.startedAt?.toISOString() ?? null,
    },
    schedule: {
      time: context.config.schedule.time,
      timezone: context.config.schedule.timezone ?? null,
    },
    provider: context.config.llm.provider,
    model: context.config.llm.model,
    feedCount: context.config.feeds.length,
    lastRun: lastResult ? toRunSummary(lastResult) : null,
  };
}
