// pattern: Imperative Shell
import { randomUUID } from "node:crypto";
import type { LanguageModel } from "ai";
import type { Logger } from "pino";
import type { AppConfig } from "../config";
import {
  collectArticles,
  fetchArticles,
  selectArticles,
  summarizeArticles,
} from "../pipeline";
import type {
  FeedFailure,
  SummarizationReport,
  SummarizationStatus,
} from "../pipeline";
import { buildSubject, toDigestContent } from "./content";
import type { DeliveryDestination, DigestMessage } from "./delivery";
import { dispatchDigest } from "./dispatcher";
import type { DeliveryReport } from "./dispatcher";
import { formatDigestText } from "./formatter";
import { renderDigestHtml } from "./renderer";

export type RunStage =
  | "idle"
  | "fetching"
  | "selecting"
  | "summarizing"
  | "formatting"
  | "delivering"
  | "done";

export type RunStatus = "success" | "partial" | "failure";

export type TriggerSource = "manual" | "scheduled";

export type RunLogEntry = Readonly<{
  at: Date;
  stage: RunStage;
  message: string;
}>;

export type DigestArticleStatus = Readonly<{
  title: string;
  url: string;
  feedName: string;
  summaryStatus: "ok" | "failed";
}>;

/**
 * Terminal record of one run, produced on entry to `done`.
 */
export type DigestResult = Readonly<{
  runId: string;
  trigger: TriggerSource;
  startedAt: Date;
  finishedAt: Date;
  status: RunStatus;
  text: string | null;
  articles: ReadonlyArray<DigestArticleStatus>;
  feedFailures: ReadonlyArray<FeedFailure>;
  summarization: Readonly<{ status: SummarizationStatus; failedCount: number }> | null;
  delivery: DeliveryReport | null;
  error: string | null;
  log: ReadonlyArray<RunLogEntry>;
}>;

export type TriggerOutcome =
  | { readonly accepted: true; readonly result: DigestResult }
  | {
      readonly accepted: false;
      readonly status: "already_running";
      readonly runId: string;
      readonly stage: RunStage;
      readonly startedAt: Date;
    };

export type RunnerState = Readonly<{
  stage: RunStage;
  active: boolean;
  runId: string | null;
  startedAt: Date | null;
}>;

export type DigestRunner = {
  /** Starts a run unless one is active; resolves with its terminal result. */
  readonly trigger: (source: TriggerSource) => Promise<TriggerOutcome>;
  readonly getState: () => RunnerState;
  readonly getLastResult: () => DigestResult | null;
};

export type DigestRunnerDeps = {
  readonly config: AppConfig;
  readonly logger: Logger;
  readonly model: LanguageModel | null;
  readonly destinations: ReadonlyArray<DeliveryDestination>;
  readonly now?: () => Date;
};

const NEXT_STAGE: Readonly<Record<RunStage, RunStage>> = {
  idle: "fetching",
  fetching: "selecting",
  selecting: "summarizing",
  summarizing: "formatting",
  formatting: "delivering",
  delivering: "done",
  done: "fetching",
};

type ActiveRun = {
  readonly runId: string;
  readonly trigger: TriggerSource;
  readonly startedAt: Date;
  readonly logger: Logger;
  readonly log: Array<RunLogEntry>;
  feedFailures: ReadonlyArray<FeedFailure>;
  summarization: SummarizationReport | null;
  text: string | null;
  delivery: DeliveryReport | null;
};

/**
 * Derives the overall run status from the stage reports.
 *
 * - `failure`: an error escaped a stage, or no destination accepted the digest
 * - `partial`: delivered, but a destination or a summarization failed
 * - `success`: everything delivered and summarized, or nothing to report
 */
export function resolveRunStatus(
  summarization: SummarizationReport | null,
  delivery: DeliveryReport | null,
  error: string | null,
): RunStatus {
  if (error !== null || delivery === null || delivery.status === "failed") {
    return "failure";
  }
  if (delivery.status === "partial") {
    return "partial";
  }
  if (summarization?.status === "partial" || summarization?.status === "failed") {
    return "partial";
  }
  return "success";
}

/**
 * Creates the run orchestrator. It owns the run lock: at most one run is
 * active at a time and a trigger arriving during a run is rejected, not queued.
 * The scheduler and the HTTP endpoints both call `trigger`.
 */
export function createDigestRunner(deps: DigestRunnerDeps): DigestRunner {
  const { config, logger } = deps;
  const now = deps.now ?? (() => new Date());

  let stage: RunStage = "idle";
  let current: ActiveRun | null = null;
  let lastResult: DigestResult | null = null;

  function isActive(): boolean {
    return stage !== "idle" && stage !== "done";
  }

  function record(run: ActiveRun, message: string): void {
    run.log.push({ at: now(), stage, message });
  }

  function advance(run: ActiveRun, next: RunStage): void {
    if (NEXT_STAGE[stage] !== next) {
      throw new Error(`illegal run transition ${stage} -> ${next}`);
    }
    stage = next;
    run.logger.debug({ stage }, "run stage entered");
  }

  async function execute(run: ActiveRun): Promise<void> {
    const { articles, summary } = await collectArticles(
      fetchArticles(config.feeds, config.fetch, run.logger),
    );
    run.feedFailures = summary.failures;
    record(
      run,
      `fetched ${articles.length} articles from ${summary.feedCount} feeds (${summary.failures.length} failed)`,
    );

    advance(run, "selecting");
    const request = selectArticles(articles, config.selection, run.startedAt);
    record(run, `selected ${request.articles.length} articles`);

    advance(run, "summarizing");
    const report = await summarizeArticles(
      request,
      deps.model,
      config.summarizer,
      run.logger,
    );
    run.summarization = report;
    record(run, `summarization ${report.status} (${report.failedCount} failed)`);

    advance(run, "formatting");
    const content = toDigestContent(report.entries, request.runAt);
    const message: DigestMessage = {
      subject: buildSubject(config.digest.title, request.runAt),
      text: formatDigestText(content, config.digest.title),
      html: renderDigestHtml(content, config.digest.title),
    };
    run.text = message.text;
    record(run, `formatted ${content.entries.length} entries`);

    advance(run, "delivering");
    if (content.entries.length === 0 && !config.delivery.sendEmptyDigest) {
      run.delivery = { status: "skipped", outcomes: [] };
      record(run, "nothing to report, delivery skipped");
    } else {
      run.delivery = await dispatchDigest(deps.destinations, message, run.logger);
      record(run, `delivery ${run.delivery.status}`);
    }

    advance(run, "done");
  }

  function toResult(run: ActiveRun, error: string | null): DigestResult {
    const status = resolveRunStatus(run.summarization, run.delivery, error);
    return {
      runId: run.runId,
      trigger: run.trigger,
      startedAt: run.startedAt,
      finishedAt: now(),
      status,
      text: run.text,
      articles: (run.summarization?.entries ?? []).map((entry) => ({
        title: entry.article.title,
        url: entry.article.url,
        feedName: entry.article.feedName,
        summaryStatus: entry.status,
      })),
      feedFailures: run.feedFailures,
      summarization: run.summarization
        ? { status: run.summarization.status, failedCount: run.summarization.failedCount }
        : null,
      delivery: run.delivery,
      error,
      log: run.log,
    };
  }

  async function trigger(source: TriggerSource): Promise<TriggerOutcome> {
    if (isActive() && current !== null) {
      logger.warn(
        { trigger: source, runId: current.runId, stage },
        "run already active, trigger rejected",
      );
      return {
        accepted: false,
        status: "already_running",
        runId: current.runId,
        stage,
        startedAt: current.startedAt,
      };
    }

    const runId = randomUUID();
    const run: ActiveRun = {
      runId,
      trigger: source,
      startedAt: now(),
      logger: logger.child({ runId }),
      log: [],
      feedFailures: [],
      summarization: null,
      text: null,
      delivery: null,
    };
    current = run;
    advance(run, "fetching");
    run.logger.info({ trigger: source }, "digest run started");

    let result: DigestResult;
    try {
      await execute(run);
      result = toResult(run, null);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      run.logger.error({ stage, error: message }, "digest run failed");
      record(run, `run failed: ${message}`);
      result = toResult(run, message);
    } finally {
      stage = "done";
      current = null;
    }

    lastResult = result;
    run.logger.info(
      {
        status: result.status,
        articleCount: result.articles.length,
        feedFailures: result.feedFailures.length,
      },
      "digest run finished",
    );
    return { accepted: true, result };
  }

  return {
    trigger,
    getState: () => ({
      stage,
      active: isActive(),
      runId: current?.runId ?? null,
      startedAt: current?.startedAt ?? null,
    }),
    getLastResult: () => lastResult,
  };
}
