import { describe, it, expect, beforeEach, afterEach } from "vitest";
import type { Server } from "node:http";
import type { AddressInfo } from "node:net";
import { createApiServer } from "./server";
import type {
  DigestResult,
  DigestRunner,
  RunnerState,
  TriggerOutcome,
} from "../digest/orchestrator";
import { createDeferred, createTestConfig, silentLogger } from "../test-utils/fixtures";
import type { Deferred } from "../test-utils/fixtures";

const startedAt = new Date("2026-10-19T08:00:00Z");

function createResult(status: DigestResult["status"]): DigestResult {
  return {
    runId: "run-1",
    trigger: "manual",
    startedAt,
    finishedAt: new Date("2026-10-19T08:01:00Z"),
    status,
    text: "*digest*",
    articles: [
      { title: "A", url: "https://example.com/a", feedName: "Feed", summaryStatus: "ok" },
      { title: "B", url: "https://example.com/b", feedName: "Feed", summaryStatus: "failed" },
    ],
    feedFailures: [],
    summarization: { status: "partial", failedCount: 1 },
    delivery: {
      status: status === "failure" ? "failed" : "delivered",
      outcomes: [
        {
          destination: "webhook",
          result:
            status === "failure"
              ? { success: false, error: "HTTP 500: Internal Server Error" }
              : { success: true, messageId: null },
        },
      ],
    },
    error: null,
    log: [],
  };
}

/**
 * A runner that holds each run open until the test resolves it, with the
 * same reject-while-active rule as the real one.
 */
type ControlledRunner = DigestRunner & { readonly runs: { pending: Deferred<DigestResult> | null } };

function createControlledRunner(): ControlledRunner {
  const runs: { pending: Deferred<DigestResult> | null } = { pending: null };
  let last: DigestResult | null = null;
  return {
    runs,
    trigger: async (): Promise<TriggerOutcome> => {
      if (runs.pending) {
        return { accepted: false, status: "already_running", runId: "run-1", stage: "summarizing", startedAt };
      }
      runs.pending = createDeferred<DigestResult>();
      const result = await runs.pending.promise;
      runs.pending = null;
      last = result;
      return { accepted: true, result };
    },
    getState: (): RunnerState =>
      runs.pending
        ? { stage: "summarizing", active: true, runId: "run-1", startedAt }
        : { stage: "idle", active: false, runId: null, startedAt: null },
    getLastResult: () => last,
  };
}

describe("createApiServer", () => {
  let server: Server;
  let baseUrl: string;
  let runner: ControlledRunner;

  beforeEach(async () => {
    runner = createControlledRunner();
    const app = createApiServer({
      config: createTestConfig({ schedule: { time: "06:30", timezone: "UTC" } }),
      logger: silentLogger,
      runner,
    });
    server = await new Promise<Server>((resolve) => {
      const s = app.listen(0, "127.0.0.1", () => resolve(s));
    });
    const { port } = server.address() as AddressInfo;
    baseUrl = `http://127.0.0.1:${port}`;
  });

  afterEach(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  it("should answer the health check", async () => {
    const response = await fetch(`${baseUrl}/health`);

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ status: "ok" });
  });

  it("should describe the service at the root", async () => {
    const response = await fetch(`${baseUrl}/`);

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({
      status: "ok",
      service: "feed-digest",
      run: { stage: "idle", active: false, runId: null, startedAt: null },
      schedule: { time: "06:30", timezone: "UTC" },
      provider: "openai",
      model: "gpt-4o-mini",
      feedCount: 1,
      lastRun: null,
    });
  });

  it("should return the terminal status of a triggered run", async () => {
    const response = fetch(`${baseUrl}/trigger`, { method: "POST" });
    await waitForPending(runner.runs);
    runner.runs.pending!.resolve(createResult("partial"));

    const res = await response;
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      runId: "run-1",
      trigger: "manual",
      status: "partial",
      startedAt: "2026-10-19T08:00:00.000Z",
      finishedAt: "2026-10-19T08:01:00.000Z",
      articleCount: 2,
      summarizedCount: 1,
      summarization: { status: "partial", failedCount: 1 },
      feedFailures: [],
      deliveries: [{ destination: "webhook", success: true, error: null }],
      error: null,
      text: "*digest*",
    });
  });

  it("should answer 500 for a failed run", async () => {
    const response = fetch(`${baseUrl}/trigger`);
    await waitForPending(runner.runs);
    runner.runs.pending!.resolve(createResult("failure"));

    const res = await response;
    expect(res.status).toBe(500);
    const body = (await res.json()) as { status: string; deliveries: unknown };
    expect(body.status).toBe("failure");
    expect(body.deliveries).toEqual([
      { destination: "webhook", success: false, error: "HTTP 500: Internal Server Error" },
    ]);
  });

  it("should stay responsive and reject a second trigger while a run is active", async () => {
    const first = fetch(`${baseUrl}/trigger`, { method: "POST" });
    await waitForPending(runner.runs);

    const status = await fetch(`${baseUrl}/`);
    expect(((await status.json()) as { run: { active: boolean } }).run.active).toBe(true);

    const second = await fetch(`${baseUrl}/trigger`, { method: "POST" });
    expect(second.status).toBe(409);
    expect(await second.json()).toEqual({
      status: "already_running",
      runId: "run-1",
      stage: "summarizing",
      startedAt: "2026-10-19T08:00:00.000Z",
    });

    runner.runs.pending!.resolve(createResult("success"));
    expect((await first).status).toBe(200);
  });

  it("should expose the runs router over tRPC", async () => {
    const response = await fetch(`${baseUrl}/api/trpc/runs.latest`);

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ result: { data: null } });
  });
});

async function waitForPending(runs: { pending: unknown }): Promise<void> {
  for (let i = 0; i < 200 && runs.pending === null; i++) {
    await new Promise((resolve) => setTimeout(resolve, 5));
  }
  expect(runs.pending).not.toBeNull();
}
