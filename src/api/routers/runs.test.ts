import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type { LanguageModel } from "ai";

vi.mock("ai", () => ({
  generateText: vi.fn(),
}));

import { generateText } from "ai";
import { appRouter } from "../router";
import { createCallerFactory } from "../trpc";
import { createDigestRunner } from "../../digest/orchestrator";
import { resetParser, setParserInstance } from "../../pipeline/poller";
import {
  createDeferred,
  createFeedParserStub,
  createRecordingDestination,
  createTestConfig,
  silentLogger,
} from "../../test-utils/fixtures";

const createCaller = createCallerFactory(appRouter);
const model = { modelId: "test-model" } as unknown as LanguageModel;

function setup(destinationResult?: Parameters<typeof createRecordingDestination>[1]) {
  const config = createTestConfig();
  const webhook = createRecordingDestination("webhook", destinationResult);
  const runner = createDigestRunner({
    config,
    logger: silentLogger,
    model,
    destinations: [webhook],
    now: () => new Date("2026-10-19T12:00:00Z"),
  });
  return { caller: createCaller({ config, logger: silentLogger, runner }), runner, webhook };
}

describe("runs router", () => {
  beforeEach(() => {
    vi.mocked(generateText).mockReset();
    vi.mocked(generateText).mockResolvedValue(
      { text: "A short summary." } as unknown as Awaited<ReturnType<typeof generateText>>,
    );
    setParserInstance(
      createFeedParserStub({
        "https://example.com/rss": {
          items: [
            {
              title: "Launch",
              link: "https://example.com/launch",
              isoDate: "2026-10-19T09:00:00.000Z",
              contentSnippet: "Something launched.",
            },
          ],
        },
      }),
    );
  });

  afterEach(() => {
    resetParser();
  });

  it("should return null from latest before any run", async () => {
    const { caller } = setup();

    expect(await caller.runs.latest()).toBeNull();
  });

  it("should run a digest on trigger and expose it as the latest run", async () => {
    const { caller, webhook } = setup();

    const response = await caller.runs.trigger();

    expect(response.accepted).toBe(true);
    if (!response.accepted) return;
    expect(response.run.status).toBe("success");
    expect(response.run.trigger).toBe("manual");
    expect(response.run.articleCount).toBe(1);
    expect(response.run.summarizedCount).toBe(1);
    expect(response.run.deliveries).toEqual([
      { destination: "webhook", success: true, error: null },
    ]);
    expect(webhook.received).toHaveLength(1);

    const latest = await caller.runs.latest();
    expect(latest).toEqual(response.run);
  });

  it("should report the delivery error of a failed run", async () => {
    const { caller } = setup({ success: false, error: "HTTP 403: Forbidden" });

    const response = await caller.runs.trigger();

    expect(response.accepted).toBe(true);
    if (!response.accepted) return;
    expect(response.run.status).toBe("failure");
    expect(response.run.deliveries).toEqual([
      { destination: "webhook", success: false, error: "HTTP 403: Forbidden" },
    ]);
  });

  it("should reject a trigger while a run is active", async () => {
    const feed = createDeferred<{ items: ReadonlyArray<unknown> }>();
    setParserInstance(createFeedParserStub({ "https://example.com/rss": feed.promise }));
    const { caller, runner } = setup();

    const first = caller.runs.trigger();
    await vi.waitFor(() => {
      expect(runner.getState().active).toBe(true);
    });
    const second = await caller.runs.trigger();

    expect(second).toMatchObject({ accepted: false, status: "already_running", stage: "fetching" });

    feed.resolve({ items: [] });
    expect((await first).accepted).toBe(true);
  });
});
