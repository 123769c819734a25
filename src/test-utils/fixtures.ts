import pino from "pino";
import type { Logger } from "pino";
import type { AppConfig } from "../config";
import type { FeedParser } from "../pipeline/poller";
import type { Article } from "../pipeline/types";
import type { DeliveryDestination, SendResult } from "../digest/delivery";

export const silentLogger: Logger = pino({ level: "silent" });

/**
 * Creates a valid AppConfig with every section filled in.
 * @param overrides - Top-level sections to replace.
 */
export function createTestConfig(overrides?: Partial<AppConfig>): AppConfig {
  return {
    llm: { provider: "openai", model: "gpt-4o-mini" },
    feeds: [
      { name: "Test Feed", url: "https://example.com/rss" },
    ],
    schedule: { time: "08:00" },
    selection: { lookbackHours: 24, maxArticles: 12 },
    fetch: { timeoutMs: 5000 },
    summarizer: {
      maxInputChars: 4000,
      maxSummaryChars: 1200,
      maxRetries: 1,
      timeoutMs: 30000,
      maxConcurrency: 2,
    },
    delivery: { timeoutMs: 5000, sendEmptyDigest: true },
    digest: { title: "Daily Digest" },
    ...overrides,
  };
}

export function createTestArticle(overrides?: Partial<Article>): Article {
  return {
    feedName: "Test Feed",
    title: "Test Article",
    url: "https://example.com/article",
    publishedAt: new Date("2026-10-19T06:00:00Z"),
    excerpt: "An excerpt of the test article.",
    ...overrides,
  };
}

/**
 * A stand-in for rss-parser keyed by feed URL. A value that is an Error is
 * thrown; anything else is returned as the parsed feed.
 */
export function createFeedParserStub(
  feeds: Readonly<Record<string, { items: ReadonlyArray<unknown> } | Error | Promise<{ items: ReadonlyArray<unknown> }>>>,
): FeedParser {
  return {
    parseURL: async (url: string) => {
      const feed = feeds[url];
      if (feed === undefined) {
        throw new Error(`Status code 404`);
      }
      if (feed instanceof Error) {
        throw feed;
      }
      const parsed = await feed;
      return { items: [...parsed.items] } as Awaited<ReturnType<FeedParser["parseURL"]>>;
    },
  };
}

/**
 * Destination stand-in that records each message it receives.
 */
export function createRecordingDestination(
  name: string,
  result: SendResult = { success: true, messageId: null },
): DeliveryDestination & { readonly received: Array<{ subject: string; text: string; html: string }> } {
  const received: Array<{ subject: string; text: string; html: string }> = [];
  return {
    name,
    received,
    deliver: async (message) => {
      received.push({ ...message });
      return result;
    },
  };
}

export type Deferred<T> = {
  readonly promise: Promise<T>;
  readonly resolve: (value: T) => void;
};

export function createDeferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}
