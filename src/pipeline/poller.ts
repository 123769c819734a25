import Parser from "rss-parser";
import { z } from "zod";
import type { Logger } from "pino";
import type { FeedSource } from "../config";
import type { Article, PollResult } from "./types";

export type FeedParser = Pick<Parser, "parseURL">;

export type PollOptions = {
  readonly timeoutMs: number;
  readonly maxItemsPerFeed?: number;
};

const rssEntrySchema = z.object({
  title: z.string().trim().min(1),
  link: z
    .string()
    .trim()
    .url()
    .refine((link) => /^https?:\/\//i.test(link), "link is not an http(s) URL"),
  isoDate: z.string().optional(),
  pubDate: z.string().optional(),
  contentSnippet: z.string().optional(),
  summary: z.string().optional(),
  content: z.string().optional(),
});

type RssEntry = z.infer<typeof rssEntrySchema>;

let parserInstance: FeedParser | null = null;
let parserTimeoutMs: number | null = null;

export function createParser(timeoutMs: number): FeedParser {
  return new Parser({
    timeout: timeoutMs,
    headers: {
      "User-Agent": "FeedDigest/1.0 (RSS digest builder)",
      Accept: "application/rss+xml, application/atom+xml, application/xml;q=0.9, */*;q=0.8",
    },
  });
}

/**
 * Returns the shared parser, recreating it when the requested timeout changes.
 * An instance installed with `setParserInstance` is returned as is.
 */
export function getParserInstance(timeoutMs: number): FeedParser {
  if (!parserInstance) {
    parserInstance = createParser(timeoutMs);
    parserTimeoutMs = timeoutMs;
  } else if (parserTimeoutMs !== null && parserTimeoutMs !== timeoutMs) {
    parserInstance = createParser(timeoutMs);
    parserTimeoutMs = timeoutMs;
  }
  return parserInstance;
}

export function setParserInstance(parser: FeedParser): void {
  parserInstance = parser;
  parserTimeoutMs = null;
}

export function resetParser(): void {
  parserInstance = null;
  parserTimeoutMs = null;
}

function parsePublishedAt(entry: RssEntry): Date | null {
  const raw = entry.isoDate ?? entry.pubDate;
  if (!raw) return null;
  const date = new Date(raw);
  return Number.isNaN(date.getTime()) ? null : date;
}

function toArticle(feedName: string, entry: RssEntry): Article {
  return {
    feedName,
    title: entry.title,
    url: entry.link,
    publishedAt: parsePublishedAt(entry),
    excerpt: (entry.contentSnippet ?? entry.summary ?? entry.content ?? "").trim(),
  };
}

/**
 * Fetches and parses a single feed. Never throws: network errors, timeouts,
 * HTTP errors and unparsable documents come back as `success: false`.
 * Entries without a usable title or link are skipped and counted.
 */
export async function pollFeed(
  source: FeedSource,
  options: PollOptions,
  logger: Logger,
): Promise<PollResult> {
  try {
    const parser = getParserInstance(options.timeoutMs);
    const feed = await parser.parseURL(source.url);

    const entries: ReadonlyArray<unknown> =
      options.maxItemsPerFeed === undefined
        ? feed.items
        : feed.items.slice(0, options.maxItemsPerFeed);

    const articles: Array<Article> = [];
    let skippedCount = 0;
    for (const item of entries) {
      const entry = rssEntrySchema.safeParse(item);
      if (entry.success) {
        articles.push(toArticle(source.name, entry.data));
      } else {
        skippedCount++;
      }
    }

    if (skippedCount > 0) {
      logger.warn(
        { feedName: source.name, skippedCount },
        "skipped malformed feed entries",
      );
    }

    logger.info(
      { feedName: source.name, articleCount: articles.length },
      "feed polled successfully",
    );
    return { success: true, feedName: source.name, articles, skippedCount };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.error(
      { feedName: source.name, feedUrl: source.url, error: message },
      "feed poll failed",
    );
    return { success: false, feedName: source.name, error: message };
  }
}
