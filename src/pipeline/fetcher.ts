import type { Logger } from "pino";
import type { FeedSource } from "../config";
import { pollFeed } from "./poller";
import type { PollOptions } from "./poller";
import type { Article, FeedFailure, FetchSummary } from "./types";

export type ArticleStream = AsyncGenerator<Article, FetchSummary, undefined>;

/**
 * Polls feeds one at a time in configured order and yields their articles.
 * A failed feed is recorded in the returned summary and the stream moves on.
 */
export async function* fetchArticles(
  sources: ReadonlyArray<FeedSource>,
  options: PollOptions,
  logger: Logger,
): ArticleStream {
  const failures: Array<FeedFailure> = [];
  let skippedEntries = 0;

  for (const source of sources) {
    const result = await pollFeed(source, options, logger);
    if (!result.success) {
      failures.push({ feedName: source.name, url: source.url, error: result.error });
      continue;
    }
    skippedEntries += result.skippedCount;
    yield* result.articles;
  }

  return { feedCount: sources.length, failures, skippedEntries };
}

export async function collectArticles(
  stream: ArticleStream,
): Promise<{ readonly articles: ReadonlyArray<Article>; readonly summary: FetchSummary }> {
  const articles: Array<Article> = [];
  let next = await stream.next();
  while (!next.done) {
    articles.push(next.value);
    next = await stream.next();
  }
  return { articles, summary: next.value };
}
