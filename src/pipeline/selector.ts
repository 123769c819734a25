// pattern: Functional Core
import type { Article, DigestRequest } from "./types";

export type SelectionOptions = {
  readonly lookbackHours: number;
  readonly maxArticles: number;
  readonly maxPerFeed?: number;
};

type Indexed = { readonly article: Article; readonly index: number; readonly time: number };

const HOUR_MS = 60 * 60 * 1000;

function mostRecent(items: ReadonlyArray<Indexed>, limit: number): Array<Indexed> {
  return [...items]
    .sort((a, b) => b.time - a.time || a.index - b.index)
    .slice(0, limit);
}

/**
 * Picks the articles for one run.
 *
 * Articles published before `now - lookbackHours`, or without a date, are
 * dropped; among the rest a repeated URL keeps its first occurrence. The per-feed and
 * overall caps keep the most recent articles. The result is in fetch order.
 */
export function selectArticles(
  articles: ReadonlyArray<Article>,
  options: SelectionOptions,
  now: Date,
): DigestRequest {
  const cutoff = now.getTime() - options.lookbackHours * HOUR_MS;
  const seenUrls = new Set<string>();
  let candidates: Array<Indexed> = [];

  articles.forEach((article, index) => {
    const time = article.publishedAt?.getTime();
    if (time === undefined || Number.isNaN(time) || time < cutoff) return;

    if (seenUrls.has(article.url)) return;
    seenUrls.add(article.url);

    candidates.push({ article, index, time });
  });

  const { maxPerFeed } = options;
  if (maxPerFeed !== undefined) {
    const byFeed = new Map<string, Array<Indexed>>();
    for (const candidate of candidates) {
      const group = byFeed.get(candidate.article.feedName) ?? [];
      group.push(candidate);
      byFeed.set(candidate.article.feedName, group);
    }
    candidates = Array.from(byFeed.values()).flatMap((group) =>
      mostRecent(group, maxPerFeed),
    );
  }

  if (candidates.length > options.maxArticles) {
    candidates = mostRecent(candidates, options.maxArticles);
  }

  return {
    articles: candidates
      .sort((a, b) => a.index - b.index)
      .map((candidate) => candidate.article),
    runAt: now,
  };
}
