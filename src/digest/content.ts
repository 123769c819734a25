// pattern: Functional Core
import type { SummaryEntry } from "../pipeline/types";

/**
 * One article as it appears in a rendered digest.
 */
export type DigestEntry = Readonly<{
  title: string;
  url: string;
  feedName: string;
  summary: string | null;
}>;

/**
 * Everything a renderer needs; rendering it is a pure function.
 */
export type DigestContent = Readonly<{
  runAt: Date;
  entries: ReadonlyArray<DigestEntry>;
}>;

export function toDigestContent(
  entries: ReadonlyArray<SummaryEntry>,
  runAt: Date,
): DigestContent {
  return {
    runAt,
    entries: entries.map(({ article, summary }) => ({
      title: article.title,
      url: article.url,
      feedName: article.feedName,
      summary,
    })),
  };
}

export function formatRunDate(runAt: Date): string {
  return runAt.toISOString().slice(0, 10);
}

export function buildSubject(title: string, runAt: Date): string {
  return `${title} -- ${formatRunDate(runAt)}`;
}
