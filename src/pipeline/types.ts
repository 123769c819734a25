export type Article = Readonly<{
  feedName: string;
  title: string;
  url: string;
  publishedAt: Date | null;
  excerpt: string;
}>;

export type FeedFailure = Readonly<{
  feedName: string;
  url: string;
  error: string;
}>;

export type PollResult =
  | {
      readonly success: true;
      readonly feedName: string;
      readonly articles: ReadonlyArray<Article>;
      readonly skippedCount: number;
    }
  | {
      readonly success: false;
      readonly feedName: string;
      readonly error: string;
    };

export type FetchSummary = Readonly<{
  feedCount: number;
  failures: ReadonlyArray<FeedFailure>;
  skippedEntries: number;
}>;

export type DigestRequest = Readonly<{
  articles: ReadonlyArray<Article>;
  runAt: Date;
}>;

export type SummaryEntry = Readonly<{
  article: Article;
  summary: string | null;
  status: "ok" | "failed";
  error: string | null;
}>;

export type SummarizationStatus = "skipped" | "ok" | "partial" | "failed";

export type SummarizationReport = Readonly<{
  status: SummarizationStatus;
  entries: ReadonlyArray<SummaryEntry>;
  failedCount: number;
}>;
