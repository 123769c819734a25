export { pollFeed } from "./poller";
export { fetchArticles, collectArticles } from "./fetcher";
export { selectArticles } from "./selector";
export { summarizeArticles } from "./summarizer";
export type {
  Article,
  DigestRequest,
  FeedFailure,
  FetchSummary,
  PollResult,
  SummarizationReport,
  SummarizationStatus,
  SummaryEntry,
} from "./types";
export type { ArticleStream } from "./fetcher";
export type { SelectionOptions } from "./selector";
export type { SummarizerOptions } from "./summarizer";
