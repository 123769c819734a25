// pattern: imperative-shell
import { generateText } from "ai";
import pLimit from "p-limit";
import type { LanguageModel } from "ai";
import type { Logger } from "pino";
import type { AppConfig } from "../config";
import { parseSummary } from "./summary-schema";
import type {
  Article,
  DigestRequest,
  SummarizationReport,
  SummarizationStatus,
  SummaryEntry,
} from "./types";

export type SummarizerOptions = AppConfig["summarizer"];

const SYSTEM_PROMPT =
  "You summarize tech and AI news articles for a daily digest. " +
  "Reply with a 2-3 sentence plain-text summary of the article. " +
  "Do not add a title, a preamble, markdown or links.";

export function buildPrompt(article: Article, maxInputChars: number): string {
  const body = article.excerpt.length > 0 ? article.excerpt : "(no excerpt available)";
  return [
    `Title: ${article.title}`,
    `Source: ${article.feedName}`,
    `Link: ${article.url}`,
    "",
    body.substring(0, maxInputChars),
  ].join("\n");
}

async function summarizeArticle(
  article: Article,
  model: LanguageModel,
  options: SummarizerOptions,
  logger: Logger,
): Promise<SummaryEntry> {
  try {
    const response = await generateText({
      model,
      system: SYSTEM_PROMPT,
      prompt: buildPrompt(article, options.maxInputChars),
      maxRetries: options.maxRetries,
      abortSignal: AbortSignal.timeout(options.timeoutMs),
    });

    const parsed = parseSummary(response.text, options.maxSummaryChars);
    if (!parsed.success) {
      logger.warn(
        { url: article.url, error: parsed.error },
        "summary rejected",
      );
      return { article, summary: null, status: "failed", error: parsed.error };
    }

    logger.debug({ url: article.url }, "article summarized");
    return { article, summary: parsed.summary, status: "ok", error: null };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.error(
      { url: article.url, feedName: article.feedName, error: message },
      "article summarization failed",
    );
    return { article, summary: null, status: "failed", error: message };
  }
}

function reportStatus(total: number, failedCount: number): SummarizationStatus {
  if (total === 0) return "skipped";
  if (failedCount === 0) return "ok";
  return failedCount === total ? "failed" : "partial";
}

/**
 * Summarizes each selected article with one model call. Failures are
 * recorded per article; the report is `failed` only when every article failed.
 * Entries keep the order of the request.
 *
 * @param model - The summarization model, or null when no client could be created
 */
export async function summarizeArticles(
  request: DigestRequest,
  model: LanguageModel | null,
  options: SummarizerOptions,
  logger: Logger,
): Promise<SummarizationReport> {
  let entries: Array<SummaryEntry>;

  if (model === null) {
    if (request.articles.length > 0) {
      logger.warn("no language model available, skipping summaries");
    }
    entries = request.articles.map((article): SummaryEntry => ({
      article,
      summary: null,
      status: "failed",
      error: "language model unavailable",
    }));
  } else {
    const limit = pLimit(options.maxConcurrency);
    entries = await Promise.all(
      request.articles.map((article) =>
        limit(() => summarizeArticle(article, model, options, logger)),
      ),
    );
  }

  const failedCount = entries.filter((entry) => entry.status === "failed").length;
  const status = reportStatus(entries.length, failedCount);

  if (status === "failed") {
    logger.error({ articleCount: entries.length }, "every article summarization failed");
  } else {
    logger.info(
      { articleCount: entries.length, failedCount, status },
      "summarization complete",
    );
  }

  return { status, entries, failedCount };
}
