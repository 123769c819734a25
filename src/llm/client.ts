import type { LanguageModel } from "ai";
import type { Logger } from "pino";
import type { AppConfig } from "../config";
import { getModel } from "./providers";

/**
 * Creates the summarization model. A provider that cannot be initialised is
 * not fatal: the service keeps running and delivers title/link-only digests.
 */
export function createLlmClient(
  config: AppConfig,
  logger: Logger,
): LanguageModel | null {
  try {
    const model = getModel(config.llm.provider, config.llm.model, {
      ollamaBaseUrl: process.env["OLLAMA_BASE_URL"],
      lmstudioBaseUrl: process.env["LMSTUDIO_BASE_URL"],
    });
    logger.info(
      { provider: config.llm.provider, model: config.llm.model },
      "llm client initialised",
    );
    return model;
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.warn(
      { provider: config.llm.provider, error: message },
      "llm client init failed, summaries disabled",
    );
    return null;
  }
}
