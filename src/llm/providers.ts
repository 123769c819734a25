import { anthropic } from "@ai-sdk/anthropic";
import { openai } from "@ai-sdk/openai";
import { google } from "@ai-sdk/google";
import { createOpenAICompatible } from "@ai-sdk/openai-compatible";
import { createOllama } from "ollama-ai-provider-v2";
import type { LanguageModel } from "ai";
import type { AppConfig } from "../config";

export type ProviderName = AppConfig["llm"]["provider"];

/**
 * Base URLs for the self-hosted providers. Hosted providers read their API
 * keys from their own environment variables (`OPENAI_API_KEY`,
 * `ANTHROPIC_API_KEY`, `GOOGLE_GENERATIVE_AI_API_KEY`).
 */
export type LocalProviderUrls = {
  readonly ollamaBaseUrl?: string;
  readonly lmstudioBaseUrl?: string;
};

export function getModel(
  provider: ProviderName,
  modelId: string,
  urls: LocalProviderUrls = {},
): LanguageModel {
  switch (provider) {
    case "anthropic":
      return anthropic(modelId);
    case "openai":
      return openai(modelId);
    case "gemini":
      return google(modelId);
    case "ollama":
      return createOllama({
        baseURL: urls.ollamaBaseUrl ?? "http://localhost:11434/api",
      })(modelId);
    case "lmstudio":
      return createOpenAICompatible({
        name: "lmstudio",
        baseURL: urls.lmstudioBaseUrl ?? "http://localhost:1234/v1",
      })(modelId);
    default: {
      const _exhaustive: never = provider;
      throw new Error(`unknown provider: ${_exhaustive}`);
    }
  }
}
