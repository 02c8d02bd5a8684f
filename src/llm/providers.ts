import { createAnthropic } from "@ai-sdk/anthropic";
import { createOpenAI } from "@ai-sdk/openai";
import { createGoogleGenerativeAI } from "@ai-sdk/google";
import { createOpenAICompatible } from "@ai-sdk/openai-compatible";
import { createOllama } from "ollama-ai-provider-v2";
import type { LanguageModel } from "ai";
import type { LlmProvider } from "../config";

function requireApiKey(provider: LlmProvider, apiKey: string | undefined): string {
  if (!apiKey) {
    throw new Error(
      `an API key is required for provider "${provider}" (set LLM_API_KEY or llm.apiKey)`,
    );
  }
  return apiKey;
}

export function getModel(
  provider: LlmProvider,
  modelId: string,
  apiKey?: string,
): LanguageModel {
  switch (provider) {
    case "anthropic":
      return createAnthropic({ apiKey: requireApiKey(provider, apiKey) })(modelId);
    case "openai":
      return createOpenAI({ apiKey: requireApiKey(provider, apiKey) })(modelId);
    case "gemini":
      return createGoogleGenerativeAI({
        apiKey: requireApiKey(provider, apiKey),
      })(modelId);
    case "ollama":
      return createOllama({
        baseURL: process.env["OLLAMA_BASE_URL"] ?? "http://localhost:11434/api",
      })(modelId);
    case "lmstudio":
      return createOpenAICompatible({
        name: "lmstudio",
        baseURL: process.env["LMSTUDIO_BASE_URL"] ?? "http://localhost:1234/v1",
      })(modelId);
    default: {
      const _exhaustive: never = provider;
      throw new Error(`unknown provider: ${String(_exhaustive)}`);
    }
  }
}
