import type { LanguageModel } from "ai";
import type { AppConfig } from "../config";
import { getModel } from "./providers";

export type LlmModels = {
  readonly triage: LanguageModel;
  readonly synthesis: LanguageModel;
};

/**
 * The cheap model used for triage and chunk summaries, and the stronger one
 * used for the final brief.
 */
export function createLlmModels(config: AppConfig): LlmModels {
  const { provider, apiKey, triageModel, synthesisModel } = config.llm;
  return {
    triage: getModel(provider, triageModel, apiKey),
    synthesis: getModel(provider, synthesisModel, apiKey),
  };
}
