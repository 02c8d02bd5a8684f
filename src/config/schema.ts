import { homedir } from "node:os";
import { join } from "node:path";
import { z } from "zod";

export const llmProviders = [
  "anthropic",
  "openai",
  "gemini",
  "ollama",
  "lmstudio",
] as const;

export type LlmProvider = (typeof llmProviders)[number];

const DEFAULT_TOPICS = ["AI orchestration", "fragrance design", "arbitrage/DeFi"];

const topicListSchema = z.preprocess((value) => {
  if (typeof value !== "string") return value;
  const trimmed = value.trim();
  if (trimmed.startsWith("[")) {
    try {
      const parsed: unknown = JSON.parse(trimmed);
      return parsed;
    } catch {
      return value;
    }
  }
  return trimmed
    .split(",")
    .map((topic) => topic.trim())
    .filter((topic) => topic.length > 0);
}, z.array(z.string().min(1)).min(1));

const llmSchema = z.object({
  provider: z.enum(llmProviders).default("anthropic"),
  apiKey: z.string().min(1).optional(),
  triageModel: z.string().min(1).default("claude-haiku-4-5-20251001"),
  synthesisModel: z.string().min(1).default("claude-sonnet-4-20250514"),
  maxRetries: z.coerce.number().int().nonnegative().default(3),
});

const gmailSchema = z.object({
  query: z.string().min(1).default("category:updates is:unread is:important"),
  recipientEmail: z.string().email().optional(),
  briefingLabel: z.string().min(1).default("Newsletter Briefing"),
  credentialsPath: z.string().min(1).default("./credentials.json"),
  tokenPath: z.string().min(1).default("./token.json"),
  oauthPort: z.coerce.number().int().min(1).max(65535).default(8080),
});

const pipelineSchema = z.object({
  initialLookbackDays: z.coerce.number().int().positive().default(7),
  tokenBudget: z.coerce.number().int().min(100).default(4000),
  triageScoreThreshold: z.coerce.number().min(0).max(1).default(0.5),
  triageBatchSize: z.coerce.number().int().positive().default(20),
  maxPerSender: z.coerce.number().int().positive().default(3),
  maxSynthesisItems: z.coerce.number().int().positive().default(25),
});

export const appConfigSchema = z.object({
  llm: llmSchema.prefault({}),
  relevanceTopics: topicListSchema.default(DEFAULT_TOPICS),
  gmail: gmailSchema.prefault({}),
  pipeline: pipelineSchema.prefault({}),
  databasePath: z
    .string()
    .min(1)
    .default(join(homedir(), ".newsletter-digest", "state.db")),
});

export type AppConfig = z.infer<typeof appConfigSchema>;
