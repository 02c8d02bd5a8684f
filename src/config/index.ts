import { existsSync, readFileSync } from "node:fs";
import { parse } from "yaml";
import { appConfigSchema } from "./schema";
import type { AppConfig, LlmProvider } from "./schema";

export const DEFAULT_CONFIG_PATH = "./config.yaml";

type Env = Readonly<Record<string, string | undefined>>;

const SECTION_ENV_VARS = {
  llm: {
    provider: "LLM_PROVIDER",
    apiKey: "LLM_API_KEY",
    triageModel: "TRIAGE_MODEL",
    synthesisModel: "SYNTHESIS_MODEL",
    maxRetries: "LLM_MAX_RETRIES",
  },
  gmail: {
    query: "GMAIL_QUERY",
    recipientEmail: "RECIPIENT_EMAIL",
    briefingLabel: "BRIEFING_LABEL",
    credentialsPath: "GMAIL_CREDENTIALS_PATH",
    tokenPath: "GMAIL_TOKEN_PATH",
    oauthPort: "OAUTH_PORT",
  },
  pipeline: {
    initialLookbackDays: "INITIAL_LOOKBACK_DAYS",
    tokenBudget: "TOKEN_BUDGET",
    triageScoreThreshold: "TRIAGE_SCORE_THRESHOLD",
    triageBatchSize: "TRIAGE_BATCH_SIZE",
    maxPerSender: "MAX_PER_SENDER",
    maxSynthesisItems: "MAX_SYNTHESIS_ITEMS",
  },
} as const;

const TOP_LEVEL_ENV_VARS = {
  relevanceTopics: "RELEVANCE_TOPICS",
  databasePath: "DATABASE_PATH",
} as const;

const PROVIDER_KEY_ENV_VARS: ReadonlyMap<string, string> = new Map([
  ["anthropic", "ANTHROPIC_API_KEY"],
  ["openai", "OPENAI_API_KEY"],
  ["gemini", "GOOGLE_GENERATIVE_AI_API_KEY"],
]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function pickEnv(
  env: Env,
  mapping: Readonly<Record<string, string>>,
): Record<string, string> {
  const picked: Record<string, string> = {};
  for (const [key, name] of Object.entries(mapping)) {
    const value = env[name];
    if (value !== undefined && value.trim() !== "") {
      picked[key] = value.trim();
    }
  }
  return picked;
}

function readConfigFile(configPath: string): Record<string, unknown> {
  let raw: string;
  try {
    raw = readFileSync(configPath, "utf-8");
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`failed to read config file at ${configPath}: ${message}`);
  }

  let parsed: unknown;
  try {
    parsed = parse(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`failed to parse YAML in ${configPath}: ${message}`);
  }

  if (parsed === null || parsed === undefined) return {};
  if (!isRecord(parsed)) {
    throw new Error(
      `invalid configuration in ${configPath}: expected a mapping at the top level`,
    );
  }
  return parsed;
}

/**
 * Overlays environment variables on the file-level settings. Env values win.
 * The API key falls back to the selected provider's own variable
 * (e.g. ANTHROPIC_API_KEY) when neither the file nor LLM_API_KEY sets one.
 */
export function applyEnvOverrides(
  base: Readonly<Record<string, unknown>>,
  env: Env,
): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...base };

  for (const [section, mapping] of Object.entries(SECTION_ENV_VARS)) {
    const overrides = pickEnv(env, mapping);
    if (Object.keys(overrides).length === 0) continue;
    const current = merged[section];
    merged[section] = { ...(isRecord(current) ? current : {}), ...overrides };
  }

  Object.assign(merged, pickEnv(env, TOP_LEVEL_ENV_VARS));

  const llm = isRecord(merged["llm"]) ? merged["llm"] : {};
  if (llm["apiKey"] === undefined) {
    const provider =
      typeof llm["provider"] === "string" ? llm["provider"] : "anthropic";
    const keyVar = PROVIDER_KEY_ENV_VARS.get(provider);
    const key = keyVar ? env[keyVar]?.trim() : undefined;
    if (key) {
      merged["llm"] = { ...llm, apiKey: key };
    }
  }

  return merged;
}

/**
 * Loads and validates settings. An explicit `configPath` must exist; without
 * one, `./config.yaml` is read only if present and the environment alone is
 * enough.
 */
export function loadConfig(
  configPath: string | null,
  env: Env = process.env,
): AppConfig {
  const path = configPath ?? DEFAULT_CONFIG_PATH;
  const readFile = configPath !== null || existsSync(path);
  const fromFile = readFile ? readConfigFile(path) : {};
  const source = readFile ? path : "the environment";

  const result = appConfigSchema.safeParse(applyEnvOverrides(fromFile, env));
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `  - ${i.path.join(".")}: ${i.message}`)
      .join("\n");
    throw new Error(`invalid configuration in ${source}:\n${issues}`);
  }

  return result.data;
}

export type { AppConfig, LlmProvider };
