import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { writeFileSync, mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { loadConfig } from "./config";
import { createLogger } from "./logger";

/**
 * Startup wiring: configuration from file and environment, and the logger the
 * entry point builds from the CLI flags.
 */
describe("entry point configuration", () => {
  let tmpDir: string;

  function writeConfig(name: string, yaml: string): string {
    const configPath = join(tmpDir, name);
    writeFileSync(configPath, yaml);
    return configPath;
  }

  beforeEach(() => {
    tmpDir = mkdtempSync(join(tmpdir(), "newsletter-digest-config-"));
  });

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
  });

  it("should load a YAML file and fill in defaults", () => {
    const configPath = writeConfig(
      "config.yaml",
      `
llm:
  provider: openai
  triageModel: gpt-4o-mini
relevanceTopics:
  - perfumery
gmail:
  oauthPort: 9090
`,
    );

    const config = loadConfig(configPath, {});

    expect(config.llm.provider).toBe("openai");
    expect(config.llm.triageModel).toBe("gpt-4o-mini");
    expect(config.llm.synthesisModel).toBe("claude-sonnet-4-20250514");
    expect(config.llm.apiKey).toBeUndefined();
    expect(config.relevanceTopics).toEqual(["perfumery"]);
    expect(config.gmail.oauthPort).toBe(9090);
    expect(config.gmail.query).toBe("category:updates is:unread is:important");
    expect(config.pipeline.tokenBudget).toBe(4000);
  });

  it("should treat an empty file as all defaults", () => {
    const config = loadConfig(writeConfig("empty.yaml", ""), {});

    expect(config.llm.provider).toBe("anthropic");
    expect(config.relevanceTopics).toEqual([
      "AI orchestration",
      "fragrance design",
      "arbitrage/DeFi",
    ]);
  });

  it("should let environment variables win over the file", () => {
    const configPath = writeConfig(
      "config.yaml",
      `
llm:
  provider: anthropic
pipeline:
  tokenBudget: 6000
`,
    );

    const config = loadConfig(configPath, {
      LLM_PROVIDER: "gemini",
      GOOGLE_GENERATIVE_AI_API_KEY: "test-secret",
      RELEVANCE_TOPICS: "agents, perfumery ,",
      TOKEN_BUDGET: "2000",
      RECIPIENT_EMAIL: "digest@example.com",
    });

    expect(config.llm.provider).toBe("gemini");
    expect(config.llm.apiKey).toBe("test-secret");
    expect(config.relevanceTopics).toEqual(["agents", "perfumery"]);
    expect(config.pipeline.tokenBudget).toBe(2000);
    expect(config.gmail.recipientEmail).toBe("digest@example.com");
  });

  it("should accept topics as a JSON array", () => {
    const config = loadConfig(writeConfig("config.yaml", ""), {
      RELEVANCE_TOPICS: '["DeFi", "arbitrage"]',
    });

    expect(config.relevanceTopics).toEqual(["DeFi", "arbitrage"]);
  });

  it("should prefer LLM_API_KEY over the provider's own key", () => {
    const config = loadConfig(writeConfig("config.yaml", ""), {
      LLM_API_KEY: "test-llm-key",
      ANTHROPIC_API_KEY: "test-anthropic-key",
    });

    expect(config.llm.apiKey).toBe("test-llm-key");
  });

  it("should list every failing path", () => {
    const configPath = writeConfig(
      "bad.yaml",
      `
llm:
  provider: invalid_provider
pipeline:
  triageScoreThreshold: 2
`,
    );

    expect(() => loadConfig(configPath, {})).toThrow("invalid configuration");
    expect(() => loadConfig(configPath, {})).toThrow(/llm\.provider/);
    expect(() => loadConfig(configPath, {})).toThrow(/pipeline\.triageScoreThreshold/);
  });

  it("should name the environment when no config file was read", () => {
    const previous = process.cwd();
    process.chdir(tmpDir);
    try {
      const env = { LLM_PROVIDER: "bogus" };
      expect(() => loadConfig(null, env)).toThrow(
        /^invalid configuration in the environment:\n/,
      );
      expect(() => loadConfig(null, env)).toThrow(/ {2}- llm\.provider: /);
    } finally {
      process.chdir(previous);
    }
  });

  it("should name the file when one was read", () => {
    const configPath = writeConfig("bad-provider.yaml", "llm:\n  provider: bogus\n");

    expect(() => loadConfig(configPath, {})).toThrow(
      `invalid configuration in ${configPath}:`,
    );
  });

  it("should fail when an explicit config file is missing", () => {
    expect(() => loadConfig(join(tmpDir, "missing.yaml"), {})).toThrow(
      /failed to read config file/,
    );
  });

  it("should reject a file that is not a mapping", () => {
    const configPath = writeConfig("list.yaml", "- one\n- two\n");

    expect(() => loadConfig(configPath, {})).toThrow(
      "expected a mapping at the top level",
    );
  });
});

describe("createLogger", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("should use the level passed by the verbose flag", () => {
    vi.stubEnv("LOG_LEVEL", "warn");

    expect(createLogger("debug").level).toBe("debug");
  });

  it("should fall back to LOG_LEVEL, then info", () => {
    vi.stubEnv("LOG_LEVEL", "warn");
    expect(createLogger().level).toBe("warn");

    vi.stubEnv("LOG_LEVEL", undefined);
    expect(createLogger().level).toBe("info");
  });
});
