import { createDatabase } from "../db";
import type { AppDatabase } from "../db";
import type { AppConfig } from "../config";
import { processedMessages, runs } from "../db/schema";
import type {
  ExtractedItem,
  RawEmail,
  TriageResult,
} from "../pipeline/types";

/**
 * Creates an in-memory SQLite test database with the schema applied.
 */
export function createTestDatabase(): AppDatabase {
  const { db } = createDatabase(":memory:");
  return db;
}

/**
 * Seeds a processed-message row.
 */
export function seedProcessedMessage(
  db: AppDatabase,
  messageId: string,
  processedAt: Date = new Date("2026-01-01T00:00:00Z"),
): void {
  db.insert(processedMessages).values({ messageId, processedAt }).run();
}

/**
 * Seeds a run-history row and returns its ID.
 */
export function seedRun(
  db: AppDatabase,
  overrides?: Partial<typeof runs.$inferInsert>,
): number {
  const result = db
    .insert(runs)
    .values({
      ranAt: new Date("2026-01-01T07:00:00Z"),
      messagesProcessed: 0,
      ...overrides,
    })
    .returning({ id: runs.id })
    .get();

  return result.id;
}

/**
 * Creates a default AppConfig suitable for testing.
 */
export function createTestConfig(): AppConfig {
  return {
    llm: {
      provider: "anthropic",
      apiKey: "test-key",
      triageModel: "test-triage-model",
      synthesisModel: "test-synthesis-model",
      maxRetries: 0,
    },
    relevanceTopics: ["AI orchestration", "fragrance design"],
    gmail: {
      query: "category:updates is:unread",
      briefingLabel: "Newsletter Briefing",
      credentialsPath: "./credentials.json",
      tokenPath: "./token.json",
      oauthPort: 8080,
    },
    pipeline: {
      initialLookbackDays: 7,
      tokenBudget: 4000,
      triageScoreThreshold: 0.5,
      triageBatchSize: 20,
      maxPerSender: 3,
      maxSynthesisItems: 25,
    },
    databasePath: ":memory:",
  };
}

export function createTestEmail(overrides?: Partial<RawEmail>): RawEmail {
  return {
    id: "msg-1",
    subject: "Weekly Roundup",
    sender: "The Weekly <news@weekly.example.com>",
    date: "Mon, 12 Jan 2026 07:00:00 +0000",
    snippet: "This week in agents and orchestration",
    bodyHtml: "",
    bodyText: "Plain body text",
    ...overrides,
  };
}

export function createTestTriageResult(
  overrides?: Partial<TriageResult>,
): TriageResult {
  return {
    email: createTestEmail(),
    category: "general_info",
    relevanceScore: 0.6,
    topics: [],
    reason: "Editorial content",
    ...overrides,
  };
}

export function createTestItem(overrides?: Partial<ExtractedItem>): ExtractedItem {
  return {
    sourceName: "The Weekly",
    topics: ["AI orchestration"],
    category: "high_relevance",
    relevanceScore: 0.9,
    summaryText: "Agents are coordinating better.",
    linkUrl: null,
    fullContent: "Agents are coordinating better.",
    emailId: "msg-1",
    emailSubject: "Weekly Roundup",
    ...overrides,
  };
}
