import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import pino from "pino";
import type { LanguageModel } from "ai";
import { buildSearchQuery, htmlPathFor, runBriefing } from "./run";
import type { RunDeps, RunOptions } from "./run";
import { processedMessages, runs } from "./db/schema";
import type { AppDatabase } from "./db";
import type { Tokenizer } from "./pipeline/chunker";
import {
  createTestConfig,
  createTestDatabase,
  createTestEmail,
  seedProcessedMessage,
  seedRun,
} from "./test-utils/db";
import { createFakeMailbox } from "./test-utils/mailbox";
import type { FakeMailbox } from "./test-utils/mailbox";

vi.mock("ai", () => ({
  generateText: vi.fn(),
  Output: {
    object: vi.fn((params: unknown) => params),
  },
}));

import { generateText } from "ai";

const logger = pino({ level: "silent" });
const NOW = new Date("2026-01-12T07:00:00Z");

const charTokenizer: Tokenizer = {
  encode: (text) => Array.from(text, (c) => c.charCodeAt(0)),
  decode: (tokens) => String.fromCharCode(...tokens),
};

const NEWSLETTER = createTestEmail();
const PROMO = createTestEmail({
  id: "msg-2",
  subject: "Flash Sale",
  sender: "Shop <deals@shop.example.com>",
  snippet: "50% off everything",
});

const DRY_RUN: RunOptions = {
  dryRun: true,
  lookbackDays: null,
  outputPath: null,
  dumpEmailsPath: null,
  dumpTriagePath: null,
};

const LIVE: RunOptions = { ...DRY_RUN, dryRun: false };

function mockTriageKeepsFirst(): void {
  vi.mocked(generateText).mockResolvedValueOnce({
    experimental_output: {
      classifications: [
        {
          index: 1,
          category: "high_relevance",
          relevanceScore: 0.9,
          topics: ["AI orchestration"],
          reason: "Agent news",
        },
        { index: 2, category: "discard", relevanceScore: 0.1, topics: [], reason: "Promo" },
      ],
    },
  } as never);
}

function mockTriageDiscardsAll(): void {
  vi.mocked(generateText).mockResolvedValueOnce({
    experimental_output: {
      classifications: [
        { index: 1, category: "discard", relevanceScore: 0.2, topics: [], reason: "Ad" },
        { index: 2, category: "discard", relevanceScore: 0.1, topics: [], reason: "Promo" },
      ],
    },
  } as never);
}

function mockSynthesis(): void {
  vi.mocked(generateText).mockResolvedValueOnce({
    experimental_output: {
      title: "Agents Everywhere",
      intro: null,
      sections: [{ heading: "AI Trends", paragraphs: ["Agents coordinate."], links: [] }],
      quickHits: [],
    },
  } as never);
}

describe("buildSearchQuery", () => {
  it("should append the window start in epoch seconds", () => {
    expect(buildSearchQuery("label:news", new Date("2026-01-01T00:00:00.900Z"))).toBe(
      "label:news after:1767225600",
    );
  });
});

describe("htmlPathFor", () => {
  it("should swap the extension and keep the directory", () => {
    expect(htmlPathFor("/tmp/out/brief.md")).toBe("/tmp/out/brief.html");
  });

  it("should add an extension when there is none", () => {
    expect(htmlPathFor("brief")).toBe("brief.html");
  });
});

describe("runBriefing", () => {
  let db: AppDatabase;
  let mailbox: FakeMailbox;
  let printed: Array<string>;

  function deps(overrides?: Partial<RunDeps>): RunDeps {
    return {
      db,
      config: createTestConfig(),
      mailbox,
      models: { triage: {} as LanguageModel, synthesis: {} as LanguageModel },
      logger,
      print: (line) => printed.push(line),
      now: () => NOW,
      extractorDeps: { tokenizer: charTokenizer, fetchLink: vi.fn() },
      ...overrides,
    };
  }

  beforeEach(() => {
    vi.clearAllMocks();
    db = createTestDatabase();
    mailbox = createFakeMailbox([NEWSLETTER, PROMO]);
    printed = [];
  });

  it("should search from the initial lookback on the first run", async () => {
    mailbox = createFakeMailbox([]);

    await runBriefing(deps(), LIVE);

    const since = Math.floor(new Date("2026-01-05T07:00:00Z").getTime() / 1000);
    expect(mailbox.searchMessages).toHaveBeenCalledWith(
      `category:updates is:unread after:${since}`,
    );
  });

  it("should search from the last recorded run", async () => {
    mailbox = createFakeMailbox([]);
    seedRun(db, { ranAt: new Date("2026-01-11T19:00:00Z") });

    await runBriefing(deps(), LIVE);

    const since = Math.floor(new Date("2026-01-11T19:00:00Z").getTime() / 1000);
    expect(mailbox.searchMessages).toHaveBeenCalledWith(
      `category:updates is:unread after:${since}`,
    );
  });

  it("should let an explicit lookback override the last run", async () => {
    mailbox = createFakeMailbox([]);
    seedRun(db, { ranAt: new Date("2026-01-11T19:00:00Z") });

    await runBriefing(deps(), { ...LIVE, lookbackDays: 2 });

    const since = Math.floor(new Date("2026-01-10T07:00:00Z").getTime() / 1000);
    expect(mailbox.searchMessages).toHaveBeenCalledWith(
      `category:updates is:unread after:${since}`,
    );
  });

  it("should record an empty run when nothing was fetched", async () => {
    mailbox = createFakeMailbox([]);

    const summary = await runBriefing(deps(), LIVE);

    expect(summary).toEqual({ fetched: 0, processed: 0, kept: 0, briefingSent: false });
    const rows = db.select().from(runs).all();
    expect(rows).toHaveLength(1);
    expect(rows[0]?.messagesProcessed).toBe(0);
    expect(generateText).not.toHaveBeenCalled();
  });

  it("should skip triage when every email was already processed", async () => {
    seedProcessedMessage(db, "msg-1");
    seedProcessedMessage(db, "msg-2");

    const summary = await runBriefing(deps(), LIVE);

    expect(summary.processed).toBe(0);
    expect(generateText).not.toHaveBeenCalled();
    expect(db.select().from(runs).all()).toHaveLength(1);
  });

  it("should send the briefing, then mark, label and record", async () => {
    mockTriageKeepsFirst();
    mockSynthesis();

    const summary = await runBriefing(deps(), LIVE);

    expect(summary).toEqual({ fetched: 2, processed: 2, kept: 1, briefingSent: true });
    expect(mailbox.sendMessage).toHaveBeenCalledTimes(1);
    expect(mailbox.sendMessage.mock.calls[0]?.[0]).toMatchObject({
      to: "me@example.com",
      subject: "Newsletter Briefing — Morning, January 12, 2026",
    });
    expect(mailbox.markAsRead).toHaveBeenCalledWith(["msg-2"]);
    expect(mailbox.ensureLabel).toHaveBeenCalledWith("Newsletter Briefing");
    expect(mailbox.addLabel).toHaveBeenCalledWith(["msg-1"], "Label_1");

    const processed = db
      .select({ id: processedMessages.messageId })
      .from(processedMessages)
      .all()
      .map((row) => row.id)
      .sort();
    expect(processed).toEqual(["msg-1", "msg-2"]);

    const rows = db.select().from(runs).all();
    expect(rows).toHaveLength(1);
    expect(rows[0]?.messagesProcessed).toBe(2);
    expect(rows[0]?.briefingSent).toBe(true);
  });

  it("should send to the configured recipient when set", async () => {
    mockTriageKeepsFirst();
    mockSynthesis();
    const config = createTestConfig();

    await runBriefing(
      deps({
        config: { ...config, gmail: { ...config.gmail, recipientEmail: "digest@example.com" } },
      }),
      LIVE,
    );

    expect(mailbox.getProfileEmail).not.toHaveBeenCalled();
    expect(mailbox.sendMessage.mock.calls[0]?.[0]).toMatchObject({
      to: "digest@example.com",
    });
  });

  it("should throw without touching state when the send fails", async () => {
    mockTriageKeepsFirst();
    mockSynthesis();
    const sendDigest = vi.fn().mockResolvedValue({ success: false, error: "quota" });

    await expect(runBriefing(deps({ sendDigest }), LIVE)).rejects.toThrow(
      "briefing send failed: quota",
    );

    expect(mailbox.markAsRead).not.toHaveBeenCalled();
    expect(mailbox.addLabel).not.toHaveBeenCalled();
    expect(db.select().from(processedMessages).all()).toEqual([]);
    expect(db.select().from(runs).all()).toEqual([]);
  });

  it("should mark discarded emails read when nothing is kept", async () => {
    mockTriageDiscardsAll();

    const summary = await runBriefing(deps(), LIVE);

    expect(summary).toEqual({ fetched: 2, processed: 2, kept: 0, briefingSent: false });
    expect(mailbox.markAsRead).toHaveBeenCalledWith(["msg-1", "msg-2"]);
    expect(mailbox.sendMessage).not.toHaveBeenCalled();
    expect(db.select().from(processedMessages).all()).toHaveLength(2);
    expect(db.select().from(runs).all()[0]?.briefingSent).toBe(false);
  });

  it("should print the briefing on a dry run and leave all state alone", async () => {
    mockTriageKeepsFirst();
    mockSynthesis();

    await runBriefing(deps(), DRY_RUN);

    const rule = "=".repeat(60);
    expect(printed[0]).toBe(rule);
    expect(printed[1]).toBe("SUBJECT: Newsletter Briefing — Morning, January 12, 2026");
    expect(printed[3]?.startsWith("Agents Everywhere\n=================")).toBe(true);
    expect(printed[5]).toBe("(Dry run: email not sent, state not updated)");
    expect(mailbox.sendMessage).not.toHaveBeenCalled();
    expect(mailbox.markAsRead).not.toHaveBeenCalled();
    expect(mailbox.ensureLabel).not.toHaveBeenCalled();
    expect(db.select().from(processedMessages).all()).toEqual([]);
    expect(db.select().from(runs).all()).toEqual([]);
  });

  it("should not record anything on a dry run that finds all emails discarded", async () => {
    mockTriageDiscardsAll();

    await runBriefing(deps(), DRY_RUN);

    expect(mailbox.markAsRead).not.toHaveBeenCalled();
    expect(db.select().from(processedMessages).all()).toEqual([]);
    expect(db.select().from(runs).all()).toEqual([]);
  });

  describe("file output", () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), "newsletter-digest-run-"));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it("should write Markdown and HTML instead of sending", async () => {
      mockTriageKeepsFirst();
      mockSynthesis();
      const outputPath = join(dir, "brief.md");

      await runBriefing(deps(), { ...LIVE, outputPath });

      const markdown = readFileSync(outputPath, "utf-8");
      expect(markdown.startsWith("# Agents Everywhere\n\n## AI Trends\n")).toBe(true);
      const html = readFileSync(join(dir, "brief.html"), "utf-8");
      expect(html.startsWith("<!DOCTYPE html>")).toBe(true);
      expect(printed).toEqual(["(Dry run: email not sent, state not updated)"]);
      expect(mailbox.sendMessage).not.toHaveBeenCalled();
      expect(db.select().from(runs).all()).toEqual([]);
    });

    it("should dump the fetched emails and the triage results", async () => {
      mockTriageKeepsFirst();
      mockSynthesis();
      const dumpEmailsPath = join(dir, "emails.txt");
      const dumpTriagePath = join(dir, "triage.txt");

      await runBriefing(deps(), { ...DRY_RUN, dumpEmailsPath, dumpTriagePath });

      const emails = readFileSync(dumpEmailsPath, "utf-8");
      expect(emails.split("\n")[0]).toMatch(/^Fetched 2 emails \(query: category:updates is:unread after:\d+\)$/);
      expect(emails).toContain("2. Flash Sale");
      const triage = readFileSync(dumpTriagePath, "utf-8");
      expect(triage).toContain("[high_relevance] score=0.90  Weekly Roundup");
    });
  });
});
