import { describe, it, expect } from "vitest";
import pino from "pino";
import {
  createTestDatabase,
  createTestEmail,
  seedProcessedMessage,
} from "../test-utils/db";
import { processedMessages } from "../db/schema";
import { filterUnprocessed, isProcessed, markProcessed } from "./dedup";

const logger = pino({ level: "silent" });

describe("isProcessed", () => {
  it("should return false for an unknown message", () => {
    const db = createTestDatabase();
    expect(isProcessed(db, "msg-unknown")).toBe(false);
  });

  it("should return true once the message is recorded", () => {
    const db = createTestDatabase();
    seedProcessedMessage(db, "msg-1");
    expect(isProcessed(db, "msg-1")).toBe(true);
  });
});

describe("filterUnprocessed", () => {
  it("should drop already-processed emails and keep input order", () => {
    const db = createTestDatabase();
    seedProcessedMessage(db, "msg-2");

    const emails = [
      createTestEmail({ id: "msg-3" }),
      createTestEmail({ id: "msg-2" }),
      createTestEmail({ id: "msg-1" }),
    ];

    const result = filterUnprocessed(db, emails, logger);

    expect(result.map((e) => e.id)).toEqual(["msg-3", "msg-1"]);
  });

  it("should return an empty list when every email was processed", () => {
    const db = createTestDatabase();
    seedProcessedMessage(db, "msg-1");

    const result = filterUnprocessed(db, [createTestEmail({ id: "msg-1" })], logger);

    expect(result).toEqual([]);
  });
});

describe("markProcessed", () => {
  it("should insert one row per message ID", () => {
    const db = createTestDatabase();
    const now = new Date("2026-03-01T07:00:00Z");

    markProcessed(db, ["msg-1", "msg-2"], now);

    const rows = db.select().from(processedMessages).all();
    expect(rows.map((r) => r.messageId).sort()).toEqual(["msg-1", "msg-2"]);
    expect(rows[0]!.processedAt).toEqual(now);
  });

  it("should keep the original timestamp when a message is marked twice", () => {
    const db = createTestDatabase();
    const first = new Date("2026-03-01T07:00:00Z");
    const second = new Date("2026-03-01T19:00:00Z");

    markProcessed(db, ["msg-1"], first);
    markProcessed(db, ["msg-1", "msg-2"], second);

    const rows = db.select().from(processedMessages).all();
    expect(rows).toHaveLength(2);
    const original = rows.find((r) => r.messageId === "msg-1");
    expect(original?.processedAt).toEqual(first);
  });

  it("should do nothing for an empty list", () => {
    const db = createTestDatabase();
    markProcessed(db, []);
    expect(db.select().from(processedMessages).all()).toEqual([]);
  });
});
