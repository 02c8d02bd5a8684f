import { integer, sqliteTable, text } from "drizzle-orm/sqlite-core";

export const processedMessages = sqliteTable("processed_messages", {
  messageId: text("message_id").primaryKey(),
  processedAt: integer("processed_at", { mode: "timestamp" }).notNull(),
});

export const runs = sqliteTable("runs", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  ranAt: integer("ran_at", { mode: "timestamp" }).notNull(),
  messagesProcessed: integer("messages_processed").notNull(),
  briefingSent: integer("briefing_sent", { mode: "boolean" })
    .notNull()
    .default(false),
});
