import { eq } from "drizzle-orm";
import type { Logger } from "pino";
import { processedMessages } from "../db/schema";
import type { AppDatabase } from "../db";
import type { RawEmail } from "./types";

export function isProcessed(db: AppDatabase, messageId: string): boolean {
  const existing = db
    .select({ messageId: processedMessages.messageId })
    .from(processedMessages)
    .where(eq(processedMessages.messageId, messageId))
    .get();

  return existing !== undefined;
}

/**
 * Drops emails whose message ID was recorded by an earlier run.
 * Order of the remaining emails is preserved.
 */
export function filterUnprocessed(
  db: AppDatabase,
  emails: ReadonlyArray<RawEmail>,
  logger: Logger,
): ReadonlyArray<RawEmail> {
  const unprocessed = emails.filter((email) => !isProcessed(db, email.id));

  logger.info(
    {
      newCount: unprocessed.length,
      skippedCount: emails.length - unprocessed.length,
    },
    "dedup complete",
  );
  return unprocessed;
}

/**
 * Records message IDs as processed. IDs already present keep their original
 * timestamp.
 */
export function markProcessed(
  db: AppDatabase,
  messageIds: ReadonlyArray<string>,
  now: Date = new Date(),
): void {
  if (messageIds.length === 0) return;

  db.insert(processedMessages)
    .values(messageIds.map((messageId) => ({ messageId, processedAt: now })))
    .onConflictDoNothing()
    .run();
}
