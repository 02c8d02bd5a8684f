import { desc } from "drizzle-orm";
import type { Logger } from "pino";
import { runs } from "../db/schema";
import type { AppDatabase } from "../db";

/**
 * Timestamp of the most recently recorded run, or null before the first one.
 */
export function lastRunTime(db: AppDatabase): Date | null {
  const last = db
    .select({ ranAt: runs.ranAt })
    .from(runs)
    .orderBy(desc(runs.id))
    .limit(1)
    .get();

  return last?.ranAt ?? null;
}

export function recordRun(
  db: AppDatabase,
  messagesProcessed: number,
  briefingSent: boolean,
  logger: Logger,
  now: Date = new Date(),
): void {
  db.insert(runs)
    .values({ ranAt: now, messagesProcessed, briefingSent })
    .run();

  logger.info({ messagesProcessed, briefingSent }, "run recorded");
}
