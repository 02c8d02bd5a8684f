// pattern: Imperative Shell
import { writeFileSync } from "node:fs";
import { format, parse } from "node:path";
import type { Logger } from "pino";
import type { AppConfig } from "./config";
import type { AppDatabase } from "./db";
import {
  buildSubject,
  createGmailSender,
  renderBriefingHtml,
  renderBriefingMarkdown,
  renderBriefingText,
  synthesizeBriefing,
} from "./digest";
import type { SendDigestFn } from "./digest";
import type { Mailbox } from "./gmail";
import type { LlmModels } from "./llm/client";
import {
  extractItems,
  filterUnprocessed,
  formatEmailDump,
  formatTriageDump,
  lastRunTime,
  markProcessed,
  recordRun,
  triageEmails,
} from "./pipeline";
import type { ExtractorDeps } from "./pipeline";

const DAY_MS = 24 * 60 * 60 * 1000;
const RULE = "=".repeat(60);

export type RunOptions = {
  readonly dryRun: boolean;
  readonly lookbackDays: number | null;
  readonly outputPath: string | null;
  readonly dumpEmailsPath: string | null;
  readonly dumpTriagePath: string | null;
};

export type RunDeps = {
  readonly db: AppDatabase;
  readonly config: AppConfig;
  readonly mailbox: Mailbox;
  readonly models: LlmModels;
  readonly logger: Logger;
  readonly sendDigest?: SendDigestFn;
  readonly print?: (line: string) => void;
  readonly now?: () => Date;
  readonly extractorDeps?: Partial<ExtractorDeps>;
};

export type RunSummary = {
  readonly fetched: number;
  readonly processed: number;
  readonly kept: number;
  readonly briefingSent: boolean;
};

/**
 * Start of the search window: an explicit lookback wins, then the last
 * recorded run, then the configured initial lookback.
 */
export function resolveWindowStart(
  db: AppDatabase,
  config: AppConfig,
  lookbackDays: number | null,
  now: Date,
  logger: Logger,
): Date {
  if (lookbackDays !== null) {
    const since = new Date(now.getTime() - lookbackDays * DAY_MS);
    logger.info({ lookbackDays, since: since.toISOString() }, "lookback override");
    return since;
  }

  const lastRun = lastRunTime(db);
  if (lastRun) {
    logger.info({ since: lastRun.toISOString() }, "fetching since last run");
    return lastRun;
  }

  const { initialLookbackDays } = config.pipeline;
  const since = new Date(now.getTime() - initialLookbackDays * DAY_MS);
  logger.info(
    { lookbackDays: initialLookbackDays, since: since.toISOString() },
    "first run, using initial lookback",
  );
  return since;
}

export function buildSearchQuery(baseQuery: string, since: Date): string {
  return `${baseQuery} after:${Math.floor(since.getTime() / 1000)}`;
}

/**
 * `brief.md` becomes `brief.html`, in the same directory.
 */
export function htmlPathFor(outputPath: string): string {
  const parsed = parse(outputPath);
  return format({ dir: parsed.dir, name: parsed.name, ext: ".html" });
}

/**
 * One scheduled run: fetch, dedup, triage, extract, synthesize, deliver.
 * A dry run never sends, never touches the mailbox state and never writes
 * to the database. Failures outside the degrading stages propagate, leaving
 * messages unprocessed for the next run.
 */
export async function runBriefing(
  deps: RunDeps,
  options: RunOptions,
): Promise<RunSummary> {
  const { db, config, mailbox, models, logger } = deps;
  const now = (deps.now ?? (() => new Date()))();
  const print = deps.print ?? ((line: string) => process.stdout.write(`${line}\n`));
  const sendDigest = deps.sendDigest ?? createGmailSender(mailbox);
  const dryRun = options.dryRun || options.outputPath !== null;

  const since = resolveWindowStart(db, config, options.lookbackDays, now, logger);
  const query = buildSearchQuery(config.gmail.query, since);
  const emails = await mailbox.searchMessages(query);

  if (options.dumpEmailsPath && emails.length > 0) {
    writeFileSync(options.dumpEmailsPath, formatEmailDump(emails, query), "utf-8");
    logger.info({ path: options.dumpEmailsPath }, "email list written");
  }

  const finish = (processed: number, kept: number, briefingSent: boolean): RunSummary => {
    if (!dryRun) recordRun(db, processed, briefingSent, logger, now);
    return { fetched: emails.length, processed, kept, briefingSent };
  };

  if (emails.length === 0) {
    logger.info("no new emails, nothing to do");
    return finish(0, 0, false);
  }

  const unprocessed = filterUnprocessed(db, emails, logger);
  if (unprocessed.length === 0) {
    logger.info("all fetched emails already processed, nothing to do");
    return finish(0, 0, false);
  }

  const outcome = await triageEmails(unprocessed, models.triage, config, logger);
  if (options.dumpTriagePath) {
    writeFileSync(options.dumpTriagePath, formatTriageDump(outcome), "utf-8");
    logger.info({ path: options.dumpTriagePath }, "triage results written");
  }

  const keptIds = outcome.kept.map((r) => r.email.id);
  const keptSet = new Set(keptIds);
  const discardedIds = unprocessed.map((e) => e.id).filter((id) => !keptSet.has(id));
  const unprocessedIds = unprocessed.map((e) => e.id);

  if (outcome.kept.length === 0) {
    logger.info("every email was discarded by triage, no briefing needed");
    if (!dryRun) {
      await mailbox.markAsRead(discardedIds);
      markProcessed(db, unprocessedIds, now);
    }
    return finish(unprocessed.length, 0, false);
  }

  const items = await extractItems(
    outcome.kept,
    models.triage,
    config,
    logger,
    deps.extractorDeps,
  );
  const briefing = await synthesizeBriefing(items, models.synthesis, config, logger);
  const subject = buildSubject(now);
  const html = renderBriefingHtml(briefing, now);
  const text = renderBriefingText(briefing);

  if (dryRun) {
    if (options.outputPath) {
      const htmlPath = htmlPathFor(options.outputPath);
      writeFileSync(options.outputPath, renderBriefingMarkdown(briefing), "utf-8");
      writeFileSync(htmlPath, html, "utf-8");
      logger.info({ path: options.outputPath, htmlPath }, "briefing written");
    } else {
      print(RULE);
      print(`SUBJECT: ${subject}`);
      print(RULE);
      print(text);
      print(RULE);
    }
    print("(Dry run: email not sent, state not updated)");
    return finish(unprocessed.length, outcome.kept.length, false);
  }

  const recipient = config.gmail.recipientEmail ?? (await mailbox.getProfileEmail());
  const result = await sendDigest({ recipient, subject, html, text }, logger);
  if (!result.success) {
    throw new Error(`briefing send failed: ${result.error}`);
  }

  await mailbox.markAsRead(discardedIds);
  const labelId = await mailbox.ensureLabel(config.gmail.briefingLabel);
  await mailbox.addLabel(keptIds, labelId);

  markProcessed(db, unprocessedIds, now);
  logger.info(
    { processed: unprocessed.length, kept: keptIds.length },
    "run complete, briefing sent",
  );
  return finish(unprocessed.length, keptIds.length, true);
}
