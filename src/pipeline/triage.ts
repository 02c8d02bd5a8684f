// pattern: Imperative Shell
import { generateText, Output } from "ai";
import type { LanguageModel } from "ai";
import type { Logger } from "pino";
import type { AppConfig } from "../config";
import { triageSystemPrompt, triageUserPrompt } from "./prompts";
import { triageOutputSchema } from "./triage-schema";
import type { TriageOutput } from "./triage-schema";
import type { RawEmail, TriageOutcome, TriageResult } from "./types";

const PREVIEW_LENGTH = 600;

export function emailPreview(email: RawEmail): string {
  const preview = email.snippet || email.bodyText.slice(0, PREVIEW_LENGTH);
  return preview.slice(0, PREVIEW_LENGTH);
}

/**
 * Canonical sender key: the address inside angle brackets when present,
 * otherwise the whole header, lowercased.
 * `Newsletter <News@Example.com>` becomes `news@example.com`.
 */
export function normalizeSender(sender: string): string {
  const match = /<([^>]+)>/.exec(sender);
  return (match?.[1] ?? sender).trim().toLowerCase();
}

/**
 * Pairs each email with its classification by 1-based index. Emails the
 * model left out are discarded.
 */
export function matchClassifications(
  batch: ReadonlyArray<RawEmail>,
  output: TriageOutput,
): Array<TriageResult> {
  const byIndex = new Map(output.classifications.map((c) => [c.index, c]));

  return batch.map((email, i): TriageResult => {
    const classification = byIndex.get(i + 1);
    if (!classification) {
      return {
        email,
        category: "discard",
        relevanceScore: 0,
        topics: [],
        reason: "Missing from model output; defaulting to discard",
      };
    }
    return {
      email,
      category: classification.category,
      relevanceScore: classification.relevanceScore,
      topics: classification.topics,
      reason: classification.reason,
    };
  });
}

/**
 * Keeps at most `maxPerSender` results per sender, preferring higher scores.
 * Survivors stay in their original order.
 */
export function capPerSender(
  results: ReadonlyArray<TriageResult>,
  maxPerSender: number,
  logger: Logger,
): Array<TriageResult> {
  const bySender = new Map<string, Array<TriageResult>>();
  for (const result of results) {
    const key = normalizeSender(result.email.sender);
    const group = bySender.get(key) ?? [];
    group.push(result);
    bySender.set(key, group);
  }

  const survivors = new Set<TriageResult>();
  for (const [sender, group] of bySender) {
    if (group.length > maxPerSender) {
      logger.debug(
        { sender, count: group.length, kept: maxPerSender },
        "sender over cap, keeping top scores",
      );
    }
    const top = [...group]
      .sort((a, b) => b.relevanceScore - a.relevanceScore)
      .slice(0, maxPerSender);
    for (const result of top) survivors.add(result);
  }

  return results.filter((result) => survivors.has(result));
}

async function triageBatch(
  batch: ReadonlyArray<RawEmail>,
  model: LanguageModel,
  config: AppConfig,
  logger: Logger,
): Promise<Array<TriageResult>> {
  try {
    const { experimental_output } = await generateText({
      model,
      maxRetries: config.llm.maxRetries,
      system: triageSystemPrompt(config.relevanceTopics),
      prompt: triageUserPrompt(
        batch.map((email, i) => ({
          index: i + 1,
          subject: email.subject,
          sender: email.sender,
          preview: emailPreview(email),
        })),
      ),
      experimental_output: Output.object({ schema: triageOutputSchema }),
    });

    const results = matchClassifications(batch, experimental_output);
    for (const result of results) {
      logger.debug(
        {
          category: result.category,
          score: result.relevanceScore,
          subject: result.email.subject.slice(0, 60),
          reason: result.reason.slice(0, 80),
        },
        "email classified",
      );
    }
    return results;
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.error(
      { batchSize: batch.length, error: message },
      "triage call failed, defaulting batch to general_info",
    );
    return batch.map((email): TriageResult => ({
      email,
      category: "general_info",
      relevanceScore: 0.5,
      topics: [],
      reason: "Triage failed; defaulting to general_info",
    }));
  }
}

/**
 * Classifies emails in batches with the triage model, then keeps the
 * non-discarded results at or above the score threshold, capped per sender.
 */
export async function triageEmails(
  emails: ReadonlyArray<RawEmail>,
  model: LanguageModel,
  config: AppConfig,
  logger: Logger,
): Promise<TriageOutcome> {
  if (emails.length === 0) {
    return { all: [], kept: [] };
  }

  const { triageBatchSize, triageScoreThreshold, maxPerSender } = config.pipeline;
  const all: Array<TriageResult> = [];

  for (let start = 0; start < emails.length; start += triageBatchSize) {
    const batch = emails.slice(start, start + triageBatchSize);
    all.push(...(await triageBatch(batch, model, config, logger)));
  }

  const aboveThreshold = all.filter(
    (r) => r.category !== "discard" && r.relevanceScore >= triageScoreThreshold,
  );
  const kept = capPerSender(aboveThreshold, maxPerSender, logger);

  logger.info(
    {
      total: emails.length,
      kept: kept.length,
      highRelevance: kept.filter((r) => r.category === "high_relevance").length,
      generalInfo: kept.filter((r) => r.category === "general_info").length,
      discarded: all.length - kept.length,
    },
    "triage complete",
  );

  return { all, kept };
}
