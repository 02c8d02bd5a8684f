// pattern: Imperative Shell
import { generateText, Output } from "ai";
import type { LanguageModel } from "ai";
import type { Logger } from "pino";
import type { AppConfig } from "../config";
import { SYNTHESIS_SYSTEM, synthesisUserPrompt } from "../pipeline/prompts";
import type { ExtractedItem } from "../pipeline/types";
import { briefingOutputSchema } from "./briefing-schema";
import type { Briefing, BriefingSource, QuickHit } from "./types";

const MAX_CONTENT_CHARS = 1500;
const FALLBACK_SUMMARY_CHARS = 200;
const SYNTHESIS_MAX_TOKENS = 4096;

export const EMPTY_BRIEFING_TITLE = "No Updates Today";
export const FALLBACK_BRIEFING_TITLE = "Newsletter Briefing (Fallback)";

export function gmailMessageLink(messageId: string): string {
  return `https://mail.google.com/mail/u/0/#inbox/${messageId}`;
}

/**
 * High-relevance items first (stable within each group), capped.
 */
export function prioritizeItems(
  items: ReadonlyArray<ExtractedItem>,
  maxItems: number,
): Array<ExtractedItem> {
  const rank = (item: ExtractedItem): number =>
    item.category === "high_relevance" ? 0 : item.category === "general_info" ? 1 : 2;
  return [...items].sort((a, b) => rank(a) - rank(b)).slice(0, maxItems);
}

/**
 * One entry per distinct email, linking back to the message in Gmail.
 */
export function buildSources(items: ReadonlyArray<ExtractedItem>): Array<BriefingSource> {
  const seen = new Set<string>();
  const sources: Array<BriefingSource> = [];
  for (const item of items) {
    if (!item.emailId || seen.has(item.emailId)) continue;
    seen.add(item.emailId);
    sources.push({
      subject: item.emailSubject || item.sourceName,
      url: gmailMessageLink(item.emailId),
      sourceName: item.sourceName,
    });
  }
  return sources;
}

export function emptyBriefing(): Briefing {
  return {
    title: EMPTY_BRIEFING_TITLE,
    intro:
      "No new newsletter content was found since the last briefing. Check back next time!",
    sections: [],
    quickHits: [],
    sources: [],
    fallback: false,
  };
}

export function fallbackBriefing(items: ReadonlyArray<ExtractedItem>): Briefing {
  const quickHits: Array<QuickHit> = items.map((item) => ({
    source: item.sourceName,
    text: item.summaryText.slice(0, FALLBACK_SUMMARY_CHARS),
    url: item.linkUrl,
  }));
  return {
    title: FALLBACK_BRIEFING_TITLE,
    intro: null,
    sections: [],
    quickHits,
    sources: buildSources(items),
    fallback: true,
  };
}

function truncateContent(text: string): string {
  return text.length > MAX_CONTENT_CHARS
    ? `${text.slice(0, MAX_CONTENT_CHARS)}...`
    : text;
}

export function buildSynthesisPrompt(items: ReadonlyArray<ExtractedItem>): string {
  return synthesisUserPrompt(
    items.map((item) => ({
      source: item.sourceName,
      topics: item.topics.length > 0 ? item.topics.join(", ") : "General",
      category: item.category,
      content: truncateContent(item.summaryText),
      link: item.linkUrl ?? "N/A",
    })),
  );
}

/**
 * Writes the topic-grouped brief with the synthesis model. If the call fails
 * the brief degrades to one quick hit per item.
 */
export async function synthesizeBriefing(
  items: ReadonlyArray<ExtractedItem>,
  model: LanguageModel,
  config: AppConfig,
  logger: Logger,
): Promise<Briefing> {
  if (items.length === 0) {
    logger.info("no items to synthesize");
    return emptyBriefing();
  }

  const prioritized = prioritizeItems(items, config.pipeline.maxSynthesisItems);
  if (prioritized.length < items.length) {
    logger.info(
      { from: items.length, to: prioritized.length },
      "capping synthesis input",
    );
  }

  try {
    const { experimental_output } = await generateText({
      model,
      maxRetries: config.llm.maxRetries,
      maxOutputTokens: SYNTHESIS_MAX_TOKENS,
      system: SYNTHESIS_SYSTEM,
      prompt: buildSynthesisPrompt(prioritized),
      experimental_output: Output.object({ schema: briefingOutputSchema }),
    });

    logger.info(
      {
        sections: experimental_output.sections.length,
        quickHits: experimental_output.quickHits.length,
      },
      "briefing synthesized",
    );

    return {
      title: experimental_output.title,
      intro: experimental_output.intro,
      sections: experimental_output.sections,
      quickHits: experimental_output.quickHits,
      sources: buildSources(prioritized),
      fallback: false,
    };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.error({ error: message }, "synthesis failed, using fallback list");
    return fallbackBriefing(prioritized);
  }
}
