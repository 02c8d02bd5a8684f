// pattern: Imperative Shell
import { generateText } from "ai";
import type { LanguageModel } from "ai";
import type { Logger } from "pino";
import type { AppConfig } from "../config";
import { countTokens, defaultTokenizer, splitIntoChunks } from "./chunker";
import type { Tokenizer } from "./chunker";
import { fetchLinkContent } from "./fetcher";
import { htmlToPlainText, sourceName } from "./html";
import { findBestLink } from "./links";
import { CHUNK_SUMMARY_SYSTEM, chunkSummaryUserPrompt } from "./prompts";
import type { ExtractedItem, TriageResult } from "./types";

export const LINKED_ARTICLE_SEPARATOR = "\n\n--- Linked Article ---\n\n";

const CHUNK_SUMMARY_MAX_TOKENS = 512;
const CHUNK_FALLBACK_CHARS = 500;

export type ExtractorDeps = {
  readonly fetchLink: (url: string, logger: Logger) => Promise<string>;
  readonly tokenizer: Tokenizer;
};

/**
 * Summarizes each token window independently with the triage model and joins
 * the summaries. A window whose call fails contributes its opening text.
 */
export async function summarizeChunks(
  text: string,
  model: LanguageModel,
  config: AppConfig,
  logger: Logger,
  tokenizer: Tokenizer = defaultTokenizer(),
): Promise<string> {
  const chunks = splitIntoChunks(text, config.pipeline.tokenBudget, tokenizer);
  logger.debug({ chunks: chunks.length }, "summarizing oversized content");

  const summaries: Array<string> = [];
  for (const [index, chunk] of chunks.entries()) {
    try {
      const { text: summary } = await generateText({
        model,
        maxRetries: config.llm.maxRetries,
        maxOutputTokens: CHUNK_SUMMARY_MAX_TOKENS,
        system: CHUNK_SUMMARY_SYSTEM,
        prompt: chunkSummaryUserPrompt(chunk),
      });
      summaries.push(summary.trim());
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.warn(
        { chunk: index, error: message },
        "chunk summary failed, using truncated text",
      );
      summaries.push(`${chunk.slice(0, CHUNK_FALLBACK_CHARS)}...`);
    }
  }

  return summaries.join("\n\n");
}

async function extractSingle(
  result: TriageResult,
  model: LanguageModel,
  config: AppConfig,
  logger: Logger,
  deps: ExtractorDeps,
): Promise<ExtractedItem> {
  const { email } = result;
  const body = email.bodyHtml ? htmlToPlainText(email.bodyHtml) : email.bodyText;

  let linkUrl: string | null = null;
  let linkContent = "";
  if (result.category === "high_relevance") {
    linkUrl = findBestLink(email.bodyHtml);
    if (linkUrl) {
      linkContent = await deps.fetchLink(linkUrl, logger);
    }
  }

  const combined = linkContent
    ? `${body}${LINKED_ARTICLE_SEPARATOR}${linkContent}`
    : body;

  const tokens = countTokens(combined, deps.tokenizer);
  const summaryText =
    tokens > config.pipeline.tokenBudget
      ? await summarizeChunks(combined, model, config, logger, deps.tokenizer)
      : combined;

  logger.debug(
    { emailId: email.id, tokens, linkUrl, chunked: tokens > config.pipeline.tokenBudget },
    "item extracted",
  );

  return {
    sourceName: sourceName(email.sender),
    topics: result.topics,
    category: result.category,
    relevanceScore: result.relevanceScore,
    summaryText,
    linkUrl,
    fullContent: combined,
    emailId: email.id,
    emailSubject: email.subject,
  };
}

/**
 * Turns kept triage results into summarized items, in order. High-relevance
 * items also pull in their best outbound link. An item that fails entirely
 * falls back to its email snippet.
 */
export async function extractItems(
  results: ReadonlyArray<TriageResult>,
  model: LanguageModel,
  config: AppConfig,
  logger: Logger,
  deps: Partial<ExtractorDeps> = {},
): Promise<Array<ExtractedItem>> {
  const resolved: ExtractorDeps = {
    fetchLink: deps.fetchLink ?? fetchLinkContent,
    tokenizer: deps.tokenizer ?? defaultTokenizer(),
  };
  const items: Array<ExtractedItem> = [];

  for (const result of results) {
    try {
      items.push(await extractSingle(result, model, config, logger, resolved));
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.error(
        { emailId: result.email.id, subject: result.email.subject, error: message },
        "extraction failed, using snippet",
      );
      items.push({
        sourceName: sourceName(result.email.sender),
        topics: result.topics,
        category: result.category,
        relevanceScore: result.relevanceScore,
        summaryText: result.email.snippet,
        linkUrl: null,
        fullContent: "",
        emailId: result.email.id,
        emailSubject: result.email.subject,
      });
    }
  }

  logger.info({ count: items.length }, "extraction complete");
  return items;
}
