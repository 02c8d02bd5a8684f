// pattern: Imperative Shell
import * as cheerio from "cheerio";
import type { Logger } from "pino";
import { htmlToPlainText } from "./html";

export const LINK_FETCH_TIMEOUT_MS = 15000;
const MAX_ARTICLE_CHARS = 8000;
const NON_CONTENT_SELECTORS = "script, style, nav, footer, header, aside, iframe";

type FetchResult =
  | { success: true; html: string; url: string }
  | { success: false; error: string; url: string };

/**
 * Fetches article HTML from a single URL with timeout support.
 * Responses that are not HTML are reported as failures.
 */
export async function fetchArticle(
  url: string,
  timeoutMs: number,
  logger: Logger,
): Promise<FetchResult> {
  try {
    const response = await fetch(url, {
      signal: AbortSignal.timeout(timeoutMs),
      redirect: "follow",
      headers: {
        "User-Agent": "NewsletterDigest/1.0 (linked article fetcher)",
        Accept: "text/html,application/xhtml+xml",
      },
    });

    if (!response.ok) {
      return {
        success: false,
        error: `HTTP ${response.status}: ${response.statusText}`,
        url,
      };
    }

    const contentType = response.headers.get("content-type") ?? "";
    if (!contentType.includes("html")) {
      return {
        success: false,
        error: `unsupported content type: ${contentType || "none"}`,
        url,
      };
    }

    const html = await response.text();
    return { success: true, html, url };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.warn({ url, error: message }, "article fetch failed");
    return { success: false, error: message, url };
  }
}

/**
 * Main text of an article page: the first `article`, else `main`, else
 * `body`, with navigation and other page chrome removed.
 */
export function extractArticleText(html: string): string {
  const $ = cheerio.load(html);
  $(NON_CONTENT_SELECTORS).remove();

  const root = [$("article"), $("main"), $("body")].find((el) => el.length > 0);
  if (!root) return "";

  return htmlToPlainText($.html(root.first())).slice(0, MAX_ARTICLE_CHARS);
}

/**
 * Fetches a linked article and returns its text, or "" when the page cannot
 * be fetched or is not HTML.
 */
export async function fetchLinkContent(url: string, logger: Logger): Promise<string> {
  const result = await fetchArticle(url, LINK_FETCH_TIMEOUT_MS, logger);
  if (!result.success) {
    logger.debug({ url, error: result.error }, "linked article skipped");
    return "";
  }

  const text = extractArticleText(result.html);
  logger.debug({ url, chars: text.length }, "linked article fetched");
  return text;
}
