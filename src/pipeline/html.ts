// pattern: Functional Core
import { convert } from "html-to-text";
import type { HtmlToTextOptions } from "html-to-text";

const INVISIBLE_UNICODE =
  /[\u200b-\u200f\u00ad\u2060-\u2064\ufeff\u034f\u061c\u115f\u1160\u17b4\u17b5\uffa0]/g;

const NO_BREAK_SPACE = /\u00a0/g;

const HEADINGS = ["h1", "h2", "h3", "h4", "h5", "h6"];

const CONVERT_OPTIONS: HtmlToTextOptions = {
  wordwrap: false,
  selectors: [
    { selector: "a", options: { ignoreHref: true } },
    { selector: "img", format: "skip" },
    { selector: "head", format: "skip" },
    { selector: "script", format: "skip" },
    { selector: "style", format: "skip" },
    { selector: "meta", format: "skip" },
    { selector: "link", format: "skip" },
    ...HEADINGS.map((selector) => ({ selector, options: { uppercase: false } })),
  ],
};

/**
 * Removes zero-width and other invisible characters that newsletter
 * templates use for spacing and tracking. Non-breaking spaces become spaces.
 */
export function stripInvisibleUnicode(text: string): string {
  return text.replace(INVISIBLE_UNICODE, "").replace(NO_BREAK_SPACE, " ");
}

export function collapseBlankLines(text: string): string {
  return text.replace(/\n{3,}/g, "\n\n");
}

/**
 * Converts an HTML email or page to plain text: one block per line, images
 * and link targets dropped, invisible characters removed, runs of blank
 * lines collapsed.
 */
export function htmlToPlainText(html: string): string {
  const text = convert(html, CONVERT_OPTIONS);
  return collapseBlankLines(stripInvisibleUnicode(text)).trim();
}

/**
 * Display name from a From header, e.g. `"The Batch" <news@x.com>` becomes
 * `The Batch`. Falls back to the part before `@`.
 */
export function sourceName(sender: string): string {
  const match = /^"?([^"<]+)"?\s*</.exec(sender);
  const name = match?.[1]?.trim();
  if (name) return name;
  return sender.split("@")[0] ?? sender;
}
