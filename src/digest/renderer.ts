// pattern: Functional Core
import type { Briefing, BriefingSection } from "./types";

const PRODUCT_NAME = "Newsletter Briefing";

const MONTHS = [
  "January",
  "February",
  "March",
  "April",
  "May",
  "June",
  "July",
  "August",
  "September",
  "October",
  "November",
  "December",
];

const WEEKDAYS = [
  "Sunday",
  "Monday",
  "Tuesday",
  "Wednesday",
  "Thursday",
  "Friday",
  "Saturday",
];

const EVENING_START_HOUR_UTC = 14;

const FONT = "-apple-system,BlinkMacSystemFont,'Segoe UI',Roboto,Helvetica,Arial,sans-serif";
const TEXT_STYLE = `font-family:${FONT}; font-size:16px; line-height:1.7; color:#2d3436;`;
const P_STYLE = `margin:0 0 16px 0; ${TEXT_STYLE}`;
const H2_STYLE = `margin:28px 0 12px 0; padding-bottom:8px; border-bottom:2px solid #e8e8e8; font-family:${FONT}; font-size:20px; font-weight:700; color:#1a1a2e; line-height:1.3;`;
const UL_STYLE = `margin:0 0 16px 0; padding-left:20px; ${TEXT_STYLE}`;
const LI_STYLE = "margin:0 0 8px 0; padding-left:4px;";
const A_STYLE = "color:#0f3460; text-decoration:underline;";

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

/** e.g. `January 05, 2026` (UTC). */
export function formatShortDate(date: Date): string {
  const day = String(date.getUTCDate()).padStart(2, "0");
  return `${MONTHS[date.getUTCMonth()] ?? ""} ${day}, ${date.getUTCFullYear()}`;
}

/** e.g. `Monday, January 05, 2026` (UTC). */
export function formatLongDate(date: Date): string {
  return `${WEEKDAYS[date.getUTCDay()] ?? ""}, ${formatShortDate(date)}`;
}

export function buildSubject(now: Date = new Date()): string {
  const period = now.getUTCHours() < EVENING_START_HOUR_UTC ? "Morning" : "Evening";
  return `${PRODUCT_NAME} — ${period}, ${formatShortDate(now)}`;
}

function link(url: string, label: string): string {
  return `<a href="${escapeHtml(url)}" style="${A_STYLE}">${escapeHtml(label)}</a>`;
}

function list(items: ReadonlyArray<string>): string {
  return `<ul style="${UL_STYLE}">${items
    .map((item) => `<li style="${LI_STYLE}">${item}</li>`)
    .join("")}</ul>`;
}

function renderSectionHtml(section: BriefingSection): string {
  const paragraphs = section.paragraphs
    .map((paragraph) => `<p style="${P_STYLE}">${escapeHtml(paragraph)}</p>`)
    .join("\n");
  const links =
    section.links.length > 0
      ? list(section.links.map((l) => link(l.url, l.label)))
      : "";
  return `<h2 style="${H2_STYLE}">${escapeHtml(section.heading)}</h2>\n${paragraphs}\n${links}`;
}

function renderBodyHtml(briefing: Briefing): string {
  const parts: Array<string> = [
    `<h1 style="margin:0 0 16px 0; font-family:${FONT}; font-size:24px; font-weight:700; color:#1a1a2e; line-height:1.3;">${escapeHtml(briefing.title)}</h1>`,
  ];

  if (briefing.intro) {
    parts.push(`<p style="${P_STYLE}">${escapeHtml(briefing.intro)}</p>`);
  }

  for (const section of briefing.sections) {
    parts.push(renderSectionHtml(section));
  }

  if (briefing.quickHits.length > 0) {
    parts.push(`<h2 style="${H2_STYLE}">Quick Hits</h2>`);
    parts.push(
      list(
        briefing.quickHits.map((hit) => {
          const more = hit.url ? ` — ${link(hit.url, "link")}` : "";
          return `<strong style="color:#1a1a2e;">${escapeHtml(hit.source)}</strong>: ${escapeHtml(hit.text)}${more}`;
        }),
      ),
    );
  }

  if (briefing.sources.length > 0) {
    parts.push(`<h2 style="${H2_STYLE}">Sources</h2>`);
    parts.push(
      list(
        briefing.sources.map(
          (source) =>
            `${link(source.url, source.subject)} — <em>${escapeHtml(source.sourceName)}</em>`,
        ),
      ),
    );
  }

  return parts.join("\n");
}

/**
 * Renders the brief as a complete HTML email: inline styles, table layout.
 */
export function renderBriefingHtml(briefing: Briefing, now: Date = new Date()): string {
  return `<!DOCTYPE html>
<html>
<head>
<meta charset="utf-8">
<meta name="viewport" content="width=device-width, initial-scale=1.0">
<title>${PRODUCT_NAME}</title>
</head>
<body style="margin:0; padding:0; background-color:#f4f4f7;">
<table role="presentation" width="100%" cellpadding="0" cellspacing="0" border="0" style="background-color:#f4f4f7;">
<tr><td align="center" style="padding:24px 16px;">
<table role="presentation" width="600" cellpadding="0" cellspacing="0" border="0" style="max-width:600px; width:100%; background-color:#ffffff; border-radius:8px;">
<tr>
<td style="background-color:#1a1a2e; padding:32px 40px 28px 40px; text-align:left;">
<p style="margin:0 0 4px 0; font-family:Arial,Helvetica,sans-serif; font-size:11px; letter-spacing:2px; text-transform:uppercase; color:#7ec8e3; font-weight:600;">${PRODUCT_NAME}</p>
<p style="margin:0; font-family:Arial,Helvetica,sans-serif; font-size:13px; color:#a8b2d1;">${formatLongDate(now)}</p>
</td>
</tr>
<tr>
<td style="padding:32px 40px 16px 40px; ${TEXT_STYLE}">
${renderBodyHtml(briefing)}
</td>
</tr>
<tr>
<td style="padding:20px 40px 28px 40px; border-top:1px solid #e8e8e8; text-align:center;">
<p style="margin:0; font-family:Arial,Helvetica,sans-serif; font-size:12px; color:#999999; line-height:1.5;">Curated automatically from your newsletters</p>
</td>
</tr>
</table>
</td></tr>
</table>
</body>
</html>`;
}

function underline(heading: string, char: string): string {
  return `${heading}\n${char.repeat(heading.length)}`;
}

/**
 * Plain-text alternative: underlined headings and `- ` bullets.
 */
export function renderBriefingText(briefing: Briefing): string {
  const blocks: Array<string> = [underline(briefing.title, "=")];

  if (briefing.intro) blocks.push(briefing.intro);

  for (const section of briefing.sections) {
    blocks.push(underline(section.heading, "-"));
    blocks.push(...section.paragraphs);
    if (section.links.length > 0) {
      blocks.push(section.links.map((l) => `- ${l.label}: ${l.url}`).join("\n"));
    }
  }

  if (briefing.quickHits.length > 0) {
    blocks.push(underline("Quick Hits", "-"));
    blocks.push(
      briefing.quickHits
        .map((hit) => `- ${hit.source}: ${hit.text}${hit.url ? ` (${hit.url})` : ""}`)
        .join("\n"),
    );
  }

  if (briefing.sources.length > 0) {
    blocks.push(underline("Sources", "-"));
    blocks.push(
      briefing.sources
        .map((s) => `- ${s.subject} (${s.sourceName}): ${s.url}`)
        .join("\n"),
    );
  }

  return `${blocks.join("\n\n")}\n`;
}

/**
 * Markdown rendering, written by `run --output`.
 */
export function renderBriefingMarkdown(briefing: Briefing): string {
  const blocks: Array<string> = [`# ${briefing.title}`];

  if (briefing.intro) blocks.push(briefing.intro);

  for (const section of briefing.sections) {
    blocks.push(`## ${section.heading}`);
    blocks.push(...section.paragraphs);
    if (section.links.length > 0) {
      blocks.push(section.links.map((l) => `- [${l.label}](${l.url})`).join("\n"));
    }
  }

  if (briefing.quickHits.length > 0) {
    blocks.push("## Quick Hits");
    blocks.push(
      briefing.quickHits
        .map((hit) => `- **${hit.source}**: ${hit.text}${hit.url ? ` — [link](${hit.url})` : ""}`)
        .join("\n"),
    );
  }

  if (briefing.sources.length > 0) {
    blocks.push("## Sources");
    blocks.push(
      briefing.sources
        .map((s) => `- [${s.subject}](${s.url}) — *${s.sourceName}*`)
        .join("\n"),
    );
  }

  return `${blocks.join("\n\n")}\n`;
}
