// pattern: Functional Core
import type { RawEmail, TriageOutcome, TriageResult } from "./types";

const RULE = "=".repeat(60);
const SNIPPET_CHARS = 120;

/**
 * Numbered listing of fetched emails, written by `run --dump-emails`.
 */
export function formatEmailDump(
  emails: ReadonlyArray<RawEmail>,
  query: string,
): string {
  const lines = [`Fetched ${emails.length} emails (query: ${query})\n`];
  emails.forEach((email, i) => {
    lines.push(`${i + 1}. ${email.subject}`);
    lines.push(`   From: ${email.sender}`);
    lines.push(`   Date: ${email.date}`);
    lines.push(`   Snippet: ${email.snippet.slice(0, SNIPPET_CHARS)}`);
    lines.push("");
  });
  return lines.join("\n");
}

function resultLines(result: TriageResult, withTopics: boolean): Array<string> {
  const lines = [
    `  [${result.category}] score=${result.relevanceScore.toFixed(2)}  ${result.email.subject}`,
    `    From: ${result.email.sender}`,
  ];
  if (withTopics) {
    lines.push(`    Topics: ${result.topics.join(", ") || "(none)"}`);
  }
  lines.push(`    Reason: ${result.reason}`, "");
  return lines;
}

/**
 * Kept and discarded triage results, each by descending score, written by
 * `run --dump-triage`.
 */
export function formatTriageDump(outcome: TriageOutcome): string {
  const kept = new Set(outcome.kept);
  const byScore = [...outcome.all].sort((a, b) => b.relevanceScore - a.relevanceScore);

  const lines = [
    `Triage results: ${outcome.kept.length} kept / ${outcome.all.length} total\n`,
    RULE,
    "KEPT",
    RULE,
  ];
  for (const result of byScore.filter((r) => kept.has(r))) {
    lines.push(...resultLines(result, true));
  }

  lines.push(RULE, "DISCARDED", RULE);
  for (const result of byScore.filter((r) => !kept.has(r))) {
    lines.push(...resultLines(result, false));
  }

  return lines.join("\n");
}
