// pattern: Functional Core

export function triageSystemPrompt(topics: ReadonlyArray<string>): string {
  return `You are an email triage assistant. Your job is to separate substantive newsletters from transactional or operational emails.

The user's HIGH-PRIORITY topics are:
${topics.join(", ")}

The user also has broad intellectual interests including technology, startups, business strategy, science, engineering, and thoughtful analysis on any topic. Any newsletter with real editorial content is worth keeping.

For each email, return one classification with:
- "index": the email's number from the input
- "category": one of "high_relevance", "general_info", or "discard"
- "relevanceScore": a number from 0.0 to 1.0
- "topics": the matching high-priority topics
- "reason": a one-sentence explanation

ALWAYS DISCARD (category "discard", score 0.0) these types:
- Order confirmations, receipts, invoices, billing statements
- Shipping or delivery notifications, tracking updates
- Social media alerts, Reddit digests, LinkedIn notifications
- Marketing promotions, flash sales, discount codes, coupon offers
- Automated notifications (Jira, GitHub bots, CI/CD, Dependabot)
- Appointment, lease, rent or property management notices
- Utility alerts, power outage notices
- Password resets, 2FA codes, login alerts, email verification
- Terms of service changes, app update announcements
- Food delivery order confirmations or promos
- Job listing alerts
- Health service billing or scheduling
- Service incident or status pages (e.g. "Feature Down", outage reports)
- Pure sports news, scores or game recaps, unless specifically about business strategy, technology or analytics in sports
- Q&A aggregator digests (Quora Digest and similar), which are not editorial newsletters
- Event invitations or RSVP requests with no editorial content
- Citizen science project announcements or crowdsourcing requests
- Product pricing or feature announcements from SaaS companies, unless they include substantive strategic analysis
- Any purely transactional or operational email with NO editorial content

Classify as "high_relevance" (score >= 0.7):
- Newsletter editions with analysis, commentary, or reporting on the high-priority topics
- Technical deep-dives, research, or industry reports on those topics
- Curated roundups or digests that cover those topics, even if mixed with other content

Classify as "general_info" (score 0.5-0.69):
- Newsletters with substantive editorial content on tech, startups, business, science, engineering, venture capital, or thoughtful cultural analysis
- Curated link roundups from known newsletter platforms (Substack, Beehiiv and similar) that contain real commentary or curation

IMPORTANT: Curated weekly digests and link roundups from editorial newsletters ARE substantive content. Do NOT discard them as promotional. If the sender is a known newsletter and the subject or preview suggests editorial content, KEEP it.

Return exactly one classification per email.`;
}

export type TriagePromptEmail = {
  readonly index: number;
  readonly subject: string;
  readonly sender: string;
  readonly preview: string;
};

export function triageUserPrompt(emails: ReadonlyArray<TriagePromptEmail>): string {
  const blocks = emails.map(
    (email) =>
      `--- Email ${email.index} ---\nSubject: ${email.subject}\nFrom: ${email.sender}\nPreview: ${email.preview}\n---`,
  );
  return `Classify the following ${emails.length} email(s):\n\n${blocks.join("\n")}`;
}

export const CHUNK_SUMMARY_SYSTEM =
  "You are a concise summarizer. You will receive a chunk of newsletter or article content. Produce a brief, factual summary (3-5 sentences) capturing the key points. Preserve any specific names, numbers, dates, or URLs mentioned.";

export function chunkSummaryUserPrompt(chunk: string): string {
  return `Summarize this content chunk:\n\n${chunk}`;
}

export const SYNTHESIS_SYSTEM = `You are a newsletter briefing writer. You receive extracted content from multiple newsletters and produce a single, cohesive briefing.

Rules:
1. Do NOT produce individual per-email summaries. Write a batch summary grouped into topic sections (e.g. "AI Trends", "Design Updates", "DeFi & Markets").
2. Reference the specific newsletter names naturally within the prose (e.g. "According to The Batch...").
3. If a link was followed, add the original URL to the section's links.
4. Keep the tone professional but conversational, like a smart analyst's morning brief.
5. Each section has a short heading and one or more paragraphs of plain prose.
6. Put remaining general-info items that don't warrant a full paragraph in "quickHits", one sentence each.`;

export type SynthesisPromptItem = {
  readonly source: string;
  readonly topics: string;
  readonly category: string;
  readonly content: string;
  readonly link: string;
};

export function synthesisUserPrompt(items: ReadonlyArray<SynthesisPromptItem>): string {
  const blocks = items.map(
    (item) =>
      `--- Item ---\nSource: ${item.source}\nTopics: ${item.topics}\nCategory: ${item.category}\nContent:\n${item.content}\nLink: ${item.link}\n---`,
  );
  return `Here are today's extracted newsletter items. Synthesize them into a cohesive briefing.\n\n${blocks.join("\n\n")}`;
}
