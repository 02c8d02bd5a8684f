// pattern: Functional Core
import * as cheerio from "cheerio";

const SKIP_PATTERN =
  /(unsubscribe|manage.preferences|mailto:|twitter\.com|facebook\.com|instagram\.com|linkedin\.com\/share|youtube\.com|t\.co\/|bit\.ly|list-manage\.com|mailchimp\.com|campaign-archive|view.in.browser|privacy.policy|terms.of.service|\.png|\.jpg|\.gif|\.svg)/i;

// Click-tracking and mailing infrastructure hosts.
const SKIP_DOMAINS = [
  "email.mg",
  "clicks.mlsend",
  "click.convertkit-mail",
  "trk.klclick",
  "t.dripemail2",
  "links.beehiiv",
];

const ARTICLE_DOMAINS = ["medium.com", "substack.com", "arxiv.org", "github.com"];

const BASE_SCORE = 0.5;
const ANCHOR_TEXT_BONUS = 0.3;
const PATH_DEPTH_BONUS = 0.2;
const ARTICLE_DOMAIN_BONUS = 0.1;

/**
 * Scores a link by how likely it is to point at the article a newsletter is
 * about. Zero means skip.
 */
export function scoreLink(url: string, anchorText: string): number {
  if (SKIP_PATTERN.test(url)) return 0;

  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return 0;
  }

  const host = parsed.host.toLowerCase();
  if (SKIP_DOMAINS.some((domain) => host.includes(domain))) return 0;

  let score = BASE_SCORE;
  if (anchorText.length > 10) score += ANCHOR_TEXT_BONUS;

  const segments = parsed.pathname.split("/").filter((part) => part.length > 0);
  if (segments.length >= 2) score += PATH_DEPTH_BONUS;

  if (ARTICLE_DOMAINS.some((domain) => host.includes(domain))) {
    score += ARTICLE_DOMAIN_BONUS;
  }

  return score;
}

/**
 * Picks the highest-scoring absolute http(s) link in the HTML. The first link
 * wins a tie. Returns null when no link qualifies.
 */
export function findBestLink(html: string): string | null {
  if (!html) return null;

  const $ = cheerio.load(html);
  let bestUrl: string | null = null;
  let bestScore = 0;

  for (const el of $("a[href]").toArray()) {
    const href = ($(el).attr("href") ?? "").trim();
    if (!href.startsWith("http://") && !href.startsWith("https://")) continue;

    const score = scoreLink(href, $(el).text().trim());
    if (score > bestScore) {
      bestUrl = href;
      bestScore = score;
    }
  }

  return bestUrl;
}
