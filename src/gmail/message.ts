// pattern: Functional Core
import type { gmail_v1 } from "googleapis";
import type { RawEmail } from "../pipeline/types";

type MessagePart = gmail_v1.Schema$MessagePart;

function decodeBase64Url(data: string): string {
  return Buffer.from(data, "base64url").toString("utf-8");
}

/**
 * Walks the MIME tree depth-first and collects every text/html and text/plain
 * body, each joined with newlines.
 */
export function extractBodies(payload: MessagePart): {
  readonly bodyHtml: string;
  readonly bodyText: string;
} {
  const htmlParts: Array<string> = [];
  const textParts: Array<string> = [];

  const walk = (part: MessagePart): void => {
    const data = part.body?.data;
    if (data) {
      if (part.mimeType === "text/html") htmlParts.push(decodeBase64Url(data));
      else if (part.mimeType === "text/plain") textParts.push(decodeBase64Url(data));
    }
    for (const sub of part.parts ?? []) {
      walk(sub);
    }
  };

  walk(payload);
  return { bodyHtml: htmlParts.join("\n"), bodyText: textParts.join("\n") };
}

/**
 * Converts a `format: "full"` Gmail message into a RawEmail.
 * Returns null when the payload has no headers.
 */
export function parseMessage(
  messageId: string,
  message: gmail_v1.Schema$Message,
): RawEmail | null {
  const payload = message.payload;
  if (!payload?.headers) return null;

  const headers = new Map<string, string>();
  for (const header of payload.headers) {
    if (header.name && header.value !== null && header.value !== undefined) {
      headers.set(header.name.toLowerCase(), header.value);
    }
  }

  const { bodyHtml, bodyText } = extractBodies(payload);

  return {
    id: messageId,
    subject: headers.get("subject") ?? "(no subject)",
    sender: headers.get("from") ?? "unknown",
    date: headers.get("date") ?? "",
    snippet: message.snippet ?? "",
    bodyHtml,
    bodyText,
  };
}
