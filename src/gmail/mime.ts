// pattern: Functional Core
import { randomUUID } from "node:crypto";

export type OutgoingMessage = {
  readonly to: string;
  readonly subject: string;
  readonly html: string;
  readonly text: string;
};

const CRLF = "\r\n";
const ENCODED_WORD_MAX_BYTES = 45;
const BASE64_LINE_LENGTH = 76;

// Printable ASCII only; anything else needs an RFC 2047 encoded word.
const PLAIN_HEADER = /^[\x20-\x7e]*$/;

/**
 * Encodes a header value as one or more UTF-8 "B" encoded words, each short
 * enough to stay under the 75-character limit. Pure ASCII passes through.
 */
export function encodeHeaderValue(value: string): string {
  if (PLAIN_HEADER.test(value)) return value;

  const words: Array<string> = [];
  let current = "";
  for (const char of value) {
    if (Buffer.byteLength(current + char, "utf-8") > ENCODED_WORD_MAX_BYTES) {
      words.push(current);
      current = "";
    }
    current += char;
  }
  if (current) words.push(current);

  return words
    .map((word) => `=?UTF-8?B?${Buffer.from(word, "utf-8").toString("base64")}?=`)
    .join(`${CRLF} `);
}

function base64Body(content: string): string {
  const encoded = Buffer.from(content, "utf-8").toString("base64");
  const lines: Array<string> = [];
  for (let i = 0; i < encoded.length; i += BASE64_LINE_LENGTH) {
    lines.push(encoded.slice(i, i + BASE64_LINE_LENGTH));
  }
  return lines.join(CRLF);
}

/**
 * Builds a multipart/alternative RFC 822 message with a plain-text and an
 * HTML part.
 */
export function buildMimeMessage(
  message: OutgoingMessage,
  boundary: string = `briefing-${randomUUID()}`,
): string {
  const part = (contentType: string, content: string): string =>
    [
      `--${boundary}`,
      `Content-Type: ${contentType}; charset="UTF-8"`,
      "Content-Transfer-Encoding: base64",
      "",
      base64Body(content),
    ].join(CRLF);

  return [
    `To: ${message.to}`,
    `Subject: ${encodeHeaderValue(message.subject)}`,
    "MIME-Version: 1.0",
    `Content-Type: multipart/alternative; boundary="${boundary}"`,
    "",
    part("text/plain", message.text),
    part("text/html", message.html),
    `--${boundary}--`,
    "",
  ].join(CRLF);
}

/**
 * The `raw` field Gmail's messages.send expects: the whole message,
 * base64url-encoded.
 */
export function encodeRawMessage(mime: string): string {
  return Buffer.from(mime, "utf-8").toString("base64url");
}
