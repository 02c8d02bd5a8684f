// pattern: Functional Core
import { getEncoding } from "js-tiktoken";
import type { Tiktoken } from "js-tiktoken";

export type Tokenizer = {
  readonly encode: (text: string) => Array<number>;
  readonly decode: (tokens: Array<number>) => string;
};

const OVERLAP_STRIDE = 0.75;

let encoding: Tiktoken | null = null;

/**
 * The cl100k_base tokenizer, loaded once on first use.
 */
export function defaultTokenizer(): Tokenizer {
  encoding ??= getEncoding("cl100k_base");
  const enc = encoding;
  return {
    encode: (text) => enc.encode(text),
    decode: (tokens) => enc.decode(tokens),
  };
}

export function countTokens(
  text: string,
  tokenizer: Tokenizer = defaultTokenizer(),
): number {
  return tokenizer.encode(text).length;
}

/**
 * Splits text into windows of `chunkSize` tokens that overlap by a quarter
 * (stride is floor(0.75 * chunkSize)). The last window is the first one that
 * reaches the end of the text.
 */
export function splitIntoChunks(
  text: string,
  chunkSize: number,
  tokenizer: Tokenizer = defaultTokenizer(),
): Array<string> {
  const tokens = tokenizer.encode(text);
  const stride = Math.max(1, Math.floor(chunkSize * OVERLAP_STRIDE));
  const chunks: Array<string> = [];

  for (let pos = 0; pos < tokens.length; pos += stride) {
    chunks.push(tokenizer.decode(tokens.slice(pos, pos + chunkSize)));
    if (pos + chunkSize >= tokens.length) break;
  }

  return chunks;
}
