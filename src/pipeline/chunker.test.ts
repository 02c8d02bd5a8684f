import { describe, it, expect } from "vitest";
import { countTokens, splitIntoChunks } from "./chunker";
import type { Tokenizer } from "./chunker";

// One token per character keeps window boundaries easy to read.
const charTokenizer: Tokenizer = {
  encode: (text) => Array.from(text, (c) => c.charCodeAt(0)),
  decode: (tokens) => String.fromCharCode(...tokens),
};

describe("countTokens", () => {
  it("should count cl100k_base tokens by default", () => {
    expect(countTokens("hello world")).toBe(2);
  });

  it("should use the given tokenizer", () => {
    expect(countTokens("abcde", charTokenizer)).toBe(5);
  });
});

describe("splitIntoChunks", () => {
  it("should overlap windows by a quarter and stop at the end", () => {
    expect(splitIntoChunks("abcdefghij", 4, charTokenizer)).toEqual([
      "abcd",
      "defg",
      "ghij",
    ]);
  });

  it("should emit a short final window when the stride leaves a tail", () => {
    expect(splitIntoChunks("abcdefghijk", 4, charTokenizer)).toEqual([
      "abcd",
      "defg",
      "ghij",
      "jk",
    ]);
  });

  it("should return one chunk when the text fits", () => {
    expect(splitIntoChunks("abcd", 4, charTokenizer)).toEqual(["abcd"]);
  });

  it("should return no chunks for empty text", () => {
    expect(splitIntoChunks("", 4, charTokenizer)).toEqual([]);
  });

  it("should round the stride down", () => {
    // chunkSize 10 gives a stride of 7
    expect(splitIntoChunks("abcdefghijklmn", 10, charTokenizer)).toEqual([
      "abcdefghij",
      "hijklmn",
    ]);
  });
});
