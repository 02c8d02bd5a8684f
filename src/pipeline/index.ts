export { filterUnprocessed, isProcessed, markProcessed } from "./dedup";
export { lastRunTime, recordRun } from "./runs";
export { triageEmails } from "./triage";
export { extractItems, summarizeChunks } from "./extractor";
export type { ExtractorDeps } from "./extractor";
export { fetchLinkContent } from "./fetcher";
export { countTokens, splitIntoChunks } from "./chunker";
export type { Tokenizer } from "./chunker";
export { formatEmailDump, formatTriageDump } from "./dump";
export type {
  RawEmail,
  TriageCategory,
  TriageResult,
  TriageOutcome,
  ExtractedItem,
} from "./types";
