export type RawEmail = {
  readonly id: string;
  readonly subject: string;
  readonly sender: string;
  readonly date: string;
  readonly snippet: string;
  readonly bodyHtml: string;
  readonly bodyText: string;
};

export type TriageCategory = "high_relevance" | "general_info" | "discard";

export type TriageResult = {
  readonly email: RawEmail;
  readonly category: TriageCategory;
  readonly relevanceScore: number;
  readonly topics: ReadonlyArray<string>;
  readonly reason: string;
};

export type TriageOutcome = {
  readonly all: ReadonlyArray<TriageResult>;
  readonly kept: ReadonlyArray<TriageResult>;
};

export type ExtractedItem = {
  readonly sourceName: string;
  readonly topics: ReadonlyArray<string>;
  readonly category: TriageCategory;
  readonly relevanceScore: number;
  readonly summaryText: string;
  readonly linkUrl: string | null;
  readonly fullContent: string;
  readonly emailId: string;
  readonly emailSubject: string;
};
