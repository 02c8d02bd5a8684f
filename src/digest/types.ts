export type BriefingLink = {
  readonly label: string;
  readonly url: string;
};

export type BriefingSection = {
  readonly heading: string;
  readonly paragraphs: ReadonlyArray<string>;
  readonly links: ReadonlyArray<BriefingLink>;
};

export type QuickHit = {
  readonly source: string;
  readonly text: string;
  readonly url: string | null;
};

export type BriefingSource = {
  readonly subject: string;
  readonly url: string;
  readonly sourceName: string;
};

export type Briefing = {
  readonly title: string;
  readonly intro: string | null;
  readonly sections: ReadonlyArray<BriefingSection>;
  readonly quickHits: ReadonlyArray<QuickHit>;
  readonly sources: ReadonlyArray<BriefingSource>;
  readonly fallback: boolean;
};
