import { z } from "zod";

export const briefingOutputSchema = z.object({
  title: z.string().describe("Short headline for the whole briefing"),
  intro: z
    .string()
    .nullable()
    .describe("One or two sentences framing the day's themes, or null"),
  sections: z
    .array(
      z.object({
        heading: z.string().describe("Topic name, e.g. \"AI Trends\""),
        paragraphs: z
          .array(z.string())
          .describe("Plain-prose paragraphs that cite newsletters by name"),
        links: z
          .array(
            z.object({
              label: z.string(),
              url: z.string().describe("Original URL of a followed link"),
            }),
          )
          .describe("Reference links for this section. Empty array if none.")
          .default([]),
      }),
    )
    .describe("Topic-grouped batch summary"),
  quickHits: z
    .array(
      z.object({
        source: z.string().describe("Newsletter name"),
        text: z.string().describe("One-sentence takeaway"),
        url: z.string().nullable().describe("Followed link, or null"),
      }),
    )
    .describe("Remaining general-info items. Empty array if none.")
    .default([]),
});

export type BriefingOutput = z.infer<typeof briefingOutputSchema>;
