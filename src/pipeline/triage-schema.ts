import { z } from "zod";

export const triageCategories = ["high_relevance", "general_info", "discard"] as const;

export const triageOutputSchema = z.object({
  classifications: z
    .array(
      z.object({
        index: z.number().int().describe("1-based number of the email in the input"),
        category: z.enum(triageCategories),
        relevanceScore: z
          .number()
          .min(0)
          .max(1)
          .describe("Relevance from 0.0 (discard) to 1.0"),
        topics: z
          .array(z.string())
          .describe("Matching high-priority topics. Empty array if none.")
          .default([]),
        reason: z.string().describe("One-sentence explanation").default(""),
      }),
    )
    .describe("One classification per input email"),
});

export type TriageOutput = z.infer<typeof triageOutputSchema>;
