import { z } from "zod";

export const DRAFT_BOUNDS = {
  summaryMaxChars: 600,
  stepsMin: 3,
  stepsMax: 5,
  citationsMin: 1,
  citationsMax: 5,
  quizMax: 3,
  glossaryMax: 8
} as const;

export type DraftBounds = typeof DRAFT_BOUNDS;

/**
 * Shape of the model reply. Only types are checked here; size bounds belong
 * to the auditor so that violations become feedback instead of a fallback.
 */
export const modelDraftSchema = z.object({
  summary: z.string(),
  steps: z.array(z.string()),
  citations: z.array(
    z.object({
      label: z.string(),
      url: z.string().default(""),
      chunk_ids: z.array(z.number().int())
    })
  ),
  quiz: z
    .array(
      z.object({
        question: z.string(),
        answer: z.string(),
        reference: z.string().nullable().optional()
      })
    )
    .default([]),
  glossary: z
    .array(
      z.object({
        term: z.string(),
        definition: z.string()
      })
    )
    .default([])
});

export type ModelDraft = z.infer<typeof modelDraftSchema>;
