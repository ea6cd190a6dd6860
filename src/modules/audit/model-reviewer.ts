import { z } from "zod";
import type { JsonCompletionFn } from "../../clients/openai.js";
import { AUDIT_REVIEWER_SYSTEM_PROMPT, buildAuditReviewerUserPrompt } from "../../prompts/index.js";
import type { AnswerReviewer, ModelReviewInput, ModelReviewVerdict } from "./types.js";

export class AnswerReviewerError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "AnswerReviewerError";
  }
}

const reviewerResponseSchema = z.object({
  alignment: z.number().min(0).max(1),
  tone: z.enum(["educational", "advice"]),
  rationale: z.string().trim().min(1).max(400)
});

export interface ModelAnswerReviewerOptions {
  completeJson: JsonCompletionFn;
  model: string;
  timeoutMs?: number;
}

/** Asks the model whether a draft answers the question and stays educational. */
export class ModelAnswerReviewer implements AnswerReviewer {
  constructor(private readonly options: ModelAnswerReviewerOptions) {}

  async review(input: ModelReviewInput): Promise<ModelReviewVerdict> {
    const content = await this.options.completeJson({
      model: this.options.model,
      system: AUDIT_REVIEWER_SYSTEM_PROMPT,
      user: buildAuditReviewerUserPrompt(input),
      signal: input.signal,
      timeoutMs: this.options.timeoutMs
    });

    let parsedJson: unknown;
    try {
      parsedJson = JSON.parse(content);
    } catch (error) {
      const message = error instanceof Error ? error.message : "invalid json";
      throw new AnswerReviewerError(`Answer reviewer returned invalid JSON: ${message}`);
    }

    const parsed = reviewerResponseSchema.safeParse(parsedJson);
    if (!parsed.success) {
      throw new AnswerReviewerError("Answer reviewer JSON schema validation failed.");
    }
    return parsed.data;
  }
}
