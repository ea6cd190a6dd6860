import type { JsonCompletionFn } from "../../clients/openai.js";
import { NoEvidenceError } from "../../errors.js";
import { logInfo, logWarn } from "../../observability/logger.js";
import { recordModelLatency } from "../../observability/metrics.js";
import { DRAFTER_SYSTEM_PROMPT, buildDrafterUserPrompt } from "../../prompts/index.js";
import { withTimeout } from "../../utils/timeout.js";
import { modelDraftSchema, type ModelDraft } from "./draft-schema.js";
import { buildTemplateDraft } from "./template-drafter.js";
import type { Draft, DraftInput, DraftResult, Drafter } from "./types.js";

export class DraftGenerationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DraftGenerationError";
  }
}

export interface ModelDrafterDependencies {
  completeJson: JsonCompletionFn;
  model: string;
  timeoutMs: number;
  now?: () => number;
  logInfo?: typeof logInfo;
  logWarn?: typeof logWarn;
  recordModelLatency?: typeof recordModelLatency;
}

const toDraft = (reply: ModelDraft): Draft => ({
  summary: reply.summary,
  steps: reply.steps,
  citations: reply.citations.map((citation) => ({
    label: citation.label,
    url: citation.url,
    chunkIds: citation.chunk_ids
  })),
  quiz: reply.quiz.map((item) => ({
    question: item.question,
    answer: item.answer,
    reference: item.reference ?? null
  })),
  glossary: reply.glossary,
  origin: "model"
});

export const parseModelDraft = (content: string): Draft => {
  if (content.trim().length === 0) {
    throw new DraftGenerationError("Drafter returned empty content.");
  }

  let parsedJson: unknown;
  try {
    parsedJson = JSON.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : "invalid json";
    throw new DraftGenerationError(`Drafter returned invalid JSON: ${message}`);
  }

  const parsed = modelDraftSchema.safeParse(parsedJson);
  if (!parsed.success) {
    const paths = parsed.error.issues.map((issue) => issue.path.join(".") || "root").slice(0, 5);
    throw new DraftGenerationError(`Drafter JSON schema validation failed at ${paths.join(", ")}.`);
  }
  return toDraft(parsed.data);
};

/**
 * Language-model drafter. Any generation failure resolves to the evidence
 * template rather than an error; only missing evidence is raised.
 */
export function createModelDrafter(dependencies: ModelDrafterDependencies): Drafter {
  const now = dependencies.now ?? Date.now;
  const info = dependencies.logInfo ?? logInfo;
  const warn = dependencies.logWarn ?? logWarn;
  const recordLatency = dependencies.recordModelLatency ?? recordModelLatency;

  return {
    async draft(input: DraftInput): Promise<DraftResult> {
      if (input.evidence.items.length === 0) {
        throw new NoEvidenceError();
      }

      const context = { requestId: input.requestId ?? null, stage: "draft" };
      const startedAt = now();
      try {
        const content = await withTimeout(
          (signal) =>
            dependencies.completeJson({
              model: dependencies.model,
              system: DRAFTER_SYSTEM_PROMPT,
              user: buildDrafterUserPrompt(input),
              signal,
              timeoutMs: dependencies.timeoutMs
            }),
          dependencies.timeoutMs,
          { label: "drafter", parentSignal: input.signal }
        );
        const draft = parseModelDraft(content);
        const latencyMs = now() - startedAt;
        recordLatency(latencyMs);
        info("draft.model.complete", context, {
          latency_ms: latencyMs,
          model: dependencies.model,
          retry: Boolean(input.feedback),
          citation_count: draft.citations.length,
          fallback_used: false
        });
        return { draft, fallbackReason: null };
      } catch (error) {
        const message = error instanceof Error ? error.message : "unknown drafter error";
        warn("draft.model.fallback", context, {
          model: dependencies.model,
          retry: Boolean(input.feedback),
          error: message,
          fallback_used: true
        });
        return { draft: buildTemplateDraft(input.evidence), fallbackReason: message };
      }
    }
  };
}
