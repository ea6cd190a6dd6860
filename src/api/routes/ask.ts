import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { z } from "zod";
import type { PipelineResult, PipelineRunInput } from "../../modules/pipeline/types.js";
import { MAX_QUERY_CHARS } from "../../modules/intake/intake-guard.js";
import { recordErrorRate } from "../../observability/metrics.js";

const askBodySchema = z.object({
  query: z.string().trim().min(1, "query is required").max(MAX_QUERY_CHARS, "query is too long"),
  k: z.number().int().positive().optional()
});

const UNAVAILABLE_REASONS = new Set(["IndexUnavailable", "EmptyCorpus", "EmbeddingMismatch", "UpstreamUnavailable"]);

const toValidationError = (error: z.ZodError) => ({
  detail: error.issues.map((issue) => ({
    type: issue.code,
    loc: ["body", ...issue.path],
    msg: issue.message
  }))
});

const resolveRequestId = (request: FastifyRequest): string => {
  const headerRequestId = request.headers["x-request-id"];
  if (typeof headerRequestId === "string" && headerRequestId.trim().length > 0) {
    return headerRequestId.trim();
  }
  return request.id;
};

export const statusCodeFor = (result: PipelineResult): number =>
  result.status === "failed" && result.reason && UNAVAILABLE_REASONS.has(result.reason) ? 503 : 200;

export interface AskRoutesDependencies {
  pipeline: { run(input: PipelineRunInput): Promise<PipelineResult> };
}

export async function registerAskRoutes(app: FastifyInstance, dependencies: AskRoutesDependencies): Promise<void> {
  app.post("/ask", async (request: FastifyRequest, reply: FastifyReply) => {
    const parsed = askBodySchema.safeParse(request.body);
    if (!parsed.success) {
      recordErrorRate("validation_422");
      reply.code(422);
      return toValidationError(parsed.error);
    }

    // The client hanging up cancels the run at its next stage boundary.
    const controller = new AbortController();
    const onClose = (): void => {
      if (!reply.raw.writableEnded) {
        controller.abort();
      }
    };
    reply.raw.once("close", onClose);

    try {
      const result = await dependencies.pipeline.run({
        query: parsed.data.query,
        k: parsed.data.k,
        requestId: resolveRequestId(request),
        signal: controller.signal
      });
      reply.code(statusCodeFor(result));
      return result;
    } finally {
      reply.raw.off("close", onClose);
    }
  });
}
