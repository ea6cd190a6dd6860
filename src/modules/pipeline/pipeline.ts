import { CancelledError, NoEvidenceError, PipelineError, serializeError } from "../../errors.js";
import { logError, logInfo, logTrace, logWarn } from "../../observability/logger.js";
import { recordErrorRate, recordPipelineOutcome, recordStageLatency } from "../../observability/metrics.js";
import { buildDraftFeedback, createAuditor, recoveredAuditReason, type AuditContext } from "../audit/auditor.js";
import type { AuditReport } from "../audit/types.js";
import { buildTemplateDraft } from "../drafting/template-drafter.js";
import type { Draft, Drafter } from "../drafting/types.js";
import type { IntakeDecision } from "../intake/types.js";
import { citationsEqual, polishDraft } from "../polish/polisher.js";
import type { Retriever } from "../rag/retriever.js";
import type { EvidenceSet } from "../rag/types.js";
import { blockedMessage, failureMessage } from "./messages.js";
import { reportReviewSinkFailure } from "./review-repository.js";
import type {
  FailureReason,
  PipelineNode,
  PipelineResult,
  PipelineRunInput,
  PipelineStage,
  PipelineState,
  PipelineStatus,
  ReviewSink,
  ReviewTrigger
} from "./types.js";

/** Every edge the run may take. Anything else is a programming error. */
export const TRANSITIONS: Readonly<Record<PipelineStage, readonly PipelineNode[]>> = {
  intake: ["retrieve", "blocked", "failed"],
  retrieve: ["draft", "failed"],
  draft: ["audit", "failed"],
  audit: ["polish", "draft", "fallback", "failed"],
  polish: ["succeeded", "failed"],
  fallback: ["succeeded", "failed"]
};

export const MAX_DRAFT_RETRIES = 1;
export const DEFAULT_MIN_EVIDENCE = 2;

const TERMINALS: ReadonlySet<PipelineNode> = new Set<PipelineNode>(["blocked", "succeeded", "failed"]);

const isTerminal = (node: PipelineNode): node is PipelineStatus => TERMINALS.has(node);

export const isAllowedTransition = (from: PipelineStage, to: PipelineNode): boolean => TRANSITIONS[from].includes(to);

export interface IntakeScreen {
  screen(query: string, options: { requestId?: string; signal?: AbortSignal }): Promise<IntakeDecision>;
}

export interface PipelineDependencies {
  intake: IntakeScreen;
  retriever: Retriever;
  drafter: Drafter;
  audit?: (draft: Draft, evidence: EvidenceSet, context: AuditContext) => AuditReport | Promise<AuditReport>;
  polish?: (draft: Draft) => Draft;
  reviewSink?: ReviewSink | null;
  defaultK: number;
  maxK: number;
  /** Fewer retrieved entries than this is treated as no evidence. */
  minEvidence?: number;
  now?: () => number;
  createRequestId?: () => string;
}

interface StepOutcome {
  next: PipelineNode;
  outcome: string;
}

class InvalidTransitionError extends Error {
  constructor(from: PipelineStage, to: PipelineNode) {
    super(`Transition ${from} -> ${to} is not allowed.`);
    this.name = "InvalidTransitionError";
  }
}

const defaultRequestId = (): string => `${Date.now()}-${Math.random().toString(36).slice(2)}`;

const toFailureReason = (error: unknown, signal: AbortSignal | undefined): FailureReason => {
  if (signal?.aborted || error instanceof CancelledError) {
    return "Cancelled";
  }
  return error instanceof PipelineError ? error.code : "InternalError";
};

const requireValue = <T>(value: T | null, label: string): T => {
  if (value === null) {
    throw new Error(`Pipeline state is missing ${label}.`);
  }
  return value;
};

/**
 * Intake → Retrieve → Draft → Audit → (Polish | Draft once more | Fallback).
 * `run` never rejects: every path ends in `blocked`, `succeeded` or `failed`.
 */
export class GuardedAnswerPipeline {
  private readonly now: () => number;
  private readonly audit: (draft: Draft, evidence: EvidenceSet, context: AuditContext) => AuditReport | Promise<AuditReport>;
  private readonly polish: (draft: Draft) => Draft;
  private readonly minEvidence: number;

  constructor(private readonly dependencies: PipelineDependencies) {
    this.now = dependencies.now ?? Date.now;
    this.audit = dependencies.audit ?? createAuditor({ now: this.now });
    this.polish = dependencies.polish ?? ((draft) => polishDraft(draft));
    this.minEvidence = Math.max(1, dependencies.minEvidence ?? DEFAULT_MIN_EVIDENCE);
  }

  async run(input: PipelineRunInput): Promise<PipelineResult> {
    const startedAt = this.now();
    const requestId = input.requestId ?? (this.dependencies.createRequestId ?? defaultRequestId)();
    const state: PipelineState = {
      requestId,
      query: input.query,
      cleanedQuery: "",
      k: Math.min(input.k ?? this.dependencies.defaultK, this.dependencies.maxK),
      intake: null,
      evidence: null,
      draft: null,
      audit: null,
      feedback: null,
      retries: 0,
      draftAttempts: 0,
      degraded: false,
      degradedReason: null,
      trace: [],
      timings: {},
      failure: null
    };

    let node: PipelineNode = "intake";
    while (!isTerminal(node)) {
      const stage: PipelineStage = node;
      const stageStartedAt = this.now();
      let step: StepOutcome;

      try {
        this.throwIfCancelled(input.signal);
        step = await this.step(stage, state, input.signal);
        if (!isAllowedTransition(stage, step.next)) {
          throw new InvalidTransitionError(stage, step.next);
        }
      } catch (error) {
        const reason = toFailureReason(error, input.signal);
        state.failure = reason;
        step = { next: "failed", outcome: `error:${reason}` };
        const log = reason === "InternalError" ? logError : logWarn;
        log("pipeline.stage.failed", { requestId, stage }, { reason, ...serializeError(error) });
      }

      const elapsedMs = this.now() - stageStartedAt;
      state.timings[stage] = (state.timings[stage] ?? 0) + elapsedMs;
      state.trace.push({ stage, next: step.next, elapsedMs, outcome: step.outcome });
      recordStageLatency(stage, elapsedMs);
      logTrace("pipeline.transition", { requestId, stage }, { next: step.next, outcome: step.outcome, elapsed_ms: elapsedMs });
      node = step.next;
    }

    return this.finish(node, state, this.now() - startedAt);
  }

  private throwIfCancelled(signal: AbortSignal | undefined): void {
    if (signal?.aborted) {
      throw new CancelledError();
    }
  }

  private async step(stage: PipelineStage, state: PipelineState, signal: AbortSignal | undefined): Promise<StepOutcome> {
    switch (stage) {
      case "intake":
        return this.runIntake(state, signal);
      case "retrieve":
        return this.runRetrieve(state, signal);
      case "draft":
        return this.runDraft(state, signal);
      case "audit":
        return this.runAudit(state, signal);
      case "polish":
        return this.runPolish(state);
      case "fallback":
        return this.runFallback(state);
    }
  }

  private async runIntake(state: PipelineState, signal: AbortSignal | undefined): Promise<StepOutcome> {
    const decision = await this.dependencies.intake.screen(state.query, { requestId: state.requestId, signal });
    state.intake = decision;
    state.cleanedQuery = decision.cleanedQuery;
    if (decision.blocked) {
      return { next: "blocked", outcome: decision.blockReason ?? "blocked" };
    }
    return { next: "retrieve", outcome: `scope:${decision.scope?.domain ?? "unknown"}` };
  }

  private async runRetrieve(state: PipelineState, signal: AbortSignal | undefined): Promise<StepOutcome> {
    const evidence = await this.dependencies.retriever.retrieve({
      query: state.cleanedQuery,
      k: state.k,
      requestId: state.requestId,
      signal
    });
    state.evidence = evidence;
    if (evidence.items.length < this.minEvidence) {
      throw new NoEvidenceError();
    }
    return { next: "draft", outcome: `hits:${evidence.items.length}` };
  }

  private async runDraft(state: PipelineState, signal: AbortSignal | undefined): Promise<StepOutcome> {
    state.draftAttempts += 1;
    const result = await this.dependencies.drafter.draft({
      query: state.cleanedQuery,
      evidence: requireValue(state.evidence, "evidence"),
      feedback: state.feedback,
      requestId: state.requestId,
      signal
    });
    state.draft = result.draft;
    return { next: "audit", outcome: result.fallbackReason ? "template" : result.draft.origin };
  }

  private async runAudit(state: PipelineState, signal: AbortSignal | undefined): Promise<StepOutcome> {
    const report = await this.audit(requireValue(state.draft, "draft"), requireValue(state.evidence, "evidence"), {
      query: state.cleanedQuery,
      requestId: state.requestId,
      signal
    });
    state.audit = report;
    if (report.ok) {
      return { next: "polish", outcome: "pass" };
    }

    const errorCodes = [...new Set(report.issues.filter((issue) => issue.severity === "error").map((issue) => issue.code))];
    if (state.retries < MAX_DRAFT_RETRIES) {
      state.retries += 1;
      state.feedback = buildDraftFeedback(report, state.retries);
      return { next: "draft", outcome: `retry:${errorCodes.join(",")}` };
    }
    state.degradedReason = recoveredAuditReason(report);
    recordErrorRate(`pipeline_recovered_${state.degradedReason}`);
    return { next: "fallback", outcome: `fail:${errorCodes.join(",")}` };
  }

  private async runPolish(state: PipelineState): Promise<StepOutcome> {
    const draft = requireValue(state.draft, "draft");
    const polished = this.polish(draft);
    if (!citationsEqual(draft.citations, polished.citations)) {
      logWarn("pipeline.polish.citation_drift", { requestId: state.requestId, stage: "polish" }, { reverted: true });
      return { next: "succeeded", outcome: "reverted" };
    }
    state.draft = polished;
    return { next: "succeeded", outcome: "polished" };
  }

  private async runFallback(state: PipelineState): Promise<StepOutcome> {
    state.draft = buildTemplateDraft(requireValue(state.evidence, "evidence"));
    state.degraded = true;
    return { next: "succeeded", outcome: "degraded" };
  }

  private reviewTrigger(status: PipelineStatus, state: PipelineState): ReviewTrigger | null {
    if (status !== "succeeded") {
      return null;
    }
    if (state.degraded) {
      return "degraded_fallback";
    }
    return state.intake?.scope?.sensitive ? "sensitive_topic" : null;
  }

  private async submitReview(trigger: ReviewTrigger, status: PipelineStatus, state: PipelineState): Promise<boolean> {
    const sink = this.dependencies.reviewSink;
    if (!sink) {
      return false;
    }

    const entry = {
      requestId: state.requestId,
      trigger,
      status,
      scopeDomain: state.intake?.scope?.domain ?? null,
      cleanedQuery: state.cleanedQuery,
      payload: {
        draftAttempts: state.draftAttempts,
        degradedReason: state.degradedReason,
        auditIssues: state.audit?.issues ?? [],
        citations: state.draft?.citations ?? [],
        snapshotVersion: state.evidence?.snapshotVersion ?? null
      }
    };
    try {
      await sink.submit(entry);
      return true;
    } catch (error) {
      reportReviewSinkFailure(entry, error);
      return false;
    }
  }

  private async finish(status: PipelineStatus, state: PipelineState, totalMs: number): Promise<PipelineResult> {
    const trigger = this.reviewTrigger(status, state);
    const submitted = trigger ? await this.submitReview(trigger, status, state) : false;
    const intake = state.intake;

    const result: PipelineResult = {
      status,
      meta: {
        requestId: state.requestId,
        timings: { ...state.timings, total: totalMs },
        trace: state.trace,
        retrievalHits: state.evidence?.items.length ?? 0,
        auditIssues: state.audit?.issues ?? [],
        draftAttempts: state.draftAttempts,
        degraded: state.degraded,
        degradedReason: state.degradedReason,
        scopePath: intake?.scope?.path ?? null,
        suppressedFindings: intake?.suppressedCount ?? 0,
        review: trigger ? { trigger, submitted } : null
      }
    };

    if (intake && intake.warnings.length > 0) {
      result.warnings = [...intake.warnings];
    }

    if (status === "blocked" && intake?.blockReason) {
      result.reason = intake.blockReason;
      result.message = blockedMessage(intake.blockReason, intake.findings, intake.scope);
      result.blocks = {
        reason: intake.blockReason,
        kinds: [...new Set(intake.findings.filter((finding) => finding.severity === "block").map((finding) => finding.kind))],
        findings: intake.findings,
        scope: intake.scope
      };
    } else if (status === "failed") {
      const reason = state.failure ?? "InternalError";
      result.reason = reason;
      result.message = failureMessage(reason);
      recordErrorRate(`pipeline_${reason}`);
    } else if (status === "succeeded" && state.draft) {
      const { summary, steps, citations, quiz, glossary } = state.draft;
      result.answer = { summary, steps, citations, quiz, glossary };
    }

    recordPipelineOutcome(status);
    logInfo("pipeline.run.complete", { requestId: state.requestId }, {
      status,
      reason: result.reason ?? null,
      draft_attempts: state.draftAttempts,
      degraded: state.degraded,
      retrieval_hits: result.meta.retrievalHits,
      review_trigger: trigger,
      latency_ms: totalMs
    });
    return result;
  }
}
