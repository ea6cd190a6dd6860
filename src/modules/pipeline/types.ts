import type { PipelineErrorCode, RecoveredAuditReason } from "../../errors.js";
import type { AuditIssue, AuditReport } from "../audit/types.js";
import type { Draft, DraftFeedback, GlossaryEntry, LegalCitation, QuizItem } from "../drafting/types.js";
import type { Finding, IntakeBlockReason, IntakeDecision, PiiKind, ScopeDecision, ScopePath } from "../intake/types.js";
import type { EvidenceSet } from "../rag/types.js";

export type PipelineStage = "intake" | "retrieve" | "draft" | "audit" | "polish" | "fallback";

export type PipelineStatus = "blocked" | "succeeded" | "failed";

export type PipelineNode = PipelineStage | PipelineStatus;

export type FailureReason = PipelineErrorCode | "InternalError";

export interface TraceEntry {
  stage: PipelineStage;
  next: PipelineNode;
  elapsedMs: number;
  outcome: string;
}

export type ReviewTrigger = "degraded_fallback" | "sensitive_topic";

export interface ReviewEntry {
  requestId: string;
  trigger: ReviewTrigger;
  status: PipelineStatus;
  scopeDomain: string | null;
  cleanedQuery: string;
  payload: {
    draftAttempts: number;
    degradedReason: RecoveredAuditReason | null;
    auditIssues: AuditIssue[];
    citations: LegalCitation[];
    snapshotVersion: string | null;
  };
}

export interface ReviewSink {
  submit(entry: ReviewEntry): Promise<void>;
}

export interface PipelineRunInput {
  query: string;
  k?: number;
  requestId?: string;
  signal?: AbortSignal;
}

export interface PipelineAnswer {
  summary: string;
  steps: string[];
  citations: LegalCitation[];
  quiz: QuizItem[];
  glossary: GlossaryEntry[];
}

export interface PipelineBlocks {
  reason: IntakeBlockReason;
  /** Distinct kinds of the blocking findings, in order of appearance. */
  kinds: PiiKind[];
  findings: Finding[];
  scope: ScopeDecision | null;
}

export interface PipelineMeta {
  requestId: string;
  timings: Partial<Record<PipelineStage, number>> & { total: number };
  trace: TraceEntry[];
  retrievalHits: number;
  auditIssues: AuditIssue[];
  draftAttempts: number;
  degraded: boolean;
  degradedReason: RecoveredAuditReason | null;
  scopePath: ScopePath | null;
  suppressedFindings: number;
  review: { trigger: ReviewTrigger; submitted: boolean } | null;
}

export interface PipelineResult {
  status: PipelineStatus;
  reason?: FailureReason | IntakeBlockReason;
  message?: string;
  blocks?: PipelineBlocks;
  warnings?: string[];
  answer?: PipelineAnswer;
  meta: PipelineMeta;
}

/** Mutable envelope owned by a single run. */
export interface PipelineState {
  requestId: string;
  query: string;
  cleanedQuery: string;
  k: number;
  intake: IntakeDecision | null;
  evidence: EvidenceSet | null;
  draft: Draft | null;
  audit: AuditReport | null;
  feedback: DraftFeedback | null;
  retries: number;
  draftAttempts: number;
  degraded: boolean;
  degradedReason: RecoveredAuditReason | null;
  trace: TraceEntry[];
  timings: Partial<Record<PipelineStage, number>>;
  failure: FailureReason | null;
}
