import type { RecoveredAuditReason } from "../../errors.js";
import { logInfo, logWarn } from "../../observability/logger.js";
import { withTimeout } from "../../utils/timeout.js";
import { DRAFT_BOUNDS, type DraftBounds } from "../drafting/draft-schema.js";
import type { Draft, DraftFeedback } from "../drafting/types.js";
import type { EvidenceSet } from "../rag/types.js";
import type { AnswerReviewer, AuditIssue, AuditReport, ModelReviewVerdict } from "./types.js";

// Phrasings that turn an educational answer into personalised legal advice.
export const DEFAULT_ADVICE_PATTERNS: readonly RegExp[] = [
  /\bvoc[eê] deve processar\b/i,
  /\brecomendo que (?:voc[eê] )?(?:processe|acione)\b/i,
  /\bmeu conselho (?:é|e\b)/i,
  /\baconselho (?:voc[eê] |que )/i,
  /\bentre com (?:um )?processo\b/i
];

export interface AuditOptions {
  bounds?: DraftBounds;
  advicePatterns?: readonly RegExp[];
  now?: () => number;
}

const isBlank = (value: string | undefined | null): boolean => !value || value.trim().length === 0;

const checkGrounding = (draft: Draft, evidenceIds: ReadonlySet<number>, urlsById: ReadonlyMap<number, string>): AuditIssue[] => {
  const issues: AuditIssue[] = [];

  draft.citations.forEach((citation, index) => {
    const pointer = `citations[${index}]`;
    if (citation.chunkIds.length === 0) {
      issues.push({
        code: "UNSUPPORTED_CLAIM",
        severity: "error",
        message: `Citation "${citation.label}" does not reference any retrieved source.`,
        pointer,
        chunkIds: []
      });
      return;
    }

    const unsupported = citation.chunkIds.filter((id) => !evidenceIds.has(id));
    if (unsupported.length > 0) {
      issues.push({
        code: "UNSUPPORTED_CLAIM",
        severity: "error",
        message: `Citation "${citation.label}" references ids outside the evidence: ${unsupported.join(", ")}.`,
        pointer,
        chunkIds: unsupported
      });
      return;
    }

    const canonicalUrls = citation.chunkIds.map((id) => urlsById.get(id));
    if (!isBlank(citation.url) && !canonicalUrls.includes(citation.url)) {
      issues.push({
        code: "CITATION_URL_MISMATCH",
        severity: "warn",
        message: `Citation "${citation.label}" URL does not match the canonical URL of its source.`,
        pointer,
        chunkIds: [...citation.chunkIds]
      });
    }
  });

  return issues;
};

const checkStructure = (draft: Draft, bounds: DraftBounds): AuditIssue[] => {
  const issues: AuditIssue[] = [];
  const steps = draft.steps.filter((step) => !isBlank(step));

  if (isBlank(draft.summary)) {
    issues.push({ code: "MISSING_FIELD", severity: "error", message: "Summary is missing.", pointer: "summary" });
  } else {
    if (draft.summary.trim().length > bounds.summaryMaxChars) {
      issues.push({
        code: "SIZE_BOUND",
        severity: "warn",
        message: `Summary has ${draft.summary.trim().length} characters; the limit is ${bounds.summaryMaxChars}.`,
        pointer: "summary"
      });
    }
    if (/\n\s*\n/.test(draft.summary.trim())) {
      issues.push({
        code: "SUMMARY_FORMAT",
        severity: "warn",
        message: "Summary must be a single paragraph.",
        pointer: "summary"
      });
    }
  }

  if (steps.length === 0) {
    issues.push({ code: "MISSING_FIELD", severity: "error", message: "Action steps are missing.", pointer: "steps" });
  } else if (steps.length < bounds.stepsMin || steps.length > bounds.stepsMax) {
    issues.push({
      code: "SIZE_BOUND",
      severity: "warn",
      message: `Expected ${bounds.stepsMin}-${bounds.stepsMax} action steps, got ${steps.length}.`,
      pointer: "steps"
    });
  }

  if (draft.citations.length === 0) {
    issues.push({
      code: "MISSING_FIELD",
      severity: "error",
      message: "At least one legal-basis citation is required.",
      pointer: "citations"
    });
  } else if (draft.citations.length > bounds.citationsMax) {
    issues.push({
      code: "SIZE_BOUND",
      severity: "warn",
      message: `Expected at most ${bounds.citationsMax} citations, got ${draft.citations.length}.`,
      pointer: "citations"
    });
  }

  draft.citations.forEach((citation, index) => {
    if (isBlank(citation.label)) {
      issues.push({
        code: "MISSING_FIELD",
        severity: "error",
        message: "Citation label is missing.",
        pointer: `citations[${index}].label`
      });
    }
  });

  if (draft.quiz.length > bounds.quizMax) {
    issues.push({
      code: "SIZE_BOUND",
      severity: "warn",
      message: `Expected at most ${bounds.quizMax} quiz items, got ${draft.quiz.length}.`,
      pointer: "quiz"
    });
  }

  if (draft.glossary.length > bounds.glossaryMax) {
    issues.push({
      code: "SIZE_BOUND",
      severity: "warn",
      message: `Expected at most ${bounds.glossaryMax} glossary entries, got ${draft.glossary.length}.`,
      pointer: "glossary"
    });
  }

  return issues;
};

const checkEducationalTone = (draft: Draft, patterns: readonly RegExp[]): AuditIssue[] => {
  const fields: Array<[string, string]> = [
    ["summary", draft.summary],
    ...draft.steps.map((step, index): [string, string] => [`steps[${index}]`, step])
  ];
  const issues: AuditIssue[] = [];
  for (const [pointer, text] of fields) {
    if (patterns.some((pattern) => pattern.test(text))) {
      issues.push({
        code: "PERSONALIZED_ADVICE",
        severity: "error",
        message: "Content gives personalised legal advice instead of general guidance.",
        pointer
      });
    }
  }
  return issues;
};

/**
 * Validates a draft against the evidence it was produced from.
 * `ok` holds exactly when no issue has severity `error`.
 */
export function auditDraft(draft: Draft, evidence: EvidenceSet, options: AuditOptions = {}): AuditReport {
  const now = options.now ?? Date.now;
  const startedAt = now();
  const evidenceIds = new Set(evidence.items.map(({ chunk }) => chunk.id));
  const urlsById = new Map(evidence.items.map(({ chunk }) => [chunk.id, chunk.metadata.url]));

  const issues = [
    ...checkGrounding(draft, evidenceIds, urlsById),
    ...checkStructure(draft, options.bounds ?? DRAFT_BOUNDS),
    ...checkEducationalTone(draft, options.advicePatterns ?? DEFAULT_ADVICE_PATTERNS)
  ];

  return {
    ok: !issues.some((issue) => issue.severity === "error"),
    issues,
    elapsedMs: now() - startedAt
  };
}

export const MIN_ALIGNMENT = 0.7;
const DEFAULT_REVIEWER_TIMEOUT_MS = 8000;

export interface AuditContext {
  query: string;
  requestId?: string;
  signal?: AbortSignal;
}

export type AuditFn = (draft: Draft, evidence: EvidenceSet, context: AuditContext) => Promise<AuditReport>;

export interface AuditorDependencies extends AuditOptions {
  reviewer?: AnswerReviewer | null;
  reviewerTimeoutMs?: number;
  minAlignment?: number;
  logInfo?: typeof logInfo;
  logWarn?: typeof logWarn;
}

const reviewIssues = (verdict: ModelReviewVerdict, minAlignment: number): AuditIssue[] => {
  const issues: AuditIssue[] = [];
  if (verdict.alignment < minAlignment) {
    issues.push({
      code: "QUERY_MISALIGNED",
      severity: "error",
      message: `Answer does not address the question (alignment ${verdict.alignment.toFixed(2)}, minimum ${minAlignment.toFixed(2)}).`,
      pointer: "summary"
    });
  }
  if (verdict.tone === "advice") {
    issues.push({
      code: "PERSONALIZED_ADVICE",
      severity: "error",
      message: `Content gives personalised legal advice instead of general guidance: ${verdict.rationale}`,
      pointer: "summary"
    });
  }
  return issues;
};

/**
 * Rule checks first; when they pass and a reviewer is configured, the model
 * also scores alignment and tone. A reviewer that fails or times out leaves
 * the rule-only report in place.
 */
export function createAuditor(dependencies: AuditorDependencies = {}): AuditFn {
  const now = dependencies.now ?? Date.now;
  const info = dependencies.logInfo ?? logInfo;
  const warn = dependencies.logWarn ?? logWarn;
  const minAlignment = dependencies.minAlignment ?? MIN_ALIGNMENT;

  return async (draft, evidence, context) => {
    const startedAt = now();
    const report = auditDraft(draft, evidence, dependencies);
    const reviewer = dependencies.reviewer;
    if (!reviewer || !report.ok) {
      return report;
    }

    const logContext = { requestId: context.requestId ?? null, stage: "audit" };
    let verdict: ModelReviewVerdict;
    try {
      verdict = await withTimeout(
        (signal) =>
          reviewer.review({
            query: context.query,
            summary: draft.summary,
            steps: draft.steps,
            requestId: context.requestId,
            signal
          }),
        dependencies.reviewerTimeoutMs ?? DEFAULT_REVIEWER_TIMEOUT_MS,
        { label: "answer reviewer", parentSignal: context.signal }
      );
    } catch (error) {
      if (context.signal?.aborted) {
        throw error;
      }
      const message = error instanceof Error ? error.message : "unknown reviewer error";
      warn("audit.model.fallback", logContext, { error: message, fallback_used: true });
      return report;
    }

    const issues = [...report.issues, ...reviewIssues(verdict, minAlignment)];
    info("audit.model.complete", logContext, { alignment: verdict.alignment, tone: verdict.tone });
    return {
      ok: !issues.some((issue) => issue.severity === "error"),
      issues,
      elapsedMs: now() - startedAt
    };
  };
}

/** Grounding failures are unsupported claims; every other blocking issue breaks the answer contract. */
export const recoveredAuditReason = (report: AuditReport): RecoveredAuditReason =>
  report.issues.some((issue) => issue.code === "UNSUPPORTED_CLAIM" && issue.severity === "error")
    ? "UnsupportedClaim"
    : "StructuralViolation";

export function buildDraftFeedback(report: AuditReport, attempt: number): DraftFeedback {
  const unsupportedChunkIds = [
    ...new Set(
      report.issues
        .filter((issue) => issue.code === "UNSUPPORTED_CLAIM")
        .flatMap((issue) => issue.chunkIds ?? [])
    )
  ].sort((a, b) => a - b);

  return {
    attempt,
    unsupportedChunkIds,
    issues: report.issues.map((issue) => ({ ...issue }))
  };
}
