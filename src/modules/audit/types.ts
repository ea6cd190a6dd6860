export type AuditIssueCode =
  | "UNSUPPORTED_CLAIM"
  | "MISSING_FIELD"
  | "SIZE_BOUND"
  | "SUMMARY_FORMAT"
  | "CITATION_URL_MISMATCH"
  | "PERSONALIZED_ADVICE"
  | "QUERY_MISALIGNED";

export type AuditSeverity = "error" | "warn";

export interface AuditIssue {
  code: AuditIssueCode;
  severity: AuditSeverity;
  message: string;
  pointer?: string;
  chunkIds?: number[];
}

export interface AuditReport {
  ok: boolean;
  issues: AuditIssue[];
  elapsedMs: number;
}

export type AnswerTone = "educational" | "advice";

/** What the model reviewer concluded about a draft that already passed the rule checks. */
export interface ModelReviewVerdict {
  alignment: number;
  tone: AnswerTone;
  rationale: string;
}

export interface ModelReviewInput {
  query: string;
  summary: string;
  steps: string[];
  requestId?: string;
  signal?: AbortSignal;
}

export interface AnswerReviewer {
  review(input: ModelReviewInput): Promise<ModelReviewVerdict>;
}
