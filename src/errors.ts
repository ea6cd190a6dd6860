export type PipelineErrorCode =
  | "InputRejected"
  | "IndexUnavailable"
  | "EmptyCorpus"
  | "EmbeddingMismatch"
  | "NoEvidence"
  | "UnsupportedClaim"
  | "StructuralViolation"
  | "UpstreamUnavailable"
  | "Cancelled";

/** Audit failures that the bounded retry and the degraded template absorb. */
export type RecoveredAuditReason = Extract<PipelineErrorCode, "UnsupportedClaim" | "StructuralViolation">;

export class PipelineError extends Error {
  readonly code: PipelineErrorCode;

  constructor(code: PipelineErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PipelineError";
    this.code = code;
  }
}

export class InputRejectedError extends PipelineError {
  constructor(message: string) {
    super("InputRejected", message);
    this.name = "InputRejectedError";
  }
}

export class IndexUnavailableError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("IndexUnavailable", message, options);
    this.name = "IndexUnavailableError";
  }
}

/** Raised when snapshot artifacts disagree about which identifiers exist. */
export class IndexAlignmentError extends IndexUnavailableError {
  readonly missingMetadataIds: number[];
  readonly missingVectorIds: number[];

  constructor(message: string, details: { missingMetadataIds?: number[]; missingVectorIds?: number[] } = {}) {
    super(message);
    this.name = "IndexAlignmentError";
    this.missingMetadataIds = details.missingMetadataIds ?? [];
    this.missingVectorIds = details.missingVectorIds ?? [];
  }
}

export class EmptyCorpusError extends PipelineError {
  constructor(message = "Vector index contains zero entries.") {
    super("EmptyCorpus", message);
    this.name = "EmptyCorpusError";
  }
}

export class EmbeddingMismatchError extends PipelineError {
  constructor(message: string) {
    super("EmbeddingMismatch", message);
    this.name = "EmbeddingMismatchError";
  }
}

export class NoEvidenceError extends PipelineError {
  constructor(message = "No evidence available to ground an answer.") {
    super("NoEvidence", message);
    this.name = "NoEvidenceError";
  }
}

export class UpstreamUnavailableError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("UpstreamUnavailable", message, options);
    this.name = "UpstreamUnavailableError";
  }
}

export class CancelledError extends PipelineError {
  constructor(message = "Request was cancelled.") {
    super("Cancelled", message);
    this.name = "CancelledError";
  }
}

export const serializeError = (error: unknown): Record<string, unknown> => {
  if (!(error instanceof Error)) {
    return { error_raw: String(error) };
  }

  const details: Record<string, unknown> = {
    error_name: error.name,
    error_message: error.message
  };

  if (error instanceof PipelineError) {
    details.error_code = error.code;
  }

  if (error.stack) {
    details.error_stack = error.stack;
  }

  const cause: unknown = error.cause;
  if (cause instanceof Error) {
    details.error_cause = {
      name: cause.name,
      message: cause.message,
      stack: cause.stack
    };
  } else if (cause !== undefined) {
    details.error_cause = cause;
  }

  return details;
};

export const errorMessage = (error: unknown, fallback: string): string =>
  error instanceof Error && error.message.trim().length > 0 ? error.message : fallback;
