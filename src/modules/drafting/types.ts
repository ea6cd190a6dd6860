import type { AuditIssue } from "../audit/types.js";
import type { EvidenceSet } from "../rag/types.js";

export interface LegalCitation {
  label: string;
  url: string;
  chunkIds: number[];
}

export interface QuizItem {
  question: string;
  answer: string;
  reference: string | null;
}

export interface GlossaryEntry {
  term: string;
  definition: string;
}

export type DraftOrigin = "model" | "template";

export interface Draft {
  summary: string;
  steps: string[];
  citations: LegalCitation[];
  quiz: QuizItem[];
  glossary: GlossaryEntry[];
  origin: DraftOrigin;
}

/** Carried from a failed audit into the single re-draft. */
export interface DraftFeedback {
  attempt: number;
  unsupportedChunkIds: number[];
  issues: AuditIssue[];
}

export interface DraftInput {
  query: string;
  evidence: EvidenceSet;
  feedback?: DraftFeedback | null;
  requestId?: string;
  signal?: AbortSignal;
}

export interface DraftResult {
  draft: Draft;
  fallbackReason: string | null;
}

export interface Drafter {
  draft(input: DraftInput): Promise<DraftResult>;
}
