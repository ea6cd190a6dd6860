export type PiiKind = "national_tax_id" | "company_id" | "email" | "phone" | "case_number";

export type FindingSeverity = "block" | "warn";

export interface TextSpan {
  start: number;
  end: number;
}

export interface Finding {
  kind: PiiKind;
  span: TextSpan;
  checksumVerified: boolean;
  severity: FindingSeverity;
}

export type ScopeDomain = "in-scope" | "adjacent-legal-domain" | "non-legal";

export type ScopePath = "classifier" | "heuristic";

export interface ScopeDecision {
  domain: ScopeDomain;
  confidence: number | null;
  rationale: string;
  path: ScopePath;
  sensitive: boolean;
}

export type WarningDisplay = "show" | "log";

export interface ScopeTermLists {
  inScope: string[];
  adjacentLegal: string[];
  legalMarkers: string[];
  sensitive: string[];
}

export interface IntakePolicy {
  severity: Record<PiiKind, FindingSeverity>;
  maskToken: string;
  warningDisplay: WarningDisplay;
  scopeTerms: ScopeTermLists;
}

export type IntakeBlockReason = "sensitive_data" | "out_of_scope";

export interface IntakeDecision {
  findings: Finding[];
  suppressedCount: number;
  scope: ScopeDecision | null;
  blocked: boolean;
  blockReason: IntakeBlockReason | null;
  cleanedQuery: string;
  warnings: string[];
  elapsedMs: number;
}

export interface ScopeClassificationInput {
  maskedText: string;
  requestId?: string;
  signal?: AbortSignal;
}

export interface ScopeClassification {
  domain: ScopeDomain;
  confidence: number | null;
  rationale: string;
}

export interface ScopeClassifier {
  readonly path: ScopePath;
  classify(input: ScopeClassificationInput): Promise<ScopeClassification>;
}
