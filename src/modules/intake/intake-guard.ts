import { InputRejectedError } from "../../errors.js";
import { logInfo, logWarn } from "../../observability/logger.js";
import { withTimeout } from "../../utils/timeout.js";
import { maskFindings, scanForPii } from "./pii-detector.js";
import { KeywordScopeClassifier } from "./scope-classifier.js";
import type {
  Finding,
  IntakeDecision,
  IntakePolicy,
  ScopeClassification,
  ScopeClassifier,
  ScopeDecision
} from "./types.js";

const CASE_NUMBER_WARNING =
  "Sua mensagem contém um número de processo. Ele foi ocultado e não será usado na resposta.";
const GENERIC_WARNING = "Parte da sua mensagem foi ocultada por conter dado pessoal.";

export const MAX_QUERY_CHARS = 4000;

export interface IntakeGuardDependencies {
  /** Primary scope path; absent means the heuristic is the only path. */
  classifier?: ScopeClassifier | null;
  classifierTimeoutMs: number;
  now?: () => number;
  logInfo?: typeof logInfo;
  logWarn?: typeof logWarn;
}

export interface ScreenOptions {
  requestId?: string;
  signal?: AbortSignal;
}

const describeWarning = (finding: Finding): string =>
  finding.kind === "case_number" ? CASE_NUMBER_WARNING : GENERIC_WARNING;

export class IntakeGuard {
  private readonly heuristic: KeywordScopeClassifier;
  private readonly now: () => number;
  private readonly info: typeof logInfo;
  private readonly warn: typeof logWarn;

  constructor(
    private readonly policy: IntakePolicy,
    private readonly dependencies: IntakeGuardDependencies
  ) {
    this.heuristic = new KeywordScopeClassifier(policy.scopeTerms);
    this.now = dependencies.now ?? Date.now;
    this.info = dependencies.logInfo ?? logInfo;
    this.warn = dependencies.logWarn ?? logWarn;
  }

  async screen(query: string, options: ScreenOptions = {}): Promise<IntakeDecision> {
    const startedAt = this.now();
    const context = { requestId: options.requestId ?? null, stage: "intake" };
    if (query.trim().length === 0) {
      throw new InputRejectedError("Query is empty.");
    }
    if (query.length > MAX_QUERY_CHARS) {
      throw new InputRejectedError(`Query has ${query.length} characters; the limit is ${MAX_QUERY_CHARS}.`);
    }
    const { findings, suppressedCount } = scanForPii(query, this.policy.severity);
    const blocking = findings.filter((finding) => finding.severity === "block");
    const warnFindings = findings.filter((finding) => finding.severity === "warn");
    const cleanedQuery = maskFindings(query, findings, this.policy.maskToken);

    if (warnFindings.length > 0) {
      this.warn("intake.pii.warning", context, {
        kinds: warnFindings.map((finding) => finding.kind),
        display: this.policy.warningDisplay
      });
    }
    const warnings =
      this.policy.warningDisplay === "show"
        ? [...new Set(warnFindings.map(describeWarning))]
        : [];

    if (blocking.length > 0) {
      const decision: IntakeDecision = {
        findings,
        suppressedCount,
        scope: null,
        blocked: true,
        blockReason: "sensitive_data",
        cleanedQuery,
        warnings,
        elapsedMs: this.now() - startedAt
      };
      this.logDecision(decision, options);
      return decision;
    }

    const scope = await this.classifyScope(cleanedQuery, options);
    const blocked = scope.domain !== "in-scope";
    const decision: IntakeDecision = {
      findings,
      suppressedCount,
      scope,
      blocked,
      blockReason: blocked ? "out_of_scope" : null,
      cleanedQuery,
      warnings,
      elapsedMs: this.now() - startedAt
    };
    this.logDecision(decision, options);
    return decision;
  }

  /** Tries the primary classifier once and falls back to keywords on any failure. */
  private async classifyScope(maskedText: string, options: ScreenOptions): Promise<ScopeDecision> {
    const sensitive = this.heuristic.isSensitive(maskedText);
    const classifier = this.dependencies.classifier;

    if (classifier) {
      try {
        const result: ScopeClassification = await withTimeout(
          (signal) => classifier.classify({ maskedText, requestId: options.requestId, signal }),
          this.dependencies.classifierTimeoutMs,
          { label: "scope classifier", parentSignal: options.signal }
        );
        return { ...result, path: classifier.path, sensitive };
      } catch (error) {
        const message = error instanceof Error ? error.message : "unknown classifier error";
        this.warn(
          "intake.scope.fallback",
          { requestId: options.requestId ?? null, stage: "intake" },
          { error: message, fallback_used: true }
        );
      }
    }

    const fallback = this.heuristic.classifySync(maskedText);
    return { ...fallback, path: this.heuristic.path, sensitive };
  }

  private logDecision(decision: IntakeDecision, options: ScreenOptions): void {
    this.info(
      "intake.screen.complete",
      { requestId: options.requestId ?? null, stage: "intake" },
      {
        blocked: decision.blocked,
        block_reason: decision.blockReason,
        finding_kinds: decision.findings.map((finding) => finding.kind),
        suppressed_count: decision.suppressedCount,
        scope_domain: decision.scope?.domain ?? null,
        scope_path: decision.scope?.path ?? null,
        elapsed_ms: decision.elapsedMs
      }
    );
  }
}
