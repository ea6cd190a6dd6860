import { z } from "zod";
import type { JsonCompletionFn } from "../../clients/openai.js";
import { SCOPE_CLASSIFIER_SYSTEM_PROMPT, buildScopeClassifierUserPrompt } from "../../prompts/index.js";
import type {
  ScopeClassification,
  ScopeClassificationInput,
  ScopeClassifier,
  ScopeTermLists
} from "./types.js";

export class ScopeClassifierError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ScopeClassifierError";
  }
}

export const normalizeForMatching = (value: string): string =>
  value
    .normalize("NFD")
    .replace(/[\u0300-\u036f]/g, "")
    .toLowerCase()
    .replace(/[^a-z0-9.]+/g, " ")
    .replace(/\.+(?=\s|$)|(?:^|\s)\.+/g, " ")
    .replace(/\s+/g, " ")
    .trim();

export const matchTerms = (normalizedText: string, terms: string[]): string[] => {
  const padded = ` ${normalizedText} `;
  const matched: string[] = [];
  for (const term of terms) {
    const normalizedTerm = normalizeForMatching(term);
    if (normalizedTerm.length > 0 && padded.includes(` ${normalizedTerm} `) && !matched.includes(normalizedTerm)) {
      matched.push(normalizedTerm);
    }
  }
  return matched;
};

/** Keyword-overlap fallback; confidence is always null on this path. */
export class KeywordScopeClassifier implements ScopeClassifier {
  readonly path = "heuristic" as const;

  constructor(private readonly terms: ScopeTermLists) {}

  async classify(input: ScopeClassificationInput): Promise<ScopeClassification> {
    return this.classifySync(input.maskedText);
  }

  classifySync(maskedText: string): ScopeClassification {
    const normalized = normalizeForMatching(maskedText);
    const inScope = matchTerms(normalized, this.terms.inScope);
    const adjacent = matchTerms(normalized, this.terms.adjacentLegal);

    if (inScope.length > 0 && inScope.length >= adjacent.length) {
      return {
        domain: "in-scope",
        confidence: null,
        rationale: `heuristic: consumer-law terms [${inScope.join(", ")}]`
      };
    }

    if (adjacent.length > 0) {
      return {
        domain: "adjacent-legal-domain",
        confidence: null,
        rationale: `heuristic: other legal-domain terms [${adjacent.join(", ")}]`
      };
    }

    const markers = matchTerms(normalized, this.terms.legalMarkers);
    if (markers.length > 0) {
      return {
        domain: "adjacent-legal-domain",
        confidence: null,
        rationale: `heuristic: generic legal terms [${markers.join(", ")}] without consumer-law terms`
      };
    }

    return {
      domain: "non-legal",
      confidence: null,
      rationale: "heuristic: no legal terms found"
    };
  }

  isSensitive(maskedText: string): boolean {
    return matchTerms(normalizeForMatching(maskedText), this.terms.sensitive).length > 0;
  }
}

const modelScopeResponseSchema = z.object({
  domain: z.enum(["in-scope", "adjacent-legal-domain", "non-legal"]),
  confidence: z.number().min(0).max(1).nullable().optional(),
  rationale: z.string().trim().min(1).max(400)
});

export interface ModelScopeClassifierOptions {
  completeJson: JsonCompletionFn;
  model: string;
}

export class ModelScopeClassifier implements ScopeClassifier {
  readonly path = "classifier" as const;

  constructor(private readonly options: ModelScopeClassifierOptions) {}

  async classify(input: ScopeClassificationInput): Promise<ScopeClassification> {
    const content = await this.options.completeJson({
      model: this.options.model,
      system: SCOPE_CLASSIFIER_SYSTEM_PROMPT,
      user: buildScopeClassifierUserPrompt(input.maskedText),
      signal: input.signal
    });

    if (content.trim().length === 0) {
      throw new ScopeClassifierError("Scope classifier returned empty content.");
    }

    let parsedJson: unknown;
    try {
      parsedJson = JSON.parse(content);
    } catch (error) {
      const message = error instanceof Error ? error.message : "invalid json";
      throw new ScopeClassifierError(`Scope classifier returned invalid JSON: ${message}`);
    }

    const parsed = modelScopeResponseSchema.safeParse(parsedJson);
    if (!parsed.success) {
      throw new ScopeClassifierError("Scope classifier JSON schema validation failed.");
    }

    return {
      domain: parsed.data.domain,
      confidence: parsed.data.confidence ?? null,
      rationale: parsed.data.rationale
    };
  }
}
