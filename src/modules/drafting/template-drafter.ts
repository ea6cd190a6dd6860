import { NoEvidenceError } from "../../errors.js";
import type { EvidenceSet } from "../rag/types.js";
import { DRAFT_BOUNDS } from "./draft-schema.js";
import type { Draft, Drafter, LegalCitation } from "./types.js";

export const TEMPLATE_STEPS = [
  "Reúna as provas da relação de consumo, como nota fiscal, contrato, conversas e fotos.",
  "Peça formalmente ao fornecedor a solução do problema e guarde o número de protocolo.",
  "Se não houver solução, registre reclamação no PROCON ou na plataforma consumidor.gov.br."
] as const;

const SUMMARY_EXCERPT_MAX_CHARS = 420;

const excerpt = (value: string, maxChars: number): string => {
  const normalized = value.replace(/\s+/g, " ").trim();
  if (normalized.length <= maxChars) {
    return normalized;
  }
  const cut = normalized.slice(0, maxChars - 1);
  const lastSpace = cut.lastIndexOf(" ");
  return `${(lastSpace > 0 ? cut.slice(0, lastSpace) : cut).trimEnd()}…`;
};

export const citationLabel = (article: string, source: string): string => `${article} (${source})`;

/**
 * Deterministic answer assembled from the top evidence entries only. Used when
 * generation fails and as the degraded answer after a second audit failure.
 */
export function buildTemplateDraft(evidence: EvidenceSet): Draft {
  const top = evidence.items[0];
  if (!top) {
    throw new NoEvidenceError();
  }

  const citations: LegalCitation[] = evidence.items.slice(0, DRAFT_BOUNDS.citationsMax).map(({ chunk }) => ({
    label: citationLabel(chunk.metadata.article, chunk.metadata.source),
    url: chunk.metadata.url,
    chunkIds: [chunk.id]
  }));

  return {
    summary: `Segundo ${citationLabel(top.chunk.metadata.article, top.chunk.metadata.source)}: ${excerpt(
      top.chunk.text,
      SUMMARY_EXCERPT_MAX_CHARS
    )}`,
    steps: [...TEMPLATE_STEPS],
    citations,
    quiz: [],
    glossary: [],
    origin: "template"
  };
}

export const templateDrafter: Drafter = {
  async draft(input) {
    return { draft: buildTemplateDraft(input.evidence), fallbackReason: null };
  }
};
