import { DRAFT_BOUNDS } from "../drafting/draft-schema.js";
import type { Draft, LegalCitation } from "../drafting/types.js";

export interface PolishOptions {
  summaryMaxChars?: number;
}

const LIST_MARKER = /^(?:(?:\d+[.)]|[-*•])(?:\s+|$))+/;
const TERMINAL_PUNCTUATION = /[.!?…:;]$/;

const collapseWhitespace = (value: string): string => value.replace(/\s+/g, " ").trim();

const withTerminalPunctuation = (value: string): string =>
  value.length === 0 || TERMINAL_PUNCTUATION.test(value) ? value : `${value}.`;

const capitalize = (value: string): string =>
  value.length === 0 ? value : `${value.charAt(0).toLocaleUpperCase("pt-BR")}${value.slice(1)}`;

/**
 * Cuts at the last sentence end that fits, otherwise at a word boundary with
 * an ellipsis. The result never exceeds `maxChars`.
 */
export const truncateAtSentence = (value: string, maxChars: number): string => {
  if (value.length <= maxChars) {
    return value;
  }

  const window = value.slice(0, maxChars);
  const sentenceEnd = Math.max(window.lastIndexOf(". "), window.lastIndexOf("! "), window.lastIndexOf("? "));
  if (sentenceEnd > 0) {
    return window.slice(0, sentenceEnd + 1);
  }
  if (/[.!?]$/.test(window)) {
    return window;
  }

  const cut = value.slice(0, maxChars - 1);
  const lastSpace = cut.lastIndexOf(" ");
  const head = (lastSpace > 0 ? cut.slice(0, lastSpace) : cut).replace(/[\s,;:.]+$/, "");
  return `${head}…`;
};

export const polishSummary = (summary: string, maxChars: number): string => {
  const collapsed = collapseWhitespace(summary);
  if (collapsed.length === 0) {
    return collapsed;
  }
  return truncateAtSentence(withTerminalPunctuation(capitalize(collapsed)), maxChars);
};

export const polishSteps = (steps: readonly string[]): string[] => {
  const seen = new Set<string>();
  const polished: string[] = [];
  for (const step of steps) {
    const unmarked = collapseWhitespace(step).replace(LIST_MARKER, "");
    const cleaned = withTerminalPunctuation(capitalize(collapseWhitespace(unmarked)));
    if (cleaned.length === 0) {
      continue;
    }
    const key = cleaned.toLocaleLowerCase("pt-BR");
    if (seen.has(key)) {
      continue;
    }
    seen.add(key);
    polished.push(cleaned);
  }
  return polished;
};

export const citationsEqual = (left: readonly LegalCitation[], right: readonly LegalCitation[]): boolean =>
  left.length === right.length &&
  left.every((citation, index) => {
    const other = right[index];
    return (
      other !== undefined &&
      citation.label === other.label &&
      citation.url === other.url &&
      citation.chunkIds.length === other.chunkIds.length &&
      citation.chunkIds.every((id, position) => other.chunkIds[position] === id)
    );
  });

// Only summary and steps are rewritten; everything else is copied through.
export function polishDraft(draft: Draft, options: PolishOptions = {}): Draft {
  return {
    ...draft,
    summary: polishSummary(draft.summary, options.summaryMaxChars ?? DRAFT_BOUNDS.summaryMaxChars),
    steps: polishSteps(draft.steps),
    citations: draft.citations.map((citation) => ({ ...citation, chunkIds: [...citation.chunkIds] })),
    quiz: draft.quiz.map((item) => ({ ...item })),
    glossary: draft.glossary.map((entry) => ({ ...entry }))
  };
}
