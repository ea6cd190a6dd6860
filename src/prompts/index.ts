import type { DraftFeedback } from "../modules/drafting/types.js";
import type { EvidenceSet } from "../modules/rag/types.js";

export const SCOPE_CLASSIFIER_SYSTEM_PROMPT = [
  "You are a legal scope classifier for an educational assistant about Brazilian consumer law (Código de Defesa do Consumidor, Lei 8.078/90).",
  "Classify the user message into exactly one domain:",
  '"in-scope" for consumer-law questions,',
  '"adjacent-legal-domain" for legal questions from any other area of law,',
  '"non-legal" for everything else.',
  'Return only valid JSON: {"domain": "...", "confidence": <0..1>, "rationale": "<one short sentence>"}.',
  "Personal data in the message has been replaced by a placeholder; do not speculate about it."
].join(" ");

export const buildScopeClassifierUserPrompt = (maskedText: string): string =>
  ["User message:", maskedText].join("\n");

export const AUDIT_REVIEWER_SYSTEM_PROMPT = [
  "You review draft answers of an educational assistant about Brazilian consumer law.",
  "Score how directly the answer addresses the user question, from 0 (unrelated) to 1 (fully on point).",
  'Classify the tone as "educational" when it explains general rights and procedures,',
  'or "advice" when it tells this user what they personally should do in their case, such as suing someone.',
  'Return only valid JSON: {"alignment": <0..1>, "tone": "educational" | "advice", "rationale": "<one short sentence>"}.'
].join(" ");

export const buildAuditReviewerUserPrompt = (input: { query: string; summary: string; steps: string[] }): string =>
  [
    "Question:",
    input.query,
    "",
    "Answer summary:",
    input.summary,
    "",
    "Action steps:",
    ...input.steps.map((step, index) => `${index + 1}. ${step}`)
  ].join("\n");

export const DRAFTER_SYSTEM_PROMPT = [
  "You write short educational answers about Brazilian consumer law in Brazilian Portuguese.",
  "Use only the numbered evidence passages you receive; never cite anything else.",
  "Explain general rights and procedures. Do not give personalised legal advice and do not tell the user to sue.",
  "Return only valid JSON with this shape:",
  '{"summary": "one paragraph, at most 600 characters",',
  '"steps": ["3 to 5 short action steps"],',
  '"citations": [{"label": "article and law", "url": "canonical url of the cited passage", "chunk_ids": [<evidence id>]}],',
  '"quiz": [{"question": "...", "answer": "...", "reference": "article or null"}],',
  '"glossary": [{"term": "...", "definition": "..."}]}',
  "Use between 1 and 5 citations, at most 3 quiz items, and keep the glossary short."
].join("\n");

const EVIDENCE_EXCERPT_MAX_CHARS = 1200;

const truncateText = (value: string, maxChars: number): string => {
  const normalized = value.replace(/\s+/g, " ").trim();
  if (normalized.length <= maxChars) {
    return normalized;
  }
  return `${normalized.slice(0, Math.max(1, maxChars - 1)).trimEnd()}…`;
};

export const buildEvidenceBlock = (evidence: EvidenceSet): string =>
  evidence.items
    .map(({ chunk, score }) =>
      [
        `[${chunk.id}] ${chunk.metadata.article} | ${chunk.metadata.source} | score=${score.toFixed(3)}`,
        `url: ${chunk.metadata.url}`,
        truncateText(chunk.text, EVIDENCE_EXCERPT_MAX_CHARS)
      ].join("\n")
    )
    .join("\n\n");

export const buildFeedbackBlock = (feedback: DraftFeedback): string => {
  const lines = feedback.issues.map((issue) => {
    const pointer = issue.pointer ? ` (${issue.pointer})` : "";
    return `- [${issue.code}]${pointer} ${issue.message}`;
  });
  if (feedback.unsupportedChunkIds.length > 0) {
    lines.push(`- Never cite these ids, they are not in the evidence: ${feedback.unsupportedChunkIds.join(", ")}`);
  }
  return ["Your previous answer was rejected. Fix exactly these problems:", ...lines].join("\n");
};

export const buildDrafterUserPrompt = (input: {
  query: string;
  evidence: EvidenceSet;
  feedback?: DraftFeedback | null;
}): string => {
  const allowedIds = input.evidence.items.map(({ chunk }) => chunk.id).join(", ");
  return [
    "Question:",
    input.query,
    "",
    "Evidence passages:",
    buildEvidenceBlock(input.evidence),
    "",
    `Allowed chunk_ids: ${allowedIds}`,
    ...(input.feedback ? ["", buildFeedbackBlock(input.feedback)] : [])
  ].join("\n");
};
