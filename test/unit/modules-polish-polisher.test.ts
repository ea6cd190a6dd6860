import { describe, expect, it } from "vitest";
import { buildTemplateDraft } from "../../src/modules/drafting/template-drafter.js";
import type { Draft } from "../../src/modules/drafting/types.js";
import {
  citationsEqual,
  polishDraft,
  polishSteps,
  polishSummary,
  truncateAtSentence
} from "../../src/modules/polish/polisher.js";
import { CORPUS, evidenceFrom } from "../../tests/helpers/corpus.js";

describe("modules/polish/polisher", () => {
  it("normalises the summary into one capitalised sentence block", () => {
    expect(polishSummary("  o consumidor tem direitos\n\n  básicos ", 600)).toBe("O consumidor tem direitos básicos.");
    expect(polishSummary("   ", 600)).toBe("");
    expect(polishSummary("Já termina com pontuação!", 600)).toBe("Já termina com pontuação!");
  });

  it.each([
    ["Primeira frase. Segunda frase longa demais", 20, "Primeira frase."],
    ["Fim. Resto", 4, "Fim."],
    ["uma duas tres quatro", 10, "uma duas…"],
    ["curto", 10, "curto"]
  ])("truncates %j to %i characters", (value, maxChars, expected) => {
    const truncated = truncateAtSentence(value, maxChars);
    expect(truncated).toBe(expected);
    expect(truncated.length).toBeLessThanOrEqual(maxChars);
  });

  it("strips list markers, drops blanks and removes duplicate steps", () => {
    expect(polishSteps(["1. guarde a nota", "- guarde a nota.", "  ", "2) procure o PROCON!", "-"])).toEqual([
      "Guarde a nota.",
      "Procure o PROCON!"
    ]);
  });

  it("is idempotent and leaves citations untouched", () => {
    const draft: Draft = {
      ...buildTemplateDraft(evidenceFrom([CORPUS[0]])),
      summary: "o fornecedor responde   pelo vício",
      steps: ["* reclame com a loja", "registre no procon"]
    };

    const once = polishDraft(draft);
    const twice = polishDraft(once);

    expect(once.summary).toBe("O fornecedor responde pelo vício.");
    expect(once.steps).toEqual(["Reclame com a loja.", "Registre no procon."]);
    expect(twice).toEqual(once);
    expect(once.citations).toEqual(draft.citations);
    expect(once.citations[0]).not.toBe(draft.citations[0]);
    expect(citationsEqual(once.citations, draft.citations)).toBe(true);
  });

  it("honours a shorter summary limit", () => {
    const draft = buildTemplateDraft(evidenceFrom([CORPUS[0]]));
    expect(polishDraft(draft, { summaryMaxChars: 80 }).summary.length).toBeLessThanOrEqual(80);
  });

  it("compares citations by label, url and ids in order", () => {
    const base = [{ label: "Art. 18 (CDC)", url: "u", chunkIds: [1, 2] }];
    expect(citationsEqual(base, [{ label: "Art. 18 (CDC)", url: "u", chunkIds: [1, 2] }])).toBe(true);
    expect(citationsEqual(base, [{ label: "Art. 18 (CDC)", url: "u", chunkIds: [2, 1] }])).toBe(false);
    expect(citationsEqual(base, [{ label: "Art. 18", url: "u", chunkIds: [1, 2] }])).toBe(false);
    expect(citationsEqual(base, [])).toBe(false);
  });
});
