import { describe, expect, it } from "vitest";
import { EmptyCorpusError, IndexAlignmentError, IndexUnavailableError } from "../../src/errors.js";
import type { IndexSnapshot, RawHit, VectorSearchBackend } from "../../src/modules/rag/types.js";
import { buildMemorySnapshot, clampK, prepareVector, searchIndex } from "../../src/modules/rag/vector-index.js";
import { BAG_OF_WORDS_DESCRIPTOR, CORPUS, DEFECT_QUERY, bagOfWords, buildCorpusSnapshot, makeChunk } from "../../tests/helpers/corpus.js";

const descriptor = { model: "unit", dimension: 2, normalize: true };

const stubBackend = (hits: RawHit[], size = hits.length): VectorSearchBackend => ({
  kind: "memory",
  size,
  async search() {
    return hits;
  }
});

const snapshotWith = (backend: VectorSearchBackend): IndexSnapshot => ({
  ...buildCorpusSnapshot(),
  backend
});

describe("modules/rag/vector-index prepareVector", () => {
  it("normalises to unit length when the descriptor asks for it", () => {
    expect(prepareVector([3, 4], descriptor)).toEqual([0.6, 0.8]);
    expect(prepareVector([3, 4], { ...descriptor, normalize: false })).toEqual([3, 4]);
    expect(prepareVector([0, 0], descriptor)).toEqual([0, 0]);
  });

  it("rejects wrong dimensions and non-finite values", () => {
    expect(() => prepareVector([1, 2, 3], descriptor)).toThrow(IndexUnavailableError);
    expect(() => prepareVector([1, Number.NaN], descriptor)).toThrow("Vector contains non-finite values.");
  });
});

describe("modules/rag/vector-index buildMemorySnapshot", () => {
  const chunks = [makeChunk(1, "Art. 1", "um"), makeChunk(2, "Art. 2", "dois")];

  it("rejects vectors without metadata and metadata without vectors", () => {
    let caught: unknown;
    try {
      buildMemorySnapshot({
        version: "v",
        embedding: descriptor,
        entries: [
          { id: 1, vector: [1, 0] },
          { id: 3, vector: [0, 1] }
        ],
        chunks
      });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(IndexAlignmentError);
    expect(caught).toBeInstanceOf(IndexUnavailableError);
    if (caught instanceof IndexAlignmentError) {
      expect(caught.missingMetadataIds).toEqual([3]);
      expect(caught.missingVectorIds).toEqual([2]);
    }
  });

  it("rejects duplicate identifiers on either side", () => {
    expect(() =>
      buildMemorySnapshot({
        version: "v",
        embedding: descriptor,
        entries: [
          { id: 1, vector: [1, 0] },
          { id: 1, vector: [0, 1] }
        ],
        chunks
      })
    ).toThrow("Duplicate vector ids: 1.");

    expect(() =>
      buildMemorySnapshot({
        version: "v",
        embedding: descriptor,
        entries: [{ id: 1, vector: [1, 0] }],
        chunks: [makeChunk(1, "Art. 1", "um"), makeChunk(1, "Art. 1", "de novo")]
      })
    ).toThrow("Duplicate chunk metadata ids: 1.");
  });

  it("rejects vectors of the wrong dimension", () => {
    expect(() =>
      buildMemorySnapshot({
        version: "v",
        embedding: descriptor,
        entries: [
          { id: 1, vector: [1, 0, 0] },
          { id: 2, vector: [0, 1] }
        ],
        chunks
      })
    ).toThrow("Vector dimension 3 does not match embedding dimension 2.");
  });
});

describe("modules/rag/vector-index clampK", () => {
  it.each([
    [0, 5, 1],
    [-3, 5, 1],
    [3, 5, 3],
    [50, 5, 5],
    [2.7, 5, 2],
    [Number.NaN, 5, 1]
  ])("clamps k=%s over %s entries to %s", (requested, size, expected) => {
    expect(clampK(requested, size)).toBe(expected);
  });
});

describe("modules/rag/vector-index searchIndex", () => {
  it("returns evidence ordered by descending score", async () => {
    const snapshot = buildCorpusSnapshot();
    const query = prepareVector(bagOfWords(DEFECT_QUERY), BAG_OF_WORDS_DESCRIPTOR);

    const evidence = await searchIndex(snapshot, query, 3);

    expect(evidence.items.map((item) => item.chunk.id)).toEqual([1, 2, 3]);
    expect(evidence.items[0]?.score).toBeCloseTo(6 / Math.sqrt(50), 6);
    expect(evidence).toMatchObject({ requestedK: 3, effectiveK: 3, droppedIds: [], snapshotVersion: "test-v1" });
  });

  it("clamps k to the corpus size", async () => {
    const evidence = await searchIndex(buildCorpusSnapshot(), prepareVector(bagOfWords(DEFECT_QUERY), BAG_OF_WORDS_DESCRIPTOR), 99);
    expect(evidence.effectiveK).toBe(CORPUS.length);
    expect(evidence.items).toHaveLength(CORPUS.length);
  });

  it("breaks score ties by ascending id", async () => {
    const snapshot = snapshotWith(
      stubBackend([
        { id: 3, score: 0.5 },
        { id: 1, score: 0.5 },
        { id: 2, score: 0.9 }
      ])
    );
    const evidence = await searchIndex(snapshot, [], 3);
    expect(evidence.items.map((item) => item.chunk.id)).toEqual([2, 1, 3]);
  });

  it("drops identifiers that have no metadata", async () => {
    const snapshot = snapshotWith(
      stubBackend(
        [
          { id: 1, score: 0.9 },
          { id: 404, score: 0.8 },
          { id: Number.NaN, score: 0.7 },
          { id: 2, score: 0.6 }
        ],
        5
      )
    );
    const evidence = await searchIndex(snapshot, [], 4);

    expect(evidence.items.map((item) => item.chunk.id)).toEqual([1, 2]);
    expect(evidence.droppedIds).toEqual([404, Number.NaN]);
    for (const item of evidence.items) {
      expect(item.chunk.metadata.article).not.toBe("");
    }
  });

  it("raises IndexUnavailable without a snapshot and EmptyCorpus on zero entries", async () => {
    await expect(searchIndex(null, [], 3)).rejects.toBeInstanceOf(IndexUnavailableError);
    await expect(searchIndex(buildCorpusSnapshot([]), [], 3)).rejects.toBeInstanceOf(EmptyCorpusError);
  });
});
