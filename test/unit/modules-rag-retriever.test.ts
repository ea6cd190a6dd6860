import { describe, expect, it, vi } from "vitest";
import { EmbeddingMismatchError, PipelineError, UpstreamUnavailableError } from "../../src/errors.js";
import { IndexRegistry } from "../../src/modules/rag/index-registry.js";
import { assertEmbeddingCompatible, createRetriever } from "../../src/modules/rag/retriever.js";
import type { Embedder } from "../../src/modules/rag/types.js";
import {
  BAG_OF_WORDS_DESCRIPTOR,
  DEFECT_QUERY,
  buildCorpusSnapshot,
  createBagOfWordsEmbedder
} from "../../tests/helpers/corpus.js";

const loadedRegistry = (): IndexRegistry => {
  const registry = new IndexRegistry();
  registry.swap(buildCorpusSnapshot());
  return registry;
};

describe("modules/rag/retriever", () => {
  it("embeds the query, searches the current snapshot and logs the outcome", async () => {
    const logInfo = vi.fn();
    const recordRetrievalLatency = vi.fn();
    const retriever = createRetriever({
      registry: loadedRegistry(),
      embedder: createBagOfWordsEmbedder(),
      embeddingTimeoutMs: 100,
      now: vi.fn().mockReturnValueOnce(1000).mockReturnValueOnce(1012),
      recordRetrievalLatency,
      logInfo
    });

    const evidence = await retriever.retrieve({ query: DEFECT_QUERY, k: 2, requestId: "req-7" });

    expect(evidence.items.map((item) => item.chunk.metadata.article)).toEqual(["Art. 18", "Art. 26"]);
    expect(recordRetrievalLatency).toHaveBeenCalledWith(12);
    expect(logInfo).toHaveBeenCalledWith(
      "rag.retrieve.complete",
      { requestId: "req-7", stage: "retrieve" },
      expect.objectContaining({ latency_ms: 12, requested_k: 2, effective_k: 2, result_count: 2, dropped_count: 0 })
    );
  });

  it("refuses a query embedder that does not match the index", async () => {
    const retriever = createRetriever({
      registry: loadedRegistry(),
      embedder: createBagOfWordsEmbedder({ ...BAG_OF_WORDS_DESCRIPTOR, model: "another-model" }),
      embeddingTimeoutMs: 100,
      logInfo: vi.fn()
    });

    const attempt = retriever.retrieve({ query: DEFECT_QUERY, k: 3 });
    await expect(attempt).rejects.toBeInstanceOf(EmbeddingMismatchError);
    await expect(attempt).rejects.toThrow(
      "Query embedder another-model/16/normalized does not match index embedding test-bag-of-words/16/normalized."
    );
  });

  it("treats a normalisation mismatch as incompatible", () => {
    let caught: unknown;
    try {
      assertEmbeddingCompatible({ ...BAG_OF_WORDS_DESCRIPTOR, normalize: false }, BAG_OF_WORDS_DESCRIPTOR);
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(PipelineError);
    expect(caught instanceof PipelineError ? caught.code : null).toBe("EmbeddingMismatch");
  });

  it("wraps embedding failures and timeouts as UpstreamUnavailable", async () => {
    const failing: Embedder = {
      descriptor: BAG_OF_WORDS_DESCRIPTOR,
      embed: vi.fn().mockRejectedValue(new Error("socket hang up"))
    };
    const hanging: Embedder = {
      descriptor: BAG_OF_WORDS_DESCRIPTOR,
      embed: () => new Promise<number[]>(() => undefined)
    };

    for (const embedder of [failing, hanging]) {
      const retriever = createRetriever({ registry: loadedRegistry(), embedder, embeddingTimeoutMs: 20, logInfo: vi.fn() });
      await expect(retriever.retrieve({ query: DEFECT_QUERY, k: 1 })).rejects.toBeInstanceOf(UpstreamUnavailableError);
    }
  });

  it("reports EmptyCorpus before embedding when the snapshot has no entries", async () => {
    const registry = new IndexRegistry();
    registry.swap(buildCorpusSnapshot([]));
    const embed = vi.fn().mockRejectedValue(new Error("socket hang up"));
    const retriever = createRetriever({
      registry,
      embedder: { descriptor: BAG_OF_WORDS_DESCRIPTOR, embed },
      embeddingTimeoutMs: 20,
      logInfo: vi.fn()
    });

    await expect(retriever.retrieve({ query: DEFECT_QUERY, k: 3 })).rejects.toMatchObject({ code: "EmptyCorpus" });
    expect(embed).not.toHaveBeenCalled();
  });

  it("propagates IndexUnavailable when nothing is loaded", async () => {
    const retriever = createRetriever({
      registry: new IndexRegistry(),
      embedder: createBagOfWordsEmbedder(),
      embeddingTimeoutMs: 100
    });
    await expect(retriever.retrieve({ query: DEFECT_QUERY, k: 1 })).rejects.toMatchObject({ code: "IndexUnavailable" });
  });
});
