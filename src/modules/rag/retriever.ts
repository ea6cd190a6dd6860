import { EmbeddingMismatchError, EmptyCorpusError, UpstreamUnavailableError } from "../../errors.js";
import { logInfo } from "../../observability/logger.js";
import { recordRetrievalLatency } from "../../observability/metrics.js";
import { withTimeout } from "../../utils/timeout.js";
import type { IndexRegistry } from "./index-registry.js";
import { prepareVector, searchIndex } from "./vector-index.js";
import type { Embedder, EmbeddingDescriptor, EvidenceSet } from "./types.js";

export interface RetrieveInput {
  query: string;
  k: number;
  requestId?: string;
  signal?: AbortSignal;
}

export interface Retriever {
  retrieve(input: RetrieveInput): Promise<EvidenceSet>;
}

export interface RetrieverDependencies {
  registry: Pick<IndexRegistry, "current">;
  embedder: Embedder;
  embeddingTimeoutMs: number;
  now?: () => number;
  recordRetrievalLatency?: typeof recordRetrievalLatency;
  logInfo?: typeof logInfo;
}

export const describeEmbedding = (descriptor: EmbeddingDescriptor): string =>
  `${descriptor.model}/${descriptor.dimension}/${descriptor.normalize ? "normalized" : "raw"}`;

export function assertEmbeddingCompatible(query: EmbeddingDescriptor, index: EmbeddingDescriptor): void {
  if (query.model !== index.model || query.dimension !== index.dimension || query.normalize !== index.normalize) {
    throw new EmbeddingMismatchError(
      `Query embedder ${describeEmbedding(query)} does not match index embedding ${describeEmbedding(index)}.`
    );
  }
}

export function createRetriever(dependencies: RetrieverDependencies): Retriever {
  const now = dependencies.now ?? Date.now;
  const recordLatency = dependencies.recordRetrievalLatency ?? recordRetrievalLatency;
  const info = dependencies.logInfo ?? logInfo;

  return {
    async retrieve(input) {
      const startedAt = now();
      const snapshot = dependencies.registry.current();
      if (snapshot.backend.size === 0) {
        throw new EmptyCorpusError();
      }
      assertEmbeddingCompatible(dependencies.embedder.descriptor, snapshot.embedding);

      let rawVector: number[];
      try {
        rawVector = await withTimeout(
          (signal) => dependencies.embedder.embed(input.query, signal),
          dependencies.embeddingTimeoutMs,
          { label: "query embedding", parentSignal: input.signal }
        );
      } catch (error) {
        if (error instanceof UpstreamUnavailableError) {
          throw error;
        }
        const message = error instanceof Error ? error.message : "unknown embedding error";
        throw new UpstreamUnavailableError(`Query embedding failed: ${message}`, { cause: error });
      }

      const queryVector = prepareVector(rawVector, snapshot.embedding);
      const evidence = await searchIndex(snapshot, queryVector, input.k, {
        requestId: input.requestId,
        signal: input.signal
      });

      const latencyMs = now() - startedAt;
      recordLatency(latencyMs);
      info(
        "rag.retrieve.complete",
        { requestId: input.requestId ?? null, stage: "retrieve" },
        {
          latency_ms: latencyMs,
          requested_k: evidence.requestedK,
          effective_k: evidence.effectiveK,
          result_count: evidence.items.length,
          dropped_count: evidence.droppedIds.length,
          top_score: evidence.items[0]?.score ?? null,
          snapshot_version: evidence.snapshotVersion
        }
      );

      return evidence;
    }
  };
}
