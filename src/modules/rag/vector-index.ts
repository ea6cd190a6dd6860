import { EmptyCorpusError, IndexAlignmentError, IndexUnavailableError } from "../../errors.js";
import { logWarn } from "../../observability/logger.js";
import type {
  Chunk,
  EmbeddingDescriptor,
  EvidenceSet,
  IndexEntry,
  IndexSnapshot,
  RawHit,
  ScoredChunk,
  VectorSearchBackend,
  VectorSearchRequest
} from "./types.js";

/**
 * The single vector transform shared by snapshot building and query time.
 * Both sides must go through it or scores stop meaning cosine similarity.
 */
export function prepareVector(vector: readonly number[], descriptor: EmbeddingDescriptor): number[] {
  if (vector.length !== descriptor.dimension) {
    throw new IndexUnavailableError(
      `Vector dimension ${vector.length} does not match embedding dimension ${descriptor.dimension}.`
    );
  }
  if (vector.some((value) => !Number.isFinite(value))) {
    throw new IndexUnavailableError("Vector contains non-finite values.");
  }
  if (!descriptor.normalize) {
    return [...vector];
  }

  const norm = Math.sqrt(vector.reduce((sum, value) => sum + value * value, 0));
  if (norm === 0) {
    return vector.map(() => 0);
  }
  return vector.map((value) => value / norm);
}

const dot = (a: readonly number[], b: readonly number[]): number => {
  let total = 0;
  for (let i = 0; i < a.length; i += 1) {
    total += (a[i] ?? 0) * (b[i] ?? 0);
  }
  return total;
};

export const compareScoredDescending = (a: RawHit, b: RawHit): number =>
  b.score - a.score || a.id - b.id;

/** Exact inner-product search over prepared vectors held in memory. */
export class InMemoryVectorBackend implements VectorSearchBackend {
  readonly kind = "memory" as const;
  private readonly entries: readonly IndexEntry[];

  constructor(entries: readonly IndexEntry[]) {
    this.entries = entries.map((entry) => ({ id: entry.id, vector: [...entry.vector] }));
  }

  get size(): number {
    return this.entries.length;
  }

  async search(request: VectorSearchRequest): Promise<RawHit[]> {
    return this.entries
      .map((entry) => ({ id: entry.id, score: dot(entry.vector, request.vector) }))
      .sort(compareScoredDescending)
      .slice(0, Math.max(0, request.limit));
  }
}

const findDuplicates = (ids: number[]): number[] => {
  const seen = new Set<number>();
  const duplicates = new Set<number>();
  for (const id of ids) {
    if (seen.has(id)) {
      duplicates.add(id);
    }
    seen.add(id);
  }
  return [...duplicates];
};

export const indexChunks = (chunks: readonly Chunk[]): Map<number, Chunk> => {
  const duplicates = findDuplicates(chunks.map((chunk) => chunk.id));
  if (duplicates.length > 0) {
    throw new IndexAlignmentError(`Duplicate chunk metadata ids: ${duplicates.join(", ")}.`);
  }
  return new Map(chunks.map((chunk) => [chunk.id, Object.freeze({ ...chunk, metadata: Object.freeze({ ...chunk.metadata }) })]));
};

export interface BuildMemorySnapshotInput {
  version: string;
  embedding: EmbeddingDescriptor;
  entries: readonly IndexEntry[];
  chunks: readonly Chunk[];
  now?: () => Date;
}

/**
 * Builds a new in-memory snapshot, rejecting any artifact pair whose vector
 * identifiers and metadata identifiers are not in one-to-one correspondence.
 */
export function buildMemorySnapshot(input: BuildMemorySnapshotInput): IndexSnapshot {
  const chunks = indexChunks(input.chunks);
  const entryIds = input.entries.map((entry) => entry.id);
  const duplicateVectors = findDuplicates(entryIds);
  if (duplicateVectors.length > 0) {
    throw new IndexAlignmentError(`Duplicate vector ids: ${duplicateVectors.join(", ")}.`);
  }

  const vectorIds = new Set(entryIds);
  const missingMetadataIds = entryIds.filter((id) => !chunks.has(id));
  const missingVectorIds = [...chunks.keys()].filter((id) => !vectorIds.has(id));
  if (missingMetadataIds.length > 0 || missingVectorIds.length > 0) {
    throw new IndexAlignmentError(
      `Index/metadata mismatch: ${missingMetadataIds.length} vector(s) without metadata, ${missingVectorIds.length} metadata record(s) without vector.`,
      { missingMetadataIds, missingVectorIds }
    );
  }

  const prepared = input.entries.map((entry) => ({
    id: entry.id,
    vector: prepareVector(entry.vector, input.embedding)
  }));

  return {
    version: input.version,
    builtAt: (input.now ?? (() => new Date()))().toISOString(),
    embedding: { ...input.embedding },
    backend: new InMemoryVectorBackend(prepared),
    chunks
  };
}

export const clampK = (requestedK: number, corpusSize: number): number => {
  const whole = Number.isFinite(requestedK) ? Math.floor(requestedK) : 1;
  return Math.min(Math.max(1, whole), corpusSize);
};

export interface SearchIndexOptions {
  requestId?: string;
  signal?: AbortSignal;
}

/**
 * Searches a snapshot with an already-prepared query vector. Hits whose
 * identifier has no metadata record are dropped and logged, never returned.
 */
export async function searchIndex(
  snapshot: IndexSnapshot | null,
  queryVector: number[],
  requestedK: number,
  options: SearchIndexOptions = {}
): Promise<EvidenceSet> {
  if (!snapshot) {
    throw new IndexUnavailableError("Vector index is not loaded.");
  }
  const corpusSize = snapshot.backend.size;
  if (corpusSize === 0) {
    throw new EmptyCorpusError();
  }

  const effectiveK = clampK(requestedK, corpusSize);
  const hits = await snapshot.backend.search({
    vector: queryVector,
    limit: effectiveK,
    signal: options.signal
  });

  const items: ScoredChunk[] = [];
  const droppedIds: number[] = [];
  const seen = new Set<number>();
  for (const hit of [...hits].sort(compareScoredDescending)) {
    const chunk = snapshot.chunks.get(hit.id);
    if (!chunk || !Number.isFinite(hit.score)) {
      droppedIds.push(hit.id);
      continue;
    }
    if (seen.has(hit.id)) {
      continue;
    }
    seen.add(hit.id);
    items.push({ chunk, score: hit.score });
  }

  if (droppedIds.length > 0) {
    logWarn(
      "rag.search.orphan_ids_dropped",
      { requestId: options.requestId ?? null, stage: "retrieve" },
      {
        snapshot_version: snapshot.version,
        dropped_ids: droppedIds,
        raw_hit_count: hits.length
      }
    );
  }

  return {
    items: items.slice(0, effectiveK),
    requestedK,
    effectiveK,
    droppedIds,
    snapshotVersion: snapshot.version
  };
}
