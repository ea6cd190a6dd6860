export interface ChunkMetadata {
  article: string;
  source: string;
  url: string;
  publishedAt: string | null;
}

export interface Chunk {
  id: number;
  text: string;
  metadata: ChunkMetadata;
}

export interface IndexEntry {
  id: number;
  vector: number[];
}

export interface EmbeddingDescriptor {
  model: string;
  dimension: number;
  normalize: boolean;
}

export interface RawHit {
  id: number;
  score: number;
}

export interface VectorSearchRequest {
  vector: number[];
  limit: number;
  signal?: AbortSignal;
}

/** Nearest-neighbour backend; returns identifiers only, never metadata. */
export interface VectorSearchBackend {
  readonly kind: "memory" | "qdrant";
  readonly size: number;
  search(request: VectorSearchRequest): Promise<RawHit[]>;
}

export interface IndexSnapshot {
  version: string;
  builtAt: string;
  embedding: EmbeddingDescriptor;
  backend: VectorSearchBackend;
  chunks: ReadonlyMap<number, Chunk>;
}

export interface ScoredChunk {
  chunk: Chunk;
  score: number;
}

export interface EvidenceSet {
  items: ScoredChunk[];
  requestedK: number;
  effectiveK: number;
  droppedIds: number[];
  snapshotVersion: string;
}

export interface Embedder {
  readonly descriptor: EmbeddingDescriptor;
  embed(text: string, signal?: AbortSignal): Promise<number[]>;
}
