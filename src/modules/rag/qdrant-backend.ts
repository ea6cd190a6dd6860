import { IndexUnavailableError } from "../../errors.js";
import type { RawHit, VectorSearchBackend, VectorSearchRequest } from "./types.js";

type QdrantPoint = {
  id: string | number;
  score: number;
};

/** The slice of `QdrantClient` this backend relies on. */
export interface QdrantSearchPort {
  search(
    collectionName: string,
    request: { vector: number[]; limit: number; with_payload: boolean; with_vector: boolean }
  ): Promise<QdrantPoint[]>;
  count(collectionName: string, request: { exact: boolean }): Promise<{ count: number }>;
}

export interface CreateQdrantBackendOptions {
  client: QdrantSearchPort;
  collection: string;
}

const toNumericId = (id: string | number): number => {
  if (typeof id === "number") {
    return id;
  }
  const parsed = Number(id);
  // Non-numeric (UUID) ids cannot resolve against the metadata table.
  return Number.isInteger(parsed) ? parsed : Number.NaN;
};

export async function createQdrantBackend(options: CreateQdrantBackendOptions): Promise<VectorSearchBackend> {
  let size: number;
  try {
    const result = await options.client.count(options.collection, { exact: true });
    size = result.count;
  } catch (error) {
    const message = error instanceof Error ? error.message : "unknown qdrant error";
    throw new IndexUnavailableError(`Qdrant health error: ${message}`, { cause: error });
  }

  return {
    kind: "qdrant",
    size,
    async search(request: VectorSearchRequest): Promise<RawHit[]> {
      try {
        const points = await options.client.search(options.collection, {
          vector: request.vector,
          limit: request.limit,
          with_payload: false,
          with_vector: false
        });
        return points.map((point) => ({ id: toNumericId(point.id), score: point.score }));
      } catch (error) {
        const message = error instanceof Error ? error.message : "unknown qdrant error";
        throw new IndexUnavailableError(`Qdrant health error: ${message}`, { cause: error });
      }
    }
  };
}
