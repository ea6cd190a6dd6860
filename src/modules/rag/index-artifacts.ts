import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { IndexAlignmentError, IndexUnavailableError } from "../../errors.js";
import { createQdrantBackend, type QdrantSearchPort } from "./qdrant-backend.js";
import { buildMemorySnapshot, indexChunks } from "./vector-index.js";
import type { Chunk, EmbeddingDescriptor, IndexSnapshot } from "./types.js";

export const METADATA_FILE = "metadata.json";
export const VECTORS_FILE = "vectors.json";

const embeddingDescriptorSchema = z.object({
  model: z.string().min(1),
  dimension: z.number().int().positive(),
  normalize: z.boolean().default(true)
});

const chunkRecordSchema = z.object({
  id: z.number().int().nonnegative(),
  text: z.string().min(1),
  article: z.string().min(1),
  source: z.string().min(1),
  url: z.string().url(),
  published_at: z.string().nullable().optional()
});

export const metadataArtifactSchema = z.object({
  version: z.string().min(1),
  embedding: embeddingDescriptorSchema,
  chunks: z.array(chunkRecordSchema)
});

export const vectorsArtifactSchema = z.object({
  embedding: embeddingDescriptorSchema,
  entries: z.array(
    z.object({
      id: z.number().int().nonnegative(),
      vector: z.array(z.number())
    })
  )
});

export type MetadataArtifact = z.infer<typeof metadataArtifactSchema>;
export type VectorsArtifact = z.infer<typeof vectorsArtifactSchema>;

type ReadFile = (filePath: string, encoding: "utf8") => Promise<string>;

const readArtifact = async <T>(
  filePath: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  readFile: ReadFile
): Promise<T> => {
  let content: string;
  try {
    content = await readFile(filePath, "utf8");
  } catch (error) {
    const message = error instanceof Error ? error.message : "unknown read error";
    throw new IndexUnavailableError(`Cannot read index artifact ${filePath}: ${message}`, { cause: error });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : "invalid json";
    throw new IndexUnavailableError(`Index artifact ${filePath} is not valid JSON: ${message}`);
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues
      .slice(0, 5)
      .map((issue) => `${issue.path.join(".") || "root"}: ${issue.message}`)
      .join("; ");
    throw new IndexUnavailableError(`Index artifact ${filePath} failed validation: ${details}`);
  }
  return parsed.data;
};

export const toChunks = (artifact: MetadataArtifact): Chunk[] =>
  artifact.chunks.map((record) => ({
    id: record.id,
    text: record.text,
    metadata: {
      article: record.article,
      source: record.source,
      url: record.url,
      publishedAt: record.published_at ?? null
    }
  }));

export const sameEmbedding = (a: EmbeddingDescriptor, b: EmbeddingDescriptor): boolean =>
  a.model === b.model && a.dimension === b.dimension && a.normalize === b.normalize;

export interface LoadArtifactsOptions {
  indexDir: string;
  readFile?: ReadFile;
}

export async function loadMemorySnapshot(options: LoadArtifactsOptions): Promise<IndexSnapshot> {
  const readFile = options.readFile ?? fs.readFile;
  const [metadata, vectors] = await Promise.all([
    readArtifact(path.join(options.indexDir, METADATA_FILE), metadataArtifactSchema, readFile),
    readArtifact(path.join(options.indexDir, VECTORS_FILE), vectorsArtifactSchema, readFile)
  ]);

  if (!sameEmbedding(metadata.embedding, vectors.embedding)) {
    throw new IndexAlignmentError(
      `Artifacts were built with different embeddings: metadata=${metadata.embedding.model}/${metadata.embedding.dimension}, vectors=${vectors.embedding.model}/${vectors.embedding.dimension}.`
    );
  }

  return buildMemorySnapshot({
    version: metadata.version,
    embedding: metadata.embedding,
    entries: vectors.entries,
    chunks: toChunks(metadata)
  });
}

export interface LoadQdrantSnapshotOptions extends LoadArtifactsOptions {
  collection: string;
  client: QdrantSearchPort;
  now?: () => Date;
}

/**
 * Pairs a Qdrant collection with the local metadata artifact. The point count
 * must equal the metadata record count; per-id drift is caught at query time.
 */
export async function loadQdrantSnapshot(options: LoadQdrantSnapshotOptions): Promise<IndexSnapshot> {
  const readFile = options.readFile ?? fs.readFile;
  const metadata = await readArtifact(path.join(options.indexDir, METADATA_FILE), metadataArtifactSchema, readFile);
  const chunks = indexChunks(toChunks(metadata));
  const backend = await createQdrantBackend({
    client: options.client,
    collection: options.collection
  });

  if (backend.size !== chunks.size) {
    throw new IndexAlignmentError(
      `Index/metadata mismatch: collection ${options.collection} holds ${backend.size} point(s), metadata holds ${chunks.size} record(s).`
    );
  }

  return {
    version: metadata.version,
    builtAt: (options.now ?? (() => new Date()))().toISOString(),
    embedding: metadata.embedding,
    backend,
    chunks
  };
}
