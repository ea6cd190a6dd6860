import { QdrantClient } from "@qdrant/js-client-rest";
import { config } from "../config/index.js";

type HealthStatus = "ok" | "error";

export interface QdrantSingleton {
  client: QdrantClient;
  healthCheck: () => Promise<{ status: HealthStatus; details?: string }>;
}

const REQUEST_TIMEOUT_MS = 5000;
const REQUEST_RETRIES = 3;
const REQUEST_RETRY_DELAY_MS = 250;

let singleton: QdrantSingleton | null = null;
let initPromise: Promise<QdrantSingleton> | null = null;

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

async function withRetries<T>(operation: () => Promise<T>): Promise<T> {
  let lastError: unknown;

  for (let attempt = 1; attempt <= REQUEST_RETRIES; attempt += 1) {
    try {
      return await operation();
    } catch (error) {
      lastError = error;
      if (attempt < REQUEST_RETRIES) {
        await delay(REQUEST_RETRY_DELAY_MS * attempt);
      }
    }
  }

  throw lastError;
}

async function initialize(): Promise<QdrantSingleton> {
  const url = config.QDRANT_URL;
  if (!url) {
    throw new Error("QDRANT_URL is missing; set it or use INDEX_BACKEND=local.");
  }

  const client = new QdrantClient({
    url,
    apiKey: config.QDRANT_API_KEY,
    timeout: REQUEST_TIMEOUT_MS
  });

  await withRetries(async () => {
    await client.getCollections();
  });

  console.info("[clients/qdrant] initialized singleton");

  return {
    client,
    async healthCheck() {
      try {
        const { exists } = await client.collectionExists(config.QDRANT_COLLECTION);
        return exists
          ? { status: "ok" }
          : { status: "error", details: `collection ${config.QDRANT_COLLECTION} does not exist` };
      } catch (error) {
        const details = error instanceof Error ? error.message : "unknown error";
        return { status: "error", details };
      }
    }
  };
}

export async function getQdrantClient(): Promise<QdrantSingleton> {
  if (singleton) {
    return singleton;
  }

  if (!initPromise) {
    initPromise = initialize().catch((error: unknown) => {
      initPromise = null;
      throw error;
    });
  }

  singleton = await initPromise;
  return singleton;
}

export async function shutdownQdrantClient(): Promise<void> {
  if (!singleton) {
    return;
  }

  singleton = null;
  initPromise = null;
  console.info("[clients/qdrant] shutdown complete");
}

export function resetQdrantClientForTests(): void {
  singleton = null;
  initPromise = null;
}
