import OpenAI from "openai";
import { config } from "../config/index.js";
import { UpstreamUnavailableError } from "../errors.js";

type HealthStatus = "ok" | "error";

export interface OpenAISingleton {
  client: OpenAI;
  healthCheck: () => Promise<{ status: HealthStatus; details?: string }>;
}

export interface JsonCompletionRequest {
  model: string;
  system: string;
  user: string;
  signal?: AbortSignal;
  /** Overrides the client-wide request timeout for calls with their own budget. */
  timeoutMs?: number;
}

export type JsonCompletionFn = (request: JsonCompletionRequest) => Promise<string>;

export interface EmbeddingRequest {
  model: string;
  input: string;
  dimensions?: number;
  signal?: AbortSignal;
  timeoutMs?: number;
}

export type EmbeddingFn = (request: EmbeddingRequest) => Promise<number[]>;

const REQUEST_TIMEOUT_MS = 7000;
const REQUEST_RETRIES = 1;

// A caller-owned budget already bounds the whole call, so the client must not cut it short or retry past it.
export const perCallRequestOptions = (
  request: { signal?: AbortSignal; timeoutMs?: number }
): { signal?: AbortSignal; timeout?: number; maxRetries?: number } =>
  request.timeoutMs === undefined
    ? { signal: request.signal }
    : { signal: request.signal, timeout: request.timeoutMs, maxRetries: 0 };

let singleton: OpenAISingleton | null = null;

function initialize(): OpenAISingleton {
  const apiKey = config.OPENAI_API_KEY;
  if (!apiKey) {
    throw new UpstreamUnavailableError("OPENAI_API_KEY is missing.");
  }

  const client = new OpenAI({
    apiKey,
    maxRetries: REQUEST_RETRIES,
    timeout: REQUEST_TIMEOUT_MS
  });

  console.info("[clients/openai] initialized singleton");

  return {
    client,
    async healthCheck() {
      try {
        await client.models.retrieve(config.OPENAI_MODEL, { timeout: REQUEST_TIMEOUT_MS });
        return { status: "ok" };
      } catch (error) {
        const details = error instanceof Error ? error.message : "unknown error";
        return { status: "error", details };
      }
    }
  };
}

export async function getOpenAIClient(): Promise<OpenAISingleton> {
  if (!singleton) {
    singleton = initialize();
  }

  return singleton;
}

export async function shutdownOpenAIClient(): Promise<void> {
  if (!singleton) {
    return;
  }

  singleton = null;
  console.info("[clients/openai] shutdown complete");
}

export function resetOpenAIClientForTests(): void {
  singleton = null;
}

export const normalizeCompletionContent = (value: unknown): string => {
  if (typeof value === "string") {
    return value;
  }

  if (Array.isArray(value)) {
    return value
      .map((part: unknown) => {
        if (typeof part === "string") {
          return part;
        }
        if (part && typeof part === "object" && "text" in part && typeof part.text === "string") {
          return part.text;
        }
        return "";
      })
      .join("");
  }

  return "";
};

const wrapUpstreamError = (label: string, error: unknown): UpstreamUnavailableError => {
  if (error instanceof UpstreamUnavailableError) {
    return error;
  }
  const message = error instanceof Error ? error.message : "unknown openai error";
  return new UpstreamUnavailableError(`${label} failed: ${message}`, { cause: error });
};

/** Chat completion constrained to a JSON object reply; returns the raw content. */
export const requestJsonCompletion: JsonCompletionFn = async (request) => {
  try {
    const { client } = await getOpenAIClient();
    const response = await client.chat.completions.create(
      {
        model: request.model,
        temperature: 0,
        response_format: { type: "json_object" },
        messages: [
          { role: "system", content: request.system },
          { role: "user", content: request.user }
        ]
      },
      perCallRequestOptions(request)
    );
    return normalizeCompletionContent(response.choices[0]?.message?.content);
  } catch (error) {
    throw wrapUpstreamError("OpenAI chat completion", error);
  }
};

export const requestEmbedding: EmbeddingFn = async (request) => {
  let embedding: number[] | undefined;
  try {
    const { client } = await getOpenAIClient();
    const response = await client.embeddings.create(
      {
        model: request.model,
        input: request.input,
        ...(request.dimensions ? { dimensions: request.dimensions } : {})
      },
      perCallRequestOptions(request)
    );
    embedding = response.data[0]?.embedding;
  } catch (error) {
    throw wrapUpstreamError("OpenAI embeddings", error);
  }

  if (!embedding || embedding.length === 0) {
    throw new UpstreamUnavailableError("Embedding response missing vector payload.");
  }
  return embedding;
};
