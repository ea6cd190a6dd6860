import type { EmbeddingFn } from "../../clients/openai.js";
import type { Embedder, EmbeddingDescriptor } from "./types.js";

export interface OpenAIEmbedderOptions {
  model: string;
  dimension: number;
  embed: EmbeddingFn;
}

export function createOpenAIEmbedder(options: OpenAIEmbedderOptions): Embedder {
  const descriptor: EmbeddingDescriptor = {
    model: options.model,
    dimension: options.dimension,
    normalize: true
  };

  return {
    descriptor,
    embed(text, signal) {
      return options.embed({
        model: options.model,
        input: text,
        dimensions: options.dimension,
        signal
      });
    }
  };
}
