import { requestEmbedding, requestJsonCompletion } from "../../clients/openai.js";
import { getQdrantClient } from "../../clients/qdrant.js";
import type { Config } from "../../config/index.js";
import { loadIntakePolicy } from "../../config/intake-policy.js";
import { createAuditor } from "../audit/auditor.js";
import { ModelAnswerReviewer } from "../audit/model-reviewer.js";
import { createModelDrafter } from "../drafting/model-drafter.js";
import { IntakeGuard } from "../intake/intake-guard.js";
import { ModelScopeClassifier } from "../intake/scope-classifier.js";
import type { IntakePolicy } from "../intake/types.js";
import { createOpenAIEmbedder } from "../rag/embedder.js";
import { loadMemorySnapshot, loadQdrantSnapshot } from "../rag/index-artifacts.js";
import type { IndexRegistry, SnapshotLoader } from "../rag/index-registry.js";
import { createRetriever } from "../rag/retriever.js";
import { GuardedAnswerPipeline } from "./pipeline.js";
import { PostgresReviewRepository, logOnlyReviewSink } from "./review-repository.js";

type PipelineConfig = Pick<
  Config,
  | "INDEX_BACKEND"
  | "INDEX_DIR"
  | "QDRANT_COLLECTION"
  | "OPENAI_API_KEY"
  | "OPENAI_MODEL"
  | "OPENAI_SCOPE_MODEL"
  | "OPENAI_AUDIT_MODEL"
  | "OPENAI_EMBEDDING_MODEL"
  | "OPENAI_EMBEDDING_DIMENSIONS"
  | "POSTGRES_URL"
  | "DEFAULT_TOP_K"
  | "MAX_TOP_K"
  | "MIN_EVIDENCE"
  | "CLASSIFIER_TIMEOUT_MS"
  | "DRAFTER_TIMEOUT_MS"
  | "EMBEDDING_TIMEOUT_MS"
  | "AUDIT_TIMEOUT_MS"
  | "INTAKE_POLICY_FILE"
>;

export function createSnapshotLoader(config: Pick<Config, "INDEX_BACKEND" | "INDEX_DIR" | "QDRANT_COLLECTION">): SnapshotLoader {
  if (config.INDEX_BACKEND === "qdrant") {
    return async () => {
      const { client } = await getQdrantClient();
      return loadQdrantSnapshot({ indexDir: config.INDEX_DIR, collection: config.QDRANT_COLLECTION, client });
    };
  }
  return () => loadMemorySnapshot({ indexDir: config.INDEX_DIR });
}

export interface DefaultPipelineOptions {
  config: PipelineConfig;
  registry: IndexRegistry;
  policy?: IntakePolicy;
}

/** Production wiring: OpenAI for scope, embeddings, drafting and answer review; Postgres for review when configured. */
export function createDefaultPipeline(options: DefaultPipelineOptions): GuardedAnswerPipeline {
  const { config, registry } = options;
  const policy = options.policy ?? loadIntakePolicy(config.INTAKE_POLICY_FILE);

  const intake = new IntakeGuard(policy, {
    classifier: config.OPENAI_API_KEY
      ? new ModelScopeClassifier({ completeJson: requestJsonCompletion, model: config.OPENAI_SCOPE_MODEL })
      : null,
    classifierTimeoutMs: config.CLASSIFIER_TIMEOUT_MS
  });

  const retriever = createRetriever({
    registry,
    embedder: createOpenAIEmbedder({
      model: config.OPENAI_EMBEDDING_MODEL,
      dimension: config.OPENAI_EMBEDDING_DIMENSIONS,
      embed: requestEmbedding
    }),
    embeddingTimeoutMs: config.EMBEDDING_TIMEOUT_MS
  });

  const drafter = createModelDrafter({
    completeJson: requestJsonCompletion,
    model: config.OPENAI_MODEL,
    timeoutMs: config.DRAFTER_TIMEOUT_MS
  });

  const audit = createAuditor({
    reviewer: config.OPENAI_API_KEY
      ? new ModelAnswerReviewer({
          completeJson: requestJsonCompletion,
          model: config.OPENAI_AUDIT_MODEL,
          timeoutMs: config.AUDIT_TIMEOUT_MS
        })
      : null,
    reviewerTimeoutMs: config.AUDIT_TIMEOUT_MS
  });

  return new GuardedAnswerPipeline({
    intake,
    retriever,
    drafter,
    audit,
    reviewSink: config.POSTGRES_URL ? new PostgresReviewRepository() : logOnlyReviewSink,
    defaultK: config.DEFAULT_TOP_K,
    maxK: config.MAX_TOP_K,
    minEvidence: config.MIN_EVIDENCE
  });
}
