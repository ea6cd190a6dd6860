import { describe, expect, it, vi } from "vitest";
import { buildAllowedFrontendOrigins, buildApp } from "../../src/app.js";
import { loadIntakePolicy } from "../../src/config/intake-policy.js";
import { templateDrafter } from "../../src/modules/drafting/template-drafter.js";
import { IntakeGuard } from "../../src/modules/intake/intake-guard.js";
import { GuardedAnswerPipeline } from "../../src/modules/pipeline/pipeline.js";
import { IndexRegistry } from "../../src/modules/rag/index-registry.js";
import { createRetriever } from "../../src/modules/rag/retriever.js";
import { DEFECT_QUERY, buildCorpusSnapshot, createBagOfWordsEmbedder } from "../../tests/helpers/corpus.js";

const buildTestApp = async (loaded: boolean) => {
  const registry = new IndexRegistry();
  if (loaded) {
    registry.swap(buildCorpusSnapshot());
  }
  const pipeline = new GuardedAnswerPipeline({
    intake: new IntakeGuard(loadIntakePolicy(), { classifier: null, classifierTimeoutMs: 50 }),
    retriever: createRetriever({ registry, embedder: createBagOfWordsEmbedder(), embeddingTimeoutMs: 100 }),
    drafter: templateDrafter,
    defaultK: 3,
    maxK: 8
  });
  return buildApp({ pipeline, registry, registerInfrastructureHealth: false, logger: false });
};

describe("buildAllowedFrontendOrigins", () => {
  it("defaults to the local frontend on both loopback names", () => {
    expect(buildAllowedFrontendOrigins(undefined)).toEqual(["http://localhost:5173", "http://127.0.0.1:5173"]);
  });

  it("adds loopback aliases and keeps unparsable entries as given", () => {
    expect(buildAllowedFrontendOrigins("http://localhost:3000, invalid-url, http://localhost:3000")).toEqual([
      "http://localhost:3000",
      "invalid-url",
      "http://127.0.0.1:3000"
    ]);
  });
});

describe("buildApp", () => {
  it("answers a consumer question end to end", async () => {
    vi.spyOn(console, "info").mockImplementation(() => undefined);
    const app = await buildTestApp(true);
    try {
      const response = await app.inject({
        method: "POST",
        url: "/ask",
        headers: { "x-request-id": "req-e2e" },
        payload: { query: DEFECT_QUERY }
      });

      expect(response.statusCode).toBe(200);
      const body: unknown = response.json();
      expect(body).toMatchObject({
        status: "succeeded",
        meta: { requestId: "req-e2e", retrievalHits: 3, degraded: false },
        answer: {
          citations: [{ chunkIds: [1] }, { chunkIds: [2] }, { chunkIds: [3] }]
        }
      });
    } finally {
      await app.close();
    }
  });

  it("answers 503 while no index is loaded", async () => {
    vi.spyOn(console, "info").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const app = await buildTestApp(false);
    try {
      const ask = await app.inject({ method: "POST", url: "/ask", payload: { query: DEFECT_QUERY } });
      expect(ask.statusCode).toBe(503);
      expect(ask.json()).toMatchObject({ status: "failed", reason: "IndexUnavailable" });

      const health = await app.inject({ method: "GET", url: "/health" });
      expect(health.statusCode).toBe(503);
    } finally {
      await app.close();
    }
  });

  it("exposes metrics and allows the configured origin", async () => {
    const app = await buildTestApp(true);
    try {
      const preflight = await app.inject({
        method: "OPTIONS",
        url: "/ask",
        headers: { origin: "http://127.0.0.1:5173", "access-control-request-method": "POST" }
      });
      expect(preflight.headers["access-control-allow-origin"]).toBe("http://127.0.0.1:5173");

      const metrics = await app.inject({ method: "GET", url: "/metrics" });
      expect(metrics.statusCode).toBe(200);
    } finally {
      await app.close();
    }
  });
});
