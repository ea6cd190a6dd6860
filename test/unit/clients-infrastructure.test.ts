import Fastify from "fastify";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { ManagedClient } from "../../src/clients/lifecycle.js";

describe("clients/openai", () => {
  beforeEach(() => {
    vi.resetModules();
  });

  afterEach(() => {
    vi.doUnmock("../../src/config/index.js");
    vi.doUnmock("openai");
  });

  async function importOpenAIClientModule(options: { apiKey?: string; client?: Record<string, unknown> } = {}) {
    vi.doMock("../../src/config/index.js", () => ({
      config: {
        OPENAI_API_KEY: "apiKey" in options ? options.apiKey : "test-secret",
        OPENAI_MODEL: "gpt-test"
      }
    }));

    const client = options.client ?? { models: { retrieve: vi.fn(async () => ({ id: "gpt-test" })) } };
    const OpenAIConstructor = vi.fn().mockImplementation(() => client);
    vi.doMock("openai", () => ({ default: OpenAIConstructor }));

    const mod = await import("../../src/clients/openai.js");
    return { mod, OpenAIConstructor };
  }

  it("constructs one client with bounded retries and reuses it", async () => {
    vi.spyOn(console, "info").mockImplementation(() => undefined);
    const { mod, OpenAIConstructor } = await importOpenAIClientModule();

    const first = await mod.getOpenAIClient();
    const second = await mod.getOpenAIClient();

    expect(first).toBe(second);
    expect(OpenAIConstructor).toHaveBeenCalledTimes(1);
    expect(OpenAIConstructor).toHaveBeenCalledWith({ apiKey: "test-secret", maxRetries: 1, timeout: 7000 });
    await expect(first.healthCheck()).resolves.toEqual({ status: "ok" });
  });

  it("refuses to start without an API key", async () => {
    const { mod } = await importOpenAIClientModule({ apiKey: undefined });
    await expect(mod.getOpenAIClient()).rejects.toMatchObject({ code: "UpstreamUnavailable" });
  });

  it("reports health check failures instead of throwing", async () => {
    vi.spyOn(console, "info").mockImplementation(() => undefined);
    const { mod } = await importOpenAIClientModule({
      client: { models: { retrieve: vi.fn().mockRejectedValue(new Error("401 invalid key")) } }
    });

    const singleton = await mod.getOpenAIClient();
    await expect(singleton.healthCheck()).resolves.toEqual({ status: "error", details: "401 invalid key" });
  });

  it("returns the raw JSON completion and wraps provider errors", async () => {
    vi.spyOn(console, "info").mockImplementation(() => undefined);
    const create = vi
      .fn()
      .mockResolvedValueOnce({ choices: [{ message: { content: '{"domain":"in-scope"}' } }] })
      .mockRejectedValueOnce(new Error("rate limited"));
    const { mod } = await importOpenAIClientModule({ client: { chat: { completions: { create } } } });

    await expect(mod.requestJsonCompletion({ model: "gpt-test", system: "s", user: "u" })).resolves.toBe(
      '{"domain":"in-scope"}'
    );
    expect(create.mock.calls[0]?.[0]).toMatchObject({
      model: "gpt-test",
      temperature: 0,
      response_format: { type: "json_object" },
      messages: [
        { role: "system", content: "s" },
        { role: "user", content: "u" }
      ]
    });

    expect(create.mock.calls[0]?.[1]).toEqual({ signal: undefined });

    await expect(mod.requestJsonCompletion({ model: "gpt-test", system: "s", user: "u" })).rejects.toThrow(
      "OpenAI chat completion failed: rate limited"
    );
  });

  it("lets a per-call timeout replace the client-wide timeout and retries", async () => {
    vi.spyOn(console, "info").mockImplementation(() => undefined);
    const create = vi.fn().mockResolvedValue({ choices: [{ message: { content: "{}" } }] });
    const { mod } = await importOpenAIClientModule({ client: { chat: { completions: { create } } } });
    const controller = new AbortController();

    await mod.requestJsonCompletion({ model: "gpt-test", system: "s", user: "u", signal: controller.signal, timeoutMs: 20000 });

    expect(create.mock.calls[0]?.[1]).toEqual({ signal: controller.signal, timeout: 20000, maxRetries: 0 });
  });

  it("returns embedding vectors and rejects empty payloads", async () => {
    vi.spyOn(console, "info").mockImplementation(() => undefined);
    const create = vi
      .fn()
      .mockResolvedValueOnce({ data: [{ embedding: [0.1, 0.2] }] })
      .mockResolvedValueOnce({ data: [] });
    const { mod } = await importOpenAIClientModule({ client: { embeddings: { create } } });

    await expect(mod.requestEmbedding({ model: "emb", input: "texto", dimensions: 2 })).resolves.toEqual([0.1, 0.2]);
    expect(create.mock.calls[0]?.[0]).toEqual({ model: "emb", input: "texto", dimensions: 2 });
    await expect(mod.requestEmbedding({ model: "emb", input: "texto" })).rejects.toThrow(
      "Embedding response missing vector payload."
    );
  });

  it("flattens content parts into text", async () => {
    const { mod } = await importOpenAIClientModule();
    expect(mod.normalizeCompletionContent(["{", { text: '"a":1' }, { type: "image" }, "}"])).toBe('{"a":1}');
    expect(mod.normalizeCompletionContent(null)).toBe("");
  });
});

describe("clients/postgres", () => {
  beforeEach(() => {
    vi.resetModules();
    vi.useRealTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.doUnmock("../../src/config/index.js");
    vi.doUnmock("pg");
  });

  async function importPostgresClientModule(pool: Record<string, unknown>, postgresUrl: string | undefined = "postgres://test/db") {
    vi.doMock("../../src/config/index.js", () => ({ config: { POSTGRES_URL: postgresUrl } }));
    const PoolConstructor = vi.fn().mockImplementation(() => pool);
    vi.doMock("pg", () => ({ Pool: PoolConstructor }));
    const mod = await import("../../src/clients/postgres.js");
    return { mod, PoolConstructor };
  }

  it("requires a connection string", async () => {
    const { mod, PoolConstructor } = await importPostgresClientModule({}, undefined);
    await expect(mod.getPostgresClient()).rejects.toThrow("POSTGRES_URL is missing");
    expect(PoolConstructor).not.toHaveBeenCalled();
  });

  it("retries startup queries and coalesces concurrent initialisation", async () => {
    vi.useFakeTimers();
    vi.spyOn(console, "info").mockImplementation(() => undefined);
    const pool = {
      query: vi
        .fn()
        .mockRejectedValueOnce(new Error("db not ready"))
        .mockRejectedValueOnce(new Error("db still not ready"))
        .mockResolvedValue({ rows: [] }),
      end: vi.fn(async () => undefined)
    };
    const { mod, PoolConstructor } = await importPostgresClientModule(pool);

    const pendingA = mod.getPostgresClient();
    const pendingB = mod.getPostgresClient();
    await vi.advanceTimersByTimeAsync(1000);
    const [clientA, clientB] = await Promise.all([pendingA, pendingB]);

    expect(clientA).toBe(clientB);
    expect(PoolConstructor).toHaveBeenCalledTimes(1);
    expect(pool.query).toHaveBeenCalledTimes(3);
    expect(pool.query).toHaveBeenNthCalledWith(3, "SELECT 1");
  });

  it("commits successful transactions and rolls back failed ones", async () => {
    vi.spyOn(console, "info").mockImplementation(() => undefined);
    const txClient = {
      query: vi.fn(async (sql: string) => {
        if (sql === "SELECT fail") {
          throw new Error("tx fail");
        }
        return { rows: [] };
      }),
      release: vi.fn()
    };
    const pool = {
      query: vi.fn().mockResolvedValue({ rows: [] }),
      end: vi.fn(async () => undefined),
      connect: vi.fn().mockResolvedValue(txClient)
    };
    const { mod } = await importPostgresClientModule(pool);

    await expect(
      mod.withTransaction(async (client) => {
        await client.query("SELECT 42");
        return 42;
      })
    ).resolves.toBe(42);
    expect(txClient.query.mock.calls.map(([sql]) => sql)).toEqual(["BEGIN", "SELECT 42", "COMMIT"]);

    txClient.query.mockClear();
    await expect(
      mod.withTransaction(async (client) => {
        await client.query("SELECT fail");
        return 1;
      })
    ).rejects.toThrow("tx fail");
    expect(txClient.query.mock.calls.map(([sql]) => sql)).toEqual(["BEGIN", "SELECT fail", "ROLLBACK"]);
    expect(txClient.release).toHaveBeenCalledTimes(2);
  });

  it("ends the pool on shutdown and reconnects afterwards", async () => {
    vi.spyOn(console, "info").mockImplementation(() => undefined);
    const pool = { query: vi.fn().mockResolvedValue({ rows: [] }), end: vi.fn(async () => undefined) };
    const { mod, PoolConstructor } = await importPostgresClientModule(pool);

    const first = await mod.getPostgresClient();
    await mod.shutdownPostgresClient();
    const second = await mod.getPostgresClient();

    expect(pool.end).toHaveBeenCalledTimes(1);
    expect(first).not.toBe(second);
    expect(PoolConstructor).toHaveBeenCalledTimes(2);
  });
});

describe("clients/qdrant", () => {
  beforeEach(() => {
    vi.resetModules();
    vi.useRealTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.doUnmock("../../src/config/index.js");
    vi.doUnmock("@qdrant/js-client-rest");
  });

  async function importQdrantClientModule(remoteClient: Record<string, unknown>, qdrantUrl: string | undefined = "http://localhost:6333") {
    vi.doMock("../../src/config/index.js", () => ({
      config: { QDRANT_URL: qdrantUrl, QDRANT_API_KEY: "test-secret", QDRANT_COLLECTION: "cdc_chunks" }
    }));
    const QdrantClientConstructor = vi.fn().mockImplementation(() => remoteClient);
    vi.doMock("@qdrant/js-client-rest", () => ({ QdrantClient: QdrantClientConstructor }));
    const mod = await import("../../src/clients/qdrant.js");
    return { mod, QdrantClientConstructor };
  }

  it("requires a URL", async () => {
    const { mod, QdrantClientConstructor } = await importQdrantClientModule({}, undefined);
    await expect(mod.getQdrantClient()).rejects.toThrow("QDRANT_URL is missing");
    expect(QdrantClientConstructor).not.toHaveBeenCalled();
  });

  it("retries startup and health-checks the configured collection", async () => {
    vi.useFakeTimers();
    vi.spyOn(console, "info").mockImplementation(() => undefined);
    const remoteClient = {
      getCollections: vi
        .fn()
        .mockRejectedValueOnce(new Error("qdrant not ready"))
        .mockResolvedValue({ collections: [] }),
      collectionExists: vi.fn().mockResolvedValueOnce({ exists: true }).mockResolvedValueOnce({ exists: false })
    };
    const { mod, QdrantClientConstructor } = await importQdrantClientModule(remoteClient);

    const pending = mod.getQdrantClient();
    await vi.advanceTimersByTimeAsync(1000);
    const singleton = await pending;

    expect(QdrantClientConstructor).toHaveBeenCalledWith({
      url: "http://localhost:6333",
      apiKey: "test-secret",
      timeout: 5000
    });
    expect(remoteClient.getCollections).toHaveBeenCalledTimes(2);
    await expect(singleton.healthCheck()).resolves.toEqual({ status: "ok" });
    await expect(singleton.healthCheck()).resolves.toEqual({
      status: "error",
      details: "collection cdc_chunks does not exist"
    });
    expect(remoteClient.collectionExists).toHaveBeenCalledWith("cdc_chunks");
  });
});

describe("clients/lifecycle", () => {
  beforeEach(() => {
    vi.resetModules();
  });

  const fakeClients = () => {
    const health = vi.fn(async () => ({ status: "ok" }));
    const shutdown = vi.fn(async () => undefined);
    const clients: ManagedClient[] = ["openai", "postgres"].map((name) => ({
      name,
      get: async () => ({ healthCheck: health }),
      shutdown
    }));
    return { clients, health, shutdown, loadClients: vi.fn(async () => clients) };
  };

  it("registers no hooks when bootstrap is disabled", async () => {
    const lifecycle = await import("../../src/clients/lifecycle.js");
    lifecycle.resetClientLifecycleStateForTests();
    const { loadClients } = fakeClients();
    const app = Fastify({ logger: false });

    lifecycle.registerClientLifecycle(app, { enableBootstrap: false, loadClients });
    await app.ready();
    await app.close();

    expect(loadClients).not.toHaveBeenCalled();
  });

  it("health-checks clients when ready and shuts them down on close", async () => {
    vi.spyOn(console, "info").mockImplementation(() => undefined);
    const lifecycle = await import("../../src/clients/lifecycle.js");
    lifecycle.resetClientLifecycleStateForTests();
    const { loadClients, health, shutdown } = fakeClients();
    const app = Fastify({ logger: false });

    lifecycle.registerClientLifecycle(app, { enableBootstrap: true, loadClients, registerProcessSignals: false });
    await app.ready();
    expect(health).toHaveBeenCalledTimes(2);

    await app.close();
    expect(shutdown).toHaveBeenCalledTimes(2);
  });

  it("registers signal handlers once and exits after shutting down", async () => {
    const consoleInfo = vi.spyOn(console, "info").mockImplementation(() => undefined);
    const lifecycle = await import("../../src/clients/lifecycle.js");
    lifecycle.resetClientLifecycleStateForTests();
    const { loadClients, shutdown } = fakeClients();
    const exit = vi.fn();
    const before = new Set(process.listeners("SIGTERM"));
    const beforeInterrupt = new Set(process.listeners("SIGINT"));

    lifecycle.registerClientLifecycle(Fastify({ logger: false }), { enableBootstrap: true, loadClients, exit });
    lifecycle.registerClientLifecycle(Fastify({ logger: false }), { enableBootstrap: true, loadClients, exit });

    const added = process.listeners("SIGTERM").filter((listener) => !before.has(listener));
    const interruptAdded = process.listeners("SIGINT").filter((listener) => !beforeInterrupt.has(listener));
    try {
      expect(added).toHaveLength(1);
      added[0]?.("SIGTERM");
      await vi.waitFor(() => expect(exit).toHaveBeenCalledWith(0));
      expect(consoleInfo).toHaveBeenCalledWith("[lifecycle/process] received SIGTERM");
      expect(shutdown).toHaveBeenCalledTimes(2);
      expect(interruptAdded).toHaveLength(1);
    } finally {
      for (const listener of added) {
        process.removeListener("SIGTERM", listener);
      }
      for (const listener of interruptAdded) {
        process.removeListener("SIGINT", listener);
      }
    }
  });
});
