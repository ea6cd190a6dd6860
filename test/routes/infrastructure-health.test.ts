import Fastify from "fastify";
import { describe, expect, it, vi } from "vitest";
import { registerInfrastructureHealthRoute } from "../../src/api/routes/infrastructure-health.js";
import type { ManagedClient } from "../../src/clients/lifecycle.js";

const client = (name: string, health: unknown): ManagedClient => ({
  name,
  get: async () => ({ healthCheck: async () => health }),
  shutdown: async () => undefined
});

describe("GET /infra/health", () => {
  it("returns each configured client's health", async () => {
    const app = Fastify({ logger: false });
    try {
      await registerInfrastructureHealthRoute(app, async () => [
        client("openai", { status: "error", details: "degraded" }),
        client("postgres", { status: "ok" })
      ]);

      const response = await app.inject({ method: "GET", url: "/infra/health" });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({
        status: "ok",
        clients: {
          openai: { status: "error", details: "degraded" },
          postgres: { status: "ok" }
        }
      });
    } finally {
      await app.close();
    }
  });

  it("returns 503 when a client cannot be resolved", async () => {
    const failing: ManagedClient = {
      name: "postgres",
      get: vi.fn().mockRejectedValue(new Error("postgres down")),
      shutdown: async () => undefined
    };
    const app = Fastify({ logger: false });
    try {
      await registerInfrastructureHealthRoute(app, async () => [client("openai", { status: "ok" }), failing]);

      const response = await app.inject({ method: "GET", url: "/infra/health" });

      expect(response.statusCode).toBe(503);
      expect(response.json()).toEqual({ status: "error", detail: "postgres down" });
    } finally {
      await app.close();
    }
  });
});
