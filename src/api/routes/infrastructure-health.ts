import type { FastifyInstance } from "fastify";
import { loadConfiguredClients, type ManagedClient } from "../../clients/lifecycle.js";

export async function registerInfrastructureHealthRoute(
  app: FastifyInstance,
  loadClients: () => Promise<ManagedClient[]> = loadConfiguredClients
): Promise<void> {
  app.get("/infra/health", async (_request, reply) => {
    try {
      const clients = await loadClients();
      const statuses = await Promise.all(
        clients.map(async (client) => [client.name, await (await client.get()).healthCheck()] as const)
      );
      return {
        status: "ok",
        clients: Object.fromEntries(statuses)
      };
    } catch (error) {
      const detail = error instanceof Error ? error.message : "unknown error";
      reply.code(503);
      return {
        status: "error",
        detail
      };
    }
  });
}
