import type { FastifyInstance } from "fastify";
import type { IndexRegistry } from "../../modules/rag/index-registry.js";

export async function registerHealthRoute(
  app: FastifyInstance,
  registry?: Pick<IndexRegistry, "status">
): Promise<void> {
  app.get("/health", async (_request, reply) => {
    if (!registry) {
      return { status: "ok" };
    }

    const index = registry.status();
    if (!index.loaded) {
      reply.code(503);
    }
    return { status: index.loaded ? "ok" : "degraded", index };
  });
}
