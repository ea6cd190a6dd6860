import type { FastifyInstance } from "fastify";
import { registerAskRoutes, type AskRoutesDependencies } from "./ask.js";

export interface ApiRoutesDependencies {
  ask: AskRoutesDependencies;
}

export async function registerApiRoutes(app: FastifyInstance, dependencies: ApiRoutesDependencies): Promise<void> {
  await registerAskRoutes(app, dependencies.ask);
}
