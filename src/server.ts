import { fileURLToPath } from "node:url";
import { buildApp } from "./app.js";
import { config } from "./config/index.js";
import { serializeError } from "./errors.js";
import { createDefaultPipeline, createSnapshotLoader } from "./modules/pipeline/factory.js";
import { IndexRegistry, registerIndexReloadSignal } from "./modules/rag/index-registry.js";
import { logError, logInfo } from "./observability/logger.js";
import { runStartupChecks } from "./startup/startup-checks.js";

export function resolvePort(rawPort: string | number | undefined): number {
  const parsed = typeof rawPort === "number" ? rawPort : Number.parseInt(rawPort ?? "", 10);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : 3000;
}

export async function bootstrap(): Promise<void> {
  await runStartupChecks();

  const registry = new IndexRegistry(createSnapshotLoader(config));
  try {
    await registry.reload();
  } catch (error) {
    // Serve anyway: requests fail with IndexUnavailable until a SIGHUP reload succeeds.
    logError("server.index.load_failed", {}, serializeError(error));
  }
  registerIndexReloadSignal(registry);

  const pipeline = createDefaultPipeline({ config, registry });
  const app = await buildApp({ pipeline, registry });
  const port = resolvePort(config.PORT);
  await app.listen({ host: "0.0.0.0", port });
  logInfo("server.started", {}, { port, index: registry.status() });
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  bootstrap().catch((error: unknown) => {
    console.error("Startup failed", error);
    process.exitCode = 1;
  });
}
