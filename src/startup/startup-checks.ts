import { config } from "../config/index.js";
import { assertMigrationsCurrent } from "../migrations/check-migrations.js";

export async function runStartupChecks(): Promise<void> {
  if (!config.RUN_STARTUP_CHECKS || !config.POSTGRES_URL) {
    return;
  }

  await assertMigrationsCurrent();
}
