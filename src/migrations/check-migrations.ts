import { getPostgresClient } from "../clients/postgres.js";
import { MIGRATIONS_TABLE_SQL, defaultMigrationsDir, listMigrationFiles } from "./run-migrations.js";

export interface CheckMigrationsDependencies {
  migrationsDir?: string;
  readdirFn?: (dir: string) => Promise<string[]>;
  query?: (sql: string) => Promise<{ rows: Array<{ filename: string }> }>;
}

const defaultQuery = async (sql: string): Promise<{ rows: Array<{ filename: string }> }> => {
  const { pool } = await getPostgresClient();
  return pool.query<{ filename: string }>(sql);
};

export async function assertMigrationsCurrent(dependencies: CheckMigrationsDependencies = {}): Promise<void> {
  const files = await listMigrationFiles(dependencies.migrationsDir ?? defaultMigrationsDir, dependencies.readdirFn);
  if (files.length === 0) {
    return;
  }

  const query = dependencies.query ?? defaultQuery;
  await query(MIGRATIONS_TABLE_SQL);
  const appliedResult = await query("SELECT filename FROM schema_migrations");
  const applied = new Set(appliedResult.rows.map((row) => row.filename));

  const pending = files.filter((file) => !applied.has(file));
  if (pending.length > 0) {
    throw new Error(`Pending migrations detected: ${pending.join(", ")}. Run npm run migrate.`);
  }
}
