import { readdir, readFile } from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { withTransaction } from "../clients/postgres.js";

const currentFilePath = fileURLToPath(import.meta.url);
export const defaultMigrationsDir = path.resolve(path.dirname(currentFilePath), "../../migrations");

export const MIGRATIONS_TABLE_SQL = `
  CREATE TABLE IF NOT EXISTS schema_migrations (
    filename TEXT PRIMARY KEY,
    applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
  )
`;

export async function listMigrationFiles(
  migrationsDir: string,
  readdirFn: (dir: string) => Promise<string[]> = readdir
): Promise<string[]> {
  return (await readdirFn(migrationsDir)).filter((name) => name.endsWith(".sql")).sort();
}

/** The part of a pooled client migrations use; `pg`'s PoolClient satisfies it. */
export interface MigrationClient {
  query(sql: string, values?: unknown[]): Promise<{ rows: Array<{ filename: string }> }>;
}

export interface RunMigrationsDependencies {
  migrationsDir?: string;
  readdirFn?: (dir: string) => Promise<string[]>;
  readFileFn?: (filePath: string, encoding: "utf8") => Promise<string>;
  withTransactionFn?: <T>(operation: (client: MigrationClient) => Promise<T>) => Promise<T>;
}

/** Applies pending `.sql` files in name order, each in its own transaction. */
export async function runMigrations(dependencies: RunMigrationsDependencies = {}): Promise<string[]> {
  const migrationsDir = dependencies.migrationsDir ?? defaultMigrationsDir;
  const readFileFn = dependencies.readFileFn ?? readFile;
  const withTransactionFn = dependencies.withTransactionFn ?? withTransaction;

  const filenames = await listMigrationFiles(migrationsDir, dependencies.readdirFn);
  if (filenames.length === 0) {
    return [];
  }

  const appliedBefore = await withTransactionFn(async (client) => {
    await client.query(MIGRATIONS_TABLE_SQL);
    const result = await client.query("SELECT filename FROM schema_migrations");
    return new Set(result.rows.map((row) => row.filename));
  });

  const applied: string[] = [];
  for (const filename of filenames) {
    if (appliedBefore.has(filename)) {
      continue;
    }

    const migrationSql = (await readFileFn(path.join(migrationsDir, filename), "utf8")).replace(/^\uFEFF/, "");
    await withTransactionFn(async (client) => {
      await client.query(migrationSql);
      await client.query("INSERT INTO schema_migrations (filename) VALUES ($1)", [filename]);
    });
    applied.push(filename);
  }

  return applied;
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  runMigrations()
    .then((applied) => {
      console.log(applied.length === 0 ? "No pending migrations." : `Applied migrations: ${applied.join(", ")}`);
    })
    .catch((error: unknown) => {
      console.error("Migration failed", error);
      process.exitCode = 1;
    });
}
