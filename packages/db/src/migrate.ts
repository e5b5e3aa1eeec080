import { readdir, readFile } from "fs/promises";
import { dirname, join } from "path";
import { fileURLToPath } from "url";

import { createLogger, errorMessage, loadDotEnvIfPresent } from "@chunkwise/shared";

import { createDb, type Db } from "./db";

const log = createLogger({ component: "migrate" });

export const MIGRATIONS_DIR = join(dirname(fileURLToPath(import.meta.url)), "..", "migrations");

export async function listMigrationFiles(dir: string = MIGRATIONS_DIR): Promise<string[]> {
  const entries = await readdir(dir);
  return entries.filter((name) => /^\d{4}_.+\.sql$/.test(name)).sort();
}

/**
 * Apply pending migrations in file-name order. Each file runs in its own
 * transaction together with its schema_migrations row.
 */
export async function runMigrations(db: Pick<Db, "query" | "tx">, dir = MIGRATIONS_DIR): Promise<string[]> {
  await db.query(
    "create table if not exists schema_migrations (name text primary key, applied_at timestamptz not null default now())",
  );
  const res = await db.query<{ name: string }>("select name from schema_migrations");
  const applied = new Set(res.rows.map((row) => row.name));

  const newlyApplied: string[] = [];
  for (const file of await listMigrationFiles(dir)) {
    if (applied.has(file)) continue;
    const sql = await readFile(join(dir, file), "utf-8");
    await db.tx(async (tx) => {
      await tx.query(sql);
      await tx.query("insert into schema_migrations (name) values ($1)", [file]);
    });
    log.info({ file }, "Applied migration");
    newlyApplied.push(file);
  }
  return newlyApplied;
}

async function main(): Promise<void> {
  loadDotEnvIfPresent();
  const databaseUrl = process.env.DATABASE_URL;
  if (!databaseUrl) throw new Error("Missing required env var: DATABASE_URL");

  const db = createDb(databaseUrl);
  try {
    const applied = await runMigrations(db);
    log.info({ count: applied.length }, applied.length > 0 ? "Migrations complete" : "Schema up to date");
  } finally {
    await db.close();
  }
}

if (process.argv[1] && fileURLToPath(import.meta.url) === process.argv[1]) {
  main().catch((err: unknown) => {
    log.error({ err: errorMessage(err) }, "Migration failed");
    process.exit(1);
  });
}
