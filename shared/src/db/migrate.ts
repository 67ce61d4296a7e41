import fs from "fs";
import path from "path";
import type { Pool } from "pg";
import dotenv from "dotenv";
import { createPool, withTransaction } from "./pool";
import { eLog, nLog } from "../logger";

const MIGRATIONS_DIR = path.join(__dirname, "migrations");

async function ensureSchemaTable(pool: Pool) {
  await pool.query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      id SERIAL PRIMARY KEY,
      filename TEXT NOT NULL UNIQUE,
      executed_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    );
  `);
}

async function getApplied(pool: Pool): Promise<Set<string>> {
  const res = await pool.query<{ filename: string }>("SELECT filename FROM schema_migrations");
  return new Set(res.rows.map((r) => r.filename));
}

async function applyMigration(pool: Pool, filePath: string, filename: string) {
  const sql = await fs.promises.readFile(filePath, "utf8");
  nLog(`[migrate] applying ${filename}`);
  await withTransaction(pool, async (client) => {
    await client.query(sql);
    await client.query("INSERT INTO schema_migrations(filename) VALUES ($1)", [filename]);
  });
}

/** Apply every pending .sql file in name order */
export async function runMigrations(pool: Pool, dir: string = MIGRATIONS_DIR): Promise<string[]> {
  await ensureSchemaTable(pool);
  const applied = await getApplied(pool);
  const files = (await fs.promises.readdir(dir)).filter((f) => f.endsWith(".sql")).sort();

  const ran: string[] = [];
  for (const file of files) {
    if (applied.has(file)) continue;
    await applyMigration(pool, path.join(dir, file), file);
    ran.push(file);
  }
  nLog(`[migrate] done (${ran.length} applied)`);
  return ran;
}

async function main() {
  dotenv.config();
  const pool = createPool({ connectionString: process.env.DATABASE_URL ?? "" });
  try {
    await runMigrations(pool);
  } finally {
    await pool.end();
  }
}

if (require.main === module) {
  main().catch((err) => {
    eLog("[migrate] fatal", err);
    process.exit(1);
  });
}
