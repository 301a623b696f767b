import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import pool from "./connection.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

/**
 * Applies every `migrations/*.sql` file not yet recorded in `_migrations`,
 * in file-name order, each inside its own transaction.
 */
export async function runMigrations(): Promise<void> {
  const client = await pool.connect();
  try {
    await client.query(`
      CREATE TABLE IF NOT EXISTS _migrations (
        id SERIAL PRIMARY KEY,
        name TEXT NOT NULL UNIQUE,
        applied_at TIMESTAMPTZ DEFAULT NOW()
      )
    `);

    const migrationsDir = path.join(__dirname, "migrations");
    const files = fs.readdirSync(migrationsDir).filter(f => f.endsWith(".sql")).sort();

    const { rows: applied } = await client.query<{ name: string }>(
      "SELECT name FROM _migrations"
    );
    const appliedSet = new Set(applied.map((r) => r.name));

    for (const file of files) {
      if (appliedSet.has(file)) continue;

      const sql = fs.readFileSync(path.join(migrationsDir, file), "utf-8");
      console.log(`[migrate] Applying ${file}`);

      await client.query("BEGIN");
      try {
        await client.query(sql);
        await client.query("INSERT INTO _migrations (name) VALUES ($1)", [file]);
        await client.query("COMMIT");
        console.log(`[migrate]   ✓ ${file}`);
      } catch (err) {
        await client.query("ROLLBACK");
        console.error(`[migrate]   ✗ ${file}:`, err);
        throw err;
      }
    }
  } finally {
    client.release();
  }
}
