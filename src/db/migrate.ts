import "dotenv/config";
import pool from "./connection.js";
import { runMigrations } from "./run-migrations.js";

async function migrate() {
  try {
    await runMigrations();
    console.log("[migrate] Migrations complete.");
  } finally {
    await pool.end();
  }
}

migrate().catch((err) => {
  console.error("[migrate] Migration failed:", err);
  process.exit(1);
});
