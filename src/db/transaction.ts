import type { PoolClient } from "pg";
import pool from "./connection.js";

/**
 * Runs `fn` inside BEGIN/COMMIT on a dedicated pool client.
 * Any rejection rolls back and is rethrown; the client is always released.
 */
export async function withTransaction<T>(fn: (client: PoolClient) => Promise<T>): Promise<T> {
  const client = await pool.connect();
  try {
    await client.query("BEGIN");
    const result = await fn(client);
    await client.query("COMMIT");
    return result;
  } catch (err) {
    await client.query("ROLLBACK").catch((rollbackErr: unknown) => {
      console.error("[db] Rollback failed:", rollbackErr instanceof Error ? rollbackErr.message : rollbackErr);
    });
    throw err;
  } finally {
    client.release();
  }
}
