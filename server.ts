import "dotenv/config";
import config from "./src/config.js";
import { createApp } from "./src/app.js";
import { runMigrations } from "./src/db/run-migrations.js";
import pool from "./src/db/connection.js";

async function start() {
  try {
    await runMigrations();
    const app = createApp();
    const server = app.listen(config.PORT, () => {
      console.log(`Lift Log API running on port ${config.PORT} (protein day boundary: ${config.REFERENCE_TIMEZONE})`);
    });

    const shutdown = (signal: string) => {
      console.log(`\n${signal} received. Shutting down gracefully...`);
      server.close(async () => {
        console.log("HTTP server closed.");
        try {
          await pool.end();
          console.log("Database pool closed.");
          process.exit(0);
        } catch (err) {
          console.error("Error closing database pool:", err);
          process.exit(1);
        }
      });

      // Force close after 10 seconds
      setTimeout(() => {
        console.error("Forced shutdown after timeout.");
        process.exit(1);
      }, 10_000).unref();
    };

    process.on("SIGTERM", () => shutdown("SIGTERM"));
    process.on("SIGINT", () => shutdown("SIGINT"));
  } catch (err) {
    console.error("Failed to start:", err);
    process.exit(1);
  }
}

void start();
