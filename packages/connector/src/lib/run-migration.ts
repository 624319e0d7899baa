/**
 * Run SQL migration files
 * Usage: npx tsx src/lib/run-migration.ts migrations/001_baseline.sql [migrations/002_strava.sql ...]
 *
 * Connection settings come from the same .env as the sync (DB_* keys).
 */

import fs from "fs";
import pg from "pg";
import { pathToFileURL } from "url";
import { loadEnvFile } from "./config.js";
import { ConfigError } from "./errors.js";
import { setupLogger } from "./logger.js";
import { toClientConfig } from "../db/client.js";

const { Client } = pg;
const logger = setupLogger("migration");

const DB_KEYS = ["DB_HOST", "DB_PORT", "DB_NAME", "DB_USER", "DB_PASSWORD"] as const;

/**
 * Execute one migration file on an open client
 */
export async function runMigration(client: pg.ClientBase, filePath: string): Promise<void> {
  const sql = fs.readFileSync(filePath, "utf8");
  logger.info(`Running migration from: ${filePath}`);
  await client.query(sql);
  logger.info("Migration completed successfully");
}

async function main(): Promise<void> {
  const files = process.argv.slice(2);
  if (files.length === 0) {
    console.error("Usage: npx tsx src/lib/run-migration.ts <sql-file> [<sql-file> ...]");
    process.exit(1);
  }

  // Only the DB keys are needed here, not the Strava credentials
  loadEnvFile();
  const missing = DB_KEYS.filter((key) => !process.env[key]);
  if (missing.length > 0) {
    throw new ConfigError([...missing]);
  }

  const client = new Client(
    toClientConfig({
      host: process.env.DB_HOST ?? "",
      port: Number(process.env.DB_PORT),
      database: process.env.DB_NAME ?? "",
      user: process.env.DB_USER ?? "",
      password: process.env.DB_PASSWORD ?? "",
    })
  );
  await client.connect();

  try {
    for (const file of files) {
      await runMigration(client, file);
    }
  } finally {
    await client.end();
  }
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main().catch((err) => {
    console.error("Migration failed:", err);
    process.exit(1);
  });
}
