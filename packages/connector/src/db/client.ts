/**
 * PostgreSQL connection
 *
 * One long-lived client per run, shared by every query in sequence.
 * Transactions are managed by the caller (see ActivityStore).
 */

import pg from "pg";
import type { DbConfig } from "../lib/config.js";
import { setupLogger } from "../lib/logger.js";

const { Client } = pg;
const logger = setupLogger("db");

let dbClient: pg.Client | null = null;

export function toClientConfig(db: DbConfig): pg.ClientConfig {
  return {
    host: db.host,
    port: db.port,
    database: db.database,
    user: db.user,
    password: db.password,
  };
}

/**
 * Get the connected client (singleton)
 *
 * @param db - Connection settings, used on first call
 */
export async function getDbClient(db: DbConfig): Promise<pg.Client> {
  if (dbClient !== null) {
    return dbClient;
  }

  const client = new Client(toClientConfig(db));
  try {
    await client.connect();
  } catch (error) {
    await client.end().catch((endError: unknown) => {
      logger.warn(`Failed to close client after connect error: ${String(endError)}`);
    });
    throw error;
  }
  logger.debug(`Connected to ${db.host}:${db.port}/${db.database}`);

  dbClient = client;
  return client;
}

/**
 * Close the client if open
 */
export async function closeDbClient(): Promise<void> {
  if (dbClient === null) {
    return;
  }

  const client = dbClient;
  dbClient = null;
  await client.end();
  logger.debug("Connection closed");
}
