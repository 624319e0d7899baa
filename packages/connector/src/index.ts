/**
 * @strava-ingest/connector
 *
 * Syncs Strava activities and streams to the PostgreSQL raw schema.
 */

// Re-export services as namespaces to avoid conflicts
export * as strava from "./services/strava/index.js";

// Re-export lib utilities
export * from "./lib/config.js";
export * from "./lib/errors.js";
export * from "./lib/logger.js";
export { updateEnvKey } from "./lib/env-file.js";
export { runMigration } from "./lib/run-migration.js";

// Re-export db utilities
export { getDbClient, closeDbClient } from "./db/client.js";
export * from "./db/ingest-runs.js";
