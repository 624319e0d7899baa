/**
 * Strava - Sync Orchestrator
 *
 * Run lifecycle around ActivitySyncer:
 * config (fatal before any I/O) -> token refresh -> DB connection ->
 * ingest_runs row -> sync -> bookkeeping -> close.
 *
 * A failed run rolls back its open batch, is recorded as "failed" and rethrown.
 */

import { closeDbClient, getDbClient } from "../../db/client.js";
import { failIngestRun, finishIngestRun, startIngestRun } from "../../db/ingest-runs.js";
import { loadConfig, type AppConfig } from "../../lib/config.js";
import { errorMessage } from "../../lib/errors.js";
import { setupLogger } from "../../lib/logger.js";
import { StravaClient, type SleepFn } from "./api-client.js";
import { StravaCredentials } from "./credentials.js";
import { ActivityStore } from "./db.js";
import { ActivitySyncer } from "./sync.js";
import type { SyncObserver, SyncOptions, SyncResult } from "./types.js";

const logger = setupLogger("strava-orchestrator");

const SERVICE_NAME = "strava";
const SOURCE_NAME = "strava_api_v3";

export interface RunOptions extends SyncOptions {
  /** Cap on activities per run (unbounded when omitted) */
  maxActivities?: number;
  /** Pre-validated config; loaded from .env when omitted */
  config?: AppConfig;
  observer?: SyncObserver;
  sleep?: SleepFn;
  apiBaseUrl?: string;
  tokenUrl?: string;
}

export interface RunResult extends SyncResult {
  runId: string;
  elapsedMs: number;
}

/**
 * Run one incremental Strava sync
 *
 * @param options - Sync tuning and test seams
 * @returns Counts, watermark and bookkeeping id
 */
export async function syncActivities(options: RunOptions = {}): Promise<RunResult> {
  const config = options.config ?? loadConfig();
  const startTime = Date.now();

  logger.info("Starting Strava incremental ingest");

  const credentials = new StravaCredentials({
    ...config.strava,
    envPath: config.envPath,
    tokenUrl: options.tokenUrl,
  });
  const accessToken = await credentials.refreshAccessToken();

  const client = await getDbClient(config.db);
  const store = new ActivityStore(client);
  let runId: string | null = null;

  try {
    runId = await startIngestRun(client, SERVICE_NAME, SOURCE_NAME);
    logger.debug(`Ingest run ${runId} started`);

    const source = new StravaClient(accessToken, {
      baseUrl: options.apiBaseUrl,
      pacingMs: options.pacingMs,
      maxActivities: options.maxActivities,
      sleep: options.sleep,
    });
    const syncer = new ActivitySyncer(source, store, {
      lookbackHours: options.lookbackHours,
      defaultDays: options.defaultDays,
      commitEvery: options.commitEvery,
      pacingMs: options.pacingMs,
      observer: options.observer,
      sleep: options.sleep,
    });

    const result = await syncer.run();

    await finishIngestRun(client, runId, {
      rowsFetched: result.activitiesProcessed,
      rowsInserted: result.streamsUpserted,
      rowsUpdated: result.activitiesProcessed,
      maxTs: result.latestStart,
    });

    const elapsedMs = Date.now() - startTime;
    logger.info(`Strava sync completed in ${(elapsedMs / 1000).toFixed(2)}s`);

    return { ...result, runId, elapsedMs };
  } catch (error) {
    logger.error(`Strava sync failed: ${errorMessage(error)}`);
    try {
      await store.rollback();
      if (runId !== null) {
        await failIngestRun(client, runId, errorMessage(error));
      }
    } catch (bookkeepingError) {
      logger.error(`Could not record failed run: ${errorMessage(bookkeepingError)}`);
    }
    throw error;
  } finally {
    await closeDbClient();
  }
}
