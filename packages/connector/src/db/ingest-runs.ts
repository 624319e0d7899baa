/**
 * Ingest run bookkeeping
 *
 * One row in meta.ingest_runs per execution: inserted as "started",
 * closed as "success" with counts or "failed" with the error message.
 * Statements run outside any batch transaction so a failed run is still recorded.
 */

import type pg from "pg";

export interface IngestRunStats {
  rowsFetched: number;
  rowsInserted: number;
  rowsUpdated: number;
  maxTs: Date | null;
}

/**
 * Insert a "started" row
 *
 * @returns run_id (bigint, as returned by pg)
 */
export async function startIngestRun(
  client: pg.ClientBase,
  service: string,
  source: string
): Promise<string> {
  const result = await client.query<{ run_id: string }>(
    `INSERT INTO meta.ingest_runs (service, source, status)
     VALUES ($1, $2, 'started')
     RETURNING run_id`,
    [service, source]
  );
  return result.rows[0].run_id;
}

export async function finishIngestRun(
  client: pg.ClientBase,
  runId: string,
  stats: IngestRunStats
): Promise<void> {
  await client.query(
    `UPDATE meta.ingest_runs
     SET status = 'success',
         finished_at_utc = NOW(),
         rows_fetched = $2,
         rows_inserted = $3,
         rows_updated = $4,
         max_ts_utc = $5
     WHERE run_id = $1`,
    [runId, stats.rowsFetched, stats.rowsInserted, stats.rowsUpdated, stats.maxTs]
  );
}

export async function failIngestRun(
  client: pg.ClientBase,
  runId: string,
  message: string
): Promise<void> {
  await client.query(
    `UPDATE meta.ingest_runs
     SET status = 'failed',
         finished_at_utc = NOW(),
         error_message = $2
     WHERE run_id = $1`,
    [runId, message]
  );
}
