/**
 * Strava Connector - Database Operations
 *
 * Idempotent upserts into raw.strava__activities and raw.strava__activity_streams,
 * plus the two reads the sync loop needs (watermark, stream presence).
 *
 * Statements run inside an explicit transaction that is opened lazily and
 * closed by commit()/rollback(). The caller decides the batch size.
 */

import type pg from "pg";
import { setupLogger } from "../../lib/logger.js";
import { sportTypeOf } from "./streams.js";
import type { ActivityRepository, LatLng, StravaActivity, StravaStream } from "./types.js";

const logger = setupLogger("strava-db");

export const ACTIVITIES_TABLE = "raw.strava__activities";
export const STREAMS_TABLE = "raw.strava__activity_streams";

// Every column is refreshed on conflict so structured fields follow the latest payload
const UPSERT_ACTIVITY_SQL = `
  INSERT INTO ${ACTIVITIES_TABLE} (
    activity_id, athlete_id, name, sport_type,
    start_date_utc, start_date_local, timezone,
    distance_m, moving_time_s, elapsed_time_s,
    total_elevation_gain_m,
    start_lat, start_lng, end_lat, end_lng,
    raw, ingested_at_utc
  )
  VALUES (
    $1, $2, $3, $4,
    $5, $6, $7,
    $8, $9, $10,
    $11,
    $12, $13, $14, $15,
    $16::jsonb, NOW()
  )
  ON CONFLICT (activity_id) DO UPDATE SET
    athlete_id = EXCLUDED.athlete_id,
    name = EXCLUDED.name,
    sport_type = EXCLUDED.sport_type,
    start_date_utc = EXCLUDED.start_date_utc,
    start_date_local = EXCLUDED.start_date_local,
    timezone = EXCLUDED.timezone,
    distance_m = EXCLUDED.distance_m,
    moving_time_s = EXCLUDED.moving_time_s,
    elapsed_time_s = EXCLUDED.elapsed_time_s,
    total_elevation_gain_m = EXCLUDED.total_elevation_gain_m,
    start_lat = EXCLUDED.start_lat,
    start_lng = EXCLUDED.start_lng,
    end_lat = EXCLUDED.end_lat,
    end_lng = EXCLUDED.end_lng,
    raw = EXCLUDED.raw,
    ingested_at_utc = EXCLUDED.ingested_at_utc`;

const UPSERT_STREAM_SQL = `
  INSERT INTO ${STREAMS_TABLE} (
    activity_id, stream_type, original_size, data, raw, ingested_at_utc
  )
  VALUES ($1, $2, $3, $4::jsonb, $5::jsonb, NOW())
  ON CONFLICT (activity_id, stream_type) DO UPDATE SET
    original_size = EXCLUDED.original_size,
    data = EXCLUDED.data,
    raw = EXCLUDED.raw,
    ingested_at_utc = EXCLUDED.ingested_at_utc`;

// =============================================================================
// Row mapping
// =============================================================================

export interface ActivityRow {
  activity_id: number;
  athlete_id: number | null;
  name: string | null;
  sport_type: string | null;
  start_date_utc: string | null;
  start_date_local: string | null;
  timezone: string | null;
  distance_m: number | null;
  moving_time_s: number | null;
  elapsed_time_s: number | null;
  total_elevation_gain_m: number | null;
  start_lat: number | null;
  start_lng: number | null;
  end_lat: number | null;
  end_lng: number | null;
  raw: string;
}

function splitLatLng(value: LatLng | [] | null | undefined): [number | null, number | null] {
  if (value && value.length === 2) {
    return [value[0], value[1]];
  }
  return [null, null];
}

/**
 * Map an API activity to column values (activities without GPS get NULL coordinates)
 */
export function toActivityRow(activity: StravaActivity): ActivityRow {
  const [startLat, startLng] = splitLatLng(activity.start_latlng);
  const [endLat, endLng] = splitLatLng(activity.end_latlng);

  return {
    activity_id: activity.id,
    athlete_id: activity.athlete?.id ?? null,
    name: activity.name ?? null,
    sport_type: sportTypeOf(activity),
    start_date_utc: activity.start_date ?? null,
    start_date_local: activity.start_date_local ?? null,
    timezone: activity.timezone ?? null,
    distance_m: activity.distance ?? null,
    moving_time_s: activity.moving_time ?? null,
    elapsed_time_s: activity.elapsed_time ?? null,
    total_elevation_gain_m: activity.total_elevation_gain ?? null,
    start_lat: startLat,
    start_lng: startLng,
    end_lat: endLat,
    end_lng: endLng,
    raw: JSON.stringify(activity),
  };
}

// =============================================================================
// Store
// =============================================================================

export class ActivityStore implements ActivityRepository {
  private readonly client: pg.ClientBase;
  private inTransaction = false;

  constructor(client: pg.ClientBase) {
    this.client = client;
  }

  private async execute<R extends pg.QueryResultRow>(
    sql: string,
    values: unknown[] = []
  ): Promise<pg.QueryResult<R>> {
    if (!this.inTransaction) {
      await this.client.query("BEGIN");
      this.inTransaction = true;
    }
    return this.client.query<R>(sql, values);
  }

  /**
   * Latest stored start time, or null when the table is empty
   */
  async latestActivityStart(): Promise<Date | null> {
    const result = await this.execute<{ latest: Date | null }>(
      `SELECT MAX(start_date_utc) AS latest FROM ${ACTIVITIES_TABLE}`
    );
    return result.rows[0]?.latest ?? null;
  }

  /**
   * True iff every required stream type is already stored for the activity
   */
  async hasRequiredStreams(activityId: number, required: ReadonlySet<string>): Promise<boolean> {
    const result = await this.execute<{ stream_type: string }>(
      `SELECT stream_type FROM ${STREAMS_TABLE} WHERE activity_id = $1`,
      [activityId]
    );
    const present = new Set(result.rows.map((row) => row.stream_type));

    for (const type of required) {
      if (!present.has(type)) {
        return false;
      }
    }
    return true;
  }

  async upsertActivity(activity: StravaActivity): Promise<void> {
    const row = toActivityRow(activity);
    await this.execute(UPSERT_ACTIVITY_SQL, [
      row.activity_id,
      row.athlete_id,
      row.name,
      row.sport_type,
      row.start_date_utc,
      row.start_date_local,
      row.timezone,
      row.distance_m,
      row.moving_time_s,
      row.elapsed_time_s,
      row.total_elevation_gain_m,
      row.start_lat,
      row.start_lng,
      row.end_lat,
      row.end_lng,
      row.raw,
    ]);
  }

  async upsertStream(activityId: number, streamType: string, stream: StravaStream): Promise<void> {
    await this.execute(UPSERT_STREAM_SQL, [
      activityId,
      streamType,
      stream.original_size ?? null,
      JSON.stringify(stream.data ?? null),
      JSON.stringify(stream),
    ]);
  }

  /**
   * Commit the open batch (no-op when nothing was written since the last commit)
   */
  async commit(): Promise<void> {
    if (!this.inTransaction) {
      return;
    }
    await this.client.query("COMMIT");
    this.inTransaction = false;
    logger.debug("Committed");
  }

  /**
   * Discard the open batch
   */
  async rollback(): Promise<void> {
    if (!this.inTransaction) {
      return;
    }
    this.inTransaction = false;
    await this.client.query("ROLLBACK");
    logger.debug("Rolled back");
  }
}
