/**
 * Strava Connector - Type Definitions
 */

// =============================================================================
// API payloads
// =============================================================================

export type LatLng = [number, number];

/**
 * Summary activity as returned by GET /athlete/activities.
 * Only the fields mapped to columns are typed; the full object is kept in `raw`.
 */
export interface StravaActivity {
  id: number;
  athlete?: { id: number };
  name?: string;
  type?: string;
  sport_type?: string;
  start_date?: string; // UTC, ISO8601
  start_date_local?: string; // local wall clock, ISO8601 with "Z"
  timezone?: string;
  distance?: number; // meters
  moving_time?: number; // seconds
  elapsed_time?: number; // seconds
  total_elevation_gain?: number; // meters
  start_latlng?: LatLng | [] | null;
  end_latlng?: LatLng | [] | null;
  [key: string]: unknown;
}

export type StreamType =
  | "time"
  | "distance"
  | "latlng"
  | "altitude"
  | "velocity_smooth"
  | "heartrate"
  | "cadence"
  | "watts"
  | "temp"
  | "moving"
  | "grade_smooth";

/**
 * One stream from GET /activities/{id}/streams?key_by_type=true
 */
export interface StravaStream {
  data?: unknown[];
  original_size?: number;
  resolution?: "low" | "medium" | "high";
  series_type?: "distance" | "time";
  [key: string]: unknown;
}

/**
 * Streams keyed by type. The API may return types that were not requested.
 */
export type StreamSet = Record<string, StravaStream>;

export interface TokenResponse {
  access_token?: string;
  refresh_token?: string;
  expires_at?: number;
  expires_in?: number;
  token_type?: string;
}

// =============================================================================
// Component contracts
// =============================================================================

/**
 * Remote read access consumed by the syncer
 */
export interface ActivitySource {
  listActivities(afterEpoch: number): AsyncIterable<StravaActivity>;
  fetchStreams(activityId: number): Promise<StreamSet>;
}

/**
 * Persistence consumed by the syncer
 */
export interface ActivityRepository {
  latestActivityStart(): Promise<Date | null>;
  hasRequiredStreams(activityId: number, required: ReadonlySet<string>): Promise<boolean>;
  upsertActivity(activity: StravaActivity): Promise<void>;
  upsertStream(activityId: number, streamType: string, stream: StravaStream): Promise<void>;
  commit(): Promise<void>;
}

// =============================================================================
// Sync
// =============================================================================

export interface SyncCounts {
  activitiesProcessed: number;
  streamsUpserted: number;
  activitiesSkipped: number;
}

export interface SyncResult extends SyncCounts {
  /** Lower bound passed to the activities endpoint */
  watermark: Date;
  /** Latest activity start seen in this run, null when nothing was fetched */
  latestStart: Date | null;
}

/**
 * Observability hook. Replaces direct console progress output.
 */
export interface SyncObserver {
  onStart?(watermark: Date): void;
  onProgress?(counts: SyncCounts): void;
  onComplete?(result: SyncResult): void;
}

export interface SyncOptions {
  /** Safety margin subtracted from the latest stored start (default 6) */
  lookbackHours?: number;
  /** Initial window when no activity is stored yet (default 30) */
  defaultDays?: number;
  /** Activities per commit (default 25) */
  commitEvery?: number;
  /** Pause after each activity that triggered a stream fetch, in ms (default 200) */
  pacingMs?: number;
}
