/**
 * Strava Service
 *
 * Incremental sync of Strava activities and streams.
 */

export { syncActivities } from "./orchestrator.js";
export {
  ActivitySyncer,
  computeWatermark,
  createLoggingObserver,
  toEpochSeconds,
  LOOKBACK_BUFFER_HOURS,
  DEFAULT_DAYS_IF_EMPTY,
  COMMIT_EVERY_N_ACTIVITIES,
} from "./sync.js";
export { StravaClient, sleep } from "./api-client.js";
export { StravaCredentials } from "./credentials.js";
export { ActivityStore, toActivityRow } from "./db.js";
export {
  STREAM_KEYS,
  REQUIRED_STREAMS_RUN,
  REQUIRED_STREAMS_DEFAULT,
  requiredStreamsFor,
  sportTypeOf,
} from "./streams.js";

// Types
export type { RunOptions, RunResult } from "./orchestrator.js";
export type { ActivitySyncerOptions } from "./sync.js";
export type { StravaClientOptions, SleepFn } from "./api-client.js";
export type { StravaCredentialsInit } from "./credentials.js";
export type { ActivityRow } from "./db.js";
export type {
  ActivityRepository,
  ActivitySource,
  LatLng,
  StravaActivity,
  StravaStream,
  StreamSet,
  StreamType,
  SyncCounts,
  SyncObserver,
  SyncOptions,
  SyncResult,
} from "./types.js";
