/**
 * Strava Connector - Stream policy
 *
 * Which stream types are requested, and which must already be stored for an
 * activity to be skipped.
 */

import type { StravaStream, StreamType } from "./types.js";

/** Requested from /activities/{id}/streams */
export const STREAM_KEYS: readonly StreamType[] = [
  "time",
  "heartrate",
  "cadence",
  "watts",
  "velocity_smooth",
  "altitude",
  "grade_smooth",
  "latlng",
  "temp",
  "moving",
];

export const REQUIRED_STREAMS_RUN: ReadonlySet<StreamType> = new Set<StreamType>([
  "time",
  "heartrate",
  "velocity_smooth",
  "altitude",
  "grade_smooth",
  "latlng",
  "distance",
  "moving",
]);

// Non-runs stay cheap: one stored stream is enough to skip them
export const REQUIRED_STREAMS_DEFAULT: ReadonlySet<StreamType> = new Set<StreamType>(["time"]);

/**
 * Sport type of an activity, preferring `sport_type` over the legacy `type`
 */
export function sportTypeOf(activity: { sport_type?: string; type?: string }): string | null {
  return activity.sport_type || activity.type || null;
}

/**
 * Required stream set for a sport type ("Run" in any case gets the full set)
 */
export function requiredStreamsFor(sportType: string | null): ReadonlySet<StreamType> {
  if ((sportType ?? "").toLowerCase() === "run") {
    return REQUIRED_STREAMS_RUN;
  }
  return REQUIRED_STREAMS_DEFAULT;
}

/**
 * Whether a returned stream carries at least one sample
 */
export function hasData(stream: StravaStream): boolean {
  return Array.isArray(stream.data) && stream.data.length > 0;
}
