/**
 * Strava Connector - Sync Logic
 *
 * One sequential pass:
 * 1. Watermark = latest stored start - lookback buffer (or now - default window)
 * 2. Upsert every listed activity
 * 3. Fetch streams only when the sport's required set is not stored yet
 * 4. Commit every N activities, then once at the end
 */

import { ConfigError } from "../../lib/errors.js";
import { setupLogger, type Logger } from "../../lib/logger.js";
import { PACING_MS, sleep, type SleepFn } from "./api-client.js";
import { hasData, requiredStreamsFor, sportTypeOf } from "./streams.js";
import type {
  ActivityRepository,
  ActivitySource,
  SyncCounts,
  SyncObserver,
  SyncOptions,
  SyncResult,
} from "./types.js";

const logger = setupLogger("strava-sync");

// Configuration
export const LOOKBACK_BUFFER_HOURS = 6;
export const DEFAULT_DAYS_IF_EMPTY = 30;
export const COMMIT_EVERY_N_ACTIVITIES = 25;

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

// =============================================================================
// Watermark
// =============================================================================

/**
 * Lower bound for the next fetch
 *
 * @param latest - Latest stored activity start, null when none is stored
 * @param now - Current time
 */
export function computeWatermark(
  latest: Date | null,
  now: Date,
  lookbackHours: number = LOOKBACK_BUFFER_HOURS,
  defaultDays: number = DEFAULT_DAYS_IF_EMPTY
): Date {
  if (latest) {
    return new Date(latest.getTime() - lookbackHours * HOUR_MS);
  }
  return new Date(now.getTime() - defaultDays * DAY_MS);
}

export function toEpochSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

function laterOf(current: Date | null, isoTimestamp: string | undefined): Date | null {
  if (!isoTimestamp) return current;
  const candidate = new Date(isoTimestamp);
  if (isNaN(candidate.getTime())) return current;
  return current === null || candidate > current ? candidate : current;
}

// =============================================================================
// Observer
// =============================================================================

/**
 * Observer that reports through the logger
 */
export function createLoggingObserver(log: Logger = logger): SyncObserver {
  return {
    onStart: (watermark) => {
      log.info(`Fetching activities after ${watermark.toISOString()}`);
    },
    onProgress: (counts) => {
      log.info("Progress", {
        activities: counts.activitiesProcessed,
        streams: counts.streamsUpserted,
        skipped: counts.activitiesSkipped,
      });
    },
    onComplete: (result) => {
      log.info("Incremental ingest complete", {
        activities: result.activitiesProcessed,
        streams: result.streamsUpserted,
        skipped: result.activitiesSkipped,
      });
    },
  };
}

// =============================================================================
// Syncer
// =============================================================================

export interface ActivitySyncerOptions extends SyncOptions {
  observer?: SyncObserver;
  sleep?: SleepFn;
  now?: () => Date;
}

export class ActivitySyncer {
  private readonly source: ActivitySource;
  private readonly store: ActivityRepository;
  private readonly lookbackHours: number;
  private readonly defaultDays: number;
  private readonly commitEvery: number;
  private readonly pacingMs: number;
  private readonly observer: SyncObserver;
  private readonly sleep: SleepFn;
  private readonly now: () => Date;

  constructor(source: ActivitySource, store: ActivityRepository, options: ActivitySyncerOptions = {}) {
    this.source = source;
    this.store = store;
    this.lookbackHours = options.lookbackHours ?? LOOKBACK_BUFFER_HOURS;
    this.defaultDays = options.defaultDays ?? DEFAULT_DAYS_IF_EMPTY;
    this.commitEvery = options.commitEvery ?? COMMIT_EVERY_N_ACTIVITIES;
    this.pacingMs = options.pacingMs ?? PACING_MS;
    this.observer = options.observer ?? createLoggingObserver();
    this.sleep = options.sleep ?? sleep;
    this.now = options.now ?? (() => new Date());

    if (!Number.isInteger(this.commitEvery) || this.commitEvery < 1) {
      throw new ConfigError(["commitEvery"], `commitEvery must be a positive integer, got ${this.commitEvery}`);
    }
  }

  async run(): Promise<SyncResult> {
    const latest = await this.store.latestActivityStart();
    const watermark = computeWatermark(latest, this.now(), this.lookbackHours, this.defaultDays);
    this.observer.onStart?.(watermark);

    const counts: SyncCounts = {
      activitiesProcessed: 0,
      streamsUpserted: 0,
      activitiesSkipped: 0,
    };
    let latestStart: Date | null = null;

    for await (const activity of this.source.listActivities(toEpochSeconds(watermark))) {
      await this.store.upsertActivity(activity);
      counts.activitiesProcessed++;
      latestStart = laterOf(latestStart, activity.start_date);

      const required = requiredStreamsFor(sportTypeOf(activity));

      if (await this.store.hasRequiredStreams(activity.id, required)) {
        counts.activitiesSkipped++;
        logger.debug(`Activity ${activity.id}: streams present, skipped`);
      } else {
        const streams = await this.source.fetchStreams(activity.id);
        let written = 0;
        for (const [streamType, stream] of Object.entries(streams)) {
          // Only series with samples are stored
          if (!hasData(stream)) continue;
          await this.store.upsertStream(activity.id, streamType, stream);
          written++;
        }
        counts.streamsUpserted += written;
        logger.debug(`Activity ${activity.id}: ${written} streams upserted`);
        await this.sleep(this.pacingMs);
      }

      if (counts.activitiesProcessed % this.commitEvery === 0) {
        await this.store.commit();
        this.observer.onProgress?.({ ...counts });
      }
    }

    await this.store.commit();

    const result: SyncResult = { ...counts, watermark, latestStart };
    this.observer.onComplete?.(result);
    return result;
  }
}
