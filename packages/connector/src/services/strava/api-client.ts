/**
 * Strava API Client
 *
 * Paginated activity listing and per-activity stream fetching.
 * Data fetching only, no DB operations.
 *
 * Rate limit handling:
 * - 429: fixed 60s cool-down, then the identical request again (no cap, no growth)
 * - 403/404 on streams: no telemetry available, empty result
 * - Anything else non-2xx: StravaApiError, fatal for the run
 *
 * Pages are paced with a short fixed delay even when no 429 was seen.
 */

import { StravaApiError } from "../../lib/errors.js";
import { setupLogger } from "../../lib/logger.js";
import { STREAM_KEYS } from "./streams.js";
import type { ActivitySource, StravaActivity, StreamSet } from "./types.js";

const logger = setupLogger("strava-api");

// Configuration
export const STRAVA_API_BASE = "https://www.strava.com/api/v3";
export const PER_PAGE = 200;
export const RATE_LIMIT_WAIT_MS = 60_000;
export const PACING_MS = 200;

export type SleepFn = (ms: number) => Promise<void>;

export const sleep: SleepFn = (ms) => new Promise((r) => setTimeout(r, ms));

export interface StravaClientOptions {
  baseUrl?: string;
  perPage?: number;
  rateLimitWaitMs?: number;
  pacingMs?: number;
  /** Stop listing after this many activities (unbounded when omitted) */
  maxActivities?: number;
  sleep?: SleepFn;
}

// =============================================================================
// Response guards
// =============================================================================

function isActivity(value: unknown): value is StravaActivity {
  return (
    typeof value === "object" &&
    value !== null &&
    "id" in value &&
    typeof value.id === "number"
  );
}

function isStreamSet(value: unknown): value is StreamSet {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return false;
  }
  return Object.values(value).every(
    (stream) => typeof stream === "object" && stream !== null && !Array.isArray(stream)
  );
}

// =============================================================================
// Client
// =============================================================================

export class StravaClient implements ActivitySource {
  private readonly accessToken: string;
  private readonly baseUrl: string;
  private readonly perPage: number;
  private readonly rateLimitWaitMs: number;
  private readonly pacingMs: number;
  private readonly maxActivities: number | null;
  private readonly sleep: SleepFn;

  constructor(accessToken: string, options: StravaClientOptions = {}) {
    this.accessToken = accessToken;
    this.baseUrl = options.baseUrl ?? STRAVA_API_BASE;
    this.perPage = options.perPage ?? PER_PAGE;
    this.rateLimitWaitMs = options.rateLimitWaitMs ?? RATE_LIMIT_WAIT_MS;
    this.pacingMs = options.pacingMs ?? PACING_MS;
    this.maxActivities = options.maxActivities ?? null;
    this.sleep = options.sleep ?? sleep;
  }

  /**
   * GET with unbounded fixed-delay retry on 429.
   * Returns the response for every other status; callers decide what is fatal.
   */
  private async get(url: string): Promise<Response> {
    while (true) {
      logger.debug(`GET ${url}`);
      const response = await fetch(url, {
        headers: { Authorization: `Bearer ${this.accessToken}` },
      });

      if (response.status !== 429) {
        return response;
      }

      // Drain so the connection is released before waiting
      await response.text();
      logger.warn(`Rate limited (429). Waiting ${this.rateLimitWaitMs / 1000}s...`);
      await this.sleep(this.rateLimitWaitMs);
    }
  }

  /**
   * List activities started after the given epoch, page by page
   *
   * @param afterEpoch - Lower bound in epoch seconds
   */
  async *listActivities(afterEpoch: number): AsyncGenerator<StravaActivity> {
    let page = 1;
    let fetched = 0;

    while (true) {
      const params = new URLSearchParams({
        after: String(afterEpoch),
        page: String(page),
        per_page: String(this.perPage),
      });
      const url = `${this.baseUrl}/athlete/activities?${params}`;
      const response = await this.get(url);

      if (response.status !== 200) {
        const text = await response.text();
        throw new StravaApiError(
          response.status,
          text,
          url,
          `Activities fetch failed (HTTP ${response.status}): ${text}`
        );
      }

      const items: unknown = await response.json();
      if (!Array.isArray(items)) {
        throw new StravaApiError(response.status, JSON.stringify(items), url, "Activities response is not an array");
      }
      if (items.length === 0) {
        logger.debug(`Page ${page} empty, listing complete (${fetched} activities)`);
        return;
      }

      logger.debug(`Page ${page}: ${items.length} activities`);

      for (const item of items) {
        if (!isActivity(item)) {
          throw new StravaApiError(response.status, JSON.stringify(item), url, "Activity without numeric id");
        }
        yield item;
        fetched++;
        if (this.maxActivities !== null && fetched >= this.maxActivities) {
          logger.info(`Reached max activities per run (${this.maxActivities})`);
          return;
        }
      }

      page++;
      await this.sleep(this.pacingMs);
    }
  }

  /**
   * Fetch all requested streams for one activity, keyed by type
   *
   * @returns Streams by type; empty when Strava answers 403 or 404
   */
  async fetchStreams(activityId: number): Promise<StreamSet> {
    const params = new URLSearchParams({
      keys: STREAM_KEYS.join(","),
      key_by_type: "true",
      resolution: "high",
      series_type: "time",
    });
    const url = `${this.baseUrl}/activities/${activityId}/streams?${params}`;
    const response = await this.get(url);

    if (response.status === 403 || response.status === 404) {
      await response.text();
      logger.debug(`No streams for activity ${activityId} (HTTP ${response.status})`);
      return {};
    }

    if (response.status !== 200) {
      const text = await response.text();
      throw new StravaApiError(
        response.status,
        text,
        url,
        `Streams fetch failed (HTTP ${response.status}): ${text}`
      );
    }

    const data: unknown = await response.json();
    if (!isStreamSet(data)) {
      throw new StravaApiError(response.status, JSON.stringify(data), url, "Streams response is not keyed by type");
    }
    return data;
  }
}
