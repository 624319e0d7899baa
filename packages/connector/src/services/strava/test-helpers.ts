/**
 * Shared fixtures for Strava connector tests
 */

import { vi } from "vitest";
import type { StravaActivity, StravaStream } from "./types.js";

export function jsonResponse(body: unknown, status: number = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

export function textResponse(body: string, status: number): Response {
  return new Response(body, { status });
}

/**
 * Stub global fetch with a queue of responses, one per call
 */
export function stubFetch(responses: Response[]) {
  const fetchMock = vi.fn(async (input: string | URL | Request, _init?: RequestInit) => {
    const next = responses.shift();
    if (!next) {
      throw new Error(`Unexpected request: ${String(input)}`);
    }
    return next;
  });
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

export async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of iterable) {
    items.push(item);
  }
  return items;
}

export function makeActivity(id: number, overrides: Partial<StravaActivity> = {}): StravaActivity {
  return {
    id,
    athlete: { id: 7 },
    name: `Activity ${id}`,
    sport_type: "Ride",
    type: "Ride",
    start_date: "2026-10-01T06:00:00Z",
    start_date_local: "2026-10-01T08:00:00Z",
    timezone: "(GMT+01:00) Europe/London",
    distance: 10000,
    moving_time: 3000,
    elapsed_time: 3200,
    total_elevation_gain: 55,
    start_latlng: [51.5, -0.12],
    end_latlng: [51.51, -0.13],
    ...overrides,
  };
}

export function makeStream(data: unknown[]): StravaStream {
  return {
    data,
    original_size: data.length,
    resolution: "high",
    series_type: "time",
  };
}
