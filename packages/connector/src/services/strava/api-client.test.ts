import { describe, it, expect, vi } from "vitest";
import { StravaClient } from "./api-client.js";
import { StravaApiError } from "../../lib/errors.js";
import {
  collect,
  jsonResponse,
  makeActivity,
  makeStream,
  stubFetch,
  textResponse,
} from "./test-helpers.js";

const BASE = "https://strava.test/api/v3";

function createClient(options: { maxActivities?: number } = {}) {
  const sleep = vi.fn(async (_ms: number) => {});
  const client = new StravaClient("test-token", { baseUrl: BASE, sleep, ...options });
  return { client, sleep };
}

function requestedUrl(fetchMock: ReturnType<typeof stubFetch>, call: number): URL {
  return new URL(String(fetchMock.mock.calls[call][0]));
}

describe("StravaClient", () => {
  describe("listActivities", () => {
    it("should page until an empty page", async () => {
      const fetchMock = stubFetch([
        jsonResponse([makeActivity(1), makeActivity(2)]),
        jsonResponse([makeActivity(3)]),
        jsonResponse([]),
      ]);
      const { client, sleep } = createClient();

      const activities = await collect(client.listActivities(1700000000));

      expect(activities.map((a) => a.id)).toEqual([1, 2, 3]);
      expect(fetchMock).toHaveBeenCalledTimes(3);

      const first = requestedUrl(fetchMock, 0);
      expect(first.pathname).toBe("/api/v3/athlete/activities");
      expect(first.searchParams.get("after")).toBe("1700000000");
      expect(first.searchParams.get("page")).toBe("1");
      expect(first.searchParams.get("per_page")).toBe("200");
      expect(requestedUrl(fetchMock, 1).searchParams.get("page")).toBe("2");
      expect(requestedUrl(fetchMock, 2).searchParams.get("page")).toBe("3");

      // pacing after each non-empty page
      expect(sleep.mock.calls).toEqual([[200], [200]]);
    });

    it("should send the bearer token", async () => {
      const fetchMock = stubFetch([jsonResponse([])]);
      const { client } = createClient();

      await collect(client.listActivities(0));

      expect(fetchMock.mock.calls[0][1]).toEqual({
        headers: { Authorization: "Bearer test-token" },
      });
    });

    it("should wait and retry the identical request on 429", async () => {
      const fetchMock = stubFetch([
        textResponse("Rate Limit Exceeded", 429),
        jsonResponse([makeActivity(1)]),
        jsonResponse([]),
      ]);
      const { client, sleep } = createClient();

      const activities = await collect(client.listActivities(1700000000));

      expect(activities.map((a) => a.id)).toEqual([1]);
      expect(fetchMock.mock.calls[0][0]).toBe(fetchMock.mock.calls[1][0]);
      expect(requestedUrl(fetchMock, 1).searchParams.get("page")).toBe("1");
      expect(sleep.mock.calls).toEqual([[60000], [200]]);
    });

    it("should keep retrying through consecutive 429s", async () => {
      stubFetch([
        textResponse("", 429),
        textResponse("", 429),
        textResponse("", 429),
        jsonResponse([]),
      ]);
      const { client, sleep } = createClient();

      const activities = await collect(client.listActivities(0));

      expect(activities).toEqual([]);
      expect(sleep.mock.calls).toEqual([[60000], [60000], [60000]]);
    });

    it("should fail on other non-success statuses", async () => {
      stubFetch([textResponse("boom", 500)]);
      const { client } = createClient();

      const result = collect(client.listActivities(0));

      await expect(result).rejects.toBeInstanceOf(StravaApiError);
    });

    it("should carry status and body in the error", async () => {
      stubFetch([textResponse("Authorization Error", 401)]);
      const { client } = createClient();

      await expect(collect(client.listActivities(0))).rejects.toMatchObject({
        status: 401,
        body: "Authorization Error",
        message: "Activities fetch failed (HTTP 401): Authorization Error",
      });
    });

    it("should stop at maxActivities", async () => {
      const fetchMock = stubFetch([
        jsonResponse([makeActivity(1), makeActivity(2), makeActivity(3)]),
      ]);
      const { client } = createClient({ maxActivities: 2 });

      const activities = await collect(client.listActivities(0));

      expect(activities.map((a) => a.id)).toEqual([1, 2]);
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });
  });

  describe("fetchStreams", () => {
    it("should request high resolution streams keyed by type", async () => {
      const streams = {
        time: makeStream([0, 1, 2]),
        heartrate: makeStream([120, 121, 125]),
      };
      const fetchMock = stubFetch([jsonResponse(streams)]);
      const { client } = createClient();

      const result = await client.fetchStreams(42);

      expect(result).toEqual(streams);
      const url = requestedUrl(fetchMock, 0);
      expect(url.pathname).toBe("/api/v3/activities/42/streams");
      expect(url.searchParams.get("keys")).toBe(
        "time,heartrate,cadence,watts,velocity_smooth,altitude,grade_smooth,latlng,temp,moving"
      );
      expect(url.searchParams.get("key_by_type")).toBe("true");
      expect(url.searchParams.get("resolution")).toBe("high");
      expect(url.searchParams.get("series_type")).toBe("time");
    });

    it.each([403, 404])("should return an empty mapping on %i", async (status) => {
      const notFound = textResponse("Record Not Found", status);
      stubFetch([notFound]);
      const { client } = createClient();

      await expect(client.fetchStreams(42)).resolves.toEqual({});
      expect(notFound.bodyUsed).toBe(true);
    });

    it("should retry on 429 without recursion", async () => {
      const rateLimited = textResponse("Rate Limit Exceeded", 429);
      const fetchMock = stubFetch([rateLimited, jsonResponse({ time: makeStream([0]) })]);
      const { client, sleep } = createClient();

      const result = await client.fetchStreams(42);

      expect(Object.keys(result)).toEqual(["time"]);
      expect(rateLimited.bodyUsed).toBe(true);
      expect(fetchMock.mock.calls[0][0]).toBe(fetchMock.mock.calls[1][0]);
      expect(sleep.mock.calls).toEqual([[60000]]);
    });

    it("should fail on server errors", async () => {
      stubFetch([textResponse("Bad Gateway", 502)]);
      const { client } = createClient();

      await expect(client.fetchStreams(42)).rejects.toThrow(
        "Streams fetch failed (HTTP 502): Bad Gateway"
      );
    });
  });
});
