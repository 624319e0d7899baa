import { describe, it, expect, vi, beforeEach } from "vitest";
import pg from "pg";
import { syncActivities } from "./orchestrator.js";
import type { AppConfig } from "../../lib/config.js";
import { setLogLevel } from "../../lib/logger.js";
import { AuthenticationError, StravaApiError } from "../../lib/errors.js";
import { jsonResponse, makeActivity, makeStream, stubFetch, textResponse } from "./test-helpers.js";

const { mockClient } = vi.hoisted(() => ({
  mockClient: {
    connect: vi.fn(),
    query: vi.fn(),
    end: vi.fn(),
  },
}));

// Mock pg module
vi.mock("pg", () => ({
  default: {
    Client: vi.fn(() => mockClient),
  },
}));

const config: AppConfig = {
  envPath: "/nonexistent/.env",
  db: { host: "localhost", port: 5432, database: "test", user: "test", password: "test" },
  strava: { clientId: "1234", clientSecret: "test-secret", refreshToken: "test-refresh" },
  logLevel: null,
};

function answerQueries(): void {
  mockClient.query.mockImplementation(async (sql: string) => {
    if (sql.includes("INSERT INTO meta.ingest_runs")) return { rows: [{ run_id: "17" }] };
    if (sql.includes("MAX(start_date_utc)")) return { rows: [{ latest: null }] };
    return { rows: [] };
  });
}

function executedSql(): string[] {
  return mockClient.query.mock.calls.map((call) => String(call[0]).trim());
}

function runOptions() {
  return {
    config,
    observer: {},
    sleep: vi.fn(async (_ms: number) => {}),
    apiBaseUrl: "https://strava.test/api/v3",
    tokenUrl: "https://strava.test/oauth/token",
  };
}

describe("strava orchestrator", () => {
  beforeEach(() => {
    vi.clearAllMocks();
    setLogLevel("error");
    answerQueries();
  });

  it("should sync, record a successful run and close the connection", async () => {
    const run = makeActivity(42, { sport_type: "Run", start_date: "2026-10-17T06:00:00Z" });
    stubFetch([
      jsonResponse({ access_token: "test-access", refresh_token: "test-refresh" }),
      jsonResponse([run]),
      jsonResponse({ time: makeStream([0, 1]), heartrate: makeStream([120, 121]) }),
      jsonResponse([]),
    ]);

    const result = await syncActivities(runOptions());

    expect(result).toMatchObject({
      runId: "17",
      activitiesProcessed: 1,
      streamsUpserted: 2,
      activitiesSkipped: 0,
    });

    const sql = executedSql();
    expect(sql[0]).toContain("INSERT INTO meta.ingest_runs");
    expect(sql[1]).toBe("BEGIN");
    expect(sql.filter((s) => s === "COMMIT")).toHaveLength(1);

    const finish = mockClient.query.mock.calls.find((call) =>
      String(call[0]).includes("status = 'success'")
    );
    expect(finish?.[1]).toEqual(["17", 1, 2, 1, new Date("2026-10-17T06:00:00Z")]);
    expect(mockClient.end).toHaveBeenCalledTimes(1);
  });

  it("should roll back, record the failure and rethrow on API errors", async () => {
    stubFetch([
      jsonResponse({ access_token: "test-access" }),
      textResponse("upstream down", 503),
    ]);

    await expect(syncActivities(runOptions())).rejects.toBeInstanceOf(StravaApiError);

    const sql = executedSql();
    expect(sql).toContain("ROLLBACK");
    expect(sql).not.toContain("COMMIT");

    const failed = mockClient.query.mock.calls.find((call) =>
      String(call[0]).includes("status = 'failed'")
    );
    expect(failed?.[1]).toEqual([
      "17",
      "Activities fetch failed (HTTP 503): upstream down",
    ]);
    expect(mockClient.end).toHaveBeenCalledTimes(1);
  });

  it("should abort before touching the database when the token is rejected", async () => {
    stubFetch([textResponse("invalid refresh_token", 401)]);

    await expect(syncActivities(runOptions())).rejects.toBeInstanceOf(AuthenticationError);

    expect(pg.Client).not.toHaveBeenCalled();
    expect(mockClient.query).not.toHaveBeenCalled();
  });
});
