import { describe, it, expect } from "vitest";
import {
  REQUIRED_STREAMS_DEFAULT,
  REQUIRED_STREAMS_RUN,
  STREAM_KEYS,
  hasData,
  requiredStreamsFor,
  sportTypeOf,
} from "./streams.js";

describe("streams", () => {
  describe("hasData", () => {
    it("should accept a stream with samples", () => {
      expect(hasData({ data: [0], original_size: 1 })).toBe(true);
    });

    it("should reject empty or missing data", () => {
      expect(hasData({ data: [], original_size: 0 })).toBe(false);
      expect(hasData({ original_size: 0 })).toBe(false);
    });
  });

  describe("requiredStreamsFor", () => {
    it("should return the full set for runs regardless of case", () => {
      expect(requiredStreamsFor("Run")).toBe(REQUIRED_STREAMS_RUN);
      expect(requiredStreamsFor("run")).toBe(REQUIRED_STREAMS_RUN);
      expect(requiredStreamsFor("RUN")).toBe(REQUIRED_STREAMS_RUN);
    });

    it("should return the time-only set for other sports", () => {
      expect(requiredStreamsFor("Ride")).toBe(REQUIRED_STREAMS_DEFAULT);
      expect(requiredStreamsFor("TrailRun")).toBe(REQUIRED_STREAMS_DEFAULT);
      expect(requiredStreamsFor(null)).toBe(REQUIRED_STREAMS_DEFAULT);
      expect([...REQUIRED_STREAMS_DEFAULT]).toEqual(["time"]);
    });

    it("should require eight stream types for runs", () => {
      expect([...REQUIRED_STREAMS_RUN].sort()).toEqual([
        "altitude",
        "distance",
        "grade_smooth",
        "heartrate",
        "latlng",
        "moving",
        "time",
        "velocity_smooth",
      ]);
    });
  });

  describe("sportTypeOf", () => {
    it("should prefer sport_type and fall back to type", () => {
      expect(sportTypeOf({ sport_type: "TrailRun", type: "Run" })).toBe("TrailRun");
      expect(sportTypeOf({ type: "Run" })).toBe("Run");
      expect(sportTypeOf({})).toBeNull();
    });
  });

  it("should request ten stream keys", () => {
    expect(STREAM_KEYS.join(",")).toBe(
      "time,heartrate,cadence,watts,velocity_smooth,altitude,grade_smooth,latlng,temp,moving"
    );
  });
});
