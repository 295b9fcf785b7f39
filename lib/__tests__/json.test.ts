import { describe, it, expect } from "@jest/globals";
import { parseAbsolute } from "@internationalized/date";
import { toJson, toJsonValue } from "../json";
import { FacilityQueryFailed } from "../metrics/errors";

describe("toJsonValue", () => {
  it("serializes ZonedDateTime with its offset", () => {
    const timestamp = parseAbsolute(
      "2023-05-01T00:00:00Z",
      "America/Los_Angeles",
    );
    expect(toJsonValue({ timestamp, value: 1.5 })).toEqual({
      timestamp: "2023-04-30T17:00:00-07:00",
      value: 1.5,
    });
  });

  it("turns nested Maps into objects", () => {
    const devices = new Map([
      ["Oxnard", new Map([["Compressors", { count: 2 }]])],
    ]);
    expect(toJsonValue(devices)).toEqual({
      Oxnard: { Compressors: { count: 2 } },
    });
  });

  it("serializes errors with their code", () => {
    const error = new FacilityQueryFailed("oxnard", new Error("boom"));
    expect(toJsonValue({ status: "failed", error })).toEqual({
      status: "failed",
      error: {
        name: "FacilityQueryFailed",
        message: "Query failed for facility oxnard: boom",
        code: "FACILITY_QUERY_FAILED",
      },
    });
  });

  it("keeps null and drops undefined fields", () => {
    expect(
      toJsonValue({ value: null, missing: undefined, samples: [null, 2] }),
    ).toEqual({ value: null, samples: [null, 2] });
  });
});

describe("toJson", () => {
  it("pretty-prints by default", () => {
    expect(toJson({ a: [1] })).toBe('{\n  "a": [\n    1\n  ]\n}');
    expect(toJson({ a: [1] }, 0)).toBe('{"a":[1]}');
  });
});
