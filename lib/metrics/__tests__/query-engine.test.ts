import {
  describe,
  it,
  expect,
  beforeEach,
  afterEach,
  jest,
} from "@jest/globals";
import { parseAbsolute } from "@internationalized/date";
import { aliasMetric } from "../filter";
import type { FacilityTarget } from "../facility-selector";
import { PointResolver } from "../point-resolver";
import { HistoricalQueryEngine, chunk, extractSamples } from "../query-engine";
import type { PointBinding, TimeWindow } from "../types";
import {
  FakeAtlasClient,
  makeDevice,
  makeFacility,
} from "../../__tests__/fake-atlas-client";

const T0 = 1682899200; // 2023-05-01T00:00:00Z

const window: TimeWindow = {
  start: parseAbsolute("2023-05-01T00:00:00Z", "UTC"),
  end: parseAbsolute("2023-05-01T01:00:00Z", "UTC"),
  intervalSeconds: 1800,
};

function setup(aliases: string[], pointIds: Record<string, string>) {
  const facility = makeFacility("oxnard");
  const properties: Record<string, string> = {};
  aliases.forEach((alias, i) => {
    properties[`Prop${i}`] = alias;
  });
  const client = new FakeAtlasClient().addFacility(
    facility,
    [makeDevice("c1", "compressor", properties)],
    pointIds,
  );
  const target: FacilityTarget = {
    facility,
    orgId: facility.organizationId,
    agentId: "agent-oxnard",
  };
  const bindings: PointBinding[] = new PointResolver(client).resolveDevices(
    target,
    client.devices.get("agent-oxnard") ?? [],
    [aliasMetric("compressor", ".*")],
  ).bindings;
  return { client, target, bindings };
}

describe("chunk()", () => {
  it("splits into batches of at most the given size", () => {
    expect(chunk([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
    expect(chunk([], 3)).toEqual([]);
  });

  it("rejects a non-positive size", () => {
    expect(() => chunk([1], 0)).toThrow("Batch size must be a positive integer");
  });
});

describe("extractSamples()", () => {
  it("sorts analog samples by time", () => {
    const samples = extractSamples(
      [
        {
          pointId: "p1",
          values: {
            avg: { analog: { timestamps: [T0 + 60, T0], values: [2.5, 1.5] } },
          },
        },
      ],
      "avg",
    );
    expect(samples).toEqual([
      { timeMs: T0 * 1000, value: 1.5 },
      { timeMs: (T0 + 60) * 1000, value: 2.5 },
    ]);
  });

  it("turns discrete values into 1 and 0", () => {
    const samples = extractSamples(
      [
        {
          pointId: "p1",
          values: {
            max: {
              discrete: { timestamps: [T0, T0 + 60], values: [true, false] },
            },
          },
        },
      ],
      "max",
    );
    expect(samples.map((s) => s.value)).toEqual([1, 0]);
  });

  it("ignores other aggregations", () => {
    const samples = extractSamples(
      [
        {
          pointId: "p1",
          values: { min: { analog: { timestamps: [T0], values: [1] } } },
        },
      ],
      "avg",
    );
    expect(samples).toEqual([]);
  });
});

describe("HistoricalQueryEngine", () => {
  beforeEach(() => {
    jest.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("looks point ids up once per facility", async () => {
    const { client, target, bindings } = setup(["a", "b", "c"], {
      a: "1",
      b: "2",
      c: "3",
    });
    const engine = new HistoricalQueryEngine(client);
    await engine.fetchFacility(target, bindings, window);

    const lookups = client.callsTo("getPointIds");
    expect(lookups).toHaveLength(1);
    expect(lookups[0].aliases).toEqual(["a", "b", "c"]);
  });

  it("batches point ids by maxBatchSize", async () => {
    const aliases = ["a", "b", "c", "d", "e"];
    const { client, target, bindings } = setup(aliases, {
      a: "1",
      b: "2",
      c: "3",
      d: "4",
      e: "5",
    });
    const engine = new HistoricalQueryEngine(client, { maxBatchSize: 2 });
    const result = await engine.fetchFacility(target, bindings, window);

    expect(
      client.callsTo("getHistoricalValues").map((c) => c.request?.pointIds),
    ).toEqual([["1", "2"], ["3", "4"], ["5"]]);
    expect(result.requestCount).toBe(3);
  });

  it("sends the window, interval and aggregation", async () => {
    const { client, target, bindings } = setup(["a"], { a: "1" });
    const engine = new HistoricalQueryEngine(client);
    await engine.fetchFacility(target, bindings, window, "max");

    const request = client.callsTo("getHistoricalValues")[0].request;
    expect(request?.start).toBe(window.start);
    expect(request?.end).toBe(window.end);
    expect(request?.interval).toBe(1800);
    expect(request?.aggregateBy).toEqual(["max"]);
  });

  it("follows page tokens to the last page", async () => {
    const { client, target, bindings } = setup(["a", "b", "c"], {
      a: "1",
      b: "2",
      c: "3",
    });
    client.pageSize = 1;
    client.analog.set("3", { timestamps: [T0], values: [7] });

    const engine = new HistoricalQueryEngine(client);
    const result = await engine.fetchFacility(target, bindings, window);

    expect(
      client.callsTo("getHistoricalValues").map((c) => c.pageToken),
    ).toEqual([undefined, "1", "2"]);
    expect(result.requestCount).toBe(3);
    expect(
      result.results.find((r) => r.binding.pointAlias === "c")?.samples,
    ).toEqual([{ timeMs: T0 * 1000, value: 7 }]);
  });

  it("stops when a request keeps paginating past maxPages", async () => {
    const { client, target, bindings } = setup(["a", "b", "c"], {
      a: "1",
      b: "2",
      c: "3",
    });
    client.pageSize = 1;

    const engine = new HistoricalQueryEngine(client, { maxPages: 2 });
    await expect(
      engine.fetchFacility(target, bindings, window),
    ).rejects.toThrow("still paginating after 2 pages");
  });

  it("drops aliases the platform cannot resolve", async () => {
    const { client, target, bindings } = setup(["a", "ghost"], { a: "1" });
    const engine = new HistoricalQueryEngine(client);
    const result = await engine.fetchFacility(target, bindings, window);

    expect(result.results.map((r) => r.binding.pointAlias)).toEqual(["a"]);
    expect(result.unresolved).toEqual([]);
    expect(console.warn).toHaveBeenCalledWith(
      "[QueryEngine] oxnard: point ghost not found, skipping",
    );
  });

  it("reports unresolvable aliases under the report policy", async () => {
    const { client, target, bindings } = setup(["a", "ghost"], { a: "1" });
    const engine = new HistoricalQueryEngine(client, {
      missingMetricPolicy: "report",
    });
    const result = await engine.fetchFacility(target, bindings, window);

    expect(result.unresolved).toEqual([
      {
        facilityShortName: "oxnard",
        deviceId: "c1",
        deviceName: "Device c1",
        label: "ghost",
        pointAlias: "ghost",
        reason: "unknown-alias",
      },
    ]);
  });

  it("makes no requests when there is nothing to read", async () => {
    const { client, target } = setup([], {});
    const engine = new HistoricalQueryEngine(client);
    const result = await engine.fetchFacility(target, [], window);

    expect(result).toEqual({ results: [], unresolved: [], requestCount: 0 });
    expect(client.calls).toEqual([]);
  });

  it("rejects an invalid maxBatchSize", () => {
    const client = new FakeAtlasClient();
    expect(() => new HistoricalQueryEngine(client, { maxBatchSize: 0 })).toThrow(
      "maxBatchSize must be a positive integer, got 0",
    );
  });
});
