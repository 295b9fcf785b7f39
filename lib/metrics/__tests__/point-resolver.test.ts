import {
  describe,
  it,
  expect,
  beforeEach,
  afterEach,
  jest,
} from "@jest/globals";
import { DeviceKind, MetricName } from "../catalog";
import { aliasMetric, catalogMetric } from "../filter";
import { InvalidFilter, UnknownFacility } from "../errors";
import { PointResolver } from "../point-resolver";
import {
  FakeAtlasClient,
  makeDevice,
  makeFacility,
} from "../../__tests__/fake-atlas-client";

const suctionPressure = catalogMetric(
  DeviceKind.COMPRESSOR,
  MetricName.SUCTION_PRESSURE,
);

function buildClient(): FakeAtlasClient {
  return new FakeAtlasClient()
    .addFacility(makeFacility("stockton"), [
      makeDevice("c2", "compressor", {
        SuctionPressure: "st_c2_suction",
        MotorCurrent: "st_c2_motorCurrent",
      }),
    ])
    .addFacility(makeFacility("oxnard"), [
      makeDevice("c9", "compressor", {
        SuctionPressure: "ox_c9_suction",
        MotorCurrent: "ox_c9_motorCurrent",
      }),
      makeDevice("c1", "compressor", {
        MotorCurrent: "ox_c1_motorCurrent",
        OilPressure: "ox_c1_oil",
      }),
      makeDevice("v1", "vessel", { SuctionPressure: "ox_v1_suction" }),
    ]);
}

describe("PointResolver", () => {
  let client: FakeAtlasClient;

  beforeEach(() => {
    client = buildClient();
    jest.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("orders bindings by facility, device id and label", async () => {
    const resolver = new PointResolver(client);
    const bindings = await resolver.resolve({
      metrics: [suctionPressure, aliasMetric("compressor", ".*_motorCurrent")],
    });

    expect(
      bindings.map((b) => [b.facility.shortName, b.device.id, b.label]),
    ).toEqual([
      ["oxnard", "c1", "ox_c1_motorCurrent"],
      ["oxnard", "c9", "ox_c9_motorCurrent"],
      ["oxnard", "c9", "suction_pressure"],
      ["stockton", "c2", "st_c2_motorCurrent"],
      ["stockton", "c2", "suction_pressure"],
    ]);
  });

  it("only binds aliases matching the regex, labelled by the raw alias", async () => {
    const resolver = new PointResolver(client);
    const bindings = await resolver.resolve({
      facilities: ["oxnard"],
      metrics: [aliasMetric("compressor", "ox_c1_")],
    });

    expect(bindings).toHaveLength(2);
    for (const binding of bindings) {
      expect(binding.label).toBe(binding.pointAlias);
      expect(binding.pointAlias.startsWith("ox_c1_")).toBe(true);
      expect(
        binding.device.properties.map((p) => p.value.alias),
      ).toContain(binding.pointAlias);
    }
  });

  it("skips devices lacking a catalog property without error", async () => {
    const resolver = new PointResolver(client);
    const bindings = await resolver.resolve({
      facilities: ["oxnard"],
      metrics: [suctionPressure],
    });

    expect(bindings.map((b) => b.device.id)).toEqual(["c9"]);
  });

  it("reports missing catalog properties under the report policy", async () => {
    const resolver = new PointResolver(client, {
      missingMetricPolicy: "report",
    });
    const target = {
      facility: client.facilities[1],
      orgId: "org-oxnard",
      agentId: "agent-oxnard",
    };
    const resolution = await resolver.resolveFacility(target, [
      suctionPressure,
    ]);

    expect(resolution.unresolved).toEqual([
      {
        facilityShortName: "oxnard",
        deviceId: "c1",
        deviceName: "Device c1",
        label: "suction_pressure",
        reason: "missing-property",
      },
    ]);
  });

  it("returns identical bindings when resolved twice", async () => {
    const resolver = new PointResolver(client);
    const filter = {
      metrics: [suctionPressure, aliasMetric("compressor", ".*")],
    };
    const first = await resolver.resolve(filter);
    const second = await resolver.resolve(filter);

    expect(second).toEqual(first);
  });

  it("keeps one binding per facility, device and alias when specs overlap", async () => {
    const resolver = new PointResolver(client);
    const bindings = await resolver.resolve({
      facilities: ["stockton"],
      metrics: [
        aliasMetric("compressor", ".*_motorCurrent"),
        aliasMetric("compressor", "st_c2_motor"),
        aliasMetric("compressor", ".*_motorCurrent"),
      ],
    });

    expect(bindings.map((b) => b.pointAlias)).toEqual(["st_c2_motorCurrent"]);
  });

  it("ignores devices of other kinds", async () => {
    const resolver = new PointResolver(client);
    const bindings = await resolver.resolve({
      facilities: ["oxnard"],
      metrics: [catalogMetric(DeviceKind.VESSEL, MetricName.SUCTION_PRESSURE)],
    });

    expect(bindings.map((b) => b.pointAlias)).toEqual(["ox_v1_suction"]);
  });

  it("throws UnknownFacility listing every missing name", async () => {
    const resolver = new PointResolver(client);
    const error = await resolver
      .resolve({
        facilities: ["oxnard", "fresno", "modesto"],
        metrics: [suctionPressure],
      })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(UnknownFacility);
    expect(error instanceof UnknownFacility && error.shortNames).toEqual([
      "fresno",
      "modesto",
    ]);
  });

  it("skips facilities without an agent when selecting all", async () => {
    client.addFacility(makeFacility("fresno", { agents: [] }));
    const resolver = new PointResolver(client);
    const bindings = await resolver.resolve({ metrics: [suctionPressure] });

    expect(new Set(bindings.map((b) => b.facility.shortName))).toEqual(
      new Set(["oxnard", "stockton"]),
    );
  });

  it("rejects the whole call when one facility's devices cannot be listed", async () => {
    client.failures.set("agent-stockton", new Error("connection reset"));
    const resolver = new PointResolver(client);
    await expect(
      resolver.resolve({ metrics: [suctionPressure] }),
    ).rejects.toThrow("connection reset");
  });

  it("validates the filter before calling the API", async () => {
    const resolver = new PointResolver(client);
    await expect(resolver.resolve({ metrics: [] })).rejects.toThrow(
      InvalidFilter,
    );
    expect(client.calls).toEqual([]);
  });
});
