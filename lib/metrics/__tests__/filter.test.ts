import { describe, it, expect } from "@jest/globals";
import {
  DeviceKind,
  MetricName,
  getCatalogEntry,
  isValidMetric,
  listCatalogEntries,
  metricsForKind,
} from "../catalog";
import {
  aliasMetric,
  catalogMetric,
  createAliasMatcher,
  validateFilter,
  type DeviceMetricSpec,
} from "../filter";
import { InvalidFilter } from "../errors";
import { makeDevice } from "../../__tests__/fake-atlas-client";

describe("metric catalog", () => {
  it("maps compressor suction pressure to its property key", () => {
    const entry = getCatalogEntry(
      DeviceKind.COMPRESSOR,
      MetricName.SUCTION_PRESSURE,
    );
    expect(entry?.propertyKey).toBe("SuctionPressure");
    expect(entry?.label).toBe("Suction Pressure");
  });

  it("only knows metrics that exist for the device kind", () => {
    expect(isValidMetric(DeviceKind.VESSEL, MetricName.SUCTION_PRESSURE)).toBe(
      true,
    );
    expect(
      isValidMetric(DeviceKind.EVAPORATOR, MetricName.SUCTION_PRESSURE),
    ).toBe(false);
  });

  it("lists metrics per kind in enum order", () => {
    expect(metricsForKind(DeviceKind.CONDENSER)).toEqual([
      MetricName.DISCHARGE_PRESSURE,
      MetricName.DISCHARGE_TEMPERATURE,
    ]);
    expect(listCatalogEntries()).toHaveLength(9);
  });
});

describe("catalogMetric()", () => {
  it("accepts a metric valid for the kind", () => {
    expect(catalogMetric("compressor", "suction_pressure")).toEqual({
      type: "catalog",
      deviceKind: DeviceKind.COMPRESSOR,
      metric: MetricName.SUCTION_PRESSURE,
    });
  });

  it("rejects a metric the kind does not have", () => {
    expect(() =>
      catalogMetric(DeviceKind.EVAPORATOR, MetricName.SUCTION_PRESSURE),
    ).toThrow(InvalidFilter);
  });

  it("rejects an unknown device kind", () => {
    expect(() => catalogMetric("chiller", "suction_pressure")).toThrow(
      'Unknown device kind "chiller"',
    );
  });
});

describe("aliasMetric()", () => {
  it("rejects a regex that does not compile", () => {
    expect(() => aliasMetric(DeviceKind.COMPRESSOR, "([")).toThrow(
      InvalidFilter,
    );
  });
});

describe("validateFilter()", () => {
  it("requires at least one metric", () => {
    expect(() => validateFilter({ metrics: [] })).toThrow(
      "Filter must contain at least one metric",
    );
  });

  it("revalidates plain-object specs", () => {
    const spec: DeviceMetricSpec = {
      type: "catalog",
      deviceKind: DeviceKind.CONDENSER,
      metric: MetricName.SUCTION_PRESSURE,
    };
    expect(() => validateFilter({ metrics: [spec] })).toThrow(InvalidFilter);
  });

  it("rejects empty facility names", () => {
    expect(() =>
      validateFilter({
        facilities: ["oxnard", " "],
        metrics: [catalogMetric("compressor", "suction_pressure")],
      }),
    ).toThrow("Facility short names must be non-empty");
  });
});

describe("alias matchers", () => {
  const compressor = makeDevice("c1", "compressor", {
    SuctionPressure: "comp1_suction_pressure",
    MotorCurrent: "comp1_motorCurrent",
    OilPressure: "comp1_oil_pressure",
    Auxiliary: "aux_comp1_motorCurrent_raw",
  });

  it("catalog matcher picks the property's alias, labelled by metric", () => {
    const matcher = createAliasMatcher(
      catalogMetric(DeviceKind.COMPRESSOR, MetricName.SUCTION_PRESSURE),
    );
    expect(matcher.expectsMatch).toBe(true);
    expect(matcher.match(compressor)).toEqual([
      { alias: "comp1_suction_pressure", label: "suction_pressure" },
    ]);
  });

  it("catalog matcher finds nothing on a device without the property", () => {
    const matcher = createAliasMatcher(
      catalogMetric(DeviceKind.COMPRESSOR, MetricName.DISCHARGE_PRESSURE),
    );
    expect(matcher.match(compressor)).toEqual([]);
  });

  it("regex matcher anchors at the start of the alias", () => {
    const matcher = createAliasMatcher(
      aliasMetric(DeviceKind.COMPRESSOR, "comp1_.*Current"),
    );
    expect(matcher.expectsMatch).toBe(false);
    expect(matcher.match(compressor)).toEqual([
      { alias: "comp1_motorCurrent", label: "comp1_motorCurrent" },
    ]);
  });

  it("regex matcher labels every match with its raw alias", () => {
    const matcher = createAliasMatcher(
      aliasMetric(DeviceKind.COMPRESSOR, ".*_pressure"),
    );
    expect(matcher.match(compressor).map((m) => m.label)).toEqual([
      "comp1_suction_pressure",
      "comp1_oil_pressure",
    ]);
  });
});
