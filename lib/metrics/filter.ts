/**
 * Filters and alias matching
 *
 * A DeviceMetricSpec names a metric either through the catalog
 * (device kind + metric name) or through a regular expression over the raw
 * point aliases of devices of a kind. Each form has its own AliasMatcher.
 */

import { ERROR_MESSAGES } from "../../config";
import type { Device } from "../atlas/types";
import {
  DeviceKind,
  getCatalogEntry,
  isDeviceKind,
  isMetricName,
  MetricName,
} from "./catalog";
import { describeError, InvalidFilter } from "./errors";

export interface CatalogMetricSpec {
  readonly type: "catalog";
  readonly deviceKind: DeviceKind;
  readonly metric: MetricName;
}

export interface AliasRegexMetricSpec {
  readonly type: "alias-regex";
  readonly deviceKind: DeviceKind;
  readonly aliasRegex: string;
}

export type DeviceMetricSpec = CatalogMetricSpec | AliasRegexMetricSpec;

export interface Filter {
  facilities?: string[]; // Facility short names; empty means all
  metrics: DeviceMetricSpec[];
}

export interface RateFilter {
  facilities?: string[];
}

function requireDeviceKind(deviceKind: string): DeviceKind {
  if (!isDeviceKind(deviceKind)) {
    throw new InvalidFilter(
      `Unknown device kind "${deviceKind}", expected one of ${Object.values(DeviceKind).join(", ")}`,
    );
  }
  return deviceKind;
}

/**
 * Regex form aliases are matched from the first character of the alias
 */
function compileAliasRegex(aliasRegex: string): RegExp {
  try {
    return new RegExp(`^(?:${aliasRegex})`);
  } catch (error) {
    throw new InvalidFilter(
      `${ERROR_MESSAGES.INVALID_REGEX}: /${aliasRegex}/ (${describeError(error)})`,
    );
  }
}

/**
 * Metric looked up in the catalog, e.g.
 * catalogMetric(DeviceKind.COMPRESSOR, MetricName.SUCTION_PRESSURE)
 *
 * @throws InvalidFilter if the metric does not exist for the device kind
 */
export function catalogMetric(
  deviceKind: DeviceKind | string,
  metric: MetricName | string,
): CatalogMetricSpec {
  const kind = requireDeviceKind(deviceKind);
  if (!isMetricName(metric) || !getCatalogEntry(kind, metric)) {
    throw new InvalidFilter(
      `${ERROR_MESSAGES.INVALID_METRIC}: ${metric} on ${kind}`,
    );
  }
  return Object.freeze({ type: "catalog", deviceKind: kind, metric });
}

/**
 * Every point alias matching aliasRegex on devices of the kind, e.g.
 * aliasMetric(DeviceKind.COMPRESSOR, ".*_motorCurrent")
 *
 * @throws InvalidFilter if the expression does not compile
 */
export function aliasMetric(
  deviceKind: DeviceKind | string,
  aliasRegex: string,
): AliasRegexMetricSpec {
  const kind = requireDeviceKind(deviceKind);
  compileAliasRegex(aliasRegex);
  return Object.freeze({ type: "alias-regex", deviceKind: kind, aliasRegex });
}

/**
 * Check a filter before anything goes over the network. Specs may be plain
 * objects, so each one is validated again here.
 *
 * @throws InvalidFilter
 */
export function validateFilter(filter: Filter): void {
  if (!filter.metrics || filter.metrics.length === 0) {
    throw new InvalidFilter(ERROR_MESSAGES.NO_METRICS);
  }

  for (const spec of filter.metrics) {
    switch (spec.type) {
      case "catalog":
        catalogMetric(spec.deviceKind, spec.metric);
        break;
      case "alias-regex":
        aliasMetric(spec.deviceKind, spec.aliasRegex);
        break;
      default:
        throw new InvalidFilter(
          `Unknown metric spec ${JSON.stringify(spec)}`,
        );
    }
  }

  for (const name of filter.facilities ?? []) {
    if (typeof name !== "string" || name.trim() === "") {
      throw new InvalidFilter("Facility short names must be non-empty");
    }
  }
}

export interface MatchedAlias {
  alias: string; // Raw point alias
  label: string; // Metric label the series is keyed by
}

/**
 * Finds the point aliases a spec selects on one device
 */
export interface AliasMatcher {
  readonly spec: DeviceMetricSpec;
  /**
   * True when the spec names a single point every device of the kind is
   * expected to have, so finding none is worth reporting
   */
  readonly expectsMatch: boolean;
  match(device: Device): MatchedAlias[];
}

export class CatalogAliasMatcher implements AliasMatcher {
  readonly expectsMatch = true;
  private readonly propertyKey: string;

  constructor(readonly spec: CatalogMetricSpec) {
    const entry = getCatalogEntry(spec.deviceKind, spec.metric);
    if (!entry) {
      throw new InvalidFilter(
        `${ERROR_MESSAGES.INVALID_METRIC}: ${spec.metric} on ${spec.deviceKind}`,
      );
    }
    this.propertyKey = entry.propertyKey;
  }

  match(device: Device): MatchedAlias[] {
    const property = device.properties.find(
      (prop) => prop.key === this.propertyKey,
    );
    return property
      ? [{ alias: property.value.alias, label: this.spec.metric }]
      : [];
  }
}

export class RegexAliasMatcher implements AliasMatcher {
  readonly expectsMatch = false;
  private readonly pattern: RegExp;

  constructor(readonly spec: AliasRegexMetricSpec) {
    this.pattern = compileAliasRegex(spec.aliasRegex);
  }

  match(device: Device): MatchedAlias[] {
    return device.properties
      .filter((prop) => this.pattern.test(prop.value.alias))
      .map((prop) => ({ alias: prop.value.alias, label: prop.value.alias }));
  }
}

export function createAliasMatcher(spec: DeviceMetricSpec): AliasMatcher {
  switch (spec.type) {
    case "catalog":
      return new CatalogAliasMatcher(spec);
    case "alias-regex":
      return new RegexAliasMatcher(spec);
  }
}
