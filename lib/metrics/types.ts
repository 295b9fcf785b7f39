import type { ZonedDateTime } from "@internationalized/date";
import type { Device, Facility } from "../atlas/types";
import type { Milliseconds } from "../date-utils";
import type { FacilityQueryFailed } from "./errors";
import type { DeviceMetricSpec } from "./filter";

/**
 * What to do with a catalog metric a device does not expose, or an alias the
 * platform cannot resolve to a point id
 */
export type MissingMetricPolicy = "skip" | "report";

/**
 * A point selected by a filter: one series in the result
 */
export interface PointBinding {
  facility: Facility;
  device: Device;
  spec: DeviceMetricSpec;
  label: string; // Catalog metric name, or the raw alias for regex specs
  pointAlias: string;
}

/**
 * A binding whose alias has been resolved to a point id for this read.
 * Point ids are not stable across sessions and are never kept.
 */
export interface ResolvedPointBinding extends PointBinding {
  pointId: string;
}

export type UnresolvedReason = "missing-property" | "unknown-alias";

export interface UnresolvedMetric {
  facilityShortName: string;
  deviceId: string;
  deviceName: string;
  label: string;
  pointAlias?: string;
  reason: UnresolvedReason;
}

/**
 * Requested time range and bucket size. start is inclusive, end exclusive.
 */
export interface TimeWindow {
  start: ZonedDateTime;
  end: ZonedDateTime;
  intervalSeconds: number;
}

export interface RawSample {
  timeMs: Milliseconds;
  value: number;
}

export interface MetricSample {
  timestamp: ZonedDateTime; // Bucket start, in the facility's time zone
  timeMs: Milliseconds;
  value: number | null; // null = no reading in this bucket
}

export interface MetricSeries {
  facilityShortName: string;
  deviceId: string;
  deviceName: string;
  deviceAlias: string;
  deviceKind: string;
  label: string;
  pointAlias: string;
  spec: DeviceMetricSpec;
  samples: MetricSample[];
}

export type FacilityMetrics =
  | {
      status: "ok";
      facility: Facility;
      series: MetricSeries[];
      byDeviceKind: Map<string, MetricSeries[]>; // The same series grouped by device kind
    }
  | {
      status: "failed";
      facility: Facility;
      error: FacilityQueryFailed;
    };

export interface MetricsReadResult {
  window: TimeWindow;
  facilities: FacilityMetrics[]; // Ordered by facility short name
  unresolved: UnresolvedMetric[]; // Empty unless missingMetricPolicy is "report"
}
