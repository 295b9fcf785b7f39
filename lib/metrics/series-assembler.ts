/**
 * Series Assembler
 *
 * Places raw samples on the requested interval grid. The platform has
 * already aggregated to the interval, so values are passed through; this
 * only aligns them to buckets and marks the empty ones.
 */

import { asMilliseconds, fromEpochMs, toEpochMs } from "../date-utils";
import type { BindingSamples } from "./query-engine";
import { compareBindings } from "./point-resolver";
import type {
  MetricSample,
  MetricSeries,
  MetricsReadResult,
  RawSample,
  ResolvedPointBinding,
  TimeWindow,
} from "./types";

/**
 * Number of buckets covering [start, end): ceil((end - start) / interval)
 */
export function bucketCount(window: TimeWindow): number {
  const spanMs = toEpochMs(window.end) - toEpochMs(window.start);
  return Math.max(0, Math.ceil(spanMs / (window.intervalSeconds * 1000)));
}

/**
 * Build the bucketed series of one binding. Bucket i covers
 * [start + i·interval, start + (i+1)·interval); the first sample in a bucket
 * wins and samples outside the grid are dropped.
 */
export function assembleSeries(
  binding: ResolvedPointBinding,
  samples: RawSample[],
  window: TimeWindow,
): MetricSeries {
  const startMs = toEpochMs(window.start);
  const intervalMs = window.intervalSeconds * 1000;
  const count = bucketCount(window);
  const values: (number | null)[] = new Array<number | null>(count).fill(null);

  for (const sample of samples) {
    const index = Math.floor((sample.timeMs - startMs) / intervalMs);
    if (index < 0 || index >= count) continue;
    if (values[index] === null) {
      values[index] = sample.value;
    }
  }

  const timeZone = binding.facility.timezone;
  const buckets: MetricSample[] = values.map((value, i) => {
    const timeMs = asMilliseconds(startMs + i * intervalMs);
    return { timestamp: fromEpochMs(timeMs, timeZone), timeMs, value };
  });

  return {
    facilityShortName: binding.facility.shortName,
    deviceId: binding.device.id,
    deviceName: binding.device.name,
    deviceAlias: binding.device.alias,
    deviceKind: binding.device.kind,
    label: binding.label,
    pointAlias: binding.pointAlias,
    spec: binding.spec,
    samples: buckets,
  };
}

/**
 * Assemble every binding's series, ordered by (facility, device id, label)
 */
export function assemble(
  results: BindingSamples[],
  window: TimeWindow,
): MetricSeries[] {
  return [...results]
    .sort((a, b) => compareBindings(a.binding, b.binding))
    .map(({ binding, samples }) => assembleSeries(binding, samples, window));
}

/**
 * Group a facility's series by device kind, keeping their order
 */
export function groupByDeviceKind(
  series: MetricSeries[],
): Map<string, MetricSeries[]> {
  const groups = new Map<string, MetricSeries[]>();
  for (const entry of series) {
    const group = groups.get(entry.deviceKind) ?? [];
    group.push(entry);
    groups.set(entry.deviceKind, group);
  }
  return groups;
}

export function seriesKey(
  facilityShortName: string,
  deviceId: string,
  label: string,
): string {
  return `${facilityShortName}/${deviceId}/${label}`;
}

/**
 * Index every successfully read series by seriesKey(facility, device, label)
 */
export function indexSeries(
  result: MetricsReadResult,
): Map<string, MetricSeries> {
  const index = new Map<string, MetricSeries>();
  for (const facility of result.facilities) {
    if (facility.status !== "ok") continue;
    for (const series of facility.series) {
      index.set(
        seriesKey(series.facilityShortName, series.deviceId, series.label),
        series,
      );
    }
  }
  return index;
}
