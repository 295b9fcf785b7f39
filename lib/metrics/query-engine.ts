/**
 * Historical Query Engine
 *
 * Fetches raw samples for one facility's bindings: a single alias→id lookup,
 * then facility-readings requests in batches of point ids, each request's
 * pages followed to the end before the next batch starts.
 */

import { QUERY_CONFIG } from "../../config";
import { historicalValuePages, type IAtlasClient } from "../atlas/client";
import type { AggregateBy, HistoricalValues } from "../atlas/types";
import { asMilliseconds } from "../date-utils";
import type { FacilityTarget } from "./facility-selector";
import type {
  MissingMetricPolicy,
  PointBinding,
  RawSample,
  ResolvedPointBinding,
  TimeWindow,
  UnresolvedMetric,
} from "./types";

export interface HistoricalQueryEngineOptions {
  maxBatchSize?: number;
  maxPages?: number;
  missingMetricPolicy?: MissingMetricPolicy;
  debug?: boolean;
}

export interface BindingSamples {
  binding: ResolvedPointBinding;
  samples: RawSample[];
}

export interface FacilityFetchResult {
  results: BindingSamples[]; // Same order as the bindings passed in
  unresolved: UnresolvedMetric[];
  requestCount: number; // facility-readings pages fetched
}

/**
 * Split items into chunks of at most size
 */
export function chunk<T>(items: T[], size: number): T[][] {
  if (!Number.isInteger(size) || size <= 0) {
    throw new Error(`Batch size must be a positive integer, got ${size}`);
  }
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

/**
 * Pull the samples of one aggregation out of a point's historical values.
 * Discrete (boolean) points become 1 and 0.
 */
export function extractSamples(
  values: HistoricalValues[],
  aggregate: AggregateBy,
): RawSample[] {
  const samples: RawSample[] = [];

  for (const entry of values) {
    const pointValues = entry.values[aggregate];
    if (pointValues?.analog) {
      const { timestamps, values: readings } = pointValues.analog;
      timestamps.forEach((ts, i) => {
        samples.push({ timeMs: asMilliseconds(ts * 1000), value: readings[i] });
      });
    } else if (pointValues?.discrete) {
      const { timestamps, values: readings } = pointValues.discrete;
      timestamps.forEach((ts, i) => {
        samples.push({
          timeMs: asMilliseconds(ts * 1000),
          value: readings[i] ? 1 : 0,
        });
      });
    }
  }

  return samples.sort((a, b) => a.timeMs - b.timeMs);
}

export class HistoricalQueryEngine {
  private readonly maxBatchSize: number;
  private readonly maxPages: number;
  private readonly missingMetricPolicy: MissingMetricPolicy;
  private readonly debug: boolean;

  constructor(
    private readonly client: IAtlasClient,
    options: HistoricalQueryEngineOptions = {},
  ) {
    this.maxBatchSize = options.maxBatchSize ?? QUERY_CONFIG.maxBatchSize;
    this.maxPages = options.maxPages ?? QUERY_CONFIG.maxPages;
    this.missingMetricPolicy = options.missingMetricPolicy ?? "skip";
    this.debug = options.debug ?? false;

    if (!Number.isInteger(this.maxBatchSize) || this.maxBatchSize <= 0) {
      throw new Error(
        `maxBatchSize must be a positive integer, got ${this.maxBatchSize}`,
      );
    }
  }

  /**
   * Fetch the samples of one facility's bindings over the window
   */
  async fetchFacility(
    target: FacilityTarget,
    bindings: PointBinding[],
    window: TimeWindow,
    aggregate: AggregateBy = "avg",
    signal?: AbortSignal,
  ): Promise<FacilityFetchResult> {
    if (bindings.length === 0) {
      return { results: [], unresolved: [], requestCount: 0 };
    }

    const { resolved, unresolved } = await this.resolvePointIds(
      target,
      bindings,
      signal,
    );

    const pointIds = Array.from(new Set(resolved.map((b) => b.pointId)));
    const valuesByPointId = new Map<string, HistoricalValues[]>();
    let requestCount = 0;

    // Batches run sequentially within a facility
    for (const batch of chunk(pointIds, this.maxBatchSize)) {
      const pages = historicalValuePages(
        this.client,
        target.orgId,
        target.agentId,
        {
          pointIds: batch,
          start: window.start,
          end: window.end,
          interval: window.intervalSeconds,
          aggregateBy: [aggregate],
        },
        signal,
        this.maxPages,
      );

      for await (const page of pages) {
        requestCount++;
        for (const entry of page.values) {
          const existing = valuesByPointId.get(entry.pointId) ?? [];
          existing.push(entry);
          valuesByPointId.set(entry.pointId, existing);
        }
      }
    }

    if (this.debug) {
      console.log(
        `[QueryEngine] ${target.facility.shortName}: ${pointIds.length} points, ${requestCount} requests`,
      );
    }

    return {
      results: resolved.map((binding) => ({
        binding,
        samples: extractSamples(
          valuesByPointId.get(binding.pointId) ?? [],
          aggregate,
        ),
      })),
      unresolved,
      requestCount,
    };
  }

  /**
   * One alias→id lookup for the whole facility. Aliases the platform does
   * not return are dropped.
   */
  private async resolvePointIds(
    target: FacilityTarget,
    bindings: PointBinding[],
    signal?: AbortSignal,
  ): Promise<{
    resolved: ResolvedPointBinding[];
    unresolved: UnresolvedMetric[];
  }> {
    const aliases = Array.from(new Set(bindings.map((b) => b.pointAlias)));
    const pointIds = await this.client.getPointIds(
      target.orgId,
      target.agentId,
      aliases,
      signal,
    );

    const resolved: ResolvedPointBinding[] = [];
    const unresolved: UnresolvedMetric[] = [];

    for (const binding of bindings) {
      if (Object.hasOwn(pointIds, binding.pointAlias)) {
        resolved.push({ ...binding, pointId: pointIds[binding.pointAlias] });
        continue;
      }

      console.warn(
        `[QueryEngine] ${target.facility.shortName}: point ${binding.pointAlias} not found, skipping`,
      );
      if (this.missingMetricPolicy === "report") {
        unresolved.push({
          facilityShortName: target.facility.shortName,
          deviceId: binding.device.id,
          deviceName: binding.device.name,
          label: binding.label,
          pointAlias: binding.pointAlias,
          reason: "unknown-alias",
        });
      }
    }

    return { resolved, unresolved };
  }
}
