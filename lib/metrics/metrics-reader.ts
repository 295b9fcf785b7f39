/**
 * MetricsReader
 *
 * High-level entry point: a Filter in, facility/device/metric-indexed series
 * out. Each facility runs resolve → fetch → assemble on its own; facilities
 * run concurrently up to maxConcurrency.
 */

import { now, type ZonedDateTime } from "@internationalized/date";
import { ERROR_MESSAGES, QUERY_CONFIG } from "../../config";
import type { IAtlasClient } from "../atlas/client";
import { createAtlasClient } from "../atlas/credentials";
import { AGGREGATE_METHODS, type AggregateBy } from "../atlas/types";
import { toEpochMs } from "../date-utils";
import { getAtlasEnv } from "../env";
import { QueryScope, runPerFacility } from "../query-scope";
import { InvalidFilter } from "./errors";
import { selectFacilities } from "./facility-selector";
import { validateFilter, type Filter } from "./filter";
import { PointResolver } from "./point-resolver";
import { HistoricalQueryEngine } from "./query-engine";
import { assemble, groupByDeviceKind } from "./series-assembler";
import type {
  FacilityMetrics,
  MetricSeries,
  MetricsReadResult,
  MissingMetricPolicy,
  TimeWindow,
  UnresolvedMetric,
} from "./types";

export interface MetricsReaderOptions {
  client?: IAtlasClient; // Defaults to a client configured from the environment
  refreshToken?: string;
  missingMetricPolicy?: MissingMetricPolicy;
  maxBatchSize?: number;
  maxConcurrency?: number;
  maxPages?: number;
  timeoutMs?: number; // Default overall timeout for read()
  debug?: boolean;
}

export interface MetricsReadOptions {
  start?: ZonedDateTime; // Inclusive, defaults to 10 minutes before end
  end?: ZonedDateTime; // Exclusive, defaults to now
  interval?: number; // Seconds
  aggregate?: AggregateBy;
  signal?: AbortSignal;
  timeoutMs?: number;
}

/**
 * Work out the requested window, applying defaults
 *
 * @throws InvalidFilter if the interval is not a positive integer or start is
 * not before end
 */
export function resolveTimeWindow(options: MetricsReadOptions = {}): TimeWindow {
  const intervalSeconds =
    options.interval ?? QUERY_CONFIG.defaultIntervalSeconds;
  if (!Number.isInteger(intervalSeconds) || intervalSeconds <= 0) {
    throw new InvalidFilter(
      `${ERROR_MESSAGES.INVALID_INTERVAL}, got ${intervalSeconds}`,
    );
  }

  // Requests carry whole seconds, so the bucket grid does too
  const end = (options.end ?? now("UTC")).set({ millisecond: 0 });
  const start = options.start
    ? options.start.set({ millisecond: 0 })
    : end.subtract({ milliseconds: QUERY_CONFIG.defaultMetricWindowMs });

  if (toEpochMs(start) >= toEpochMs(end)) {
    throw new InvalidFilter(ERROR_MESSAGES.INVALID_RANGE);
  }

  return { start, end, intervalSeconds };
}

function requireAggregate(aggregate: string): AggregateBy {
  const method = AGGREGATE_METHODS.find((m) => m === aggregate);
  if (!method) {
    throw new InvalidFilter(
      `Unknown aggregation "${aggregate}", expected one of ${AGGREGATE_METHODS.join(", ")}`,
    );
  }
  return method;
}

interface FacilityRead {
  series: MetricSeries[];
  unresolved: UnresolvedMetric[];
}

export class MetricsReader {
  readonly client: IAtlasClient;
  private readonly resolver: PointResolver;
  private readonly engine: HistoricalQueryEngine;
  private readonly maxConcurrency: number;
  private readonly timeoutMs?: number;
  private readonly debug: boolean;

  constructor(options: MetricsReaderOptions = {}) {
    const env = getAtlasEnv();
    this.debug = options.debug ?? env.debug;
    this.client =
      options.client ??
      createAtlasClient({
        refreshToken: options.refreshToken,
        debug: this.debug,
      });

    const missingMetricPolicy = options.missingMetricPolicy ?? "skip";
    this.resolver = new PointResolver(this.client, {
      missingMetricPolicy,
      debug: this.debug,
    });
    this.engine = new HistoricalQueryEngine(this.client, {
      maxBatchSize: options.maxBatchSize ?? env.maxBatchSize,
      maxPages: options.maxPages,
      missingMetricPolicy,
      debug: this.debug,
    });
    this.maxConcurrency = options.maxConcurrency ?? env.maxConcurrency;
    this.timeoutMs = options.timeoutMs ?? env.timeoutMs;
  }

  /**
   * Read the series a filter selects over a time window
   *
   * Resolves even if some facilities fail; their entries carry the error.
   *
   * @throws InvalidFilter before any request is made
   * @throws UnknownFacility if a named facility does not exist
   * @throws AllFacilitiesFailed if every selected facility failed
   * @throws QueryCancelled / QueryTimeout when the signal or timeout fires
   */
  async read(
    filter: Filter,
    options: MetricsReadOptions = {},
  ): Promise<MetricsReadResult> {
    validateFilter(filter);
    const window = resolveTimeWindow(options);
    const aggregate = requireAggregate(options.aggregate ?? "avg");

    const scope = new QueryScope({
      signal: options.signal,
      timeoutMs: options.timeoutMs ?? this.timeoutMs,
    });

    try {
      scope.throwIfStopped();
      const targets = await selectFacilities(
        this.client,
        filter.facilities,
        scope.signal,
      );

      if (this.debug) {
        console.log(
          `[MetricsReader] Reading ${filter.metrics.length} metrics from ${targets.length} facilities`,
        );
      }

      const outcomes = await runPerFacility<FacilityRead>(
        targets,
        this.maxConcurrency,
        scope,
        "MetricsReader",
        async (target) => {
          const resolution = await this.resolver.resolveFacility(
            target,
            filter.metrics,
            scope.signal,
          );
          const fetched = await this.engine.fetchFacility(
            target,
            resolution.bindings,
            window,
            aggregate,
            scope.signal,
          );
          return {
            series: assemble(fetched.results, window),
            unresolved: [...resolution.unresolved, ...fetched.unresolved],
          };
        },
      );

      const facilities = outcomes.map((outcome): FacilityMetrics =>
        outcome.status === "ok"
          ? {
              status: "ok",
              facility: outcome.facility,
              series: outcome.value.series,
              byDeviceKind: groupByDeviceKind(outcome.value.series),
            }
          : outcome,
      );
      const unresolved = outcomes.flatMap((outcome) =>
        outcome.status === "ok" ? outcome.value.unresolved : [],
      );

      return { window, facilities, unresolved };
    } catch (error) {
      throw scope.toQueryError(error);
    } finally {
      scope.dispose();
    }
  }
}
