/**
 * RatesReader
 *
 * Hourly energy rates for the facilities a RateFilter selects, one rates
 * request per facility.
 */

import {
  now,
  toTimeZone,
  type ZonedDateTime,
} from "@internationalized/date";
import { ERROR_MESSAGES, QUERY_CONFIG } from "../../config";
import type { IAtlasClient } from "../atlas/client";
import { createAtlasClient } from "../atlas/credentials";
import type { Facility, HourlyRates } from "../atlas/types";
import { toEpochMs } from "../date-utils";
import { getAtlasEnv } from "../env";
import { InvalidFilter, type FacilityQueryFailed } from "../metrics/errors";
import { selectFacilities } from "../metrics/facility-selector";
import type { RateFilter } from "../metrics/filter";
import { QueryScope, runPerFacility } from "../query-scope";

export interface RatesReaderOptions {
  client?: IAtlasClient;
  refreshToken?: string;
  maxConcurrency?: number;
  timeoutMs?: number;
  debug?: boolean;
}

export interface RatesReadOptions {
  start?: ZonedDateTime; // Inclusive, defaults to 24 hours before end
  end?: ZonedDateTime; // Exclusive, defaults to now
  signal?: AbortSignal;
  timeoutMs?: number;
}

export type FacilityRates =
  | { status: "ok"; facility: Facility; rates: HourlyRates }
  | { status: "failed"; facility: Facility; error: FacilityQueryFailed };

export interface RatesReadResult {
  start: ZonedDateTime;
  end: ZonedDateTime;
  facilities: FacilityRates[]; // Ordered by facility short name
}

export class RatesReader {
  readonly client: IAtlasClient;
  private readonly maxConcurrency: number;
  private readonly timeoutMs?: number;
  private readonly debug: boolean;

  constructor(options: RatesReaderOptions = {}) {
    const env = getAtlasEnv();
    this.debug = options.debug ?? env.debug;
    this.client =
      options.client ??
      createAtlasClient({
        refreshToken: options.refreshToken,
        debug: this.debug,
      });
    this.maxConcurrency = options.maxConcurrency ?? env.maxConcurrency;
    this.timeoutMs = options.timeoutMs ?? env.timeoutMs;
  }

  /**
   * Read hourly rates. Rate start times are in each facility's time zone.
   *
   * @throws InvalidFilter if start is not before end
   * @throws UnknownFacility if a named facility does not exist
   * @throws AllFacilitiesFailed if every selected facility failed
   * @throws QueryCancelled / QueryTimeout when the signal or timeout fires
   */
  async read(
    filter: RateFilter = {},
    options: RatesReadOptions = {},
  ): Promise<RatesReadResult> {
    for (const name of filter.facilities ?? []) {
      if (typeof name !== "string" || name.trim() === "") {
        throw new InvalidFilter("Facility short names must be non-empty");
      }
    }

    const end = (options.end ?? now("UTC")).set({ millisecond: 0 });
    const start = options.start
      ? options.start.set({ millisecond: 0 })
      : end.subtract({ milliseconds: QUERY_CONFIG.defaultRateWindowMs });
    if (toEpochMs(start) >= toEpochMs(end)) {
      throw new InvalidFilter(ERROR_MESSAGES.INVALID_RANGE);
    }

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
          `[RatesReader] Reading rates for ${targets.length} facilities`,
        );
      }

      const outcomes = await runPerFacility<HourlyRates>(
        targets,
        this.maxConcurrency,
        scope,
        "RatesReader",
        (target) => {
          const timeZone = target.facility.timezone;
          return this.client.getHourlyRates(
            target.orgId,
            target.agentId,
            toTimeZone(start, timeZone),
            toTimeZone(end, timeZone),
            scope.signal,
          );
        },
      );

      const facilities = outcomes.map((outcome): FacilityRates =>
        outcome.status === "ok"
          ? { status: "ok", facility: outcome.facility, rates: outcome.value }
          : outcome,
      );

      return { start, end, facilities };
    } catch (error) {
      throw scope.toQueryError(error);
    } finally {
      scope.dispose();
    }
  }
}
