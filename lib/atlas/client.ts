/**
 * Atlas API Client
 *
 * Typed wrapper around the platform's primitive operations: facility and
 * device enumeration, point alias resolution, historical values and hourly
 * rates.
 */

import { now, type ZonedDateTime } from "@internationalized/date";
import { QUERY_CONFIG } from "../../config";
import {
  asMilliseconds,
  formatAtlasTimestamp,
  fromUnixTimestamp,
} from "../date-utils";
import { AtlasHttpClient, type AtlasHttpClientOptions } from "./http-client";
import {
  DevicesResponseSchema,
  FacilitiesResponseSchema,
  HistoricalValuesResponseSchema,
  HourlyRatesResponseSchema,
  PointIdsResponseSchema,
  parseResponse,
  type RawHourlyRate,
} from "./schemas";
import type {
  Device,
  Facility,
  HistoricalValuesPage,
  HistoricalValuesRequest,
  HourlyRate,
  HourlyRates,
} from "./types";

export interface IAtlasClient {
  listFacilities(signal?: AbortSignal): Promise<Facility[]>;
  listDevices(
    orgId: string,
    agentId: string,
    signal?: AbortSignal,
  ): Promise<Device[]>;
  /**
   * Map point aliases to point ids. Aliases the platform does not know are
   * left out of the result.
   */
  getPointIds(
    orgId: string,
    agentId: string,
    pointAliases: string[],
    signal?: AbortSignal,
  ): Promise<Record<string, string>>;
  /**
   * Fetch one page of historical values. Pass the previous page's
   * nextPageToken to continue.
   */
  getHistoricalValues(
    orgId: string,
    agentId: string,
    request: HistoricalValuesRequest,
    pageToken?: string,
    signal?: AbortSignal,
  ): Promise<HistoricalValuesPage>;
  getHourlyRates(
    orgId: string,
    agentId: string,
    since?: ZonedDateTime,
    until?: ZonedDateTime,
    signal?: AbortSignal,
  ): Promise<HourlyRates>;
}

/**
 * Iterate over every page of a historical values query, following page
 * tokens until the platform stops returning one
 *
 * @throws Error if the platform keeps paginating past maxPages
 */
export async function* historicalValuePages(
  client: IAtlasClient,
  orgId: string,
  agentId: string,
  request: HistoricalValuesRequest,
  signal?: AbortSignal,
  maxPages: number = QUERY_CONFIG.maxPages,
): AsyncGenerator<HistoricalValuesPage, void, undefined> {
  let pageToken: string | undefined;

  for (let page = 0; page < maxPages; page++) {
    const result = await client.getHistoricalValues(
      orgId,
      agentId,
      request,
      pageToken,
      signal,
    );
    yield result;

    if (!result.nextPageToken) return;
    pageToken = result.nextPageToken;
  }

  throw new Error(
    `Historical values for agent ${agentId} still paginating after ${maxPages} pages`,
  );
}

function toHourlyRates(
  rates: RawHourlyRate[] | null | undefined,
  timeZone: string,
): HourlyRate[] {
  return (rates ?? []).map((rate) => ({
    start: fromUnixTimestamp(rate.start, timeZone),
    startMs: asMilliseconds(rate.start * 1000),
    rate: rate.rate,
  }));
}

export class AtlasClient implements IAtlasClient {
  private http: AtlasHttpClient;

  constructor(http: AtlasHttpClient);
  constructor(options: AtlasHttpClientOptions);
  constructor(httpOrOptions: AtlasHttpClient | AtlasHttpClientOptions) {
    this.http =
      httpOrOptions instanceof AtlasHttpClient
        ? httpOrOptions
        : new AtlasHttpClient(httpOrOptions);
  }

  /**
   * List facilities the logged in user has access to
   */
  async listFacilities(signal?: AbortSignal): Promise<Facility[]> {
    const userId = await this.http.getUserId(signal);
    const path = `/users/${encodeURIComponent(userId)}/facilities`;
    const data = await this.http.request("GET", path, {
      query: { view: "extended" },
      signal,
    });
    return parseResponse(FacilitiesResponseSchema, data, path);
  }

  /**
   * List all devices for a given facility
   */
  async listDevices(
    orgId: string,
    agentId: string,
    signal?: AbortSignal,
  ): Promise<Device[]> {
    const path = `${agentPath(orgId, agentId)}/devices`;
    const data = await this.http.request("GET", path, { signal });
    return parseResponse(DevicesResponseSchema, data, path);
  }

  async getPointIds(
    orgId: string,
    agentId: string,
    pointAliases: string[],
    signal?: AbortSignal,
  ): Promise<Record<string, string>> {
    const path = `${agentPath(orgId, agentId)}/point-ids`;
    const data = await this.http.request("POST", path, {
      json: { names: pointAliases },
      signal,
    });
    return parseResponse(PointIdsResponseSchema, data, path);
  }

  async getHistoricalValues(
    orgId: string,
    agentId: string,
    request: HistoricalValuesRequest,
    pageToken?: string,
    signal?: AbortSignal,
  ): Promise<HistoricalValuesPage> {
    const end = request.end ?? now("UTC");
    const start =
      request.start ??
      end.subtract({ milliseconds: QUERY_CONFIG.defaultMetricWindowMs });

    const path = `${agentPath(orgId, agentId)}/facility-readings`;
    const data = await this.http.request("POST", path, {
      json: {
        point_ids: request.pointIds,
        start: formatAtlasTimestamp(start),
        end: formatAtlasTimestamp(end),
        interval: request.interval ?? QUERY_CONFIG.defaultIntervalSeconds,
        aggregate_by: request.aggregateBy ?? ["avg"],
        changes_only: request.changesOnly ?? false,
        scaled: request.scaled ?? true,
        ...(pageToken ? { page_token: pageToken } : {}),
      },
      signal,
    });
    return parseResponse(HistoricalValuesResponseSchema, data, path);
  }

  /**
   * Get hourly rates for a facility. `since` is inclusive, `until` exclusive;
   * rate start times come back in the time zone of `since`.
   */
  async getHourlyRates(
    orgId: string,
    agentId: string,
    since?: ZonedDateTime,
    until?: ZonedDateTime,
    signal?: AbortSignal,
  ): Promise<HourlyRates> {
    const end = until ?? now("UTC");
    const start =
      since ?? end.subtract({ milliseconds: QUERY_CONFIG.defaultRateWindowMs });

    const path = `${agentPath(orgId, agentId)}/rates`;
    const data = await this.http.request("GET", path, {
      query: {
        since: formatAtlasTimestamp(start),
        until: formatAtlasTimestamp(end),
      },
      signal,
    });
    const raw = parseResponse(HourlyRatesResponseSchema, data, path);
    const timeZone = start.timeZone;

    return {
      usageRate: toHourlyRates(raw.usage_rate, timeZone),
      maximumDemandCharge: toHourlyRates(raw.maximum_demand_charge, timeZone),
      timeOfUseDemandCharge: toHourlyRates(
        raw.time_of_use_demand_charge,
        timeZone,
      ),
      dayAheadMarketRate: toHourlyRates(raw.day_ahead_market_rate, timeZone),
      realTimeMarketRate: toHourlyRates(raw.real_time_market_rate, timeZone),
    };
  }
}

function agentPath(orgId: string, agentId: string): string {
  return `/orgs/${encodeURIComponent(orgId)}/agents/${encodeURIComponent(agentId)}`;
}
