import type { ZonedDateTime } from "@internationalized/date";
import type { Milliseconds } from "../date-utils";

/**
 * A monitored site. Queries address it by organization id and the id of its
 * first agent.
 */
export interface Facility {
  organizationId: string;
  facilityId: string;
  displayName: string;
  shortName: string;
  address: string;
  timezone: string; // IANA time zone, e.g. "America/Los_Angeles"
  agents: Agent[];
}

export interface Agent {
  agentId: string;
}

export interface PropertyValue {
  alias: string; // Raw point alias, e.g. "comp1_suction_pressure"
  name: string; // Human readable, e.g. "Suction Pressure"
  kind: string; // "analog" | "discrete"
  bias: string; // "input" | "output"
}

export interface DeviceProperty {
  key: string; // e.g. "SuctionPressure"
  value: PropertyValue;
}

export interface DeviceConnection {
  deviceId: string;
  kind: string;
}

export interface Device {
  id: string;
  name: string;
  alias: string;
  kind: string; // Raw device kind as reported by the platform
  properties: DeviceProperty[];
  upstream: DeviceConnection[];
  downstream: DeviceConnection[];
}

/**
 * Aggregation methods supported by facility-readings
 */
export type AggregateBy = "avg" | "min" | "max" | "first" | "last";

export const AGGREGATE_METHODS: readonly AggregateBy[] = [
  "avg",
  "min",
  "max",
  "first",
  "last",
];

export interface SampleSeries<T> {
  timestamps: number[]; // Unix seconds
  values: T[];
}

export interface PointValues {
  analog?: SampleSeries<number>;
  discrete?: SampleSeries<boolean>;
}

export interface HistoricalValues {
  pointId: string;
  values: Partial<Record<AggregateBy, PointValues>>;
}

export interface HistoricalValuesPage {
  values: HistoricalValues[];
  nextPageToken?: string;
}

export interface HistoricalValuesRequest {
  pointIds: string[];
  start?: ZonedDateTime; // Defaults to 10 minutes before end
  end?: ZonedDateTime; // Defaults to now
  interval?: number; // Seconds, defaults to 60
  aggregateBy?: AggregateBy[]; // Defaults to ["avg"]
  changesOnly?: boolean; // Defaults to false
  scaled?: boolean; // Defaults to true (physical units)
}

/**
 * One hourly rate. `start` is the beginning of the hour.
 */
export interface HourlyRate {
  start: ZonedDateTime;
  startMs: Milliseconds;
  rate: number;
}

export interface HourlyRates {
  usageRate: HourlyRate[];
  maximumDemandCharge: HourlyRate[];
  timeOfUseDemandCharge: HourlyRate[];
  dayAheadMarketRate: HourlyRate[];
  realTimeMarketRate: HourlyRate[];
}

export const HOURLY_RATE_SERIES: readonly (keyof HourlyRates)[] = [
  "usageRate",
  "maximumDemandCharge",
  "timeOfUseDemandCharge",
  "dayAheadMarketRate",
  "realTimeMarketRate",
];
