export { ATLAS_API_CONFIG, QUERY_CONFIG, ERROR_MESSAGES } from "../config";
export { AtlasConfigError, getAtlasEnv, isDebugEnabled } from "./env";
export type { AtlasEnv } from "./env";

export {
  AtlasHttpClient,
  AtlasHttpError,
  AtlasAuthError,
} from "./atlas/http-client";
export type {
  AtlasHttpClientOptions,
  FetchLike,
  RequestOptions,
} from "./atlas/http-client";
export { AtlasResponseError } from "./atlas/schemas";
export { AtlasClient, historicalValuePages } from "./atlas/client";
export type { IAtlasClient } from "./atlas/client";
export {
  createAtlasClient,
  resolveRefreshToken,
  DEFAULT_ENV_FILES,
} from "./atlas/credentials";
export {
  indexDevices,
  listAllDevices,
  pluralKindTitle,
} from "./atlas/device-index";
export type { DeviceEntry, DevicesByKind } from "./atlas/device-index";
export * from "./atlas/types";

export {
  DeviceKind,
  MetricName,
  getCatalogEntry,
  isValidMetric,
  listCatalogEntries,
  metricsForKind,
} from "./metrics/catalog";
export {
  catalogMetric,
  aliasMetric,
  validateFilter,
  createAliasMatcher,
  CatalogAliasMatcher,
  RegexAliasMatcher,
} from "./metrics/filter";
export type {
  AliasMatcher,
  AliasRegexMetricSpec,
  CatalogMetricSpec,
  DeviceMetricSpec,
  Filter,
  MatchedAlias,
  RateFilter,
} from "./metrics/filter";
export {
  AtlasQueryError,
  InvalidFilter,
  UnknownFacility,
  FacilityQueryFailed,
  AllFacilitiesFailed,
  QueryCancelled,
  QueryTimeout,
} from "./metrics/errors";
export type { AtlasQueryErrorCode } from "./metrics/errors";
export { selectFacilities } from "./metrics/facility-selector";
export type { FacilityTarget } from "./metrics/facility-selector";
export { PointResolver } from "./metrics/point-resolver";
export type { FacilityResolution } from "./metrics/point-resolver";
export { HistoricalQueryEngine } from "./metrics/query-engine";
export type { BindingSamples, FacilityFetchResult } from "./metrics/query-engine";
export {
  assemble,
  assembleSeries,
  bucketCount,
  groupByDeviceKind,
  indexSeries,
  seriesKey,
} from "./metrics/series-assembler";
export { MetricsReader, resolveTimeWindow } from "./metrics/metrics-reader";
export type {
  MetricsReaderOptions,
  MetricsReadOptions,
} from "./metrics/metrics-reader";
export type * from "./metrics/types";
export { RatesReader } from "./rates/rates-reader";
export type {
  FacilityRates,
  RatesReaderOptions,
  RatesReadOptions,
  RatesReadResult,
} from "./rates/rates-reader";
export { toJson, toJsonValue } from "./json";
export type { JsonValue } from "./json";
