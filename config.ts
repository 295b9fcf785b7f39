// Configuration for the Atlas telemetry client

// API Configuration
export const ATLAS_API_CONFIG = {
  baseUrl: "https://atlaslive.io",
  loginEndpoint: "/api/login/v2/login",
  userinfoEndpoint: "/api/login/v2/userinfo",
  apiPrefix: "/api/front/v1",
  timeout: 30000, // 30 seconds per request
  retryAttempts: 3, // Number of retry attempts
  retryDelay: 1000, // Initial retry delay in ms, doubled per attempt
  tokenExpirationMargin: 30 * 60 * 1000, // Refresh 30 minutes before expiry
} as const;

// Query Configuration
export const QUERY_CONFIG = {
  maxBatchSize: 100, // Point ids per facility-readings request
  maxConcurrency: 4, // Facilities queried in parallel
  maxPages: 50, // Pages followed per facility-readings request
  defaultMetricWindowMs: 10 * 60 * 1000, // Last 10 minutes
  defaultIntervalSeconds: 60,
  defaultRateWindowMs: 24 * 60 * 60 * 1000, // Last 24 hours
} as const;

// Error Messages
export const ERROR_MESSAGES = {
  NO_METRICS: "Filter must contain at least one metric",
  INVALID_METRIC: "Metric is not valid for device kind",
  INVALID_REGEX: "Alias regular expression does not compile",
  INVALID_INTERVAL: "Interval must be a positive integer number of seconds",
  INVALID_RANGE: "Start must be before end",
  UNKNOWN_FACILITY: "Facility not found",
  FACILITY_QUERY_FAILED: "Query failed for facility",
  ALL_FACILITIES_FAILED: "Query failed for every facility",
  QUERY_CANCELLED: "Query was cancelled",
  QUERY_TIMEOUT: "Query timed out",
  NO_REFRESH_TOKEN: "No refresh token provided and ATLAS_REFRESH_TOKEN is not set",
} as const;
