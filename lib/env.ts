/**
 * Environment configuration
 *
 * Reads ATLAS_* variables and merges them over the defaults in config.ts.
 */

import { ATLAS_API_CONFIG, QUERY_CONFIG } from "../config";

export class AtlasConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "AtlasConfigError";
  }
}

export interface AtlasEnv {
  refreshToken?: string;
  baseUrl: string;
  debug: boolean;
  maxBatchSize: number;
  maxConcurrency: number;
  timeoutMs?: number;
}

type EnvSource = Record<string, string | undefined>;

function parsePositiveInt(
  env: EnvSource,
  key: string,
): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return undefined;

  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new AtlasConfigError(
      `${key} must be a positive integer, got "${raw}"`,
    );
  }
  return value;
}

/**
 * Check if debug logging was requested through ATLAS_DEBUG
 */
export function isDebugEnabled(env: EnvSource = process.env): boolean {
  const raw = env.ATLAS_DEBUG?.toLowerCase();
  return raw === "1" || raw === "true" || raw === "yes";
}

/**
 * Read the client configuration from the environment
 *
 * @throws AtlasConfigError if a numeric variable is not a positive integer
 */
export function getAtlasEnv(env: EnvSource = process.env): AtlasEnv {
  const refreshToken = env.ATLAS_REFRESH_TOKEN?.trim();

  return {
    refreshToken: refreshToken ? refreshToken : undefined,
    baseUrl: env.ATLAS_BASE_URL?.trim() || ATLAS_API_CONFIG.baseUrl,
    debug: isDebugEnabled(env),
    maxBatchSize:
      parsePositiveInt(env, "ATLAS_MAX_BATCH_SIZE") ??
      QUERY_CONFIG.maxBatchSize,
    maxConcurrency:
      parsePositiveInt(env, "ATLAS_MAX_CONCURRENCY") ??
      QUERY_CONFIG.maxConcurrency,
    timeoutMs: parsePositiveInt(env, "ATLAS_TIMEOUT_MS"),
  };
}
