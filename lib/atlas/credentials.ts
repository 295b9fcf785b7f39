/**
 * Refresh token lookup and client construction
 *
 * Lookup order: explicit token, ATLAS_REFRESH_TOKEN in the environment, then
 * ATLAS_REFRESH_TOKEN in a dotenv file (.env.local, then .env).
 */

import fs from "fs";
import path from "path";
import { parse } from "dotenv";
import { ERROR_MESSAGES } from "../../config";
import { AtlasConfigError, getAtlasEnv } from "../env";
import { AtlasClient } from "./client";
import type { FetchLike } from "./http-client";

export const DEFAULT_ENV_FILES = [".env.local", ".env"];

export interface AtlasCredentialOptions {
  refreshToken?: string;
  envFiles?: string[]; // Searched in order, relative to cwd
  env?: Record<string, string | undefined>;
}

function readTokenFromEnvFile(file: string): string | undefined {
  const resolved = path.resolve(file);
  if (!fs.existsSync(resolved)) return undefined;

  const parsed = parse(fs.readFileSync(resolved));
  const token = parsed.ATLAS_REFRESH_TOKEN?.trim();
  return token ? token : undefined;
}

/**
 * Find the refresh token to log in with
 *
 * @throws AtlasConfigError if no token is found anywhere
 */
export function resolveRefreshToken(
  options: AtlasCredentialOptions = {},
): string {
  const explicit = options.refreshToken?.trim();
  if (explicit) return explicit;

  const fromEnv = getAtlasEnv(options.env ?? process.env).refreshToken;
  if (fromEnv) return fromEnv;

  const envFiles = options.envFiles ?? DEFAULT_ENV_FILES;
  for (const file of envFiles) {
    const token = readTokenFromEnvFile(file);
    if (token) return token;
  }

  throw new AtlasConfigError(
    `${ERROR_MESSAGES.NO_REFRESH_TOKEN}, and none was found in ${envFiles.join(", ")}`,
  );
}

export interface CreateAtlasClientOptions extends AtlasCredentialOptions {
  debug?: boolean;
  baseUrl?: string;
  fetch?: FetchLike;
}

/**
 * Factory function to get an Atlas client configured from the environment
 */
export function createAtlasClient(
  options: CreateAtlasClientOptions = {},
): AtlasClient {
  const env = getAtlasEnv(options.env ?? process.env);

  return new AtlasClient({
    refreshToken: resolveRefreshToken(options),
    baseUrl: options.baseUrl ?? env.baseUrl,
    debug: options.debug ?? env.debug,
    fetch: options.fetch,
  });
}
