/**
 * Atlas HTTP transport
 *
 * Exchanges the long-lived refresh token for short-lived access tokens,
 * resolves the user id, and sends authenticated JSON requests to the
 * /api/front/v1 API with timeouts and retries.
 */

import { setTimeout as sleep } from "node:timers/promises";
import { ATLAS_API_CONFIG } from "../../config";
import {
  AtlasResponseError,
  TokenResponseSchema,
  UserInfoSchema,
  parseResponse,
} from "./schemas";

export class AtlasHttpError extends Error {
  constructor(
    message: string,
    public statusCode?: number,
    public responseBody?: string,
  ) {
    super(message);
    this.name = "AtlasHttpError";
  }
}

export class AtlasAuthError extends Error {
  constructor(
    message: string,
    public statusCode?: number,
  ) {
    super(message);
    this.name = "AtlasAuthError";
  }
}

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export interface AtlasHttpClientOptions {
  refreshToken: string;
  baseUrl?: string;
  debug?: boolean;
  fetch?: FetchLike;
  timeoutMs?: number;
  retryAttempts?: number;
  retryDelayMs?: number;
}

export type HttpMethod = "GET" | "POST";

export interface RequestOptions {
  query?: Record<string, string>;
  json?: unknown;
  signal?: AbortSignal;
}

interface ReceivedResponse {
  status: number;
  ok: boolean;
  text: string;
}

function isRetryableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

/**
 * Settle with the promise, or reject with the signal's reason once it aborts
 */
function untilAborted<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise;
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      },
    );
  });
}

export class AtlasHttpClient {
  private readonly refreshToken: string;
  private readonly baseUrl: string;
  private readonly debug: boolean;
  private readonly fetchImpl: FetchLike;
  private readonly timeoutMs: number;
  private readonly retryAttempts: number;
  private readonly retryDelayMs: number;

  private accessToken?: string;
  private expiresAtMs = 0;
  private userId?: string;
  private pendingRefresh?: Promise<void>;

  constructor(options: AtlasHttpClientOptions) {
    this.refreshToken = options.refreshToken;
    this.baseUrl = options.baseUrl ?? ATLAS_API_CONFIG.baseUrl;
    this.debug = options.debug ?? false;
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));
    this.timeoutMs = options.timeoutMs ?? ATLAS_API_CONFIG.timeout;
    this.retryAttempts = options.retryAttempts ?? ATLAS_API_CONFIG.retryAttempts;
    this.retryDelayMs = options.retryDelayMs ?? ATLAS_API_CONFIG.retryDelay;
  }

  /**
   * Id of the logged in user, refreshing the session first if needed
   */
  async getUserId(signal?: AbortSignal): Promise<string> {
    await this.refreshAccessToken(false, signal);
    if (!this.userId) {
      throw new AtlasAuthError("User id not available after login");
    }
    return this.userId;
  }

  /**
   * Refresh the access token if it expires within the margin (or always when
   * forced). Concurrent callers share a single refresh, which runs under
   * the request timeout only; each caller's signal just stops its own wait.
   */
  async refreshAccessToken(force = false, signal?: AbortSignal): Promise<void> {
    const expiresSoon =
      this.expiresAtMs - Date.now() < ATLAS_API_CONFIG.tokenExpirationMargin;
    if (!force && this.accessToken && !expiresSoon) return;

    if (!this.pendingRefresh) {
      this.pendingRefresh = this.login().finally(() => {
        this.pendingRefresh = undefined;
      });
    }
    await untilAborted(this.pendingRefresh, signal);
  }

  private async login(): Promise<void> {
    const loginUrl = `${this.baseUrl}${ATLAS_API_CONFIG.loginEndpoint}`;

    if (this.debug) {
      console.log("[AtlasHttp] Refreshing access token...");
    }

    const response = await this.send(
      loginUrl,
      {
        method: "POST",
        headers: { "Content-Type": "application/x-www-form-urlencoded" },
        body: new URLSearchParams({
          grant_type: "refresh_token",
          refresh_token: this.refreshToken,
        }).toString(),
      },
    );

    if (!response.ok) {
      throw new AtlasAuthError(
        `Token refresh failed: ${response.status} - ${response.text}`,
        response.status,
      );
    }

    const tokens = parseResponse(
      TokenResponseSchema,
      parseJson(response.text, loginUrl),
      loginUrl,
    );
    if (!tokens.access_token) {
      throw new AtlasAuthError(
        `Could not find access_token in response from ${loginUrl}`,
      );
    }
    if (!tokens.expires_in) {
      throw new AtlasAuthError(
        `Could not find expires_in in response from ${loginUrl}`,
      );
    }

    const userinfoUrl = `${this.baseUrl}${ATLAS_API_CONFIG.userinfoEndpoint}`;
    const userinfoResponse = await this.send(
      userinfoUrl,
      { headers: { Authorization: `Bearer ${tokens.access_token}` } },
    );
    if (!userinfoResponse.ok) {
      throw new AtlasAuthError(
        `Userinfo request failed: ${userinfoResponse.status}`,
        userinfoResponse.status,
      );
    }
    const userinfo = parseResponse(
      UserInfoSchema,
      parseJson(userinfoResponse.text, userinfoUrl),
      userinfoUrl,
    );

    this.accessToken = tokens.access_token;
    this.expiresAtMs = Date.now() + tokens.expires_in * 1000;
    this.userId = userinfo.sub;

    if (this.debug) {
      console.log(
        `[AtlasHttp] Access token refreshed, expires in ${tokens.expires_in}s`,
      );
    }
  }

  /**
   * Make an authenticated request to the Atlas API and return the decoded
   * JSON body
   *
   * @param path - Path below the API prefix, e.g. "/orgs/1/agents/2/devices"
   * @throws AtlasHttpError on a non-2xx response once retries are exhausted
   */
  async request(
    method: HttpMethod,
    path: string,
    options: RequestOptions = {},
  ): Promise<unknown> {
    const query = options.query
      ? `?${new URLSearchParams(options.query).toString()}`
      : "";
    const url = `${this.baseUrl}${ATLAS_API_CONFIG.apiPrefix}${path}${query}`;

    let reauthenticated = false;
    let attempt = 0;

    for (;;) {
      await this.refreshAccessToken(false, options.signal);

      const startedAt = Date.now();
      let response: ReceivedResponse;
      try {
        response = await this.send(
          url,
          {
            method,
            headers: {
              Authorization: `Bearer ${this.accessToken}`,
              Accept: "application/json",
              ...(options.json !== undefined
                ? { "Content-Type": "application/json" }
                : {}),
            },
            body:
              options.json !== undefined
                ? JSON.stringify(options.json)
                : undefined,
          },
          options.signal,
        );
      } catch (error) {
        if (options.signal?.aborted || attempt >= this.retryAttempts) {
          throw error;
        }
        attempt++;
        console.warn(
          `[AtlasHttp] ${method} ${path} failed (${error instanceof Error ? error.message : String(error)}), retry ${attempt}/${this.retryAttempts}`,
        );
        await this.backoff(attempt, options.signal);
        continue;
      }

      if (this.debug) {
        console.log(
          `[AtlasHttp] ${method} ${path} -> ${response.status} (${Date.now() - startedAt}ms)`,
        );
      }

      if (response.status === 401 && !reauthenticated) {
        // Token revoked or expired early, log in again and replay once
        reauthenticated = true;
        await this.refreshAccessToken(true, options.signal);
        continue;
      }

      if (isRetryableStatus(response.status) && attempt < this.retryAttempts) {
        attempt++;
        console.warn(
          `[AtlasHttp] ${method} ${path} returned ${response.status}, retry ${attempt}/${this.retryAttempts}`,
        );
        await this.backoff(attempt, options.signal);
        continue;
      }

      if (!response.ok) {
        throw new AtlasHttpError(
          `Atlas API error: ${response.status} - ${response.text || "No additional detail received"}`,
          response.status,
          response.text,
        );
      }

      return parseJson(response.text, url);
    }
  }

  /**
   * fetch and read the body with the per-request timeout. The caller's
   * signal aborts the request as well; a timeout surfaces as AtlasHttpError.
   */
  private async send(
    url: string,
    init: RequestInit,
    signal?: AbortSignal,
  ): Promise<ReceivedResponse> {
    signal?.throwIfAborted();

    const controller = new AbortController();
    const onAbort = () => controller.abort(signal?.reason);
    signal?.addEventListener("abort", onAbort, { once: true });
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await this.fetchImpl(url, {
        ...init,
        signal: controller.signal,
      });
      const text = await untilAborted(response.text(), controller.signal);
      return { status: response.status, ok: response.ok, text };
    } catch (error) {
      if (signal?.aborted) throw signal.reason;
      if (controller.signal.aborted) {
        throw new AtlasHttpError(
          `Request to ${url} timed out after ${this.timeoutMs}ms`,
        );
      }
      throw error;
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
    }
  }

  private async backoff(attempt: number, signal?: AbortSignal): Promise<void> {
    const delayMs = this.retryDelayMs * 2 ** (attempt - 1);
    if (delayMs > 0) {
      await sleep(delayMs, undefined, { signal });
    }
  }
}

function parseJson(text: string, url: string): unknown {
  try {
    const data: unknown = JSON.parse(text);
    return data;
  } catch (error) {
    throw new AtlasResponseError(
      `Invalid JSON from ${url}: ${error instanceof Error ? error.message : String(error)}, got ${text.slice(0, 200)}`,
      [],
      text,
    );
  }
}
