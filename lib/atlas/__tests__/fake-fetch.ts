/**
 * fetch stand-in for transport tests. Login and userinfo answer by default;
 * everything else goes to the route handler.
 */

import { ReadableStream } from "node:stream/web";
import type { FetchLike } from "../http-client";

export interface FetchCall {
  url: string;
  init?: RequestInit;
}

export type Route = (
  url: string,
  init?: RequestInit,
) => Response | Promise<Response>;

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

export function isLogin(url: string): boolean {
  return url.endsWith("/api/login/v2/login");
}

export function isUserinfo(url: string): boolean {
  return url.endsWith("/api/login/v2/userinfo");
}

export function createFakeFetch(
  route: Route,
  login: Route = () =>
    jsonResponse({ access_token: "test-access-token", expires_in: 3600 }),
) {
  const calls: FetchCall[] = [];
  const fetch: FetchLike = async (url, init) => {
    calls.push({ url, init });
    if (isLogin(url)) return login(url, init);
    if (isUserinfo(url)) return jsonResponse({ sub: "user-1" });
    return route(url, init);
  };

  return {
    fetch,
    calls,
    apiCalls: () =>
      calls.filter((call) => !isLogin(call.url) && !isUserinfo(call.url)),
    loginCalls: () => calls.filter((call) => isLogin(call.url)),
  };
}

/**
 * A response that never arrives; rejects once the request is aborted
 */
export function hangUntilAborted(init?: RequestInit): Promise<Response> {
  return new Promise((_resolve, reject) => {
    const signal = init?.signal;
    if (!signal) return;
    signal.addEventListener("abort", () => reject(signal.reason), {
      once: true,
    });
  });
}

/**
 * A response whose headers arrive but whose body never does
 */
export function stalledBodyResponse(): Response {
  return new Response(new ReadableStream<Uint8Array>({ start() {} }), {
    status: 200,
    headers: { "Content-Type": "application/json" },
  });
}

/**
 * A promise the test settles by hand
 */
export function deferred<T>() {
  let settle: (value: T) => void = () => undefined;
  const promise = new Promise<T>((resolve) => {
    settle = resolve;
  });
  return { promise, resolve: (value: T) => settle(value) };
}

export async function waitFor(condition: () => boolean): Promise<void> {
  for (let i = 0; i < 100 && !condition(); i++) {
    await new Promise((resolve) => setImmediate(resolve));
  }
}

export function header(call: FetchCall | undefined, name: string): string | null {
  return new Headers(call?.init?.headers).get(name);
}
