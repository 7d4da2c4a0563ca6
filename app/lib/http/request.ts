/**
 * request.ts
 *
 * JSON-over-HTTP with the retry discipline shared by the setlist and catalog
 * clients:
 * - every attempt waits on the provider's RateLimiter first
 * - network errors, timeouts, failed header resolution (e.g. a token
 *   refresh) and 5xx are retried with linear backoff
 * - 429 sleeps for Retry-After (seconds) or a default, then retries
 * - 401 calls onUnauthorized once and retries with fresh headers
 * - any other 4xx is final
 *
 * Never throws for transport problems; the caller gets { ok: false } and
 * decides what "no data" means.
 */

import type { Clock, RateLimiter } from "./rateLimiter";
import { systemClock } from "./rateLimiter";

export const DEFAULT_RETRIES = 3;
export const DEFAULT_BACKOFF_MS = 1000;
export const DEFAULT_RETRY_AFTER_MS = 5000;
export const DEFAULT_TIMEOUT_MS = 15000;

export interface RequestPolicy {
  limiter: RateLimiter;
  /** Log tag, e.g. "setlistfm" */
  label: string;
  timeoutMs?: number;
  retries?: number;
  backoffMs?: number;
  defaultRetryAfterMs?: number;
  clock?: Clock;
  fetchImpl?: typeof fetch;
  /** Evaluated before every attempt so refreshed credentials are picked up */
  headers?: () => Promise<Record<string, string>> | Record<string, string>;
  onUnauthorized?: () => void;
}

export interface RequestInput {
  method?: "GET" | "POST" | "PUT";
  body?: unknown;
}

export type JsonResult<T> =
  | { ok: true; status: number; data: T | null }
  | { ok: false; status: number | null; reason: string };

function retryAfterMs(header: string | null, fallback: number): number {
  if (!header) return fallback;
  const seconds = Number(header);
  if (Number.isFinite(seconds) && seconds >= 0) return seconds * 1000;
  const at = Date.parse(header);
  if (!Number.isNaN(at)) return Math.max(0, at - Date.now());
  return fallback;
}

async function readJson<T>(response: Response): Promise<T | null> {
  const text = await response.text();
  if (!text.trim()) return null;
  return JSON.parse(text) as T;
}

export async function requestJson<T>(
  url: string,
  input: RequestInput,
  policy: RequestPolicy,
): Promise<JsonResult<T>> {
  const {
    limiter,
    label,
    timeoutMs = DEFAULT_TIMEOUT_MS,
    retries = DEFAULT_RETRIES,
    backoffMs = DEFAULT_BACKOFF_MS,
    defaultRetryAfterMs = DEFAULT_RETRY_AFTER_MS,
    clock = systemClock,
    fetchImpl = fetch,
  } = policy;

  let reauthorized = false;
  let lastFailure: { status: number | null; reason: string } = {
    status: null,
    reason: "not attempted",
  };

  for (let attempt = 0; attempt <= retries; attempt++) {
    await limiter.acquire();

    let response: Response;
    try {
      // Resolving headers may refresh credentials, which can fail like any
      // other transport step
      const headers: Record<string, string> = {
        Accept: "application/json",
        ...(policy.headers ? await policy.headers() : {}),
      };
      if (input.body !== undefined) {
        headers["Content-Type"] = "application/json";
      }

      response = await fetchImpl(url, {
        method: input.method ?? "GET",
        headers,
        body: input.body === undefined ? undefined : JSON.stringify(input.body),
        signal: AbortSignal.timeout(timeoutMs),
      });
    } catch (error) {
      lastFailure = {
        status: null,
        reason: error instanceof Error ? error.message : String(error),
      };
      console.warn(
        `[${label}] Request failed (attempt ${attempt + 1}/${retries + 1}): ${lastFailure.reason}`,
      );
      if (attempt < retries) await clock.sleep(backoffMs * (attempt + 1));
      continue;
    }

    if (response.ok) {
      try {
        return { ok: true, status: response.status, data: await readJson<T>(response) };
      } catch (error) {
        // A body that is not JSON will not become JSON on retry.
        return {
          ok: false,
          status: response.status,
          reason: `Invalid JSON body: ${error instanceof Error ? error.message : String(error)}`,
        };
      }
    }

    lastFailure = { status: response.status, reason: `HTTP ${response.status}` };

    if (response.status === 401 && policy.onUnauthorized && !reauthorized) {
      console.warn(`[${label}] 401 from ${url}, refreshing credentials`);
      reauthorized = true;
      policy.onUnauthorized();
      attempt--; // the re-auth retry does not use up an attempt
      continue;
    }

    if (response.status === 429) {
      const wait = retryAfterMs(
        response.headers.get("retry-after"),
        defaultRetryAfterMs,
      );
      console.warn(
        `[${label}] Rate limited (attempt ${attempt + 1}/${retries + 1}), waiting ${wait}ms`,
      );
      if (attempt < retries) await clock.sleep(wait);
      continue;
    }

    if (response.status >= 500) {
      console.warn(
        `[${label}] HTTP ${response.status} (attempt ${attempt + 1}/${retries + 1})`,
      );
      if (attempt < retries) await clock.sleep(backoffMs * (attempt + 1));
      continue;
    }

    return { ok: false, ...lastFailure };
  }

  console.error(`[${label}] Giving up on ${url}: ${lastFailure.reason}`);
  return { ok: false, ...lastFailure };
}
