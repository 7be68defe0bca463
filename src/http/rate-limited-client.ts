/**
 * RateLimitedClient - the only path from a rail to the network
 *
 * - Per-tenant token bucket pacing
 * - Jittered exponential backoff for 5xx, 429, timeouts and network errors
 * - Fail-fast on auth and validation errors
 * - Short-TTL cache for GET responses
 */

import { setTimeout as delay } from "node:timers/promises";

import { railLogger } from "../logger.js";
import {
  CancelledError,
  FatalSyncError,
  TransientSyncError,
  type SyncError,
} from "../services/sync/errors.js";
import { TokenBucket, type Sleep } from "./token-bucket.js";

import type { RailCredential } from "../types/index.js";

// ============================================================================
// Types
// ============================================================================

export type QueryParams = Record<string, string | number | undefined>;

export type FetchFn = (
  input: string,
  init: RequestInit
) => Promise<Response>;

export interface CallOptions {
  method?: "GET" | "POST";
  body?: unknown;
  /** Sent form-encoded instead of a JSON body (OAuth token endpoints) */
  form?: Record<string, string>;
  headers?: Record<string, string>;
  /** Sent as `Idempotency-Key`; makes a POST safe to retry */
  idempotencyKey?: string;
  signal?: AbortSignal;
  /** Set false to bypass the GET cache for this call */
  cache?: boolean;
}

export interface RateLimitedClientConfig {
  rateLimitCapacity: number;
  rateLimitRefillPerSec: number;
  timeoutMs: number;
  maxRetries: number;
  cacheTtlMs: number;
  baseBackoffMs?: number;
  maxBackoffMs?: number;
}

export interface RateLimitedClientDeps {
  fetchFn?: FetchFn;
  sleep?: Sleep;
  now?: () => number;
  random?: () => number;
}

interface CacheEntry {
  expiresAt: number;
  value: unknown;
}

// ============================================================================
// Helpers
// ============================================================================

const DEFAULT_BASE_BACKOFF_MS = 500;
const DEFAULT_MAX_BACKOFF_MS = 30_000;

/**
 * "Equal jitter" backoff: half the capped exponential delay is fixed, the
 * other half random.
 */
export function computeBackoff(
  attempt: number,
  baseMs: number,
  maxMs: number,
  random: () => number = Math.random
): number {
  const cap = Math.min(maxMs, baseMs * 2 ** attempt);
  return Math.round(cap / 2 + random() * (cap / 2));
}

/**
 * Parse a Retry-After header (delta-seconds or HTTP date) into milliseconds
 */
export function parseRetryAfter(
  header: string | null,
  now: number
): number | null {
  if (header === null || header.trim() === "") {
    return null;
  }
  const seconds = Number(header);
  if (Number.isFinite(seconds)) {
    return Math.max(0, Math.round(seconds * 1000));
  }
  const date = Date.parse(header);
  if (Number.isNaN(date)) {
    return null;
  }
  return Math.max(0, date - now);
}

export function buildUrl(endpoint: string, params: QueryParams): string {
  const url = new URL(endpoint);
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) {
      url.searchParams.set(key, String(value));
    }
  }
  return url.toString();
}

const defaultSleep: Sleep = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

// ============================================================================
// RateLimitedClient
// ============================================================================

export class RateLimitedClient {
  private readonly buckets = new Map<string, TokenBucket>();
  private readonly cache = new Map<string, CacheEntry>();
  private readonly fetchFn: FetchFn;
  private readonly sleep: Sleep;
  private readonly now: () => number;
  private readonly random: () => number;
  private readonly baseBackoffMs: number;
  private readonly maxBackoffMs: number;

  constructor(
    private readonly config: RateLimitedClientConfig,
    deps: RateLimitedClientDeps = {}
  ) {
    this.fetchFn = deps.fetchFn ?? ((input, init) => fetch(input, init));
    this.sleep = deps.sleep ?? defaultSleep;
    this.now = deps.now ?? Date.now;
    this.random = deps.random ?? Math.random;
    this.baseBackoffMs = config.baseBackoffMs ?? DEFAULT_BASE_BACKOFF_MS;
    this.maxBackoffMs = config.maxBackoffMs ?? DEFAULT_MAX_BACKOFF_MS;
  }

  /**
   * Issue one logical request against a rail API.
   *
   * Resolves with the parsed JSON body (null for an empty body). Rejects
   * with TransientSyncError once retries are exhausted, FatalSyncError for
   * non-retryable responses and CancelledError when `signal` aborts.
   */
  async call(
    endpoint: string,
    params: QueryParams,
    credential: RailCredential,
    options: CallOptions = {}
  ): Promise<unknown> {
    const method = options.method ?? "GET";
    const url = buildUrl(endpoint, params);
    const cacheKey = `${credential.tenantId} ${method} ${url}`;
    const useCache =
      method === "GET" && options.cache !== false && this.config.cacheTtlMs > 0;

    if (useCache) {
      const hit = this.cache.get(cacheKey);
      if (hit !== undefined && hit.expiresAt > this.now()) {
        railLogger.trace({ method, url }, "Response cache hit");
        return hit.value;
      }
    }

    const retryable = method === "GET" || options.idempotencyKey !== undefined;
    const maxRetries = retryable ? this.config.maxRetries : 0;
    const bucket = this.bucketFor(credential.tenantId);

    let lastError: SyncError | null = null;

    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      await bucket.take(options.signal);

      const outcome = await this.attempt(method, url, credential, options);
      if (outcome.ok) {
        if (useCache) {
          this.cache.set(cacheKey, {
            expiresAt: this.now() + this.config.cacheTtlMs,
            value: outcome.value,
          });
        }
        return outcome.value;
      }

      if (!(outcome.error instanceof TransientSyncError)) {
        throw outcome.error;
      }
      lastError = outcome.error;

      if (attempt === maxRetries) {
        break;
      }

      const waitMs =
        outcome.error.retryAfterMs ??
        computeBackoff(
          attempt,
          this.baseBackoffMs,
          this.maxBackoffMs,
          this.random
        );
      railLogger.warn(
        {
          tenantId: credential.tenantId,
          method,
          url,
          status: outcome.error.status,
          attempt: attempt + 1,
          waitMs,
        },
        "Retryable rail error, backing off"
      );
      await this.sleepOrCancel(waitMs, options.signal);
    }

    throw lastError ?? new TransientSyncError("Request failed");
  }

  /**
   * End a sync cycle: drop cached responses, for one tenant or all
   */
  clearCache(tenantId?: string): void {
    if (tenantId === undefined) {
      this.cache.clear();
      return;
    }
    for (const key of this.cache.keys()) {
      if (key.startsWith(`${tenantId} `)) {
        this.cache.delete(key);
      }
    }
  }

  get cacheSize(): number {
    return this.cache.size;
  }

  private bucketFor(tenantId: string): TokenBucket {
    let bucket = this.buckets.get(tenantId);
    if (bucket === undefined) {
      bucket = new TokenBucket({
        capacity: this.config.rateLimitCapacity,
        refillPerSec: this.config.rateLimitRefillPerSec,
        now: this.now,
        sleep: this.sleep,
      });
      this.buckets.set(tenantId, bucket);
    }
    return bucket;
  }

  private async sleepOrCancel(ms: number, signal?: AbortSignal): Promise<void> {
    try {
      await this.sleep(ms, signal);
    } catch (error) {
      if (signal?.aborted === true) {
        throw new CancelledError();
      }
      throw error;
    }
  }

  private async attempt(
    method: "GET" | "POST",
    url: string,
    credential: RailCredential,
    options: CallOptions
  ): Promise<{ ok: true; value: unknown } | { ok: false; error: SyncError }> {
    const timeout = AbortSignal.timeout(this.config.timeoutMs);
    const signal =
      options.signal !== undefined
        ? AbortSignal.any([options.signal, timeout])
        : timeout;

    const headers: Record<string, string> = {
      Accept: "application/json",
      Authorization: `Bearer ${credential.accessToken}`,
      ...options.headers,
    };
    if (options.idempotencyKey !== undefined) {
      headers["Idempotency-Key"] = options.idempotencyKey;
    }
    let body: string | undefined;
    if (options.form !== undefined) {
      headers["Content-Type"] = "application/x-www-form-urlencoded";
      body = new URLSearchParams(options.form).toString();
    } else if (options.body !== undefined) {
      headers["Content-Type"] = "application/json";
      body = JSON.stringify(options.body);
    }

    railLogger.debug({ method, url }, "Sending request to rail API");
    const startTime = performance.now();

    let response: Response;
    try {
      response = await this.fetchFn(url, { method, headers, body, signal });
    } catch (error) {
      if (options.signal?.aborted === true) {
        throw new CancelledError();
      }
      const timedOut = timeout.aborted;
      return {
        ok: false,
        error: new TransientSyncError(
          timedOut ? "Request timed out" : "Network error",
          null,
          null,
          { cause: error }
        ),
      };
    }

    const duration = Math.round(performance.now() - startTime);
    railLogger.debug(
      {
        method,
        url,
        status: response.status,
        duration: `${String(duration)}ms`,
      },
      "Received response from rail API"
    );

    if (response.ok) {
      const text = await response.text();
      if (text === "") {
        return { ok: true, value: null };
      }
      try {
        const value: unknown = JSON.parse(text);
        return { ok: true, value };
      } catch (error) {
        return {
          ok: false,
          error: new TransientSyncError(
            "Malformed JSON response",
            response.status,
            null,
            { cause: error }
          ),
        };
      }
    }

    return { ok: false, error: classifyResponse(response, this.now()) };
  }
}

function classifyResponse(response: Response, now: number): SyncError {
  const { status } = response;
  if (status === 401 || status === 403) {
    return new FatalSyncError(
      `Rail rejected credentials (${String(status)})`,
      "auth",
      status
    );
  }
  if (status === 429) {
    return new TransientSyncError(
      "Rate limited by rail",
      status,
      parseRetryAfter(response.headers.get("retry-after"), now)
    );
  }
  if (status >= 500) {
    return new TransientSyncError(
      `Rail server error (${String(status)})`,
      status
    );
  }
  if (status === 404) {
    return new FatalSyncError("Rail resource not found", "not_found", status);
  }
  return new FatalSyncError(
    `Rail rejected request (${String(status)})`,
    "validation",
    status
  );
}
