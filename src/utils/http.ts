/**
 * HTTP utilities: per-host rate limiting, retry and a default request timeout,
 * installed as a wrapper around the global `fetch`.
 *
 * Courier tracking pages, Shopify and the Sheets API all go through the same
 * wrapper, so one misbehaving host cannot starve the others.
 */

import { createLogger } from './logger';
import {
  calculateDelay,
  parseRetryAfterHeader,
  sleep,
  NonRetryableError,
  RateLimitError,
  TransientError,
} from '../infra/retry';

const logger = createLogger('http');

// =============================================================================
// Types
// =============================================================================

export interface HttpRateLimit {
  maxRequests: number;
  windowMs: number;
}

export interface HttpRetryConfig {
  enabled?: boolean;
  maxAttempts?: number;
  minDelay?: number;
  maxDelay?: number;
  jitter?: number;
  backoffMultiplier?: number;
  methods?: string[];
}

export interface HttpClientConfig {
  enabled?: boolean;
  defaultRateLimit?: HttpRateLimit;
  perHost?: Record<string, HttpRateLimit>;
  retry?: HttpRetryConfig;
  /** Applied when the caller passes no AbortSignal */
  requestTimeoutMs?: number;
}

// =============================================================================
// Constants
// =============================================================================

const DEFAULT_RATE_LIMIT: HttpRateLimit = {
  maxRequests: 60,
  windowMs: 60_000,
};

const DEFAULT_RETRY: Required<HttpRetryConfig> = {
  enabled: true,
  maxAttempts: 3,
  minDelay: 500,
  maxDelay: 30_000,
  jitter: 0.1,
  backoffMultiplier: 2,
  methods: ['GET', 'HEAD', 'OPTIONS'],
};

const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

/** Max host entries kept in the bucket map */
const MAX_HOST_ENTRIES = 500;

// =============================================================================
// Rate limiter (fixed window per host)
// =============================================================================

interface HostBucket {
  count: number;
  resetAt: number;
}

const hostBuckets = new Map<string, HostBucket>();
const hostCooldowns = new Map<string, number>();

function checkRateLimit(host: string, limit: HttpRateLimit): { allowed: boolean; resetIn: number } {
  const now = Date.now();
  let bucket = hostBuckets.get(host);

  if (!bucket && hostBuckets.size >= MAX_HOST_ENTRIES) {
    const firstKey = hostBuckets.keys().next().value;
    if (firstKey) hostBuckets.delete(firstKey);
  }

  if (!bucket || now >= bucket.resetAt) {
    bucket = { count: 0, resetAt: now + limit.windowMs };
    hostBuckets.set(host, bucket);
  }

  bucket.count++;
  if (bucket.count > limit.maxRequests) {
    return { allowed: false, resetIn: bucket.resetAt - now };
  }
  return { allowed: true, resetIn: 0 };
}

// =============================================================================
// Helpers
// =============================================================================

type FetchInput = string | URL | Request;

let originalFetch: typeof fetch | null = null;
let httpConfig: HttpClientConfig = {
  enabled: true,
  defaultRateLimit: DEFAULT_RATE_LIMIT,
  perHost: {},
  retry: DEFAULT_RETRY,
  requestTimeoutMs: DEFAULT_REQUEST_TIMEOUT_MS,
};

function urlOf(input: FetchInput): string {
  if (typeof input === 'string') return input;
  if (input instanceof URL) return input.toString();
  return input.url;
}

function hostOf(input: FetchInput): string | null {
  try {
    return new URL(urlOf(input)).host;
  } catch {
    return null;
  }
}

function resolveRateLimit(host: string): HttpRateLimit | null {
  if (httpConfig.enabled === false) return null;
  return httpConfig.perHost?.[host] ?? httpConfig.defaultRateLimit ?? null;
}

function retryAllowed(method: string): boolean {
  const retry = httpConfig.retry ?? DEFAULT_RETRY;
  if (retry.enabled === false) return false;
  const methods = retry.methods?.length ? retry.methods : DEFAULT_RETRY.methods;
  return methods.includes(method);
}

async function waitForCooldown(host: string): Promise<void> {
  const until = hostCooldowns.get(host);
  if (!until) return;
  const now = Date.now();
  if (until <= now) {
    hostCooldowns.delete(host);
    return;
  }
  logger.warn({ host, delay: until - now }, 'HTTP cooldown active; waiting');
  await sleep(until - now);
}

async function applyRateLimit(host: string): Promise<void> {
  const limit = resolveRateLimit(host);
  if (!limit) return;
  const result = checkRateLimit(host, limit);
  if (!result.allowed) {
    const waitMs = Math.max(0, result.resetIn);
    logger.warn({ host, waitMs }, 'HTTP rate limit hit; waiting');
    await sleep(waitMs);
  }
}

// =============================================================================
// Core fetch wrapper
// =============================================================================

async function fetchWithControl(input: FetchInput, init?: RequestInit): Promise<Response> {
  const baseFetch = originalFetch ?? fetch;
  const host = hostOf(input);
  if (!host) {
    return baseFetch(input, init);
  }

  await waitForCooldown(host);
  await applyRateLimit(host);

  const method = (init?.method ?? (input instanceof Request ? input.method : 'GET')).toUpperCase();
  const retry = { ...DEFAULT_RETRY, ...(httpConfig.retry ?? {}) };
  const maxAttempts = retryAllowed(method) ? retry.maxAttempts : 1;
  const timeoutMs = httpConfig.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;

  let lastError: unknown = null;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      const fetchInit: RequestInit = init?.signal ? init : { ...init, signal: AbortSignal.timeout(timeoutMs) };
      const response = await baseFetch(input, fetchInit);

      if ((response.status === 429 || response.status >= 500) && attempt < maxAttempts) {
        // Drain the body so the socket goes back to the pool
        await response.body?.cancel().catch((err: unknown) => logger.debug({ err }, 'Body cancel failed'));

        const retryAfter = parseRetryAfterHeader(response.headers.get('retry-after'));
        if (retryAfter) {
          hostCooldowns.set(host, Date.now() + retryAfter);
        }
        const delay = retryAfter ?? calculateDelay(attempt, retry);
        logger.warn({ host, status: response.status, delay }, 'HTTP retry scheduled');
        await sleep(delay);
        continue;
      }

      return response;
    } catch (error) {
      lastError = error;
      if (attempt >= maxAttempts || init?.signal?.aborted) {
        throw error;
      }
      const delay = calculateDelay(attempt, retry);
      logger.warn({ host, delay, error }, 'HTTP request failed; retrying');
      await sleep(delay);
    }
  }

  throw lastError;
}

// =============================================================================
// Public API
// =============================================================================

/** Merge rate-limit / retry / timeout settings into the HTTP client config. */
export function configureHttpClient(config?: HttpClientConfig): void {
  if (!config) return;
  httpConfig = {
    ...httpConfig,
    ...config,
    perHost: { ...(httpConfig.perHost ?? {}), ...(config.perHost ?? {}) },
    retry: { ...(httpConfig.retry ?? {}), ...(config.retry ?? {}) },
  };
  hostBuckets.clear();
}

/** Install the rate-limited / retrying wrapper as the global `fetch`. */
export function installHttpClient(config?: HttpClientConfig): void {
  if (!originalFetch) {
    originalFetch = globalThis.fetch.bind(globalThis);
    globalThis.fetch = fetchWithControl;
  }
  if (config) configureHttpClient(config);
}

export function getHttpClientConfig(): HttpClientConfig {
  return httpConfig;
}

/**
 * Map a non-2xx response onto the retry error taxonomy.
 */
export async function errorFromResponse(response: Response, label: string): Promise<Error> {
  const body = await response.text().catch(() => '');
  const detail = body.length > 300 ? `${body.slice(0, 300)}...` : body;
  const message = `${label} failed (${response.status})${detail ? `: ${detail}` : ''}`;

  if (response.status === 429) {
    return new RateLimitError(message, parseRetryAfterHeader(response.headers.get('retry-after')) ?? undefined);
  }
  if (response.status === 408 || response.status >= 500) {
    return new TransientError(message, response.status);
  }
  return new NonRetryableError(message, response.status);
}

/**
 * GET a URL as text. Throws on non-2xx so per-order callers can log and skip.
 */
export async function fetchText(url: string, headers: Record<string, string> = {}, signal?: AbortSignal): Promise<string> {
  const response = await fetch(url, { method: 'GET', headers, signal });
  if (!response.ok) {
    throw await errorFromResponse(response, `GET ${url}`);
  }
  return response.text();
}
