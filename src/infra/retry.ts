/**
 * Retry Infrastructure - Exponential backoff with jitter
 *
 * Shared by every adapter that crosses the process boundary: the Shopify
 * order source, the Sheets ledger, courier tracking fetches and the
 * classifier. Callers pick a named policy and may add a per-attempt timeout
 * and an abort signal.
 */

import { createLogger } from '../utils/logger';

const logger = createLogger('retry');

// =============================================================================
// TYPES
// =============================================================================

export interface RetryOptions {
  /** Maximum number of attempts including the first (default: 3) */
  maxAttempts?: number;
  /** Minimum delay in ms (default: 1000) */
  minDelay?: number;
  /** Maximum delay in ms (default: 30000) */
  maxDelay?: number;
  /** Jitter factor 0-1 (default: 0.1 = +/-10%) */
  jitter?: number;
  /** Backoff multiplier (default: 2) */
  backoffMultiplier?: number;
  /** Decides whether a failed attempt may be retried */
  retryPredicate?: (error: Error, attempt: number) => boolean;
  onRetry?: (info: RetryInfo) => void;
  /** Timeout per attempt in ms */
  timeout?: number;
  /** Aborts the remaining attempts and any pending backoff */
  signal?: AbortSignal;
}

export interface RetryInfo {
  attempt: number;
  maxAttempts: number;
  delay: number;
  error: Error;
  willRetry: boolean;
}

export type RetryPolicyName = 'default' | 'shopify' | 'sheets' | 'courier' | 'classifier';

// =============================================================================
// ERROR TYPES
// =============================================================================

export class RetryableError extends Error {
  readonly retryable: boolean = true;
  readonly retryAfter?: number;

  constructor(message: string, retryAfter?: number) {
    super(message);
    this.name = 'RetryableError';
    this.retryAfter = retryAfter;
  }
}

/** HTTP 429. Carries the server's retry-after hint (ms) when it sent one. */
export class RateLimitError extends RetryableError {
  readonly statusCode: number;

  constructor(message: string, retryAfter?: number, statusCode = 429) {
    super(message, retryAfter);
    this.name = 'RateLimitError';
    this.statusCode = statusCode;
  }
}

/** 5xx responses, resets, timeouts. */
export class TransientError extends RetryableError {
  readonly statusCode?: number;

  constructor(message: string, statusCode?: number) {
    super(message);
    this.name = 'TransientError';
    this.statusCode = statusCode;
  }
}

/** 4xx responses and validation failures. Never retried. */
export class NonRetryableError extends Error {
  readonly retryable: boolean = false;
  readonly statusCode?: number;

  constructor(message: string, statusCode?: number) {
    super(message);
    this.name = 'NonRetryableError';
    this.statusCode = statusCode;
  }
}

export class AbortedError extends NonRetryableError {
  constructor(message = 'Operation aborted') {
    super(message);
    this.name = 'AbortedError';
  }
}

// =============================================================================
// TRANSIENT ERROR DETECTION
// =============================================================================

const TRANSIENT_PATTERNS = [
  'econnreset',
  'econnrefused',
  'etimedout',
  'econnaborted',
  'epipe',
  'enetunreach',
  'ehostunreach',
  'eai_again',
  'socket hang up',
  'network error',
  'fetch failed',
  'connection reset',
  'service unavailable',
  'bad gateway',
  'gateway timeout',
  'request timeout',
  'overloaded',
];

function statusCodeOf(err: Error): number | undefined {
  if ('statusCode' in err && typeof err.statusCode === 'number') return err.statusCode;
  if ('status' in err && typeof err.status === 'number') return err.status;
  return undefined;
}

/**
 * Detect transient/network errors that are safe to retry.
 */
export function isTransientError(err: Error): boolean {
  if ('retryable' in err && typeof err.retryable === 'boolean') {
    return err.retryable;
  }

  if (err.name === 'TimeoutError' || err.name === 'FetchError') {
    return true;
  }

  const statusCode = statusCodeOf(err);
  if (statusCode !== undefined) {
    return statusCode === 408 || statusCode === 429 || (statusCode >= 500 && statusCode <= 504);
  }

  const message = err.message.toLowerCase();
  if (TRANSIENT_PATTERNS.some((p) => message.includes(p))) {
    return true;
  }

  return /\b(status\s*[:=]?\s*|http\s+)(429|50[0-4])\b/i.test(err.message);
}

// =============================================================================
// RETRY-AFTER PARSING
// =============================================================================

/**
 * Parse a Retry-After header value (seconds or HTTP date) into milliseconds.
 */
export function parseRetryAfterHeader(value: string | null | undefined): number | null {
  if (!value) return null;

  const seconds = Number.parseInt(value, 10);
  if (Number.isFinite(seconds)) {
    return Math.max(0, seconds * 1000);
  }

  const dateMs = Date.parse(value);
  if (!Number.isNaN(dateMs)) {
    const delayMs = dateMs - Date.now();
    return delayMs > 0 ? delayMs : null;
  }

  return null;
}

function retryAfterOf(error: Error): number | null {
  if (error instanceof RetryableError && typeof error.retryAfter === 'number') {
    return error.retryAfter;
  }
  return null;
}

// =============================================================================
// DELAY CALCULATION
// =============================================================================

export function calculateDelay(
  attempt: number,
  config: Required<Pick<RetryOptions, 'minDelay' | 'maxDelay' | 'jitter' | 'backoffMultiplier'>>,
): number {
  const exponentialDelay = config.minDelay * Math.pow(config.backoffMultiplier, attempt - 1);
  const cappedDelay = Math.min(exponentialDelay, config.maxDelay);
  const jitterRange = cappedDelay * config.jitter;
  const jitterValue = (Math.random() * 2 - 1) * jitterRange;
  return Math.round(Math.max(0, cappedDelay + jitterValue));
}

/**
 * Sleep for `ms`, waking early with an AbortedError if the signal fires.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new AbortedError());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new AbortedError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

// =============================================================================
// withTimeout
// =============================================================================

/**
 * Reject with a TransientError if `promise` has not settled within `timeoutMs`.
 * `onTimeout` runs after the rejection, to cancel the work behind `promise`.
 */
export function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  label = 'Operation',
  onTimeout?: () => void,
): Promise<T> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new TransientError(`${label} timed out after ${timeoutMs}ms`));
      onTimeout?.();
    }, timeoutMs);

    promise.then(
      (result) => {
        clearTimeout(timer);
        resolve(result);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      },
    );
  });
}

// =============================================================================
// withRetry
// =============================================================================

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/** A single attempt; `signal` fires when the caller aborts or the attempt times out. */
export type RetryAttempt<T> = (signal?: AbortSignal) => Promise<T>;

async function runAttempt<T>(fn: RetryAttempt<T>, timeout: number | undefined, signal?: AbortSignal): Promise<T> {
  if (!timeout) return fn(signal);

  const controller = new AbortController();
  const forwardAbort = () => controller.abort(signal?.reason);
  if (signal?.aborted) forwardAbort();
  else signal?.addEventListener('abort', forwardAbort, { once: true });

  try {
    return await withTimeout(fn(controller.signal), timeout, 'Operation', () => controller.abort());
  } finally {
    signal?.removeEventListener('abort', forwardAbort);
  }
}

/**
 * Execute `fn` with automatic retry on transient errors. Each attempt gets its
 * own signal, aborted when the attempt times out, so a timed-out request is
 * cancelled before the next one starts.
 *
 * @example
 * ```ts
 * const orders = await withRetry(() => source.fetchPage(url), getRetryPolicy('shopify'));
 * ```
 */
export async function withRetry<T>(fn: RetryAttempt<T>, options: RetryOptions = {}): Promise<T> {
  const {
    maxAttempts = 3,
    minDelay = 1000,
    maxDelay = 30000,
    jitter = 0.1,
    backoffMultiplier = 2,
    retryPredicate = isTransientError,
    onRetry,
    timeout,
    signal,
  } = options;

  let lastError: Error = new Error('withRetry: no attempts made');

  for (let attempt = 1; attempt <= Math.max(1, maxAttempts); attempt++) {
    if (signal?.aborted) {
      throw new AbortedError();
    }

    try {
      return await runAttempt(fn, timeout, signal);
    } catch (error) {
      lastError = toError(error);
      const willRetry = attempt < maxAttempts && !signal?.aborted && retryPredicate(lastError, attempt);

      const serverRetryAfter = retryAfterOf(lastError);
      const delay =
        serverRetryAfter !== null
          ? Math.min(serverRetryAfter, maxDelay)
          : calculateDelay(attempt, { minDelay, maxDelay, jitter, backoffMultiplier });

      onRetry?.({ attempt, maxAttempts, delay, error: lastError, willRetry });

      logger.debug({ attempt, maxAttempts, delay, willRetry, error: lastError.message }, 'Retry attempt');

      if (!willRetry) {
        break;
      }

      await sleep(delay, signal);
    }
  }

  throw lastError;
}

// =============================================================================
// POLICIES
// =============================================================================

export const RETRY_POLICIES: Record<RetryPolicyName, RetryOptions> = {
  default: {
    maxAttempts: 3,
    minDelay: 1000,
    maxDelay: 30000,
    jitter: 0.1,
    backoffMultiplier: 2,
  },

  /** Shopify's leaky bucket refills at 2 req/s; 429s carry Retry-After */
  shopify: {
    maxAttempts: 5,
    minDelay: 1000,
    maxDelay: 20000,
    jitter: 0.2,
    backoffMultiplier: 2,
  },

  /** Sheets write quota is per-minute, so back off further */
  sheets: {
    maxAttempts: 5,
    minDelay: 2000,
    maxDelay: 60000,
    jitter: 0.2,
    backoffMultiplier: 2,
  },

  courier: {
    maxAttempts: 2,
    minDelay: 1000,
    maxDelay: 5000,
    jitter: 0.1,
    backoffMultiplier: 2,
  },

  classifier: {
    maxAttempts: 2,
    minDelay: 1000,
    maxDelay: 10000,
    jitter: 0.1,
    backoffMultiplier: 2,
  },
};

export function getRetryPolicy(name: RetryPolicyName): RetryOptions {
  return RETRY_POLICIES[name];
}
