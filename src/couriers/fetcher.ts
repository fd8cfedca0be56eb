import type { CourierApiConfig } from '../types';
import { createLogger } from '../utils/logger';
import { fetchText } from '../utils/http';
import { getRetryPolicy, withRetry } from '../infra/retry';
import { resolveTrackingRequest, type TrackingRequest } from './resolver';

const logger = createLogger('couriers');

/** Some courier sites serve an empty shell to non-browser clients */
export const BROWSER_HEADERS: Record<string, string> = {
  'User-Agent':
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36',
  Accept: 'application/json,text/html;q=0.9,*/*;q=0.8',
  'Accept-Language': 'en-US,en;q=0.8',
};

export const DEFAULT_TRACKING_TIMEOUT_MS = 30_000;

export interface FetchTrackingOptions {
  couriers?: readonly CourierApiConfig[];
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface TrackingPayload {
  request: TrackingRequest;
  body: string;
}

async function fetchWithPolicy(url: string, options: FetchTrackingOptions): Promise<string> {
  return withRetry((attemptSignal) => fetchText(url, BROWSER_HEADERS, attemptSignal), {
    ...getRetryPolicy('courier'),
    timeout: options.timeoutMs ?? DEFAULT_TRACKING_TIMEOUT_MS,
    signal: options.signal,
  });
}

/**
 * Download tracking data for a fulfillment's tracking URL, preferring the
 * courier's API. If the API request fails the public tracking page is
 * fetched instead; if that fails too the error propagates.
 */
export async function fetchTrackingPayload(trackingUrl: string, options: FetchTrackingOptions = {}): Promise<TrackingPayload> {
  const request = resolveTrackingRequest(trackingUrl, options.couriers ?? []);

  if (request.url === trackingUrl) {
    return { request, body: await fetchWithPolicy(trackingUrl, options) };
  }

  try {
    return { request, body: await fetchWithPolicy(request.url, options) };
  } catch (err) {
    if (options.signal?.aborted) throw err;
    logger.warn(
      { courier: request.courier, url: request.url, error: err instanceof Error ? err.message : String(err) },
      'Courier API request failed; fetching tracking page directly',
    );
    return { request: { url: trackingUrl }, body: await fetchWithPolicy(trackingUrl, options) };
  }
}
