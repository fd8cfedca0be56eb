/**
 * Courier API resolution: turn a customer-facing tracking URL into a direct
 * courier API request when a configured courier recognises it.
 */

import type { CourierApiConfig } from '../types';

export interface TrackingRequest {
  /** URL to fetch */
  url: string;
  /** Courier that matched, absent when fetching the original page */
  courier?: string;
  trackingNumber?: string;
}

const PLACEHOLDER = '{trackingNumber}';
const MIN_PATH_ID_LENGTH = 6;

export function findCourier(trackingUrl: string, couriers: readonly CourierApiConfig[]): CourierApiConfig | undefined {
  const lower = trackingUrl.toLowerCase();
  return couriers.find((courier) => courier.enabled && lower.includes(courier.detectionUrl.toLowerCase()));
}

/**
 * Tracking id from the first configured query parameter present, else the
 * last path segment longer than five characters.
 */
export function extractTrackingNumber(trackingUrl: string, queryParameters: readonly string[]): string | null {
  let parsed: URL;
  try {
    parsed = new URL(trackingUrl);
  } catch {
    return null;
  }

  for (const name of queryParameters) {
    const value = parsed.searchParams.get(name)?.trim();
    if (value) return value;
  }

  const segments = parsed.pathname.split('/').filter((segment) => segment.length > 0);
  const last = segments[segments.length - 1];
  if (last !== undefined && last.length >= MIN_PATH_ID_LENGTH) {
    return decodeURIComponent(last);
  }
  return null;
}

/**
 * Where to fetch tracking data for `trackingUrl`. Any failure to resolve a
 * courier request falls back to the original URL.
 */
export function resolveTrackingRequest(trackingUrl: string, couriers: readonly CourierApiConfig[]): TrackingRequest {
  const courier = findCourier(trackingUrl, couriers);
  if (!courier || !courier.apiEndpoint.includes(PLACEHOLDER)) {
    return { url: trackingUrl };
  }

  let trackingNumber: string | null;
  try {
    trackingNumber = extractTrackingNumber(trackingUrl, courier.queryParameters);
  } catch {
    // malformed percent-encoding in the path
    trackingNumber = null;
  }
  if (!trackingNumber) {
    return { url: trackingUrl };
  }

  return {
    url: courier.apiEndpoint.split(PLACEHOLDER).join(encodeURIComponent(trackingNumber)),
    courier: courier.name,
    trackingNumber,
  };
}
