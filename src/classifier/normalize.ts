/**
 * Normalisation of free-text classifier labels onto the canonical tracking
 * statuses and the four severity colours.
 */

import type { TrackingAnalysisResult, TrackingColor } from '../types';

export const CANONICAL_STATUSES = [
  'Delivered',
  'In-Transit',
  'Stuck',
  'Failed',
  'Return',
  'Customer Not Picking Phone',
] as const;

export type CanonicalStatus = (typeof CANONICAL_STATUSES)[number];

/** Returned whenever the classifier could not be reached or timed out. */
export const UNCLASSIFIED_STATUS = 'Analysis Failed';

export function unclassified(error: string): TrackingAnalysisResult {
  return { status: UNCLASSIFIED_STATUS, color: 'Red', error };
}

export function isUnclassified(result: TrackingAnalysisResult): boolean {
  return result.status === UNCLASSIFIED_STATUS;
}

/**
 * Map a raw label onto a canonical status. Unrecognised labels pass through
 * trimmed so a new courier wording is still visible in the ledger.
 */
export function normalizeStatus(raw: string | null | undefined): string {
  const trimmed = raw?.trim() ?? '';
  if (!trimmed) return 'In-Transit';

  const lower = trimmed.toLowerCase();

  if (lower.includes('deliver') && !lower.includes('not') && !lower.includes('fail')) return 'Delivered';
  if (lower.includes('transit')) return 'In-Transit';
  if (lower.includes('stuck') || lower.includes('delay') || lower.includes('hold')) return 'Stuck';
  if (lower.includes('fail') || lower.includes('unsuccess') || lower.includes('cancel')) return 'Failed';
  if (lower.includes('return')) return 'Return';
  if (lower.includes('phone') || lower.includes('contact') || lower.includes('unreachable')) {
    return 'Customer Not Picking Phone';
  }

  return trimmed;
}

export function normalizeColor(raw: string | null | undefined): TrackingColor {
  const lower = raw?.toLowerCase() ?? '';
  if (lower.includes('green')) return 'Green';
  if (lower.includes('yellow')) return 'Yellow';
  if (lower.includes('orange')) return 'Orange';
  if (lower.includes('red')) return 'Red';
  return 'Yellow';
}
