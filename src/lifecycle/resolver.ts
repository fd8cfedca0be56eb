/**
 * Scenario resolution: which lifecycle stage an order is in and therefore
 * which ledger mutation it needs.
 *
 * Pure function of (tags, timestamps, fulfillment state, existing row, clock).
 * Rules are checked in order and the first match wins.
 */

import type { LedgerRow, Order, Scenario } from '../types';
import { DEFAULT_TAG_VOCABULARY, TagSet, type TagVocabulary } from './tags';

export const HOUR_MS = 60 * 60 * 1000;
export const DAY_MS = 24 * HOUR_MS;

export const DEFAULT_STALE_AFTER_HOURS = 24;

export interface ResolveOptions {
  /** Evaluation clock in epoch ms (default: Date.now()) */
  now?: number;
  vocabulary?: TagVocabulary;
  staleAfterHours?: number;
}

/** Hours since the order was created, clamped at 0 for clocks behind the order. */
export function orderAgeHours(order: Order, now: number): number {
  return Math.max(0, (now - order.createdAt.getTime()) / HOUR_MS);
}

export function isDeliveredRow(row: LedgerRow | undefined): boolean {
  return row !== undefined && row.deliveryStatus.trim().toLowerCase() === 'delivered';
}

export function resolveScenario(order: Order, row: LedgerRow | undefined, options: ResolveOptions = {}): Scenario {
  const now = options.now ?? Date.now();
  const vocab = options.vocabulary ?? DEFAULT_TAG_VOCABULARY;
  const staleAfterHours = options.staleAfterHours ?? DEFAULT_STALE_AFTER_HOURS;
  const tags = TagSet.parse(order.tags);

  if (order.cancelledAt || tags.containsAny(vocab.cancelled)) {
    return 'Cancelled';
  }

  if (!row) {
    return 'NewOrder';
  }

  if (
    tags.containsAny(vocab.whatsAppSent) &&
    !tags.containsAny(vocab.confirmed) &&
    !tags.containsAny(vocab.didNotPickUp)
  ) {
    return 'AwaitingWhatsAppConfirm';
  }

  if (tags.containsAny(vocab.invalidWhatsApp)) {
    return 'InvalidWhatsApp';
  }

  if (tags.containsAny(vocab.awaitingCall)) {
    return 'AwaitingPhoneCall';
  }

  if (tags.containsAny(vocab.noAnswer)) {
    return 'CustomerNotPickingPhone';
  }

  const sizeConfirmed = tags.containsAny(vocab.sizeConfirmed);

  if (tags.containsAny(vocab.callCompleted) && !sizeConfirmed) {
    return 'AwaitingSizeConfirmation';
  }

  if (sizeConfirmed && order.fulfillmentStatus === 'unfulfilled') {
    return 'ReadyForCourier';
  }

  if (order.fulfillmentStatus === 'fulfilled' && order.fulfillments.length > 0) {
    return isDeliveredRow(row) ? 'AlreadyDelivered' : 'TrackParcel';
  }

  if (orderAgeHours(order, now) > staleAfterHours && order.fulfillmentStatus === 'unfulfilled' && !sizeConfirmed) {
    return 'StaleOrder';
  }

  return 'UpdateOnly';
}

/** First fulfillment tracking URL, if the courier supplied one. */
export function trackingUrlOf(order: Order): string | undefined {
  for (const fulfillment of order.fulfillments) {
    const url = fulfillment.trackingUrl?.trim();
    if (url) return url;
  }
  return undefined;
}
