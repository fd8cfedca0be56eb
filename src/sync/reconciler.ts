/**
 * Sheet reconciliation: decide a scenario per order and turn it into the
 * ledger mutation that brings the order's row up to date.
 *
 * Mutations are only assembled here. Applying them is the batcher's job.
 */

import type { CourierApiConfig, LedgerRow, Order, Scenario, TrackingAnalysisResult } from '../types';
import { createLogger } from '../utils/logger';
import { AbortedError } from '../infra/retry';
import { resolveScenario, trackingUrlOf } from '../lifecycle/resolver';
import { rowLabelsFor } from '../lifecycle/templates';
import type { TagVocabulary } from '../lifecycle/tags';
import { normalizeContent } from '../content/normalizer';
import { classifyWithFallback } from '../classifier/fallback';
import { unclassified } from '../classifier/normalize';
import type { Classifier } from '../classifier/types';
import { fetchTrackingPayload, type FetchTrackingOptions, type TrackingPayload } from '../couriers/fetcher';
import { buildRowCells } from '../ledger/columns';
import type { LedgerMutation } from '../ledger/types';

const logger = createLogger('reconciler');

export const EMPTY_TRACKING_MESSAGE = 'Tracking page had no readable content';

// =============================================================================
// TYPES
// =============================================================================

export type TrackingFetcher = (url: string, options: FetchTrackingOptions) => Promise<TrackingPayload>;

export interface ReconcileDeps {
  classifier: Classifier;
  /** Evaluation clock shared by every order in the pass */
  now?: number;
  vocabulary?: TagVocabulary;
  staleAfterHours?: number;
  transitFollowUpDays?: number;
  couriers?: readonly CourierApiConfig[];
  classifierTimeoutMs?: number;
  classifierMaxAttempts?: number;
  trackingTimeoutMs?: number;
  fetchTracking?: TrackingFetcher;
  signal?: AbortSignal;
}

export interface OrderOutcome {
  orderId: number;
  orderName: string;
  scenario: Scenario;
  mutation?: LedgerMutation;
  /** Classifier result, for TrackParcel orders */
  analysis?: TrackingAnalysisResult;
}

// =============================================================================
// TRACKING
// =============================================================================

/**
 * Fetch, normalise and classify a tracking URL. Never throws except on
 * abort: fetch failures and empty pages give the unclassified result.
 */
export async function analyzeTracking(trackingUrl: string, deps: ReconcileDeps): Promise<TrackingAnalysisResult> {
  const fetchTracking = deps.fetchTracking ?? fetchTrackingPayload;

  let payload: TrackingPayload;
  try {
    payload = await fetchTracking(trackingUrl, {
      couriers: deps.couriers,
      timeoutMs: deps.trackingTimeoutMs,
      signal: deps.signal,
    });
  } catch (err) {
    if (deps.signal?.aborted) throw err;
    const message = err instanceof Error ? err.message : String(err);
    logger.warn({ url: trackingUrl, error: message }, 'Tracking fetch failed');
    return unclassified(message);
  }

  const text = normalizeContent(payload.body);
  if (!text) {
    logger.warn({ url: payload.request.url }, 'Tracking content empty after normalisation');
    return unclassified(EMPTY_TRACKING_MESSAGE);
  }

  return classifyWithFallback(deps.classifier, text, {
    timeoutMs: deps.classifierTimeoutMs,
    maxAttempts: deps.classifierMaxAttempts,
    signal: deps.signal,
  });
}

// =============================================================================
// RECONCILE
// =============================================================================

export async function reconcileOrder(order: Order, row: LedgerRow | undefined, deps: ReconcileDeps): Promise<OrderOutcome> {
  const now = deps.now ?? Date.now();
  const scenario = resolveScenario(order, row, {
    now,
    vocabulary: deps.vocabulary,
    staleAfterHours: deps.staleAfterHours,
  });
  const outcome: OrderOutcome = { orderId: order.id, orderName: order.name, scenario };

  if (scenario === 'TrackParcel') {
    const trackingUrl = trackingUrlOf(order);
    if (!trackingUrl) {
      logger.debug({ orderId: order.id }, 'Fulfilled order has no tracking URL; leaving row unchanged');
      return outcome;
    }
    outcome.analysis = await analyzeTracking(trackingUrl, deps);
  }

  const labels = rowLabelsFor(scenario, order, row, outcome.analysis, {
    now,
    transitFollowUpDays: deps.transitFollowUpDays,
  });
  if (!labels) return outcome;

  const cells = buildRowCells(order, labels);
  outcome.mutation = row
    ? { kind: 'update', rowIndex: row.rowIndex, orderId: order.id, cells, color: labels.color }
    : { kind: 'append', orderId: order.id, cells, color: labels.color };
  return outcome;
}

export function indexRows(rows: readonly LedgerRow[]): Map<number, LedgerRow> {
  const byOrder = new Map<number, LedgerRow>();
  for (const row of rows) {
    // First row wins when an order id appears twice
    if (!byOrder.has(row.orderId)) byOrder.set(row.orderId, row);
  }
  return byOrder;
}

/**
 * Reconcile every order, in order. An order that fails is logged and
 * skipped; the rest of the pass continues.
 */
export async function reconcileOrders(
  orders: readonly Order[],
  rows: readonly LedgerRow[],
  deps: ReconcileDeps,
): Promise<LedgerMutation[]> {
  const byOrder = indexRows(rows);
  const now = deps.now ?? Date.now();
  const mutations: LedgerMutation[] = [];

  for (const order of orders) {
    if (deps.signal?.aborted) throw new AbortedError();
    try {
      const outcome = await reconcileOrder(order, byOrder.get(order.id), { ...deps, now });
      if (outcome.mutation) mutations.push(outcome.mutation);
    } catch (err) {
      if (deps.signal?.aborted) throw err;
      logger.error({ orderId: order.id, err }, 'Failed to reconcile order; skipping');
    }
  }
  return mutations;
}
