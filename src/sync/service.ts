/**
 * Order sync service - one reconciliation pass over a window of orders,
 * plus a watch loop that repeats it on an interval.
 *
 * A pass reads orders and ledger rows, reconciles orders one at a time and
 * streams the resulting mutations through the batcher. A failing order is
 * recorded and skipped. Failing to reach the order source or the ledger
 * store aborts the pass.
 */

import type { CourierApiConfig, Scenario } from '../types';
import { createLogger } from '../utils/logger';
import { NonRetryableError } from '../infra/retry';
import { DAY_MS } from '../lifecycle/resolver';
import type { TagVocabulary } from '../lifecycle/tags';
import type { Classifier } from '../classifier/types';
import type { OrderSource } from '../shopify/client';
import type { LedgerMutation, LedgerStore } from '../ledger/types';
import { createLedgerBatcher, DEFAULT_BATCH_SIZE } from './batcher';
import { indexRows, reconcileOrder, type ReconcileDeps, type TrackingFetcher } from './reconciler';

const logger = createLogger('sync');

// =============================================================================
// TYPES
// =============================================================================

export interface SyncSettings {
  batchSize: number;
  staleAfterHours: number;
  transitFollowUpDays: number;
  lookbackDays: number;
  vocabulary?: TagVocabulary;
  couriers: readonly CourierApiConfig[];
  classifierTimeoutMs?: number;
  classifierMaxAttempts?: number;
  trackingTimeoutMs?: number;
}

export interface SyncServiceDeps {
  source: OrderSource;
  store: LedgerStore;
  classifier: Classifier;
  settings?: Partial<SyncSettings>;
  fetchTracking?: TrackingFetcher;
  clock?: () => number;
}

export type OrderAction = 'append' | 'update' | 'none' | 'failed';

export interface OrderResult {
  orderId: number;
  orderName: string;
  action: OrderAction;
  scenario?: Scenario;
  /** Classifier status for tracked parcels */
  trackingStatus?: string;
  error?: string;
}

export interface SyncPassOptions {
  from?: Date;
  to?: Date;
  /** Collect mutations in the report instead of writing them */
  dryRun?: boolean;
  signal?: AbortSignal;
  onOrder?: (result: OrderResult) => void;
}

export interface SyncReport {
  from: Date;
  to: Date;
  dryRun: boolean;
  aborted: boolean;
  ordersSeen: number;
  appended: number;
  updated: number;
  unchanged: number;
  failed: number;
  /** Mutations applied to the store, or collected on a dry run */
  written: number;
  discarded: number;
  scenarios: Partial<Record<Scenario, number>>;
  results: OrderResult[];
  /** Dry runs only */
  mutations: LedgerMutation[];
  durationMs: number;
}

export interface WatchOptions {
  intervalMinutes: number;
  onReport?: (report: SyncReport) => void;
}

export interface SyncWatcher {
  /** Stop scheduling passes; resolves once any pass in progress finishes */
  stop(): Promise<void>;
}

export interface OrderSyncService {
  runPass(options?: SyncPassOptions): Promise<SyncReport>;
  watch(options: WatchOptions): SyncWatcher;
}

const DEFAULT_SETTINGS: SyncSettings = {
  batchSize: DEFAULT_BATCH_SIZE,
  staleAfterHours: 24,
  transitFollowUpDays: 5,
  lookbackDays: 30,
  couriers: [],
};

// =============================================================================
// IMPLEMENTATION
// =============================================================================

export function createOrderSyncService(deps: SyncServiceDeps): OrderSyncService {
  const settings: SyncSettings = { ...DEFAULT_SETTINGS, ...deps.settings };
  const clock = deps.clock ?? Date.now;

  async function runPass(options: SyncPassOptions = {}): Promise<SyncReport> {
    const startedAt = clock();
    const to = options.to ?? new Date(startedAt);
    const from = options.from ?? new Date(to.getTime() - settings.lookbackDays * DAY_MS);
    if (from.getTime() > to.getTime()) {
      throw new NonRetryableError(`Sync window start ${from.toISOString()} is after its end ${to.toISOString()}`);
    }
    const dryRun = options.dryRun ?? false;
    const signal = options.signal;

    const report: SyncReport = {
      from,
      to,
      dryRun,
      aborted: false,
      ordersSeen: 0,
      appended: 0,
      updated: 0,
      unchanged: 0,
      failed: 0,
      written: 0,
      discarded: 0,
      scenarios: {},
      results: [],
      mutations: [],
      durationMs: 0,
    };

    logger.info({ from: from.toISOString(), to: to.toISOString(), dryRun, ledger: deps.store.name }, 'Starting sync pass');

    const orders = await deps.source.fetchOrders({ createdAtMin: from, createdAtMax: to, signal });
    const rows = await deps.store.readRows();
    const byOrder = indexRows(rows);
    report.ordersSeen = orders.length;

    const batcher = createLedgerBatcher(
      dryRun
        ? async (batch) => {
            report.mutations.push(...batch);
          }
        : (batch) => deps.store.applyMutations(batch),
      settings.batchSize,
    );

    const reconcileDeps: ReconcileDeps = {
      classifier: deps.classifier,
      now: startedAt,
      vocabulary: settings.vocabulary,
      staleAfterHours: settings.staleAfterHours,
      transitFollowUpDays: settings.transitFollowUpDays,
      couriers: settings.couriers,
      classifierTimeoutMs: settings.classifierTimeoutMs,
      classifierMaxAttempts: settings.classifierMaxAttempts,
      trackingTimeoutMs: settings.trackingTimeoutMs,
      fetchTracking: deps.fetchTracking,
      signal,
    };

    for (const order of orders) {
      if (signal?.aborted) {
        report.aborted = true;
        break;
      }

      let result: OrderResult;
      let mutation: LedgerMutation | undefined;
      try {
        const outcome = await reconcileOrder(order, byOrder.get(order.id), reconcileDeps);
        mutation = outcome.mutation;
        result = {
          orderId: order.id,
          orderName: order.name,
          scenario: outcome.scenario,
          action: mutation ? mutation.kind : 'none',
          trackingStatus: outcome.analysis?.status,
        };
      } catch (err) {
        if (signal?.aborted) {
          report.aborted = true;
          break;
        }
        const message = err instanceof Error ? err.message : String(err);
        logger.error({ orderId: order.id, orderName: order.name, error: message }, 'Order failed; skipping');
        result = { orderId: order.id, orderName: order.name, action: 'failed', error: message };
      }

      // A result computed while the pass was being cancelled is not written
      if (signal?.aborted) {
        report.aborted = true;
        break;
      }

      if (result.scenario) {
        report.scenarios[result.scenario] = (report.scenarios[result.scenario] ?? 0) + 1;
      }
      if (result.action === 'append') report.appended++;
      else if (result.action === 'update') report.updated++;
      else if (result.action === 'failed') report.failed++;
      else report.unchanged++;
      report.results.push(result);
      options.onOrder?.(result);

      if (mutation) await batcher.add(mutation);
    }

    if (report.aborted) {
      report.discarded = batcher.discard();
      logger.warn({ processed: report.results.length, discarded: report.discarded }, 'Sync pass aborted');
    } else {
      await batcher.flush();
    }

    report.written = batcher.appliedCount();
    report.durationMs = clock() - startedAt;
    logger.info(
      {
        orders: report.ordersSeen,
        appended: report.appended,
        updated: report.updated,
        unchanged: report.unchanged,
        failed: report.failed,
        written: report.written,
        durationMs: report.durationMs,
      },
      'Sync pass finished',
    );
    return report;
  }

  function watch(options: WatchOptions): SyncWatcher {
    const intervalMs = Math.max(1000, Math.round(options.intervalMinutes * 60_000));
    let current: Promise<void> | null = null;
    let stopped = false;

    const tick = (): void => {
      if (stopped) return;
      if (current) {
        logger.warn('Previous sync pass still running; skipping this interval');
        return;
      }
      current = runPass()
        .then(
          (report) => options.onReport?.(report),
          (err: unknown) => {
            logger.error({ err }, 'Sync pass failed');
          },
        )
        .finally(() => {
          current = null;
        });
    };

    logger.info({ intervalMinutes: options.intervalMinutes }, 'Watching orders');
    tick();
    const timer = setInterval(tick, intervalMs);

    return {
      async stop() {
        stopped = true;
        clearInterval(timer);
        if (current) await current;
        logger.info('Order watch stopped');
      },
    };
  }

  return { runPass, watch };
}
