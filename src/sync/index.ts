export {
  reconcileOrder,
  reconcileOrders,
  analyzeTracking,
  indexRows,
  EMPTY_TRACKING_MESSAGE,
  type ReconcileDeps,
  type OrderOutcome,
  type TrackingFetcher,
} from './reconciler';
export { createLedgerBatcher, DEFAULT_BATCH_SIZE, type LedgerBatcher, type ApplyBatch } from './batcher';
export {
  createOrderSyncService,
  type OrderSyncService,
  type SyncServiceDeps,
  type SyncSettings,
  type SyncPassOptions,
  type SyncReport,
  type OrderResult,
  type OrderAction,
  type WatchOptions,
  type SyncWatcher,
} from './service';
