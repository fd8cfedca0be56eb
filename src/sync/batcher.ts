import { createLogger } from '../utils/logger';
import type { LedgerMutation } from '../ledger/types';

const logger = createLogger('ledger-batcher');

export const DEFAULT_BATCH_SIZE = 50;

export type ApplyBatch = (mutations: LedgerMutation[]) => Promise<void>;

export interface LedgerBatcher {
  /** Queue a mutation; flushes when the batch reaches the threshold */
  add(mutation: LedgerMutation): Promise<void>;
  /** Apply whatever is queued. Returns the number of mutations written. */
  flush(): Promise<number>;
  /** Drop queued mutations without applying them. Returns how many were dropped. */
  discard(): number;
  pendingCount(): number;
  /** Mutations applied so far */
  appliedCount(): number;
}

export function createLedgerBatcher(apply: ApplyBatch, batchSize: number = DEFAULT_BATCH_SIZE): LedgerBatcher {
  const threshold = Math.max(1, Math.floor(batchSize));
  let pending: LedgerMutation[] = [];
  let applied = 0;
  // One batch in flight at a time
  let tail: Promise<unknown> = Promise.resolve();

  function flush(): Promise<number> {
    const run = tail.then(async () => {
      if (pending.length === 0) return 0;
      const batch = pending;
      pending = [];
      await apply(batch);
      applied += batch.length;
      logger.debug({ count: batch.length, applied }, 'Flushed ledger batch');
      return batch.length;
    });
    tail = run.catch(() => undefined);
    return run;
  }

  return {
    async add(mutation) {
      pending.push(mutation);
      if (pending.length >= threshold) {
        await flush();
      }
    },

    flush,

    discard() {
      const dropped = pending.length;
      pending = [];
      if (dropped > 0) logger.info({ dropped }, 'Discarded unflushed ledger mutations');
      return dropped;
    },

    pendingCount: () => pending.length,
    appliedCount: () => applied,
  };
}
