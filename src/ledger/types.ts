import type { LedgerRow, RowColor } from '../types';

/** One full ledger row, columns A to L. */
export interface LedgerCells {
  orderId: number;
  stage: string;
  contactStatus: string;
  deliveryStatus: string;
  alert: string;
  orderName: string;
  customer: string;
  phone: string;
  city: string;
  payment: string;
  trackingUrl: string;
  createdAt: string;
}

export interface AppendMutation {
  kind: 'append';
  orderId: number;
  cells: LedgerCells;
  color: RowColor;
}

export interface UpdateMutation {
  kind: 'update';
  rowIndex: number;
  orderId: number;
  cells: LedgerCells;
  color: RowColor;
}

/** Every mutation rewrites the whole row and its background colour. */
export type LedgerMutation = AppendMutation | UpdateMutation;

export interface LedgerStore {
  readonly name: string;
  /** Data rows (row 2 onward) whose Order ID cell holds an integer */
  readRows(): Promise<LedgerRow[]>;
  /** Apply one batch. Appends land in the order given. */
  applyMutations(mutations: LedgerMutation[]): Promise<void>;
}
