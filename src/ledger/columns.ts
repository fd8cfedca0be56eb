/**
 * Ledger column layout and row colours.
 */

import type { LedgerRow, Order, RowColor } from '../types';
import type { RowLabels } from '../lifecycle/templates';
import { trackingUrlOf } from '../lifecycle/resolver';
import type { LedgerCells } from './types';

export const LEDGER_HEADERS = [
  'Order ID',
  'Stage',
  'WhatsApp Status',
  'Delivery Status',
  'AI Alert',
  'Order',
  'Customer',
  'Phone',
  'City',
  'Payment',
  'Tracking URL',
  'Created At',
] as const;

export const LEDGER_COLUMN_COUNT = LEDGER_HEADERS.length;

export interface RgbColor {
  red: number;
  green: number;
  blue: number;
}

export const ROW_COLORS: Record<RowColor, RgbColor> = {
  Green: { red: 0.7, green: 0.9, blue: 0.7 },
  Yellow: { red: 1, green: 1, blue: 0.7 },
  Orange: { red: 1, green: 0.85, blue: 0.6 },
  Red: { red: 0.95, green: 0.7, blue: 0.7 },
  Grey: { red: 0.85, green: 0.85, blue: 0.85 },
  White: { red: 1, green: 1, blue: 1 },
};

const ROW_COLOR_NAMES: readonly RowColor[] = ['Green', 'Yellow', 'Orange', 'Red', 'Grey', 'White'];

export function isRowColor(value: unknown): value is RowColor {
  return ROW_COLOR_NAMES.some((name) => name === value);
}

const PHONE_ATTRIBUTE = /phone|whatsapp|mobile|contact/i;

/** Best number to reach the customer on. */
export function contactPhone(order: Order): string {
  return (
    order.customerPhone ??
    order.billingPhone ??
    order.noteAttributes.find((attr) => PHONE_ATTRIBUTE.test(attr.name) && attr.value.trim())?.value.trim() ??
    ''
  );
}

export function buildRowCells(order: Order, labels: RowLabels): LedgerCells {
  return {
    orderId: order.id,
    stage: labels.stage,
    contactStatus: labels.contactStatus,
    deliveryStatus: labels.deliveryStatus,
    alert: labels.alert,
    orderName: order.name,
    customer: order.customerName,
    phone: contactPhone(order),
    city: order.shippingCity ?? '',
    payment: order.financialStatus,
    trackingUrl: trackingUrlOf(order) ?? '',
    createdAt: order.createdAt.toISOString(),
  };
}

/** Cells in column order, A to L. */
export function cellsToValues(cells: LedgerCells): Array<string | number> {
  return [
    cells.orderId,
    cells.stage,
    cells.contactStatus,
    cells.deliveryStatus,
    cells.alert,
    cells.orderName,
    cells.customer,
    cells.phone,
    cells.city,
    cells.payment,
    cells.trackingUrl,
    cells.createdAt,
  ];
}

function cellText(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return '';
}

/**
 * Read a data row as returned by the store (columns from A). Returns null
 * when column A is not an integer order id.
 */
export function parseLedgerRow(values: readonly unknown[], rowIndex: number): LedgerRow | null {
  const idText = cellText(values[0]).trim();
  if (!/^\d+$/.test(idText)) return null;
  const orderId = Number(idText);
  if (!Number.isSafeInteger(orderId)) return null;

  return {
    rowIndex,
    orderId,
    stage: cellText(values[1]),
    contactStatus: cellText(values[2]),
    deliveryStatus: cellText(values[3]),
    alert: cellText(values[4]),
  };
}
