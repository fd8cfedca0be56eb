/**
 * Per-scenario ledger labels: stage, contact status, delivery status, alert
 * and row colour.
 */

import type { LedgerRow, Order, RowColor, Scenario, TrackingAnalysisResult } from '../types';
import { alertFor, type AlertOptions } from './alerts';

export interface RowLabels {
  stage: string;
  contactStatus: string;
  deliveryStatus: string;
  alert: string;
  color: RowColor;
}

interface StaticLabels {
  stage: string;
  contactStatus: string;
  deliveryStatus: string;
}

const NOT_SHIPPED = 'Not Shipped';

const STATIC_LABELS: Partial<Record<Scenario, StaticLabels>> = {
  NewOrder: { stage: 'New Order', contactStatus: 'Pending', deliveryStatus: NOT_SHIPPED },
  AwaitingWhatsAppConfirm: {
    stage: 'Awaiting WhatsApp Confirmation',
    contactStatus: 'WhatsApp Sent',
    deliveryStatus: NOT_SHIPPED,
  },
  InvalidWhatsApp: { stage: 'Invalid WhatsApp', contactStatus: 'Invalid Number', deliveryStatus: NOT_SHIPPED },
  AwaitingPhoneCall: { stage: 'Awaiting Phone Call', contactStatus: 'Confirmed', deliveryStatus: NOT_SHIPPED },
  CustomerNotPickingPhone: {
    stage: 'Customer Not Picking Phone',
    contactStatus: 'No Answer',
    deliveryStatus: NOT_SHIPPED,
  },
  AwaitingSizeConfirmation: {
    stage: 'Awaiting Size Confirmation',
    contactStatus: 'Call Completed',
    deliveryStatus: NOT_SHIPPED,
  },
  ReadyForCourier: { stage: 'Ready for Courier', contactStatus: 'Size Confirmed', deliveryStatus: 'Ready to Ship' },
};

/**
 * Labels the row should carry after this pass, or null when the scenario
 * produces no mutation (AlreadyDelivered, or an update with no row to update).
 */
export function rowLabelsFor(
  scenario: Scenario,
  order: Order,
  row: LedgerRow | undefined,
  result?: TrackingAnalysisResult,
  options: AlertOptions = {},
): RowLabels | null {
  if (scenario === 'AlreadyDelivered') return null;
  if (scenario !== 'NewOrder' && !row) return null;

  const alert = alertFor(scenario, order, row, result, options);
  const keptContact = row?.contactStatus ?? 'Pending';

  const labels = STATIC_LABELS[scenario];
  if (labels) {
    return { ...labels, alert: alert.text, color: alert.color };
  }

  switch (scenario) {
    case 'TrackParcel': {
      const deliveryStatus = result?.status ?? row?.deliveryStatus ?? '';
      const delivered = deliveryStatus.trim().toLowerCase() === 'delivered';
      return {
        stage: delivered ? 'Delivered' : 'In Delivery',
        contactStatus: keptContact,
        deliveryStatus,
        alert: alert.text,
        color: alert.color,
      };
    }
    case 'StaleOrder':
      return {
        stage: 'Stale - Unfulfilled',
        contactStatus: keptContact,
        deliveryStatus: NOT_SHIPPED,
        alert: alert.text,
        color: alert.color,
      };
    case 'Cancelled':
      return {
        stage: 'Cancelled',
        contactStatus: keptContact,
        deliveryStatus: 'Cancelled',
        alert: alert.text,
        color: alert.color,
      };
    default:
      return {
        stage: row?.stage ?? '',
        contactStatus: keptContact,
        deliveryStatus: row?.deliveryStatus ?? '',
        alert: row?.alert ?? '',
        color: 'White',
      };
  }
}
