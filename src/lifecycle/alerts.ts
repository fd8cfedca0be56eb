/**
 * Alert text and severity colour for each scenario.
 */

import type { LedgerRow, Order, RowColor, Scenario, TrackingAnalysisResult } from '../types';
import { UNCLASSIFIED_STATUS, normalizeColor } from '../classifier/normalize';
import { orderAgeHours } from './resolver';

export interface Alert {
  text: string;
  color: RowColor;
}

export interface AlertOptions {
  now?: number;
  /** In-transit parcels older than this many days get a follow-up alert (default 5) */
  transitFollowUpDays?: number;
}

export const DEFAULT_TRANSIT_FOLLOW_UP_DAYS = 5;

// =============================================================================
// WHATSAPP CONFIRMATION
// =============================================================================

export type WhatsAppAlertLevel = 'none' | 'reminder' | 'follow-up' | 'urgent';

export interface WhatsAppAlert {
  level: WhatsAppAlertLevel;
  text: string;
}

const WHATSAPP_LEVEL_COLORS: Record<WhatsAppAlertLevel, RowColor> = {
  none: 'Yellow',
  reminder: 'Yellow',
  'follow-up': 'Orange',
  urgent: 'Red',
};

function plural(count: number, unit: string): string {
  return `${count} ${unit}${count === 1 ? '' : 's'}`;
}

/**
 * Escalating alert for a WhatsApp message that has not been confirmed.
 * Defined for every elapsed time; negative input counts as zero.
 */
export function whatsAppAlert(elapsedHours: number): WhatsAppAlert {
  const hours = Number.isFinite(elapsedHours) ? Math.max(0, elapsedHours) : 0;
  const wholeHours = Math.floor(hours);

  if (hours < 2) {
    return { level: 'none', text: '' };
  }
  if (hours < 6) {
    return { level: 'reminder', text: `Reminder: WhatsApp sent ${plural(wholeHours, 'hour')} ago - awaiting confirmation` };
  }
  if (hours < 24) {
    return { level: 'follow-up', text: `Follow up: no WhatsApp confirmation after ${plural(wholeHours, 'hour')}` };
  }
  const days = Math.floor(hours / 24);
  return { level: 'urgent', text: `URGENT: No WhatsApp confirmation for ${days} day(s) - call customer` };
}

export function whatsAppAlertColor(level: WhatsAppAlertLevel): RowColor {
  return WHATSAPP_LEVEL_COLORS[level];
}

// =============================================================================
// TRACKING
// =============================================================================

/**
 * Alert for a classified parcel. `ageDays` is the unrounded order age; the
 * follow-up message reports whole days.
 */
export function trackingAlert(
  status: string,
  ageDays: number,
  followUpDays: number = DEFAULT_TRANSIT_FOLLOW_UP_DAYS,
): string {
  const lower = status.trim().toLowerCase();

  switch (lower) {
    case 'delivered':
      return 'Delivered successfully';
    case 'in-transit':
    case 'in transit':
      return ageDays > followUpDays
        ? `Follow up: in transit for ${Math.floor(ageDays)} days - check with courier`
        : 'Parcel on the way';
    case 'stuck':
      return 'URGENT: Parcel stuck - contact courier';
    case 'failed':
      return 'CRITICAL: Delivery failed - call customer immediately';
    case 'return':
    case 'returned':
      return 'Parcel returning - verify customer address';
    case 'customer not picking phone':
      return 'Courier cannot reach customer - call back';
    case 'analysis failed':
      return 'Tracking analysis failed - check manually';
    default:
      return `Info: ${status}`;
  }
}

// =============================================================================
// ALERT GENERATOR
// =============================================================================

const STATIC_ALERTS: Partial<Record<Scenario, Alert>> = {
  NewOrder: { text: '', color: 'White' },
  InvalidWhatsApp: { text: 'Invalid WhatsApp number - verify phone with customer', color: 'Red' },
  AwaitingPhoneCall: { text: 'Call customer to confirm order', color: 'Yellow' },
  CustomerNotPickingPhone: { text: 'Customer not picking phone - try again', color: 'Orange' },
  AwaitingSizeConfirmation: { text: 'Confirm size with customer', color: 'Yellow' },
  ReadyForCourier: { text: 'Ready to book courier', color: 'Green' },
  Cancelled: { text: '', color: 'Grey' },
};

export function alertFor(
  scenario: Scenario,
  order: Order,
  row?: LedgerRow,
  result?: TrackingAnalysisResult,
  options: AlertOptions = {},
): Alert {
  const now = options.now ?? Date.now();
  const ageHours = orderAgeHours(order, now);

  const fixed = STATIC_ALERTS[scenario];
  if (fixed) return fixed;

  switch (scenario) {
    case 'AwaitingWhatsAppConfirm': {
      const alert = whatsAppAlert(ageHours);
      return { text: alert.text, color: whatsAppAlertColor(alert.level) };
    }
    case 'TrackParcel': {
      if (!result) {
        return { text: trackingAlert(UNCLASSIFIED_STATUS, 0), color: 'Red' };
      }
      return {
        text: trackingAlert(result.status, ageHours / 24, options.transitFollowUpDays),
        color: normalizeColor(result.color),
      };
    }
    case 'StaleOrder': {
      const days = Math.floor(ageHours / 24);
      return { text: `URGENT: Order unfulfilled for ${days} day(s) - fulfil or contact customer`, color: 'Orange' };
    }
    case 'AlreadyDelivered':
      return { text: row?.alert ?? '', color: 'Green' };
    default:
      return { text: row?.alert ?? '', color: 'White' };
  }
}
