import { describe, it, expect } from 'vitest';
import type { LedgerRow, Order } from '../types';
import { TagSet, mergeVocabulary } from './tags';
import { resolveScenario, trackingUrlOf } from './resolver';
import { alertFor, trackingAlert, whatsAppAlert } from './alerts';
import { rowLabelsFor } from './templates';

// =============================================================================
// Fixtures
// =============================================================================

const NOW = Date.UTC(2025, 0, 10, 12, 0, 0);
const HOUR = 60 * 60 * 1000;

function makeOrder(overrides: Partial<Order> = {}): Order {
  return {
    id: 1001,
    name: '#1001',
    createdAt: new Date(NOW - HOUR),
    tags: '',
    fulfillmentStatus: 'unfulfilled',
    fulfillments: [],
    financialStatus: 'pending',
    customerName: 'Test Customer',
    customerPhone: '+10000000000',
    shippingCity: 'Springfield',
    noteAttributes: [],
    ...overrides,
  };
}

function makeRow(overrides: Partial<LedgerRow> = {}): LedgerRow {
  return {
    rowIndex: 2,
    orderId: 1001,
    stage: 'New Order',
    contactStatus: 'Pending',
    deliveryStatus: 'Not Shipped',
    alert: '',
    ...overrides,
  };
}

// =============================================================================
// TagSet
// =============================================================================

describe('TagSet', () => {
  it('splits on commas, semicolons and pipes and ignores case', () => {
    const tags = TagSet.parse(' WhatsApp Sent ;size confirmed| VIP ,');
    expect(tags.tokens).toEqual(['whatsapp sent', 'size confirmed', 'vip']);
    expect(tags.contains('Size Confirmed')).toBe(true);
  });

  it('matches phrases as whole words inside a token', () => {
    const tags = TagSet.parse('WhatsApp Confirmed');
    expect(tags.contains('Confirmed')).toBe(true);
    expect(TagSet.parse('Unconfirmed').contains('Confirmed')).toBe(false);
  });

  it('treats empty input as no tags', () => {
    expect(TagSet.parse('').size).toBe(0);
    expect(TagSet.parse(undefined).contains('Cancelled')).toBe(false);
  });

  it('dedupes repeated tags', () => {
    expect(TagSet.parse('VIP, vip,  VIP ').size).toBe(1);
  });
});

describe('mergeVocabulary', () => {
  it('replaces only the keys that are overridden', () => {
    const vocab = mergeVocabulary({ cancelled: ['Voided'] });
    expect(vocab.cancelled).toEqual(['Voided']);
    expect(vocab.whatsAppSent).toEqual(['WhatsApp Sent']);
  });

  it('ignores empty override lists', () => {
    expect(mergeVocabulary({ confirmed: [] }).confirmed).toEqual(['Confirmed']);
  });
});

// =============================================================================
// resolveScenario
// =============================================================================

describe('resolveScenario', () => {
  it('cancels regardless of row when cancelledAt is set', () => {
    const order = makeOrder({ cancelledAt: new Date(NOW), tags: 'WhatsApp Sent' });
    expect(resolveScenario(order, undefined, { now: NOW })).toBe('Cancelled');
    expect(resolveScenario(order, makeRow(), { now: NOW })).toBe('Cancelled');
  });

  it('cancels on the Cancelled tag', () => {
    expect(resolveScenario(makeOrder({ tags: 'Size Confirmed, Cancelled' }), makeRow(), { now: NOW })).toBe('Cancelled');
  });

  it('returns NewOrder when there is no row, whatever the tags', () => {
    const order = makeOrder({ tags: 'WhatsApp Sent, Size Confirmed', fulfillmentStatus: 'fulfilled' });
    expect(resolveScenario(order, undefined, { now: NOW })).toBe('NewOrder');
  });

  it('waits for WhatsApp confirmation until Confirmed is added', () => {
    const row = makeRow();
    const sent = makeOrder({ tags: 'WhatsApp Sent' });
    expect(resolveScenario(sent, row, { now: NOW })).toBe('AwaitingWhatsAppConfirm');

    const confirmed = makeOrder({ tags: 'WhatsApp Sent, WhatsApp Confirmed' });
    expect(resolveScenario(confirmed, row, { now: NOW })).toBe('AwaitingPhoneCall');
  });

  it('routes Did not pick up past the WhatsApp wait', () => {
    const order = makeOrder({ tags: 'WhatsApp Sent, Did not pick up' });
    expect(resolveScenario(order, makeRow(), { now: NOW })).toBe('CustomerNotPickingPhone');
  });

  it('prefers InvalidWhatsApp over later rules', () => {
    const order = makeOrder({ tags: 'Invalid WhatsApp, No Answer' });
    expect(resolveScenario(order, makeRow(), { now: NOW })).toBe('InvalidWhatsApp');
  });

  it('asks for size once the call is completed', () => {
    expect(resolveScenario(makeOrder({ tags: 'Call Completed' }), makeRow(), { now: NOW })).toBe(
      'AwaitingSizeConfirmation',
    );
    expect(resolveScenario(makeOrder({ tags: 'Call Completed, Size Confirmed' }), makeRow(), { now: NOW })).toBe(
      'ReadyForCourier',
    );
  });

  it('tracks fulfilled orders until the row says Delivered', () => {
    const order = makeOrder({
      fulfillmentStatus: 'fulfilled',
      fulfillments: [{ trackingUrl: 'https://courier.test/track?id=ABC123456' }],
    });
    expect(resolveScenario(order, makeRow({ deliveryStatus: 'In-Transit' }), { now: NOW })).toBe('TrackParcel');
    expect(resolveScenario(order, makeRow({ deliveryStatus: 'DELIVERED' }), { now: NOW })).toBe('AlreadyDelivered');
  });

  it('does not track fulfilled orders without fulfillment records', () => {
    const order = makeOrder({ fulfillmentStatus: 'fulfilled', createdAt: new Date(NOW - 48 * HOUR) });
    expect(resolveScenario(order, makeRow(), { now: NOW })).toBe('UpdateOnly');
  });

  it('marks unfulfilled orders older than the threshold as stale', () => {
    const fresh = makeOrder({ createdAt: new Date(NOW - 23 * HOUR) });
    const old = makeOrder({ createdAt: new Date(NOW - 30 * HOUR) });
    expect(resolveScenario(fresh, makeRow(), { now: NOW })).toBe('UpdateOnly');
    expect(resolveScenario(old, makeRow(), { now: NOW })).toBe('StaleOrder');
    expect(resolveScenario(old, makeRow(), { now: NOW, staleAfterHours: 48 })).toBe('UpdateOnly');
  });

  it('uses an overridden vocabulary', () => {
    const vocabulary = mergeVocabulary({ cancelled: ['Voided'] });
    expect(resolveScenario(makeOrder({ tags: 'Voided' }), makeRow(), { now: NOW, vocabulary })).toBe('Cancelled');
    expect(resolveScenario(makeOrder({ tags: 'Cancelled' }), makeRow(), { now: NOW, vocabulary })).toBe('UpdateOnly');
  });
});

describe('trackingUrlOf', () => {
  it('returns the first non-blank tracking url', () => {
    const order = makeOrder({ fulfillments: [{ trackingUrl: '  ' }, { trackingUrl: 'https://courier.test/t/1' }] });
    expect(trackingUrlOf(order)).toBe('https://courier.test/t/1');
    expect(trackingUrlOf(makeOrder())).toBeUndefined();
  });
});

// =============================================================================
// Alerts
// =============================================================================

describe('whatsAppAlert', () => {
  it('escalates with elapsed time', () => {
    expect(whatsAppAlert(1.5)).toEqual({ level: 'none', text: '' });
    expect(whatsAppAlert(3)).toEqual({
      level: 'reminder',
      text: 'Reminder: WhatsApp sent 3 hours ago - awaiting confirmation',
    });
    expect(whatsAppAlert(7.9)).toEqual({
      level: 'follow-up',
      text: 'Follow up: no WhatsApp confirmation after 7 hours',
    });
    expect(whatsAppAlert(50)).toEqual({
      level: 'urgent',
      text: 'URGENT: No WhatsApp confirmation for 2 day(s) - call customer',
    });
  });

  it('clamps negative elapsed time to zero', () => {
    expect(whatsAppAlert(-5).level).toBe('none');
  });

  it('places the boundaries at 2, 6 and 24 hours', () => {
    expect(whatsAppAlert(2).level).toBe('reminder');
    expect(whatsAppAlert(6).level).toBe('follow-up');
    expect(whatsAppAlert(24).level).toBe('urgent');
  });
});

describe('trackingAlert', () => {
  it('maps canonical statuses case-insensitively', () => {
    expect(trackingAlert('delivered', 1)).toBe('Delivered successfully');
    expect(trackingAlert('STUCK', 1)).toBe('URGENT: Parcel stuck - contact courier');
    expect(trackingAlert('Failed', 1)).toBe('CRITICAL: Delivery failed - call customer immediately');
    expect(trackingAlert('Returned', 1)).toBe('Parcel returning - verify customer address');
    expect(trackingAlert('Customer Not Picking Phone', 1)).toBe('Courier cannot reach customer - call back');
    expect(trackingAlert('Analysis Failed', 1)).toBe('Tracking analysis failed - check manually');
  });

  it('asks for a follow-up on long transits', () => {
    expect(trackingAlert('In-Transit', 5)).toBe('Parcel on the way');
    expect(trackingAlert('in transit', 6)).toBe('Follow up: in transit for 6 days - check with courier');
  });

  it('escalates as soon as the age passes the threshold', () => {
    expect(trackingAlert('In-Transit', 5.5)).toBe('Follow up: in transit for 5 days - check with courier');
  });

  it('passes unknown statuses through', () => {
    expect(trackingAlert('Held at customs', 2)).toBe('Info: Held at customs');
  });
});

describe('alertFor', () => {
  it('flags a 30 hour old stale order as urgent with a day count', () => {
    const order = makeOrder({ createdAt: new Date(NOW - 30 * HOUR) });
    const alert = alertFor('StaleOrder', order, makeRow(), undefined, { now: NOW });
    expect(alert.text).toBe('URGENT: Order unfulfilled for 1 day(s) - fulfil or contact customer');
    expect(alert.color).toBe('Orange');
  });

  it('colours the WhatsApp wait by level', () => {
    const order = makeOrder({ createdAt: new Date(NOW - 10 * HOUR) });
    expect(alertFor('AwaitingWhatsAppConfirm', order, makeRow(), undefined, { now: NOW }).color).toBe('Orange');
  });

  it('uses the classifier colour for tracked parcels', () => {
    const order = makeOrder({ createdAt: new Date(NOW - 2 * 24 * HOUR) });
    const alert = alertFor('TrackParcel', order, makeRow(), { status: 'Stuck', color: 'Orange' }, { now: NOW });
    expect(alert).toEqual({ text: 'URGENT: Parcel stuck - contact courier', color: 'Orange' });
  });

  it('honours the transit follow-up threshold', () => {
    const order = makeOrder({ createdAt: new Date(NOW - 3 * 24 * HOUR) });
    const alert = alertFor('TrackParcel', order, makeRow(), { status: 'In-Transit', color: 'Yellow' }, {
      now: NOW,
      transitFollowUpDays: 2,
    });
    expect(alert.text).toBe('Follow up: in transit for 3 days - check with courier');
  });

  it('follows up on a parcel five and a half days old', () => {
    const order = makeOrder({ createdAt: new Date(NOW - 132 * HOUR) });
    const alert = alertFor('TrackParcel', order, makeRow(), { status: 'In-Transit', color: 'Yellow' }, { now: NOW });
    expect(alert).toEqual({ text: 'Follow up: in transit for 5 days - check with courier', color: 'Yellow' });
  });
});

// =============================================================================
// Templates
// =============================================================================

describe('rowLabelsFor', () => {
  it('starts new orders with pending labels and no highlight', () => {
    expect(rowLabelsFor('NewOrder', makeOrder(), undefined, undefined, { now: NOW })).toEqual({
      stage: 'New Order',
      contactStatus: 'Pending',
      deliveryStatus: 'Not Shipped',
      alert: '',
      color: 'White',
    });
  });

  it('produces nothing for delivered parcels', () => {
    expect(rowLabelsFor('AlreadyDelivered', makeOrder(), makeRow({ deliveryStatus: 'Delivered' }))).toBeNull();
  });

  it('produces nothing for a cancellation without a row', () => {
    expect(rowLabelsFor('Cancelled', makeOrder({ cancelledAt: new Date(NOW) }), undefined)).toBeNull();
  });

  it('keeps the contact status when cancelling', () => {
    const labels = rowLabelsFor('Cancelled', makeOrder(), makeRow({ contactStatus: 'Confirmed' }));
    expect(labels).toEqual({
      stage: 'Cancelled',
      contactStatus: 'Confirmed',
      deliveryStatus: 'Cancelled',
      alert: '',
      color: 'Grey',
    });
  });

  it('writes the classifier status for tracked parcels', () => {
    const order = makeOrder({ createdAt: new Date(NOW - 24 * HOUR) });
    const labels = rowLabelsFor('TrackParcel', order, makeRow({ contactStatus: 'Size Confirmed' }), {
      status: 'Delivered',
      color: 'Green',
    }, { now: NOW });
    expect(labels).toEqual({
      stage: 'Delivered',
      contactStatus: 'Size Confirmed',
      deliveryStatus: 'Delivered',
      alert: 'Delivered successfully',
      color: 'Green',
    });
  });

  it('leaves existing labels alone on UpdateOnly', () => {
    const row = makeRow({ stage: 'Custom', contactStatus: 'Manual', deliveryStatus: 'Held', alert: 'note' });
    expect(rowLabelsFor('UpdateOnly', makeOrder(), row)).toEqual({
      stage: 'Custom',
      contactStatus: 'Manual',
      deliveryStatus: 'Held',
      alert: 'note',
      color: 'White',
    });
  });
});
