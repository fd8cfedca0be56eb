/**
 * Core domain types shared across the order lifecycle, content normalisation,
 * classifier and ledger modules.
 */

// =============================================================================
// ORDERS (read-only view of the commerce platform)
// =============================================================================

export type FulfillmentStatus = 'unfulfilled' | 'fulfilled' | 'partial' | 'other';

export interface Fulfillment {
  trackingUrl?: string;
  trackingNumber?: string;
  trackingCompany?: string;
}

export interface NoteAttribute {
  name: string;
  value: string;
}

export interface Order {
  /** Numeric order id, unique per shop */
  id: number;
  /** Display name, e.g. "#1042" */
  name: string;
  createdAt: Date;
  cancelledAt?: Date;
  /** Free-text, comma-delimited tag field */
  tags: string;
  fulfillmentStatus: FulfillmentStatus;
  fulfillments: Fulfillment[];
  financialStatus: string;
  customerName: string;
  customerPhone?: string;
  billingPhone?: string;
  shippingCity?: string;
  noteAttributes: NoteAttribute[];
}

// =============================================================================
// LEDGER
// =============================================================================

export interface LedgerRow {
  /** 1-based sheet row; row 1 is the header */
  rowIndex: number;
  orderId: number;
  stage: string;
  contactStatus: string;
  deliveryStatus: string;
  alert: string;
}

// =============================================================================
// SCENARIOS
// =============================================================================

export const SCENARIOS = [
  'NewOrder',
  'AwaitingWhatsAppConfirm',
  'InvalidWhatsApp',
  'AwaitingPhoneCall',
  'CustomerNotPickingPhone',
  'AwaitingSizeConfirmation',
  'ReadyForCourier',
  'TrackParcel',
  'AlreadyDelivered',
  'StaleOrder',
  'Cancelled',
  'UpdateOnly',
] as const;

export type Scenario = (typeof SCENARIOS)[number];

// =============================================================================
// TRACKING ANALYSIS
// =============================================================================

export const TRACKING_COLORS = ['Green', 'Yellow', 'Orange', 'Red'] as const;

export type TrackingColor = (typeof TRACKING_COLORS)[number];

/** Background colour of a ledger row. Grey marks cancellations, White is no highlight. */
export type RowColor = TrackingColor | 'Grey' | 'White';

export interface TrackingAnalysisResult {
  /** Canonical status, or the classifier's label verbatim when unrecognised */
  status: string;
  color: TrackingColor;
  error?: string;
}

// =============================================================================
// CONTENT
// =============================================================================

export type ContentType = 'JSON' | 'XML' | 'HTML' | 'PlainText' | 'Unknown';

// =============================================================================
// COURIERS
// =============================================================================

export interface CourierApiConfig {
  name: string;
  /** Substring that identifies the courier in a tracking URL */
  detectionUrl: string;
  /** Endpoint template with a `{trackingNumber}` placeholder */
  apiEndpoint: string;
  /** Query parameter names that may carry the tracking number, in priority order */
  queryParameters: string[];
  enabled: boolean;
}
