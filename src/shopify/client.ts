/**
 * Shopify Admin REST order source.
 *
 * Orders are listed with cursor pagination: each response's `Link` header
 * carries the `page_info` cursor for the next page.
 */

import { z } from 'zod';
import type { FulfillmentStatus, Order } from '../types';
import { createLogger } from '../utils/logger';
import { errorFromResponse } from '../utils/http';
import { getRetryPolicy, withRetry } from '../infra/retry';

const logger = createLogger('shopify');

export const MAX_PAGES = 100;
export const PAGE_SIZE = 250;
export const DEFAULT_API_VERSION = '2024-10';

export interface FetchOrdersQuery {
  createdAtMin: Date;
  createdAtMax: Date;
  signal?: AbortSignal;
}

export interface OrderSource {
  fetchOrders(query: FetchOrdersQuery): Promise<Order[]>;
}

export interface ShopifyConfig {
  shopDomain: string;
  accessToken: string;
  apiVersion?: string;
}

// =============================================================================
// RAW SCHEMA
// =============================================================================

const optionalText = z.string().nullish();

const rawFulfillmentSchema = z.object({
  tracking_url: optionalText,
  tracking_urls: z.array(z.string()).nullish(),
  tracking_number: optionalText,
  tracking_company: optionalText,
});

const rawPersonSchema = z
  .object({
    first_name: optionalText,
    last_name: optionalText,
    name: optionalText,
    phone: optionalText,
    city: optionalText,
  })
  .nullish();

export const rawOrderSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  created_at: z.string(),
  cancelled_at: optionalText,
  tags: z.string().nullish(),
  fulfillment_status: optionalText,
  financial_status: optionalText,
  fulfillments: z.array(rawFulfillmentSchema).nullish(),
  customer: rawPersonSchema,
  billing_address: rawPersonSchema,
  shipping_address: rawPersonSchema,
  note_attributes: z.array(z.object({ name: z.string(), value: z.union([z.string(), z.number()]).nullish() })).nullish(),
});

export type RawShopifyOrder = z.infer<typeof rawOrderSchema>;

const ordersPageSchema = z.object({ orders: z.array(z.unknown()) });

// =============================================================================
// MAPPING
// =============================================================================

function toFulfillmentStatus(raw: string | null | undefined): FulfillmentStatus {
  switch (raw ?? null) {
    case null:
    case 'unfulfilled':
      return 'unfulfilled';
    case 'fulfilled':
      return 'fulfilled';
    case 'partial':
      return 'partial';
    default:
      return 'other';
  }
}

function parseDate(raw: string | null | undefined): Date | undefined {
  if (!raw) return undefined;
  const date = new Date(raw);
  return Number.isNaN(date.getTime()) ? undefined : date;
}

function nonBlank(value: string | null | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function personName(person: RawShopifyOrder['customer']): string | undefined {
  if (!person) return undefined;
  const full = [person.first_name, person.last_name].filter((part) => part && part.trim()).join(' ');
  return nonBlank(full) ?? nonBlank(person.name);
}

export function mapShopifyOrder(raw: RawShopifyOrder): Order {
  const createdAt = parseDate(raw.created_at);
  if (!createdAt) {
    throw new Error(`Order ${raw.id} has an invalid created_at: ${raw.created_at}`);
  }

  return {
    id: raw.id,
    name: raw.name,
    createdAt,
    cancelledAt: parseDate(raw.cancelled_at),
    tags: raw.tags ?? '',
    fulfillmentStatus: toFulfillmentStatus(raw.fulfillment_status),
    fulfillments: (raw.fulfillments ?? []).map((fulfillment) => ({
      trackingUrl: nonBlank(fulfillment.tracking_url) ?? nonBlank(fulfillment.tracking_urls?.[0]),
      trackingNumber: nonBlank(fulfillment.tracking_number),
      trackingCompany: nonBlank(fulfillment.tracking_company),
    })),
    financialStatus: raw.financial_status ?? '',
    customerName:
      personName(raw.customer) ?? personName(raw.shipping_address) ?? personName(raw.billing_address) ?? '',
    customerPhone: nonBlank(raw.customer?.phone) ?? nonBlank(raw.shipping_address?.phone),
    billingPhone: nonBlank(raw.billing_address?.phone),
    shippingCity: nonBlank(raw.shipping_address?.city),
    noteAttributes: (raw.note_attributes ?? []).map((attr) => ({
      name: attr.name,
      value: attr.value === null || attr.value === undefined ? '' : String(attr.value),
    })),
  };
}

// =============================================================================
// CLIENT
// =============================================================================

export function normalizeShopDomain(domain: string): string {
  const host = domain.trim().replace(/^https?:\/\//i, '').replace(/\/.*$/, '');
  return host.includes('.') ? host : `${host}.myshopify.com`;
}

/** URL of the `rel="next"` page in a Link header, if any. */
export function parseNextLink(linkHeader: string | null): string | null {
  if (!linkHeader) return null;
  for (const part of linkHeader.split(',')) {
    const match = part.match(/<([^>]+)>;\s*rel="next"/);
    if (match) return match[1];
  }
  return null;
}

export function createShopifyOrderSource(config: ShopifyConfig): OrderSource {
  const shop = normalizeShopDomain(config.shopDomain);
  const apiVersion = config.apiVersion ?? DEFAULT_API_VERSION;
  const headers = {
    'X-Shopify-Access-Token': config.accessToken,
    Accept: 'application/json',
  };

  async function fetchPage(url: string, signal?: AbortSignal): Promise<{ orders: unknown[]; next: string | null }> {
    const response = await fetch(url, { headers, signal });
    if (!response.ok) {
      throw await errorFromResponse(response, 'Shopify orders request');
    }
    const body = ordersPageSchema.parse(await response.json());
    return { orders: body.orders, next: parseNextLink(response.headers.get('link')) };
  }

  return {
    async fetchOrders({ createdAtMin, createdAtMax, signal }) {
      const params = new URLSearchParams({
        status: 'any',
        limit: String(PAGE_SIZE),
        created_at_min: createdAtMin.toISOString(),
        created_at_max: createdAtMax.toISOString(),
      });
      let url: string | null = `https://${shop}/admin/api/${apiVersion}/orders.json?${params.toString()}`;

      const orders: Order[] = [];
      let pages = 0;

      while (url && pages < MAX_PAGES) {
        const pageUrl: string = url;
        const page = await withRetry(() => fetchPage(pageUrl, signal), { ...getRetryPolicy('shopify'), signal });
        pages++;

        for (const rawOrder of page.orders) {
          const parsed = rawOrderSchema.safeParse(rawOrder);
          if (!parsed.success) {
            logger.warn({ issues: parsed.error.issues.slice(0, 3) }, 'Skipping malformed Shopify order');
            continue;
          }
          try {
            orders.push(mapShopifyOrder(parsed.data));
          } catch (err) {
            logger.warn({ orderId: parsed.data.id, error: err instanceof Error ? err.message : String(err) }, 'Skipping Shopify order');
          }
        }

        url = page.next;
      }

      if (url) {
        logger.warn({ pages, fetched: orders.length }, 'Stopped at the Shopify page ceiling; later orders were not fetched');
      }

      logger.info({ shop, pages, orders: orders.length }, 'Fetched Shopify orders');
      return orders;
    },
  };
}
