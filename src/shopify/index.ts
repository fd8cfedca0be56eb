export {
  createShopifyOrderSource,
  mapShopifyOrder,
  normalizeShopDomain,
  parseNextLink,
  rawOrderSchema,
  MAX_PAGES,
  type OrderSource,
  type FetchOrdersQuery,
  type ShopifyConfig,
  type RawShopifyOrder,
} from './client';
