export { resolveTrackingRequest, extractTrackingNumber, findCourier, type TrackingRequest } from './resolver';
export {
  fetchTrackingPayload,
  BROWSER_HEADERS,
  DEFAULT_TRACKING_TIMEOUT_MS,
  type FetchTrackingOptions,
  type TrackingPayload,
} from './fetcher';
