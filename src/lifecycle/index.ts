export { TagSet, DEFAULT_TAG_VOCABULARY, mergeVocabulary, type TagVocabulary } from './tags';
export {
  resolveScenario,
  orderAgeHours,
  isDeliveredRow,
  trackingUrlOf,
  DEFAULT_STALE_AFTER_HOURS,
  type ResolveOptions,
} from './resolver';
export {
  alertFor,
  trackingAlert,
  whatsAppAlert,
  whatsAppAlertColor,
  DEFAULT_TRANSIT_FOLLOW_UP_DAYS,
  type Alert,
  type AlertOptions,
  type WhatsAppAlert,
  type WhatsAppAlertLevel,
} from './alerts';
export { rowLabelsFor, type RowLabels } from './templates';
