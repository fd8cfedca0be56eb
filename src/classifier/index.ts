export type { Classifier, CompletionFn, CompletionRequest } from './types';
export {
  normalizeStatus,
  normalizeColor,
  unclassified,
  isUnclassified,
  CANONICAL_STATUSES,
  UNCLASSIFIED_STATUS,
  type CanonicalStatus,
} from './normalize';
export { parseClassifierResponse, PARSE_FAILURE_MESSAGE } from './parse';
export {
  createClaudeClassifier,
  buildTrackingPrompt,
  TRACKING_SYSTEM_PROMPT,
  DEFAULT_CLASSIFIER_MODEL,
  type ClaudeClassifierConfig,
} from './claude';
export { classifyWithFallback, DEFAULT_CLASSIFY_TIMEOUT_MS, type ClassifyOptions } from './fallback';
