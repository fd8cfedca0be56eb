export { detectContentType } from './detector';
export { decodeEntities } from './entities';
export { extractJsonFields, extractFromJson, type FieldCategory } from './json-extractor';
export { extractWithPatterns } from './pattern-extractor';
export { extractFromXml, htmlToText, collapseWhitespace } from './markup-extractor';
export { truncateIntelligently, TRACKING_KEYWORDS } from './truncate';
export {
  normalizeContent,
  normalizeContentDetailed,
  runStrategies,
  STRATEGIES,
  MAX_OUTPUT_LENGTH,
  MIN_SIGNAL_LENGTH,
  type ExtractionStrategy,
  type NamedStrategy,
  type NormalizedContent,
} from './normalizer';
