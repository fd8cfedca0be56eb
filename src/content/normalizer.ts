/**
 * Content normalisation: turn an arbitrary courier payload into bounded,
 * information-dense text for the classifier.
 *
 * Each content type runs an ordered cascade of extraction strategies; the
 * first strategy that yields enough signal wins. Every path ends under the
 * same hard output ceiling.
 */

import type { ContentType } from '../types';
import { createLogger } from '../utils/logger';
import { detectContentType } from './detector';
import { extractFromJson } from './json-extractor';
import { extractWithPatterns } from './pattern-extractor';
import { collapseWhitespace, extractFromXml, htmlToText } from './markup-extractor';
import { truncateIntelligently } from './truncate';

const logger = createLogger('content');

// =============================================================================
// LIMITS
// =============================================================================

export const MAX_OUTPUT_LENGTH = 2000;
export const STRUCTURED_LIMIT = 1500;
export const CLEANED_JSON_LIMIT = 1000;
export const TEXT_LIMIT = 1500;
/** Structured extractions shorter than this fall through to the next strategy */
export const MIN_SIGNAL_LENGTH = 50;

// =============================================================================
// STRATEGIES
// =============================================================================

/** Returns text when it extracted enough signal, null to fall through. */
export type ExtractionStrategy = (raw: string) => string | null;

export interface NamedStrategy {
  name: string;
  extract: ExtractionStrategy;
}

export function plainTextStrategy(raw: string): string {
  const text = collapseWhitespace(raw);
  return text ? truncateIntelligently(text, TEXT_LIMIT) : '';
}

const structuredJson: NamedStrategy = {
  name: 'json-fields',
  extract: (raw) => {
    const extracted = extractFromJson(raw);
    if (extracted === null || !extracted.trim() || extracted.length < MIN_SIGNAL_LENGTH) return null;
    return extracted.slice(0, STRUCTURED_LIMIT);
  },
};

const patternFallback: NamedStrategy = {
  name: 'patterns',
  extract: (raw) => {
    const extracted = extractWithPatterns(raw);
    if (!extracted.trim() || extracted.length <= MIN_SIGNAL_LENGTH) return null;
    return extracted.slice(0, STRUCTURED_LIMIT);
  },
};

const cleanedJson: NamedStrategy = {
  name: 'cleaned-json',
  extract: (raw) => raw.replace(/\s+/g, ' ').slice(0, CLEANED_JSON_LIMIT),
};

const xmlElements: NamedStrategy = {
  name: 'xml-elements',
  extract: (raw) => {
    const extracted = extractFromXml(raw);
    return extracted ? extracted : null;
  },
};

const htmlText: NamedStrategy = {
  name: 'html-text',
  extract: (raw) => {
    const text = htmlToText(raw);
    return text ? truncateIntelligently(text, TEXT_LIMIT) : '';
  },
};

const plainText: NamedStrategy = { name: 'plain-text', extract: plainTextStrategy };

export const STRATEGIES: Record<ContentType, NamedStrategy[]> = {
  JSON: [structuredJson, patternFallback, cleanedJson],
  XML: [xmlElements, plainText],
  HTML: [htmlText],
  PlainText: [plainText],
  Unknown: [],
};

// =============================================================================
// PIPELINE
// =============================================================================

export interface NormalizedContent {
  type: ContentType;
  /** Strategy that produced the text, null for Unknown input */
  strategy: string | null;
  text: string;
}

export function runStrategies(raw: string, strategies: NamedStrategy[]): { strategy: string | null; text: string } {
  for (const strategy of strategies) {
    let text: string | null;
    try {
      text = strategy.extract(raw);
    } catch (err) {
      logger.warn(
        { strategy: strategy.name, error: err instanceof Error ? err.message : String(err) },
        'Extraction strategy threw, falling through',
      );
      continue;
    }
    if (text !== null) return { strategy: strategy.name, text };
    logger.debug({ strategy: strategy.name }, 'Extraction yielded too little signal, falling through');
  }
  return { strategy: null, text: '' };
}

/**
 * Detect, extract and bound a payload, reporting which path produced it.
 */
export function normalizeContentDetailed(raw: string | null | undefined, type?: ContentType): NormalizedContent {
  const input = raw ?? '';
  const contentType = type ?? detectContentType(input);
  const { strategy, text } = runStrategies(input, STRATEGIES[contentType]);
  const bounded = text.length > MAX_OUTPUT_LENGTH ? text.slice(0, MAX_OUTPUT_LENGTH) : text;

  logger.debug(
    { type: contentType, strategy, inputLength: input.length, outputLength: bounded.length },
    'Content normalised',
  );

  return { type: contentType, strategy, text: bounded };
}

export function normalizeContent(raw: string | null | undefined): string {
  return normalizeContentDetailed(raw).text;
}
