/**
 * Order tag parsing and the lifecycle tag vocabulary.
 *
 * The commerce platform stores tags as one free-text field. Staff add tags
 * such as "WhatsApp Sent" or "Size Confirmed" as the order moves through the
 * pre-courier funnel, so the field works as a flag set. It is parsed once into
 * a token set and every rule asks the set, never the raw string.
 */

export interface TagVocabulary {
  cancelled: string[];
  whatsAppSent: string[];
  /** Any of these blocks "awaiting WhatsApp confirmation" */
  confirmed: string[];
  didNotPickUp: string[];
  invalidWhatsApp: string[];
  /** Customer confirmed on WhatsApp, phone call pending */
  awaitingCall: string[];
  noAnswer: string[];
  callCompleted: string[];
  sizeConfirmed: string[];
}

export const DEFAULT_TAG_VOCABULARY: TagVocabulary = {
  cancelled: ['Cancelled'],
  whatsAppSent: ['WhatsApp Sent'],
  confirmed: ['Confirmed'],
  didNotPickUp: ['Did not pick up'],
  invalidWhatsApp: ['Invalid WhatsApp'],
  awaitingCall: ['WhatsApp Confirmed', 'Awaiting Call'],
  noAnswer: ['Did not pick up', 'No Answer'],
  callCompleted: ['Call Completed'],
  sizeConfirmed: ['Size Confirmed'],
};

const VOCABULARY_KEYS: ReadonlyArray<keyof TagVocabulary> = [
  'cancelled',
  'whatsAppSent',
  'confirmed',
  'didNotPickUp',
  'invalidWhatsApp',
  'awaitingCall',
  'noAnswer',
  'callCompleted',
  'sizeConfirmed',
];

/** Overlay partial overrides (e.g. from config) on the default vocabulary. */
export function mergeVocabulary(overrides: Partial<TagVocabulary> = {}): TagVocabulary {
  const merged: TagVocabulary = { ...DEFAULT_TAG_VOCABULARY };
  for (const key of VOCABULARY_KEYS) {
    const phrases = overrides[key];
    if (phrases && phrases.length > 0) merged[key] = phrases;
  }
  return merged;
}

// =============================================================================
// TAG SET
// =============================================================================

function normalizeToken(value: string): string {
  return value.trim().replace(/\s+/g, ' ').toLowerCase();
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export class TagSet {
  readonly tokens: readonly string[];

  constructor(tokens: string[]) {
    this.tokens = tokens;
  }

  static parse(raw: string | null | undefined): TagSet {
    if (!raw) return new TagSet([]);
    const tokens = raw
      .split(/[,;|]/)
      .map(normalizeToken)
      .filter((token) => token.length > 0);
    return new TagSet([...new Set(tokens)]);
  }

  /**
   * True when some token contains `phrase` as a whole-word sequence:
   * "whatsapp confirmed" contains "Confirmed", "unconfirmed" does not.
   */
  contains(phrase: string): boolean {
    const needle = normalizeToken(phrase);
    if (!needle) return false;
    const pattern = new RegExp(`(^|[^a-z0-9])${escapeRegExp(needle)}($|[^a-z0-9])`);
    return this.tokens.some((token) => pattern.test(token));
  }

  containsAny(phrases: readonly string[]): boolean {
    return phrases.some((phrase) => this.contains(phrase));
  }

  get size(): number {
    return this.tokens.length;
  }
}
