/**
 * Keyword-aware truncation. Prefers sentences that talk about the parcel;
 * falls back to keeping the head and tail of the text.
 */

export const TRACKING_KEYWORDS = [
  'delivered',
  'delivery',
  'status',
  'tracking',
  'failed',
  'returned',
  'stuck',
  'transit',
  'location',
  'date',
  'received',
  'recipient',
  'out for delivery',
  'in transit',
  'picked up',
  'attempted',
  'exception',
  'delay',
  'completed',
] as const;

const SPLICE_MARKER = ' [...] ';

function hasKeyword(segment: string): boolean {
  const lower = segment.toLowerCase();
  return TRACKING_KEYWORDS.some((keyword) => lower.includes(keyword));
}

/**
 * Bound `text` to `maxLength` characters. The result is never longer than
 * `maxLength`, and text that already fits comes back unchanged.
 */
export function truncateIntelligently(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text;
  if (maxLength <= 0) return '';

  const segments = text.split(/[.\n;]/).filter((segment) => segment.length > 0);
  const kept: string[] = [];
  /** Length of `kept.join('. ')` */
  let joinedLength = 0;

  for (const segment of segments) {
    if (!hasKeyword(segment)) continue;
    const piece = segment.trim();
    const nextLength = kept.length === 0 ? piece.length : joinedLength + 2 + piece.length;
    if (nextLength >= maxLength) break;
    kept.push(piece);
    joinedLength = nextLength;
  }

  if (kept.length > 0 && joinedLength > maxLength / 2) {
    return kept.join('. ');
  }

  const half = Math.floor(maxLength / 2) - 10;
  if (half <= 0) {
    return text.slice(0, maxLength);
  }

  return text.slice(0, half) + SPLICE_MARKER + text.slice(text.length - half);
}
