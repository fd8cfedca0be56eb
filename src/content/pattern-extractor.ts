/**
 * Regex fallback for payloads the structured extractors cannot make sense of
 * (truncated JSON, JSON embedded in script tags, odd nesting).
 */

interface PatternRule {
  tag: 'STATUS' | 'LOCATION' | 'TIME';
  keys: string[];
  limit: number;
}

const PATTERN_RULES: PatternRule[] = [
  {
    tag: 'STATUS',
    keys: ['status', 'delivery_status', 'tracking_status', 'state', 'stage', 'ProcessDescForPortal', 'OperationDesc'],
    limit: 5,
  },
  {
    tag: 'LOCATION',
    keys: ['location', 'city', 'destination', 'origin', 'hub', 'BranchName', 'ConsigneeCity'],
    limit: 3,
  },
  {
    tag: 'TIME',
    keys: ['date', 'timestamp', 'delivered_at', 'delivery_date', 'TransactionDate'],
    limit: 2,
  },
];

function buildPattern(keys: string[]): RegExp {
  return new RegExp(`"(?:${keys.join('|')})"\\s*:\\s*"([^"]+)"`, 'gi');
}

const COMPILED = PATTERN_RULES.map((rule) => ({ ...rule, pattern: buildPattern(rule.keys) }));

/**
 * Pull quoted `"key": "value"` pairs for known status, location and date keys.
 * Returns "" when nothing matched.
 */
export function extractWithPatterns(raw: string): string {
  const lines: string[] = [];

  for (const rule of COMPILED) {
    let count = 0;
    for (const match of raw.matchAll(rule.pattern)) {
      if (count >= rule.limit) break;
      lines.push(`[${rule.tag}] ${match[1]}`);
      count++;
    }
  }

  return lines.join('\n');
}
