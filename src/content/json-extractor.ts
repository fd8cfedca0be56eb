/**
 * Structured extraction from courier JSON responses.
 *
 * Walks the document for four field vocabularies (status, location, time,
 * details) and renders one `[CATEGORY] field: value` line per distinct value.
 * Array roots are treated as an event log with the newest event last.
 */

import trackingFields from './tracking-fields.json';
import { tryParseJson } from './detector';

export type FieldCategory = 'STATUS' | 'LOCATION' | 'TIME' | 'DETAILS';

function lowerSet(names: string[]): ReadonlySet<string> {
  return new Set(names.map((name) => name.toLowerCase()));
}

const FIELD_SETS: ReadonlyArray<[FieldCategory, ReadonlySet<string>]> = [
  ['STATUS', lowerSet(trackingFields.status)],
  ['LOCATION', lowerSet(trackingFields.location)],
  ['TIME', lowerSet(trackingFields.time)],
  ['DETAILS', lowerSet(trackingFields.details)],
];

const STATUS_FIELDS = lowerSet(trackingFields.status);
const TIME_FIELDS = lowerSet(trackingFields.time);
const HISTORY_FIELDS = trackingFields.history.map((name) => name.toLowerCase());

/** Older events shown under RECENT HISTORY / TRACKING HISTORY */
const HISTORY_DEPTH = 3;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function primitiveText(value: unknown): string | null {
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed ? trimmed : null;
  }
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  if (typeof value === 'boolean') return String(value);
  return null;
}

/** Child entries in document order; array items carry no key. */
function childEntries(node: unknown): Array<[string | null, unknown]> {
  if (Array.isArray(node)) return node.map((item): [string | null, unknown] => [null, item]);
  if (isRecord(node)) return Object.entries(node);
  return [];
}

/** Push children so that they pop in document order. */
function pushChildren<T>(stack: T[], children: T[]): void {
  for (let i = children.length - 1; i >= 0; i--) stack.push(children[i]);
}

/**
 * Append one line per first-seen value of any field in `fields`, at any depth.
 * Values are de-duplicated case-insensitively within one call. The walk keeps
 * its own stack, so nesting depth is bounded only by what JSON.parse accepts.
 */
function collectFields(node: unknown, fields: ReadonlySet<string>, category: FieldCategory | null, out: string[]): void {
  const seen = new Set<string>();
  const stack: Array<[string | null, unknown]> = [];
  pushChildren(stack, childEntries(node));

  for (let entry = stack.pop(); entry !== undefined; entry = stack.pop()) {
    const [key, value] = entry;
    if (key !== null && fields.has(key.toLowerCase())) {
      const text = primitiveText(value);
      if (text !== null && !seen.has(text.toLowerCase())) {
        seen.add(text.toLowerCase());
        out.push(category ? `[${category}] ${key}: ${text}` : `${key}: ${text}`);
      }
    }
    pushChildren(stack, childEntries(value));
  }
}

function collectAllCategories(node: unknown, out: string[]): void {
  for (const [category, fields] of FIELD_SETS) {
    collectFields(node, fields, category, out);
  }
}

// =============================================================================
// HISTORY
// =============================================================================

function getIgnoreCase(record: Record<string, unknown>, ...names: string[]): string | null {
  for (const name of names) {
    for (const [key, value] of Object.entries(record)) {
      if (key.toLowerCase() !== name) continue;
      const text = primitiveText(value);
      if (text !== null) return text;
    }
  }
  return null;
}

/** Depth-first search for the first array stored under `field`. */
function findArrayField(root: unknown, field: string): unknown[] | null {
  const stack: unknown[] = [root];

  for (let node = stack.pop(); node !== undefined; node = stack.pop()) {
    if (isRecord(node)) {
      for (const [key, value] of Object.entries(node)) {
        if (key.toLowerCase() === field && Array.isArray(value)) return value;
      }
    }
    pushChildren(stack, childEntries(node).map(([, value]) => value));
  }
  return null;
}

function formatHistoryEvent(event: unknown): string | null {
  if (!isRecord(event)) return null;
  const status = getIgnoreCase(event, 'status', 'message', 'description');
  if (!status) return null;

  const date = getIgnoreCase(event, 'date', 'timestamp', 'time');
  const location = getIgnoreCase(event, 'location', 'city');

  let line = `- ${status}`;
  if (date) line += ` (${date})`;
  if (location) line += ` at ${location}`;
  return line;
}

function collectTrackingHistory(root: unknown, out: string[]): void {
  for (const field of HISTORY_FIELDS) {
    const events = findArrayField(root, field);
    if (!events) continue;

    out.push('', '### TRACKING HISTORY ###');
    for (const event of events.slice(-HISTORY_DEPTH)) {
      const line = formatHistoryEvent(event);
      if (line) out.push(line);
    }
    return;
  }
}

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Render the tracking-relevant parts of an already-parsed JSON document.
 */
export function extractJsonFields(root: unknown): string {
  const lines: string[] = [];

  if (Array.isArray(root) && root.length > 0) {
    const latest = root[root.length - 1];
    lines.push('### LATEST STATUS ###');
    collectAllCategories(latest, lines);

    if (root.length > 1) {
      lines.push('', '### RECENT HISTORY ###');
      const previous = root.slice(Math.max(0, root.length - 1 - HISTORY_DEPTH), root.length - 1);
      for (const item of previous) {
        collectFields(item, STATUS_FIELDS, null, lines);
        collectFields(item, TIME_FIELDS, null, lines);
        lines.push('---');
      }
    }
  } else {
    collectAllCategories(root, lines);
    collectTrackingHistory(root, lines);
  }

  return lines.join('\n');
}

/** Parse `raw` and extract; null when it does not parse. */
export function extractFromJson(raw: string): string | null {
  const root = tryParseJson(raw.trim());
  if (root === undefined) return null;
  return extractJsonFields(root);
}
