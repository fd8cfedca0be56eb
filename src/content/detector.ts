import type { ContentType } from '../types';

const HTML_MARKERS = ['<html', '<body', '<div', '<script'];
const HTML_ROOT = /^<(!doctype\s+html|html[\s>])/i;

export function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Classify a raw tracking payload. A document whose root is `<html>` or an
 * HTML doctype counts as HTML even though it also looks like markup.
 */
export function detectContentType(raw: string | null | undefined): ContentType {
  if (!raw || !raw.trim()) return 'Unknown';

  const trimmed = raw.trimStart();

  if ((trimmed.startsWith('{') || trimmed.startsWith('[')) && tryParseJson(trimmed) !== undefined) {
    return 'JSON';
  }

  if (trimmed.startsWith('<') && !HTML_ROOT.test(trimmed) && trimmed.includes('</') && trimmed.includes('>')) {
    return 'XML';
  }

  const lower = trimmed.toLowerCase();
  if (HTML_MARKERS.some((marker) => lower.includes(marker))) {
    return 'HTML';
  }

  return 'PlainText';
}
