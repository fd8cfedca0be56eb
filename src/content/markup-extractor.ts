/**
 * XML and HTML extraction. Both are regex based; tracking pages are rarely
 * well-formed enough for a real parser to help.
 */

import { decodeEntities } from './entities';

const XML_ELEMENT = /<(?:status|location|date|time|message|description|remarks|delivery)\b[^>]*>([^<]+)<\//gi;

/**
 * Text content of the tracking-relevant XML elements, one per line.
 * Returns "" when none carry text.
 */
export function extractFromXml(xml: string): string {
  const values: string[] = [];
  for (const match of xml.matchAll(XML_ELEMENT)) {
    const value = decodeEntities(match[1].trim()).trim();
    if (value) values.push(value);
  }
  return values.join('\n');
}

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/** Visible text of an HTML page, whitespace collapsed. */
export function htmlToText(html: string): string {
  const stripped = html
    .replace(/<script\b[^>]*>[\s\S]*?<\/script>/gi, '')
    .replace(/<style\b[^>]*>[\s\S]*?<\/style>/gi, '')
    .replace(/<!--[\s\S]*?-->/g, '')
    .replace(/<[^>]+>/g, ' ');
  return collapseWhitespace(decodeEntities(stripped));
}
