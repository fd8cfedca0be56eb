import { z } from 'zod';
import type { TrackingAnalysisResult } from '../types';
import { normalizeColor, normalizeStatus } from './normalize';

export const PARSE_FAILURE_MESSAGE = 'Could not parse classifier response';

const optionalText = z.string().optional().catch(undefined);

const replySchema = z.object({
  status: optionalText,
  color: optionalText,
  error: optionalText,
});

/**
 * Read `{ "status": ..., "color": ... }` out of a model reply. The reply may
 * wrap the object in prose or a code fence; the span from the first `{` to
 * the last `}` is parsed.
 */
export function parseClassifierResponse(text: string | null | undefined): TrackingAnalysisResult {
  const fallback: TrackingAnalysisResult = { status: 'In-Transit', color: 'Yellow', error: PARSE_FAILURE_MESSAGE };
  if (!text || !text.trim()) return fallback;

  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start < 0 || end <= start) return fallback;

  let parsed: unknown;
  try {
    parsed = JSON.parse(text.slice(start, end + 1));
  } catch {
    return fallback;
  }
  const reply = replySchema.safeParse(parsed);
  if (!reply.success) return fallback;

  const result: TrackingAnalysisResult = {
    status: normalizeStatus(reply.data.status),
    color: normalizeColor(reply.data.color),
  };
  if (reply.data.error) result.error = reply.data.error;
  return result;
}
