import type { TrackingAnalysisResult } from '../types';
import { createLogger } from '../utils/logger';
import { getRetryPolicy, withRetry } from '../infra/retry';
import type { Classifier } from './types';
import { unclassified } from './normalize';

const logger = createLogger('classifier');

export const DEFAULT_CLASSIFY_TIMEOUT_MS = 60_000;

export interface ClassifyOptions {
  timeoutMs?: number;
  maxAttempts?: number;
  signal?: AbortSignal;
}

/**
 * Classify with a per-attempt timeout and retries. Never throws: any failure
 * yields the unclassified (Red) result carrying the error message.
 */
export async function classifyWithFallback(
  classifier: Classifier,
  text: string,
  options: ClassifyOptions = {},
): Promise<TrackingAnalysisResult> {
  const policy = getRetryPolicy('classifier');

  try {
    return await withRetry((attemptSignal) => classifier.classify(text, attemptSignal), {
      ...policy,
      maxAttempts: options.maxAttempts ?? policy.maxAttempts,
      timeout: options.timeoutMs ?? DEFAULT_CLASSIFY_TIMEOUT_MS,
      signal: options.signal,
    });
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.error({ classifier: classifier.name, error: message }, 'Classification failed; marking as unclassified');
    return unclassified(message);
  }
}
