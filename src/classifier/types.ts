import type { TrackingAnalysisResult } from '../types';

/**
 * Anything that can label normalised tracking text with a status and colour.
 * Implementations may throw; callers wrap them with `classifyWithFallback`.
 */
export interface Classifier {
  readonly name: string;
  classify(text: string, signal?: AbortSignal): Promise<TrackingAnalysisResult>;
}

export interface CompletionRequest {
  system: string;
  user: string;
  signal?: AbortSignal;
}

/** One prompt in, raw model text out. */
export type CompletionFn = (request: CompletionRequest) => Promise<string>;
