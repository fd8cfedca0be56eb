/**
 * Claude-backed tracking classifier.
 */

import Anthropic from '@anthropic-ai/sdk';
import { createLogger } from '../utils/logger';
import { NonRetryableError } from '../infra/retry';
import type { Classifier, CompletionFn } from './types';
import { parseClassifierResponse } from './parse';

const logger = createLogger('classifier');

export const DEFAULT_CLASSIFIER_MODEL = 'claude-3-5-haiku-20241022';

export const TRACKING_SYSTEM_PROMPT = `You are a courier tracking analyzer for an e-commerce business. Analyze tracking info and detect problems.
Return ONLY valid JSON: {"status": "Status", "color": "Color"}

Status options:
- Delivered: Package successfully delivered
- In-Transit: Moving normally through courier network
- Stuck: No movement for 2+ days at same location
- Failed: Delivery attempt failed
- Return: Being returned to sender
- Customer Not Picking Phone: Courier cannot contact customer

Color codes:
- Green: Delivered
- Yellow: In-Transit (normal)
- Orange: Stuck (warning - needs follow-up)
- Red: Failed, Return, or Customer not reachable (urgent action needed)

Look for keywords like: delivered, out for delivery, in transit, attempted delivery, returned, customer unreachable, contact failed, stuck, delay`;

export function buildTrackingPrompt(text: string): string {
  return `Analyze this courier tracking information:\n\n${text}\n\nReturn JSON with status and color.`;
}

export interface ClaudeClassifierConfig {
  apiKey: string;
  model?: string;
  maxTokens?: number;
  /** Replaces the SDK call, e.g. in tests */
  complete?: CompletionFn;
}

function createSdkCompletion(apiKey: string, model: string, maxTokens: number): CompletionFn {
  // The shared retry helper owns retries, so the SDK makes a single attempt
  const client = new Anthropic({ apiKey, maxRetries: 0 });

  return async ({ system, user, signal }) => {
    const response = await client.messages.create(
      {
        model,
        max_tokens: maxTokens,
        temperature: 0.3,
        system,
        messages: [{ role: 'user', content: user }],
      },
      { signal },
    );

    return response.content.map((block) => (block.type === 'text' ? block.text : '')).join('');
  };
}

export function createClaudeClassifier(config: ClaudeClassifierConfig): Classifier {
  const model = config.model ?? DEFAULT_CLASSIFIER_MODEL;
  const maxTokens = config.maxTokens ?? 150;

  let complete = config.complete;
  if (!complete) {
    if (!config.apiKey) {
      throw new NonRetryableError('Claude classifier requires an API key (ANTHROPIC_API_KEY)');
    }
    complete = createSdkCompletion(config.apiKey, model, maxTokens);
  }
  const completion = complete;

  return {
    name: `claude:${model}`,

    async classify(text, signal) {
      const reply = await completion({ system: TRACKING_SYSTEM_PROMPT, user: buildTrackingPrompt(text), signal });
      const result = parseClassifierResponse(reply);
      if (result.error) {
        logger.warn({ model, reply: reply.slice(0, 200) }, 'Classifier reply was not usable JSON');
      }
      return result;
    },
  };
}
