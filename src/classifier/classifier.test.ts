import { describe, it, expect, vi } from 'vitest';
import { normalizeColor, normalizeStatus } from './normalize';
import { parseClassifierResponse, PARSE_FAILURE_MESSAGE } from './parse';
import { createClaudeClassifier, TRACKING_SYSTEM_PROMPT } from './claude';
import { classifyWithFallback } from './fallback';
import type { Classifier, CompletionFn } from './types';
import { NonRetryableError, TransientError } from '../infra/retry';

describe('normalizeStatus', () => {
  it.each([
    ['Delivered to consignee', 'Delivered'],
    ['Out for delivery', 'Delivered'],
    ['Delivery failed', 'Failed'],
    ['Not delivered', 'Not delivered'],
    ['in transit to hub', 'In-Transit'],
    ['On hold at warehouse', 'Stuck'],
    ['Shipment delayed', 'Stuck'],
    ['Unsuccessful attempt', 'Failed'],
    ['Cancelled by shipper', 'Failed'],
    ['Returned to origin', 'Return'],
    ['Consignee unreachable', 'Customer Not Picking Phone'],
    ['  Held at customs  ', 'Held at customs'],
    ['', 'In-Transit'],
    ['   ', 'In-Transit'],
  ])('maps %j to %j', (raw, expected) => {
    expect(normalizeStatus(raw)).toBe(expected);
  });

  it('treats null as blank', () => {
    expect(normalizeStatus(null)).toBe('In-Transit');
  });
});

describe('normalizeColor', () => {
  it('maps substrings to the four colours', () => {
    expect(normalizeColor('GREEN')).toBe('Green');
    expect(normalizeColor('light yellow')).toBe('Yellow');
    expect(normalizeColor('Orange')).toBe('Orange');
    expect(normalizeColor('dark red')).toBe('Red');
  });

  it('defaults to Yellow for anything else', () => {
    for (const raw of ['', 'blue', 'purple', undefined, null]) {
      expect(normalizeColor(raw)).toBe('Yellow');
    }
  });
});

describe('parseClassifierResponse', () => {
  it('reads status and colour from a JSON reply wrapped in prose', () => {
    const reply = 'Here you go:\n```json\n{"status": "stuck at hub", "color": "orange"}\n```';
    expect(parseClassifierResponse(reply)).toEqual({ status: 'Stuck', color: 'Orange' });
  });

  it('defaults missing fields', () => {
    expect(parseClassifierResponse('{}')).toEqual({ status: 'In-Transit', color: 'Yellow' });
  });

  it('keeps an error reported by the model', () => {
    expect(parseClassifierResponse('{"status":"Delivered","color":"Green","error":"partial page"}')).toEqual({
      status: 'Delivered',
      color: 'Green',
      error: 'partial page',
    });
  });

  it.each(['', '   ', 'no json here', '{"status": ', '} reversed {'])('falls back for %j', (reply) => {
    expect(parseClassifierResponse(reply)).toEqual({
      status: 'In-Transit',
      color: 'Yellow',
      error: PARSE_FAILURE_MESSAGE,
    });
  });
});

describe('createClaudeClassifier', () => {
  it('sends the tracking prompt and parses the reply', async () => {
    const complete = vi.fn<CompletionFn>().mockResolvedValue('{"status":"Returned","color":"Red"}');
    const classifier = createClaudeClassifier({ apiKey: 'test-secret', complete });

    const result = await classifier.classify('[STATUS] status: RTO initiated');

    expect(result).toEqual({ status: 'Return', color: 'Red' });
    expect(complete).toHaveBeenCalledTimes(1);
    const request = complete.mock.calls[0][0];
    expect(request.system).toBe(TRACKING_SYSTEM_PROMPT);
    expect(request.user).toContain('[STATUS] status: RTO initiated');
  });

  it('refuses to build an SDK client without an API key', () => {
    expect(() => createClaudeClassifier({ apiKey: '' })).toThrow(NonRetryableError);
  });
});

describe('classifyWithFallback', () => {
  function fakeClassifier(classify: Classifier['classify']): Classifier {
    return { name: 'fake', classify };
  }

  it('returns the classifier result when it succeeds', async () => {
    const classifier = fakeClassifier(async () => ({ status: 'Delivered', color: 'Green' }));
    await expect(classifyWithFallback(classifier, 'text')).resolves.toEqual({ status: 'Delivered', color: 'Green' });
  });

  it('returns the unclassified result on failure', async () => {
    const classifier = fakeClassifier(async () => {
      throw new NonRetryableError('bad request', 400);
    });
    await expect(classifyWithFallback(classifier, 'text')).resolves.toEqual({
      status: 'Analysis Failed',
      color: 'Red',
      error: 'bad request',
    });
  });

  it('returns the unclassified result on timeout', async () => {
    const classifier = fakeClassifier(() => new Promise(() => {}));
    const result = await classifyWithFallback(classifier, 'text', { timeoutMs: 20, maxAttempts: 1 });
    expect(result).toEqual({ status: 'Analysis Failed', color: 'Red', error: 'Operation timed out after 20ms' });
  });

  it('cancels the classifier request that timed out', async () => {
    const signals: AbortSignal[] = [];
    const classifier = fakeClassifier((_text, signal) => {
      if (signal) signals.push(signal);
      return new Promise(() => {});
    });

    const result = await classifyWithFallback(classifier, 'text', { timeoutMs: 20, maxAttempts: 1 });

    expect(result.status).toBe('Analysis Failed');
    expect(signals).toHaveLength(1);
    expect(signals[0].aborted).toBe(true);
  });

  it('retries transient failures', async () => {
    const classify = vi
      .fn<Classifier['classify']>()
      .mockRejectedValueOnce(new TransientError('overloaded', 529))
      .mockResolvedValueOnce({ status: 'Stuck', color: 'Orange' });
    const classifier = fakeClassifier(classify);

    vi.useFakeTimers();
    try {
      const pending = classifyWithFallback(classifier, 'text', { maxAttempts: 2 });
      await vi.runAllTimersAsync();
      await expect(pending).resolves.toEqual({ status: 'Stuck', color: 'Orange' });
    } finally {
      vi.useRealTimers();
    }
    expect(classify).toHaveBeenCalledTimes(2);
  });
});
