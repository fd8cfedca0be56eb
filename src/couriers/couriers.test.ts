import { describe, it, expect, vi, afterEach } from 'vitest';
import type { CourierApiConfig } from '../types';
import { extractTrackingNumber, resolveTrackingRequest } from './resolver';
import { fetchTrackingPayload } from './fetcher';

const COURIERS: CourierApiConfig[] = [
  {
    name: 'disabled-express',
    detectionUrl: 'track.example.com',
    apiEndpoint: 'https://api.disabled.test/{trackingNumber}',
    queryParameters: ['id'],
    enabled: false,
  },
  {
    name: 'example-express',
    detectionUrl: 'track.example.com',
    apiEndpoint: 'https://api.example.com/v1/track?cn={trackingNumber}',
    queryParameters: ['cn', 'tracking_number'],
    enabled: true,
  },
];

describe('extractTrackingNumber', () => {
  it('prefers the first configured query parameter present', () => {
    const url = 'https://track.example.com/t?tracking_number=TN999999&cn=CN123456';
    expect(extractTrackingNumber(url, ['cn', 'tracking_number'])).toBe('CN123456');
  });

  it('falls back to a long last path segment', () => {
    expect(extractTrackingNumber('https://track.example.com/parcel/AB123456/', ['cn'])).toBe('AB123456');
  });

  it('ignores short path segments', () => {
    expect(extractTrackingNumber('https://track.example.com/t/12345', ['cn'])).toBeNull();
  });

  it('returns null for unparseable URLs', () => {
    expect(extractTrackingNumber('not a url', ['cn'])).toBeNull();
  });
});

describe('resolveTrackingRequest', () => {
  it('builds the courier API URL for a recognised tracking link', () => {
    expect(resolveTrackingRequest('https://track.example.com/?cn=AB 123456', COURIERS)).toEqual({
      url: 'https://api.example.com/v1/track?cn=AB%20123456',
      courier: 'example-express',
      trackingNumber: 'AB 123456',
    });
  });

  it('keeps the original URL for unknown couriers', () => {
    const url = 'https://other-courier.test/track/ZX987654';
    expect(resolveTrackingRequest(url, COURIERS)).toEqual({ url });
  });

  it('keeps the original URL when no tracking number is found', () => {
    const url = 'https://track.example.com/t/123';
    expect(resolveTrackingRequest(url, COURIERS)).toEqual({ url });
  });

  it('skips disabled couriers', () => {
    const onlyDisabled = COURIERS.slice(0, 1);
    const url = 'https://track.example.com/?id=AB123456';
    expect(resolveTrackingRequest(url, onlyDisabled)).toEqual({ url });
  });
});

describe('fetchTrackingPayload', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('fetches the courier API with browser headers', async () => {
    const fetchMock = vi.fn().mockResolvedValue(new Response('{"status":"Delivered"}', { status: 200 }));
    vi.stubGlobal('fetch', fetchMock);

    const payload = await fetchTrackingPayload('https://track.example.com/?cn=AB123456', { couriers: COURIERS });

    expect(payload.body).toBe('{"status":"Delivered"}');
    expect(payload.request.courier).toBe('example-express');
    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://api.example.com/v1/track?cn=AB123456');
    expect(init.headers['User-Agent']).toContain('Mozilla/5.0');
  });

  it('falls back to the tracking page when the courier API rejects the request', async () => {
    const fetchMock = vi
      .fn()
      .mockResolvedValueOnce(new Response('not found', { status: 404 }))
      .mockResolvedValueOnce(new Response('<html><body>In transit</body></html>', { status: 200 }));
    vi.stubGlobal('fetch', fetchMock);

    const trackingUrl = 'https://track.example.com/?cn=AB123456';
    const payload = await fetchTrackingPayload(trackingUrl, { couriers: COURIERS });

    expect(payload).toEqual({ request: { url: trackingUrl }, body: '<html><body>In transit</body></html>' });
    expect(fetchMock.mock.calls[1][0]).toBe(trackingUrl);
  });

  it('propagates a failure of the direct page fetch', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(new Response('gone', { status: 410 })));

    await expect(fetchTrackingPayload('https://unknown.test/track/AB123456')).rejects.toThrow(
      'GET https://unknown.test/track/AB123456 failed (410): gone',
    );
  });

  it('cancels each tracking request that times out', async () => {
    const signals: AbortSignal[] = [];
    vi.stubGlobal(
      'fetch',
      vi.fn((_url: string, init?: RequestInit) => {
        if (init?.signal) signals.push(init.signal);
        return new Promise<Response>(() => undefined);
      }),
    );

    vi.useFakeTimers();
    try {
      const outcome = expect(fetchTrackingPayload('https://unknown.test/track/AB123456', { timeoutMs: 10 })).rejects.toThrow(
        'Operation timed out after 10ms',
      );
      await vi.runAllTimersAsync();
      await outcome;
    } finally {
      vi.useRealTimers();
    }

    expect(signals).toHaveLength(2);
    expect(signals.every((signal) => signal.aborted)).toBe(true);
  });
});
