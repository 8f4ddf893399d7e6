import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import { RetryingClient } from './retrying-client.js';
import { RateLimiter } from './rate-limiter.js';
import { ExternalServiceFailure } from '../utils/errors.js';
import { silentLogger } from '../utils/logger.js';
import { FakeClock, jsonResponse } from '../test/helpers.js';

describe('RetryingClient', () => {
  let clock: FakeClock;
  let fetchMock: Mock<typeof fetch>;

  const createClient = (random = () => 0) =>
    new RetryingClient({
      service: 'overpass',
      limiter: new RateLimiter('overpass', 0, clock),
      policy: { maxAttempts: 3, backoffBaseMs: 1000, jitterMs: 500, timeoutMs: 10_000 },
      logger: silentLogger,
      headers: { 'User-Agent': 'street-ranking-test/1.0' },
      fetch: fetchMock,
      clock,
      random,
    });

  beforeEach(() => {
    clock = new FakeClock();
    fetchMock = vi.fn<typeof fetch>();
  });

  it('should return the parsed body on success', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ elements: [] }));
    const client = createClient();

    const body = await client.execute({ method: 'GET', url: 'https://example.test/a' });

    expect(body).toEqual({ elements: [] });
    expect(fetchMock).toHaveBeenCalledTimes(1);
    const init = fetchMock.mock.calls[0][1];
    expect(init?.method).toBe('GET');
    expect(init?.headers).toEqual({
      Accept: 'application/json',
      'User-Agent': 'street-ranking-test/1.0',
    });
  });

  it('should merge request headers over the defaults', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({}));
    const client = createClient();

    await client.execute({
      method: 'POST',
      url: 'https://example.test/a',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body: 'data=x',
    });

    const init = fetchMock.mock.calls[0][1];
    expect(init?.body).toBe('data=x');
    expect(init?.headers).toEqual({
      Accept: 'application/json',
      'User-Agent': 'street-ranking-test/1.0',
      'Content-Type': 'application/x-www-form-urlencoded',
    });
  });

  it('should retry transient failures with exponential backoff', async () => {
    fetchMock
      .mockResolvedValueOnce(jsonResponse({}, 503))
      .mockResolvedValueOnce(jsonResponse({}, 429))
      .mockResolvedValueOnce(jsonResponse({ ok: true }));
    const client = createClient();

    const body = await client.execute({ method: 'GET', url: 'https://example.test/a' });

    expect(body).toEqual({ ok: true });
    expect(fetchMock).toHaveBeenCalledTimes(3);
    expect(clock.sleeps).toEqual([2000, 4000]);
    expect(client.stats()).toEqual({ requests: 1, attempts: 3, retries: 2, failures: 0 });
  });

  it('should fail after the last attempt with the attempt history', async () => {
    fetchMock.mockImplementation(async () => jsonResponse({}, 500));
    const client = createClient();

    const error = await client
      .execute({ method: 'GET', url: 'https://example.test/a' })
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ExternalServiceFailure);
    if (!(error instanceof ExternalServiceFailure)) return;
    expect(error.message).toBe('overpass: Upstream server error (HTTP 500) (after 3 attempts)');
    expect(error.status).toBe(500);
    expect(error.attempts.map((a) => a.outcome)).toEqual(['transient', 'transient', 'transient']);
    expect(fetchMock).toHaveBeenCalledTimes(3);
    expect(clock.sleeps).toEqual([2000, 4000]);
  });

  it('should not retry a 404', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ error: 'missing' }, 404));
    const client = createClient();

    const error = await client
      .execute({ method: 'GET', url: 'https://example.test/a' })
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ExternalServiceFailure);
    if (!(error instanceof ExternalServiceFailure)) return;
    expect(error.isNotFound).toBe(true);
    expect(error.message).toBe('overpass: Not found');
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(clock.sleeps).toEqual([]);
  });

  it('should not retry other client errors', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({}, 400));
    const client = createClient();

    await expect(client.execute({ method: 'GET', url: 'https://example.test/a' })).rejects.toThrow(
      'overpass: Request rejected (HTTP 400)'
    );
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('should retry network errors', async () => {
    fetchMock
      .mockRejectedValueOnce(new TypeError('fetch failed'))
      .mockResolvedValueOnce(jsonResponse({ ok: true }));
    const client = createClient();

    await expect(client.execute({ method: 'GET', url: 'https://example.test/a' })).resolves.toEqual({
      ok: true,
    });
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('should treat an unparseable body as transient', async () => {
    fetchMock
      .mockResolvedValueOnce(new Response('<html>busy</html>', { status: 200 }))
      .mockResolvedValueOnce(jsonResponse({ ok: true }));
    const client = createClient();

    await expect(client.execute({ method: 'GET', url: 'https://example.test/a' })).resolves.toEqual({
      ok: true,
    });
    expect(clock.sleeps).toEqual([2000]);
  });

  it('should take a rate-limit token for every attempt', async () => {
    fetchMock
      .mockResolvedValueOnce(jsonResponse({}, 502))
      .mockResolvedValueOnce(jsonResponse({ ok: true }));
    const limiter = new RateLimiter('overpass', 1000, clock);
    const acquire = vi.spyOn(limiter, 'acquire');
    const client = new RetryingClient({
      service: 'overpass',
      limiter,
      policy: { maxAttempts: 3, backoffBaseMs: 100, jitterMs: 0, timeoutMs: 10_000 },
      logger: silentLogger,
      fetch: fetchMock,
      clock,
    });

    await client.execute({ method: 'GET', url: 'https://example.test/a' });

    expect(acquire).toHaveBeenCalledTimes(2);
    // 200 ms backoff, then the limiter holds the retry until 1000 ms after the first attempt
    expect(clock.sleeps).toEqual([200, 800]);
  });

  it('should add jitter to the backoff delay', () => {
    const client = createClient(() => 0.5);
    expect(client.backoffDelay(1)).toBe(2250);
    expect(client.backoffDelay(2)).toBe(4250);
  });

  it('should reject a policy without attempts', () => {
    expect(
      () =>
        new RetryingClient({
          service: 'overpass',
          limiter: new RateLimiter('overpass', 0),
          policy: { maxAttempts: 0, backoffBaseMs: 0, jitterMs: 0, timeoutMs: 1 },
          logger: silentLogger,
        })
    ).toThrow(RangeError);
  });
});
