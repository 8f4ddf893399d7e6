import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import { pino } from 'pino';
import {
  GeocodeResolver,
  NominatimProvider,
  PostcodesIoProvider,
  type GeocodeProvider,
  type LookupOutcome,
} from './geocode-resolver.js';
import { RateLimiter } from './rate-limiter.js';
import { RetryingClient } from './retrying-client.js';
import { ExternalServiceFailure, GeocodeFailure } from '../utils/errors.js';
import { silentLogger } from '../utils/logger.js';
import { FakeClock, MemoryGeocodeCache, jsonResponse } from '../test/helpers.js';

const E1 = { lat: 51.515, lon: -0.072 };

function fakeProvider(name: string, lookup: (district: string) => Promise<LookupOutcome>) {
  const provider = { name, lookup: vi.fn(lookup) } satisfies GeocodeProvider;
  return provider;
}

describe('PostcodesIoProvider', () => {
  let fetchMock: Mock<typeof fetch>;
  let provider: PostcodesIoProvider;

  beforeEach(() => {
    const clock = new FakeClock();
    fetchMock = vi.fn<typeof fetch>();
    const client = new RetryingClient({
      service: 'postcodes.io',
      limiter: new RateLimiter('postcodes.io', 0, clock),
      policy: { maxAttempts: 3, backoffBaseMs: 10, jitterMs: 0, timeoutMs: 1000 },
      logger: silentLogger,
      fetch: fetchMock,
      clock,
    });
    provider = new PostcodesIoProvider(client, 'https://postcodes.example.test');
  });

  it('should return the published outcode centroid', async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse({ status: 200, result: { outcode: 'E1', latitude: 51.517, longitude: -0.061 } })
    );

    await expect(provider.lookup('E1')).resolves.toEqual({
      found: true,
      coordinate: { lat: 51.517, lon: -0.061 },
    });
    expect(fetchMock.mock.calls[0][0]).toBe('https://postcodes.example.test/outcodes/E1');
  });

  it('should report an unknown outcode as not found', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ status: 404, error: 'Outcode not found' }, 404));

    await expect(provider.lookup('ZZ9')).resolves.toEqual({
      found: false,
      reason: 'postcodes.io: not found',
    });
  });

  it('should report an outcode without a centroid', async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse({ status: 200, result: { latitude: null, longitude: null } })
    );

    await expect(provider.lookup('EC1')).resolves.toEqual({
      found: false,
      reason: 'postcodes.io: no centroid published',
    });
  });

  it('should propagate service failures', async () => {
    fetchMock.mockImplementation(async () => jsonResponse({}, 503));

    await expect(provider.lookup('E1')).rejects.toBeInstanceOf(ExternalServiceFailure);
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });
});

describe('NominatimProvider', () => {
  let fetchMock: Mock<typeof fetch>;
  let provider: NominatimProvider;

  beforeEach(() => {
    const clock = new FakeClock();
    fetchMock = vi.fn<typeof fetch>();
    const client = new RetryingClient({
      service: 'nominatim',
      limiter: new RateLimiter('nominatim', 0, clock),
      policy: { maxAttempts: 3, backoffBaseMs: 10, jitterMs: 0, timeoutMs: 1000 },
      logger: silentLogger,
      fetch: fetchMock,
      clock,
    });
    provider = new NominatimProvider(client, 'https://geocoder.example.test', 'London, UK');
  });

  it('should send the district with the region hint', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse([]));

    await provider.lookup('E1');

    const url = new URL(String(fetchMock.mock.calls[0][0]));
    expect(url.origin + url.pathname).toBe('https://geocoder.example.test/search');
    expect(url.searchParams.get('q')).toBe('E1, London, UK');
    expect(url.searchParams.get('format')).toBe('jsonv2');
    expect(url.searchParams.get('addressdetails')).toBe('1');
  });

  it('should average the results inside the district', async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse([
        { lat: '51.50', lon: '-0.10', address: { postcode: 'E1 6AN' } },
        { lat: '51.52', lon: '-0.06', address: { postcode: 'e1 7aa' } },
        { lat: '51.60', lon: '-0.20', address: { postcode: 'E10 5AA' } },
      ])
    );

    const outcome = await provider.lookup('E1');

    expect(outcome.found).toBe(true);
    if (!outcome.found) return;
    expect(outcome.coordinate.lat).toBeCloseTo(51.51, 10);
    expect(outcome.coordinate.lon).toBeCloseTo(-0.08, 10);
  });

  it('should accept a single result without a matching postcode', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse([{ lat: '51.515', lon: '-0.072' }]));

    await expect(provider.lookup('E1')).resolves.toEqual({ found: true, coordinate: E1 });
  });

  it('should reject several results outside the district', async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse([
        { lat: '51.5', lon: '-0.1', address: { postcode: 'E10 5AA' } },
        { lat: '51.6', lon: '-0.2' },
      ])
    );

    await expect(provider.lookup('E1')).resolves.toEqual({
      found: false,
      reason: 'nominatim: ambiguous (2 results, none in district)',
    });
  });

  it('should report an empty answer', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse([]));

    await expect(provider.lookup('E1')).resolves.toEqual({
      found: false,
      reason: 'nominatim: no results',
    });
  });
});

describe('GeocodeResolver', () => {
  it('should answer from the cache without calling a provider', async () => {
    const provider = fakeProvider('primary', async () => ({ found: true, coordinate: { lat: 0, lon: 0 } }));
    const resolver = new GeocodeResolver(new MemoryGeocodeCache({ E1 }), [provider], silentLogger);

    await expect(resolver.resolve('e1')).resolves.toEqual(E1);
    expect(provider.lookup).not.toHaveBeenCalled();
  });

  it('should cache a lookup so the second resolve makes no external call', async () => {
    const cache = new MemoryGeocodeCache();
    const provider = fakeProvider('primary', async () => ({ found: true, coordinate: E1 }));
    const resolver = new GeocodeResolver(cache, [provider], silentLogger);

    const first = await resolver.resolve('E1');
    const second = await resolver.resolve(' e1 ');

    expect(first).toEqual(E1);
    expect(second).toEqual(E1);
    expect(provider.lookup).toHaveBeenCalledTimes(1);
    expect(cache.get('E1')).toEqual(E1);
  });

  it('should fall back to the next provider on a miss', async () => {
    const primary = fakeProvider('primary', async () => ({ found: false, reason: 'primary: not found' }));
    const fallback = fakeProvider('fallback', async () => ({ found: true, coordinate: E1 }));
    const resolver = new GeocodeResolver(new MemoryGeocodeCache(), [primary, fallback], silentLogger);

    await expect(resolver.resolve('E1')).resolves.toEqual(E1);
    expect(primary.lookup).toHaveBeenCalledWith('E1');
    expect(fallback.lookup).toHaveBeenCalledWith('E1');
  });

  it('should fail with every reason when no provider locates the district', async () => {
    const primary = fakeProvider('primary', async () => ({ found: false, reason: 'primary: not found' }));
    const fallback = fakeProvider('fallback', async () => {
      throw new ExternalServiceFailure('fallback', 'Request timeout (after 3 attempts)');
    });
    const cache = new MemoryGeocodeCache();
    const resolver = new GeocodeResolver(cache, [primary, fallback], silentLogger);

    const error = await resolver.resolve('ZZ9').catch((err: unknown) => err);

    expect(error).toBeInstanceOf(GeocodeFailure);
    if (!(error instanceof GeocodeFailure)) return;
    expect(error.reasons).toEqual(['primary: not found', 'fallback: Request timeout (after 3 attempts)']);
    expect(error.unreachable).toBe(false);
    expect(cache.size()).toBe(0);
  });

  it('should flag the failure as unreachable when every provider failed', async () => {
    const down = fakeProvider('primary', async () => {
      throw new ExternalServiceFailure('primary', 'Upstream server error (HTTP 503) (after 3 attempts)', 503);
    });
    const resolver = new GeocodeResolver(new MemoryGeocodeCache(), [down], silentLogger);

    const error = await resolver.resolve('E1').catch((err: unknown) => err);

    expect(error).toBeInstanceOf(GeocodeFailure);
    expect(error instanceof GeocodeFailure && error.unreachable).toBe(true);
  });

  it('should skip a provider that returns an invalid coordinate', async () => {
    const broken = fakeProvider('broken', async () => ({ found: true, coordinate: { lat: 200, lon: 0 } }));
    const fallback = fakeProvider('fallback', async () => ({ found: true, coordinate: E1 }));
    const resolver = new GeocodeResolver(new MemoryGeocodeCache(), [broken, fallback], silentLogger);

    await expect(resolver.resolve('E1')).resolves.toEqual(E1);
  });

  it('should share one lookup between concurrent callers', async () => {
    const provider = fakeProvider('primary', async () => ({ found: true, coordinate: E1 }));
    const resolver = new GeocodeResolver(new MemoryGeocodeCache(), [provider], silentLogger);

    const [a, b] = await Promise.all([resolver.resolve('E1'), resolver.resolve('E1')]);

    expect(a).toEqual(E1);
    expect(b).toEqual(E1);
    expect(provider.lookup).toHaveBeenCalledTimes(1);
  });

  it('should log a failed cache write and still return the coordinate', async () => {
    const lines: string[] = [];
    const logger = pino({ level: 'info' }, { write: (line: string) => lines.push(line) });
    const cache = new MemoryGeocodeCache();
    vi.spyOn(cache, 'set').mockRejectedValueOnce(new Error('disk full'));
    const provider = fakeProvider('primary', async () => ({ found: true, coordinate: E1 }));
    const resolver = new GeocodeResolver(cache, [provider], logger);

    await expect(resolver.resolve('E1')).resolves.toEqual(E1);

    const failure = lines.map((line) => JSON.parse(line)).find((entry) => entry.level === 50);
    expect(failure).toMatchObject({
      component: 'geocode-resolver',
      district: 'E1',
      err: 'disk full',
      msg: 'Could not persist geocode result',
    });
    expect(cache.get('E1')).toBeNull();

    // Uncached, so the next resolve asks the provider again and stores the answer
    await expect(resolver.resolve('E1')).resolves.toEqual(E1);
    expect(provider.lookup).toHaveBeenCalledTimes(2);
    expect(cache.get('E1')).toEqual(E1);
  });

  it('should propagate unexpected provider errors', async () => {
    const provider = fakeProvider('primary', async () => {
      throw new RangeError('bug');
    });
    const resolver = new GeocodeResolver(new MemoryGeocodeCache(), [provider], silentLogger);

    await expect(resolver.resolve('E1')).rejects.toThrow('bug');
  });
});
