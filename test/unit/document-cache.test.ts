import { describe, test, expect, beforeEach } from '@jest/globals';
import { DocumentCache, DocumentCacheOptions } from '../../src/document-cache';
import { UpstreamFetchError } from '../../src/errors';
import { createLogger } from '../../src/logger';
import { FetchedBlob } from '../../src/types';
import { FakeBlobFetcher, htmlBlob, spreadsheetBlob } from '../helpers/fake-fetcher';
import { buildWorkbook, sampleWorkbook } from '../helpers/workbook-fixtures';

const T0 = 1_700_000_000_000;
const TTL_MS = 60_000;
const SOURCE_URL = 'https://contoso.sharepoint.com/:x:/g/fleet/EbcD?e=1';

describe('DocumentCache', () => {
  let clock: number;
  let fetcher: FakeBlobFetcher;

  function createCache(overrides: Partial<DocumentCacheOptions> = {}): DocumentCache {
    return new DocumentCache({
      sourceUrl: SOURCE_URL,
      ttlMs: TTL_MS,
      fetcher,
      logger: createLogger({ silent: true }),
      maxRetries: 1,
      retryBaseDelayMs: 0,
      now: () => clock,
      ...overrides,
    });
  }

  beforeEach(() => {
    clock = T0;
    fetcher = new FakeBlobFetcher(async () => spreadsheetBlob(sampleWorkbook()));
  });

  test('downloads the direct link with a cache buster on first use', async () => {
    const cache = createCache();
    const workbook = await cache.getWorkbook();

    expect(workbook.sheetNames).toEqual(['Conductores', 'Resumen']);
    expect(fetcher.urls).toEqual([
      'https://contoso.sharepoint.com/:x:/g/fleet/EbcD?e=1&download=1&_cb=1700000000',
    ]);
  });

  test('reuses the download while younger than the TTL', async () => {
    const cache = createCache();
    const first = await cache.getEntry();

    clock = T0 + TTL_MS - 1;
    const second = await cache.getEntry();

    expect(second).toBe(first);
    expect(fetcher.callCount).toBe(1);
  });

  test('downloads again once the TTL has elapsed', async () => {
    const cache = createCache();
    const first = await cache.getEntry();

    clock = T0 + TTL_MS;
    const second = await cache.getEntry();

    expect(second).not.toBe(first);
    expect(second.fetchedAt).toBe(T0 + TTL_MS);
    expect(fetcher.callCount).toBe(2);
  });

  test('a forced refresh downloads even when fresh', async () => {
    const cache = createCache();
    await cache.getEntry();
    await cache.getEntry(true);

    expect(fetcher.callCount).toBe(2);
  });

  test('concurrent callers share a single download', async () => {
    let release: (blob: FetchedBlob) => void = () => undefined;
    fetcher.respond = () =>
      new Promise<FetchedBlob>((resolve) => {
        release = resolve;
      });
    const cache = createCache();

    const pending = Array.from({ length: 5 }, () => cache.getEntry());
    expect(fetcher.callCount).toBe(1);

    release(spreadsheetBlob(sampleWorkbook()));
    const entries = await Promise.all(pending);

    expect(fetcher.callCount).toBe(1);
    expect(new Set(entries).size).toBe(1);
  });

  test('concurrent callers after expiry trigger exactly one new download', async () => {
    const cache = createCache();
    await cache.getEntry();
    clock = T0 + TTL_MS;

    const entries = await Promise.all(Array.from({ length: 8 }, () => cache.getEntry()));

    expect(fetcher.callCount).toBe(2);
    expect(new Set(entries).size).toBe(1);
  });

  test('serves the previous download when a refresh fails and stale-serve is on', async () => {
    const cache = createCache({ serveStaleOnError: true });
    const first = await cache.getEntry();

    clock = T0 + TTL_MS;
    fetcher.respond = async () => htmlBlob(200);
    const second = await cache.getEntry();

    expect(second).toBe(first);
    expect(cache.snapshot()).toEqual({ state: 'loaded', fetchedAt: T0, ageSeconds: 60 });
  });

  test('serves the cached copy without downloading during the retry window', async () => {
    const cache = createCache({ serveStaleOnError: true, staleRetryMs: 10_000 });
    const first = await cache.getEntry();

    clock = T0 + TTL_MS;
    fetcher.respond = async () => {
      throw new UpstreamFetchError('Spreadsheet download failed (503)');
    };
    expect(await cache.getEntry()).toBe(first);
    expect(fetcher.callCount).toBe(2);

    clock = T0 + TTL_MS + 9_999;
    expect(await cache.getEntry()).toBe(first);
    expect(fetcher.callCount).toBe(2);

    clock = T0 + TTL_MS + 10_000;
    fetcher.respond = async () => spreadsheetBlob(sampleWorkbook());
    const recovered = await cache.getEntry();

    expect(fetcher.callCount).toBe(3);
    expect(recovered).not.toBe(first);
    expect(recovered.fetchedAt).toBe(T0 + TTL_MS + 10_000);
  });

  test('a forced refresh ignores the retry window', async () => {
    const cache = createCache({ serveStaleOnError: true, staleRetryMs: 10_000 });
    await cache.getEntry();

    clock = T0 + TTL_MS;
    fetcher.respond = async () => htmlBlob(503, 'Service Unavailable');
    await cache.getEntry();
    await cache.getEntry(true);

    expect(fetcher.callCount).toBe(3);
  });

  test('propagates the refresh failure when stale-serve is off', async () => {
    const cache = createCache({ serveStaleOnError: false });
    await cache.getEntry();

    clock = T0 + TTL_MS;
    fetcher.respond = async () => htmlBlob(200);

    await expect(cache.getEntry()).rejects.toBeInstanceOf(UpstreamFetchError);
  });

  test('propagates failures while nothing has been downloaded yet', async () => {
    fetcher.respond = async () => htmlBlob(404, 'Not Found');
    const cache = createCache({ serveStaleOnError: true });

    const failure = cache.getEntry();
    await expect(failure).rejects.toBeInstanceOf(UpstreamFetchError);
    await expect(failure).rejects.toMatchObject({
      statusCode: 502,
      details: { status: 404, contentType: 'text/html; charset=utf-8', sample: 'Not Found' },
    });
    expect(cache.snapshot()).toEqual({ state: 'empty' });
  });

  test('retries transient failures before giving up', async () => {
    let attempts = 0;
    fetcher.respond = async () => {
      attempts++;
      if (attempts < 3) {
        throw new UpstreamFetchError('socket hang up');
      }
      return spreadsheetBlob(buildWorkbook({ Hoja1: [['x']] }));
    };
    const cache = createCache({ maxRetries: 3 });

    const workbook = await cache.getWorkbook();

    expect(workbook.sheetNames).toEqual(['Hoja1']);
    expect(fetcher.callCount).toBe(3);
  });

  test('wraps unexpected errors after the last attempt', async () => {
    fetcher.respond = async () => {
      throw new TypeError('boom');
    };
    const cache = createCache({ maxRetries: 2 });

    await expect(cache.getEntry()).rejects.toThrow(
      'Spreadsheet download failed after 2 attempts: boom'
    );
    expect(fetcher.callCount).toBe(2);
  });

  test('invalidate forgets the download', async () => {
    const cache = createCache();
    await cache.getEntry();
    cache.invalidate();

    expect(cache.snapshot()).toEqual({ state: 'empty' });
    await cache.getEntry();
    expect(fetcher.callCount).toBe(2);
  });
});
