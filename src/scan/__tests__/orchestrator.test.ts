import { promises as fs } from 'node:fs';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { FakeClock, TEST_SECRET, makeExtension, makeScanResult, makeTempDir, removeDir } from '../../__tests__/helpers.js';
import type { CacheKey, CachedResult, ResultCache } from '../../cache/cache.js';
import { CacheManager } from '../../cache/cacheManager.js';
import type { ExtensionRef, RetryStats, ScanOutcome, ScanResult } from '../../types/index.js';
import { hmacHex } from '../../utils/hash.js';
import { MS_PER_DAY } from '../../utils/time.js';
import { ScanOrchestrator, clampWorkers, type ProgressEvent, type ScanClient } from '../orchestrator.js';

const WEEK = 7 * MS_PER_DAY;

const emptyRetryStats: RetryStats = {
  totalRetries: 0,
  successfulRetries: 0,
  failedAfterRetries: 0,
  totalWorkflowRetries: 0,
  successfulWorkflowRetries: 0,
  failedAfterWorkflowRetries: 0,
};

class FakeClient implements ScanClient {
  readonly scanned: string[] = [];
  inFlight = 0;
  maxInFlight = 0;

  constructor(private readonly respond: (publisher: string, name: string) => ScanOutcome = succeed) {}

  async scan(publisher: string, name: string): Promise<ScanOutcome> {
    this.scanned.push(`${publisher}.${name}`);
    this.inFlight += 1;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    await new Promise((resolve) => setTimeout(resolve, 5));
    this.inFlight -= 1;
    return this.respond(publisher, name);
  }

  getRetryStats(): RetryStats {
    return { ...emptyRetryStats, totalRetries: 4 };
  }
}

class MemoryCache implements ResultCache {
  readonly entries = new Map<string, CachedResult>();

  async getEntry(key: CacheKey): Promise<CachedResult | undefined> {
    return this.entries.get(`${key.extensionId}@${key.version}`);
  }

  async save(key: CacheKey, result: ScanResult): Promise<void> {
    this.entries.set(`${key.extensionId}@${key.version}`, { result, cachedAt: '2026-01-10T00:00:00.000Z' });
  }
}

function succeed(publisher: string, name: string): ScanOutcome {
  return { status: 'success', result: makeScanResult({ publisher, name }) };
}

const manyExtensions = (count: number): ExtensionRef[] =>
  Array.from({ length: count }, (_, index) => makeExtension('acme', `ext${index}`));

describe('clampWorkers', () => {
  it('keeps the pool between one and five workers', () => {
    expect(clampWorkers(undefined)).toBe(3);
    expect(clampWorkers(0)).toBe(1);
    expect(clampWorkers(4)).toBe(4);
    expect(clampWorkers(9)).toBe(5);
  });
});

describe('ScanOrchestrator', () => {
  it.each([1, 3, 5])('completes every item exactly once with %i workers', async (workers) => {
    const client = new FakeClient();
    const orchestrator = new ScanOrchestrator({ cache: new MemoryCache(), client });
    const items = manyExtensions(12);

    const { results, stats } = await orchestrator.run(items, { workers, maxAgeMs: WEEK });

    expect(results.map((outcome) => outcome.index)).toEqual(items.map((_, index) => index));
    expect(results.map((outcome) => outcome.extension.id)).toEqual(items.map((item) => item.id));
    expect(new Set(client.scanned).size).toBe(12);
    expect(client.scanned).toHaveLength(12);
    expect(client.maxInFlight).toBe(workers);
    expect(stats).toMatchObject({ total: 12, cacheHits: 0, freshScans: 12, errors: 0, vulnerabilitiesFound: 36 });
  });

  it('clamps an oversized pool', async () => {
    const client = new FakeClient();
    const orchestrator = new ScanOrchestrator({ cache: new MemoryCache(), client });

    await orchestrator.run(manyExtensions(8), { workers: 20, maxAgeMs: WEEK });

    expect(client.maxInFlight).toBe(5);
  });

  describe('with a real cache', () => {
    let directory: string;

    beforeEach(async () => {
      directory = await makeTempDir();
    });

    afterEach(async () => {
      await removeDir(directory);
    });

    it('caches successes and retries the not-found extension on the next run', async () => {
      const clock = new FakeClock();
      const cache = await CacheManager.open({ directory, secret: TEST_SECRET, now: clock.now });
      const items = [makeExtension('acme', 'alpha'), makeExtension('acme', 'beta'), makeExtension('acme', 'gamma')];
      const respond = (publisher: string, name: string): ScanOutcome =>
        name === 'beta'
          ? { status: 'not-found', reason: 'Extension not found on the analysis service' }
          : succeed(publisher, name);

      const firstClient = new FakeClient(respond);
      const first = await new ScanOrchestrator({ cache, client: firstClient }).run(items, { workers: 3, maxAgeMs: WEEK });

      expect(first.stats).toMatchObject({ total: 3, cacheHits: 0, freshScans: 2, errors: 1 });
      expect(first.stats.failedExtensions).toEqual([
        { id: 'acme.beta', name: 'beta', errorType: 'not_found', errorMessage: 'Extension not found on the analysis service' },
      ]);
      expect(first.results.map((outcome) => outcome.status)).toEqual(['success', 'not-found', 'success']);
      expect(await cache.list()).toHaveLength(2);

      clock.advance(MS_PER_DAY);
      const secondClient = new FakeClient(respond);
      const second = await new ScanOrchestrator({ cache, client: secondClient }).run(items, { workers: 3, maxAgeMs: WEEK });

      expect(second.stats).toMatchObject({ total: 3, cacheHits: 2, freshScans: 0, errors: 1 });
      expect(secondClient.scanned).toEqual(['acme.beta']);
      expect(second.results[0]).toMatchObject({ fromCache: true, cachedAt: '2026-01-10T00:00:00.000Z' });
    });

    it('rescans an item whose signed cached payload is missing fields', async () => {
      const payload = '{"riskLevel":"low"}';
      await fs.writeFile(
        path.join(directory, 'cache.json'),
        JSON.stringify({
          format: 'extscan-cache',
          schemaVersion: 1,
          entries: [
            {
              extensionId: 'acme.alpha',
              version: '1.0.0',
              payload,
              cachedAt: '2026-01-09T00:00:00.000Z',
              signature: hmacHex(TEST_SECRET, payload),
              riskLevel: 'low',
            },
          ],
        }),
      );
      const cacheLogger = vi.fn<[string], void>();
      const cache = await CacheManager.open({ directory, secret: TEST_SECRET, logger: cacheLogger, now: new FakeClock().now });
      const client = new FakeClient();

      const { results, stats } = await new ScanOrchestrator({ cache, client }).run([makeExtension('acme', 'alpha')], {
        maxAgeMs: WEEK,
      });

      expect(client.scanned).toEqual(['acme.alpha']);
      expect(results).toHaveLength(1);
      expect(results[0]).toMatchObject({ status: 'success', fromCache: false, index: 0 });
      expect(stats).toMatchObject({ total: 1, cacheHits: 0, freshScans: 1, errors: 0, vulnerabilitiesFound: 3 });
      expect(cacheLogger).toHaveBeenCalledWith(
        'Unusable cached payload for acme.alpha@1.0.0: payload.publisher must be a string; treating as a cache miss.',
      );
    });
  });

  it('scans everything and saves nothing without a cache', async () => {
    const client = new FakeClient();
    const orchestrator = new ScanOrchestrator({ client });
    const items = [makeExtension('acme', 'alpha'), makeExtension('acme', 'beta')];

    await orchestrator.run(items, { maxAgeMs: WEEK });
    const { stats } = await orchestrator.run(items, { maxAgeMs: WEEK });

    expect(client.scanned).toEqual(['acme.alpha', 'acme.beta', 'acme.alpha', 'acme.beta']);
    expect(stats).toMatchObject({ total: 2, cacheHits: 0, freshScans: 2 });
  });

  it('logs and ignores a progress callback that throws', async () => {
    const logger = vi.fn<[string], void>();
    const onProgress = () => {
      throw new Error('display gone');
    };

    const orchestrator = new ScanOrchestrator({ cache: new MemoryCache(), client: new FakeClient(), logger, onProgress });

    const { results, stats } = await orchestrator.run([makeExtension('acme', 'alpha')], { maxAgeMs: WEEK });

    expect(results[0]?.status).toBe('success');
    expect(stats).toMatchObject({ freshScans: 1, errors: 0 });
    expect(logger.mock.calls).toEqual([
      ['Progress callback failed on started for acme.alpha: display gone'],
      ['Progress callback failed on completed for acme.alpha: display gone'],
    ]);
  });

  it('rescans cached items on refresh', async () => {
    const cache = new MemoryCache();
    const item = makeExtension('acme', 'alpha');
    await cache.save({ extensionId: item.id, version: item.version }, makeScanResult());
    const client = new FakeClient();

    const { stats } = await new ScanOrchestrator({ cache, client }).run([item], { maxAgeMs: WEEK, refresh: true });

    expect(client.scanned).toEqual(['acme.alpha']);
    expect(stats).toMatchObject({ cacheHits: 0, freshScans: 1 });
  });

  it('isolates an item that throws', async () => {
    const client = new FakeClient((publisher, name) => {
      if (name === 'beta') {
        throw new Error('kaboom');
      }
      return succeed(publisher, name);
    });
    const logger = vi.fn<[string], void>();
    const items = [makeExtension('acme', 'alpha'), makeExtension('acme', 'beta'), makeExtension('acme', 'gamma')];

    const { results, stats } = await new ScanOrchestrator({ cache: new MemoryCache(), client, logger }).run(items, {
      maxAgeMs: WEEK,
    });

    expect(results[1]).toMatchObject({ status: 'error', reason: 'kaboom', errorType: 'api_error', index: 1 });
    expect(stats).toMatchObject({ freshScans: 2, errors: 1 });
    expect(logger).toHaveBeenCalledWith('Unexpected failure scanning acme.beta: kaboom');
  });

  it('keeps a successful item when saving it fails', async () => {
    const cache = new MemoryCache();
    vi.spyOn(cache, 'save').mockRejectedValue(new Error('disk full'));
    const logger = vi.fn<[string], void>();

    const { results } = await new ScanOrchestrator({ cache, client: new FakeClient(), logger }).run(
      [makeExtension('acme', 'alpha')],
      { maxAgeMs: WEEK },
    );

    expect(results[0]?.status).toBe('success');
    expect(logger).toHaveBeenCalledWith('Failed to cache result for acme.alpha@1.0.0: disk full');
  });

  it('reports failures by category and takes retry counts from the client', async () => {
    const client = new FakeClient(() => ({ status: 'error', reason: 'Rate limit exceeded (HTTP 429)', errorType: 'rate_limit' }));

    const { stats } = await new ScanOrchestrator({ cache: new MemoryCache(), client }).run(
      [{ ...makeExtension('acme', 'alpha'), displayName: 'Alpha' }],
      { maxAgeMs: WEEK },
    );

    expect(stats.failedExtensions).toEqual([
      { id: 'acme.alpha', name: 'Alpha', errorType: 'rate_limit', errorMessage: 'Rate limit exceeded (HTTP 429)' },
    ]);
    expect(stats.retry.totalRetries).toBe(4);
  });

  it('emits progress events per item', async () => {
    const cache = new MemoryCache();
    const cachedItem = makeExtension('acme', 'alpha');
    await cache.save({ extensionId: cachedItem.id, version: cachedItem.version }, makeScanResult());
    const events: string[] = [];
    const onProgress = (event: ProgressEvent) => events.push(`${event.type}:${event.extension.id}`);

    await new ScanOrchestrator({
      cache,
      client: new FakeClient(() => ({ status: 'not-found', reason: 'gone' })),
      onProgress,
    }).run([cachedItem, makeExtension('acme', 'beta')], { workers: 1, maxAgeMs: WEEK });

    expect(events).toEqual(['started:acme.alpha', 'cached:acme.alpha', 'started:acme.beta', 'failed:acme.beta']);
  });
});
