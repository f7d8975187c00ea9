import os from 'node:os';
import path from 'node:path';
import { describe, expect, it } from 'vitest';
import { loadConfig, resolveCacheDir } from '../config.js';

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    const config = loadConfig({}, {});

    expect(config).toEqual({
      apiUrl: 'https://vscan.dev/api/extensions',
      cacheDir: path.join(os.homedir(), '.extscan'),
      cacheSecret: undefined,
      workers: 3,
      cacheMaxAgeDays: 7,
      cacheMaxAgeMs: 7 * 24 * 60 * 60 * 1000,
      requestDelayMs: 1500,
      maxRetries: 3,
      retryDelayMs: 2000,
      timeoutMs: 30_000,
    });
  });

  it('prefers command-line options over the environment', () => {
    const config = loadConfig(
      { workers: '2', apiUrl: 'http://localhost:8080/api/' },
      { EXTSCAN_WORKERS: '4', EXTSCAN_API_URL: 'https://example.test/api', EXTSCAN_MAX_RETRIES: '0' },
    );

    expect(config.workers).toBe(2);
    expect(config.apiUrl).toBe('http://localhost:8080/api');
    expect(config.maxRetries).toBe(0);
  });

  it('clamps the worker count', () => {
    expect(loadConfig({ workers: '12' }, {}).workers).toBe(5);
  });

  it('decodes a hex signing key from the environment', () => {
    const config = loadConfig({}, { EXTSCAN_CACHE_SECRET: 'ab'.repeat(32) });

    expect(config.cacheSecret).toEqual(Buffer.alloc(32, 0xab));
  });

  it.each([
    [{ cacheMaxAgeDays: '400' }, {}, 'Option --cache-max-age-days must be between 1 and 365.'],
    [{ maxRetries: '11' }, {}, 'Option --max-retries must be between 0 and 10.'],
    [{ workers: 'many' }, {}, 'Option --workers must be a positive number.'],
    [{ requestDelay: '-1' }, {}, 'Option --request-delay must be zero or a positive number.'],
    [{ apiUrl: 'ftp://example.test' }, {}, 'API URL must use http or https: ftp://example.test'],
    [{}, { EXTSCAN_CACHE_SECRET: 'test-secret' }, 'EXTSCAN_CACHE_SECRET must be at least 32 bytes of hex.'],
  ])('rejects %o / %o', (options, env, message) => {
    expect(() => loadConfig(options, env)).toThrow(message);
  });
});

describe('resolveCacheDir', () => {
  it('expands the home directory', () => {
    expect(resolveCacheDir('~/scan-cache')).toBe(path.join(os.homedir(), 'scan-cache'));
  });

  it('rejects parent-directory segments', () => {
    expect(() => resolveCacheDir('/tmp/cache/../../etc')).toThrow('Cache directory must not contain ".."');
  });
});
