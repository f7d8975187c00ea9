import os from 'node:os';
import path from 'node:path';
import { DEFAULT_API_URL } from './clients/analysisClient.js';
import { clampWorkers } from './scan/orchestrator.js';
import { daysToMs } from './utils/time.js';

export interface ScanConfig {
  apiUrl: string;
  cacheDir: string;
  cacheSecret: Buffer | undefined;
  workers: number;
  cacheMaxAgeDays: number;
  cacheMaxAgeMs: number;
  requestDelayMs: number;
  maxRetries: number;
  retryDelayMs: number;
  timeoutMs: number;
}

/** Raw values as they come from commander; each falls back to the environment, then a default. */
export interface RawConfigOptions {
  apiUrl?: string | undefined;
  cacheDir?: string | undefined;
  workers?: string | undefined;
  cacheMaxAgeDays?: string | undefined;
  requestDelay?: string | undefined;
  maxRetries?: string | undefined;
  retryDelay?: string | undefined;
  timeout?: string | undefined;
}

type Env = Record<string, string | undefined>;

export function loadConfig(raw: RawConfigOptions = {}, env: Env = process.env): ScanConfig {
  const cacheMaxAgeDays = parseBoundedInteger(
    raw.cacheMaxAgeDays ?? env.EXTSCAN_CACHE_MAX_AGE_DAYS,
    7,
    1,
    365,
    'cache-max-age-days',
  );

  return {
    apiUrl: parseApiUrl(raw.apiUrl ?? env.EXTSCAN_API_URL),
    cacheDir: resolveCacheDir(raw.cacheDir ?? env.EXTSCAN_CACHE_DIR),
    cacheSecret: parseSecret(env.EXTSCAN_CACHE_SECRET),
    workers: clampWorkers(parsePositiveInteger(raw.workers ?? env.EXTSCAN_WORKERS, 3, 'workers')),
    cacheMaxAgeDays,
    cacheMaxAgeMs: daysToMs(cacheMaxAgeDays),
    requestDelayMs: parseNonNegativeInteger(raw.requestDelay ?? env.EXTSCAN_REQUEST_DELAY_MS, 1500, 'request-delay'),
    maxRetries: parseBoundedInteger(raw.maxRetries ?? env.EXTSCAN_MAX_RETRIES, 3, 0, 10, 'max-retries'),
    retryDelayMs: parsePositiveInteger(raw.retryDelay ?? env.EXTSCAN_RETRY_DELAY_MS, 2000, 'retry-delay'),
    timeoutMs: parsePositiveInteger(raw.timeout ?? env.EXTSCAN_TIMEOUT_MS, 30_000, 'timeout'),
  };
}

export function resolveCacheDir(value: string | undefined): string {
  const raw = value?.trim() || path.join(os.homedir(), '.extscan');
  if (raw.split(/[\\/]/).includes('..')) {
    throw new Error(`Cache directory must not contain "..": ${raw}`);
  }
  const expanded = raw === '~' || raw.startsWith('~/') ? path.join(os.homedir(), raw.slice(1)) : raw;
  return path.resolve(expanded);
}

function parseApiUrl(value: string | undefined): string {
  const raw = value?.trim() || DEFAULT_API_URL;
  let url: URL;
  try {
    url = new URL(raw);
  } catch {
    throw new Error(`Invalid API URL: ${raw}`);
  }
  if (url.protocol !== 'https:' && url.protocol !== 'http:') {
    throw new Error(`API URL must use http or https: ${raw}`);
  }
  return raw.replace(/\/+$/, '');
}

function parseSecret(value: string | undefined): Buffer | undefined {
  const trimmed = value?.trim();
  if (!trimmed) {
    return undefined;
  }
  if (!/^(?:[0-9a-f]{2})+$/i.test(trimmed) || trimmed.length < 64) {
    throw new Error('EXTSCAN_CACHE_SECRET must be at least 32 bytes of hex.');
  }
  return Buffer.from(trimmed, 'hex');
}

export function parsePositiveInteger(value: string | undefined, fallback: number, flagName: string): number {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }

  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new Error(`Option --${flagName} must be a positive number.`);
  }
  return Math.floor(parsed);
}

export function parseNonNegativeInteger(value: string | undefined, fallback: number, flagName: string): number {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }

  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new Error(`Option --${flagName} must be zero or a positive number.`);
  }
  return Math.floor(parsed);
}

function parseBoundedInteger(value: string | undefined, fallback: number, min: number, max: number, flagName: string): number {
  const parsed = parseNonNegativeInteger(value, fallback, flagName);
  if (parsed < min || parsed > max) {
    throw new Error(`Option --${flagName} must be between ${min} and ${max}.`);
  }
  return parsed;
}
