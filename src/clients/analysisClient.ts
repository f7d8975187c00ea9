import {
  AnalysisFailedError,
  AnalysisTimeoutError,
  ClientError,
  InvalidResponseError,
  NetworkError,
  RateLimitedError,
  ResponseTooLargeError,
  RetryExhaustedError,
  ScanError,
  ServerError,
  categorizeError,
  describeError,
} from '../errors.js';
import { jot, safeParse } from '../jot.js';
import type { RetryStats, ScanOutcome, ScanResult } from '../types/index.js';
import type { Logger } from '../utils/logger.js';
import { sleep as realSleep, type Sleep } from '../utils/sleep.js';
import { sanitizeMessage } from '../utils/text.js';
import { systemClock, type Clock } from '../utils/time.js';
import { readBodyWithLimit } from './body.js';
import { parseAnalysisResult } from './resultParser.js';

export interface RequestInitLike {
  method: string;
  headers: Record<string, string>;
  body?: string;
  signal: AbortSignal;
}

export type FetchLike = (url: string, init: RequestInitLike) => Promise<Response>;

export interface AnalysisClientOptions {
  apiUrl?: string | undefined;
  reportBaseUrl?: string | undefined;
  fetchImpl?: FetchLike | undefined;
  timeoutMs?: number | undefined;
  maxRetries?: number | undefined;
  retryBaseDelayMs?: number | undefined;
  maxBackoffMs?: number | undefined;
  requestSpacingMs?: number | undefined;
  pollIntervalMs?: number | undefined;
  maxWaitMs?: number | undefined;
  maxResponseBytes?: number | undefined;
  maxWorkflowRetries?: number | undefined;
  workflowRetryDelayMs?: number | undefined;
  sleep?: Sleep | undefined;
  random?: (() => number) | undefined;
  now?: Clock | undefined;
  logger?: Logger | undefined;
}

export const DEFAULT_API_URL = 'https://vscan.dev/api/extensions';
export const MAX_RESPONSE_BYTES = 10 * 1024 * 1024;
export const MIN_BACKOFF_MS = 500;
export const MAX_BACKOFF_MS = 30_000;
const USER_AGENT = 'extscan/0.1.0';

/** What one HTTP attempt decided; the retry loop branches on `kind`, not on exceptions. */
export type AttemptResult<T> =
  | { kind: 'ok'; value: T }
  | { kind: 'retryable'; error: ScanError; retryAfterMs?: number | undefined }
  | { kind: 'permanent'; error: ScanError };

interface HttpRequest {
  method: 'GET' | 'POST';
  url: string;
  body?: unknown;
}

const submitResponseSchema = jot.object({
  analysisId: jot.string({ minLength: 1 }),
});

const statusResponseSchema = jot.object({
  status: jot.string(),
  message: jot.optional(jot.unknown()),
});

export interface BackoffInput {
  attempt: number;
  baseDelayMs: number;
  maxDelayMs: number;
  random: () => number;
  retryAfterMs?: number | undefined;
}

/** `base * 2^attempt` with ±20% jitter, clamped; a server hint replaces the computed value. */
export function computeBackoffDelay({ attempt, baseDelayMs, maxDelayMs, random, retryAfterMs }: BackoffInput): number {
  if (retryAfterMs !== undefined) {
    return Math.min(Math.max(retryAfterMs, 0), maxDelayMs);
  }

  const backoff = baseDelayMs * 2 ** attempt;
  const jitter = (random() * 2 - 1) * 0.2 * backoff;
  return Math.max(Math.min(backoff + jitter, maxDelayMs), MIN_BACKOFF_MS);
}

/** Parses a `Retry-After` header (delta seconds or HTTP date) into milliseconds. */
export function parseRetryAfter(header: string | null, nowMs: number): number | undefined {
  if (header === null || header.trim() === '') {
    return undefined;
  }
  const seconds = Number(header);
  if (Number.isFinite(seconds)) {
    return Math.max(0, seconds * 1000);
  }
  const date = Date.parse(header);
  return Number.isNaN(date) ? undefined : Math.max(0, date - nowMs);
}

/**
 * Client for the remote analysis service: submit → poll → fetch, with every HTTP call
 * retried on rate limits, 5xx and network failures, and the whole workflow retried
 * when it ends on a transient error.
 */
export class AnalysisClient {
  private readonly apiUrl: string;
  private readonly reportBaseUrl: string;
  private readonly fetchImpl: FetchLike;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly retryBaseDelayMs: number;
  private readonly maxBackoffMs: number;
  private readonly requestSpacingMs: number;
  private readonly pollIntervalMs: number;
  private readonly maxWaitMs: number;
  private readonly maxResponseBytes: number;
  private readonly maxWorkflowRetries: number;
  private readonly workflowRetryDelayMs: number;
  private readonly sleep: Sleep;
  private readonly random: () => number;
  private readonly now: Clock;
  private readonly logger: Logger | undefined;
  private nextRequestAt = 0;
  private readonly retryStats: RetryStats = {
    totalRetries: 0,
    successfulRetries: 0,
    failedAfterRetries: 0,
    totalWorkflowRetries: 0,
    successfulWorkflowRetries: 0,
    failedAfterWorkflowRetries: 0,
  };

  constructor(options: AnalysisClientOptions = {}) {
    this.apiUrl = (options.apiUrl ?? DEFAULT_API_URL).replace(/\/+$/, '');
    this.reportBaseUrl = options.reportBaseUrl ?? `${new URL(this.apiUrl).origin}/extension/`;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.maxRetries = options.maxRetries ?? 3;
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? 2000;
    this.maxBackoffMs = options.maxBackoffMs ?? MAX_BACKOFF_MS;
    this.requestSpacingMs = options.requestSpacingMs ?? 0;
    this.pollIntervalMs = options.pollIntervalMs ?? 2000;
    this.maxWaitMs = options.maxWaitMs ?? 300_000;
    this.maxResponseBytes = options.maxResponseBytes ?? MAX_RESPONSE_BYTES;
    this.maxWorkflowRetries = options.maxWorkflowRetries ?? 2;
    this.workflowRetryDelayMs = options.workflowRetryDelayMs ?? 5000;
    this.sleep = options.sleep ?? realSleep;
    this.random = options.random ?? Math.random;
    this.now = options.now ?? systemClock;
    this.logger = options.logger;
  }

  getRetryStats(): RetryStats {
    return { ...this.retryStats };
  }

  /** Runs the full workflow for one extension. Never throws; failures come back as outcomes. */
  async scan(publisher: string, name: string): Promise<ScanOutcome> {
    if (!publisher.trim() || !name.trim()) {
      return { status: 'error', reason: 'Extension is missing a publisher or name', errorType: 'invalid_metadata' };
    }

    for (let attempt = 0; ; attempt += 1) {
      try {
        const result = await this.runWorkflow(publisher, name);
        if (attempt > 0) {
          this.retryStats.successfulWorkflowRetries += 1;
        }
        return { status: 'success', result };
      } catch (error) {
        const transient = isTransientWorkflowError(error);
        if (transient && attempt < this.maxWorkflowRetries) {
          this.retryStats.totalWorkflowRetries += 1;
          const delay = this.workflowRetryDelayMs * 2 ** attempt;
          this.logger?.(
            `${publisher}.${name}: workflow retry ${attempt + 1}/${this.maxWorkflowRetries} after: ${describeError(error)}. Waiting ${(delay / 1000).toFixed(1)}s.`,
          );
          await this.sleep(delay);
          continue;
        }
        if (attempt > 0) {
          this.retryStats.failedAfterWorkflowRetries += 1;
        }
        return toFailedOutcome(error);
      }
    }
  }

  async submitAnalysis(publisher: string, name: string): Promise<string> {
    const response = await this.requestWithRetry({
      method: 'POST',
      url: `${this.apiUrl}/analyze`,
      body: { publisher, name },
    });
    const parsed = safeParse(submitResponseSchema, response, 'response');
    if (!parsed.ok) {
      throw new InvalidResponseError(`Failed to submit analysis: ${parsed.error}`);
    }
    return parsed.value.analysisId;
  }

  async waitForCompletion(analysisId: string): Promise<void> {
    const startedAt = this.now();
    for (;;) {
      const waited = this.now() - startedAt;
      if (waited > this.maxWaitMs) {
        throw new AnalysisTimeoutError(waited);
      }

      const response = await this.requestWithRetry({
        method: 'GET',
        url: `${this.apiUrl}/status/${encodeURIComponent(analysisId)}`,
      });
      const parsed = safeParse(statusResponseSchema, response, 'response');
      if (!parsed.ok) {
        throw new InvalidResponseError(`Failed to check status: ${parsed.error}`);
      }

      if (parsed.value.status === 'completed') {
        return;
      }
      if (parsed.value.status === 'failed') {
        const message = parsed.value.message;
        throw new AnalysisFailedError(typeof message === 'string' ? sanitizeMessage(message) : undefined);
      }
      await this.sleep(this.pollIntervalMs);
    }
  }

  async fetchResults(analysisId: string): Promise<unknown> {
    return this.requestWithRetry({
      method: 'GET',
      url: `${this.apiUrl}/results/${encodeURIComponent(analysisId)}`,
    });
  }

  private async runWorkflow(publisher: string, name: string): Promise<ScanResult> {
    const analysisId = await this.submitAnalysis(publisher, name);
    await this.waitForCompletion(analysisId);
    const raw = await this.fetchResults(analysisId);
    return parseAnalysisResult(raw, {
      publisher,
      name,
      analysisId,
      reportUrl: `${this.reportBaseUrl}${publisher}.${name}`,
    });
  }

  private async requestWithRetry(request: HttpRequest): Promise<unknown> {
    for (let attempt = 0; ; attempt += 1) {
      const result = await this.attempt(request);
      if (result.kind === 'ok') {
        if (attempt > 0) {
          this.retryStats.successfulRetries += 1;
        }
        return result.value;
      }
      if (result.kind === 'permanent') {
        throw result.error;
      }
      if (attempt >= this.maxRetries) {
        this.retryStats.failedAfterRetries += 1;
        throw new RetryExhaustedError(result.error, attempt + 1);
      }

      const delay = computeBackoffDelay({
        attempt,
        baseDelayMs: this.retryBaseDelayMs,
        maxDelayMs: this.maxBackoffMs,
        random: this.random,
        retryAfterMs: result.retryAfterMs,
      });
      this.retryStats.totalRetries += 1;
      this.logger?.(
        `Retry ${attempt + 1}/${this.maxRetries} for ${request.method} ${request.url} after: ${result.error.message}. Waiting ${(delay / 1000).toFixed(1)}s.`,
      );
      await this.sleep(delay);
    }
  }

  private async attempt(request: HttpRequest): Promise<AttemptResult<unknown>> {
    await this.throttle();

    const headers: Record<string, string> = { 'User-Agent': USER_AGENT, Accept: 'application/json' };
    const init: RequestInitLike = {
      method: request.method,
      headers,
      signal: AbortSignal.timeout(this.timeoutMs),
    };
    if (request.body !== undefined) {
      headers['Content-Type'] = 'application/json';
      init.body = JSON.stringify(request.body);
    }

    let response: Response;
    let text: string;
    try {
      response = await this.fetchImpl(request.url, init);
      text = await readBodyWithLimit(response, this.maxResponseBytes);
    } catch (error) {
      if (error instanceof ResponseTooLargeError) {
        return { kind: 'permanent', error };
      }
      return { kind: 'retryable', error: toNetworkError(error, this.timeoutMs) };
    }

    const body = parseJsonOrUndefined(text);

    if (response.status === 429) {
      const retryAfterMs = parseRetryAfter(response.headers.get('retry-after'), this.now()) ?? retryAfterFromBody(body);
      return { kind: 'retryable', error: new RateLimitedError(retryAfterMs), retryAfterMs };
    }
    if (response.status >= 500) {
      return { kind: 'retryable', error: new ServerError(response.status) };
    }
    if (response.status >= 400) {
      return { kind: 'permanent', error: new ClientError(response.status, errorDetail(body)) };
    }
    if (body === undefined) {
      return { kind: 'permanent', error: new InvalidResponseError(`Malformed JSON from ${request.url}`) };
    }
    return { kind: 'ok', value: body };
  }

  // Reserves the next free slot so concurrent callers stay `requestSpacingMs` apart.
  private async throttle(): Promise<void> {
    if (this.requestSpacingMs <= 0) {
      return;
    }
    const now = this.now();
    const slot = Math.max(now, this.nextRequestAt);
    this.nextRequestAt = slot + this.requestSpacingMs;
    if (slot > now) {
      await this.sleep(slot - now);
    }
  }
}

function isTransientWorkflowError(error: unknown): boolean {
  return error instanceof RetryExhaustedError || error instanceof AnalysisTimeoutError;
}

function toFailedOutcome(error: unknown): ScanOutcome {
  if (error instanceof ClientError && error.status === 404) {
    return { status: 'not-found', reason: error.message };
  }
  return { status: 'error', reason: describeError(error), errorType: categorizeError(error) };
}

function toNetworkError(error: unknown, timeoutMs: number): NetworkError {
  const timedOut = error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');
  if (timedOut) {
    return new NetworkError(`Request timed out after ${timeoutMs / 1000}s`, true, { cause: error });
  }
  return new NetworkError(`Network error: ${sanitizeMessage(describeError(error))}`, false, { cause: error });
}

function parseJsonOrUndefined(text: string): unknown {
  if (!text.trim()) {
    return undefined;
  }
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    return undefined;
  }
}

function retryAfterFromBody(body: unknown): number | undefined {
  const parsed = safeParse(jot.object({ retryAfter: jot.number() }), body);
  return parsed.ok ? Math.max(0, parsed.value.retryAfter * 1000) : undefined;
}

function errorDetail(body: unknown): string | undefined {
  const parsed = safeParse(jot.object({ error: jot.string() }), body);
  return parsed.ok ? sanitizeMessage(parsed.value.error) : undefined;
}
