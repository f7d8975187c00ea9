import pLimit from 'p-limit';
import type { ResultCache } from '../cache/cache.js';
import { categorizeError, describeError } from '../errors.js';
import type {
  ErrorCategory,
  ExtensionRef,
  FailedExtension,
  ItemOutcome,
  RetryStats,
  ScanOutcome,
  ScanRunStats,
} from '../types/index.js';
import type { Logger } from '../utils/logger.js';
import { systemClock, type Clock } from '../utils/time.js';

export const MIN_WORKERS = 1;
export const MAX_WORKERS = 5;
export const DEFAULT_WORKERS = 3;

/** The part of the analysis client the orchestrator needs. */
export interface ScanClient {
  scan(publisher: string, name: string): Promise<ScanOutcome>;
  getRetryStats(): RetryStats;
}

export type ProgressEvent =
  | { type: 'started'; extension: ExtensionRef; index: number }
  | { type: 'cached'; extension: ExtensionRef; index: number }
  | { type: 'completed'; extension: ExtensionRef; index: number }
  | { type: 'failed'; extension: ExtensionRef; index: number; reason: string };

export interface ScanOrchestratorOptions {
  /** Without a cache every item is scanned and nothing is saved. */
  cache?: ResultCache | undefined;
  client: ScanClient;
  logger?: Logger | undefined;
  onProgress?: ((event: ProgressEvent) => void) | undefined;
  now?: Clock | undefined;
}

export interface RunOptions {
  workers?: number | undefined;
  maxAgeMs: number;
  /** Skip cache lookups and rescan everything; fresh results are still saved. */
  refresh?: boolean | undefined;
}

export interface RunReport {
  results: ItemOutcome[];
  stats: ScanRunStats;
}

export function clampWorkers(requested: number | undefined): number {
  if (requested === undefined || !Number.isFinite(requested)) {
    return DEFAULT_WORKERS;
  }
  return Math.min(MAX_WORKERS, Math.max(MIN_WORKERS, Math.floor(requested)));
}

export class ScanCounters {
  cacheHits = 0;
  freshScans = 0;
  errors = 0;
  vulnerabilitiesFound = 0;
  readonly failedExtensions: FailedExtension[] = [];

  record(outcome: ItemOutcome): void {
    if (outcome.status === 'success') {
      const found = outcome.result.vulnerabilities.total;
      if (outcome.fromCache) {
        this.cacheHits += 1;
      } else {
        this.freshScans += 1;
      }
      this.vulnerabilitiesFound += found;
      return;
    }

    this.errors += 1;
    const errorType: ErrorCategory = outcome.status === 'not-found' ? 'not_found' : outcome.errorType;
    this.failedExtensions.push({
      id: outcome.extension.id,
      name: outcome.extension.displayName ?? outcome.extension.name,
      errorType,
      errorMessage: outcome.reason,
    });
  }
}

/**
 * Scans a batch of extensions on a bounded pool of workers. Each item checks the
 * cache first and falls back to the analysis client; successful fresh results are
 * handed to the cache's writer. An item never fails the batch.
 */
export class ScanOrchestrator {
  private readonly cache: ResultCache | undefined;
  private readonly client: ScanClient;
  private readonly logger: Logger | undefined;
  private readonly onProgress: ((event: ProgressEvent) => void) | undefined;
  private readonly now: Clock;

  constructor(options: ScanOrchestratorOptions) {
    this.cache = options.cache;
    this.client = options.client;
    this.logger = options.logger;
    this.onProgress = options.onProgress;
    this.now = options.now ?? systemClock;
  }

  async run(items: readonly ExtensionRef[], options: RunOptions): Promise<RunReport> {
    const startedAt = this.now();
    const limit = pLimit(clampWorkers(options.workers));
    const counters = new ScanCounters();
    const pendingWrites: Promise<void>[] = [];

    const results = await Promise.all(
      items.map((extension, index) => limit(() => this.scanOne(extension, index, options, counters, pendingWrites))),
    );
    await Promise.all(pendingWrites);

    results.sort((a, b) => a.index - b.index);
    return {
      results,
      stats: {
        total: items.length,
        cacheHits: counters.cacheHits,
        freshScans: counters.freshScans,
        errors: counters.errors,
        vulnerabilitiesFound: counters.vulnerabilitiesFound,
        failedExtensions: counters.failedExtensions,
        retry: this.client.getRetryStats(),
        durationMs: this.now() - startedAt,
      },
    };
  }

  private async scanOne(
    extension: ExtensionRef,
    index: number,
    options: RunOptions,
    counters: ScanCounters,
    pendingWrites: Promise<void>[],
  ): Promise<ItemOutcome> {
    this.emit({ type: 'started', extension, index });
    try {
      const outcome = await this.resolve(extension, index, options, pendingWrites);
      counters.record(outcome);
      return outcome;
    } catch (error) {
      const reason = describeError(error);
      this.logger?.(`Unexpected failure scanning ${extension.id}: ${reason}`);
      this.emit({ type: 'failed', extension, index, reason });
      const failed: ItemOutcome = {
        status: 'error',
        reason,
        errorType: categorizeError(error),
        extension,
        index,
        fromCache: false,
      };
      counters.record(failed);
      return failed;
    }
  }

  private async resolve(
    extension: ExtensionRef,
    index: number,
    options: RunOptions,
    pendingWrites: Promise<void>[],
  ): Promise<ItemOutcome> {
    const cache = this.cache;
    const key = { extensionId: extension.id, version: extension.version };
    if (cache && !options.refresh) {
      const cached = await cache.getEntry(key, options.maxAgeMs);
      if (cached) {
        this.emit({ type: 'cached', extension, index });
        return { status: 'success', result: cached.result, extension, index, fromCache: true, cachedAt: cached.cachedAt };
      }
    }

    const outcome = await this.client.scan(extension.publisher, extension.name);
    if (outcome.status === 'success') {
      if (cache) {
        pendingWrites.push(
          cache.save(key, outcome.result).catch((error: unknown) => {
            this.logger?.(`Failed to cache result for ${extension.id}@${extension.version}: ${describeError(error)}`);
          }),
        );
      }
      this.emit({ type: 'completed', extension, index });
    } else {
      this.emit({ type: 'failed', extension, index, reason: outcome.reason });
    }
    return { ...outcome, extension, index, fromCache: false };
  }

  // A progress callback cannot fail the item it reports on.
  private emit(event: ProgressEvent): void {
    try {
      this.onProgress?.(event);
    } catch (error) {
      this.logger?.(`Progress callback failed on ${event.type} for ${event.extension.id}: ${describeError(error)}`);
    }
  }
}
