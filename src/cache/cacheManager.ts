import pLimit from 'p-limit';
import { CacheStoreError, describeError } from '../errors.js';
import { safeParse } from '../jot.js';
import type { ScanResult } from '../types/index.js';
import type { Logger } from '../utils/logger.js';
import { ageInDays, parseIsoToMs, systemClock, toIso, type Clock } from '../utils/time.js';
import type {
  CacheKey,
  CachedExtensionSummary,
  CachedResult,
  CacheStats,
  MigrationReport,
  ResultCache,
} from './cache.js';
import { deriveIndexedFields } from './indexedFields.js';
import { IntegrityStore } from './integrityStore.js';
import { applyMigrations, planMigrations, type MigrationContext } from './migrations.js';
import {
  CACHE_FORMAT,
  CURRENT_SCHEMA_VERSION,
  cacheEntrySchema,
  entrySchemasByVersion,
  scanResultSchema,
  type CacheEntry,
  type DocumentEnvelope,
} from './schemas.js';

export interface CacheManagerOptions {
  directory: string;
  secret?: Buffer | undefined;
  logger?: Logger | undefined;
  now?: Clock | undefined;
}

/**
 * Versioned, expiring, signed store of scan results.
 *
 * Every mutation goes through `writer`, a queue of concurrency one, so there is a
 * single writer per process. Reads go straight to the file and are not queued; the
 * writer swaps the file atomically, so a reader always sees a complete document.
 */
export class CacheManager implements ResultCache {
  private readonly writer = pLimit(1);

  private constructor(
    private readonly store: IntegrityStore,
    private readonly now: Clock,
    private readonly logger: Logger | undefined,
  ) {}

  static async open(options: CacheManagerOptions): Promise<CacheManager> {
    const store = await IntegrityStore.open({
      directory: options.directory,
      secret: options.secret,
      logger: options.logger,
      now: options.now,
    });
    const manager = new CacheManager(store, options.now ?? systemClock, options.logger);
    await manager.writer(() => manager.ensureUsable());
    await manager.migrate();
    return manager;
  }

  get storePath(): string {
    return this.store.filePath;
  }

  async get(key: CacheKey, maxAgeMs: number): Promise<ScanResult | undefined> {
    const entry = await this.getEntry(key, maxAgeMs);
    return entry?.result;
  }

  async getEntry(key: CacheKey, maxAgeMs: number): Promise<CachedResult | undefined> {
    const entries = await this.readEntries();
    const entry = entries?.find((candidate) => matchesKey(candidate, key));
    if (!entry) {
      return undefined;
    }

    const cachedAtMs = parseIsoToMs(entry.cachedAt);
    if (cachedAtMs === undefined || this.now() - cachedAtMs > maxAgeMs) {
      return undefined;
    }

    if (!this.store.verify(signedMaterial(entry, entry.payload), entry.signature)) {
      this.logger?.(`Integrity check failed for ${key.extensionId}@${key.version}; treating as a cache miss.`);
      return undefined;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(entry.payload);
    } catch (error) {
      this.logger?.(`Unreadable cached payload for ${key.extensionId}@${key.version}: ${describeError(error)}`);
      return undefined;
    }
    const result = safeParse(scanResultSchema, parsed, 'payload');
    if (!result.ok) {
      this.logger?.(`Unusable cached payload for ${key.extensionId}@${key.version}: ${result.error}; treating as a cache miss.`);
      return undefined;
    }
    return { result: result.value, cachedAt: entry.cachedAt };
  }

  save(key: CacheKey, result: ScanResult): Promise<void> {
    return this.writer(async () => {
      const entries = await this.loadForWrite();
      const payload = JSON.stringify(result);
      const entry: CacheEntry = {
        extensionId: key.extensionId,
        version: key.version,
        payload,
        cachedAt: toIso(this.now()),
        schemaVersion: CURRENT_SCHEMA_VERSION,
        signature: this.store.sign(signedMaterial(key, payload)),
        ...deriveIndexedFields(result),
      };
      const remaining = entries.filter((candidate) => !matchesKey(candidate, key));
      await this.commit([...remaining, entry]);
    });
  }

  clear(): Promise<number> {
    return this.writer(async () => {
      const entries = await this.loadForWrite();
      await this.commit([]);
      return entries.length;
    });
  }

  cleanupOld(maxAgeMs: number): Promise<number> {
    return this.writer(async () => {
      const entries = await this.loadForWrite();
      const now = this.now();
      const kept = entries.filter((entry) => {
        const cachedAtMs = parseIsoToMs(entry.cachedAt);
        return cachedAtMs !== undefined && now - cachedAtMs <= maxAgeMs;
      });
      if (kept.length !== entries.length) {
        await this.commit(kept);
      }
      return entries.length - kept.length;
    });
  }

  /** Drops entries for extensions no longer installed. An empty list removes nothing. */
  cleanupOrphaned(installedIds: readonly string[]): Promise<number> {
    if (installedIds.length === 0) {
      return Promise.resolve(0);
    }
    const installed = new Set(installedIds.map((id) => id.toLowerCase()));
    return this.writer(async () => {
      const entries = await this.loadForWrite();
      const kept = entries.filter((entry) => installed.has(entry.extensionId.toLowerCase()));
      if (kept.length !== entries.length) {
        await this.commit(kept);
      }
      return entries.length - kept.length;
    });
  }

  async list(): Promise<CachedExtensionSummary[]> {
    const entries = (await this.readEntries()) ?? [];
    return entries
      .map((entry) => ({
        extensionId: entry.extensionId,
        version: entry.version,
        cachedAt: entry.cachedAt,
        riskLevel: entry.riskLevel,
        securityScore: entry.securityScore,
        vulnerabilitiesCount: entry.vulnerabilitiesCount,
      }))
      .sort((a, b) => (parseIsoToMs(b.cachedAt) ?? 0) - (parseIsoToMs(a.cachedAt) ?? 0));
  }

  async stats(staleAfterMs: number): Promise<CacheStats> {
    const entries = (await this.readEntries()) ?? [];
    const now = this.now();
    const riskBreakdown: Record<string, number> = {};
    let withVulnerabilities = 0;
    let staleEntries = 0;
    let oldest: { iso: string; ms: number } | undefined;
    let newest: { iso: string; ms: number } | undefined;
    const ages: number[] = [];

    for (const entry of entries) {
      const level = entry.riskLevel ?? 'unknown';
      riskBreakdown[level] = (riskBreakdown[level] ?? 0) + 1;
      if (entry.vulnerabilitiesCount > 0) {
        withVulnerabilities += 1;
      }

      const cachedAtMs = parseIsoToMs(entry.cachedAt);
      if (cachedAtMs === undefined) {
        continue;
      }
      if (!oldest || cachedAtMs < oldest.ms) {
        oldest = { iso: entry.cachedAt, ms: cachedAtMs };
      }
      if (!newest || cachedAtMs > newest.ms) {
        newest = { iso: entry.cachedAt, ms: cachedAtMs };
      }
      if (now - cachedAtMs > staleAfterMs) {
        staleEntries += 1;
      }
      const age = ageInDays(now, entry.cachedAt);
      if (age !== undefined) {
        ages.push(age);
      }
    }

    const averageAgeDays =
      ages.length > 0 ? Math.round((ages.reduce((sum, age) => sum + age, 0) / ages.length) * 10) / 10 : null;

    return {
      totalEntries: entries.length,
      riskBreakdown,
      withVulnerabilities,
      oldestEntry: oldest?.iso ?? null,
      newestEntry: newest?.iso ?? null,
      averageAgeDays,
      staleEntries,
      storeSizeBytes: await this.store.sizeBytes(),
      storePath: this.store.filePath,
      schemaVersion: CURRENT_SCHEMA_VERSION,
    };
  }

  /**
   * Upgrades an older on-disk schema in one pass. The new document is built fully in
   * memory and committed with a single atomic replace; a failing entry aborts the run
   * and leaves the file untouched.
   */
  migrate(): Promise<MigrationReport> {
    return this.writer(async () => {
      const loaded = await this.store.load();
      if (loaded.kind !== 'ok' || loaded.document.schemaVersion >= CURRENT_SCHEMA_VERSION) {
        const version = loaded.kind === 'ok' ? loaded.document.schemaVersion : CURRENT_SCHEMA_VERSION;
        return { fromVersion: version, toVersion: version, migrated: 0 };
      }

      const fromVersion = loaded.document.schemaVersion;
      const plan = planMigrations(fromVersion, CURRENT_SCHEMA_VERSION);
      const context: MigrationContext = {
        bindSignature: (entry) =>
          this.store.verify(entry.payload, entry.signature) ? this.store.sign(signedMaterial(entry, entry.payload)) : '',
      };
      const migrated = applyMigrations(loaded.document.entries, plan, context);
      await this.store.write({ format: CACHE_FORMAT, schemaVersion: CURRENT_SCHEMA_VERSION, entries: migrated });
      this.logger?.(`Migrated cache schema v${fromVersion} → v${CURRENT_SCHEMA_VERSION} (${migrated.length} entries).`);
      return { fromVersion, toVersion: CURRENT_SCHEMA_VERSION, migrated: migrated.length };
    });
  }

  // Runs on the writer before first use.
  private async ensureUsable(): Promise<void> {
    const loaded = await this.store.load();
    if (loaded.kind === 'missing') {
      await this.commit([]);
      return;
    }
    if (loaded.kind === 'corrupt') {
      await this.recover(loaded.reason);
      return;
    }

    const { schemaVersion, entries } = loaded.document;
    if (schemaVersion > CURRENT_SCHEMA_VERSION) {
      throw new CacheStoreError(
        `Cache store ${this.store.filePath} uses schema v${schemaVersion}, newer than supported v${CURRENT_SCHEMA_VERSION}`,
      );
    }
    const schema = entrySchemasByVersion.get(schemaVersion);
    if (!schema) {
      await this.recover(`unknown schema version ${schemaVersion}`);
      return;
    }
    for (const [index, entry] of entries.entries()) {
      const checked = safeParse(schema, entry, `entries[${index}]`);
      if (!checked.ok) {
        await this.recover(checked.error);
        return;
      }
    }
  }

  private async recover(reason: string): Promise<void> {
    const backupPath = await this.store.quarantine();
    const moved = backupPath ? `Moved it to ${backupPath}` : 'It was already gone';
    this.logger?.(`ERROR: cache store ${this.store.filePath} is corrupted (${reason}). ${moved}; created an empty store.`);
    await this.commit([]);
  }

  private async readEntries(): Promise<CacheEntry[] | undefined> {
    const loaded = await this.store.load();
    if (loaded.kind === 'missing') {
      return [];
    }
    if (loaded.kind === 'corrupt') {
      this.logger?.(`Cache store unreadable (${loaded.reason}); treating as empty.`);
      return undefined;
    }
    const parsed = parseCurrentEntries(loaded.document);
    if (!parsed.ok) {
      this.logger?.(`Cache store unreadable (${parsed.error}); treating as empty.`);
      return undefined;
    }
    return parsed.value;
  }

  private async loadForWrite(): Promise<CacheEntry[]> {
    const loaded = await this.store.load();
    if (loaded.kind === 'missing') {
      return [];
    }
    if (loaded.kind === 'corrupt') {
      await this.recover(loaded.reason);
      return [];
    }
    const parsed = parseCurrentEntries(loaded.document);
    if (!parsed.ok) {
      await this.recover(parsed.error);
      return [];
    }
    return parsed.value;
  }

  private commit(entries: CacheEntry[]): Promise<void> {
    return this.store.write({ format: CACHE_FORMAT, schemaVersion: CURRENT_SCHEMA_VERSION, entries });
  }
}

function parseCurrentEntries(document: DocumentEnvelope): { ok: true; value: CacheEntry[] } | { ok: false; error: string } {
  if (document.schemaVersion !== CURRENT_SCHEMA_VERSION) {
    return { ok: false, error: `unexpected schema version ${document.schemaVersion}` };
  }
  const entries: CacheEntry[] = [];
  for (const [index, raw] of document.entries.entries()) {
    const checked = safeParse(cacheEntrySchema, raw, `entries[${index}]`);
    if (!checked.ok) {
      return checked;
    }
    entries.push(checked.value);
  }
  return { ok: true, value: entries };
}

// Binds a signature to the entry it was issued for, so a payload cannot be replayed under another key.
function signedMaterial(key: CacheKey, payload: string): string {
  return JSON.stringify([key.extensionId, key.version, payload]);
}

function matchesKey(entry: CacheEntry, key: CacheKey): boolean {
  return entry.extensionId === key.extensionId && entry.version === key.version;
}
