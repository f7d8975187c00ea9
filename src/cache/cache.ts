import type { ScanResult } from '../types/index.js';

export interface CacheKey {
  extensionId: string;
  version: string;
}

export interface CachedResult {
  result: ScanResult;
  cachedAt: string;
}

/** The slice of the cache the scan orchestrator depends on. */
export interface ResultCache {
  getEntry(key: CacheKey, maxAgeMs: number): Promise<CachedResult | undefined>;
  save(key: CacheKey, result: ScanResult): Promise<void>;
}

export interface CacheStats {
  totalEntries: number;
  riskBreakdown: Record<string, number>;
  withVulnerabilities: number;
  oldestEntry: string | null;
  newestEntry: string | null;
  averageAgeDays: number | null;
  staleEntries: number;
  storeSizeBytes: number;
  storePath: string;
  schemaVersion: number;
}

export interface CachedExtensionSummary {
  extensionId: string;
  version: string;
  cachedAt: string;
  riskLevel: string | null;
  securityScore: number | null;
  vulnerabilitiesCount: number;
}

export interface MigrationReport {
  fromVersion: number;
  toVersion: number;
  migrated: number;
}
