import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import type { ExtensionRef, ScanResult } from '../types/index.js';

export const TEST_SECRET = Buffer.alloc(32, 'test-secret');
export const T0 = Date.parse('2026-01-10T00:00:00.000Z');

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'extscan-test-'));
}

export async function removeDir(directory: string): Promise<void> {
  await fs.rm(directory, { recursive: true, force: true });
}

export class FakeClock {
  constructor(public nowMs: number = T0) {}

  readonly now = (): number => this.nowMs;

  advance(ms: number): void {
    this.nowMs += ms;
  }
}

export function makeExtension(publisher: string, name: string, version: string = '1.0.0'): ExtensionRef {
  return { id: `${publisher}.${name}`.toLowerCase(), publisher, name, version };
}

export function makeScanResult(overrides: Partial<ScanResult> = {}): ScanResult {
  return {
    publisher: 'acme',
    name: 'widget',
    analysisId: 'analysis-1',
    metadata: {
      name: 'widget',
      version: '1.0.0',
      displayName: 'Widget',
      description: null,
      publisher: { id: 'acme', name: 'Acme', verified: true, domain: null },
      repositoryUrl: null,
      homepageUrl: null,
      license: 'MIT',
      keywords: [],
      categories: [],
      statistics: { installs: 100, rating: 4.5, ratingCount: 10 },
      lastUpdated: null,
    },
    security: { score: 72, riskLevel: 'medium', scoreContributions: {}, moduleRiskLevels: {}, notes: [] },
    dependencies: {
      totalCount: 2,
      runtimeCount: 2,
      devCount: 0,
      withVulnerabilities: 1,
      highRiskCount: 0,
      mediumRiskCount: 1,
      lowRiskCount: 1,
      vulnerabilities: { total: 3, critical: 0, high: 1, moderate: 2, low: 0, info: 0 },
      list: [],
    },
    riskFactors: [],
    securityScore: 72,
    riskLevel: 'medium',
    vulnerabilities: { total: 3, critical: 0, high: 1, moderate: 2, low: 0, info: 0 },
    analysisTimestamp: '2026-01-09T12:00:00.000Z',
    hasErrors: false,
    reportUrl: 'https://vscan.dev/extension/acme.widget',
    ...overrides,
  };
}

/** A results document as the analysis service returns it. */
export const analysisDocument = {
  extensionInfo: { name: 'widget', version: '1.2.3' },
  securityScore: { score: 81, riskLevel: 'low', contributions: { base: 100 }, moduleRiskLevels: {}, notes: ['ok'] },
  analysisModules: {
    dependencies: {
      vulnerabilities: { summary: { total: 1, high: 1 } },
      dependencies: [{ name: 'left-pad', version: '1.0.0', type: 'runtime', risk: 'high', vulnerabilities: [{}] }],
    },
    metadata: { metadata: { publisherInfo: { isVerified: true } }, riskFactors: [] },
  },
  analysisTimestamp: '2026-01-10T00:00:00.000Z',
  hasErrors: false,
};
