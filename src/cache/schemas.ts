import { jot, type InferJot, type JotSchema } from '../jot.js';
import type { ScanResult } from '../types/index.js';

export const CACHE_FORMAT = 'extscan-cache';
export const CURRENT_SCHEMA_VERSION = 2;

export const documentEnvelopeSchema = jot.object({
  format: jot.enum([CACHE_FORMAT] as const),
  schemaVersion: jot.number({ integer: true }),
  entries: jot.array(jot.unknown()),
});

export type DocumentEnvelope = InferJot<typeof documentEnvelopeSchema>;

export const cacheEntryV1Schema = jot.object({
  extensionId: jot.string({ minLength: 1 }),
  version: jot.string({ minLength: 1 }),
  payload: jot.string(),
  cachedAt: jot.string(),
  signature: jot.string(),
  riskLevel: jot.nullable(jot.string()),
});

export type CacheEntryV1 = InferJot<typeof cacheEntryV1Schema>;

export const cacheEntrySchema = jot.object({
  extensionId: jot.string({ minLength: 1 }),
  version: jot.string({ minLength: 1 }),
  payload: jot.string(),
  cachedAt: jot.string(),
  schemaVersion: jot.number({ integer: true }),
  signature: jot.string(),
  riskLevel: jot.nullable(jot.string()),
  securityScore: jot.nullable(jot.number()),
  vulnerabilitiesCount: jot.number({ integer: true }),
  dependenciesCount: jot.number({ integer: true }),
  publisherVerified: jot.boolean(),
  hasRiskFactors: jot.boolean(),
});

export type CacheEntry = InferJot<typeof cacheEntrySchema>;

export const entrySchemasByVersion: ReadonlyMap<number, JotSchema<unknown>> = new Map<number, JotSchema<unknown>>([
  [1, cacheEntryV1Schema],
  [CURRENT_SCHEMA_VERSION, cacheEntrySchema],
]);

const nullableString = () => jot.nullable(jot.string());
const nullableNumber = () => jot.nullable(jot.number());

const vulnerabilityCountsSchema = jot.object({
  total: jot.number(),
  critical: jot.number(),
  high: jot.number(),
  moderate: jot.number(),
  low: jot.number(),
  info: jot.number(),
});

// Mirrors ScanResult; a cached payload that does not match is a miss.
export const scanResultSchema: JotSchema<ScanResult> = jot.object({
  publisher: jot.string(),
  name: jot.string(),
  analysisId: jot.string(),
  metadata: jot.object({
    name: nullableString(),
    version: nullableString(),
    displayName: nullableString(),
    description: nullableString(),
    publisher: jot.object({
      id: nullableString(),
      name: nullableString(),
      verified: jot.boolean(),
      domain: nullableString(),
    }),
    repositoryUrl: nullableString(),
    homepageUrl: nullableString(),
    license: nullableString(),
    keywords: jot.array(jot.string()),
    categories: jot.array(jot.string()),
    statistics: jot.object({
      installs: nullableNumber(),
      rating: nullableNumber(),
      ratingCount: nullableNumber(),
    }),
    lastUpdated: nullableString(),
  }),
  security: jot.object({
    score: nullableNumber(),
    riskLevel: nullableString(),
    scoreContributions: jot.record(nullableNumber()),
    moduleRiskLevels: jot.record(nullableString()),
    notes: jot.array(jot.string()),
  }),
  dependencies: jot.object({
    totalCount: jot.number(),
    runtimeCount: jot.number(),
    devCount: jot.number(),
    withVulnerabilities: jot.number(),
    highRiskCount: jot.number(),
    mediumRiskCount: jot.number(),
    lowRiskCount: jot.number(),
    vulnerabilities: vulnerabilityCountsSchema,
    list: jot.array(
      jot.object({
        name: nullableString(),
        version: nullableString(),
        type: nullableString(),
        risk: nullableString(),
        reason: nullableString(),
        vulnerabilityCount: jot.number(),
      }),
    ),
  }),
  riskFactors: jot.array(
    jot.object({
      type: nullableString(),
      description: nullableString(),
      severity: nullableString(),
    }),
  ),
  securityScore: nullableNumber(),
  riskLevel: nullableString(),
  vulnerabilities: vulnerabilityCountsSchema,
  analysisTimestamp: nullableString(),
  hasErrors: jot.boolean(),
  reportUrl: jot.string(),
});
