import { isPlainRecord } from '../jot.js';
import type {
  DependencyInfo,
  DependencySummary,
  ExtensionMetadata,
  RiskFactor,
  ScanResult,
  SecurityDetails,
  VulnerabilityCounts,
} from '../types/index.js';

type Json = Record<string, unknown>;

const ANALYSIS_MODULES = [
  'metadata',
  'dependencies',
  'socket',
  'virusTotal',
  'permissions',
  'ossfScorecard',
  'networkEndpoints',
  'sensitiveInfo',
  'obfuscation',
  'consolidatedAst',
  'openGrep',
] as const;

export interface ParseContext {
  publisher: string;
  name: string;
  analysisId: string;
  reportUrl: string;
}

/**
 * Maps the analysis document returned by the service into a `ScanResult`.
 * Missing or mistyped sections degrade to empty values rather than failing the scan.
 */
export function parseAnalysisResult(raw: unknown, context: ParseContext): ScanResult {
  const doc = record(raw);
  const scoreSection = record(doc.securityScore);
  const modules = record(doc.analysisModules);
  const dependencies = parseDependencies(record(modules.dependencies));

  return {
    publisher: context.publisher,
    name: context.name,
    analysisId: context.analysisId,
    metadata: parseMetadata(doc),
    security: parseSecurity(scoreSection),
    dependencies,
    riskFactors: parseRiskFactors(record(modules.metadata)),
    securityScore: numberOrNull(scoreSection.score),
    riskLevel: stringOrNull(scoreSection.riskLevel),
    vulnerabilities: dependencies.vulnerabilities,
    analysisTimestamp: stringOrNull(doc.analysisTimestamp),
    hasErrors: doc.hasErrors === true,
    reportUrl: context.reportUrl,
  };
}

function parseMetadata(doc: Json): ExtensionMetadata {
  const info = record(doc.extensionInfo);
  const meta = record(record(record(doc.analysisModules).metadata).metadata);
  const publisher = record(meta.publisherInfo);
  const statistics = record(meta.statistics);
  const rating = numberOrNull(statistics.averageRating);

  return {
    name: stringOrNull(info.name),
    version: stringOrNull(info.version),
    displayName: stringOrNull(meta.displayName),
    description: stringOrNull(meta.description),
    publisher: {
      id: stringOrNull(publisher.name),
      name: stringOrNull(publisher.displayName),
      verified: publisher.isVerified === true,
      domain: stringOrNull(publisher.domain),
    },
    repositoryUrl: stringOrNull(meta.repositoryUrl),
    homepageUrl: stringOrNull(meta.homepageUrl),
    license: stringOrNull(meta.license),
    keywords: stringList(meta.keywords),
    categories: stringList(meta.categories),
    statistics: {
      installs: numberOrNull(statistics.installCount),
      rating: rating === null ? null : Math.round(rating * 100) / 100,
      ratingCount: numberOrNull(statistics.ratingCount),
    },
    lastUpdated: stringOrNull(meta.lastUpdated),
  };
}

function parseSecurity(scoreSection: Json): SecurityDetails {
  const contributions = record(scoreSection.contributions);
  const moduleRisks = record(scoreSection.moduleRiskLevels);
  const scoreContributions: Record<string, number | null> = { base: numberOrNull(contributions.base) };
  const moduleRiskLevels: Record<string, string | null> = {};

  for (const key of ANALYSIS_MODULES) {
    scoreContributions[key] = numberOrNull(contributions[key]);
    moduleRiskLevels[key] = stringOrNull(moduleRisks[key]);
  }

  return {
    score: numberOrNull(scoreSection.score),
    riskLevel: stringOrNull(scoreSection.riskLevel),
    scoreContributions,
    moduleRiskLevels,
    notes: stringList(scoreSection.notes),
  };
}

function parseDependencies(section: Json): DependencySummary {
  const summary = record(record(section.vulnerabilities).summary);
  const vulnerabilities: VulnerabilityCounts = {
    total: count(summary.total),
    critical: count(summary.critical),
    high: count(summary.high),
    moderate: count(summary.moderate),
    low: count(summary.low),
    info: count(summary.info),
  };

  const list: DependencyInfo[] = (Array.isArray(section.dependencies) ? section.dependencies : []).map((item) => {
    const dep = record(item);
    return {
      name: stringOrNull(dep.name),
      version: stringOrNull(dep.version),
      type: stringOrNull(dep.type),
      risk: stringOrNull(dep.risk),
      reason: stringOrNull(dep.reason),
      vulnerabilityCount: Array.isArray(dep.vulnerabilities) ? dep.vulnerabilities.length : 0,
    };
  });

  const byRisk = (level: string) => list.filter((dep) => dep.risk?.toLowerCase() === level).length;

  return {
    totalCount: list.length,
    runtimeCount: list.filter((dep) => dep.type === 'runtime').length,
    devCount: list.filter((dep) => dep.type === 'dev').length,
    withVulnerabilities: list.filter((dep) => dep.vulnerabilityCount > 0).length,
    highRiskCount: byRisk('high'),
    mediumRiskCount: byRisk('medium'),
    lowRiskCount: byRisk('low'),
    vulnerabilities,
    list,
  };
}

function parseRiskFactors(metadataModule: Json): RiskFactor[] {
  const factors = Array.isArray(metadataModule.riskFactors) ? metadataModule.riskFactors : [];
  return factors.map((item) => {
    const factor = record(item);
    return {
      type: stringOrNull(factor.type),
      description: stringOrNull(factor.description),
      severity: stringOrNull(factor.risk),
    };
  });
}

function record(value: unknown): Json {
  return isPlainRecord(value) ? value : {};
}

function stringOrNull(value: unknown): string | null {
  return typeof value === 'string' ? value : null;
}

function numberOrNull(value: unknown): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

function count(value: unknown): number {
  return numberOrNull(value) ?? 0;
}

function stringList(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((item): item is string => typeof item === 'string') : [];
}
