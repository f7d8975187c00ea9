import { isPlainRecord } from '../jot.js';

export interface IndexedFields {
  riskLevel: string | null;
  securityScore: number | null;
  vulnerabilitiesCount: number;
  dependenciesCount: number;
  publisherVerified: boolean;
  hasRiskFactors: boolean;
}

/**
 * Pulls the denormalized filter columns out of a serialized scan result.
 * Works on `unknown` because migrations feed it payloads written by older releases.
 */
export function deriveIndexedFields(result: unknown): IndexedFields {
  const record = isPlainRecord(result) ? result : {};
  const vulnerabilities = isPlainRecord(record.vulnerabilities) ? record.vulnerabilities : {};
  const dependencies = isPlainRecord(record.dependencies) ? record.dependencies : {};
  const metadata = isPlainRecord(record.metadata) ? record.metadata : {};
  const publisher = isPlainRecord(metadata.publisher) ? metadata.publisher : {};

  return {
    riskLevel: typeof record.riskLevel === 'string' ? record.riskLevel : null,
    securityScore: finiteOrNull(record.securityScore),
    vulnerabilitiesCount: finiteOrNull(vulnerabilities.total) ?? 0,
    dependenciesCount: finiteOrNull(dependencies.totalCount) ?? 0,
    publisherVerified: publisher.verified === true,
    hasRiskFactors: Array.isArray(record.riskFactors) && record.riskFactors.length > 0,
  };
}

function finiteOrNull(value: unknown): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}
