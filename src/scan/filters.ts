import type { ExtensionRef, ItemOutcome } from '../types/index.js';

export const RISK_LEVELS = ['low', 'medium', 'high', 'critical'] as const;

export type RiskLevel = (typeof RISK_LEVELS)[number];

export interface ExtensionFilter {
  /** Case-insensitive publisher match. */
  publisher?: string | undefined;
  includeIds?: readonly string[] | undefined;
  excludeIds?: readonly string[] | undefined;
}

/** Splits a comma-separated id list. Returns `undefined` when nothing is left after trimming. */
export function parseIdList(raw: string | undefined): string[] | undefined {
  const ids = (raw ?? '')
    .split(',')
    .map((id) => id.trim().toLowerCase())
    .filter((id) => id.length > 0);
  return ids.length > 0 ? ids : undefined;
}

export function parseRiskLevel(raw: string): RiskLevel {
  const normalized = raw.trim().toLowerCase();
  const level = RISK_LEVELS.find((candidate) => candidate === normalized);
  if (!level) {
    throw new Error(`Option --min-risk-level must be one of ${RISK_LEVELS.join(', ')}.`);
  }
  return level;
}

/** Keeps the extensions that pass every filter given; an empty filter keeps everything. */
export function filterExtensions(extensions: readonly ExtensionRef[], filter: ExtensionFilter): ExtensionRef[] {
  const include = toIdSet(filter.includeIds);
  const exclude = toIdSet(filter.excludeIds);
  const publisher = filter.publisher?.trim().toLowerCase();

  return extensions.filter((extension) => {
    if (include && !include.has(extension.id)) {
      return false;
    }
    if (exclude?.has(extension.id)) {
      return false;
    }
    return !publisher || extension.publisher.toLowerCase() === publisher;
  });
}

/**
 * Drops successful results below `minLevel`. A result with no recognised level ranks as
 * low. Failed items are kept so they still show up in the output.
 */
export function filterByMinRiskLevel(results: readonly ItemOutcome[], minLevel: RiskLevel): ItemOutcome[] {
  const threshold = riskRank(minLevel);
  return results.filter((outcome) => outcome.status !== 'success' || riskRank(outcome.result.riskLevel) >= threshold);
}

function riskRank(level: string | null): number {
  const normalized = level?.toLowerCase();
  return Math.max(0, RISK_LEVELS.findIndex((candidate) => candidate === normalized));
}

function toIdSet(ids: readonly string[] | undefined): Set<string> | undefined {
  return ids && ids.length > 0 ? new Set(ids.map((id) => id.toLowerCase())) : undefined;
}
