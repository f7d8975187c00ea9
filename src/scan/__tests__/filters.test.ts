import { describe, expect, it } from 'vitest';
import { makeExtension, makeScanResult } from '../../__tests__/helpers.js';
import type { ItemOutcome } from '../../types/index.js';
import { filterByMinRiskLevel, filterExtensions, parseIdList, parseRiskLevel } from '../filters.js';

const installed = [
  makeExtension('acme', 'alpha'),
  makeExtension('Acme', 'beta'),
  makeExtension('globex', 'gamma'),
];

describe('parseIdList', () => {
  it('trims, lower-cases and drops empty ids', () => {
    expect(parseIdList(' Acme.Alpha, ,globex.gamma,')).toEqual(['acme.alpha', 'globex.gamma']);
  });

  it('treats a missing or blank list as no filter', () => {
    expect(parseIdList(undefined)).toBeUndefined();
    expect(parseIdList(' , ')).toBeUndefined();
  });
});

describe('filterExtensions', () => {
  const ids = (filter: Parameters<typeof filterExtensions>[1]) => filterExtensions(installed, filter).map((extension) => extension.id);

  it('keeps everything without filters', () => {
    expect(ids({})).toEqual(['acme.alpha', 'acme.beta', 'globex.gamma']);
  });

  it('matches the publisher case-insensitively', () => {
    expect(ids({ publisher: 'ACME' })).toEqual(['acme.alpha', 'acme.beta']);
  });

  it('keeps only included ids and drops excluded ones', () => {
    expect(ids({ includeIds: ['acme.alpha', 'globex.gamma'] })).toEqual(['acme.alpha', 'globex.gamma']);
    expect(ids({ excludeIds: ['ACME.BETA'] })).toEqual(['acme.alpha', 'globex.gamma']);
  });

  it('requires every filter to match', () => {
    expect(ids({ publisher: 'acme', includeIds: ['acme.alpha', 'globex.gamma'], excludeIds: ['acme.alpha'] })).toEqual([]);
  });
});

describe('parseRiskLevel', () => {
  it('accepts the four levels in any case', () => {
    expect(parseRiskLevel('High')).toBe('high');
  });

  it('rejects anything else', () => {
    expect(() => parseRiskLevel('severe')).toThrow('Option --min-risk-level must be one of low, medium, high, critical.');
  });
});

describe('filterByMinRiskLevel', () => {
  const success = (name: string, riskLevel: string | null, index: number): ItemOutcome => ({
    status: 'success',
    result: makeScanResult({ name, riskLevel }),
    extension: makeExtension('acme', name),
    index,
    fromCache: false,
  });
  const results: ItemOutcome[] = [
    success('low', 'low', 0),
    success('medium', 'medium', 1),
    success('critical', 'CRITICAL', 2),
    success('unknown', null, 3),
    { status: 'not-found', reason: 'gone', extension: makeExtension('acme', 'missing'), index: 4, fromCache: false },
  ];

  it('keeps results at or above the threshold and every failure', () => {
    expect(filterByMinRiskLevel(results, 'medium').map((outcome) => outcome.extension.name)).toEqual([
      'medium',
      'critical',
      'missing',
    ]);
  });

  it('ranks an unknown level as low', () => {
    expect(filterByMinRiskLevel(results, 'low')).toHaveLength(5);
    expect(filterByMinRiskLevel(results, 'critical').map((outcome) => outcome.extension.name)).toEqual(['critical', 'missing']);
  });
});
