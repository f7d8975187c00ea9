#!/usr/bin/env node
import path from 'node:path';
import { promises as fs } from 'node:fs';
import { Command } from 'commander';
import dotenv from 'dotenv';
import { CacheManager } from './cache/cacheManager.js';
import { AnalysisClient } from './clients/analysisClient.js';
import { loadConfig, parsePositiveInteger, type RawConfigOptions, type ScanConfig } from './config.js';
import { CsvStreamWriter, outcomeToRow } from './csv/writer.js';
import { discoverExtensions } from './discovery/extensions.js';
import { describeCategory, describeError } from './errors.js';
import { filterByMinRiskLevel, filterExtensions, parseIdList, parseRiskLevel } from './scan/filters.js';
import { ScanOrchestrator, type ProgressEvent } from './scan/orchestrator.js';
import type { ItemOutcome, ScanRunStats } from './types/index.js';
import { createLogger } from './utils/logger.js';
import { daysToMs } from './utils/time.js';

dotenv.config();

const program = new Command();
program.name('extscan').description('Scan installed VS Code extensions with a remote security-analysis service.');

interface ScanCommandOptions extends RawConfigOptions {
  extensionsDir?: string;
  output?: string;
  refresh?: boolean;
  cache?: boolean;
  publisher?: string;
  includeIds?: string;
  excludeIds?: string;
  minRiskLevel?: string;
  verbose?: boolean;
}

interface CleanupCommandOptions extends RawConfigOptions {
  maxAgeDays?: string;
  orphaned?: boolean;
  extensionsDir?: string;
}

configureCacheOptions(
  program
    .command('scan')
    .description('Scan every installed extension, reusing cached results that are still fresh.'),
)
  .option('--extensions-dir <path>', 'VS Code extensions directory (default ~/.vscode/extensions).')
  .option('-o, --output <file>', 'Write results to a .json or .csv file.')
  .option('-w, --workers <number>', 'Concurrent scans, 1-5 (default 3).')
  .option('--cache-max-age-days <days>', 'Reuse cached results younger than this (default 7).')
  .option('--refresh', 'Ignore cached results and rescan everything.')
  .option('--no-cache', 'Neither read nor write the result cache.')
  .option('--publisher <publisher>', 'Only scan extensions from this publisher (case-insensitive).')
  .option('--include-ids <ids>', 'Comma-separated extension ids to scan.')
  .option('--exclude-ids <ids>', 'Comma-separated extension ids to skip.')
  .option('--min-risk-level <level>', 'Only report results at or above low, medium, high or critical.')
  .option('--api-url <url>', 'Analysis service base URL.')
  .option('--request-delay <ms>', 'Minimum delay between HTTP requests in ms (default 1500).')
  .option('--max-retries <number>', 'Retries per HTTP request, 0-10 (default 3).')
  .option('--retry-delay <ms>', 'Base retry delay in ms (default 2000).')
  .option('--timeout <ms>', 'Per-request timeout in ms (default 30000).')
  .option('-v, --verbose', 'Log retries and per-extension progress.')
  .action(async (rawOptions: ScanCommandOptions) => {
    await runCommand(() => handleScan(rawOptions));
  });

const cacheCommand = program.command('cache').description('Inspect and maintain the local result cache.');

configureCacheOptions(cacheCommand.command('stats').description('Show cache statistics.'))
  .option('--json', 'Print statistics as JSON.')
  .action(async (rawOptions: RawConfigOptions & { json?: boolean }) => {
    await runCommand(() => handleCacheStats(rawOptions));
  });

configureCacheOptions(cacheCommand.command('list').description('List cached extensions, newest first.')).action(
  async (rawOptions: RawConfigOptions) => {
    await runCommand(() => handleCacheList(rawOptions));
  },
);

configureCacheOptions(cacheCommand.command('clear').description('Remove every cached result.')).action(
  async (rawOptions: RawConfigOptions) => {
    await runCommand(() => handleCacheClear(rawOptions));
  },
);

configureCacheOptions(cacheCommand.command('cleanup').description('Remove stale or orphaned cache entries.'))
  .option('--max-age-days <days>', 'Remove entries older than this many days.')
  .option('--orphaned', 'Remove entries for extensions that are no longer installed.')
  .option('--extensions-dir <path>', 'VS Code extensions directory used with --orphaned.')
  .action(async (rawOptions: CleanupCommandOptions) => {
    await runCommand(() => handleCacheCleanup(rawOptions));
  });

await program.parseAsync();

function configureCacheOptions(command: Command): Command {
  return command.option('--cache-dir <path>', 'Cache directory (default ~/.extscan).');
}

async function runCommand(handler: () => Promise<void>): Promise<void> {
  try {
    await handler();
  } catch (error) {
    console.error(`Error: ${describeError(error)}`);
    process.exitCode = 1;
  }
}

async function openCache(config: ScanConfig): Promise<CacheManager> {
  return CacheManager.open({
    directory: config.cacheDir,
    secret: config.cacheSecret,
    logger: createLogger('cache'),
  });
}

async function handleScan(rawOptions: ScanCommandOptions) {
  const config = loadConfig(rawOptions);
  const verbose = rawOptions.verbose === true;
  const useCache = rawOptions.cache !== false;
  if (!useCache && rawOptions.refresh) {
    throw new Error('Use either --no-cache or --refresh, not both.');
  }
  const minRiskLevel = rawOptions.minRiskLevel === undefined ? undefined : parseRiskLevel(rawOptions.minRiskLevel);
  const cache = useCache ? await openCache(config) : undefined;

  const installed = await discoverExtensions({
    directory: rawOptions.extensionsDir,
    logger: verbose ? createLogger('discovery') : undefined,
  });
  const extensions = filterExtensions(installed, {
    publisher: rawOptions.publisher,
    includeIds: parseIdList(rawOptions.includeIds),
    excludeIds: parseIdList(rawOptions.excludeIds),
  });
  if (extensions.length === 0) {
    console.log(installed.length === 0 ? 'No installed extensions found.' : 'No installed extensions match the filters.');
    return;
  }

  const client = new AnalysisClient({
    apiUrl: config.apiUrl,
    timeoutMs: config.timeoutMs,
    maxRetries: config.maxRetries,
    retryBaseDelayMs: config.retryDelayMs,
    requestSpacingMs: config.requestDelayMs,
    logger: verbose ? createLogger('client') : undefined,
  });

  const progressLogger = createLogger('scan');
  const orchestrator = new ScanOrchestrator({
    cache,
    client,
    logger: progressLogger,
    onProgress: verbose ? (event) => progressLogger(describeProgress(event, extensions.length)) : undefined,
  });

  console.error(`Scanning ${extensions.length} extensions with ${config.workers} workers...`);
  const report = await orchestrator.run(extensions, {
    workers: config.workers,
    maxAgeMs: config.cacheMaxAgeMs,
    refresh: rawOptions.refresh === true,
  });
  const { stats } = report;
  const results = minRiskLevel ? filterByMinRiskLevel(report.results, minRiskLevel) : report.results;
  if (minRiskLevel) {
    console.error(`Reporting ${results.length} of ${report.results.length} results at or above ${minRiskLevel} risk.`);
  }

  if (rawOptions.output) {
    const outputPath = path.resolve(rawOptions.output);
    await writeOutput(outputPath, results, stats);
    console.error(`Wrote ${results.length} results to ${outputPath}`);
  }
  printSummary(stats);
}

async function writeOutput(outputPath: string, results: ItemOutcome[], stats: ScanRunStats) {
  const extension = path.extname(outputPath).toLowerCase();
  if (extension === '.csv') {
    const writer = await CsvStreamWriter.create(outputPath);
    for (const outcome of results) {
      await writer.writeRow(outcomeToRow(outcome));
    }
    await writer.close();
    return;
  }
  if (extension !== '.json') {
    throw new Error(`Unsupported output format "${extension || outputPath}"; use .json or .csv.`);
  }

  await fs.mkdir(path.dirname(outputPath), { recursive: true });
  await fs.writeFile(outputPath, JSON.stringify({ summary: stats, results }, null, 2), 'utf8');
}

function printSummary(stats: ScanRunStats) {
  console.log(`Extensions scanned: ${stats.total}`);
  console.log(`  From cache:        ${stats.cacheHits}`);
  console.log(`  Fresh scans:       ${stats.freshScans}`);
  console.log(`  Failed:            ${stats.errors}`);
  console.log(`Vulnerabilities:     ${stats.vulnerabilitiesFound}`);
  console.log(`Duration:            ${(stats.durationMs / 1000).toFixed(1)}s`);

  if (stats.retry.totalRetries > 0 || stats.retry.totalWorkflowRetries > 0) {
    console.log(
      `Retries:             ${stats.retry.totalRetries} (${stats.retry.successfulRetries} recovered, ${stats.retry.failedAfterRetries} exhausted)`,
    );
  }

  for (const failed of stats.failedExtensions) {
    console.log(`  ✗ ${failed.id} [${describeCategory(failed.errorType)}] ${failed.errorMessage}`);
  }
}

function describeProgress(event: ProgressEvent, total: number): string {
  const position = `[${event.index + 1}/${total}] ${event.extension.id}`;
  switch (event.type) {
    case 'started':
      return `${position}: scanning`;
    case 'cached':
      return `${position}: cached`;
    case 'completed':
      return `${position}: done`;
    case 'failed':
      return `${position}: failed (${event.reason})`;
  }
}

async function handleCacheStats(rawOptions: RawConfigOptions & { json?: boolean }) {
  const config = loadConfig(rawOptions);
  const cache = await openCache(config);
  const stats = await cache.stats(config.cacheMaxAgeMs);

  if (rawOptions.json) {
    console.log(JSON.stringify(stats, null, 2));
    return;
  }

  console.log(`Cache store:     ${stats.storePath} (schema v${stats.schemaVersion}, ${stats.storeSizeBytes} bytes)`);
  console.log(`Entries:         ${stats.totalEntries}`);
  console.log(`Stale (>${config.cacheMaxAgeDays}d):    ${stats.staleEntries}`);
  console.log(`Vulnerable:      ${stats.withVulnerabilities}`);
  console.log(`Average age:     ${stats.averageAgeDays === null ? 'n/a' : `${stats.averageAgeDays} days`}`);
  console.log(`Oldest / newest: ${stats.oldestEntry ?? 'n/a'} / ${stats.newestEntry ?? 'n/a'}`);
  for (const [level, count] of Object.entries(stats.riskBreakdown)) {
    console.log(`  ${level}: ${count}`);
  }
}

async function handleCacheList(rawOptions: RawConfigOptions) {
  const cache = await openCache(loadConfig(rawOptions));
  const entries = await cache.list();
  if (entries.length === 0) {
    console.log('Cache is empty.');
    return;
  }
  for (const entry of entries) {
    const score = entry.securityScore === null ? '-' : entry.securityScore;
    console.log(
      `${entry.extensionId}@${entry.version}  risk=${entry.riskLevel ?? 'unknown'}  score=${score}  vulns=${entry.vulnerabilitiesCount}  cached=${entry.cachedAt}`,
    );
  }
}

async function handleCacheClear(rawOptions: RawConfigOptions) {
  const cache = await openCache(loadConfig(rawOptions));
  const removed = await cache.clear();
  console.log(`Removed ${removed} cached results.`);
}

async function handleCacheCleanup(rawOptions: CleanupCommandOptions) {
  if (rawOptions.maxAgeDays === undefined && !rawOptions.orphaned) {
    throw new Error('Specify --max-age-days and/or --orphaned.');
  }
  const cache = await openCache(loadConfig(rawOptions));

  if (rawOptions.maxAgeDays !== undefined) {
    const days = parsePositiveInteger(rawOptions.maxAgeDays, 7, 'max-age-days');
    const removed = await cache.cleanupOld(daysToMs(days));
    console.log(`Removed ${removed} entries older than ${days} days.`);
  }

  if (rawOptions.orphaned) {
    const installed = await discoverExtensions({ directory: rawOptions.extensionsDir });
    const removed = await cache.cleanupOrphaned(installed.map((extension) => extension.id));
    console.log(`Removed ${removed} entries for extensions that are no longer installed.`);
  }
}
