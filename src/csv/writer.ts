import { createWriteStream, WriteStream } from 'node:fs';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import { finished } from 'node:stream/promises';
import type { ItemOutcome } from '../types/index.js';

export interface CsvRow {
  extension_id: string;
  name: string;
  version: string;
  status: string;
  from_cache: string;
  risk_level: string;
  security_score: string;
  vulnerabilities_total: number;
  vulnerabilities_critical: number;
  vulnerabilities_high: number;
  dependencies: number;
  publisher_verified: string;
  error_type: string;
  error_message: string;
  report_url: string;
}

const HEADER: ReadonlyArray<keyof CsvRow> = [
  'extension_id',
  'name',
  'version',
  'status',
  'from_cache',
  'risk_level',
  'security_score',
  'vulnerabilities_total',
  'vulnerabilities_critical',
  'vulnerabilities_high',
  'dependencies',
  'publisher_verified',
  'error_type',
  'error_message',
  'report_url',
];

export class CsvStreamWriter {
  private constructor(private readonly destination: string, private readonly stream: WriteStream) {}

  static async create(destination: string): Promise<CsvStreamWriter> {
    await fs.mkdir(path.dirname(destination), { recursive: true });
    const stream = createWriteStream(destination, { encoding: 'utf8' });
    stream.write(`${HEADER.join(',')}\n`);
    return new CsvStreamWriter(destination, stream);
  }

  async writeRow(row: CsvRow): Promise<void> {
    const line = HEADER.map((key) => csvEscape(String(row[key]))).join(',');
    if (!this.stream.write(`${line}\n`)) {
      await onceDrain(this.stream);
    }
  }

  async close(): Promise<void> {
    this.stream.end();
    await finished(this.stream);
  }

  get path(): string {
    return this.destination;
  }
}

export function outcomeToRow(outcome: ItemOutcome): CsvRow {
  const { extension } = outcome;
  const base = {
    extension_id: extension.id,
    name: extension.displayName ?? extension.name,
    version: extension.version,
    status: outcome.status,
    from_cache: outcome.fromCache ? 'yes' : 'no',
  };

  if (outcome.status !== 'success') {
    return {
      ...base,
      risk_level: '',
      security_score: '',
      vulnerabilities_total: 0,
      vulnerabilities_critical: 0,
      vulnerabilities_high: 0,
      dependencies: 0,
      publisher_verified: '',
      error_type: outcome.status === 'not-found' ? 'not_found' : outcome.errorType,
      error_message: outcome.reason,
      report_url: '',
    };
  }

  const { result } = outcome;
  return {
    ...base,
    risk_level: result.riskLevel ?? '',
    security_score: result.securityScore === null ? '' : String(result.securityScore),
    vulnerabilities_total: result.vulnerabilities.total,
    vulnerabilities_critical: result.vulnerabilities.critical,
    vulnerabilities_high: result.vulnerabilities.high,
    dependencies: result.dependencies.totalCount,
    publisher_verified: result.metadata.publisher.verified ? 'yes' : 'no',
    error_type: '',
    error_message: '',
    report_url: result.reportUrl,
  };
}

async function onceDrain(stream: WriteStream): Promise<void> {
  await new Promise<void>((resolve) => stream.once('drain', resolve));
}

export function csvEscape(value: string): string {
  const needsQuotes = value.includes(',') || value.includes('\n') || value.includes('"');
  const sanitized = value.replace(/\r?\n/g, ' ').replace(/"/g, '""');
  return needsQuotes ? `"${sanitized}"` : sanitized;
}
