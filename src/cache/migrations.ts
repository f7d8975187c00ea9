import { CacheMigrationError, describeError } from '../errors.js';
import { isPlainRecord } from '../jot.js';
import { deriveIndexedFields } from './indexedFields.js';
import { cacheEntryV1Schema, entrySchemasByVersion, type CacheEntry } from './schemas.js';

/** What a step may ask of the store while it runs. */
export interface MigrationContext {
  /**
   * Returns a signature over the entry's key and payload when its current signature
   * still verifies, or an empty string so the entry reads as a miss afterwards.
   */
  bindSignature(entry: { extensionId: string; version: string; payload: string; signature: string }): string;
}

export interface Migration {
  from: number;
  to: number;
  description: string;
  migrateEntry(entry: unknown, context: MigrationContext): unknown;
}

const v1ToV2: Migration = {
  from: 1,
  to: 2,
  description: 'add per-entry schema version and indexed filter columns; bind signatures to the entry key',
  migrateEntry(entry, context) {
    const v1 = cacheEntryV1Schema.parse(entry, 'entry');
    const parsedPayload: unknown = JSON.parse(v1.payload);
    if (!isPlainRecord(parsedPayload)) {
      throw new TypeError('entry.payload must encode an object');
    }
    const indexed = deriveIndexedFields(parsedPayload);

    const next: CacheEntry = {
      extensionId: v1.extensionId,
      version: v1.version,
      payload: v1.payload,
      cachedAt: v1.cachedAt,
      schemaVersion: 2,
      signature: context.bindSignature(v1),
      ...indexed,
      riskLevel: v1.riskLevel ?? indexed.riskLevel,
    };
    return next;
  },
};

export const MIGRATIONS: readonly Migration[] = [v1ToV2];

/** Ordered chain of steps leading from `from` to `to`; throws when the table has a gap. */
export function planMigrations(from: number, to: number, table: readonly Migration[] = MIGRATIONS): Migration[] {
  const plan: Migration[] = [];
  let cursor = from;
  while (cursor < to) {
    const step = table.find((migration) => migration.from === cursor);
    if (!step) {
      throw new CacheMigrationError(`No migration registered from schema v${cursor}`, from, to);
    }
    plan.push(step);
    cursor = step.to;
  }
  if (cursor !== to) {
    throw new CacheMigrationError(`Migration chain overshoots schema v${to}`, from, to);
  }
  return plan;
}

/**
 * Runs every step over every entry in memory. Any failure aborts the whole run, so
 * callers either get a complete set of migrated entries or an exception.
 */
export function applyMigrations(
  entries: readonly unknown[],
  plan: readonly Migration[],
  context: MigrationContext,
): unknown[] {
  let current: unknown[] = [...entries];
  for (const step of plan) {
    const targetSchema = entrySchemasByVersion.get(step.to);
    current = current.map((entry, index) => {
      try {
        const migrated = step.migrateEntry(entry, context);
        return targetSchema ? targetSchema.parse(migrated, `entries[${index}]`) : migrated;
      } catch (error) {
        throw new CacheMigrationError(
          `Migration v${step.from}→v${step.to} failed on entry ${index}: ${describeError(error)}`,
          step.from,
          step.to,
          { cause: error },
        );
      }
    });
  }

  if (current.length !== entries.length) {
    const first = plan[0];
    const last = plan[plan.length - 1];
    throw new CacheMigrationError(
      `Migration changed the entry count (${entries.length} → ${current.length})`,
      first?.from ?? 0,
      last?.to ?? 0,
    );
  }
  return current;
}
