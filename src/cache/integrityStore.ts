import { randomBytes } from 'node:crypto';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import { CacheStoreError, describeError } from '../errors.js';
import { safeParse } from '../jot.js';
import { hexDigestsEqual, hmacHex } from '../utils/hash.js';
import type { Logger } from '../utils/logger.js';
import { fileStamp, systemClock, type Clock } from '../utils/time.js';
import { documentEnvelopeSchema, type DocumentEnvelope } from './schemas.js';

export const SECRET_KEY_BYTES = 32;
const SECRET_FILE_NAME = '.cache_secret';

export interface IntegrityStoreOptions {
  directory: string;
  fileName?: string | undefined;
  /** Signing key supplied by deployment configuration; overrides the key file. */
  secret?: Buffer | undefined;
  logger?: Logger | undefined;
  now?: Clock | undefined;
}

export type LoadResult =
  | { kind: 'missing' }
  | { kind: 'ok'; document: DocumentEnvelope }
  | { kind: 'corrupt'; reason: string };

/**
 * Owns the cache file on disk: atomic replacement of the whole document,
 * HMAC signing of payloads, and moving damaged files out of the way.
 */
export class IntegrityStore {
  private tempCounter = 0;

  private constructor(
    readonly directory: string,
    readonly filePath: string,
    private readonly key: Buffer,
    private readonly now: Clock,
  ) {}

  static async open(options: IntegrityStoreOptions): Promise<IntegrityStore> {
    const directory = path.resolve(options.directory);
    try {
      await fs.mkdir(directory, { recursive: true, mode: 0o700 });
    } catch (error) {
      throw new CacheStoreError(`Cannot create cache directory ${directory}: ${describeError(error)}`, { cause: error });
    }

    const key = options.secret ?? (await loadOrCreateSecret(directory, options.logger));
    if (key.length < SECRET_KEY_BYTES) {
      throw new CacheStoreError(`Cache signing key must be at least ${SECRET_KEY_BYTES} bytes`);
    }

    const filePath = path.join(directory, options.fileName ?? 'cache.json');
    return new IntegrityStore(directory, filePath, key, options.now ?? systemClock);
  }

  sign(payload: string): string {
    return hmacHex(this.key, payload);
  }

  verify(payload: string, signature: string): boolean {
    if (!signature) {
      return false;
    }
    return hexDigestsEqual(this.sign(payload), signature);
  }

  async load(): Promise<LoadResult> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        return { kind: 'missing' };
      }
      throw new CacheStoreError(`Cannot read cache store ${this.filePath}: ${describeError(error)}`, { cause: error });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      return { kind: 'corrupt', reason: `invalid JSON (${describeError(error)})` };
    }

    const envelope = safeParse(documentEnvelopeSchema, parsed, 'document');
    if (!envelope.ok) {
      return { kind: 'corrupt', reason: envelope.error };
    }
    return { kind: 'ok', document: envelope.value };
  }

  /** Replaces the document in one rename, so readers never observe a partial write. */
  async write(document: DocumentEnvelope): Promise<void> {
    this.tempCounter += 1;
    const tempPath = `${this.filePath}.${process.pid}.${this.tempCounter}.tmp`;
    try {
      await fs.writeFile(tempPath, JSON.stringify(document), { encoding: 'utf8', mode: 0o600 });
      await fs.rename(tempPath, this.filePath);
    } catch (error) {
      await fs.rm(tempPath, { force: true });
      throw new CacheStoreError(`Cannot write cache store ${this.filePath}: ${describeError(error)}`, { cause: error });
    }
  }

  /** Moves the damaged file aside and returns where it went, or `undefined` when there was no file to move. */
  async quarantine(): Promise<string | undefined> {
    const backupPath = `${this.filePath}.corrupted.${fileStamp(this.now())}`;
    try {
      await fs.rename(this.filePath, backupPath);
    } catch (error) {
      if (isMissingFile(error)) {
        return undefined;
      }
      throw new CacheStoreError(`Cannot move damaged cache store aside: ${describeError(error)}`, { cause: error });
    }
    return backupPath;
  }

  async sizeBytes(): Promise<number> {
    try {
      const stat = await fs.stat(this.filePath);
      return stat.size;
    } catch (error) {
      if (isMissingFile(error)) {
        return 0;
      }
      throw error;
    }
  }
}

async function loadOrCreateSecret(directory: string, logger: Logger | undefined): Promise<Buffer> {
  const secretPath = path.join(directory, SECRET_FILE_NAME);
  try {
    const existing = await fs.readFile(secretPath);
    if (existing.length >= SECRET_KEY_BYTES) {
      return existing;
    }
    logger?.(`Signing key at ${secretPath} is too short; generating a new one. Existing entries will be rescanned.`);
  } catch (error) {
    if (!isMissingFile(error)) {
      logger?.(`Cannot read signing key at ${secretPath} (${describeError(error)}); generating a new one.`);
    }
  }

  const generated = randomBytes(SECRET_KEY_BYTES);
  try {
    await fs.writeFile(secretPath, generated, { mode: 0o600 });
  } catch (error) {
    logger?.(
      `WARNING: cannot persist signing key to ${secretPath} (${describeError(error)}). Using an in-memory key; cached entries will not verify in later runs.`,
    );
  }
  return generated;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
