import { promises as fs, type Dirent } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { describeError } from '../errors.js';
import { isPlainRecord, jot, safeParse } from '../jot.js';
import type { ExtensionRef } from '../types/index.js';
import type { Logger } from '../utils/logger.js';
import { sanitizeMessage } from '../utils/text.js';
import { toIso } from '../utils/time.js';

export const MAX_PACKAGE_JSON_BYTES = 1024 * 1024;

const installedEntrySchema = jot.object({
  identifier: jot.object({ id: jot.string({ minLength: 1 }) }),
  version: jot.string({ minLength: 1 }),
  relativeLocation: jot.string({ minLength: 1 }),
  metadata: jot.optional(jot.unknown()),
});

const manifestSchema = jot.object({
  name: jot.string({ minLength: 1 }),
  publisher: jot.string({ minLength: 1 }),
  version: jot.optional(jot.string()),
  displayName: jot.optional(jot.unknown()),
});

interface InstalledRecord {
  id: string;
  version: string;
  installedAt: string | undefined;
}

export interface DiscoveryOptions {
  directory?: string | undefined;
  logger?: Logger | undefined;
}

export function defaultExtensionsDirectory(): string {
  return path.join(os.homedir(), '.vscode', 'extensions');
}

/**
 * Lists installed extensions. When `extensions.json` is present only the directories it
 * names are read, which filters out older versions VS Code leaves on disk.
 */
export async function discoverExtensions(options: DiscoveryOptions = {}): Promise<ExtensionRef[]> {
  const directory = path.resolve(options.directory ?? defaultExtensionsDirectory());
  const logger = options.logger;

  let dirents: Dirent[];
  try {
    dirents = await fs.readdir(directory, { withFileTypes: true });
  } catch (error) {
    throw new Error(`Cannot read extensions directory ${directory}: ${describeError(error)}`, { cause: error });
  }

  const installed = await readInstalledList(directory, logger);
  const extensions: ExtensionRef[] = [];

  for (const dirent of dirents) {
    if (!dirent.isDirectory() || dirent.name.startsWith('.')) {
      continue;
    }
    const record = installed?.get(dirent.name);
    if (installed && !record) {
      continue;
    }

    try {
      const extension = await readManifest(path.join(directory, dirent.name));
      if (!extension) {
        continue;
      }
      if (record?.installedAt) {
        extension.installedAt = record.installedAt;
      }
      extensions.push(extension);
    } catch (error) {
      logger?.(`Skipping ${dirent.name}: ${sanitizeMessage(describeError(error), 150)}`);
    }
  }

  return extensions.sort((a, b) => a.id.localeCompare(b.id));
}

async function readInstalledList(directory: string, logger: Logger | undefined): Promise<Map<string, InstalledRecord> | undefined> {
  const listPath = path.join(directory, 'extensions.json');
  let raw: string;
  try {
    raw = await fs.readFile(listPath, 'utf8');
  } catch (error) {
    logger?.(`extensions.json not readable (${describeError(error)}); scanning every extension directory.`);
    return undefined;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    logger?.(`Failed to parse extensions.json: ${sanitizeMessage(describeError(error))}`);
    return undefined;
  }
  if (!Array.isArray(parsed)) {
    logger?.('extensions.json is not a list; scanning every extension directory.');
    return undefined;
  }

  const installed = new Map<string, InstalledRecord>();
  for (const item of parsed) {
    const entry = safeParse(installedEntrySchema, item);
    if (!entry.ok) {
      continue;
    }
    const timestamp = isPlainRecord(entry.value.metadata) ? entry.value.metadata.installedTimestamp : undefined;
    installed.set(entry.value.relativeLocation, {
      id: entry.value.identifier.id.toLowerCase(),
      version: entry.value.version,
      installedAt: typeof timestamp === 'number' && Number.isFinite(timestamp) ? toIso(timestamp) : undefined,
    });
  }
  return installed;
}

async function readManifest(extensionDir: string): Promise<ExtensionRef | undefined> {
  const manifestPath = path.join(extensionDir, 'package.json');
  let size: number;
  try {
    size = (await fs.stat(manifestPath)).size;
  } catch {
    return undefined;
  }
  if (size > MAX_PACKAGE_JSON_BYTES) {
    throw new Error(`package.json too large: ${size} bytes (max: ${MAX_PACKAGE_JSON_BYTES})`);
  }

  const parsed: unknown = JSON.parse(await fs.readFile(manifestPath, 'utf8'));
  const manifest = safeParse(manifestSchema, parsed, 'package.json');
  if (!manifest.ok) {
    return undefined;
  }

  const { name, publisher, version, displayName } = manifest.value;
  return {
    id: `${publisher}.${name}`.toLowerCase(),
    publisher,
    name,
    version: version || 'unknown',
    displayName: typeof displayName === 'string' ? displayName : name,
  };
}
