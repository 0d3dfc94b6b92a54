/**
 * Offline Cache — last known revocation status per user, written after each
 * successful online check and read only when the ledger cannot be reached.
 */

import { readFile, rename, writeFile } from 'node:fs/promises';
import { createLogger } from './logger.js';
import { describeErrors, validateCacheFile, type CacheFile, type CacheFileEntry } from './schemas.js';
import type { OfflineCacheEntry } from './types.js';

export interface OfflineCache {
  get(userId: string): Promise<OfflineCacheEntry | null>;
  put(entry: OfflineCacheEntry): Promise<void>;
}

export class MemoryOfflineCache implements OfflineCache {
  private entries = new Map<string, OfflineCacheEntry>();

  async get(userId: string): Promise<OfflineCacheEntry | null> {
    const entry = this.entries.get(userId);
    return entry ? { ...entry } : null;
  }

  async put(entry: OfflineCacheEntry): Promise<void> {
    this.entries.set(entry.userId, { ...entry });
  }
}

/**
 * JSON-file cache. A missing file is an empty cache; a file that does not
 * match the schema is discarded with a warning and rewritten on the next put.
 * Entries live in one Map per instance, loaded once and shared by every caller.
 */
export class FileOfflineCache implements OfflineCache {
  private loading?: Promise<Map<string, CacheFileEntry>>;
  private writing: Promise<void> = Promise.resolve();
  private logger = createLogger('FileOfflineCache');

  constructor(readonly path: string) {}

  async get(userId: string): Promise<OfflineCacheEntry | null> {
    const entry = (await this.load()).get(userId);
    return entry ? { userId, lastKnownRevoked: entry.lastKnownRevoked, checkedAt: entry.checkedAt } : null;
  }

  async put(entry: OfflineCacheEntry): Promise<void> {
    const entries = await this.load();
    entries.set(entry.userId, { lastKnownRevoked: entry.lastKnownRevoked, checkedAt: entry.checkedAt });
    const file: CacheFile = { version: 1, entries: Object.fromEntries(entries) };
    const snapshot = JSON.stringify(file, null, 2) + '\n';
    const write = this.writing.then(() => this.persist(snapshot));
    this.writing = write.catch(() => undefined);
    return write;
  }

  private async persist(contents: string): Promise<void> {
    const tmp = `${this.path}.${process.pid}.tmp`;
    await writeFile(tmp, contents, 'utf-8');
    await rename(tmp, this.path);
  }

  private load(): Promise<Map<string, CacheFileEntry>> {
    this.loading ??= this.readFromDisk().catch((err: unknown) => {
      // Let the next call retry a failed read
      this.loading = undefined;
      throw err;
    });
    return this.loading;
  }

  private async readFromDisk(): Promise<Map<string, CacheFileEntry>> {
    let raw: string;
    try {
      raw = await readFile(this.path, 'utf-8');
    } catch (err) {
      if (isMissingFile(err)) return new Map();
      throw err;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      parsed = undefined;
    }
    if (validateCacheFile(parsed)) {
      return new Map(Object.entries(parsed.entries));
    }
    this.logger.warn('Discarding unreadable offline cache', {
      path: this.path,
      error: parsed === undefined ? 'invalid JSON' : describeErrors(validateCacheFile),
    });
    return new Map();
  }
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
