/**
 * Wiki Cache Store
 *
 * One JSON file per (repoType, owner, repo, language) under the cache
 * directory. Writes fully replace a file; concurrent writers to the same key
 * race and the last one wins. Entries never expire.
 */

import { promises as fs } from 'fs';
import { join } from 'path';
import { Result, ok, err, describeError, errnoCode } from '../../lib/result-types.js';
import {
  CacheEntryNotFoundError,
  CacheWriteFailedError,
  InvalidCacheKeyError
} from '../../lib/errors/DocWikiErrors.js';
import { createSilentLogger } from '../../lib/logger.js';
import type { Logger } from '../../lib/logger.js';
import { WikiCacheFileSchema, fromWikiCacheFile, findOrphanPages, toWikiCacheFile } from '../../models/WikiCache.js';
import type { CachedWikiSummary, WikiCacheEntry, WikiCacheKey } from '../../models/WikiCache.js';
import {
  encodeCacheFilename,
  fixedRoleSeparatorFields,
  isCacheFilename,
  parseCacheFilename,
  validateCacheKey
} from './wiki-cache-filename.js';

export interface WikiCacheStoreOptions {
  cacheDir: string;
  logger?: Logger;
}

export class WikiCacheStore {
  readonly cacheDir: string;
  private readonly logger: Logger;

  constructor(options: WikiCacheStoreOptions) {
    this.cacheDir = options.cacheDir;
    this.logger = options.logger ?? createSilentLogger();
  }

  /**
   * Absolute path of the file holding a key
   */
  pathFor(key: WikiCacheKey): Result<string, InvalidCacheKeyError> {
    return validateCacheKey(key).map((valid) => join(this.cacheDir, encodeCacheFilename(valid)));
  }

  /**
   * Read a cached wiki
   *
   * A missing, unparseable or malformed file is reported as not found.
   */
  async get(key: WikiCacheKey): Promise<Result<WikiCacheEntry, CacheEntryNotFoundError | InvalidCacheKeyError>> {
    const path = this.pathFor(key);
    if (path.isErr()) {
      return err(path.error);
    }

    let content: string;
    try {
      content = await fs.readFile(path.value, 'utf-8');
    } catch (error) {
      if (errnoCode(error) !== 'ENOENT') {
        this.logger.warn('cache', 'Could not read wiki cache file', { path: path.value, reason: describeError(error) });
      }
      return err(new CacheEntryNotFoundError(path.value));
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      this.logger.warn('cache', 'Wiki cache file is not valid JSON', { path: path.value, reason: describeError(error) });
      return err(new CacheEntryNotFoundError(path.value));
    }

    const parsed = WikiCacheFileSchema.safeParse(raw);
    if (!parsed.success) {
      this.logger.warn('cache', 'Wiki cache file does not match the expected schema', {
        path: path.value,
        issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      });
      return err(new CacheEntryNotFoundError(path.value));
    }

    return ok(fromWikiCacheFile(parsed.data));
  }

  /**
   * Write a wiki, replacing any existing file for the key
   *
   * @returns Path of the written file
   */
  async put(key: WikiCacheKey, entry: WikiCacheEntry): Promise<Result<string, CacheWriteFailedError | InvalidCacheKeyError>> {
    const path = this.pathFor(key);
    if (path.isErr()) {
      return err(path.error);
    }

    const ambiguous = fixedRoleSeparatorFields(key);
    if (ambiguous.length > 0) {
      this.logger.warn('cache', 'Key fields contain "_"; the entry will be listed under a different key', {
        fields: ambiguous
      });
    }

    const orphans = findOrphanPages(entry);
    if (orphans.length > 0) {
      this.logger.debug('cache', 'Generated pages missing from the wiki structure', { pages: orphans });
    }

    const payload = JSON.stringify(toWikiCacheFile(entry), null, 2);

    try {
      await fs.mkdir(this.cacheDir, { recursive: true });
      await fs.writeFile(path.value, payload, 'utf-8');
    } catch (error) {
      this.logger.error('cache', 'Failed to write wiki cache', error, { path: path.value });
      return err(new CacheWriteFailedError(path.value, 'write', describeError(error)));
    }

    this.logger.info('cache', 'Saved wiki cache', {
      path: path.value,
      bytes: Buffer.byteLength(payload, 'utf-8'),
      pages: Object.keys(entry.generatedPages).length
    });
    return ok(path.value);
  }

  async delete(
    key: WikiCacheKey
  ): Promise<Result<void, CacheEntryNotFoundError | CacheWriteFailedError | InvalidCacheKeyError>> {
    const path = this.pathFor(key);
    if (path.isErr()) {
      return err(path.error);
    }

    try {
      await fs.unlink(path.value);
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') {
        return err(new CacheEntryNotFoundError(path.value));
      }
      this.logger.error('cache', 'Failed to delete wiki cache', error, { path: path.value });
      return err(new CacheWriteFailedError(path.value, 'delete', describeError(error)));
    }

    this.logger.info('cache', 'Deleted wiki cache', { path: path.value });
    return ok(undefined);
  }

  /**
   * Every cached wiki, most recently written first
   *
   * Files whose names cannot be decoded are logged and left out.
   */
  async listAll(): Promise<CachedWikiSummary[]> {
    const filenames = await this.readCacheFilenames();
    const summaries: CachedWikiSummary[] = [];

    for (const filename of filenames) {
      const parsed = parseCacheFilename(filename);
      if (parsed.isErr()) {
        this.logger.warn('cache', 'Skipping wiki cache file', { filename, reason: parsed.error.message });
        continue;
      }

      try {
        const stats = await fs.stat(join(this.cacheDir, filename));
        summaries.push({
          id: filename,
          key: parsed.value,
          name: `${parsed.value.owner}/${parsed.value.repo}`,
          submittedAt: stats.mtimeMs
        });
      } catch (error) {
        // Removed between readdir and stat
        this.logger.debug('cache', 'Wiki cache file vanished while listing', {
          filename,
          reason: describeError(error)
        });
      }
    }

    return summaries.sort((a, b) => b.submittedAt - a.submittedAt || a.id.localeCompare(b.id));
  }

  /**
   * Delete every cache file
   *
   * @returns Number of files removed
   */
  async clear(): Promise<Result<number, CacheWriteFailedError>> {
    const filenames = await this.readCacheFilenames();
    let removed = 0;

    for (const filename of filenames) {
      const path = join(this.cacheDir, filename);
      try {
        await fs.unlink(path);
        removed++;
      } catch (error) {
        if (errnoCode(error) === 'ENOENT') {
          continue;
        }
        this.logger.error('cache', 'Failed to clear wiki cache', error, { path, removed });
        return err(new CacheWriteFailedError(path, 'delete', describeError(error)));
      }
    }

    this.logger.info('cache', 'Cleared wiki cache', { removed });
    return ok(removed);
  }

  private async readCacheFilenames(): Promise<string[]> {
    try {
      const entries = await fs.readdir(this.cacheDir);
      return entries.filter(isCacheFilename);
    } catch (error) {
      if (errnoCode(error) !== 'ENOENT') {
        this.logger.warn('cache', 'Could not read wiki cache directory', {
          dir: this.cacheDir,
          reason: describeError(error)
        });
      }
      return [];
    }
  }
}
