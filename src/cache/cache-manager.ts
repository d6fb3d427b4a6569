/**
 * Cache Manager.
 *
 * Mediates restore and save of dependency and build caches. The cache is
 * advisory: a miss only means rebuilding from scratch, and neither a
 * restore nor a save failure ever changes a job's outcome.
 */

import { CacheKey, CacheKeyInput, CacheRestoreResult, CacheSaveResult } from '../domain/cache';
import { cacheError, describeError } from '../domain/errors';
import { Logger, logger as rootLogger } from '../logger';
import { CacheBackend, resolveCachePath } from './backend';
import { computeCacheKey, hashLockFiles, readLockFiles } from './cache-key';

export interface CacheManagerOptions {
  workspaceRoot: string;
  namespace: string;
  /** Lock files whose content is part of every key. */
  lockFiles: string[];
  /** Paths snapshotted into each entry; "~" expands to the home directory. */
  paths: string[];
}

export class CacheManager {
  private lockDigest?: Promise<string>;

  constructor(
    private backend: CacheBackend,
    private options: CacheManagerOptions,
    private log: Logger = rootLogger.child({ module: 'cache' }),
  ) {}

  /** Content hash of the lock files, read once per manager. */
  async getLockDigest(): Promise<string> {
    if (!this.lockDigest) {
      this.lockDigest = readLockFiles(this.options.workspaceRoot, this.options.lockFiles).then(hashLockFiles);
    }
    return this.lockDigest;
  }

  async keyFor(input: Omit<CacheKeyInput, 'namespace' | 'lockDigest'>): Promise<CacheKey> {
    return computeCacheKey({
      ...input,
      namespace: this.options.namespace,
      lockDigest: await this.getLockDigest(),
    });
  }

  /** Attempt to materialize a prior entry. Errors count as a miss. */
  async restore(key: CacheKey): Promise<CacheRestoreResult> {
    try {
      const entry = await this.backend.restore(key);
      if (!entry) {
        this.log.info('Cache miss', { key });
        return { found: false };
      }
      this.log.info('Cache hit', { key, createdAt: entry.createdAt });
      return { found: true, path: entry.blobRef };
    } catch (err) {
      const message = describeError(err);
      this.warn('restore', key, message);
      return { found: false, error: message };
    }
  }

  /** Persist the configured paths under the key. Never throws. */
  async save(key: CacheKey, paths: string[] = this.options.paths): Promise<CacheSaveResult> {
    const resolved = paths.map((p) => resolveCachePath(this.options.workspaceRoot, p));
    try {
      await this.backend.save(key, resolved);
      this.log.info('Cache saved', { key });
      return { saved: true };
    } catch (err) {
      const message = describeError(err);
      this.warn('save', key, message);
      return { saved: false, error: message };
    }
  }

  private warn(operation: 'restore' | 'save', key: CacheKey, message: string): void {
    const error = cacheError(operation, key, message);
    this.log.warn(error.message, { code: error.code, key });
  }
}
