/**
 * Cache key derivation.
 *
 * Keys are a pure function of declared inputs: the same inputs produce the
 * same key on every run and every host.
 */

import { createHash } from 'crypto';
import path from 'path';
import fs from 'fs-extra';
import { CacheKey, CacheKeyInput } from '../domain/cache';
import { canonicalFeatureSet } from '../domain/target';

/** A dependency lock file and its content. */
export interface LockFile {
  /** Workspace-relative path. */
  path: string;
  content: string | Buffer;
}

/** Compute the cache key for a job class. */
export function computeCacheKey(input: CacheKeyInput): CacheKey {
  const parts = [input.namespace, input.cacheClass, input.operatingSystem];
  if (input.cacheClass === 'build') {
    parts.push(input.cpuArchitecture ?? 'any');
    const features = canonicalFeatureSet(input.featureSet ?? []);
    parts.push(features.length > 0 ? features.join('+') : 'default');
  }
  parts.push(input.lockDigest);
  return parts.join('-');
}

/**
 * Hash lock file contents. Order-independent: files are sorted by path,
 * and each path is hashed along with its content.
 */
export function hashLockFiles(files: LockFile[]): string {
  const hash = createHash('sha256');
  const sorted = [...files].sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
  for (const file of sorted) {
    hash.update(file.path);
    hash.update('\0');
    hash.update(file.content);
    hash.update('\0');
  }
  return hash.digest('hex');
}

/** Read the declared lock files that exist under the workspace root. */
export async function readLockFiles(workspaceRoot: string, lockFiles: string[]): Promise<LockFile[]> {
  const files: LockFile[] = [];
  for (const relative of lockFiles) {
    const absolute = path.resolve(workspaceRoot, relative);
    if (await fs.pathExists(absolute)) {
      files.push({ path: relative, content: await fs.readFile(absolute) });
    }
  }
  return files;
}
