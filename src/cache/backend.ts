/**
 * Cache storage backends.
 *
 * The cache manager delegates persistence to a backend. Eviction is the
 * backend's concern; entries are only ever added or replaced.
 */

import os from 'os';
import path from 'path';
import fs from 'fs-extra';
import { v4 as uuid } from 'uuid';
import { CacheEntry, CacheKey } from '../domain/cache';

export interface CacheBackend {
  /** Look up an entry without materializing it. */
  lookup(key: CacheKey): Promise<CacheEntry | null>;
  /** Materialize an entry onto the paths it was saved from. */
  restore(key: CacheKey): Promise<CacheEntry | null>;
  /** Snapshot the given paths under the key, replacing any previous entry. */
  save(key: CacheKey, paths: string[]): Promise<CacheEntry>;
}

interface EntryManifest {
  key: CacheKey;
  createdAt: string;
  paths: string[];
}

const MANIFEST_FILE = 'entry.json';

/**
 * Directory-per-key backend. Saves are written to a private temporary
 * directory and moved into place, so a concurrent save of the same key
 * replaces the entry whole (last writer wins) and readers never observe a
 * half-written entry.
 */
export class FileSystemCacheBackend implements CacheBackend {
  constructor(private root: string) {}

  async lookup(key: CacheKey): Promise<CacheEntry | null> {
    const manifest = await this.readManifest(key);
    return manifest ? this.toEntry(manifest) : null;
  }

  async restore(key: CacheKey): Promise<CacheEntry | null> {
    const manifest = await this.readManifest(key);
    if (!manifest) return null;
    const dir = this.entryDir(key);
    for (let i = 0; i < manifest.paths.length; i++) {
      const snapshot = path.join(dir, 'paths', String(i));
      if (await fs.pathExists(snapshot)) {
        await fs.copy(snapshot, manifest.paths[i], { overwrite: true });
      }
    }
    return this.toEntry(manifest);
  }

  async save(key: CacheKey, paths: string[]): Promise<CacheEntry> {
    const staging = path.join(this.root, `.staging-${uuid()}`);
    const manifest: EntryManifest = { key, createdAt: new Date().toISOString(), paths };
    try {
      await fs.ensureDir(path.join(staging, 'paths'));
      for (let i = 0; i < paths.length; i++) {
        if (await fs.pathExists(paths[i])) {
          await fs.copy(paths[i], path.join(staging, 'paths', String(i)));
        }
      }
      await fs.writeJson(path.join(staging, MANIFEST_FILE), manifest);
      await fs.move(staging, this.entryDir(key), { overwrite: true });
    } finally {
      await fs.remove(staging);
    }
    return this.toEntry(manifest);
  }

  private entryDir(key: CacheKey): string {
    return path.join(this.root, key.replace(/[^A-Za-z0-9_.+-]/g, '_'));
  }

  private async readManifest(key: CacheKey): Promise<EntryManifest | null> {
    const file = path.join(this.entryDir(key), MANIFEST_FILE);
    if (!(await fs.pathExists(file))) return null;
    const manifest: EntryManifest = await fs.readJson(file);
    return manifest.key === key ? manifest : null;
  }

  private toEntry(manifest: EntryManifest): CacheEntry {
    return { key: manifest.key, blobRef: this.entryDir(manifest.key), createdAt: manifest.createdAt };
  }
}

/** In-memory backend for tests and dry runs. Records entries only. */
export class MemoryCacheBackend implements CacheBackend {
  private entries = new Map<CacheKey, CacheEntry & { paths: string[] }>();

  async lookup(key: CacheKey): Promise<CacheEntry | null> {
    const entry = this.entries.get(key);
    return entry ? { key: entry.key, blobRef: entry.blobRef, createdAt: entry.createdAt } : null;
  }

  async restore(key: CacheKey): Promise<CacheEntry | null> {
    return this.lookup(key);
  }

  async save(key: CacheKey, paths: string[]): Promise<CacheEntry> {
    const entry = { key, blobRef: `memory://cache/${key}`, createdAt: new Date().toISOString(), paths: [...paths] };
    this.entries.set(key, entry);
    return { key: entry.key, blobRef: entry.blobRef, createdAt: entry.createdAt };
  }

  /** Number of stored entries. */
  get size(): number {
    return this.entries.size;
  }
}

/** Expand a leading "~" to the home directory and resolve against the workspace. */
export function resolveCachePath(workspaceRoot: string, entry: string): string {
  if (entry === '~' || entry.startsWith('~/')) {
    return path.join(os.homedir(), entry.slice(1));
  }
  return path.resolve(workspaceRoot, entry);
}
