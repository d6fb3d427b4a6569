/**
 * Cache domain model.
 *
 * Cache entries hold dependency and build output snapshots keyed by a
 * deterministic fingerprint of the inputs that produced them.
 */

/** Jobs in the same class share cache entries when their inputs match. */
export type CacheClass = 'build' | 'check';

/** Declared inputs of a cache key. */
export interface CacheKeyInput {
  namespace: string;
  cacheClass: CacheClass;
  operatingSystem: string;
  /** Omitted for check jobs, which run on the host architecture. */
  cpuArchitecture?: string;
  featureSet?: readonly string[];
  /** Content hash of the dependency lock files. */
  lockDigest: string;
}

export type CacheKey = string;

export interface CacheEntry {
  key: CacheKey;
  blobRef: string;
  createdAt: string;
}

export interface CacheRestoreResult {
  found: boolean;
  path?: string;
  /** Set when the lookup failed and was downgraded to a miss. */
  error?: string;
}

export interface CacheSaveResult {
  saved: boolean;
  error?: string;
}
