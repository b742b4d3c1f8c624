import { LRUCache } from 'lru-cache';

export interface CacheOptions {
  maxSize?: number;
  ttl?: number;
}

const DEFAULT_MAX_SIZE = 1000;

export function createCache<T extends NonNullable<unknown>>(options: CacheOptions = {}) {
  return new LRUCache<string, T>({
    max: options.maxSize ?? DEFAULT_MAX_SIZE,
    ...(options.ttl !== undefined && { ttl: options.ttl }),
  });
}

// ── Cache stats export ───────────────────────────────────────────────────────

export interface CacheStats {
  [key: string]: { size: number; max: number };
}

const registry = new Map<string, () => { size: number; max: number }>();

/** Register a cache so it shows up in /health/caches */
export function registerCache<T extends NonNullable<unknown>>(name: string, cache: LRUCache<string, T>): LRUCache<string, T> {
  registry.set(name, () => ({ size: cache.size, max: cache.max }));
  return cache;
}

export function getCacheStats(): CacheStats {
  const stats: CacheStats = {};
  for (const [name, read] of registry) {
    stats[name] = read();
  }
  return stats;
}
