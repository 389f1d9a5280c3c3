import type { DnsAnswer, DnsQuestion } from '../types.js';
import { normalizeHost } from '../utils.js';

// the parts of a question that identify a cache entry
export type CacheKey = Pick<DnsQuestion, 'query' | 'type'>;

// resolution cache keyed by (name, record type)
// entries live for the lifetime of the cache: no TTL, no eviction, first writer wins
export class ResolutionCache {
  private cache: Map<string, DnsAnswer>;

  constructor() {
    this.cache = new Map();
  }

  get(key: CacheKey): DnsAnswer | null {
    return this.cache.get(ResolutionCache.makeKey(key)) ?? null;
  }

  has(key: CacheKey): boolean {
    return this.cache.has(ResolutionCache.makeKey(key));
  }

  // store the answer unless the key is already taken, return the stored answer
  set(key: CacheKey, answer: DnsAnswer): DnsAnswer {
    const cacheKey = ResolutionCache.makeKey(key);
    const existing = this.cache.get(cacheKey);
    if (existing) return existing;
    this.cache.set(cacheKey, answer);
    return answer;
  }

  size(): number {
    return this.cache.size;
  }

  // names are compared case-insensitively, without leading/trailing dots
  static makeKey(key: CacheKey): string {
    return `${normalizeHost(key.query)}:${key.type}`;
  }
}
