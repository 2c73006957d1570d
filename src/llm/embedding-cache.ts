import type { EmbeddingOptions, EmbeddingProvider } from './types.js';
import logger from '../utils/logger.js';

interface CacheEntry {
  embedding: number[];
  timestamp: number;
}

export interface EmbeddingCacheOptions {
  ttlMs?: number;
  maxSize?: number;
  now?: () => number;
}

const DEFAULT_TTL_MS = 5 * 60 * 1000; // 5 minutes
const DEFAULT_MAX_SIZE = 500;

/**
 * TTL cache in front of an embedding provider.
 *
 * Shared across requests but read-mostly: a miss calls the wrapped provider
 * with that request's own signal, nothing in flight is shared.
 */
export class CachedEmbeddingProvider implements EmbeddingProvider {
  private readonly cache = new Map<string, CacheEntry>();
  private readonly ttlMs: number;
  private readonly maxSize: number;
  private readonly now: () => number;

  constructor(
    private readonly inner: EmbeddingProvider,
    options: EmbeddingCacheOptions = {}
  ) {
    this.ttlMs = options.ttlMs ?? DEFAULT_TTL_MS;
    this.maxSize = options.maxSize ?? DEFAULT_MAX_SIZE;
    this.now = options.now ?? Date.now;
  }

  async embed(text: string, options: EmbeddingOptions = {}): Promise<number[]> {
    const key = getCacheKey(text);
    const cached = this.cache.get(key);

    if (cached && this.now() - cached.timestamp < this.ttlMs) {
      logger.debug('Embedding cache hit', { keyLength: key.length });
      return cached.embedding;
    }

    const embedding = await this.inner.embed(text, options);
    this.cache.set(key, { embedding, timestamp: this.now() });

    if (this.cache.size > this.maxSize) {
      this.evict();
    }

    return embedding;
  }

  /**
   * Drop expired entries, then the oldest ones until back under maxSize
   */
  private evict(): void {
    const now = this.now();
    for (const [key, entry] of this.cache.entries()) {
      if (now - entry.timestamp >= this.ttlMs) {
        this.cache.delete(key);
      }
    }

    if (this.cache.size > this.maxSize) {
      const oldest = Array.from(this.cache.entries())
        .sort((a, b) => a[1].timestamp - b[1].timestamp)
        .slice(0, this.cache.size - this.maxSize);
      for (const [key] of oldest) {
        this.cache.delete(key);
      }
    }
  }
}

// Full trimmed text, never a prefix
function getCacheKey(text: string): string {
  return text.trim();
}
