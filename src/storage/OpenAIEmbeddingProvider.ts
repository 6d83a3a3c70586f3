import OpenAI from 'openai';
import type { EmbeddingProvider } from './VectorStore';

export interface OpenAIEmbeddingProviderConfig {
  apiKey?: string;
  model?: string;
  timeoutMs?: number;
  maxRetries?: number;
  cache?: {
    enabled?: boolean;
    ttl?: number; // milliseconds
    maxSize?: number;
  };
}

interface CacheEntry<T> {
  value: T;
  timestamp: number;
}

/**
 * OpenAI embeddings with an in-process TTL cache.
 * Expired entries are dropped when they are next read.
 */
export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  private config: Required<Omit<OpenAIEmbeddingProviderConfig, 'apiKey' | 'cache'>> & {
    cache: { enabled: boolean; ttl: number; maxSize: number };
  };
  private openai: OpenAI;
  private embeddingCache: Map<string, CacheEntry<number[]>> = new Map();
  private cacheStats = { hits: 0, misses: 0 };

  constructor(config: OpenAIEmbeddingProviderConfig = {}, client?: OpenAI) {
    this.config = {
      model: config.model || 'text-embedding-3-small',
      timeoutMs: config.timeoutMs ?? 30000,
      maxRetries: config.maxRetries ?? 3,
      cache: {
        enabled: config.cache?.enabled ?? true,
        ttl: config.cache?.ttl ?? 3600000, // 1 hour
        maxSize: config.cache?.maxSize ?? 1000,
      },
    };

    this.openai =
      client ??
      new OpenAI({
        apiKey: config.apiKey,
        timeout: this.config.timeoutMs,
        maxRetries: this.config.maxRetries,
      });
  }

  async embed(text: string): Promise<number[]> {
    const [embedding] = await this.embedMany([text]);
    return embedding;
  }

  async embedMany(texts: string[]): Promise<number[][]> {
    const results: Array<number[] | undefined> = texts.map((text) => this.readCache(text));
    const missing = texts.filter((_, idx) => results[idx] === undefined);

    if (missing.length > 0) {
      const unique = Array.from(new Set(missing));
      const response = await this.openai.embeddings.create({
        model: this.config.model,
        input: unique,
      });

      const fetched = new Map<string, number[]>();
      for (const item of response.data) {
        const text = unique[item.index];
        fetched.set(text, item.embedding);
        this.writeCache(text, item.embedding);
      }

      texts.forEach((text, idx) => {
        if (results[idx] === undefined) {
          results[idx] = fetched.get(text);
        }
      });
    }

    return results.map((embedding, idx) => {
      if (!embedding) {
        throw new Error(`Embedding missing for input ${idx}`);
      }
      return embedding;
    });
  }

  getCacheStats() {
    const lookups = this.cacheStats.hits + this.cacheStats.misses;
    return {
      size: this.embeddingCache.size,
      maxSize: this.config.cache.maxSize,
      hits: this.cacheStats.hits,
      misses: this.cacheStats.misses,
      hitRate: lookups > 0 ? (this.cacheStats.hits / lookups).toFixed(2) : '0.00',
    };
  }

  clearCache(): void {
    this.embeddingCache.clear();
    this.cacheStats = { hits: 0, misses: 0 };
  }

  // ============================================================================
  // Private Methods
  // ============================================================================

  private readCache(text: string): number[] | undefined {
    if (!this.config.cache.enabled) return undefined;

    const cacheKey = `${this.config.model}:${text}`;
    const cached = this.embeddingCache.get(cacheKey);

    if (cached) {
      if (Date.now() - cached.timestamp < this.config.cache.ttl) {
        this.cacheStats.hits++;
        return cached.value;
      }
      // Expired
      this.embeddingCache.delete(cacheKey);
    }

    this.cacheStats.misses++;
    return undefined;
  }

  private writeCache(text: string, embedding: number[]): void {
    if (!this.config.cache.enabled) return;

    const cacheKey = `${this.config.model}:${text}`;
    if (!this.embeddingCache.has(cacheKey) && this.embeddingCache.size >= this.config.cache.maxSize) {
      // Evict oldest insertion
      const firstKey = this.embeddingCache.keys().next().value;
      if (firstKey) {
        this.embeddingCache.delete(firstKey);
      }
    }

    this.embeddingCache.set(cacheKey, { value: embedding, timestamp: Date.now() });
  }
}
