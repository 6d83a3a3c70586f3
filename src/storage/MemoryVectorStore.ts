import type { ZodType } from 'zod';
import {
  cosineSimilarity,
  type EmbeddingProvider,
  type MetadataFilter,
  type VectorCollection,
  type VectorMatch,
  type VectorRecord,
  type VectorRecordInput,
  type VectorStore,
} from './VectorStore';

interface StoredRecord {
  id: string;
  document: string;
  metadata: unknown;
  embedding: number[];
  updatedAt: Date;
}

/**
 * In-memory vector store with brute-force cosine search.
 * Suitable for development, testing, and small catalogs.
 */
export class MemoryVectorStore implements VectorStore {
  private collections: Map<string, Map<string, StoredRecord>> = new Map();

  constructor(private embeddings: EmbeddingProvider) {}

  collection<M>(name: string, schema: ZodType<M>): VectorCollection<M> {
    let records = this.collections.get(name);
    if (!records) {
      records = new Map();
      this.collections.set(name, records);
    }
    return new MemoryVectorCollection(name, schema, records, this.embeddings);
  }

  async close(): Promise<void> {
    // Nothing to release
  }

  /**
   * Clear every collection (useful for testing)
   */
  clear(): void {
    this.collections.clear();
  }
}

class MemoryVectorCollection<M> implements VectorCollection<M> {
  constructor(
    readonly name: string,
    private schema: ZodType<M>,
    private records: Map<string, StoredRecord>,
    private embeddings: EmbeddingProvider
  ) {}

  async upsert(records: VectorRecordInput<M>[]): Promise<void> {
    if (records.length === 0) return;

    const vectors = await this.embeddings.embedMany(records.map((r) => r.document));
    const now = new Date();

    records.forEach((record, idx) => {
      this.records.set(record.id, {
        id: record.id,
        document: record.document,
        metadata: structuredClone(record.metadata),
        embedding: vectors[idx],
        updatedAt: now,
      });
    });
  }

  async get(ids: string[]): Promise<VectorRecord<M>[]> {
    const found: VectorRecord<M>[] = [];
    for (const id of ids) {
      const stored = this.records.get(id);
      if (stored) {
        found.push({
          id: stored.id,
          document: stored.document,
          metadata: this.schema.parse(stored.metadata),
          updatedAt: new Date(stored.updatedAt),
        });
      }
    }
    return found;
  }

  async query(text: string, k: number, filter?: MetadataFilter): Promise<VectorMatch<M>[]> {
    if (k <= 0 || this.records.size === 0) return [];

    const queryVector = await this.embeddings.embed(text);

    return Array.from(this.records.values())
      .filter((stored) => matchesFilter(stored.metadata, filter))
      .map((stored) => ({
        stored,
        distance: 1 - cosineSimilarity(queryVector, stored.embedding),
      }))
      .sort((a, b) => a.distance - b.distance)
      .slice(0, k)
      .map(({ stored, distance }) => ({
        id: stored.id,
        document: stored.document,
        metadata: this.schema.parse(stored.metadata),
        distance,
      }));
  }

  async listIds(): Promise<string[]> {
    return Array.from(this.records.keys());
  }

  async count(): Promise<number> {
    return this.records.size;
  }

  async delete(ids: string[]): Promise<number> {
    let deleted = 0;
    for (const id of ids) {
      if (this.records.delete(id)) deleted++;
    }
    return deleted;
  }

  async clear(): Promise<void> {
    this.records.clear();
  }
}

function matchesFilter(metadata: unknown, filter?: MetadataFilter): boolean {
  if (!filter) return true;
  if (typeof metadata !== 'object' || metadata === null) return false;

  const fields = new Map<string, unknown>(Object.entries(metadata));
  return Object.entries(filter).every(([key, value]) => fields.get(key) === value);
}
