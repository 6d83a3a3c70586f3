import type { VectorCollection, VectorStore } from '../storage';
import { type ProductVibe, type ScoredRecord, StorageError } from '../types';
import { ProductVibeSchema } from './schemas';

/**
 * Text embedded for a vibe record
 */
export function vibeDocumentText(vibe: Pick<ProductVibe, 'vibeTags' | 'moodSummary' | 'idealFor'>): string {
  return `${vibe.vibeTags.join(', ')}. ${vibe.moodSummary}. ${vibe.idealFor}.`;
}

/**
 * Generated vibe records keyed by productId.
 * No referential integrity with the product store; orphans are tolerated.
 */
export class VibeStore {
  private collection: VectorCollection<ProductVibe>;

  constructor(store: VectorStore, collectionPrefix: string) {
    this.collection = store.collection(`${collectionPrefix}_product_vibes`, ProductVibeSchema);
  }

  async upsert(vibe: ProductVibe): Promise<void> {
    try {
      await this.collection.upsert([
        { id: vibe.productId, document: vibeDocumentText(vibe), metadata: vibe },
      ]);
    } catch (error) {
      throw new StorageError(`failed to upsert vibes for ${vibe.productId}`, error);
    }
  }

  /**
   * Returns null when the record is missing or cannot be read
   */
  async get(productId: string): Promise<ProductVibe | null> {
    try {
      const [record] = await this.collection.get([productId]);
      return record ? record.metadata : null;
    } catch (error) {
      console.error(`VibeStore: failed to read vibes for ${productId}`, error);
      return null;
    }
  }

  async exists(productId: string): Promise<boolean> {
    return (await this.get(productId)) !== null;
  }

  async searchSimilar(queryText: string, k: number): Promise<ScoredRecord<ProductVibe>[]> {
    const matches = await this.read(() => this.collection.query(queryText, k));
    return matches.map((match) => ({
      record: match.metadata,
      similarity: 1 - match.distance,
    }));
  }

  async getAll(): Promise<ProductVibe[]> {
    const records = await this.read(async () => this.collection.get(await this.collection.listIds()));
    return records.map((record) => record.metadata);
  }

  async listIds(): Promise<string[]> {
    return this.read(() => this.collection.listIds());
  }

  async count(): Promise<number> {
    return this.read(() => this.collection.count());
  }

  async delete(productId: string): Promise<boolean> {
    return (await this.read(() => this.collection.delete([productId]))) > 0;
  }

  async clear(): Promise<void> {
    await this.read(() => this.collection.clear());
  }

  private async read<T>(operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      throw new StorageError(`${this.collection.name} unavailable`, error);
    }
  }
}
