import type { VectorCollection, VectorStore } from '../storage';
import { type Product, type ProductRow, type ScoredRecord, StorageError } from '../types';
import { computeContentHash } from '../utils';
import { ProductSchema } from './schemas';

/**
 * Text embedded for a product
 */
export function productDocumentText(product: ProductRow): string {
  return `${product.name}. ${product.type}. ${product.description}. Colors: ${product.colors}. Material: ${product.material}.`;
}

/**
 * Canonical product records, one per productId.
 * Every upsert recomputes the content hash and keeps the original createdAt.
 */
export class ProductStore {
  private collection: VectorCollection<Product>;

  constructor(store: VectorStore, collectionPrefix: string) {
    this.collection = store.collection(`${collectionPrefix}_products`, ProductSchema);
  }

  async upsert(row: ProductRow): Promise<Product> {
    try {
      const [existing] = await this.collection.get([row.productId]);
      const now = new Date().toISOString();

      const product: Product = {
        ...row,
        contentHash: computeContentHash(row),
        createdAt: existing?.metadata.createdAt ?? now,
        updatedAt: now,
      };

      await this.collection.upsert([
        { id: product.productId, document: productDocumentText(product), metadata: product },
      ]);
      return product;
    } catch (error) {
      throw new StorageError(`failed to upsert product ${row.productId}`, error);
    }
  }

  async upsertMany(rows: ProductRow[]): Promise<{ added: number; failed: number }> {
    let added = 0;
    let failed = 0;

    for (const row of rows) {
      try {
        await this.upsert(row);
        added++;
      } catch (error) {
        console.warn(`ProductStore: skipped product ${row.productId}`, error);
        failed++;
      }
    }

    return { added, failed };
  }

  async get(productId: string): Promise<Product | null> {
    const [record] = await this.read(() => this.collection.get([productId]));
    return record ? record.metadata : null;
  }

  async getMany(productIds: string[]): Promise<Product[]> {
    const records = await this.read(() => this.collection.get(productIds));
    return records.map((record) => record.metadata);
  }

  async getAll(): Promise<Product[]> {
    const ids = await this.listIds();
    return this.getMany(ids);
  }

  async exists(productId: string): Promise<boolean> {
    return (await this.get(productId)) !== null;
  }

  async contentHash(productId: string): Promise<string | null> {
    const product = await this.get(productId);
    return product ? product.contentHash : null;
  }

  /**
   * Products ordered by similarity to the query (1 - cosine distance, unclamped)
   */
  async searchSimilar(
    queryText: string,
    k: number,
    productType?: string
  ): Promise<ScoredRecord<Product>[]> {
    const matches = await this.read(() =>
      this.collection.query(queryText, k, productType ? { type: productType } : undefined)
    );

    return matches.map((match) => ({
      record: match.metadata,
      similarity: 1 - match.distance,
    }));
  }

  async listIds(): Promise<string[]> {
    return this.read(() => this.collection.listIds());
  }

  async count(): Promise<number> {
    return this.read(() => this.collection.count());
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
