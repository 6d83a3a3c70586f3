import type { VectorStore } from '../storage';
import { ProductStore } from './ProductStore';
import { VibeStore } from './VibeStore';

export interface CatalogStats {
  productsCount: number;
  vibesCount: number;
  productsWithoutVibes: number;
}

/**
 * The two catalog collections sharing one vector store
 */
export class ProductCatalog {
  readonly products: ProductStore;
  readonly vibes: VibeStore;

  constructor(store: VectorStore, collectionPrefix: string) {
    this.products = new ProductStore(store, collectionPrefix);
    this.vibes = new VibeStore(store, collectionPrefix);
  }

  /**
   * Ids present in the product store with no vibe record
   */
  async productsWithoutVibes(): Promise<string[]> {
    const [productIds, vibeIds] = await Promise.all([
      this.products.listIds(),
      this.vibes.listIds(),
    ]);
    const withVibes = new Set(vibeIds);
    return productIds.filter((id) => !withVibes.has(id));
  }

  async getStats(): Promise<CatalogStats> {
    const [productsCount, vibesCount, missing] = await Promise.all([
      this.products.count(),
      this.vibes.count(),
      this.productsWithoutVibes(),
    ]);

    return {
      productsCount,
      vibesCount,
      productsWithoutVibes: missing.length,
    };
  }

  async clearAll(): Promise<void> {
    await Promise.all([this.products.clear(), this.vibes.clear()]);
    console.warn('ProductCatalog: cleared all collections');
  }
}
