import type { ProductStore, VibeStore } from '../catalog';
import type {
  Product,
  ProductVibe,
  ScoredRecord,
  SearchOptions,
  SearchResult,
} from '../types';

export interface HybridSearchConfig {
  productWeight?: number;
  vibeWeight?: number;
  /**
   * Candidates fetched from each store per requested result
   */
  widenFactor?: number;
}

interface Candidate {
  product: Product;
  vibe: ProductVibe | null;
  productSimilarity: number;
  vibeSimilarity: number;
  rank: number;
}

/**
 * Ranks products by a weighted blend of attribute similarity and vibe similarity
 */
export class HybridSearchEngine {
  private config: Required<HybridSearchConfig>;

  constructor(
    private products: ProductStore,
    private vibes: VibeStore,
    config: HybridSearchConfig = {}
  ) {
    this.config = {
      productWeight: config.productWeight ?? 0.4,
      vibeWeight: config.vibeWeight ?? 0.6,
      widenFactor: config.widenFactor ?? 2,
    };
  }

  async search(query: string, n: number = 5, options: SearchOptions = {}): Promise<SearchResult[]> {
    if (n <= 0) return [];

    const { searchProducts = true, searchVibes = true, productType } = options;
    const k = n * this.config.widenFactor;

    const productHits = searchProducts
      ? await this.products.searchSimilar(query, k, productType)
      : [];
    const vibeHits = searchVibes ? await this.searchVibesSafely(query, k) : [];

    const candidates = new Map<string, Candidate>();

    productHits.forEach((hit, idx) => {
      candidates.set(hit.record.productId, {
        product: hit.record,
        vibe: null,
        productSimilarity: hit.similarity,
        vibeSimilarity: 0,
        rank: idx,
      });
    });

    const vibeOnly: ScoredRecord<ProductVibe>[] = [];
    for (const hit of vibeHits) {
      const existing = candidates.get(hit.record.productId);
      if (existing) {
        existing.vibe = hit.record;
        existing.vibeSimilarity = hit.similarity;
      } else {
        vibeOnly.push(hit);
      }
    }

    if (vibeOnly.length > 0) {
      const found = await this.products.getMany(vibeOnly.map((hit) => hit.record.productId));
      const byId = new Map(found.map((product) => [product.productId, product]));

      vibeOnly.forEach((hit, idx) => {
        const product = byId.get(hit.record.productId);
        // Orphaned vibes and products outside the type filter are dropped
        if (!product || (productType && product.type !== productType)) return;

        candidates.set(product.productId, {
          product,
          vibe: hit.record,
          productSimilarity: 0,
          vibeSimilarity: hit.similarity,
          rank: productHits.length + idx,
        });
      });
    }

    const ranked = Array.from(candidates.values())
      .map((candidate) => ({ candidate, combinedScore: this.combinedScore(candidate) }))
      .sort((a, b) => b.combinedScore - a.combinedScore || a.candidate.rank - b.candidate.rank)
      .slice(0, n);

    // Vibes for product-only hits are fetched for display; they do not affect the score
    return Promise.all(
      ranked.map(async ({ candidate, combinedScore }) => {
        const vibe = candidate.vibe ?? (await this.vibes.get(candidate.product.productId));
        return this.toResult(candidate, vibe, combinedScore);
      })
    );
  }

  private combinedScore(candidate: Candidate): number {
    return (
      candidate.productSimilarity * this.config.productWeight +
      candidate.vibeSimilarity * this.config.vibeWeight
    );
  }

  private async searchVibesSafely(query: string, k: number): Promise<ScoredRecord<ProductVibe>[]> {
    try {
      return await this.vibes.searchSimilar(query, k);
    } catch (error) {
      console.error('HybridSearchEngine: vibe search failed, ranking on products only', error);
      return [];
    }
  }

  private toResult(
    candidate: Candidate,
    vibe: ProductVibe | null,
    combinedScore: number
  ): SearchResult {
    const { product } = candidate;
    return {
      productId: product.productId,
      productName: product.name,
      productType: product.type,
      priceMin: product.priceMin,
      priceMax: product.priceMax,
      currency: product.currency,
      productUrl: product.url,
      imageUrl: product.imageUrl,
      vibeTags: vibe ? vibe.vibeTags : [],
      moodSummary: vibe ? vibe.moodSummary : '',
      productSimilarity: candidate.productSimilarity,
      vibeSimilarity: candidate.vibeSimilarity,
      combinedScore,
    };
  }
}
