import type { GenerationMethod, ProductRow, ProductVibe, VibeMethod } from '../types';
import type { LLMVibeResult, StructuredVibeGenerator } from './LLMVibeGenerator';
import { extractVibeTags, inferAttributes, vocabulary, type RuleInput } from './rules';

export interface VibeGeneratorConfig {
  maxTags?: number;
  /**
   * Rule-based tag extractor
   */
  extractTags?: (product: RuleInput) => string[];
}

/**
 * Case-insensitive merge keeping first spelling and order, capped at max
 */
export function mergeTags(primary: string[], secondary: string[], max: number): string[] {
  const seen = new Set<string>();
  const merged: string[] = [];

  for (const tag of [...primary, ...secondary]) {
    const key = tag.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    merged.push(tag);
  }

  return merged.slice(0, max);
}

/**
 * Produces a vibe record for a product by rules, model, or both.
 * generate() never rejects; every failure degrades to a cheaper method.
 */
export class VibeGenerator {
  private config: Required<VibeGeneratorConfig>;

  constructor(
    private llm: StructuredVibeGenerator | null,
    config: VibeGeneratorConfig = {}
  ) {
    this.config = {
      maxTags: config.maxTags ?? 12,
      extractTags: config.extractTags ?? extractVibeTags,
    };
  }

  get hasLLM(): boolean {
    return this.llm !== null;
  }

  async generate(product: ProductRow, method: VibeMethod): Promise<ProductVibe> {
    try {
      switch (method) {
        case 'rule_based':
          return this.fromRules(product, 'rule_based');

        case 'llm': {
          const result = await this.tryLLM(product);
          if (!result) return this.fromRules(product, 'rule_based_fallback');
          return this.fromLLM(product, result, result.vibeTags, 'llm');
        }

        case 'hybrid': {
          const ruleTags = this.config.extractTags(product);
          const result = await this.tryLLM(product);
          if (!result) return this.fromRules(product, 'rule_based_fallback', ruleTags);
          return this.fromLLM(product, result, mergeTags(result.vibeTags, ruleTags, Infinity), 'hybrid');
        }
      }
    } catch (error) {
      console.error(`VibeGenerator: generation failed for ${product.productId}`, error);
    }

    try {
      return this.fromRules(product, 'rule_based_error_fallback');
    } catch (error) {
      console.error(`VibeGenerator: rule extraction failed for ${product.productId}`, error);
      return this.build(product, [...vocabulary.defaultTags], 'default_fallback');
    }
  }

  private async tryLLM(product: ProductRow): Promise<LLMVibeResult | null> {
    if (!this.llm) {
      console.warn('VibeGenerator: no language model configured, using rules');
      return null;
    }

    try {
      return await this.llm.generate(product);
    } catch (error) {
      console.warn(`VibeGenerator: model generation failed for ${product.productId}, using rules`, error);
      return null;
    }
  }

  private fromRules(
    product: ProductRow,
    method: GenerationMethod,
    tags: string[] = this.config.extractTags(product)
  ): ProductVibe {
    return this.build(product, tags, method);
  }

  private fromLLM(
    product: ProductRow,
    result: LLMVibeResult,
    tags: string[],
    method: GenerationMethod
  ): ProductVibe {
    return {
      productId: product.productId,
      vibeTags: mergeTags(tags, [], this.config.maxTags),
      moodSummary: result.moodSummary,
      idealFor: result.idealFor,
      stylingTip: result.stylingTip,
      occasions: result.occasions,
      category: result.category,
      subcategory: result.subcategory,
      materials: result.materials,
      hasEmbellishment: result.hasEmbellishment,
      styleAttributes: result.styleAttributes,
      silhouette: result.silhouette,
      generationMethod: method,
      createdAt: new Date().toISOString(),
    };
  }

  private build(product: ProductRow, tags: string[], method: GenerationMethod): ProductVibe {
    return {
      productId: product.productId,
      vibeTags: mergeTags(tags, [], this.config.maxTags),
      moodSummary: '',
      idealFor: '',
      stylingTip: '',
      occasions: [],
      ...inferAttributes(product),
      generationMethod: method,
      createdAt: new Date().toISOString(),
    };
  }
}
