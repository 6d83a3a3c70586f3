import { generateObject } from 'ai';
import { z } from 'zod';
import type { LLMConfig } from '../config';
import type { ProviderFactory } from '../providers';
import { VibeGenerationError, type ProductRow, type VibeAttributes } from '../types';
import { cleanTags } from './rules';

export const LLMVibeSchema = z.object({
  vibeTags: z.array(z.string()).describe('6-10 specific, occasion-based vibe tags'),
  moodSummary: z.string().describe('1-2 evocative sentences'),
  idealFor: z.string().describe('Who this piece is perfect for'),
  stylingTip: z.string().describe('Practical styling advice'),
  occasions: z.array(z.string()).describe('3-6 suitable occasions'),
  category: z.string().describe('Clothing, Footwear or Accessories'),
  subcategory: z.string().describe('Dress, Heel, Bag, Top, Jumpsuit, Set, ...'),
  materials: z.array(z.string()),
  hasEmbellishment: z.boolean().describe('true for sequins, beads, rhinestones, crystals, glitter'),
  styleAttributes: z.array(z.string()).describe('Neckline, sleeves, fit, length, back style'),
  silhouette: z.string().describe('A-line, bodycon, empire, fit-and-flare, straight, mermaid'),
});

export interface LLMVibeResult extends VibeAttributes {
  vibeTags: string[];
  moodSummary: string;
  idealFor: string;
  stylingTip: string;
  occasions: string[];
}

export interface GenerateOptions {
  abortSignal?: AbortSignal;
}

/**
 * Structured vibe generation backed by a language model
 */
export interface StructuredVibeGenerator {
  generate(product: ProductRow, options?: GenerateOptions): Promise<LLMVibeResult>;
}

const SYSTEM_PROMPT = `You are a fashion stylist writing product metadata for a boutique.
Vibe tags must be granular and occasion-based, for example "wedding guest", "office chic",
"figure flattering", "day to night", "autumn elegance". Avoid generic words like "nice" or "pretty".`;

export type LLMVibeGeneratorConfig = Pick<
  LLMConfig,
  'provider' | 'model' | 'timeoutMs' | 'maxRetries' | 'temperature'
>;

export class LLMVibeGenerator implements StructuredVibeGenerator {
  constructor(
    private providers: ProviderFactory,
    private config: LLMVibeGeneratorConfig
  ) {}

  async generate(product: ProductRow, options: GenerateOptions = {}): Promise<LLMVibeResult> {
    const model = await this.providers.getModel(this.config.provider, this.config.model);

    let object: z.infer<typeof LLMVibeSchema>;
    try {
      ({ object } = await generateObject({
        model,
        schema: LLMVibeSchema,
        system: SYSTEM_PROMPT,
        prompt: this.buildPrompt(product),
        temperature: this.config.temperature,
        maxRetries: this.config.maxRetries,
        abortSignal: options.abortSignal ?? AbortSignal.timeout(this.config.timeoutMs),
      }));
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new VibeGenerationError(product.productId, reason, error);
    }

    return {
      ...object,
      vibeTags: cleanTags(object.vibeTags, product.type),
    };
  }

  private buildPrompt(product: ProductRow): string {
    return [
      'Generate complete metadata for this fashion product.',
      '',
      `Product: ${product.name}`,
      `Type: ${product.type}`,
      `Colors: ${product.colors}`,
      `Material: ${product.material}`,
      `Price: ${product.priceMin} ${product.currency}`,
      `Description: ${product.description}`,
    ].join('\n');
  }
}
