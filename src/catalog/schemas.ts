import { z } from 'zod';

export const ProductSchema = z.object({
  productId: z.string(),
  name: z.string(),
  type: z.string(),
  description: z.string(),
  colors: z.string(),
  material: z.string(),
  priceMin: z.number(),
  priceMax: z.number(),
  currency: z.string(),
  url: z.string(),
  imageUrl: z.string(),
  contentHash: z.string(),
  createdAt: z.string(),
  updatedAt: z.string(),
});

export const GenerationMethodSchema = z.enum([
  'rule_based',
  'llm',
  'hybrid',
  'rule_based_fallback',
  'rule_based_error_fallback',
  'default_fallback',
]);

export const ProductVibeSchema = z.object({
  productId: z.string(),
  vibeTags: z.array(z.string()),
  moodSummary: z.string(),
  idealFor: z.string(),
  stylingTip: z.string(),
  occasions: z.array(z.string()),
  category: z.string(),
  subcategory: z.string(),
  materials: z.array(z.string()),
  hasEmbellishment: z.boolean(),
  styleAttributes: z.array(z.string()),
  silhouette: z.string(),
  generationMethod: GenerationMethodSchema,
  createdAt: z.string(),
});
