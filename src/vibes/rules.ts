import { z } from 'zod';
import type { ProductRow, VibeAttributes } from '../types';
import vocabularyData from './vocabulary.json';

const VibeMapSchema = z.record(z.array(z.string()));

const VocabularySchema = z.object({
  vibeKeywords: z.object({
    occasions: VibeMapSchema,
    moods: VibeMapSchema,
    seasons: VibeMapSchema,
    styles: VibeMapSchema,
  }),
  materialVibes: VibeMapSchema,
  colorVibes: VibeMapSchema,
  productTypeVibes: VibeMapSchema,
  typeFallbackTags: VibeMapSchema,
  defaultTags: z.array(z.string()),
  embellishmentKeywords: z.array(z.string()),
  knownMaterials: z.array(z.string()),
});

export type Vocabulary = z.infer<typeof VocabularySchema>;
export type VibeCategory = keyof Vocabulary['vibeKeywords'];

export const vocabulary: Vocabulary = VocabularySchema.parse(vocabularyData);

/**
 * Every keyword-scored vibe, in category order
 */
const VIBE_KEYWORDS: Array<[string, string[]]> = Object.values(vocabulary.vibeKeywords).flatMap(
  (group) => Object.entries(group)
);

export type RuleInput = Pick<ProductRow, 'name' | 'type' | 'description' | 'colors' | 'material'>;

const MAX_RULE_TAGS = 8;
const MIN_RULE_TAGS = 3;
const MIN_TAG_SCORE = 0.3;

// ============================================================================
// Scoring
// ============================================================================

export function scoreVibesFromText(text: string, weight: number = 1): Map<string, number> {
  const scores = new Map<string, number>();
  if (!text) return scores;

  const lower = text.toLowerCase();
  for (const [vibe, keywords] of VIBE_KEYWORDS) {
    const matches = keywords.filter((keyword) => lower.includes(keyword)).length;
    if (matches > 0) {
      scores.set(vibe, Math.min(1, matches * 0.3) * weight);
    }
  }
  return scores;
}

function scoreFromMap(text: string, map: Record<string, string[]>, score: number): Map<string, number> {
  const scores = new Map<string, number>();
  if (!text) return scores;

  const lower = text.toLowerCase();
  for (const [key, vibes] of Object.entries(map)) {
    if (lower.includes(key)) {
      for (const vibe of vibes) {
        scores.set(vibe, Math.max(scores.get(vibe) ?? 0, score));
      }
    }
  }
  return scores;
}

export function scoreVibesFromMaterial(material: string): Map<string, number> {
  return scoreFromMap(material, vocabulary.materialVibes, 0.8);
}

export function scoreVibesFromColors(colors: string): Map<string, number> {
  return scoreFromMap(colors, vocabulary.colorVibes, 0.6);
}

export function scoreVibesFromType(productType: string): Map<string, number> {
  return scoreFromMap(productType, vocabulary.productTypeVibes, 0.4);
}

/**
 * Best score per vibe across description, name, material, colours and type
 */
function collectScores(product: RuleInput): Map<string, number> {
  const all = new Map<string, number>();
  const sources = [
    scoreVibesFromText(product.description, 1.5),
    scoreVibesFromText(product.name, 1.2),
    scoreVibesFromMaterial(product.material),
    scoreVibesFromColors(product.colors),
    scoreVibesFromType(product.type),
  ];

  for (const source of sources) {
    for (const [vibe, score] of source) {
      all.set(vibe, Math.max(all.get(vibe) ?? 0, score));
    }
  }
  return all;
}

/**
 * Vibe scores normalised so the strongest vibe is 1
 */
export function getVibeScores(product: RuleInput): Record<string, number> {
  const scores = collectScores(product);
  const max = Math.max(0, ...scores.values());
  if (max === 0) return {};

  return Object.fromEntries(Array.from(scores, ([vibe, score]) => [vibe, score / max]));
}

// ============================================================================
// Extraction
// ============================================================================

/**
 * Deterministic vibe tags for a product, strongest first.
 * Always returns at least three tags, padded from the default tags.
 */
export function extractVibeTags(product: RuleInput): string[] {
  const tags = Array.from(collectScores(product))
    .sort((a, b) => b[1] - a[1])
    .slice(0, MAX_RULE_TAGS)
    .filter(([, score]) => score > MIN_TAG_SCORE)
    .map(([vibe]) => vibe);

  for (const fallback of vocabulary.defaultTags) {
    if (tags.length >= MIN_RULE_TAGS) break;
    if (!tags.includes(fallback)) tags.push(fallback);
  }

  return tags;
}

/**
 * Structural attributes inferred from the product text alone
 */
export function inferAttributes(product: RuleInput): VibeAttributes {
  const type = product.type.toLowerCase();
  const name = product.name.toLowerCase();
  const mentions = (words: string[]) =>
    words.some((word) => type.includes(word) || name.includes(word));

  let category = 'Clothing';
  let subcategory = 'Dress';

  if (mentions(['heel', 'sandal', 'shoe', 'pump'])) {
    category = 'Footwear';
    subcategory = 'Heel';
  } else if (mentions(['bag', 'clutch', 'tote'])) {
    category = 'Accessories';
    subcategory = 'Bag';
  } else if (mentions(['jumpsuit'])) {
    subcategory = 'Jumpsuit';
  } else if (type.includes('top') || type.includes('blouse')) {
    subcategory = 'Top';
  } else if (type.includes('set')) {
    subcategory = 'Set';
  }

  const material = product.material.toLowerCase();
  const materials = vocabulary.knownMaterials.filter((known) => material.includes(known));

  const text = `${name} ${product.description.toLowerCase()} ${material}`;
  const hasEmbellishment = vocabulary.embellishmentKeywords.some((keyword) => text.includes(keyword));

  return {
    category,
    subcategory,
    materials,
    hasEmbellishment,
    styleAttributes: [],
    silhouette: '',
  };
}

/**
 * Normalise model-produced tags: trimmed, lower-case, 2-50 chars, unique.
 * Short lists are padded from the product type's fallback tags.
 */
export function cleanTags(tags: string[], productType: string, minTags: number = 5): string[] {
  const seen = new Set<string>();
  const cleaned: string[] = [];

  for (const raw of tags) {
    const tag = raw.trim().toLowerCase();
    if (tag.length < 2 || tag.length > 50 || seen.has(tag)) continue;
    seen.add(tag);
    cleaned.push(tag);
  }

  const fallbacks =
    vocabulary.typeFallbackTags[productType.toLowerCase()] ?? vocabulary.typeFallbackTags.dress;

  for (const tag of fallbacks) {
    if (cleaned.length >= minTags) break;
    if (!seen.has(tag)) {
      seen.add(tag);
      cleaned.push(tag);
    }
  }

  return cleaned;
}

// ============================================================================
// Vocabulary Helpers
// ============================================================================

export function getAllVibes(): string[] {
  return VIBE_KEYWORDS.map(([vibe]) => vibe);
}

export function getVibesByCategory(): Record<VibeCategory, string[]> {
  const { occasions, moods, seasons, styles } = vocabulary.vibeKeywords;
  return {
    occasions: Object.keys(occasions),
    moods: Object.keys(moods),
    seasons: Object.keys(seasons),
    styles: Object.keys(styles),
  };
}

/**
 * Vibes sharing at least two keywords with the given vibe
 */
export function findRelatedVibes(vibe: string): string[] {
  const entry = VIBE_KEYWORDS.find(([name]) => name === vibe);
  if (!entry) return [];

  const keywords = new Set(entry[1]);
  return VIBE_KEYWORDS.filter(
    ([other, otherKeywords]) =>
      other !== vibe && otherKeywords.filter((keyword) => keywords.has(keyword)).length >= 2
  ).map(([other]) => other);
}
