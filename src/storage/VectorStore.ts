import type { ZodType } from 'zod';

// ============================================================================
// Embedding Provider
// ============================================================================

/**
 * Maps text to a fixed-dimension vector
 */
export interface EmbeddingProvider {
  embed(text: string): Promise<number[]>;
  embedMany(texts: string[]): Promise<number[][]>;
}

// ============================================================================
// Vector Collection Types
// ============================================================================

export type MetadataValue = string | number | boolean;

/**
 * Exact-match filter on top-level metadata fields
 */
export type MetadataFilter = Record<string, MetadataValue>;

export interface VectorRecordInput<M> {
  id: string;
  document: string;
  metadata: M;
}

export interface VectorRecord<M> extends VectorRecordInput<M> {
  updatedAt: Date;
}

export interface VectorMatch<M> {
  id: string;
  document: string;
  metadata: M;
  /**
   * Cosine distance in [0, 2]; 0 means identical direction
   */
  distance: number;
}

/**
 * A named namespace of embedded documents.
 * Metadata is validated against the collection schema on every read.
 */
export interface VectorCollection<M> {
  readonly name: string;

  upsert(records: VectorRecordInput<M>[]): Promise<void>;
  get(ids: string[]): Promise<VectorRecord<M>[]>;
  query(text: string, k: number, filter?: MetadataFilter): Promise<VectorMatch<M>[]>;
  listIds(): Promise<string[]>;
  count(): Promise<number>;
  delete(ids: string[]): Promise<number>;
  clear(): Promise<void>;
}

export interface VectorStore {
  collection<M>(name: string, schema: ZodType<M>): VectorCollection<M>;

  /**
   * Close the underlying connection (if applicable)
   */
  close(): Promise<void>;
}

/**
 * Calculate cosine similarity between two vectors
 */
export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length) {
    throw new Error('Vectors must have the same length');
  }

  let dotProduct = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    dotProduct += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  normA = Math.sqrt(normA);
  normB = Math.sqrt(normB);

  if (normA === 0 || normB === 0) {
    return 0;
  }

  return dotProduct / (normA * normB);
}
