// ============================================================================
// Catalog Types
// ============================================================================

/**
 * Raw product row as it arrives from a batch import (CSV or similar)
 */
export interface ProductRow {
  productId: string;
  name: string;
  type: string;
  description: string;
  colors: string;
  material: string;
  priceMin: number;
  priceMax: number;
  currency: string;
  url: string;
  imageUrl: string;
}

export interface Product extends ProductRow {
  contentHash: string;
  createdAt: string;
  updatedAt: string;
}

export type VibeMethod = 'rule_based' | 'llm' | 'hybrid';

export type GenerationMethod =
  | VibeMethod
  | 'rule_based_fallback'
  | 'rule_based_error_fallback'
  | 'default_fallback';

/**
 * Structured attributes shared by rule-based inference and LLM output
 */
export interface VibeAttributes {
  category: string;
  subcategory: string;
  materials: string[];
  hasEmbellishment: boolean;
  styleAttributes: string[];
  silhouette: string;
}

export interface ProductVibe extends VibeAttributes {
  productId: string;
  vibeTags: string[];
  moodSummary: string;
  idealFor: string;
  stylingTip: string;
  occasions: string[];
  generationMethod: GenerationMethod;
  createdAt: string;
}

/**
 * A store record paired with its similarity to a query.
 * similarity = 1 - cosine distance, so it can be negative.
 */
export interface ScoredRecord<T> {
  record: T;
  similarity: number;
}

// ============================================================================
// Search Types
// ============================================================================

export interface SearchOptions {
  searchProducts?: boolean;
  searchVibes?: boolean;
  productType?: string;
}

export interface SearchResult {
  productId: string;
  productName: string;
  productType: string;
  priceMin: number;
  priceMax: number;
  currency: string;
  productUrl: string;
  imageUrl: string;
  vibeTags: string[];
  moodSummary: string;
  productSimilarity: number;
  vibeSimilarity: number;
  combinedScore: number;
}

// ============================================================================
// Processing Types
// ============================================================================

export interface ChangeSet {
  newRows: ProductRow[];
  updatedRows: ProductRow[];
  unchangedRows: ProductRow[];
}

export interface ProcessOptions {
  forceRegenerate?: boolean;
  method?: VibeMethod;
}

export interface ProcessingStats {
  total: number;
  newProducts: number;
  updatedProducts: number;
  unchangedProducts: number;
  vibesGenerated: number;
  vibesSkipped: number;
  errors: number;
  processingTimeMs: number;
}

/**
 * Product merged with its vibes, as written by the catalog export
 */
export interface EnrichedProduct extends Product, VibeAttributes {
  vibeTags: string[];
  moodSummary: string;
  idealFor: string;
  stylingTip: string;
  occasions: string[];
}

// ============================================================================
// Order & Stock Types
// ============================================================================

export type OrderStatus =
  | 'pending'
  | 'confirmed'
  | 'processing'
  | 'shipped'
  | 'delivered'
  | 'cancelled'
  | 'refunded';

export type StockStatus = 'in_stock' | 'low_stock' | 'out_of_stock';

export interface StockVariant {
  size: string;
  color: string;
  quantity: number;
  status: StockStatus;
}

export interface StockRecord {
  productId: string;
  productName: string;
  variants: StockVariant[];
  totalInventory: number;
  lastUpdated: string;
  version: number;
}

export interface OrderItemInput {
  productId: string;
  productName?: string;
  size: string;
  color: string;
  quantity: number;
  price: number;
}

export interface OrderItem {
  productId: string;
  productName: string;
  size: string;
  color: string;
  quantity: number;
  price: number;
  subtotal: number;
}

export interface OrderHistoryEntry {
  action: string;
  timestamp: string;
  details: string;
}

export interface Order {
  orderId: string;
  customerName: string;
  customerEmail: string;
  items: OrderItem[];
  totalAmount: number;
  currency: string;
  shippingAddress: string;
  notes: string;
  status: OrderStatus;
  createdAt: string;
  updatedAt: string;
  history: OrderHistoryEntry[];
}

export interface CreateOrderInput {
  customerName: string;
  customerEmail: string;
  items: OrderItemInput[];
  shippingAddress?: string;
  notes?: string;
  currency?: string;
}

export interface OrderUpdates {
  items?: OrderItemInput[];
  shippingAddress?: string;
  notes?: string;
  status?: OrderStatus;
}

export interface StockCheck {
  available: boolean;
  currentQuantity: number;
}

// ============================================================================
// Operation Results
// ============================================================================

export type RejectionKind =
  | 'validation'
  | 'insufficient_stock'
  | 'not_found'
  | 'invalid_state'
  | 'invalid_transition'
  | 'conflict'
  | 'storage';

export interface Rejection {
  kind: RejectionKind;
  message: string;
  details?: Record<string, unknown>;
}

/**
 * Expected business outcomes come back as values; only faults throw.
 */
export type OperationResult<T> =
  | { ok: true; value: T; message: string }
  | { ok: false; error: Rejection };

// ============================================================================
// Error Types
// ============================================================================

export class VibeCartError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'VibeCartError';
  }
}

export class StorageError extends VibeCartError {
  constructor(message: string, cause?: unknown) {
    super(`Storage error: ${message}`, { cause });
    this.name = 'StorageError';
  }
}

export class ConcurrencyConflictError extends VibeCartError {
  constructor(key: string) {
    super(`Concurrent modification detected: ${key}`);
    this.name = 'ConcurrencyConflictError';
  }
}

export class ProviderNotFoundError extends VibeCartError {
  constructor(provider: string) {
    super(`Provider not configured: ${provider}`);
    this.name = 'ProviderNotFoundError';
  }
}

export class InvalidConfigError extends VibeCartError {
  constructor(message: string) {
    super(`Invalid configuration: ${message}`);
    this.name = 'InvalidConfigError';
  }
}

export class VibeGenerationError extends VibeCartError {
  constructor(productId: string, reason: string, cause?: unknown) {
    super(`Vibe generation failed for ${productId}: ${reason}`, { cause });
    this.name = 'VibeGenerationError';
  }
}
