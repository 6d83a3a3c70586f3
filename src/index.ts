import { VibeCart, type VibeCartOverrides } from './core/VibeCart';
import type { AppConfig } from './config';

// Main entry
export { VibeCart } from './core/VibeCart';
export type { VibeCartOverrides } from './core/VibeCart';

// Config
export { loadConfig } from './config';
export type {
  AppConfig,
  EmbeddingConfig,
  LLMConfig,
  LLMProviderType,
  LoadConfigOptions,
  OrderConfig,
  StorageBackend,
  StorageConfig,
  VibeConfig,
} from './config';

// Components
export * from './catalog';
export * from './search';
export * from './vibes';
export * from './storage';
export * from './orders';
export * from './processing';
export { ProviderFactory, providerConfigFromLLM } from './providers';
export type { ProviderConfig } from './providers';
export { KeyedMutex, computeContentHash, generateOrderId } from './utils';

// Types
export type * from './types';

// Errors
export {
  VibeCartError,
  StorageError,
  ConcurrencyConflictError,
  ProviderNotFoundError,
  InvalidConfigError,
  VibeGenerationError,
} from './types';

export function createVibeCart(config: AppConfig, overrides: VibeCartOverrides = {}): VibeCart {
  return new VibeCart(config, overrides);
}
