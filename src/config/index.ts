import dotenv from 'dotenv';
import { z } from 'zod';
import { InvalidConfigError } from '../types';

// ============================================================================
// Config Types
// ============================================================================

export type LLMProviderType = 'openai' | 'anthropic' | 'groq' | 'ollama';
export type StorageBackend = 'memory' | 'mongodb';

export interface LLMConfig {
  provider: LLMProviderType;
  model: string;
  apiKey?: string;
  /**
   * Base URL for OpenAI-compatible endpoints (used by ollama)
   */
  baseUrl?: string;
  timeoutMs: number;
  maxRetries: number;
  temperature: number;
}

export interface EmbeddingConfig {
  apiKey?: string;
  model: string;
  cache: {
    enabled: boolean;
    ttl: number; // milliseconds
    maxSize: number;
  };
}

export interface StorageConfig {
  backend: StorageBackend;
  mongoUri: string;
  dbName: string;
  collectionPrefix: string;
  vectorIndexName: string;
}

export interface VibeConfig {
  method: 'rule_based' | 'llm' | 'hybrid';
  maxTags: number;
}

export interface OrderConfig {
  currency: string;
  lowStockThreshold: number;
}

export interface AppConfig {
  llm: LLMConfig;
  embeddings: EmbeddingConfig;
  storage: StorageConfig;
  vibes: VibeConfig;
  orders: OrderConfig;
}

// ============================================================================
// Environment Schema
// ============================================================================

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() !== '' ? value.trim() : undefined));

const EnvSchema = z.object({
  LLM_PROVIDER: z.enum(['openai', 'anthropic', 'groq', 'ollama']).default('openai'),
  LLM_MODEL: optionalString,
  LLM_API_KEY: optionalString,
  LLM_BASE_URL: optionalString,
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(60000),
  LLM_MAX_RETRIES: z.coerce.number().int().min(0).default(3),
  LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.7),
  OPENAI_API_KEY: optionalString,
  ANTHROPIC_API_KEY: optionalString,
  GROQ_API_KEY: optionalString,
  EMBEDDING_MODEL: z.string().default('text-embedding-3-small'),
  EMBEDDING_CACHE_ENABLED: z
    .enum(['true', 'false'])
    .default('true')
    .transform((value) => value === 'true'),
  EMBEDDING_CACHE_TTL_MS: z.coerce.number().int().positive().default(3600000),
  EMBEDDING_CACHE_MAX_SIZE: z.coerce.number().int().positive().default(1000),
  STORAGE_BACKEND: z.enum(['memory', 'mongodb']).default('memory'),
  MONGODB_URI: z.string().default('mongodb://localhost:27017'),
  MONGODB_DB_NAME: z.string().default('vibecart'),
  COLLECTION_PREFIX: z.string().regex(/^[a-z0-9_]+$/i).default('vibecart'),
  VECTOR_INDEX_NAME: z.string().default('vector_index'),
  VIBE_METHOD: z.enum(['rule_based', 'llm', 'hybrid']).default('hybrid'),
  VIBE_MAX_TAGS: z.coerce.number().int().min(3).max(50).default(12),
  DEFAULT_CURRENCY: z.string().length(3).default('MYR'),
  LOW_STOCK_THRESHOLD: z.coerce.number().int().min(0).default(3),
});

type Env = z.infer<typeof EnvSchema>;

const DEFAULT_MODELS: Record<LLMProviderType, string> = {
  openai: 'gpt-4o-mini',
  anthropic: 'claude-3-5-haiku-20241022',
  groq: 'llama-3.3-70b-versatile',
  ollama: 'llama3.1',
};

function providerApiKey(env: Env): string | undefined {
  if (env.LLM_API_KEY) return env.LLM_API_KEY;

  switch (env.LLM_PROVIDER) {
    case 'openai':
      return env.OPENAI_API_KEY;
    case 'anthropic':
      return env.ANTHROPIC_API_KEY;
    case 'groq':
      return env.GROQ_API_KEY;
    case 'ollama':
      return undefined;
  }
}

// ============================================================================
// Loader
// ============================================================================

export interface LoadConfigOptions {
  /**
   * Variables to read; defaults to process.env
   */
  env?: Record<string, string | undefined>;

  /**
   * .env file loaded into process.env before reading.
   * Ignored when `env` is given.
   */
  envFile?: string;
}

/**
 * Build the application config once at startup.
 * The returned object is passed explicitly into every component.
 */
export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
  let source = options.env;
  if (!source) {
    dotenv.config(options.envFile ? { path: options.envFile } : undefined);
    source = process.env;
  }

  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new InvalidConfigError(issues);
  }

  const env = parsed.data;

  if (env.LLM_PROVIDER === 'ollama' && !env.LLM_BASE_URL) {
    env.LLM_BASE_URL = 'http://localhost:11434/v1';
  }

  return {
    llm: {
      provider: env.LLM_PROVIDER,
      model: env.LLM_MODEL ?? DEFAULT_MODELS[env.LLM_PROVIDER],
      apiKey: providerApiKey(env),
      baseUrl: env.LLM_BASE_URL,
      timeoutMs: env.LLM_TIMEOUT_MS,
      maxRetries: env.LLM_MAX_RETRIES,
      temperature: env.LLM_TEMPERATURE,
    },
    embeddings: {
      apiKey: env.OPENAI_API_KEY,
      model: env.EMBEDDING_MODEL,
      cache: {
        enabled: env.EMBEDDING_CACHE_ENABLED,
        ttl: env.EMBEDDING_CACHE_TTL_MS,
        maxSize: env.EMBEDDING_CACHE_MAX_SIZE,
      },
    },
    storage: {
      backend: env.STORAGE_BACKEND,
      mongoUri: env.MONGODB_URI,
      dbName: env.MONGODB_DB_NAME,
      collectionPrefix: env.COLLECTION_PREFIX,
      vectorIndexName: env.VECTOR_INDEX_NAME,
    },
    vibes: {
      method: env.VIBE_METHOD,
      maxTags: env.VIBE_MAX_TAGS,
    },
    orders: {
      currency: env.DEFAULT_CURRENCY,
      lowStockThreshold: env.LOW_STOCK_THRESHOLD,
    },
  };
}
