import type { AppConfig } from '../config';
import { ProductCatalog } from '../catalog';
import { DataProcessor } from '../processing';
import { MemoryOrderStorage, MongoOrderStorage, OrderManager, OrderSearchIndex } from '../orders';
import type { OrderStorage } from '../orders';
import { ProviderFactory, providerConfigFromLLM } from '../providers';
import { HybridSearchEngine } from '../search';
import {
  MemoryVectorStore,
  MongoDBVectorStore,
  OpenAIEmbeddingProvider,
  type EmbeddingProvider,
  type VectorStore,
} from '../storage';
import { InvalidConfigError } from '../types';
import { LLMVibeGenerator, VibeGenerator, type StructuredVibeGenerator } from '../vibes';

/**
 * Components that replace the ones built from config (tests, custom backends)
 */
export interface VibeCartOverrides {
  embeddings?: EmbeddingProvider;
  vectorStore?: VectorStore;
  orderStorage?: OrderStorage;
  /**
   * Structured vibe generator; null runs rules only
   */
  vibeLLM?: StructuredVibeGenerator | null;
}

/**
 * Wires the catalog, search, ingest and order components from one config
 */
export class VibeCart {
  readonly catalog: ProductCatalog;
  readonly search: HybridSearchEngine;
  readonly processor: DataProcessor;
  readonly orders: OrderManager;
  readonly vibes: VibeGenerator;
  readonly providers: ProviderFactory;

  private vectorStore: VectorStore;
  private orderStorage: OrderStorage;

  constructor(config: AppConfig, overrides: VibeCartOverrides = {}) {
    const prefix = config.storage.collectionPrefix;

    this.vectorStore = overrides.vectorStore ?? this.createVectorStore(config, overrides.embeddings);
    this.orderStorage = overrides.orderStorage ?? this.createOrderStorage(config);

    this.catalog = new ProductCatalog(this.vectorStore, prefix);
    this.search = new HybridSearchEngine(this.catalog.products, this.catalog.vibes);

    this.providers = new ProviderFactory(providerConfigFromLLM(config.llm));
    const llm =
      overrides.vibeLLM !== undefined
        ? overrides.vibeLLM
        : this.createLLMGenerator(config);

    this.vibes = new VibeGenerator(llm, { maxTags: config.vibes.maxTags });
    this.processor = new DataProcessor(this.catalog, this.vibes, {
      method: config.vibes.method,
      defaultCurrency: config.orders.currency,
    });

    this.orders = new OrderManager(
      this.orderStorage,
      new OrderSearchIndex(this.vectorStore, prefix),
      config.orders
    );
  }

  async close(): Promise<void> {
    await Promise.all([this.vectorStore.close(), this.orderStorage.close()]);
  }

  // ============================================================================
  // Private Methods
  // ============================================================================

  private createVectorStore(config: AppConfig, embeddings?: EmbeddingProvider): VectorStore {
    const provider = embeddings ?? this.createEmbeddings(config);

    if (config.storage.backend === 'mongodb') {
      return new MongoDBVectorStore(
        {
          uri: config.storage.mongoUri,
          dbName: config.storage.dbName,
          vectorIndexName: config.storage.vectorIndexName,
        },
        provider
      );
    }
    return new MemoryVectorStore(provider);
  }

  private createEmbeddings(config: AppConfig): EmbeddingProvider {
    if (!config.embeddings.apiKey) {
      throw new InvalidConfigError(
        'Embeddings require OPENAI_API_KEY. Set it or pass an embedding provider override'
      );
    }
    return new OpenAIEmbeddingProvider({
      apiKey: config.embeddings.apiKey,
      model: config.embeddings.model,
      cache: config.embeddings.cache,
    });
  }

  private createOrderStorage(config: AppConfig): OrderStorage {
    if (config.storage.backend === 'mongodb') {
      return new MongoOrderStorage({
        uri: config.storage.mongoUri,
        dbName: config.storage.dbName,
        collectionPrefix: config.storage.collectionPrefix,
      });
    }
    return new MemoryOrderStorage();
  }

  private createLLMGenerator(config: AppConfig): StructuredVibeGenerator | null {
    if (config.vibes.method === 'rule_based') return null;

    if (!this.providers.isProviderConfigured(config.llm.provider)) {
      console.warn(
        `VibeCart: ${config.llm.provider} is not configured, vibes will use rules only`
      );
      return null;
    }
    return new LLMVibeGenerator(this.providers, config.llm);
  }
}
