import type { LanguageModel } from 'ai';
import { createOpenAI } from '@ai-sdk/openai';
import type { LLMConfig, LLMProviderType } from '../config';
import { ProviderNotFoundError } from '../types';

export interface ProviderConfig {
  openai?: { apiKey: string };
  anthropic?: { apiKey: string };
  groq?: { apiKey: string };
  ollama?: { baseUrl: string };
}

/**
 * Provider credentials for the single provider selected in LLMConfig
 */
export function providerConfigFromLLM(llm: LLMConfig): ProviderConfig {
  switch (llm.provider) {
    case 'openai':
      return llm.apiKey ? { openai: { apiKey: llm.apiKey } } : {};
    case 'anthropic':
      return llm.apiKey ? { anthropic: { apiKey: llm.apiKey } } : {};
    case 'groq':
      return llm.apiKey ? { groq: { apiKey: llm.apiKey } } : {};
    case 'ollama':
      return { ollama: { baseUrl: llm.baseUrl || 'http://localhost:11434/v1' } };
  }
}

/**
 * Provider factory for creating language model instances
 * Supports OpenAI, Anthropic, Groq and Ollama via the AI SDK
 */
export class ProviderFactory {
  private config: ProviderConfig;
  private modelCache: Map<string, LanguageModel> = new Map();

  constructor(config: ProviderConfig) {
    this.config = config;
  }

  /**
   * Get a language model for the specified provider and model
   */
  async getModel(provider: LLMProviderType, modelName: string): Promise<LanguageModel> {
    const cacheKey = `${provider}:${modelName}`;

    const cached = this.modelCache.get(cacheKey);
    if (cached) {
      return cached;
    }

    let model: LanguageModel;

    switch (provider) {
      case 'openai': {
        if (!this.config.openai?.apiKey) {
          throw new ProviderNotFoundError('openai');
        }
        const openai = createOpenAI({
          apiKey: this.config.openai.apiKey,
        });
        model = openai(modelName);
        break;
      }

      case 'anthropic': {
        if (!this.config.anthropic?.apiKey) {
          throw new ProviderNotFoundError('anthropic');
        }
        const { createAnthropic } = await import('@ai-sdk/anthropic');
        const anthropic = createAnthropic({
          apiKey: this.config.anthropic.apiKey,
        });
        model = anthropic(modelName);
        break;
      }

      case 'groq': {
        if (!this.config.groq?.apiKey) {
          throw new ProviderNotFoundError('groq');
        }
        const { createGroq } = await import('@ai-sdk/groq');
        const groq = createGroq({
          apiKey: this.config.groq.apiKey,
        });
        model = groq(modelName);
        break;
      }

      case 'ollama': {
        if (!this.config.ollama?.baseUrl) {
          throw new ProviderNotFoundError('ollama');
        }
        // Ollama speaks the chat-completions dialect only
        const ollama = createOpenAI({
          baseURL: this.config.ollama.baseUrl,
          apiKey: 'ollama',
        });
        model = ollama.chat(modelName);
        break;
      }

      default:
        throw new ProviderNotFoundError(String(provider));
    }

    this.modelCache.set(cacheKey, model);
    return model;
  }

  /**
   * Check if a provider is configured
   */
  isProviderConfigured(provider: LLMProviderType): boolean {
    switch (provider) {
      case 'openai':
        return !!this.config.openai?.apiKey;
      case 'anthropic':
        return !!this.config.anthropic?.apiKey;
      case 'groq':
        return !!this.config.groq?.apiKey;
      case 'ollama':
        return !!this.config.ollama?.baseUrl;
      default:
        return false;
    }
  }

  /**
   * Get list of configured providers
   */
  getConfiguredProviders(): LLMProviderType[] {
    const providers: LLMProviderType[] = [];

    if (this.config.openai?.apiKey) providers.push('openai');
    if (this.config.anthropic?.apiKey) providers.push('anthropic');
    if (this.config.groq?.apiKey) providers.push('groq');
    if (this.config.ollama?.baseUrl) providers.push('ollama');

    return providers;
  }

  /**
   * Clear the model cache
   */
  clearCache(): void {
    this.modelCache.clear();
  }
}
