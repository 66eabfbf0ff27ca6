import { createAnthropicClient } from './anthropic.js';
import type { ProviderSettings } from './config.js';
import { ConfigurationError } from './errors.js';
import { AnthropicProvider, OpenRouterProvider } from './llm-provider.js';
import type { LLMProvider } from './llm-provider.js';
import { PerplexityClient } from './perplexity.js';

/**
 * Provider handles for one process. Built once at startup and passed into
 * every run; nothing here is a module-level singleton.
 */
export interface ServiceClients {
  llm: LLMProvider;
  /** Absent when no Perplexity key is configured; discovery then uses `llm`. */
  perplexity: PerplexityClient | null;
  models: {
    generation: string;
    extraction: string;
  };
  maxTokens: number;
}

export function createLLMProvider(settings: ProviderSettings): LLMProvider {
  if (settings.llmProvider === 'openrouter') {
    if (!settings.openRouterApiKey) {
      throw new ConfigurationError('OPENROUTER_API_KEY is required when LLM_PROVIDER=openrouter');
    }
    return new OpenRouterProvider({ apiKey: settings.openRouterApiKey, baseUrl: settings.openRouterBaseUrl });
  }

  if (!settings.anthropicApiKey) {
    throw new ConfigurationError('ANTHROPIC_API_KEY is required when LLM_PROVIDER=anthropic');
  }
  return new AnthropicProvider(createAnthropicClient(settings.anthropicApiKey));
}

export function createServiceClients(settings: ProviderSettings): ServiceClients {
  return {
    llm: createLLMProvider(settings),
    perplexity: settings.perplexityApiKey
      ? new PerplexityClient(settings.perplexityApiKey, settings.perplexityModel)
      : null,
    models: {
      generation: settings.generationModel,
      extraction: settings.extractionModel,
    },
    maxTokens: settings.maxTokens,
  };
}
