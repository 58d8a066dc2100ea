import { LLMPort } from '../../application/ports/LLMPort';
import { LLMProvider } from '../../domain/config/AppConfig';
import { ConfigurationError } from '../../domain/errors/AppErrors';
import { AnthropicAdapter } from './AnthropicAdapter';
import { RetryPolicy } from './BaseLLMAdapter';
import { GeminiAdapter } from './GeminiAdapter';
import { OpenAIAdapter } from './OpenAIAdapter';
import { loggers } from '../logging';

/**
 * Configuration for creating an LLM adapter.
 */
export interface LLMAdapterFactoryConfig {
  /** Provider to use */
  provider: LLMProvider;
  /** API key */
  apiKey: string;
  /** Model override */
  model?: string;
  /** Per-request timeout */
  timeoutMs?: number;
  retryPolicy?: RetryPolicy;
}

/**
 * Factory for creating LLM adapters based on configuration.
 */
export class LLMAdapterFactory {
  /**
   * Create an LLM adapter based on configuration.
   */
  static create(config: LLMAdapterFactoryConfig): LLMPort {
    if (!config.apiKey.trim()) {
      throw new ConfigurationError(`missing API key for provider ${config.provider}`);
    }
    const options = {
      apiKey: config.apiKey,
      model: config.model,
      timeoutMs: config.timeoutMs,
      retryPolicy: config.retryPolicy,
    };

    let adapter: LLMPort;
    switch (config.provider) {
      case 'anthropic':
        adapter = new AnthropicAdapter(options);
        break;
      case 'openai':
        adapter = new OpenAIAdapter(options);
        break;
      case 'gemini':
        adapter = new GeminiAdapter(options);
        break;
    }

    loggers.llm.info('Decision service ready', { provider: adapter.provider, model: adapter.model });
    return adapter;
  }
}
