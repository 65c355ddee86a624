import { logger } from '../../utils/logger.js';
import type { ReasoningConfig } from '../../config/index.js';
import type { ReasoningBackend } from './ReasoningBackend.interface.js';
import { OpenAIReasoningBackend } from './OpenAIReasoningBackend.js';
import { AnthropicReasoningBackend } from './AnthropicReasoningBackend.js';
import { DEFAULT_BASE_URLS, OpenAIClientFactory } from './OpenAIClientFactory.js';

export class ReasoningBackendFactory {
  /** Builds a fresh backend for one pipeline; nothing is cached between calls. */
  static create(config: ReasoningConfig): ReasoningBackend {
    const settings = {
      model: config.model,
      maxTokens: config.maxTokens,
      temperature: config.temperature,
    };

    switch (config.provider) {
      case 'anthropic':
        logger.info({ model: config.model }, 'Initializing Anthropic reasoning backend');
        return new AnthropicReasoningBackend(config.apiKey, config.callTimeoutMs, settings, config.baseUrl);
      case 'openai':
      case 'openrouter':
      case 'ollama': {
        const baseUrl = config.baseUrl ?? (config.provider === 'openai' ? undefined : DEFAULT_BASE_URLS[config.provider]);
        logger.info({ provider: config.provider, model: config.model, baseUrl }, 'Initializing reasoning backend');
        const client = OpenAIClientFactory.create({
          // Ollama ignores the key but the SDK requires one.
          apiKey: config.apiKey || 'ollama',
          baseUrl,
          timeoutMs: config.callTimeoutMs,
        });
        return new OpenAIReasoningBackend(config.provider, client, settings);
      }
    }
  }
}
