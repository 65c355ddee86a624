import Anthropic from '@anthropic-ai/sdk';
import { logger } from '../../utils/logger.js';
import { ModelUnavailableError } from '../../utils/errors.js';
import type { ReasoningBackend, ReasoningRequest, ReasoningResponse } from './ReasoningBackend.interface.js';
import type { ChatSettings } from './OpenAIReasoningBackend.js';

export class AnthropicReasoningBackend implements ReasoningBackend {
  readonly name = 'anthropic';
  private client: Anthropic;

  constructor(
    apiKey: string,
    timeoutMs: number,
    private settings: ChatSettings,
    baseUrl?: string
  ) {
    this.client = new Anthropic({ apiKey, baseURL: baseUrl, timeout: timeoutMs, maxRetries: 0 });
  }

  async testConnection(): Promise<boolean> {
    try {
      await this.client.messages.create({
        model: this.settings.model,
        max_tokens: 10,
        messages: [{ role: 'user', content: 'test' }],
      });
      return true;
    } catch {
      return false;
    }
  }

  async complete(request: ReasoningRequest, signal: AbortSignal): Promise<ReasoningResponse> {
    logger.debug(
      { backend: this.name, documentType: request.documentType, promptLength: request.userPrompt.length },
      'Sending reasoning request'
    );

    let message: Anthropic.Message;
    try {
      message = await this.client.messages.create(
        {
          model: this.settings.model,
          max_tokens: this.settings.maxTokens,
          temperature: this.settings.temperature,
          system: request.systemPrompt,
          messages: [{ role: 'user', content: request.userPrompt }],
        },
        { signal }
      );
    } catch (error) {
      throw this.toModelError(error);
    }

    const parts: string[] = [];
    for (const block of message.content) {
      if (block.type === 'text') {
        parts.push(block.text);
      }
    }

    return {
      text: parts.join('\n'),
      metadata: {
        modelUsed: message.model,
        timestamp: new Date().toISOString(),
        tokensUsed: message.usage.input_tokens + message.usage.output_tokens,
      },
    };
  }

  private toModelError(error: unknown): unknown {
    if (error instanceof Anthropic.APIUserAbortError) {
      return error;
    }
    if (error instanceof Anthropic.APIConnectionError) {
      return new ModelUnavailableError(`Anthropic unreachable: ${error.message}`, error);
    }
    if (error instanceof Anthropic.APIError && (error.status === 429 || (error.status ?? 0) >= 500)) {
      return new ModelUnavailableError(`Anthropic returned ${error.status}`, error);
    }
    return error;
  }
}
