import type OpenAI from 'openai';
import { logger } from '../../utils/logger.js';
import type { ReasoningBackend, ReasoningRequest, ReasoningResponse } from './ReasoningBackend.interface.js';
import { OpenAIClientFactory } from './OpenAIClientFactory.js';

export interface ChatSettings {
  model: string;
  maxTokens: number;
  temperature: number;
}

/**
 * Chat-completions backend. Serves OpenAI itself and the compatible
 * endpoints of OpenRouter and Ollama, which differ only by base URL.
 */
export class OpenAIReasoningBackend implements ReasoningBackend {
  constructor(
    readonly name: string,
    private client: OpenAI,
    private settings: ChatSettings
  ) {}

  async testConnection(): Promise<boolean> {
    try {
      await this.client.models.list();
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

    let completion: OpenAI.Chat.Completions.ChatCompletion;
    try {
      completion = await this.client.chat.completions.create(
        {
          model: this.settings.model,
          messages: [
            { role: 'system', content: request.systemPrompt },
            { role: 'user', content: request.userPrompt },
          ],
          temperature: this.settings.temperature,
          max_tokens: this.settings.maxTokens,
        },
        { signal }
      );
    } catch (error) {
      throw OpenAIClientFactory.toModelError(error, `${this.name} backend`);
    }

    const text = completion.choices[0]?.message?.content ?? '';

    return {
      text,
      metadata: {
        modelUsed: completion.model,
        timestamp: new Date().toISOString(),
        tokensUsed: completion.usage?.total_tokens,
      },
    };
  }
}
