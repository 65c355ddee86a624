import OpenAI from 'openai';
import { ModelUnavailableError } from '../../utils/errors.js';

export interface OpenAIClientSettings {
  apiKey: string;
  baseUrl?: string;
  timeoutMs: number;
}

const OPENROUTER_BASE_URL = 'https://openrouter.ai/api/v1';
const OLLAMA_BASE_URL = 'http://localhost:11434/v1';

export const DEFAULT_BASE_URLS = {
  openrouter: OPENROUTER_BASE_URL,
  ollama: OLLAMA_BASE_URL,
} as const;

export class OpenAIClientFactory {
  /**
   * One client per pipeline. SDK retries are off: retry policy belongs to the
   * stage that owns the call.
   */
  static create(settings: OpenAIClientSettings): OpenAI {
    return new OpenAI({
      apiKey: settings.apiKey,
      baseURL: settings.baseUrl,
      timeout: settings.timeoutMs,
      maxRetries: 0,
    });
  }

  /** Maps SDK failures onto the retryable / terminal split the stages use. */
  static toModelError(error: unknown, label: string): unknown {
    if (error instanceof OpenAI.APIUserAbortError) {
      return error;
    }
    if (error instanceof OpenAI.APIConnectionError) {
      return new ModelUnavailableError(`${label} unreachable: ${error.message}`, error);
    }
    if (error instanceof OpenAI.APIError && (error.status === 429 || (error.status ?? 0) >= 500)) {
      return new ModelUnavailableError(`${label} returned ${error.status}`, error);
    }
    return error;
  }
}
