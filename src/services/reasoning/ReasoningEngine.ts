import { logger } from '../../utils/logger.js';
import {
  PipelineError,
  ReasoningBackendError,
  ReasoningParseError,
  errorMessage,
} from '../../utils/errors.js';
import { callWithTimeout, deadlineError, isTransient, withRetry } from '../../utils/async.js';
import type { DocumentType } from '../../domain/documents/DocumentType.js';
import type { NormalizedRecord, ReasoningVerdict } from '../../domain/verification/types.js';
import type { ReasoningBackend, ReasoningResponse } from '../llm/ReasoningBackend.interface.js';
import { buildReasoningPrompts } from '../llm/prompts/index.js';
import { parseVerdict } from './VerdictParser.js';

export interface ReasoningEngineOptions {
  callTimeoutMs: number;
  retryDelayMs?: number;
}

export class ReasoningEngine {
  constructor(
    private backend: ReasoningBackend,
    private options: ReasoningEngineOptions
  ) {}

  testConnection(): Promise<boolean> {
    return this.backend.testConnection();
  }

  async assess(record: NormalizedRecord, documentType: DocumentType, signal?: AbortSignal): Promise<ReasoningVerdict> {
    const { systemPrompt, userPrompt } = buildReasoningPrompts(documentType, record);
    const response = await this.complete({ documentType, systemPrompt, userPrompt }, signal);

    const parsed = parseVerdict(response.text);
    if (parsed.kind === 'unparseable') {
      logger.warn({ documentType, backend: this.backend.name, reason: parsed.reason }, 'Unparseable reasoning response');
      throw new ReasoningParseError(parsed.reason, { preview: response.text.slice(0, 200) });
    }

    logger.debug(
      {
        documentType,
        strategy: parsed.kind,
        benefits: parsed.benefits.length,
        risks: parsed.risks.length,
        model: response.metadata.modelUsed,
      },
      'Reasoning verdict parsed'
    );

    return { benefits: parsed.benefits, risks: parsed.risks, strategy: parsed.kind };
  }

  private complete(
    request: { documentType: DocumentType; systemPrompt: string; userPrompt: string },
    signal?: AbortSignal
  ): Promise<ReasoningResponse> {
    return withRetry(
      () =>
        callWithTimeout(s => this.backend.complete(request, s), {
          timeoutMs: this.options.callTimeoutMs,
          signal,
          label: `${this.backend.name} backend`,
        }),
      {
        retries: 1,
        initialDelayMs: this.options.retryDelayMs ?? 250,
        shouldRetry: isTransient,
        signal,
        onRetry: (error, attempt) =>
          logger.warn({ backend: this.backend.name, attempt, error: errorMessage(error) }, 'Retrying reasoning call'),
      }
    ).catch((error: unknown) => {
      if (signal?.aborted) {
        throw deadlineError(signal);
      }
      if (error instanceof PipelineError) {
        throw error;
      }
      throw new ReasoningBackendError(`Reasoning backend failed: ${errorMessage(error)}`, error);
    });
  }
}
