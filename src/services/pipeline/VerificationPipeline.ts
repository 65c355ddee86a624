import pLimit from 'p-limit';
import { logger } from '../../utils/logger.js';
import {
  ContractViolationError,
  ExtractionError,
  PipelineError,
  PipelineTimeoutError,
  ReasoningBackendError,
  errorMessage,
} from '../../utils/errors.js';
import { abortable, deadlineError } from '../../utils/async.js';
import { createRequestId } from '../../utils/ids.js';
import { isDocumentType, type DocumentType } from '../../domain/documents/DocumentType.js';
import type {
  NormalizedRecord,
  PipelineIssue,
  RawDocument,
  ReasoningVerdict,
  VerificationRecord,
} from '../../domain/verification/types.js';
import type { Config, PipelineConfig } from '../../config/index.js';
import { FieldExtractor } from '../extraction/FieldExtractor.js';
import { LayoutModelFactory } from '../extraction/LayoutModelFactory.js';
import { PdfJsRasterizer } from '../extraction/PdfRasterizer.js';
import { FieldNormalizer } from '../normalization/FieldNormalizer.js';
import { ReasoningEngine } from '../reasoning/ReasoningEngine.js';
import { ReasoningBackendFactory } from '../llm/ReasoningBackendFactory.js';
import { AssessmentAssembler } from '../assessment/AssessmentAssembler.js';

export interface VerificationRequest {
  documentType: DocumentType;
  document: RawDocument;
  requestId?: string;
}

export interface VerifyOptions {
  /** Caller cancellation, e.g. a client disconnect. */
  signal?: AbortSignal;
}

export interface VerifyManyOptions extends VerifyOptions {
  onResult?: (record: VerificationRecord, index: number) => void;
}

export interface PipelineComponents {
  extractor: FieldExtractor;
  normalizer: FieldNormalizer;
  reasoning: ReasoningEngine;
  assembler: AssessmentAssembler;
}

export interface ConnectionStatus {
  extraction: boolean;
  reasoning: boolean;
}

interface StageOutcome {
  record: NormalizedRecord;
  verdict: ReasoningVerdict | null;
  issues: PipelineIssue[];
}

/** What the stages have produced so far; read when the deadline cuts them off. */
interface StageProgress {
  record: NormalizedRecord;
  issues: PipelineIssue[];
}

type Stage = 'extraction' | 'reasoning';

export class VerificationPipeline {
  constructor(
    private components: PipelineComponents,
    private options: PipelineConfig
  ) {}

  /** Wires fresh clients from config; pipelines never share model handles. */
  static fromConfig(config: Config): VerificationPipeline {
    const extractor = new FieldExtractor(LayoutModelFactory.create(config.extraction), new PdfJsRasterizer(), {
      callTimeoutMs: config.extraction.callTimeoutMs,
      minConfidence: config.extraction.minConfidence,
      maxPages: config.extraction.maxPages,
      rasterDpi: config.extraction.rasterDpi,
    });
    const reasoning = new ReasoningEngine(ReasoningBackendFactory.create(config.reasoning), {
      callTimeoutMs: config.reasoning.callTimeoutMs,
    });

    return new VerificationPipeline(
      { extractor, normalizer: new FieldNormalizer(), reasoning, assembler: new AssessmentAssembler() },
      config.pipeline
    );
  }

  async testConnections(): Promise<ConnectionStatus> {
    const [extraction, reasoning] = await Promise.all([
      this.components.extractor.testConnection(),
      this.components.reasoning.testConnection(),
    ]);
    return { extraction, reasoning };
  }

  /**
   * Runs one document through every stage under a single deadline. Stage
   * failures come back as a `failed` record; only an unknown document type
   * throws.
   */
  async verify(request: VerificationRequest, options: VerifyOptions = {}): Promise<VerificationRecord> {
    if (!isDocumentType(request.documentType)) {
      throw new ContractViolationError(`Unknown document type: ${String(request.documentType)}`);
    }

    const requestId = request.requestId ?? createRequestId('direct');
    const startTime = Date.now();
    const controller = new AbortController();
    const timer = setTimeout(() => {
      controller.abort(new PipelineTimeoutError(`Request exceeded ${this.options.requestTimeoutMs}ms`));
    }, this.options.requestTimeoutMs);
    const onCallerAbort = () => {
      controller.abort(new PipelineTimeoutError('Request was cancelled by the caller', options.signal?.reason));
    };

    if (options.signal?.aborted) {
      onCallerAbort();
    } else {
      options.signal?.addEventListener('abort', onCallerAbort, { once: true });
    }

    const progress: StageProgress = { record: {}, issues: [] };
    let outcome: StageOutcome;
    try {
      outcome = await abortable(this.runStages(request, progress, controller.signal), controller.signal);
    } catch (error) {
      if (!controller.signal.aborted) {
        throw error;
      }
      outcome = {
        record: progress.record,
        verdict: null,
        issues: [...progress.issues, { kind: 'stage', error: deadlineError(controller.signal) }],
      };
    } finally {
      clearTimeout(timer);
      options.signal?.removeEventListener('abort', onCallerAbort);
    }

    const record = this.components.assembler.assemble(
      request.documentType,
      outcome.record,
      outcome.verdict,
      outcome.issues
    );

    logger.info(
      {
        requestId,
        documentType: request.documentType,
        fileName: request.document.fileName,
        status: record.status,
        failure: record.failure?.reason,
        degraded: record.degradedFields.length,
        durationMs: Date.now() - startTime,
      },
      'Verification complete'
    );

    return record;
  }

  /** Verifies independent documents in parallel; results keep input order. */
  async verifyMany(
    requests: readonly VerificationRequest[],
    options: VerifyManyOptions = {}
  ): Promise<VerificationRecord[]> {
    const limit = pLimit(this.options.concurrency);
    const { onResult, ...verifyOptions } = options;
    return Promise.all(
      requests.map((request, index) =>
        limit(async () => {
          const record = await this.verify(request, verifyOptions);
          onResult?.(record, index);
          return record;
        })
      )
    );
  }

  private async runStages(
    request: VerificationRequest,
    progress: StageProgress,
    signal: AbortSignal
  ): Promise<StageOutcome> {
    const { extractor, normalizer, reasoning } = this.components;
    const issues: PipelineIssue[] = [];
    let record: NormalizedRecord = {};
    let stage: Stage = 'extraction';

    try {
      signal.throwIfAborted();
      const extraction = await extractor.extract(request.document, request.documentType, signal);
      issues.push(...extraction.pageIssues);

      const normalized = normalizer.normalize(extraction.fields, request.documentType);
      record = normalized.record;
      issues.push(...normalized.issues);
      progress.record = record;
      progress.issues = [...issues];

      stage = 'reasoning';
      const verdict = await reasoning.assess(record, request.documentType, signal);
      return { record, verdict, issues };
    } catch (error) {
      if (error instanceof ContractViolationError) {
        throw error;
      }
      const stageError = this.toStageError(error, stage, signal);
      logger.warn({ stage, code: stageError.code, error: stageError.message }, 'Pipeline stage failed');
      issues.push({ kind: 'stage', error: stageError });
      return { record, verdict: null, issues };
    }
  }

  private toStageError(error: unknown, stage: Stage, signal: AbortSignal): PipelineError {
    if (signal.aborted) {
      return deadlineError(signal);
    }
    if (error instanceof PipelineError) {
      return error;
    }
    const message = errorMessage(error);
    return stage === 'extraction'
      ? new ExtractionError(`Extraction failed: ${message}`, error)
      : new ReasoningBackendError(`Reasoning failed: ${message}`, error);
  }
}
