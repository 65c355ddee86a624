import { logger } from '../../utils/logger.js';
import {
  ExtractionError,
  ModelUnavailableError,
  PipelineTimeoutError,
  UnsupportedMediaError,
  errorMessage,
} from '../../utils/errors.js';
import { callWithTimeout, deadlineError, isTransient, withRetry } from '../../utils/async.js';
import { canonicalKey, collapseWhitespace } from '../../utils/text.js';
import { getSchema, resolveField, type DocumentSchema } from '../../domain/documents/schemas.js';
import type { DocumentType } from '../../domain/documents/DocumentType.js';
import type { ExtractedField, ExtractionResult, PageIssue, RawDocument } from '../../domain/verification/types.js';
import type { PageImage, RoleHint } from '../../types/extraction.types.js';
import type { LayoutModel } from './LayoutModel.interface.js';
import type { PageRasterizer } from './PdfRasterizer.js';
import { resolveMediaKind } from './media.js';

export interface FieldExtractorOptions {
  callTimeoutMs: number;
  minConfidence: number;
  maxPages: number;
  rasterDpi: number;
  retryDelayMs?: number;
}

export class FieldExtractor {
  constructor(
    private layoutModel: LayoutModel,
    private rasterizer: PageRasterizer,
    private options: FieldExtractorOptions
  ) {}

  testConnection(): Promise<boolean> {
    return this.layoutModel.testConnection();
  }

  async extract(document: RawDocument, documentType: DocumentType, signal?: AbortSignal): Promise<ExtractionResult> {
    const media = resolveMediaKind(document.mediaType);
    if (!media) {
      throw new UnsupportedMediaError(`Unsupported media type: ${document.mediaType}`, {
        mediaType: document.mediaType,
        fileName: document.fileName,
      });
    }
    if (document.content.length === 0) {
      throw new ExtractionError('Document is empty', { fileName: document.fileName });
    }

    const schema = getSchema(documentType);
    const pages =
      media.kind === 'pdf'
        ? await this.rasterize(document, signal)
        : [{ page: 1, image: document.content, mediaType: media.pageType ?? 'image/png' } satisfies PageImage];

    if (pages.length === 0) {
      throw new ExtractionError('PDF has no pages', { fileName: document.fileName });
    }

    const roles: RoleHint[] = schema.fields.map(f => ({ role: f.name, description: f.description }));
    const fields: ExtractedField[] = [];
    const pageIssues: PageIssue[] = [];
    let lastFailure: unknown = null;

    for (const page of pages) {
      try {
        const pageFields = await this.analyzePage(page, documentType, schema, roles, signal);
        fields.push(...pageFields);
      } catch (error) {
        if (error instanceof PipelineTimeoutError) {
          throw error;
        }
        logger.warn({ page: page.page, error: errorMessage(error) }, 'Page extraction failed');
        pageIssues.push({ kind: 'page', page: page.page, reason: errorMessage(error) });
        lastFailure = error;
      }
    }

    if (pageIssues.length === pages.length) {
      if (lastFailure instanceof ExtractionError) {
        throw lastFailure;
      }
      throw new ExtractionError(`Layout model failed: ${errorMessage(lastFailure)}`, lastFailure);
    }

    logger.debug(
      { documentType, pageCount: pages.length, fieldCount: fields.length, failedPages: pageIssues.length },
      'Field extraction complete'
    );

    return { fields, pageIssues, pageCount: pages.length };
  }

  private async rasterize(document: RawDocument, signal?: AbortSignal): Promise<PageImage[]> {
    try {
      return await this.rasterizer.rasterize(document.content, {
        dpi: this.options.rasterDpi,
        maxPages: this.options.maxPages,
      });
    } catch (error) {
      if (signal?.aborted) {
        throw deadlineError(signal);
      }
      throw new ExtractionError(`Failed to rasterize PDF: ${errorMessage(error)}`, error);
    }
  }

  private async analyzePage(
    page: PageImage,
    documentType: DocumentType,
    schema: DocumentSchema,
    roles: RoleHint[],
    signal?: AbortSignal
  ): Promise<ExtractedField[]> {
    const response = await withRetry(
      () =>
        callWithTimeout(s => this.layoutModel.analyzePage({ documentType, page, roles }, s), {
          timeoutMs: this.options.callTimeoutMs,
          signal,
          label: `${this.layoutModel.name} (page ${page.page})`,
        }),
      {
        retries: 1,
        initialDelayMs: this.options.retryDelayMs ?? 250,
        shouldRetry: isTransient,
        signal,
        onRetry: (error, attempt) =>
          logger.warn({ page: page.page, attempt, error: errorMessage(error) }, 'Retrying layout model call'),
      }
    ).catch((error: unknown) => {
      if (signal?.aborted) {
        throw deadlineError(signal);
      }
      if (error instanceof ModelUnavailableError) {
        throw new ExtractionError(`Layout model unavailable: ${error.message}`, error);
      }
      throw error;
    });

    const extracted: ExtractedField[] = [];
    for (const span of response.spans) {
      const text = collapseWhitespace(span.text);
      if (text.length === 0 || span.confidence < this.options.minConfidence) {
        continue;
      }
      if (!resolveField(schema, span.role)) {
        continue;
      }
      extracted.push({
        name: canonicalKey(span.role),
        text,
        location: { page: page.page, box: span.box },
        confidence: span.confidence,
      });
    }

    logger.debug(
      { page: page.page, spans: response.spans.length, kept: extracted.length, model: response.metadata.modelUsed },
      'Page analyzed'
    );

    return extracted;
  }
}
