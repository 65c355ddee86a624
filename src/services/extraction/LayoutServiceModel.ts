import axios, { type AxiosInstance } from 'axios';
import { logger } from '../../utils/logger.js';
import { ExtractionError, ModelUnavailableError } from '../../utils/errors.js';
import type { LayoutModel } from './LayoutModel.interface.js';
import type { LayoutAnalysisRequest, LayoutAnalysisResponse } from '../../types/extraction.types.js';
import { parseLayoutPayload } from './layout-response.schema.js';

const TRANSIENT_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ECONNABORTED', 'ETIMEDOUT', 'EAI_AGAIN']);

/**
 * Client for a self-hosted token-classification service (LayoutLM family)
 * exposing `POST /analyze` and `GET /health`.
 */
export class LayoutServiceModel implements LayoutModel {
  readonly name = 'layout-service';
  private http: AxiosInstance;

  constructor(baseUrl: string, timeoutMs: number, private model?: string) {
    this.http = axios.create({ baseURL: baseUrl, timeout: timeoutMs });
  }

  async testConnection(): Promise<boolean> {
    try {
      await this.http.get('/health');
      return true;
    } catch {
      return false;
    }
  }

  async analyzePage(request: LayoutAnalysisRequest, signal: AbortSignal): Promise<LayoutAnalysisResponse> {
    const { page } = request;

    logger.debug({ documentType: request.documentType, page: page.page }, 'Sending page to layout service');

    let data: unknown;
    try {
      const response = await this.http.post(
        '/analyze',
        {
          document_type: request.documentType,
          page: page.page,
          media_type: page.mediaType,
          image_base64: page.image.toString('base64'),
          roles: request.roles.map(r => r.role),
          model: this.model,
        },
        { signal }
      );
      data = response.data;
    } catch (error) {
      throw this.toModelError(error);
    }

    const parsed = parseLayoutPayload(data, this.name);

    return {
      spans: parsed.spans,
      metadata: {
        modelUsed: parsed.model ?? this.model ?? this.name,
        timestamp: new Date().toISOString(),
      },
    };
  }

  private toModelError(error: unknown): unknown {
    if (!axios.isAxiosError(error) || axios.isCancel(error)) {
      return error;
    }
    const status = error.response?.status;
    if (!error.response || (error.code && TRANSIENT_CODES.has(error.code))) {
      return new ModelUnavailableError(`Layout service unreachable: ${error.message}`, { code: error.code });
    }
    if (status === 429 || (status ?? 0) >= 500) {
      return new ModelUnavailableError(`Layout service returned ${status}`, { status });
    }
    return new ExtractionError(`Layout service rejected the page with ${status}`, { status, body: error.response.data });
  }
}
