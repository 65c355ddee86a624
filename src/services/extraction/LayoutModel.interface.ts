import type { LayoutAnalysisRequest, LayoutAnalysisResponse } from '../../types/extraction.types.js';

/**
 * Visual-document model that labels text regions on one page image.
 *
 * Implementations throw ModelUnavailableError for failures worth retrying and
 * ExtractionError when the model answered with something unusable.
 */
export interface LayoutModel {
  readonly name: string;
  analyzePage(request: LayoutAnalysisRequest, signal: AbortSignal): Promise<LayoutAnalysisResponse>;
  testConnection(): Promise<boolean>;
}
