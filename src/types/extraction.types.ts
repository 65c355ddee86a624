import type { DocumentType } from '../domain/documents/DocumentType.js';
import type { BoundingBox } from '../domain/verification/types.js';

export type PageMediaType = 'image/png' | 'image/jpeg';

export interface PageImage {
  /** 1-based page index. */
  page: number;
  image: Buffer;
  mediaType: PageMediaType;
  width?: number;
  height?: number;
}

export interface RoleHint {
  role: string;
  description: string;
}

export interface LayoutAnalysisRequest {
  documentType: DocumentType;
  page: PageImage;
  roles: RoleHint[];
}

export interface LayoutSpan {
  text: string;
  role: string;
  box: BoundingBox | null;
  confidence: number;
}

export interface LayoutAnalysisResponse {
  spans: LayoutSpan[];
  metadata: {
    modelUsed: string;
    timestamp: string;
    tokensUsed?: number;
  };
}
