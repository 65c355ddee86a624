import type { DocumentType } from '../documents/DocumentType.js';
import type { PipelineError, PipelineErrorCode } from '../../utils/errors.js';
import type { FieldValue } from './FieldValue.js';

export type MediaKind = 'image' | 'pdf';

export interface RawDocument {
  content: Buffer;
  /** Declared MIME type, e.g. `application/pdf` or `image/png`. */
  mediaType: string;
  fileName?: string;
}

/** Box in page pixel coordinates of the rendered page image. */
export interface BoundingBox {
  x0: number;
  y0: number;
  x1: number;
  y1: number;
}

export interface FieldLocation {
  /** 1-based page index. */
  page: number;
  box: BoundingBox | null;
}

export interface ExtractedField {
  name: string;
  text: string;
  location: FieldLocation;
  confidence: number;
}

export interface PageIssue {
  kind: 'page';
  page: number;
  reason: string;
}

export interface FieldIssue {
  kind: 'field';
  field: string;
  reason: string;
}

export interface StageFailure {
  kind: 'stage';
  error: PipelineError;
}

export type PipelineIssue = PageIssue | FieldIssue | StageFailure;

export interface ExtractionResult {
  fields: ExtractedField[];
  pageIssues: PageIssue[];
  pageCount: number;
}

export type NormalizedRecord = Readonly<Record<string, FieldValue>>;

export interface NormalizationResult {
  record: NormalizedRecord;
  issues: FieldIssue[];
}

export interface VerdictItem {
  label: string;
  explanation: string;
}

export type ParseStrategy = 'structured' | 'heuristic';

export interface ReasoningVerdict {
  benefits: VerdictItem[];
  risks: VerdictItem[];
  strategy: ParseStrategy;
}

export type VerificationStatus = 'success' | 'partial_failure' | 'failed';

export interface VerificationFailure {
  reason: PipelineErrorCode;
  message: string;
}

export interface VerificationRecord {
  readonly documentType: DocumentType;
  readonly fields: NormalizedRecord;
  readonly benefits: readonly Readonly<VerdictItem>[];
  readonly risks: readonly Readonly<VerdictItem>[];
  readonly status: VerificationStatus;
  readonly degradedFields: readonly string[];
  readonly completeness: number;
  readonly failure?: Readonly<VerificationFailure>;
}

/** JSON contract handed to the HTTP layer and the batch runner. */
export interface WireVerificationRecord {
  document_type: DocumentType;
  extracted_fields: Record<string, string>;
  benefits: VerdictItem[];
  risks: VerdictItem[];
  status: VerificationStatus;
  degraded_fields: string[];
  completeness_score: number;
  failure?: VerificationFailure;
}
