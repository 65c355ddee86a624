import type { DocumentType } from '../../domain/documents/DocumentType.js';
import type { VerificationStatus, WireVerificationRecord } from '../../domain/verification/types.js';

export type OutputFormat = 'table' | 'json';

export interface ClassificationResult {
  documentType: DocumentType | null;
  confidence: number;
  method: 'explicit' | 'pattern';
  patterns: string[];
}

export interface BatchConfig {
  folder: string;
  /** Forces every file to this type instead of classifying by file name. */
  documentType?: DocumentType;
  format: OutputFormat;
  concurrency: number;
}

export interface FileInfo {
  path: string;
  name: string;
  size: number;
  extension: string;
}

export interface ClassifiedFile extends FileInfo {
  classification: ClassificationResult;
  skip?: boolean;
  skipReason?: string;
}

export interface BatchProgress {
  phase: 'scanning' | 'classifying' | 'verifying';
  current: number;
  total: number;
  currentFile?: string;
}

export interface VerificationSummary {
  fileName: string;
  documentType: DocumentType;
  status: VerificationStatus;
  completeness: number;
  benefits: number;
  risks: number;
  failure?: string;
  record: WireVerificationRecord;
}

export interface BatchResult {
  config: BatchConfig;
  files: ClassifiedFile[];
  verified: VerificationSummary[];
  summary: {
    total: number;
    succeeded: number;
    partial: number;
    failed: number;
    skipped: number;
    byType: Partial<Record<DocumentType, number>>;
  };
}
