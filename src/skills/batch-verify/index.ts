import { readdir, readFile, stat } from 'fs/promises';
import { extname, join } from 'path';
import pLimit from 'p-limit';
import { logger } from '../../utils/logger.js';
import { errorMessage } from '../../utils/errors.js';
import { createRequestId } from '../../utils/ids.js';
import { mediaTypeFromFileName, SUPPORTED_EXTENSIONS } from '../../services/extraction/media.js';
import { toWire } from '../../services/assessment/AssessmentAssembler.js';
import type { VerificationPipeline } from '../../services/pipeline/VerificationPipeline.js';
import type { DocumentType } from '../../domain/documents/DocumentType.js';
import type { VerificationRecord } from '../../domain/verification/types.js';
import { DocumentClassifier } from './classifier/DocumentClassifier.js';
import type { ProgressReporter } from './reporters/ProgressReporter.js';
import type { BatchConfig, BatchResult, ClassifiedFile, FileInfo, VerificationSummary } from './types.js';

const EXTENSIONS = new Set(SUPPORTED_EXTENSIONS);

export type DocumentReader = (path: string) => Promise<Buffer>;

interface Job {
  file: ClassifiedFile;
  documentType: DocumentType;
}

export class BatchVerifier {
  constructor(
    private pipeline: VerificationPipeline,
    private classifier: DocumentClassifier = new DocumentClassifier(),
    private readDocument: DocumentReader = path => readFile(path)
  ) {}

  async run(config: BatchConfig, reporter: ProgressReporter): Promise<BatchResult> {
    reporter.update({ phase: 'scanning', current: 0, total: 0 });
    const files = await this.scanFolder(config.folder);
    reporter.complete(`Found ${files.length} files`);

    const classifiedFiles: ClassifiedFile[] = files.map((file, i) => {
      reporter.update({ phase: 'classifying', current: i + 1, total: files.length, currentFile: file.name });
      const classification = config.documentType
        ? { documentType: config.documentType, confidence: 1, method: 'explicit' as const, patterns: [] }
        : this.classifier.classify(file.name);
      return classification.documentType
        ? { ...file, classification }
        : { ...file, classification, skip: true, skipReason: 'unclassified' };
    });
    reporter.complete(`Classified ${classifiedFiles.length} files`);

    for (const file of classifiedFiles) {
      if (file.skip) {
        reporter.warn(`Skipping ${file.name}: document type not recognised from file name`);
      }
    }

    const jobs: Job[] = [];
    for (const file of classifiedFiles) {
      if (!file.skip && file.classification.documentType) {
        jobs.push({ file, documentType: file.classification.documentType });
      }
    }

    // Each file is read inside its slot so at most `concurrency` documents sit in memory.
    const limit = pLimit(config.concurrency);
    let done = 0;
    const outcomes = await Promise.all(
      jobs.map(job =>
        limit(async () => {
          const record = await this.verifyFile(job, reporter);
          done += 1;
          reporter.update({ phase: 'verifying', current: done, total: jobs.length });
          return { job, record };
        })
      )
    );

    const verified: VerificationSummary[] = [];
    for (const { job, record } of outcomes) {
      if (!record) {
        continue;
      }
      verified.push({
        fileName: job.file.name,
        documentType: record.documentType,
        status: record.status,
        completeness: record.completeness,
        benefits: record.benefits.length,
        risks: record.risks.length,
        failure: record.failure?.reason,
        record: toWire(record),
      });
    }

    const result: BatchResult = {
      config,
      files: classifiedFiles,
      verified,
      summary: {
        total: classifiedFiles.length,
        succeeded: verified.filter(v => v.status === 'success').length,
        partial: verified.filter(v => v.status === 'partial_failure').length,
        failed: verified.filter(v => v.status === 'failed').length,
        skipped: classifiedFiles.filter(f => f.skip).length,
        byType: {},
      },
    };

    for (const summary of verified) {
      result.summary.byType[summary.documentType] = (result.summary.byType[summary.documentType] ?? 0) + 1;
    }

    reporter.complete(
      `Verification complete: ${result.summary.succeeded} succeeded, ${result.summary.partial} partial, ${result.summary.failed} failed`
    );
    logger.info({ folder: config.folder, ...result.summary }, 'Batch verification finished');

    return result;
  }

  /** Unreadable files are marked skipped and produce no record. */
  private async verifyFile(job: Job, reporter: ProgressReporter): Promise<VerificationRecord | null> {
    const { file, documentType } = job;
    let content: Buffer;
    try {
      content = await this.readDocument(file.path);
    } catch (error) {
      logger.warn({ file: file.name, error: errorMessage(error) }, 'Could not read document');
      reporter.warn(`Skipping ${file.name}: ${errorMessage(error)}`);
      file.skip = true;
      file.skipReason = 'unreadable';
      return null;
    }

    const record = await this.pipeline.verify({
      documentType,
      document: {
        content,
        mediaType: mediaTypeFromFileName(file.name) ?? 'application/octet-stream',
        fileName: file.name,
      },
      requestId: createRequestId('batch'),
    });
    reporter.result(file.name, record.status);
    return record;
  }

  private async scanFolder(folder: string): Promise<FileInfo[]> {
    const files: FileInfo[] = [];
    const entries = await readdir(folder, { withFileTypes: true });

    for (const entry of entries) {
      if (!entry.isFile()) {
        continue;
      }
      const ext = extname(entry.name).toLowerCase();
      if (EXTENSIONS.has(ext)) {
        const fullPath = join(folder, entry.name);
        const stats = await stat(fullPath);
        files.push({ path: fullPath, name: entry.name, size: stats.size, extension: ext });
      }
    }

    return files.sort((a, b) => a.name.localeCompare(b.name));
  }
}
