import { logger } from '../../utils/logger.js';
import { ContractViolationError } from '../../utils/errors.js';
import { getSchema } from '../../domain/documents/schemas.js';
import { isDocumentType, type DocumentType } from '../../domain/documents/DocumentType.js';
import { NOT_FOUND, formatFieldValue, isResolved, type FieldValue } from '../../domain/verification/FieldValue.js';
import type {
  NormalizedRecord,
  PipelineIssue,
  ReasoningVerdict,
  VerdictItem,
  VerificationFailure,
  VerificationRecord,
  VerificationStatus,
  WireVerificationRecord,
} from '../../domain/verification/types.js';

const deepFreeze = <T>(value: T): T => {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
};

const copyValue = (value: FieldValue): FieldValue => (value === NOT_FOUND ? NOT_FOUND : { ...value });

/** Trims, drops unlabeled items and removes exact duplicates, keeping first occurrence order. */
export function repairItems(items: readonly VerdictItem[]): VerdictItem[] {
  const seen = new Set<string>();
  const repaired: VerdictItem[] = [];
  for (const item of items) {
    const label = item.label.trim();
    const explanation = item.explanation.trim();
    if (label.length === 0) {
      continue;
    }
    const key = JSON.stringify([label, explanation]);
    if (seen.has(key)) {
      continue;
    }
    seen.add(key);
    repaired.push({ label, explanation });
  }
  return repaired;
}

/**
 * Merges the normalized fields, the verdict and every issue raised along the
 * way into one immutable record. Business failures become `status` and
 * `failure`; the only throw is for an unknown document type.
 */
export class AssessmentAssembler {
  assemble(
    documentType: DocumentType,
    record: NormalizedRecord,
    verdict: ReasoningVerdict | null,
    issues: readonly PipelineIssue[]
  ): VerificationRecord {
    if (!isDocumentType(documentType)) {
      throw new ContractViolationError(`Unknown document type: ${String(documentType)}`);
    }
    const schema = getSchema(documentType);

    const fields: Record<string, FieldValue> = {};
    for (const def of schema.fields) {
      const value = record[def.name];
      fields[def.name] = value === undefined ? NOT_FOUND : copyValue(value);
    }

    const degraded = new Set<string>();
    let failure: VerificationFailure | undefined;
    for (const issue of issues) {
      switch (issue.kind) {
        case 'field':
          degraded.add(issue.field);
          break;
        case 'page':
          degraded.add(`page:${issue.page}`);
          break;
        case 'stage':
          failure ??= { reason: issue.error.code, message: issue.error.message };
          break;
      }
    }

    if (!failure && !verdict) {
      throw new ContractViolationError('A verdict is required when no stage failed');
    }

    const status: VerificationStatus = failure ? 'failed' : degraded.size > 0 ? 'partial_failure' : 'success';
    const resolved = schema.fields.filter(def => isResolved(fields[def.name])).length;

    const assembled: VerificationRecord = {
      documentType,
      fields,
      benefits: failure || !verdict ? [] : repairItems(verdict.benefits),
      risks: failure || !verdict ? [] : repairItems(verdict.risks),
      status,
      degradedFields: [...degraded].sort(),
      completeness: Math.round((resolved / schema.fields.length) * 100) / 100,
      ...(failure ? { failure } : {}),
    };

    logger.debug(
      { documentType, status, degraded: assembled.degradedFields.length, completeness: assembled.completeness },
      'Assessment assembled'
    );

    return deepFreeze(assembled);
  }
}

export function toWire(record: VerificationRecord): WireVerificationRecord {
  const extracted: Record<string, string> = {};
  for (const [name, value] of Object.entries(record.fields)) {
    extracted[name] = formatFieldValue(value);
  }
  return {
    document_type: record.documentType,
    extracted_fields: extracted,
    benefits: record.benefits.map(item => ({ ...item })),
    risks: record.risks.map(item => ({ ...item })),
    status: record.status,
    degraded_fields: [...record.degradedFields],
    completeness_score: record.completeness,
    ...(record.failure ? { failure: { ...record.failure } } : {}),
  };
}
