import { logger } from '../../utils/logger.js';
import { ContractViolationError } from '../../utils/errors.js';
import { getSchema, resolveField, type FieldDefinition } from '../../domain/documents/schemas.js';
import { isDocumentType, type DocumentType } from '../../domain/documents/DocumentType.js';
import { NOT_FOUND, type FieldValue } from '../../domain/verification/FieldValue.js';
import type { ExtractedField, FieldIssue, NormalizationResult } from '../../domain/verification/types.js';
import { parseDate, parseMoney, parseText } from './value-parsers.js';

interface Candidate {
  field: ExtractedField;
  order: number;
}

const position = (field: ExtractedField): [number, number, number] => [
  field.location.page,
  field.location.box?.y0 ?? Number.POSITIVE_INFINITY,
  field.location.box?.x0 ?? Number.POSITIVE_INFINITY,
];

/** Highest confidence first; ties go to the earliest page, then top, then left, then input order. */
export const compareCandidates = (a: Candidate, b: Candidate): number => {
  if (a.field.confidence !== b.field.confidence) {
    return b.field.confidence - a.field.confidence;
  }
  const pa = position(a.field);
  const pb = position(b.field);
  for (let i = 0; i < pa.length; i++) {
    if (pa[i] !== pb[i]) {
      return pa[i] < pb[i] ? -1 : 1;
    }
  }
  return a.order - b.order;
};

export class FieldNormalizer {
  normalize(fields: readonly ExtractedField[], documentType: DocumentType): NormalizationResult {
    if (!isDocumentType(documentType)) {
      throw new ContractViolationError(`Unknown document type: ${String(documentType)}`);
    }
    const schema = getSchema(documentType);

    const candidates = new Map<string, Candidate[]>();
    fields.forEach((field, order) => {
      const def = resolveField(schema, field.name);
      if (!def) {
        return;
      }
      const list = candidates.get(def.name) ?? [];
      list.push({ field, order });
      candidates.set(def.name, list);
    });

    const record: Record<string, FieldValue> = {};
    const issues: FieldIssue[] = [];

    for (const def of schema.fields) {
      const best = (candidates.get(def.name) ?? []).sort(compareCandidates)[0];
      if (!best) {
        record[def.name] = NOT_FOUND;
        continue;
      }

      const value = this.coerce(def, best.field.text);
      if (value === NOT_FOUND) {
        issues.push({
          kind: 'field',
          field: def.name,
          reason: `Could not read "${best.field.text}" as ${def.kind}`,
        });
      }
      record[def.name] = value;
    }

    logger.debug(
      {
        documentType,
        resolved: schema.fields.length - Object.values(record).filter(v => v === NOT_FOUND).length,
        total: schema.fields.length,
        degraded: issues.length,
      },
      'Normalization complete'
    );

    return { record: Object.freeze(record), issues };
  }

  private coerce(def: FieldDefinition, raw: string): FieldValue {
    switch (def.kind) {
      case 'text': {
        const value = parseText(raw);
        return value === null ? NOT_FOUND : { kind: 'text', value };
      }
      case 'date': {
        const value = parseDate(raw);
        return value === null ? NOT_FOUND : { kind: 'date', value };
      }
      case 'money': {
        const parsed = parseMoney(raw);
        return parsed === null ? NOT_FOUND : { kind: 'money', ...parsed };
      }
    }
  }
}
