import { DOCUMENT_TYPE_LABELS, type DocumentType } from '../../../domain/documents/DocumentType.js';
import { formatFieldValue } from '../../../domain/verification/FieldValue.js';
import type { NormalizedRecord } from '../../../domain/verification/types.js';
import { BASE_REASONING_SYSTEM_PROMPT, BASE_REASONING_USER_PROMPT } from './base-reasoning.js';
import { RENT_AGREEMENT_CHECKLIST } from './rent-agreement.js';
import { TITLE_DEED_CHECKLIST } from './title-deed.js';
import { NOC_CHECKLIST } from './noc.js';

const CHECKLISTS: Record<DocumentType, readonly string[]> = {
  rent_agreement: RENT_AGREEMENT_CHECKLIST,
  title_deed: TITLE_DEED_CHECKLIST,
  noc: NOC_CHECKLIST,
};

export function getChecklist(documentType: DocumentType): readonly string[] {
  return CHECKLISTS[documentType];
}

export function buildReasoningPrompts(
  documentType: DocumentType,
  record: NormalizedRecord
): { systemPrompt: string; userPrompt: string } {
  const fields: Record<string, string> = {};
  for (const [name, value] of Object.entries(record)) {
    fields[name] = formatFieldValue(value);
  }
  return {
    systemPrompt: BASE_REASONING_SYSTEM_PROMPT,
    userPrompt: BASE_REASONING_USER_PROMPT(DOCUMENT_TYPE_LABELS[documentType], fields, CHECKLISTS[documentType]),
  };
}
