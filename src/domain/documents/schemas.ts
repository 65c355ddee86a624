import { canonicalKey, diceCoefficient } from '../../utils/text.js';
import type { DocumentType } from './DocumentType.js';

export type FieldKind = 'text' | 'date' | 'money';

export interface FieldDefinition {
  name: string;
  kind: FieldKind;
  /** Other role labels a layout model may emit for this field. */
  aliases: readonly string[];
  description: string;
}

export interface DocumentSchema {
  documentType: DocumentType;
  fields: readonly FieldDefinition[];
}

export const FUZZY_MATCH_THRESHOLD = 0.8;

const field = (name: string, kind: FieldKind, description: string, aliases: string[] = []): FieldDefinition => ({
  name,
  kind,
  description,
  aliases,
});

const signatures = field('signatures', 'text', 'Signature blocks of the parties and witnesses', [
  'signature',
  'signed_by',
  'witness',
  'witnesses',
]);

const RENT_AGREEMENT: DocumentSchema = {
  documentType: 'rent_agreement',
  fields: [
    field('landlord', 'text', 'Name of the landlord / licensor', ['lessor', 'licensor', 'owner']),
    field('tenant', 'text', 'Name of the tenant / licensee', ['lessee', 'licensee']),
    field('property_address', 'text', 'Address of the rented premises', ['premises', 'address', 'property']),
    field('agreement_date', 'date', 'Date the agreement was executed', ['date_of_agreement', 'execution_date', 'dated']),
    field('term', 'text', 'Duration of the tenancy', ['duration', 'lease_term', 'period', 'tenure']),
    field('rent_amount', 'money', 'Monthly rent or license fee', ['rent', 'monthly_rent', 'license_fee']),
    field('security_deposit', 'money', 'Refundable security deposit', ['deposit', 'advance']),
    field('rent_due_date', 'text', 'Day of the month rent is payable', ['due_date', 'payment_date']),
    field('notice_period', 'text', 'Notice or lock-in period for termination', ['termination_notice', 'lock_in']),
    field('stamp_duty', 'text', 'Stamp paper / e-stamp details', ['stamp_paper', 'e_stamp']),
    signatures,
  ],
};

const TITLE_DEED: DocumentSchema = {
  documentType: 'title_deed',
  fields: [
    field('owner', 'text', 'Current owner / purchaser', ['proprietor', 'purchaser', 'buyer', 'vendee']),
    field('seller', 'text', 'Previous owner / vendor', ['vendor', 'transferor']),
    field('property_details', 'text', 'Description of the property', [
      'property',
      'plot',
      'property_description',
      'schedule_of_property',
    ]),
    field('survey_number', 'text', 'Survey / plot / CTS number', ['survey_no', 'plot_number', 'cts_number', 'khasra']),
    field('boundaries', 'text', 'Boundaries of the property', ['boundary', 'bounded_by']),
    field('consideration_amount', 'money', 'Sale consideration', ['consideration', 'sale_price', 'sale_consideration']),
    field('registration_number', 'text', 'Registration / document number', ['registration_no', 'document_number']),
    field('registration_date', 'date', 'Date of registration', ['date_of_registration', 'execution_date']),
    field('encumbrance', 'text', 'Encumbrance status or charges on the property', [
      'encumbrances',
      'encumbrance_status',
      'lien',
    ]),
    field('stamp_duty', 'text', 'Stamp duty paid', ['stamp_paper', 'e_stamp']),
    signatures,
  ],
};

const NOC: DocumentSchema = {
  documentType: 'noc',
  fields: [
    field('applicant', 'text', 'Person or entity the NOC is issued to', ['applicant_name', 'name', 'addressed_to']),
    field('issuing_authority', 'text', 'Authority or society issuing the NOC', ['authority', 'issued_by', 'issuer', 'society']),
    field('purpose', 'text', 'Purpose the NOC is granted for', ['reason', 'subject']),
    field('property_address', 'text', 'Property the NOC concerns', ['premises', 'address', 'property']),
    field('reference_number', 'text', 'Reference / letter number', ['ref_no', 'reference', 'letter_number']),
    field('issue_date', 'date', 'Date of issue', ['date', 'dated', 'date_of_issue']),
    field('validity_period', 'text', 'Validity of the NOC', ['validity', 'valid_until', 'valid_till']),
    field('conditions', 'text', 'Conditions and restrictions', ['terms_and_conditions', 'restrictions']),
    field('official_seal', 'text', 'Seal or stamp of the issuing authority', ['seal', 'stamp']),
    { ...signatures, aliases: [...signatures.aliases, 'authorized_signatory'] },
  ],
};

const SCHEMAS: Record<DocumentType, DocumentSchema> = {
  rent_agreement: RENT_AGREEMENT,
  title_deed: TITLE_DEED,
  noc: NOC,
};

export function getSchema(documentType: DocumentType): DocumentSchema {
  return SCHEMAS[documentType];
}

export function fieldNames(documentType: DocumentType): string[] {
  return SCHEMAS[documentType].fields.map(f => f.name);
}

/**
 * Maps a role label onto a schema field: an exact hit on the field name or an
 * alias wins, otherwise the closest name/alias above FUZZY_MATCH_THRESHOLD.
 */
export function resolveField(schema: DocumentSchema, role: string): FieldDefinition | null {
  const key = canonicalKey(role);
  if (key.length === 0) {
    return null;
  }

  for (const def of schema.fields) {
    if (def.name === key || def.aliases.includes(key)) {
      return def;
    }
  }

  let best: { def: FieldDefinition; score: number } | null = null;
  for (const def of schema.fields) {
    for (const candidate of [def.name, ...def.aliases]) {
      const score = diceCoefficient(key, candidate);
      if (score >= FUZZY_MATCH_THRESHOLD && (!best || score > best.score)) {
        best = { def, score };
      }
    }
  }

  return best?.def ?? null;
}
