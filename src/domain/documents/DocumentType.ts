export const DOCUMENT_TYPES = ['rent_agreement', 'title_deed', 'noc'] as const;

export type DocumentType = (typeof DOCUMENT_TYPES)[number];

export const DOCUMENT_TYPE_LABELS: Record<DocumentType, string> = {
  rent_agreement: 'Rent Agreement',
  title_deed: 'Title Deed',
  noc: 'NOC',
};

export function isDocumentType(value: unknown): value is DocumentType {
  return typeof value === 'string' && (DOCUMENT_TYPES as readonly string[]).includes(value);
}

/**
 * Accepts the slug (`title_deed`), the display label (`Title Deed`) and loose
 * spellings of either (`title-deed`, `NO OBJECTION CERTIFICATE`).
 */
export function parseDocumentType(input: string): DocumentType | null {
  const key = input.trim().toLowerCase().replace(/[^a-z0-9]+/g, '_').replace(/^_|_$/g, '');

  if (isDocumentType(key)) {
    return key;
  }

  switch (key) {
    case 'rent':
    case 'rental_agreement':
    case 'lease':
    case 'lease_agreement':
    case 'leave_and_license':
      return 'rent_agreement';
    case 'title':
    case 'sale_deed':
    case 'deed':
      return 'title_deed';
    case 'no_objection_certificate':
      return 'noc';
    default:
      return null;
  }
}
