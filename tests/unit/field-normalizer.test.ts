import { describe, expect, it } from 'vitest';
import { FieldNormalizer } from '../../src/services/normalization/FieldNormalizer.js';
import { fieldNames } from '../../src/domain/documents/schemas.js';
import { DOCUMENT_TYPES, type DocumentType } from '../../src/domain/documents/DocumentType.js';
import { NOT_FOUND } from '../../src/domain/verification/FieldValue.js';
import type { BoundingBox, ExtractedField } from '../../src/domain/verification/types.js';
import { ContractViolationError } from '../../src/utils/errors.js';

const extracted = (
  name: string,
  text: string,
  confidence: number,
  page = 1,
  box: BoundingBox | null = null
): ExtractedField => ({ name, text, confidence, location: { page, box } });

const box = (x0: number, y0: number): BoundingBox => ({ x0, y0, x1: x0 + 100, y1: y0 + 20 });

describe('FieldNormalizer', () => {
  const normalizer = new FieldNormalizer();

  it.each([...DOCUMENT_TYPES])('returns exactly the %s schema fields for empty input', type => {
    const { record, issues } = normalizer.normalize([], type);
    expect(Object.keys(record)).toEqual(fieldNames(type));
    expect(Object.values(record).every(value => value === NOT_FOUND)).toBe(true);
    expect(issues).toEqual([]);
  });

  it.each([...DOCUMENT_TYPES])('never adds keys outside the %s schema', type => {
    const { record } = normalizer.normalize(
      [extracted('landlord', 'Ramesh Sharma', 0.9), extracted('unrelated_label', 'x', 0.9)],
      type
    );
    expect(Object.keys(record)).toEqual(fieldNames(type));
  });

  it('coerces typed values', () => {
    const { record } = normalizer.normalize(
      [
        extracted('rent_amount', 'Rs. 22,000/- per month', 0.9),
        extracted('agreement_date', '1st day of April, 2024', 0.8),
        extracted('landlord', ' Ramesh  Sharma ', 0.95),
      ],
      'rent_agreement'
    );

    expect(record.rent_amount).toEqual({ kind: 'money', amount: 22000, currency: 'INR' });
    expect(record.agreement_date).toEqual({ kind: 'date', value: '2024-04-01' });
    expect(record.landlord).toEqual({ kind: 'text', value: 'Ramesh Sharma' });
    expect(record.tenant).toBe(NOT_FOUND);
  });

  it('matches aliases and near-miss names', () => {
    const { record } = normalizer.normalize(
      [extracted('lessor', 'Ramesh Sharma', 0.9), extracted('tenants', 'Anita Rao', 0.9)],
      'rent_agreement'
    );
    expect(record.landlord).toEqual({ kind: 'text', value: 'Ramesh Sharma' });
    expect(record.tenant).toEqual({ kind: 'text', value: 'Anita Rao' });
  });

  it('prefers the highest confidence candidate', () => {
    const { record } = normalizer.normalize(
      [extracted('tenant', 'Low Confidence', 0.5, 1), extracted('tenant', 'High Confidence', 0.9, 3)],
      'rent_agreement'
    );
    expect(record.tenant).toEqual({ kind: 'text', value: 'High Confidence' });
  });

  it('breaks confidence ties by page, then top, then left, then input order', () => {
    const byPage = normalizer.normalize(
      [extracted('tenant', 'Page Two', 0.8, 2, box(0, 0)), extracted('tenant', 'Page One', 0.8, 1, box(0, 500))],
      'rent_agreement'
    );
    expect(byPage.record.tenant).toEqual({ kind: 'text', value: 'Page One' });

    const byTop = normalizer.normalize(
      [extracted('tenant', 'Lower', 0.8, 1, box(0, 300)), extracted('tenant', 'Upper', 0.8, 1, box(400, 100))],
      'rent_agreement'
    );
    expect(byTop.record.tenant).toEqual({ kind: 'text', value: 'Upper' });

    const byLeft = normalizer.normalize(
      [extracted('tenant', 'Right', 0.8, 1, box(300, 100)), extracted('tenant', 'Left', 0.8, 1, box(10, 100))],
      'rent_agreement'
    );
    expect(byLeft.record.tenant).toEqual({ kind: 'text', value: 'Left' });

    const unlocated = normalizer.normalize(
      [extracted('tenant', 'No Box', 0.8, 1, null), extracted('tenant', 'Boxed', 0.8, 1, box(900, 900))],
      'rent_agreement'
    );
    expect(unlocated.record.tenant).toEqual({ kind: 'text', value: 'Boxed' });

    const byOrder = normalizer.normalize(
      [extracted('tenant', 'First', 0.8), extracted('tenant', 'Second', 0.8)],
      'rent_agreement'
    );
    expect(byOrder.record.tenant).toEqual({ kind: 'text', value: 'First' });
  });

  it('downgrades an unreadable value to not found and reports the field', () => {
    const { record, issues } = normalizer.normalize(
      [extracted('rent_amount', 'to be decided', 0.9)],
      'rent_agreement'
    );
    expect(record.rent_amount).toBe(NOT_FOUND);
    expect(issues).toEqual([
      { kind: 'field', field: 'rent_amount', reason: 'Could not read "to be decided" as money' },
    ]);
  });

  it('returns a frozen record', () => {
    const { record } = normalizer.normalize([], 'noc');
    expect(Object.isFrozen(record)).toBe(true);
  });

  it('rejects an unknown document type', () => {
    const unknownType: DocumentType = JSON.parse('"power_of_attorney"');
    expect(() => normalizer.normalize([], unknownType)).toThrow(ContractViolationError);
  });
});
