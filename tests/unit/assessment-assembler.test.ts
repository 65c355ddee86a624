import { describe, expect, it } from 'vitest';
import { AssessmentAssembler, repairItems, toWire } from '../../src/services/assessment/AssessmentAssembler.js';
import { fieldNames } from '../../src/domain/documents/schemas.js';
import type { DocumentType } from '../../src/domain/documents/DocumentType.js';
import { NOT_FOUND } from '../../src/domain/verification/FieldValue.js';
import type { NormalizedRecord, ReasoningVerdict } from '../../src/domain/verification/types.js';
import { ContractViolationError, ReasoningParseError } from '../../src/utils/errors.js';

const record: NormalizedRecord = {
  landlord: { kind: 'text', value: 'Ramesh Sharma' },
  tenant: NOT_FOUND,
  rent_amount: { kind: 'money', amount: 22000, currency: 'INR' },
};

const verdict: ReasoningVerdict = {
  benefits: [{ label: 'Clear rent terms', explanation: 'Monthly rent is stated' }],
  risks: [{ label: 'Tenant identity missing', explanation: 'No tenant name found' }],
  strategy: 'structured',
};

describe('AssessmentAssembler', () => {
  const assembler = new AssessmentAssembler();

  it('is idempotent for the same inputs', () => {
    const first = assembler.assemble('rent_agreement', record, verdict, []);
    const second = assembler.assemble('rent_agreement', record, verdict, []);

    expect(JSON.stringify(second)).toBe(JSON.stringify(first));
  });

  it('marks a clean run as success', () => {
    const result = assembler.assemble('rent_agreement', record, verdict, []);

    expect(result.status).toBe('success');
    expect(result.degradedFields).toEqual([]);
    expect(result.failure).toBeUndefined();
    expect(result.risks).toEqual([{ label: 'Tenant identity missing', explanation: 'No tenant name found' }]);
  });

  it('completes missing schema fields and drops unknown keys in schema order', () => {
    const result = assembler.assemble(
      'rent_agreement',
      { ...record, favourite_colour: { kind: 'text', value: 'blue' } },
      verdict,
      []
    );

    expect(Object.keys(result.fields)).toEqual(fieldNames('rent_agreement'));
    expect(result.fields.security_deposit).toBe(NOT_FOUND);
  });

  it('scores completeness as the resolved share of schema fields', () => {
    const result = assembler.assemble('rent_agreement', record, verdict, []);

    // 2 of 11 rent agreement fields resolved
    expect(result.completeness).toBe(0.18);
  });

  it('reports field and page issues as partial failure', () => {
    const result = assembler.assemble('rent_agreement', record, verdict, [
      { kind: 'field', field: 'rent_amount', reason: 'Could not read "tbd" as money' },
      { kind: 'page', page: 2, reason: 'Malformed layout response' },
      { kind: 'field', field: 'agreement_date', reason: 'Could not read "soon" as date' },
      { kind: 'field', field: 'rent_amount', reason: 'Could not read "tbd" as money' },
    ]);

    expect(result.status).toBe('partial_failure');
    expect(result.degradedFields).toEqual(['agreement_date', 'page:2', 'rent_amount']);
    expect(result.benefits).toHaveLength(1);
  });

  it('turns a stage failure into a failed record with an empty verdict', () => {
    const result = assembler.assemble('title_deed', {}, null, [
      { kind: 'stage', error: new ReasoningParseError('No benefit or risk markers found in reasoning response') },
    ]);

    expect(result.status).toBe('failed');
    expect(result.benefits).toEqual([]);
    expect(result.risks).toEqual([]);
    expect(result.failure).toEqual({
      reason: 'REASONING_PARSE_ERROR',
      message: 'No benefit or risk markers found in reasoning response',
    });
    expect(result.completeness).toBe(0);
  });

  it('deep-freezes the record', () => {
    const result = assembler.assemble('rent_agreement', record, verdict, []);

    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.fields)).toBe(true);
    expect(Object.isFrozen(result.fields.landlord)).toBe(true);
    expect(Object.isFrozen(result.benefits)).toBe(true);
    expect(Object.isFrozen(result.benefits[0])).toBe(true);
  });

  it('does not freeze the caller inputs', () => {
    const input = { landlord: { kind: 'text' as const, value: 'Ramesh Sharma' } };
    assembler.assemble('rent_agreement', input, verdict, []);

    expect(Object.isFrozen(input.landlord)).toBe(false);
    expect(Object.isFrozen(verdict.benefits[0])).toBe(false);
  });

  it('throws only for an unknown document type', () => {
    const unknownType: DocumentType = JSON.parse('"power_of_attorney"');

    expect(() => assembler.assemble(unknownType, record, verdict, [])).toThrow(ContractViolationError);
  });
});

describe('repairItems', () => {
  it('trims, drops empty labels and removes exact duplicates', () => {
    expect(
      repairItems([
        { label: '  Clear rent terms ', explanation: ' Rent stated ' },
        { label: '   ', explanation: 'orphan explanation' },
        { label: 'Clear rent terms', explanation: 'Rent stated' },
        { label: 'Clear rent terms', explanation: 'Different wording' },
      ])
    ).toEqual([
      { label: 'Clear rent terms', explanation: 'Rent stated' },
      { label: 'Clear rent terms', explanation: 'Different wording' },
    ]);
  });
});

describe('toWire', () => {
  const assembler = new AssessmentAssembler();

  it('serializes to the snake_case contract', () => {
    const wire = toWire(assembler.assemble('rent_agreement', record, verdict, []));

    expect(wire.document_type).toBe('rent_agreement');
    expect(wire.extracted_fields.landlord).toBe('Ramesh Sharma');
    expect(wire.extracted_fields.tenant).toBe('not found');
    expect(wire.extracted_fields.rent_amount).toBe('INR 22000.00');
    expect(wire.status).toBe('success');
    expect(wire.completeness_score).toBe(0.18);
    expect(wire.degraded_fields).toEqual([]);
    expect('failure' in wire).toBe(false);
  });

  it('includes the failure for failed records', () => {
    const failed = assembler.assemble('noc', {}, null, [
      { kind: 'stage', error: new ReasoningParseError('nothing classifiable') },
    ]);

    expect(toWire(failed).failure).toEqual({ reason: 'REASONING_PARSE_ERROR', message: 'nothing classifiable' });
  });
});
