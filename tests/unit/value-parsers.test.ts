import { describe, expect, it } from 'vitest';
import { parseDate, parseMoney, parseText } from '../../src/services/normalization/value-parsers.js';

describe('parseDate', () => {
  it('reads ISO dates', () => {
    expect(parseDate('2024-01-05')).toBe('2024-01-05');
  });

  it('reads numeric dates day first', () => {
    expect(parseDate('05/01/2024')).toBe('2024-01-05');
    expect(parseDate('5.1.24')).toBe('2024-01-05');
  });

  it('falls back to month first when day first is impossible', () => {
    expect(parseDate('12/25/2024')).toBe('2024-12-25');
  });

  it('reads deed-style ordinal dates', () => {
    expect(parseDate('Executed on this 5th day of January, 2024')).toBe('2024-01-05');
  });

  it('reads month-name-first dates and abbreviations', () => {
    expect(parseDate('March 3, 2023')).toBe('2023-03-03');
    expect(parseDate('Sept. 14 2022')).toBe('2022-09-14');
  });

  it('rejects impossible calendar dates', () => {
    expect(parseDate('31/02/2024')).toBeNull();
  });

  it('returns null when there is no date', () => {
    expect(parseDate('to be decided')).toBeNull();
  });
});

describe('parseMoney', () => {
  it('reads Indian digit grouping with the rupee marker', () => {
    expect(parseMoney('Rs. 1,00,000/-')).toEqual({ amount: 100000, currency: 'INR' });
  });

  it('keeps decimals', () => {
    expect(parseMoney('₹ 25,000.50')).toEqual({ amount: 25000.5, currency: 'INR' });
  });

  it('applies lakh and crore multipliers', () => {
    expect(parseMoney('INR 2.5 lakh')).toEqual({ amount: 250000, currency: 'INR' });
    expect(parseMoney('12 crore')).toEqual({ amount: 120000000, currency: 'INR' });
  });

  it('detects other currencies', () => {
    expect(parseMoney('$1,200')).toEqual({ amount: 1200, currency: 'USD' });
  });

  it('defaults unmarked amounts to rupees', () => {
    expect(parseMoney('5000')).toEqual({ amount: 5000, currency: 'INR' });
  });

  it('returns null when there is no amount', () => {
    expect(parseMoney('Twenty thousand only')).toBeNull();
  });
});

describe('parseText', () => {
  it('collapses whitespace and strips edge punctuation', () => {
    expect(parseText('  : Ramesh   Sharma, ')).toBe('Ramesh Sharma');
  });

  it('keeps a trailing period', () => {
    expect(parseText('Acme Estates Pvt. Ltd.')).toBe('Acme Estates Pvt. Ltd.');
  });

  it('returns null for punctuation only', () => {
    expect(parseText(' -- ')).toBeNull();
  });
});
