import { collapseWhitespace } from '../../utils/text.js';

const MONTHS = [
  'january',
  'february',
  'march',
  'april',
  'may',
  'june',
  'july',
  'august',
  'september',
  'october',
  'november',
  'december',
];

const monthIndex = (name: string): number | null => {
  const lower = name.toLowerCase().replace(/\.$/, '');
  if (lower.length < 3) {
    return null;
  }
  const index = MONTHS.findIndex(month => month.startsWith(lower));
  return index >= 0 ? index + 1 : null;
};

const expandYear = (year: number): number => {
  if (year >= 100) {
    return year;
  }
  return year < 50 ? 2000 + year : 1900 + year;
};

const toIsoDate = (year: number, month: number, day: number): string | null => {
  if (month < 1 || month > 12 || day < 1 || day > 31) {
    return null;
  }
  const candidate = new Date(Date.UTC(year, month - 1, day));
  if (
    candidate.getUTCFullYear() !== year ||
    candidate.getUTCMonth() + 1 !== month ||
    candidate.getUTCDate() !== day
  ) {
    return null;
  }
  return `${String(year).padStart(4, '0')}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
};

const ISO_REGEX = /\b(\d{4})-(\d{1,2})-(\d{1,2})\b/;
const NUMERIC_REGEX = /\b(\d{1,2})[/.-](\d{1,2})[/.-](\d{2,4})\b/;
const DAY_MONTH_REGEX = /\b(\d{1,2})(?:st|nd|rd|th)?\s+(?:day\s+of\s+)?([a-z]{3,9}\.?),?\s+(\d{4})\b/i;
const MONTH_DAY_REGEX = /\b([a-z]{3,9}\.?)\s+(\d{1,2})(?:st|nd|rd|th)?,?\s+(\d{4})\b/i;

/**
 * Finds the first calendar date in free text. Numeric dates are read day
 * first, falling back to month first when that is the only valid reading.
 */
export function parseDate(input: string): string | null {
  const text = collapseWhitespace(input);

  const iso = ISO_REGEX.exec(text);
  if (iso) {
    return toIsoDate(Number(iso[1]), Number(iso[2]), Number(iso[3]));
  }

  const numeric = NUMERIC_REGEX.exec(text);
  if (numeric) {
    const [, a, b, y] = numeric;
    const year = expandYear(Number(y));
    return toIsoDate(year, Number(b), Number(a)) ?? toIsoDate(year, Number(a), Number(b));
  }

  const dayMonth = DAY_MONTH_REGEX.exec(text);
  if (dayMonth) {
    const month = monthIndex(dayMonth[2]);
    if (month) {
      return toIsoDate(Number(dayMonth[3]), month, Number(dayMonth[1]));
    }
  }

  const monthDay = MONTH_DAY_REGEX.exec(text);
  if (monthDay) {
    const month = monthIndex(monthDay[1]);
    if (month) {
      return toIsoDate(Number(monthDay[3]), month, Number(monthDay[2]));
    }
  }

  return null;
}

export interface ParsedMoney {
  amount: number;
  currency: string;
}

const CURRENCY_PATTERNS: Array<{ currency: string; pattern: RegExp }> = [
  { currency: 'INR', pattern: /₹|(?:^|[^a-z])(?:rs\.?|inr|rupees?)(?=[^a-z]|$)/i },
  { currency: 'USD', pattern: /\$|(?:^|[^a-z])(?:usd|dollars?)(?=[^a-z]|$)/i },
  { currency: 'EUR', pattern: /€|(?:^|[^a-z])(?:eur|euros?)(?=[^a-z]|$)/i },
  { currency: 'GBP', pattern: /£|(?:^|[^a-z])(?:gbp|pounds?)(?=[^a-z]|$)/i },
];

const AMOUNT_REGEX = /(\d{1,3}(?:,\d{2,3})+|\d+)(\.\d+)?(?:\s*(lakhs?|lacs?|crores?|cr)\b)?/i;

const MULTIPLIERS: Record<string, number> = {
  lakh: 100_000,
  lakhs: 100_000,
  lac: 100_000,
  lacs: 100_000,
  crore: 10_000_000,
  crores: 10_000_000,
  cr: 10_000_000,
};

/**
 * Reads the first amount in the text, e.g. `Rs. 1,00,000/-`, `$1,200`,
 * `INR 2.5 lakh`. Unmarked amounts are taken as rupees.
 */
export function parseMoney(input: string, defaultCurrency = 'INR'): ParsedMoney | null {
  const text = collapseWhitespace(input);
  const match = AMOUNT_REGEX.exec(text);
  if (!match) {
    return null;
  }

  const whole = match[1].replace(/,/g, '');
  const amount = Number.parseFloat(`${whole}${match[2] ?? ''}`);
  if (!Number.isFinite(amount)) {
    return null;
  }

  const multiplier = match[3] ? MULTIPLIERS[match[3].toLowerCase()] ?? 1 : 1;
  const currency = CURRENCY_PATTERNS.find(c => c.pattern.test(text))?.currency ?? defaultCurrency;

  return {
    amount: Math.round(amount * multiplier * 100) / 100,
    currency,
  };
}

const EDGE_PUNCTUATION = /^[\s:;,.\-–]+|[\s:;,\-–]+$/g;

export function parseText(input: string): string | null {
  const text = collapseWhitespace(input).replace(EDGE_PUNCTUATION, '');
  return text.length > 0 ? text : null;
}
