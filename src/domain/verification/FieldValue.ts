export const NOT_FOUND = 'not found';
export type NotFound = typeof NOT_FOUND;

export interface TextValue {
  kind: 'text';
  value: string;
}

export interface DateValue {
  kind: 'date';
  /** ISO calendar date, `YYYY-MM-DD`. */
  value: string;
}

export interface MoneyValue {
  kind: 'money';
  amount: number;
  currency: string;
}

export type FieldValue = TextValue | DateValue | MoneyValue | NotFound;

export const isResolved = (value: FieldValue): value is TextValue | DateValue | MoneyValue => value !== NOT_FOUND;

export function formatFieldValue(value: FieldValue): string {
  if (value === NOT_FOUND) {
    return NOT_FOUND;
  }
  switch (value.kind) {
    case 'text':
    case 'date':
      return value.value;
    case 'money':
      return `${value.currency} ${value.amount.toFixed(2)}`;
  }
}
