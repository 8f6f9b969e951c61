/**
 * Attribute value cleaning and type inference for text fields
 */

import type { AttributeValue, FieldType } from '../core/types.js';

// ============================================================================
// Sentinels
// ============================================================================

/**
 * Spellings of "no value" seen in exported spreadsheets and legacy systems,
 * compared case-insensitively after trimming
 */
export const NULL_SENTINELS: ReadonlySet<string> = new Set(['', 'null', 'n/a', '-', '--', 'na', '#n/a', 'none', 'nan']);

export function isNullSentinel(value: string): boolean {
  return NULL_SENTINELS.has(value.trim().toLowerCase());
}

// ============================================================================
// Text cleaning
// ============================================================================

// C0 controls except tab, line feed and carriage return, plus DEL
const CONTROL_CHARS = /[\x00-\x08\x0B\x0C\x0E-\x1F\x7F]/g;

export interface CleanedText {
  readonly value: string;
  readonly trimmed: boolean;
  readonly stripped: boolean;
}

export function cleanText(raw: string): CleanedText {
  const withoutControls = raw.replace(CONTROL_CHARS, '');
  const value = withoutControls.trim();
  return {
    value,
    stripped: withoutControls !== raw,
    trimmed: value !== withoutControls,
  };
}

// ============================================================================
// Inference
// ============================================================================

const INTEGER = /^[-+]?\d+$/;
const REAL = /^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/;
const DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const DATETIME = /^(\d{4})-(\d{2})-(\d{2})[ T](\d{2}):(\d{2}):(\d{2})(\.\d+)?(Z|[+-]\d{2}:?\d{2})?$/;

/**
 * Integer part written with a leading zero, e.g. `0123` or `-007.5`
 * (identifiers such as postal codes, which must stay text)
 */
function hasLeadingZero(value: string): boolean {
  return /^[-+]?0\d/.test(value);
}

// Decimal digits a double holds exactly
const MAX_EXACT_DIGITS = 15;

function significantDigits(value: string): number {
  const mantissa = value.replace(/^[-+]/, '').replace(/[eE].*$/, '').replace('.', '');
  return mantissa.replace(/^0+/, '').replace(/0+$/, '').length;
}

/**
 * Numeric text whose value survives conversion to a number unchanged
 */
function isExactNumber(value: string): boolean {
  if (!REAL.test(value) || hasLeadingZero(value) || !Number.isFinite(Number(value))) return false;
  if (INTEGER.test(value) && Number.isSafeInteger(Number(value))) return true;
  return significantDigits(value) <= MAX_EXACT_DIGITS;
}

function isCalendarDate(year: string, month: string, day: string): boolean {
  const y = Number(year);
  const m = Number(month);
  const d = Number(day);
  if (m < 1 || m > 12 || d < 1) return false;
  const daysInMonth = new Date(Date.UTC(y, m, 0)).getUTCDate();
  return d <= daysInMonth;
}

export function isIsoDate(value: string): boolean {
  const match = DATE.exec(value);
  return match !== null && isCalendarDate(match[1] ?? '', match[2] ?? '', match[3] ?? '');
}

export function isIsoDateTime(value: string): boolean {
  const match = DATETIME.exec(value);
  if (match === null || !isCalendarDate(match[1] ?? '', match[2] ?? '', match[3] ?? '')) return false;
  return Number(match[4]) < 24 && Number(match[5]) < 60 && Number(match[6]) < 60;
}

/**
 * Narrowest type every value fits, or undefined to keep the field as text
 *
 * `values` are cleaned, non-null strings. Numbers with more digits than a
 * double holds stay text.
 */
export function inferTextFieldType(values: readonly string[]): FieldType | undefined {
  if (values.length === 0) return undefined;

  if (values.every(isExactNumber)) {
    const integral = values.every((v) => INTEGER.test(v) && Number.isSafeInteger(Number(v)));
    return integral ? 'integer' : 'real';
  }

  let dates = 0;
  let dateTimes = 0;
  for (const v of values) {
    if (isIsoDate(v)) dates++;
    else if (isIsoDateTime(v)) dateTimes++;
    else return undefined;
  }
  return dateTimes > 0 ? 'datetime' : dates > 0 ? 'date' : undefined;
}

/**
 * Convert a cleaned string to the in-memory representation of `type`
 */
export function convertText(value: string, type: FieldType): AttributeValue {
  switch (type) {
    case 'integer':
    case 'real':
      return Number(value);
    case 'datetime':
      return isIsoDate(value) ? `${value}T00:00:00` : value.replace(' ', 'T');
    default:
      return value;
  }
}
