/**
 * Sexagesimal and fixed-point label rendering.
 *
 * @module sexagesimal
 */

export type SexagesimalFields = 1 | 2 | 3;

export const DEGREE_SYMBOLS = ['°', '′', '″'] as const;
export const HOUR_SYMBOLS = ['h', 'm', 's'] as const;

export interface SexagesimalStyle {
  readonly fields: SexagesimalFields;
  /** Fractional digits on the last field. */
  readonly precision: number;
  /** Symbol appended after each field; missing entries render as nothing. */
  readonly symbols: ReadonlyArray<string>;
}

/**
 * Fractional digits actually computed on the last field. Further digits are
 * rendered as zeros so the rounded total stays below 2^53 for whole-sky values.
 */
export const MAX_SEXAGESIMAL_DIGITS = 8;

const SUBDIVISIONS: Readonly<Record<SexagesimalFields, number>> = { 1: 1, 2: 60, 3: 3600 };

const pad2 = (n: number): string => String(n).padStart(2, '0');

/**
 * Renders `value` (degrees or hours) as base-60 fields.
 *
 * Rounding happens once, on the last field, in integer steps of
 * 10^-precision; carries into minutes and whole units follow from the integer
 * split, so 10°59′59.96″ at precision 1 renders as 11°00′00.0″.
 *
 * At most {@link MAX_SEXAGESIMAL_DIGITS} fractional digits are significant.
 *
 * Minutes and seconds are zero-padded to two integer digits. Values that round
 * to zero never carry a minus sign.
 */
export function formatSexagesimal(value: number, style: SexagesimalStyle): string {
  const { fields, precision, symbols } = style;
  if (!Number.isFinite(value)) return String(value);

  const digits = Math.min(precision, MAX_SEXAGESIMAL_DIGITS);
  const scale = 10 ** digits;
  const total = Math.round(Math.abs(value) * SUBDIVISIONS[fields] * scale);
  const lastWhole = Math.floor(total / scale);
  const fraction = total - lastWhole * scale;

  const parts: string[] = [];
  if (fields === 1) {
    parts.push(String(lastWhole));
  } else if (fields === 2) {
    parts.push(String(Math.floor(lastWhole / 60)), pad2(lastWhole % 60));
  } else {
    parts.push(String(Math.floor(lastWhole / 3600)), pad2(Math.floor(lastWhole / 60) % 60), pad2(lastWhole % 60));
  }

  if (precision > 0) {
    parts[parts.length - 1] += `.${String(fraction).padStart(digits, '0').padEnd(precision, '0')}`;
  }

  const sign = value < 0 && total !== 0 ? '-' : '';
  return sign + parts.map((part, i) => part + (symbols[i] ?? '')).join('');
}

/**
 * Fixed-point rendering with exactly `precision` fractional digits.
 *
 * Avoids displaying "-0.00" for values that round to zero.
 */
export function formatDecimal(value: number, precision: number): string {
  // toFixed() only accepts 0..100 digits.
  const formatted = value.toFixed(Math.min(100, Math.max(0, precision)));
  return formatted.startsWith('-') && Number(formatted) === 0 ? formatted.slice(1) : formatted;
}
