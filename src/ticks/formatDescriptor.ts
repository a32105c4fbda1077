/**
 * Tick label format strings.
 *
 * A format string such as `dd:mm:ss.s` or `x.xx` is parsed once into an
 * immutable {@link FormatDescriptor}. The grammar is an ordered list of rules;
 * the first rule whose pattern matches the whole string wins.
 *
 * @module formatDescriptor
 */

import { toDegrees, type AngleUnit, type UnitKind } from '../utils/angles';
import type { SexagesimalFields } from '../utils/sexagesimal';
import { FormatParseError } from './errors';

export interface FormatDescriptor {
  /** Decimal fraction (`3.21`) rather than sexagesimal fields (`dd:mm:ss`). */
  readonly decimal: boolean;
  readonly unit: UnitKind;
  /** Sexagesimal field count; always 1 for decimal formats. */
  readonly fields: SexagesimalFields;
  /** Fractional digits on the last field. */
  readonly precision: number;
}

export interface AngleFormatDescriptor extends FormatDescriptor {
  readonly unit: AngleUnit;
}

interface FormatRule<D extends FormatDescriptor> {
  readonly pattern: RegExp;
  readonly build: (format: string) => D;
}

const precisionOf = (format: string): number => {
  const dot = format.indexOf('.');
  return dot === -1 ? 0 : format.length - dot - 1;
};

const fieldsOf = (format: string): SexagesimalFields => {
  if (format.includes('.')) return 3;
  const colons = format.split(':').length - 1;
  return colons === 0 ? 1 : colons === 1 ? 2 : 3;
};

const sexagesimalRule = (pattern: RegExp, unit: AngleUnit): FormatRule<AngleFormatDescriptor> => ({
  pattern,
  build: (format) => ({ decimal: false, unit, fields: fieldsOf(format), precision: precisionOf(format) }),
});

const decimalRule = <U extends UnitKind>(pattern: RegExp, unit: U): FormatRule<FormatDescriptor & { unit: U }> => ({
  pattern,
  build: (format) => ({ decimal: true, unit, fields: 1, precision: precisionOf(format) }),
});

const ANGLE_FORMAT_RULES: ReadonlyArray<FormatRule<AngleFormatDescriptor>> = [
  sexagesimalRule(/^dd(:mm(:ss(\.s+)?)?)?$/, 'degree'),
  sexagesimalRule(/^hh(:mm(:ss(\.s+)?)?)?$/, 'hourangle'),
  decimalRule(/^d(\.d+)?$/, 'degree'),
  decimalRule(/^m(\.m+)?$/, 'arcminute'),
  decimalRule(/^s(\.s+)?$/, 'arcsecond'),
];

const SCALAR_FORMAT_RULES: ReadonlyArray<FormatRule<FormatDescriptor>> = [
  decimalRule(/^x(\.x+)?$/, 'dimensionless'),
];

function parseWith<D extends FormatDescriptor>(rules: ReadonlyArray<FormatRule<D>>, format: string): D {
  const rule = rules.find((r) => r.pattern.test(format));
  if (!rule) throw new FormatParseError(format);
  const descriptor = rule.build(format);
  Object.freeze(descriptor);
  return descriptor;
}

/**
 * Parses an angle format: `dd[:mm[:ss[.s…]]]`, `hh[:mm[:ss[.s…]]]`,
 * `d[.d…]`, `m[.m…]` or `s[.s…]`.
 *
 * @throws FormatParseError
 */
export function parseAngleFormat(format: string): AngleFormatDescriptor {
  return parseWith(ANGLE_FORMAT_RULES, format);
}

/**
 * Parses a scalar format: `x` or `x.x…`.
 *
 * @throws FormatParseError
 */
export function parseScalarFormat(format: string): FormatDescriptor {
  return parseWith(SCALAR_FORMAT_RULES, format);
}

/**
 * Finest spacing, in degrees, that an angle format can represent exactly.
 *
 * Decimal formats resolve one unit / 10^precision. Sexagesimal formats resolve
 * 1°, 1′ or 1″ / 10^precision for one, two or three fields, scaled by 15 for
 * hour angle (so `hh:mm` resolves one minute of time).
 */
export function computeAngleBaseSpacing(descriptor: AngleFormatDescriptor): number {
  const scale = 10 ** descriptor.precision;

  if (descriptor.decimal) {
    return toDegrees({ value: 1, unit: descriptor.unit }) / scale;
  }

  const perWhole = descriptor.unit === 'hourangle' ? 15 : 1;
  switch (descriptor.fields) {
    case 1:
      return perWhole;
    case 2:
      return perWhole / 60;
    case 3:
      return perWhole / 3600 / scale;
  }
}

/**
 * Finest spacing a scalar format can represent exactly: 1 / 10^precision.
 */
export function computeScalarBaseSpacing(descriptor: FormatDescriptor): number {
  return 1 / 10 ** descriptor.precision;
}
