/**
 * Angle quantities.
 *
 * A deliberately closed set of unit kinds: the tick code only ever needs
 * degrees, hour angle, arcminutes, arcseconds and plain numbers.
 *
 * @module angles
 */

export type AngleUnit = 'degree' | 'hourangle' | 'arcminute' | 'arcsecond';
export type UnitKind = AngleUnit | 'dimensionless';

export interface Quantity {
  readonly value: number;
  readonly unit: UnitKind;
}

// Stored as "units per degree" or "degrees per unit", whichever is an integer,
// so conversions multiply or divide by an exact factor.
const CONVERSIONS: Readonly<Record<AngleUnit, Readonly<{ factor: number; perDegree: boolean }>>> = {
  degree: { factor: 1, perDegree: false },
  hourangle: { factor: 15, perDegree: false },
  arcminute: { factor: 60, perDegree: true },
  arcsecond: { factor: 3600, perDegree: true },
};

const ANGLE_UNITS: readonly string[] = Object.keys(CONVERSIONS);

export const isAngleUnit = (unit: unknown): unit is AngleUnit =>
  typeof unit === 'string' && ANGLE_UNITS.includes(unit);

export function quantity(value: number, unit: UnitKind): Quantity {
  return { value, unit };
}

/**
 * Returns true if `value` is a quantity carrying one of the angular units.
 */
export function isAngleQuantity(value: unknown): value is Quantity & { readonly unit: AngleUnit } {
  if (typeof value !== 'object' || value === null) return false;
  if (!('value' in value) || !('unit' in value)) return false;
  return typeof value.value === 'number' && isAngleUnit(value.unit);
}

/**
 * Throws a TypeError unless `value` is an angle quantity.
 */
export function assertAngleQuantity(
  label: string,
  value: unknown
): asserts value is Quantity & { readonly unit: AngleUnit } {
  if (!isAngleQuantity(value)) {
    throw new TypeError(`${label} should be a Quantity with units of angle. Received: ${describeValue(value)}`);
  }
}

const describeValue = (value: unknown): string => {
  if (typeof value === 'object' && value !== null && 'unit' in value) {
    return `quantity in ${String(value.unit)}`;
  }
  return String(value);
};

export function toDegrees(q: Quantity): number {
  if (q.unit === 'dimensionless') {
    throw new TypeError('toDegrees(q): dimensionless quantities cannot be converted to an angle.');
  }
  const { factor, perDegree } = CONVERSIONS[q.unit];
  return perDegree ? q.value / factor : q.value * factor;
}

export function fromDegrees(valueDeg: number, unit: AngleUnit): number {
  const { factor, perDegree } = CONVERSIONS[unit];
  return perDegree ? valueDeg * factor : valueDeg / factor;
}

export const degrees = (value: number): Quantity => quantity(value, 'degree');
export const arcminutes = (value: number): Quantity => quantity(value, 'arcminute');
export const arcseconds = (value: number): Quantity => quantity(value, 'arcsecond');
export const hourangles = (value: number): Quantity => quantity(value, 'hourangle');
