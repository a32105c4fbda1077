/**
 * Tick positions as whole multiples of a spacing.
 *
 * @module locateTicks
 */

import { INDEX_SNAP_TOLERANCE } from '../config/types';

const normalizeZero = (v: number): number => (Object.is(v, -0) ? 0 : v);

// `value / spacing` that lands within tolerance of an integer is that integer,
// e.g. 0.3 / 0.1 === 2.9999999999999996.
const snapIndex = (q: number): number => {
  const rounded = Math.round(q);
  return Math.abs(q - rounded) <= INDEX_SNAP_TOLERANCE * Math.max(1, Math.abs(q)) ? rounded : q;
};

/**
 * Returns `i * spacing` for every integer `i` with `min <= i * spacing <= max`,
 * in ascending order.
 *
 * Positions are computed from the integer index rather than by accumulating
 * `spacing`, so there is no drift across many ticks. An empty array is a
 * normal result (no multiple inside the range, reversed range, or a spacing
 * that is not a finite positive number).
 */
export function locateMultiples(min: number, max: number, spacing: number): number[] {
  if (!Number.isFinite(spacing) || spacing <= 0) return [];
  if (!Number.isFinite(min) || !Number.isFinite(max)) return [];

  const iMin = Math.ceil(snapIndex(min / spacing));
  const iMax = Math.floor(snapIndex(max / spacing));

  const ticks: number[] = [];
  for (let i = iMin; i <= iMax; i++) {
    ticks.push(normalizeZero(i) * spacing);
  }
  return ticks;
}
