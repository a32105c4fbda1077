/**
 * Tick placement modes.
 *
 * Exactly one of explicit values, a desired tick count or a fixed spacing is
 * active at a time. Replacing the mode replaces the whole union member, so the
 * other two can never linger.
 *
 * @module tickMode
 */

import {
  DEFAULT_TICK_NUMBER,
  SPACING_RELATIVE_TOLERANCE,
  SPACING_TOLERANCE,
  type FormatterLocatorOptions,
  type SpacingCorrection,
  type SpacingWarningHandler,
} from '../config/types';
import { ConfigurationError } from './errors';

export type TickMode<TSpacing> =
  | Readonly<{ kind: 'values'; values: ReadonlyArray<number> }>
  | Readonly<{ kind: 'number'; number: number }>
  | Readonly<{ kind: 'spacing'; spacing: TSpacing }>;

export const tickValues = (values: ReadonlyArray<number>): TickMode<never> => ({
  kind: 'values',
  values: Object.freeze([...values]),
});

export const tickNumber = (number: number): TickMode<never> => {
  assertTickNumber(number);
  return { kind: 'number', number };
};

export const tickSpacing = <TSpacing>(spacing: TSpacing): TickMode<TSpacing> => ({ kind: 'spacing', spacing });

export function assertTickNumber(number: number): void {
  if (!Number.isInteger(number) || number <= 0) {
    throw new ConfigurationError(`number must be a positive integer. Received: ${String(number)}`);
  }
}

/**
 * Picks the initial mode from constructor options.
 *
 * @throws ConfigurationError if more than one of values/number/spacing is set
 */
export function resolveInitialMode<TSpacing>(options: FormatterLocatorOptions<TSpacing>): TickMode<TSpacing> {
  const { values, number, spacing } = options;
  const given = [values, number, spacing].filter((v) => v !== undefined && v !== null).length;
  if (given > 1) {
    throw new ConfigurationError('At most one of values/number/spacing can be specified');
  }

  if (values !== undefined && values !== null) return tickValues(values);
  if (number !== undefined && number !== null) return tickNumber(number);
  if (spacing !== undefined && spacing !== null) return tickSpacing(spacing);
  return tickNumber(DEFAULT_TICK_NUMBER);
}

export const defaultWarningHandler: SpacingWarningHandler = (correction) => {
  console.warn(correction.message);
};

/**
 * Brings `spacing` onto the grid of `baseSpacing`.
 *
 * - Below the base spacing: replaced by the base spacing.
 * - Further than `tolerance` from a multiple: rounded to the nearest multiple.
 *
 * Both checks are capped at a small fraction of `baseSpacing`.
 *
 * Returns null when no correction is needed.
 */
export function correctSpacing(
  spacing: number,
  baseSpacing: number,
  tolerance: number = SPACING_TOLERANCE
): SpacingCorrection | null {
  const relative = baseSpacing * SPACING_RELATIVE_TOLERANCE;
  if (spacing < baseSpacing - relative) {
    return {
      reason: 'too-small',
      requested: spacing,
      corrected: baseSpacing,
      message: 'Spacing is too small - resetting spacing to match format',
    };
  }

  const multiple = Math.round(spacing / baseSpacing);
  const corrected = multiple * baseSpacing;
  if (Math.abs(spacing - corrected) > Math.min(tolerance, relative)) {
    return {
      reason: 'not-multiple',
      requested: spacing,
      corrected,
      message: 'Spacing is not a multiple of base spacing - resetting spacing to match format',
    };
  }

  return null;
}
