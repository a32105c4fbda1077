/**
 * Formatter/locator configuration types.
 */

import type { Quantity } from '../utils/angles';

/** Tick count used when none of values/number/spacing is given. */
export const DEFAULT_TICK_NUMBER = 5;

/**
 * Absolute tolerance for "spacing is a multiple of the base spacing", in
 * degrees for angles and raw units for scalars.
 */
export const SPACING_TOLERANCE = 1e-10;

/**
 * Tolerance relative to the base spacing. Bounds both spacing checks, so
 * formats whose base spacing is near or below {@link SPACING_TOLERANCE} are
 * still enforced.
 */
export const SPACING_RELATIVE_TOLERANCE = 1e-9;

/**
 * Relative tolerance used when snapping `value / spacing` to a whole tick index.
 */
export const INDEX_SNAP_TOLERANCE = 1e-9;

/**
 * Sentinel spacing reported with explicit values, as a multiple of the
 * smallest unit (arcseconds for angles). Only used to pick label precision.
 */
export const EXPLICIT_VALUES_SPACING = 1.1;

export type SpacingCorrectionReason = 'too-small' | 'not-multiple';

/**
 * Emitted when an explicit spacing cannot be represented by the current
 * format and has been replaced.
 *
 * `requested` and `corrected` are in degrees for angles, raw units for scalars.
 */
export interface SpacingCorrection {
  readonly reason: SpacingCorrectionReason;
  readonly requested: number;
  readonly corrected: number;
  readonly message: string;
}

export type SpacingWarningHandler = (correction: SpacingCorrection) => void;

export interface FormatterLocatorOptions<TSpacing> {
  /** Exact tick positions, used verbatim. */
  readonly values?: ReadonlyArray<number> | null;
  /** Desired number of ticks (positive integer). */
  readonly number?: number | null;
  /** Fixed tick spacing. */
  readonly spacing?: TSpacing | null;
  /** Label format string; omitted means labels are derived from the spacing. */
  readonly format?: string | null;
  /**
   * Receives spacing corrections. Defaults to writing the message with
   * `console.warn`.
   */
  readonly onWarning?: SpacingWarningHandler;
}

export type AngleFormatterLocatorOptions = FormatterLocatorOptions<Quantity>;
export type ScalarFormatterLocatorOptions = FormatterLocatorOptions<number>;
