/**
 * Formatter/locator for angle-valued axes.
 *
 * Tick positions are always in degrees. Labels are sexagesimal (degrees or
 * hour angle) or decimal (degrees, arcminutes or arcseconds), depending on the
 * format string.
 *
 * @module createAngleFormatterLocator
 */

import {
  EXPLICIT_VALUES_SPACING,
  SPACING_TOLERANCE,
  type AngleFormatterLocatorOptions,
} from '../config/types';
import { arcseconds, assertAngleQuantity, degrees, fromDegrees, toDegrees, type Quantity } from '../utils/angles';
import { selectStepDegree, selectStepHour, selectStepScalar } from '../utils/selectStep';
import { DEGREE_SYMBOLS, HOUR_SYMBOLS, formatDecimal, formatSexagesimal } from '../utils/sexagesimal';
import { ConfigurationError } from './errors';
import { computeAngleBaseSpacing, parseAngleFormat, type AngleFormatDescriptor } from './formatDescriptor';
import { locateMultiples } from './locateTicks';
import {
  correctSpacing,
  defaultWarningHandler,
  resolveInitialMode,
  tickNumber,
  tickSpacing,
  tickValues,
  type TickMode,
} from './tickMode';
import type { FormatterLocator } from './types';

export type AngleFormatterLocator = FormatterLocator<Quantity>;

/**
 * Label style used when no format is set, chosen from the spacing so that
 * neighbouring ticks get distinct labels.
 *
 * - spacing > 1°: `dd`
 * - spacing > 1′: `dd:mm`
 * - spacing > 1″: `dd:mm:ss`
 * - otherwise `dd:mm:ss` with enough fractional second digits
 */
export function autoAngleDescriptor(spacingDeg: number): AngleFormatDescriptor {
  if (spacingDeg > 1) return { decimal: false, unit: 'degree', fields: 1, precision: 0 };
  if (spacingDeg > 1 / 60) return { decimal: false, unit: 'degree', fields: 2, precision: 0 };
  if (spacingDeg > 1 / 3600) return { decimal: false, unit: 'degree', fields: 3, precision: 0 };

  const spacingArcsec = spacingDeg * 3600;
  const precision = spacingArcsec > 0 && Number.isFinite(spacingArcsec) ? -Math.floor(Math.log10(spacingArcsec)) : 0;
  return { decimal: false, unit: 'degree', fields: 3, precision: Math.max(0, precision) };
}

/**
 * Renders a value in degrees according to an angle descriptor.
 */
export function formatAngle(valueDeg: number, descriptor: AngleFormatDescriptor): string {
  const { decimal, unit, fields, precision } = descriptor;
  const value = fromDegrees(valueDeg, unit);
  if (decimal) return formatDecimal(value, precision);

  const symbols = unit === 'hourangle' ? HOUR_SYMBOLS : DEGREE_SYMBOLS;
  return formatSexagesimal(value, { fields, precision, symbols: symbols.slice(0, fields) });
}

const assertSpacingDegrees = (spacingDeg: number): void => {
  if (!Number.isFinite(spacingDeg) || spacingDeg <= 0) {
    throw new ConfigurationError(`spacing must be a finite positive angle. Received: ${String(spacingDeg)} deg`);
  }
};

/**
 * Creates an angle formatter/locator.
 *
 * At most one of `values`, `number` and `spacing` may be given; with none,
 * five ticks are requested. `spacing` must be an angle {@link Quantity}.
 *
 * @throws ConfigurationError on conflicting or invalid tick options
 * @throws FormatParseError on an unrecognized format
 * @throws TypeError if `spacing` is not an angle quantity
 */
export function createAngleFormatterLocator(options: AngleFormatterLocatorOptions = {}): AngleFormatterLocator {
  const warn = options.onWarning ?? defaultWarningHandler;

  let mode: TickMode<Quantity> = resolveInitialMode(options);
  let format: string | null = null;
  let descriptor: AngleFormatDescriptor | null = null;

  const baseSpacingDeg = (): number | null => (descriptor ? computeAngleBaseSpacing(descriptor) : null);

  const revalidateSpacing = (): void => {
    const base = baseSpacingDeg();
    if (base === null || mode.kind !== 'spacing') return;

    const correction = correctSpacing(toDegrees(mode.spacing), base, SPACING_TOLERANCE);
    if (correction) {
      warn(correction);
      mode = tickSpacing(degrees(correction.corrected));
    }
  };

  const resolveSpacingDeg = (
    currentMode: Exclude<TickMode<Quantity>, { kind: 'values' }>,
    valueMin: number,
    valueMax: number
  ): number => {
    if (currentMode.kind === 'spacing') return toDegrees(currentMode.spacing);

    const dv = Math.abs(valueMax - valueMin) / currentMode.number;
    const base = baseSpacingDeg();
    // The format cannot resolve anything finer than its base spacing.
    if (base !== null && dv < base) return base;
    if (descriptor?.decimal) {
      // 1-2-5 decades in the label unit stay on the 10^-precision grid.
      const unit = descriptor.unit;
      return toDegrees({ value: selectStepScalar(fromDegrees(dv, unit)), unit });
    }
    return descriptor?.unit === 'hourangle' ? selectStepHour(dv) : selectStepDegree(dv);
  };

  const self: AngleFormatterLocator = {
    getMode() {
      return mode;
    },

    setMode(next) {
      switch (next.kind) {
        case 'values':
          self.setValues(next.values);
          return;
        case 'number':
          self.setNumber(next.number);
          return;
        case 'spacing':
          self.setSpacing(next.spacing);
          return;
      }
    },

    getValues() {
      return mode.kind === 'values' ? mode.values : null;
    },

    setValues(values) {
      mode = tickValues(values);
    },

    getNumber() {
      return mode.kind === 'number' ? mode.number : null;
    },

    setNumber(number) {
      mode = tickNumber(number);
    },

    getSpacing() {
      return mode.kind === 'spacing' ? mode.spacing : null;
    },

    setSpacing(spacing) {
      assertAngleQuantity('spacing', spacing);
      assertSpacingDegrees(toDegrees(spacing));
      mode = tickSpacing(spacing);
      revalidateSpacing();
    },

    getFormat() {
      return format;
    },

    setFormat(next) {
      if (next === null) {
        format = null;
        descriptor = null;
        return;
      }
      // Parse before touching state so a bad format leaves the old one in place.
      const parsed = parseAngleFormat(next);
      format = next;
      descriptor = parsed;
      revalidateSpacing();
    },

    getFormatDescriptor() {
      return descriptor;
    },

    getBaseSpacing() {
      const base = baseSpacingDeg();
      return base === null ? null : degrees(base);
    },

    locator(valueMin, valueMax) {
      if (mode.kind === 'values') {
        return { values: [...mode.values], spacing: arcseconds(EXPLICIT_VALUES_SPACING) };
      }

      const spacingDeg = resolveSpacingDeg(mode, valueMin, valueMax);
      return { values: locateMultiples(valueMin, valueMax, spacingDeg), spacing: degrees(spacingDeg) };
    },

    formatter(values, spacing) {
      if (values.length === 0) return [];

      const active = descriptor ?? autoAngleDescriptor(toDegrees(spacing));
      return values.map((v) => formatAngle(v, active));
    },
  };

  if (mode.kind === 'spacing') self.setSpacing(mode.spacing);
  self.setFormat(options.format ?? null);

  return self;
}
