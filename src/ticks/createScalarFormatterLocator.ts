/**
 * Formatter/locator for plain numeric axes.
 *
 * @module createScalarFormatterLocator
 */

import {
  EXPLICIT_VALUES_SPACING,
  SPACING_TOLERANCE,
  type ScalarFormatterLocatorOptions,
} from '../config/types';
import { selectStepScalar } from '../utils/selectStep';
import { formatDecimal } from '../utils/sexagesimal';
import { ConfigurationError } from './errors';
import { computeScalarBaseSpacing, parseScalarFormat, type FormatDescriptor } from './formatDescriptor';
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

export type ScalarFormatterLocator = FormatterLocator<number>;

/**
 * Fractional digits used when no format is set: enough to tell ticks `spacing`
 * apart, and none for spacings of 1 or more.
 */
export function autoScalarPrecision(spacing: number): number {
  if (!Number.isFinite(spacing) || spacing <= 0 || spacing >= 1) return 0;
  return -Math.floor(Math.log10(spacing));
}

const assertSpacing = (spacing: number): void => {
  if (!Number.isFinite(spacing) || spacing <= 0) {
    throw new ConfigurationError(`spacing must be a finite positive number. Received: ${String(spacing)}`);
  }
};

/**
 * Creates a scalar formatter/locator.
 *
 * At most one of `values`, `number` and `spacing` may be given; with none,
 * five ticks are requested.
 *
 * @throws ConfigurationError on conflicting or invalid tick options
 * @throws FormatParseError on an unrecognized format
 */
export function createScalarFormatterLocator(options: ScalarFormatterLocatorOptions = {}): ScalarFormatterLocator {
  const warn = options.onWarning ?? defaultWarningHandler;

  let mode: TickMode<number> = resolveInitialMode(options);
  let format: string | null = null;
  let descriptor: FormatDescriptor | null = null;

  const baseSpacing = (): number | null => (descriptor ? computeScalarBaseSpacing(descriptor) : null);

  const revalidateSpacing = (): void => {
    const base = baseSpacing();
    if (base === null || mode.kind !== 'spacing') return;

    const correction = correctSpacing(mode.spacing, base, SPACING_TOLERANCE);
    if (correction) {
      warn(correction);
      mode = tickSpacing(correction.corrected);
    }
  };

  const self: ScalarFormatterLocator = {
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
      assertSpacing(spacing);
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
      const parsed = parseScalarFormat(next);
      format = next;
      descriptor = parsed;
      revalidateSpacing();
    },

    getFormatDescriptor() {
      return descriptor;
    },

    getBaseSpacing() {
      return baseSpacing();
    },

    locator(valueMin, valueMax) {
      if (mode.kind === 'values') {
        return { values: [...mode.values], spacing: EXPLICIT_VALUES_SPACING };
      }

      let spacing: number;
      if (mode.kind === 'spacing') {
        spacing = mode.spacing;
      } else {
        const dv = Math.abs(valueMax - valueMin) / mode.number;
        const base = baseSpacing();
        spacing = base !== null && dv < base ? base : selectStepScalar(dv);
      }

      return { values: locateMultiples(valueMin, valueMax, spacing), spacing };
    },

    formatter(values, spacing) {
      if (values.length === 0) return [];

      const precision = descriptor ? descriptor.precision : autoScalarPrecision(spacing);
      return values.map((v) => formatDecimal(v, precision));
    },
  };

  if (mode.kind === 'spacing') self.setSpacing(mode.spacing);
  self.setFormat(options.format ?? null);

  return self;
}
