/**
 * sextant-ticks - joint tick locators and label formatters for angle and scalar axes
 */

export const version = '1.0.0';

// Formatter/locators - Functional API
export type { FormatterLocator, LocatedTicks } from './ticks/types';
export type { AngleFormatterLocator } from './ticks/createAngleFormatterLocator';
export { createAngleFormatterLocator, autoAngleDescriptor, formatAngle } from './ticks/createAngleFormatterLocator';
export type { ScalarFormatterLocator } from './ticks/createScalarFormatterLocator';
export { createScalarFormatterLocator, autoScalarPrecision } from './ticks/createScalarFormatterLocator';

// Tick modes
export type { TickMode } from './ticks/tickMode';
export { tickValues, tickNumber, tickSpacing, correctSpacing } from './ticks/tickMode';
export { locateMultiples } from './ticks/locateTicks';

// Format descriptors
export type { FormatDescriptor, AngleFormatDescriptor } from './ticks/formatDescriptor';
export {
  parseAngleFormat,
  parseScalarFormat,
  computeAngleBaseSpacing,
  computeScalarBaseSpacing,
} from './ticks/formatDescriptor';

// Errors
export { ConfigurationError, FormatParseError } from './ticks/errors';

// Configuration
export type {
  FormatterLocatorOptions,
  AngleFormatterLocatorOptions,
  ScalarFormatterLocatorOptions,
  SpacingCorrection,
  SpacingCorrectionReason,
  SpacingWarningHandler,
} from './config/types';
export { DEFAULT_TICK_NUMBER, SPACING_TOLERANCE } from './config/types';

// Units, spacing selection and rendering helpers
export type { AngleUnit, UnitKind, Quantity } from './utils/angles';
export {
  quantity,
  degrees,
  arcminutes,
  arcseconds,
  hourangles,
  toDegrees,
  fromDegrees,
  isAngleQuantity,
  assertAngleQuantity,
} from './utils/angles';
export { selectStepScalar, selectStepDegree, selectStepHour } from './utils/selectStep';
export type { SexagesimalFields, SexagesimalStyle } from './utils/sexagesimal';
export { formatSexagesimal, formatDecimal, DEGREE_SYMBOLS, HOUR_SYMBOLS } from './utils/sexagesimal';
