/**
 * "Nice" tick spacing selection.
 *
 * Maps a raw desired spacing onto the nearest clean value of the relevant unit
 * system: 1-2-5 decades for plain numbers, and tabulated sexagesimal steps for
 * degrees and hour angle.
 *
 * @module selectStep
 */

const DECADE_MULTIPLIERS = [1, 2, 5, 10] as const;
const DECADE_LOGS = DECADE_MULTIPLIERS.map((m) => Math.log10(m));

// Shared by minutes and seconds (of arc or of time).
const MINSEC_LIMITS = [1.5, 2.5, 3.5, 8, 11, 18, 25, 45];
const MINSEC_STEPS = [1, 2, 3, 5, 10, 15, 20, 30];

const DEGREE_LIMITS = [1.5, 3, 7, 13, 20, 40, 70, 120, 270, 520];
const DEGREE_STEPS = [1, 2, 5, 10, 15, 30, 45, 90, 180, 360];

const HOUR_LIMITS = [1.5, 2.5, 3.5, 5, 7, 10, 15, 21, 36];
const HOUR_STEPS = [1, 2, 3, 4, 6, 8, 12, 18, 24];

interface StepTable {
  readonly limits: readonly number[];
  readonly steps: readonly number[];
}

/**
 * Builds a combined second/minute/whole table in degrees.
 *
 * @param degreesPerWhole - 1 for degrees, 15 for hours
 */
function buildTable(
  degreesPerWhole: number,
  wholeLimits: readonly number[],
  wholeSteps: readonly number[]
): StepTable {
  const perSecond = degreesPerWhole / 3600;
  const perMinute = degreesPerWhole / 60;
  return {
    limits: [
      ...MINSEC_LIMITS.map((l) => l * perSecond),
      ...MINSEC_LIMITS.map((l) => l * perMinute),
      ...wholeLimits.map((l) => l * degreesPerWhole),
    ],
    steps: [
      ...MINSEC_STEPS.map((s) => s * perSecond),
      ...MINSEC_STEPS.map((s) => s * perMinute),
      ...wholeSteps.map((s) => s * degreesPerWhole),
    ],
  };
}

const DEGREE_TABLE = buildTable(1, DEGREE_LIMITS, DEGREE_STEPS);
const HOUR_TABLE = buildTable(15, HOUR_LIMITS, HOUR_STEPS);

/**
 * First step whose limit is >= dv; past the end of the table, the largest step.
 */
function lookupStep(table: StepTable, dv: number): number {
  const n = table.limits.findIndex((limit) => limit >= dv);
  return table.steps[n === -1 ? table.steps.length - 1 : n];
}

/**
 * Rounds a positive spacing to the nearest (in log space) of 1, 2, 5 or 10
 * times a power of ten.
 *
 * Non-finite or non-positive input is returned unchanged.
 */
export function selectStepScalar(dv: number): number {
  if (!Number.isFinite(dv) || dv <= 0) return dv;

  const logDv = Math.log10(dv);
  const base = Math.floor(logDv);
  const frac = logDv - base;

  let best = 0;
  for (let i = 1; i < DECADE_LOGS.length; i++) {
    if (Math.abs(frac - DECADE_LOGS[i]) < Math.abs(frac - DECADE_LOGS[best])) best = i;
  }

  // Divide for negative exponents: 5 / 100 is exact where 5 * 0.01 is not.
  const multiplier = DECADE_MULTIPLIERS[best];
  return base >= 0 ? multiplier * 10 ** base : multiplier / 10 ** -base;
}

/**
 * Selects a clean degree/arcminute/arcsecond spacing.
 *
 * @param dvDeg - Raw spacing in degrees
 * @returns Spacing in degrees
 */
export function selectStepDegree(dvDeg: number): number {
  if (dvDeg > 1 / 3600) return lookupStep(DEGREE_TABLE, dvDeg);
  return selectStepScalar(dvDeg * 3600) / 3600;
}

/**
 * Selects a clean hour/minute/second-of-time spacing.
 *
 * @param dvDeg - Raw spacing in degrees
 * @returns Spacing in degrees
 */
export function selectStepHour(dvDeg: number): number {
  if (dvDeg > 15 / 3600) return lookupStep(HOUR_TABLE, dvDeg);
  return (selectStepScalar((dvDeg * 3600) / 15) * 15) / 3600;
}
