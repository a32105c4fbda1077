/**
 * Tests for sexagesimal and fixed-point label rendering.
 */

import { describe, it, expect } from 'vitest';
import { DEGREE_SYMBOLS, HOUR_SYMBOLS, formatDecimal, formatSexagesimal } from '../sexagesimal';

describe('formatSexagesimal', () => {
  it('renders one, two and three fields', () => {
    expect(formatSexagesimal(10.4, { fields: 1, precision: 0, symbols: DEGREE_SYMBOLS })).toBe('10°');
    expect(formatSexagesimal(10.5, { fields: 2, precision: 0, symbols: DEGREE_SYMBOLS })).toBe('10°30′');
    expect(formatSexagesimal(10, { fields: 3, precision: 0, symbols: DEGREE_SYMBOLS })).toBe('10°00′00″');
  });

  it('rounds to nearest on the last field', () => {
    expect(formatSexagesimal(10.6, { fields: 1, precision: 0, symbols: DEGREE_SYMBOLS })).toBe('11°');
  });

  it('carries rounding into minutes and whole units', () => {
    const value = 10 + 59 / 60 + 59.96 / 3600;
    expect(formatSexagesimal(value, { fields: 3, precision: 1, symbols: DEGREE_SYMBOLS })).toBe('11°00′00.0″');
  });

  it('pads fractional seconds to the requested precision', () => {
    expect(formatSexagesimal(1.5 / 3600, { fields: 3, precision: 2, symbols: DEGREE_SYMBOLS })).toBe('0°00′01.50″');
  });

  it('pads digits beyond the computed precision with zeros', () => {
    expect(formatSexagesimal(359.5, { fields: 3, precision: 12, symbols: DEGREE_SYMBOLS })).toBe(
      '359°30′00.000000000000″'
    );
    expect(formatSexagesimal(1.5 / 3600, { fields: 3, precision: 10, symbols: DEGREE_SYMBOLS })).toBe(
      '0°00′01.5000000000″'
    );
  });

  it('prefixes negative values with a minus sign', () => {
    expect(formatSexagesimal(-10.5, { fields: 2, precision: 0, symbols: DEGREE_SYMBOLS })).toBe('-10°30′');
  });

  it('drops the sign when the value rounds to zero', () => {
    expect(formatSexagesimal(-1e-9, { fields: 3, precision: 0, symbols: DEGREE_SYMBOLS })).toBe('0°00′00″');
  });

  it('uses hour symbols', () => {
    expect(formatSexagesimal(2.5, { fields: 3, precision: 0, symbols: HOUR_SYMBOLS })).toBe('2h30m00s');
  });

  it('leaves out missing symbols', () => {
    expect(formatSexagesimal(10.5, { fields: 2, precision: 0, symbols: [':'] })).toBe('10:30');
  });
});

describe('formatDecimal', () => {
  it('pads to exactly the requested digits', () => {
    expect(formatDecimal(0.3, 2)).toBe('0.30');
    expect(formatDecimal(1, 3)).toBe('1.000');
    expect(formatDecimal(2, 0)).toBe('2');
  });

  it('rounds to nearest', () => {
    expect(formatDecimal(-12.345, 1)).toBe('-12.3');
    expect(formatDecimal(0.26, 1)).toBe('0.3');
  });

  it('normalizes negative zero', () => {
    expect(formatDecimal(-0.001, 2)).toBe('0.00');
    expect(formatDecimal(-0, 0)).toBe('0');
  });
});
