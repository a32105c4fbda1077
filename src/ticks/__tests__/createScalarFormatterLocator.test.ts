/**
 * Tests for the scalar formatter/locator.
 */

import { describe, it, expect, vi } from 'vitest';
import { autoScalarPrecision, createScalarFormatterLocator } from '../createScalarFormatterLocator';
import { ConfigurationError, FormatParseError } from '../errors';
import { tickNumber } from '../tickMode';

describe('createScalarFormatterLocator: configuration', () => {
  it('defaults to five ticks and no format', () => {
    const fl = createScalarFormatterLocator();

    expect(fl.getMode()).toEqual({ kind: 'number', number: 5 });
    expect(fl.getFormat()).toBeNull();
    expect(fl.getBaseSpacing()).toBeNull();
  });

  it('rejects more than one of values/number/spacing', () => {
    expect(() => createScalarFormatterLocator({ values: [0], spacing: 1 })).toThrow(ConfigurationError);
  });

  it('rejects invalid tick counts and keeps the previous mode', () => {
    const fl = createScalarFormatterLocator({ number: 4 });

    expect(() => fl.setNumber(0)).toThrow(ConfigurationError);
    expect(() => fl.setNumber(2.5)).toThrow(ConfigurationError);
    expect(fl.getNumber()).toBe(4);
  });

  it('keeps exactly one mode active after each setter', () => {
    const fl = createScalarFormatterLocator({ spacing: 2 });

    fl.setNumber(7);
    expect(fl.getSpacing()).toBeNull();
    expect(fl.getNumber()).toBe(7);

    fl.setValues([0.5]);
    expect(fl.getNumber()).toBeNull();
    expect(fl.getValues()).toEqual([0.5]);

    fl.setSpacing(0.25);
    expect(fl.getValues()).toBeNull();
    expect(fl.getSpacing()).toBe(0.25);

    fl.setMode(tickNumber(2));
    expect(fl.getSpacing()).toBeNull();
    expect(fl.getNumber()).toBe(2);
  });

  it('rejects invalid spacings and formats', () => {
    const fl = createScalarFormatterLocator({ format: 'x.x' });

    expect(() => fl.setSpacing(-1)).toThrow(ConfigurationError);
    expect(() => fl.setSpacing(Number.POSITIVE_INFINITY)).toThrow(ConfigurationError);
    expect(() => fl.setFormat('x.y')).toThrow(FormatParseError);
    expect(() => fl.setFormat('dd')).toThrow(FormatParseError);
    expect(fl.getFormat()).toBe('x.x');
  });

  it('reports the base spacing of the format', () => {
    const fl = createScalarFormatterLocator({ format: 'x.xxx' });

    expect(fl.getBaseSpacing()).toBe(0.001);
    expect(fl.getFormatDescriptor()).toEqual({ decimal: true, unit: 'dimensionless', fields: 1, precision: 3 });
  });
});

describe('createScalarFormatterLocator: spacing correction', () => {
  it('raises a spacing finer than the format can show', () => {
    const onWarning = vi.fn();
    const fl = createScalarFormatterLocator({ format: 'x.x', spacing: 0.05, onWarning });

    expect(fl.getSpacing()).toBe(0.1);
    expect(onWarning).toHaveBeenCalledTimes(1);
    expect(onWarning.mock.calls[0][0]).toMatchObject({ reason: 'too-small', requested: 0.05, corrected: 0.1 });
  });

  it('rounds to the nearest multiple of the base spacing', () => {
    const onWarning = vi.fn();
    const fl = createScalarFormatterLocator({ format: 'x.x', onWarning });

    fl.setSpacing(0.23);

    expect(fl.getSpacing()).toBe(2 * 0.1);
    expect(onWarning.mock.calls[0][0]).toMatchObject({ reason: 'not-multiple', requested: 0.23 });
  });

  it('raises a spacing finer than a high-precision format can show', () => {
    const onWarning = vi.fn();
    const fl = createScalarFormatterLocator({ format: 'x.xxxxxxxxxxx', spacing: 5e-12, onWarning });

    expect(fl.getSpacing()).toBe(1e-11);
    expect(onWarning.mock.calls[0][0]).toMatchObject({ reason: 'too-small', requested: 5e-12 });

    const { values, spacing } = fl.locator(0, 4e-11);
    expect(fl.formatter(values, spacing)).toEqual([
      '0.00000000000',
      '0.00000000001',
      '0.00000000002',
      '0.00000000003',
      '0.00000000004',
    ]);
  });

  it('accepts a spacing already on the grid', () => {
    const onWarning = vi.fn();
    const fl = createScalarFormatterLocator({ format: 'x.xx', spacing: 0.1, onWarning });

    expect(fl.getSpacing()).toBe(0.1);
    expect(onWarning).not.toHaveBeenCalled();
  });
});

describe('createScalarFormatterLocator: locator and formatter', () => {
  it('places and labels ticks with a fixed spacing', () => {
    const fl = createScalarFormatterLocator({ format: 'x.xx', spacing: 0.1 });

    const { values, spacing } = fl.locator(0, 0.35);

    expect(spacing).toBe(0.1);
    expect(values).toEqual([0, 0.1, 0.2, 3 * 0.1]);
    expect(fl.formatter(values, spacing)).toEqual(['0.00', '0.10', '0.20', '0.30']);
  });

  it('chooses a nice spacing for a tick count', () => {
    const fl = createScalarFormatterLocator();

    const { values, spacing } = fl.locator(0, 10);

    expect(spacing).toBe(2);
    expect(values).toEqual([0, 2, 4, 6, 8, 10]);
    expect(fl.formatter(values, spacing)).toEqual(['0', '2', '4', '6', '8', '10']);
  });

  it('derives label precision from a fractional spacing', () => {
    const fl = createScalarFormatterLocator();

    const { values, spacing } = fl.locator(0, 1);

    expect(spacing).toBe(0.2);
    expect(fl.formatter(values, spacing)).toEqual(['0.0', '0.2', '0.4', '0.6', '0.8', '1.0']);
  });

  it('falls back to the base spacing when the ideal spacing is finer', () => {
    const fl = createScalarFormatterLocator({ format: 'x', number: 5 });

    expect(fl.locator(0, 2)).toEqual({ values: [0, 1, 2], spacing: 1 });
  });

  it('returns explicit values verbatim with the sentinel spacing', () => {
    const fl = createScalarFormatterLocator({ values: [1.5, 3] });

    const { values, spacing } = fl.locator(100, 200);

    expect(values).toEqual([1.5, 3]);
    expect(spacing).toBe(1.1);
    expect(fl.formatter(values, spacing)).toEqual(['2', '3']);
  });

  it('never renders negative zero', () => {
    const fl = createScalarFormatterLocator({ format: 'x.x' });

    expect(fl.formatter([-0.04, -1.26], 0.1)).toEqual(['0.0', '-1.3']);
  });

  it('returns empty results for an empty range', () => {
    const fl = createScalarFormatterLocator({ spacing: 1 });

    const { values, spacing } = fl.locator(5.2, 5.8);

    expect(values).toEqual([]);
    expect(fl.formatter(values, spacing)).toEqual([]);
  });

  it('falls back to automatic labels once the format is cleared', () => {
    const fl = createScalarFormatterLocator({ format: 'x.xxx' });

    fl.setFormat(null);

    expect(fl.formatter([0.5], 0.5)).toEqual(['0.5']);
  });
});

describe('autoScalarPrecision', () => {
  it('uses enough digits to separate ticks', () => {
    expect(autoScalarPrecision(5)).toBe(0);
    expect(autoScalarPrecision(1)).toBe(0);
    expect(autoScalarPrecision(0.5)).toBe(1);
    expect(autoScalarPrecision(0.02)).toBe(2);
  });

  it('returns zero for unusable spacings', () => {
    expect(autoScalarPrecision(0)).toBe(0);
    expect(autoScalarPrecision(Number.NaN)).toBe(0);
  });
});
