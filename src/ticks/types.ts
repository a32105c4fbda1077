import type { FormatDescriptor } from './formatDescriptor';
import type { TickMode } from './tickMode';

export interface LocatedTicks<TSpacing> {
  /** Tick positions, ascending unless they were given explicitly. */
  readonly values: number[];
  /** Spacing the positions were generated with; pass it on to `formatter`. */
  readonly spacing: TSpacing;
}

/**
 * A joint tick formatter/locator.
 *
 * The locator only produces spacings the current format can render exactly,
 * and the formatter picks a label precision that distinguishes neighbouring
 * ticks. Neither call keeps state between invocations.
 */
export interface FormatterLocator<TSpacing> {
  getMode(): TickMode<TSpacing>;
  setMode(mode: TickMode<TSpacing>): void;

  /** Explicit tick values, or null when another mode is active. */
  getValues(): ReadonlyArray<number> | null;
  /** Replaces the current mode with explicit values. */
  setValues(values: ReadonlyArray<number>): void;

  /** Desired tick count, or null when another mode is active. */
  getNumber(): number | null;
  /**
   * Replaces the current mode with a desired tick count.
   *
   * @throws ConfigurationError if `number` is not a positive integer
   */
  setNumber(number: number): void;

  /** Fixed spacing, or null when another mode is active. */
  getSpacing(): TSpacing | null;
  /**
   * Replaces the current mode with a fixed spacing. With a format set, the
   * spacing is first corrected onto the format's base spacing.
   */
  setSpacing(spacing: TSpacing): void;

  getFormat(): string | null;
  /**
   * Sets (or clears, with null) the label format, then re-validates any fixed
   * spacing against the new base spacing.
   *
   * @throws FormatParseError
   */
  setFormat(format: string | null): void;
  getFormatDescriptor(): FormatDescriptor | null;

  /** Finest spacing the current format can represent, or null without a format. */
  getBaseSpacing(): TSpacing | null;

  locator(valueMin: number, valueMax: number): LocatedTicks<TSpacing>;
  formatter(values: ReadonlyArray<number>, spacing: TSpacing): string[];
}
