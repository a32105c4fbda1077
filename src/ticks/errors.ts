/**
 * Raised when a formatter/locator is configured inconsistently, e.g. with more
 * than one of `values`, `number` and `spacing`.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Raised when a format string matches none of the recognized grammars.
 */
export class FormatParseError extends Error {
  readonly format: string;

  constructor(format: string) {
    super(`Invalid format: ${format}`);
    this.name = 'FormatParseError';
    this.format = format;
  }
}
