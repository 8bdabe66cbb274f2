/**
 * Error kinds raised by the elastic tabstops library.
 * All errors are fail-fast: nothing is retried, and a throwing operation
 * leaves the block as it was before the call.
 */

/**
 * Base class of every error this library throws.
 */
export class TabStopsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Invalid tab stop configuration (for example a zero step size).
 */
export class ConfigurationError extends TabStopsError {
  readonly errors: readonly string[];

  constructor(errors: readonly string[]) {
    super(`Invalid tab stop configuration: ${errors.join('; ')}`);
    this.errors = errors;
  }
}

/**
 * Line or column index outside the block, or an inverted range.
 */
export class LineRangeError extends TabStopsError {
  readonly start: number;
  readonly end: number;
  readonly length: number;

  constructor(start: number, end: number, length: number, message?: string) {
    super(message ?? `Invalid line range [${start}, ${end}) for block of length ${length}`);
    this.start = start;
    this.end = end;
    this.length = length;
  }
}

/**
 * A lookup by line content found no matching line.
 */
export class LineNotFoundError extends TabStopsError {}

/**
 * A width tracker was asked for something its bookkeeping says cannot happen.
 * Indicates a bug in the caller's accounting, never a user error.
 */
export class InternalConsistencyError extends TabStopsError {}

/**
 * The size function returned something other than a finite, non-negative
 * number, or a cell cannot be measured by the default size function.
 */
export class InvalidSizeError extends TabStopsError {}
