/**
 * Error thrown when a value breaks one of Discord's fixed bounds
 * (a label that is too long, a max_length of zero, ...).
 *
 * Type mismatches are reported with the built-in TypeError instead.
 */
export class ValidationError extends Error {
  /** Attribute that failed validation */
  readonly field: string;

  constructor(field: string, message: string) {
    super(message);
    this.name = 'ValidationError';
    this.field = field;
  }
}
