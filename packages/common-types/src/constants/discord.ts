/**
 * Discord Constants
 *
 * Discord API limits for modal dialogs and their text inputs.
 */

/**
 * Text input component limits
 */
export const TEXT_INPUT_LIMITS = {
  /** Label character limit */
  LABEL_MAX: 45,
  /** Placeholder character limit */
  PLACEHOLDER_MAX: 100,
  /** Lowest accepted min_length */
  MIN_LENGTH_MIN: 0,
  /** Highest accepted min_length */
  MIN_LENGTH_MAX: 4000,
  /** Lowest accepted max_length (zero would make the input unusable) */
  MAX_LENGTH_MIN: 1,
  /** Highest accepted max_length */
  MAX_LENGTH_MAX: 4000,
  /** Pre-filled value character limit */
  VALUE_MAX: 4000,
  /** Random bytes behind a generated custom_id (hex-encoded to twice this length) */
  CUSTOM_ID_BYTES: 16,
} as const;

/**
 * Modal dialog layout limits
 */
export const MODAL_LIMITS = {
  /** Rows a modal can hold */
  MAX_ROWS: 5,
  /** Width units in one row; a text input always fills the row */
  ROW_WIDTH: 5,
} as const;
