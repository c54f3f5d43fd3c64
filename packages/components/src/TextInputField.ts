/**
 * Text Input Field
 *
 * One text input of a modal dialog. Holds the validated configuration that is
 * sent to Discord plus the value the user submitted, once a submission has
 * been relayed back.
 *
 * @example
 * const field = new TextInputField({
 *   label: 'Feedback',
 *   style: TextInputStyle.Paragraph,
 *   maxLength: 500,
 * });
 * field.toComponentJSON();
 * // { type: 4, style: 2, custom_id: '<32 hex chars>', label: 'Feedback', required: true, max_length: 500 }
 *
 * field.refreshState({ value: 'Great bot' });
 * field.value; // 'Great bot'
 */

import crypto from 'crypto';
import { ComponentType, TextInputBuilder, TextInputStyle } from 'discord.js';
import {
  createLogger,
  MODAL_LIMITS,
  TEXT_INPUT_LIMITS,
  ValidationError,
} from '@modal-kit/common-types';
import { parseTextInputComponent, type TextInputComponentData } from './schemas.js';

const logger = createLogger('TextInputField');

export interface TextInputFieldOptions {
  /** Single line or multi-line; defaults to Short */
  style?: TextInputStyle;
  /** Identifier echoed back on submission; generated when omitted */
  customId?: string;
  label: string;
  placeholder?: string;
  minLength?: number;
  maxLength?: number;
  /** Defaults to true */
  required?: boolean;
  /** Pre-filled value */
  value?: string;
  /** Modal row (0-4); automatic placement when omitted */
  row?: number;
  /** Numeric component id; Discord assigns one when omitted */
  id?: number;
}

/**
 * Submitted state relayed from a modal submission
 */
export interface TextInputState {
  value: string;
}

// ============================================================================
// Validation
// ============================================================================

function describeType(value: unknown): string {
  if (value === null) {
    return 'null';
  }
  if (Array.isArray(value)) {
    return 'array';
  }
  if (typeof value === 'number') {
    return String(value);
  }
  return typeof value;
}

function requireString(field: string, value: unknown): string {
  if (typeof value !== 'string') {
    throw new TypeError(`${field} must be a string, not ${describeType(value)}`);
  }
  return value;
}

/** Length in code points, so an emoji counts as one character */
function countChars(text: string): number {
  return [...text].length;
}

function requireMaxChars(field: string, value: unknown, max: number): string {
  const text = requireString(field, value);
  if (countChars(text) > max) {
    throw new ValidationError(field, `${field} must be ${max} characters or fewer`);
  }
  return text;
}

function requireIntegerInRange(field: string, value: unknown, min: number, max: number): number {
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new TypeError(`${field} must be an integer, not ${describeType(value)}`);
  }
  if (value < min || value > max) {
    throw new ValidationError(field, `${field} must be between ${min} and ${max}`);
  }
  return value;
}

function isTextInputStyle(value: unknown): value is TextInputStyle {
  return value === TextInputStyle.Short || value === TextInputStyle.Paragraph;
}

function validateStyle(style: unknown): TextInputStyle {
  if (!isTextInputStyle(style)) {
    throw new TypeError(`style must be a TextInputStyle, not ${String(style)}`);
  }
  return style;
}

function validateCustomId(customId: unknown): string {
  const id = requireString('customId', customId);
  if (id.length === 0) {
    throw new ValidationError('customId', 'customId must not be empty');
  }
  return id;
}

function validateLabel(label: unknown): string {
  return requireMaxChars('label', label, TEXT_INPUT_LIMITS.LABEL_MAX);
}

function validatePlaceholder(placeholder: unknown): string | undefined {
  return placeholder === undefined
    ? undefined
    : requireMaxChars('placeholder', placeholder, TEXT_INPUT_LIMITS.PLACEHOLDER_MAX);
}

function validateMinLength(minLength: unknown): number | undefined {
  return minLength === undefined
    ? undefined
    : requireIntegerInRange(
        'minLength',
        minLength,
        TEXT_INPUT_LIMITS.MIN_LENGTH_MIN,
        TEXT_INPUT_LIMITS.MIN_LENGTH_MAX
      );
}

function validateMaxLength(maxLength: unknown): number | undefined {
  return maxLength === undefined
    ? undefined
    : requireIntegerInRange(
        'maxLength',
        maxLength,
        TEXT_INPUT_LIMITS.MAX_LENGTH_MIN,
        TEXT_INPUT_LIMITS.MAX_LENGTH_MAX
      );
}

function validateRequired(required: unknown): boolean {
  if (typeof required !== 'boolean') {
    throw new TypeError(`required must be a boolean, not ${describeType(required)}`);
  }
  return required;
}

function validateValue(value: unknown): string | undefined {
  return value === undefined
    ? undefined
    : requireMaxChars('value', value, TEXT_INPUT_LIMITS.VALUE_MAX);
}

function validateRow(row: unknown): number | undefined {
  return row === undefined
    ? undefined
    : requireIntegerInRange('row', row, 0, MODAL_LIMITS.MAX_ROWS - 1);
}

function validateId(id: unknown): number | undefined {
  if (id === undefined) {
    return undefined;
  }
  if (typeof id !== 'number' || !Number.isInteger(id)) {
    throw new TypeError(`id must be an integer, not ${describeType(id)}`);
  }
  return id;
}

/**
 * Random 16-byte id, hex-encoded (32 lowercase characters)
 */
function generateCustomId(): string {
  return crypto.randomBytes(TEXT_INPUT_LIMITS.CUSTOM_ID_BYTES).toString('hex');
}

function quote(value: string | undefined): string {
  return value === undefined ? 'undefined' : `'${value}'`;
}

// ============================================================================
// Field
// ============================================================================

export class TextInputField {
  private _style: TextInputStyle;
  private _customId: string;
  private _label: string;
  private _placeholder: string | undefined;
  private _minLength: number | undefined;
  private _maxLength: number | undefined;
  private _required: boolean;
  private _value: string | undefined;
  private _row: number | undefined;
  private readonly _id: number | undefined;

  /** Value submitted by the user; undefined until a submission is ingested */
  private submittedValue: string | undefined;

  /**
   * @throws ValidationError when a bound is violated
   * @throws TypeError when an option has the wrong type
   */
  constructor(options: TextInputFieldOptions) {
    this._label = validateLabel(options.label);
    this._minLength = validateMinLength(options.minLength);
    this._maxLength = validateMaxLength(options.maxLength);
    this._value = validateValue(options.value);
    this._placeholder = validatePlaceholder(options.placeholder);
    this._style = validateStyle(options.style ?? TextInputStyle.Short);
    this._required = validateRequired(options.required ?? true);
    this._row = validateRow(options.row);
    this._id = validateId(options.id);

    if (options.customId === undefined) {
      this._customId = generateCustomId();
      logger.debug({ customId: this._customId }, 'Generated custom id for text input');
    } else {
      this._customId = validateCustomId(options.customId);
    }
  }

  /**
   * Build a field from a component record received from Discord or read back
   * from storage.
   *
   * @param row - Layout row; not part of the record
   * @throws TypeError when the record does not have the text input shape
   * @throws ValidationError when the record breaks a bound
   */
  static fromComponent(data: unknown, row?: number): TextInputField {
    const component = parseTextInputComponent(data);
    return new TextInputField({
      style: component.style,
      customId: component.custom_id,
      label: component.label,
      placeholder: component.placeholder,
      minLength: component.min_length,
      maxLength: component.max_length,
      required: component.required,
      value: component.value,
      row,
      id: component.id,
    });
  }

  // ============================================================================
  // Accessors
  // ============================================================================

  get type(): ComponentType.TextInput {
    return ComponentType.TextInput;
  }

  /** Numeric component id, if one was given or assigned */
  get id(): number | undefined {
    return this._id;
  }

  get style(): TextInputStyle {
    return this._style;
  }

  set style(style: TextInputStyle) {
    this._style = validateStyle(style);
  }

  get customId(): string {
    return this._customId;
  }

  set customId(customId: string) {
    this._customId = validateCustomId(customId);
  }

  get label(): string {
    return this._label;
  }

  set label(label: string) {
    this._label = validateLabel(label);
  }

  get placeholder(): string | undefined {
    return this._placeholder;
  }

  set placeholder(placeholder: string | undefined) {
    this._placeholder = validatePlaceholder(placeholder);
  }

  get minLength(): number | undefined {
    return this._minLength;
  }

  set minLength(minLength: number | undefined) {
    this._minLength = validateMinLength(minLength);
  }

  get maxLength(): number | undefined {
    return this._maxLength;
  }

  set maxLength(maxLength: number | undefined) {
    this._maxLength = validateMaxLength(maxLength);
  }

  get required(): boolean {
    return this._required;
  }

  set required(required: boolean) {
    this._required = validateRequired(required);
  }

  /**
   * The submitted value once a submission has been ingested (even an empty
   * one), otherwise the pre-filled value.
   */
  get value(): string | undefined {
    if (this.submittedValue !== undefined) {
      return this.submittedValue;
    }
    return this._value;
  }

  /**
   * Sets the pre-filled value. After a submission has been ingested this no
   * longer changes what `value` reads.
   */
  set value(value: string | undefined) {
    this._value = validateValue(value);
  }

  get row(): number | undefined {
    return this._row;
  }

  set row(row: number | undefined) {
    this._row = validateRow(row);
  }

  /** Whether a submitted value has been ingested */
  get hasResponse(): boolean {
    return this.submittedValue !== undefined;
  }

  /** Share of a modal row this field takes; text inputs fill the row */
  get width(): number {
    return MODAL_LIMITS.ROW_WIDTH;
  }

  // ============================================================================
  // Conversion
  // ============================================================================

  /**
   * Serialize to the component record Discord expects. The layout row is not
   * part of the record, and `value` is always the pre-fill.
   */
  toComponentJSON(): TextInputComponentData {
    const data: TextInputComponentData = {
      type: ComponentType.TextInput,
      style: this._style,
      custom_id: this._customId,
      label: this._label,
      required: this._required,
    };

    if (this._placeholder !== undefined) {
      data.placeholder = this._placeholder;
    }
    if (this._minLength !== undefined) {
      data.min_length = this._minLength;
    }
    if (this._maxLength !== undefined) {
      data.max_length = this._maxLength;
    }
    if (this._value !== undefined) {
      data.value = this._value;
    }
    if (this._id !== undefined) {
      data.id = this._id;
    }

    return data;
  }

  /**
   * discord.js builder carrying the same component record
   */
  toBuilder(): TextInputBuilder {
    return new TextInputBuilder(this.toComponentJSON());
  }

  /**
   * Record the value the user submitted. Called once by the submission
   * relay; the value comes from Discord and is not re-validated.
   */
  refreshState(state: TextInputState): void {
    this.submittedValue = state.value;
    logger.debug(
      { customId: this._customId, length: state.value.length },
      'Ingested submitted text input value'
    );
  }

  toString(): string {
    const attributes = [
      `label=${quote(this._label)}`,
      `placeholder=${quote(this._placeholder)}`,
      `value=${quote(this.value)}`,
      `required=${this._required}`,
      `style=${TextInputStyle[this._style]}`,
      `minLength=${this._minLength}`,
      `maxLength=${this._maxLength}`,
      `customId=${quote(this._customId)}`,
      `id=${this._id}`,
    ];
    return `<TextInputField ${attributes.join(' ')}>`;
  }
}
