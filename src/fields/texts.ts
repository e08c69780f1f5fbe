/**
 * Text fields: single-line strings, text areas, passwords, email addresses
 * and URLs.
 */

import { z } from 'zod';
import {
  BaseFieldOptionsSchema,
  Field,
  NO_CAPABILITIES,
  accept,
  reject,
  validateOptions,
  type BaseFieldOptions,
  type FieldCapabilities,
  type ParseResult,
  type RequiredOption,
} from '../field.js';
import { FieldDefinitionError } from '../core/errors.js';
import type { FieldTypes, ParseValue } from '../core/values.js';
import type { MessageRegistry } from '../messages.js';
import type { FieldRenderer } from '../render-contract.js';

export const TextEncodingSchema = z.enum(['ascii', 'latin1', 'utf-8']);

/**
 * Character set that parsed text must be representable in.
 */
export type TextEncoding = z.infer<typeof TextEncodingSchema>;

const TEXT_TYPES: FieldTypes = {
  data: ['string'],
  parse: ['null', 'string'],
  render: ['string'],
};

const TEXT_CAPABILITIES: FieldCapabilities = { ...NO_CAPABILITIES, optRequired: true };

const LengthSchema = z.number().int().nonnegative().optional();

export const TextFieldOptionsSchema = BaseFieldOptionsSchema.extend({
  required: z.boolean().optional(),
  minlen: LengthSchema,
  maxlen: LengthSchema,
  encoding: TextEncodingSchema.optional(),
}).strict();

export interface TextFieldOptions extends BaseFieldOptions<string>, RequiredOption {
  minlen?: number;
  maxlen?: number;
  /** Reject characters that this encoding cannot represent */
  encoding?: TextEncoding;
}

/**
 * Whether a single character survives a round-trip through an encoding.
 */
function encodable(char: string, encoding: TextEncoding): boolean {
  const nodeEncoding = encoding === 'utf-8' ? 'utf8' : encoding;
  return Buffer.from(char, nodeEncoding).toString(nodeEncoding) === char;
}

function isControlChar(char: string): boolean {
  const code = char.charCodeAt(0);
  return code < 0x20 && code !== 0x0a && code !== 0x0d;
}

/**
 * Base class for fields receiving text.
 */
export abstract class TextField<TName extends string = string> extends Field<string, string, TName> {
  readonly minlen: number | undefined;
  readonly maxlen: number | undefined;
  readonly encoding: TextEncoding | undefined;

  protected constructor(
    name: TName,
    options: TextFieldOptions,
    types: FieldTypes = TEXT_TYPES,
    capabilities: FieldCapabilities = TEXT_CAPABILITIES
  ) {
    super(name, options, types, capabilities);

    if (
      options.minlen !== undefined &&
      options.maxlen !== undefined &&
      options.minlen > options.maxlen
    ) {
      throw new FieldDefinitionError(
        name,
        `minlen ${options.minlen} exceeds maxlen ${options.maxlen}`
      );
    }

    this.minlen = options.minlen;
    this.maxlen = options.maxlen;
    this.encoding = options.encoding;
  }

  parseValue(raw: ParseValue): ParseResult<string, string> {
    const missing = this.checkRequired(raw);
    if (missing) {
      return missing;
    }
    if (raw !== null && typeof raw !== 'string') {
      return this.unexpected(raw);
    }

    // Not sent is the empty string; minlen does not apply to it.
    const value = raw ?? '';
    const chars = Array.from(value);

    if (this.encoding !== undefined) {
      const encoding = this.encoding;
      if (!chars.every((char) => encodable(char, encoding))) {
        const replacement = chars.map((char) => (encodable(char, encoding) ? char : '?')).join('');
        return reject('text-invalid-chars', replacement);
      }
    }

    if (this.minlen !== undefined && chars.length > 0 && chars.length < this.minlen) {
      return reject('text-minlen', this.renderValue(value));
    }
    if (this.maxlen !== undefined && chars.length > this.maxlen) {
      return reject('text-maxlen', this.renderValue(value));
    }

    if (chars.some(isControlChar)) {
      return reject(
        'text-invalid-chars',
        chars.filter((char) => !isControlChar(char)).join('')
      );
    }

    return accept(value);
  }

  renderValue(value: string | null): string {
    return value ?? '';
  }

  displayValue(value: string | null, _messages: MessageRegistry): string {
    return value ?? '';
  }
}

// =============================================================================
// Single-line strings
// =============================================================================

export const StringFieldOptionsSchema = TextFieldOptionsSchema.extend({
  size: z.number().int().positive().optional(),
  strip: z.boolean().optional(),
}).strict();

export interface StringFieldOptions extends TextFieldOptions {
  /** Suggested rendering width; defaults to maxlen */
  size?: number;
  /** Strip leading and trailing whitespace when parsing and rendering */
  strip?: boolean;
}

/**
 * String input that must fit on a single line.
 */
export class StringField<TName extends string = string> extends TextField<TName> {
  readonly size: number | undefined;
  readonly strip: boolean;

  constructor(name: TName, options: StringFieldOptions = {}) {
    const validated = validateOptions(name, StringFieldOptionsSchema, options);
    super(name, options);
    this.size = validated.size ?? validated.maxlen;
    this.strip = validated.strip ?? false;
  }

  parseValue(raw: ParseValue): ParseResult<string, string> {
    const result = super.parseValue(raw);
    if (!result.ok) {
      return result;
    }

    if (/[\r\n]/.test(result.value)) {
      return reject('text-invalid-chars', this.renderValue(result.value));
    }

    return this.strip ? accept(result.value.trim()) : result;
  }

  renderValue(value: string | null): string {
    const rendered = super.renderValue(value);
    return this.strip ? rendered.trim() : rendered;
  }

  renderWith<TOut>(
    renderer: FieldRenderer<TOut>,
    value: string | null,
    error: string | null,
    required: boolean
  ): TOut {
    return renderer.renderStringField(this, value, error, required);
  }
}

// =============================================================================
// Text areas
// =============================================================================

export const TextAreaFieldOptionsSchema = TextFieldOptionsSchema.extend({
  rows: z.number().int().positive().optional(),
  cols: z.number().int().positive().optional(),
}).strict();

export interface TextAreaFieldOptions extends TextFieldOptions {
  rows?: number;
  cols?: number;
}

/**
 * A multi-line string.
 */
export class TextAreaField<TName extends string = string> extends TextField<TName> {
  readonly rows: number | undefined;
  readonly cols: number | undefined;

  constructor(name: TName, options: TextAreaFieldOptions = {}) {
    const validated = validateOptions(name, TextAreaFieldOptionsSchema, options);
    super(name, options);
    this.rows = validated.rows;
    this.cols = validated.cols;
  }

  renderValue(value: string | null): string {
    // Browsers expect bare newlines.
    return super.renderValue(value).replace(/\r\n/g, '\n');
  }

  displayValue(value: string | null, _messages: MessageRegistry): string {
    return this.renderValue(value);
  }

  renderWith<TOut>(
    renderer: FieldRenderer<TOut>,
    value: string | null,
    error: string | null,
    required: boolean
  ): TOut {
    return renderer.renderTextAreaField(this, value, error, required);
  }
}

// =============================================================================
// Passwords
// =============================================================================

/** Displayed in place of any password, whatever its length. */
export const PASSWORD_MASK = '********';

export const PasswordFieldOptionsSchema = TextFieldOptionsSchema.extend({
  size: z.number().int().positive().optional(),
  hidepw: z.boolean().optional(),
}).strict();

export interface PasswordFieldOptions extends TextFieldOptions {
  size?: number;
  /** Never send the password back in a rendered form (default: true) */
  hidepw?: boolean;
}

/**
 * A single-line field for entering a password.
 */
export class PasswordField<TName extends string = string> extends StringField<TName> {
  readonly hidepw: boolean;

  constructor(name: TName, options: PasswordFieldOptions = {}) {
    const { hidepw, ...rest } = validateOptions(name, PasswordFieldOptionsSchema, options);
    super(name, { ...rest, initial: options.initial, strip: false });
    this.hidepw = hidepw ?? true;
  }

  renderValue(value: string | null): string {
    return this.hidepw ? '' : super.renderValue(value);
  }

  displayValue(value: string | null, _messages: MessageRegistry): string {
    return value === null ? '' : PASSWORD_MASK;
  }

  renderWith<TOut>(
    renderer: FieldRenderer<TOut>,
    value: string | null,
    error: string | null,
    required: boolean
  ): TOut {
    return renderer.renderPasswordField(this, value, error, required);
  }
}

// =============================================================================
// Email addresses
// =============================================================================

const AddressSpecSchema = z.string().email();

const LOCAL_PART_PATTERN = /^[A-Za-z0-9!#$%&'*+/=?^_`{|}~.-]+$/;

export const EmailFieldOptionsSchema = BaseFieldOptionsSchema.extend({
  required: z.boolean().optional(),
  acceptLocal: z.boolean().optional(),
}).strict();

export interface EmailFieldOptions extends BaseFieldOptions<string>, RequiredOption {
  /** Accept local addresses, i.e. without a domain */
  acceptLocal?: boolean;
}

/**
 * Extract the address part of `Full Name <user@example.com>`, or the whole
 * text when there are no angle brackets.
 */
export function extractAddress(text: string): string {
  const bracketed = /<([^<>]*)>\s*$/.exec(text);
  if (bracketed) {
    return bracketed[1].trim();
  }
  return text.trim();
}

/**
 * Field for an email address. A display name given with `<...>` is dropped.
 * Ascii only, stripped.
 */
export class EmailField<TName extends string = string> extends StringField<TName> {
  readonly acceptLocal: boolean;

  constructor(name: TName, options: EmailFieldOptions = {}) {
    const { acceptLocal, ...rest } = validateOptions(name, EmailFieldOptionsSchema, options);
    super(name, { ...rest, initial: options.initial, encoding: 'ascii', strip: true });
    this.acceptLocal = acceptLocal ?? false;
  }

  parseValue(raw: ParseValue): ParseResult<string, string> {
    const result = super.parseValue(raw);
    if (!result.ok || result.value === '') {
      return result;
    }

    const address = extractAddress(result.value);
    if (address === '') {
      return reject('email-invalid', this.renderValue(result.value));
    }

    if (!address.includes('@')) {
      if (!LOCAL_PART_PATTERN.test(address)) {
        return reject('email-invalid', this.renderValue(result.value));
      }
      return this.acceptLocal ? accept(address) : reject('email-error-local', this.renderValue(result.value));
    }

    if (!AddressSpecSchema.safeParse(address).success) {
      return reject('email-invalid', this.renderValue(result.value));
    }

    return accept(address);
  }

  renderWith<TOut>(
    renderer: FieldRenderer<TOut>,
    value: string | null,
    error: string | null,
    required: boolean
  ): TOut {
    return renderer.renderEmailField(this, value, error, required);
  }
}

// =============================================================================
// URLs
// =============================================================================

export const URLFieldOptionsSchema = BaseFieldOptionsSchema.extend({
  required: z.boolean().optional(),
}).strict();

export interface URLFieldOptions extends BaseFieldOptions<string>, RequiredOption {}

/**
 * Field for a URL. Ascii only, stripped, no embedded whitespace.
 */
export class URLField<TName extends string = string> extends StringField<TName> {
  constructor(name: TName, options: URLFieldOptions = {}) {
    const validated = validateOptions(name, URLFieldOptionsSchema, options);
    super(name, { ...validated, initial: options.initial, encoding: 'ascii', strip: true });
  }

  parseValue(raw: ParseValue): ParseResult<string, string> {
    const result = super.parseValue(raw);
    if (!result.ok) {
      return result;
    }

    if (/\s/.test(result.value)) {
      return reject('url-invalid', this.renderValue(result.value.replace(/\s/g, '?')));
    }

    return result;
  }

  renderWith<TOut>(
    renderer: FieldRenderer<TOut>,
    value: string | null,
    error: string | null,
    required: boolean
  ): TOut {
    return renderer.renderURLField(this, value, error, required);
  }
}
