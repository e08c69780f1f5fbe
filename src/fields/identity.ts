/**
 * Fields for account names and return paths.
 */

import { z } from 'zod';
import type { ParseValue } from '../core/values.js';
import {
  BaseFieldOptionsSchema,
  accept,
  reject,
  validateOptions,
  type BaseFieldOptions,
  type ParseResult,
  type RequiredOption,
} from '../field.js';
import { DEFAULT_MESSAGES } from '../messages.js';
import type { FieldRenderer } from '../render-contract.js';
import { EmailField, StringField } from './texts.js';

const USERNAME_PATTERN = /^[a-z0-9]*$/;

/**
 * Check a stripped value against the username rules: lowercase letters and
 * digits. With `autolower`, uppercase letters are folded instead of rejected.
 */
export function validateUsername(value: string, autolower = false): ParseResult<string, string> {
  let username = value;
  const lowered = value.toLowerCase();
  if (lowered !== value) {
    if (!autolower) {
      return reject('username-lower-error', lowered);
    }
    username = lowered;
  }
  if (!USERNAME_PATTERN.test(username)) {
    return reject('username-invalid', username);
  }
  return accept(username);
}

export const UsernameFieldOptionsSchema = BaseFieldOptionsSchema.extend({
  required: z.boolean().optional(),
  minlen: z.number().int().nonnegative().optional(),
  maxlen: z.number().int().positive().optional(),
  size: z.number().int().positive().optional(),
  autolower: z.boolean().optional(),
}).strict();

export interface UsernameFieldOptions extends BaseFieldOptions<string>, RequiredOption {
  /** Default: 3 */
  minlen?: number;
  /** Default: 16 */
  maxlen?: number;
  size?: number;
  /** Lowercase the name instead of rejecting uppercase letters */
  autolower?: boolean;
}

/**
 * A short lowercase account name.
 */
export class UsernameField<TName extends string = string> extends StringField<TName> {
  readonly autolower: boolean;

  constructor(name: TName, options: UsernameFieldOptions = {}) {
    const { autolower, ...rest } = validateOptions(name, UsernameFieldOptionsSchema, options);
    super(name, {
      ...rest,
      initial: options.initial,
      label: rest.label ?? DEFAULT_MESSAGES['username-label'],
      minlen: rest.minlen ?? 3,
      maxlen: rest.maxlen ?? 16,
      encoding: 'ascii',
      strip: true,
    });
    this.autolower = autolower ?? false;
  }

  parseValue(raw: ParseValue): ParseResult<string, string> {
    const result = super.parseValue(raw);
    if (!result.ok) {
      return result;
    }
    return validateUsername(result.value, this.autolower);
  }

  renderWith<TOut>(
    renderer: FieldRenderer<TOut>,
    value: string | null,
    error: string | null,
    required: boolean
  ): TOut {
    return renderer.renderUsernameField(this, value, error, required);
  }
}

export const UsernameOrEmailFieldOptionsSchema = BaseFieldOptionsSchema.extend({
  required: z.boolean().optional(),
}).strict();

export interface UsernameOrEmailFieldOptions extends BaseFieldOptions<string>, RequiredOption {}

/**
 * Accepts either a username or an email address, e.g. on login forms.
 */
export class UsernameOrEmailField<TName extends string = string> extends EmailField<TName> {
  constructor(name: TName, options: UsernameOrEmailFieldOptions = {}) {
    const validated = validateOptions(name, UsernameOrEmailFieldOptionsSchema, options);
    super(name, {
      ...validated,
      initial: options.initial,
      label: validated.label ?? DEFAULT_MESSAGES['username-or-email-label'],
      acceptLocal: true,
    });
  }

  parseValue(raw: ParseValue): ParseResult<string, string> {
    const result = super.parseValue(raw);
    if (!result.ok || result.value === '' || result.value.includes('@')) {
      return result;
    }
    return validateUsername(result.value);
  }

  renderWith<TOut>(
    renderer: FieldRenderer<TOut>,
    value: string | null,
    error: string | null,
    required: boolean
  ): TOut {
    return renderer.renderUsernameOrEmailField(this, value, error, required);
  }
}

const URL_PATH_PATTERN = /^[/a-zA-Z0-9]*$/;

export const URLPathFieldOptionsSchema = z
  .object({
    initial: z.string().nullable().optional(),
    required: z.boolean().optional(),
  })
  .strict();

export interface URLPathFieldOptions extends RequiredOption {
  initial?: string | null;
}

/**
 * A hidden field carrying a local URL path, typically where to return after
 * the form is handled.
 */
export class URLPathField<TName extends string = string> extends StringField<TName> {
  constructor(name: TName, options: URLPathFieldOptions = {}) {
    const validated = validateOptions(name, URLPathFieldOptionsSchema, options);
    super(name, { ...validated, state: 'hidden', encoding: 'ascii', strip: true });
  }

  parseValue(raw: ParseValue): ParseResult<string, string> {
    const result = super.parseValue(raw);
    if (!result.ok) {
      return result;
    }
    if (!URL_PATH_PATTERN.test(result.value)) {
      return reject('url-path-invalid', this.renderValue(result.value.replace(/ /g, '?')));
    }
    return result;
  }

  renderWith<TOut>(
    renderer: FieldRenderer<TOut>,
    value: string | null,
    error: string | null,
    required: boolean
  ): TOut {
    return renderer.renderURLPathField(this, value, error, required);
  }
}
