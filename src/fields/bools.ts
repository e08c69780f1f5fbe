/**
 * Boolean fields: plain checkboxes and must-agree checkboxes.
 */

import { z } from 'zod';
import type { FieldTypes, ParseValue } from '../core/values.js';
import {
  BaseFieldOptionsSchema,
  Field,
  FieldStateSchema,
  accept,
  reject,
  validateOptions,
  type BaseFieldOptions,
  type FieldState,
  type ParseResult,
} from '../field.js';
import type { MessageRegistry } from '../messages.js';
import type { FieldRenderer } from '../render-contract.js';

const BOOL_TYPES: FieldTypes = {
  data: ['boolean'],
  parse: ['null', 'string'],
  render: ['boolean'],
};

export const BoolFieldOptionsSchema = BaseFieldOptionsSchema.extend({
  disptrue: z.string().optional(),
  dispfalse: z.string().optional(),
}).strict();

export interface BoolFieldOptions extends BaseFieldOptions<boolean> {
  /** Display text for true, instead of the registry's `display-true` */
  disptrue?: string;
  /** Display text for false, instead of the registry's `display-false` */
  dispfalse?: string;
}

/**
 * A single checkbox.
 *
 * Browsers do not send unchecked checkboxes, so absence is false and the
 * field cannot be optionally required.
 */
export class BoolField<TName extends string = string> extends Field<boolean, boolean, TName> {
  readonly disptrue: string | undefined;
  readonly dispfalse: string | undefined;

  constructor(name: TName, options: BoolFieldOptions = {}) {
    const validated = validateOptions(name, BoolFieldOptionsSchema, options);
    super(name, options, BOOL_TYPES);
    this.disptrue = validated.disptrue;
    this.dispfalse = validated.dispfalse;
  }

  parseValue(raw: ParseValue): ParseResult<boolean, boolean> {
    if (raw === null) {
      return accept(false);
    }
    if (typeof raw !== 'string') {
      return this.unexpected(raw);
    }
    return accept(raw !== '' && raw !== '0');
  }

  renderValue(value: boolean | null): boolean {
    return value ?? false;
  }

  displayValue(value: boolean | null, messages: MessageRegistry): string {
    if (value) {
      return this.disptrue === undefined ? messages.get('display-true') : messages.translate(this.disptrue);
    }
    return this.dispfalse === undefined ? messages.get('display-false') : messages.translate(this.dispfalse);
  }

  renderWith<TOut>(
    renderer: FieldRenderer<TOut>,
    value: boolean | null,
    error: string | null,
    required: boolean
  ): TOut {
    return renderer.renderBoolField(this, value, error, required);
  }
}

export const AgreeFieldOptionsSchema = z
  .object({
    label: z.string().optional(),
    state: FieldStateSchema.optional(),
  })
  .strict();

export interface AgreeFieldOptions {
  label?: string;
  state?: FieldState;
}

/**
 * A checkbox the user has to tick, e.g. to accept terms of use.
 */
export class AgreeField<TName extends string = string> extends BoolField<TName> {
  constructor(name: TName, options: AgreeFieldOptions = {}) {
    const validated = validateOptions(name, AgreeFieldOptionsSchema, options);
    super(name, { ...validated, initial: false });
  }

  parseValue(raw: ParseValue): ParseResult<boolean, boolean> {
    const result = super.parseValue(raw);
    if (result.ok && !result.value) {
      return reject('agree-required', false);
    }
    return result;
  }

  /** Always marked: agreeing is the whole point of the field. */
  isRequired(): boolean {
    return true;
  }

  renderValue(_value: boolean | null): boolean {
    return false;
  }

  displayValue(value: boolean | null, messages: MessageRegistry): string {
    return value ? messages.get('agree-display') : messages.get('display-false');
  }

  renderWith<TOut>(
    renderer: FieldRenderer<TOut>,
    value: boolean | null,
    error: string | null,
    required: boolean
  ): TOut {
    return renderer.renderAgreeField(this, value, error, required);
  }
}
