/**
 * Numeric fields: single-line inputs parsed into integers or floats, with
 * optional bounds and a printf-style display format.
 */

import { z } from 'zod';
import { FieldDefinitionError } from '../core/errors.js';
import type { FieldTypes, ParseValue } from '../core/values.js';
import {
  BaseFieldOptionsSchema,
  Field,
  NO_CAPABILITIES,
  accept,
  reject,
  validateOptions,
  type BaseFieldOptions,
  type ParseResult,
  type RequiredOption,
} from '../field.js';
import type { MessageRegistry } from '../messages.js';
import type { FieldRenderer } from '../render-contract.js';

const INTEGER_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

const FORMAT_DIRECTIVE = /%([-+ 0]*)(\d+)?(?:\.(\d+))?([difeEgGs%])/g;

/**
 * Format a number with a printf-like template: `%d`, `%i`, `%f`, `%e`, `%g`
 * and `%s` with optional flags (`-`, `+`, space, `0`), width and precision.
 */
export function formatNumber(template: string, value: number): string {
  return template.replace(
    FORMAT_DIRECTIVE,
    (_match, flags: string, width: string | undefined, precision: string | undefined, conversion: string) => {
      if (conversion === '%') {
        return '%';
      }

      const digits = precision === undefined ? undefined : Number(precision);
      let body: string;
      switch (conversion) {
        case 'd':
        case 'i':
          body = Math.trunc(Math.abs(value)).toString();
          break;
        case 'f':
          body = Math.abs(value).toFixed(digits ?? 6);
          break;
        case 'e':
        case 'E': {
          const exponential = Math.abs(value).toExponential(digits ?? 6);
          // printf pads the exponent to two digits
          const padded = exponential.replace(/e([+-])(\d)$/, 'e$10$2');
          body = conversion === 'E' ? padded.toUpperCase() : padded;
          break;
        }
        case 'g':
        case 'G': {
          const general = String(Number(Math.abs(value).toPrecision(digits || 6)));
          body = conversion === 'G' ? general.toUpperCase() : general;
          break;
        }
        default:
          body = String(Math.abs(value));
      }

      let sign = '';
      if (value < 0 || Object.is(value, -0)) {
        sign = '-';
      } else if (flags.includes('+')) {
        sign = '+';
      } else if (flags.includes(' ')) {
        sign = ' ';
      }

      const minWidth = width === undefined ? 0 : Number(width);
      const length = sign.length + body.length;
      if (length >= minWidth) {
        return sign + body;
      }
      const fill = minWidth - length;
      if (flags.includes('-')) {
        return sign + body + ' '.repeat(fill);
      }
      if (flags.includes('0')) {
        return sign + '0'.repeat(fill) + body;
      }
      return ' '.repeat(fill) + sign + body;
    }
  );
}

const NUMERIC_TYPES_RENDER = ['string'] as const;
const NUMERIC_TYPES_PARSE = ['null', 'string'] as const;

export const NumericFieldOptionsSchema = BaseFieldOptionsSchema.extend({
  required: z.boolean().optional(),
  minval: z.number().finite().optional(),
  maxval: z.number().finite().optional(),
  format: z.string().regex(/%/, 'format must contain a % directive').optional(),
}).strict();

export interface NumericFieldOptions extends BaseFieldOptions<number>, RequiredOption {
  minval?: number;
  maxval?: number;
  /** Printf-like output template, e.g. `%.2f`; does not affect parsing */
  format?: string;
}

/**
 * Base class for single-line text inputs holding a number. Nothing sent
 * parses to null.
 */
export abstract class NumericField<TName extends string = string> extends Field<
  number | null,
  string,
  TName
> {
  readonly minval: number | undefined;
  readonly maxval: number | undefined;
  readonly format: string | undefined;

  protected constructor(name: TName, options: NumericFieldOptions, types: FieldTypes) {
    const validated = validateOptions(name, NumericFieldOptionsSchema, options);
    super(name, options, types, { ...NO_CAPABILITIES, optRequired: true });

    if (
      validated.minval !== undefined &&
      validated.maxval !== undefined &&
      validated.minval > validated.maxval
    ) {
      throw new FieldDefinitionError(
        name,
        `minval ${validated.minval} exceeds maxval ${validated.maxval}`
      );
    }

    this.minval = validated.minval;
    this.maxval = validated.maxval;
    this.format = validated.format;
  }

  /**
   * Convert a trimmed literal, or return null if it is not a valid literal.
   */
  protected abstract convert(literal: string): number | null;

  parseValue(raw: ParseValue): ParseResult<number | null, string> {
    const missing = this.checkRequired(raw);
    if (missing) {
      return missing;
    }
    if (raw !== null && typeof raw !== 'string') {
      return this.unexpected(raw);
    }

    if (raw === null || raw.trim() === '') {
      return accept(null);
    }

    const value = this.convert(raw.trim());
    if (value === null) {
      return reject({ key: 'numerical-invalid', args: [raw] }, raw);
    }

    if (this.minval !== undefined && value < this.minval) {
      return reject(
        { key: 'numerical-minval', args: [this.renderValue(this.minval)] },
        this.renderValue(value)
      );
    }
    if (this.maxval !== undefined && value > this.maxval) {
      return reject(
        { key: 'numerical-maxval', args: [this.renderValue(this.maxval)] },
        this.renderValue(value)
      );
    }

    return accept(value);
  }

  renderValue(value: number | null): string {
    if (value === null) {
      return '';
    }
    return this.format === undefined ? String(value) : formatNumber(this.format, value);
  }

  displayValue(value: number | null, _messages: MessageRegistry): string {
    return this.renderValue(value);
  }
}

/**
 * A single-line text input parsed as an integer.
 */
export class IntField<TName extends string = string> extends NumericField<TName> {
  constructor(name: TName, options: NumericFieldOptions = {}) {
    super(name, options, {
      data: ['null', 'integer'],
      parse: NUMERIC_TYPES_PARSE,
      render: NUMERIC_TYPES_RENDER,
    });
  }

  protected convert(literal: string): number | null {
    if (!INTEGER_PATTERN.test(literal)) {
      return null;
    }
    const value = Number(literal);
    return Number.isSafeInteger(value) ? value : null;
  }

  renderWith<TOut>(
    renderer: FieldRenderer<TOut>,
    value: string | null,
    error: string | null,
    required: boolean
  ): TOut {
    return renderer.renderIntField(this, value, error, required);
  }
}

/**
 * A single-line text input parsed as a floating-point number.
 */
export class FloatField<TName extends string = string> extends NumericField<TName> {
  constructor(name: TName, options: NumericFieldOptions = {}) {
    super(name, options, {
      data: ['null', 'number'],
      parse: NUMERIC_TYPES_PARSE,
      render: NUMERIC_TYPES_RENDER,
    });
  }

  protected convert(literal: string): number | null {
    if (!FLOAT_PATTERN.test(literal)) {
      return null;
    }
    const value = Number(literal);
    return Number.isFinite(value) ? value : null;
  }

  renderWith<TOut>(
    renderer: FieldRenderer<TOut>,
    value: string | null,
    error: string | null,
    required: boolean
  ): TOut {
    return renderer.renderFloatField(this, value, error, required);
  }
}
