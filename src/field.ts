/**
 * Field base class and the parse/render/display protocol.
 *
 * A field converts between three value domains:
 *
 *   parse value ──parseValue()──▶ data value ──renderValue()──▶ render value
 *                                     │
 *                                     └──displayValue()──▶ display text
 *
 * parseValue() never throws for bad user input. It returns a ParseResult: the
 * data value, or a message plus an optional replacement render value used to
 * redisplay what the user typed. Anything that cannot be caused by a user
 * (wrong raw types, values outside a fixed choice set) throws
 * InternalFieldError instead.
 */

import { z } from 'zod';
import { FieldDefinitionError, InternalFieldError } from './core/errors.js';
import {
  describeValue,
  matchesKinds,
  type FieldTypes,
  type ParseValue,
} from './core/values.js';
import type { MessageKey, MessageRef, MessageRegistry } from './messages.js';
import type { FieldRenderer } from './render-contract.js';

// =============================================================================
// Parse results
// =============================================================================

export interface ParseSuccess<TData> {
  readonly ok: true;
  readonly value: TData;
}

export interface ParseFailure<TRender> {
  readonly ok: false;
  /** A registry reference, or literal text supplied by the application */
  readonly message: MessageRef | string;
  /** Something the field can still render to redisplay the bad input */
  readonly replacement: TRender | null;
}

export type ParseResult<TData, TRender> = ParseSuccess<TData> | ParseFailure<TRender>;

export function accept<TData>(value: TData): ParseSuccess<TData> {
  return { ok: true, value };
}

export function reject<TRender>(
  message: MessageKey | MessageRef,
  replacement: TRender | null = null
): ParseFailure<TRender> {
  return {
    ok: false,
    message: typeof message === 'string' ? { key: message } : message,
    replacement,
  };
}

// =============================================================================
// States, orientation, capabilities
// =============================================================================

export const FieldStateSchema = z.enum(['normal', 'readonly', 'disabled', 'hidden']);

/**
 * Rendering state of a field. Only affects how a renderer draws it; parsing
 * eligibility is the caller's choice through `only` / `ignore`.
 */
export type FieldState = z.infer<typeof FieldStateSchema>;

export const OrientationSchema = z.enum(['horizontal', 'vertical']);

/** Layout of fields drawn as a set of discrete widgets. */
export type Orientation = z.infer<typeof OrientationSchema>;

export interface FieldCapabilities {
  /** Accepts the `required` option */
  readonly optRequired: boolean;
  /** Accepts the `orient` option */
  readonly orientable: boolean;
  /** Parses against a choice set */
  readonly choices: boolean;
  /** May produce a list of values */
  readonly multiValued: boolean;
  /** Produces upload handles, which are culled from redisplay values */
  readonly upload: boolean;
}

export const NO_CAPABILITIES: FieldCapabilities = {
  optRequired: false,
  orientable: false,
  choices: false,
  multiValued: false,
  upload: false,
};

// =============================================================================
// Options
// =============================================================================

/** Field and variable names: lowercase letters, digits, `_` and `-`. */
export const FIELD_NAME_PATTERN = /^[a-z0-9][a-z0-9_-]*$/i;

export const BaseFieldOptionsSchema = z
  .object({
    label: z.string().optional(),
    state: FieldStateSchema.optional(),
    initial: z.unknown().optional(),
  })
  .strict();

export interface BaseFieldOptions<TData> {
  /** Untranslated caption, translated by the renderer's registry */
  label?: string;
  state?: FieldState;
  /**
   * Value used when rendering without a value for the field. Never used by
   * parsing: a missing argument yields the field's own "absent" value.
   */
  initial?: TData | null;
}

/** Options of fields that can be optionally required. */
export interface RequiredOption {
  required?: boolean;
}

/**
 * Validate field options against a zod schema, raising FieldDefinitionError.
 */
export function validateOptions<TSchema extends z.ZodTypeAny>(
  fieldName: string,
  schema: TSchema,
  options: unknown
): z.output<TSchema> {
  const parsed = schema.safeParse(options);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new FieldDefinitionError(fieldName, detail, parsed.error.issues);
  }
  return parsed.data;
}

/**
 * True for the submissions that count as "nothing sent".
 */
export function isAbsent(value: ParseValue): boolean {
  return value === null || value === '' || (Array.isArray(value) && value.length === 0);
}

// =============================================================================
// Field
// =============================================================================

export abstract class Field<TData, TRender, TName extends string = string> {
  readonly name: TName;
  /** Submission variables consumed by this field, in order */
  readonly varnames: readonly string[];
  readonly label: string | undefined;
  readonly state: FieldState;
  readonly initial: TData | null;
  readonly types: FieldTypes;
  readonly capabilities: FieldCapabilities;

  /** Optional requiredness; only meaningful when capabilities.optRequired */
  readonly required: boolean;

  /** Client-side script assets this field depends on: name → licence notice */
  readonly scripts: Readonly<Record<string, string>> = {};

  protected constructor(
    name: TName,
    options: BaseFieldOptions<TData> & RequiredOption,
    types: FieldTypes,
    capabilities: FieldCapabilities = NO_CAPABILITIES,
    extraVarnames: readonly string[] = []
  ) {
    if (!FIELD_NAME_PATTERN.test(name)) {
      throw new FieldDefinitionError(name, 'field names must be alphanumeric identifiers');
    }
    if (options.required !== undefined && !capabilities.optRequired) {
      throw new FieldDefinitionError(name, 'this field kind cannot be optionally required');
    }

    this.name = name;
    this.varnames = [name, ...extraVarnames];
    this.label = options.label;
    this.state = options.state ?? 'normal';
    this.types = types;
    this.capabilities = capabilities;
    this.required = options.required ?? false;

    const initial = options.initial ?? null;
    if (initial !== null && !matchesKinds(initial, types.data)) {
      throw new FieldDefinitionError(
        name,
        `initial value of type ${describeValue(initial)} is not a valid data value`
      );
    }
    this.initial = initial;
  }

  /**
   * Convert a decoded submission value into a data value.
   */
  abstract parseValue(raw: ParseValue): ParseResult<TData, TRender>;

  /**
   * Prepare a data value, or null for "not set", for an input widget.
   */
  abstract renderValue(value: TData | null): TRender;

  /**
   * Translated, human-readable text for a read-only display.
   */
  abstract displayValue(value: TData | null, messages: MessageRegistry): string;

  /**
   * Hand this field to the renderer entry point for its kind.
   */
  abstract renderWith<TOut>(
    renderer: FieldRenderer<TOut>,
    value: TRender | null,
    error: string | null,
    required: boolean
  ): TOut;

  isHidden(): boolean {
    return this.state === 'hidden';
  }

  /**
   * Whether renderers should mark this field as required.
   */
  isRequired(): boolean {
    return this.required;
  }

  acceptsParse(value: unknown): boolean {
    return matchesKinds(value, this.types.parse);
  }

  acceptsData(value: unknown): value is TData {
    return matchesKinds(value, this.types.data);
  }

  acceptsRender(value: unknown): value is TRender {
    return matchesKinds(value, this.types.render);
  }

  toString(): string {
    return `<Field name=${this.name}>`;
  }

  /**
   * The "missing required value" failure, or null when the check passes.
   */
  protected checkRequired(raw: ParseValue): ParseFailure<TRender> | null {
    if (this.required && isAbsent(raw)) {
      return reject<TRender>('error-required-value');
    }
    return null;
  }

  protected unexpected(raw: unknown): never {
    throw new InternalFieldError(
      this.name,
      `unexpected parse value of type ${describeValue(raw)}`
    );
  }
}

/** Any field, whatever its value types. */
export type AnyField = Field<unknown, unknown>;

/** Data type produced by a field. */
export type DataOf<F> = F extends Field<infer TData, unknown, string> ? TData : never;

/** Render type consumed by a field's renderer. */
export type RenderOf<F> = F extends Field<unknown, infer TRender, string> ? TRender : never;
