/**
 * Form definition.
 *
 * A Form is an ordered, named collection of fields plus the metadata a
 * renderer needs to draw the surrounding form element. Forms are built once
 * and shared across requests; per-submission state lives in FormParser.
 */

import { z } from 'zod';
import {
  FormDefinitionError,
  FormwrightError,
  InternalFieldError,
  UnknownFieldError,
} from './core/errors.js';
import { defaultLogger, type Logger } from './core/logger.js';
import {
  describeValue,
  isUploadSource,
  type ArgValue,
  type NormalizedArgs,
  type ParseValue,
  type ScalarParseValue,
} from './core/values.js';
import { Field, type AnyField, type DataOf } from './field.js';
import { DEFAULT_MESSAGES, defaultMessages, type MessageRegistry } from './messages.js';

const MULTIPART = 'multipart/form-data';

const SubmitEntrySchema = z.union([z.string().min(1), z.tuple([z.string().min(1), z.string()])]);

export const FormOptionsSchema = z
  .object({
    action: z.string().optional(),
    submit: z.union([z.string().min(1), z.array(SubmitEntrySchema).min(1)]).optional(),
    method: z.enum(['GET', 'POST']).optional(),
    enctype: z.string().optional(),
    acceptCharset: z.string().min(1).optional(),
    reset: z.union([z.boolean(), z.string()]).optional(),
    logger: z
      .custom<Logger>((value) => typeof value === 'object' && value !== null && 'warn' in value)
      .optional(),
  })
  .strict();

function isFieldList<F extends AnyField>(entry: F | readonly F[]): entry is readonly F[] {
  return Array.isArray(entry);
}

export type FormMethod = 'GET' | 'POST';

/** A submit button as a `[value, label]` pair, or a value used as its own label. */
export type SubmitEntry = string | readonly [string, string];

export interface FormOptions {
  /** URL of the handler receiving the submission */
  action?: string;
  /**
   * Label of the single submit button, or the buttons of a form with several
   * submit buttons
   */
  submit?: string | readonly SubmitEntry[];
  /** Default: POST */
  method?: FormMethod;
  /** Switched to multipart/form-data when a file upload field is added */
  enctype?: string;
  /** Charset used to decode byte arguments (default: UTF-8) */
  acceptCharset?: string;
  /** Add a reset button, with the default or the given label */
  reset?: boolean | string;
  logger?: Logger;
}

export interface SubmitButton {
  /** Submission variable of the button; null for a lone submit button */
  readonly value: string | null;
  /** Untranslated label */
  readonly label: string;
}

/**
 * Outcome of parsing one field, with the message already resolved to text.
 */
export type FieldOutcome =
  | { readonly ok: true; readonly value: unknown }
  | { readonly ok: false; readonly message: string; readonly replacement: unknown };

/**
 * Parsed values keyed by field name. Fields without a value read as null.
 */
export type FormValues<F extends AnyField> = {
  readonly [K in F as K['name']]: DataOf<K> | null;
};

/** Field names of a form's field union. */
export type FieldName<F extends AnyField> = F['name'];

export class Form<F extends AnyField = AnyField> {
  readonly name: string;
  readonly action: string | undefined;
  readonly method: FormMethod;
  readonly acceptCharset: string;
  readonly submit: readonly SubmitButton[];
  /** Untranslated label of the reset button, or null for none */
  readonly reset: string | null;

  private readonly fieldList: F[] = [];
  private readonly fieldMap = new Map<string, F>();
  private readonly varnameOwners = new Map<string, F>();
  private readonly explicitEnctype: string | undefined;
  private currentEnctype: string | undefined;
  private readonly logger: Logger;

  /**
   * @param name - Form name, also used by renderers as the form element id
   * @param fields - Fields in display order; nested lists are flattened
   * @param options - Submission and rendering metadata
   */
  constructor(name: string, fields: readonly (F | readonly F[])[], options: FormOptions = {}) {
    if (name === '') {
      throw new FormDefinitionError(name, 'forms need a name');
    }

    const parsed = FormOptionsSchema.safeParse(options);
    if (!parsed.success) {
      const detail = parsed.error.issues
        .map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
        .join('; ');
      throw new FormDefinitionError(name, detail, parsed.error.issues);
    }

    this.name = name;
    this.action = options.action;
    this.method = options.method ?? 'POST';
    this.acceptCharset = options.acceptCharset ?? 'UTF-8';
    this.explicitEnctype = options.enctype;
    this.currentEnctype = options.enctype;
    this.logger = options.logger ?? defaultLogger();

    try {
      new TextDecoder(this.acceptCharset);
    } catch (err) {
      throw new FormDefinitionError(
        name,
        `unsupported charset '${this.acceptCharset}': ${err instanceof Error ? err.message : String(err)}`
      );
    }

    this.submit = Form.submitButtons(options.submit);
    if (options.reset === true) {
      this.reset = DEFAULT_MESSAGES['reset-button'];
    } else {
      this.reset = typeof options.reset === 'string' ? options.reset : null;
    }

    const submitValues = new Set<string>();
    for (const button of this.submit) {
      if (button.value === null) {
        continue;
      }
      if (submitValues.has(button.value)) {
        throw new FormDefinitionError(name, `duplicate submit value '${button.value}'`);
      }
      submitValues.add(button.value);
    }

    for (const entry of fields) {
      for (const field of isFieldList(entry) ? entry : [entry]) {
        this.addField(field);
      }
    }
  }

  private static submitButtons(submit: FormOptions['submit']): SubmitButton[] {
    if (submit === undefined) {
      return [{ value: null, label: DEFAULT_MESSAGES['submit-button'] }];
    }
    if (typeof submit === 'string') {
      return [{ value: null, label: submit }];
    }
    return submit.map((entry) =>
      typeof entry === 'string' ? { value: entry, label: entry } : { value: entry[0], label: entry[1] }
    );
  }

  get fields(): readonly F[] {
    return this.fieldList;
  }

  /** Encoding type for the form element, or undefined for the browser default. */
  get enctype(): string | undefined {
    return this.currentEnctype;
  }

  /** Whether the form has several submit buttons to tell apart. */
  hasMultipleSubmits(): boolean {
    return this.submit.some((button) => button.value !== null);
  }

  /**
   * Add a field at the end of the form.
   *
   * @throws FormDefinitionError when the object is not a field, or when its
   *   name or one of its variable names is already taken
   */
  addField(field: F): void {
    if (!(field instanceof Field)) {
      throw new FormDefinitionError(this.name, `expecting a field, got ${describeValue(field)}`);
    }
    if (this.fieldMap.has(field.name)) {
      throw new FormDefinitionError(this.name, `field name '${field.name}' is already used`);
    }
    for (const varname of field.varnames) {
      const owner = this.varnameOwners.get(varname);
      if (owner !== undefined) {
        throw new FormDefinitionError(
          this.name,
          `variable '${varname}' of field '${field.name}' collides with field '${owner.name}'`
        );
      }
      if (this.submit.some((button) => button.value === varname)) {
        throw new FormDefinitionError(
          this.name,
          `variable '${varname}' of field '${field.name}' collides with a submit button`
        );
      }
    }

    if (field.capabilities.upload && this.currentEnctype !== MULTIPART) {
      if (this.explicitEnctype !== undefined) {
        this.logger.warn('overriding form enctype for a file upload field', {
          form: this.name,
          field: field.name,
          enctype: this.explicitEnctype,
        });
      }
      this.currentEnctype = MULTIPART;
    }

    this.fieldList.push(field);
    this.fieldMap.set(field.name, field);
    for (const varname of field.varnames) {
      this.varnameOwners.set(varname, field);
    }
  }

  /**
   * @throws UnknownFieldError when no field has this name
   */
  getField(name: string): F {
    const field = this.fieldMap.get(name);
    if (field === undefined) {
      throw new UnknownFieldError(name, this.name);
    }
    return field;
  }

  hasField(name: string): boolean {
    return this.fieldMap.has(name);
  }

  names(): FieldName<F>[] {
    return this.fieldList.map((field) => field.name);
  }

  /** Submission variables of all fields, in field order. */
  varnames(): string[] {
    return this.fieldList.flatMap((field) => field.varnames);
  }

  /** Untranslated labels of the given fields, or of all fields. */
  labels(names?: readonly string[]): (string | undefined)[] {
    const fields = names === undefined ? this.fieldList : names.map((name) => this.getField(name));
    return fields.map((field) => field.label);
  }

  /**
   * Collect an object's properties named like the fields, e.g. to fill a
   * form from a stored record before rendering it.
   */
  fetchNames(source: object, exceptions: readonly string[] = []): Record<string, unknown> {
    const values: Record<string, unknown> = {};
    for (const field of this.fieldList) {
      if (exceptions.includes(field.name) || !(field.name in source)) {
        continue;
      }
      values[field.name] = Reflect.get(source, field.name);
    }
    return values;
  }

  /**
   * Client scripts required by the fields: file name → licence notice.
   */
  getScripts(): Record<string, string> {
    const scripts: Record<string, string> = {};
    for (const field of this.fieldList) {
      for (const [file, notice] of Object.entries(field.scripts)) {
        if (!(file in scripts)) {
          scripts[file] = notice;
        }
      }
    }
    return scripts;
  }

  /**
   * Resolve the fields a parse or render pass touches.
   *
   * @param only - Field names to use, in this order (default: all fields)
   * @param ignore - Field names to leave out
   * @throws UnknownFieldError for names not in the form
   */
  selectFields(only?: readonly string[], ignore?: readonly string[]): F[] {
    const selected = only === undefined ? [...this.fieldList] : only.map((name) => this.getField(name));
    if (ignore === undefined) {
      return selected;
    }
    for (const name of ignore) {
      this.getField(name);
    }
    return selected.filter((field) => !ignore.includes(field.name));
  }

  /**
   * Parse and validate the arguments of one field.
   *
   * Byte arguments are decoded with the form's charset, except for fields
   * that take raw bytes. User mistakes come back as a failed outcome with a
   * resolved message; type violations throw InternalFieldError.
   */
  parseField(field: F, args: NormalizedArgs, messages: MessageRegistry = defaultMessages): FieldOutcome {
    const keepBytes = field.capabilities.upload || field.types.parse.includes('bytes');
    const decoded: Record<string, ScalarParseValue> = {};

    for (const varname of field.varnames) {
      const arg = Object.prototype.hasOwnProperty.call(args, varname) ? args[varname] : undefined;
      const value = this.decodeArg(field, arg, keepBytes);
      if (value === undefined) {
        return { ok: false, message: messages.get('error-invalid-encoding'), replacement: null };
      }
      decoded[varname] = value;
    }

    const parseValue: ParseValue = field.varnames.length === 1 ? decoded[field.name] ?? null : decoded;
    if (!field.acceptsParse(parseValue)) {
      throw new InternalFieldError(
        field.name,
        `parse value of type ${describeValue(parseValue)} is not accepted`
      );
    }

    const result = field.parseValue(parseValue);
    if (result.ok) {
      if (!field.acceptsData(result.value)) {
        throw new InternalFieldError(
          field.name,
          `parsed value of type ${describeValue(result.value)} is not a data value`
        );
      }
      return { ok: true, value: result.value };
    }

    if (result.replacement !== null && !field.acceptsRender(result.replacement)) {
      throw new InternalFieldError(
        field.name,
        `replacement of type ${describeValue(result.replacement)} is not a render value`
      );
    }
    return { ok: false, message: messages.resolve(result.message), replacement: result.replacement };
  }

  /**
   * Decode one argument; undefined means the bytes are not valid in the
   * form's charset.
   */
  private decodeArg(
    field: F,
    arg: ArgValue | null | undefined,
    keepBytes: boolean
  ): ScalarParseValue | undefined {
    if (arg === null || arg === undefined) {
      return null;
    }
    if (typeof arg === 'string') {
      return arg;
    }
    if (Buffer.isBuffer(arg)) {
      return keepBytes ? arg : this.decodeBytes(arg);
    }
    if (Array.isArray(arg)) {
      const items: string[] = [];
      for (const item of arg) {
        const text = typeof item === 'string' ? item : this.decodeBytes(item);
        if (text === undefined) {
          return undefined;
        }
        items.push(text);
      }
      return items;
    }
    if (isUploadSource(arg)) {
      return arg;
    }
    throw new InternalFieldError(field.name, `unexpected argument of type ${describeValue(arg)}`);
  }

  private decodeBytes(bytes: Buffer): string | undefined {
    try {
      return new TextDecoder(this.acceptCharset, { fatal: true }).decode(bytes);
    } catch (err) {
      if (err instanceof TypeError) {
        return undefined;
      }
      throw err;
    }
  }

  /**
   * Tell which of several submit buttons was pressed.
   *
   * @returns The button value, or null for forms with a single submit
   *   button or when no button variable was sent
   */
  parseSubmit(args: NormalizedArgs): string | null {
    if (!this.hasMultipleSubmits()) {
      return null;
    }
    const present = this.submit.filter(
      (button) =>
        button.value !== null &&
        Object.prototype.hasOwnProperty.call(args, button.value) &&
        args[button.value] !== null &&
        args[button.value] !== undefined
    );
    if (present.length > 1) {
      throw new FormwrightError(`Several submit buttons present for form '${this.name}'`, {
        form: this.name,
        submits: present.map((button) => button.value),
      });
    }
    return present[0]?.value ?? null;
  }

  toString(): string {
    return `<Form name=${this.name} fields=${this.fieldList.length}>`;
  }
}
