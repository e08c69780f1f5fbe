/**
 * Choice fields: radio buttons, menus, checkbox sets and listboxes.
 *
 * Choice values are ascii strings used internally by the application; labels
 * are the user-visible part and get translated for display. The set of
 * choices may be late-bound with setChoices(), e.g. right before rendering,
 * or checking may be switched off entirely with `nocheck` when the
 * application validates the values itself.
 */

import { z } from 'zod';
import { FieldDefinitionError, InternalFieldError } from '../core/errors.js';
import { isStringList, type FieldTypes, type ParseValue } from '../core/values.js';
import {
  BaseFieldOptionsSchema,
  Field,
  NO_CAPABILITIES,
  OrientationSchema,
  accept,
  reject,
  validateOptions,
  type BaseFieldOptions,
  type FieldCapabilities,
  type Orientation,
  type ParseResult,
  type RequiredOption,
} from '../field.js';
import type { MessageRegistry } from '../messages.js';
import type { FieldRenderer } from '../render-contract.js';

const ChoiceValueSchema = z.union([z.string(), z.number().int()]);

export const ChoiceSchema = z.union([
  ChoiceValueSchema,
  z.tuple([ChoiceValueSchema, z.string()]),
]);

/**
 * A choice as given by the application: a value, or a [value, label] pair.
 * Integer values are converted to strings.
 */
export type ChoiceInput = z.infer<typeof ChoiceSchema>;

export interface Choice {
  readonly value: string;
  readonly label: string;
}

const ASCII = /^[\x00-\x7f]*$/;

function normalizeValue(value: string | number): string {
  return typeof value === 'number' ? String(value) : value;
}

/**
 * Normalize choice inputs into ordered value/label pairs.
 */
export function normalizeChoices(fieldName: string, inputs: readonly ChoiceInput[]): Choice[] {
  const seen = new Set<string>();
  return inputs.map((input) => {
    const [rawValue, label] = Array.isArray(input) ? input : [input, undefined];
    const value = normalizeValue(rawValue);
    if (!ASCII.test(value)) {
      throw new FieldDefinitionError(fieldName, `choice value '${value}' is not ascii`);
    }
    if (seen.has(value)) {
      throw new FieldDefinitionError(fieldName, `duplicate choice value '${value}'`);
    }
    seen.add(value);
    return { value, label: label ?? value };
  });
}

const ChoiceFieldOptionsSchema = BaseFieldOptionsSchema.extend({
  choices: z.array(ChoiceSchema).optional(),
  nocheck: z.boolean().optional(),
}).strict();

export interface ChoiceFieldOptions<TInitial> extends BaseFieldOptions<TInitial> {
  /** Ordered choices; may be set later with setChoices() */
  choices?: readonly ChoiceInput[];
  /** Accept any submitted value instead of checking against the choices */
  nocheck?: boolean;
}

/**
 * Base class for fields choosing among a set of values.
 */
export abstract class ChoiceField<TData, TRender, TName extends string = string> extends Field<
  TData,
  TRender,
  TName
> {
  readonly nocheck: boolean;
  private choiceList: readonly Choice[] = [];
  private labels = new Map<string, string>();

  protected constructor(
    name: TName,
    options: ChoiceFieldOptions<TData> & RequiredOption,
    types: FieldTypes,
    capabilities: FieldCapabilities
  ) {
    super(name, options, types, { ...capabilities, choices: true });
    this.nocheck = options.nocheck ?? false;
    this.setChoices(options.choices ?? []);
  }

  get choices(): readonly Choice[] {
    return this.choiceList;
  }

  /**
   * Replace the choices this field renders and checks against.
   */
  setChoices(inputs: readonly ChoiceInput[]): void {
    this.choiceList = normalizeChoices(this.name, inputs);
    this.labels = new Map(this.choiceList.map((choice) => [choice.value, choice.label]));
  }

  hasChoice(value: string): boolean {
    return this.labels.has(value);
  }

  /**
   * The untranslated label of a value, or the value itself when unknown.
   */
  labelOf(value: string): string {
    return this.labels.get(value) ?? value;
  }

  /**
   * Check submitted values against the choice set. Browsers only send what
   * was rendered, so a mismatch is a bug or a forged request.
   */
  protected checkValues(values: readonly string[]): void {
    if (this.nocheck) {
      return;
    }
    for (const value of values) {
      if (!this.labels.has(value)) {
        throw new InternalFieldError(this.name, `value '${value}' is not one of the choices`);
      }
    }
  }

  protected asciiValue(value: string): string {
    if (!ASCII.test(value)) {
      throw new InternalFieldError(this.name, 'choice value is not ascii');
    }
    return value;
  }

  /**
   * Exactly one value. Nothing selected is a user error.
   */
  protected parseOne(raw: ParseValue): ParseResult<string, string> {
    if (raw === null || raw === '') {
      return reject('one-choice-required');
    }
    if (Array.isArray(raw)) {
      throw new InternalFieldError(this.name, 'several values received for a single choice');
    }
    if (typeof raw !== 'string') {
      return this.unexpected(raw);
    }
    const value = this.asciiValue(raw);
    this.checkValues([value]);
    return accept(value);
  }

  /**
   * Zero or more values. A lone value is wrapped in a list.
   */
  protected parseMany(raw: ParseValue): ParseResult<string[], readonly string[]> {
    if (raw === null || raw === '') {
      return accept([]);
    }
    const submitted = typeof raw === 'string' ? [raw] : raw;
    if (!isStringList(submitted)) {
      return this.unexpected(submitted);
    }
    const values = submitted.map((item) => this.asciiValue(item));
    this.checkValues(values);
    return accept(values);
  }

  protected renderOne(value: string | null): string {
    if (value !== null) {
      return value;
    }
    const first = this.choiceList[0];
    if (first === undefined) {
      throw new InternalFieldError(this.name, 'single choice field without choices has no default');
    }
    return first.value;
  }

  protected displayOne(value: string, messages: MessageRegistry): string {
    return messages.translate(this.labelOf(value));
  }

  protected displayMany(values: readonly string[], messages: MessageRegistry): string {
    return values.map((value) => messages.translate(this.labelOf(value))).join(', ');
  }
}

// =============================================================================
// Exactly one choice
// =============================================================================

const ONE_CHOICE_TYPES: FieldTypes = {
  data: ['string'],
  parse: ['null', 'string', 'list'],
  render: ['string'],
};

export const OneChoiceFieldOptionsSchema = ChoiceFieldOptionsSchema.extend({
  initial: ChoiceValueSchema.nullable().optional(),
}).strict();

export interface OneChoiceFieldOptions extends Omit<ChoiceFieldOptions<string>, 'initial'> {
  initial?: string | number | null;
}

/**
 * Base class for fields forcing exactly one choice.
 */
export abstract class OneChoiceField<TName extends string = string> extends ChoiceField<
  string,
  string,
  TName
> {
  protected constructor(
    name: TName,
    options: OneChoiceFieldOptions,
    capabilities: FieldCapabilities = NO_CAPABILITIES
  ) {
    const validated = validateOptions(name, OneChoiceFieldOptionsSchema, options);
    const initial = validated.initial === undefined || validated.initial === null
      ? null
      : normalizeValue(validated.initial);
    super(name, { ...options, initial }, ONE_CHOICE_TYPES, capabilities);
  }

  parseValue(raw: ParseValue): ParseResult<string, string> {
    return this.parseOne(raw);
  }

  renderValue(value: string | null): string {
    return this.renderOne(value);
  }

  displayValue(value: string | null, messages: MessageRegistry): string {
    return value === null ? '' : this.displayOne(value, messages);
  }
}

export const RadioFieldOptionsSchema = OneChoiceFieldOptionsSchema.extend({
  orient: OrientationSchema.optional(),
}).strict();

export interface RadioFieldOptions extends OneChoiceFieldOptions {
  orient?: Orientation;
}

/**
 * A set of radio buttons.
 */
export class RadioField<TName extends string = string> extends OneChoiceField<TName> {
  readonly orient: Orientation;

  constructor(name: TName, options: RadioFieldOptions = {}) {
    const { orient, ...rest } = validateOptions(name, RadioFieldOptionsSchema, options);
    super(name, { ...rest, choices: options.choices }, { ...NO_CAPABILITIES, orientable: true });
    this.orient = orient ?? 'vertical';
  }

  renderWith<TOut>(
    renderer: FieldRenderer<TOut>,
    value: string | null,
    error: string | null,
    required: boolean
  ): TOut {
    return renderer.renderRadioField(this, value, error, required);
  }
}

/**
 * A drop-down menu.
 */
export class MenuField<TName extends string = string> extends OneChoiceField<TName> {
  constructor(name: TName, options: OneChoiceFieldOptions = {}) {
    super(name, options);
  }

  renderWith<TOut>(
    renderer: FieldRenderer<TOut>,
    value: string | null,
    error: string | null,
    required: boolean
  ): TOut {
    return renderer.renderMenuField(this, value, error, required);
  }
}

// =============================================================================
// Any number of choices
// =============================================================================

const InitialListSchema = z.union([ChoiceValueSchema, z.array(ChoiceValueSchema)]).nullable().optional();

function normalizeInitialList(
  initial: z.infer<typeof InitialListSchema>
): string[] | null {
  if (initial === undefined || initial === null) {
    return null;
  }
  return Array.isArray(initial) ? initial.map(normalizeValue) : [normalizeValue(initial)];
}

export const CheckboxesFieldOptionsSchema = ChoiceFieldOptionsSchema.extend({
  initial: InitialListSchema,
  orient: OrientationSchema.optional(),
}).strict();

export interface CheckboxesFieldOptions
  extends Omit<ChoiceFieldOptions<readonly string[]>, 'initial'> {
  initial?: string | number | readonly (string | number)[] | null;
  orient?: Orientation;
}

/**
 * A row or column of checkboxes, zero or more of which may be ticked.
 */
export class CheckboxesField<TName extends string = string> extends ChoiceField<
  readonly string[],
  readonly string[],
  TName
> {
  readonly orient: Orientation;

  constructor(name: TName, options: CheckboxesFieldOptions = {}) {
    const validated = validateOptions(name, CheckboxesFieldOptionsSchema, options);
    super(
      name,
      {
        label: validated.label,
        state: validated.state,
        nocheck: validated.nocheck,
        choices: options.choices,
        initial: normalizeInitialList(validated.initial),
      },
      { data: ['list'], parse: ['null', 'string', 'list'], render: ['list'] },
      { ...NO_CAPABILITIES, orientable: true, multiValued: true }
    );
    this.orient = validated.orient ?? 'vertical';
  }

  parseValue(raw: ParseValue): ParseResult<readonly string[], readonly string[]> {
    return this.parseMany(raw);
  }

  renderValue(value: readonly string[] | null): readonly string[] {
    return value ?? [];
  }

  displayValue(value: readonly string[] | null, messages: MessageRegistry): string {
    return this.displayMany(value ?? [], messages);
  }

  renderWith<TOut>(
    renderer: FieldRenderer<TOut>,
    value: readonly string[] | null,
    error: string | null,
    required: boolean
  ): TOut {
    return renderer.renderCheckboxesField(this, value, error, required);
  }
}

// =============================================================================
// Listboxes
// =============================================================================

const DEFAULT_LISTBOX_SIZE = 5;

/** Listbox data: a list in multiple mode, else one value or nothing. */
export type ListboxValue = string | readonly string[] | null;

export const ListboxFieldOptionsSchema = ChoiceFieldOptionsSchema.extend({
  initial: InitialListSchema,
  required: z.boolean().optional(),
  multiple: z.boolean().optional(),
  size: z.number().int().positive().optional(),
}).strict();

export interface ListboxFieldOptions
  extends Omit<ChoiceFieldOptions<string>, 'initial'>,
    RequiredOption {
  initial?: string | number | readonly (string | number)[] | null;
  /** Allow more than one selection; fixed for the lifetime of the field */
  multiple?: boolean;
  /** Number of visible rows; defaults to the number of choices, at most 5 */
  size?: number;
}

/**
 * A listbox taller than one row.
 *
 * In single mode it yields one value or null, so unlike menus and radio
 * buttons it can end up with nothing selected (use `required` to prevent
 * that). In multiple mode it yields a list.
 */
export class ListboxField<TName extends string = string> extends ChoiceField<
  ListboxValue,
  ListboxValue,
  TName
> {
  readonly multiple: boolean;
  readonly size: number;

  constructor(name: TName, options: ListboxFieldOptions = {}) {
    const validated = validateOptions(name, ListboxFieldOptionsSchema, options);
    const multiple = validated.multiple ?? false;
    const initialList = normalizeInitialList(validated.initial);

    let initial: ListboxValue = initialList;
    if (!multiple && initialList !== null) {
      if (initialList.length > 1) {
        throw new FieldDefinitionError(name, 'several initial values for a single-mode listbox');
      }
      initial = initialList[0] ?? null;
    }

    super(
      name,
      {
        label: validated.label,
        state: validated.state,
        nocheck: validated.nocheck,
        required: validated.required,
        choices: options.choices,
        initial,
      },
      {
        data: multiple ? ['list'] : ['null', 'string'],
        parse: ['null', 'string', 'list'],
        render: multiple ? ['list'] : ['string'],
      },
      { ...NO_CAPABILITIES, optRequired: true, multiValued: multiple }
    );

    this.multiple = multiple;
    this.size = validated.size ?? Math.min(this.choices.length || DEFAULT_LISTBOX_SIZE, DEFAULT_LISTBOX_SIZE);
  }

  parseValue(raw: ParseValue): ParseResult<ListboxValue, ListboxValue> {
    const missing = this.checkRequired(raw);
    if (missing) {
      return missing;
    }
    if (this.multiple) {
      return this.parseMany(raw);
    }
    if (raw === null || raw === '') {
      return accept(null);
    }
    return this.parseOne(raw);
  }

  renderValue(value: ListboxValue): ListboxValue {
    if (this.multiple) {
      if (value === null) {
        return [];
      }
      return typeof value === 'string' ? [value] : value;
    }
    if (value === null) {
      return '';
    }
    if (typeof value !== 'string') {
      throw new InternalFieldError(this.name, 'list value for a single-mode listbox');
    }
    return value;
  }

  displayValue(value: ListboxValue, messages: MessageRegistry): string {
    if (value === null) {
      return '';
    }
    if (typeof value === 'string') {
      return this.displayOne(value, messages);
    }
    return this.displayMany(value, messages);
  }

  renderWith<TOut>(
    renderer: FieldRenderer<TOut>,
    value: ListboxValue,
    error: string | null,
    required: boolean
  ): TOut {
    return renderer.renderListboxField(this, value, error, required);
  }
}
