/**
 * Date fields: free text entry, script-assisted entry and date menus.
 */

import { addDays, format, startOfDay, type Locale } from 'date-fns';
import { enUS } from 'date-fns/locale';
import { z } from 'zod';
import { FieldDefinitionError, InternalFieldError } from '../core/errors.js';
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
import { DEFAULT_MESSAGES, type MessageRegistry } from '../messages.js';
import type { FieldRenderer } from '../render-contract.js';
import { ChoiceField, type Choice } from './choices.js';
import { StringField } from './texts.js';

const DATE_TYPES: FieldTypes = {
  data: ['null', 'date'],
  parse: ['null', 'string'],
  render: ['string'],
};

const ISO_FORMAT = 'yyyy-MM-dd';
const DISPLAY_FORMAT = 'EEE, dd MMMM yyyy';

const LocaleSchema = z.custom<Locale>(
  (value) => typeof value === 'object' && value !== null && 'code' in value,
  { message: 'expected a date-fns locale' }
);

/**
 * A date at local midnight, or null if the triple is not a calendar date.
 */
export function makeDate(year: number, month: number, day: number): Date | null {
  if (year < 1) {
    return null;
  }
  // setFullYear keeps years below 100 as they are; the Date constructor does not
  const date = new Date(2000, 0, 1);
  date.setFullYear(year, month - 1, day);
  if (date.getFullYear() !== year || date.getMonth() !== month - 1 || date.getDate() !== day) {
    return null;
  }
  return startOfDay(date);
}

export function toIsoDate(date: Date): string {
  return format(date, ISO_FORMAT);
}

/**
 * Human-readable date, e.g. `Mon, 03 October 2005`. Years before 1900 use
 * the plain `Y-M-D` form.
 */
export function displayDate(date: Date, locale: Locale = enUS): string {
  if (date.getFullYear() < 1900) {
    return `${date.getFullYear()}-${date.getMonth() + 1}-${date.getDate()}`;
  }
  return format(date, DISPLAY_FORMAT, { locale });
}

/**
 * Month number (1-12) for a full or abbreviated month name in a locale.
 */
export function monthFromName(name: string, locale: Locale = enUS): number | null {
  const wanted = name.toLocaleLowerCase();
  for (let month = 0; month < 12; month++) {
    const sample = new Date(2000, month, 1);
    const abbreviated = format(sample, 'MMM', { locale }).replace(/\.$/, '');
    const full = format(sample, 'MMMM', { locale });
    if (wanted === abbreviated.toLocaleLowerCase() || wanted === full.toLocaleLowerCase()) {
      return month + 1;
    }
  }
  return null;
}

// =============================================================================
// Free text entry
// =============================================================================

const ISO_PATTERN = /^(?<year>\d+)-(?<month>\d+)-(?<day>\d+)$/;
const DAY_MONTH_YEAR_PATTERN = /^(?<day>\d+)\s+(?<name>\p{L}+)\.?\s+(?<year>\d+)$/u;
const MONTH_DAY_YEAR_PATTERN = /^(?<name>\p{L}+)\.?\s+(?<day>\d+)[\s,]+(?<year>\d+)$/u;

export const DateFieldOptionsSchema = BaseFieldOptionsSchema.extend({
  required: z.boolean().optional(),
  locale: LocaleSchema.optional(),
}).strict();

export interface DateFieldOptions extends BaseFieldOptions<Date>, RequiredOption {
  /** Locale for month names and display; defaults to en-US */
  locale?: Locale;
}

/**
 * A text input accepting `YYYY-MM-DD`, `D Month YYYY` or `Month D, YYYY`.
 */
export class DateField<TName extends string = string> extends Field<Date | null, string, TName> {
  readonly size = 20;
  readonly locale: Locale;
  private readonly text: StringField;

  constructor(name: TName, options: DateFieldOptions = {}) {
    const validated = validateOptions(name, DateFieldOptionsSchema, options);
    super(name, options, DATE_TYPES, { ...NO_CAPABILITIES, optRequired: true });
    this.locale = validated.locale ?? enUS;
    this.text = new StringField(name, { required: validated.required, strip: true, size: this.size });
  }

  parseValue(raw: ParseValue): ParseResult<Date | null, string> {
    const result = this.text.parseValue(raw);
    if (!result.ok) {
      return result;
    }

    const value = result.value;
    if (value === '') {
      return accept(null);
    }

    const match =
      ISO_PATTERN.exec(value) ?? DAY_MONTH_YEAR_PATTERN.exec(value) ?? MONTH_DAY_YEAR_PATTERN.exec(value);
    const groups = match?.groups;
    if (groups === undefined) {
      return reject({ key: 'date-invalid-format', args: [value] }, value);
    }

    let month: number | null;
    if (groups.month !== undefined) {
      month = Number(groups.month);
    } else {
      month = monthFromName(groups.name ?? '', this.locale);
      if (month === null) {
        return reject({ key: 'date-invalid-month', args: [groups.name ?? ''] }, value);
      }
    }

    const date = makeDate(Number(groups.year), month, Number(groups.day));
    if (date === null) {
      return reject({ key: 'date-invalid', args: [value] }, value);
    }
    return accept(date);
  }

  renderValue(value: Date | null): string {
    return value === null ? '' : toIsoDate(value);
  }

  displayValue(value: Date | null, _messages: MessageRegistry): string {
    return value === null ? '' : displayDate(value, this.locale);
  }

  renderWith<TOut>(
    renderer: FieldRenderer<TOut>,
    value: string | null,
    error: string | null,
    required: boolean
  ): TOut {
    return renderer.renderDateField(this, value, error, required);
  }
}

// =============================================================================
// Script-assisted entry
// =============================================================================

/** Client script the calendar widget needs, with the notice to keep. */
export const CALENDAR_SCRIPT = {
  'calendarDateInput.js': 'Calendar date input script. Keep this notice intact for use.',
} as const;

const SCRIPT_NAME_PATTERN = /^[a-zA-Z_]+$/;
const COMPACT_DATE_PATTERN = /^(\d{4})(\d{2})(\d{2})$/;

export const JSDateFieldOptionsSchema = DateFieldOptionsSchema;

export type JSDateFieldOptions = DateFieldOptions;

/**
 * A date entered through a client-side calendar widget, which always submits
 * `YYYYMMDD`. Anything else did not come from the widget and is treated as
 * an internal error. Required unless `required: false` is given.
 */
export class JSDateField<TName extends string = string> extends Field<Date | null, string, TName> {
  readonly scripts: Readonly<Record<string, string>> = CALENDAR_SCRIPT;
  readonly locale: Locale;

  constructor(name: TName, options: JSDateFieldOptions = {}) {
    const validated = validateOptions(name, JSDateFieldOptionsSchema, options);
    if (!SCRIPT_NAME_PATTERN.test(name)) {
      throw new FieldDefinitionError(name, 'calendar fields need a name of letters and underscores');
    }
    super(
      name,
      { ...options, required: validated.required ?? true },
      DATE_TYPES,
      { ...NO_CAPABILITIES, optRequired: true }
    );
    this.locale = validated.locale ?? enUS;
  }

  parseValue(raw: ParseValue): ParseResult<Date | null, string> {
    if (raw === null || raw === '') {
      // The widget always sends a value, even when untouched.
      return this.required ? reject({ key: 'date-invalid', args: [''] }) : accept(null);
    }
    if (typeof raw !== 'string') {
      return this.unexpected(raw);
    }

    const match = COMPACT_DATE_PATTERN.exec(raw);
    if (match === null) {
      throw new InternalFieldError(this.name, 'calendar widget sent a malformed date');
    }

    const date = makeDate(Number(match[1]), Number(match[2]), Number(match[3]));
    if (date === null) {
      return reject({ key: 'date-invalid', args: [raw] });
    }
    return accept(date);
  }

  renderValue(value: Date | null): string {
    return value === null ? '' : format(value, 'yyyyMMdd');
  }

  displayValue(value: Date | null, _messages: MessageRegistry): string {
    return value === null ? '' : displayDate(value, this.locale);
  }

  renderWith<TOut>(
    renderer: FieldRenderer<TOut>,
    value: string | null,
    error: string | null,
    required: boolean
  ): TOut {
    return renderer.renderJSDateField(this, value, error, required);
  }
}

// =============================================================================
// Date menus
// =============================================================================

/** Choice value standing for "no particular date". */
export const ANY_DATE = 'any';

export const DateMenuFieldOptionsSchema = BaseFieldOptionsSchema.extend({
  days: z.number().int().positive().optional(),
  offset: z.number().int().optional(),
  anyLabel: z.union([z.string(), z.literal(true)]).optional(),
  nocheck: z.boolean().optional(),
  locale: LocaleSchema.optional(),
  clock: z.custom<() => Date>((value) => typeof value === 'function').optional(),
}).strict();

export interface DateMenuFieldOptions extends BaseFieldOptions<Date> {
  /** Number of consecutive days offered (default: 30) */
  days?: number;
  /** Days between today and the first date offered (default: 0) */
  offset?: number;
  /** Offer an "any date" entry first, parsed as null, with this label (`true`: the default label) */
  anyLabel?: string | true;
  nocheck?: boolean;
  locale?: Locale;
  /** Source of "today" (default: the system clock) */
  clock?: () => Date;
}

/**
 * A menu of upcoming dates, recomputed from the clock whenever its choices
 * are read.
 */
export class DateMenuField<TName extends string = string> extends ChoiceField<
  Date | null,
  string,
  TName
> {
  readonly days: number;
  readonly offset: number;
  readonly anyLabel: string | undefined;
  readonly locale: Locale;
  private readonly clock: () => Date;

  constructor(name: TName, options: DateMenuFieldOptions = {}) {
    const validated = validateOptions(name, DateMenuFieldOptionsSchema, options);
    super(
      name,
      { label: validated.label, state: validated.state, nocheck: validated.nocheck, initial: options.initial },
      DATE_TYPES,
      NO_CAPABILITIES
    );
    this.days = validated.days ?? 30;
    this.offset = validated.offset ?? 0;
    this.anyLabel = validated.anyLabel === true ? DEFAULT_MESSAGES['date-any'] : validated.anyLabel;
    this.locale = validated.locale ?? enUS;
    this.clock = validated.clock ?? (() => new Date());
    this.refresh();
  }

  get choices(): readonly Choice[] {
    this.refresh();
    return super.choices;
  }

  /**
   * Regenerate the dates offered, starting `offset` days from today.
   */
  refresh(): void {
    const first = addDays(startOfDay(this.clock()), this.offset);
    const dates: [string, string][] = [];
    for (let index = 0; index < this.days; index++) {
      const date = addDays(first, index);
      dates.push([toIsoDate(date), displayDate(date, this.locale)]);
    }
    this.setChoices(this.anyLabel === undefined ? dates : [[ANY_DATE, this.anyLabel], ...dates]);
  }

  parseValue(raw: ParseValue): ParseResult<Date | null, string> {
    this.refresh();
    const result = this.parseOne(raw);
    if (!result.ok) {
      return result;
    }
    if (result.value === ANY_DATE && this.anyLabel !== undefined) {
      return accept(null);
    }

    const match = ISO_PATTERN.exec(result.value);
    const date = match?.groups
      ? makeDate(Number(match.groups.year), Number(match.groups.month), Number(match.groups.day))
      : null;
    if (date === null) {
      throw new InternalFieldError(this.name, `menu value '${result.value}' is not a date`);
    }
    return accept(date);
  }

  renderValue(value: Date | null): string {
    if (value !== null) {
      return toIsoDate(value);
    }
    if (this.anyLabel !== undefined) {
      return ANY_DATE;
    }
    this.refresh();
    return this.renderOne(null);
  }

  displayValue(value: Date | null, messages: MessageRegistry): string {
    if (value === null) {
      return this.anyLabel === undefined ? '' : messages.translate(this.anyLabel);
    }
    return displayDate(value, this.locale);
  }

  renderWith<TOut>(
    renderer: FieldRenderer<TOut>,
    value: string | null,
    error: string | null,
    required: boolean
  ): TOut {
    return renderer.renderDateMenuField(this, value, error, required);
  }
}
