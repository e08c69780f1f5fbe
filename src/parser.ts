/**
 * Form parsing protocol.
 *
 * A FormParser handles one submission of one form:
 *
 *   1. parseArgs() converts the arguments with the form's fields, keeping
 *      the values that parsed and recording errors for those that did not;
 *   2. the handler may add its own cross-field checks through error();
 *   3. end() closes the protocol. Without errors it returns the parsed
 *      values; with errors it hands values and errors to the redirect
 *      handler so the form can be redisplayed.
 *
 * Every parser must be ended or cancelled. Forgetting to do so is a bug in
 * the handler: close() raises for it, and parsers collected without having
 * been finished are logged.
 */

import { ParserProtocolError, InternalFieldError, UnknownFieldError } from './core/errors.js';
import { defaultLogger, type Logger } from './core/logger.js';
import { describeValue, isNormalizedArgs, type NormalizedArgs } from './core/values.js';
import type { AnyField } from './field.js';
import type { FieldName, Form, FormValues } from './form.js';
import { defaultMessages, type MessageRegistry } from './messages.js';
import type { Normalizer } from './norms/normalizer.js';

/** Status of the first batch of field errors found by parseArgs(). */
export const STATUS_INVALID_INPUT = 'error-invalid-input';
/** Status once errors have been signaled more than once. */
export const STATUS_MANY = 'error-many';
/** Default status of handler-signaled errors. */
export const STATUS_ERROR = 'error';

/**
 * A field error as given to error(): `true` for a generic message, a
 * message, a `[message, replacement]` pair, or the normalized entry itself.
 */
export type FieldErrorInput =
  | true
  | string
  | readonly [string, unknown]
  | { readonly message: string; readonly replacement?: unknown };

export interface FieldErrorEntry {
  readonly message: string;
  /** Render value for redisplaying the field, or null */
  readonly replacement: unknown;
}

export interface ErrorReport<F extends AnyField = AnyField> {
  /** Summary shown to the user, when this is the only error signaled */
  message?: string;
  /** Machine-readable status, when this is the only error signaled */
  status?: string;
  /** Fields to flag with the generic message */
  names?: readonly FieldName<F>[];
  /** Fields to flag with specific errors */
  fields?: Partial<Record<FieldName<F>, FieldErrorInput>>;
}

/**
 * Everything needed to send the user back to the form with errors marked.
 */
export interface RedirectRequest<F extends AnyField = AnyField> {
  readonly url: string | undefined;
  readonly form: Form<F>;
  readonly status: string;
  readonly message: string;
  /** Parsed values, without file uploads */
  readonly values: Readonly<Record<string, unknown>>;
  readonly errors: Readonly<Record<string, FieldErrorEntry>>;
}

export type RedirectHandler<F extends AnyField = AnyField> = (request: RedirectRequest<F>) => void;

export type ParseOutcome<F extends AnyField> =
  | {
      readonly ok: true;
      readonly values: FormValues<F>;
      /** Extra values saved with store() */
      readonly stored: ReadonlyMap<string, unknown>;
    }
  | { readonly ok: false; readonly redirect: RedirectRequest<F> };

export interface FormParserOptions<F extends AnyField = AnyField, TRaw = NormalizedArgs> {
  /** Converts framework arguments; without one, arguments must already be normalized */
  normalizer?: Normalizer<TRaw>;
  messages?: MessageRegistry;
  logger?: Logger;
  /** Where to send the user back to on errors */
  redirectUrl?: string;
  /** Called by end() when errors were signaled */
  onRedirect?: RedirectHandler<F>;
}

export interface FieldSelection {
  only?: readonly string[];
  ignore?: readonly string[];
}

type ParserState = 'parsing' | 'ended' | 'cancelled';

interface UnfinishedParser {
  readonly formName: string;
  readonly logger: Logger;
}

const unfinishedParsers = new FinalizationRegistry<UnfinishedParser>((held) => {
  held.logger.error('form parser was discarded without end() or cancel()', { form: held.formName });
});

const UNRESOLVED = Symbol('unresolved submit');

/**
 * Whether every declared field has a value its field accepts, or null.
 */
function holdsFormValues<F extends AnyField>(
  form: Form<F>,
  values: object
): values is FormValues<F> {
  return form.fields.every((field) => {
    const value: unknown = Reflect.get(values, field.name);
    return value === null || field.acceptsData(value);
  });
}

/**
 * Read-only view over finished values. Declared fields without a value read
 * as null; any other name is a bug in the caller.
 */
function freezeValues<F extends AnyField>(
  form: Form<F>,
  values: ReadonlyMap<string, unknown>
): FormValues<F> {
  const target: Record<string, unknown> = Object.create(null);
  for (const name of form.names()) {
    target[name] = values.has(name) ? values.get(name) : null;
  }
  Object.freeze(target);

  if (!holdsFormValues(form, target)) {
    throw new ParserProtocolError(form.name, 'parsed values do not match the form fields');
  }

  const view = new Proxy(target, {
    get(object, property) {
      if (typeof property === 'symbol' || Object.prototype.hasOwnProperty.call(object, property)) {
        return Reflect.get(object, property);
      }
      // Probed by JSON.stringify and await
      if (property === 'toJSON' || property === 'then') {
        return undefined;
      }
      throw new UnknownFieldError(property, form.name);
    },
  });
  return view;
}

export class FormParser<F extends AnyField = AnyField, TRaw = NormalizedArgs> {
  readonly form: Form<F>;

  private readonly normalizer: Normalizer<TRaw> | undefined;
  private readonly messages: MessageRegistry;
  private readonly logger: Logger;
  private readonly redirectUrl: string | undefined;
  private readonly onRedirect: RedirectHandler<F> | undefined;

  private readonly values = new Map<string, unknown>();
  private readonly errors = new Map<string, FieldErrorEntry>();
  private readonly stored = new Map<string, unknown>();
  private errorCalls = 0;
  private currentStatus: string | null = null;
  private currentMessage = '';
  private submitValue: string | null | typeof UNRESOLVED = UNRESOLVED;
  private state: ParserState = 'parsing';

  constructor(form: Form<F>, options: FormParserOptions<F, TRaw> = {}) {
    this.form = form;
    this.normalizer = options.normalizer;
    this.messages = options.messages ?? defaultMessages;
    this.logger = options.logger ?? defaultLogger();
    this.redirectUrl = options.redirectUrl;
    this.onRedirect = options.onRedirect;

    unfinishedParsers.register(this, { formName: form.name, logger: this.logger }, this);
  }

  /** Status token of the errors signaled so far, or null. */
  get status(): string | null {
    return this.currentStatus;
  }

  /** Summary message of the errors signaled so far. */
  get message(): string {
    return this.currentMessage;
  }

  get isFinished(): boolean {
    return this.state !== 'parsing';
  }

  /**
   * Parse the submitted arguments of the selected fields.
   *
   * Arguments without a matching field are ignored. Values that parse are
   * kept, failures are signaled through error() in one batch. The submit
   * button is resolved along the way.
   */
  parseArgs(args: TRaw, selection: FieldSelection = {}): void {
    this.assertParsing('parseArgs()');
    const normalized = this.normalize(args);

    const failures: [string, FieldErrorEntry][] = [];
    for (const field of this.form.selectFields(selection.only, selection.ignore)) {
      const outcome = this.form.parseField(field, normalized, this.messages);
      if (outcome.ok) {
        this.values.set(field.name, outcome.value);
      } else {
        failures.push([field.name, { message: outcome.message, replacement: outcome.replacement }]);
      }
    }

    if (failures.length > 0) {
      this.signal(STATUS_INVALID_INPUT, undefined, failures);
    }

    this.submitValue = this.form.parseSubmit(normalized);
  }

  /**
   * Resolve only the submit button.
   */
  parseSubmit(args: TRaw): string | null {
    this.assertParsing('parseSubmit()');
    this.submitValue = this.form.parseSubmit(this.normalize(args));
    return this.submitValue;
  }

  /**
   * The pressed submit button, or null for single-button forms.
   *
   * @throws ParserProtocolError before the arguments were parsed
   */
  getSubmit(): string | null {
    if (this.submitValue === UNRESOLVED) {
      throw new ParserProtocolError(this.form.name, 'submit value requested before parsing arguments');
    }
    return this.submitValue;
  }

  /**
   * Parsed value of a field, or null when it has none (yet).
   */
  get<K extends FieldName<F>>(name: K): unknown {
    this.form.getField(name);
    return this.values.has(name) ? this.values.get(name) : null;
  }

  /**
   * Snapshot of the parsed values, e.g. to store for redisplay.
   *
   * @param cullUploads - Leave out file upload values
   */
  getValues(cullUploads = false): Record<string, unknown> {
    const snapshot: Record<string, unknown> = {};
    for (const [name, value] of this.values) {
      if (cullUploads && this.form.getField(name).capabilities.upload) {
        continue;
      }
      snapshot[name] = value;
    }
    return snapshot;
  }

  hasErrors(): boolean {
    return this.errorCalls > 0;
  }

  getErrors(): Readonly<Record<string, FieldErrorEntry>> {
    return Object.fromEntries(this.errors);
  }

  getErrorFields(): string[] {
    return [...this.errors.keys()];
  }

  /** Untranslated labels of the fields in error. */
  getErrorLabels(): (string | undefined)[] {
    return this.form.labels(this.getErrorFields());
  }

  /**
   * Keep an extra value next to the parsed ones, e.g. something computed
   * during validation. Stored names live apart from field names.
   */
  store(name: string, value: unknown): void {
    this.assertParsing('store()');
    this.stored.set(name, value);
  }

  getStored(name: string): unknown {
    return this.stored.get(name);
  }

  /**
   * Signal errors.
   *
   * The message and status are used only if this is the only time errors
   * are signaled for this submission; otherwise a generic message and the
   * `error-many` status are used.
   */
  error(report: ErrorReport<F> = {}): void {
    this.assertParsing('error()');

    const entries: [string, FieldErrorEntry][] = [];
    for (const name of report.names ?? []) {
      entries.push([name, this.normalizeError(name, true)]);
    }
    for (const [name, input] of Object.entries<FieldErrorInput | undefined>(report.fields ?? {})) {
      if (input !== undefined) {
        entries.push([name, this.normalizeError(name, input)]);
      }
    }

    this.signal(report.status ?? STATUS_ERROR, report.message, entries);
  }

  /**
   * Finish the protocol.
   *
   * @param url - Overrides the redirect URL given at construction
   * @returns The values when no error was signaled, otherwise the redirect
   *   request, after the redirect handler has seen it
   */
  end(url?: string): ParseOutcome<F> {
    this.assertParsing('end()');
    this.finish('ended');

    if (this.hasErrors()) {
      return { ok: false, redirect: this.redirect(url) };
    }
    return { ok: true, values: freezeValues(this.form, this.values), stored: new Map(this.stored) };
  }

  /**
   * Build the redirect request and hand it to the redirect handler. Only
   * valid after end(), and only when errors were signaled.
   */
  redirect(url?: string): RedirectRequest<F> {
    if (this.state !== 'ended' || !this.hasErrors()) {
      throw new ParserProtocolError(this.form.name, 'redirect() needs an ended parser with errors');
    }

    const request: RedirectRequest<F> = {
      url: url ?? this.redirectUrl,
      form: this.form,
      status: this.currentStatus ?? STATUS_ERROR,
      message: this.currentMessage,
      values: this.getValues(true),
      errors: this.getErrors(),
    };
    this.onRedirect?.(request);
    return request;
  }

  /**
   * Finish without redirecting, when the handler deals with the outcome
   * itself.
   */
  cancel(): void {
    if (this.state === 'ended') {
      throw new ParserProtocolError(this.form.name, 'cancel() after end()');
    }
    this.finish('cancelled');
  }

  /**
   * Verify the protocol was completed.
   *
   * @throws ParserProtocolError when neither end() nor cancel() was called
   */
  close(): void {
    if (this.state === 'parsing') {
      this.finish('cancelled');
      throw new ParserProtocolError(this.form.name, 'closed without end() or cancel()');
    }
  }

  private normalize(args: TRaw): NormalizedArgs {
    if (this.normalizer !== undefined) {
      return this.normalizer.normalize(args);
    }
    if (!isNormalizedArgs(args)) {
      throw new ParserProtocolError(
        this.form.name,
        `arguments of type ${describeValue(args)} need a normalizer`
      );
    }
    return args;
  }

  private normalizeError(name: string, input: FieldErrorInput): FieldErrorEntry {
    const field = this.form.getField(name);

    let entry: FieldErrorEntry;
    if (input === true) {
      entry = { message: this.messages.get('generic-value-error'), replacement: null };
    } else if (typeof input === 'string') {
      entry = { message: input, replacement: null };
    } else if ('message' in input) {
      entry = { message: input.message, replacement: input.replacement ?? null };
    } else {
      entry = { message: input[0], replacement: input[1] ?? null };
    }

    if (entry.replacement !== null && !field.acceptsRender(entry.replacement)) {
      throw new InternalFieldError(
        name,
        `replacement of type ${describeValue(entry.replacement)} is not a render value`
      );
    }
    return entry;
  }

  private signal(status: string, message: string | undefined, entries: [string, FieldErrorEntry][]): void {
    if (this.errorCalls === 0) {
      this.currentStatus = status;
      this.currentMessage = message || this.messages.get('generic-ui-message');
    } else {
      this.currentStatus = STATUS_MANY;
      this.currentMessage = this.messages.get('generic-ui-message');
    }
    this.errorCalls++;

    for (const [name, entry] of entries) {
      this.errors.set(name, entry);
    }
  }

  private assertParsing(operation: string): void {
    if (this.state !== 'parsing') {
      throw new ParserProtocolError(this.form.name, `${operation} called after the parser was ${this.state}`);
    }
  }

  private finish(state: Exclude<ParserState, 'parsing'>): void {
    this.state = state;
    unfinishedParsers.unregister(this);
  }
}

/**
 * Run `body` with a new parser and verify the parser was finished when it
 * returns. A parser left unfinished by a throwing body is cancelled so the
 * body's error propagates.
 */
export function withFormParser<F extends AnyField, TRaw, TResult>(
  form: Form<F>,
  options: FormParserOptions<F, TRaw>,
  body: (parser: FormParser<F, TRaw>) => TResult
): TResult {
  const parser = new FormParser<F, TRaw>(form, options);
  let result: TResult;
  try {
    result = body(parser);
  } catch (err) {
    if (!parser.isFinished) {
      parser.cancel();
    }
    throw err;
  }
  parser.close();
  return result;
}

/**
 * Parse a submission and end the parser in one call, for handlers without
 * checks of their own.
 */
export function parseForm<F extends AnyField, TRaw = NormalizedArgs>(
  form: Form<F>,
  args: TRaw,
  options: FormParserOptions<F, TRaw> & FieldSelection = {}
): ParseOutcome<F> {
  const { only, ignore, ...parserOptions } = options;
  const parser = new FormParser<F, TRaw>(form, parserOptions);
  try {
    parser.parseArgs(args, { only, ignore });
  } catch (err) {
    parser.cancel();
    throw err;
  }
  return parser.end();
}
