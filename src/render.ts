/**
 * Renderer base class.
 *
 * Markup backends subclass FormRenderer and implement the per-field-kind
 * entry points of FieldRenderer plus a few layout primitives. The base class
 * takes care of the protocol around them: picking the value to draw for each
 * field (error replacement, then submitted value, then initial value),
 * translating errors and labels, drawing hidden fields, and checking that
 * every field of the form was rendered.
 */

import { loadConfig } from './core/config.js';
import { RendererProtocolError } from './core/errors.js';
import { defaultLogger, type Logger } from './core/logger.js';
import { describeValue } from './core/values.js';
import type { AnyField } from './field.js';
import type { Form } from './form.js';
import { defaultMessages, type MessageRegistry } from './messages.js';
import type { FieldErrorEntry, FieldSelection } from './parser.js';
import type { FieldRenderer } from './render-contract.js';
import type { AgreeField, BoolField } from './fields/bools.js';
import type {
  CheckboxesField,
  ListboxField,
  ListboxValue,
  MenuField,
  RadioField,
} from './fields/choices.js';
import type { URLPathField, UsernameField, UsernameOrEmailField } from './fields/identity.js';
import type { FloatField, IntField } from './fields/numeric.js';
import type { DateField, DateMenuField, JSDateField } from './fields/temporal.js';
import type {
  EmailField,
  PasswordField,
  StringField,
  TextAreaField,
  URLField,
} from './fields/texts.js';
import type { FileUploadField, SetFileField } from './fields/uploads.js';

type Scalar = string | null;

export interface FormRendererOptions {
  /** Data values to draw, e.g. from a redirect request or Form.fetchNames() */
  values?: Readonly<Record<string, unknown>>;
  /** Errors to mark, as collected by a FormParser */
  errors?: Readonly<Record<string, FieldErrorEntry>>;
  messages?: MessageRegistry;
  logger?: Logger;
  /** Raise from finish() when fields were left out (default: from the environment) */
  completionChecks?: boolean;
}

/** One row of a field table, with translated texts. */
export interface TableRow<TOut> {
  readonly label: string;
  readonly input: TOut;
  readonly required: boolean;
  readonly error: string | null;
}

/** A submit or reset button, with a translated label. */
export interface ButtonSpec {
  readonly value: string | null;
  readonly label: string;
}

export abstract class FormRenderer<TOut> implements FieldRenderer<TOut> {
  readonly form: Form;
  protected readonly messages: MessageRegistry;
  protected readonly logger: Logger;
  private readonly values: Readonly<Record<string, unknown>>;
  private readonly errors: Readonly<Record<string, FieldErrorEntry>>;
  private readonly completionChecks: boolean;
  private readonly rendered = new Set<string>();
  private finished = false;

  constructor(form: Form, options: FormRendererOptions = {}) {
    this.form = form;
    this.values = options.values ?? {};
    this.errors = options.errors ?? {};
    this.messages = options.messages ?? defaultMessages;
    this.logger = options.logger ?? defaultLogger();
    this.completionChecks = options.completionChecks ?? loadConfig().completionChecks;
  }

  // ---------------------------------------------------------------------------
  // Backend primitives
  // ---------------------------------------------------------------------------

  /** Concatenate fragments. */
  protected abstract join(fragments: readonly TOut[]): TOut;

  protected abstract doContainerOpen(form: Form): TOut;

  protected abstract doContainerClose(form: Form): TOut;

  protected abstract doTable(rows: readonly TableRow<TOut>[]): TOut;

  protected abstract doSubmit(buttons: readonly ButtonSpec[], reset: string | null): TOut;

  abstract renderStringField(field: StringField, value: Scalar, error: string | null, required: boolean): TOut;
  abstract renderTextAreaField(field: TextAreaField, value: Scalar, error: string | null, required: boolean): TOut;
  abstract renderPasswordField(field: PasswordField, value: Scalar, error: string | null, required: boolean): TOut;
  abstract renderEmailField(field: EmailField, value: Scalar, error: string | null, required: boolean): TOut;
  abstract renderURLField(field: URLField, value: Scalar, error: string | null, required: boolean): TOut;
  abstract renderIntField(field: IntField, value: Scalar, error: string | null, required: boolean): TOut;
  abstract renderFloatField(field: FloatField, value: Scalar, error: string | null, required: boolean): TOut;
  abstract renderBoolField(field: BoolField, value: boolean | null, error: string | null, required: boolean): TOut;
  abstract renderAgreeField(field: AgreeField, value: boolean | null, error: string | null, required: boolean): TOut;
  abstract renderRadioField(field: RadioField, value: Scalar, error: string | null, required: boolean): TOut;
  abstract renderMenuField(field: MenuField, value: Scalar, error: string | null, required: boolean): TOut;
  abstract renderCheckboxesField(field: CheckboxesField, value: readonly string[] | null, error: string | null, required: boolean): TOut;
  abstract renderListboxField(field: ListboxField, value: ListboxValue, error: string | null, required: boolean): TOut;
  abstract renderDateField(field: DateField, value: Scalar, error: string | null, required: boolean): TOut;
  abstract renderJSDateField(field: JSDateField, value: Scalar, error: string | null, required: boolean): TOut;
  abstract renderDateMenuField(field: DateMenuField, value: Scalar, error: string | null, required: boolean): TOut;
  abstract renderFileUploadField(field: FileUploadField, value: Scalar, error: string | null, required: boolean): TOut;
  abstract renderSetFileField(field: SetFileField, value: Scalar, error: string | null, required: boolean): TOut;
  abstract renderUsernameField(field: UsernameField, value: Scalar, error: string | null, required: boolean): TOut;
  abstract renderUsernameOrEmailField(field: UsernameOrEmailField, value: Scalar, error: string | null, required: boolean): TOut;
  abstract renderURLPathField(field: URLPathField, value: Scalar, error: string | null, required: boolean): TOut;
  abstract renderHidden(field: AnyField, value: unknown): TOut;

  // ---------------------------------------------------------------------------
  // Form structure
  // ---------------------------------------------------------------------------

  /**
   * Render the whole form: container, field table, hidden fields and
   * buttons.
   */
  render(selection: FieldSelection = {}): TOut {
    return this.renderContainer(this.join([this.renderTable(selection), this.renderSubmit()]));
  }

  renderContainer(body: TOut): TOut {
    return this.join([this.doContainerOpen(this.form), body, this.doContainerClose(this.form)]);
  }

  /**
   * Render the selected fields as table rows. Hidden fields get no row; they
   * follow the table.
   */
  renderTable(selection: FieldSelection = {}): TOut {
    const rows: TableRow<TOut>[] = [];
    const hidden: TOut[] = [];
    for (const field of this.form.selectFields(selection.only, selection.ignore)) {
      if (field.isHidden()) {
        hidden.push(this.renderField(field.name));
        continue;
      }
      rows.push({
        label: this.labelOf(field),
        input: this.renderField(field.name),
        required: field.isRequired(),
        error: this.errorText(field.name),
      });
    }
    return this.join([this.doTable(rows), ...hidden]);
  }

  /**
   * Lay out already-rendered inputs next to their (untranslated) labels.
   */
  table(pairs: readonly (readonly [string, TOut])[]): TOut {
    return this.doTable(
      pairs.map(([label, input]) => ({
        label: this.messages.translate(label),
        input,
        required: false,
        error: null,
      }))
    );
  }

  renderSubmit(): TOut {
    const buttons = this.form.submit.map((button) => ({
      value: button.value,
      label: this.messages.translate(button.label),
    }));
    const reset = this.form.reset === null ? null : this.messages.translate(this.form.reset);
    return this.doSubmit(buttons, reset);
  }

  /**
   * Render one field with its value and error.
   *
   * @throws RendererProtocolError for a hidden field without a value or with
   *   an error, or when the value cannot be drawn by the field
   */
  renderField(name: string): TOut {
    const field = this.form.getField(name);
    const value = this.renderValueOf(field);
    const error = this.errorText(name);
    this.rendered.add(name);

    if (field.isHidden()) {
      if (error !== null) {
        throw new RendererProtocolError(this.form.name, `hidden field '${name}' has an error`);
      }
      if (value === null) {
        throw new RendererProtocolError(this.form.name, `hidden field '${name}' has no value`);
      }
      return this.renderHidden(field, value);
    }

    return field.renderWith(this, value, error, field.isRequired());
  }

  /**
   * Read-only text for a field: its display value, or a marker when it is in
   * error or unset.
   */
  displayText(name: string): string {
    const field = this.form.getField(name);
    this.rendered.add(name);
    if (this.errorText(name) !== null) {
      return this.messages.get('display-error');
    }
    const value = this.values[name];
    if (value === undefined || value === null) {
      return this.messages.get('display-unset');
    }
    if (!field.acceptsData(value)) {
      throw new RendererProtocolError(
        this.form.name,
        `value of type ${describeValue(value)} cannot be displayed by field '${name}'`
      );
    }
    return field.displayValue(value, this.messages);
  }

  /**
   * Names of the fields not rendered so far.
   */
  pending(): string[] {
    return this.form.names().filter((name) => !this.rendered.has(name));
  }

  /**
   * End rendering, checking that every field was rendered.
   *
   * @throws RendererProtocolError when fields are missing and completion
   *   checks are on
   */
  finish(): void {
    if (this.finished) {
      throw new RendererProtocolError(this.form.name, 'finish() called twice');
    }
    this.finished = true;

    const missing = this.pending();
    if (missing.length === 0) {
      return;
    }
    if (this.completionChecks) {
      throw new RendererProtocolError(this.form.name, `fields not rendered: ${missing.join(', ')}`);
    }
    this.logger.warn('form rendered without some of its fields', { form: this.form.name, missing });
  }

  // ---------------------------------------------------------------------------
  // Value resolution
  // ---------------------------------------------------------------------------

  protected labelOf(field: AnyField): string {
    return field.label === undefined ? '' : this.messages.translate(field.label);
  }

  protected errorText(name: string): string | null {
    return this.errors[name]?.message ?? null;
  }

  /**
   * The render value for a field: the error replacement if there is one,
   * else the given data value, else the field's initial value. A value the
   * field cannot convert but can draw as is (e.g. text a user typed) is
   * drawn unchanged.
   */
  protected renderValueOf(field: AnyField): unknown {
    const replacement = this.errors[field.name]?.replacement;
    if (replacement !== undefined && replacement !== null) {
      return this.checkedRenderValue(field, replacement);
    }

    if (Object.prototype.hasOwnProperty.call(this.values, field.name)) {
      const value = this.values[field.name];
      if (value === null || value === undefined || field.acceptsData(value)) {
        return this.checkedRenderValue(field, field.renderValue(value ?? null));
      }
      return this.checkedRenderValue(field, value);
    }

    if (field.initial === null && field.isHidden()) {
      return null;
    }
    return this.checkedRenderValue(field, field.renderValue(field.initial));
  }

  private checkedRenderValue(field: AnyField, value: unknown): unknown {
    if (!field.acceptsRender(value)) {
      throw new RendererProtocolError(
        this.form.name,
        `value of type ${describeValue(value)} cannot be rendered by field '${field.name}'`
      );
    }
    return value;
  }
}
