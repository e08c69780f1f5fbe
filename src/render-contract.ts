/**
 * Per-field-kind rendering entry points.
 *
 * Each concrete field class hands itself to exactly one of these methods from
 * its `renderWith()`, so a renderer that implements this interface covers every
 * kind the library ships. `value` is already a valid render value for the
 * field, or null when nothing is set; `error` is resolved message text.
 */

import type { AnyField } from './field.js';
import type { AgreeField, BoolField } from './fields/bools.js';
import type { CheckboxesField, ListboxField, MenuField, RadioField } from './fields/choices.js';
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
type Selection = string | readonly string[] | null;

export interface FieldRenderer<TOut> {
  renderStringField(field: StringField, value: Scalar, error: string | null, required: boolean): TOut;
  renderTextAreaField(field: TextAreaField, value: Scalar, error: string | null, required: boolean): TOut;
  renderPasswordField(field: PasswordField, value: Scalar, error: string | null, required: boolean): TOut;
  renderEmailField(field: EmailField, value: Scalar, error: string | null, required: boolean): TOut;
  renderURLField(field: URLField, value: Scalar, error: string | null, required: boolean): TOut;

  renderIntField(field: IntField, value: Scalar, error: string | null, required: boolean): TOut;
  renderFloatField(field: FloatField, value: Scalar, error: string | null, required: boolean): TOut;

  renderBoolField(field: BoolField, value: boolean | null, error: string | null, required: boolean): TOut;
  renderAgreeField(field: AgreeField, value: boolean | null, error: string | null, required: boolean): TOut;

  renderRadioField(field: RadioField, value: Scalar, error: string | null, required: boolean): TOut;
  renderMenuField(field: MenuField, value: Scalar, error: string | null, required: boolean): TOut;
  renderCheckboxesField(
    field: CheckboxesField,
    value: readonly string[] | null,
    error: string | null,
    required: boolean
  ): TOut;
  renderListboxField(field: ListboxField, value: Selection, error: string | null, required: boolean): TOut;

  renderDateField(field: DateField, value: Scalar, error: string | null, required: boolean): TOut;
  renderJSDateField(field: JSDateField, value: Scalar, error: string | null, required: boolean): TOut;
  renderDateMenuField(field: DateMenuField, value: Scalar, error: string | null, required: boolean): TOut;

  renderFileUploadField(field: FileUploadField, value: Scalar, error: string | null, required: boolean): TOut;
  renderSetFileField(field: SetFileField, value: Scalar, error: string | null, required: boolean): TOut;

  renderUsernameField(field: UsernameField, value: Scalar, error: string | null, required: boolean): TOut;
  renderUsernameOrEmailField(
    field: UsernameOrEmailField,
    value: Scalar,
    error: string | null,
    required: boolean
  ): TOut;
  renderURLPathField(field: URLPathField, value: Scalar, error: string | null, required: boolean): TOut;

  /**
   * Render any field as a hidden input carrying its render value.
   */
  renderHidden(field: AnyField, value: unknown): TOut;
}
