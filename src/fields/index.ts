export {
  TextEncodingSchema,
  TextField,
  StringField,
  TextAreaField,
  PasswordField,
  PASSWORD_MASK,
  EmailField,
  URLField,
  extractAddress,
  type TextEncoding,
  type TextFieldOptions,
  type StringFieldOptions,
  type TextAreaFieldOptions,
  type PasswordFieldOptions,
  type EmailFieldOptions,
  type URLFieldOptions,
} from './texts.js';

export {
  NumericField,
  IntField,
  FloatField,
  formatNumber,
  type NumericFieldOptions,
} from './numeric.js';

export {
  BoolField,
  AgreeField,
  type BoolFieldOptions,
  type AgreeFieldOptions,
} from './bools.js';

export {
  ChoiceField,
  OneChoiceField,
  RadioField,
  MenuField,
  CheckboxesField,
  ListboxField,
  normalizeChoices,
  type Choice,
  type ChoiceInput,
  type ChoiceFieldOptions,
  type OneChoiceFieldOptions,
  type RadioFieldOptions,
  type CheckboxesFieldOptions,
  type ListboxFieldOptions,
  type ListboxValue,
} from './choices.js';

export {
  DateField,
  JSDateField,
  DateMenuField,
  ANY_DATE,
  CALENDAR_SCRIPT,
  displayDate,
  makeDate,
  monthFromName,
  toIsoDate,
  type DateFieldOptions,
  type JSDateFieldOptions,
  type DateMenuFieldOptions,
} from './temporal.js';

export {
  UploadField,
  FileUploadField,
  SetFileField,
  RESET_SUFFIX,
  toFileUpload,
  type FileUploadFieldOptions,
  type SetFileFieldOptions,
} from './uploads.js';

export {
  UsernameField,
  UsernameOrEmailField,
  URLPathField,
  validateUsername,
  type UsernameFieldOptions,
  type UsernameOrEmailFieldOptions,
  type URLPathFieldOptions,
} from './identity.js';
