/**
 * formwright: server-side form definition, parsing and validation.
 */

export {
  FormwrightError,
  FieldDefinitionError,
  FormDefinitionError,
  InternalFieldError,
  UnknownFieldError,
  ParserProtocolError,
  RendererProtocolError,
  FileDisplayError,
} from './core/errors.js';
export { loadConfig, LogLevelSchema, type FormwrightConfig, type LogLevel } from './core/config.js';
export { createConsoleLogger, defaultLogger, type Logger } from './core/logger.js';
export {
  FileUpload,
  isUploadSource,
  isNormalizedArgs,
  type UploadSource,
  type ArgValue,
  type NormalizedArgs,
  type ParseValue,
  type ScalarParseValue,
  type ValueKind,
  type FieldTypes,
} from './core/values.js';

export {
  DEFAULT_MESSAGES,
  MessageRegistry,
  defaultMessages,
  type MessageKey,
  type MessageRef,
  type MessageRegistryOptions,
  type Translator,
} from './messages.js';

export {
  Field,
  accept,
  reject,
  FIELD_NAME_PATTERN,
  type AnyField,
  type BaseFieldOptions,
  type DataOf,
  type RenderOf,
  type FieldCapabilities,
  type FieldState,
  type Orientation,
  type ParseResult,
  type ParseSuccess,
  type ParseFailure,
} from './field.js';
export * from './fields/index.js';

export {
  Form,
  type FormOptions,
  type FormMethod,
  type FormValues,
  type FieldName,
  type FieldOutcome,
  type SubmitButton,
  type SubmitEntry,
} from './form.js';
export {
  FormParser,
  withFormParser,
  parseForm,
  STATUS_ERROR,
  STATUS_INVALID_INPUT,
  STATUS_MANY,
  type ErrorReport,
  type FieldErrorEntry,
  type FieldErrorInput,
  type FieldSelection,
  type FormParserOptions,
  type ParseOutcome,
  type RedirectHandler,
  type RedirectRequest,
} from './parser.js';

export type { FieldRenderer } from './render-contract.js';
export {
  FormRenderer,
  type ButtonSpec,
  type FormRendererOptions,
  type TableRow,
} from './render.js';

export type { Normalizer } from './norms/normalizer.js';
export {
  BodyNormalizer,
  FormDataNormalizer,
  blobToUpload,
  type BlobLike,
  type WebBody,
  type WebEntries,
  type WebEntryValue,
} from './norms/web.js';
