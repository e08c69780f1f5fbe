/**
 * Error classes for programming and protocol errors.
 *
 * None of these are ever produced by bad user input: invalid submissions are
 * reported through ParseResult values and the parser's error map. An instance
 * of one of these classes means the calling code (or a field implementation)
 * has a bug, so they are meant to propagate uncaught.
 */

import type { ZodIssue } from 'zod';

/**
 * Base class for misuse of the library API.
 */
export class FormwrightError extends Error {
  constructor(
    message: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'FormwrightError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * A field was declared with options that do not validate.
 */
export class FieldDefinitionError extends FormwrightError {
  constructor(
    fieldName: string,
    message: string,
    public readonly issues: readonly ZodIssue[] = []
  ) {
    super(`Invalid definition for field '${fieldName}': ${message}`, { fieldName });
    this.name = 'FieldDefinitionError';
  }
}

/**
 * A form was declared with invalid options, or with colliding fields.
 */
export class FormDefinitionError extends FormwrightError {
  constructor(
    formName: string,
    message: string,
    public readonly issues: readonly ZodIssue[] = []
  ) {
    super(`Invalid definition for form '${formName}': ${message}`, { formName });
    this.name = 'FormDefinitionError';
  }
}

/**
 * A field received a value that could not have come from a user: a raw type
 * outside its parse types, a choice outside its choice set, a malformed value
 * produced by client script, or a replacement value it cannot render.
 */
export class InternalFieldError extends FormwrightError {
  constructor(fieldName: string, message: string) {
    super(`Internal error in field '${fieldName}': ${message}`, { fieldName });
    this.name = 'InternalFieldError';
  }
}

export class UnknownFieldError extends FormwrightError {
  constructor(
    public readonly fieldName: string,
    formName: string
  ) {
    super(`Field '${fieldName}' is not present in form '${formName}'`, { fieldName, formName });
    this.name = 'UnknownFieldError';
  }
}

/**
 * The parse → validate → end protocol of a FormParser was not followed.
 */
export class ParserProtocolError extends FormwrightError {
  constructor(formName: string, message: string) {
    super(`Form parser for '${formName}': ${message}`, { formName });
    this.name = 'ParserProtocolError';
  }
}

export class RendererProtocolError extends FormwrightError {
  constructor(formName: string, message: string) {
    super(`Form renderer for '${formName}': ${message}`, { formName });
    this.name = 'RendererProtocolError';
  }
}

/**
 * File uploads carry no text to show in a read-only display.
 */
export class FileDisplayError extends FormwrightError {
  constructor(fieldName: string) {
    super(`Attempting to display the file upload of field '${fieldName}'`, { fieldName });
    this.name = 'FileDisplayError';
  }
}
