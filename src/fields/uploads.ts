/**
 * File upload fields.
 *
 * Parsed uploads are FileUpload handles over whatever the normalizer
 * produced. The handles stay owned by the caller: nothing here reads them,
 * and the parser leaves them out of the values it hands back for
 * redisplay.
 */

import { z } from 'zod';
import { FileDisplayError } from '../core/errors.js';
import {
  FileUpload,
  isParseRecord,
  isUploadSource,
  type FieldTypes,
  type ParseValue,
} from '../core/values.js';
import {
  Field,
  FieldStateSchema,
  NO_CAPABILITIES,
  accept,
  reject,
  validateOptions,
  type FieldCapabilities,
  type FieldState,
  type ParseResult,
  type RequiredOption,
} from '../field.js';
import { DEFAULT_MESSAGES, type MessageRegistry } from '../messages.js';
import type { FieldRenderer } from '../render-contract.js';

const UPLOAD_CAPABILITIES: FieldCapabilities = {
  ...NO_CAPABILITIES,
  optRequired: true,
  upload: true,
};

export const FileUploadFieldOptionsSchema = z
  .object({
    label: z.string().optional(),
    state: FieldStateSchema.optional(),
    required: z.boolean().optional(),
    accept: z.string().optional(),
  })
  .strict();

export interface FileUploadFieldOptions extends RequiredOption {
  label?: string;
  state?: FieldState;
  /** File type filter for the browser dialog, e.g. `image/*` */
  accept?: string;
}

/**
 * Wrap a submitted file into an upload handle. Empty content counts as
 * nothing submitted.
 */
export function toFileUpload(raw: ParseValue): FileUpload | null | undefined {
  if (raw === null) {
    return null;
  }
  if (typeof raw === 'string') {
    return raw === '' ? null : FileUpload.fromBuffer(Buffer.from(raw, 'utf8'));
  }
  if (Buffer.isBuffer(raw)) {
    return raw.length === 0 ? null : FileUpload.fromBuffer(raw);
  }
  if (isUploadSource(raw)) {
    const upload = raw instanceof FileUpload ? raw : new FileUpload(raw);
    return upload.size === 0 ? null : upload;
  }
  return undefined;
}

export abstract class UploadField<TData, TName extends string> extends Field<TData, string, TName> {
  readonly accept: string | undefined;

  protected constructor(
    name: TName,
    options: FileUploadFieldOptions,
    types: FieldTypes,
    extraVarnames: readonly string[] = []
  ) {
    const validated = validateOptions(name, FileUploadFieldOptionsSchema, options);
    super(
      name,
      { label: validated.label, state: validated.state, required: validated.required },
      types,
      UPLOAD_CAPABILITIES,
      extraVarnames
    );
    this.accept = validated.accept;
  }

  /**
   * The required check runs on the wrapped upload, since an empty file is
   * as good as none.
   */
  protected parseUpload(raw: ParseValue): ParseResult<FileUpload | null, string> {
    const upload = toFileUpload(raw);
    if (upload === undefined) {
      return this.unexpected(raw);
    }
    if (this.required && upload === null) {
      return reject('error-required-value');
    }
    return accept(upload);
  }

  /** Browsers ignore preset file names, so nothing is ever rendered. */
  renderValue(_value: TData | null): string {
    return '';
  }

  displayValue(value: TData | null, _messages: MessageRegistry): string {
    if (isUploadSource(value)) {
      throw new FileDisplayError(this.name);
    }
    return '';
  }
}

/**
 * A file sent by the client.
 */
export class FileUploadField<TName extends string = string> extends UploadField<
  FileUpload | null,
  TName
> {
  constructor(name: TName, options: FileUploadFieldOptions = {}) {
    super(name, options, {
      data: ['null', 'upload'],
      parse: ['null', 'string', 'bytes', 'upload'],
      render: ['string'],
    });
  }

  parseValue(raw: ParseValue): ParseResult<FileUpload | null, string> {
    return this.parseUpload(raw);
  }

  renderWith<TOut>(
    renderer: FieldRenderer<TOut>,
    value: string | null,
    error: string | null,
    required: boolean
  ): TOut {
    return renderer.renderFileUploadField(this, value, error, required);
  }
}

/** Suffix of the variable carrying the "remove" checkbox. */
export const RESET_SUFFIX = '_reset';

export const SetFileFieldOptionsSchema = FileUploadFieldOptionsSchema.extend({
  remlabel: z.string().optional(),
}).strict();

export interface SetFileFieldOptions extends FileUploadFieldOptions {
  /** Untranslated label of the "remove" checkbox */
  remlabel?: string;
}

/**
 * A file upload with a "remove" checkbox, for replacing or deleting a file
 * stored on the server.
 *
 * Parses to a new upload, `false` when removal was requested (which wins
 * over an upload sent at the same time), or null when neither happened.
 */
export class SetFileField<TName extends string = string> extends UploadField<
  FileUpload | false | null,
  TName
> {
  readonly remlabel: string;

  constructor(name: TName, options: SetFileFieldOptions = {}) {
    const { remlabel, ...rest } = validateOptions(name, SetFileFieldOptionsSchema, options);
    super(
      name,
      rest,
      {
        data: ['null', 'upload', 'boolean'],
        parse: ['record'],
        render: ['string'],
      },
      [`${name}${RESET_SUFFIX}`]
    );
    this.remlabel = remlabel ?? DEFAULT_MESSAGES['setfile-reset'];
  }

  get resetVarname(): string {
    return `${this.name}${RESET_SUFFIX}`;
  }

  parseValue(raw: ParseValue): ParseResult<FileUpload | false | null, string> {
    if (!isParseRecord(raw)) {
      return this.unexpected(raw);
    }

    const reset = raw[this.resetVarname] ?? null;
    if (reset !== null && typeof reset !== 'string') {
      return this.unexpected(reset);
    }
    if (reset !== null && reset !== '') {
      return accept(false);
    }

    return this.parseUpload(raw[this.name] ?? null);
  }

  renderWith<TOut>(
    renderer: FieldRenderer<TOut>,
    value: string | null,
    error: string | null,
    required: boolean
  ): TOut {
    return renderer.renderSetFileField(this, value, error, required);
  }
}
