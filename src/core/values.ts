/**
 * Value domains shared by fields, forms and normalizers.
 *
 * Every field declares three sets of value kinds:
 * - data: what parsing produces for the application,
 * - parse: what a normalized submission may hand to the field,
 * - render: what a renderer must be able to draw.
 *
 * The kinds are checked at the Form boundary so that a field never sees a raw
 * value it did not declare, and never returns one it did not promise.
 */

/**
 * Anything exposing a `read` operation can stand for an uploaded file.
 */
export interface UploadSource {
  read(): Buffer | Promise<Buffer>;
  readonly filename?: string;
  readonly size?: number;
}

/**
 * Caller-owned handle over an uploaded file. The library wraps sources but
 * never buffers or closes them.
 */
export class FileUpload implements UploadSource {
  readonly filename?: string;
  readonly size?: number;
  readonly contentType?: string;

  constructor(
    private readonly source: UploadSource,
    options: { filename?: string; size?: number; contentType?: string } = {}
  ) {
    this.filename = options.filename ?? source.filename;
    this.size = options.size ?? source.size;
    this.contentType = options.contentType;
  }

  /**
   * Wrap in-memory content into a virtual file.
   */
  static fromBuffer(content: Buffer, filename?: string): FileUpload {
    return new FileUpload({ read: () => content }, { filename, size: content.length });
  }

  async read(): Promise<Buffer> {
    return this.source.read();
  }
}

/** A single submitted argument, as produced by a normalizer. */
export type ArgValue = string | Buffer | readonly (string | Buffer)[] | UploadSource;

/**
 * Generic submission shape: variable name → raw value. Missing variables may
 * be absent, `undefined` or `null`.
 */
export type NormalizedArgs = Readonly<Record<string, ArgValue | null | undefined>>;

/** A decoded value for one variable, as handed to a field. */
export type ScalarParseValue = string | readonly string[] | UploadSource | Buffer | null;

/**
 * What a field's parseValue receives: a scalar for single-variable fields, or
 * a varname → value record for fields consuming several variables.
 */
export type ParseValue = ScalarParseValue | Readonly<Record<string, ScalarParseValue>>;

export type ValueKind =
  | 'null'
  | 'string'
  | 'list'
  | 'boolean'
  | 'integer'
  | 'number'
  | 'date'
  | 'upload'
  | 'bytes'
  | 'record';

export interface FieldTypes {
  readonly data: readonly ValueKind[];
  readonly parse: readonly ValueKind[];
  readonly render: readonly ValueKind[];
}

export function isUploadSource(value: unknown): value is UploadSource {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Buffer.isBuffer(value) &&
    'read' in value &&
    typeof value.read === 'function'
  );
}

export function isStringList(value: unknown): value is readonly string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function isPlainRecord(value: unknown): value is Readonly<Record<string, unknown>> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    !Buffer.isBuffer(value) &&
    !(value instanceof Date) &&
    !isUploadSource(value)
  );
}

/**
 * Whether a parse value is the varname → value record of a multi-variable
 * field.
 */
export function isParseRecord(
  value: ParseValue
): value is Readonly<Record<string, ScalarParseValue>> {
  return isPlainRecord(value);
}

const KIND_CHECKS: Record<ValueKind, (value: unknown) => boolean> = {
  null: (value) => value === null,
  string: (value) => typeof value === 'string',
  list: isStringList,
  boolean: (value) => typeof value === 'boolean',
  integer: (value) => typeof value === 'number' && Number.isInteger(value),
  number: (value) => typeof value === 'number' && Number.isFinite(value),
  date: (value) => value instanceof Date && !Number.isNaN(value.getTime()),
  upload: isUploadSource,
  bytes: (value) => Buffer.isBuffer(value),
  record: isPlainRecord,
};

/**
 * Check a value against a set of declared kinds.
 */
export function matchesKinds(value: unknown, kinds: readonly ValueKind[]): boolean {
  return kinds.some((kind) => KIND_CHECKS[kind](value));
}

/**
 * Short description of a value for internal error messages.
 */
export function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (value === undefined) return 'undefined';
  if (Array.isArray(value)) return 'array';
  if (Buffer.isBuffer(value)) return 'Buffer';
  if (value instanceof Date) return 'Date';
  return typeof value;
}

function isArgValue(value: unknown): boolean {
  if (value === null || value === undefined || typeof value === 'string' || Buffer.isBuffer(value)) {
    return true;
  }
  if (Array.isArray(value)) {
    return value.every((item) => typeof item === 'string' || Buffer.isBuffer(item));
  }
  return isUploadSource(value);
}

/**
 * Whether a value already has the normalized submission shape.
 */
export function isNormalizedArgs(value: unknown): value is NormalizedArgs {
  if (!isPlainRecord(value)) {
    return false;
  }
  // FormData, URLSearchParams and the like need a normalizer
  const prototype: unknown = Object.getPrototypeOf(value);
  if (prototype !== Object.prototype && prototype !== null) {
    return false;
  }
  return Object.values(value).every(isArgValue);
}
