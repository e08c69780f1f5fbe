/**
 * Normalizers for web-standard request bodies: FormData, URLSearchParams and
 * the record bodies produced by body parsers such as Hono's
 * `parseBody({ all: true })`.
 */

import { FormwrightError } from '../core/errors.js';
import { FileUpload, type ArgValue, type NormalizedArgs } from '../core/values.js';
import type { Normalizer } from './normalizer.js';

/**
 * The part of the web `Blob`/`File` interface used to read uploads.
 */
export interface BlobLike {
  readonly size: number;
  readonly type?: string;
  readonly name?: string;
  arrayBuffer(): Promise<ArrayBuffer>;
}

export type WebEntryValue = string | BlobLike;

/** Anything iterating over `[name, value]` pairs, like FormData. */
export type WebEntries = Iterable<readonly [string, WebEntryValue]>;

/** A parsed body where repeated names are already gathered into arrays. */
export type WebBody = Readonly<Record<string, WebEntryValue | readonly WebEntryValue[]>>;

export function blobToUpload(blob: BlobLike): FileUpload {
  return new FileUpload(
    {
      read: async () => Buffer.from(await blob.arrayBuffer()),
      filename: blob.name,
      size: blob.size,
    },
    { contentType: blob.type || undefined }
  );
}

/**
 * Gathers repeated names into lists of strings. Files cannot be repeated
 * under one name.
 */
class ArgsBuilder {
  private readonly args: Record<string, ArgValue> = Object.create(null);

  add(name: string, value: WebEntryValue): void {
    const previous = this.args[name];
    if (typeof value !== 'string') {
      if (previous !== undefined) {
        throw new FormwrightError(`Several values including a file were sent for '${name}'`, { name });
      }
      this.args[name] = blobToUpload(value);
      return;
    }

    if (previous === undefined) {
      this.args[name] = value;
    } else if (typeof previous === 'string') {
      this.args[name] = [previous, value];
    } else if (Array.isArray(previous)) {
      this.args[name] = [...previous, value];
    } else {
      throw new FormwrightError(`Several values including a file were sent for '${name}'`, { name });
    }
  }

  build(): NormalizedArgs {
    return { ...this.args };
  }
}

/**
 * Normalizes FormData, URLSearchParams or any iterable of name/value pairs.
 */
export class FormDataNormalizer implements Normalizer<WebEntries> {
  normalize(raw: WebEntries): NormalizedArgs {
    const builder = new ArgsBuilder();
    for (const [name, value] of raw) {
      builder.add(name, value);
    }
    return builder.build();
  }
}

/**
 * Normalizes record bodies where repeated names map to arrays.
 */
export class BodyNormalizer implements Normalizer<WebBody> {
  normalize(raw: WebBody): NormalizedArgs {
    const builder = new ArgsBuilder();
    for (const [name, value] of Object.entries(raw)) {
      const values: readonly WebEntryValue[] = typeof value === 'string' || !isEntryList(value) ? [value] : value;
      for (const item of values) {
        builder.add(name, item);
      }
    }
    return builder.build();
  }
}

function isEntryList(value: WebEntryValue | readonly WebEntryValue[]): value is readonly WebEntryValue[] {
  return Array.isArray(value);
}
