import { describe, it, expect } from 'vitest';
import { BodyNormalizer, FormDataNormalizer, blobToUpload } from '../../src/norms/web.js';
import { FormwrightError } from '../../src/core/errors.js';
import { FileUpload } from '../../src/core/values.js';

function textBlob(content: string): Blob {
  return new Blob([content], { type: 'text/plain' });
}

describe('blobToUpload', () => {
  it('should read the blob content lazily', async () => {
    const upload = blobToUpload(textBlob('hello'));
    expect(upload.size).toBe(5);
    expect(upload.contentType).toBe('text/plain');
    expect(upload.filename).toBeUndefined();
    expect((await upload.read()).toString('utf8')).toBe('hello');
  });
});

describe('FormDataNormalizer', () => {
  const normalizer = new FormDataNormalizer();

  it('should gather repeated names into lists', () => {
    expect(normalizer.normalize(new URLSearchParams('a=1&a=2&b=x'))).toEqual({ a: ['1', '2'], b: 'x' });
  });

  it('should keep empty values', () => {
    expect(normalizer.normalize(new URLSearchParams('a=&b=0'))).toEqual({ a: '', b: '0' });
  });

  it('should wrap files into uploads', async () => {
    const body = new FormData();
    body.append('title', 'Notes');
    body.append('doc', textBlob('hello'), 'hello.txt');

    const args = normalizer.normalize(body);
    expect(args.title).toBe('Notes');

    const upload = args.doc;
    expect(upload).toBeInstanceOf(FileUpload);
    if (upload instanceof FileUpload) {
      expect(upload.filename).toBe('hello.txt');
      expect((await upload.read()).toString('utf8')).toBe('hello');
    }
  });

  it('should refuse repeated files', () => {
    const body = new FormData();
    body.append('doc', textBlob('a'), 'a.txt');
    body.append('doc', textBlob('b'), 'b.txt');
    expect(() => normalizer.normalize(body)).toThrow("Several values including a file were sent for 'doc'");
  });

  it('should refuse a file mixed with text', () => {
    const entries: [string, string | Blob][] = [
      ['doc', 'text'],
      ['doc', textBlob('file')],
    ];
    expect(() => normalizer.normalize(entries)).toThrow(FormwrightError);
  });
});

describe('BodyNormalizer', () => {
  const normalizer = new BodyNormalizer();

  it('should keep lists and single values', () => {
    expect(normalizer.normalize({ tags: ['red', 'blue'], name: 'Ann' })).toEqual({
      tags: ['red', 'blue'],
      name: 'Ann',
    });
  });

  it('should unwrap single-item lists', () => {
    expect(normalizer.normalize({ name: ['Ann'] })).toEqual({ name: 'Ann' });
  });

  it('should wrap files into uploads', () => {
    const args = normalizer.normalize({ doc: textBlob('hello') });
    expect(args.doc).toBeInstanceOf(FileUpload);
  });

  it('should refuse several files under one name', () => {
    expect(() => normalizer.normalize({ doc: [textBlob('a'), textBlob('b')] })).toThrow(FormwrightError);
  });
});
