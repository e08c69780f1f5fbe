import { describe, it, expect, vi } from 'vitest';
import { Form } from '../src/form.js';
import {
  FormDefinitionError,
  FormwrightError,
  InternalFieldError,
  UnknownFieldError,
} from '../src/core/errors.js';
import type { Logger } from '../src/core/logger.js';
import type { AnyField } from '../src/field.js';
import { BoolField } from '../src/fields/bools.js';
import { FileUploadField, SetFileField } from '../src/fields/uploads.js';
import { IntField } from '../src/fields/numeric.js';
import { JSDateField } from '../src/fields/temporal.js';
import { StringField } from '../src/fields/texts.js';
import { MessageRegistry } from '../src/messages.js';

function mockLogger(): Logger {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

type SignupField = StringField<'name'> | IntField<'age'> | BoolField<'news'>;

function signupForm(): Form<SignupField> {
  return new Form<SignupField>('signup', [
    new StringField('name', { label: 'Name', required: true }),
    [new IntField('age', { label: 'Age' }), new BoolField('news', { label: 'Newsletter' })],
  ]);
}

describe('Form', () => {
  describe('definition', () => {
    it('should flatten nested field lists in order', () => {
      const form = signupForm();
      expect(form.names()).toEqual(['name', 'age', 'news']);
      expect(form.labels()).toEqual(['Name', 'Age', 'Newsletter']);
      expect(form.labels(['news'])).toEqual(['Newsletter']);
    });

    it('should keep the order of fields given alone and in lists', () => {
      const form = new Form<AnyField>('f', [
        [new StringField('a'), new StringField('b')],
        new IntField('c'),
        [],
        [new BoolField('d')],
      ]);
      expect(form.names()).toEqual(['a', 'b', 'c', 'd']);
    });

    it('should default to a single POST submit button', () => {
      const form = signupForm();
      expect(form.method).toBe('POST');
      expect(form.submit).toEqual([{ value: null, label: 'Submit' }]);
      expect(form.hasMultipleSubmits()).toBe(false);
      expect(form.reset).toBeNull();
      expect(form.enctype).toBeUndefined();
    });

    it('should take several submit buttons and a reset button', () => {
      const form = new Form('edit', [], { submit: [['save', 'Save'], 'delete'], reset: true });
      expect(form.submit).toEqual([
        { value: 'save', label: 'Save' },
        { value: 'delete', label: 'delete' },
      ]);
      expect(form.hasMultipleSubmits()).toBe(true);
      expect(form.reset).toBe('Reset');
    });

    it('should refuse duplicate field names', () => {
      expect(() => new Form('f', [new StringField('a'), new IntField('a')])).toThrow(
        "Invalid definition for form 'f': field name 'a' is already used"
      );
    });

    it('should refuse colliding variable names', () => {
      expect(() => new Form('f', [new StringField('doc_reset'), new SetFileField('doc')])).toThrow(
        FormDefinitionError
      );
    });

    it('should refuse fields named like a submit button', () => {
      expect(() => new Form('f', [new StringField('save')], { submit: ['save', 'cancel'] })).toThrow(
        FormDefinitionError
      );
    });

    it('should refuse duplicate submit values', () => {
      expect(() => new Form('f', [], { submit: ['save', ['save', 'Save again']] })).toThrow(
        "Invalid definition for form 'f': duplicate submit value 'save'"
      );
    });

    it('should refuse unknown charsets', () => {
      expect(() => new Form('f', [], { acceptCharset: 'no-such-charset' })).toThrow(FormDefinitionError);
    });

    it('should switch to multipart for uploads', () => {
      const form = new Form('f', [new FileUploadField('photo')]);
      expect(form.enctype).toBe('multipart/form-data');
    });

    it('should warn when overriding an explicit enctype', () => {
      const logger = mockLogger();
      const form = new Form<AnyField>('f', [], { enctype: 'application/x-www-form-urlencoded', logger });
      form.addField(new FileUploadField('photo'));

      expect(form.enctype).toBe('multipart/form-data');
      expect(logger.warn).toHaveBeenCalledWith('overriding form enctype for a file upload field', {
        form: 'f',
        field: 'photo',
        enctype: 'application/x-www-form-urlencoded',
      });
    });

    it('should list variables of multi-variable fields', () => {
      const form = new Form('f', [new StringField('title'), new SetFileField('doc')]);
      expect(form.varnames()).toEqual(['title', 'doc', 'doc_reset']);
    });

    it('should collect client scripts once', () => {
      const form = new Form('f', [new JSDateField('start'), new JSDateField('end')]);
      expect(Object.keys(form.getScripts())).toEqual(['calendarDateInput.js']);
    });
  });

  describe('field lookup', () => {
    it('should find fields by name', () => {
      const form = signupForm();
      expect(form.getField('age').name).toBe('age');
      expect(form.hasField('age')).toBe(true);
      expect(form.hasField('email')).toBe(false);
    });

    it('should raise for unknown names', () => {
      expect(() => signupForm().getField('email')).toThrow(UnknownFieldError);
      expect(() => signupForm().getField('email')).toThrow("Field 'email' is not present in form 'signup'");
    });

    it('should select fields by only and ignore', () => {
      const form = signupForm();
      expect(form.selectFields(['news', 'name']).map((field) => field.name)).toEqual(['news', 'name']);
      expect(form.selectFields(undefined, ['age']).map((field) => field.name)).toEqual(['name', 'news']);
      expect(() => form.selectFields(undefined, ['email'])).toThrow(UnknownFieldError);
    });

    it('should fetch properties named like its fields', () => {
      const record = { name: 'Ann', age: 30, news: true, id: 7 };
      expect(signupForm().fetchNames(record, ['news'])).toEqual({ name: 'Ann', age: 30 });
    });
  });

  describe('parseField', () => {
    it('should parse a valid argument', () => {
      const form = signupForm();
      expect(form.parseField(form.getField('age'), { age: '30' })).toEqual({ ok: true, value: 30 });
    });

    it('should resolve messages of failures', () => {
      const form = signupForm();
      expect(form.parseField(form.getField('age'), { age: 'ten' })).toEqual({
        ok: false,
        message: "Invalid number: 'ten'.",
        replacement: 'ten',
      });
    });

    it('should resolve messages with the given registry', () => {
      const form = signupForm();
      const messages = new MessageRegistry({ overrides: { 'error-required-value': 'Required.' } });
      expect(form.parseField(form.getField('name'), {}, messages)).toEqual({
        ok: false,
        message: 'Required.',
        replacement: null,
      });
    });

    it('should decode byte arguments', () => {
      const form = signupForm();
      expect(form.parseField(form.getField('name'), { name: Buffer.from('Zoë') })).toEqual({
        ok: true,
        value: 'Zoë',
      });
    });

    it('should decode with the form charset', () => {
      const form = new Form('f', [new StringField('name')], { acceptCharset: 'latin1' });
      expect(form.parseField(form.getField('name'), { name: Buffer.from([0x5a, 0x6f, 0xeb]) })).toEqual({
        ok: true,
        value: 'Zoë',
      });
    });

    it('should report bytes invalid in the charset', () => {
      const form = signupForm();
      expect(form.parseField(form.getField('name'), { name: Buffer.from([0xff, 0xfe]) })).toEqual({
        ok: false,
        message: 'Browser error: Invalid chars in expected encoding.',
        replacement: null,
      });
    });

    it('should keep bytes for upload fields', () => {
      const form = new Form('f', [new FileUploadField('photo')]);
      const outcome = form.parseField(form.getField('photo'), { photo: Buffer.from([0xff]) });
      expect(outcome.ok).toBe(true);
    });

    it('should hand a record to multi-variable fields', () => {
      const form = new Form('f', [new SetFileField('doc')]);
      expect(form.parseField(form.getField('doc'), { doc_reset: 'on' })).toEqual({ ok: true, value: false });
    });

    it('should raise for raw values a field does not take', () => {
      const form = signupForm();
      expect(() => form.parseField(form.getField('name'), { name: ['a', 'b'] })).toThrow(InternalFieldError);
    });
  });

  describe('parseSubmit', () => {
    const form = new Form('edit', [], { submit: [['save', 'Save'], ['delete', 'Delete']] });

    it('should tell which button was pressed', () => {
      expect(form.parseSubmit({ delete: 'Delete' })).toBe('delete');
      expect(form.parseSubmit({})).toBeNull();
    });

    it('should ignore button variables on single-button forms', () => {
      expect(signupForm().parseSubmit({ save: 'Save' })).toBeNull();
    });

    it('should refuse several pressed buttons', () => {
      expect(() => form.parseSubmit({ save: 'Save', delete: 'Delete' })).toThrow(FormwrightError);
    });
  });
});
