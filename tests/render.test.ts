import { describe, it, expect, vi } from 'vitest';
import { Form } from '../src/form.js';
import { FormRenderer, type ButtonSpec, type FormRendererOptions, type TableRow } from '../src/render.js';
import { RendererProtocolError, UnknownFieldError } from '../src/core/errors.js';
import type { Logger } from '../src/core/logger.js';
import type { AnyField } from '../src/field.js';
import { AgreeField, BoolField } from '../src/fields/bools.js';
import type { CheckboxesField, ListboxField, ListboxValue, MenuField, RadioField } from '../src/fields/choices.js';
import { URLPathField, type UsernameField, type UsernameOrEmailField } from '../src/fields/identity.js';
import { IntField, type FloatField } from '../src/fields/numeric.js';
import type { DateField, DateMenuField, JSDateField } from '../src/fields/temporal.js';
import {
  StringField,
  type EmailField,
  type PasswordField,
  type TextAreaField,
  type URLField,
} from '../src/fields/texts.js';
import type { FileUploadField, SetFileField } from '../src/fields/uploads.js';
import { MessageRegistry } from '../src/messages.js';

/**
 * Draws every input as `kind:name=<JSON value>`, which keeps expectations
 * readable.
 */
class TextRenderer extends FormRenderer<string> {
  protected join(fragments: readonly string[]): string {
    return fragments.join('');
  }

  protected doContainerOpen(form: Form): string {
    return `<form name="${form.name}">`;
  }

  protected doContainerClose(_form: Form): string {
    return '</form>';
  }

  protected doTable(rows: readonly TableRow<string>[]): string {
    return rows
      .map((row) => {
        const marker = row.required ? '*' : '';
        const error = row.error === null ? '' : ` !${row.error}`;
        return `[${row.label}${marker}: ${row.input}${error}]`;
      })
      .join('');
  }

  protected doSubmit(buttons: readonly ButtonSpec[], reset: string | null): string {
    const parts = buttons.map((button) => `<submit ${button.value ?? ''}:${button.label}>`);
    if (reset !== null) {
      parts.push(`<reset :${reset}>`);
    }
    return parts.join('');
  }

  private input(kind: string, field: AnyField, value: unknown): string {
    return `${kind}:${field.name}=${JSON.stringify(value)}`;
  }

  renderStringField(field: StringField, value: string | null): string {
    return this.input('string', field, value);
  }
  renderTextAreaField(field: TextAreaField, value: string | null): string {
    return this.input('textarea', field, value);
  }
  renderPasswordField(field: PasswordField, value: string | null): string {
    return this.input('password', field, value);
  }
  renderEmailField(field: EmailField, value: string | null): string {
    return this.input('email', field, value);
  }
  renderURLField(field: URLField, value: string | null): string {
    return this.input('url', field, value);
  }
  renderIntField(field: IntField, value: string | null): string {
    return this.input('int', field, value);
  }
  renderFloatField(field: FloatField, value: string | null): string {
    return this.input('float', field, value);
  }
  renderBoolField(field: BoolField, value: boolean | null): string {
    return this.input('bool', field, value);
  }
  renderAgreeField(field: AgreeField, value: boolean | null): string {
    return this.input('agree', field, value);
  }
  renderRadioField(field: RadioField, value: string | null): string {
    return this.input('radio', field, value);
  }
  renderMenuField(field: MenuField, value: string | null): string {
    return this.input('menu', field, value);
  }
  renderCheckboxesField(field: CheckboxesField, value: readonly string[] | null): string {
    return this.input('checkboxes', field, value);
  }
  renderListboxField(field: ListboxField, value: ListboxValue): string {
    return this.input('listbox', field, value);
  }
  renderDateField(field: DateField, value: string | null): string {
    return this.input('date', field, value);
  }
  renderJSDateField(field: JSDateField, value: string | null): string {
    return this.input('jsdate', field, value);
  }
  renderDateMenuField(field: DateMenuField, value: string | null): string {
    return this.input('datemenu', field, value);
  }
  renderFileUploadField(field: FileUploadField, value: string | null): string {
    return this.input('file', field, value);
  }
  renderSetFileField(field: SetFileField, value: string | null): string {
    return this.input('setfile', field, value);
  }
  renderUsernameField(field: UsernameField, value: string | null): string {
    return this.input('username', field, value);
  }
  renderUsernameOrEmailField(field: UsernameOrEmailField, value: string | null): string {
    return this.input('login', field, value);
  }
  renderURLPathField(field: URLPathField, value: string | null): string {
    return this.input('path', field, value);
  }
  renderHidden(field: AnyField, value: unknown): string {
    return `hidden:${field.name}=${JSON.stringify(value)}`;
  }
}

type SignupField = StringField<'name'> | IntField<'age'> | BoolField<'news'> | URLPathField<'back'>;

function signupForm(): Form<SignupField> {
  return new Form<SignupField>('signup', [
    new StringField('name', { label: 'Name', required: true }),
    new IntField('age', { label: 'Age' }),
    new BoolField('news', { label: 'Newsletter' }),
    new URLPathField('back'),
  ]);
}

function mockLogger(): Logger {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function renderer(options: FormRendererOptions = {}): TextRenderer {
  return new TextRenderer(signupForm(), { completionChecks: true, logger: mockLogger(), ...options });
}

const FILLED = { name: 'Ann', age: 30, news: false, back: '/home' };

describe('FormRenderer', () => {
  describe('render', () => {
    it('should draw the container, rows, hidden fields and buttons', () => {
      const output = renderer({ values: FILLED }).render();
      expect(output).toBe(
        '<form name="signup">' +
          '[Name*: string:name="Ann"][Age: int:age="30"][Newsletter: bool:news=false]' +
          'hidden:back="/home"' +
          '<submit :Submit>' +
          '</form>'
      );
    });

    it('should draw initial values for fields without data', () => {
      const form = new Form('f', [new StringField('city', { label: 'City', initial: 'Paris' })]);
      const output = new TextRenderer(form, { completionChecks: true }).renderTable();
      expect(output).toBe('[City: string:city="Paris"]');
    });

    it('should draw the selected fields only', () => {
      const output = renderer({ values: FILLED }).renderTable({ ignore: ['age', 'news'] });
      expect(output).toBe('[Name*: string:name="Ann"]hidden:back="/home"');
    });

    it('should draw several buttons and a reset button', () => {
      const form = new Form('edit', [], { submit: [['save', 'Save'], ['delete', 'Delete']], reset: true });
      const output = new TextRenderer(form, { completionChecks: true }).renderSubmit();
      expect(output).toBe('<submit save:Save><submit delete:Delete><reset :Reset>');
    });

    it('should translate labels and buttons', () => {
      const messages = new MessageRegistry({ translate: (text) => text.toUpperCase() });
      const instance = renderer({ values: FILLED, messages });
      expect(instance.renderTable({ only: ['name'] })).toBe('[NAME*: string:name="Ann"]');
      expect(instance.renderSubmit()).toBe('<submit :SUBMIT>');
    });

    it('should lay out rendered inputs with table()', () => {
      const instance = renderer();
      expect(instance.table([['Note', 'text']])).toBe('[Note: text]');
    });
  });

  describe('values and errors', () => {
    it('should draw error replacements and messages', () => {
      const output = renderer({
        values: { name: 'Ann', back: '/home' },
        errors: { age: { message: 'Value too small.', replacement: '12' } },
      }).renderTable();
      expect(output).toBe(
        '[Name*: string:name="Ann"][Age: int:age="12" !Value too small.][Newsletter: bool:news=false]' +
          'hidden:back="/home"'
      );
    });

    it('should draw errors without replacement from the values', () => {
      const output = renderer({
        values: FILLED,
        errors: { name: { message: 'Name is taken.', replacement: null } },
      }).renderField('name');
      expect(output).toBe('string:name="Ann"');
    });

    it('should draw user text a field could not parse as is', () => {
      expect(renderer({ values: { age: 'ten' } }).renderField('age')).toBe('int:age="ten"');
    });

    it('should refuse values the field cannot draw', () => {
      expect(() => renderer({ values: { news: 'yes' } }).renderField('news')).toThrow(
        "Form renderer for 'signup': value of type string cannot be rendered by field 'news'"
      );
    });

    it('should refuse unknown fields', () => {
      expect(() => renderer().renderField('email')).toThrow(UnknownFieldError);
    });

    it('should refuse hidden fields without a value', () => {
      expect(() => renderer().renderField('back')).toThrow(
        "Form renderer for 'signup': hidden field 'back' has no value"
      );
    });

    it('should refuse hidden fields with an error', () => {
      const instance = renderer({
        values: FILLED,
        errors: { back: { message: 'Invalid path.', replacement: null } },
      });
      expect(() => instance.renderField('back')).toThrow(RendererProtocolError);
    });
  });

  describe('displayText', () => {
    it('should display values, errors and unset fields', () => {
      const instance = renderer({
        values: { age: 30, news: true },
        errors: { name: { message: 'Missing value required.', replacement: null } },
      });
      expect(instance.displayText('name')).toBe('(Error)');
      expect(instance.displayText('age')).toBe('30');
      expect(instance.displayText('news')).toBe('Yes');
      expect(instance.displayText('back')).toBe('(Not set)');
    });

    it('should refuse values that are not data values', () => {
      expect(() => renderer({ values: { age: 'ten' } }).displayText('age')).toThrow(RendererProtocolError);
    });
  });

  describe('finish', () => {
    it('should pass once every field was rendered', () => {
      const instance = renderer({ values: FILLED });
      instance.render();
      expect(instance.pending()).toEqual([]);
      expect(() => instance.finish()).not.toThrow();
    });

    it('should count displayed fields as rendered', () => {
      const instance = renderer({ values: FILLED });
      instance.renderField('name');
      instance.displayText('age');
      expect(instance.pending()).toEqual(['news', 'back']);
    });

    it('should raise for missing fields with completion checks', () => {
      const instance = renderer({ values: FILLED });
      instance.renderField('name');
      expect(() => instance.finish()).toThrow("Form renderer for 'signup': fields not rendered: age, news, back");
    });

    it('should only warn for missing fields without completion checks', () => {
      const logger = mockLogger();
      const instance = renderer({ values: FILLED, completionChecks: false, logger });
      instance.renderField('name');
      instance.finish();
      expect(logger.warn).toHaveBeenCalledWith('form rendered without some of its fields', {
        form: 'signup',
        missing: ['age', 'news', 'back'],
      });
    });

    it('should refuse to finish twice', () => {
      const instance = renderer({ values: FILLED });
      instance.render();
      instance.finish();
      expect(() => instance.finish()).toThrow('finish() called twice');
    });
  });
});
