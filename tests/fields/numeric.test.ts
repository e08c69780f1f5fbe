import { describe, it, expect } from 'vitest';
import { FloatField, IntField, formatNumber } from '../../src/fields/numeric.js';
import { FieldDefinitionError } from '../../src/core/errors.js';
import { defaultMessages } from '../../src/messages.js';

describe('formatNumber', () => {
  it('should format integers', () => {
    expect(formatNumber('%d', 42.9)).toBe('42');
    expect(formatNumber('%05d', 42)).toBe('00042');
    expect(formatNumber('%+d', 7)).toBe('+7');
    expect(formatNumber('[%-5d]', 42)).toBe('[42   ]');
    expect(formatNumber('[%4i]', -3)).toBe('[  -3]');
  });

  it('should format fixed-point numbers', () => {
    expect(formatNumber('%.2f', 3.14159)).toBe('3.14');
    expect(formatNumber('%f', 1.5)).toBe('1.500000');
    expect(formatNumber('%6.2f', -2.5)).toBe(' -2.50');
  });

  it('should pad exponents to two digits', () => {
    expect(formatNumber('%e', 12345.678)).toBe('1.234568e+04');
    expect(formatNumber('%.1E', 0.5)).toBe('5.0E-01');
  });

  it('should drop trailing zeros in general format', () => {
    expect(formatNumber('%g', 0.0001234)).toBe('0.0001234');
    expect(formatNumber('%g', 2.5)).toBe('2.5');
  });

  it('should keep surrounding text and literal percent signs', () => {
    expect(formatNumber('%d%% done', 80)).toBe('80% done');
    expect(formatNumber('EUR %s', 12)).toBe('EUR 12');
  });
});

describe('IntField', () => {
  it('should parse integers', () => {
    const field = new IntField('age');
    expect(field.parseValue('42')).toEqual({ ok: true, value: 42 });
    expect(field.parseValue(' -7 ')).toEqual({ ok: true, value: -7 });
  });

  it('should parse nothing sent as null', () => {
    const field = new IntField('age');
    expect(field.parseValue(null)).toEqual({ ok: true, value: null });
    expect(field.parseValue('  ')).toEqual({ ok: true, value: null });
  });

  it('should reject a missing value when required', () => {
    const field = new IntField('age', { required: true });
    expect(field.parseValue('')).toEqual({
      ok: false,
      message: { key: 'error-required-value' },
      replacement: null,
    });
  });

  it('should reject non-integers with the submitted text', () => {
    const field = new IntField('age');
    expect(field.parseValue('1.5')).toEqual({
      ok: false,
      message: { key: 'numerical-invalid', args: ['1.5'] },
      replacement: '1.5',
    });
    expect(field.parseValue('ten')).toEqual({
      ok: false,
      message: { key: 'numerical-invalid', args: ['ten'] },
      replacement: 'ten',
    });
  });

  it('should reject integers beyond the safe range', () => {
    const result = new IntField('big').parseValue('99999999999999999999');
    expect(result.ok).toBe(false);
  });

  it('should report the bound in its rendered form', () => {
    const field = new IntField('age', { minval: 18, maxval: 120 });
    const tooSmall = field.parseValue('12');
    expect(tooSmall).toEqual({
      ok: false,
      message: { key: 'numerical-minval', args: ['18'] },
      replacement: '12',
    });
    expect(field.parseValue('121')).toEqual({
      ok: false,
      message: { key: 'numerical-maxval', args: ['120'] },
      replacement: '121',
    });

    if (!tooSmall.ok) {
      expect(defaultMessages.resolve(tooSmall.message)).toBe("Value too small.  Minimum value is '18'.");
    }
  });

  it('should render with its format', () => {
    const field = new IntField('number', { format: '%03d' });
    expect(field.renderValue(7)).toBe('007');
    expect(field.renderValue(null)).toBe('');
    expect(field.displayValue(7, defaultMessages)).toBe('007');
  });

  it('should refuse an initial value that is not an integer', () => {
    expect(() => new IntField('age', { initial: 1.5 })).toThrow(FieldDefinitionError);
  });

  it('should refuse inconsistent bounds', () => {
    expect(() => new IntField('age', { minval: 10, maxval: 5 })).toThrow(
      "Invalid definition for field 'age': minval 10 exceeds maxval 5"
    );
  });

  it('should refuse a format without a directive', () => {
    expect(() => new IntField('age', { format: 'years' })).toThrow(FieldDefinitionError);
  });
});

describe('FloatField', () => {
  it('should parse decimal and exponent notation', () => {
    const field = new FloatField('ratio');
    expect(field.parseValue('0.25')).toEqual({ ok: true, value: 0.25 });
    expect(field.parseValue('.5')).toEqual({ ok: true, value: 0.5 });
    expect(field.parseValue('1e3')).toEqual({ ok: true, value: 1000 });
  });

  it('should reject words that Number() would accept', () => {
    const field = new FloatField('ratio');
    expect(field.parseValue('Infinity').ok).toBe(false);
    expect(field.parseValue('0x10').ok).toBe(false);
  });

  it('should format the bound and the replacement', () => {
    const field = new FloatField('price', { maxval: 1.5, format: '%.2f' });
    expect(field.parseValue('2')).toEqual({
      ok: false,
      message: { key: 'numerical-maxval', args: ['1.50'] },
      replacement: '2.00',
    });
  });
});
