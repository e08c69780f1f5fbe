import { describe, it, expect } from 'vitest';
import {
  URLPathField,
  UsernameField,
  UsernameOrEmailField,
  validateUsername,
} from '../../src/fields/identity.js';

describe('validateUsername', () => {
  it('should accept lowercase letters and digits', () => {
    expect(validateUsername('ann42')).toEqual({ ok: true, value: 'ann42' });
  });

  it('should reject uppercase letters, suggesting the lowercase form', () => {
    expect(validateUsername('Ann')).toEqual({
      ok: false,
      message: { key: 'username-lower-error' },
      replacement: 'ann',
    });
  });

  it('should fold uppercase letters with autolower', () => {
    expect(validateUsername('Ann', true)).toEqual({ ok: true, value: 'ann' });
  });

  it('should reject other characters', () => {
    expect(validateUsername('ann_b')).toEqual({
      ok: false,
      message: { key: 'username-invalid' },
      replacement: 'ann_b',
    });
  });
});

describe('UsernameField', () => {
  it('should use the default label and bounds', () => {
    const field = new UsernameField('user');
    expect(field.label).toBe('Username');
    expect(field.minlen).toBe(3);
    expect(field.maxlen).toBe(16);
  });

  it('should strip and validate the name', () => {
    const field = new UsernameField('user');
    expect(field.parseValue('  carol  ')).toEqual({ ok: true, value: 'carol' });
    expect(field.parseValue('Carol')).toEqual({
      ok: false,
      message: { key: 'username-lower-error' },
      replacement: 'carol',
    });
  });

  it('should check the length first', () => {
    expect(new UsernameField('user').parseValue('ab')).toEqual({
      ok: false,
      message: { key: 'text-minlen' },
      replacement: 'ab',
    });
  });

  it('should lowercase with autolower', () => {
    expect(new UsernameField('user', { autolower: true }).parseValue('Carol')).toEqual({
      ok: true,
      value: 'carol',
    });
  });
});

describe('UsernameOrEmailField', () => {
  const field = new UsernameOrEmailField('login');

  it('should accept an email address', () => {
    expect(field.parseValue('carol@example.com')).toEqual({ ok: true, value: 'carol@example.com' });
  });

  it('should accept a username', () => {
    expect(field.parseValue('carol')).toEqual({ ok: true, value: 'carol' });
  });

  it('should apply the username rules without an @', () => {
    expect(field.parseValue('Carol')).toEqual({
      ok: false,
      message: { key: 'username-lower-error' },
      replacement: 'carol',
    });
  });

  it('should use the default label', () => {
    expect(field.label).toBe('Username or Email');
  });
});

describe('URLPathField', () => {
  it('should be hidden', () => {
    expect(new URLPathField('back').isHidden()).toBe(true);
  });

  it('should accept local paths and nothing', () => {
    const field = new URLPathField('back');
    expect(field.parseValue('/account/settings')).toEqual({ ok: true, value: '/account/settings' });
    expect(field.parseValue('')).toEqual({ ok: true, value: '' });
  });

  it('should reject other characters', () => {
    expect(new URLPathField('back').parseValue('/a b')).toEqual({
      ok: false,
      message: { key: 'url-path-invalid' },
      replacement: '/a?b',
    });
    expect(new URLPathField('back').parseValue('http://example.com').ok).toBe(false);
  });
});
