import { describe, it, expect } from 'vitest';
import { DEFAULT_MESSAGES, MessageRegistry, defaultMessages } from '../../src/messages.js';

describe('MessageRegistry', () => {
  it('should return the built-in templates', () => {
    expect(defaultMessages.get('generic-ui-message')).toBe('Please fix errors below.');
    expect(defaultMessages.raw('submit-button')).toBe(DEFAULT_MESSAGES['submit-button']);
  });

  it('should fill placeholders in order', () => {
    expect(defaultMessages.format('numerical-invalid', 'ten')).toBe("Invalid number: 'ten'.");
    expect(defaultMessages.format('numerical-minval', 18)).toBe("Value too small.  Minimum value is '18'.");
  });

  it('should leave placeholders without arguments alone', () => {
    expect(defaultMessages.format('date-invalid')).toBe("Invalid date: '%s'.");
  });

  it('should resolve references and literal texts', () => {
    expect(defaultMessages.resolve({ key: 'date-invalid', args: ['2005-02-30'] })).toBe(
      "Invalid date: '2005-02-30'."
    );
    expect(defaultMessages.resolve({ key: 'text-minlen' })).toBe('String too short.');
    expect(defaultMessages.resolve('Passwords do not match.')).toBe('Passwords do not match.');
  });

  it('should take overrides', () => {
    const messages = new MessageRegistry({ overrides: { 'submit-button': 'Send' } });
    expect(messages.get('submit-button')).toBe('Send');
    expect(messages.get('reset-button')).toBe('Reset');
  });

  it('should translate templates before filling them', () => {
    const french: Record<string, string> = { "Invalid date: '%s'.": "Date invalide : '%s'." };
    const messages = new MessageRegistry({ translate: (text) => french[text] ?? text });
    expect(messages.format('date-invalid', '2005-02-30')).toBe("Date invalide : '2005-02-30'.");
    expect(messages.raw('date-invalid')).toBe("Invalid date: '%s'.");
    expect(messages.translate('Name')).toBe('Name');
  });
});
