/**
 * Message registry.
 *
 * All human-readable strings the library can produce live here, keyed by a
 * symbolic identifier. Fields only ever refer to keys; the registry handed to
 * the parser or renderer turns them into text, so an application can replace
 * templates or plug in its own translation function.
 */

export const DEFAULT_MESSAGES = {
  // Buttons
  'submit-button': 'Submit',
  'reset-button': 'Reset',

  // Form-level parsing
  'error-invalid-encoding': 'Browser error: Invalid chars in expected encoding.',
  'error-required-value': 'Missing value required.',
  'generic-ui-message': 'Please fix errors below.',
  'generic-value-error': 'Invalid value.',

  // Display renderers
  'display-error': '(Error)',
  'display-unset': '(Not set)',
  'display-true': 'Yes',
  'display-false': 'No',

  // Texts
  'text-invalid-chars': 'Invalid characters in string.',
  'text-minlen': 'String too short.',
  'text-maxlen': 'String too long.',
  'email-invalid': 'Invalid email address.',
  'email-error-local': 'Please specify a full email address.',
  'url-invalid': 'Invalid URL.',
  'url-path-invalid': 'Invalid URL Path.',

  // Numbers
  'numerical-invalid': "Invalid number: '%s'.",
  'numerical-minval': "Value too small.  Minimum value is '%s'.",
  'numerical-maxval': "Value too large.  Maximum value is '%s'.",

  // Choices
  'one-choice-required': 'Please select at least one of the choices.',

  // Dates
  'date-invalid-format': "Invalid format for date: '%s'. Use YYYY-MM-DD format.",
  'date-invalid-month': "Invalid month name for date: '%s'.",
  'date-invalid': "Invalid date: '%s'.",
  'date-any': 'Any date',

  // Uploads
  'setfile-reset': 'Remove',

  // Agreement
  'agree-required': 'Please indicate agreement.',
  'agree-display': 'Agreed.',

  // Users
  'username-label': 'Username',
  'username-or-email-label': 'Username or Email',
  'username-lower-error': 'Usernames can only contain lowercase letters.',
  'username-invalid': 'Invalid username.  Only letters and numbers accepted.',
} as const;

export type MessageKey = keyof typeof DEFAULT_MESSAGES;

export type Translator = (text: string) => string;

export interface MessageRegistryOptions {
  /** Replacement templates for some or all keys */
  overrides?: Partial<Record<MessageKey, string>>;
  /** Translation applied to every template and label at lookup time */
  translate?: Translator;
}

/**
 * Reference to a registry message with its `%s` arguments, as produced by
 * fields before any text is resolved.
 */
export interface MessageRef {
  readonly key: MessageKey;
  readonly args?: readonly (string | number)[];
}

export class MessageRegistry {
  private readonly templates: Record<MessageKey, string>;
  private readonly translator: Translator;

  constructor(options: MessageRegistryOptions = {}) {
    this.templates = { ...DEFAULT_MESSAGES, ...options.overrides };
    this.translator = options.translate ?? ((text) => text);
  }

  /**
   * The untranslated template for a key.
   */
  raw(key: MessageKey): string {
    return this.templates[key];
  }

  /**
   * The translated template for a key.
   */
  get(key: MessageKey): string {
    return this.translator(this.templates[key]);
  }

  /**
   * Translate a label or any other user-visible token.
   */
  translate(text: string): string {
    return this.translator(text);
  }

  /**
   * The translated template with each `%s` replaced by the next argument.
   */
  format(key: MessageKey, ...args: readonly (string | number)[]): string {
    let index = 0;
    return this.get(key).replace(/%s/g, (placeholder) => {
      if (index >= args.length) {
        return placeholder;
      }
      return String(args[index++]);
    });
  }

  resolve(message: MessageRef | string): string {
    if (typeof message === 'string') {
      return this.translator(message);
    }
    return this.format(message.key, ...(message.args ?? []));
  }
}

/** Registry with the built-in English templates and no translation. */
export const defaultMessages = new MessageRegistry();
