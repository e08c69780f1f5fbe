import { describe, it, expect, vi, afterEach } from 'vitest';
import { createConsoleLogger } from '../../src/core/logger.js';

describe('createConsoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should prefix warnings and pass the context along', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    createConsoleLogger('warn').warn('careful', { form: 'signup' });
    expect(warn).toHaveBeenCalledWith('[formwright] WARNING: careful', { form: 'signup' });
  });

  it('should drop messages below its level', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const logger = createConsoleLogger('warn');

    logger.info('chatty');
    logger.error('boom');

    expect(info).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledWith('[formwright] ERROR: boom', '');
  });

  it('should write nothing when silent', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    createConsoleLogger('silent').error('boom');
    expect(error).not.toHaveBeenCalled();
  });

  it('should write everything at info level', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => {});
    createConsoleLogger('info').info('parsed', { fields: 3 });
    expect(info).toHaveBeenCalledWith('[formwright] parsed', { fields: 3 });
  });
});
