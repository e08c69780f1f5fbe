/**
 * Library configuration, read from environment variables.
 *
 * FORMWRIGHT_LOG_LEVEL=silent|error|warn|info (default: warn)
 * FORMWRIGHT_COMPLETION_CHECKS=true|false (default: true)
 */

import { z } from 'zod';
import { FormwrightError } from './errors.js';

export const LogLevelSchema = z.enum(['silent', 'error', 'warn', 'info']);

export type LogLevel = z.infer<typeof LogLevelSchema>;

const BooleanFlagSchema = z
  .enum(['true', 'false', '1', '0'])
  .transform((flag) => flag === 'true' || flag === '1');

const EnvSchema = z.object({
  FORMWRIGHT_LOG_LEVEL: LogLevelSchema.default('warn'),
  FORMWRIGHT_COMPLETION_CHECKS: BooleanFlagSchema.default('true'),
});

export interface FormwrightConfig {
  /** Minimum level written by the console logger */
  logLevel: LogLevel;
  /** Raise when a renderer is finished before rendering every field */
  completionChecks: boolean;
}

/**
 * Build the library configuration from an environment map.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): FormwrightConfig {
  const parsed = EnvSchema.safeParse({
    FORMWRIGHT_LOG_LEVEL: env.FORMWRIGHT_LOG_LEVEL || undefined,
    FORMWRIGHT_COMPLETION_CHECKS: env.FORMWRIGHT_COMPLETION_CHECKS || undefined,
  });

  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new FormwrightError(`Invalid formwright environment configuration: ${detail}`);
  }

  return {
    logLevel: parsed.data.FORMWRIGHT_LOG_LEVEL,
    completionChecks: parsed.data.FORMWRIGHT_COMPLETION_CHECKS,
  };
}
