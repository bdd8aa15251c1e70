/**
 * Error classes for the runtime package.
 * Builds on the AbsenceError hierarchy from @absential/types.
 */

import { AbsenceError } from '@absential/types';

export type FieldErrors = Readonly<Record<string, readonly string[] | undefined>>;

/**
 * Environment variables failed validation
 */
export class ConfigurationError extends AbsenceError {
  public readonly fieldErrors: FieldErrors;

  constructor(fieldErrors: FieldErrors) {
    const lines = Object.entries(fieldErrors).map(
      ([field, messages]) => `  ${field}: ${(messages ?? []).join(', ')}`
    );
    super(`Environment validation failed:\n${lines.join('\n')}`, 'CONFIGURATION_INVALID');
    this.name = 'ConfigurationError';
    this.fieldErrors = fieldErrors;
  }
}
