/**
 * Configuration Errors
 *
 * Two error kinds leave the resolution pass:
 * - ConfigurationError: the config document or the provided variables are wrong
 * - ModuleContractError: an entity-type module does not honour its contract
 */

import type { ZodError } from 'zod';

/**
 * Error caused by user input (config files, variables, includes, references)
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly suggestion?: string,
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Error caused by a defective entity-type module
 */
export class ModuleContractError extends Error {
  constructor(
    message: string,
    public readonly moduleId: string,
  ) {
    super(`Module "${moduleId}" ${message}`);
    this.name = 'ModuleContractError';
  }
}

/**
 * Format Zod validation errors into human-readable message.
 *
 * @param error - Zod validation error
 * @param context - What was being validated (e.g. "variables", "entity web")
 */
export function formatValidationErrors(error: ZodError, context: string): string {
  const errors = error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path ? `  • ${path}: ${issue.message}` : `  • ${issue.message}`;
  });

  return `Invalid ${context}:\n${errors.join('\n')}`;
}
