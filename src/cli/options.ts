/**
 * Option Parsing and Validation
 *
 * Parses and validates CLI options:
 * - Variable assignments (--var name=value)
 * - Config and plugin paths
 * - Environment variable overrides
 */

import path from 'path';
import fs from 'fs-extra';

/**
 * Invalid command-line input, with a hint on how to fix it
 */
export class ValidationError extends Error {
  constructor(
    message: string,
    public readonly field: string,
    public readonly value: unknown,
    public readonly suggestion?: string,
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

const VARIABLE_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_.-]*$/;

/**
 * Parse a single `name=value` assignment. The value may itself contain "=".
 *
 * @throws ValidationError if the assignment has no "=" or an invalid name
 */
export function parseVariableAssignment(assignment: string): [string, string] {
  const separator = assignment.indexOf('=');
  if (separator === -1) {
    throw new ValidationError(
      `Invalid variable assignment: "${assignment}"`,
      'var',
      assignment,
      'Use format like "--var env=prod"',
    );
  }

  const name = assignment.slice(0, separator).trim();
  if (!VARIABLE_NAME_PATTERN.test(name)) {
    throw new ValidationError(
      `Invalid variable name: "${name}"`,
      'var',
      assignment,
      'Variable names start with a letter or underscore',
    );
  }

  return [name, assignment.slice(separator + 1)];
}

/**
 * Parse repeated `--var name=value` options; later assignments win
 */
export function parseVariableAssignments(assignments: readonly string[] = []): Record<string, string> {
  const variables: Record<string, string> = {};
  for (const assignment of assignments) {
    const [name, value] = parseVariableAssignment(assignment);
    variables[name] = value;
  }
  return variables;
}

/**
 * Commander collector for repeatable options
 */
export function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

/**
 * Resolve and validate a file path
 *
 * @param filePath - Path to resolve (can be relative or absolute)
 * @param mustExist - Whether the path must exist
 * @returns Absolute path
 * @throws ValidationError if path doesn't exist when required
 */
export function resolvePath(filePath: string, mustExist = false): string {
  const resolved = path.resolve(filePath.trim());

  if (mustExist && !fs.pathExistsSync(resolved)) {
    throw new ValidationError(
      `Path does not exist: "${filePath}"`,
      'path',
      filePath,
      'Provide a valid file path',
    );
  }

  return resolved;
}

/**
 * Check if verbose mode is enabled
 *
 * Checks both --verbose flag and MANIFOLD_VERBOSE environment variable
 */
export function isVerboseEnabled(verboseFlag?: boolean): boolean {
  if (verboseFlag !== undefined) {
    return verboseFlag;
  }

  const envVerbose = process.env.MANIFOLD_VERBOSE;
  return envVerbose === 'true' || envVerbose === '1';
}
