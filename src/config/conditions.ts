/**
 * Condition Evaluator
 *
 * Decides whether an entity is excluded by its `only` / `except` restrictions.
 */

import type { ConfigValue } from './types.js';
import type { VariableContainer } from './variables.js';

export type Restriction = Readonly<Record<string, ConfigValue>>;

function matches(actual: string | null | undefined, expected: ConfigValue): boolean {
  if (expected === null) {
    return actual === null;
  }
  return actual === String(expected);
}

/**
 * Check whether an entity should be skipped.
 *
 * - only: every listed variable must be declared and equal to the expected value
 * - except: any listed variable that is declared and equal to the value excludes the entity
 *
 * @returns true if the entity must be left out
 */
export function shouldSkip(
  variables: VariableContainer,
  only: Restriction = {},
  except: Restriction = {},
): boolean {
  for (const [name, expected] of Object.entries(only)) {
    if (!variables.has(name) || !matches(variables.get(name), expected)) {
      return true;
    }
  }

  for (const [name, excluded] of Object.entries(except)) {
    if (variables.has(name) && matches(variables.get(name), excluded)) {
      return true;
    }
  }

  return false;
}
