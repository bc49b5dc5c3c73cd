/**
 * Entity config validation helpers for entity-type modules
 */

import { z } from 'zod';
import { ConfigurationError, formatValidationErrors } from '../config/errors.js';
import type { ConfigMapping } from '../config/types.js';

export const ScalarSchema = z.union([z.string(), z.number(), z.boolean()]);

/**
 * `extra_vars` mapping; scalar values are rendered as strings
 */
export const ExtraVarsSchema = z
  .record(z.string(), ScalarSchema)
  .transform((vars) => {
    const rendered: Record<string, string> = {};
    for (const [name, value] of Object.entries(vars)) {
      rendered[name] = String(value);
    }
    return rendered;
  });

export const RestrictionSchema = z.record(z.string(), ScalarSchema.nullable());

/**
 * Validate an entity config against a module schema
 *
 * @throws ConfigurationError listing every issue
 */
export function parseEntityConfig<S extends z.ZodTypeAny>(
  schema: S,
  name: string,
  config: ConfigMapping,
): z.output<S> {
  const result = schema.safeParse(config);
  if (!result.success) {
    throw new ConfigurationError(formatValidationErrors(result.error, `config for entity ${name}`));
  }
  return result.data;
}
