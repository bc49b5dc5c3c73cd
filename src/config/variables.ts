/**
 * Variable Resolver
 *
 * Resolves declared variables with precedence:
 * 1. Values provided by the caller (--var name=value)
 * 2. Environment variable named by `from` (or VAR_<NAME>)
 * 3. Declared default
 * 4. Unresolved (null)
 */

import { z } from 'zod';
import { ConfigurationError, formatValidationErrors } from './errors.js';
import { renderTemplate, type TemplateVariables } from './template.js';

const ScalarSchema = z.union([z.string(), z.number(), z.boolean()]);

/**
 * Schema for a single entry under the `variables` section
 */
export const VariableDefinitionSchema = z.object({
  from: z.string().min(1).optional(),
  default: ScalarSchema.nullable().optional(),
  required: z.boolean().optional(),
  values: z.array(ScalarSchema).optional(),
  description: z.string().optional(),
});

export type VariableDefinition = z.infer<typeof VariableDefinitionSchema>;

/**
 * Schema for the `variables` section. A bare `name:` entry declares an
 * optional variable with no default.
 */
export const VariablesSectionSchema = z.record(z.string(), VariableDefinitionSchema.nullable());

export type ProvidedVariables = Readonly<Record<string, string>>;

type Environment = Readonly<Record<string, string | undefined>>;

/**
 * Immutable set of resolved variables, shared by the renderer, the
 * condition evaluator and every entity-type module.
 */
export class VariableContainer {
  private readonly values: TemplateVariables;

  constructor(values: Record<string, string | null>) {
    this.values = Object.freeze({ ...values });
  }

  /**
   * Render text against the container; `extraVars` win on collision for this call only
   */
  render(text: string, extraVars: TemplateVariables = {}): string {
    return renderTemplate(text, this.values, extraVars);
  }

  get(name: string): string | null | undefined {
    return this.has(name) ? this.values[name] : undefined;
  }

  has(name: string): boolean {
    return Object.prototype.hasOwnProperty.call(this.values, name);
  }

  names(): string[] {
    return Object.keys(this.values);
  }

  toRecord(): Readonly<Record<string, string | null>> {
    const record: Record<string, string | null> = {};
    for (const name of this.names()) {
      record[name] = this.values[name] ?? null;
    }
    return record;
  }
}

/**
 * Name of the environment variable consulted when `from` is not declared
 *
 * @example environmentNameFor('db-host') // 'VAR_DB_HOST'
 */
export function environmentNameFor(name: string): string {
  return 'VAR_' + name.replace(/-/g, '_').toUpperCase();
}

function calculateValue(
  name: string,
  definition: VariableDefinition,
  provided: ProvidedVariables,
  env: Environment,
): string | null {
  if (Object.prototype.hasOwnProperty.call(provided, name)) {
    return provided[name];
  }

  const envName = definition.from ?? environmentNameFor(name);
  const envValue = Object.prototype.hasOwnProperty.call(env, envName) ? env[envName] : undefined;
  if (envValue !== undefined) {
    return envValue;
  }

  if (definition.default !== undefined && definition.default !== null) {
    return String(definition.default);
  }

  return null;
}

/**
 * Resolve the `variables` section into a VariableContainer.
 *
 * Undeclared provided variables are passed through verbatim. An empty
 * string does not satisfy `required`.
 *
 * @param declared - Raw `variables` section from the config document
 * @param provided - Variables supplied by the caller
 * @param env - Environment to read `from` variables from
 * @throws ConfigurationError on a malformed section, a missing required
 *   variable or a value outside the allow-list
 */
export function resolveVariables(
  declared: unknown,
  provided: ProvidedVariables = {},
  env: Environment = process.env,
): VariableContainer {
  const parsed = VariablesSectionSchema.safeParse(declared ?? {});
  if (!parsed.success) {
    throw new ConfigurationError(formatValidationErrors(parsed.error, 'variables section'));
  }

  const resolved: Record<string, string | null> = {};

  for (const [name, rawDefinition] of Object.entries(parsed.data)) {
    const definition: VariableDefinition = rawDefinition ?? {};
    const value = calculateValue(name, definition, provided, env);

    if (!value && definition.required) {
      throw new ConfigurationError(
        `Missing required variable ${name}`,
        `Provide it with --var ${name}=<value> or set ${definition.from ?? environmentNameFor(name)}`,
      );
    }

    if (definition.values) {
      const allowed = definition.values.map((allowedValue) => String(allowedValue));
      if (value === null || !allowed.includes(value)) {
        throw new ConfigurationError(
          `Value '${value ?? ''}' not allowed for ${name}. Possible values: ${allowed.join(',')}`,
        );
      }
    }

    resolved[name] = value;
  }

  for (const [name, value] of Object.entries(provided)) {
    if (!Object.prototype.hasOwnProperty.call(resolved, name)) {
      resolved[name] = value;
    }
  }

  return new VariableContainer(resolved);
}
