/**
 * Template Renderer
 *
 * Substitutes {{name}} placeholders with variable values. Placeholders
 * without a value are left in place; any remaining "{{" after substitution
 * fails the render.
 */

import { ConfigurationError } from './errors.js';

export type TemplateVariables = Readonly<Record<string, string | null | undefined>>;

const PLACEHOLDER_PATTERN = /{{\s*([^{}\s]+)\s*}}/g;

function hasOwn(variables: TemplateVariables, name: string): boolean {
  return Object.prototype.hasOwnProperty.call(variables, name);
}

/**
 * Render text against a set of variables.
 *
 * @param text - Template text
 * @param variables - Base variables
 * @param extraVars - Per-call variables, taking precedence over `variables`
 * @throws ConfigurationError if a placeholder remains unresolved
 */
export function renderTemplate(
  text: string,
  variables: TemplateVariables,
  extraVars: TemplateVariables = {},
): string {
  const rendered = text.replace(PLACEHOLDER_PATTERN, (placeholder: string, name: string) => {
    let value: string | null | undefined;
    if (hasOwn(extraVars, name)) {
      value = extraVars[name];
    } else if (hasOwn(variables, name)) {
      value = variables[name];
    }
    return value === null || value === undefined ? placeholder : value;
  });

  const remaining = rendered.indexOf('{{');
  if (remaining !== -1) {
    const unresolved = rendered.slice(remaining).match(/^{{[^}]*}?}?/);
    throw new ConfigurationError(
      `Unresolved variable in template: ${unresolved ? unresolved[0] : '{{'}`,
      'Declare the variable under "variables" or provide it with --var name=value',
    );
  }

  return rendered;
}

