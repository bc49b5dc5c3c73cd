/**
 * Config Helper
 *
 * Facade handed to entity-type modules. Paths resolve against the root
 * config document's directory, including for entities declared in includes.
 */

import fs from 'fs';
import path from 'path';
import yaml from 'js-yaml';
import { ConfigurationError } from './errors.js';
import type { TemplateVariables } from './template.js';
import type { ConfigValue } from './types.js';
import type { VariableContainer } from './variables.js';

export interface ReadOptions {
  /** Pass the file content through the template renderer */
  render?: boolean;
  /** Extra variables for this render only */
  extraVars?: TemplateVariables;
}

/**
 * Read a file as UTF-8 text, mapping file system errors to ConfigurationError
 */
export function readTextFile(filePath: string): string {
  try {
    return fs.readFileSync(filePath, 'utf8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Could not read ${filePath}: ${reason}`);
  }
}

/**
 * Parse YAML text into a config tree
 *
 * @param source - File name used in error messages
 */
export function parseYaml(text: string, source: string): ConfigValue {
  try {
    const parsed: unknown = yaml.load(text);
    return parsed === undefined ? null : toConfigValue(parsed, source);
  } catch (error) {
    if (error instanceof yaml.YAMLException) {
      throw new ConfigurationError(
        `YAML parsing error in ${source}:\n` +
          `  Line ${error.mark ? error.mark.line + 1 : '?'}: ${error.reason}`,
      );
    }
    throw error;
  }
}

/**
 * Parse JSON text into a config tree
 *
 * @param source - File name used in error messages
 */
export function parseJson(text: string, source: string): ConfigValue {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`JSON parsing error in ${source}: ${reason}`);
  }
  return toConfigValue(parsed, source);
}

/**
 * Convert a parsed value into a config tree. Nested Maps become mappings.
 */
export function toConfigValue(value: unknown, source: string): ConfigValue {
  if (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean'
  ) {
    return value;
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (Array.isArray(value)) {
    return value.map((item) => toConfigValue(item, source));
  }
  if (value instanceof Map) {
    const mapping: Record<string, ConfigValue> = {};
    for (const [key, item] of value) {
      mapping[toConfigKey(key, source)] = toConfigValue(item, source);
    }
    return mapping;
  }
  if (typeof value === 'object') {
    const mapping: Record<string, ConfigValue> = {};
    for (const [key, item] of Object.entries(value)) {
      mapping[key] = toConfigValue(item, source);
    }
    return mapping;
  }
  throw new ConfigurationError(`Unsupported value of type ${typeof value} in ${source}`);
}

/**
 * Mapping keys must be scalars; numbers and booleans are used as written
 */
export function toConfigKey(key: unknown, source: string): string {
  if (typeof key === 'string') {
    return key;
  }
  if (typeof key === 'number' || typeof key === 'boolean' || key === null) {
    return String(key);
  }
  throw new ConfigurationError(`Unsupported mapping key in ${source}: keys must be scalars`);
}

export class ConfigHelper {
  constructor(
    public readonly variables: VariableContainer,
    public readonly basePath: string,
  ) {}

  abspath(filePath: string): string {
    return path.resolve(this.basePath, filePath);
  }

  /**
   * Read a file relative to the root config directory. Files are re-read on every call.
   */
  readFile(filename: string, options: ReadOptions = {}): string {
    const data = readTextFile(this.abspath(filename));
    return options.render ? this.variables.render(data, options.extraVars) : data;
  }

  readYaml(filename: string, options: ReadOptions = {}): ConfigValue {
    return parseYaml(this.readFile(filename, options), filename);
  }

  readJson(filename: string, options: ReadOptions = {}): ConfigValue {
    return parseJson(this.readFile(filename, options), filename);
  }

  render(text: string, extraVars: TemplateVariables = {}): string {
    return this.variables.render(text, extraVars);
  }
}
