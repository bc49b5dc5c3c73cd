/**
 * Config document reading and include merging
 *
 * Documents are parsed into a Map so that sections keep the order they were
 * written in, integer-like names included.
 */

import path from 'path';
import { parseDocument } from 'yaml';
import { z } from 'zod';
import { log } from '../cli/logger.js';
import { ConfigurationError, formatValidationErrors } from './errors.js';
import { readTextFile, toConfigKey, toConfigValue } from './helper.js';
import type { ConfigDocument } from './types.js';

const StringListSchema = z.array(z.string().min(1));

/**
 * Parse YAML text into an ordered config document (empty text is an empty document)
 *
 * @param source - File name used in error messages
 */
export function parseConfigDocument(text: string, source: string): ConfigDocument {
  const parsed = parseDocument(text);
  const [error] = parsed.errors;
  if (error) {
    const line = error.linePos ? error.linePos[0].line : '?';
    throw new ConfigurationError(
      `YAML parsing error in ${source}:\n  Line ${line}: ${error.message.split('\n')[0]}`,
    );
  }

  const contents: unknown = parsed.toJS({ mapAsMap: true });
  if (contents === null || contents === undefined) {
    return new Map();
  }
  if (!(contents instanceof Map)) {
    throw new ConfigurationError(`Invalid configuration file: ${source} - expected a mapping`);
  }

  const document: ConfigDocument = new Map();
  for (const [key, value] of contents) {
    document.set(toConfigKey(key, source), toConfigValue(value, source));
  }
  return document;
}

/**
 * Read a YAML file that must contain a top-level mapping
 */
export function readDocument(filePath: string): ConfigDocument {
  return parseConfigDocument(readTextFile(filePath), filePath);
}

function readList(document: ConfigDocument, key: 'includes' | 'modules'): string[] {
  const result = StringListSchema.safeParse(document.get(key) ?? []);
  if (!result.success) {
    throw new ConfigurationError(formatValidationErrors(result.error, `${key} section`));
  }
  return result.data;
}

export function readIncludes(document: ConfigDocument): string[] {
  return readList(document, 'includes');
}

export function readModules(document: ConfigDocument): string[] {
  return readList(document, 'modules');
}

/**
 * Shallowly merge the documents listed under `includes` into a copy of the root document.
 *
 * Include paths are relative to `basePath`. Includes listed inside included
 * documents are not followed.
 *
 * @throws ConfigurationError if an include redeclares a top-level key
 */
export function mergeIncludes(document: ConfigDocument, basePath: string): ConfigDocument {
  const merged: ConfigDocument = new Map(document);

  for (const include of readIncludes(document)) {
    const included = readDocument(path.resolve(basePath, include));

    for (const [key, value] of included) {
      if (merged.has(key)) {
        throw new ConfigurationError(`${key} found in base config and include file ${include}`);
      }
      merged.set(key, value);
    }
    log.debug(`Merged include ${include} (${included.size} keys)`);
  }

  return merged;
}
