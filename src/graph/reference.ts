/**
 * Dependency reference parsing
 *
 * Accepted forms:
 * - "name"            → kind "create"
 * - "name:kind"       → split on the last colon
 * - { name, kind? }   → structured form
 */

import { ConfigurationError } from '../config/errors.js';
import { isConfigMapping, type ConfigValue } from '../config/types.js';
import { DEFAULT_RELATION_KIND, type DependencyReference } from './types.js';

export function parseDependencyReference(raw: ConfigValue): DependencyReference {
  if (typeof raw === 'string') {
    const separator = raw.lastIndexOf(':');
    const name = separator === -1 ? raw : raw.slice(0, separator);
    const kind = separator === -1 ? DEFAULT_RELATION_KIND : raw.slice(separator + 1);
    return checkReference({ name, kind }, raw);
  }

  if (isConfigMapping(raw)) {
    const { name, kind = DEFAULT_RELATION_KIND } = raw;
    if (typeof name === 'string' && typeof kind === 'string') {
      return checkReference({ name, kind }, JSON.stringify(raw));
    }
  }

  throw new ConfigurationError(
    `Invalid dependency reference: ${JSON.stringify(raw)}`,
    'Use "name", "name:kind" or { name: ..., kind: ... }',
  );
}

function checkReference(reference: DependencyReference, source: string): DependencyReference {
  if (reference.name.trim() === '') {
    throw new ConfigurationError(`Dependency reference "${source}" has an empty name`);
  }
  if (reference.kind.trim() === '') {
    throw new ConfigurationError(`Dependency reference "${source}" has an empty relation kind`);
  }
  return reference;
}

