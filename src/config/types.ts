/**
 * Config Tree Types
 *
 * The document handed to entity-type modules is an untyped YAML tree.
 * Modules validate their own fields; the core only relies on reserved keys.
 */

export type ConfigScalar = string | number | boolean | null;

export type ConfigValue = ConfigScalar | ConfigValue[] | ConfigMapping;

export interface ConfigMapping {
  [key: string]: ConfigValue;
}

/**
 * Top-level sections of a config document, in document order. A Map keeps
 * integer-like entity names where they were written.
 */
export type ConfigDocument = Map<string, ConfigValue>;

/**
 * Top-level keys that carry metadata rather than entities
 */
export const RESERVED_KEYS = ['variables', 'modules', 'includes'] as const;

export type ReservedKey = (typeof RESERVED_KEYS)[number];

export function isReservedKey(key: string): key is ReservedKey {
  return (RESERVED_KEYS as readonly string[]).includes(key);
}

export function isConfigMapping(value: unknown): value is ConfigMapping {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
