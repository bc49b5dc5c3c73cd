/**
 * Dependency Graph Types
 */

/** Relation kind used when a reference carries none */
export const DEFAULT_RELATION_KIND = 'create';

/**
 * Parsed dependency reference, e.g. "db:update" → { name: 'db', kind: 'update' }
 */
export interface DependencyReference {
  name: string;
  kind: string;
}

/**
 * Resolved dependency edge
 */
export interface DependencyEdge<T = unknown> {
  /** Name of the entity depended upon */
  name: string;
  /** Deployment object of that entity */
  target: T;
  /** Relation kind ("create" unless specified) */
  kind: string;
}

/**
 * Entity name → ordered dependency edges. Only entities that declared
 * dependencies appear as keys.
 */
export type DependencyGraph<T = unknown> = Map<string, DependencyEdge<T>[]>;
