/**
 * Dependency Graph Builder
 *
 * Parses raw dependency references and resolves them against the deployment objects of
 * the current load. A dangling reference fails the whole load.
 */

import { ConfigurationError } from '../config/errors.js';
import type { ConfigValue } from '../config/types.js';
import { parseDependencyReference } from './reference.js';
import type { DependencyEdge, DependencyGraph } from './types.js';

/**
 * Build the dependency graph
 *
 * @param rawDependencies - Entity name → raw `dependencies` entries, in declaration order
 * @param deploymentObjects - Entity name → deployment object
 * @throws ConfigurationError if a reference is malformed or names an unknown entity
 */
export function buildDependencyGraph<T>(
  rawDependencies: ReadonlyMap<string, readonly ConfigValue[]>,
  deploymentObjects: ReadonlyMap<string, T>,
): DependencyGraph<T> {
  const graph: DependencyGraph<T> = new Map();

  for (const [entityName, references] of rawDependencies) {
    const edges: DependencyEdge<T>[] = [];

    for (const reference of references.map(parseDependencyReference)) {
      const target = deploymentObjects.get(reference.name);
      if (target === undefined) {
        throw new ConfigurationError(
          `Could not find dependency ${reference.name} required by ${entityName}`,
          'Check the name, and that the entity is not excluded by only/except',
        );
      }
      edges.push({ name: reference.name, target, kind: reference.kind });
    }

    graph.set(entityName, edges);
  }

  return graph;
}
