/**
 * Deployment Order Resolution
 *
 * Derives an order in which entities can be applied from the dependency
 * graph: dependencies first, document order as the tie-break. Cycles are
 * reported, not thrown; the loader itself never reorders entities.
 */

import type { DependencyGraph } from './types.js';

/**
 * Node of the ordering graph
 */
export interface OrderNode {
  name: string;
  /** Entities this entity depends on */
  dependencies: string[];
}

/**
 * Group of entities whose dependencies are all satisfied by earlier batches
 */
export interface DeploymentBatch {
  batchNumber: number;
  entities: string[];
}

export interface DeploymentOrder {
  /** Topologically sorted entity names (empty when cycles exist) */
  order: string[];
  /** Batches that could be applied in parallel (empty when cycles exist) */
  batches: DeploymentBatch[];
  /** Entities without dependencies */
  roots: string[];
  /** Dependency cycles, each closed (first name repeated at the end) */
  cycles: string[][];
}

export class DeploymentOrderResolver {
  private readonly nodes = new Map<string, OrderNode>();

  /**
   * @param names - All entity names, in document order
   * @param graph - Dependency graph of the same load
   */
  constructor(names: Iterable<string>, graph: DependencyGraph) {
    for (const name of names) {
      this.nodes.set(name, { name, dependencies: [] });
    }

    for (const [name, edges] of graph) {
      const node = this.nodes.get(name);
      if (!node) {
        continue;
      }
      for (const edge of edges) {
        if (!node.dependencies.includes(edge.name)) {
          node.dependencies.push(edge.name);
        }
      }
    }
  }

  analyze(): DeploymentOrder {
    const cycles = this.detectCycles();
    const roots = Array.from(this.nodes.values())
      .filter((node) => node.dependencies.length === 0)
      .map((node) => node.name);

    return {
      order: cycles.length === 0 ? this.topologicalSort() : [],
      batches: cycles.length === 0 ? this.buildBatches() : [],
      roots,
      cycles,
    };
  }

  topologicalSort(): string[] {
    const sorted: string[] = [];
    const visited = new Set<string>();
    const visiting = new Set<string>();

    const visit = (name: string): boolean => {
      if (visited.has(name)) {
        return true;
      }
      if (visiting.has(name)) {
        return false;
      }

      visiting.add(name);
      for (const dependency of this.nodes.get(name)?.dependencies ?? []) {
        if (!visit(dependency)) {
          return false;
        }
      }
      visiting.delete(name);
      visited.add(name);
      sorted.push(name);

      return true;
    };

    for (const name of this.nodes.keys()) {
      visit(name);
    }

    return sorted;
  }

  buildBatches(): DeploymentBatch[] {
    const batches: DeploymentBatch[] = [];
    const completed = new Set<string>();

    while (completed.size < this.nodes.size) {
      const ready = Array.from(this.nodes.values())
        .filter((node) => !completed.has(node.name))
        .filter((node) => node.dependencies.every((dependency) => completed.has(dependency)))
        .map((node) => node.name);

      // cycle: nothing more can be scheduled
      if (ready.length === 0) {
        break;
      }

      batches.push({ batchNumber: batches.length, entities: ready });
      for (const name of ready) {
        completed.add(name);
      }
    }

    return batches;
  }

  detectCycles(): string[][] {
    const cycles: string[][] = [];
    const visited = new Set<string>();
    const visiting = new Set<string>();
    const path: string[] = [];

    const visit = (name: string): void => {
      if (visited.has(name)) {
        return;
      }

      if (visiting.has(name)) {
        cycles.push(path.slice(path.indexOf(name)).concat(name));
        return;
      }

      visiting.add(name);
      path.push(name);
      for (const dependency of this.nodes.get(name)?.dependencies ?? []) {
        visit(dependency);
      }
      path.pop();
      visiting.delete(name);
      visited.add(name);
    };

    for (const name of this.nodes.keys()) {
      visit(name);
    }

    return cycles;
  }
}

/**
 * Compute the deployment order for a load result
 */
export function resolveDeploymentOrder(
  names: Iterable<string>,
  graph: DependencyGraph,
): DeploymentOrder {
  return new DeploymentOrderResolver(names, graph).analyze();
}
