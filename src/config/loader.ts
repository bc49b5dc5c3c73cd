/**
 * Config Loader
 *
 * Entry point of the resolution pass:
 * 1. Read the root document and merge its includes
 * 2. Resolve variables (fails before any entity is parsed)
 * 3. Load entity-type modules
 * 4. Parse entities and build the dependency graph
 *
 * The pass is synchronous and all-or-nothing.
 */

import path from 'path';
import { log } from '../cli/logger.js';
import { buildDependencyGraph } from '../graph/builder.js';
import type { DependencyGraph } from '../graph/types.js';
import { ModuleRegistry } from '../modules/registry.js';
import type { EntityManager, ModuleSource } from '../modules/types.js';
import { mergeIncludes, readDocument, readModules } from './document.js';
import { ConfigHelper } from './helper.js';
import { processEntities } from './pipeline.js';
import { resolveVariables, type ProvidedVariables, type VariableContainer } from './variables.js';

export interface LoadOptions {
  /** Plugin module sources, searched after the built-in modules */
  sources?: readonly ModuleSource[];
  /** Environment for variable resolution (defaults to process.env) */
  env?: Readonly<Record<string, string | undefined>>;
}

export interface DeploymentConfig {
  /** Entity name → deployment object */
  deploymentObjects: Map<string, unknown>;
  /** Entity name → dependency edges (only entities that declared dependencies) */
  dependencies: DependencyGraph;
  /** Manager key → manager singleton */
  managers: Map<string, EntityManager>;
  /** Entity name → manager key */
  entityManagers: Map<string, string>;
  /** Resolved variables of this load */
  variables: VariableContainer;
}

/**
 * Load and resolve a deployment config document
 *
 * @param documentPath - Path to the root YAML document
 * @param providedVariables - Variables supplied by the caller, overriding environment and defaults
 * @throws ConfigurationError for any problem with the config or the variables
 * @throws ModuleContractError if an entity-type module is defective
 */
export function loadDeploymentConfig(
  documentPath: string,
  providedVariables: ProvidedVariables = {},
  options: LoadOptions = {},
): DeploymentConfig {
  const absolutePath = path.resolve(documentPath);
  const basePath = path.dirname(absolutePath);
  log.debug(`Loading ${absolutePath}`);

  const document = mergeIncludes(readDocument(absolutePath), basePath);
  const variables = resolveVariables(document.get('variables'), providedVariables, options.env);
  const helper = new ConfigHelper(variables, basePath);

  const registry = new ModuleRegistry({ sources: options.sources });
  const { managers, modules } = registry.load(readModules(document));

  const { deploymentObjects, rawDependencies, entityManagers } = processEntities(
    modules,
    variables,
    document,
    helper,
  );
  const dependencies = buildDependencyGraph(rawDependencies, deploymentObjects);

  log.debug(`Resolved ${deploymentObjects.size} entities, ${dependencies.size} with dependencies`);
  return { deploymentObjects, dependencies, managers, entityManagers, variables };
}
