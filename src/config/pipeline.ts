/**
 * Entity Pipeline
 *
 * Walks the entity sections of a config document in document order:
 * preprocess (fan-out) → only/except filtering → type-specific parsing.
 * No reordering by dependency happens here.
 */

import { log } from '../cli/logger.js';
import type { ModuleDescriptor, PreprocessedEntity } from '../modules/types.js';
import { shouldSkip, type Restriction } from './conditions.js';
import { ConfigurationError, ModuleContractError } from './errors.js';
import type { ConfigHelper } from './helper.js';
import { isConfigMapping, isReservedKey, type ConfigMapping, type ConfigValue } from './types.js';
import type { VariableContainer } from './variables.js';

export interface PipelineResult {
  /** Entity name → deployment object, in first-seen order */
  deploymentObjects: Map<string, unknown>;
  /** Entity name → raw `dependencies` entries (only entities that declared some) */
  rawDependencies: Map<string, ConfigValue[]>;
  /** Entity name → configKey of the manager responsible for it */
  entityManagers: Map<string, string>;
}

function lookupModule(
  modules: ReadonlyMap<string, ModuleDescriptor>,
  name: string,
  config: ConfigMapping,
): ModuleDescriptor {
  const { type } = config;
  if (type === undefined || type === null) {
    throw new ConfigurationError(`Entity "${name}" has no type`);
  }
  const descriptor = typeof type === 'string' ? modules.get(type) : undefined;
  if (!descriptor) {
    throw new ConfigurationError(
      `Entity "${name}" has unknown type ${JSON.stringify(type)}`,
      `Known types: ${Array.from(modules.keys()).join(', ')}`,
    );
  }
  return descriptor;
}

function readRestriction(name: string, config: ConfigMapping, key: 'only' | 'except'): Restriction {
  const restriction = config[key];
  if (restriction === undefined || restriction === null) {
    return {};
  }
  if (!isConfigMapping(restriction)) {
    throw new ConfigurationError(`Entity "${name}": ${key} must be a mapping of variable name to value`);
  }
  return restriction;
}

function preprocess(
  descriptor: ModuleDescriptor,
  name: string,
  config: ConfigMapping,
  helper: ConfigHelper,
): PreprocessedEntity[] {
  if (!descriptor.preprocess) {
    return [{ name, config }];
  }

  const entities: unknown = descriptor.preprocess(name, config, helper);
  if (!Array.isArray(entities)) {
    throw new ModuleContractError(`preprocess for "${name}" must return an array`, descriptor.moduleId);
  }

  return entities.map((entity: unknown) => {
    if (
      !isConfigMapping(entity) ||
      typeof entity.name !== 'string' ||
      !isConfigMapping(entity.config)
    ) {
      throw new ModuleContractError(
        `preprocess for "${name}" must return { name, config } pairs`,
        descriptor.moduleId,
      );
    }
    return { name: entity.name, config: entity.config };
  });
}

/**
 * Turn the entity sections of a document into deployment objects
 *
 * @throws ConfigurationError on a missing or unknown type or malformed reserved fields
 * @throws ModuleContractError if a module returns malformed results
 */
export function processEntities(
  modules: ReadonlyMap<string, ModuleDescriptor>,
  variables: VariableContainer,
  document: ReadonlyMap<string, ConfigValue>,
  helper: ConfigHelper,
): PipelineResult {
  const deploymentObjects = new Map<string, unknown>();
  const rawDependencies = new Map<string, ConfigValue[]>();
  const entityManagers = new Map<string, string>();

  for (const [sectionName, section] of document) {
    if (isReservedKey(sectionName)) {
      continue;
    }
    if (!isConfigMapping(section)) {
      throw new ConfigurationError(`Entity "${sectionName}" must be a mapping`);
    }

    const descriptor = lookupModule(modules, sectionName, section);

    for (const { name, config } of preprocess(descriptor, sectionName, section, helper)) {
      const only = readRestriction(name, config, 'only');
      const except = readRestriction(name, config, 'except');
      if (shouldSkip(variables, only, except)) {
        log.debug(`Skipping ${name}: only/except restrictions not met`);
        continue;
      }

      const dependencies = config.dependencies ?? null;
      if (dependencies !== null && !Array.isArray(dependencies)) {
        throw new ConfigurationError(`Entity "${name}": dependencies must be a list`);
      }

      const deploymentObject: unknown = descriptor.parse(name, config, helper);
      if (deploymentObject === undefined) {
        throw new ModuleContractError(`parse for "${name}" returned nothing`, descriptor.moduleId);
      }

      if (dependencies && dependencies.length > 0) {
        rawDependencies.set(name, dependencies);
      } else {
        rawDependencies.delete(name);
      }
      deploymentObjects.set(name, deploymentObject);
      entityManagers.set(name, descriptor.configKey);
      log.debug(`Parsed ${descriptor.sectionType} ${name}`);
    }
  }

  return { deploymentObjects, rawDependencies, entityManagers };
}
