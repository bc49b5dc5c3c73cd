/**
 * Module Registry
 *
 * Loads entity-type modules from an ordered list of sources. The built-in
 * source always comes first; plugin sources follow in the order given.
 *
 * Identifiers:
 * - "name"          → first source in the search list that provides "name"
 * - "source:name"   → moves "source" to the front of the search list for this
 *                     and every later identifier of the same load, then looks up "name"
 */

import { log } from '../cli/logger.js';
import { ConfigurationError, ModuleContractError } from '../config/errors.js';
import { builtinModules } from './builtin/index.js';
import type {
  EntityManager,
  EntityModule,
  LoadedModules,
  ModuleDescriptor,
  ModuleSource,
} from './types.js';

export const BUILTIN_SOURCE = 'builtin';

/**
 * Modules loaded before any identifier listed in the config document
 */
export const BUILTIN_MODULES: readonly string[] = ['secret', 'job', 'app'];

export interface ModuleIdentifier {
  source?: string;
  module: string;
}

export function parseModuleIdentifier(identifier: string): ModuleIdentifier {
  const separator = identifier.lastIndexOf(':');
  if (separator === -1) {
    return { module: identifier };
  }
  return { source: identifier.slice(0, separator), module: identifier.slice(separator + 1) };
}

/**
 * Check that a value satisfies the EntityModule contract
 *
 * @throws ModuleContractError naming the first violation
 */
export function assertEntityModule(value: unknown, moduleId: string): asserts value is EntityModule {
  if (typeof value !== 'object' || value === null) {
    throw new ModuleContractError('is not an object', moduleId);
  }
  if (!('configKey' in value) || typeof value.configKey !== 'string' || value.configKey === '') {
    throw new ModuleContractError('must declare a non-empty string configKey', moduleId);
  }
  if (!('sectionType' in value) || typeof value.sectionType !== 'string' || value.sectionType === '') {
    throw new ModuleContractError('must declare a non-empty string sectionType', moduleId);
  }
  if (!('parse' in value) || typeof value.parse !== 'function') {
    throw new ModuleContractError('must provide a parse function', moduleId);
  }
  if (!('createManager' in value) || typeof value.createManager !== 'function') {
    throw new ModuleContractError('must provide a createManager function', moduleId);
  }
  if ('preprocess' in value && value.preprocess !== undefined && typeof value.preprocess !== 'function') {
    throw new ModuleContractError('declares a preprocess that is not a function', moduleId);
  }
}

function assertManager(value: unknown, moduleId: string): asserts value is EntityManager {
  if (typeof value !== 'object' || value === null || !('describe' in value) || typeof value.describe !== 'function') {
    throw new ModuleContractError('createManager must return an object with a describe function', moduleId);
  }
}

export interface ModuleRegistryOptions {
  /** Plugin sources, searched after the built-in source */
  sources?: readonly ModuleSource[];
}

export class ModuleRegistry {
  private readonly sources: readonly ModuleSource[];

  constructor(options: ModuleRegistryOptions = {}) {
    const sources = [{ name: BUILTIN_SOURCE, modules: builtinModules }, ...(options.sources ?? [])];
    const names = new Set<string>();
    for (const source of sources) {
      if (names.has(source.name)) {
        throw new ConfigurationError(`Duplicate module source "${source.name}"`);
      }
      names.add(source.name);
    }
    this.sources = sources;
  }

  /**
   * Load the built-in modules followed by `additionalModules`
   *
   * @param additionalModules - Identifiers from the config document's `modules` section
   * @throws ConfigurationError if a source or module cannot be found
   * @throws ModuleContractError if a module violates the contract
   */
  load(additionalModules: readonly string[] = []): LoadedModules {
    const searchPath = [...this.sources];
    const managers = new Map<string, EntityManager>();
    const modules = new Map<string, ModuleDescriptor>();

    for (const identifier of [...BUILTIN_MODULES, ...additionalModules]) {
      const parsed = parseModuleIdentifier(identifier);

      if (parsed.source !== undefined) {
        const index = searchPath.findIndex((source) => source.name === parsed.source);
        if (index === -1) {
          throw new ConfigurationError(
            `Could not load module ${identifier}: unknown module source "${parsed.source}"`,
            `Known sources: ${searchPath.map((source) => source.name).join(', ')}`,
          );
        }
        const [source] = searchPath.splice(index, 1);
        searchPath.unshift(source);
      }

      const source = searchPath.find((candidate) =>
        Object.prototype.hasOwnProperty.call(candidate.modules, parsed.module),
      );
      if (!source) {
        throw new ConfigurationError(`Could not load module ${identifier}`);
      }

      const entityModule: unknown = source.modules[parsed.module];
      assertEntityModule(entityModule, identifier);

      if (!managers.has(entityModule.configKey)) {
        const manager: unknown = entityModule.createManager();
        assertManager(manager, identifier);
        managers.set(entityModule.configKey, manager);
      }

      modules.set(entityModule.sectionType, {
        moduleId: `${source.name}:${parsed.module}`,
        configKey: entityModule.configKey,
        sectionType: entityModule.sectionType,
        parse: entityModule.parse,
        preprocess: entityModule.preprocess,
      });

      log.debug(`Loaded module ${source.name}:${parsed.module} (type ${entityModule.sectionType})`);
    }

    return { managers, modules };
  }
}
