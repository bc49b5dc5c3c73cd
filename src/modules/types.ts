/**
 * Entity-Type Module Contract
 *
 * Each deployable entity type (app, job, secret, ...) is contributed by a
 * module that parses its config section and owns a manager singleton.
 */

import type { ConfigHelper } from '../config/helper.js';
import type { ConfigMapping } from '../config/types.js';

/**
 * Per-type manager, responsible for applying deployment objects of its type.
 * Applying is outside the resolution pass; the loader only instantiates managers.
 */
export interface EntityManager {
  /** One-line, human-readable summary of a deployment object of this type */
  describe(deploymentObject: unknown): string;
}

/**
 * Entity produced by a preprocessor
 */
export interface PreprocessedEntity {
  name: string;
  config: ConfigMapping;
}

export type EntityParser<T = unknown> = (
  name: string,
  config: ConfigMapping,
  helper: ConfigHelper,
) => T;

export type EntityPreprocessor = (
  name: string,
  config: ConfigMapping,
  helper: ConfigHelper,
) => PreprocessedEntity[];

export interface EntityModule<T = unknown> {
  /** Key the module's manager is registered under (e.g. "apps") */
  configKey: string;
  /** Value of the `type` field this module handles (e.g. "app") */
  sectionType: string;
  createManager(): EntityManager;
  parse: EntityParser<T>;
  /** Expands one config block into zero or more entities */
  preprocess?: EntityPreprocessor;
}

/**
 * Named collection of modules the registry can load from
 */
export interface ModuleSource {
  name: string;
  modules: Readonly<Record<string, EntityModule>>;
}

/**
 * Descriptor of a loaded module, keyed by section type in the registry output
 */
export interface ModuleDescriptor {
  moduleId: string;
  configKey: string;
  sectionType: string;
  parse: EntityParser;
  preprocess?: EntityPreprocessor;
}

export interface LoadedModules {
  /** configKey → manager singleton */
  managers: Map<string, EntityManager>;
  /** sectionType → descriptor */
  modules: Map<string, ModuleDescriptor>;
}
