/**
 * manifold - configuration resolution and dependency graph core
 *
 * @example
 * ```typescript
 * import { loadDeploymentConfig } from 'manifold-deploy';
 *
 * const { deploymentObjects, dependencies, managers } = loadDeploymentConfig('deploy.yml', {
 *   env: 'prod',
 * });
 * ```
 */

// Errors
export { ConfigurationError, ModuleContractError, formatValidationErrors } from './config/errors.js';

// Config tree
export {
  type ConfigScalar,
  type ConfigValue,
  type ConfigMapping,
  type ConfigDocument,
  RESERVED_KEYS,
  isConfigMapping,
  isReservedKey,
} from './config/types.js';

// Templates and variables
export { renderTemplate, type TemplateVariables } from './config/template.js';
export {
  VariableContainer,
  VariableDefinitionSchema,
  VariablesSectionSchema,
  environmentNameFor,
  resolveVariables,
  type VariableDefinition,
  type ProvidedVariables,
} from './config/variables.js';
export { ConfigHelper, type ReadOptions } from './config/helper.js';
export { shouldSkip, type Restriction } from './config/conditions.js';

// Loading
export { mergeIncludes, parseConfigDocument, readDocument } from './config/document.js';
export { processEntities, type PipelineResult } from './config/pipeline.js';
export { loadDeploymentConfig, type LoadOptions, type DeploymentConfig } from './config/loader.js';

// Modules
export {
  ModuleRegistry,
  BUILTIN_MODULES,
  BUILTIN_SOURCE,
  assertEntityModule,
  parseModuleIdentifier,
  type ModuleRegistryOptions,
} from './modules/registry.js';
export type {
  EntityManager,
  EntityModule,
  EntityParser,
  EntityPreprocessor,
  LoadedModules,
  ModuleDescriptor,
  ModuleSource,
  PreprocessedEntity,
} from './modules/types.js';
export { parseEntityConfig } from './modules/validation.js';
export {
  AppDeployment,
  JobDeployment,
  SecretDeployment,
  appModule,
  jobModule,
  secretModule,
} from './modules/builtin/index.js';

// Dependency graph
export {
  DEFAULT_RELATION_KIND,
  type DependencyEdge,
  type DependencyGraph,
  type DependencyReference,
} from './graph/types.js';
export { parseDependencyReference } from './graph/reference.js';
export { buildDependencyGraph } from './graph/builder.js';
export {
  DeploymentOrderResolver,
  resolveDeploymentOrder,
  type DeploymentBatch,
  type DeploymentOrder,
} from './graph/order.js';
