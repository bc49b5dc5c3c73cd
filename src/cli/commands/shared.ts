/**
 * Helpers shared by the commands that load a config document
 */

import { ConfigurationError, ModuleContractError } from '../../config/errors.js';
import { loadDeploymentConfig, type DeploymentConfig } from '../../config/loader.js';
import { log } from '../logger.js';
import { parseVariableAssignments, resolvePath, ValidationError } from '../options.js';
import { loadPluginSources } from '../plugins.js';

export const EXIT_CONFIG_ERROR = 1;
export const EXIT_USAGE_ERROR = 2;
export const EXIT_MODULE_ERROR = 3;

export interface LoadCommandOptions {
  var?: string[];
  plugin?: string[];
}

/**
 * Load a config document the way every command does: --var assignments,
 * then plugin files, then the synchronous resolution pass
 */
export async function loadFromOptions(
  configPath: string,
  options: LoadCommandOptions,
): Promise<DeploymentConfig> {
  const documentPath = resolvePath(configPath, true);
  const variables = parseVariableAssignments(options.var);
  const sources = await loadPluginSources(options.plugin ?? []);

  log.debug(`Variables provided: ${Object.keys(variables).join(', ') || '(none)'}`);
  return loadDeploymentConfig(documentPath, variables, { sources });
}

/**
 * Report known errors and exit with a code telling config problems
 * (1) from usage problems (2) and module defects (3). Unknown errors are rethrown.
 */
export function exitOnKnownError(error: unknown): never {
  if (error instanceof ValidationError) {
    log.error(error.message);
    if (error.suggestion) {
      log.info(`Suggestion: ${error.suggestion}`);
    }
    process.exit(EXIT_USAGE_ERROR);
  }

  if (error instanceof ConfigurationError) {
    log.error(`Configuration error: ${error.message}`);
    if (error.suggestion) {
      log.info(`Suggestion: ${error.suggestion}`);
    }
    process.exit(EXIT_CONFIG_ERROR);
  }

  if (error instanceof ModuleContractError) {
    log.error(`Module error: ${error.message}`);
    log.info('The entity-type module is defective; the configuration itself may be fine');
    process.exit(EXIT_MODULE_ERROR);
  }

  throw error;
}
