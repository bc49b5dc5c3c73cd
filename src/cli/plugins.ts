/**
 * Plugin file loading
 *
 * A plugin file exports `modules` (or a default export) mapping module
 * names to EntityModule objects. Each file becomes a module source named
 * after the file, so `modules: ["<file-name>:<module>"]` in a config
 * document selects from it.
 */

import path from 'path';
import { pathToFileURL } from 'url';
import { ConfigurationError } from '../config/errors.js';
import { assertEntityModule } from '../modules/registry.js';
import type { EntityModule, ModuleSource } from '../modules/types.js';
import { log } from './logger.js';
import { resolvePath } from './options.js';

function pickExports(namespace: unknown): unknown {
  if (typeof namespace !== 'object' || namespace === null) {
    return undefined;
  }
  if ('modules' in namespace) {
    return namespace.modules;
  }
  if ('default' in namespace) {
    return namespace.default;
  }
  return undefined;
}

export function pluginSourceName(file: string): string {
  return path.basename(file, path.extname(file));
}

/**
 * Build a module source from the exports of a plugin file
 *
 * @throws ConfigurationError if nothing usable is exported
 * @throws ModuleContractError if an exported module violates the contract
 */
export function toModuleSource(name: string, namespace: unknown): ModuleSource {
  const exported = pickExports(namespace);
  if (typeof exported !== 'object' || exported === null || Array.isArray(exported)) {
    throw new ConfigurationError(
      `Plugin ${name} exports no modules`,
      'Export `modules` as an object mapping module names to entity modules',
    );
  }

  const modules: Record<string, EntityModule> = {};
  for (const [moduleName, entityModule] of Object.entries(exported)) {
    assertEntityModule(entityModule, `${name}:${moduleName}`);
    modules[moduleName] = entityModule;
  }

  return { name, modules };
}

/**
 * Import plugin files, in order, before the (synchronous) load starts
 */
export async function loadPluginSources(files: readonly string[]): Promise<ModuleSource[]> {
  const sources: ModuleSource[] = [];

  for (const file of files) {
    const resolved = resolvePath(file, true);
    let namespace: unknown;
    try {
      namespace = await import(pathToFileURL(resolved).href);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConfigurationError(`Could not load plugin ${file}: ${reason}`);
    }

    const source = toModuleSource(pluginSourceName(file), namespace);
    log.debug(`Loaded plugin ${resolved} (${Object.keys(source.modules).join(', ')})`);
    sources.push(source);
  }

  return sources;
}
