/**
 * Definition file loading shared by the app and job modules
 */

import path from 'path';
import { ConfigurationError } from '../../config/errors.js';
import type { ConfigHelper } from '../../config/helper.js';
import { isConfigMapping, type ConfigMapping } from '../../config/types.js';

const YAML_EXTENSIONS = ['.yml', '.yaml'];

/**
 * Read a JSON or YAML definition file (chosen by extension), rendered with
 * the load's variables plus `extraVars`
 */
export function readDefinition(
  helper: ConfigHelper,
  entityName: string,
  filename: string,
  extraVars: Readonly<Record<string, string>>,
): ConfigMapping {
  const options = { render: true, extraVars };
  const definition = YAML_EXTENSIONS.includes(path.extname(filename).toLowerCase())
    ? helper.readYaml(filename, options)
    : helper.readJson(filename, options);

  if (!isConfigMapping(definition)) {
    throw new ConfigurationError(`Entity "${entityName}": definition ${filename} must contain a mapping`);
  }
  return definition;
}
