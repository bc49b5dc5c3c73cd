/**
 * App entities
 *
 * A single block can fan out into one app per variant:
 *
 * ```yaml
 * web:
 *   type: app
 *   definition: apps/web.json
 *   variants:
 *     blue: { extra_vars: { color: blue } }
 *     green:
 *       extra_vars: { color: green }
 *       only: { env: prod }
 * ```
 *
 * yields the entities `web-blue` and `web-green`. The variant suffix is
 * available to templates as `{{variant}}`.
 */

import { z } from 'zod';
import type { ConfigHelper } from '../../config/helper.js';
import type { ConfigMapping } from '../../config/types.js';
import type { EntityManager, EntityModule, PreprocessedEntity } from '../types.js';
import { ExtraVarsSchema, RestrictionSchema, ScalarSchema, parseEntityConfig } from '../validation.js';
import { readDefinition } from './definition.js';

const AppConfigSchema = z.object({
  path: z.string().min(1).optional(),
  definition: z.string().min(1),
  extra_vars: ExtraVarsSchema.default({}),
});

const VariantSchema = z
  .object({
    extra_vars: z.record(z.string(), ScalarSchema).optional(),
    only: RestrictionSchema.optional(),
    except: RestrictionSchema.optional(),
  })
  .nullable();

const VariantsConfigSchema = z.object({
  extra_vars: z.record(z.string(), ScalarSchema).optional(),
  variants: z.record(z.string().min(1), VariantSchema).optional(),
});

export class AppDeployment {
  constructor(
    public readonly name: string,
    public readonly appId: string,
    public readonly definition: ConfigMapping,
  ) {}
}

export class AppsManager implements EntityManager {
  describe(deploymentObject: unknown): string {
    if (!(deploymentObject instanceof AppDeployment)) {
      return 'unknown app object';
    }
    const instances = deploymentObject.definition.instances;
    return typeof instances === 'number'
      ? `app ${deploymentObject.appId} (${instances} instances)`
      : `app ${deploymentObject.appId}`;
  }
}

/**
 * Expand `variants` into one entity per suffix. Variant restrictions
 * replace the block's own; extra_vars are merged over the block's.
 */
export function preprocessAppConfig(name: string, config: ConfigMapping): PreprocessedEntity[] {
  const { variants, extra_vars: baseExtraVars } = parseEntityConfig(VariantsConfigSchema, name, config);
  if (!variants) {
    return [{ name, config }];
  }

  const { variants: _variants, ...base } = config;

  return Object.entries(variants).map(([suffix, variant]) => {
    const extraVars: ConfigMapping = { variant: suffix, ...baseExtraVars, ...variant?.extra_vars };

    const entityConfig: ConfigMapping = { ...base, extra_vars: extraVars };
    if (variant?.only) {
      entityConfig.only = variant.only;
    }
    if (variant?.except) {
      entityConfig.except = variant.except;
    }

    return { name: `${name}-${suffix}`, config: entityConfig };
  });
}

export function parseAppConfig(name: string, config: ConfigMapping, helper: ConfigHelper): AppDeployment {
  const app = parseEntityConfig(AppConfigSchema, name, config);
  const definition = readDefinition(helper, name, app.definition, app.extra_vars);

  let appId: string;
  if (app.path !== undefined) {
    appId = helper.render(app.path, app.extra_vars);
  } else if (typeof definition.id === 'string') {
    appId = definition.id;
  } else {
    appId = `/${name}`;
  }

  return new AppDeployment(name, appId, { ...definition, id: appId });
}

export const appModule: EntityModule<AppDeployment> = {
  configKey: 'apps',
  sectionType: 'app',
  createManager: () => new AppsManager(),
  parse: parseAppConfig,
  preprocess: preprocessAppConfig,
};
