/**
 * Secret entities
 *
 * ```yaml
 * db-password:
 *   type: secret
 *   path: "{{env}}/db/password"
 *   file: secrets/db-password.txt
 * ```
 */

import { z } from 'zod';
import type { ConfigHelper } from '../../config/helper.js';
import type { ConfigMapping } from '../../config/types.js';
import type { EntityManager, EntityModule } from '../types.js';
import { parseEntityConfig } from '../validation.js';

const SecretConfigSchema = z
  .object({
    path: z.string().min(1),
    value: z.string().optional(),
    file: z.string().min(1).optional(),
    render: z.boolean().default(false),
  })
  .refine((config) => (config.value === undefined) !== (config.file === undefined), {
    message: 'exactly one of value or file is required',
  });

export class SecretDeployment {
  constructor(
    public readonly name: string,
    public readonly path: string,
    public readonly value: string,
  ) {}
}

export class SecretsManager implements EntityManager {
  describe(deploymentObject: unknown): string {
    if (!(deploymentObject instanceof SecretDeployment)) {
      return 'unknown secret object';
    }
    return `secret ${deploymentObject.path} (${deploymentObject.value.length} bytes)`;
  }
}

export function parseSecretConfig(name: string, config: ConfigMapping, helper: ConfigHelper): SecretDeployment {
  const secret = parseEntityConfig(SecretConfigSchema, name, config);
  const secretPath = helper.render(secret.path);

  const value =
    secret.file !== undefined
      ? helper.readFile(secret.file, { render: secret.render })
      : helper.render(secret.value ?? '');

  return new SecretDeployment(name, secretPath, value);
}

export const secretModule: EntityModule<SecretDeployment> = {
  configKey: 'secrets',
  sectionType: 'secret',
  createManager: () => new SecretsManager(),
  parse: parseSecretConfig,
};
