import type { EntityModule } from '../types.js';
import { appModule } from './app.js';
import { jobModule } from './job.js';
import { secretModule } from './secret.js';

export { AppDeployment, AppsManager, appModule, parseAppConfig, preprocessAppConfig } from './app.js';
export { JobDeployment, JobsManager, jobModule, parseJobConfig } from './job.js';
export { SecretDeployment, SecretsManager, secretModule, parseSecretConfig } from './secret.js';

export const builtinModules: Readonly<Record<string, EntityModule>> = {
  secret: secretModule,
  job: jobModule,
  app: appModule,
};
