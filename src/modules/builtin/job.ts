/**
 * Job entities: a scheduled or one-off job described by a definition file
 */

import { z } from 'zod';
import type { ConfigHelper } from '../../config/helper.js';
import type { ConfigMapping } from '../../config/types.js';
import type { EntityManager, EntityModule } from '../types.js';
import { ExtraVarsSchema, parseEntityConfig } from '../validation.js';
import { readDefinition } from './definition.js';

const JobConfigSchema = z.object({
  path: z.string().min(1).optional(),
  definition: z.string().min(1),
  extra_vars: ExtraVarsSchema.default({}),
});

export class JobDeployment {
  constructor(
    public readonly name: string,
    public readonly jobId: string,
    public readonly definition: ConfigMapping,
  ) {}
}

export class JobsManager implements EntityManager {
  describe(deploymentObject: unknown): string {
    if (!(deploymentObject instanceof JobDeployment)) {
      return 'unknown job object';
    }
    return `job ${deploymentObject.jobId}`;
  }
}

export function parseJobConfig(name: string, config: ConfigMapping, helper: ConfigHelper): JobDeployment {
  const job = parseEntityConfig(JobConfigSchema, name, config);
  const definition = readDefinition(helper, name, job.definition, job.extra_vars);

  let jobId: string;
  if (job.path !== undefined) {
    jobId = helper.render(job.path, job.extra_vars);
  } else if (typeof definition.id === 'string') {
    jobId = definition.id;
  } else {
    jobId = name;
  }

  return new JobDeployment(name, jobId, { ...definition, id: jobId });
}

export const jobModule: EntityModule<JobDeployment> = {
  configKey: 'jobs',
  sectionType: 'job',
  createManager: () => new JobsManager(),
  parse: parseJobConfig,
};
