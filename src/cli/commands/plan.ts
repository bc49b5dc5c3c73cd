/**
 * Plan Command - Show the resolved entities, their dependencies and a
 * deployment order, without deploying anything
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { DeploymentConfig } from '../../config/loader.js';
import { resolveDeploymentOrder, type DeploymentBatch } from '../../graph/order.js';
import { log } from '../logger.js';
import { collect } from '../options.js';
import { EXIT_CONFIG_ERROR, exitOnKnownError, loadFromOptions, type LoadCommandOptions } from './shared.js';

export interface PlanOptions extends LoadCommandOptions {
  json?: boolean;
}

export interface PlannedEntity {
  name: string;
  manager: string;
  summary: string;
}

export interface PlannedDependency {
  name: string;
  kind: string;
}

export interface PlanSummary {
  entities: PlannedEntity[];
  dependencies: Record<string, PlannedDependency[]>;
  batches: DeploymentBatch[];
  cycles: string[][];
  variables: Readonly<Record<string, string | null>>;
}

/**
 * Summarize a resolved config for display
 */
export function buildPlan(config: DeploymentConfig): PlanSummary {
  const entities: PlannedEntity[] = [];
  for (const [name, deploymentObject] of config.deploymentObjects) {
    const manager = config.entityManagers.get(name) ?? 'unknown';
    const summary = config.managers.get(manager)?.describe(deploymentObject) ?? '';
    entities.push({ name, manager, summary });
  }

  const dependencies: Record<string, PlannedDependency[]> = {};
  for (const [name, edges] of config.dependencies) {
    dependencies[name] = edges.map((edge) => ({ name: edge.name, kind: edge.kind }));
  }

  const { batches, cycles } = resolveDeploymentOrder(config.deploymentObjects.keys(), config.dependencies);

  return { entities, dependencies, batches, cycles, variables: config.variables.toRecord() };
}

function printPlan(plan: PlanSummary): void {
  const rule = chalk.gray('─'.repeat(50));

  console.log('\n' + chalk.bold('Deployment Plan'));
  console.log(rule);

  console.log(chalk.bold(`Entities (${plan.entities.length})`));
  for (const entity of plan.entities) {
    console.log(`  ${chalk.cyan(entity.name)} [${entity.manager}] ${entity.summary}`);
  }

  const dependents = Object.entries(plan.dependencies);
  if (dependents.length > 0) {
    console.log(chalk.bold('Dependencies'));
    for (const [name, edges] of dependents) {
      for (const edge of edges) {
        console.log(`  ${name} → ${edge.name} (${edge.kind})`);
      }
    }
  }

  console.log(chalk.bold('Order'));
  for (const batch of plan.batches) {
    console.log(`  ${batch.batchNumber + 1}. ${batch.entities.join(', ')}`);
  }
  console.log(rule + '\n');
}

/**
 * Execute the plan command
 */
export async function planCommand(configPath: string, options: PlanOptions): Promise<void> {
  log.debug('Plan command invoked');

  let plan: PlanSummary;
  try {
    plan = buildPlan(await loadFromOptions(configPath, options));
  } catch (error) {
    exitOnKnownError(error);
  }

  if (options.json) {
    console.log(JSON.stringify(plan, null, 2));
  } else {
    printPlan(plan);
  }

  if (plan.cycles.length > 0) {
    for (const cycle of plan.cycles) {
      log.error(`Dependency cycle: ${cycle.join(' → ')}`);
    }
    process.exit(EXIT_CONFIG_ERROR);
  }
}

/**
 * Register the plan command with Commander
 */
export function registerPlanCommand(program: Command): void {
  program
    .command('plan')
    .description('Resolve a deployment config and show what would be deployed')
    .argument('<config>', 'Path to the root config document')
    .option('--var <name=value>', 'Provide a variable (repeatable)', collect, [])
    .option('--plugin <file>', 'Load entity-type modules from a file (repeatable)', collect, [])
    .option('--json', 'Output in JSON format')
    .action(planCommand)
    .addHelpText(
      'after',
      `
Examples:
  $ manifold plan deploy.yml
  $ manifold plan deploy.yml --var env=prod --json
  $ manifold plan deploy.yml --plugin ./plugins/queues.js

Output Information:
  - Entities with their manager and a short summary
  - Dependency edges and relation kinds
  - Batches in which entities can be deployed
`,
    );
}
