/**
 * Validate Command - Resolve a config document and report whether it loads
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { log } from '../logger.js';
import { collect } from '../options.js';
import { exitOnKnownError, loadFromOptions, type LoadCommandOptions } from './shared.js';

export type ValidateOptions = LoadCommandOptions;

/**
 * Execute the validate command
 */
export async function validateCommand(configPath: string, options: ValidateOptions): Promise<void> {
  log.debug('Validate command invoked');

  try {
    const config = await loadFromOptions(configPath, options);
    console.log(
      chalk.green('✓') +
        ` ${configPath} is valid: ${config.deploymentObjects.size} entities, ` +
        `${config.managers.size} managers`,
    );
  } catch (error) {
    exitOnKnownError(error);
  }
}

/**
 * Register the validate command with Commander
 */
export function registerValidateCommand(program: Command): void {
  program
    .command('validate')
    .description('Resolve a deployment config and report errors')
    .argument('<config>', 'Path to the root config document')
    .option('--var <name=value>', 'Provide a variable (repeatable)', collect, [])
    .option('--plugin <file>', 'Load entity-type modules from a file (repeatable)', collect, [])
    .action(validateCommand)
    .addHelpText(
      'after',
      `
Examples:
  $ manifold validate deploy.yml
  $ manifold validate deploy.yml --var env=prod

Exit Codes:
  0  Config resolves
  1  Configuration error
  2  Invalid command-line input
  3  Defective entity-type module
`,
    );
}
