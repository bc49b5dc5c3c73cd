#!/usr/bin/env node

/**
 * manifold CLI Entry Point
 *
 * Commands:
 * - plan <config>      - Resolve a config and show entities, dependencies and order
 * - validate <config>  - Resolve a config and report errors
 *
 * Global Options:
 * - --verbose, -v       - Enable detailed output
 * - --no-color          - Disable colored output
 * - --version, -V       - Show version information
 * - --help, -h          - Show help information
 */

import { Command } from 'commander';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import chalk from 'chalk';
import { initLogger, log } from './logger.js';
import { isVerboseEnabled } from './options.js';
import { registerPlanCommand } from './commands/plan.js';
import { registerValidateCommand } from './commands/validate.js';

// Get package.json for version info
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const packageJson: unknown = JSON.parse(readFileSync(join(__dirname, '../../package.json'), 'utf8'));

function packageVersion(): string {
  if (typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson) {
    return String(packageJson.version);
  }
  return '0.0.0';
}

/**
 * Create and configure the CLI program
 */
function createProgram(): Command {
  const program = new Command();

  program
    .name('manifold')
    .description('Resolve declarative deployment configs into deployment objects and a dependency graph')
    .version(packageVersion(), '-V, --version', 'Output the current version');

  program
    .option('-v, --verbose', 'Enable verbose output')
    .option('--no-color', 'Disable colored output')
    .hook('preAction', (thisCommand) => {
      const opts = thisCommand.opts();
      // Commander converts --no-color to color: false
      initLogger({
        verbose: isVerboseEnabled(opts.verbose),
        noColor: opts.color === false,
      });
    });

  registerPlanCommand(program);
  registerValidateCommand(program);

  program.addHelpText(
    'after',
    `
Environment Variables:
  MANIFOLD_LOG_LEVEL      Set log level (error, warn, info, debug)
  MANIFOLD_VERBOSE        Enable verbose mode (true/false)
  VAR_<NAME>              Value for variable <name> without a "from" mapping

Examples:
  $ manifold plan deploy.yml --var env=prod
  $ manifold validate deploy.yml
`,
  );

  return program;
}

/**
 * Global error handler for unhandled errors
 */
function setupErrorHandlers(): void {
  process.on('unhandledRejection', (reason: unknown) => {
    console.error(chalk.red('Unhandled promise rejection:'));
    console.error(reason);
    process.exit(1);
  });

  process.on('uncaughtException', (error: Error) => {
    console.error(chalk.red('Uncaught exception:'));
    console.error(error);
    process.exit(1);
  });
}

async function main(): Promise<void> {
  try {
    setupErrorHandlers();
    await createProgram().parseAsync(process.argv);
  } catch (error) {
    if (error instanceof Error) {
      console.error(chalk.red('Error:'), error.message);
      if (error.stack) {
        log.debug(error.stack);
      }
    } else {
      console.error(chalk.red('Unknown error:'), error);
    }
    process.exit(1);
  }
}

void main();
