#!/usr/bin/env node
/**
 * docweave CLI Entry Point
 *
 * This is the main entry point for the `docweave` command.
 * It sets up Commander.js with global options and registers all subcommands.
 */

import { createRequire } from 'node:module';
import { Command } from 'commander';
import chalk from 'chalk';

import type { GlobalOptions, CommandContext } from './types.js';
import { createConfigCommand } from './commands/config.js';
import { createContextCommand } from './commands/context.js';
import { createEvaluateCommand } from './commands/evaluate.js';
import { createIndexCommand } from './commands/index.js';
import { createSyncCommand } from './commands/sync.js';
import { handleError, createGlobalErrorHandler, CLIError } from '../errors/index.js';

const require = createRequire(import.meta.url);
// dist/cli/index.js and src/cli/index.ts both sit two levels below package.json
const packageJson: { version: string } = require('../../package.json');
const VERSION = packageJson.version;

// Create the root program
const program = new Command();

program
  .name('docweave')
  .description('Keep generated API documentation in sync with a changing source tree')
  .version(VERSION, '-v, --version', 'Display version number')

  // Global options - available to ALL subcommands
  .option('--verbose', 'Enable verbose output for debugging', false)
  .option('--json', 'Output results as JSON', false)

  .addHelpText('after', `
${chalk.dim('Examples:')}
  ${chalk.cyan('docweave sync')}                      Document symbols changed in the last commit
  ${chalk.cyan('docweave sync --since main')}         Document everything changed since main
  ${chalk.cyan('docweave sync --all --strategy rag')} Full pass with the rag strategy
  ${chalk.cyan('docweave index src/pkg/Foo.py')}      Update the symbol index only
  ${chalk.cyan('docweave context pkg.Foo.bar')}       Show the retrieval context of a symbol
  ${chalk.cyan('docweave evaluate')}                  Judge the generated docs against the code
  ${chalk.cyan('docweave config set llm.model gpt-4o')}
`);

/**
 * Create a command context with logging utilities
 * This is passed to all command handlers
 */
function createContext(options: GlobalOptions): CommandContext {
  return {
    options,
    log: (message: string) => {
      if (!options.json) {
        console.log(message);
      }
    },
    info: (message: string) => {
      if (!options.json) {
        console.log(message);
      }
    },
    debug: (message: string) => {
      if (options.verbose && !options.json) {
        console.log(chalk.dim(`[debug] ${message}`));
      }
    },
    warn: (message: string) => {
      if (!options.json) {
        console.warn(chalk.yellow(`Warning: ${message}`));
      }
    },
    error: (message: string) => {
      if (options.json) {
        console.error(JSON.stringify({ error: message }));
      } else {
        console.error(chalk.red(`Error: ${message}`));
      }
    },
  };
}

/**
 * Get global options from the program
 * Commander stores options on the Command object after parsing
 */
function getGlobalOptions(): GlobalOptions {
  const opts = program.opts<Partial<GlobalOptions>>();
  return {
    verbose: opts.verbose ?? false,
    json: opts.json ?? false,
  };
}

const getContext = (): CommandContext => createContext(getGlobalOptions());

program.addCommand(createSyncCommand(getContext));
program.addCommand(createIndexCommand(getContext));
program.addCommand(createContextCommand(getContext));
program.addCommand(createEvaluateCommand(getContext));
program.addCommand(createConfigCommand(getContext));

// ============================================================================
// ERROR HANDLING & EXECUTION
// ============================================================================

program.on('command:*', (operands: string[]) => {
  throw new CLIError(
    `Unknown command: ${operands[0] ?? ''}`,
    'Run: docweave --help  to see available commands'
  );
});

async function main(): Promise<void> {
  const getErrorOptions = () => {
    const opts = getGlobalOptions();
    return { verbose: opts.verbose, json: opts.json };
  };

  // Errors that escape every try/catch
  const globalHandler = createGlobalErrorHandler(getErrorOptions());
  process.on('uncaughtException', globalHandler);
  process.on('unhandledRejection', globalHandler);

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    handleError(error, getErrorOptions());
  }
}

void main();
