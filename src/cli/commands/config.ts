/**
 * Config Command
 *
 * Manages <repo>/.docweave/config.toml via CLI:
 *   docweave config get <key>          - Get a specific value
 *   docweave config set <key> <value>  - Set a value
 *   docweave config list               - Show all configuration
 *   docweave config init               - Write a commented template
 *   docweave config path               - Show config file location
 */

import { Command } from 'commander';
import chalk from 'chalk';

import {
  getConfigPath,
  getConfigValue,
  initConfig,
  listConfig,
  loadConfig,
  setConfigValue,
} from '../../config/index.js';
import type { CommandContext, RepoCommandOptions } from '../types.js';
import { openRepo, resolveRepoRoot } from '../utils/runtime.js';

/**
 * Create the config command with all subcommands
 */
export function createConfigCommand(getContext: () => CommandContext): Command {
  const configCmd = new Command('config')
    .description('Manage repository configuration')
    .option('-r, --repo <path>', 'Repository root (defaults to the current directory)');

  const repoOption = (): string | undefined => configCmd.opts<RepoCommandOptions>().repo;

  // docweave config get <key>
  configCmd
    .command('get <key>')
    .description('Get a configuration value (e.g., docweave config get llm.model)')
    .action((key: string) => {
      const ctx = getContext();
      const { config } = openRepo(ctx, repoOption());
      const value = getConfigValue(config, key);

      if (value === undefined) {
        ctx.error(`Unknown config key: ${key}`);
        ctx.log('');
        ctx.log(`Run ${chalk.cyan('docweave config list')} to see all available keys.`);
        process.exitCode = 1;
        return;
      }

      if (ctx.options.json) {
        console.log(JSON.stringify({ key, value }));
      } else {
        ctx.log(formatValue(value));
      }
    });

  // docweave config set <key> <value>
  configCmd
    .command('set <key> <value>')
    .description('Set a configuration value (e.g., docweave config set agent.max_steps 8)')
    .action((key: string, value: string) => {
      const ctx = getContext();
      const repoRoot = resolveRepoRoot(ctx, repoOption());
      setConfigValue(repoRoot, key, value);
      const stored = getConfigValue(loadConfig(repoRoot), key);

      if (ctx.options.json) {
        console.log(JSON.stringify({ success: true, key, value: stored }));
      } else {
        ctx.log(`${chalk.green('✓')} Set ${chalk.cyan(key)} = ${chalk.yellow(formatValue(stored))}`);
      }
    });

  // docweave config list
  configCmd
    .command('list')
    .alias('ls')
    .description('List all configuration values')
    .action(() => {
      const ctx = getContext();
      const { config, repoRoot } = openRepo(ctx, repoOption());
      const entries = listConfig(config);

      if (ctx.options.json) {
        console.log(JSON.stringify(Object.fromEntries(entries), null, 2));
        return;
      }

      ctx.log(chalk.bold('Configuration:'));
      ctx.log('');

      // Group by top-level key for readability
      let currentGroup = '';
      for (const [key, value] of entries) {
        const group = key.split('.')[0] ?? '';
        if (group !== currentGroup) {
          if (currentGroup !== '') ctx.log('');
          currentGroup = group;
        }
        ctx.log(`  ${chalk.cyan(key)} = ${chalk.yellow(formatValue(value))}`);
      }

      ctx.log('');
      ctx.log(chalk.dim(`Config file: ${getConfigPath(repoRoot)}`));
    });

  // docweave config init
  configCmd
    .command('init')
    .description('Write a commented config.toml with the defaults')
    .option('-f, --force', 'Overwrite an existing file', false)
    .action((options: { force: boolean }) => {
      const ctx = getContext();
      const repoRoot = resolveRepoRoot(ctx, repoOption());
      const path = initConfig(repoRoot, options.force);

      if (ctx.options.json) {
        console.log(JSON.stringify({ success: true, path }));
      } else {
        ctx.log(`${chalk.green('✓')} Wrote ${path}`);
      }
    });

  // docweave config path
  configCmd
    .command('path')
    .description('Show the config file location')
    .action(() => {
      const ctx = getContext();
      const configPath = getConfigPath(resolveRepoRoot(ctx, repoOption()));

      if (ctx.options.json) {
        console.log(JSON.stringify({ path: configPath }));
      } else {
        ctx.log(configPath);
      }
    });

  return configCmd;
}

/**
 * Format a value for display
 */
export function formatValue(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  if (typeof value === 'number') return String(value);
  return JSON.stringify(value);
}
