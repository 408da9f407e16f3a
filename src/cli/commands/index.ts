/**
 * Index Command
 *
 * Runs only the symbol indexer: diffs symbol hashes against the vector
 * store, embeds what changed and removes what disappeared. No
 * documentation is written.
 *
 * Usage:
 *   docweave index                  Files changed in the last commit
 *   docweave index src/pkg/Foo.py   Only the given files
 *   docweave index --all            Every source file
 *   docweave index --json           Machine-readable classification
 */

import { Command } from 'commander';
import chalk from 'chalk';

import type { CommandContext, RepoCommandOptions } from '../types.js';
import { openIndex } from '../utils/runtime.js';
import { startSpinner } from '../utils/spinner.js';
import { resolveChangedFiles, type ChangeSelectionOptions } from '../utils/changes.js';
import { TreeSitterSymbolExtractor } from '../../indexer/extractor/index.js';
import { resolvePackageRoot } from '../../indexer/scanner.js';
import { runSymbolIndexer } from '../../indexer/symbol-indexer.js';
import type { CodeSymbol, IndexResult } from '../../indexer/types.js';

type IndexCommandOptions = RepoCommandOptions & ChangeSelectionOptions;

const ids = (symbols: readonly CodeSymbol[]): string[] => symbols.map((s) => s.symbolId);

function printResult(ctx: CommandContext, result: IndexResult): void {
  ctx.log(chalk.bold(`Indexed ${result.changedFiles.length} file(s)`));
  for (const symbol of result.added) ctx.log(`  ${chalk.green('+')} ${symbol.symbolId}`);
  for (const symbol of result.modified) ctx.log(`  ${chalk.yellow('~')} ${symbol.symbolId}`);
  for (const id of result.deletedIds) ctx.log(`  ${chalk.red('-')} ${id}`);
  ctx.log(chalk.dim(`  ${result.unchanged.length} unchanged`));
  if (result.skippedFiles.length > 0) {
    ctx.log(chalk.yellow(`  Skipped (parse errors): ${result.skippedFiles.join(', ')}`));
  }
}

/**
 * Create the index command.
 *
 * @param getContext - Factory function to get the command context
 */
export function createIndexCommand(getContext: () => CommandContext): Command {
  return new Command('index')
    .description('Update the symbol index without generating documentation')
    .argument('[files...]', 'Repo-relative source files to index')
    .option('-r, --repo <path>', 'Repository root (defaults to the current directory)')
    .option('-a, --all', 'Index every source file instead of the changed ones', false)
    .option('-s, --since <ref>', 'Index files changed between <ref> and HEAD')
    .action(async (files: string[], cmdOptions: IndexCommandOptions) => {
      const ctx = getContext();
      const runtime = openIndex(ctx, cmdOptions.repo);
      const { config, paths, repoRoot } = runtime;
      const packageRoot = resolvePackageRoot(paths.sourceRoot);

      const spinner = startSpinner(ctx, 'Indexing symbols...');
      let result: IndexResult;
      try {
        result = await runSymbolIndexer({
          repoRoot,
          scanRoot: packageRoot,
          changedFiles: resolveChangedFiles(ctx, runtime, files, cmdOptions),
          extractor: new TreeSitterSymbolExtractor(repoRoot, packageRoot),
          embedder: runtime.embedder,
          store: runtime.store,
          extensions: config.indexing.extensions,
          ignorePatterns: config.indexing.ignore_patterns,
          scrollLimit: config.store.scroll_limit,
          logger: ctx,
        });
        spinner?.stop();
      } catch (error) {
        spinner?.fail('Indexing failed');
        throw error;
      } finally {
        runtime.store.close();
      }

      if (ctx.options.json) {
        console.log(
          JSON.stringify(
            {
              files: result.changedFiles,
              added: ids(result.added),
              modified: ids(result.modified),
              unchanged: ids(result.unchanged),
              deleted: result.deletedIds,
              skippedFiles: result.skippedFiles,
            },
            null,
            2
          )
        );
        return;
      }
      printResult(ctx, result);
    });
}
