/**
 * Sync Command
 *
 * Re-indexes changed source files and regenerates the documentation of
 * every new or modified symbol.
 *
 * Usage:
 *   docweave sync                       Files changed in the last commit
 *   docweave sync src/pkg/Foo.py        Only the given files
 *   docweave sync --since main          Files changed since a ref
 *   docweave sync --all                 Every source file
 *   docweave sync --strategy rag        Override generation.strategy
 *
 * The pipeline:
 * 1. Indexing - diff symbol hashes against the vector store
 * 2. Generation - document each changed symbol with the chosen strategy
 * 3. Reordering - put each document's sections back in source order
 */

import { Command } from 'commander';
import chalk from 'chalk';

import type { CommandContext, RepoCommandOptions } from '../types.js';
import { openIndex } from '../utils/runtime.js';
import { spinnerLogger, startSpinner } from '../utils/spinner.js';
import { resolveChangedFiles, type ChangeSelectionOptions } from '../utils/changes.js';
import { GenerationStrategySchema, type Config } from '../../config/index.js';
import { ValidationError } from '../../errors/index.js';
import { runSyncPipeline, type SyncSummary } from '../../pipeline/index.js';
import { createLLMProvider } from '../../providers/index.js';

interface SyncCommandOptions extends RepoCommandOptions, ChangeSelectionOptions {
  strategy?: string;
  model?: string;
}

function withStrategy(config: Config, strategy: string | undefined): Config {
  if (strategy === undefined) return config;
  const parsed = GenerationStrategySchema.safeParse(strategy);
  if (!parsed.success) {
    throw new ValidationError(`Unknown strategy: ${strategy}`, [
      `Expected one of: ${GenerationStrategySchema.options.join(', ')}`,
    ]);
  }
  return { ...config, generation: { ...config.generation, strategy: parsed.data } };
}

function printSummary(ctx: CommandContext, summary: SyncSummary): void {
  const { index } = summary;
  ctx.log('');
  ctx.log(chalk.bold('Sync complete'));
  ctx.log(
    `  Symbols:    ${chalk.green(`${index.added.length} added`)}, ${chalk.yellow(`${index.modified.length} modified`)}, ` +
      `${index.unchanged.length} unchanged, ${chalk.red(`${summary.deleted.length} deleted`)}`
  );
  ctx.log(`  Documented: ${summary.documented.length}`);
  if (summary.impactUpdates.length > 0) {
    ctx.log(`  Dependents: ${summary.impactUpdates.length} updated (${summary.impactUpdates.join(', ')})`);
  }
  ctx.log(`  Reordered:  ${summary.reordered.length} document(s)`);
  if (index.skippedFiles.length > 0) {
    ctx.log(chalk.yellow(`  Skipped:    ${index.skippedFiles.join(', ')}`));
  }
  if (summary.failed.length > 0) {
    ctx.log(chalk.red(`  Failed:     ${summary.failed.length}`));
    for (const failure of summary.failed) {
      ctx.log(chalk.red(`    ${failure.symbolId}: ${failure.error}`));
    }
  }
}

/**
 * Create the sync command.
 *
 * @param getContext - Factory function to get the command context
 */
export function createSyncCommand(getContext: () => CommandContext): Command {
  return new Command('sync')
    .description('Regenerate documentation for changed symbols')
    .argument('[files...]', 'Repo-relative source files to sync')
    .option('-r, --repo <path>', 'Repository root (defaults to the current directory)')
    .option('-a, --all', 'Sync every source file instead of the changed ones', false)
    .option('-s, --since <ref>', 'Sync files changed between <ref> and HEAD')
    .option('--strategy <strategy>', 'Generation strategy: agentic, rag or review')
    .option('-m, --model <model>', 'Override llm.model')
    .action(async (files: string[], cmdOptions: SyncCommandOptions) => {
      const ctx = getContext();
      const runtime = openIndex(ctx, cmdOptions.repo);
      let summary: SyncSummary;
      try {
        const config = withStrategy(runtime.config, cmdOptions.strategy);
        const llm = createLLMProvider(config, { model: cmdOptions.model });
        ctx.debug(`LLM: ${llm.name}/${llm.model}, strategy: ${config.generation.strategy}`);

        const changedFiles = resolveChangedFiles(ctx, runtime, files, cmdOptions);
        if (changedFiles !== undefined && changedFiles.length === 0) {
          if (ctx.options.json) {
            console.log(JSON.stringify({ documented: [], failed: [], deleted: [], reordered: [], impactUpdates: [] }));
          } else {
            ctx.log('No changed source files. Pass files, --since <ref> or --all.');
          }
          return;
        }

        const spinner = startSpinner(ctx, 'Indexing symbols...');
        try {
          summary = await runSyncPipeline({
            config,
            repoRoot: runtime.repoRoot,
            changedFiles,
            llm,
            embedder: runtime.embedder,
            store: runtime.store,
            logger: spinnerLogger(ctx, spinner),
            onSymbol: (symbol, index, total) => {
              if (spinner) spinner.text = `Documenting ${symbol.symbolId} (${index + 1}/${total})`;
            },
          });
          spinner?.stop();
        } catch (error) {
          spinner?.fail('Sync failed');
          throw error;
        }
      } finally {
        runtime.store.close();
      }

      if (ctx.options.json) {
        console.log(
          JSON.stringify(
            {
              added: summary.index.added.map((s) => s.symbolId),
              modified: summary.index.modified.map((s) => s.symbolId),
              documented: summary.documented,
              failed: summary.failed,
              deleted: summary.deleted,
              reordered: summary.reordered,
              impactUpdates: summary.impactUpdates,
              skippedFiles: summary.index.skippedFiles,
            },
            null,
            2
          )
        );
        return;
      }
      printSummary(ctx, summary);
    });
}
