/**
 * Context Command
 *
 * Prints the retrieval context the generators would see for a symbol:
 * its nearest neighbours in the vector store.
 *
 * Usage:
 *   docweave context pkg.Foo.bar
 *   docweave context pkg.Foo.bar -k 10 --json
 */

import { Command } from 'commander';
import chalk from 'chalk';

import type { CommandContext, RepoCommandOptions } from '../types.js';
import { openIndex } from '../utils/runtime.js';
import { findRelatedSymbols, renderRetrievalContext } from '../../agent/context-builder.js';
import { ValidationError } from '../../errors/index.js';

interface ContextCommandOptions extends RepoCommandOptions {
  k?: string;
}

function parseK(value: string | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  const k = Number(value);
  if (!Number.isInteger(k) || k < 1) {
    throw new ValidationError(`Invalid -k value: ${value}`, ['Expected a positive integer']);
  }
  return k;
}

/**
 * Create the context command.
 *
 * @param getContext - Factory function to get the command context
 */
export function createContextCommand(getContext: () => CommandContext): Command {
  return new Command('context')
    .description('Show the related symbols retrieved for a qualified name')
    .argument('<qualname>', 'Qualified symbol name, e.g. pkg.Foo.bar')
    .option('-r, --repo <path>', 'Repository root (defaults to the current directory)')
    .option('-k <count>', 'Number of neighbours (defaults to agent.context_top_k)')
    .action(async (qualname: string, cmdOptions: ContextCommandOptions) => {
      const ctx = getContext();
      const runtime = openIndex(ctx, cmdOptions.repo);

      try {
        const k = parseK(cmdOptions.k, runtime.config.agent.context_top_k);
        const hits = await findRelatedSymbols({ qualname, embedder: runtime.embedder, store: runtime.store, k });

        if (ctx.options.json) {
          console.log(
            JSON.stringify(
              {
                qualname,
                related: hits.map((hit) => ({ ...hit.payload, score: hit.score })),
              },
              null,
              2
            )
          );
          return;
        }

        ctx.log(chalk.bold(`Context for ${qualname}`));
        ctx.log(renderRetrievalContext(hits));
      } finally {
        runtime.store.close();
      }
    });
}
