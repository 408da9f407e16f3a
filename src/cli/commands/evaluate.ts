/**
 * Evaluate Command
 *
 * Has the model judge how well each documentation section describes the
 * symbol it belongs to, and writes a report.
 *
 * Usage:
 *   docweave evaluate                       Every source file with a document
 *   docweave evaluate src/pkg/Foo.py        Only the given files
 *   docweave evaluate --format json -o eval.json
 */

import { existsSync } from 'node:fs';
import { isAbsolute, relative, resolve } from 'node:path';
import { Command } from 'commander';
import chalk from 'chalk';

import type { CommandContext, RepoCommandOptions } from '../types.js';
import { openRepo, type RepoRuntime } from '../utils/runtime.js';
import { spinnerLogger, startSpinner } from '../utils/spinner.js';
import { DocumentStore } from '../../docs/document-store.js';
import { ValidationError } from '../../errors/index.js';
import {
  ReportFormatSchema,
  runDocEvaluation,
  writeEvaluationReport,
  type EvaluationReport,
  type ReportFormat,
} from '../../eval/index.js';
import { TreeSitterSymbolExtractor } from '../../indexer/extractor/index.js';
import { collectSourceFiles, createSourceFileFilter, resolvePackageRoot } from '../../indexer/scanner.js';
import { createLLMProvider } from '../../providers/index.js';

interface EvaluateCommandOptions extends RepoCommandOptions {
  model?: string;
  output?: string;
  format?: string;
}

function parseFormat(value: string | undefined): ReportFormat {
  const parsed = ReportFormatSchema.safeParse(value ?? 'text');
  if (!parsed.success) {
    throw new ValidationError(`Unknown report format: ${value}`, ['Expected text or json']);
  }
  return parsed.data;
}

/**
 * Listed files that a sync would cover, or every source file whose
 * document exists.
 */
async function selectFiles(
  ctx: CommandContext,
  runtime: RepoRuntime,
  documents: DocumentStore,
  files: readonly string[]
): Promise<string[]> {
  const { repoRoot, config, paths } = runtime;
  const packageRoot = resolvePackageRoot(paths.sourceRoot);
  const scanOptions = { extensions: config.indexing.extensions, ignorePatterns: config.indexing.ignore_patterns };

  if (files.length > 0) {
    const inScope = createSourceFileFilter(repoRoot, packageRoot, scanOptions);
    const listed = files.map((file) => (isAbsolute(file) ? relative(repoRoot, file) : file).split('\\').join('/'));
    for (const file of listed.filter((f) => !inScope(f))) {
      ctx.warn(`Not a source file for this repository: ${file}`);
    }
    return listed.filter(inScope);
  }

  const all = await collectSourceFiles(repoRoot, packageRoot, scanOptions);
  return all.filter((file) => existsSync(documents.docPathForSourceFile(file)));
}

function printSummary(ctx: CommandContext, report: EvaluationReport, outputPath: string): void {
  const { summary } = report;
  ctx.log('');
  ctx.log(chalk.bold('Evaluation complete'));
  ctx.log(`  Documents: ${summary.documents}`);
  ctx.log(`  Evaluated: ${chalk.green(String(summary.evaluated))}`);
  if (summary.missingDocs > 0) ctx.log(chalk.yellow(`  Missing:   ${summary.missingDocs}`));
  if (summary.extraDocs > 0) ctx.log(chalk.yellow(`  Extra:     ${summary.extraDocs}`));
  if (summary.failed > 0) ctx.log(chalk.red(`  Failed:    ${summary.failed}`));
  ctx.log(`  Report:    ${outputPath}`);
}

/**
 * Create the evaluate command.
 *
 * @param getContext - Factory function to get the command context
 */
export function createEvaluateCommand(getContext: () => CommandContext): Command {
  return new Command('evaluate')
    .description('Judge generated documentation against the source it describes')
    .argument('[files...]', 'Repo-relative source files to evaluate')
    .option('-r, --repo <path>', 'Repository root (defaults to the current directory)')
    .option('-m, --model <model>', 'Override llm.model for the judge')
    .option('-o, --output <path>', 'Report path (defaults to .docweave/evaluation_summary.txt, or .json)')
    .option('-f, --format <format>', 'Report format: text or json', 'text')
    .action(async (files: string[], cmdOptions: EvaluateCommandOptions) => {
      const ctx = getContext();
      const format = parseFormat(cmdOptions.format);
      const runtime = openRepo(ctx, cmdOptions.repo);
      const { repoRoot, config, paths } = runtime;
      const llm = createLLMProvider(config, { model: cmdOptions.model });
      ctx.debug(`Judge: ${llm.name}/${llm.model}`);

      const packageRoot = resolvePackageRoot(paths.sourceRoot);
      const documents = new DocumentStore({ docsRoot: paths.docsRoot, repoRoot, packageRoot, logger: ctx });
      const targets = await selectFiles(ctx, runtime, documents, files);
      if (targets.length === 0) {
        ctx.log('No documented source files to evaluate. Run docweave sync first.');
        return;
      }

      const spinner = startSpinner(ctx, 'Evaluating documentation...');
      let report: EvaluationReport;
      try {
        report = await runDocEvaluation(
          {
            repoRoot,
            llm,
            extractor: new TreeSitterSymbolExtractor(repoRoot, packageRoot),
            documents,
            logger: spinnerLogger(ctx, spinner),
            onJudge: (symbolId) => {
              if (spinner) spinner.text = `Evaluating ${symbolId}`;
            },
          },
          targets
        );
        spinner?.stop();
      } catch (error) {
        spinner?.fail('Evaluation failed');
        throw error;
      }

      const defaultPath = format === 'json' ? paths.evaluationReport.replace(/\.txt$/, '.json') : paths.evaluationReport;
      const outputPath = cmdOptions.output ? resolve(repoRoot, cmdOptions.output) : defaultPath;
      writeEvaluationReport(report, outputPath, format);

      if (ctx.options.json) {
        console.log(JSON.stringify({ ...report, output: outputPath }, null, 2));
        return;
      }
      printSummary(ctx, report, outputPath);
    });
}
