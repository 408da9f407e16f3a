/**
 * Evaluation Runner
 *
 * LLM-as-judge pass over generated documentation.
 *
 * Flow:
 * 1. Group source files by the document they write into
 * 2. Extract each file's symbols (classes, functions, methods)
 * 3. Read the document's sections and pair them with the symbols
 * 4. Ask the judge for a critique of every symbol that has a section
 * 5. Summarize
 *
 * A failed judge call or unreadable source marks that pair as failed; the
 * run goes on. Files that do not parse are left out with a warning.
 */

import { readFileSync } from 'node:fs';
import { join } from 'node:path';

import { DOC_EVALUATION_PROMPT, languageVariables } from '../agent/prompts.js';
import { renderTemplate } from '../agent/template.js';
import type { DocumentStore } from '../docs/document-store.js';
import { SymbolParseError } from '../errors/index.js';
import type { SymbolExtractor } from '../indexer/extractor/extractor.js';
import { spanText, splitLines } from '../indexer/extractor/span.js';
import { languageForFile } from '../indexer/scanner.js';
import { isIndexable, type CodeSymbol, type SourceLanguage } from '../indexer/types.js';
import type { LLMProvider } from '../providers/types.js';
import { silentLogger, toPosixRelative, type Logger } from '../utils/index.js';
import { summarizeEvaluation } from './aggregator.js';
import { matchSections, readDocSections, type MatchedPair } from './sections.js';
import type { DocumentEvaluation, EvaluationReport, PairEvaluation } from './types.js';

// ============================================================================
// TYPES
// ============================================================================

export const MISSING_DOC_NOTE = 'Documentation not found for symbol.';
export const EXTRA_DOC_NOTE = 'Extra documentation section found with no corresponding code.';

export interface DocEvaluatorOptions {
  repoRoot: string;
  llm: LLMProvider;
  extractor: SymbolExtractor;
  documents: DocumentStore;
  logger?: Logger;
  /** Called before each judge request */
  onJudge?: (symbolId: string) => void;
  /** Clock for generatedAt */
  now?: () => Date;
}

// ============================================================================
// JUDGE
// ============================================================================

/**
 * Ask the judge how well `doc` describes `code`.
 *
 * @throws whatever the provider throws
 */
export async function judgePair(
  llm: LLMProvider,
  code: string,
  doc: string,
  language: SourceLanguage
): Promise<string> {
  const prompt = renderTemplate(DOC_EVALUATION_PROMPT, { ...languageVariables(language), code, doc });
  const response = await llm.chat([{ role: 'user', content: prompt }], { temperature: 0 });
  return response.content.trim();
}

// ============================================================================
// RUNNER
// ============================================================================

class Evaluation {
  private readonly lineCache = new Map<string, string[]>();
  private readonly logger: Logger;

  constructor(private readonly options: DocEvaluatorOptions) {
    this.logger = options.logger ?? silentLogger;
  }

  /** Indexable symbols of each file in path order, each file in source order */
  symbolsOf(files: readonly string[]): { symbols: CodeSymbol[]; parsed: string[] } {
    const symbols: CodeSymbol[] = [];
    const parsed: string[] = [];
    for (const file of [...files].sort()) {
      try {
        const extracted = this.options.extractor.extractFile(file).filter(isIndexable);
        symbols.push(...extracted.sort((a, b) => a.start - b.start));
        parsed.push(file);
      } catch (error) {
        if (!(error instanceof SymbolParseError)) throw error;
        this.logger.warn(`${error.message}; not evaluated`);
      }
    }
    return { symbols, parsed };
  }

  async evaluatePair(pair: MatchedPair): Promise<PairEvaluation> {
    const { symbol, section } = pair;
    if (symbol === null) {
      return { symbolId: section?.symbolId ?? null, file: null, status: 'extra_doc', critique: EXTRA_DOC_NOTE };
    }
    const base = { symbolId: symbol.symbolId, file: symbol.file };
    if (section === null || section.content === '') {
      return { ...base, status: 'missing_doc', critique: MISSING_DOC_NOTE };
    }

    try {
      const language = languageForFile(symbol.file);
      if (language === null) {
        throw new Error(`Unsupported source file: ${symbol.file}`);
      }
      const code = spanText(this.linesOf(symbol.file), symbol.start, symbol.end);
      this.options.onJudge?.(symbol.symbolId);
      this.logger.debug?.(`Evaluating ${symbol.symbolId}`);
      const critique = await judgePair(this.options.llm, code, section.content, language);
      return { ...base, status: 'evaluated', critique };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Could not evaluate ${symbol.symbolId}: ${message}`);
      return { ...base, status: 'failed', critique: `Evaluation failed: ${message}` };
    }
  }

  private linesOf(file: string): string[] {
    let lines = this.lineCache.get(file);
    if (lines === undefined) {
      lines = splitLines(readFileSync(join(this.options.repoRoot, file), 'utf-8'));
      this.lineCache.set(file, lines);
    }
    return lines;
  }
}

/**
 * Evaluate the documentation of the given source files. Files that share a
 * document are evaluated together against it.
 *
 * @param files repo-relative source files
 *
 * @example
 * const report = await runDocEvaluation(
 *   { repoRoot, llm, extractor, documents, logger: consoleLogger },
 *   ['src/pkg/Foo.py'],
 * );
 * report.summary.evaluated // 1
 */
export async function runDocEvaluation(
  options: DocEvaluatorOptions,
  files: readonly string[]
): Promise<EvaluationReport> {
  const { documents, llm } = options;
  const run = new Evaluation(options);

  const filesByDoc = new Map<string, string[]>();
  for (const file of new Set(files)) {
    const docPath = documents.docPathForSourceFile(file);
    filesByDoc.set(docPath, [...(filesByDoc.get(docPath) ?? []), file]);
  }

  const results: DocumentEvaluation[] = [];
  for (const docPath of [...filesByDoc.keys()].sort()) {
    const { symbols, parsed } = run.symbolsOf(filesByDoc.get(docPath) ?? []);
    if (parsed.length === 0) continue;

    const { strategy, pairs } = matchSections(symbols, readDocSections(documents, docPath));
    const evaluated: PairEvaluation[] = [];
    for (const pair of pairs) {
      evaluated.push(await run.evaluatePair(pair));
    }
    results.push({
      docPath: toPosixRelative(options.repoRoot, docPath),
      sources: parsed,
      strategy,
      pairs: evaluated,
    });
  }

  return {
    generatedAt: (options.now?.() ?? new Date()).toISOString(),
    judge: `${llm.name}/${llm.model}`,
    documents: results,
    summary: summarizeEvaluation(results),
  };
}
