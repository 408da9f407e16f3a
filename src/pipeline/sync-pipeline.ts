/**
 * Sync Pipeline
 *
 * One end-to-end run: index the changed files, document every new or
 * modified symbol, apply impact instructions, then reorder each touched
 * document to match source order.
 *
 * Failures are isolated. A symbol that cannot be documented is logged and
 * skipped; a document that cannot be written skips the rest of that file.
 */

import { readFileSync } from 'node:fs';
import { join } from 'node:path';

import { FileAuditLog, type AuditLog } from '../agent/audit-log.js';
import { buildRetrievalContext } from '../agent/context-builder.js';
import { createDefaultTools } from '../agent/tools/index.js';
import type { ImpactInstruction } from '../agent/types.js';
import { resolveRepoPaths, type RepoPaths } from '../config/paths.js';
import type { Config } from '../config/schema.js';
import { DocumentStore } from '../docs/document-store.js';
import { DocumentWriteError } from '../errors/index.js';
import type { EmbeddingProvider } from '../indexer/embedder/types.js';
import { TreeSitterSymbolExtractor, type SymbolExtractor } from '../indexer/extractor/extractor.js';
import { spanText, splitLines } from '../indexer/extractor/span.js';
import { collectSourceFiles, languageForFile, resolvePackageRoot } from '../indexer/scanner.js';
import { runSymbolIndexer } from '../indexer/symbol-indexer.js';
import type { CodeSymbol, SourceLanguage } from '../indexer/types.js';
import type { LLMProvider } from '../providers/types.js';
import type { VectorStore } from '../store/types.js';
import { silentLogger, type Logger } from '../utils/index.js';
import { JsonlFailureLog, type FailureLog } from './review-loop.js';
import { createStrategy } from './strategies.js';
import type { GenerationStrategy, SymbolFailure, SyncSummary } from './types.js';

// ============================================================================
// TYPES
// ============================================================================

export interface SyncPipelineOptions {
  config: Config;
  repoRoot: string;
  /** Repo-relative files to sync; a full pass when omitted */
  changedFiles?: readonly string[];
  llm: LLMProvider;
  embedder: EmbeddingProvider;
  store: VectorStore;
  extractor?: SymbolExtractor;
  documents?: DocumentStore;
  /** Overrides generation.strategy */
  strategy?: GenerationStrategy;
  auditLog?: AuditLog;
  failureLog?: FailureLog;
  logger?: Logger;
  /** Called before each symbol is generated */
  onSymbol?: (symbol: CodeSymbol, index: number, total: number) => void;
}

// ============================================================================
// HELPERS
// ============================================================================

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Group symbols by file (first-seen file order) and sort each group by start.
 */
export function groupByFile(symbols: readonly CodeSymbol[]): Map<string, CodeSymbol[]> {
  const groups = new Map<string, CodeSymbol[]>();
  for (const symbol of symbols) {
    const group = groups.get(symbol.file);
    if (group) {
      group.push(symbol);
    } else {
      groups.set(symbol.file, [symbol]);
    }
  }
  for (const group of groups.values()) {
    group.sort((a, b) => a.start - b.start);
  }
  return groups;
}

/**
 * Symbol ids of one file in source order.
 */
export function sourceOrder(symbols: readonly CodeSymbol[]): string[] {
  return [...symbols].sort((a, b) => a.start - b.start).map((s) => s.symbolId);
}

// ============================================================================
// DOCUMENT SOURCES
// ============================================================================

/**
 * Which source files write into each document. Files that differ only in
 * extension (pkg/a.py, pkg/a.ts) or in how their path splits (pkg_a.py,
 * pkg/a.py) share one document, so its block order is built from all of
 * them, not just the files of this run.
 */
class DocumentSources {
  private sourcesByDoc: Promise<Map<string, string[]>> | null = null;

  constructor(
    private readonly documents: DocumentStore,
    private readonly listSources: () => Promise<string[]>,
    private readonly extractor: SymbolExtractor,
    /** Symbols of the files this run indexed */
    private readonly runSymbols: Map<string, CodeSymbol[]>,
    /** Every file this run covered, deleted ones included */
    private readonly runFiles: ReadonlySet<string>,
    private readonly skippedFiles: ReadonlySet<string>
  ) {}

  /**
   * Block order for a document: each contributing file in path order, each
   * file's symbols in source order. Null when a contributing file could not
   * be parsed this run; its blocks must stay.
   *
   * @throws SymbolParseError when a file outside this run cannot be parsed
   */
  async orderFor(docPath: string): Promise<string[] | null> {
    const onDisk = (await this.bySourceDoc()).get(docPath) ?? [];
    const fromRun = [...this.runFiles].filter((file) => this.documents.docPathForSourceFile(file) === docPath);
    const files = [...new Set([...onDisk, ...fromRun])].sort();

    const order: string[] = [];
    for (const file of files) {
      if (this.skippedFiles.has(file)) return null;
      const symbols =
        this.runSymbols.get(file) ?? (this.runFiles.has(file) ? [] : this.extractor.extractFile(file));
      order.push(...sourceOrder(symbols));
    }
    return order;
  }

  private bySourceDoc(): Promise<Map<string, string[]>> {
    this.sourcesByDoc ??= this.listSources().then((files) => {
      const byDoc = new Map<string, string[]>();
      for (const file of files) {
        const docPath = this.documents.docPathForSourceFile(file);
        byDoc.set(docPath, [...(byDoc.get(docPath) ?? []), file]);
      }
      return byDoc;
    });
    return this.sourcesByDoc;
  }
}

// ============================================================================
// PIPELINE
// ============================================================================

class SyncRun {
  readonly documented: string[] = [];
  readonly failed: SymbolFailure[] = [];
  readonly reordered: string[] = [];
  readonly impactUpdates: string[] = [];

  constructor(
    private readonly repoRoot: string,
    private readonly documents: DocumentStore,
    private readonly strategy: GenerationStrategy,
    private readonly sources: DocumentSources,
    private readonly allById: Map<string, CodeSymbol>,
    private readonly contextFor: (symbol: CodeSymbol) => Promise<string>,
    private readonly logger: Logger
  ) {}

  async documentFile(file: string, symbols: readonly CodeSymbol[], onSymbol: (symbol: CodeSymbol) => void): Promise<void> {
    const language = languageForFile(file);
    if (language === null) {
      this.failFile(file, symbols, new Error(`Unsupported source file: ${file}`));
      return;
    }

    let lines: string[];
    try {
      lines = splitLines(readFileSync(join(this.repoRoot, file), 'utf-8'));
    } catch (error) {
      this.failFile(file, symbols, error);
      return;
    }

    const docPath = this.documents.docPathForSourceFile(file);
    for (const [index, symbol] of symbols.entries()) {
      onSymbol(symbol);
      try {
        const code = spanText(lines, symbol.start, symbol.end);
        const context = await this.contextFor(symbol);
        const result = await this.strategy.generate({ symbol, code, context, language });

        if (result.docs === '') {
          throw new Error('Model returned no documentation');
        }
        const outcome = this.documents.writeSection(docPath, symbol.symbolId, result.docs);
        this.documented.push(symbol.symbolId);
        this.logger.info(`${outcome === 'updated' ? 'Updated' : 'Documented'} ${symbol.symbolId}`);

        for (const instruction of result.impactInstructions) {
          await this.applyImpact(instruction, language);
        }
      } catch (error) {
        if (error instanceof DocumentWriteError) {
          this.failFile(file, symbols.slice(index), error);
          return;
        }
        this.fail(symbol, error);
      }
    }
  }

  /**
   * Regenerate a dependent symbol's block and restore source order in its
   * document. Unknown targets are logged and ignored. Symbols outside this
   * run are located by searching the documents.
   */
  private async applyImpact(instruction: ImpactInstruction, fallbackLanguage: SourceLanguage): Promise<void> {
    const { symbol_id: symbolId } = instruction;
    const target = this.allById.get(symbolId);
    try {
      const docPath = target
        ? this.documents.docPathForSourceFile(target.file)
        : (this.documents.findSection(symbolId)?.docPath ?? null);
      if (docPath === null) {
        this.logger.warn(`Could not find the document for ${symbolId}; impact update skipped`);
        return;
      }

      const language = (target && languageForFile(target.file)) ?? fallbackLanguage;
      const docs = await this.strategy.applyImpact(instruction, language);
      if (docs === '') {
        this.logger.warn(`Model returned no documentation for ${symbolId}; impact update skipped`);
        return;
      }
      this.documents.writeSection(docPath, symbolId, docs);
      this.impactUpdates.push(symbolId);
      this.logger.info(`Updated dependent ${symbolId}`);

      if (target) {
        await this.reorderDocument(docPath);
      }
    } catch (error) {
      this.logger.warn(`Impact update for ${symbolId} failed: ${errorMessage(error)}`);
    }
  }

  /**
   * Match the block order of every document these files write to.
   */
  async reorder(files: readonly string[]): Promise<void> {
    const docPaths = new Set(files.map((file) => this.documents.docPathForSourceFile(file)));
    for (const docPath of docPaths) {
      try {
        await this.reorderDocument(docPath);
      } catch (error) {
        this.logger.warn(`Could not reorder ${docPath}: ${errorMessage(error)}`);
      }
    }
  }

  private async reorderDocument(docPath: string): Promise<void> {
    const order = await this.sources.orderFor(docPath);
    if (order === null) {
      this.logger.debug?.(`Kept block order of ${docPath}: one of its sources did not parse`);
      return;
    }
    if (this.documents.reorderSections(docPath, order)) {
      this.markReordered(docPath);
    }
  }

  private markReordered(docPath: string): void {
    if (!this.reordered.includes(docPath)) this.reordered.push(docPath);
  }

  private fail(symbol: CodeSymbol, error: unknown): void {
    const message = errorMessage(error);
    this.failed.push({ symbolId: symbol.symbolId, file: symbol.file, error: message });
    this.logger.warn(`Failed to document ${symbol.symbolId}: ${message}`);
  }

  private failFile(file: string, symbols: readonly CodeSymbol[], error: unknown): void {
    const message = errorMessage(error);
    this.logger.warn(`Skipping ${file}: ${message}`);
    for (const symbol of symbols) {
      this.failed.push({ symbolId: symbol.symbolId, file, error: message });
    }
  }
}

/**
 * @example
 * const summary = await runSyncPipeline({
 *   config, repoRoot: '/work/repo', changedFiles: ['src/pkg/Foo.py'],
 *   llm, embedder, store, logger: consoleLogger,
 * });
 * summary.documented // ['pkg.Foo.bar']
 */
export async function runSyncPipeline(options: SyncPipelineOptions): Promise<SyncSummary> {
  const { config, llm, embedder, store } = options;
  const logger = options.logger ?? silentLogger;
  const paths: RepoPaths = resolveRepoPaths(options.repoRoot, config);
  const packageRoot = resolvePackageRoot(paths.sourceRoot);

  const extractor = options.extractor ?? new TreeSitterSymbolExtractor(paths.repoRoot, packageRoot);
  const scanOptions = { extensions: config.indexing.extensions, ignorePatterns: config.indexing.ignore_patterns };

  const index = await runSymbolIndexer({
    repoRoot: paths.repoRoot,
    scanRoot: packageRoot,
    changedFiles: options.changedFiles,
    extractor,
    embedder,
    store,
    ...scanOptions,
    scrollLimit: config.store.scroll_limit,
    logger,
  });
  logger.info(
    `Indexed ${index.changedFiles.length} file(s): ${index.added.length} added, ` +
      `${index.modified.length} modified, ${index.deletedIds.length} deleted`
  );

  const documents =
    options.documents ??
    new DocumentStore({ docsRoot: paths.docsRoot, repoRoot: paths.repoRoot, packageRoot, logger });
  const tools = createDefaultTools({
    repoRoot: paths.repoRoot,
    documents,
    extensions: config.indexing.extensions,
    ignorePatterns: config.indexing.ignore_patterns,
    logger,
  });
  const strategy =
    options.strategy ??
    createStrategy({
      config,
      llm,
      tools,
      auditLog: options.auditLog ?? new FileAuditLog(paths.auditLog, logger),
      failureLog: options.failureLog ?? new JsonlFailureLog(paths.failureLog, logger),
      logger,
    });

  const skipped = new Set(index.skippedFiles);
  const sources = new DocumentSources(
    documents,
    () => collectSourceFiles(paths.repoRoot, packageRoot, scanOptions),
    extractor,
    groupByFile(index.allSymbols),
    new Set(index.changedFiles),
    skipped
  );
  const allById = new Map(index.allSymbols.map((s) => [s.symbolId, s]));
  const run = new SyncRun(
    paths.repoRoot,
    documents,
    strategy,
    sources,
    allById,
    (symbol) => buildRetrievalContext({ qualname: symbol.qualname, embedder, store, k: config.agent.context_top_k }),
    logger
  );

  const total = index.changedSymbols.length;
  let position = 0;
  for (const [file, symbols] of groupByFile(index.changedSymbols)) {
    await run.documentFile(file, symbols, (symbol) => options.onSymbol?.(symbol, position++, total));
  }

  await run.reorder(index.changedFiles);

  return {
    index,
    documented: run.documented,
    failed: run.failed,
    deleted: index.deletedIds,
    reordered: run.reordered,
    impactUpdates: run.impactUpdates,
  };
}
