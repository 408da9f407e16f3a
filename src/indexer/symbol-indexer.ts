/**
 * Symbol Indexer
 *
 * Incremental change detection at symbol granularity:
 * Extract → Diff against stored hashes → Delete vanished → Embed + Upsert changed
 *
 * The vector store is the only record of the previous run. Each point's
 * payload carries the symbol's file and hash, so the two lookup maps the
 * diff needs are rebuilt from a single scroll.
 */

import { existsSync } from 'node:fs';
import { join } from 'node:path';

import { SymbolParseError } from '../errors/index.js';
import { pointIdFor, type PointPayload, type StoredPoint, type VectorStore } from '../store/index.js';
import { silentLogger, type Logger } from '../utils/index.js';
import type { EmbeddingProvider } from './embedder/types.js';
import type { SymbolExtractor } from './extractor/extractor.js';
import { collectSourceFiles, createSourceFileFilter } from './scanner.js';
import { isIndexable, type CodeSymbol, type IndexResult } from './types.js';

// ============================================================================
// TYPES
// ============================================================================

export interface SymbolIndexerOptions {
  /** Absolute repository root; every file path is relative to it */
  repoRoot: string;
  /**
   * Directory scanned when no changed-file list is given (the package root).
   * Defaults to repoRoot.
   */
  scanRoot?: string;
  /**
   * Repo-relative files flagged by the change source. Absent means a full
   * pass over every source file under scanRoot.
   */
  changedFiles?: readonly string[];
  extractor: SymbolExtractor;
  embedder: EmbeddingProvider;
  store: VectorStore;
  /** indexing.extensions */
  extensions?: readonly string[];
  /** indexing.ignore_patterns */
  ignorePatterns?: readonly string[];
  /** store.scroll_limit */
  scrollLimit?: number;
  logger?: Logger;
}

/**
 * What the store knew before this run.
 */
export interface ExistingMaps {
  /** symbol_id → hash */
  hashes: Map<string, string>;
  /** file → symbol_ids stored for it */
  idsByFile: Map<string, Set<string>>;
}

export interface SymbolClassification {
  unchanged: CodeSymbol[];
  modified: CodeSymbol[];
  added: CodeSymbol[];
}

// ============================================================================
// PURE HELPERS
// ============================================================================

/**
 * Rebuild the hash and file maps from scrolled points.
 */
export function buildExistingMaps(points: readonly StoredPoint[]): ExistingMaps {
  const hashes = new Map<string, string>();
  const idsByFile = new Map<string, Set<string>>();

  for (const { payload } of points) {
    hashes.set(payload.symbol_id, payload.hash);
    let ids = idsByFile.get(payload.file);
    if (!ids) {
      ids = new Set();
      idsByFile.set(payload.file, ids);
    }
    ids.add(payload.symbol_id);
  }

  return { hashes, idsByFile };
}

/**
 * Split indexable symbols by comparing their hash to the stored one.
 * Module symbols are ignored.
 */
export function classifySymbols(
  symbols: readonly CodeSymbol[],
  hashes: ReadonlyMap<string, string>
): SymbolClassification {
  const result: SymbolClassification = { unchanged: [], modified: [], added: [] };

  for (const symbol of symbols) {
    if (!isIndexable(symbol)) continue;

    const stored = hashes.get(symbol.symbolId);
    if (stored === undefined) {
      result.added.push(symbol);
    } else if (stored === symbol.hash) {
      result.unchanged.push(symbol);
    } else {
      result.modified.push(symbol);
    }
  }

  return result;
}

/**
 * Ids stored for `file` that the current extraction no longer produces.
 */
export function detectDeletions(
  file: string,
  currentIds: ReadonlySet<string>,
  idsByFile: ReadonlyMap<string, ReadonlySet<string>>
): string[] {
  const stored = idsByFile.get(file);
  if (!stored) return [];
  return [...stored].filter((id) => !currentIds.has(id)).sort();
}

/**
 * Text embedded for a symbol: `"{qualname}: {docstring}"`.
 */
export function embeddingText(symbol: CodeSymbol): string {
  return `${symbol.qualname}: ${symbol.docstring}`;
}

/**
 * Payload persisted with a symbol's vector.
 */
export function payloadFor(symbol: CodeSymbol): PointPayload {
  return {
    symbol_id: symbol.symbolId,
    qualname: symbol.qualname,
    file: symbol.file,
    kind: symbol.kind,
    hash: symbol.hash,
  };
}

// ============================================================================
// TARGET RESOLUTION
// ============================================================================

function normalizeFile(file: string): string {
  return file.replace(/\\/g, '/').replace(/^\.\//, '');
}

/**
 * Files this run covers.
 *
 * Explicit list: the entries a full pass would also pick (supported
 * extension, under scanRoot, not ignored), deduplicated. Out-of-scope
 * entries the store still holds symbols for are kept so their points are
 * deleted.
 * Full pass: every source file on disk plus every stored file that has
 * since disappeared (so its symbols are deleted).
 */
async function resolveTargetFiles(
  options: SymbolIndexerOptions,
  existing: ExistingMaps,
  inScope: (file: string) => boolean
): Promise<string[]> {
  const scanRoot = options.scanRoot ?? options.repoRoot;
  const collectOptions = { extensions: options.extensions, ignorePatterns: options.ignorePatterns };

  if (options.changedFiles) {
    const targets: string[] = [];
    for (const file of new Set(options.changedFiles.map(normalizeFile))) {
      if (inScope(file) || existing.idsByFile.has(file)) {
        targets.push(file);
      } else {
        options.logger?.debug?.(`Not a source file for this repository: ${file}`);
      }
    }
    return targets;
  }

  const onDisk = await collectSourceFiles(options.repoRoot, scanRoot, collectOptions);
  const targets = new Set(onDisk);
  for (const file of existing.idsByFile.keys()) {
    if (!existsSync(join(options.repoRoot, file))) {
      targets.add(file);
    }
  }
  return [...targets].sort();
}

// ============================================================================
// MAIN ENTRY
// ============================================================================

/**
 * Run one incremental indexing pass.
 *
 * Never aborts on a single file: unparseable files are logged and skipped
 * (their stored symbols are left alone), and an unreadable store degrades
 * to "everything is new".
 *
 * @throws whatever the embedder or the store's write path throws
 */
export async function runSymbolIndexer(options: SymbolIndexerOptions): Promise<IndexResult> {
  const { repoRoot, extractor, embedder, store, logger = silentLogger } = options;

  let existing: ExistingMaps;
  try {
    existing = buildExistingMaps(await store.scrollAll(options.scrollLimit));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.warn(`Could not read stored symbols, treating all symbols as new: ${message}`);
    existing = { hashes: new Map(), idsByFile: new Map() };
  }

  const inScope = createSourceFileFilter(repoRoot, options.scanRoot ?? repoRoot, {
    extensions: options.extensions,
    ignorePatterns: options.ignorePatterns,
  });
  const changedFiles = await resolveTargetFiles(options, existing, inScope);
  logger.debug?.(`Indexing ${changedFiles.length} file(s)`);

  const allSymbols: CodeSymbol[] = [];
  const deletedIds: string[] = [];
  const skippedFiles: string[] = [];

  for (const file of changedFiles) {
    let current: CodeSymbol[] = [];

    // Out-of-scope files only reach here to have their stored points removed
    if (inScope(file) && existsSync(join(repoRoot, file))) {
      try {
        current = extractor.extractFile(file);
      } catch (error) {
        if (!(error instanceof SymbolParseError)) {
          throw error;
        }
        logger.warn(`${error.message}; skipped`);
        skippedFiles.push(file);
        continue;
      }
    }

    allSymbols.push(...current);
    const currentIds = new Set(current.map((s) => s.symbolId));
    deletedIds.push(...detectDeletions(file, currentIds, existing.idsByFile));
  }

  const { unchanged, modified, added } = classifySymbols(allSymbols, existing.hashes);
  const changedSymbols = [...modified, ...added].sort(
    (a, b) => a.file.localeCompare(b.file) || a.start - b.start
  );

  if (deletedIds.length > 0) {
    await store.delete(deletedIds.map(pointIdFor));
    logger.info(`Deleted ${deletedIds.length} symbol(s) from the index`);
  }

  if (changedSymbols.length > 0) {
    const vectors = await embedder.embed(changedSymbols.map(embeddingText));
    await store.upsert(vectors, changedSymbols.map(payloadFor));
    logger.info(`Embedded ${changedSymbols.length} changed symbol(s)`);
  }

  logger.debug?.(
    `unchanged=${unchanged.length} modified=${modified.length} added=${added.length} deleted=${deletedIds.length}`
  );

  return {
    allSymbols,
    changedSymbols,
    unchanged,
    modified,
    added,
    deletedIds,
    changedFiles,
    skippedFiles,
  };
}
