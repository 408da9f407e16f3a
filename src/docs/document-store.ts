/**
 * Document Section Store
 *
 * Inserts, replaces, reorders and prunes marker-delimited blocks inside
 * Markdown files. Text outside the blocks is never touched by writes;
 * reorders keep everything before the first block.
 *
 * Single writer per document: there is no locking, last write wins.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { basename, dirname, extname, isAbsolute, join, resolve } from 'node:path';
import fg from 'fast-glob';

import { DocumentWriteError } from '../errors/index.js';
import { silentLogger, type Logger } from '../utils/index.js';
import { parseBlocks, renderBlock, sectionPattern } from './markers.js';
import { docFileNameForSource } from './naming.js';

export interface DocumentStoreOptions {
  /** Absolute docs directory (paths.docs_root) */
  docsRoot: string;
  /** Repository root, for naming documents after source files */
  repoRoot?: string;
  /** Package root; defaults to repoRoot */
  packageRoot?: string;
  logger?: Logger;
}

/** Outcome of a write, for logs and summaries */
export type WriteOutcome = 'created' | 'updated' | 'appended';

export interface FoundSection {
  /** Absolute path of the document holding the block */
  docPath: string;
  /** Block text, markers included */
  block: string;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Title written at the top of a new document.
 */
export function defaultHeader(docPath: string): string {
  return `# API Documentation: ${basename(docPath, extname(docPath))}\n\n`;
}

export class DocumentStore {
  readonly docsRoot: string;
  private readonly repoRoot: string;
  private readonly packageRoot: string;
  private readonly logger: Logger;

  constructor(options: DocumentStoreOptions) {
    this.docsRoot = resolve(options.docsRoot);
    this.repoRoot = resolve(options.repoRoot ?? this.docsRoot);
    this.packageRoot = resolve(options.packageRoot ?? this.repoRoot);
    this.logger = options.logger ?? silentLogger;
  }

  /** Absolute document path; relative paths are under docsRoot */
  resolvePath(docPath: string): string {
    return isAbsolute(docPath) ? docPath : join(this.docsRoot, docPath);
  }

  /**
   * Document that holds the sections of a repo-relative source file.
   */
  docPathForSourceFile(file: string): string {
    return join(this.docsRoot, docFileNameForSource(this.repoRoot, this.packageRoot, file));
  }

  /**
   * Replace the block for `symbolId`, or append it.
   *
   * Idempotent: the same (symbolId, content) twice leaves the file
   * byte-identical after the first call.
   *
   * @throws InvalidSymbolIdError for ids containing marker syntax
   * @throws DocumentWriteError on I/O failure
   */
  writeSection(docPath: string, symbolId: string, content: string): WriteOutcome {
    const path = this.resolvePath(docPath);
    const block = renderBlock(symbolId, content);
    const pattern = sectionPattern(symbolId, 'g');

    const existing = this.read(path);
    let text = existing ?? defaultHeader(path);
    let outcome: WriteOutcome;

    if (sectionPattern(symbolId).test(text)) {
      // Function replacement: content may contain `$&` and friends
      text = text.replace(pattern, () => block);
      outcome = 'updated';
    } else {
      text += `\n\n${block}\n\n---`;
      outcome = existing === null ? 'created' : 'appended';
    }

    if (text !== existing) {
      this.write(path, text);
    }
    this.logger.debug?.(`${outcome} section ${symbolId} in ${path}`);
    return outcome;
  }

  /**
   * Rebuild a document as header + the blocks for `orderedIds`, in order,
   * separated by a blank line. Blocks whose id is not listed are dropped;
   * listed ids without a block are skipped.
   *
   * No-op when the document is missing or has no blocks.
   *
   * @returns whether the file was rewritten
   * @throws DocumentWriteError on I/O failure
   */
  reorderSections(docPath: string, orderedIds: readonly string[]): boolean {
    const path = this.resolvePath(docPath);
    const text = this.read(path);
    if (text === null) return false;

    const blocks = parseBlocks(text);
    const first = blocks[0];
    if (!first) return false;

    const header = text.slice(0, first.index);
    const byId = new Map<string, string>();
    for (const block of blocks) {
      // First occurrence wins
      if (!byId.has(block.symbolId)) byId.set(block.symbolId, block.text);
    }

    const kept: string[] = [];
    const seen = new Set<string>();
    for (const id of orderedIds) {
      const block = byId.get(id);
      if (block === undefined || seen.has(id)) continue;
      seen.add(id);
      kept.push(block);
    }

    const rebuilt = kept.length > 0 ? `${header}${kept.join('\n\n')}\n` : header;
    if (rebuilt === text) return false;

    const dropped = [...byId.keys()].filter((id) => !seen.has(id));
    if (dropped.length > 0) {
      this.logger.debug?.(`Dropped ${dropped.length} section(s) from ${path}: ${dropped.join(', ')}`);
    }
    this.write(path, rebuilt);
    return true;
  }

  /**
   * Block text (markers included) for `symbolId` in one document, or null.
   */
  readSection(docPath: string, symbolId: string): string | null {
    const text = this.read(this.resolvePath(docPath));
    if (text === null) return null;
    return sectionPattern(symbolId).exec(text)?.[0] ?? null;
  }

  /**
   * Block content between the markers, or null.
   */
  readSectionContent(docPath: string, symbolId: string): string | null {
    const block = this.readSection(docPath, symbolId);
    if (block === null) return null;
    const firstBreak = block.indexOf('\n');
    const lastBreak = block.lastIndexOf('\n');
    return firstBreak === lastBreak ? '' : block.slice(firstBreak + 1, lastBreak);
  }

  /** Whole document text, or null when it does not exist */
  readDocument(docPath: string): string | null {
    return this.read(this.resolvePath(docPath));
  }

  /** Section ids in document order */
  listSectionIds(docPath: string): string[] {
    const text = this.read(this.resolvePath(docPath));
    return text === null ? [] : parseBlocks(text).map((b) => b.symbolId);
  }

  /**
   * Search every Markdown file under docsRoot for the block of `symbolId`.
   * Files are visited in sorted order; the first hit wins.
   */
  findSection(symbolId: string): FoundSection | null {
    const pattern = sectionPattern(symbolId);
    for (const docPath of this.listDocuments()) {
      const text = this.read(docPath);
      const match = text === null ? null : pattern.exec(text);
      if (match) {
        return { docPath, block: match[0] };
      }
    }
    return null;
  }

  /** Absolute paths of every .md file under docsRoot, sorted */
  listDocuments(): string[] {
    if (!existsSync(this.docsRoot)) return [];
    return fg
      .sync('**/*.md', { cwd: this.docsRoot, absolute: true, onlyFiles: true, suppressErrors: true })
      .sort();
  }

  private read(path: string): string | null {
    if (!existsSync(path)) return null;
    try {
      return readFileSync(path, 'utf-8');
    } catch (error) {
      throw new DocumentWriteError(path, toError(error));
    }
  }

  private write(path: string, text: string): void {
    try {
      mkdirSync(dirname(path), { recursive: true });
      writeFileSync(path, text, 'utf-8');
    } catch (error) {
      throw new DocumentWriteError(path, toError(error));
    }
  }
}
