/**
 * Symbol Index Types
 *
 * The unit of change detection and documentation is a CodeSymbol: a class,
 * function or method (plus one module symbol per file) with a content hash
 * over its exact source span.
 */

/**
 * Kinds of symbol the extractors emit.
 */
export type SymbolKind = 'module' | 'class' | 'function' | 'method';

/**
 * Kinds that are embedded, stored and documented. Module symbols only
 * participate in ordering.
 */
export const INDEXABLE_KINDS: ReadonlySet<SymbolKind> = new Set(['class', 'function', 'method']);

export function isIndexable(symbol: { kind: SymbolKind }): boolean {
  return INDEXABLE_KINDS.has(symbol.kind);
}

/**
 * A documentable unit of source code.
 */
export interface CodeSymbol {
  /** Stable id, equal to qualname: `pkg.module.Class.method` */
  symbolId: string;
  kind: SymbolKind;
  /** Repo-relative POSIX path of the defining file */
  file: string;
  qualname: string;
  /** Enclosing qualname; null for module symbols */
  parent: string | null;
  /** 1-based, inclusive */
  start: number;
  /** 1-based, inclusive */
  end: number;
  /** Cleaned docstring / doc comment, '' when absent */
  docstring: string;
  /** SHA-256 hex over lines [start, end] joined by '\n' */
  hash: string;
}

/**
 * Languages the tree-sitter extractors understand.
 */
export type SourceLanguage = 'python' | 'typescript' | 'javascript';

/**
 * Extensions (without dot) accepted in indexing.extensions.
 */
export const EXTENSION_TO_LANGUAGE: Readonly<Record<string, SourceLanguage>> = {
  py: 'python',
  ts: 'typescript',
  js: 'javascript',
};

export const DEFAULT_SOURCE_EXTENSIONS = ['py', 'ts', 'js'];

/**
 * Default gitignore-style patterns never scanned for symbols.
 */
export const DEFAULT_IGNORE_PATTERNS = [
  // Version control
  '.git',
  '.svn',
  '.hg',

  // Dependencies and virtualenvs
  'node_modules',
  'vendor',
  'venv',
  '.venv',
  'site-packages',
  '__pycache__',
  '.tox',

  // Build outputs
  'dist',
  'build',
  'out',
  '.cache',

  // IDE/Editor
  '.idea',
  '.vscode',

  // Our own state and type declarations
  '.docweave',
  '*.d.ts',
];

/**
 * Outcome of one Symbol Indexer run.
 */
export interface IndexResult {
  /** Every symbol extracted from the target files */
  allSymbols: CodeSymbol[];
  /** Indexable symbols that were new or modified (and were re-embedded) */
  changedSymbols: CodeSymbol[];
  unchanged: CodeSymbol[];
  modified: CodeSymbol[];
  added: CodeSymbol[];
  /** Symbol ids removed from the store */
  deletedIds: string[];
  /** Repo-relative files the run covered, including deleted ones */
  changedFiles: string[];
  /** Files skipped because they could not be parsed */
  skippedFiles: string[];
}
