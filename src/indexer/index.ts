/**
 * Symbol Indexer Module
 *
 * Finds source files, extracts their symbols with tree-sitter, and keeps the
 * vector store in step with the symbol hashes.
 *
 * @example
 * ```ts
 * import { runSymbolIndexer, TreeSitterSymbolExtractor } from './indexer';
 *
 * const packageRoot = join(repoRoot, 'src');
 * const result = await runSymbolIndexer({
 *   repoRoot,
 *   scanRoot: packageRoot,
 *   changedFiles: ['src/pkg/Foo.py'],
 *   extractor: new TreeSitterSymbolExtractor(repoRoot, packageRoot),
 *   embedder,
 *   store,
 * });
 *
 * console.log(`${result.added.length} added, ${result.modified.length} modified`);
 * ```
 */

export {
  runSymbolIndexer,
  buildExistingMaps,
  classifySymbols,
  detectDeletions,
  embeddingText,
  payloadFor,
  type SymbolIndexerOptions,
  type ExistingMaps,
  type SymbolClassification,
} from './symbol-indexer.js';

export { getGitChangedFiles, type GitChangeOptions } from './change-source.js';

export { collectSourceFiles, resolvePackageRoot, languageForFile, type CollectOptions } from './scanner.js';

export {
  createIgnoreFilter,
  loadGitignoreFile,
  parseGitignoreContent,
  type IgnoreFilter,
  type IgnoreFilterOptions,
} from './ignore.js';

export {
  type SymbolKind,
  type CodeSymbol,
  type SourceLanguage,
  type IndexResult,
  INDEXABLE_KINDS,
  EXTENSION_TO_LANGUAGE,
  DEFAULT_SOURCE_EXTENSIONS,
  DEFAULT_IGNORE_PATTERNS,
  isIndexable,
} from './types.js';

export {
  extractSymbols,
  moduleQualname,
  TreeSitterSymbolExtractor,
  type SymbolExtractor,
  spanText,
  hashSpan,
} from './extractor/index.js';

export {
  createEmbeddingProvider,
  OpenAIEmbeddingProvider,
  type OpenAIEmbeddingOptions,
  type EmbeddingProvider,
  type EmbeddingsClient,
} from './embedder/index.js';
