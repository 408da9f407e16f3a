/**
 * docweave - Library Entry Point
 *
 * The CLI (`docweave sync`) covers the usual workflow. These exports are for
 * driving a sync from other tooling, or for reusing the pieces on their own:
 * the symbol indexer, the vector store, the section-addressable document
 * store, the agent loop and the documentation evaluator.
 *
 * @example Sync from a script
 * ```typescript
 * import {
 *   loadConfig,
 *   resolveRepoPaths,
 *   createEmbeddingProvider,
 *   createLLMProvider,
 *   SqliteVectorStore,
 *   runSyncPipeline,
 * } from 'docweave';
 *
 * const config = loadConfig(repoRoot);
 * const paths = resolveRepoPaths(repoRoot, config);
 * const store = new SqliteVectorStore({ path: paths.vectorsDb, collection: config.store.collection });
 *
 * const summary = await runSyncPipeline({
 *   config,
 *   repoRoot,
 *   changedFiles: ['src/pkg/Foo.py'],
 *   llm: createLLMProvider(config),
 *   embedder: createEmbeddingProvider(config),
 *   store,
 * });
 * store.close();
 * ```
 *
 * @example Section edits without the pipeline
 * ```typescript
 * import { DocumentStore } from 'docweave';
 *
 * const docs = new DocumentStore({ docsRoot: 'docs' });
 * docs.writeSection('docs/pkg_Foo.md', 'pkg.Foo.bar', 'Returns the bar.');
 * ```
 *
 * @packageDocumentation
 */

export type { GlobalOptions, CommandContext } from './cli/types.js';

export * from './config/index.js';
export * from './errors/index.js';
export * from './indexer/index.js';
export * from './store/index.js';
export * from './docs/index.js';
export * from './agent/index.js';
export * from './pipeline/index.js';
export * from './eval/index.js';
export * from './providers/index.js';
export * from './utils/index.js';

// Both modules name a type GenerationStrategy: the pipeline interface wins,
// the config enum is exported under its own name.
export type { GenerationStrategy } from './pipeline/index.js';
export type { GenerationStrategy as GenerationStrategyName } from './config/index.js';
