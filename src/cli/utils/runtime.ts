/**
 * Command Runtime
 *
 * Resolves the repository a command works on and opens the services it
 * needs. Every command builds its config once here and passes it down.
 */

import { loadConfig, loadEnvFile, resolveRepoPaths, type Config, type RepoPaths } from '../../config/index.js';
import { CLIError } from '../../errors/index.js';
import { createEmbeddingProvider, type EmbeddingProvider } from '../../indexer/embedder/index.js';
import { SqliteVectorStore } from '../../store/index.js';
import { validateRepoPath } from '../../utils/path-validation.js';
import type { CommandContext } from '../types.js';

export interface RepoRuntime {
  repoRoot: string;
  config: Config;
  paths: RepoPaths;
}

export interface IndexRuntime extends RepoRuntime {
  embedder: EmbeddingProvider;
  store: SqliteVectorStore;
}

/**
 * Validate `--repo` (default: cwd).
 *
 * @returns the real path of the repository root
 * @throws CLIError when the path is not a usable directory
 */
export function resolveRepoRoot(ctx: CommandContext, repo: string = process.cwd()): string {
  const validation = validateRepoPath(repo);
  if (!validation.valid) {
    throw new CLIError(validation.error, validation.hint);
  }
  for (const warning of validation.warnings) {
    ctx.debug(warning);
  }
  return validation.normalizedPath;
}

/**
 * Resolve the repository, load its .env and config.
 *
 * @throws ConfigError when config.toml is invalid
 */
export function openRepo(ctx: CommandContext, repo?: string): RepoRuntime {
  const repoRoot = resolveRepoRoot(ctx, repo);
  loadEnvFile(repoRoot);
  const config = loadConfig(repoRoot);
  const paths = resolveRepoPaths(repoRoot, config);
  ctx.debug(`Repository: ${repoRoot}`);
  ctx.debug(`Docs: ${paths.docsRoot}`);

  return { repoRoot, config, paths };
}

/**
 * openRepo plus the embedding provider and the vector store. The caller
 * closes the store.
 */
export function openIndex(ctx: CommandContext, repo?: string): IndexRuntime {
  const runtime = openRepo(ctx, repo);
  const { config, paths } = runtime;

  const embedder = createEmbeddingProvider(config);
  ctx.debug(`Embedding: ${embedder.name}/${embedder.model}`);

  const store = new SqliteVectorStore({ path: paths.vectorsDb, collection: config.store.collection });
  return { ...runtime, embedder, store };
}
