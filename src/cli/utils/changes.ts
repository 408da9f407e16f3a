/**
 * Which files a command should cover.
 *
 * Precedence: explicit file arguments, then --all (full pass), then
 * `git diff --name-only <since> HEAD` (default since: HEAD~1).
 */

import { isAbsolute, relative } from 'node:path';

import { getGitChangedFiles } from '../../indexer/change-source.js';
import type { CommandContext } from '../types.js';
import type { RepoRuntime } from './runtime.js';

export interface ChangeSelectionOptions {
  all?: boolean;
  since?: string;
}

/**
 * @returns repo-relative POSIX paths, or undefined for a full pass
 */
export function resolveChangedFiles(
  ctx: CommandContext,
  runtime: RepoRuntime,
  files: readonly string[],
  options: ChangeSelectionOptions
): string[] | undefined {
  if (files.length > 0) {
    return files.map((file) =>
      (isAbsolute(file) ? relative(runtime.repoRoot, file) : file).split('\\').join('/')
    );
  }
  if (options.all) {
    ctx.debug('Full pass over every source file');
    return undefined;
  }

  const base = options.since ?? 'HEAD~1';
  const changed = getGitChangedFiles(runtime.repoRoot, {
    base,
    extensions: runtime.config.indexing.extensions,
    logger: ctx,
  });
  ctx.debug(`git diff ${base} HEAD: ${changed.length} source file(s)`);
  return changed;
}
