/**
 * Change Source
 *
 * Lists the source files touched between two git revisions. Runs git
 * synchronously: one short command per sync.
 */

import { execFileSync } from 'node:child_process';
import { extname } from 'node:path';

import type { Logger } from '../utils/index.js';

export interface GitChangeOptions {
  /** Older revision (default HEAD~1) */
  base?: string;
  /** Newer revision (default HEAD) */
  head?: string;
  /** Extensions without the dot; other files are dropped */
  extensions?: readonly string[];
  logger?: Logger;
}

/**
 * Files changed between `base` and `head`, relative to repoRoot.
 *
 * Deleted files are kept in the list: the indexer treats a listed path
 * that no longer exists as a whole-file deletion.
 *
 * @returns [] when git is unavailable or repoRoot is not a repository
 */
export function getGitChangedFiles(repoRoot: string, options: GitChangeOptions = {}): string[] {
  const { base = 'HEAD~1', head = 'HEAD', extensions, logger } = options;
  const allowed = extensions ? new Set(extensions) : null;

  let output: string;
  try {
    output = execFileSync('git', ['diff', '--name-only', '--relative', base, head, '--'], {
      cwd: repoRoot,
      encoding: 'utf8',
      stdio: ['pipe', 'pipe', 'pipe'],
    });
  } catch (error) {
    logger?.warn(
      `git diff ${base} ${head} failed: ${error instanceof Error ? error.message.split('\n')[0] : String(error)}`
    );
    return [];
  }

  return output
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line !== '')
    .filter((line) => allowed === null || allowed.has(extname(line).slice(1)))
    .sort();
}
