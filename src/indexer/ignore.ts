/**
 * Gitignore Pattern Handling
 *
 * Utilities for loading and applying gitignore-style patterns.
 * Uses the 'ignore' package which implements the full gitignore syntax.
 */

import { existsSync, readFileSync } from 'node:fs';
import { isAbsolute, join, relative, sep } from 'node:path';
import ignore, { type Ignore } from 'ignore';

import { DEFAULT_IGNORE_PATTERNS } from './types.js';

/**
 * Options for creating an ignore filter.
 */
export interface IgnoreFilterOptions {
  /** Root directory containing .gitignore */
  rootPath: string;

  /** Additional patterns to ignore (indexing.ignore_patterns) */
  additionalPatterns?: readonly string[];

  /** Whether to use default ignore patterns */
  useDefaults?: boolean;
}

/**
 * A filter function that tests whether a path should be ignored.
 */
export type IgnoreFilter = (filePath: string) => boolean;

/**
 * Parse gitignore file content into an array of patterns.
 * Drops comments and blank lines; keeps negations.
 */
export function parseGitignoreContent(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line !== '' && !line.startsWith('#'));
}

/**
 * Load gitignore patterns from a file. Missing file => [].
 */
export function loadGitignoreFile(gitignorePath: string): string[] {
  if (!existsSync(gitignorePath)) {
    return [];
  }
  return parseGitignoreContent(readFileSync(gitignorePath, 'utf-8'));
}

/**
 * Create an ignore filter for the given root directory.
 *
 * Patterns are layered, lowest priority first:
 * 1. DEFAULT_IGNORE_PATTERNS (if useDefaults is true)
 * 2. .gitignore in the root directory
 * 3. additionalPatterns
 *
 * @returns A filter that returns true if a path should be IGNORED
 */
export function createIgnoreFilter(options: IgnoreFilterOptions): IgnoreFilter {
  const { rootPath, additionalPatterns = [], useDefaults = true } = options;

  const ig: Ignore = ignore();

  if (useDefaults) {
    ig.add(DEFAULT_IGNORE_PATTERNS);
  }

  const gitignorePatterns = loadGitignoreFile(join(rootPath, '.gitignore'));
  if (gitignorePatterns.length > 0) {
    ig.add(gitignorePatterns);
  }

  if (additionalPatterns.length > 0) {
    ig.add([...additionalPatterns]);
  }

  // The ignore library expects root-relative paths with forward slashes
  return (filePath: string): boolean => {
    let relativePath = isAbsolute(filePath) ? relative(rootPath, filePath) : filePath;

    if (sep === '\\') {
      relativePath = relativePath.split(sep).join('/');
    }

    // The root itself, or anything outside it, is never ignored here
    if (relativePath === '' || relativePath.startsWith('..')) {
      return false;
    }

    return ig.ignores(relativePath);
  };
}
