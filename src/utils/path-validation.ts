/**
 * Path Validation Utilities
 *
 * Structured validation for the repository passed with --repo, and
 * containment checks for paths a model asks tools to read.
 */

import { isAbsolute, join, relative, resolve } from 'node:path';
import { existsSync, statSync, realpathSync, accessSync, constants } from 'node:fs';

// ============================================================================
// Types
// ============================================================================

/**
 * Result of path validation.
 *
 * Uses discriminated union to force callers to handle both success and failure.
 * Warnings are returned even on success for non-fatal issues.
 */
export type PathValidationResult =
  | { valid: true; normalizedPath: string; warnings: string[] }
  | { valid: false; error: string; hint: string };

// ============================================================================
// Validation Functions
// ============================================================================

/**
 * Validate a repository root.
 *
 * Checks existence, that it is a readable directory, and resolves symlinks.
 * A missing .git directory is only a warning: change detection falls back
 * to scanning every file.
 */
export function validateRepoPath(inputPath: string): PathValidationResult {
  const warnings: string[] = [];
  const absolutePath = resolve(inputPath);

  if (!existsSync(absolutePath)) {
    return {
      valid: false,
      error: `Path does not exist: ${absolutePath}`,
      hint: 'Pass the repository root with --repo <path>',
    };
  }

  let realPath: string;
  try {
    realPath = realpathSync(absolutePath);
  } catch (error) {
    return {
      valid: false,
      error: `Cannot resolve path: ${absolutePath}`,
      hint: `System error: ${error instanceof Error ? error.message : String(error)}`,
    };
  }

  if (!statSync(realPath).isDirectory()) {
    return {
      valid: false,
      error: `Path is not a directory: ${realPath}`,
      hint: 'docweave needs the repository root, not a file inside it',
    };
  }

  try {
    accessSync(realPath, constants.R_OK | constants.W_OK);
  } catch {
    return {
      valid: false,
      error: `Permission denied: cannot read and write ${realPath}`,
      hint: 'docweave writes docs and .docweave/ inside the repository',
    };
  }

  if (!existsSync(join(realPath, '.git'))) {
    warnings.push(`${realPath} is not a git repository; every source file will be scanned`);
  }

  return { valid: true, normalizedPath: realPath, warnings };
}

/**
 * Resolve `target` against `root` and refuse anything outside it.
 *
 * @returns the absolute path, or null when it escapes root
 */
export function resolveWithinRoot(root: string, target: string): string | null {
  const absoluteRoot = resolve(root);
  const absolute = resolve(absoluteRoot, target);
  const rel = relative(absoluteRoot, absolute);

  if (rel === '') {
    return absolute;
  }
  if (rel === '..' || rel.startsWith('../') || rel.startsWith('..\\') || isAbsolute(rel)) {
    return null;
  }
  return absolute;
}

/**
 * Repo-relative POSIX form of an absolute path.
 */
export function toPosixRelative(root: string, absolute: string): string {
  return relative(root, absolute).split('\\').join('/');
}
