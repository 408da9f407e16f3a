/**
 * Source File Scanner
 *
 * Discovers source files with fast-glob while respecting gitignore
 * patterns. Results are repo-relative POSIX paths, sorted, so every run
 * visits files in the same order.
 */

import { existsSync, statSync } from 'node:fs';
import { extname, isAbsolute, join, relative, resolve } from 'node:path';
import fg from 'fast-glob';

import { createIgnoreFilter } from './ignore.js';
import { toPosixRelative } from '../utils/index.js';
import { DEFAULT_SOURCE_EXTENSIONS, EXTENSION_TO_LANGUAGE, type SourceLanguage } from './types.js';

export interface CollectOptions {
  /** Extensions without the dot (default: py, ts, js) */
  extensions?: readonly string[];
  /** Extra gitignore-style patterns (indexing.ignore_patterns) */
  ignorePatterns?: readonly string[];
}

/**
 * The directory module names are computed against: `<sourceRoot>/src`
 * when it exists, otherwise sourceRoot itself.
 */
export function resolvePackageRoot(sourceRoot: string): string {
  const candidate = join(resolve(sourceRoot), 'src');
  if (existsSync(candidate) && statSync(candidate).isDirectory()) {
    return candidate;
  }
  return resolve(sourceRoot);
}

/**
 * Language for a path, or null when the extension is not supported.
 */
export function languageForFile(file: string): SourceLanguage | null {
  const ext = extname(file).slice(1).toLowerCase();
  return EXTENSION_TO_LANGUAGE[ext] ?? null;
}

/**
 * Build the glob pattern for the given extensions.
 */
function buildGlobPattern(extensions: readonly string[]): string {
  return extensions.length === 1 ? `**/*.${extensions[0]}` : `**/*.{${extensions.join(',')}}`;
}

/**
 * Predicate over repo-relative paths: true when a full pass would index the
 * file. It has a supported extension, lies under scanRoot, and matches no
 * ignore pattern. Only the path is checked, so missing files pass too.
 */
export function createSourceFileFilter(
  repoRoot: string,
  scanRoot: string,
  options: CollectOptions = {}
): (file: string) => boolean {
  const absoluteRepo = resolve(repoRoot);
  const absoluteScan = resolve(scanRoot);
  const allowed = new Set(
    (options.extensions ?? DEFAULT_SOURCE_EXTENSIONS).filter((ext) => EXTENSION_TO_LANGUAGE[ext] !== undefined)
  );
  const shouldIgnore = createIgnoreFilter({
    rootPath: absoluteRepo,
    additionalPatterns: options.ignorePatterns,
  });

  return (file: string): boolean => {
    if (!allowed.has(extname(file).slice(1).toLowerCase())) return false;
    const absolute = resolve(absoluteRepo, file);
    const fromScan = relative(absoluteScan, absolute);
    if (fromScan === '' || fromScan.startsWith('..') || isAbsolute(fromScan)) return false;
    return !shouldIgnore(toPosixRelative(absoluteRepo, absolute));
  };
}

/**
 * Collect every source file under scanRoot.
 *
 * Ignore patterns are evaluated relative to repoRoot, where .gitignore lives.
 *
 * @returns repo-relative POSIX paths, sorted
 */
export async function collectSourceFiles(
  repoRoot: string,
  scanRoot: string,
  options: CollectOptions = {}
): Promise<string[]> {
  const absoluteRepo = resolve(repoRoot);
  const absoluteScan = resolve(scanRoot);
  const extensions = (options.extensions ?? DEFAULT_SOURCE_EXTENSIONS).filter(
    (ext) => EXTENSION_TO_LANGUAGE[ext] !== undefined
  );

  if (extensions.length === 0 || !existsSync(absoluteScan)) {
    return [];
  }

  const inScope = createSourceFileFilter(absoluteRepo, absoluteScan, options);

  const entries = await fg(buildGlobPattern(extensions), {
    cwd: absoluteScan,
    absolute: true,
    dot: false,
    onlyFiles: true,
    followSymbolicLinks: false,
    suppressErrors: true,
  });

  return entries
    .map((absolutePath) => toPosixRelative(absoluteRepo, absolutePath))
    .filter(inScope)
    .sort();
}
