import { extname, isAbsolute, relative, resolve } from 'node:path';

/**
 * Document file name for a source file: its path relative to the package
 * root, extension dropped, segments joined by '_', plus '.md'.
 *
 * Files outside the package root are named from their repo-relative path.
 *
 * @example
 * docFileNameForSource('/repo', '/repo/src', 'src/pkg/Foo.py') // 'pkg_Foo.md'
 */
export function docFileNameForSource(repoRoot: string, packageRoot: string, file: string): string {
  const absolute = isAbsolute(file) ? file : resolve(repoRoot, file);
  let rel = relative(packageRoot, absolute);
  if (rel === '' || rel.startsWith('..') || isAbsolute(rel)) {
    rel = relative(repoRoot, absolute);
  }
  const withoutExt = rel.slice(0, rel.length - extname(rel).length);
  return `${withoutExt.split(/[\\/]/).filter(Boolean).join('_')}.md`;
}
