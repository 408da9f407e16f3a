/**
 * Test Utilities - Temporary repositories
 */

import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';

export interface TempRepo {
  root: string;
  /** Write (or overwrite) a repo-relative file, creating parent dirs */
  write(relPath: string, content: string): string;
  /** Remove a repo-relative file */
  remove(relPath: string): void;
  cleanup(): void;
}

/**
 * Create a scratch repository in the OS temp dir, seeded with `files`.
 *
 * @example
 * ```typescript
 * const repo = createTempRepo({ 'src/pkg/foo.py': 'def bar():\n    pass\n' });
 * afterEach(() => repo.cleanup());
 * ```
 */
export function createTempRepo(files: Record<string, string> = {}): TempRepo {
  const root = mkdtempSync(join(tmpdir(), 'docweave-test-'));

  const write = (relPath: string, content: string): string => {
    const absPath = join(root, relPath);
    mkdirSync(dirname(absPath), { recursive: true });
    writeFileSync(absPath, content, 'utf-8');
    return absPath;
  };

  for (const [relPath, content] of Object.entries(files)) {
    write(relPath, content);
  }

  return {
    root,
    write,
    remove: (relPath) => rmSync(join(root, relPath), { force: true }),
    cleanup: () => rmSync(root, { recursive: true, force: true }),
  };
}
