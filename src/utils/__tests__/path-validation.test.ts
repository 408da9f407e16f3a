/**
 * Path Validation Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync, realpathSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { validateRepoPath, resolveWithinRoot, toPosixRelative } from '../path-validation.js';

// ============================================================================
// Test Setup
// ============================================================================

let TEST_DIR: string;

describe('validateRepoPath', () => {
  beforeEach(() => {
    // realpath: on macOS /var -> /private/var
    TEST_DIR = realpathSync(mkdtempSync(join(tmpdir(), 'docweave-path-')));
  });

  afterEach(() => {
    rmSync(TEST_DIR, { recursive: true, force: true });
  });

  it('accepts a git repository without warnings', () => {
    mkdirSync(join(TEST_DIR, '.git'));

    const result = validateRepoPath(TEST_DIR);

    expect(result).toEqual({ valid: true, normalizedPath: TEST_DIR, warnings: [] });
  });

  it('warns when the directory is not a git repository', () => {
    const result = validateRepoPath(TEST_DIR);

    expect(result.valid).toBe(true);
    if (result.valid) {
      expect(result.warnings).toEqual([
        `${TEST_DIR} is not a git repository; every source file will be scanned`,
      ]);
    }
  });

  it('rejects a missing path', () => {
    const result = validateRepoPath(join(TEST_DIR, 'nope'));

    expect(result.valid).toBe(false);
    if (!result.valid) {
      expect(result.error).toBe(`Path does not exist: ${join(TEST_DIR, 'nope')}`);
    }
  });

  it('rejects a file', () => {
    const file = join(TEST_DIR, 'a.py');
    writeFileSync(file, 'x = 1\n');

    const result = validateRepoPath(file);

    expect(result.valid).toBe(false);
    if (!result.valid) {
      expect(result.error).toBe(`Path is not a directory: ${file}`);
    }
  });
});

describe('resolveWithinRoot', () => {
  it('resolves paths inside the root', () => {
    expect(resolveWithinRoot('/repo', 'src/pkg')).toBe('/repo/src/pkg');
    expect(resolveWithinRoot('/repo', '.')).toBe('/repo');
  });

  it('refuses paths that escape the root', () => {
    expect(resolveWithinRoot('/repo', '../etc')).toBeNull();
    expect(resolveWithinRoot('/repo', '/etc/passwd')).toBeNull();
    expect(resolveWithinRoot('/repo', 'src/../../x')).toBeNull();
  });

  it('allows names that merely start with two dots', () => {
    expect(resolveWithinRoot('/repo', '..hidden')).toBe('/repo/..hidden');
  });
});

describe('toPosixRelative', () => {
  it('returns a slash-separated relative path', () => {
    expect(toPosixRelative('/repo', '/repo/src/pkg/a.py')).toBe('src/pkg/a.py');
  });
});
