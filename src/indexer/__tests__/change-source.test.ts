/**
 * Git change source tests
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { execFileSync } from 'node:child_process';
import { getGitChangedFiles } from '../change-source.js';

vi.mock('node:child_process', () => ({
  execFileSync: vi.fn(),
}));

const mockExecFileSync = vi.mocked(execFileSync);

describe('getGitChangedFiles', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('diffs HEAD~1..HEAD by default', () => {
    mockExecFileSync.mockReturnValueOnce('src/b.py\nsrc/a.py\n');

    expect(getGitChangedFiles('/repo')).toEqual(['src/a.py', 'src/b.py']);
    expect(mockExecFileSync).toHaveBeenCalledWith(
      'git',
      ['diff', '--name-only', '--relative', 'HEAD~1', 'HEAD', '--'],
      expect.objectContaining({ cwd: '/repo' })
    );
  });

  it('filters by extension', () => {
    mockExecFileSync.mockReturnValueOnce('README.md\nsrc/a.py\nweb/app.ts\n');

    expect(getGitChangedFiles('/repo', { extensions: ['py'] })).toEqual(['src/a.py']);
  });

  it('passes custom revisions', () => {
    mockExecFileSync.mockReturnValueOnce('');

    expect(getGitChangedFiles('/repo', { base: 'main', head: 'feature' })).toEqual([]);
    expect(mockExecFileSync).toHaveBeenCalledWith(
      'git',
      ['diff', '--name-only', '--relative', 'main', 'feature', '--'],
      expect.anything()
    );
  });

  it('returns [] and warns when git fails', () => {
    mockExecFileSync.mockImplementation(() => {
      throw new Error('fatal: not a git repository\nmore');
    });
    const warn = vi.fn();

    expect(getGitChangedFiles('/repo', { logger: { info: vi.fn(), warn } })).toEqual([]);
    expect(warn).toHaveBeenCalledWith('git diff HEAD~1 HEAD failed: fatal: not a git repository');
  });
});
