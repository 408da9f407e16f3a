/**
 * Agent Tool Tests
 *
 * Each tool runs against a scratch repository on disk.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'node:path';
import { z } from 'zod';

import { createDefaultTools, defineTool, ToolRegistry, NO_USAGES_FOUND, DOCS_ROOT_NOT_FOUND } from '../index.js';
import { DocumentStore } from '../../../docs/index.js';
import { createTempRepo, type TempRepo } from '../../../test-utils/index.js';

describe('ToolRegistry', () => {
  const registry = new ToolRegistry([
    defineTool({
      name: 'add',
      description: 'Add two numbers',
      parameters: z.object({ a: z.number(), b: z.number() }),
      execute: ({ a, b }) => String(a + b),
    }),
  ]);

  it('validates arguments and executes', async () => {
    expect(await registry.execute('add', { a: 1, b: 2 })).toEqual({ success: true, output: '3' });
  });

  it('reports unknown tools', async () => {
    expect(await registry.execute('sub', {})).toEqual({ success: false, error: 'Tool sub not found.' });
  });

  it('reports invalid arguments', async () => {
    expect(await registry.execute('add', { a: 1 })).toEqual({
      success: false,
      error: 'Invalid arguments for add: b: Required',
    });
  });

  it('refuses duplicate names', () => {
    expect(() =>
      registry.register(
        defineTool({ name: 'add', description: '', parameters: z.object({}), execute: () => '' })
      )
    ).toThrow('Tool already registered: add');
  });
});

describe('default tools', () => {
  let repo: TempRepo;
  let registry: ToolRegistry;

  const run = async (name: string, args: Record<string, unknown>): Promise<string> => {
    const result = await registry.execute(name, args);
    if (!result.success) throw new Error(result.error);
    return result.output;
  };

  beforeEach(() => {
    repo = createTempRepo({
      'src/pkg/core.py': 'def add(a, b):\n    return a + b\n',
      'src/pkg/main.py': 'from pkg.core import add\n\nprint(add(1, 2))\n',
      'node_modules/lib/index.js': 'add(1, 2)\n',
      'README.md': 'add things\n',
    });
    const documents = new DocumentStore({ docsRoot: join(repo.root, 'docs'), repoRoot: repo.root });
    registry = createDefaultTools({ repoRoot: repo.root, documents });
  });

  afterEach(() => {
    repo.cleanup();
  });

  describe('search_code', () => {
    it('returns path:line: content for source files only', async () => {
      expect(await run('search_code', { query: 'add(' })).toBe(
        ['src/pkg/core.py:1: def add(a, b):', 'src/pkg/main.py:3: print(add(1, 2))'].join('\n')
      );
    });

    it('returns the sentinel when nothing matches', async () => {
      expect(await run('search_code', { query: 'subtract' })).toBe(NO_USAGES_FOUND);
    });

    it('stops after ten matches', async () => {
      repo.write('src/many.py', Array.from({ length: 15 }, (_, i) => `needle_${i} = ${i}`).join('\n'));

      const output = await run('search_code', { query: 'needle' });

      expect(output.split('\n')).toHaveLength(10);
      expect(output.split('\n')[9]).toBe('src/many.py:10: needle_9 = 9');
    });
  });

  describe('get_doc_for_symbol', () => {
    it('reports a missing docs root', async () => {
      expect(await run('get_doc_for_symbol', { symbol_id: 'pkg.core.add' })).toBe(DOCS_ROOT_NOT_FOUND);
    });

    it('returns the block with its markers', async () => {
      repo.write(
        'docs/pkg_core.md',
        '# API\n\n<!-- BEGIN: auto:pkg.core.add -->\n### add\n<!-- END: auto:pkg.core.add -->\n'
      );

      expect(await run('get_doc_for_symbol', { symbol_id: 'pkg.core.add' })).toBe(
        '<!-- BEGIN: auto:pkg.core.add -->\n### add\n<!-- END: auto:pkg.core.add -->'
      );
      expect(await run('get_doc_for_symbol', { symbol_id: 'pkg.core.sub' })).toBe(
        'No documentation found for symbol: pkg.core.sub'
      );
    });
  });

  describe('list_directory', () => {
    it('lists entries sorted with [DIR] and [FILE] tags', async () => {
      expect(await run('list_directory', { path: 'src/pkg' })).toBe('[FILE] core.py\n[FILE] main.py');
      expect(await run('list_directory', { path: 'src' })).toBe('[DIR] pkg');
    });

    it('defaults to the repository root', async () => {
      expect(await run('list_directory', {})).toBe('[DIR] node_modules\n[FILE] README.md\n[DIR] src');
    });

    it('returns errors as text', async () => {
      expect(await run('list_directory', { path: 'nope' })).toBe('Error: Path not found: nope');
      expect(await run('list_directory', { path: '../..' })).toBe('Error: Path is outside the repository: ../..');
      expect(await run('list_directory', { path: 'README.md' })).toBe('Error: Not a directory: README.md');
    });
  });
});
