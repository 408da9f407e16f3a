/**
 * Tests for sync command
 *
 * The runtime is swapped for the hash embedder and an in-memory store, and
 * the LLM factory for scripted completions. Everything else is real.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { Command } from 'commander';

import { createSyncCommand } from '../sync.js';
import type { CommandContext } from '../../types.js';
import { openIndex, type IndexRuntime } from '../../utils/runtime.js';
import { DEFAULT_CONFIG, resolveRepoPaths } from '../../../config/index.js';
import { createLLMProvider } from '../../../providers/index.js';
import { SqliteVectorStore } from '../../../store/index.js';
import {
  createTempRepo,
  HashEmbeddingProvider,
  ScriptedLLMProvider,
  type TempRepo,
} from '../../../test-utils/index.js';

vi.mock('../../utils/runtime.js', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../../utils/runtime.js')>()),
  openIndex: vi.fn(),
}));

vi.mock('../../../providers/index.js', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../../../providers/index.js')>()),
  createLLMProvider: vi.fn(),
}));

const SOURCE = 'src/pkg/mod.py';

describe('sync command', () => {
  let repo: TempRepo;
  let runtime: IndexRuntime;
  let mockContext: CommandContext;
  let logOutput: string[];
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    repo = createTempRepo({ [SOURCE]: 'def hello():\n    return 1\n' });
    runtime = {
      repoRoot: repo.root,
      config: DEFAULT_CONFIG,
      paths: resolveRepoPaths(repo.root, DEFAULT_CONFIG),
      embedder: new HashEmbeddingProvider(32),
      store: new SqliteVectorStore({ path: ':memory:', collection: 'codebase' }),
    };
    vi.mocked(openIndex).mockReturnValue(runtime);

    logOutput = [];
    mockContext = {
      options: { verbose: false, json: true },
      log: (msg: string) => logOutput.push(msg),
      info: vi.fn(),
      debug: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    };
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    repo.cleanup();
  });

  async function run(command: Command, ...args: string[]): Promise<void> {
    const program = new Command();
    program.addCommand(command);
    await program.parseAsync(['node', 'test', ...args]);
  }

  function jsonOutput(): unknown {
    const first = consoleLogSpy.mock.calls[0];
    return JSON.parse(String(first?.[0]));
  }

  describe('sync', () => {
    it('documents the given file with the chosen strategy', async () => {
      const llm = new ScriptedLLMProvider(['analysis', 'HELLO DOCS']);
      vi.mocked(createLLMProvider).mockReturnValue(llm);

      await run(createSyncCommand(() => mockContext), 'sync', SOURCE, '--strategy', 'rag');

      expect(jsonOutput()).toMatchObject({ added: ['pkg.mod.hello'], documented: ['pkg.mod.hello'], failed: [] });
      expect(vi.mocked(createLLMProvider).mock.calls[0]?.[0].generation.strategy).toBe('rag');
      expect(readFileSync(join(repo.root, 'docs', 'pkg_mod.md'), 'utf-8')).toBe(
        '# API Documentation: pkg_mod\n\n\n\n' +
          '<!-- BEGIN: auto:pkg.mod.hello -->\nHELLO DOCS\n<!-- END: auto:pkg.mod.hello -->\n'
      );
    });

    it('rejects an unknown strategy and closes the index', async () => {
      const close = vi.spyOn(runtime.store, 'close');

      await expect(run(createSyncCommand(() => mockContext), 'sync', SOURCE, '--strategy', 'fancy')).rejects.toThrow(
        'Unknown strategy: fancy'
      );
      expect(close).toHaveBeenCalledTimes(1);
    });

    it('closes the index when the LLM provider cannot be created', async () => {
      const close = vi.spyOn(runtime.store, 'close');
      vi.mocked(createLLMProvider).mockImplementationOnce(() => {
        throw new Error('llm.api_key is not set');
      });

      await expect(run(createSyncCommand(() => mockContext), 'sync', SOURCE)).rejects.toThrow('llm.api_key is not set');
      expect(close).toHaveBeenCalledTimes(1);
    });

    it('does nothing when git reports no changes', async () => {
      vi.mocked(createLLMProvider).mockReturnValue(new ScriptedLLMProvider());
      mockContext.options.json = false;

      await run(createSyncCommand(() => mockContext), 'sync');

      expect(logOutput).toEqual(['No changed source files. Pass files, --since <ref> or --all.']);
    });
  });
});
