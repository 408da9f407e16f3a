/**
 * Tests for context command
 *
 * The runtime is swapped for the hash embedder and an in-memory store.
 * Everything else is real.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Command } from 'commander';

import { createContextCommand } from '../context.js';
import type { CommandContext } from '../../types.js';
import { openIndex, type IndexRuntime } from '../../utils/runtime.js';
import { DEFAULT_CONFIG, resolveRepoPaths } from '../../../config/index.js';
import { SqliteVectorStore } from '../../../store/index.js';
import {
  createTempRepo,
  HashEmbeddingProvider,
  type TempRepo,
} from '../../../test-utils/index.js';

vi.mock('../../utils/runtime.js', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../../utils/runtime.js')>()),
  openIndex: vi.fn(),
}));

const SOURCE = 'src/pkg/mod.py';

describe('context command', () => {
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

  describe('context', () => {
    it('lists neighbours other than the symbol itself', async () => {
      const symbols = ['pkg.a', 'pkg.b'];
      await runtime.store.upsert(
        await runtime.embedder.embed(symbols),
        symbols.map((id) => ({ symbol_id: id, qualname: id, file: 'src/pkg/x.py', kind: 'function', hash: 'h' }))
      );

      await run(createContextCommand(() => mockContext), 'context', 'pkg.a', '-k', '5');

      expect(jsonOutput()).toMatchObject({
        qualname: 'pkg.a',
        related: [{ qualname: 'pkg.b', symbol_id: 'pkg.b', file: 'src/pkg/x.py', kind: 'function' }],
      });
    });

    it('renders the neighbour list in text mode', async () => {
      await runtime.store.upsert(await runtime.embedder.embed(['pkg.a', 'pkg.b']), [
        { symbol_id: 'pkg.a', qualname: 'pkg.a', file: 'src/pkg/x.py', kind: 'function', hash: 'h' },
        { symbol_id: 'pkg.b', qualname: 'pkg.b', file: 'src/pkg/x.py', kind: 'class', hash: 'h' },
      ]);
      mockContext.options.json = false;

      await run(createContextCommand(() => mockContext), 'context', 'pkg.a');

      expect(logOutput[1]).toBe('- pkg.b (class) from src/pkg/x.py');
    });

    it('rejects a non-numeric -k', async () => {
      await expect(run(createContextCommand(() => mockContext), 'context', 'pkg.a', '-k', 'many')).rejects.toThrow(
        'Invalid -k value: many'
      );
    });
  });
});
