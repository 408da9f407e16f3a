/**
 * Tests for evaluate command
 *
 * Real config loader, tree-sitter extractor and documents in a temp
 * repository; the LLM factory returns scripted judge replies.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { existsSync, readFileSync, realpathSync } from 'node:fs';
import { join } from 'node:path';
import { Command } from 'commander';

import { createEvaluateCommand } from '../evaluate.js';
import type { CommandContext } from '../../types.js';
import { createLLMProvider } from '../../../providers/index.js';
import { createTempRepo, ScriptedLLMProvider, type TempRepo } from '../../../test-utils/index.js';

vi.mock('../../../providers/index.js', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../../../providers/index.js')>()),
  createLLMProvider: vi.fn(),
}));

const SOURCE = 'src/pkg/util.py';
const DOC = 'docs/pkg_util.md';
const A_BLOCK = '<!-- BEGIN: auto:pkg.util.a -->\nReturns one.\n<!-- END: auto:pkg.util.a -->';

describe('evaluate command', () => {
  let repo: TempRepo;
  let root: string;
  let mockContext: CommandContext;
  let logOutput: string[];
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    repo = createTempRepo({ [SOURCE]: 'def a():\n    return 1\n' });
    root = realpathSync(repo.root);
    logOutput = [];
    mockContext = {
      options: { verbose: false, json: false },
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

  async function run(...args: string[]): Promise<void> {
    const program = new Command();
    program.addCommand(createEvaluateCommand(() => mockContext));
    await program.parseAsync(['node', 'test', 'evaluate', '--repo', repo.root, ...args]);
  }

  it('writes a text report for every documented source file', async () => {
    repo.write(DOC, `# API Documentation: pkg_util\n\n${A_BLOCK}\n`);
    const llm = new ScriptedLLMProvider(['Looks right.']);
    vi.mocked(createLLMProvider).mockReturnValue(llm);

    await run();

    const reportPath = join(root, '.docweave', 'evaluation_summary.txt');
    const text = readFileSync(reportPath, 'utf-8');
    expect(text).toContain(`${DOC} <-> ${SOURCE} (matched by symbol id)\n`);
    expect(text).toContain('[evaluated] pkg.util.a\nLooks right.\n');
    expect(logOutput).toContain(`  Report:    ${reportPath}`);
    expect(llm.callCount).toBe(1);
  });

  it('prints the report as JSON and writes it beside the text default', async () => {
    repo.write(DOC, `${A_BLOCK}\n`);
    vi.mocked(createLLMProvider).mockReturnValue(new ScriptedLLMProvider(['Accurate.']));
    mockContext.options.json = true;

    await run(SOURCE, '--format', 'json');

    const output: unknown = JSON.parse(String(consoleLogSpy.mock.calls[0]?.[0]));
    const reportPath = join(root, '.docweave', 'evaluation_summary.json');
    expect(output).toMatchObject({
      output: reportPath,
      summary: { documents: 1, pairs: 1, evaluated: 1, missingDocs: 0, extraDocs: 0, failed: 0 },
    });
    expect(existsSync(reportPath)).toBe(true);
  });

  it('does nothing when no source file has a document', async () => {
    const llm = new ScriptedLLMProvider();
    vi.mocked(createLLMProvider).mockReturnValue(llm);

    await run();

    expect(logOutput).toEqual(['No documented source files to evaluate. Run docweave sync first.']);
    expect(llm.callCount).toBe(0);
  });

  it('warns about listed files outside the source tree', async () => {
    repo.write('tests/test_util.py', 'def test_a():\n    pass\n');
    vi.mocked(createLLMProvider).mockReturnValue(new ScriptedLLMProvider());

    await run('tests/test_util.py');

    expect(mockContext.warn).toHaveBeenCalledWith('Not a source file for this repository: tests/test_util.py');
    expect(logOutput).toEqual(['No documented source files to evaluate. Run docweave sync first.']);
  });

  it('rejects an unknown report format', async () => {
    await expect(run('--format', 'xml')).rejects.toThrow('Unknown report format: xml');
  });
});
