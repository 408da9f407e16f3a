/**
 * Tests for config command
 *
 * Runs the real loader against a temp repository.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { Command } from 'commander';

import { createConfigCommand, formatValue } from '../config.js';
import type { CommandContext } from '../../types.js';
import { createTempRepo, type TempRepo } from '../../../test-utils/index.js';

describe('createConfigCommand', () => {
  let repo: TempRepo;
  let mockContext: CommandContext;
  let logOutput: string[];
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    repo = createTempRepo();
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
    process.exitCode = undefined;
    repo.cleanup();
  });

  async function run(...args: string[]): Promise<void> {
    const program = new Command();
    program.addCommand(createConfigCommand(() => mockContext));
    await program.parseAsync(['node', 'test', 'config', '--repo', repo.root, ...args]);
  }

  it('creates command with correct name', () => {
    expect(createConfigCommand(() => mockContext).name()).toBe('config');
  });

  it('init writes the template under .docweave', async () => {
    await run('init');

    const path = join(repo.root, '.docweave', 'config.toml');
    expect(existsSync(path)).toBe(true);
    expect(readFileSync(path, 'utf-8')).toContain('[llm]');
  });

  it('init refuses to overwrite without --force', async () => {
    await run('init');

    await expect(run('init')).rejects.toThrow('Config file already exists');
  });

  it('set then get round-trips a typed value', async () => {
    await run('set', 'agent.max_steps', '8');
    logOutput.length = 0;

    await run('get', 'agent.max_steps');

    expect(logOutput).toEqual(['8']);
  });

  it('prints JSON for get with --json', async () => {
    mockContext.options.json = true;

    await run('get', 'generation.strategy');

    expect(consoleLogSpy).toHaveBeenCalledWith(JSON.stringify({ key: 'generation.strategy', value: 'agentic' }));
  });

  it('reports unknown keys on get', async () => {
    await run('get', 'llm.nope');

    expect(mockContext.error).toHaveBeenCalledWith('Unknown config key: llm.nope');
    expect(process.exitCode).toBe(1);
  });

  it('rejects unknown keys on set', async () => {
    await expect(run('set', 'llm.nope', 'x')).rejects.toThrow('Unknown config key: llm.nope');
  });

  it('lists every key', async () => {
    await run('list');

    const line = logOutput.find((l) => l.includes('agent.max_steps'));
    expect(line).toMatch(/agent\.max_steps.* = .*5/);
    expect(logOutput[logOutput.length - 1]).toContain(join('.docweave', 'config.toml'));
  });
});

describe('formatValue', () => {
  it('formats scalars and lists', () => {
    expect(formatValue(true)).toBe('true');
    expect(formatValue(3)).toBe('3');
    expect(formatValue(['py', 'ts'])).toBe('["py","ts"]');
  });
});
