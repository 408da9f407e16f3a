/**
 * Agent Loop Tests
 *
 * Drives the loop with a scripted completion provider and tiny tools.
 */

import { describe, it, expect, vi } from 'vitest';
import { z } from 'zod';

import {
  runAgentLoop,
  truncateObservation,
  FALLBACK_INSTRUCTION,
  INVALID_JSON_NOTE,
  type AgentLoopOptions,
} from '../agent-loop.js';
import type { AuditLog } from '../audit-log.js';
import { defineTool, ToolRegistry } from '../tools/tool.js';
import type { AgentStep } from '../types.js';
import { ScriptedLLMProvider, type ScriptedReply } from '../../test-utils/index.js';

// ============================================================================
// Test Helpers
// ============================================================================

const echo = vi.fn(({ text }: { text: string }) => text);

function createTools(): ToolRegistry {
  return new ToolRegistry([
    defineTool({
      name: 'echo',
      description: 'Repeat the text',
      parameters: z.object({ text: z.string() }),
      execute: echo,
    }),
    defineTool({
      name: 'big',
      description: 'Return a long string',
      parameters: z.object({}),
      execute: () => 'x'.repeat(1500),
    }),
    defineTool({
      name: 'broken',
      description: 'Always throws',
      parameters: z.object({}),
      execute: () => {
        throw new Error('disk on fire');
      },
    }),
  ]);
}

function collectingAuditLog(): AuditLog & { steps: AgentStep[]; labels: string[] } {
  const steps: AgentStep[] = [];
  const labels: string[] = [];
  return {
    steps,
    labels,
    begin: (label) => labels.push(label),
    record: (step) => steps.push(step),
  };
}

function run(replies: ScriptedReply[], overrides: Partial<AgentLoopOptions> = {}) {
  const llm = new ScriptedLLMProvider(replies);
  const auditLog = collectingAuditLog();
  const promise = runAgentLoop({
    llm,
    template: 'Task {task}\n{history}',
    variables: { task: 't' },
    tools: createTools(),
    maxSteps: 3,
    auditLog,
    ...overrides,
  });
  return { llm, auditLog, promise };
}

const FINISH = '{"action": "FINISH", "analysis": "all done"}';
const ECHO_HI = '{"thought": "try echo", "action": "echo", "args": {"text": "hi"}}';

// ============================================================================
// Tests
// ============================================================================

describe('runAgentLoop', () => {
  it('returns a first-call FINISH without calling tools', async () => {
    echo.mockClear();
    const { llm, promise } = run([FINISH]);

    const result = await promise;

    expect(result).toEqual({
      payload: { action: 'FINISH', analysis: 'all done' },
      steps: 1,
      toolCalls: 0,
      forced: false,
      history: [],
    });
    expect(llm.callCount).toBe(1);
    expect(echo).not.toHaveBeenCalled();
  });

  it('executes a tool and feeds the observation into the next prompt', async () => {
    const { llm, promise } = run([ECHO_HI, FINISH]);

    const result = await promise;

    expect(result.toolCalls).toBe(1);
    expect(result.history).toEqual(['Action: echo\nArgs: {"text":"hi"}\nResult: hi\n']);
    expect(llm.requests[0]).toEqual([{ role: 'user', content: 'Task t\n' }]);
    expect(llm.requests[1]).toEqual([
      { role: 'user', content: 'Task t\nAction: echo\nArgs: {"text":"hi"}\nResult: hi\n' },
    ]);
  });

  it('makes exactly maxSteps + 1 calls when the model never finishes', async () => {
    const { llm, promise } = run([ECHO_HI, ECHO_HI, ECHO_HI, ECHO_HI]);

    const result = await promise;

    expect(llm.callCount).toBe(4);
    expect(result.steps).toBe(4);
    expect(result.toolCalls).toBe(3);
    expect(result.forced).toBe(true);
    expect(result.history[result.history.length - 1]).toBe(FALLBACK_INSTRUCTION);
    // The last reply was a tool call: its raw text becomes the analysis
    expect(result.payload).toEqual({ action: 'FINISH', analysis: ECHO_HI });
    expect(llm.lastPrompt()).toContain(FALLBACK_INSTRUCTION);
  });

  it('returns a valid FINISH from the fallback attempt as is', async () => {
    const { promise } = run([ECHO_HI, FINISH], { maxSteps: 1 });

    const result = await promise;

    expect(result.forced).toBe(true);
    expect(result.payload).toEqual({ action: 'FINISH', analysis: 'all done' });
  });

  it('truncates long observations', async () => {
    const { promise } = run(['{"action": "big"}', FINISH]);

    const result = await promise;

    expect(result.history[0]).toBe(`Action: big\nArgs: {}\nResult: ${'x'.repeat(1000)}...(truncated)\n`);
  });

  it('honours a custom observation limit', async () => {
    const { promise } = run(['{"action": "big"}', FINISH], { observationLimit: 10 });

    const result = await promise;

    expect(result.history[0]).toBe(`Action: big\nArgs: {}\nResult: ${'x'.repeat(10)}...(truncated)\n`);
  });

  it('notes unknown actions without executing anything', async () => {
    echo.mockClear();
    const { promise } = run(['{"action": "rm_rf", "args": {}}', FINISH]);

    const result = await promise;

    expect(result.history).toEqual(['Error: Unknown action rm_rf']);
    expect(result.toolCalls).toBe(0);
    expect(echo).not.toHaveBeenCalled();
  });

  it('asks for a correction after malformed output, within the step budget', async () => {
    const { llm, promise } = run(['Sure! Here is my answer.', '{"args": {}}', FINISH]);

    const result = await promise;

    expect(result.history).toEqual([INVALID_JSON_NOTE, INVALID_JSON_NOTE]);
    expect(result.steps).toBe(3);
    expect(result.forced).toBe(false);
    expect(llm.callCount).toBe(3);
  });

  it('accepts fenced JSON', async () => {
    const { promise } = run(['```json\n{"action": "FINISH", "analysis": "fenced"}\n```']);

    expect((await promise).payload.analysis).toBe('fenced');
  });

  it('turns tool exceptions into observations', async () => {
    const { promise } = run(['{"action": "broken"}', FINISH]);

    const result = await promise;

    expect(result.history).toEqual([
      "Action: broken\nArgs: {}\nResult: Error executing tool 'broken': disk on fire\n",
    ]);
  });

  it('reports invalid tool arguments as observations', async () => {
    const { promise } = run(['{"action": "echo", "args": {"text": 5}}', FINISH]);

    const result = await promise;

    expect(result.history[0]).toBe(
      "Action: echo\nArgs: {\"text\":5}\nResult: Error executing tool 'echo': Invalid arguments for echo: text: Expected string, received number\n"
    );
  });

  it('never throws when the completion service fails', async () => {
    const { promise } = run([new Error('timeout'), new Error('timeout'), new Error('timeout'), new Error('timeout')]);

    const result = await promise;

    expect(result.payload).toEqual({ action: 'FINISH' });
    expect(result.steps).toBe(4);
    expect(result.forced).toBe(true);
    expect(result.history.slice(0, 3)).toEqual([
      'System: Error occurred: timeout',
      'System: Error occurred: timeout',
      'System: Error occurred: timeout',
    ]);
  });

  it('performs only the fallback attempt when maxSteps is 0', async () => {
    const { llm, promise } = run(['plain text answer'], { maxSteps: 0 });

    const result = await promise;

    expect(llm.callCount).toBe(1);
    expect(result.payload).toEqual({ action: 'FINISH', analysis: 'plain text answer' });
  });

  it('records every step in the audit log', async () => {
    const { auditLog, promise } = run(['nope', ECHO_HI, '{"action": "ghost"}', FINISH], { label: 'research pkg.Foo' });

    await promise;

    expect(auditLog.labels).toEqual(['research pkg.Foo']);
    expect(auditLog.steps.map((s) => [s.step, s.kind])).toEqual([
      [1, 'invalid_response'],
      [2, 'tool_call'],
      [3, 'unknown_action'],
      [4, 'forced_finish'],
    ]);
    expect(auditLog.steps[1]).toEqual({
      step: 2,
      kind: 'tool_call',
      action: 'echo',
      args: { text: 'hi' },
      thought: 'try echo',
      observation: 'hi',
    });
  });

  it('fills {tools_info} from the registry', async () => {
    const { llm, promise } = run([FINISH], { template: '{tools_info}' });

    await promise;

    expect(llm.lastPrompt()).toBe(
      'Available Tools:\n- echo(text): Repeat the text\n- big(): Return a long string\n- broken(): Always throws'
    );
  });
});

describe('truncateObservation', () => {
  it('leaves text at the limit untouched', () => {
    expect(truncateObservation('abc', 3)).toBe('abc');
    expect(truncateObservation('abcd', 3)).toBe('abc...(truncated)');
  });
});
