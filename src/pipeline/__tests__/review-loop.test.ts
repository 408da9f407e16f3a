/**
 * Review Loop Tests
 */

import { describe, it, expect, afterEach } from 'vitest';
import { readFileSync } from 'node:fs';
import { join } from 'node:path';

import {
  JsonlFailureLog,
  MALFORMED_REVIEW_FEEDBACK,
  NO_FEEDBACK,
  parseReviewVerdict,
  runReviewLoop,
  type FailureLog,
  type ReviewFailureRecord,
  type ReviewLoopOptions,
} from '../review-loop.js';
import { createTempRepo, ScriptedLLMProvider, type ScriptedReply, type TempRepo } from '../../test-utils/index.js';

// ============================================================================
// Test Helpers
// ============================================================================

const APPROVED = '{"status": "APPROVED", "reasoning": "complete", "feedback": ""}';

function revision(feedback: string): string {
  return JSON.stringify({ status: 'REVISION_NEEDED', reasoning: 'incomplete', feedback });
}

function memoryFailureLog(): FailureLog & { records: ReviewFailureRecord[] } {
  const records: ReviewFailureRecord[] = [];
  return { records, append: (record) => records.push(record) };
}

function options(replies: ScriptedReply[], overrides: Partial<ReviewLoopOptions> = {}): ReviewLoopOptions {
  return {
    llm: new ScriptedLLMProvider(replies),
    symbolId: 'pkg.Foo.bar',
    code: 'def bar(self):\n    return 1',
    context: 'No related context found.',
    usageContext: 'src/app.py:3: foo.bar()',
    language: 'python',
    maxRetries: 3,
    ...overrides,
  };
}

// ============================================================================
// parseReviewVerdict
// ============================================================================

describe('parseReviewVerdict', () => {
  it('reads a fenced verdict', () => {
    expect(parseReviewVerdict('```json\n{"status": "REVISION_NEEDED", "feedback": "add Raises"}\n```')).toEqual({
      status: 'REVISION_NEEDED',
      reasoning: '',
      feedback: 'add Raises',
    });
  });

  it('treats non-JSON as a revision request', () => {
    expect(parseReviewVerdict('Looks fine to me!')).toEqual({
      status: 'REVISION_NEEDED',
      reasoning: '',
      feedback: MALFORMED_REVIEW_FEEDBACK,
    });
  });

  it('treats an unknown status as a revision request', () => {
    expect(parseReviewVerdict('{"status": "LGTM"}').feedback).toBe(MALFORMED_REVIEW_FEEDBACK);
  });
});

// ============================================================================
// runReviewLoop
// ============================================================================

describe('runReviewLoop', () => {
  it('returns the first approved draft', async () => {
    const failureLog = memoryFailureLog();
    const opts = options(['analysis 1', '```markdown\nDOC 1\n```', APPROVED], { failureLog });

    const result = await runReviewLoop(opts);

    expect(result).toEqual({ docs: 'DOC 1', analysis: 'analysis 1', approved: true, attempts: 1, lastFeedback: '' });
    expect(failureLog.records).toEqual([]);
  });

  it('starts with no feedback and passes usage context to the reviewer', async () => {
    const llm = new ScriptedLLMProvider(['analysis 1', 'DOC 1', APPROVED]);

    await runReviewLoop(options([], { llm }));

    expect(llm.requests[0]?.[0]?.content).toContain(`Previous feedback (if any):\n${NO_FEEDBACK}\n`);
    expect(llm.requests[2]?.[0]?.content).toContain('src/app.py:3: foo.bar()');
    expect(llm.requests[2]?.[0]?.content).toContain('Generated documentation:\nDOC 1\n');
  });

  it('feeds reviewer feedback and the previous draft into the next attempt', async () => {
    const llm = new ScriptedLLMProvider([
      'analysis 1',
      'DOC 1',
      revision('Document the ValueError'),
      'analysis 2',
      'DOC 2',
      APPROVED,
    ]);

    const result = await runReviewLoop(options([], { llm }));

    expect(result.docs).toBe('DOC 2');
    expect(result.attempts).toBe(2);
    expect(llm.requests[3]?.[0]?.content).toContain('Document the ValueError');
    expect(llm.requests[4]?.[0]?.content).toContain('DOC 1');
  });

  it('records the last draft when retries run out', async () => {
    const failureLog = memoryFailureLog();
    const opts = options(['a1', 'DOC 1', revision('fix params'), 'a2', 'DOC 2', revision('fix returns')], {
      maxRetries: 2,
      failureLog,
      now: () => new Date('2026-01-01T00:00:00.000Z'),
    });

    const result = await runReviewLoop(opts);

    expect(result).toEqual({ docs: 'DOC 2', analysis: 'a2', approved: false, attempts: 2, lastFeedback: 'fix returns' });
    expect(failureLog.records).toEqual([
      {
        symbol_id: 'pkg.Foo.bar',
        final_draft: 'DOC 2',
        last_feedback: 'fix returns',
        attempts: 2,
        timestamp: '2026-01-01T00:00:00.000Z',
      },
    ]);
  });

  it('sends corrective feedback after a malformed review', async () => {
    const llm = new ScriptedLLMProvider(['a1', 'DOC 1', 'not json', 'a2', 'DOC 2', APPROVED]);

    const result = await runReviewLoop(options([], { llm }));

    expect(result.approved).toBe(true);
    expect(llm.requests[3]?.[0]?.content).toContain(MALFORMED_REVIEW_FEEDBACK);
  });

  it('counts a failed completion as an attempt and keeps going', async () => {
    const llm = new ScriptedLLMProvider([new Error('rate limited'), 'a2', 'DOC 2', APPROVED]);

    const result = await runReviewLoop(options([], { llm, maxRetries: 2 }));

    expect(result.approved).toBe(true);
    expect(result.attempts).toBe(2);
    expect(llm.requests[1]?.[0]?.content).toContain('Generation failed: rate limited');
  });

  it('never throws when every attempt fails', async () => {
    const failureLog = memoryFailureLog();
    const opts = options([new Error('down'), new Error('down')], { maxRetries: 2, failureLog });

    const result = await runReviewLoop(opts);

    expect(result.docs).toBe('');
    expect(result.approved).toBe(false);
    expect(result.lastFeedback).toBe('Generation failed: down');
    expect(failureLog.records).toHaveLength(1);
  });
});

// ============================================================================
// JsonlFailureLog
// ============================================================================

describe('JsonlFailureLog', () => {
  let repo: TempRepo | undefined;

  afterEach(() => {
    repo?.cleanup();
    repo = undefined;
  });

  it('appends one JSON object per line', () => {
    repo = createTempRepo();
    const path = join(repo.root, '.docweave', 'review_failures.jsonl');
    const log = new JsonlFailureLog(path);
    const record: ReviewFailureRecord = {
      symbol_id: 'pkg.a',
      final_draft: 'draft',
      last_feedback: 'fb',
      attempts: 3,
      timestamp: '2026-01-01T00:00:00.000Z',
    };

    log.append(record);
    log.append({ ...record, symbol_id: 'pkg.b' });

    const lines = readFileSync(path, 'utf-8').trimEnd().split('\n');
    expect(lines.map((line) => JSON.parse(line).symbol_id)).toEqual(['pkg.a', 'pkg.b']);
  });
});
