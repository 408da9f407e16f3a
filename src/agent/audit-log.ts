/**
 * Agent Audit Log
 *
 * Append-only, human-readable record of every agent step, written to
 * <repo>/.docweave/agent_history.log for post-hoc review.
 */

import { appendFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';

import { silentLogger, type Logger } from '../utils/index.js';
import type { AgentStep } from './types.js';

export interface AuditLog {
  /** Mark the start of a loop run (e.g. "research pkg.Foo.bar") */
  begin(label: string): void;
  record(step: AgentStep): void;
}

/**
 * Render one step as a log entry.
 */
export function formatAuditEntry(step: AgentStep): string {
  const prefix = step.kind === 'forced_finish' ? '[Fallback]' : `[Step ${step.step}]`;
  const lines: string[] = [];

  switch (step.kind) {
    case 'tool_call':
      lines.push(`${prefix} Action: ${step.action ?? ''}`);
      if (step.thought) lines.push(`Thought: ${step.thought}`);
      lines.push(`Args: ${JSON.stringify(step.args ?? {})}`);
      lines.push(`Result: ${step.observation ?? ''}`);
      break;
    case 'finish':
      lines.push(`${prefix} FINISHED`);
      if (step.thought) lines.push(`Thought: ${step.thought}`);
      break;
    case 'unknown_action':
      lines.push(`${prefix} Error: Unknown action ${step.action ?? ''}`);
      break;
    case 'invalid_response':
    case 'error':
      lines.push(`${prefix} ${step.kind === 'error' ? 'Exception' : 'Invalid response'}: ${step.observation ?? ''}`);
      break;
    case 'forced_finish':
      lines.push(`${prefix} Step budget exhausted; forced FINISH`);
      if (step.observation) lines.push(`Result: ${step.observation}`);
      break;
  }

  return `\n${lines.join('\n')}\n`;
}

/**
 * File-backed audit log. Write failures are reported through the logger
 * and never interrupt the loop.
 */
export class FileAuditLog implements AuditLog {
  private warned = false;

  constructor(
    readonly path: string,
    private readonly logger: Logger = silentLogger
  ) {}

  begin(label: string): void {
    this.append(`\n=== ${new Date().toISOString()} ${label} ===\n`);
  }

  record(step: AgentStep): void {
    this.append(formatAuditEntry(step));
  }

  private append(text: string): void {
    try {
      mkdirSync(dirname(this.path), { recursive: true });
      appendFileSync(this.path, text, 'utf-8');
    } catch (error) {
      // One warning per log, not one per step
      if (!this.warned) {
        this.warned = true;
        const message = error instanceof Error ? error.message : String(error);
        this.logger.warn(`Cannot write agent audit log ${this.path}: ${message}`);
      }
    }
  }
}

/**
 * Audit log that discards everything.
 */
export const nullAuditLog: AuditLog = {
  begin: () => {},
  record: () => {},
};
