/**
 * Agent Response Parser
 *
 * Turns raw model text into an AgentResponse. Fails closed: a reply is
 * either a valid FINISH, a valid tool call, or an `error`.
 */

import { parseModelJson } from '../utils/index.js';
import { FINISH_ACTION, FinishPayloadSchema, ToolCallSchema, type AgentResponse } from './types.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describeIssues(issues: ReadonlyArray<{ path: (string | number)[]; message: string }>): string {
  return issues.map((i) => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message)).join('; ');
}

/**
 * Parse one model reply. Surrounding ``` / ```json fences are ignored.
 *
 * @example
 * parseAgentResponse('{"action": "FINISH", "analysis": "done"}')
 * // { type: 'finish', payload: { action: 'FINISH', analysis: 'done' } }
 */
export function parseAgentResponse(raw: string): AgentResponse {
  const json = parseModelJson(raw);
  if (!json.ok) {
    return { type: 'error', reason: `Invalid JSON: ${json.error}`, raw };
  }
  if (!isRecord(json.value)) {
    return { type: 'error', reason: 'Expected a JSON object', raw };
  }

  if (json.value.action === FINISH_ACTION) {
    const finish = FinishPayloadSchema.safeParse(json.value);
    return finish.success
      ? { type: 'finish', payload: finish.data }
      : { type: 'error', reason: `Invalid FINISH payload: ${describeIssues(finish.error.issues)}`, raw };
  }

  const call = ToolCallSchema.safeParse(json.value);
  if (!call.success) {
    return { type: 'error', reason: `Invalid tool call: ${describeIssues(call.error.issues)}`, raw };
  }

  return {
    type: 'tool_call',
    action: call.data.action,
    args: call.data.args ?? {},
    ...(call.data.thought !== undefined ? { thought: call.data.thought } : {}),
  };
}
