/**
 * Agent Loop
 *
 * Bounded think/act/observe cycle:
 *
 *   THINKING ──valid FINISH──────────────> done
 *      │  ──tool call──> execute, observe ─┐
 *      │  ──malformed──> corrective note ──┤
 *      └──────────────────<────────────────┘
 *
 * After maxSteps completions without FINISH, one more attempt is made with
 * an explicit "finish now" instruction and its result is coerced into a
 * FINISH payload. At most maxSteps + 1 completion calls; never throws.
 */

import type { LLMProvider } from '../providers/types.js';
import { silentLogger, type Logger } from '../utils/index.js';
import { nullAuditLog, type AuditLog } from './audit-log.js';
import { parseAgentResponse } from './response-parser.js';
import { renderTemplate } from './template.js';
import type { ToolRegistry } from './tools/tool.js';
import { FINISH_ACTION, type AgentLoopResult, type AgentState, type AgentStep, type FinishPayload } from './types.js';

// ============================================================================
// CONSTANTS
// ============================================================================

export const DEFAULT_OBSERVATION_LIMIT = 1000;
export const TRUNCATION_SUFFIX = '...(truncated)';
export const INVALID_JSON_NOTE = 'System: You produced invalid JSON. Please correct it.';
export const FALLBACK_INSTRUCTION =
  'System: You have reached the maximum number of tool calls. You MUST now produce the final ' +
  'technical analysis based on the information you have. Do not call any more tools. ' +
  "Output the final JSON with action='FINISH'.";

// ============================================================================
// TYPES
// ============================================================================

export interface AgentLoopOptions {
  llm: LLMProvider;
  /** Prompt template; `{history}` and `{tools_info}` are filled in by the loop */
  template: string;
  variables: Readonly<Record<string, string>>;
  tools: ToolRegistry;
  /** Completion calls before the forced finish (agent.max_steps) */
  maxSteps: number;
  /** Characters of tool output kept in history (agent.observation_limit) */
  observationLimit?: number;
  auditLog?: AuditLog;
  /** Written as the audit log run header */
  label?: string;
  logger?: Logger;
}

// ============================================================================
// HELPERS
// ============================================================================

/**
 * Cut `text` to `limit` characters and mark the cut.
 */
export function truncateObservation(text: string, limit: number = DEFAULT_OBSERVATION_LIMIT): string {
  return text.length > limit ? `${text.slice(0, limit)}${TRUNCATION_SUFFIX}` : text;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function toolCallEntry(action: string, args: Record<string, unknown>, observation: string): string {
  return `Action: ${action}\nArgs: ${JSON.stringify(args)}\nResult: ${observation}\n`;
}

// ============================================================================
// LOOP
// ============================================================================

/**
 * Run the loop until the model finishes or the budget runs out.
 */
export async function runAgentLoop(options: AgentLoopOptions): Promise<AgentLoopResult> {
  const {
    llm,
    template,
    variables,
    tools,
    maxSteps,
    observationLimit = DEFAULT_OBSERVATION_LIMIT,
    auditLog = nullAuditLog,
    logger = silentLogger,
  } = options;

  const state: AgentState = { history: [], steps: 0, finished: false };
  const toolsInfo = tools.describe();
  let toolCalls = 0;

  const complete = async (): Promise<string> => {
    const prompt = renderTemplate(template, {
      ...variables,
      tools_info: toolsInfo,
      history: state.history.join('\n'),
    });
    state.steps++;
    const response = await llm.chat([{ role: 'user', content: prompt }]);
    return response.content;
  };

  const record = (step: AgentStep): void => {
    auditLog.record(step);
  };

  auditLog.begin(options.label ?? 'agent loop');

  for (let step = 1; step <= maxSteps; step++) {
    logger.debug?.(`[Step ${step}] Thinking...`);

    let raw: string;
    try {
      raw = await complete();
    } catch (error) {
      const note = `System: Error occurred: ${errorMessage(error)}`;
      state.history.push(note);
      record({ step, kind: 'error', observation: errorMessage(error) });
      continue;
    }

    const parsed = parseAgentResponse(raw);

    if (parsed.type === 'finish') {
      state.finished = true;
      record({ step, kind: 'finish', thought: parsed.payload.thought });
      return { payload: parsed.payload, steps: state.steps, toolCalls, forced: false, history: state.history };
    }

    if (parsed.type === 'error') {
      logger.debug?.(`[Step ${step}] ${parsed.reason}`);
      state.history.push(INVALID_JSON_NOTE);
      record({ step, kind: 'invalid_response', observation: `${parsed.reason}\n${raw}` });
      continue;
    }

    const { action, args, thought } = parsed;
    if (!tools.has(action)) {
      state.history.push(`Error: Unknown action ${action}`);
      record({ step, kind: 'unknown_action', action, args, thought });
      continue;
    }

    logger.debug?.(`[Tool] Calling ${action} with ${JSON.stringify(args)}`);
    const result = await tools.execute(action, args);
    toolCalls++;
    const output = result.success ? result.output : `Error executing tool '${action}': ${result.error}`;
    const observation = truncateObservation(output, observationLimit);

    state.history.push(toolCallEntry(action, args, observation));
    record({ step, kind: 'tool_call', action, args, thought, observation });
  }

  // --- Budget exhausted: one last attempt ---
  logger.debug?.(`Max steps (${maxSteps}) reached. Forcing final answer.`);
  state.history.push(FALLBACK_INSTRUCTION);

  let payload: FinishPayload;
  try {
    const raw = await complete();
    const parsed = parseAgentResponse(raw);
    payload = parsed.type === 'finish' ? parsed.payload : { action: FINISH_ACTION, analysis: raw };
    record({ step: maxSteps + 1, kind: 'forced_finish', observation: truncateObservation(raw, observationLimit) });
  } catch (error) {
    payload = { action: FINISH_ACTION };
    record({ step: maxSteps + 1, kind: 'forced_finish', observation: `Exception: ${errorMessage(error)}` });
  }

  state.finished = true;
  return { payload, steps: state.steps, toolCalls, forced: true, history: state.history };
}
