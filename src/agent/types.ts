/**
 * Agent Loop Types
 *
 * The model answers every step with one JSON object. It is parsed into a
 * strict tagged union; anything that does not fit becomes the `error`
 * variant instead of being accepted loosely.
 */

import { z } from 'zod';

// ============================================================================
// RESPONSE SCHEMAS
// ============================================================================

/** Reserved action name that ends the loop */
export const FINISH_ACTION = 'FINISH';

/**
 * An instruction from the impact loop to refresh a dependent symbol's docs.
 */
export const ImpactInstructionSchema = z.object({
  symbol_id: z.string().min(1),
  original_docs: z.string().default(''),
  update_instructions: z.string().min(1),
});

export type ImpactInstruction = z.infer<typeof ImpactInstructionSchema>;

/**
 * Terminal payload: `{"action": "FINISH", "analysis": "...", "impact_instructions": [...]}`
 */
export const FinishPayloadSchema = z.object({
  action: z.literal(FINISH_ACTION),
  thought: z.string().optional(),
  analysis: z.string().optional(),
  impact_instructions: z.array(ImpactInstructionSchema).optional(),
});

export type FinishPayload = z.infer<typeof FinishPayloadSchema>;

/**
 * Tool call: `{"thought": "...", "action": "search_code", "args": {...}}`
 */
export const ToolCallSchema = z.object({
  thought: z.string().optional(),
  action: z.string().min(1),
  args: z.record(z.unknown()).optional(),
});

// ============================================================================
// PARSED RESPONSE
// ============================================================================

export type AgentResponse =
  | { type: 'finish'; payload: FinishPayload }
  | { type: 'tool_call'; action: string; args: Record<string, unknown>; thought?: string }
  | { type: 'error'; reason: string; raw: string };

// ============================================================================
// LOOP STATE AND RESULT
// ============================================================================

/**
 * One recorded step. `observation` is what went into the history
 * (truncated tool output, or a corrective note).
 */
export interface AgentStep {
  /** 1-based step number; the forced attempt is maxSteps + 1 */
  step: number;
  kind: 'tool_call' | 'finish' | 'unknown_action' | 'invalid_response' | 'error' | 'forced_finish';
  thought?: string;
  action?: string;
  args?: Record<string, unknown>;
  observation?: string;
}

export interface AgentState {
  /** History entries in order; joined with '\n' into the prompt */
  history: string[];
  /** Completion calls made so far */
  steps: number;
  finished: boolean;
}

export interface AgentLoopResult {
  payload: FinishPayload;
  /** Completion calls made, at most maxSteps + 1 */
  steps: number;
  /** Tools actually executed */
  toolCalls: number;
  /** True when the step budget ran out and the fallback attempt produced the payload */
  forced: boolean;
  history: string[];
}
