/**
 * Agent Module
 *
 * Bounded tool-use loop, its tools and prompts, and the retrieval context
 * builder that feeds it.
 *
 * @example
 * ```typescript
 * import { runAgentLoop, createDefaultTools, RESEARCH_LOOP_PROMPT } from './agent';
 *
 * const { payload } = await runAgentLoop({
 *   llm,
 *   template: RESEARCH_LOOP_PROMPT,
 *   variables: { code, context, language: 'Python', fence: 'python' },
 *   tools: createDefaultTools({ repoRoot, documents }),
 *   maxSteps: 5,
 * });
 * ```
 */

export {
  runAgentLoop,
  truncateObservation,
  DEFAULT_OBSERVATION_LIMIT,
  TRUNCATION_SUFFIX,
  INVALID_JSON_NOTE,
  FALLBACK_INSTRUCTION,
  type AgentLoopOptions,
} from './agent-loop.js';

export { parseAgentResponse } from './response-parser.js';
export { renderTemplate } from './template.js';
export { FileAuditLog, formatAuditEntry, nullAuditLog, type AuditLog } from './audit-log.js';

export {
  buildRetrievalContext,
  findRelatedSymbols,
  renderRetrievalContext,
  NO_RELATED_CONTEXT,
  type RetrievalContextOptions,
} from './context-builder.js';

export {
  RESEARCH_LOOP_PROMPT,
  IMPACT_LOOP_PROMPT,
  CODE_EXPERT_PROMPT,
  DOCS_EXPERT_PROMPT,
  DOCS_REVIEW_PROMPT,
  DOC_EVALUATION_PROMPT,
  LANGUAGE_DISPLAY,
  languageVariables,
} from './prompts.js';

export {
  createDefaultTools,
  createSearchCodeTool,
  createGetDocForSymbolTool,
  createListDirectoryTool,
  defineTool,
  ToolRegistry,
  NO_USAGES_FOUND,
  DOCS_ROOT_NOT_FOUND,
  type DefaultToolsOptions,
  type Tool,
  type ToolResult,
} from './tools/index.js';

export {
  FINISH_ACTION,
  FinishPayloadSchema,
  ImpactInstructionSchema,
  ToolCallSchema,
  type AgentLoopResult,
  type AgentResponse,
  type AgentState,
  type AgentStep,
  type FinishPayload,
  type ImpactInstruction,
} from './types.js';
