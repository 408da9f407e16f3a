/**
 * Generation Strategies
 *
 * - rag: code expert over the retrieval context, then docs expert
 * - agentic: research agent loop, then docs expert, then (optionally) an
 *   impact loop naming dependent symbols whose docs need refreshing
 * - review: the review loop
 */

import { runAgentLoop } from '../agent/agent-loop.js';
import { nullAuditLog, type AuditLog } from '../agent/audit-log.js';
import {
  CODE_EXPERT_PROMPT,
  DOCS_EXPERT_PROMPT,
  IMPACT_LOOP_PROMPT,
  RESEARCH_LOOP_PROMPT,
  languageVariables,
} from '../agent/prompts.js';
import { renderTemplate } from '../agent/template.js';
import type { ToolRegistry } from '../agent/tools/tool.js';
import type { ImpactInstruction } from '../agent/types.js';
import type { Config } from '../config/schema.js';
import type { CodeSymbol, SourceLanguage } from '../indexer/types.js';
import type { LLMProvider } from '../providers/types.js';
import { silentLogger, stripCodeFences, type Logger } from '../utils/index.js';
import { runReviewLoop, type FailureLog } from './review-loop.js';
import type { GenerationInput, GenerationResult, GenerationStrategy } from './types.js';

export const NO_ANALYSIS = 'No analysis produced.';
export const UPDATE_INSTRUCTION_PREFIX = 'UPDATE INSTRUCTION: ';

// ============================================================================
// SHARED STEPS
// ============================================================================

async function complete(
  llm: LLMProvider,
  template: string,
  language: SourceLanguage,
  variables: Record<string, string>
): Promise<string> {
  const prompt = renderTemplate(template, { ...languageVariables(language), ...variables });
  const response = await llm.chat([{ role: 'user', content: prompt }]);
  return response.content;
}

/**
 * Render an analysis as Markdown. Outer fences are stripped and the result
 * trimmed.
 */
export async function renderDocs(
  llm: LLMProvider,
  analysis: string,
  existingDocs: string,
  language: SourceLanguage
): Promise<string> {
  const raw = await complete(llm, DOCS_EXPERT_PROMPT, language, { analysis, existing_docs: existingDocs });
  return stripCodeFences(raw);
}

async function applyImpactInstruction(
  llm: LLMProvider,
  instruction: ImpactInstruction,
  language: SourceLanguage
): Promise<string> {
  return renderDocs(
    llm,
    `${UPDATE_INSTRUCTION_PREFIX}${instruction.update_instructions}`,
    instruction.original_docs,
    language
  );
}

// ============================================================================
// RAG
// ============================================================================

export function createRagStrategy(llm: LLMProvider): GenerationStrategy {
  return {
    name: 'rag',
    async generate({ code, context, language }: GenerationInput): Promise<GenerationResult> {
      const analysis = (await complete(llm, CODE_EXPERT_PROMPT, language, { code, context, feedback: '' })).trim();
      const docs = await renderDocs(llm, analysis, '', language);
      return { docs, analysis, impactInstructions: [] };
    },
    applyImpact: (instruction, language) => applyImpactInstruction(llm, instruction, language),
  };
}

// ============================================================================
// AGENTIC
// ============================================================================

export interface AgenticStrategyOptions {
  llm: LLMProvider;
  tools: ToolRegistry;
  maxSteps: number;
  observationLimit: number;
  /** Run the impact loop after each symbol */
  impactAnalysis: boolean;
  auditLog?: AuditLog;
  logger?: Logger;
}

/**
 * Impact instructions minus the symbol itself and repeated ids (first wins).
 */
export function filterImpactInstructions(
  symbol: CodeSymbol,
  instructions: readonly ImpactInstruction[]
): ImpactInstruction[] {
  const seen = new Set<string>([symbol.symbolId]);
  return instructions.filter((instruction) => {
    if (seen.has(instruction.symbol_id)) return false;
    seen.add(instruction.symbol_id);
    return true;
  });
}

export function createAgenticStrategy(options: AgenticStrategyOptions): GenerationStrategy {
  const { llm, tools, maxSteps, observationLimit, impactAnalysis } = options;
  const auditLog = options.auditLog ?? nullAuditLog;
  const logger = options.logger ?? silentLogger;

  return {
    name: 'agentic',
    async generate({ symbol, code, context, language }: GenerationInput): Promise<GenerationResult> {
      const lang = languageVariables(language);

      const research = await runAgentLoop({
        llm,
        template: RESEARCH_LOOP_PROMPT,
        variables: { ...lang, code, context },
        tools,
        maxSteps,
        observationLimit,
        auditLog,
        label: `research ${symbol.symbolId}`,
        logger,
      });
      const analysis = research.payload.analysis?.trim() || NO_ANALYSIS;
      const docs = await renderDocs(llm, analysis, '', language);

      if (!impactAnalysis) {
        return { docs, analysis, impactInstructions: [] };
      }

      const impact = await runAgentLoop({
        llm,
        template: IMPACT_LOOP_PROMPT,
        variables: { ...lang, symbol_id: symbol.symbolId, code, analysis },
        tools,
        maxSteps,
        observationLimit,
        auditLog,
        label: `impact ${symbol.symbolId}`,
        logger,
      });
      const impactInstructions = filterImpactInstructions(symbol, impact.payload.impact_instructions ?? []);
      if (impactInstructions.length > 0) {
        logger.debug?.(
          `${symbol.symbolId} affects ${impactInstructions.map((i) => i.symbol_id).join(', ')}`
        );
      }
      return { docs, analysis, impactInstructions };
    },
    applyImpact: (instruction, language) => applyImpactInstruction(llm, instruction, language),
  };
}

// ============================================================================
// REVIEW
// ============================================================================

export interface ReviewStrategyOptions {
  llm: LLMProvider;
  tools: ToolRegistry;
  maxRetries: number;
  failureLog?: FailureLog;
  logger?: Logger;
}

/** Last dotted segment of a qualname */
function shortName(qualname: string): string {
  const parts = qualname.split('.');
  return parts[parts.length - 1] ?? qualname;
}

export function createReviewStrategy(options: ReviewStrategyOptions): GenerationStrategy {
  const { llm, tools, maxRetries, failureLog } = options;
  const logger = options.logger ?? silentLogger;

  return {
    name: 'review',
    async generate({ symbol, code, context, language }: GenerationInput): Promise<GenerationResult> {
      const usage = await tools.execute('search_code', { query: shortName(symbol.qualname) });
      const usageContext = usage.success ? usage.output : usage.error;

      const result = await runReviewLoop({
        llm,
        symbolId: symbol.symbolId,
        code,
        context,
        usageContext,
        language,
        maxRetries,
        failureLog,
        logger,
      });
      return { docs: result.docs, analysis: result.analysis, impactInstructions: [], approved: result.approved };
    },
    applyImpact: (instruction, language) => applyImpactInstruction(llm, instruction, language),
  };
}

// ============================================================================
// FACTORY
// ============================================================================

export interface StrategyDependencies {
  config: Config;
  llm: LLMProvider;
  tools: ToolRegistry;
  auditLog?: AuditLog;
  failureLog?: FailureLog;
  logger?: Logger;
}

/**
 * Build the strategy named by `generation.strategy` (or `name`).
 */
export function createStrategy(
  deps: StrategyDependencies,
  name: Config['generation']['strategy'] = deps.config.generation.strategy
): GenerationStrategy {
  const { config, llm, tools, logger } = deps;
  switch (name) {
    case 'rag':
      return createRagStrategy(llm);
    case 'agentic':
      return createAgenticStrategy({
        llm,
        tools,
        maxSteps: config.agent.max_steps,
        observationLimit: config.agent.observation_limit,
        impactAnalysis: config.generation.impact_analysis,
        auditLog: deps.auditLog,
        logger,
      });
    case 'review':
      return createReviewStrategy({
        llm,
        tools,
        maxRetries: config.generation.review_max_retries,
        failureLog: deps.failureLog,
        logger,
      });
  }
}
