/**
 * Review Loop
 *
 * Draft, review, revise. Each attempt runs the code expert (with the last
 * reviewer feedback), renders the analysis as Markdown and asks a reviewer
 * for a JSON verdict. The loop stops on APPROVED or after maxRetries
 * attempts; an exhausted loop records its last draft in the failure log
 * and still hands that draft back.
 */

import { appendFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { z } from 'zod';

import {
  CODE_EXPERT_PROMPT,
  DOCS_EXPERT_PROMPT,
  DOCS_REVIEW_PROMPT,
  languageVariables,
} from '../agent/prompts.js';
import { renderTemplate } from '../agent/template.js';
import type { SourceLanguage } from '../indexer/types.js';
import type { LLMProvider } from '../providers/types.js';
import { parseModelJson, silentLogger, stripCodeFences, type Logger } from '../utils/index.js';

// ============================================================================
// VERDICT
// ============================================================================

export const ReviewVerdictSchema = z.object({
  status: z.enum(['APPROVED', 'REVISION_NEEDED']),
  reasoning: z.string().default(''),
  feedback: z.string().default(''),
});

export type ReviewVerdict = z.infer<typeof ReviewVerdictSchema>;

export const NO_FEEDBACK = 'None';
export const MALFORMED_REVIEW_FEEDBACK =
  'The review could not be read as a JSON verdict. Re-check the documentation against the code: ' +
  'every parameter, the return value and every raised exception.';

/**
 * Parse a reviewer reply. Anything that is not a valid verdict counts as
 * REVISION_NEEDED with corrective feedback.
 */
export function parseReviewVerdict(raw: string): ReviewVerdict {
  const parsed = parseModelJson(raw);
  if (parsed.ok) {
    const verdict = ReviewVerdictSchema.safeParse(parsed.value);
    if (verdict.success) {
      return verdict.data;
    }
  }
  return { status: 'REVISION_NEEDED', reasoning: '', feedback: MALFORMED_REVIEW_FEEDBACK };
}

// ============================================================================
// FAILURE LOG
// ============================================================================

/** One JSON line in review_failures.jsonl */
export interface ReviewFailureRecord {
  symbol_id: string;
  final_draft: string;
  last_feedback: string;
  attempts: number;
  timestamp: string;
}

export interface FailureLog {
  append(record: ReviewFailureRecord): void;
}

/**
 * Append-only JSONL failure log. Write failures are logged, not thrown.
 */
export class JsonlFailureLog implements FailureLog {
  constructor(
    readonly path: string,
    private readonly logger: Logger = silentLogger
  ) {}

  append(record: ReviewFailureRecord): void {
    try {
      mkdirSync(dirname(this.path), { recursive: true });
      appendFileSync(this.path, `${JSON.stringify(record)}\n`, 'utf-8');
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Cannot write review failure log ${this.path}: ${message}`);
    }
  }
}

// ============================================================================
// LOOP
// ============================================================================

export interface ReviewLoopOptions {
  llm: LLMProvider;
  symbolId: string;
  code: string;
  context: string;
  /** What search_code found for the symbol's name */
  usageContext: string;
  language: SourceLanguage;
  /** generation.review_max_retries */
  maxRetries: number;
  failureLog?: FailureLog;
  logger?: Logger;
  /** Clock for failure records */
  now?: () => Date;
}

export interface ReviewLoopResult {
  /** Last draft; '' when no attempt produced one */
  docs: string;
  analysis: string;
  approved: boolean;
  attempts: number;
  lastFeedback: string;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * @example
 * const { docs, approved } = await runReviewLoop({
 *   llm, symbolId: 'pkg.Foo.bar', code, context, usageContext,
 *   language: 'python', maxRetries: 3, failureLog,
 * });
 */
export async function runReviewLoop(options: ReviewLoopOptions): Promise<ReviewLoopResult> {
  const { llm, symbolId, code, context, usageContext, language, failureLog } = options;
  const logger = options.logger ?? silentLogger;
  const now = options.now ?? (() => new Date());
  const maxRetries = Math.max(1, options.maxRetries);
  const lang = languageVariables(language);

  const ask = async (template: string, variables: Record<string, string>): Promise<string> => {
    const response = await llm.chat([{ role: 'user', content: renderTemplate(template, { ...lang, ...variables }) }]);
    return response.content;
  };

  let docs = '';
  let analysis = '';
  let feedback = NO_FEEDBACK;
  let attempts = 0;

  while (attempts < maxRetries) {
    attempts++;
    let verdict: ReviewVerdict;
    try {
      analysis = (await ask(CODE_EXPERT_PROMPT, { code, context, feedback })).trim();
      docs = stripCodeFences(await ask(DOCS_EXPERT_PROMPT, { analysis, existing_docs: docs }));
      verdict = parseReviewVerdict(await ask(DOCS_REVIEW_PROMPT, { code, current_docs: docs, usage_context: usageContext }));
    } catch (error) {
      feedback = `Generation failed: ${errorMessage(error)}`;
      logger.warn(`Review attempt ${attempts}/${maxRetries} for ${symbolId} failed: ${errorMessage(error)}`);
      continue;
    }

    if (verdict.status === 'APPROVED') {
      logger.debug?.(`${symbolId} approved after ${attempts} attempt(s)`);
      return { docs, analysis, approved: true, attempts, lastFeedback: verdict.feedback };
    }
    feedback = verdict.feedback || verdict.reasoning || MALFORMED_REVIEW_FEEDBACK;
    logger.debug?.(`${symbolId} needs revision (${attempts}/${maxRetries}): ${feedback}`);
  }

  logger.warn(`${symbolId} not approved after ${attempts} attempt(s); keeping the last draft`);
  failureLog?.append({
    symbol_id: symbolId,
    final_draft: docs,
    last_feedback: feedback,
    attempts,
    timestamp: now().toISOString(),
  });
  return { docs, analysis, approved: false, attempts, lastFeedback: feedback };
}
