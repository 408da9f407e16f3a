/**
 * Pipeline Types
 */

import type { ImpactInstruction } from '../agent/types.js';
import type { GenerationStrategy as GenerationStrategyName } from '../config/schema.js';
import type { IndexResult, CodeSymbol, SourceLanguage } from '../indexer/types.js';

/**
 * Everything a strategy needs to document one symbol.
 */
export interface GenerationInput {
  symbol: CodeSymbol;
  /** Source lines [start, end] of the symbol */
  code: string;
  /** Rendered retrieval context */
  context: string;
  language: SourceLanguage;
}

export interface GenerationResult {
  /** Cleaned Markdown for the symbol's block; '' when nothing usable came back */
  docs: string;
  /** Technical analysis the docs were rendered from */
  analysis: string;
  /** Dependent symbols whose docs should be refreshed (agentic strategy only) */
  impactInstructions: ImpactInstruction[];
  /** Reviewer verdict (review strategy only) */
  approved?: boolean;
}

export interface GenerationStrategy {
  readonly name: GenerationStrategyName;
  generate(input: GenerationInput): Promise<GenerationResult>;
  /**
   * Regenerate a dependent symbol's docs from an update instruction and its
   * current docs.
   */
  applyImpact(instruction: ImpactInstruction, language: SourceLanguage): Promise<string>;
}

export interface SymbolFailure {
  symbolId: string;
  file: string;
  error: string;
}

/**
 * Outcome of one sync run.
 */
export interface SyncSummary {
  index: IndexResult;
  /** Symbol ids whose block was written */
  documented: string[];
  failed: SymbolFailure[];
  /** Symbol ids removed from the vector store */
  deleted: string[];
  /** Documents rewritten by a reorder */
  reordered: string[];
  /** Dependent symbol ids refreshed by impact instructions */
  impactUpdates: string[];
}
