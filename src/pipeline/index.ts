/**
 * Pipeline Module
 *
 * Generation strategies, the review loop, and the sync run that ties the
 * indexer, the agent and the document store together.
 */

export { runSyncPipeline, groupByFile, sourceOrder, type SyncPipelineOptions } from './sync-pipeline.js';

export {
  createStrategy,
  createRagStrategy,
  createAgenticStrategy,
  createReviewStrategy,
  filterImpactInstructions,
  renderDocs,
  NO_ANALYSIS,
  UPDATE_INSTRUCTION_PREFIX,
  type AgenticStrategyOptions,
  type ReviewStrategyOptions,
  type StrategyDependencies,
} from './strategies.js';

export {
  runReviewLoop,
  parseReviewVerdict,
  JsonlFailureLog,
  ReviewVerdictSchema,
  MALFORMED_REVIEW_FEEDBACK,
  NO_FEEDBACK,
  type FailureLog,
  type ReviewFailureRecord,
  type ReviewLoopOptions,
  type ReviewLoopResult,
  type ReviewVerdict,
} from './review-loop.js';

export type {
  GenerationInput,
  GenerationResult,
  GenerationStrategy,
  SymbolFailure,
  SyncSummary,
} from './types.js';
