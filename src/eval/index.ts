/**
 * Eval Module
 *
 * LLM-as-judge review of generated documentation against the source it
 * describes.
 */

export {
  runDocEvaluation,
  judgePair,
  MISSING_DOC_NOTE,
  EXTRA_DOC_NOTE,
  type DocEvaluatorOptions,
} from './runner.js';

export { readDocSections, splitSections, matchSections, type MatchedPair, type SectionMatch } from './sections.js';
export { summarizeEvaluation, formatEvaluationReport, REPORT_TITLE, PAIR_RULE } from './aggregator.js';
export { renderEvaluationReport, writeEvaluationReport } from './exporter.js';

export {
  EvaluationError,
  ReportFormatSchema,
  type DocSection,
  type DocumentEvaluation,
  type EvaluationReport,
  type EvaluationSummary,
  type MatchStrategy,
  type PairEvaluation,
  type PairStatus,
  type ReportFormat,
} from './types.js';
