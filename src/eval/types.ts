/**
 * Documentation Evaluation Types
 *
 * An LLM judge reads each symbol's source next to its documentation block
 * and writes a critique. Results are grouped per document, since several
 * source files can share one.
 */

import { z } from 'zod';

import { CLIError } from '../errors/index.js';

// ============================================================================
// SECTIONS
// ============================================================================

/**
 * One documentation section. Marker blocks carry their symbol id; sections
 * split on `---` lines have none and are matched by position.
 */
export interface DocSection {
  symbolId: string | null;
  content: string;
}

/**
 * How sections were paired with symbols:
 * - 'name': marker ids (exact, then by qualified or simple name)
 * - 'order': the n-th section documents the n-th symbol
 */
export type MatchStrategy = 'name' | 'order';

// ============================================================================
// RESULTS
// ============================================================================

/**
 * - evaluated: the judge returned a critique
 * - missing_doc: the symbol has no section
 * - extra_doc: a section matches no symbol
 * - failed: the judge call or the source read failed
 */
export type PairStatus = 'evaluated' | 'missing_doc' | 'extra_doc' | 'failed';

export interface PairEvaluation {
  /** Null for an extra section split on `---` */
  symbolId: string | null;
  /** Repo-relative source file; null for extra sections */
  file: string | null;
  status: PairStatus;
  /** Judge output, or a fixed note for the other statuses */
  critique: string;
}

export interface DocumentEvaluation {
  /** Repo-relative POSIX path of the document */
  docPath: string;
  /** Repo-relative source files that write into the document */
  sources: string[];
  strategy: MatchStrategy;
  pairs: PairEvaluation[];
}

export interface EvaluationSummary {
  documents: number;
  pairs: number;
  evaluated: number;
  missingDocs: number;
  extraDocs: number;
  failed: number;
}

export interface EvaluationReport {
  /** ISO timestamp */
  generatedAt: string;
  /** provider/model of the judge */
  judge: string;
  documents: DocumentEvaluation[];
  summary: EvaluationSummary;
}

// ============================================================================
// OUTPUT
// ============================================================================

export const ReportFormatSchema = z.enum(['text', 'json']);
export type ReportFormat = z.infer<typeof ReportFormatSchema>;

// ============================================================================
// ERRORS
// ============================================================================

export class EvaluationError extends CLIError {
  public readonly cause?: Error;

  constructor(message: string, cause?: Error) {
    super(message, 'Check that the state directory is writable', 1);
    this.name = 'EvaluationError';
    this.cause = cause;
  }
}
