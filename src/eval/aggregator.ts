/**
 * Evaluation Aggregator
 *
 * Rolls per-pair results up into a summary and renders the plain-text
 * report written by `docweave evaluate`.
 */

import type { DocumentEvaluation, EvaluationReport, EvaluationSummary, PairEvaluation } from './types.js';

// ============================================================================
// CONSTANTS
// ============================================================================

export const REPORT_TITLE = 'Evaluation Results (LLM as a Judge)';
export const PAIR_RULE = '-'.repeat(40);

const STRATEGY_LABEL: Readonly<Record<DocumentEvaluation['strategy'], string>> = {
  name: 'matched by symbol id',
  order: 'matched by section order',
};

// ============================================================================
// SUMMARY
// ============================================================================

export function summarizeEvaluation(documents: readonly DocumentEvaluation[]): EvaluationSummary {
  const pairs = documents.flatMap((doc) => doc.pairs);
  const count = (status: PairEvaluation['status']): number => pairs.filter((p) => p.status === status).length;
  return {
    documents: documents.length,
    pairs: pairs.length,
    evaluated: count('evaluated'),
    missingDocs: count('missing_doc'),
    extraDocs: count('extra_doc'),
    failed: count('failed'),
  };
}

// ============================================================================
// TEXT REPORT
// ============================================================================

function pairHeading(pair: PairEvaluation): string {
  const subject = pair.symbolId ?? '(unnamed section)';
  return `[${pair.status}] ${subject}`;
}

function formatDocument(doc: DocumentEvaluation): string[] {
  const lines = [`${doc.docPath} <-> ${doc.sources.join(', ')} (${STRATEGY_LABEL[doc.strategy]})`, ''];
  for (const pair of doc.pairs) {
    lines.push(pairHeading(pair), pair.critique, PAIR_RULE);
  }
  lines.push('');
  return lines;
}

/**
 * @example
 * formatEvaluationReport(report).split('\n')[0] // 'Evaluation Results (LLM as a Judge)'
 */
export function formatEvaluationReport(report: EvaluationReport): string {
  const { summary } = report;
  const lines = [
    REPORT_TITLE,
    '='.repeat(REPORT_TITLE.length),
    '',
    `Judge: ${report.judge}`,
    `Generated: ${report.generatedAt}`,
    '',
    ...report.documents.flatMap(formatDocument),
    'Summary',
    `  Documents: ${summary.documents}`,
    `  Evaluated: ${summary.evaluated}`,
    `  Missing:   ${summary.missingDocs}`,
    `  Extra:     ${summary.extraDocs}`,
    `  Failed:    ${summary.failed}`,
  ];
  return `${lines.join('\n')}\n`;
}
