/**
 * Evaluation Exporter
 *
 * Writes an evaluation report as plain text (default) or pretty-printed
 * JSON for scripts.
 */

import * as fs from 'node:fs';
import { dirname } from 'node:path';

import { formatEvaluationReport } from './aggregator.js';
import { EvaluationError, type EvaluationReport, type ReportFormat } from './types.js';

export function renderEvaluationReport(report: EvaluationReport, format: ReportFormat): string {
  return format === 'json' ? `${JSON.stringify(report, null, 2)}\n` : formatEvaluationReport(report);
}

/**
 * Write the report, creating parent directories as needed.
 *
 * @throws EvaluationError when the file cannot be written
 */
export function writeEvaluationReport(report: EvaluationReport, outputPath: string, format: ReportFormat): void {
  try {
    fs.mkdirSync(dirname(outputPath), { recursive: true });
    fs.writeFileSync(outputPath, renderEvaluationReport(report, format), 'utf-8');
  } catch (error) {
    const cause = error instanceof Error ? error : undefined;
    throw new EvaluationError(`Failed to write evaluation report to ${outputPath}: ${cause?.message ?? String(error)}`, cause);
  }
}
