/**
 * Error formatting and the CLI exit path
 *
 * - Coloured text output for terminals
 * - JSON output for hooks and CI (--json)
 * - Stack traces with --verbose
 */

import chalk from 'chalk';
import { CLIError, ValidationError } from './types.js';

/**
 * Options for error handling behavior
 */
export interface ErrorHandlerOptions {
  /** Show full stack traces */
  verbose?: boolean;
  /** Output as JSON instead of formatted text */
  json?: boolean;
}

/**
 * Structured error for JSON output
 */
export interface ErrorOutput {
  error: string;
  name: string;
  code: number;
  hint?: string;
  issues?: string[];
  stack?: string;
}

/**
 * Format an error for display without exiting.
 */
export function formatError(
  error: unknown,
  options: ErrorHandlerOptions = {}
): string {
  const { verbose = false, json = false } = options;

  if (error instanceof Error) {
    const isCLIError = error instanceof CLIError;

    if (json) {
      const output: ErrorOutput = {
        error: error.message,
        name: error.name,
        code: getExitCode(error),
        hint: isCLIError ? error.hint : undefined,
        issues: error instanceof ValidationError && error.issues.length > 0 ? error.issues : undefined,
        stack: verbose ? error.stack : undefined,
      };
      return JSON.stringify(output, null, 2);
    }

    const lines: string[] = [chalk.red('Error: ') + error.message];

    if (isCLIError && error.hint) {
      lines.push(chalk.dim('Hint: ') + error.hint);
    } else if (!isCLIError && !verbose) {
      lines.push(chalk.dim('Hint: ') + 'Run with --verbose for more details');
    }

    if (verbose && error.stack) {
      lines.push('');
      lines.push(chalk.dim('Stack trace:'));
      lines.push(chalk.dim(error.stack));
    }

    return lines.join('\n');
  }

  // Strings, numbers and other thrown values
  if (json) {
    return JSON.stringify({ error: String(error), name: 'Error', code: 1 }, null, 2);
  }

  return chalk.red('Error: ') + String(error);
}

/**
 * Get the exit code for an error. CLIError carries its own; everything else is 1.
 */
export function getExitCode(error: unknown): number {
  if (error instanceof CLIError) {
    return error.code;
  }
  return 1;
}

/**
 * Print an error to stderr and exit with its code.
 */
export function handleError(
  error: unknown,
  options: ErrorHandlerOptions = {}
): never {
  console.error(formatError(error, options));
  process.exit(getExitCode(error));
}

/**
 * Build a handler for process-level events.
 *
 * Usage:
 *   const handler = createGlobalErrorHandler({ verbose: true });
 *   process.on('uncaughtException', handler);
 *   process.on('unhandledRejection', handler);
 */
export function createGlobalErrorHandler(
  options: ErrorHandlerOptions = {}
): (error: unknown) => never {
  return (error: unknown) => handleError(error, options);
}
