/**
 * Error type definitions for docweave
 *
 * Every error that can reach the CLI boundary extends CLIError, which carries:
 * - A recovery hint shown under the message
 * - An exit code for scripts and CI hooks
 *
 * Errors that must never escape a pipeline stage (tool failures, malformed
 * model output) are modelled as result variants instead, see agent/types.ts.
 */

/**
 * Base class for all docweave errors.
 */
export class CLIError extends Error {
  /** Recovery suggestion shown to the user */
  public readonly hint?: string;

  /** Exit code (1-255, 0 is reserved for success) */
  public readonly code: number;

  constructor(message: string, hint?: string, code: number = 1) {
    super(message);
    // Required for instanceof checks after transpilation
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = 'CLIError';
    this.hint = hint;
    this.code = code;
  }
}

/**
 * Thrown when a file or directory doesn't exist.
 *
 * Exit code 3: File not found (following common Unix conventions)
 */
export class FileNotFoundError extends CLIError {
  constructor(path: string) {
    super(`Path does not exist: ${path}`, 'Check the path and try again', 3);
    this.name = 'FileNotFoundError';
  }
}

/**
 * Thrown for configuration-related errors: invalid TOML, schema violations,
 * unknown keys.
 *
 * Exit code 2: Configuration error
 */
export class ConfigError extends CLIError {
  constructor(message: string, hint?: string) {
    super(message, hint ?? 'Run: docweave config list  to see valid options', 2);
    this.name = 'ConfigError';
  }
}

/**
 * Thrown when an API key is missing or malformed.
 *
 * Exit code 4: API key error
 */
export class APIKeyError extends CLIError {
  constructor(provider: string, envVar?: string) {
    const envVarName = envVar ?? `${provider.toUpperCase()}_API_KEY`;
    super(
      `${provider} API key not configured`,
      `Set the ${envVarName} environment variable (a .env file in the repository root works too)`,
      4
    );
    this.name = 'APIKeyError';
  }
}

/**
 * Thrown for vector store failures (open, read, write).
 *
 * The symbol indexer catches read failures and degrades to an empty
 * hash map; write failures propagate.
 *
 * Exit code 5: Vector store error
 */
export class VectorStoreError extends CLIError {
  /** The underlying driver error, if any */
  public readonly cause?: Error;

  constructor(message: string, cause?: Error) {
    super(message, 'Delete .docweave/vectors.db to rebuild the index from scratch', 5);
    this.name = 'VectorStoreError';
    this.cause = cause;
  }
}

/**
 * Thrown when input validation fails.
 *
 * Used with Zod schemas to provide detailed field-level errors.
 *
 * Exit code 1: General error (validation is user input error)
 */
export class ValidationError extends CLIError {
  /** Individual validation issues */
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    const hint =
      issues.length > 0
        ? `Issues:\n  ${issues.join('\n  ')}`
        : 'Check your input and try again';
    super(message, hint, 1);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

/**
 * Thrown when a symbol id would make section markers ambiguous.
 */
export class InvalidSymbolIdError extends ValidationError {
  public readonly symbolId: string;

  constructor(symbolId: string, reason: string) {
    super(`Invalid symbol id ${JSON.stringify(symbolId)}: ${reason}`);
    this.name = 'InvalidSymbolIdError';
    this.symbolId = symbolId;
  }
}

/**
 * Thrown when a documentation file cannot be read or written.
 *
 * The sync pipeline catches it per file so one broken document
 * does not abort the run.
 *
 * Exit code 6: Document write error
 */
export class DocumentWriteError extends CLIError {
  public readonly path: string;
  public readonly cause?: Error;

  constructor(path: string, cause?: Error) {
    super(
      `Failed to update document ${path}${cause ? `: ${cause.message}` : ''}`,
      'Check that the docs directory is writable',
      6
    );
    this.name = 'DocumentWriteError';
    this.path = path;
    this.cause = cause;
  }
}

/**
 * Thrown by symbol extractors for unreadable or unparseable source files.
 *
 * Exit code 7: Parse error
 */
export class SymbolParseError extends CLIError {
  public readonly file: string;
  public readonly cause?: Error;

  constructor(file: string, cause?: Error) {
    super(
      `Could not parse ${file}${cause ? `: ${cause.message}` : ''}`,
      'The file is skipped; fix the syntax error and run docweave sync again',
      7
    );
    this.name = 'SymbolParseError';
    this.file = file;
    this.cause = cause;
  }
}
