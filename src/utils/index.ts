/**
 * Utilities Module
 *
 * Shared utility functions used across the codebase.
 */

export { consoleLogger, silentLogger, type Logger } from './logger.js';

export { stripCodeFences, tryParseJson, parseModelJson, type JsonParseResult } from './json.js';

export {
  validateRepoPath,
  resolveWithinRoot,
  toPosixRelative,
  type PathValidationResult,
} from './path-validation.js';
