/**
 * Test Utilities Module
 *
 * Shared utilities for testing across the codebase.
 *
 * @example
 * ```typescript
 * import { HashEmbeddingProvider, ScriptedLLMProvider } from '../test-utils/index.js';
 *
 * const llm = new ScriptedLLMProvider(['{"action": "FINISH", "args": {}}']);
 * ```
 */

export { HashEmbeddingProvider, ScriptedLLMProvider, type ScriptedReply } from './fakes.js';
export { createTempRepo, type TempRepo } from './temp-repo.js';
