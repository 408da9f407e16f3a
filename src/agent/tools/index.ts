/**
 * Agent Tools
 *
 * The capability table the agent loop dispatches on.
 */

import type { DocumentStore } from '../../docs/index.js';
import type { Logger } from '../../utils/index.js';
import { createGetDocForSymbolTool } from './get-doc-for-symbol.js';
import { createListDirectoryTool } from './list-directory.js';
import { createSearchCodeTool } from './search-code.js';
import { ToolRegistry } from './tool.js';

export { defineTool, ToolRegistry, type Tool, type ToolResult } from './tool.js';
export { createSearchCodeTool, NO_USAGES_FOUND, type SearchCodeToolOptions } from './search-code.js';
export { createGetDocForSymbolTool, DOCS_ROOT_NOT_FOUND } from './get-doc-for-symbol.js';
export { createListDirectoryTool } from './list-directory.js';

export interface DefaultToolsOptions {
  repoRoot: string;
  documents: DocumentStore;
  extensions?: readonly string[];
  ignorePatterns?: readonly string[];
  logger?: Logger;
}

/**
 * search_code, get_doc_for_symbol and list_directory, bound to one repository.
 */
export function createDefaultTools(options: DefaultToolsOptions): ToolRegistry {
  return new ToolRegistry([
    createSearchCodeTool({
      repoRoot: options.repoRoot,
      extensions: options.extensions,
      ignorePatterns: options.ignorePatterns,
      logger: options.logger,
    }),
    createGetDocForSymbolTool(options.documents),
    createListDirectoryTool(options.repoRoot),
  ]);
}
