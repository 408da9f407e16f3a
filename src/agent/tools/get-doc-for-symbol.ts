/**
 * get_doc_for_symbol: the current documentation block of a symbol.
 */

import { existsSync } from 'node:fs';
import { z } from 'zod';

import type { DocumentStore } from '../../docs/index.js';
import { defineTool, type Tool } from './tool.js';

export const DOCS_ROOT_NOT_FOUND = 'Error: Documentation root not found.';

const getDocInputSchema = z.object({
  symbol_id: z.string().min(1).describe('Dotted symbol id, e.g. pkg.module.Class.method'),
});

export function createGetDocForSymbolTool(documents: DocumentStore): Tool<typeof getDocInputSchema> {
  return defineTool({
    name: 'get_doc_for_symbol',
    description:
      'Return the existing generated documentation block for a symbol id, markers included.',
    parameters: getDocInputSchema,

    execute: ({ symbol_id }) => {
      if (!existsSync(documents.docsRoot)) {
        return DOCS_ROOT_NOT_FOUND;
      }
      const found = documents.findSection(symbol_id);
      return found ? found.block : `No documentation found for symbol: ${symbol_id}`;
    },
  });
}
