/**
 * search_code: literal text search over the repository's source files.
 */

import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';

import { collectSourceFiles } from '../../indexer/scanner.js';
import { silentLogger, type Logger } from '../../utils/index.js';
import { defineTool, type Tool } from './tool.js';

export const NO_USAGES_FOUND = 'No direct usages found.';
export const DEFAULT_MAX_MATCHES = 10;

export interface SearchCodeToolOptions {
  repoRoot: string;
  /** indexing.extensions */
  extensions?: readonly string[];
  /** indexing.ignore_patterns */
  ignorePatterns?: readonly string[];
  maxMatches?: number;
  logger?: Logger;
}

const searchCodeInputSchema = z.object({
  query: z.string().min(1).describe('Literal text to look for, e.g. a function name'),
});

export function createSearchCodeTool(options: SearchCodeToolOptions): Tool<typeof searchCodeInputSchema> {
  const { repoRoot, maxMatches = DEFAULT_MAX_MATCHES, logger = silentLogger } = options;

  return defineTool({
    name: 'search_code',
    description:
      'Search all source files for a literal string. Returns up to ' +
      `${maxMatches} matches as "path:line: content".`,
    parameters: searchCodeInputSchema,

    execute: async ({ query }) => {
      const files = await collectSourceFiles(repoRoot, repoRoot, {
        extensions: options.extensions,
        ignorePatterns: options.ignorePatterns,
      });

      const matches: string[] = [];
      for (const file of files) {
        let lines: string[];
        try {
          lines = readFileSync(join(repoRoot, file), 'utf-8').split(/\r?\n/);
        } catch (error) {
          logger.debug?.(`search_code: skipping ${file}: ${error instanceof Error ? error.message : String(error)}`);
          continue;
        }

        for (let i = 0; i < lines.length && matches.length < maxMatches; i++) {
          const line = lines[i] ?? '';
          if (line.includes(query)) {
            matches.push(`${file}:${i + 1}: ${line.trim()}`);
          }
        }
        if (matches.length >= maxMatches) break;
      }

      return matches.length > 0 ? matches.join('\n') : NO_USAGES_FOUND;
    },
  });
}
