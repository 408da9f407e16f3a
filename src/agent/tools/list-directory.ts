/**
 * list_directory: shallow listing of a repository directory.
 */

import { existsSync, readdirSync, statSync } from 'node:fs';
import { z } from 'zod';

import { resolveWithinRoot } from '../../utils/index.js';
import { defineTool, type Tool } from './tool.js';

const listDirectoryInputSchema = z.object({
  path: z.string().default('.').describe('Directory relative to the repository root'),
});

export function createListDirectoryTool(repoRoot: string): Tool<typeof listDirectoryInputSchema> {
  return defineTool({
    name: 'list_directory',
    description: 'List the entries of a directory relative to the repository root, as [DIR] / [FILE] lines.',
    parameters: listDirectoryInputSchema,

    execute: ({ path }) => {
      const absolute = resolveWithinRoot(repoRoot, path);
      if (absolute === null) {
        return `Error: Path is outside the repository: ${path}`;
      }
      if (!existsSync(absolute)) {
        return `Error: Path not found: ${path}`;
      }
      if (!statSync(absolute).isDirectory()) {
        return `Error: Not a directory: ${path}`;
      }

      const entries = readdirSync(absolute, { withFileTypes: true })
        .map((entry) => `${entry.isDirectory() ? '[DIR]' : '[FILE]'} ${entry.name}`)
        .sort((a, b) => a.slice(a.indexOf(' ') + 1).localeCompare(b.slice(b.indexOf(' ') + 1)));

      return entries.length > 0 ? entries.join('\n') : `Directory is empty: ${path}`;
    },
  });
}
