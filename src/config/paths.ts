/**
 * Per-repository Path Definitions
 *
 * Single source of truth for where docweave reads and writes inside a
 * repository. All modules take a RepoPaths value instead of joining paths
 * themselves.
 *
 * Directory structure:
 * <repo>/
 * ├── docs/                       (generated Markdown, paths.docs_root)
 * └── .docweave/                  (paths.state_dir)
 *     ├── config.toml
 *     ├── vectors.db              (SQLite vector store)
 *     ├── agent_history.log       (agent audit log)
 *     ├── review_failures.jsonl   (review-loop exhaustion records)
 *     └── evaluation_summary.txt  (docweave evaluate report)
 */

import { join, resolve } from 'node:path';
import type { Config } from './schema.js';

/** The config file always lives in the default state directory */
export const STATE_DIR_NAME = '.docweave';
export const CONFIG_FILE_NAME = 'config.toml';
export const VECTORS_DB_NAME = 'vectors.db';
export const AUDIT_LOG_NAME = 'agent_history.log';
export const FAILURE_LOG_NAME = 'review_failures.jsonl';
export const EVALUATION_REPORT_NAME = 'evaluation_summary.txt';

export interface RepoPaths {
  repoRoot: string;
  sourceRoot: string;
  docsRoot: string;
  stateDir: string;
  configPath: string;
  vectorsDb: string;
  auditLog: string;
  failureLog: string;
  evaluationReport: string;
}

/**
 * Get the config file path (<repo>/.docweave/config.toml)
 */
export function getConfigPath(repoRoot: string): string {
  return join(resolve(repoRoot), STATE_DIR_NAME, CONFIG_FILE_NAME);
}

/**
 * Resolve every docweave location for a repository.
 */
export function resolveRepoPaths(repoRoot: string, config: Config): RepoPaths {
  const root = resolve(repoRoot);
  const stateDir = resolve(root, config.paths.state_dir);
  return {
    repoRoot: root,
    sourceRoot: resolve(root, config.paths.source_root),
    docsRoot: resolve(root, config.paths.docs_root),
    stateDir,
    configPath: getConfigPath(root),
    vectorsDb: join(stateDir, VECTORS_DB_NAME),
    auditLog: join(stateDir, AUDIT_LOG_NAME),
    failureLog: join(stateDir, FAILURE_LOG_NAME),
    evaluationReport: join(stateDir, EVALUATION_REPORT_NAME),
  };
}
