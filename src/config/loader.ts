/**
 * Configuration Loader
 *
 * Handles the complete config lifecycle:
 * 1. Load <repo>/.docweave/config.toml if it exists
 * 2. Validate with the partial Zod schema
 * 3. Merge with defaults (user values override defaults)
 * 4. Freeze the result; it is passed explicitly to every component
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import TOML from '@iarna/toml';
import { ConfigSchema, PartialConfigSchema, type Config } from './schema.js';
import { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';
import { getConfigPath } from './paths.js';
import { ConfigError } from '../errors/index.js';

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return (
    value !== null &&
    typeof value === 'object' &&
    !Array.isArray(value) &&
    !(value instanceof Date)
  );
}

function isJsonMap(value: TOML.AnyJson | undefined): value is TOML.JsonMap {
  return isPlainObject(value);
}

/**
 * Deep merge two objects, with source values overriding target.
 * Arrays are replaced, not concatenated.
 */
export function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const result: PlainObject = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = target[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}

/**
 * Recursively freeze a value in place and return it.
 */
export function deepFreeze<T>(value: T): Readonly<T> {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

function formatIssues(error: { issues: Array<{ path: Array<string | number>; message: string }> }): string {
  return error.issues
    .map((issue) => `  - ${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('\n');
}

function readConfigFile(configPath: string): TOML.JsonMap {
  const content = fs.readFileSync(configPath, 'utf-8');
  try {
    return TOML.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown parse error';
    throw new ConfigError(
      `Invalid TOML in config file: ${message}`,
      `Fix the syntax in ${configPath} or run: docweave config init --force`
    );
  }
}

/**
 * Load the configuration for a repository.
 * Returns the merged, deep-frozen config (defaults + user overrides).
 *
 * @throws ConfigError if the file exists but is invalid
 */
export function loadConfig(repoRoot: string): Config {
  const configPath = getConfigPath(repoRoot);

  if (!fs.existsSync(configPath)) {
    return deepFreeze(ConfigSchema.parse(structuredClone(DEFAULT_CONFIG)));
  }

  const parsed = readConfigFile(configPath);
  const validationResult = PartialConfigSchema.safeParse(parsed);

  if (!validationResult.success) {
    throw new ConfigError(
      `Invalid configuration in ${configPath}:\n${formatIssues(validationResult.error)}`
    );
  }

  const merged = ConfigSchema.safeParse(deepMerge(structuredClone(DEFAULT_CONFIG), validationResult.data));
  if (!merged.success) {
    throw new ConfigError(`Invalid configuration in ${configPath}:\n${formatIssues(merged.error)}`);
  }

  return deepFreeze(merged.data);
}

/**
 * Write the commented template to <repo>/.docweave/config.toml.
 *
 * @returns the path written
 * @throws ConfigError if the file exists and force is not set
 */
export function initConfig(repoRoot: string, force = false): string {
  const configPath = getConfigPath(repoRoot);

  if (fs.existsSync(configPath) && !force) {
    throw new ConfigError(
      `Config file already exists: ${configPath}`,
      'Run: docweave config init --force  to overwrite it'
    );
  }

  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, CONFIG_TEMPLATE, 'utf-8');
  return configPath;
}

/**
 * Walk a dot-notation path through nested objects.
 */
function lookup(root: unknown, key: string): unknown {
  let current: unknown = root;
  for (const part of key.split('.')) {
    if (!isPlainObject(current)) {
      return undefined;
    }
    current = current[part];
  }
  return current;
}

/**
 * Get a specific config value by dot-notation path
 * Example: getConfigValue(config, 'llm.model') => 'claude-sonnet-4-20250514'
 */
export function getConfigValue(config: Config, key: string): unknown {
  return lookup(config, key);
}

/**
 * Set a specific config value by dot-notation path and write the file back.
 * Only the user's own keys are written; defaults stay implicit.
 */
export function setConfigValue(repoRoot: string, key: string, value: string): void {
  const parts = key.split('.');
  const defaultValue = lookup(DEFAULT_CONFIG, key);

  if (parts.some((part) => part === '') || defaultValue === undefined || isPlainObject(defaultValue)) {
    throw new ConfigError(`Unknown config key: ${key}`);
  }

  const configPath = getConfigPath(repoRoot);
  const config: TOML.JsonMap = fs.existsSync(configPath) ? readConfigFile(configPath) : {};

  let current = config;
  for (const part of parts.slice(0, -1)) {
    const next = current[part];
    if (isJsonMap(next)) {
      current = next;
    } else {
      const fresh: TOML.JsonMap = {};
      current[part] = fresh;
      current = fresh;
    }
  }

  const lastPart = parts[parts.length - 1] ?? key;
  current[lastPart] = Array.isArray(defaultValue) ? parseList(value) : parseValue(value);

  // Validate the complete config before saving
  const merged = ConfigSchema.safeParse(deepMerge(structuredClone(DEFAULT_CONFIG), config));
  if (!merged.success) {
    throw new ConfigError(
      `Invalid value for '${key}':\n${formatIssues(merged.error)}`,
      'Run: docweave config list  to see current values and types'
    );
  }

  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, TOML.stringify(config), 'utf-8');
}

/**
 * Parse a string value into the appropriate type
 * Handles booleans, numbers, and strings
 */
function parseValue(value: string): boolean | number | string {
  if (value.toLowerCase() === 'true') return true;
  if (value.toLowerCase() === 'false') return false;

  const num = Number(value);
  if (!isNaN(num) && value.trim() !== '') return num;

  return value;
}

/** "py, ts" => ['py', 'ts'] */
function parseList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/**
 * List all config values in a flat format
 * Returns entries like ['llm.model', 'claude-sonnet-4-20250514']
 */
export function listConfig(config: Config): Array<[string, unknown]> {
  const entries: Array<[string, unknown]> = [];

  function flatten(obj: PlainObject, prefix = ''): void {
    for (const [key, value] of Object.entries(obj)) {
      const fullKey = prefix ? `${prefix}.${key}` : key;

      if (isPlainObject(value)) {
        flatten(value, fullKey);
      } else {
        entries.push([fullKey, value]);
      }
    }
  }

  flatten(config);
  return entries;
}
