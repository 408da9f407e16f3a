/**
 * Environment Variable Handler
 *
 * Loads and provides secure access to provider credentials.
 * A .env file in the repository root is honoured via dotenv.
 *
 * SECURITY NOTES:
 * - Keys are NEVER logged, even in verbose mode
 * - Keys are NEVER included in error messages
 * - Only key presence/absence and format validity are reported
 */

import { join } from 'node:path';
import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';

// ============================================================================
// SCHEMA DEFINITIONS
// ============================================================================

/**
 * Environment variable schema. Keys are optional at load time; only the
 * provider actually selected in config.toml needs its key.
 */
export const EnvSchema = z.object({
  ANTHROPIC_API_KEY: z.string().optional(),
  OPENAI_API_KEY: z.string().optional(),
  OLLAMA_HOST: z.string().default('http://localhost:11434'),
  // Any endpoint speaking the OpenAI wire format (vLLM, OpenRouter, LM Studio...)
  OPENAI_COMPATIBLE_API_KEY: z.string().optional(),
  OPENAI_COMPATIBLE_BASE_URL: z.string().optional(),
  OPENAI_COMPATIBLE_MODEL: z.string().optional(),
});

export type EnvVars = z.infer<typeof EnvSchema>;

export type CredentialProvider = 'anthropic' | 'openai' | 'ollama' | 'openai-compatible';

// ============================================================================
// PRIVATE STATE
// ============================================================================

/** Parsed once, reset with _clearEnvCache() in tests */
let _envCache: EnvVars | null = null;

// ============================================================================
// PUBLIC API
// ============================================================================

/**
 * Load `<repoRoot>/.env` into process.env. Existing variables win.
 * Clears the cache so the next loadEnv() sees the new values.
 */
export function loadEnvFile(repoRoot: string): void {
  dotenvConfig({ path: join(repoRoot, '.env') });
  _envCache = null;
}

/**
 * Load environment variables (called once, then cached).
 * Does NOT validate key presence - that happens when a provider is created.
 */
export function loadEnv(): EnvVars {
  if (_envCache !== null) {
    return _envCache;
  }

  _envCache = EnvSchema.parse({
    ANTHROPIC_API_KEY: process.env.ANTHROPIC_API_KEY,
    OPENAI_API_KEY: process.env.OPENAI_API_KEY,
    OLLAMA_HOST: process.env.OLLAMA_HOST || undefined,
    OPENAI_COMPATIBLE_API_KEY: process.env.OPENAI_COMPATIBLE_API_KEY,
    OPENAI_COMPATIBLE_BASE_URL: process.env.OPENAI_COMPATIBLE_BASE_URL,
    OPENAI_COMPATIBLE_MODEL: process.env.OPENAI_COMPATIBLE_MODEL,
  });

  return _envCache;
}

/**
 * Get a specific environment variable by key.
 */
export function getEnv<K extends keyof EnvVars>(key: K): EnvVars[K] {
  return loadEnv()[key];
}

/**
 * Check if an API key is configured (non-empty) without exposing it.
 */
export function hasApiKey(provider: 'anthropic' | 'openai' | 'openai-compatible'): boolean {
  const env = loadEnv();
  switch (provider) {
    case 'anthropic':
      return Boolean(env.ANTHROPIC_API_KEY?.trim());
    case 'openai':
      return Boolean(env.OPENAI_API_KEY?.trim());
    case 'openai-compatible':
      return Boolean(env.OPENAI_COMPATIBLE_API_KEY?.trim());
  }
}

/**
 * Ollama host URL, `http://localhost:11434` unless OLLAMA_HOST is set.
 */
export function getOllamaHost(): string {
  return getEnv('OLLAMA_HOST');
}

/**
 * OpenAI-compatible endpoint settings (all optional).
 */
export function getOpenAICompatibleConfig(): {
  apiKey: string | undefined;
  baseUrl: string | undefined;
  model: string | undefined;
} {
  const env = loadEnv();
  return {
    apiKey: env.OPENAI_COMPATIBLE_API_KEY,
    baseUrl: env.OPENAI_COMPATIBLE_BASE_URL,
    model: env.OPENAI_COMPATIBLE_MODEL,
  };
}

/**
 * Clear the environment cache.
 * FOR TESTING ONLY - allows tests to mock different env values.
 *
 * @internal
 */
export function _clearEnvCache(): void {
  _envCache = null;
}

// ============================================================================
// SETUP INSTRUCTIONS
// ============================================================================

/**
 * Shown under the error when a provider's credentials are missing.
 */
export const SETUP_INSTRUCTIONS: Record<CredentialProvider, string> = {
  anthropic: `
To generate docs with Anthropic models:

1. Create an API key at https://console.anthropic.com/
2. Export it, or put it in <repo>/.env:

   ANTHROPIC_API_KEY="<your key>"
`.trim(),

  openai: `
To use OpenAI for completions or embeddings:

1. Create an API key at https://platform.openai.com/api-keys
2. Export it, or put it in <repo>/.env:

   OPENAI_API_KEY="<your key>"
`.trim(),

  ollama: `
To use a local Ollama server:

1. Start it with: ollama serve
2. Pull the configured model, e.g.: ollama pull nomic-embed-text
3. Point OLLAMA_HOST at it if it is not on http://localhost:11434
`.trim(),

  'openai-compatible': `
To use an OpenAI-compatible endpoint, set in the environment or <repo>/.env:

   OPENAI_COMPATIBLE_BASE_URL="https://llm.internal.example/v1"
   OPENAI_COMPATIBLE_API_KEY="<your key>"
   OPENAI_COMPATIBLE_MODEL="<model>"   # optional, overrides llm.model
`.trim(),
};
