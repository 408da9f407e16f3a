/**
 * Provider Credential Validation
 *
 * Checks that the selected provider can be reached before any work starts,
 * without exposing key values.
 *
 * SECURITY: These functions NEVER log or return the actual key.
 * They only report presence/absence and format validity.
 */

import { z } from 'zod';

import { getEnv, getOpenAICompatibleConfig, hasApiKey, SETUP_INSTRUCTIONS, type CredentialProvider } from '../config/env.js';
import { APIKeyError, ConfigError } from '../errors/index.js';

// ============================================================================
// VALIDATION RESULT TYPE
// ============================================================================

/**
 * Result of validating a provider's credentials.
 *
 * When valid: { valid: true }
 * When invalid: { valid: false, error, setupInstructions }
 */
export type ValidationResult =
  | { valid: true }
  | { valid: false; error: string; setupInstructions: string; missingKey?: string };

// ============================================================================
// FORMAT VALIDATORS (Zod schemas)
// ============================================================================

/**
 * Ollama and OpenAI-compatible endpoints must be HTTP(S) URLs.
 */
export const EndpointUrlSchema = z
  .string()
  .url('Invalid endpoint URL')
  .refine(
    (url) => url.startsWith('http://') || url.startsWith('https://'),
    'Endpoint must be an HTTP(S) URL'
  );

// ============================================================================
// VALIDATION FUNCTIONS
// ============================================================================

function missingKey(provider: CredentialProvider, envVar: string): ValidationResult {
  return {
    valid: false,
    error: `${envVar} environment variable is not set`,
    setupInstructions: SETUP_INSTRUCTIONS[provider],
    missingKey: envVar,
  };
}

function validateEndpoint(provider: CredentialProvider, url: string): ValidationResult {
  const result = EndpointUrlSchema.safeParse(url);
  if (!result.success) {
    return {
      valid: false,
      error: `${result.error.issues[0]?.message ?? 'Invalid endpoint URL'}: ${url}`,
      setupInstructions: SETUP_INSTRUCTIONS[provider],
    };
  }
  return { valid: true };
}

/**
 * Validate the credentials a provider needs.
 *
 * - anthropic / openai: API key present
 * - ollama: OLLAMA_HOST is an HTTP(S) URL
 * - openai-compatible: base URL set and valid (the key is optional for local servers)
 */
export function validateProviderCredentials(provider: CredentialProvider): ValidationResult {
  switch (provider) {
    case 'anthropic':
      return hasApiKey('anthropic') ? { valid: true } : missingKey(provider, 'ANTHROPIC_API_KEY');
    case 'openai':
      return hasApiKey('openai') ? { valid: true } : missingKey(provider, 'OPENAI_API_KEY');
    case 'ollama':
      return validateEndpoint(provider, getEnv('OLLAMA_HOST'));
    case 'openai-compatible': {
      const { baseUrl } = getOpenAICompatibleConfig();
      if (!baseUrl?.trim()) {
        return missingKey(provider, 'OPENAI_COMPATIBLE_BASE_URL');
      }
      return validateEndpoint(provider, baseUrl.trim());
    }
  }
}

/**
 * Throw the matching CLI error when a provider is not usable.
 *
 * @throws APIKeyError for a missing key or base URL
 * @throws ConfigError for a malformed endpoint URL
 */
export function assertProviderReady(provider: CredentialProvider): void {
  const result = validateProviderCredentials(provider);
  if (result.valid) {
    return;
  }
  if (result.missingKey) {
    throw new APIKeyError(provider, result.missingKey);
  }
  throw new ConfigError(result.error, result.setupInstructions);
}
