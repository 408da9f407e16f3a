/**
 * Configuration Schema
 *
 * Defines the shape of <repo>/.docweave/config.toml using Zod.
 * This provides both TypeScript types AND runtime validation.
 */

import { z } from 'zod';

/**
 * Where sources, generated docs and index state live, relative to the repo root
 */
export const PathsConfigSchema = z.object({
  source_root: z.string().min(1).describe('Directory scanned for source files'),
  docs_root: z.string().min(1).describe('Directory that receives generated Markdown'),
  state_dir: z.string().min(1).describe('Directory for the vector store and logs'),
});

/**
 * LLM provider type (used in multiple schemas)
 */
export const LLMProviderTypeSchema = z.enum(['anthropic', 'openai', 'ollama', 'openai-compatible']);
export type LLMProviderType = z.infer<typeof LLMProviderTypeSchema>;

/**
 * Completion service settings
 */
export const LLMConfigSchema = z.object({
  provider: LLMProviderTypeSchema.describe('Completion provider'),
  model: z.string().min(1).describe('Model name passed to the provider'),
  temperature: z.number().min(0).max(2).describe('Sampling temperature'),
  timeout_ms: z
    .number()
    .int()
    .min(1000)
    .max(600000)
    .describe('Per-request timeout in milliseconds (1000-600000)'),
  max_retries: z.number().int().min(0).max(10).describe('SDK-level retries per request'),
});

export const EmbeddingProviderTypeSchema = z.enum(['openai', 'ollama', 'openai-compatible']);
export type EmbeddingProviderType = z.infer<typeof EmbeddingProviderTypeSchema>;

/**
 * Embedding provider configuration
 */
export const EmbeddingConfigSchema = z.object({
  provider: EmbeddingProviderTypeSchema.describe('Embedding provider'),
  model: z.string().min(1).describe('Embedding model name'),
  batch_size: z
    .number()
    .int()
    .min(1)
    .max(2048)
    .describe('Number of texts to embed per request'),
});

/**
 * Vector store settings
 */
export const StoreConfigSchema = z.object({
  collection: z.string().min(1).describe('Collection name inside vectors.db'),
  scroll_limit: z
    .number()
    .int()
    .min(1)
    .describe('Maximum points read when loading stored hashes'),
});

/**
 * Tool-using agent loop settings
 */
export const AgentConfigSchema = z.object({
  max_steps: z.number().int().min(0).max(50).describe('Tool calls allowed before a forced finish'),
  observation_limit: z
    .number()
    .int()
    .min(1)
    .describe('Characters of tool output kept in the history'),
  context_top_k: z.number().int().min(1).max(100).describe('Neighbours fetched for retrieval context'),
});

export const GenerationStrategySchema = z.enum(['agentic', 'rag', 'review']);
export type GenerationStrategy = z.infer<typeof GenerationStrategySchema>;

/**
 * Documentation generation settings
 */
export const GenerationConfigSchema = z.object({
  strategy: GenerationStrategySchema.describe('How docs are produced for a changed symbol'),
  review_max_retries: z.number().int().min(1).max(20).describe('Draft/review rounds before giving up'),
  impact_analysis: z.boolean().describe('Run the impact loop after agentic generation'),
});

/**
 * Indexing configuration
 * Controls file discovery behavior during indexing
 */
export const IndexingConfigSchema = z.object({
  extensions: z
    .array(z.enum(['py', 'ts', 'js']))
    .min(1)
    .describe('Source file extensions to extract symbols from'),
  ignore_patterns: z
    .array(z.string())
    .describe('Additional gitignore-style patterns to ignore during indexing'),
});

/**
 * Root configuration schema
 * This is the complete shape of config.toml
 */
export const ConfigSchema = z.object({
  paths: PathsConfigSchema,
  llm: LLMConfigSchema,
  embedding: EmbeddingConfigSchema,
  store: StoreConfigSchema,
  agent: AgentConfigSchema,
  generation: GenerationConfigSchema,
  indexing: IndexingConfigSchema,
});

/**
 * TypeScript type inferred from the schema
 */
export type Config = z.infer<typeof ConfigSchema>;

/**
 * Partial config for merging user overrides with defaults
 * Every field becomes optional, allowing sparse config files
 */
export const PartialConfigSchema = ConfigSchema.deepPartial().strict();
export type PartialConfig = z.infer<typeof PartialConfigSchema>;
