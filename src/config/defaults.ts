/**
 * Default Configuration Values
 *
 * Used when no config.toml exists, and for every field the file leaves out.
 * The loader merges the user's file ON TOP of these defaults.
 */

import type { Config } from './schema.js';

export const DEFAULT_CONFIG: Config = {
  paths: {
    source_root: '.',
    docs_root: 'docs',
    state_dir: '.docweave',
  },

  llm: {
    provider: 'anthropic',
    model: 'claude-sonnet-4-20250514',
    temperature: 0,
    timeout_ms: 120000, // 2 minutes; agent prompts can be long
    max_retries: 2,
  },

  embedding: {
    provider: 'openai',
    model: 'text-embedding-3-small',
    batch_size: 64,
  },

  store: {
    collection: 'codebase',
    scroll_limit: 10000,
  },

  agent: {
    max_steps: 5,
    observation_limit: 1000,
    context_top_k: 5,
  },

  generation: {
    strategy: 'agentic',
    review_max_retries: 3,
    impact_analysis: true,
  },

  indexing: {
    extensions: ['py', 'ts', 'js'],
    ignore_patterns: [],
  },
};

/**
 * Config file template (TOML format)
 * Written to <repo>/.docweave/config.toml by `docweave config init`
 */
export const CONFIG_TEMPLATE = `# docweave configuration
# Location: <repo>/.docweave/config.toml
# Every key is optional; omitted keys use the defaults shown here.

[paths]
source_root = "${DEFAULT_CONFIG.paths.source_root}"
docs_root = "${DEFAULT_CONFIG.paths.docs_root}"

# Completion service: anthropic | openai | ollama | openai-compatible
[llm]
provider = "${DEFAULT_CONFIG.llm.provider}"
model = "${DEFAULT_CONFIG.llm.model}"
temperature = ${DEFAULT_CONFIG.llm.temperature}
timeout_ms = ${DEFAULT_CONFIG.llm.timeout_ms}
max_retries = ${DEFAULT_CONFIG.llm.max_retries}

# Embeddings: openai | ollama | openai-compatible
# Changing the model changes vector dimensions; delete vectors.db afterwards.
[embedding]
provider = "${DEFAULT_CONFIG.embedding.provider}"
model = "${DEFAULT_CONFIG.embedding.model}"
batch_size = ${DEFAULT_CONFIG.embedding.batch_size}

[store]
collection = "${DEFAULT_CONFIG.store.collection}"
scroll_limit = ${DEFAULT_CONFIG.store.scroll_limit}

[agent]
max_steps = ${DEFAULT_CONFIG.agent.max_steps}
observation_limit = ${DEFAULT_CONFIG.agent.observation_limit}
context_top_k = ${DEFAULT_CONFIG.agent.context_top_k}

# Strategy: agentic | rag | review
[generation]
strategy = "${DEFAULT_CONFIG.generation.strategy}"
review_max_retries = ${DEFAULT_CONFIG.generation.review_max_retries}
impact_analysis = ${DEFAULT_CONFIG.generation.impact_analysis}

[indexing]
extensions = ["py", "ts", "js"]
# ignore_patterns = ["migrations/", "*.generated.ts"]
`;
