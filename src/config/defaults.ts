/**
 * Default Configuration Values
 *
 * Used when no config.toml exists, and as the base the user's sparse file is
 * merged over.
 */

import type { Config } from './schema.js';

export const DEFAULT_CONFIG: Config = {
  generation: {
    provider: 'anthropic',
    model: 'claude-sonnet-4-20250514',
    max_retries: 2,
    retry_base_ms: 500,
    timeout_ms: 30000,
  },

  // Local BGE-small keeps ingestion free of API cost
  embedding: {
    provider: 'huggingface',
    model: 'BAAI/bge-small-en-v1.5',
    dimensions: 384,
  },

  retrieval: {
    top_k: 4,
    strategy: 'direct',
    reference_namespace: 'reference-wiki',
    customer_namespace: 'customer-docs',
  },

  validation: {
    confidence_threshold: 0.75,
  },

  chunking: {
    chunk_size: 400,
    chunk_overlap: 75,
    semantic_threshold: 0.78,
  },

  eval: {
    concurrency: 4,
    max_retries: 2,
    retry_base_ms: 500,
    output_dir: '~/.concierge/eval',
  },
};

/**
 * Written to ~/.concierge/config.toml on first run
 */
export const CONFIG_TEMPLATE = `# billing-concierge configuration
# Location: ~/.concierge/config.toml

[generation]
provider = "${DEFAULT_CONFIG.generation.provider}"   # anthropic | openai | ollama
model = "${DEFAULT_CONFIG.generation.model}"
max_retries = ${DEFAULT_CONFIG.generation.max_retries}
retry_base_ms = ${DEFAULT_CONFIG.generation.retry_base_ms}
timeout_ms = ${DEFAULT_CONFIG.generation.timeout_ms}

[embedding]
provider = "${DEFAULT_CONFIG.embedding.provider}"   # huggingface | ollama
model = "${DEFAULT_CONFIG.embedding.model}"
dimensions = ${DEFAULT_CONFIG.embedding.dimensions}

# Too few chunks miss multi-chunk answers; too many dilute the context.
[retrieval]
top_k = ${DEFAULT_CONFIG.retrieval.top_k}
strategy = "${DEFAULT_CONFIG.retrieval.strategy}"   # direct | hypothesis | multi-phrasing
reference_namespace = "${DEFAULT_CONFIG.retrieval.reference_namespace}"
customer_namespace = "${DEFAULT_CONFIG.retrieval.customer_namespace}"

# Account answers below this retrieval confidence are replaced by a clarifying question.
[validation]
confidence_threshold = ${DEFAULT_CONFIG.validation.confidence_threshold}

[chunking]
chunk_size = ${DEFAULT_CONFIG.chunking.chunk_size}
chunk_overlap = ${DEFAULT_CONFIG.chunking.chunk_overlap}
semantic_threshold = ${DEFAULT_CONFIG.chunking.semantic_threshold}

[eval]
concurrency = ${DEFAULT_CONFIG.eval.concurrency}
max_retries = ${DEFAULT_CONFIG.eval.max_retries}
retry_base_ms = ${DEFAULT_CONFIG.eval.retry_base_ms}
output_dir = "${DEFAULT_CONFIG.eval.output_dir}"
`;
