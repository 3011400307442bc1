/**
 * Embedding Provider Factory
 *
 * Builds an SDK embedding provider from the [embedding] config section and
 * adapts it to the `Embedder` surface the search and ingestion layers use.
 * HuggingFace runs locally through transformers.js; Ollama needs a server.
 */

import {
  HuggingFaceEmbeddingProvider,
  OllamaEmbeddingProvider,
  CachedEmbeddingProvider,
  type EmbeddingProvider,
  type EmbeddingResult,
} from '@contextaisdk/rag';

import type { Config } from '../../config/schema.js';
import { getOllamaHost } from '../../config/env.js';
import type { Embedder } from '../../search/types.js';
import type { ProviderOptions } from './types.js';

/**
 * HuggingFace models load through their transformers.js ports, which live
 * under the Xenova/ prefix.
 */
export function normalizeHuggingFaceModel(model: string): string {
  if (model.startsWith('BAAI/')) {
    return model.replace('BAAI/', 'Xenova/');
  }
  return model;
}

function createSdkProvider(
  config: Config['embedding'],
  options?: ProviderOptions
): EmbeddingProvider {
  if (config.provider === 'ollama') {
    return new OllamaEmbeddingProvider({
      model: config.model,
      baseUrl: getOllamaHost(),
      normalize: true,
    });
  }

  const onProgress = options?.onProgress;
  return new HuggingFaceEmbeddingProvider({
    model: normalizeHuggingFaceModel(config.model),
    // L2 normalize for cosine similarity
    normalize: true,
    onProgress: onProgress
      ? (progress: { status: string; progress?: number }) =>
          onProgress({ status: progress.status, progress: progress.progress })
      : undefined,
  });
}

/**
 * Adapt an SDK provider. Vectors whose length differs from the configured
 * dimensions are rejected so a model swap cannot silently corrupt a namespace.
 */
export function toEmbedder(provider: EmbeddingProvider, dimensions: number): Embedder {
  const check = (vector: number[]): number[] => {
    if (vector.length !== dimensions) {
      throw new Error(
        `Embedding model returned ${vector.length} dimensions, config expects ${dimensions}. ` +
          'Update embedding.dimensions with: concierge config set embedding.dimensions <n>'
      );
    }
    return vector;
  };

  return {
    dimensions,
    embed: async (text) => check((await provider.embed(text)).embedding),
    embedBatch: async (texts) => {
      if (texts.length === 0) {
        return [];
      }
      const results = await provider.embedBatch(texts);
      return results.map((result) => check(result.embedding));
    },
  };
}

/**
 * The reverse adapter, for SDK components that take a provider (the
 * semantic chunker).
 */
export function toSdkEmbeddingProvider(embedder: Embedder): EmbeddingProvider {
  const toResult = (text: string, embedding: number[]): EmbeddingResult => ({
    embedding,
    tokenCount: Math.ceil(text.length / 4),
    model: 'concierge-embedder',
  });

  return {
    name: 'ConciergeEmbedder',
    dimensions: embedder.dimensions,
    maxBatchSize: 32,
    embed: async (text) => toResult(text, await embedder.embed(text)),
    embedBatch: async (texts) => {
      const vectors = await embedder.embedBatch(texts);
      return vectors.map((vector, i) => toResult(texts[i] ?? '', vector));
    },
    isAvailable: async () => true,
  };
}

/**
 * Create the configured embedder, wrapped in the SDK's cache so repeated
 * texts (the same query across strategies) are embedded once.
 *
 * @throws Error if the provider reports itself unavailable
 */
export async function createEmbedder(
  config: Config['embedding'],
  options?: ProviderOptions
): Promise<Embedder> {
  const provider = createSdkProvider(config, options);

  let available: boolean;
  try {
    available = await provider.isAvailable();
  } catch {
    available = false;
  }
  if (!available) {
    throw new Error(
      `Embedding provider '${config.provider}' is not available. ` +
        (config.provider === 'ollama'
          ? 'Make sure Ollama is running (ollama serve) and the model is pulled.'
          : 'Check your internet connection for the initial model download.')
    );
  }

  return toEmbedder(new CachedEmbeddingProvider({ provider }), config.dimensions);
}
