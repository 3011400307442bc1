/**
 * Embedder Types
 */

export interface EmbedderOptions {
  /**
   * Chunks per embedBatch call.
   * @default 32
   */
  batchSize?: number;

  /** Abort a batch that takes longer than this */
  timeoutMs?: number;

  /** Recorded in each vector's metadata */
  chunkStrategy?: string;

  /** Fired after each batch (or each chunk while isolating a failed batch) */
  onProgress?: (processed: number, total: number) => void;

  /** A chunk was skipped; processing continues */
  onError?: (error: Error, chunkId: string) => void;
}

/**
 * Model loading progress, passed through from transformers.js.
 */
export interface ModelLoadProgress {
  status: string;
  /** 0-100, when known */
  progress?: number;
}

export interface ProviderOptions {
  /** First HuggingFace run downloads the model */
  onProgress?: (progress: ModelLoadProgress) => void;
}
