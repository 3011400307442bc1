/**
 * Chunk Strategies
 *
 * Three interchangeable ways to split a corpus document:
 * - fixed_size: greedy paragraph windows with a word overlap carried forward
 * - recursive: the SDK's RecursiveChunker (paragraph, line, sentence, word)
 * - semantic: the SDK's SemanticChunker, splitting where adjacent sentence
 *   embeddings drift apart
 *
 * The evaluation harness runs all three; `ingest` uses the one given by
 * `--chunker`.
 */

import { RecursiveChunker, type Chunk as SdkChunk, type Document } from '@contextaisdk/rag';
import { SemanticChunker } from '@contextaisdk/rag/chunking';

import type { ChunkStrategyName } from '../../config/schema.js';
import type { Embedder } from '../../search/types.js';
import { toSdkEmbeddingProvider } from '../embedder/provider.js';
import { MIN_CHUNK_SIZE, estimateTokens, toChunks } from './config.js';
import type { Chunk, ChunkSizing, ChunkStrategy, SourceDocument } from './types.js';

const PARAGRAPH_BREAK = /\n\s*\n/;

/**
 * Paragraphs are packed into a window until it would exceed `chunkSize`
 * tokens. Each new window starts with the last `chunkOverlap / 4` words of
 * the previous one.
 */
export class FixedSizeChunker implements ChunkStrategy {
  readonly name = 'fixed_size';

  constructor(private readonly sizing: ChunkSizing) {}

  async chunk(document: SourceDocument): Promise<Chunk[]> {
    const { chunkSize, chunkOverlap } = this.sizing;
    const overlapWords = Math.floor(chunkOverlap / 4);
    const windows: string[] = [];
    let current = '';

    for (const raw of document.text.split(PARAGRAPH_BREAK)) {
      const paragraph = raw.trim();
      if (!paragraph) {
        continue;
      }

      const combined = current ? `${current}\n\n${paragraph}` : paragraph;
      if (Math.floor(combined.length / 4) <= chunkSize) {
        current = combined;
        continue;
      }

      if (current) {
        windows.push(current);
        const words = current.split(/\s+/);
        const carried = overlapWords > 0 && words.length > overlapWords
          ? words.slice(-overlapWords).join(' ')
          : '';
        current = carried ? `${carried}\n\n${paragraph}` : paragraph;
      } else {
        current = paragraph;
      }
    }

    if (current) {
      windows.push(current);
    }
    return toChunks(document.docId, windows);
  }
}

function toSdkDocument(document: SourceDocument): Document {
  return {
    id: document.docId,
    content: document.text,
    metadata: {},
    source: document.source ?? document.docId,
  };
}

/**
 * Documents already within one chunk are kept whole.
 */
function fitsInOneChunk(document: SourceDocument, sizing: ChunkSizing): boolean {
  return estimateTokens(document.text) <= sizing.chunkSize;
}

const contentsOf = (chunks: SdkChunk[]): string[] =>
  chunks.map((chunk) => chunk.content).filter((text) => text.trim().length >= MIN_CHUNK_SIZE);

export class RecursiveChunkStrategy implements ChunkStrategy {
  readonly name = 'recursive';
  private readonly chunker = new RecursiveChunker();

  constructor(private readonly sizing: ChunkSizing) {}

  async chunk(document: SourceDocument): Promise<Chunk[]> {
    if (fitsInOneChunk(document, this.sizing)) {
      return toChunks(document.docId, [document.text]);
    }
    const chunks = await this.chunker.chunk(toSdkDocument(document), {
      chunkSize: this.sizing.chunkSize,
      chunkOverlap: this.sizing.chunkOverlap,
      sizeUnit: 'tokens',
    });
    return toChunks(document.docId, contentsOf(chunks));
  }
}

export class SemanticChunkStrategy implements ChunkStrategy {
  readonly name = 'semantic';
  private readonly chunker: SemanticChunker;

  constructor(
    private readonly sizing: ChunkSizing,
    embedder: Embedder,
    /** Adjacent-sentence similarity below which a new chunk starts */
    similarityThreshold: number
  ) {
    this.chunker = new SemanticChunker({
      embeddingProvider: toSdkEmbeddingProvider(embedder),
      similarityThreshold,
      minChunkSize: Math.min(100, Math.floor(sizing.chunkSize / 2)),
      maxChunkSize: sizing.chunkSize,
    });
  }

  async chunk(document: SourceDocument): Promise<Chunk[]> {
    if (fitsInOneChunk(document, this.sizing)) {
      return toChunks(document.docId, [document.text]);
    }
    const chunks = await this.chunker.chunk(toSdkDocument(document), {
      chunkSize: this.sizing.chunkSize,
      chunkOverlap: this.sizing.chunkOverlap,
      sizeUnit: 'tokens',
    });
    const texts = contentsOf(chunks);
    // A document the chunker could not split stays whole
    return toChunks(document.docId, texts.length > 0 ? texts : [document.text]);
  }
}

export interface ChunkStrategyDeps {
  sizing: ChunkSizing;
  /** Required by the semantic strategy */
  embedder: Embedder;
  semanticThreshold: number;
}

/**
 * @example
 * ```typescript
 * const chunker = createChunkStrategy('recursive', {
 *   sizing: { chunkSize: config.chunking.chunk_size, chunkOverlap: config.chunking.chunk_overlap },
 *   embedder,
 *   semanticThreshold: config.chunking.semantic_threshold,
 * });
 * const chunks = await chunker.chunk({ docId: 'faq', text });
 * ```
 */
export function createChunkStrategy(name: ChunkStrategyName, deps: ChunkStrategyDeps): ChunkStrategy {
  switch (name) {
    case 'fixed_size':
      return new FixedSizeChunker(deps.sizing);
    case 'recursive':
      return new RecursiveChunkStrategy(deps.sizing);
    case 'semantic':
      return new SemanticChunkStrategy(deps.sizing, deps.embedder, deps.semanticThreshold);
  }
}
