/**
 * Ingest Command
 *
 * Loads a directory of .txt/.md documents into a production namespace:
 *
 *   concierge ingest ./docs/wiki --namespace reference-wiki
 *   concierge ingest ./docs/customers --namespace customer-docs --chunker semantic --clear
 *
 * Namespaces beginning with `eval-` belong to the evaluation harness and are
 * refused here.
 */

import { Command, Option } from 'commander';
import chalk from 'chalk';

import type { CommandContext } from '../types.js';
import { createCliServices, vectorStoreFor, type ServicesFactory } from '../services.js';
import { IngestOptionsSchema, parseOptions } from '../validation.js';
import { CLIError } from '../../errors/index.js';
import { loadCorpus } from '../../indexer/corpus.js';
import { ingestDocuments, type IngestResult, type IngestStage } from '../../indexer/pipeline.js';
import { createChunkStrategy } from '../../indexer/chunker/index.js';
import { CHUNK_STRATEGIES, EVAL_NAMESPACE_PREFIX } from '../../eval/types.js';

const STAGE_LABELS: Record<IngestStage, string> = {
  chunking: 'Chunking',
  embedding: 'Embedding',
  storing: 'Storing',
};

export function formatIngestSummary(result: IngestResult): string[] {
  const lines = [
    `${chalk.green('✓')} Ingested ${result.documentCount} document(s) into ${chalk.cyan(result.namespace)}`,
    `  ${result.storedCount}/${result.chunkCount} chunks stored (${result.chunkStrategy}) in ${(result.durationMs / 1000).toFixed(1)}s`,
  ];
  for (const error of result.errors) {
    lines.push(chalk.yellow(`  ⚠ ${error.chunkId}: ${error.message}`));
  }
  return lines;
}

export function createIngestCommand(
  getContext: () => CommandContext,
  getServices: ServicesFactory = createCliServices
): Command {
  return new Command('ingest')
    .description('Load a corpus of .txt/.md documents into a namespace')
    .argument('<dir>', 'Directory to ingest')
    .requiredOption('-n, --namespace <ns>', 'Target namespace (e.g. reference-wiki, customer-docs)')
    .addOption(new Option('-c, --chunker <name>', 'Chunking strategy').choices([...CHUNK_STRATEGIES]))
    .option('--clear', 'Remove existing vectors in the namespace first', false)
    .action(async (dir: string, rawOptions: unknown) => {
      const ctx = getContext();
      const options = parseOptions(IngestOptionsSchema, rawOptions);

      if (options.namespace.startsWith(EVAL_NAMESPACE_PREFIX)) {
        throw new CLIError(
          `Namespace "${options.namespace}" is reserved for evaluation runs`,
          'Pick a namespace that does not start with "eval-"'
        );
      }

      const { documents, skipped } = await loadCorpus(dir);
      for (const file of skipped) {
        ctx.warn(`Skipped ${file.path} (${file.reason})`);
      }
      if (documents.length === 0) {
        throw new CLIError(`No .txt or .md documents found in ${dir}`, 'Check the directory and try again');
      }
      ctx.debug(`Loaded ${documents.length} document(s) from ${dir}`);

      const services = getServices(ctx);
      const { config } = services;
      const embedder = await services.embedder();
      const chunker = createChunkStrategy(options.chunker, {
        sizing: { chunkSize: config.chunking.chunk_size, chunkOverlap: config.chunking.chunk_overlap },
        embedder,
        semanticThreshold: config.chunking.semantic_threshold,
      });

      const ora = (await import('ora')).default;
      const spinner =
        !ctx.options.json && process.stdout.isTTY ? ora({ text: 'Ingesting...', color: 'cyan' }).start() : null;

      let result: IngestResult;
      try {
        result = await ingestDocuments({
          documents,
          namespace: options.namespace,
          chunker,
          embedder,
          store: vectorStoreFor(services),
          clear: options.clear,
          onProgress: (stage, processed, total) => {
            if (spinner) spinner.text = `${STAGE_LABELS[stage]} ${processed}/${total}`;
          },
        });
      } catch (error) {
        spinner?.fail('Ingestion failed');
        throw error;
      }
      spinner?.stop();

      if (ctx.options.json) {
        console.log(
          JSON.stringify(
            {
              namespace: result.namespace,
              chunk_strategy: result.chunkStrategy,
              document_count: result.documentCount,
              chunk_count: result.chunkCount,
              stored_count: result.storedCount,
              skipped,
              errors: result.errors,
            },
            null,
            2
          )
        );
        return;
      }
      for (const line of formatIngestSummary(result)) {
        ctx.log(line);
      }
    });
}
