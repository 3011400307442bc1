/**
 * Eval Command
 *
 * Runs every chunking × retrieval pair over a query set, judges each
 * answer, and writes the comparison report:
 *
 *   concierge eval
 *   concierge eval --queries fixtures/eval/queries.txt --corpus fixtures/eval/corpus
 *   concierge eval --concurrency 8 --output ./reports --json
 *
 * Evaluation data lives in `eval-<chunker>` namespaces and never touches the
 * namespaces the concierge answers from.
 */

import { Command } from 'commander';
import chalk from 'chalk';

import type { CommandContext } from '../types.js';
import { createCliServices, vectorStoreFor, type ServicesFactory } from '../services.js';
import { EvalOptionsSchema, parseOptions } from '../validation.js';
import { expandHome } from '../../config/paths.js';
import { loadCorpus } from '../../indexer/corpus.js';
import {
  createEvalHarnessDeps,
  evalSettings,
  exportReport,
  formatComparisonReport,
  loadQueries,
  runEvaluation,
  SqliteEvalRecorder,
  toExportedRun,
  type ComparisonReport,
} from '../../eval/index.js';

export function createEvalCommand(
  getContext: () => CommandContext,
  getServices: ServicesFactory = createCliServices
): Command {
  return new Command('eval')
    .description('Compare chunking and retrieval strategies on a labelled query set')
    .option('-q, --queries <file>', 'Query file, one "query | ground truth" per line', 'fixtures/eval/queries.txt')
    .option('-c, --corpus <dir>', 'Directory of .txt/.md documents', 'fixtures/eval/corpus')
    .option('--concurrency <n>', 'Cells evaluated in parallel (default: eval.concurrency)')
    .option('-o, --output <dir>', 'Report directory (default: eval.output_dir)')
    .action(async (rawOptions: unknown) => {
      const ctx = getContext();
      const options = parseOptions(EvalOptionsSchema, rawOptions);

      const queries = loadQueries(options.queries);
      const { documents, skipped } = await loadCorpus(options.corpus);
      for (const file of skipped) {
        ctx.warn(`Skipped ${file.path} (${file.reason})`);
      }
      ctx.debug(`${queries.length} queries, ${documents.length} documents`);

      const services = getServices(ctx);
      const { config, logger } = services;
      const embedder = await services.embedder();
      const recorder = new SqliteEvalRecorder(services.database());
      const deps = createEvalHarnessDeps(config, {
        generation: services.generation(),
        embedder,
        store: vectorStoreFor(services),
        recorder,
        logger,
      });

      const ora = (await import('ora')).default;
      const spinner =
        !ctx.options.json && process.stdout.isTTY ? ora({ text: 'Ingesting corpus...', color: 'cyan' }).start() : null;

      const settings = evalSettings(config);
      let report: ComparisonReport;
      try {
        report = await runEvaluation(
          {
            ...settings,
            concurrency: options.concurrency ?? settings.concurrency,
            queries,
            documents,
            corpusDir: options.corpus,
            onIngested: (result) => {
              ctx.debug(`${result.namespace}: ${result.storedCount} chunks`);
            },
            onCellComplete: (_cell, completed, total) => {
              if (spinner) spinner.text = `Evaluating cells ${completed}/${total}`;
            },
          },
          deps
        );
      } catch (error) {
        spinner?.fail('Evaluation failed');
        throw error;
      }

      const files = exportReport(report, expandHome(options.output ?? config.eval.output_dir));
      spinner?.succeed(
        `Evaluated ${report.cells.length} cells (${report.failedCells.length} failed)`
      );

      if (ctx.options.json) {
        console.log(JSON.stringify({ ...toExportedRun(report), files }, null, 2));
        return;
      }

      ctx.log(formatComparisonReport(report));
      ctx.log('');
      ctx.log(chalk.dim(`Report: ${files.textPath}`));
      ctx.log(chalk.dim(`Results: ${files.jsonPath}`));
    });
}
