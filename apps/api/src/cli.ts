import fs from 'fs/promises';
import path from 'path';
import { PipelineConfig } from './config';
import { StructuralError, errorMessage } from './errors';
import { ingestReviewsBuffer } from './ingest/csv';
import { Logger, consoleLogger } from './logger';
import { writeRunOutputs } from './output';
import { runPipeline } from './pipeline/run';
import { SentimentCapability } from './sentiment/classifier';
import { ReviewSink } from './store/sink';

export type PersistTarget = 'sqlite' | 'postgres';

export type CliArgs = {
  inputPath: string;
  outDir: string;
  persist?: PersistTarget;
};

export const USAGE = 'Usage: review-insights <input.csv|input.xlsx> [--out <dir>] [--persist sqlite|postgres]';

export const parseCliArgs = (argv: string[]): CliArgs => {
  let inputPath: string | undefined;
  let outDir = 'output';
  let persist: PersistTarget | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--out') {
      const value = argv[++i];
      if (!value) throw new Error('--out requires a directory');
      outDir = value;
    } else if (arg === '--persist') {
      const value = argv[++i];
      if (value !== 'sqlite' && value !== 'postgres') throw new Error('--persist must be sqlite or postgres');
      persist = value;
    } else if (arg.startsWith('--')) {
      throw new Error(`Unknown option ${arg}`);
    } else if (!inputPath) {
      inputPath = arg;
    } else {
      throw new Error(`Unexpected argument ${arg}`);
    }
  }

  if (!inputPath) throw new Error(USAGE);
  return { inputPath, outDir, ...(persist && { persist }) };
};

export type CliDeps = {
  config: PipelineConfig;
  capability: SentimentCapability;
  openSink: (target: PersistTarget) => Promise<ReviewSink>;
  logger?: Logger;
};

/** Returns the process exit code. */
export const runCli = async (argv: string[], deps: CliDeps): Promise<number> => {
  const logger = deps.logger ?? consoleLogger;

  let args: CliArgs;
  try {
    args = parseCliArgs(argv);
  } catch (err) {
    logger.error(errorMessage(err));
    return 2;
  }

  let sink: ReviewSink | undefined;
  try {
    if (args.persist) sink = await deps.openSink(args.persist);
    const buffer = await fs.readFile(args.inputPath);
    const table = ingestReviewsBuffer(buffer, path.basename(args.inputPath));
    const result = await runPipeline(table, { config: deps.config, capability: deps.capability, logger, sink });
    const files = await writeRunOutputs(args.outDir, result);

    const { report } = result;
    logger.info('DATA QUALITY SUMMARY');
    logger.info(`  Initial reviews: ${report.initial_reviews}`);
    logger.info(`  Final reviews: ${report.final_reviews}`);
    logger.info(`  Removal rate: ${report.removal_rate}%`);
    Object.entries(report.reviews_per_entity).forEach(([entity, count]) => logger.info(`  ${entity}: ${count} reviews`));
    logger.info(`  Requirements met: ${report.requirements_met ? 'yes' : 'no'}`);
    logger.info(`Outputs written to ${path.dirname(files.report)}`);
    return 0;
  } catch (err) {
    if (err instanceof StructuralError) logger.error(err.message);
    else logger.error(`Pipeline failed: ${errorMessage(err)}`);
    return 1;
  } finally {
    await sink?.close();
  }
};
