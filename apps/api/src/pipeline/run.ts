import { PipelineConfig, requiredFields } from '../config';
import { StructuralError } from '../errors';
import { duplicateIds, toRawReviews } from '../ingest/csv';
import { Logger, consoleLogger } from '../logger';
import { buildEntityInsights } from '../report/insights';
import { buildQualityReport } from '../report/quality';
import { SentimentCapability, scoreReviews } from '../sentiment/classifier';
import { ReviewSink } from '../store/sink';
import { buildThemeSummary } from '../themes/summary';
import { tagThemesByEntity } from '../themes/tagger';
import {
  EntityInsights,
  KeywordScore,
  QualityReport,
  RawTable,
  ScoredReview,
  StageLog,
  ThemeAssignment,
  ThemeSummary
} from '../types/review';
import { preprocessReviews } from './preprocess';
import { validateStructure } from './validate';

export type PipelineDeps = {
  config: PipelineConfig;
  capability: SentimentCapability;
  logger?: Logger;
  sink?: ReviewSink;
};

export type PipelineResult = {
  dataset: ScoredReview[];
  themes: ThemeAssignment[];
  report: QualityReport;
  insights: EntityInsights;
  themeSummary: ThemeSummary;
  keywordsByEntity: Record<string, KeywordScore[]>;
  stages: StageLog[];
};

/**
 * Validator → Cleaner → FieldNormalizer → LengthFilter → SentimentClassifier →
 * ThemeTagger → reports. A missing required column aborts before any stage runs.
 */
export const runPipeline = async (table: RawTable, deps: PipelineDeps): Promise<PipelineResult> => {
  const { config, capability, sink } = deps;
  const logger = deps.logger ?? consoleLogger;

  const structure = validateStructure(table, requiredFields(config), logger);
  if (!structure.ok) throw new StructuralError(structure.missing);

  const raw = toRawReviews(table);
  const repeated = duplicateIds(raw);
  if (repeated.length) {
    logger.warn(`Duplicate review_id values, later rows overwrite earlier ones when saved: ${repeated.join(', ')}`);
  }
  const { rows, stages } = preprocessReviews(raw, config, logger);
  const dataset = await scoreReviews(rows, capability, config.sentiment, logger);
  const tagging = tagThemesByEntity(dataset, config.themes, logger);
  const report = buildQualityReport(raw, rows, config);

  logger.info(
    `Quality: ${report.final_reviews}/${report.initial_reviews} reviews kept (${report.removal_rate}% removed), ` +
      `requirements ${report.requirements_met ? 'met' : 'not met'}`
  );

  if (sink) {
    await sink.saveReviews(dataset, config.entities);
    logger.info(`Saved ${dataset.length} reviews to ${sink.name}`);
  }

  return {
    dataset,
    themes: tagging.assignments,
    report,
    insights: buildEntityInsights(dataset, config.entities),
    themeSummary: buildThemeSummary(tagging.assignments, dataset),
    keywordsByEntity: tagging.keywordsByEntity,
    stages
  };
};
