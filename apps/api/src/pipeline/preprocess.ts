import { PipelineConfig } from '../config';
import { Logger, consoleLogger } from '../logger';
import { CleanedReview, RawReview, StageLog } from '../types/review';
import { applyTextCleaning, handleMissingValues, removeDuplicates } from './clean';
import { filterByLength } from './length';
import { validateDates, validateRatings } from './normalize';

export type PreprocessResult = {
  rows: CleanedReview[];
  stages: StageLog[];
};

/**
 * Cleaner → FieldNormalizer → LengthFilter. Every stage materializes a new
 * table; input rows are never mutated.
 */
export const preprocessReviews = (
  reviews: RawReview[],
  config: PipelineConfig,
  logger: Logger = consoleLogger
): PreprocessResult => {
  logger.info('Starting data preprocessing pipeline...');

  const deduped = removeDuplicates(reviews, logger);
  const filled = handleMissingValues(deduped.rows, config, logger);
  const cleaned = applyTextCleaning(filled.rows);
  const rated = validateRatings(cleaned, logger);
  const dated = validateDates(rated.rows, logger);
  const bounded = filterByLength(dated.rows, config.processing, logger);

  logger.info('Preprocessing pipeline completed');
  return {
    rows: bounded.rows,
    stages: [deduped.log, filled.log, rated.log, dated.log, bounded.log]
  };
};
