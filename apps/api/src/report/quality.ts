import { PipelineConfig } from '../config';
import { silentLogger } from '../logger';
import { preprocessReviews } from '../pipeline/preprocess';
import { CleanedReview, QualityReport, Rating, RawReview, RemovalReason, RequirementChecks } from '../types/review';

export const round2 = (value: number) => Math.round(value * 100) / 100;

const mean = (values: number[]) => (values.length ? values.reduce((sum, v) => sum + v, 0) / values.length : 0);

export type RequirementInputs = {
  initialCount: number;
  finalCount: number;
  perEntity: Record<string, number>;
};

/**
 * Each check against the configured requirements; the verdict is their conjunction.
 * The error rate is compared as an exact fraction, never the rounded percentage.
 */
export const checkRequirements = (
  { initialCount, finalCount, perEntity }: RequirementInputs,
  requirements: PipelineConfig['requirements']
): RequirementChecks => ({
  total_min_reviews: finalCount >= requirements.totalMinReviews,
  min_reviews_per_entity: Object.values(perEntity).every(count => count >= requirements.minReviewsPerEntity),
  max_error_rate: initialCount === 0 || (initialCount - finalCount) / initialCount <= requirements.maxAllowedErrorRate
});

const countBy = (rows: CleanedReview[]) =>
  rows.reduce<Record<string, number>>((acc, row) => {
    acc[row.entity_id] = (acc[row.entity_id] ?? 0) + 1;
    return acc;
  }, {});

export const ratingHistogram = (rows: CleanedReview[]) =>
  rows.reduce<Record<Rating, number>>(
    (acc, row) => {
      acc[row.rating] += 1;
      return acc;
    },
    { 1: 0, 2: 0, 3: 0, 4: 0, 5: 0 }
  );

/**
 * Summary of a preprocessing run. Removal attribution is recomputed by
 * replaying the stages on `raw`, so the report depends only on its inputs.
 */
export const buildQualityReport = (
  raw: RawReview[],
  processed: CleanedReview[],
  config: PipelineConfig
): QualityReport => {
  const initial = raw.length;
  const final = processed.length;
  const removed = initial - final;
  const removalRate = initial === 0 ? 0 : (removed / initial) * 100;

  const { stages } = preprocessReviews(raw, config, silentLogger);
  const removedFor = (reason: RemovalReason) =>
    stages.filter(stage => stage.reason === reason).reduce((sum, stage) => sum + stage.removed, 0);

  const perEntity = countBy(processed);
  const checks = checkRequirements({ initialCount: initial, finalCount: final, perEntity }, config.requirements);

  return {
    initial_reviews: initial,
    final_reviews: final,
    reviews_removed: removed,
    removal_rate: round2(removalRate),
    reviews_per_entity: perEntity,
    rating_distribution: ratingHistogram(processed),
    data_quality_metrics: {
      duplicates_removed: removedFor('duplicate'),
      missing_values_removed: removedFor('missing_values'),
      invalid_ratings_removed: removedFor('invalid_rating'),
      invalid_dates_removed: removedFor('invalid_date'),
      length_filtered: removedFor('length')
    },
    text_statistics: {
      avg_review_length: round2(mean(processed.map(row => row.review_length))),
      avg_word_count: round2(mean(processed.map(row => row.word_count))),
      total_words: processed.reduce((sum, row) => sum + row.word_count, 0)
    },
    checks,
    requirements_met: Object.values(checks).every(Boolean)
  };
};
