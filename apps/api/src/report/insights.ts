import { EntityInfo } from '../config';
import { EntityInsight, EntityInsights, RecommendationTier, ScoredReview, SentimentCategory } from '../types/review';
import { ratingHistogram, round2 } from './quality';

export const STRENGTH_MIN_RATING = 4;
export const IMPROVEMENT_MIN_RATING = 3;

/** Tier by exact average rating: 4.0 and up is a strength, 3.0 and up needs improvement. */
export const recommendationTier = (averageRating: number): RecommendationTier => {
  if (averageRating >= STRENGTH_MIN_RATING) return 'strength';
  if (averageRating >= IMPROVEMENT_MIN_RATING) return 'improvement';
  return 'critical';
};

const percent = (part: number, whole: number) => (whole === 0 ? 0 : round2((part / whole) * 100));

const insightFor = (entity: string, rows: ScoredReview[], info?: EntityInfo): EntityInsight => {
  const total = rows.length;
  const averageRating = rows.reduce((sum, row) => sum + row.rating, 0) / total;
  const share = (category: SentimentCategory) =>
    percent(rows.filter(row => row.sentiment_category === category).length, total);

  return {
    entity_id: entity,
    name: info?.name ?? entity,
    review_count: total,
    average_rating: round2(averageRating),
    average_sentiment_score: round2(rows.reduce((sum, row) => sum + row.sentiment_score, 0) / total),
    sentiment_share: { positive: share('positive'), negative: share('negative'), neutral: share('neutral') },
    five_star_share: percent(rows.filter(row => row.rating === 5).length, total),
    one_star_share: percent(rows.filter(row => row.rating === 1).length, total),
    rating_distribution: ratingHistogram(rows),
    recommendation_tier: recommendationTier(averageRating)
  };
};

/** Per-entity rating and sentiment figures; entities keep first-appearance order. */
export const buildEntityInsights = (scored: ScoredReview[], catalog: Record<string, EntityInfo> = {}): EntityInsights => {
  const groups = new Map<string, ScoredReview[]>();
  for (const row of scored) {
    const group = groups.get(row.entity_id);
    if (group) group.push(row);
    else groups.set(row.entity_id, [row]);
  }

  const entities = Array.from(groups, ([entity, rows]) => insightFor(entity, rows, catalog[entity]));

  let best: EntityInsight | null = null;
  let worst: EntityInsight | null = null;
  for (const insight of entities) {
    if (!best || insight.average_rating > best.average_rating) best = insight;
    if (!worst || insight.average_rating < worst.average_rating) worst = insight;
  }

  return {
    entities,
    best_entity: best ? best.entity_id : null,
    worst_entity: worst ? worst.entity_id : null
  };
};
