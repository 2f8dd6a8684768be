export type Rating = 1 | 2 | 3 | 4 | 5;

export type RawTable = {
  columns: string[];
  rows: Record<string, unknown>[];
  source?: string; // csv|excel|json
};

export type RawReview = {
  review_id: string;
  review_text: string | null;
  rating: unknown;
  date: unknown;
  entity_id: string | null;
  source: string | null;
  thumbs_up: number | null;
  app_version: string | null;
};

// After missing-value handling: critical fields present, optional fields defaulted.
export type FilledReview = RawReview & {
  review_text: string;
  entity_id: string;
  thumbs_up: number;
  app_version: string;
};

export type CompleteReview = FilledReview & {
  cleaned_text: string;
};

export type StageResult<T> = {
  rows: T[];
  log: StageLog;
};

export type NormalizedReview = CompleteReview & {
  rating: Rating;
  date: string; // YYYY-MM-DD
};

export type CleanedReview = NormalizedReview & {
  word_count: number;
  review_length: number;
};

export type SentimentLabel = 'POSITIVE' | 'NEGATIVE' | 'NEUTRAL';
export type SentimentCategory = 'positive' | 'negative' | 'neutral';

export type SentimentResult = {
  label: SentimentLabel;
  confidence: number; // 0..1
  category: SentimentCategory;
};

export type ScoredReview = CleanedReview & {
  sentiment_label: SentimentLabel;
  sentiment_score: number;
  sentiment_category: SentimentCategory;
};

export type ThemeAssignment = {
  review_id: string;
  entity_id: string;
  theme: string;
  matched_keywords: string[];
};

export type KeywordScore = {
  keyword: string;
  score: number;
};

export type RemovalReason = 'duplicate' | 'missing_values' | 'invalid_rating' | 'invalid_date' | 'length';

export type StageLog = {
  stage: string;
  before: number;
  after: number;
  removed: number;
  reason?: RemovalReason;
};

export type RequirementChecks = {
  total_min_reviews: boolean;
  min_reviews_per_entity: boolean;
  max_error_rate: boolean;
};

export type QualityReport = {
  initial_reviews: number;
  final_reviews: number;
  reviews_removed: number;
  removal_rate: number; // percent
  reviews_per_entity: Record<string, number>;
  rating_distribution: Record<Rating, number>;
  data_quality_metrics: {
    duplicates_removed: number;
    missing_values_removed: number;
    invalid_ratings_removed: number;
    invalid_dates_removed: number;
    length_filtered: number;
  };
  text_statistics: {
    avg_review_length: number;
    avg_word_count: number;
    total_words: number;
  };
  checks: RequirementChecks;
  requirements_met: boolean;
};

export type RecommendationTier = 'strength' | 'improvement' | 'critical';

export type EntityInsight = {
  entity_id: string;
  name: string;
  review_count: number;
  average_rating: number;
  average_sentiment_score: number;
  sentiment_share: Record<SentimentCategory, number>; // percent
  five_star_share: number; // percent
  one_star_share: number; // percent
  rating_distribution: Record<Rating, number>;
  recommendation_tier: RecommendationTier;
};

export type EntityInsights = {
  entities: EntityInsight[];
  best_entity: string | null;
  worst_entity: string | null;
};

export type ThemeSummary = {
  by_entity: Array<{ entity_id: string; theme: string; count: number }>;
  by_sentiment: Array<{ theme: string; sentiment_category: SentimentCategory; count: number }>;
};
