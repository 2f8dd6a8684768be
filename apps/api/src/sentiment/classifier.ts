import { PipelineConfig } from '../config';
import { errorMessage } from '../errors';
import { Logger, consoleLogger } from '../logger';
import { CleanedReview, ScoredReview, SentimentCategory, SentimentLabel, SentimentResult } from '../types/review';

export type RawSentiment = {
  label: string;
  confidence: number;
};

/** The external model: text in, label + confidence out. May throw. */
export type SentimentCapability = {
  name: string;
  classify: (text: string) => Promise<RawSentiment>;
};

export type SentimentThresholds = Pick<PipelineConfig['sentiment'], 'positiveThreshold' | 'negativeThreshold'>;

export const NEUTRAL_FALLBACK: Readonly<RawSentiment> = { label: 'NEUTRAL', confidence: 0.5 };

const LABELS: readonly SentimentLabel[] = ['POSITIVE', 'NEGATIVE', 'NEUTRAL'];

const toLabel = (value: unknown): SentimentLabel | null => {
  if (typeof value !== 'string') return null;
  const upper = value.trim().toUpperCase();
  return LABELS.find(label => label === upper) ?? null;
};

// POSITIVE below the positive threshold and NEGATIVE above the negative
// threshold both land in neutral.
export const categorizeSentiment = (
  label: SentimentLabel,
  confidence: number,
  thresholds: SentimentThresholds
): SentimentCategory => {
  if (label === 'POSITIVE' && confidence >= thresholds.positiveThreshold) return 'positive';
  if (label === 'NEGATIVE' && confidence <= thresholds.negativeThreshold) return 'negative';
  return 'neutral';
};

const fallbackResult = (thresholds: SentimentThresholds): SentimentResult => ({
  label: 'NEUTRAL',
  confidence: NEUTRAL_FALLBACK.confidence,
  category: categorizeSentiment('NEUTRAL', NEUTRAL_FALLBACK.confidence, thresholds)
});

/**
 * Never rejects: blank input, a capability error or a malformed answer all
 * yield the NEUTRAL / 0.5 fallback.
 */
export const classifySentiment = async (
  capability: SentimentCapability,
  text: string | null | undefined,
  thresholds: SentimentThresholds,
  logger: Logger = consoleLogger
): Promise<SentimentResult> => {
  if (text === null || text === undefined || text.trim() === '') return fallbackResult(thresholds);

  let output: RawSentiment;
  try {
    output = await capability.classify(text);
  } catch (err) {
    logger.debug(`Sentiment capability ${capability.name} failed: ${errorMessage(err)}`);
    return fallbackResult(thresholds);
  }

  const label = toLabel(output?.label);
  const confidence = output?.confidence;
  if (!label || typeof confidence !== 'number' || !Number.isFinite(confidence) || confidence < 0 || confidence > 1) {
    logger.debug(`Sentiment capability ${capability.name} returned malformed output`);
    return fallbackResult(thresholds);
  }

  return { label, confidence, category: categorizeSentiment(label, confidence, thresholds) };
};

/**
 * Scores rows batch by batch; rows inside a batch are classified concurrently
 * and the output keeps input order.
 */
export const scoreReviews = async (
  rows: CleanedReview[],
  capability: SentimentCapability,
  settings: PipelineConfig['sentiment'],
  logger: Logger = consoleLogger
): Promise<ScoredReview[]> => {
  if (rows.length === 0) return [];
  logger.info(`Starting sentiment analysis with ${capability.name}...`);

  const batchSize = Math.max(1, settings.batchSize);
  const scored: ScoredReview[] = [];

  for (let i = 0; i < rows.length; i += batchSize) {
    const batch = rows.slice(i, i + batchSize);
    const results = await Promise.all(
      batch.map(row => classifySentiment(capability, row.cleaned_text, settings, logger))
    );
    results.forEach((result, idx) => {
      scored.push({
        ...batch[idx],
        sentiment_label: result.label,
        sentiment_score: result.confidence,
        sentiment_category: result.category
      });
    });
    logger.info(`Processed ${scored.length}/${rows.length} reviews`);
  }

  const distribution = scored.reduce<Record<SentimentCategory, number>>(
    (acc, row) => {
      acc[row.sentiment_category] += 1;
      return acc;
    },
    { positive: 0, negative: 0, neutral: 0 }
  );
  logger.info(`Sentiment distribution: ${JSON.stringify(distribution)}`);
  return scored;
};
