import { vi } from 'vitest';
import { Logger } from '../logger';
import { RawSentiment, SentimentCapability } from '../sentiment/classifier';
import { RawReview, ScoredReview } from '../types/review';

export const rawReview = (overrides: Partial<RawReview> = {}): RawReview => ({
  review_id: 'r1',
  review_text: 'Great app',
  rating: 5,
  date: '2024-01-15',
  entity_id: 'CBE',
  source: 'Google Play',
  thumbs_up: null,
  app_version: null,
  ...overrides
});

/** Seven rows; each preprocessing stage removes exactly one of them. */
export const sampleReviews = () => [
  rawReview({ review_id: 'r1', review_text: 'Great app, very easy to use!', rating: 5, date: '2024-01-15', entity_id: 'CBE' }),
  rawReview({ review_id: 'r2', review_text: 'Great app, very easy to use!', rating: 5, date: '2024-01-16', entity_id: 'CBE' }),
  rawReview({ review_id: 'r3', review_text: null }),
  rawReview({ review_id: 'r4', review_text: 'Keeps crashing', rating: 7 }),
  rawReview({ review_id: 'r5', review_text: 'Slow transfers', rating: 2, date: 'yesterday' }),
  rawReview({ review_id: 'r6', review_text: '👍👍', rating: 4, date: '2024-02-01', entity_id: 'BOA' }),
  rawReview({ review_id: 'r7', review_text: 'Login fails every time', rating: '1', date: '03/05/2024', entity_id: 'BOA' })
];

export const scoredReview = (overrides: Partial<ScoredReview> = {}): ScoredReview => ({
  review_id: 'r1',
  review_text: 'Great app',
  cleaned_text: 'Great app',
  rating: 5,
  date: '2024-01-15',
  entity_id: 'CBE',
  source: 'Google Play',
  thumbs_up: 0,
  app_version: 'Unknown',
  word_count: 2,
  review_length: 9,
  sentiment_label: 'POSITIVE',
  sentiment_score: 0.9,
  sentiment_category: 'positive',
  ...overrides
});

export const mockLogger = () => ({
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  debug: vi.fn()
}) satisfies Logger;

/** Labels text containing "bad" or "crash" NEGATIVE, everything else POSITIVE. */
export const keywordCapability = (): SentimentCapability & { calls: string[] } => {
  const calls: string[] = [];
  return {
    name: 'stub',
    calls,
    classify: async (text: string): Promise<RawSentiment> => {
      calls.push(text);
      return /bad|crash/i.test(text) ? { label: 'NEGATIVE', confidence: 0.2 } : { label: 'POSITIVE', confidence: 0.9 };
    }
  };
};
