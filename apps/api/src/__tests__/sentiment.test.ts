import { describe, it, expect, vi } from 'vitest';
import { DEFAULT_CONFIG } from '../config';
import { silentLogger } from '../logger';
import { SentimentCapability, categorizeSentiment, classifySentiment, scoreReviews } from '../sentiment/classifier';
import { createSentimentCapability, unavailableSentiment } from '../sentiment';
import { keywordCapability, mockLogger, scoredReview } from './fixtures';

const thresholds = DEFAULT_CONFIG.sentiment;

const fixed = (label: string, confidence: number): SentimentCapability => ({
  name: 'fixed',
  classify: async () => ({ label, confidence })
});

describe('categorizeSentiment', () => {
  it('maps label and confidence onto a category', () => {
    expect(categorizeSentiment('POSITIVE', 0.7, thresholds)).toBe('positive');
    expect(categorizeSentiment('POSITIVE', 0.6, thresholds)).toBe('positive');
    expect(categorizeSentiment('POSITIVE', 0.5, thresholds)).toBe('neutral');
    expect(categorizeSentiment('NEGATIVE', 0.3, thresholds)).toBe('negative');
    expect(categorizeSentiment('NEGATIVE', 0.4, thresholds)).toBe('negative');
    expect(categorizeSentiment('NEGATIVE', 0.5, thresholds)).toBe('neutral');
    expect(categorizeSentiment('NEUTRAL', 0.5, thresholds)).toBe('neutral');
  });
});

describe('classifySentiment', () => {
  it('normalizes the label case', async () => {
    await expect(classifySentiment(fixed('positive', 0.9), 'love it', thresholds, silentLogger)).resolves.toEqual({
      label: 'POSITIVE',
      confidence: 0.9,
      category: 'positive'
    });
  });

  it('falls back to NEUTRAL when the capability throws', async () => {
    const logger = mockLogger();
    const result = await classifySentiment(unavailableSentiment('offline'), 'love it', thresholds, logger);
    expect(result).toEqual({ label: 'NEUTRAL', confidence: 0.5, category: 'neutral' });
    expect(logger.debug).toHaveBeenCalledWith('Sentiment capability unavailable failed: offline');
  });

  it('falls back to NEUTRAL on malformed output', async () => {
    for (const capability of [fixed('MIXED', 0.9), fixed('POSITIVE', 1.5), fixed('NEGATIVE', Number.NaN)]) {
      const result = await classifySentiment(capability, 'love it', thresholds, silentLogger);
      expect(result.label).toBe('NEUTRAL');
    }
  });

  it('does not call the capability for blank text', async () => {
    const capability = { name: 'spy', classify: vi.fn(async () => ({ label: 'POSITIVE', confidence: 1 })) };
    const result = await classifySentiment(capability, '   ', thresholds, silentLogger);
    expect(result.category).toBe('neutral');
    expect(capability.classify).not.toHaveBeenCalled();
  });
});

describe('scoreReviews', () => {
  it('scores every row in input order across batches', async () => {
    const rows = ['crash on start', 'works well', 'bad update'].map((text, idx) =>
      scoredReview({ review_id: `r${idx + 1}`, cleaned_text: text })
    );
    const capability = keywordCapability();
    const scored = await scoreReviews(rows, capability, { ...thresholds, batchSize: 2 }, silentLogger);

    expect(scored.map(r => [r.review_id, r.sentiment_label, r.sentiment_category])).toEqual([
      ['r1', 'NEGATIVE', 'negative'],
      ['r2', 'POSITIVE', 'positive'],
      ['r3', 'NEGATIVE', 'negative']
    ]);
    expect(capability.calls).toEqual(['crash on start', 'works well', 'bad update']);
  });

  it('keeps order when later rows resolve first', async () => {
    const capability: SentimentCapability = {
      name: 'slow-first',
      classify: text =>
        new Promise(resolve =>
          setTimeout(() => resolve({ label: 'POSITIVE', confidence: text === 'first' ? 0.95 : 0.7 }), text === 'first' ? 20 : 0)
        )
    };
    const rows = ['first', 'second'].map(text => scoredReview({ review_id: text, cleaned_text: text }));
    const scored = await scoreReviews(rows, capability, thresholds, silentLogger);
    expect(scored.map(r => [r.review_id, r.sentiment_score])).toEqual([
      ['first', 0.95],
      ['second', 0.7]
    ]);
  });

  it('returns an empty list without calling the capability', async () => {
    const capability = keywordCapability();
    await expect(scoreReviews([], capability, thresholds, silentLogger)).resolves.toEqual([]);
    expect(capability.calls).toEqual([]);
  });
});

describe('createSentimentCapability', () => {
  it('warns and degrades to the fallback without an API key', async () => {
    const logger = mockLogger();
    const capability = createSentimentCapability({ geminiModel: 'gemini-2.5-flash' }, logger);
    expect(capability.name).toBe('unavailable');
    expect(logger.warn).toHaveBeenCalledTimes(1);
    await expect(capability.classify('hello')).rejects.toThrow('GEMINI_API_KEY not configured');
  });
});
