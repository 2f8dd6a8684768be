import { describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG } from '../config';
import { silentLogger } from '../logger';
import { applyTextCleaning, handleMissingValues } from '../pipeline/clean';
import { filterByLength, textLength, wordCount } from '../pipeline/length';
import { coerceRating, parseReviewDate, validateDates, validateRatings } from '../pipeline/normalize';
import { RawReview } from '../types/review';
import { mockLogger, rawReview } from './fixtures';

const complete = (rows: RawReview[]) => applyTextCleaning(handleMissingValues(rows, DEFAULT_CONFIG, silentLogger).rows);

describe('coerceRating', () => {
  it('accepts integers 1..5 as numbers or numeric strings', () => {
    expect(coerceRating(5)).toBe(5);
    expect(coerceRating('4')).toBe(4);
    expect(coerceRating(' 3 ')).toBe(3);
    expect(coerceRating('4.0')).toBe(4);
  });

  it('rejects numeric strings that are not plain decimals', () => {
    ['0x5', '0b101', '0o5', '5e0', '+4', '4.', '.5e1'].forEach(value => expect(coerceRating(value)).toBeNull());
  });

  it('rejects values outside the rating set', () => {
    [4.5, 0, '6', 'five', null, true, ''].forEach(value => expect(coerceRating(value)).toBeNull());
  });
});

describe('parseReviewDate', () => {
  it('normalizes supported formats to YYYY-MM-DD', () => {
    expect(parseReviewDate('2024-01-15')).toBe('2024-01-15');
    expect(parseReviewDate('2024-01-15T10:30:00Z')).toBe('2024-01-15');
    expect(parseReviewDate('2024-01-15 10:30:00')).toBe('2024-01-15');
    expect(parseReviewDate('03/05/2024')).toBe('2024-03-05');
    expect(parseReviewDate('Jan 5, 2024')).toBe('2024-01-05');
    expect(parseReviewDate(new Date(2024, 0, 15))).toBe('2024-01-15');
  });

  it('rejects impossible dates and non-dates', () => {
    expect(parseReviewDate('2024-02-30')).toBeNull();
    expect(parseReviewDate('not a date')).toBeNull();
    expect(parseReviewDate(12345)).toBeNull();
    expect(parseReviewDate(new Date('invalid'))).toBeNull();
    expect(parseReviewDate('')).toBeNull();
  });
});

describe('validateRatings / validateDates', () => {
  it('drops rows with invalid ratings and coerces the rest', () => {
    const rows = complete([
      rawReview({ review_id: 'a', rating: '5' }),
      rawReview({ review_id: 'b', review_text: 'Other', rating: 9 })
    ]);
    const result = validateRatings(rows, silentLogger);
    expect(result.rows.map(r => [r.review_id, r.rating])).toEqual([['a', 5]]);
    expect(result.log.reason).toBe('invalid_rating');
  });

  it('drops rows with unparseable dates and warns about them', () => {
    const rated = validateRatings(
      complete([
        rawReview({ review_id: 'a', date: '01/02/2024' }),
        rawReview({ review_id: 'b', review_text: 'Other', date: 'yesterday' })
      ]),
      silentLogger
    ).rows;
    const logger = mockLogger();
    const result = validateDates(rated, logger);

    expect(result.rows.map(r => [r.review_id, r.date])).toEqual([['a', '2024-01-02']]);
    expect(logger.warn).toHaveBeenCalledWith('Found 1 reviews with invalid dates');
  });
});

describe('filterByLength', () => {
  it('counts code points and words', () => {
    expect(textLength('𝔸bc')).toBe(3);
    expect(wordCount(' fine  app ')).toBe(2);
    expect(wordCount('')).toBe(0);
  });

  it('keeps reviews within the inclusive bounds', () => {
    const dated = validateDates(
      validateRatings(
        complete([
          rawReview({ review_id: 'short', review_text: 'ok' }),
          rawReview({ review_id: 'min', review_text: 'bad' }),
          rawReview({ review_id: 'mid', review_text: 'fine app' }),
          rawReview({ review_id: 'long', review_text: 'way too long' })
        ]),
        silentLogger
      ).rows,
      silentLogger
    ).rows;
    const result = filterByLength(dated, { minReviewLength: 3, maxReviewLength: 10 }, silentLogger);

    expect(result.rows.map(r => r.review_id)).toEqual(['min', 'mid']);
    expect(result.rows[1]).toMatchObject({ review_length: 8, word_count: 2 });
    expect(result.log).toEqual({ stage: 'filter_by_length', before: 4, after: 2, removed: 2, reason: 'length' });
  });
});
