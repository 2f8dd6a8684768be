import dayjs from 'dayjs';
import customParseFormat from 'dayjs/plugin/customParseFormat';
import { Logger, consoleLogger } from '../logger';
import { CompleteReview, NormalizedReview, Rating, StageResult } from '../types/review';
import { stageLog } from './clean';

dayjs.extend(customParseFormat);

export const DATE_FORMAT = 'YYYY-MM-DD';
export const ALLOWED_RATINGS: readonly Rating[] = [1, 2, 3, 4, 5];

const ISO_DATE_PREFIX = /^(\d{4}-\d{2}-\d{2})(?:[T ][\d:.]+(?:Z|[+-]\d{2}:?\d{2})?)?$/;
const DATE_FORMATS = ['YYYY/MM/DD', 'MM/DD/YYYY', 'M/D/YYYY', 'MMM D, YYYY', 'MMMM D, YYYY', 'D MMM YYYY'];

const DECIMAL_INTEGER = /^\d+(\.0+)?$/;

const isRating = (value: number): value is Rating => ALLOWED_RATINGS.some(r => r === value);

/** Returns the rating as one of 1..5, or null when it cannot be coerced into that set. */
export const coerceRating = (value: unknown): Rating | null => {
  let num: number;
  if (typeof value === 'number') num = value;
  else if (typeof value === 'string' && DECIMAL_INTEGER.test(value.trim())) num = Number(value.trim());
  else return null;
  return isRating(num) ? num : null;
};

/** Canonical `YYYY-MM-DD` form of a date value, or null when it is not a calendar date. */
export const parseReviewDate = (value: unknown): string | null => {
  if (value instanceof Date) {
    return Number.isNaN(value.valueOf()) ? null : dayjs(value).format(DATE_FORMAT);
  }
  if (typeof value !== 'string') return null;

  const text = value.trim();
  if (!text) return null;

  const iso = ISO_DATE_PREFIX.exec(text);
  if (iso) {
    const parsed = dayjs(iso[1], DATE_FORMAT, true);
    return parsed.isValid() ? parsed.format(DATE_FORMAT) : null;
  }

  for (const format of DATE_FORMATS) {
    const parsed = dayjs(text, format, true);
    if (parsed.isValid()) return parsed.format(DATE_FORMAT);
  }
  return null;
};

export type RatedReview = CompleteReview & { rating: Rating };

export const validateRatings = (rows: CompleteReview[], logger: Logger = consoleLogger): StageResult<RatedReview> => {
  const kept = rows.reduce<RatedReview[]>((acc, row) => {
    const rating = coerceRating(row.rating);
    if (rating !== null) acc.push({ ...row, rating });
    return acc;
  }, []);

  const log = stageLog('validate_ratings', rows.length, kept.length, 'invalid_rating');
  logger.info(`Removed ${log.removed} rows with invalid ratings`);
  return { rows: kept, log };
};

export const validateDates = (rows: RatedReview[], logger: Logger = consoleLogger): StageResult<NormalizedReview> => {
  const kept = rows.reduce<NormalizedReview[]>((acc, row) => {
    const date = parseReviewDate(row.date);
    if (date !== null) acc.push({ ...row, date });
    return acc;
  }, []);

  const log = stageLog('validate_dates', rows.length, kept.length, 'invalid_date');
  if (log.removed > 0) logger.warn(`Found ${log.removed} reviews with invalid dates`);
  logger.info('Dates validated and standardized');
  return { rows: kept, log };
};
