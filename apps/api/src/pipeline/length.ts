import { PipelineConfig } from '../config';
import { Logger, consoleLogger } from '../logger';
import { CleanedReview, NormalizedReview, StageResult } from '../types/review';
import { stageLog } from './clean';

// code points, so an astral character counts once
export const textLength = (text: string) => Array.from(text).length;

export const wordCount = (text: string) => text.split(/\s+/).filter(Boolean).length;

export const filterByLength = (
  rows: NormalizedReview[],
  bounds: PipelineConfig['processing'],
  logger: Logger = consoleLogger
): StageResult<CleanedReview> => {
  const { minReviewLength, maxReviewLength } = bounds;

  const kept = rows.reduce<CleanedReview[]>((acc, row) => {
    const reviewLength = textLength(row.cleaned_text);
    if (reviewLength < minReviewLength || reviewLength > maxReviewLength) return acc;
    acc.push({ ...row, review_length: reviewLength, word_count: wordCount(row.cleaned_text) });
    return acc;
  }, []);

  const log = stageLog('filter_by_length', rows.length, kept.length, 'length');
  logger.info(`Removed ${log.removed} reviews outside length limits`);
  return { rows: kept, log };
};
