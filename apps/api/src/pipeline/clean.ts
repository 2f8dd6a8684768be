import { PipelineConfig } from '../config';
import { Logger, consoleLogger } from '../logger';
import { CompleteReview, FilledReview, RawReview, StageLog, StageResult } from '../types/review';

const WHITESPACE_RUN = /\s+/g;
const DISALLOWED_CHARS = /[^\p{L}\p{M}\p{N}\p{Pc}\s.,!?]/gu;
// emoticons, symbols & pictographs, transport & map, regional indicator flags
const EMOJI = /[\u{1F600}-\u{1F64F}\u{1F300}-\u{1F5FF}\u{1F680}-\u{1F6FF}\u{1F1E0}-\u{1F1FF}]+/gu;
// variation selectors, zero-width joiner and the keycap mark left behind once the base symbol is gone
const EMOJI_COMPONENTS = /[\uFE00-\uFE0F\u200D\u20E3]/gu;
const REPEATED_SPACES = / {2,}/g;

const isBlank = (value: unknown) => value === null || value === undefined || String(value).trim() === '';

export const stageLog = (stage: string, before: number, after: number, reason?: StageLog['reason']): StageLog => ({
  stage,
  before,
  after,
  removed: before - after,
  ...(reason && { reason })
});

/** Total: never throws, returns '' when nothing survives. */
export const cleanText = (text: unknown): string => {
  if (text === null || text === undefined) return '';
  return String(text)
    .replace(WHITESPACE_RUN, ' ')
    .replace(DISALLOWED_CHARS, '')
    .replace(EMOJI, '')
    .replace(EMOJI_COMPONENTS, '')
    .replace(REPEATED_SPACES, ' ')
    .trim();
};

const duplicateKey = (review: RawReview) =>
  JSON.stringify([
    review.review_text,
    review.entity_id,
    review.rating === null || review.rating === undefined ? null : String(review.rating)
  ]);

export const removeDuplicates = <T extends RawReview>(rows: T[], logger: Logger = consoleLogger): StageResult<T> => {
  const seen = new Set<string>();
  const kept = rows.filter(row => {
    const key = duplicateKey(row);
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });

  const log = stageLog('remove_duplicates', rows.length, kept.length, 'duplicate');
  logger.info(`Removed ${log.removed} duplicate reviews`);
  return { rows: kept, log };
};

const optionalDefault = (config: PipelineConfig, field: string, fallback: string | number) => {
  const rule = config.fields[field];
  return rule?.kind === 'optional' ? rule.default : fallback;
};

const logMissingColumns = (rows: RawReview[], logger: Logger) => {
  const fields: Array<keyof RawReview> = ['review_text', 'rating', 'date', 'entity_id', 'source', 'thumbs_up', 'app_version'];
  const counts = fields
    .map(field => ({ field, count: rows.filter(row => isBlank(row[field])).length }))
    .filter(entry => entry.count > 0);
  if (!counts.length) return;
  logger.info('Missing values before cleaning:');
  counts.forEach(({ field, count }) => logger.info(`  - ${field}: ${count} missing`));
};

/**
 * Drops rows whose review text, rating or entity is null or blank, and fills
 * `thumbs_up` / `app_version` with their configured defaults.
 */
export const handleMissingValues = (
  rows: RawReview[],
  config: PipelineConfig,
  logger: Logger = consoleLogger
): StageResult<FilledReview> => {
  logMissingColumns(rows, logger);

  const thumbsDefault = Number(optionalDefault(config, 'thumbs_up', 0)) || 0;
  const versionDefault = String(optionalDefault(config, 'app_version', 'Unknown'));

  const filled = rows.reduce<FilledReview[]>((acc, row) => {
    const { review_text: text, entity_id: entity } = row;
    if (text === null || isBlank(text) || entity === null || isBlank(entity) || isBlank(row.rating)) return acc;
    acc.push({
      ...row,
      review_text: text,
      entity_id: entity,
      thumbs_up: row.thumbs_up ?? thumbsDefault,
      app_version: row.app_version ?? versionDefault
    });
    return acc;
  }, []);

  const log = stageLog('handle_missing_values', rows.length, filled.length, 'missing_values');
  logger.info(`Removed ${log.removed} rows with missing critical data`);
  return { rows: filled, log };
};

export const applyTextCleaning = (rows: FilledReview[]): CompleteReview[] =>
  rows.map(row => ({ ...row, cleaned_text: cleanText(row.review_text) }));
