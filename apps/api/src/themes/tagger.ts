import { PipelineConfig } from '../config';
import { Logger, consoleLogger } from '../logger';
import { KeywordScore, ScoredReview, ThemeAssignment } from '../types/review';
import { extractKeywords } from './tfidf';

export type ThemeSettings = PipelineConfig['themes'];

export type ThemeMatch = {
  theme: string;
  matched_keywords: string[];
};

export type TaggingResult = {
  assignments: ThemeAssignment[];
  keywordsByEntity: Record<string, KeywordScore[]>;
  skippedEntities: string[];
};

/**
 * Substring match of each theme's trigger keywords against the lower-cased
 * text. Themes and matched keywords keep keyword-table order.
 */
export const assignThemes = (text: string, keywords: ThemeSettings['keywords'], minHits = 1): ThemeMatch[] => {
  const haystack = text.toLowerCase();
  return Object.entries(keywords).reduce<ThemeMatch[]>((acc, [theme, triggers]) => {
    const matched = triggers.filter(keyword => haystack.includes(keyword.toLowerCase()));
    if (matched.length > 0 && matched.length >= minHits) acc.push({ theme, matched_keywords: matched });
    return acc;
  }, []);
};

const groupByEntity = (rows: ScoredReview[]) =>
  rows.reduce((acc, row) => {
    const group = acc.get(row.entity_id);
    if (group) group.push(row);
    else acc.set(row.entity_id, [row]);
    return acc;
  }, new Map<string, ScoredReview[]>());

export const tagThemesByEntity = (
  rows: ScoredReview[],
  settings: ThemeSettings,
  logger: Logger = consoleLogger
): TaggingResult => {
  if (settings.minKeywordHits > 1) {
    logger.warn(`Theme assignment requires ${settings.minKeywordHits} keyword hits per theme`);
  }

  const result: TaggingResult = { assignments: [], keywordsByEntity: {}, skippedEntities: [] };

  for (const [entity, group] of groupByEntity(rows)) {
    if (group.length < settings.minGroupSize) {
      logger.info(`Skipping ${entity}: ${group.length} reviews is below the minimum of ${settings.minGroupSize}`);
      result.skippedEntities.push(entity);
      continue;
    }

    logger.info(`Analyzing themes for ${entity} (${group.length} reviews)`);
    const keywords = extractKeywords(
      group.map(row => row.cleaned_text),
      { maxFeatures: settings.tfidfMaxFeatures, topN: settings.topKeywords }
    );
    result.keywordsByEntity[entity] = keywords;
    logger.info(`Top keywords for ${entity}: ${keywords.slice(0, 5).map(k => k.keyword).join(', ')}`);

    for (const row of group) {
      for (const match of assignThemes(row.cleaned_text, settings.keywords, settings.minKeywordHits)) {
        result.assignments.push({ review_id: row.review_id, entity_id: entity, ...match });
      }
    }
  }

  logger.info(`Assigned ${result.assignments.length} review themes`);
  return result;
};
