import fs from 'fs/promises';
import path from 'path';
import Papa from 'papaparse';
import * as XLSX from 'xlsx';
import { PipelineResult } from './pipeline/run';
import { ScoredReview, ThemeAssignment } from './types/review';

export const REVIEW_COLUMNS = [
  'review_id',
  'entity_id',
  'source',
  'review_text',
  'cleaned_text',
  'rating',
  'date',
  'thumbs_up',
  'app_version',
  'word_count',
  'review_length',
  'sentiment_label',
  'sentiment_score',
  'sentiment_category'
] as const satisfies ReadonlyArray<keyof ScoredReview>;

export const THEME_COLUMNS = ['review_id', 'entity_id', 'theme', 'matched_keywords'] as const;

export const reviewRows = (dataset: ScoredReview[]) =>
  dataset.map(row => Object.fromEntries(REVIEW_COLUMNS.map(column => [column, row[column]])));

export const themeRows = (themes: ThemeAssignment[]) =>
  themes.map(theme => ({ ...theme, matched_keywords: theme.matched_keywords.join(';') }));

export const toReviewsCsv = (dataset: ScoredReview[]) =>
  Papa.unparse({ fields: [...REVIEW_COLUMNS], data: dataset.map(row => REVIEW_COLUMNS.map(column => row[column])) });

export const toThemesCsv = (themes: ThemeAssignment[]) =>
  Papa.unparse({ fields: [...THEME_COLUMNS], data: themeRows(themes).map(row => THEME_COLUMNS.map(column => row[column])) });

export const buildReportPayload = (result: PipelineResult) => ({
  generatedAt: new Date().toISOString(),
  quality: result.report,
  insights: result.insights,
  themeSummary: result.themeSummary,
  keywordsByEntity: result.keywordsByEntity,
  stages: result.stages
});

const qualityRows = (result: PipelineResult) => {
  const { report } = result;
  return [
    ['Initial reviews', report.initial_reviews],
    ['Final reviews', report.final_reviews],
    ['Reviews removed', report.reviews_removed],
    ['Removal rate (%)', report.removal_rate],
    ['Duplicates removed', report.data_quality_metrics.duplicates_removed],
    ['Missing values removed', report.data_quality_metrics.missing_values_removed],
    ['Invalid ratings removed', report.data_quality_metrics.invalid_ratings_removed],
    ['Invalid dates removed', report.data_quality_metrics.invalid_dates_removed],
    ['Length filtered', report.data_quality_metrics.length_filtered],
    ['Average review length', report.text_statistics.avg_review_length],
    ['Average word count', report.text_statistics.avg_word_count],
    ['Requirements met', report.requirements_met ? 'yes' : 'no']
  ];
};

export const buildWorkbook = (result: PipelineResult): Buffer => {
  const workbook = XLSX.utils.book_new();

  const reviews = XLSX.utils.json_to_sheet(reviewRows(result.dataset), { header: [...REVIEW_COLUMNS] });
  XLSX.utils.book_append_sheet(workbook, reviews, 'Reviews');

  const themes = XLSX.utils.json_to_sheet(themeRows(result.themes), { header: [...THEME_COLUMNS] });
  XLSX.utils.book_append_sheet(workbook, themes, 'Themes');

  XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet([['Metric', 'Value'], ...qualityRows(result)]), 'Quality');

  const entities = result.insights.entities.map(entity => ({
    entity_id: entity.entity_id,
    name: entity.name,
    review_count: entity.review_count,
    average_rating: entity.average_rating,
    average_sentiment_score: entity.average_sentiment_score,
    positive_pct: entity.sentiment_share.positive,
    negative_pct: entity.sentiment_share.negative,
    neutral_pct: entity.sentiment_share.neutral,
    five_star_pct: entity.five_star_share,
    one_star_pct: entity.one_star_share,
    recommendation_tier: entity.recommendation_tier
  }));
  XLSX.utils.book_append_sheet(workbook, XLSX.utils.json_to_sheet(entities), 'Entities');

  return XLSX.write(workbook, { bookType: 'xlsx', type: 'buffer' });
};

export type WrittenOutputs = {
  reviews: string;
  themes: string;
  report: string;
  workbook: string;
};

export const writeRunOutputs = async (dir: string, result: PipelineResult): Promise<WrittenOutputs> => {
  await fs.mkdir(dir, { recursive: true });
  const files: WrittenOutputs = {
    reviews: path.join(dir, 'reviews.csv'),
    themes: path.join(dir, 'themes.csv'),
    report: path.join(dir, 'report.json'),
    workbook: path.join(dir, 'report.xlsx')
  };

  await Promise.all([
    fs.writeFile(files.reviews, toReviewsCsv(result.dataset)),
    fs.writeFile(files.themes, toThemesCsv(result.themes)),
    fs.writeFile(files.report, JSON.stringify(buildReportPayload(result), null, 2)),
    fs.writeFile(files.workbook, buildWorkbook(result))
  ]);
  return files;
};
