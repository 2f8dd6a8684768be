import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { EntityInfo } from '../config';
import { round2 } from '../report/quality';
import { ScoredReview } from '../types/review';

const sqlDir = path.join(path.dirname(fileURLToPath(import.meta.url)), '../../sql');

export const readSchema = (file: 'schema.sql' | 'schema.sqlite.sql') => fs.readFileSync(path.join(sqlDir, file), 'utf-8');

export type ReviewSink = {
  name: string;
  saveReviews: (rows: ScoredReview[], catalog: Record<string, EntityInfo>) => Promise<void>;
  close: () => Promise<void>;
};

export type BankRecord = {
  entity_id: string;
  bank_name: string;
  app_name: string;
};

// Unknown entities use their id for both names.
export const banksFor = (rows: ScoredReview[], catalog: Record<string, EntityInfo>): BankRecord[] =>
  Array.from(new Set(rows.map(row => row.entity_id)), entity => ({
    entity_id: entity,
    bank_name: catalog[entity]?.name ?? entity,
    app_name: catalog[entity]?.appName ?? entity
  }));

export const reviewValues = (row: ScoredReview, bankId: number) => [
  row.review_id,
  bankId,
  row.review_text,
  row.rating,
  row.date,
  row.sentiment_label,
  round2(row.sentiment_score),
  row.source
];
