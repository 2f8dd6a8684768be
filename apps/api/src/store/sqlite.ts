import fs from 'fs';
import path from 'path';
import Database from 'better-sqlite3';
import { ReviewSink, banksFor, readSchema, reviewValues } from './sink';

const UPSERT_BANK = `
  INSERT INTO banks (bank_name, app_name)
  VALUES (?, ?)
  ON CONFLICT(bank_name) DO UPDATE SET app_name = excluded.app_name
`;

const UPSERT_REVIEW = `
  INSERT INTO reviews (review_id, bank_id, review_text, rating, review_date, sentiment_label, sentiment_score, source)
  VALUES (?, ?, ?, ?, ?, ?, ?, ?)
  ON CONFLICT(review_id) DO UPDATE SET
    bank_id = excluded.bank_id,
    review_text = excluded.review_text,
    rating = excluded.rating,
    review_date = excluded.review_date,
    sentiment_label = excluded.sentiment_label,
    sentiment_score = excluded.sentiment_score,
    source = excluded.source
`;

export const createSqliteSink = (db: Database.Database): ReviewSink => {
  db.exec(readSchema('schema.sqlite.sql'));

  const upsertBank = db.prepare<[string, string]>(UPSERT_BANK);
  const findBank = db.prepare<[string], { bank_id: number }>('SELECT bank_id FROM banks WHERE bank_name = ?');
  const upsertReview = db.prepare(UPSERT_REVIEW);

  return {
    name: 'sqlite',
    saveReviews: async (rows, catalog) => {
      const save = db.transaction(() => {
        const bankIds = new Map<string, number>();
        for (const bank of banksFor(rows, catalog)) {
          upsertBank.run(bank.bank_name, bank.app_name);
          const found = findBank.get(bank.bank_name);
          if (!found) throw new Error(`Bank ${bank.bank_name} was not stored`);
          bankIds.set(bank.entity_id, found.bank_id);
        }
        for (const row of rows) {
          const bankId = bankIds.get(row.entity_id);
          if (bankId === undefined) throw new Error(`No bank for entity ${row.entity_id}`);
          upsertReview.run(...reviewValues(row, bankId));
        }
      });
      save();
    },
    close: async () => {
      db.close();
    }
  };
};

export const openSqliteSink = (file: string): ReviewSink => {
  fs.mkdirSync(path.dirname(file), { recursive: true });
  const db = new Database(file);
  db.pragma('journal_mode = WAL');
  return createSqliteSink(db);
};
