import { Pool } from 'pg';
import { errorMessage } from '../errors';
import { ReviewSink, banksFor, readSchema, reviewValues } from './sink';

/** The slice of `pg.PoolClient` the sink uses. */
export type Queryable = {
  query: (text: string, values?: unknown[]) => Promise<{ rows: Array<Record<string, unknown>> }>;
};

export type PooledClient = Queryable & { release: () => void };

/** Hands out one client per save so concurrent transactions never share a connection. */
export type ClientSource = {
  connect: () => Promise<PooledClient>;
};

const UPSERT_BANK = `
  INSERT INTO banks (bank_name, app_name)
  VALUES ($1, $2)
  ON CONFLICT (bank_name) DO UPDATE SET app_name = EXCLUDED.app_name
  RETURNING bank_id
`;

const UPSERT_REVIEW = `
  INSERT INTO reviews (review_id, bank_id, review_text, rating, review_date, sentiment_label, sentiment_score, source)
  VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
  ON CONFLICT (review_id) DO UPDATE SET
    bank_id = EXCLUDED.bank_id,
    review_text = EXCLUDED.review_text,
    rating = EXCLUDED.rating,
    review_date = EXCLUDED.review_date,
    sentiment_label = EXCLUDED.sentiment_label,
    sentiment_score = EXCLUDED.sentiment_score,
    source = EXCLUDED.source
`;

const bankIdOf = (rows: Array<Record<string, unknown>>, bankName: string) => {
  const id = Number(rows[0]?.bank_id);
  if (!Number.isInteger(id)) throw new Error(`Bank ${bankName} was not stored`);
  return id;
};

export const createPostgresSink = (
  clients: ClientSource,
  onClose: () => Promise<void> = async () => undefined
): ReviewSink => ({
  name: 'postgres',
  saveReviews: async (rows, catalog) => {
    const client = await clients.connect();
    try {
      await client.query('BEGIN');
      try {
        await client.query(readSchema('schema.sql'));
        const bankIds = new Map<string, number>();
        for (const bank of banksFor(rows, catalog)) {
          const result = await client.query(UPSERT_BANK, [bank.bank_name, bank.app_name]);
          bankIds.set(bank.entity_id, bankIdOf(result.rows, bank.bank_name));
        }
        for (const row of rows) {
          const bankId = bankIds.get(row.entity_id);
          if (bankId === undefined) throw new Error(`No bank for entity ${row.entity_id}`);
          await client.query(UPSERT_REVIEW, reviewValues(row, bankId));
        }
        await client.query('COMMIT');
      } catch (err) {
        await client.query('ROLLBACK');
        throw new Error(`Postgres save failed: ${errorMessage(err)}`);
      }
    } finally {
      client.release();
    }
  },
  close: onClose
});

export const connectPostgresSink = async (connectionString: string): Promise<ReviewSink> => {
  const pool = new Pool({ connectionString });
  // fail fast on a bad DATABASE_URL instead of on the first save
  const first = await pool.connect();
  first.release();
  return createPostgresSink({ connect: () => pool.connect() }, () => pool.end());
};
