import { describe, it, expect } from 'vitest';
import * as XLSX from 'xlsx';
import { DEFAULT_CONFIG, requiredFields } from '../config';
import { BadRequestError } from '../errors';
import { duplicateIds, ingestReviewsBuffer, tableFromRecords, toRawReviews } from '../ingest/csv';
import { silentLogger } from '../logger';
import { checkStructure, validateStructure } from '../pipeline/validate';
import { rawReview } from './fixtures';

const makeWorkbookBuffer = () => {
  const data = [
    ['content', 'score', 'at', 'bank', 'source'],
    ['Good service', 4, '2024-05-01', 'BOA', 'Google Play'],
    ['Slow login', 2, '2024-05-02', 'BOA', 'Google Play']
  ];
  const sheet = XLSX.utils.aoa_to_sheet(data);
  const wb = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(wb, sheet, 'Sheet1');
  return XLSX.write(wb, { type: 'buffer', bookType: 'xlsx' });
};

describe('ingestReviewsBuffer', () => {
  it('parses CSV and maps store export columns', () => {
    const csv = 'reviewId,content,score,at,bank,source,thumbsUpCount\nabc,Great app,5,2024-01-15,CBE,Google Play,3';
    const table = ingestReviewsBuffer(Buffer.from(csv), 'reviews.csv');

    expect(table.source).toBe('csv');
    expect(table.columns).toEqual(['review_id', 'review_text', 'rating', 'date', 'entity_id', 'source', 'thumbs_up']);
    expect(table.rows[0]).toEqual({
      review_id: 'abc',
      review_text: 'Great app',
      rating: '5',
      date: '2024-01-15',
      entity_id: 'CBE',
      source: 'Google Play',
      thumbs_up: '3'
    });
  });

  it('parses XLSX workbooks', () => {
    const table = ingestReviewsBuffer(Buffer.from(makeWorkbookBuffer()), 'reviews.xlsx');
    expect(table.source).toBe('excel');
    expect(table.columns).toEqual(['review_text', 'rating', 'date', 'entity_id', 'source']);
    expect(table.rows).toHaveLength(2);
    expect(table.rows[1]).toMatchObject({ review_text: 'Slow login', rating: 2, entity_id: 'BOA' });
  });

  it('prefers the canonical column over its alias', () => {
    expect(ingestReviewsBuffer(Buffer.from('review_text,content\nA,B'), 'a.csv').rows[0]).toEqual({ review_text: 'A' });
    expect(ingestReviewsBuffer(Buffer.from('content,review_text\nB,A'), 'b.csv').rows[0]).toEqual({ review_text: 'A' });
  });

  it('rejects malformed CSV', () => {
    expect(() => ingestReviewsBuffer(Buffer.from('a,b\n1,2,3'), 'bad.csv')).toThrow(BadRequestError);
  });
});

describe('tableFromRecords', () => {
  it('collects columns across records', () => {
    const table = tableFromRecords([{ content: 'Hi' }, { score: 5, bank: 'CBE' }]);
    expect(table.columns).toEqual(['review_text', 'rating', 'entity_id']);
    expect(table.source).toBe('json');
  });

  it('rejects entries that are not objects', () => {
    expect(() => tableFromRecords([{ content: 'Hi' }, 'oops'])).toThrow('Review at index 1 is not an object');
  });
});

describe('toRawReviews', () => {
  it('derives missing ids from content and keeps raw values for later stages', () => {
    const table = tableFromRecords([
      { review_text: 'Fine', rating: '4', date: '2024-01-01', entity_id: ' CBE ', source: 'Google Play', thumbs_up: '2.7' },
      { review_id: 'x9', review_text: null, rating: 5, date: null, entity_id: '', source: '', thumbs_up: 'many' }
    ]);
    expect(toRawReviews(table)).toEqual([
      {
        review_id: expect.stringMatching(/^gen-[0-9a-f]{16}$/),
        review_text: 'Fine',
        rating: '4',
        date: '2024-01-01',
        entity_id: 'CBE',
        source: 'Google Play',
        thumbs_up: 2,
        app_version: null
      },
      {
        review_id: 'x9',
        review_text: null,
        rating: 5,
        date: null,
        entity_id: null,
        source: null,
        thumbs_up: null,
        app_version: null
      }
    ]);
  });

  it('gives the same content the same id across files and different content different ids', () => {
    const idsOf = (records: unknown[]) => toRawReviews(tableFromRecords(records)).map(row => row.review_id);
    const fine = { review_text: 'Fine', rating: 4, date: '2024-01-01', entity_id: 'CBE', source: 'Google Play' };
    const slow = { ...fine, review_text: 'Slow' };

    const [first] = idsOf([fine]);
    const [again, other] = idsOf([fine, slow]);
    expect(again).toBe(first);
    expect(other).not.toBe(first);
  });

  it('keeps identical id-less rows apart', () => {
    const row = { review_text: 'Same', rating: 3, date: '2024-01-01', entity_id: 'CBE', source: 'Google Play' };
    const ids = toRawReviews(tableFromRecords([row, row])).map(r => r.review_id);
    expect(new Set(ids).size).toBe(2);
  });
});

describe('duplicateIds', () => {
  it('lists each repeated id once', () => {
    const rows = ['a', 'b', 'a', 'c', 'a', 'b'].map(review_id => rawReview({ review_id }));
    expect(duplicateIds(rows)).toEqual(['a', 'b']);
    expect(duplicateIds([rawReview()])).toEqual([]);
  });
});

describe('validateStructure', () => {
  it('lists every missing required column', () => {
    const required = requiredFields(DEFAULT_CONFIG);
    expect(required).toEqual(['review_text', 'rating', 'date', 'entity_id', 'source']);
    expect(checkStructure({ columns: ['review_text', 'source'] }, required)).toEqual({
      ok: false,
      missing: ['rating', 'date', 'entity_id']
    });
  });

  it('accepts a table with all required columns and ignores extras', () => {
    const columns = ['review_text', 'rating', 'date', 'entity_id', 'source', 'extra'];
    expect(validateStructure({ columns }, requiredFields(DEFAULT_CONFIG), silentLogger)).toEqual({ ok: true, missing: [] });
  });
});
