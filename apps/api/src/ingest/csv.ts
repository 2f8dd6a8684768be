import { createHash } from 'crypto';
import Papa from 'papaparse';
import * as XLSX from 'xlsx';
import { BadRequestError } from '../errors';
import { RawReview, RawTable } from '../types/review';

// Column names used by the store exports, mapped onto the pipeline's field names.
export const COLUMN_ALIASES: Record<string, string> = {
  bank: 'entity_id',
  content: 'review_text',
  review_created_version: 'app_version',
  score: 'rating',
  at: 'date',
  reviewId: 'review_id',
  thumbsUpCount: 'thumbs_up'
};

const isMissing = (value: unknown) => value === null || value === undefined || String(value).trim() === '';

const canonicalColumn = (name: string) => {
  const trimmed = name.trim();
  return COLUMN_ALIASES[trimmed] ?? trimmed;
};

const parseRows = (buffer: Buffer, filename: string) => {
  const lower = filename.toLowerCase();
  if (lower.endsWith('.xlsx') || lower.endsWith('.xls')) {
    const workbook = XLSX.read(buffer, { type: 'buffer', cellDates: true });
    const sheetName = workbook.SheetNames[0];
    const worksheet = sheetName ? workbook.Sheets[sheetName] : undefined;
    if (!worksheet) throw new BadRequestError(`Workbook ${filename} has no sheets`);
    const header = XLSX.utils.sheet_to_json<unknown[]>(worksheet, { header: 1 })[0] ?? [];
    const rows = XLSX.utils.sheet_to_json<Record<string, unknown>>(worksheet, { defval: null });
    return { rows, columns: header.map(String), source: 'excel' };
  }

  const text = buffer.toString('utf-8');
  const parsed = Papa.parse<Record<string, unknown>>(text, {
    header: true,
    skipEmptyLines: true,
    dynamicTyping: false
  });

  if (parsed.errors?.length) {
    const first = parsed.errors[0];
    throw new BadRequestError(`CSV parse error: ${first.message}${first.row !== undefined ? ` (row ${first.row + 1})` : ''}`);
  }

  return { rows: parsed.data || [], columns: parsed.meta.fields ?? [], source: 'csv' };
};

const renameColumns = (row: Record<string, unknown>) => {
  const next: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(row)) {
    const column = canonicalColumn(key);
    // an explicit canonical column wins over its alias
    if (column in next && key !== column) continue;
    next[column] = value;
  }
  return next;
};

const buildTable = (rows: Record<string, unknown>[], columns: string[], source: string): RawTable => {
  const names = new Set(columns.map(canonicalColumn).filter(Boolean));
  return {
    columns: Array.from(names),
    rows: rows.map(renameColumns),
    source
  };
};

export const ingestReviewsBuffer = (buffer: Buffer, filename: string): RawTable => {
  const { rows, columns, source } = parseRows(buffer, filename);
  return buildTable(rows, columns, source);
};

export const tableFromRecords = (records: unknown[]): RawTable => {
  const rows = records.map((record, idx) => {
    if (!record || typeof record !== 'object' || Array.isArray(record)) {
      throw new BadRequestError(`Review at index ${idx} is not an object`);
    }
    return Object.fromEntries(Object.entries(record));
  });
  const columns = new Set<string>();
  rows.forEach(row => Object.keys(row).forEach(key => columns.add(key)));
  return buildTable(rows, Array.from(columns), 'json');
};

const toOptionalString = (value: unknown) => (isMissing(value) ? null : String(value));

const toCount = (value: unknown) => {
  if (isMissing(value)) return null;
  const num = typeof value === 'number' ? value : Number(String(value).trim());
  return Number.isFinite(num) ? Math.trunc(num) : null;
};

/**
 * Id for a row without one: a hash of its content plus how many identical rows
 * came before it, so reruns of a file reuse ids and different files do not collide.
 */
const contentId = (row: RawTable['rows'][number], seen: Map<string, number>) => {
  const content = JSON.stringify([row.entity_id, row.review_text, row.rating, row.date, row.source]);
  const occurrence = seen.get(content) ?? 0;
  seen.set(content, occurrence + 1);
  const digest = createHash('sha1').update(`${content}#${occurrence}`).digest('hex');
  return `gen-${digest.slice(0, 16)}`;
};

/**
 * Maps table rows onto review records. Nothing is dropped or defaulted here
 * except `review_id`, which is derived from the row content when absent.
 */
export const toRawReviews = (table: RawTable): RawReview[] => {
  const seen = new Map<string, number>();
  return table.rows.map(row => ({
    review_id: isMissing(row.review_id) ? contentId(row, seen) : String(row.review_id).trim(),
    review_text: row.review_text === null || row.review_text === undefined ? null : String(row.review_text),
    rating: row.rating ?? null,
    date: row.date ?? null,
    entity_id: isMissing(row.entity_id) ? null : String(row.entity_id).trim(),
    source: toOptionalString(row.source),
    thumbs_up: toCount(row.thumbs_up),
    app_version: toOptionalString(row.app_version)
  }));
};

/** Ids that appear on more than one row, in first-repeat order. */
export const duplicateIds = (rows: RawReview[]) => {
  const seen = new Set<string>();
  const repeated = new Set<string>();
  for (const { review_id } of rows) {
    if (seen.has(review_id)) repeated.add(review_id);
    seen.add(review_id);
  }
  return Array.from(repeated);
};
