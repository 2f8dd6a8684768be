import stopwordList from '../data/stopwords-en.json';
import { KeywordScore } from '../types/review';

export const ENGLISH_STOPWORDS: ReadonlySet<string> = new Set(stopwordList);

export type TfidfOptions = {
  maxFeatures: number;
  topN: number;
};

const TOKEN = /[\p{L}\p{N}_]{2,}/gu;

export const tokenize = (text: string, stopwords: ReadonlySet<string> = ENGLISH_STOPWORDS) =>
  (text.toLowerCase().match(TOKEN) ?? []).filter(token => !stopwords.has(token));

// unigrams followed by bigrams over the stopword-free token stream
export const ngrams = (tokens: string[]) => {
  const bigrams = tokens.slice(1).map((token, idx) => `${tokens[idx]} ${token}`);
  return [...tokens, ...bigrams];
};

const countTerms = (terms: string[]) =>
  terms.reduce((acc, term) => acc.set(term, (acc.get(term) ?? 0) + 1), new Map<string, number>());

const byScoreThenName = (a: KeywordScore, b: KeywordScore) =>
  b.score - a.score || (a.keyword < b.keyword ? -1 : a.keyword > b.keyword ? 1 : 0);

/**
 * Ranks the terms of a small corpus by summed TF-IDF weight.
 *
 * The vocabulary is capped at `maxFeatures` terms by corpus frequency; idf is
 * smoothed (`ln((1 + n) / (1 + df)) + 1`) and every document vector is
 * L2-normalized before the per-term sums are taken.
 */
export const extractKeywords = (
  texts: string[],
  options: TfidfOptions,
  stopwords: ReadonlySet<string> = ENGLISH_STOPWORDS
): KeywordScore[] => {
  const docs = texts.map(text => countTerms(ngrams(tokenize(text, stopwords))));

  const corpusCounts = new Map<string, number>();
  const docFreq = new Map<string, number>();
  for (const doc of docs) {
    for (const [term, count] of doc) {
      corpusCounts.set(term, (corpusCounts.get(term) ?? 0) + count);
      docFreq.set(term, (docFreq.get(term) ?? 0) + 1);
    }
  }
  if (corpusCounts.size === 0) return [];

  const vocabulary = new Set(
    Array.from(corpusCounts, ([keyword, score]) => ({ keyword, score }))
      .sort(byScoreThenName)
      .slice(0, Math.max(0, options.maxFeatures))
      .map(entry => entry.keyword)
  );

  const n = docs.length;
  const idf = (term: string) => Math.log((1 + n) / (1 + (docFreq.get(term) ?? 0))) + 1;

  const totals = new Map<string, number>();
  for (const doc of docs) {
    const weights = Array.from(doc)
      .filter(([term]) => vocabulary.has(term))
      .map(([term, count]) => [term, count * idf(term)] as const);
    const norm = Math.sqrt(weights.reduce((sum, [, w]) => sum + w * w, 0));
    if (norm === 0) continue;
    for (const [term, w] of weights) totals.set(term, (totals.get(term) ?? 0) + w / norm);
  }

  return Array.from(totals, ([keyword, score]) => ({ keyword, score }))
    .sort(byScoreThenName)
    .slice(0, Math.max(0, options.topN));
};
