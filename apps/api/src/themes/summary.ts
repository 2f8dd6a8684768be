import { ScoredReview, SentimentCategory, ThemeAssignment, ThemeSummary } from '../types/review';

const tally = <K>(keys: K[], keyOf: (key: K) => string) =>
  keys.reduce((acc, key) => {
    const id = keyOf(key);
    const entry = acc.get(id);
    if (entry) entry.count += 1;
    else acc.set(id, { key, count: 1 });
    return acc;
  }, new Map<string, { key: K; count: number }>());

const byText = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0);

/**
 * Theme counts per entity (entity asc, count desc) and per sentiment category
 * (theme asc, count desc). Equal counts fall back to theme or category order.
 */
export const buildThemeSummary = (assignments: ThemeAssignment[], scored: ScoredReview[]): ThemeSummary => {
  const sentimentById = new Map(scored.map(row => [row.review_id, row.sentiment_category]));

  const byEntity = tally(assignments, a => JSON.stringify([a.entity_id, a.theme]));

  const withSentiment = assignments.reduce<Array<{ theme: string; sentiment_category: SentimentCategory }>>(
    (acc, a) => {
      const category = sentimentById.get(a.review_id);
      if (category) acc.push({ theme: a.theme, sentiment_category: category });
      return acc;
    },
    []
  );
  const bySentiment = tally(withSentiment, s => JSON.stringify([s.theme, s.sentiment_category]));

  return {
    by_entity: Array.from(byEntity.values(), ({ key, count }) => ({ entity_id: key.entity_id, theme: key.theme, count })).sort(
      (a, b) => byText(a.entity_id, b.entity_id) || b.count - a.count || byText(a.theme, b.theme)
    ),
    by_sentiment: Array.from(bySentiment.values(), ({ key, count }) => ({ ...key, count })).sort(
      (a, b) => byText(a.theme, b.theme) || b.count - a.count || byText(a.sentiment_category, b.sentiment_category)
    )
  };
};
