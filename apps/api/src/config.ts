import path from 'path';
import { z } from 'zod';
import { ValidationError } from './errors';

export type FieldRule =
  | { kind: 'required' }
  | { kind: 'optional'; default: string | number | 'synthesized' };

export type EntityInfo = {
  name: string;
  appName: string;
  appId?: string;
};

export type PipelineConfig = {
  fields: Record<string, FieldRule>;
  processing: {
    minReviewLength: number;
    maxReviewLength: number;
  };
  sentiment: {
    positiveThreshold: number;
    negativeThreshold: number;
    batchSize: number;
  };
  themes: {
    keywords: Record<string, string[]>;
    tfidfMaxFeatures: number;
    minKeywordFrequency: number;
    minGroupSize: number;
    topKeywords: number;
    minKeywordHits: number;
  };
  requirements: {
    totalMinReviews: number;
    minReviewsPerEntity: number;
    maxAllowedErrorRate: number; // 0..1
  };
  entities: Record<string, EntityInfo>;
};

export const DEFAULT_CONFIG: PipelineConfig = {
  fields: {
    review_text: { kind: 'required' },
    rating: { kind: 'required' },
    date: { kind: 'required' },
    entity_id: { kind: 'required' },
    source: { kind: 'required' },
    review_id: { kind: 'optional', default: 'synthesized' },
    thumbs_up: { kind: 'optional', default: 0 },
    app_version: { kind: 'optional', default: 'Unknown' }
  },
  processing: {
    minReviewLength: 3,
    maxReviewLength: 1000
  },
  sentiment: {
    positiveThreshold: 0.6,
    negativeThreshold: 0.4,
    batchSize: 100
  },
  themes: {
    keywords: {
      'Account Access Issues': ['login', 'password', 'access', 'account', 'verify', 'authentication'],
      'Transaction Performance': ['slow', 'transfer', 'transaction', 'loading', 'speed', 'wait', 'time'],
      'UI/UX Experience': ['interface', 'design', 'easy', 'navigation', 'layout', 'user friendly'],
      'Customer Support': ['support', 'help', 'service', 'response', 'contact', 'assistance'],
      'App Reliability': ['crash', 'bug', 'error', 'freeze', 'update', 'not working'],
      'Security Concerns': ['security', 'safe', 'hack', 'privacy', 'protection'],
      'Feature Requests': ['feature', 'add', 'should have', 'missing', 'want', 'need']
    },
    tfidfMaxFeatures: 100,
    minKeywordFrequency: 5,
    minGroupSize: 10,
    topKeywords: 20,
    minKeywordHits: 1
  },
  requirements: {
    totalMinReviews: 1200,
    minReviewsPerEntity: 400,
    maxAllowedErrorRate: 0.05
  },
  entities: {
    CBE: { name: 'Commercial Bank of Ethiopia', appName: 'CBE Mobile', appId: 'com.combanketh.mobilebanking' },
    BOA: { name: 'Bank of Abyssinia', appName: 'BOA Mobile', appId: 'com.boa.boaMobileBanking' },
    DASHEN: { name: 'Dashen Bank', appName: 'Dashen Mobile', appId: 'com.dashen.dashensuperapp' }
  }
};

const fieldRuleSchema = z.union([
  z.object({ kind: z.literal('required') }),
  z.object({ kind: z.literal('optional'), default: z.union([z.string(), z.number()]) })
]);

const ratio = z.number().min(0).max(1);
const count = z.number().int().nonnegative();

export const configOverridesSchema = z
  .object({
    fields: z.record(fieldRuleSchema),
    processing: z
      .object({ minReviewLength: count, maxReviewLength: count })
      .partial(),
    sentiment: z
      .object({ positiveThreshold: ratio, negativeThreshold: ratio, batchSize: z.number().int().positive() })
      .partial(),
    themes: z
      .object({
        keywords: z.record(z.array(z.string().min(1)).min(1)),
        tfidfMaxFeatures: z.number().int().positive(),
        minKeywordFrequency: count,
        minGroupSize: count,
        topKeywords: z.number().int().positive(),
        minKeywordHits: z.number().int().positive()
      })
      .partial(),
    requirements: z
      .object({ totalMinReviews: count, minReviewsPerEntity: count, maxAllowedErrorRate: ratio })
      .partial(),
    entities: z.record(z.object({ name: z.string(), appName: z.string(), appId: z.string().optional() }))
  })
  .partial()
  .strict();

export type ConfigOverrides = z.infer<typeof configOverridesSchema>;

/**
 * Validates user-supplied overrides and layers them over the defaults.
 * `fields`, `entities` and `themes.keywords` replace the default tables wholesale.
 */
export const resolveConfig = (overrides?: unknown, base: PipelineConfig = DEFAULT_CONFIG): PipelineConfig => {
  if (overrides === undefined || overrides === null) return base;
  const parsed = configOverridesSchema.safeParse(overrides);
  if (!parsed.success) throw ValidationError.fromZodError(parsed.error);
  const o = parsed.data;

  const config: PipelineConfig = {
    fields: o.fields ?? base.fields,
    processing: { ...base.processing, ...o.processing },
    sentiment: { ...base.sentiment, ...o.sentiment },
    themes: { ...base.themes, ...o.themes },
    requirements: { ...base.requirements, ...o.requirements },
    entities: o.entities ?? base.entities
  };

  if (config.processing.minReviewLength > config.processing.maxReviewLength) {
    throw new ValidationError('Invalid config', [
      { field: 'processing.minReviewLength', message: 'must not exceed maxReviewLength' }
    ]);
  }
  return config;
};

export const requiredFields = (config: PipelineConfig) =>
  Object.entries(config.fields)
    .filter(([, rule]) => rule.kind === 'required')
    .map(([name]) => name);

export type AppEnv = {
  port: number;
  dataDir: string;
  databaseUrl?: string;
  sqlitePath: string;
  geminiApiKey?: string;
  geminiModel: string;
  sentimentBatchSize?: number;
};

export const loadEnv = (env: NodeJS.ProcessEnv = process.env): AppEnv => {
  const dataDir = env.DATA_DIR || path.join(process.cwd(), 'data');
  const batch = Number(env.SENTIMENT_BATCH_SIZE);
  return {
    port: Number(env.PORT) || 8080,
    dataDir,
    databaseUrl: env.DATABASE_URL || undefined,
    sqlitePath: env.SQLITE_PATH || path.join(dataDir, 'reviews.db'),
    geminiApiKey: env.GEMINI_API_KEY || undefined,
    geminiModel: env.GEMINI_MODEL || 'gemini-2.5-flash',
    sentimentBatchSize: Number.isInteger(batch) && batch > 0 ? batch : undefined
  };
};

export const configFromEnv = (env: Pick<AppEnv, 'sentimentBatchSize'>, base: PipelineConfig = DEFAULT_CONFIG): PipelineConfig =>
  env.sentimentBatchSize === undefined
    ? base
    : { ...base, sentiment: { ...base.sentiment, batchSize: env.sentimentBatchSize } };
