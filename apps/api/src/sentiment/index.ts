import { AppEnv } from '../config';
import { Logger, consoleLogger } from '../logger';
import { SentimentCapability } from './classifier';
import { createGeminiSentiment } from './gemini';

export const unavailableSentiment = (reason: string): SentimentCapability => ({
  name: 'unavailable',
  classify: async () => {
    throw new Error(reason);
  }
});

export const createSentimentCapability = (
  env: Pick<AppEnv, 'geminiApiKey' | 'geminiModel'>,
  logger: Logger = consoleLogger
): SentimentCapability => {
  if (env.geminiApiKey) return createGeminiSentiment(env.geminiApiKey, env.geminiModel);
  logger.warn('GEMINI_API_KEY not configured; every review will get the NEUTRAL sentiment fallback');
  return unavailableSentiment('GEMINI_API_KEY not configured');
};
