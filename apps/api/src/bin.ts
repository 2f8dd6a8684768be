import dotenv from 'dotenv';
import { runCli } from './cli';
import { configFromEnv, loadEnv } from './config';
import { createSentimentCapability } from './sentiment';
import { connectPostgresSink } from './store/postgres';
import { openSqliteSink } from './store/sqlite';

dotenv.config();

const env = loadEnv();

const code = await runCli(process.argv.slice(2), {
  config: configFromEnv(env),
  capability: createSentimentCapability(env),
  openSink: async target => {
    if (target === 'sqlite') return openSqliteSink(env.sqlitePath);
    if (!env.databaseUrl) throw new Error('DATABASE_URL is required for --persist postgres');
    return connectPostgresSink(env.databaseUrl);
  }
});
process.exit(code);
