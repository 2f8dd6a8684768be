import dotenv from 'dotenv';
import path from 'path';
import { fileURLToPath } from 'url';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
// Load root .env if present
dotenv.config({ path: path.join(__dirname, '../../../.env') });
// Fallback to local .env
dotenv.config();

import { createApp } from './app';
import { configFromEnv, loadEnv } from './config';
import { errorMessage } from './errors';
import { createSentimentCapability } from './sentiment';
import { connectPostgresSink } from './store/postgres';

const main = async () => {
  const env = loadEnv();
  const sink = env.databaseUrl ? await connectPostgresSink(env.databaseUrl) : undefined;
  const app = createApp({
    config: configFromEnv(env),
    capability: createSentimentCapability(env),
    sink
  });

  app.listen(env.port, () => {
    console.log(`Review Insights API running on ${env.port}`);
  });
};

main().catch(err => {
  console.error(`Failed to start API: ${errorMessage(err)}`);
  process.exit(1);
});
