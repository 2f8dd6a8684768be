import express, { Response } from 'express';
import cors from 'cors';
import multer from 'multer';
import { z } from 'zod';

import { PipelineConfig, resolveConfig } from './config';
import { AppError, BadRequestError, StructuralError, ValidationError, errorMessage } from './errors';
import { ingestReviewsBuffer, tableFromRecords } from './ingest/csv';
import { Logger, consoleLogger } from './logger';
import { buildReportPayload, buildWorkbook } from './output';
import { cleanText } from './pipeline/clean';
import { PipelineResult, runPipeline } from './pipeline/run';
import { SentimentCapability, classifySentiment } from './sentiment/classifier';
import { ReviewSink } from './store/sink';

export type AppDeps = {
  config: PipelineConfig;
  capability: SentimentCapability;
  logger?: Logger;
  sink?: ReviewSink;
};

const runJsonSchema = z.object({
  reviews: z.array(z.unknown()),
  config: z.unknown().optional()
});

const textSchema = z.object({ text: z.string().nullable() });

const parseBody = <S extends z.ZodTypeAny>(schema: S, body: unknown): z.infer<S> => {
  const parsed = schema.safeParse(body ?? {});
  if (!parsed.success) throw ValidationError.fromZodError(parsed.error);
  return parsed.data;
};

// multipart form fields arrive as strings
const parseConfigField = (value: unknown): unknown => {
  if (value === undefined || value === '') return undefined;
  if (typeof value !== 'string') return value;
  try {
    return JSON.parse(value);
  } catch {
    throw new BadRequestError('config must be a JSON object');
  }
};

const sendError = (res: Response, err: unknown, fallback: string, logger: Logger) => {
  if (err instanceof StructuralError) {
    return res.status(err.statusCode).json({ ...err.toJSON(), missingFields: err.missingFields });
  }
  if (err instanceof AppError) return res.status(err.statusCode).json(err.toJSON());
  logger.error(`${fallback}: ${errorMessage(err)}`);
  return res.status(500).json({ code: 'INTERNAL_ERROR', error: errorMessage(err) || fallback });
};

const sendResult = (res: Response, result: PipelineResult, format: string) => {
  if (format === 'xlsx') {
    res.setHeader('Content-Disposition', 'attachment; filename="review-insights.xlsx"');
    res.setHeader('Content-Type', 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet');
    res.send(buildWorkbook(result));
    return;
  }
  res.json({ ...buildReportPayload(result), dataset: result.dataset, themes: result.themes });
};

export const createApp = (deps: AppDeps) => {
  const app = express();
  const upload = multer();
  const logger = deps.logger ?? consoleLogger;

  app.use(cors());
  app.use(express.json({ limit: '20mb' }));

  app.get('/api/health', (_req, res) => {
    res.json({ ok: true });
  });

  app.get('/api/config', (_req, res) => {
    res.json({ config: deps.config, sentiment: deps.capability.name });
  });

  app.post('/api/pipeline/run', upload.single('file'), async (req, res) => {
    try {
      const file = req.file;
      if (!file) throw new BadRequestError('A CSV or XLSX file is required in the "file" field.');

      const config = resolveConfig(parseConfigField(req.body?.config), deps.config);
      const table = ingestReviewsBuffer(file.buffer, file.originalname);
      const result = await runPipeline(table, { config, capability: deps.capability, logger, sink: deps.sink });
      sendResult(res, result, String(req.query.format || 'json').toLowerCase());
    } catch (err) {
      sendError(res, err, 'Pipeline run failed', logger);
    }
  });

  app.post('/api/pipeline/run-json', async (req, res) => {
    try {
      const body = parseBody(runJsonSchema, req.body);
      const config = resolveConfig(body.config, deps.config);
      const result = await runPipeline(tableFromRecords(body.reviews), {
        config,
        capability: deps.capability,
        logger,
        sink: deps.sink
      });
      sendResult(res, result, String(req.query.format || 'json').toLowerCase());
    } catch (err) {
      sendError(res, err, 'Pipeline run failed', logger);
    }
  });

  app.post('/api/text/clean', (req, res) => {
    try {
      const { text } = parseBody(textSchema, req.body);
      res.json({ cleaned: cleanText(text) });
    } catch (err) {
      sendError(res, err, 'Text cleaning failed', logger);
    }
  });

  app.post('/api/sentiment/classify', async (req, res) => {
    try {
      const { text } = parseBody(textSchema, req.body);
      const result = await classifySentiment(deps.capability, text, deps.config.sentiment, logger);
      res.json(result);
    } catch (err) {
      sendError(res, err, 'Sentiment classification failed', logger);
    }
  });

  return app;
};
