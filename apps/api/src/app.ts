import crypto from 'crypto';
import path from 'path';
import express, { type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import multer from 'multer';
import type { ZodError } from 'zod';

import { hasGenerativeBackend, type AppConfig } from './config';
import { errorMessage, UnsupportedSourceError } from './errors';
import { ensureProfiled, profileSource } from './ingest';
import { connectionTestSchema, testConnection, type ConnectionTestRequest, type ConnectionTestResult } from './ingest/db';
import { analyzeSources } from './infer';
import { createRecommender, type Recommender } from './recommend';
import { loadSampleSources } from './samples';
import type { SourceDescriptor, SourceType } from './types/schema';
import { analysisRequestSchema, sourceDescriptorSchema, sourcesRequestSchema, uploadFieldsSchema } from './validation';

const UPLOAD_TYPES: Record<string, { type: SourceType; delimiter?: string }> = {
  '.csv': { type: 'csv' },
  '.tsv': { type: 'csv', delimiter: '\t' },
  '.xlsx': { type: 'excel' },
  '.xls': { type: 'excel' },
  '.json': { type: 'json' }
};

export type AppDeps = {
  recommender: Recommender;
  testConnection: (request: ConnectionTestRequest) => Promise<ConnectionTestResult>;
};

const invalid = (res: Response, error: ZodError) => {
  res.status(400).json({ error: 'Invalid request', issues: error.issues });
};

const fail = (res: Response, err: unknown, fallback: string) => {
  const status = err instanceof UnsupportedSourceError ? 400 : 500;
  if (status === 500) console.error(`[API] ${fallback}: ${errorMessage(err)}`);
  res.status(status).json({ error: errorMessage(err, fallback) });
};

export const projectNameFor = (goal: string) =>
  `project_${crypto.createHash('sha256').update(goal).digest('hex').slice(0, 8)}`;

export const createApp = (config: AppConfig, deps: Partial<AppDeps> = {}) => {
  const recommender = deps.recommender ?? createRecommender(config);
  const checkConnection = deps.testConnection ?? testConnection;

  const app = express();
  const upload = multer({ limits: { fileSize: config.maxUploadBytes } });

  app.use(cors());
  app.use(express.json({ limit: config.jsonLimit }));

  app.get('/api/health', (_req, res) => {
    res.json({
      status: 'healthy',
      services: {
        profiler: 'running',
        recommender: hasGenerativeBackend(config) ? 'running' : 'no_api_key'
      }
    });
  });

  app.post('/api/sources/profile', async (req, res) => {
    const parsed = sourceDescriptorSchema.safeParse(req.body);
    if (!parsed.success) return invalid(res, parsed.error);

    try {
      const result = await profileSource(parsed.data);
      res.json(result.ok
        ? { schema: result.schema, status: 'success' }
        : { schema: result.schema, status: 'degraded', reason: result.reason });
    } catch (err) {
      fail(res, err, 'Source profiling failed');
    }
  });

  app.post('/api/sources/upload', upload.single('file'), async (req, res) => {
    const file = req.file;
    if (!file) {
      res.status(400).json({ error: 'A file upload is required' });
      return;
    }

    const kind = UPLOAD_TYPES[path.extname(file.originalname).toLowerCase()];
    if (!kind) {
      res.status(400).json({ error: `Unsupported file type: ${file.originalname}` });
      return;
    }

    const fields = uploadFieldsSchema.safeParse(req.body ?? {});
    if (!fields.success) return invalid(res, fields.error);

    try {
      const source: SourceDescriptor = {
        id: 'uploaded_file',
        name: file.originalname,
        type: kind.type,
        config: {
          fileData: file.buffer,
          delimiter: fields.data.delimiter ?? kind.delimiter,
          encoding: fields.data.encoding
        }
      };
      const result = await profileSource(source);
      res.json({
        filename: file.originalname,
        schema: result.schema,
        status: result.ok ? 'success' : 'degraded'
      });
    } catch (err) {
      fail(res, err, 'Upload profiling failed');
    }
  });

  app.post('/api/relationships', async (req, res) => {
    const parsed = sourcesRequestSchema.safeParse(req.body);
    if (!parsed.success) return invalid(res, parsed.error);

    try {
      const sources = await ensureProfiled(parsed.data.sources);
      const { relationships } = analyzeSources(sources);
      res.json({ relationships, count: relationships.length });
    } catch (err) {
      fail(res, err, 'Relationship detection failed');
    }
  });

  app.post('/api/recommendations', async (req, res) => {
    const parsed = analysisRequestSchema.safeParse(req.body);
    if (!parsed.success) return invalid(res, parsed.error);

    try {
      const { businessRequirements } = parsed.data;
      const sources = await ensureProfiled(parsed.data.sources);
      const { relationships, dataPatterns } = analyzeSources(sources);
      const recommendations = await recommender.recommend(sources, businessRequirements, dataPatterns);

      res.json({
        recommendations,
        relationships,
        dataPatterns,
        projectInfo: {
          name: projectNameFor(businessRequirements.goal),
          estimatedRuntime: recommendations.etlPipeline.estimatedRuntime
        }
      });
    } catch (err) {
      fail(res, err, 'Recommendation failed');
    }
  });

  app.post('/api/connections/test', async (req, res) => {
    const parsed = connectionTestSchema.safeParse(req.body);
    if (!parsed.success) return invalid(res, parsed.error);

    try {
      res.json(await checkConnection(parsed.data));
    } catch (err) {
      fail(res, err, 'Connection test failed');
    }
  });

  app.get('/api/samples', (_req, res) => {
    try {
      const sources = loadSampleSources();
      res.json({ sources, ...analyzeSources(sources) });
    } catch (err) {
      fail(res, err, 'Failed to load samples');
    }
  });

  // multer rejects oversized or misnamed uploads before the route runs
  app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (!(err instanceof multer.MulterError)) return next(err);
    res.status(err.code === 'LIMIT_FILE_SIZE' ? 413 : 400).json({ error: err.message });
  });

  return app;
};
