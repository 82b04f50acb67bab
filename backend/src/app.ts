import express from 'express';
import helmet from 'helmet';
import morgan from 'morgan';
import cors from 'cors';
import swaggerUi from 'swagger-ui-express';
import { readFileSync } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import type { Pool } from 'pg';
import YAML from 'yaml';
import type { IngestContext } from './ingest/pipeline.js';
import { errorHandler } from './middleware/error-handler.js';
import { createHealthRouter } from './routes/health.js';
import { createIngestRouter } from './routes/ingest.js';

const currentDir = path.dirname(fileURLToPath(import.meta.url));
const openApiPath = path.resolve(currentDir, '../openapi/openapi.yaml');

export type AppOptions = {
  pool: Pool;
  context: IngestContext;
  uploadMaxFileSize: number;
};

export function createApp(options: AppOptions): express.Express {
  const openApiDocument = YAML.parse(readFileSync(openApiPath, 'utf8'));

  const app = express();
  app.set('trust proxy', true);
  app.use(helmet());
  app.use(cors());
  app.use(express.json());
  app.use(morgan('combined'));

  app.use('/api/v1/health', createHealthRouter(options.pool, options.context.backend));
  app.use(
    '/api/v1/ingest',
    createIngestRouter({ context: options.context, uploadMaxFileSize: options.uploadMaxFileSize })
  );

  app.use('/api/docs', swaggerUi.serve, swaggerUi.setup(openApiDocument));
  app.get('/api/v1/openapi.json', (_req, res) => {
    res.json(openApiDocument);
  });

  app.use(errorHandler);
  return app;
}
