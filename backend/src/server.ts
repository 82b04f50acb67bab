import 'dotenv/config';
import { createApp } from './app.js';
import { loadSettings } from './config.js';
import { createPool } from './db.js';
import { describeBackend, resolveBackendConfig } from './ingest/environment.js';
import { readIngestProfile } from './ingest/ingest-profile.js';
import { getTargetSchema } from './ingest/target-schema.js';
import { logger } from './logger.js';

const settings = loadSettings();
logger.level = settings.logLevel;
const backend = resolveBackendConfig(process.env);
const pool = createPool(backend);
pool.on('error', (error) => {
  logger.error({ err: error }, 'idle database client failed');
});

const app = createApp({
  pool,
  context: {
    schema: getTargetSchema(settings.targetSchemaPath),
    profile: readIngestProfile(settings.profilePath),
    backend,
    batchSize: settings.batchSize,
  },
  uploadMaxFileSize: settings.uploadMaxFileSize,
});

app.listen(settings.apiPort, () => {
  logger.info({ port: settings.apiPort, backend: backend.kind, target: describeBackend(backend) }, 'api up');
});
