import { z } from 'zod';
import { DEFAULT_INGEST_PROFILE_PATH } from './ingest/ingest-profile.js';
import { DEFAULT_TARGET_SCHEMA_PATH } from './ingest/target-schema.js';
import { logLevelSchema, type LogLevel } from './logger.js';

export const MIN_BATCH_SIZE = 1;
export const MAX_BATCH_SIZE = 10_000;
export const DEFAULT_BATCH_SIZE = 500;

export const batchSizeSchema = z.coerce.number().int().min(MIN_BATCH_SIZE).max(MAX_BATCH_SIZE);

const emptyAsUndefined = (value: unknown) => (value === '' ? undefined : value);

const settingsSchema = z.object({
  API_PORT: z.preprocess(emptyAsUndefined, z.coerce.number().int().min(1).max(65535).default(8080)),
  LOG_LEVEL: z.preprocess(emptyAsUndefined, logLevelSchema.default('info')),
  INGEST_BATCH_SIZE: z.preprocess(emptyAsUndefined, batchSizeSchema.default(DEFAULT_BATCH_SIZE)),
  INGEST_PROFILE_PATH: z.preprocess(emptyAsUndefined, z.string().default(DEFAULT_INGEST_PROFILE_PATH)),
  TARGET_SCHEMA_PATH: z.preprocess(emptyAsUndefined, z.string().default(DEFAULT_TARGET_SCHEMA_PATH)),
  INGEST_UPLOAD_MAX_FILE_SIZE: z.preprocess(emptyAsUndefined, z.coerce.number().int().positive().default(50 * 1024 * 1024)),
});

export type Settings = {
  apiPort: number;
  logLevel: LogLevel;
  batchSize: number;
  profilePath: string;
  targetSchemaPath: string;
  uploadMaxFileSize: number;
};

/** Service settings, separate from the database variables the environment resolver reads. */
export function loadSettings(env: Readonly<Record<string, string | undefined>> = process.env): Settings {
  const parsed = settingsSchema.parse(env);
  return {
    apiPort: parsed.API_PORT,
    logLevel: parsed.LOG_LEVEL,
    batchSize: parsed.INGEST_BATCH_SIZE,
    profilePath: parsed.INGEST_PROFILE_PATH,
    targetSchemaPath: parsed.TARGET_SCHEMA_PATH,
    uploadMaxFileSize: parsed.INGEST_UPLOAD_MAX_FILE_SIZE,
  };
}
