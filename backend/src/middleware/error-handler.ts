import type { ErrorRequestHandler } from 'express';
import multer from 'multer';
import { ZodError } from 'zod';
import { HttpError, IngestError, PartialLoadError, type IngestErrorCode } from '../errors.js';
import { logger } from '../logger.js';

export const statusByCode: Record<IngestErrorCode, number> = {
  malformed_source: 422,
  anchor_not_found: 422,
  schema_too_narrow: 422,
  schema_drift: 422,
  schema_mismatch: 422,
  backend_unresolved: 500,
  connection_failed: 503,
  partial_load: 500,
};

export const errorHandler: ErrorRequestHandler = (err, _req, res, _next) => {
  if (err instanceof ZodError) {
    return res.status(400).json({
      message: 'validation_failed',
      issues: err.issues,
    });
  }

  if (err instanceof multer.MulterError) {
    return res.status(err.code === 'LIMIT_FILE_SIZE' ? 413 : 400).json({
      message: err.message,
      code: err.code,
    });
  }

  if (err instanceof HttpError) {
    return res.status(err.statusCode).json({
      message: err.message,
      details: err.details,
    });
  }

  if (err instanceof IngestError) {
    const status = statusByCode[err.code];
    if (status >= 500) {
      logger.error({ err, code: err.code }, 'ingest run failed');
    }
    return res.status(status).json({
      message: err.message,
      code: err.code,
      details: err.details,
      report: err instanceof PartialLoadError ? err.report : undefined,
    });
  }

  logger.error({ err }, 'unhandled error');
  if (err instanceof Error) {
    return res.status(500).json({
      message: err.message,
    });
  }

  return res.status(500).json({
    message: 'internal_error',
  });
};
