import { Router } from 'express';
import type { Pool, QueryResult } from 'pg';
import { query } from '../db.js';
import { describeBackend } from '../ingest/environment.js';
import type { BackendConfig } from '../ingest/types.js';
import { logger } from '../logger.js';
import { asyncHandler } from '../utils/async-handler.js';

export function createHealthRouter(pool: Pool, backend: BackendConfig): Router {
  const router = Router();

  router.get(
    '/',
    asyncHandler(async (_req, res) => {
      let now: QueryResult<{ now: Date }>;
      try {
        now = await query<{ now: Date }>(pool, 'select now() as now');
      } catch (error) {
        logger.warn({ err: error }, 'health check query failed');
        res.status(503).json({
          status: 'unavailable',
          backend: backend.kind,
          target: describeBackend(backend),
          message: error instanceof Error ? error.message : String(error),
        });
        return;
      }
      res.json({
        status: 'ok',
        time: now.rows[0]?.now ?? null,
        backend: backend.kind,
        target: describeBackend(backend),
      });
    })
  );

  return router;
}
