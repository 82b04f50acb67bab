import { Router, type Request } from 'express';
import multer from 'multer';
import path from 'node:path';
import { z } from 'zod';
import { batchSizeSchema } from '../config.js';
import { badRequest } from '../errors.js';
import {
  filterPreview,
  load,
  profile,
  reconcileSource,
  type IngestContext,
} from '../ingest/pipeline.js';
import { SUPPORTED_EXTENSIONS, type SpreadsheetSource } from '../ingest/spreadsheet.js';
import { asyncHandler } from '../utils/async-handler.js';

export type IngestRouterOptions = {
  context: IngestContext;
  uploadMaxFileSize: number;
};

const flag = z
  .union([z.string(), z.boolean()])
  .optional()
  .transform((value) => {
    if (value === undefined) return false;
    if (typeof value === 'boolean') return value;
    const normalized = value.toLowerCase();
    return normalized === 'true' || normalized === '1' || normalized === 'on';
  });

const runSchema = z.object({
  sheetName: z.string().trim().min(1).optional(),
  batchSize: batchSizeSchema.optional(),
  replace: flag,
});

function uploadedSource(req: Request): SpreadsheetSource {
  const file = req.file;
  if (!file) {
    throw badRequest('a spreadsheet must be uploaded in the "file" field');
  }
  const extension = path.extname(file.originalname).toLowerCase();
  if (!SUPPORTED_EXTENSIONS.includes(extension)) {
    throw badRequest(`unsupported file type ${extension || '(none)'}`, { supported: SUPPORTED_EXTENSIONS });
  }
  return { filename: path.basename(file.originalname), data: file.buffer };
}

export function createIngestRouter(options: IngestRouterOptions): Router {
  const router = Router();
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { files: 1, fileSize: options.uploadMaxFileSize },
  });

  const contextFor = (req: Request): IngestContext => {
    const parsed = runSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      throw badRequest('invalid request', parsed.error.flatten());
    }
    const { sheetName, batchSize, replace } = parsed.data;
    return {
      ...options.context,
      sheetName: sheetName ?? options.context.sheetName,
      batchSize: batchSize ?? options.context.batchSize,
      mode: replace ? 'replace' : options.context.mode,
    };
  };

  router.post(
    '/profile',
    upload.single('file'),
    asyncHandler(async (req, res) => {
      res.json(await profile(uploadedSource(req), contextFor(req)));
    })
  );

  router.post(
    '/reconcile',
    upload.single('file'),
    asyncHandler(async (req, res) => {
      res.json(await reconcileSource(uploadedSource(req), contextFor(req)));
    })
  );

  router.post(
    '/filter-preview',
    upload.single('file'),
    asyncHandler(async (req, res) => {
      res.json(await filterPreview(uploadedSource(req), contextFor(req)));
    })
  );

  router.post(
    '/load',
    upload.single('file'),
    asyncHandler(async (req, res) => {
      const report = await load(uploadedSource(req), contextFor(req));
      res.status(201).json(report);
    })
  );

  return router;
}
