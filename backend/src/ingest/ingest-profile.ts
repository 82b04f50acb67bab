import { readFileSync } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import type { AnchorColumn, FilterPredicate, LoadMode } from './types.js';

const currentDir = path.dirname(fileURLToPath(import.meta.url));
export const DEFAULT_INGEST_PROFILE_PATH = path.resolve(currentDir, '../../config/ingest-profile.json');

const identifier = z
  .string()
  .trim()
  .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'must be a plain SQL identifier');

const anchorSchema = z.object({
  id: z.string().trim().min(1),
  aliases: z.array(z.string().trim().min(1)).min(1),
  required: z.boolean().default(true),
});

const scalar = z.union([z.string(), z.number()]);

const predicateSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('equals'), anchor: z.string().min(1), value: scalar }),
  z.object({ kind: z.literal('not-null'), anchor: z.string().min(1) }),
  z.object({ kind: z.literal('in-set'), anchor: z.string().min(1), values: z.array(scalar).min(1) }),
]);

const profileSchema = z
  .object({
    table: identifier,
    schemaName: identifier.default('public'),
    headerRow: z.number().int().min(0).default(0),
    sheetName: z.string().min(1).optional(),
    anchors: z.array(anchorSchema).default([]),
    predicates: z.array(predicateSchema).default([]),
    nullTokens: z.array(z.string()).default([]),
    maxTextLength: z.number().int().positive().default(2000),
    isolationColumn: identifier.optional(),
    sampleFields: z.array(z.string().min(1)).default([]),
    mode: z.enum(['append', 'replace']).default('append'),
  })
  .superRefine((value, ctx) => {
    const required = new Set(value.anchors.filter((anchor) => anchor.required).map((anchor) => anchor.id));
    value.predicates.forEach((predicate, index) => {
      if (!required.has(predicate.anchor)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['predicates', index, 'anchor'],
          message: `predicate anchor ${predicate.anchor} must be declared as a required anchor`,
        });
      }
    });
  });

export type IngestProfileInput = z.input<typeof profileSchema>;

export type IngestProfile = {
  readonly table: string;
  readonly schemaName: string;
  readonly headerRow: number;
  readonly sheetName?: string;
  readonly anchors: readonly AnchorColumn[];
  readonly predicates: readonly FilterPredicate[];
  readonly nullTokens: readonly string[];
  readonly maxTextLength: number;
  readonly isolationColumn?: string;
  readonly sampleFields: readonly string[];
  readonly mode: LoadMode;
};

export function defineIngestProfile(input: IngestProfileInput): IngestProfile {
  return Object.freeze(profileSchema.parse(input));
}

export function readIngestProfile(filePath: string = DEFAULT_INGEST_PROFILE_PATH): IngestProfile {
  const raw: unknown = JSON.parse(readFileSync(filePath, 'utf8'));
  return Object.freeze(profileSchema.parse(raw));
}

export function qualifiedTable(profile: Pick<IngestProfile, 'schemaName' | 'table'>): string {
  return `${profile.schemaName}.${profile.table}`;
}
