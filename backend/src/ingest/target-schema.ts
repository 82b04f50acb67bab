import { readFileSync } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import type { FieldSpec, TargetSchema } from './types.js';

const currentDir = path.dirname(fileURLToPath(import.meta.url));
export const DEFAULT_TARGET_SCHEMA_PATH = path.resolve(currentDir, '../../config/target-schema.json');

const fieldSchema = z.object({
  name: z.string().trim().min(1),
  column: z.string().trim().min(1).optional(),
  semanticType: z.enum(['text', 'integer', 'decimal', 'percent']).default('text'),
  nullable: z.boolean().default(true),
  aliases: z.array(z.string().trim().min(1)).default([]),
});

const targetSchemaFile = z
  .object({
    fields: z.array(fieldSchema).min(1),
  })
  .superRefine((value, ctx) => {
    const names = new Set<string>();
    const columns = new Set<string>();
    value.fields.forEach((field, index) => {
      const column = field.column ?? field.name;
      if (names.has(field.name)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['fields', index, 'name'], message: `duplicate field ${field.name}` });
      }
      if (columns.has(column)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['fields', index, 'column'], message: `duplicate column ${column}` });
      }
      names.add(field.name);
      columns.add(column);
    });
  });

export type TargetSchemaInput = z.input<typeof targetSchemaFile>;

function freezeSchema(parsed: z.output<typeof targetSchemaFile>): TargetSchema {
  const fields: FieldSpec[] = parsed.fields.map((field) =>
    Object.freeze({
      name: field.name,
      column: field.column ?? field.name,
      semanticType: field.semanticType,
      nullable: field.nullable,
      aliases: field.aliases,
    })
  );
  return Object.freeze({ fields: Object.freeze(fields) });
}

/** Validates a target schema definition and freezes it. */
export function defineTargetSchema(input: TargetSchemaInput): TargetSchema {
  return freezeSchema(targetSchemaFile.parse(input));
}

export function readTargetSchema(filePath: string): TargetSchema {
  const raw: unknown = JSON.parse(readFileSync(filePath, 'utf8'));
  return freezeSchema(targetSchemaFile.parse(raw));
}

let cached: { path: string; schema: TargetSchema } | null = null;

/** Process-wide target schema, read once per path. */
export function getTargetSchema(filePath: string = DEFAULT_TARGET_SCHEMA_PATH): TargetSchema {
  const resolved = path.resolve(filePath);
  if (cached && cached.path === resolved) {
    return cached.schema;
  }
  const schema = readTargetSchema(resolved);
  cached = { path: resolved, schema };
  return schema;
}

export function requiredFieldCount(schema: TargetSchema): number {
  return schema.fields.filter((field) => !field.nullable).length;
}
