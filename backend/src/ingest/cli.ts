import { batchSizeSchema } from '../config.js';
import { IngestError, PartialLoadError } from '../errors.js';
import { filterPreview, load, profile, reconcileSource, type IngestContext } from './pipeline.js';
import type { SpreadsheetSource } from './spreadsheet.js';

export const COMMANDS = ['profile', 'reconcile', 'filter-preview', 'load'] as const;
export type Command = (typeof COMMANDS)[number];

export const USAGE =
  'Usage: ingest <profile|reconcile|filter-preview|load> <file> [--batch-size N] [--replace] [--sheet NAME]';

export type CliArgs = {
  command: Command;
  file: string;
  batchSize?: number;
  replace: boolean;
  sheetName?: string;
};

export class UsageError extends Error {}

function isCommand(value: string): value is Command {
  return COMMANDS.some((command) => command === value);
}

export function parseArgs(argv: readonly string[]): CliArgs {
  const positional: string[] = [];
  let batchSize: number | undefined;
  let replace = false;
  let sheetName: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--replace') {
      replace = true;
    } else if (arg === '--batch-size' || arg === '--sheet') {
      const value = argv[i + 1];
      if (value === undefined) {
        throw new UsageError(`${arg} needs a value`);
      }
      i++;
      if (arg === '--sheet') {
        sheetName = value;
      } else {
        const parsed = batchSizeSchema.safeParse(value);
        if (!parsed.success) {
          throw new UsageError(`--batch-size must be an integer between 1 and 10000, got ${value}`);
        }
        batchSize = parsed.data;
      }
    } else if (arg !== undefined && arg.startsWith('--')) {
      throw new UsageError(`unknown option ${arg}`);
    } else if (arg !== undefined) {
      positional.push(arg);
    }
  }

  const [command, file, ...extra] = positional;
  if (!command || !file || extra.length) {
    throw new UsageError(USAGE);
  }
  if (!isCommand(command)) {
    throw new UsageError(`unknown command ${command}\n${USAGE}`);
  }
  return { command, file, batchSize, replace, sheetName };
}

export async function runCommand(args: CliArgs, base: IngestContext): Promise<unknown> {
  const ctx: IngestContext = {
    ...base,
    batchSize: args.batchSize ?? base.batchSize,
    mode: args.replace ? 'replace' : base.mode,
    sheetName: args.sheetName ?? base.sheetName,
  };
  const source: SpreadsheetSource = { path: args.file };

  switch (args.command) {
    case 'profile':
      return profile(source, ctx);
    case 'reconcile':
      return reconcileSource(source, ctx);
    case 'filter-preview':
      return filterPreview(source, ctx);
    case 'load':
      return load(source, ctx);
  }
}

/** JSON printed on stderr for a terminal error, the partial report included. */
export function describeFailure(error: unknown): Record<string, unknown> {
  if (error instanceof IngestError) {
    return {
      error: error.code,
      message: error.message,
      details: error.details,
      report: error instanceof PartialLoadError ? error.report : undefined,
    };
  }
  return { error: 'internal_error', message: error instanceof Error ? error.message : String(error) };
}
