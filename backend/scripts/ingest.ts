/**
 * Spreadsheet ingestion from the command line.
 *
 * Usage: tsx backend/scripts/ingest.ts <profile|reconcile|filter-preview|load> <file> [--batch-size N] [--replace] [--sheet NAME]
 */
import 'dotenv/config';
import { loadSettings } from '../src/config.js';
import { describeFailure, parseArgs, runCommand, UsageError, type CliArgs } from '../src/ingest/cli.js';
import { resolveBackendConfig } from '../src/ingest/environment.js';
import { readIngestProfile } from '../src/ingest/ingest-profile.js';
import { getTargetSchema } from '../src/ingest/target-schema.js';
import { logger } from '../src/logger.js';

async function main() {
  let args: CliArgs;
  try {
    args = parseArgs(process.argv.slice(2));
  } catch (error) {
    if (error instanceof UsageError) {
      console.error(error.message);
      process.exit(2);
    }
    throw error;
  }

  const settings = loadSettings();
  logger.level = settings.logLevel;
  const report = await runCommand(args, {
    schema: getTargetSchema(settings.targetSchemaPath),
    profile: readIngestProfile(settings.profilePath),
    backend: resolveBackendConfig(process.env),
    batchSize: settings.batchSize,
  });
  console.log(JSON.stringify(report, null, 2));
}

main().catch((error: unknown) => {
  console.error(JSON.stringify(describeFailure(error), null, 2));
  process.exit(1);
});
