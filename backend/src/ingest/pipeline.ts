import { randomUUID } from 'node:crypto';
import { PartialLoadError } from '../errors.js';
import { logger } from '../logger.js';
import { toReconciledRow, type CleaningRules } from './cells.js';
import { describeBackend } from './environment.js';
import { qualifiedTable, type IngestProfile } from './ingest-profile.js';
import { loadRows, preflight } from './loader.js';
import { profileSheet } from './profiler.js';
import { reconcile } from './reconciler.js';
import { filterRows } from './row-filter.js';
import { readSpreadsheet, sourceName, type SpreadsheetSource } from './spreadsheet.js';
import { openIngestStore, type RowScope, type StoreOpener, type TableRef } from './store.js';
import { verifyLoad, type SampledField } from './verifier.js';
import type {
  BackendConfig,
  ColumnMapping,
  FilterReason,
  LoadMode,
  LoadReport,
  MappingStrategy,
  ReconciledRow,
  RejectedRow,
  SheetTable,
  SourceProfile,
  TargetSchema,
} from './types.js';

/** Everything a run needs, resolved once by the caller and passed down. */
export type IngestContext = {
  schema: TargetSchema;
  profile: IngestProfile;
  backend: BackendConfig;
  batchSize: number;
  mode?: LoadMode;
  sheetName?: string;
  openStore?: StoreOpener;
};

export type ColumnSummary = {
  position: number;
  header: string;
  nullDensity: number;
};

export type ProfileReport = {
  source: string;
  sheet: string;
  headerRow: number;
  columnCount: number;
  rowCount: number;
  columns: ColumnSummary[];
};

export type ReconcileReport = {
  source: string;
  sheet: string;
  columnCount: number;
  targetFields: number;
  matchedByName: number;
  matchedByPosition: number;
  absent: string[];
  anchors: Array<{ id: string; position: number; header: string }>;
  fields: Array<{
    field: string;
    column: string;
    strategy: MappingStrategy;
    position: number | null;
    header: string | null;
  }>;
  droppedColumns: Array<{ position: number; header: string }>;
};

export type FilterPreviewReport = {
  source: string;
  sheet: string;
  rowsRead: number;
  rowsEligible: number;
  rowsFilteredOut: number;
  rowsRejected: number;
  reasons: Partial<Record<FilterReason, number>>;
  rejectedRows: RejectedRow[];
};

type RowAudit = {
  rowsRead: number;
  rowsFilteredOut: number;
  rowsRejected: number;
  reasons: Partial<Record<FilterReason, number>>;
  rejectedRows: RejectedRow[];
};

function cleaningRules(profile: IngestProfile): CleaningRules {
  return { nullTokens: profile.nullTokens, maxTextLength: profile.maxTextLength };
}

function tableRef(profile: IngestProfile): TableRef {
  return { schemaName: profile.schemaName, table: profile.table };
}

/**
 * Filter then clean, lazily. Filtered and rejected rows are recorded on the
 * audit as they stream past; only loadable rows come out.
 */
function* eligibleRows(
  table: SheetTable,
  mapping: ColumnMapping,
  ctx: IngestContext,
  audit: RowAudit
): Generator<ReconciledRow, void, undefined> {
  const rules = cleaningRules(ctx.profile);
  for (const outcome of filterRows(table.rows, mapping, ctx.profile.predicates)) {
    audit.rowsRead += 1;
    if (!outcome.eligible) {
      const reason = outcome.reason ?? 'value-mismatch';
      audit.rowsFilteredOut += 1;
      audit.reasons[reason] = (audit.reasons[reason] ?? 0) + 1;
      audit.rejectedRows.push({ row: outcome.row.line, reason, detail: outcome.anchor });
      continue;
    }
    const converted = toReconciledRow(outcome.row, mapping, ctx.schema, rules);
    if (!converted.ok) {
      audit.rowsRejected += 1;
      audit.rejectedRows.push(converted.rejection);
      continue;
    }
    yield converted.row;
  }
}

function emptyAudit(): RowAudit {
  return { rowsRead: 0, rowsFilteredOut: 0, rowsRejected: 0, reasons: {}, rejectedRows: [] };
}

export function readSource(source: SpreadsheetSource, ctx: IngestContext): Promise<SheetTable> {
  return readSpreadsheet(source, {
    headerRow: ctx.profile.headerRow,
    sheetName: ctx.sheetName ?? ctx.profile.sheetName,
  });
}

export function profileTable(table: SheetTable, source: string): ProfileReport {
  const profile = profileSheet(table);
  return {
    source,
    sheet: table.sheetName,
    headerRow: table.headerRow + 1,
    columnCount: profile.columnCount,
    rowCount: profile.rowCount,
    columns: profile.header.map((header, index) => ({
      position: index + 1,
      header,
      nullDensity: profile.nullDensity[index] ?? 0,
    })),
  };
}

function mapTable(table: SheetTable, ctx: IngestContext): { profile: SourceProfile; mapping: ColumnMapping } {
  const profile = profileSheet(table);
  const mapping = reconcile(profile, ctx.schema, ctx.profile.anchors);
  return { profile, mapping };
}

export function reconcileTable(table: SheetTable, source: string, ctx: IngestContext): ReconcileReport {
  const { profile, mapping } = mapTable(table, ctx);
  const headerAt = (index: number | null) => (index === null ? null : profile.header[index] ?? '');
  return {
    source,
    sheet: table.sheetName,
    columnCount: profile.columnCount,
    targetFields: ctx.schema.fields.length,
    matchedByName: mapping.fields.filter((field) => field.strategy === 'name').length,
    matchedByPosition: mapping.fields.filter((field) => field.strategy === 'position').length,
    absent: mapping.fields.filter((field) => field.strategy === 'absent').map((field) => field.field),
    anchors: Object.entries(mapping.anchors).map(([id, index]) => ({
      id,
      position: index + 1,
      header: profile.header[index] ?? '',
    })),
    fields: mapping.fields.map((field) => ({
      field: field.field,
      column: field.column,
      strategy: field.strategy,
      position: field.sourceIndex === null ? null : field.sourceIndex + 1,
      header: headerAt(field.sourceIndex),
    })),
    droppedColumns: mapping.droppedColumns.map((dropped) => ({ position: dropped.index + 1, header: dropped.header })),
  };
}

/** Runs the filter and cell cleaning without touching the backend. */
export function previewTable(table: SheetTable, source: string, ctx: IngestContext): FilterPreviewReport {
  const { mapping } = mapTable(table, ctx);
  const audit = emptyAudit();
  let rowsEligible = 0;
  for (const _row of eligibleRows(table, mapping, ctx, audit)) {
    rowsEligible += 1;
  }
  return {
    source,
    sheet: table.sheetName,
    rowsRead: audit.rowsRead,
    rowsEligible,
    rowsFilteredOut: audit.rowsFilteredOut,
    rowsRejected: audit.rowsRejected,
    reasons: audit.reasons,
    rejectedRows: audit.rejectedRows,
  };
}

/**
 * Full run: reconcile, filter, load in batches, verify. Structural problems
 * stop the run before the backend is opened; the store is always closed.
 */
export async function loadTable(table: SheetTable, source: string, ctx: IngestContext): Promise<LoadReport> {
  const runId = randomUUID();
  const mode = ctx.mode ?? ctx.profile.mode;
  const target = tableRef(ctx.profile);
  const runLog = logger.child({ runId, source, table: qualifiedTable(ctx.profile) });

  const { mapping } = mapTable(table, ctx);
  runLog.info(
    { backend: ctx.backend.kind, target: describeBackend(ctx.backend), mode, batchSize: ctx.batchSize },
    'load started'
  );

  const open = ctx.openStore ?? openIngestStore;
  const store = await open(ctx.backend);
  try {
    const { columns, isolated } = await preflight(store, ctx.schema, target, ctx.profile.isolationColumn);
    const warnings: string[] = [];
    if (ctx.profile.isolationColumn && !isolated) {
      warnings.push(
        `isolation column ${ctx.profile.isolationColumn} not found on ${qualifiedTable(ctx.profile)}; verification compares table totals`
      );
    }
    const scope: RowScope | undefined =
      isolated && ctx.profile.isolationColumn ? { column: ctx.profile.isolationColumn, value: runId } : undefined;

    let rowsCleared = 0;
    if (mode === 'replace') {
      rowsCleared = await store.clearTable(target);
      runLog.info({ rowsCleared }, 'table cleared');
    }
    const baseline = scope ? undefined : await store.countRows(target);

    const sampled = ctx.profile.sampleFields.flatMap((name) => {
      const fieldIndex = ctx.schema.fields.findIndex((field) => field.name === name);
      const field = ctx.schema.fields[fieldIndex];
      if (!field) {
        warnings.push(`sample field ${name} is not part of the target schema`);
        return [];
      }
      return [{ fieldIndex, sample: { field: field.name, column: field.column, expected: 0 } }];
    });

    const audit = emptyAudit();
    let rowsLoaded = 0;
    let batchesCommitted = 0;
    let failure: PartialLoadError | null = null;

    try {
      const tally = await loadRows(store, eligibleRows(table, mapping, ctx, audit), {
        table: target,
        columns,
        batchSize: ctx.batchSize,
        runTag: scope?.value,
        onBatchCommitted: (batch) => {
          for (const row of batch) {
            for (const entry of sampled) {
              if (row.values[entry.fieldIndex] !== null) entry.sample.expected += 1;
            }
          }
        },
      });
      rowsLoaded = tally.rowsLoaded;
      batchesCommitted = tally.batchesCommitted;
    } catch (error) {
      if (!(error instanceof PartialLoadError)) throw error;
      failure = error;
      rowsLoaded = error.rowsLoaded;
      batchesCommitted = error.batchesCommitted;
      warnings.push(
        `filtered and rejected counts cover only the sheet rows read before batch ${error.batchIndex} failed`
      );
    }

    const verification = await verifyLoad(store, {
      table: target,
      rowsLoaded,
      scope,
      baseline,
      sampledFields: sampled.map((entry): SampledField => entry.sample),
    });
    if (!scope && sampled.length) {
      warnings.push('sample field checks skipped without run isolation');
    }
    warnings.push(...verification.discrepancies);

    const report: LoadReport = {
      runId,
      table: qualifiedTable(ctx.profile),
      backend: ctx.backend.kind,
      mode,
      rowsRead: table.rows.length,
      rowsFilteredOut: audit.rowsFilteredOut,
      rowsRejected: audit.rowsRejected,
      rowsLoaded,
      rowsCleared,
      batchSize: ctx.batchSize,
      batchesCommitted,
      rejectedRows: audit.rejectedRows,
      verification,
      warnings,
      status: failure ? 'partial' : 'completed',
    };

    if (failure) {
      failure.report = report;
      throw failure;
    }
    runLog.info(
      {
        rowsRead: report.rowsRead,
        rowsFilteredOut: report.rowsFilteredOut,
        rowsRejected: report.rowsRejected,
        rowsLoaded: report.rowsLoaded,
        batchesCommitted,
        warnings: warnings.length,
      },
      'load finished'
    );
    return report;
  } finally {
    await store.close();
  }
}

export async function profile(source: SpreadsheetSource, ctx: IngestContext): Promise<ProfileReport> {
  return profileTable(await readSource(source, ctx), sourceName(source));
}

export async function reconcileSource(source: SpreadsheetSource, ctx: IngestContext): Promise<ReconcileReport> {
  return reconcileTable(await readSource(source, ctx), sourceName(source), ctx);
}

export async function filterPreview(source: SpreadsheetSource, ctx: IngestContext): Promise<FilterPreviewReport> {
  return previewTable(await readSource(source, ctx), sourceName(source), ctx);
}

export async function load(source: SpreadsheetSource, ctx: IngestContext): Promise<LoadReport> {
  return loadTable(await readSource(source, ctx), sourceName(source), ctx);
}
