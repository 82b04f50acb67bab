export class HttpError extends Error {
  readonly statusCode: number;
  readonly details?: unknown;

  constructor(statusCode: number, message: string, details?: unknown) {
    super(message);
    this.statusCode = statusCode;
    this.details = details;
  }
}

export function badRequest(message: string, details?: unknown): HttpError {
  return new HttpError(400, message, details);
}

export type IngestErrorCode =
  | 'malformed_source'
  | 'anchor_not_found'
  | 'schema_too_narrow'
  | 'schema_drift'
  | 'backend_unresolved'
  | 'connection_failed'
  | 'schema_mismatch'
  | 'partial_load';

/**
 * Run-level failure of the ingestion pipeline. Every subclass is terminal for
 * the current run; nothing in the pipeline retries.
 */
export abstract class IngestError extends Error {
  abstract readonly code: IngestErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.details = details;
  }
}

export class MalformedSourceError extends IngestError {
  readonly code = 'malformed_source';
}

export class AnchorNotFoundError extends IngestError {
  readonly code = 'anchor_not_found';
  readonly anchor: string;

  constructor(anchor: string, aliases: readonly string[]) {
    super(`required anchor column "${anchor}" not found (aliases: ${aliases.join(', ')})`, {
      anchor,
      aliases: [...aliases],
    });
    this.anchor = anchor;
  }
}

export class SchemaTooNarrowError extends IngestError {
  readonly code = 'schema_too_narrow';
}

/** A name-matched column sits away from its canonical position while other fields rely on position. */
export class SchemaDriftError extends IngestError {
  readonly code = 'schema_drift';
}

export class BackendUnresolvedError extends IngestError {
  readonly code = 'backend_unresolved';
}

export class ConnectionError extends IngestError {
  readonly code = 'connection_failed';

  constructor(target: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`could not connect to ${target}: ${reason}`, { target, reason });
    this.cause = cause;
  }
}

export class SchemaMismatchError extends IngestError {
  readonly code = 'schema_mismatch';
  readonly missingColumns: string[];

  constructor(table: string, missingColumns: string[]) {
    super(`table ${table} is missing required columns: ${missingColumns.join(', ')}`, {
      table,
      missingColumns,
      rowsLoaded: 0,
    });
    this.missingColumns = missingColumns;
  }
}

type PartialLoadLocation = {
  batchIndex: number;
  firstRow: number;
  lastRow: number;
  batchesCommitted: number;
  rowsLoaded: number;
};

export class PartialLoadError extends IngestError {
  readonly code = 'partial_load';
  readonly batchIndex: number;
  readonly batchesCommitted: number;
  readonly rowsLoaded: number;
  /** Filled in by the pipeline once the verifier has run. */
  report?: unknown;

  constructor(location: PartialLoadLocation, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(
      `batch ${location.batchIndex} (sheet rows ${location.firstRow}-${location.lastRow}) failed: ${reason}`,
      { ...location, reason }
    );
    this.batchIndex = location.batchIndex;
    this.batchesCommitted = location.batchesCommitted;
    this.rowsLoaded = location.rowsLoaded;
    this.cause = cause;
  }
}
