export type CellValue = string | number | boolean | Date | null;

export type SourceRow = {
  /** 1-based row number in the sheet, header rows included. */
  line: number;
  cells: CellValue[];
};

export type SheetTable = {
  sheetName: string;
  headerRow: number;
  header: string[];
  rows: SourceRow[];
};

export type SourceProfile = {
  columnCount: number;
  /** Header names after duplicate disambiguation; blank cells stay ''. */
  header: string[];
  columnPositions: Record<string, number>;
  nullDensity: number[];
  rowCount: number;
};

export type SemanticType = 'text' | 'integer' | 'decimal' | 'percent';

export type FieldSpec = {
  name: string;
  column: string;
  semanticType: SemanticType;
  nullable: boolean;
  aliases: string[];
};

export type TargetSchema = {
  fields: readonly FieldSpec[];
};

export type AnchorColumn = {
  id: string;
  aliases: string[];
  required: boolean;
};

export type FilterPredicate =
  | { kind: 'equals'; anchor: string; value: string | number }
  | { kind: 'not-null'; anchor: string }
  | { kind: 'in-set'; anchor: string; values: Array<string | number> };

export type MappingStrategy = 'name' | 'position' | 'absent';

export type FieldMapping = {
  fieldIndex: number;
  field: string;
  column: string;
  sourceIndex: number | null;
  strategy: MappingStrategy;
};

export type ColumnMapping = {
  fields: FieldMapping[];
  anchors: Record<string, number>;
  droppedColumns: Array<{ index: number; header: string }>;
};

export type FilterReason = 'missing-anchor-value' | 'value-mismatch' | 'value-not-in-set';

export type FilterOutcome = {
  row: SourceRow;
  eligible: boolean;
  reason?: FilterReason;
  anchor?: string;
};

export type LoadValue = string | number | null;

export type ReconciledRow = {
  line: number;
  values: LoadValue[];
};

export type RejectedRow = {
  row: number;
  reason: string;
  detail?: string;
};

export type BackendKind = 'managed-cloud' | 'explicit-env' | 'local-default';

/** `false` is plain TCP; the `verify-*` modes check the server certificate. */
export type SslMode = 'require' | 'no-verify' | 'verify-ca' | 'verify-full';

export type ConnectionParams = {
  host: string;
  port: number;
  user: string;
  password?: string;
  database: string;
  ssl: SslMode | false;
};

export type BackendConfig = {
  readonly kind: BackendKind;
  readonly connection: Readonly<ConnectionParams>;
};

export type LoadMode = 'append' | 'replace';

export type Verification = {
  scope: 'run' | 'table';
  expectedRows: number;
  observedRows: number | null;
  sampledFields: Array<{ field: string; expected: number; observed: number | null }>;
  discrepancies: string[];
};

export type LoadReport = {
  runId: string;
  table: string;
  backend: BackendKind;
  mode: LoadMode;
  rowsRead: number;
  rowsFilteredOut: number;
  rowsRejected: number;
  rowsLoaded: number;
  rowsCleared: number;
  batchSize: number;
  batchesCommitted: number;
  rejectedRows: RejectedRow[];
  verification: Verification;
  warnings: string[];
  status: 'completed' | 'partial';
};
