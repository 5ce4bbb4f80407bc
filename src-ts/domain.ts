// Domain layer abstractions & models
export type CellValue = string | number | boolean | Date | null;

export type RowFields = Record<string, CellValue>;

export interface RowRecord {
  fields: RowFields;
  sourceFile: string;
  originalRow: number; // 1-based position in the source sheet, header included
}

export interface SourceBatch {
  sourceFile: string;
  rows: RowRecord[];
}

export interface TableRow extends RowRecord {
  readonly index: number; // dense table index, assigned once at build time
}

export interface DiagnosticEntry {
  sourceFile: string;
  tableIndex: number;
  originalRow: number;
  issues: string[];
}

export interface ValidatorStats {
  name: string;
  column: string;
  entries: number;
  runtimeErrors: number;
}

export interface RunSummary {
  files: number;
  rows: number;
  validators: ValidatorStats[];
  exportedTo: string;
}

export interface IRecordSource {
  loadBatches(): SourceBatch[];
}

export interface IDiagnosticsLog {
  readonly target: string;
  record(entry: DiagnosticEntry): void;
}

export interface ITableExporter {
  readonly target: string;
  write(columns: string[], rows: TableRow[]): void;
}

// Console narration sink; validators never print directly.
export interface IRunObserver {
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export const BARCODE_FIELD = "Barcode_ID";
export const PTID_FIELD = "Patient_Study_ID";
export const DATE_COLLECTED_FIELD = "Date_Collected";
export const AVAILABLE_FIELD = "Available";

export const SOURCE_FILE_COLUMN = "source_file";
export const ORIGINAL_ROW_COLUMN = "original_row";
