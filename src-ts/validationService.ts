import {
  IDiagnosticsLog,
  IRecordSource,
  IRunObserver,
  ITableExporter,
  ORIGINAL_ROW_COLUMN,
  RunSummary,
  SOURCE_FILE_COLUMN,
} from "./domain";
import { ConsolidatedTable, buildConsolidatedTable } from "./table";
import { IColumnValidator } from "./validators";

export class ValidationService {
  constructor(
    private source: IRecordSource,
    private validators: IColumnValidator[],
    private log: IDiagnosticsLog,
    private exporter: ITableExporter,
    private observer: IRunObserver
  ) {}

  run(): RunSummary {
    const batches = this.source.loadBatches();
    const table = buildConsolidatedTable(batches);
    this.observer.info(
      `Consolidated ${table.size} rows from ${batches.length} file(s)`
    );
    const ctx = { table, log: this.log, observer: this.observer };
    // Validators run in order; each sees the table as left by the previous one.
    const validators = this.validators.map((v) => v.validate(ctx));
    this.exporter.write(exportColumns(table), [...table.rows()]);
    this.observer.success(`Wrote ${table.size} rows to ${this.exporter.target}`);
    return {
      files: batches.length,
      rows: table.size,
      validators,
      exportedTo: this.exporter.target,
    };
  }
}

// Data columns in first-seen order, then the provenance columns.
export function exportColumns(table: ConsolidatedTable): string[] {
  const provenance = [SOURCE_FILE_COLUMN, ORIGINAL_ROW_COLUMN];
  return [...table.columns.filter((c) => !provenance.includes(c)), ...provenance];
}
