import { CellValue, SourceBatch, TableRow } from "./domain";
import { EmptyInputError } from "./errors";
import { formatTimestamp } from "./dateNormaliser";

/**
 * All rows from every spreadsheet in one ordered collection. Rows are addressed by
 * the dense index assigned when the table is built; `sourceFile`/`originalRow`
 * are fixed for the lifetime of the table and are the only link back to the file.
 */
export class ConsolidatedTable {
  private readonly byIndex: TableRow[];

  constructor(rows: TableRow[], readonly columns: string[]) {
    this.byIndex = rows;
  }

  get size(): number {
    return this.byIndex.length;
  }

  rows(): readonly TableRow[] {
    return this.byIndex;
  }

  row(index: number): TableRow {
    const row = this.byIndex[index];
    if (!row) throw new RangeError(`No row at table index ${index}`);
    return row;
  }

  value(index: number, column: string): CellValue {
    return this.row(index).fields[column] ?? null;
  }

  setValue(index: number, column: string, value: CellValue): void {
    const row = this.row(index);
    if (!this.columns.includes(column)) this.columns.push(column);
    row.fields[column] = value;
  }
}

// Concatenate per-file batches (file order, then row order) and index densely.
export function buildConsolidatedTable(
  batches: SourceBatch[]
): ConsolidatedTable {
  const rows: TableRow[] = [];
  const columns: string[] = [];
  const seen = new Set<string>();
  for (const batch of batches) {
    for (const record of batch.rows) {
      for (const column of Object.keys(record.fields)) {
        if (seen.has(column)) continue;
        seen.add(column);
        columns.push(column);
      }
      rows.push({
        index: rows.length,
        fields: { ...record.fields },
        sourceFile: record.sourceFile,
        originalRow: record.originalRow,
      });
    }
  }
  if (!rows.length) throw new EmptyInputError();
  return new ConsolidatedTable(rows, columns);
}

export function isMissing(value: CellValue | undefined): value is null | undefined {
  return value === null || value === undefined;
}

// Text form used in issue messages; a missing cell renders as "null".
export function cellText(value: CellValue): string {
  if (value instanceof Date) return formatTimestamp(value);
  return String(value);
}
