import {
  appendFileSync,
  mkdirSync,
  readFileSync,
  readdirSync,
  statSync,
  writeFileSync,
} from "fs";
import path from "path";
import AdmZip from "adm-zip";
import Papa from "papaparse";
import pc from "picocolors";
import * as XLSX from "xlsx";
import {
  CellValue,
  DiagnosticEntry,
  IDiagnosticsLog,
  IRecordSource,
  IRunObserver,
  ITableExporter,
  ORIGINAL_ROW_COLUMN,
  RowFields,
  SOURCE_FILE_COLUMN,
  SourceBatch,
  TableRow,
} from "./domain";
import { formatDiagnosticEntry } from "./diagnostics";
import { formatCalendarDate } from "./dateNormaliser";
import {
  DiscoveryError,
  ExportWriteError,
  ExtractionError,
  LogWriteError,
  SpreadsheetReadError,
  getErrorMessage,
} from "./errors";

export const EXTRACTED_FOLDER = "extracted_excel_files";

// Archives in the folder, most recently modified first
export function listArchives(directory: string): string[] {
  return readdirSync(directory)
    .filter((f) => f.toLowerCase().endsWith(".zip"))
    .map((f) => path.join(directory, f))
    .filter((p) => statSync(p).isFile())
    .map((file) => ({ file, mtime: statSync(file).mtimeMs }))
    .sort((a, b) => b.mtime - a.mtime)
    .map((c) => c.file);
}

export function findLatestArchive(directory: string): string {
  let archives: string[];
  try {
    archives = listArchives(directory);
  } catch (e) {
    throw new DiscoveryError(
      `Could not list archives in ${directory}: ${getErrorMessage(e)}`,
      e
    );
  }
  if (!archives.length) {
    throw new DiscoveryError(`No .zip archive found in ${directory}`);
  }
  return archives[0];
}

interface ArchiveSourceOptions {
  directory: string;
  archive?: string; // skip discovery when set
}

// Reads every .xlsx inside the selected archive; each row is tagged with its file and sheet row.
export class ArchiveRecordSource implements IRecordSource {
  constructor(
    private options: ArchiveSourceOptions,
    private observer: IRunObserver
  ) {}

  loadBatches(): SourceBatch[] {
    const archive = this.options.archive ?? findLatestArchive(this.options.directory);
    const target = path.join(this.options.directory, EXTRACTED_FOLDER);
    this.observer.info(`Extracting ${archive} into ${target}`);
    const files = extractSpreadsheets(archive, target);
    this.observer.success(`Successfully extracted ${archive}`);

    const batches: SourceBatch[] = [];
    for (const file of files) {
      this.observer.info(`Extracting from ${path.basename(file)}`);
      try {
        const batch = readSpreadsheet(file);
        batches.push(batch);
        this.observer.success(
          `Successfully read ${batch.sourceFile}, rows: ${batch.rows.length}`
        );
      } catch (e) {
        // One unreadable file does not stop the batch
        const err = e instanceof SpreadsheetReadError ? e : new SpreadsheetReadError(file, e);
        this.observer.warn(err.message);
      }
    }
    return batches;
  }
}

// Extracts the archive and returns the paths of the spreadsheets it contained, sorted by entry name.
export function extractSpreadsheets(archive: string, target: string): string[] {
  try {
    const zip = new AdmZip(archive);
    mkdirSync(target, { recursive: true });
    zip.extractAllTo(target, true);
    return zip
      .getEntries()
      .filter((entry) => !entry.isDirectory)
      .map((entry) => entry.entryName)
      .filter((name) => /\.xlsx$/i.test(name) && !name.startsWith("__MACOSX/"))
      .sort()
      .map((name) => path.join(target, name));
  } catch (e) {
    throw new ExtractionError(
      `Could not extract ${archive}: ${getErrorMessage(e)}`,
      e
    );
  }
}

const ZIP_SIGNATURE = Buffer.from([0x50, 0x4b, 0x03, 0x04]); // "PK\x03\x04"

// First sheet only; the header is sheet row 1, so data row i sits on sheet row i + 2.
export function readSpreadsheet(file: string): SourceBatch {
  const sourceFile = path.basename(file);
  let raw: Array<Record<string, unknown>>;
  try {
    const content = readFileSync(file);
    // SheetJS falls back to CSV/text for anything else; an .xlsx is always a zip container
    if (!content.subarray(0, 4).equals(ZIP_SIGNATURE)) {
      throw new Error("not an .xlsx workbook");
    }
    const wb = XLSX.read(content, { type: "buffer", cellDates: false, cellNF: true });
    if (!wb.SheetNames.length) return { sourceFile, rows: [] };
    const sheet = wb.Sheets[wb.SheetNames[0]];
    localiseDateCells(sheet);
    raw = XLSX.utils.sheet_to_json<Record<string, unknown>>(sheet, {
      defval: null,
    });
  } catch (e) {
    throw new SpreadsheetReadError(file, e);
  }
  return {
    sourceFile,
    rows: raw.map((record, i) => ({
      fields: toRowFields(record),
      sourceFile,
      originalRow: i + 2,
    })),
  };
}

// Date-formatted serials become local wall-clock dates, independent of the host time zone.
function localiseDateCells(sheet: XLSX.WorkSheet): void {
  for (const address of Object.keys(sheet)) {
    if (address.startsWith("!")) continue;
    const cell: XLSX.CellObject = sheet[address];
    if (cell.t !== "n" || typeof cell.v !== "number" || cell.z === undefined) continue;
    if (!XLSX.SSF.is_date(cell.z)) continue;
    const code = XLSX.SSF.parse_date_code(cell.v);
    sheet[address] = {
      t: "d",
      v: new Date(code.y, code.m - 1, code.d, code.H, code.M, code.S),
    };
  }
}

function toRowFields(record: Record<string, unknown>): RowFields {
  const fields: RowFields = {};
  for (const [key, value] of Object.entries(record)) {
    fields[key] = toCellValue(value);
  }
  return fields;
}

export function toCellValue(value: unknown): CellValue {
  if (
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean" ||
    value instanceof Date
  ) {
    return value;
  }
  return null;
}

// Appends each entry as soon as it is recorded; the file is created if absent.
export class FileDiagnosticsLog implements IDiagnosticsLog {
  constructor(readonly target: string) {}

  record(entry: DiagnosticEntry): void {
    try {
      appendFileSync(this.target, formatDiagnosticEntry(entry));
    } catch (e) {
      throw new LogWriteError(
        `Could not write to ${this.target}: ${getErrorMessage(e)}`,
        e
      );
    }
  }
}

// Flat CSV, one line per table row; no index column.
export class CsvTableExporter implements ITableExporter {
  constructor(readonly target: string) {}

  write(columns: string[], rows: TableRow[]): void {
    const data = rows.map((row) =>
      columns.map((column) => {
        if (column === SOURCE_FILE_COLUMN) return row.sourceFile;
        if (column === ORIGINAL_ROW_COLUMN) return row.originalRow;
        return csvCell(row.fields[column] ?? null);
      })
    );
    const csv = Papa.unparse({ fields: columns, data }, { newline: "\n" });
    try {
      mkdirSync(path.dirname(this.target), { recursive: true });
      writeFileSync(this.target, csv + "\n");
    } catch (e) {
      throw new ExportWriteError(
        `Could not write ${this.target}: ${getErrorMessage(e)}`,
        e
      );
    }
  }
}

function csvCell(value: CellValue): string | number | boolean | null {
  if (value instanceof Date) return formatCalendarDate(value);
  return value;
}

export class ConsoleRunObserver implements IRunObserver {
  info(message: string): void {
    console.log(pc.dim(message));
  }
  success(message: string): void {
    console.log(pc.green(message));
  }
  warn(message: string): void {
    console.warn(pc.yellow(message));
  }
  error(message: string): void {
    console.error(pc.red(message));
  }
}
