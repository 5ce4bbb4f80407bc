import { mkdtempSync } from "fs";
import { tmpdir } from "os";
import path from "path";
import { IRunObserver, RowFields } from "../src-ts/domain";
import { InMemoryDiagnosticsLog } from "../src-ts/diagnostics";
import { ConsolidatedTable, buildConsolidatedTable } from "../src-ts/table";
import { ValidationContext } from "../src-ts/validators";

type Level = "info" | "success" | "warn" | "error";

// Observer that keeps every message for assertions
export class RecordingObserver implements IRunObserver {
  readonly messages: Array<{ level: Level; message: string }> = [];
  info(message: string): void {
    this.messages.push({ level: "info", message });
  }
  success(message: string): void {
    this.messages.push({ level: "success", message });
  }
  warn(message: string): void {
    this.messages.push({ level: "warn", message });
  }
  error(message: string): void {
    this.messages.push({ level: "error", message });
  }
  at(level: Level): string[] {
    return this.messages.filter((m) => m.level === level).map((m) => m.message);
  }
}

// Single-file table; data row i sits on sheet row i + 2
export function makeTable(
  rows: RowFields[],
  sourceFile = "batch-a.xlsx"
): ConsolidatedTable {
  return buildConsolidatedTable([
    {
      sourceFile,
      rows: rows.map((fields, i) => ({ fields, sourceFile, originalRow: i + 2 })),
    },
  ]);
}

export function makeContext(table: ConsolidatedTable): ValidationContext & {
  log: InMemoryDiagnosticsLog;
  observer: RecordingObserver;
} {
  return {
    table,
    log: new InMemoryDiagnosticsLog(),
    observer: new RecordingObserver(),
  };
}

export function tempDir() {
  return mkdtempSync(path.join(tmpdir(), "serum-validate-test-"));
}
