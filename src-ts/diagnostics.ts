import { DiagnosticEntry, IDiagnosticsLog } from "./domain";

// One block per invalid row; the trailing blank line separates blocks.
export function formatDiagnosticEntry(entry: DiagnosticEntry): string {
  const header = `File: '${entry.sourceFile}', MasterIndex: ${entry.tableIndex}, SourceRowIndex: ${entry.originalRow}\n`;
  const body = entry.issues.map((issue) => ` - ${issue}\n`).join("");
  return header + body + "\n";
}

// Keeps entries in memory in the order they were recorded
export class InMemoryDiagnosticsLog implements IDiagnosticsLog {
  readonly target = "in-memory log";
  private readonly entries: DiagnosticEntry[] = [];

  record(entry: DiagnosticEntry): void {
    this.entries.push({ ...entry, issues: [...entry.issues] });
  }

  all(): readonly DiagnosticEntry[] {
    return this.entries;
  }

  issues(): string[] {
    return this.entries.flatMap((e) => e.issues);
  }
}
