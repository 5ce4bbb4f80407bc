import {
  AVAILABLE_FIELD,
  BARCODE_FIELD,
  CellValue,
  DATE_COLLECTED_FIELD,
  IDiagnosticsLog,
  IRunObserver,
  PTID_FIELD,
  TableRow,
  ValidatorStats,
} from "./domain";
import { ValidationRuntimeError } from "./errors";
import { ConsolidatedTable, cellText, isMissing } from "./table";
import {
  IDateNormalizer,
  createDefaultDateNormalizer,
  formatTimestamp,
} from "./dateNormaliser";

export interface ValidationContext {
  table: ConsolidatedTable;
  log: IDiagnosticsLog;
  observer: IRunObserver;
}

export interface IColumnValidator {
  readonly column: string;
  validate(ctx: ValidationContext): ValidatorStats;
}

type RowCheck = (row: TableRow, value: CellValue) => string[];

/**
 * Base for single-column validators. A check that throws is reported as a
 * ValidationRuntimeError and that row is skipped for this column only; every row
 * with at least one issue gets exactly one diagnostic entry.
 */
export abstract class ColumnValidator implements IColumnValidator {
  abstract readonly column: string;

  validate(ctx: ValidationContext): ValidatorStats {
    const stats: ValidatorStats = {
      name: this.constructor.name,
      column: this.column,
      entries: 0,
      runtimeErrors: 0,
    };
    this.run(ctx, stats);
    ctx.observer.success(
      `Successfully validated '${this.column}', ${ctx.log.target} has been updated`
    );
    return stats;
  }

  protected abstract run(ctx: ValidationContext, stats: ValidatorStats): void;

  protected eachRow(
    ctx: ValidationContext,
    stats: ValidatorStats,
    check: RowCheck
  ): void {
    for (const row of ctx.table.rows()) {
      const value = row.fields[this.column] ?? null;
      let issues: string[];
      try {
        issues = check(row, value);
      } catch (e) {
        stats.runtimeErrors++;
        ctx.observer.warn(
          new ValidationRuntimeError(this.column, row.index, value, e).message
        );
        continue;
      }
      if (issues.length) this.report(ctx, stats, row, issues);
    }
  }

  protected report(
    ctx: ValidationContext,
    stats: ValidatorStats,
    row: TableRow,
    issues: string[]
  ): void {
    ctx.log.record({
      sourceFile: row.sourceFile,
      tableIndex: row.index,
      originalRow: row.originalRow,
      issues,
    });
    stats.entries++;
  }
}

export class BarcodeValidator extends ColumnValidator {
  readonly column = BARCODE_FIELD;

  protected run(ctx: ValidationContext, stats: ValidatorStats): void {
    this.eachRow(ctx, stats, (_row, value) => {
      const text = cellText(value);
      // Length is checked on the text form before the missing check, so a
      // missing barcode surfaces as a length issue ('null' is 4 characters).
      if (text.length !== 8) {
        return [`Barcode_ID '${text}' length is not equal to 8`];
      }
      if (isMissing(value)) return ["Barcode_ID is NA"];
      return [];
    });

    for (const [barcode, indices] of this.duplicateGroups(ctx.table)) {
      const issue = `Duplicate Barcode_ID: '${barcode}' found in rows: [${indices.join(", ")}]`;
      for (const index of indices) {
        this.report(ctx, stats, ctx.table.row(index), [issue]);
      }
    }
  }

  // Groups of table indices sharing a barcode (same type and text), ordered by barcode value.
  private duplicateGroups(table: ConsolidatedTable): Array<[string, number[]]> {
    const groups = new Map<string, { text: string; indices: number[] }>();
    for (const row of table.rows()) {
      const value = row.fields[this.column] ?? null;
      if (isMissing(value)) continue;
      const text = cellText(value);
      const key = `${typeof value}:${text}`;
      const group = groups.get(key);
      if (group) group.indices.push(row.index);
      else groups.set(key, { text, indices: [row.index] });
    }
    return [...groups.values()]
      .filter((g) => g.indices.length > 1)
      .sort((a, b) => (a.text < b.text ? -1 : a.text > b.text ? 1 : 0))
      .map((g): [string, number[]] => [g.text, g.indices]);
  }
}

const PTID_MARKERS = ["C", "H", "IN"];

export class PatientIdValidator extends ColumnValidator {
  readonly column = PTID_FIELD;

  protected run(ctx: ValidationContext, stats: ValidatorStats): void {
    this.eachRow(ctx, stats, (_row, value) => {
      if (isMissing(value)) return ["PTID is NA"];
      const text = cellText(value);
      if (!PTID_MARKERS.some((marker) => text.includes(marker))) {
        return [`PTID '${text}' is not correctly formatted`];
      }
      return [];
    });
  }
}

export class CollectionDateValidator extends ColumnValidator {
  readonly column = DATE_COLLECTED_FIELD;

  constructor(private readonly normalizer: IDateNormalizer) {
    super();
  }

  protected run(ctx: ValidationContext, stats: ValidatorStats): void {
    // Normalise the whole column first, valid or not.
    for (const row of ctx.table.rows()) {
      const raw = row.fields[this.column] ?? null;
      ctx.table.setValue(row.index, this.column, this.normalizer.normalise(raw));
    }
    this.eachRow(ctx, stats, (_row, value) => {
      if (!(value instanceof Date)) return ["Date_Collected is NA"];
      if (!this.normalizer.inWindow(value)) {
        return [
          `Date_Collected is outside of range, date: ${formatTimestamp(value)}`,
        ];
      }
      return [];
    });
  }
}

export class AvailabilityValidator extends ColumnValidator {
  readonly column = AVAILABLE_FIELD;

  protected run(ctx: ValidationContext, stats: ValidatorStats): void {
    this.eachRow(ctx, stats, (row, value) => {
      if (typeof value === "boolean") return []; // normalised on an earlier run
      if (isMissing(value) || value === "Y") {
        ctx.table.setValue(row.index, this.column, true);
        return [];
      }
      if (value === "N") {
        ctx.table.setValue(row.index, this.column, false);
        return [];
      }
      ctx.table.setValue(row.index, this.column, true); // fail open
      return [
        `Availability is unknown at index: ${row.index}, check to confirm availability`,
      ];
    });
  }
}

// Fixed order: identifier, patient ID, collection date, availability.
export function createDefaultValidators(
  dateNormalizer: IDateNormalizer = createDefaultDateNormalizer()
): IColumnValidator[] {
  return [
    new BarcodeValidator(),
    new PatientIdValidator(),
    new CollectionDateValidator(dateNormalizer),
    new AvailabilityValidator(),
  ];
}
