import { ValidatorStats } from "../src-ts/domain";
import { CollectionDateNormalizer } from "../src-ts/dateNormaliser";
import {
  AvailabilityValidator,
  BarcodeValidator,
  CollectionDateValidator,
  ColumnValidator,
  PatientIdValidator,
  ValidationContext,
  createDefaultValidators,
} from "../src-ts/validators";
import { makeContext, makeTable } from "./helpers";

const fixedClock = () => new Date(2024, 5, 15, 9, 0);

describe("BarcodeValidator", () => {
  it("reports wrong lengths and every member of a duplicate group", () => {
    const ctx = makeContext(
      makeTable([
        { Barcode_ID: "AB12345" },
        { Barcode_ID: "AB123456" },
        { Barcode_ID: "AB123456" },
      ])
    );
    const stats = new BarcodeValidator().validate(ctx);

    expect(ctx.log.all()).toEqual([
      {
        sourceFile: "batch-a.xlsx",
        tableIndex: 0,
        originalRow: 2,
        issues: ["Barcode_ID 'AB12345' length is not equal to 8"],
      },
      {
        sourceFile: "batch-a.xlsx",
        tableIndex: 1,
        originalRow: 3,
        issues: ["Duplicate Barcode_ID: 'AB123456' found in rows: [1, 2]"],
      },
      {
        sourceFile: "batch-a.xlsx",
        tableIndex: 2,
        originalRow: 4,
        issues: ["Duplicate Barcode_ID: 'AB123456' found in rows: [1, 2]"],
      },
    ]);
    expect(stats).toEqual({
      name: "BarcodeValidator",
      column: "Barcode_ID",
      entries: 3,
      runtimeErrors: 0,
    });
  });

  it("checks length before missing, so a missing barcode is a length issue", () => {
    const ctx = makeContext(makeTable([{ Barcode_ID: null }, {}]));
    new BarcodeValidator().validate(ctx);
    expect(ctx.log.issues()).toEqual([
      "Barcode_ID 'null' length is not equal to 8",
      "Barcode_ID 'null' length is not equal to 8",
    ]);
  });

  it("accepts numeric barcodes of eight digits", () => {
    const ctx = makeContext(makeTable([{ Barcode_ID: 12345678 }]));
    new BarcodeValidator().validate(ctx);
    expect(ctx.log.all()).toHaveLength(0);
  });

  it("orders duplicate groups by barcode value", () => {
    const ctx = makeContext(
      makeTable([
        { Barcode_ID: "ZZ000001" },
        { Barcode_ID: "AA000001" },
        { Barcode_ID: "ZZ000001" },
        { Barcode_ID: "AA000001" },
      ])
    );
    new BarcodeValidator().validate(ctx);
    expect(ctx.log.all().map((e) => e.tableIndex)).toEqual([1, 3, 0, 2]);
    expect(ctx.log.issues()[0]).toBe(
      "Duplicate Barcode_ID: 'AA000001' found in rows: [1, 3]"
    );
  });

  it("does not group a numeric barcode with the same text", () => {
    const ctx = makeContext(
      makeTable([{ Barcode_ID: 12345678 }, { Barcode_ID: "12345678" }])
    );
    new BarcodeValidator().validate(ctx);
    expect(ctx.log.all()).toHaveLength(0);
  });

  it("does not treat missing barcodes as duplicates of each other", () => {
    const ctx = makeContext(makeTable([{ Barcode_ID: null }, { Barcode_ID: null }]));
    const stats = new BarcodeValidator().validate(ctx);
    expect(stats.entries).toBe(2);
    expect(ctx.log.issues().some((i) => i.startsWith("Duplicate"))).toBe(false);
  });

  it("leaves the table untouched", () => {
    const table = makeTable([{ Barcode_ID: "AB12345" }]);
    new BarcodeValidator().validate(makeContext(table));
    expect(table.value(0, "Barcode_ID")).toBe("AB12345");
  });
});

describe("PatientIdValidator", () => {
  it("accepts ids containing C, H or IN", () => {
    const ctx = makeContext(
      makeTable([
        { Patient_Study_ID: "HAARVI-C001" },
        { Patient_Study_ID: "H17" },
        { Patient_Study_ID: "IN-204" },
      ])
    );
    new PatientIdValidator().validate(ctx);
    expect(ctx.log.all()).toHaveLength(0);
  });

  it("reports missing and badly formatted ids", () => {
    const ctx = makeContext(
      makeTable([
        { Patient_Study_ID: null },
        { Patient_Study_ID: "P-0042" },
        { Patient_Study_ID: "c-12" },
        { Patient_Study_ID: 1234 },
      ])
    );
    new PatientIdValidator().validate(ctx);
    expect(ctx.log.all().map((e) => [e.tableIndex, e.issues])).toEqual([
      [0, ["PTID is NA"]],
      [1, ["PTID 'P-0042' is not correctly formatted"]],
      [2, ["PTID 'c-12' is not correctly formatted"]],
      [3, ["PTID '1234' is not correctly formatted"]],
    ]);
  });
});

describe("CollectionDateValidator", () => {
  const validator = () =>
    new CollectionDateValidator(new CollectionDateNormalizer(fixedClock));

  it("flags the day before the window and keeps the first day", () => {
    const table = makeTable([
      { Date_Collected: "02/13/2020" },
      { Date_Collected: "02/14/2020" },
    ]);
    const ctx = makeContext(table);
    validator().validate(ctx);

    expect(ctx.log.all()).toEqual([
      {
        sourceFile: "batch-a.xlsx",
        tableIndex: 0,
        originalRow: 2,
        issues: ["Date_Collected is outside of range, date: 2020-02-13 00:00:00"],
      },
    ]);
    expect(table.value(1, "Date_Collected")).toEqual(new Date(2020, 1, 14));
  });

  it("flags future dates and normalises unparsable ones to null", () => {
    const table = makeTable([
      { Date_Collected: "06/16/2024" },
      { Date_Collected: "13/01/2021" },
      { Date_Collected: null },
    ]);
    const ctx = makeContext(table);
    validator().validate(ctx);

    expect(ctx.log.issues()).toEqual([
      "Date_Collected is outside of range, date: 2024-06-16 00:00:00",
      "Date_Collected is NA",
      "Date_Collected is NA",
    ]);
    expect(table.value(0, "Date_Collected")).toEqual(new Date(2024, 5, 16));
    expect(table.value(1, "Date_Collected")).toBeNull();
  });

  it("adds the column when no spreadsheet had it", () => {
    const table = makeTable([{ Barcode_ID: "AB123456" }]);
    const ctx = makeContext(table);
    validator().validate(ctx);
    expect(table.columns).toEqual(["Barcode_ID", "Date_Collected"]);
    expect(ctx.log.issues()).toEqual(["Date_Collected is NA"]);
  });
});

describe("AvailabilityValidator", () => {
  it("rewrites every value to a boolean and flags unknown ones", () => {
    const table = makeTable([
      { Available: null },
      { Available: "Y" },
      { Available: "N" },
      { Available: "maybe" },
      { Available: "y" },
    ]);
    const ctx = makeContext(table);
    const stats = new AvailabilityValidator().validate(ctx);

    expect(table.rows().map((r) => r.fields.Available)).toEqual([
      true,
      true,
      false,
      true,
      true,
    ]);
    expect(ctx.log.all().map((e) => e.issues)).toEqual([
      ["Availability is unknown at index: 3, check to confirm availability"],
      ["Availability is unknown at index: 4, check to confirm availability"],
    ]);
    expect(stats.entries).toBe(2);
  });
});

describe("re-running normalising validators", () => {
  it("keeps values and adds no entries on a normalised table", () => {
    const table = makeTable([
      { Date_Collected: "03/01/2021", Available: "N" },
      { Date_Collected: "12/31/2023", Available: null },
    ]);
    const normalizer = new CollectionDateNormalizer(fixedClock);
    const first = makeContext(table);
    new CollectionDateValidator(normalizer).validate(first);
    new AvailabilityValidator().validate(first);
    const snapshot = table.rows().map((r) => ({ ...r.fields }));

    const second = makeContext(table);
    new CollectionDateValidator(normalizer).validate(second);
    new AvailabilityValidator().validate(second);

    expect(first.log.all()).toHaveLength(0);
    expect(second.log.all()).toHaveLength(0);
    expect(table.rows().map((r) => r.fields)).toEqual(snapshot);
    expect(table.value(0, "Available")).toBe(false);
  });
});

class ThrowingValidator extends ColumnValidator {
  readonly column = "Barcode_ID";

  protected run(ctx: ValidationContext, stats: ValidatorStats): void {
    this.eachRow(ctx, stats, (row) => {
      if (row.index === 1) throw new Error("boom");
      return ["flagged"];
    });
  }
}

describe("ColumnValidator", () => {
  it("skips a row whose check throws and keeps going", () => {
    const ctx = makeContext(
      makeTable([
        { Barcode_ID: "AB000001" },
        { Barcode_ID: "AB000002" },
        { Barcode_ID: "AB000003" },
      ])
    );
    const stats = new ThrowingValidator().validate(ctx);

    expect(ctx.log.all().map((e) => e.tableIndex)).toEqual([0, 2]);
    expect(stats.runtimeErrors).toBe(1);
    expect(ctx.observer.at("warn")).toEqual([
      "Exception during 'Barcode_ID' validation at index: 1, value: AB000002, Exception: boom",
    ]);
  });

  it("narrates completion to the observer", () => {
    const ctx = makeContext(makeTable([{ Patient_Study_ID: "C1" }]));
    new PatientIdValidator().validate(ctx);
    expect(ctx.observer.at("success")).toEqual([
      "Successfully validated 'Patient_Study_ID', in-memory log has been updated",
    ]);
  });
});

describe("createDefaultValidators", () => {
  it("runs identifier, patient ID, collection date, then availability", () => {
    expect(createDefaultValidators().map((v) => v.column)).toEqual([
      "Barcode_ID",
      "Patient_Study_ID",
      "Date_Collected",
      "Available",
    ]);
  });
});
