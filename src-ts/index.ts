#!/usr/bin/env node
import pc from "picocolors";
import { RunConfig, parseArgsOrNull } from "./config";
import { createDefaultDateNormalizer } from "./dateNormaliser";
import {
  ArchiveRecordSource,
  ConsoleRunObserver,
  CsvTableExporter,
  FileDiagnosticsLog,
} from "./infrastructure";
import { collectInteractiveConfig, printInteractiveIntro } from "./interactive";
import { ValidationService } from "./validationService";
import { createDefaultValidators } from "./validators";
import { getErrorMessage } from "./errors";

function usage() {
  console.log(
    `Usage: serum-validate [--dir <folder>] [--archive <zip>] [--log <file>] [--out <csv>]\n       serum-validate --interactive [--dir <folder>]\n\nDefaults:\n  dir:     ~/Downloads (newest .zip is used)\n  log:     <dir>/invalid_data_log.txt (appended)\n  out:     <dir>/all_haarvi_serum.csv\n\nExamples:\n  serum-validate\n  serum-validate --dir ./batches --out ./batches/serum.csv\n  serum-validate --interactive`
  );
}

const observer = new ConsoleRunObserver();

async function main() {
  const argv = process.argv.slice(2);
  const parsed = parseArgsOrNull(argv);
  if (!parsed) {
    usage();
    if (!argv.includes("--help")) process.exitCode = 1;
    return;
  }
  let config: RunConfig = parsed;
  if (parsed.interactive) {
    printInteractiveIntro(parsed.directory);
    config = await collectInteractiveConfig(parsed);
  }
  const source = new ArchiveRecordSource(
    { directory: config.directory, archive: config.archive },
    observer
  );
  const log = new FileDiagnosticsLog(config.logFile);
  const exporter = new CsvTableExporter(config.outFile);
  const validators = createDefaultValidators(createDefaultDateNormalizer());
  const service = new ValidationService(source, validators, log, exporter, observer);
  const summary = service.run();
  const entries = summary.validators.reduce((n, v) => n + v.entries, 0);
  console.log(
    pc.green(
      `\nValidation complete. Files: ${summary.files}, rows: ${summary.rows}, log entries: ${entries}`
    )
  );
  console.log(pc.dim(`Invalid rows logged to: ${config.logFile}`));
  console.log(pc.gray(JSON.stringify(summary, null, 2)));
}

main().catch((e) => {
  observer.error(getErrorMessage(e));
  process.exit(1);
});
