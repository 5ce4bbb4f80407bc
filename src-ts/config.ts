import { homedir } from "os";
import path from "path";

export interface RunConfig {
  directory: string; // folder searched for the newest archive
  archive?: string;
  logFile: string;
  outFile: string;
}

export interface ParsedArgs extends RunConfig {
  interactive: boolean;
}

export const LOG_FILE_NAME = "invalid_data_log.txt";
export const OUT_FILE_NAME = "all_haarvi_serum.csv";

const VALUE_FLAGS = ["dir", "archive", "log", "out"] as const;
type ValueFlag = (typeof VALUE_FLAGS)[number];

function isValueFlag(key: string): key is ValueFlag {
  return (VALUE_FLAGS as readonly string[]).includes(key);
}

export function defaultRunConfig(home: string = homedir()): RunConfig {
  const downloads = path.join(home, "Downloads");
  return {
    directory: downloads,
    logFile: path.join(downloads, LOG_FILE_NAME),
    outFile: path.join(downloads, OUT_FILE_NAME),
  };
}

// Returns null when usage should be printed instead of running.
export function parseArgsOrNull(
  argv: string[],
  defaults: RunConfig = defaultRunConfig()
): ParsedArgs | null {
  if (argv.includes("--help")) return null;
  const out: Partial<Record<ValueFlag, string>> = {};
  let interactive = false;
  const consumed = new Set<number>();
  for (const [i, token] of argv.entries()) {
    if (consumed.has(i)) continue;
    if (!token.startsWith("--")) return null;
    const key = token.slice(2);
    if (key === "interactive") {
      interactive = true;
      continue;
    }
    const next = argv[i + 1];
    if (!isValueFlag(key) || next === undefined || next.startsWith("--")) {
      return null;
    }
    out[key] = next;
    consumed.add(i + 1);
  }
  // Log and export default to the chosen folder when only --dir is given.
  const directory = out.dir ?? defaults.directory;
  const sameFolder = out.dir !== undefined;
  return {
    directory,
    archive: out.archive,
    logFile:
      out.log ?? (sameFolder ? path.join(directory, LOG_FILE_NAME) : defaults.logFile),
    outFile:
      out.out ?? (sameFolder ? path.join(directory, OUT_FILE_NAME) : defaults.outFile),
    interactive,
  };
}
