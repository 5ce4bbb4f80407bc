import inquirer from "inquirer";
import pc from "picocolors";
import { RunConfig } from "./config";
import { DiscoveryError, getErrorMessage } from "./errors";
import { listArchives } from "./infrastructure";

interface InteractiveAnswers {
  archive: string;
  logFile: string;
  outFile: string;
}

export async function collectInteractiveConfig(
  defaults: RunConfig
): Promise<RunConfig> {
  let archives: string[];
  try {
    archives = listArchives(defaults.directory);
  } catch (e) {
    throw new DiscoveryError(
      `Could not list archives in ${defaults.directory}: ${getErrorMessage(e)}`,
      e
    );
  }
  if (archives.length === 0) {
    throw new DiscoveryError(
      `Could not find a .zip archive in ${defaults.directory} for interactive mode.`
    );
  }
  const answers = await inquirer.prompt<InteractiveAnswers>([
    {
      type: "list",
      name: "archive",
      message: `Select archive (${defaults.directory})`,
      choices: archives,
      loop: false,
    },
    {
      type: "input",
      name: "logFile",
      message: "Invalid data log",
      default: defaults.logFile,
    },
    {
      type: "input",
      name: "outFile",
      message: "Consolidated CSV output",
      default: defaults.outFile,
    },
  ]);
  return { ...defaults, ...answers };
}

export function printInteractiveIntro(directory: string) {
  console.log(
    pc.cyan("\nEntering interactive mode...") +
      "\n" +
      pc.dim(
        `(Tip: Place the batch .zip in ${directory}; the newest archive is listed first.)`
      )
  );
}
