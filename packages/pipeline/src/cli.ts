/**
 * Command line entry
 *
 * Usage:
 *   outfit-forge --import <dir> --export <dir> [--count <n>] [--seed <n>]
 *                [--ext <ext>] [--categories top,bottom]
 *
 * Any flag may be left out when the matching OUTFIT_* variable is set.
 */

import {
  OutfitError,
  toErrorMessage,
  type OutfitHost,
} from "@outfit-forge/combinator";
import chalk from "chalk";

import { loadConfig, type PipelineConfigInput } from "./config.js";
import { ConfigError } from "./errors.js";
import { isSuccessfulRun, runPipeline } from "./pipeline.js";
import { formatReport } from "./report.js";

export const USAGE = `Usage: outfit-forge --import <dir> --export <dir> [options]

Options:
  --import <dir>        Folder with one subfolder per body-part category
  --export <dir>        Folder the outfits are written to
  --count <n>           Outfits per skeleton (default 10)
  --seed <n>            Seed for reproducible selections
  --ext <ext>           Extension of the part files to read (default glb)
  --categories <a,b>    Categories to combine besides body
  --help                Show this message`;

export type CliCommand =
  | { kind: "help" }
  | { kind: "run"; overrides: Partial<PipelineConfigInput> };

const VALUE_FLAGS = new Set([
  "--import",
  "--export",
  "--count",
  "--seed",
  "--ext",
  "--categories",
]);

function toNumber(flag: string, value: string): number {
  if (!/^-?\d+$/.test(value)) {
    throw new ConfigError(`${flag} expects a whole number, got "${value}"`, [
      `${flag}: expected a whole number`,
    ]);
  }
  return Number(value);
}

/**
 * Parse arguments after the script name
 *
 * Accepts `--flag value` and `--flag=value`.
 */
export function parseCliArgs(args: readonly string[]): CliCommand {
  const overrides: Partial<PipelineConfigInput> = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--help" || arg === "-h") return { kind: "help" };

    const eq = arg.indexOf("=");
    const flag = eq >= 0 ? arg.slice(0, eq) : arg;
    if (!VALUE_FLAGS.has(flag)) {
      throw new ConfigError(`Unknown argument: ${arg}`, [`${arg}: unknown`]);
    }

    let value: string | undefined;
    if (eq >= 0) {
      value = arg.slice(eq + 1);
    } else {
      value = args[i + 1];
      i++;
    }
    if (value === undefined || value === "" || VALUE_FLAGS.has(value)) {
      throw new ConfigError(`Missing value for ${flag}`, [
        `${flag}: missing value`,
      ]);
    }

    switch (flag) {
      case "--import":
        overrides.importPath = value;
        break;
      case "--export":
        overrides.exportPath = value;
        break;
      case "--count":
        overrides.combinations = toNumber(flag, value);
        break;
      case "--seed":
        overrides.seed = toNumber(flag, value);
        break;
      case "--ext":
        overrides.extension = value;
        break;
      case "--categories":
        overrides.categories = value
          .split(",")
          .map((item) => item.trim())
          .filter((item) => item.length > 0);
        break;
    }
  }

  return { kind: "run", overrides };
}

/**
 * Run the command line and resolve to the process exit code
 */
export async function main(
  args: readonly string[],
  host?: OutfitHost,
): Promise<number> {
  try {
    const command = parseCliArgs(args);
    if (command.kind === "help") {
      console.log(USAGE);
      return 0;
    }

    const config = await loadConfig(command.overrides);
    console.log(
      chalk.blue(
        `Combining parts from ${config.importPath} into ${config.exportPath}`,
      ),
    );

    const result = await runPipeline(config, host);
    for (const line of formatReport(result)) console.log(line);

    if (!isSuccessfulRun(result.report, config.combinations)) {
      console.error(
        chalk.red(
          result.report.exported.length === 0
            ? "No outfits were exported"
            : `${result.report.failed.length} outfit(s) failed to export`,
        ),
      );
      return 1;
    }
    return 0;
  } catch (error) {
    console.error(chalk.red(`✗ ${toErrorMessage(error)}`));
    if (error instanceof ConfigError) {
      console.error(USAGE);
    } else if (!(error instanceof OutfitError) && error instanceof Error) {
      console.error(chalk.gray(error.stack ?? ""));
    }
    return 1;
  }
}
