/**
 * run command - Run a single matrix entry
 *
 * This is the body of one fan-out job. The entry comes from flags or from the
 * EDGEDB_VERSION / EDGEDB_URL / EDGEDB_MAKE_DBS environment the CI job sets.
 */

import path from "path";
import chalk from "chalk";
import { parseBoolean, parseInteger, resolveConfig, type Env } from "../config.js";
import { getEntryDirName, printEntryReport, runMatrixEntry } from "../harness/entry-runner.js";
import type { MatrixEntry, RunOptions } from "../types.js";

/**
 * Build the entry from flags, falling back to the job environment
 */
export function entryFromOptions(options: RunOptions, env: Env = process.env): MatrixEntry | undefined {
  const version = options.edgedbVersion ?? env.EDGEDB_VERSION;
  const url = options.edgedbUrl ?? env.EDGEDB_URL;
  if (!version || !url) {
    return undefined;
  }

  return {
    version,
    downloadUrl: url,
    seedFixtureDbs: options.makeDbs ?? parseBoolean(env.EDGEDB_MAKE_DBS) ?? false,
  };
}

export async function run(options: RunOptions): Promise<void> {
  const entry = entryFromOptions(options);

  if (!entry) {
    console.error(chalk.red("\n❌ Error: No matrix entry given"));
    console.log(
      chalk.gray("   Pass"),
      chalk.cyan("--edgedb-version"),
      chalk.gray("and"),
      chalk.cyan("--edgedb-url"),
      chalk.gray("or set EDGEDB_VERSION and EDGEDB_URL.")
    );
    process.exit(1);
  }

  const config = resolveConfig({
    port: parseInteger(options.port),
    migrationTimeoutMs: secondsToMs(options.migrationTimeout),
  });

  const workDir = path.resolve(options.workDir ?? path.join(config.workDir, getEntryDirName(entry)));

  const report = await runMatrixEntry(entry, {
    config,
    workDir,
    cwd: process.cwd(),
    keepWorkDir: options.keepWorkDir,
    verbose: options.verbose,
  });

  printEntryReport(report, report.status === "failed" ? workDir : undefined);

  if (report.status === "failed") {
    process.exit(1);
  }
}

export function secondsToMs(value: string | undefined): number | undefined {
  const seconds = parseInteger(value);
  return seconds === undefined ? undefined : seconds * 1000;
}
