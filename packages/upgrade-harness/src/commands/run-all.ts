/**
 * run-all command - Compute the matrix and run every entry locally
 */

import path from "path";
import fs from "fs-extra";
import chalk from "chalk";
import { parseInteger, resolveConfig } from "../config.js";
import { runMatrixEntries, summarizeReports } from "../harness/fan-out.js";
import type { MatrixEntry, RunAllOptions } from "../types.js";
import { formatDuration } from "../utils.js";
import { fromWorkflowMatrix } from "../utils/matrix.js";
import { computeMatrix } from "./matrix.js";
import { secondsToMs } from "./run.js";

export async function runAll(options: RunAllOptions): Promise<void> {
  const config = resolveConfig({
    baseUrl: options.baseUrl,
    platform: options.platform,
    port: parseInteger(options.port),
    workDir: options.workDir ? path.resolve(options.workDir) : undefined,
    migrationTimeoutMs: secondsToMs(options.migrationTimeout),
  });

  let entries: MatrixEntry[];
  if (options.matrix) {
    entries = fromWorkflowMatrix(await fs.readFile(options.matrix, "utf-8"));
  } else {
    ({ entries } = await computeMatrix(config, { branch: options.branch }));
  }

  if (entries.length === 0) {
    console.log(chalk.yellow("\n⚠️  Nothing to run: the matrix is empty\n"));
    return;
  }

  const jobs = parseInteger(options.jobs) ?? 1;
  console.log(chalk.blue.bold(`\n🧪 Running ${entries.length} entries on ${jobs} worker${jobs === 1 ? "" : "s"}\n`));

  const startedAt = Date.now();
  const reports = await runMatrixEntries(entries, {
    config,
    jobs,
    workRoot: config.workDir,
    cwd: process.cwd(),
    keepWorkDir: options.keepWorkDir,
    verbose: options.verbose,
  });

  const { passed, failed } = summarizeReports(reports);
  console.log(chalk.blue.bold("📋 Summary:\n"));
  for (const report of reports) {
    const mark = report.status === "passed" ? chalk.green("✓") : chalk.red("✗");
    const where = report.phase ? chalk.gray(` (${report.phase})`) : "";
    const seeded = report.entry.seedFixtureDbs ? "make-dbs" : "no-dbs";
    console.log(`   ${mark} ${report.entry.version} ${chalk.gray(seeded)}${where}`);
  }
  console.log(
    chalk.gray(`\n   ${passed} passed, ${failed} failed in ${formatDuration(Date.now() - startedAt)}\n`)
  );

  if (failed > 0) {
    process.exit(1);
  }
}
