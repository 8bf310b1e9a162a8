/**
 * Drives one matrix entry through its phases:
 *
 * 1. Download the old release and bootstrap a fresh data directory with it
 * 2. Create the fixture databases (only when the entry seeds them)
 * 3. Upgrade the directory with the current release and run the test subset
 * 4. Restart the old release on the upgraded directory and query it
 *    (final releases only)
 *
 * Failures are reported on the returned EntryReport, never thrown.
 */

import path from "path";
import fs from "fs-extra";
import chalk from "chalk";
import ora from "ora";
import type { HarnessConfig } from "../config.js";
import { HarnessError, TestFailure, VerificationMismatch } from "../errors.js";
import { ServerInstance } from "../orchestrator/instance.js";
import { seedFixtureDatabases } from "../phases/data-seeder.js";
import { runUpgrade } from "../phases/upgrade-runner.js";
import {
  DEFAULT_DOWNGRADE_CHECK,
  shouldVerifyDowngrade,
  verifyDowngrade,
  type DowngradeCheck,
} from "../phases/downgrade-verifier.js";
import type { EntryPhase, EntryReport, MatrixEntry, TestResult } from "../types.js";
import { formatDuration } from "../utils.js";
import type { ClientFactory } from "../utils/db-client.js";
import type { FetchLike } from "../utils/index-fetcher.js";

export interface EntryRunOptions {
  config: HarnessConfig;
  /** Directory owned by this entry; holds the release and the data directory */
  workDir: string;
  /** Source checkout of the current release */
  cwd?: string;
  /** Keep the work directory of a passing entry */
  keepWorkDir?: boolean;
  verbose?: boolean;
  downgradeCheck?: DowngradeCheck;
  clientFactory?: ClientFactory;
  fetchImpl?: FetchLike;
}

/**
 * Human-readable label identifying the version/flag combination
 */
export function describeEntry(entry: MatrixEntry): string {
  return `${entry.version} (${entry.seedFixtureDbs ? "with" : "without"} fixture databases)`;
}

/**
 * Work directory name for an entry, unique per version/flag combination
 */
export function getEntryDirName(entry: MatrixEntry): string {
  const version = entry.version.replace(/[^A-Za-z0-9.-]/g, "_");
  return `${version}-${entry.seedFixtureDbs ? "dbs" : "nodbs"}`;
}

export async function runMatrixEntry(
  entry: MatrixEntry,
  options: EntryRunOptions
): Promise<EntryReport> {
  const { config, workDir } = options;
  const startedAt = Date.now();
  const tests: TestResult[] = [];
  let phase: EntryPhase = "fetch";
  let downgradeVerified = false;

  console.log(chalk.blue(`\n📦 ${describeEntry(entry)}\n`));

  try {
    // Every run starts from an empty work directory, including reruns of an
    // entry whose directory was kept after a failure
    await fs.emptyDir(workDir);

    const download = ora(`Downloading ${entry.version}...`).start();
    let instance: ServerInstance;
    try {
      instance = await ServerInstance.fetch(entry, workDir, {
        port: config.port,
        readiness: config.readiness,
        clientFactory: options.clientFactory,
        verbose: options.verbose,
        fetchImpl: options.fetchImpl,
      });
    } catch (error) {
      download.fail(`Failed to download ${entry.version}`);
      throw error;
    }
    download.succeed(`Downloaded ${entry.version}`);

    phase = "bootstrap";
    step(`Bootstrapping data directory with ${entry.version}...`);
    await instance.bootstrap();

    if (entry.seedFixtureDbs) {
      phase = "seed";
      step(`Creating fixture databases: ${config.fixtureDatabases.join(", ")}`);
      await instance.withRunning(async () => {
        const client = instance.connect();
        try {
          await seedFixtureDatabases(client, config.fixtureDatabases);
        } finally {
          await client.close();
        }
      });
    }

    phase = "upgrade";
    step("Upgrading data directory with the current release...");
    await runUpgrade({
      dataDir: instance.dataDir,
      devCommand: config.devCommand,
      migrationTimeoutMs: config.migrationTimeoutMs,
      testFiles: config.testFiles,
      testJobs: config.testJobs,
      cwd: options.cwd,
      verbose: options.verbose,
      onTestResult: (result) => {
        phase = "test";
        tests.push(result);
        console.log(
          result.passed
            ? chalk.green(`   ✓ ${result.file}`)
            : chalk.red(`   ✗ ${result.file} (exit code ${result.exitCode})`)
        );
      },
    });

    if (shouldVerifyDowngrade(entry.version)) {
      phase = "downgrade";
      step(`Checking ${entry.version} still reads the upgraded data directory...`);
      await verifyDowngrade(instance, options.downgradeCheck ?? DEFAULT_DOWNGRADE_CHECK);
      downgradeVerified = true;
    } else {
      console.log(chalk.gray(`   Skipping downgrade check for pre-release ${entry.version}`));
    }

    if (!options.keepWorkDir) {
      await fs.remove(workDir);
    }

    return {
      entry,
      status: "passed",
      tests,
      downgradeVerified,
      durationMs: Date.now() - startedAt,
    };
  } catch (error) {
    return {
      entry,
      status: "failed",
      phase: error instanceof TestFailure ? "test" : phase,
      error: error instanceof Error ? error : new Error(String(error)),
      tests,
      downgradeVerified,
      durationMs: Date.now() - startedAt,
    };
  }
}

/**
 * Print the outcome of an entry, with the failing phase and its diagnostics
 */
export function printEntryReport(report: EntryReport, workDir?: string): void {
  const label = describeEntry(report.entry);
  const duration = formatDuration(report.durationMs);

  if (report.status === "passed") {
    const downgrade = report.downgradeVerified ? ", downgrade verified" : "";
    console.log(chalk.green(`\n✅ ${label} passed in ${duration}${downgrade}\n`));
    return;
  }

  console.error(chalk.red(`\n❌ ${label} failed during ${report.phase ?? "unknown"} phase (${duration})`));

  const { error } = report;
  if (error) {
    console.error(chalk.red(`   ${error.message}`));

    if (error instanceof VerificationMismatch) {
      console.error(chalk.gray("   Expected:"), JSON.stringify(error.expected));
      console.error(chalk.gray("   Actual:  "), JSON.stringify(error.actual));
    }

    if (error instanceof HarnessError) {
      if (error.detail) {
        console.error(chalk.gray(indent(error.detail)));
      }
      if (error.suggestion) {
        console.error(chalk.yellow(`   💡 ${error.suggestion}`));
      }
    }
  }

  if (workDir) {
    console.error(chalk.gray(`   Work directory kept at ${path.resolve(workDir)}`));
  }
  console.error();
}

function step(message: string): void {
  console.log(chalk.gray(`▸ ${message}`));
}

function indent(text: string): string {
  return text
    .split("\n")
    .map((line) => `   ${line}`)
    .join("\n");
}
