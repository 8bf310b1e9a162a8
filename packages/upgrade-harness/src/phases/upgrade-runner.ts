/**
 * Runs the current release against a data directory produced by an old one.
 *
 * The upgrade itself is forced by a separate bootstrap-only run, with its own
 * time bound, before any test starts.
 */

import chalk from "chalk";
import { execa } from "execa";
import ora from "ora";
import which from "which";
import { BootstrapError, MigrationTimeout, TestFailure } from "../errors.js";
import type { TestResult } from "../types.js";
import { formatDuration } from "../utils.js";
import { buildTestArgs, buildUpgradeArgs } from "../utils/server-command.js";

export interface UpgradeOptions {
  dataDir: string;
  /** Current-release developer command, resolved on PATH */
  devCommand: string;
  migrationTimeoutMs: number;
  testFiles: readonly string[];
  testJobs: number;
  /** Source checkout of the current release; test paths are relative to it */
  cwd?: string;
  verbose?: boolean;
  /** Called after each test file, pass or fail */
  onTestResult?: (result: TestResult) => void;
}

/**
 * Upgrade the data directory, then run every test file against it.
 * Throws TestFailure after all files ran if any of them failed.
 */
export async function runUpgrade(options: UpgradeOptions): Promise<TestResult[]> {
  const command = await resolveDevCommand(options.devCommand);
  await upgradeDataDir(command, options);
  return runTestFiles(command, options);
}

async function resolveDevCommand(devCommand: string): Promise<string> {
  const resolved = await which(devCommand, { nothrow: true });
  if (!resolved) {
    throw new BootstrapError(
      `"${devCommand}" was not found on PATH`,
      undefined,
      "Install the current release in development mode, or set UPGRADE_HARNESS_DEV_COMMAND"
    );
  }
  return resolved;
}

export async function upgradeDataDir(
  command: string,
  options: Pick<UpgradeOptions, "dataDir" | "migrationTimeoutMs" | "cwd" | "verbose">
): Promise<void> {
  const args = buildUpgradeArgs(options.dataDir);
  if (options.verbose) {
    console.log(chalk.gray(`$ ${command} ${args.join(" ")}`));
  }

  const startedAt = Date.now();
  const spinner = ora("Upgrading data directory with the current release...").start();
  const result = await execa(command, args, {
    cwd: options.cwd,
    reject: false,
    // Server output would break the spinner line unless asked for
    stdout: options.verbose ? "inherit" : "pipe",
    timeout: options.migrationTimeoutMs,
  });

  if (result.timedOut) {
    spinner.fail("Data directory upgrade timed out");
    throw new MigrationTimeout(options.migrationTimeoutMs);
  }

  if (result.failed) {
    spinner.fail("Data directory upgrade failed");
    throw new BootstrapError(
      `Upgrading the data directory failed (exit code ${result.exitCode ?? "none"})`,
      result.stderr
    );
  }

  spinner.succeed(`Data directory upgraded in ${formatDuration(Date.now() - startedAt)}`);
}

async function runTestFiles(command: string, options: UpgradeOptions): Promise<TestResult[]> {
  const results: TestResult[] = [];

  for (const file of options.testFiles) {
    const args = buildTestArgs({
      dataDir: options.dataDir,
      jobs: options.testJobs,
      files: [file],
    });
    if (options.verbose) {
      console.log(chalk.gray(`$ ${command} ${args.join(" ")}`));
    }

    const result = await execa(command, args, {
      cwd: options.cwd,
      reject: false,
      stdout: "inherit",
      stderr: ["pipe", "inherit"],
    });

    const testResult: TestResult = {
      file,
      passed: !result.failed,
      exitCode: result.exitCode ?? -1,
      stderr: result.failed ? result.stderr : "",
    };
    results.push(testResult);
    options.onTestResult?.(testResult);
  }

  const failures = results.filter((r) => !r.passed);
  if (failures.length > 0) {
    throw new TestFailure(failures);
  }

  return results;
}
