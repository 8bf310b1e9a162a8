/**
 * Error taxonomy for the upgrade harness.
 *
 * FetchError, ParseError and BranchParseError abort the whole run: no matrix
 * can be computed without them. Everything else is scoped to one matrix entry
 * and is reported against that entry's version/flag combination.
 */

import chalk from "chalk";
import type { TestResult } from "./types.js";
import { formatDuration } from "./utils.js";

/**
 * Base error class for harness errors
 */
export class HarnessError extends Error {
  constructor(
    message: string,
    public detail?: string,
    public suggestion?: string
  ) {
    super(message);
    this.name = "HarnessError";
    // Maintain proper stack trace for where error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Network failure or non-2xx response from a release index or archive
 */
export class FetchError extends HarnessError {
  constructor(message: string, detail?: string, suggestion?: string) {
    super(message, detail, suggestion);
    this.name = "FetchError";
  }
}

/**
 * Index document that is not JSON or does not match the index schema
 */
export class ParseError extends HarnessError {
  constructor(message: string, detail?: string, suggestion?: string) {
    super(message, detail, suggestion);
    this.name = "ParseError";
  }
}

export class BranchParseError extends HarnessError {
  constructor(branch: string) {
    super(
      `Cannot derive a major version from branch "${branch}"`,
      "The branch name contains no digits",
      "Run against a release branch such as stable/3, or pass --branch"
    );
    this.name = "BranchParseError";
  }
}

export class BootstrapError extends HarnessError {
  constructor(message: string, detail?: string, suggestion?: string) {
    super(message, detail, suggestion);
    this.name = "BootstrapError";
  }
}

/**
 * Server process that exited early or never accepted connections
 */
export class SpawnError extends HarnessError {
  constructor(message: string, detail?: string, suggestion?: string) {
    super(message, detail, suggestion);
    this.name = "SpawnError";
  }
}

export class SeedError extends HarnessError {
  constructor(
    public database: string,
    detail?: string
  ) {
    super(`Failed to create fixture database "${database}"`, detail);
    this.name = "SeedError";
  }
}

export class MigrationTimeout extends HarnessError {
  constructor(public timeoutMs: number) {
    super(
      `Data directory upgrade did not finish within ${formatDuration(timeoutMs)}`,
      undefined,
      "Raise the bound with --migration-timeout or UPGRADE_HARNESS_MIGRATION_TIMEOUT"
    );
    this.name = "MigrationTimeout";
  }
}

/**
 * Aggregate of every failed test file in one suite run
 */
export class TestFailure extends HarnessError {
  constructor(public failures: TestResult[]) {
    super(
      `${failures.length} test file${failures.length === 1 ? "" : "s"} failed: ${failures
        .map((f) => f.file)
        .join(", ")}`,
      failures.map((f) => f.stderr).filter(Boolean).join("\n")
    );
    this.name = "TestFailure";
  }
}

export class VerificationMismatch extends HarnessError {
  constructor(
    public actual: unknown,
    public expected: unknown
  ) {
    super("Query result after downgrade does not match the expected value");
    this.name = "VerificationMismatch";
  }
}

/**
 * Thrown on an illegal instance state change. Indicates a harness bug rather
 * than a server failure.
 */
export class InvalidTransitionError extends Error {
  constructor(from: string, to: string) {
    super(`Invalid instance transition: ${from} -> ${to}`);
    this.name = "InvalidTransitionError";
  }
}

/**
 * Display error message with consistent formatting
 */
export function displayError(error: Error): void {
  console.error(chalk.red(`\n❌ Error: ${error.message}`));

  if (error instanceof VerificationMismatch) {
    console.error(chalk.gray("Expected:"), JSON.stringify(error.expected));
    console.error(chalk.gray("Actual:  "), JSON.stringify(error.actual));
  }

  if (error instanceof HarnessError) {
    if (error.detail) {
      console.error(chalk.gray("\nDetails:"));
      console.error(chalk.gray(error.detail));
    }

    if (error.suggestion) {
      console.error(chalk.yellow(`\n💡 ${error.suggestion}`));
    }
  }

  console.error();
}
