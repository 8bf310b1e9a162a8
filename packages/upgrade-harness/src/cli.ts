#!/usr/bin/env node

/**
 * Upgrade Harness CLI
 *
 * Checks that the current server release reads data directories created by
 * earlier releases of the same major version, and that final releases still
 * read them after the upgrade.
 */

import { Command } from "commander";
import chalk from "chalk";
import { displayError } from "./errors.js";
import { getCliVersion } from "./utils.js";

// Import commands
import { matrix } from "./commands/matrix.js";
import { run } from "./commands/run.js";
import { runAll } from "./commands/run-all.js";
import { doctor } from "./commands/doctor.js";

const program = new Command();

program
  .name("upgrade-harness")
  .description("🔁 Upgrade and downgrade compatibility checks against published releases")
  .version(getCliVersion(), "-v, --version", "Output the current version");

// matrix command
program
  .command("matrix")
  .description("Compute the upgrade-test matrix for a branch")
  .option("--branch <branch>", "Branch name (default: GITHUB_BASE_REF or GITHUB_REF_NAME)")
  .option("--platform <platform>", "Package index platform")
  .option("--base-url <url>", "Package server root")
  .option("--output <file>", "Append matrix=<json> to this file (default: GITHUB_OUTPUT)")
  .action(matrix);

// run command
program
  .command("run")
  .description("Run one matrix entry against the current release")
  .option("--edgedb-version <version>", "Old release version (default: EDGEDB_VERSION)")
  .option("--edgedb-url <url>", "Old release archive URL (default: EDGEDB_URL)")
  .option("--make-dbs", "Create the fixture databases with the old release (default: EDGEDB_MAKE_DBS)")
  .option("--work-dir <dir>", "Directory for the release and its data directory (emptied first)")
  .option("--port <port>", "Port the old release serves on")
  .option("--migration-timeout <seconds>", "Upper bound for the data directory upgrade")
  .option("--keep-work-dir", "Keep the work directory after a passing run")
  .option("--verbose", "Print subprocess command lines")
  .action(run);

// run-all command
program
  .command("run-all")
  .description("Compute the matrix and run every entry locally")
  .option("--branch <branch>", "Branch name (default: GITHUB_BASE_REF or GITHUB_REF_NAME)")
  .option("--platform <platform>", "Package index platform")
  .option("--base-url <url>", "Package server root")
  .option("--matrix <file>", "Run a matrix saved by the matrix command instead")
  .option("-j, --jobs <count>", "Entries to run at once", "1")
  .option("--work-dir <dir>", "Root directory for entry work directories")
  .option("--port <port>", "First port; worker N serves on port + N")
  .option("--migration-timeout <seconds>", "Upper bound for each data directory upgrade")
  .option("--keep-work-dir", "Keep work directories of passing entries")
  .option("--verbose", "Print subprocess command lines")
  .action(runAll);

// doctor command
program
  .command("doctor")
  .description("Run diagnostics and show configuration")
  .action(doctor);

try {
  await program.parseAsync(process.argv);
} catch (error: unknown) {
  if (error instanceof Error) {
    displayError(error);
  } else {
    console.error(chalk.red("\n❌ Error:"), String(error));
  }

  console.error(
    chalk.yellow("💡 Try running:"),
    chalk.cyan("upgrade-harness doctor")
  );

  process.exit(1);
}
