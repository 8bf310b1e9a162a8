/**
 * doctor command - Run diagnostics
 */

import chalk from "chalk";
import which from "which";
import { resolveConfig } from "../config.js";
import { getCliVersion, isPortAvailable } from "../utils.js";

export async function doctor(): Promise<void> {
  const config = resolveConfig();

  console.log(chalk.blue.bold("\n🩺 Upgrade Harness Diagnostics\n"));

  // CLI Version
  console.log(chalk.cyan("CLI Version:"), getCliVersion());

  // Prerequisites
  console.log(chalk.cyan("\n📋 Prerequisites:"));
  const nodeVersion = process.version.replace("v", "");
  const nodeMajor = parseInt(nodeVersion.split(".")[0], 10);
  console.log(
    chalk.gray("  Node.js:"),
    nodeMajor >= 20
      ? chalk.green(`✓ v${nodeVersion}`)
      : chalk.yellow(`⚠️  v${nodeVersion} (need v20+)`)
  );

  const devCommand = await which(config.devCommand, { nothrow: true });
  console.log(
    chalk.gray(`  ${config.devCommand}:`),
    devCommand ? chalk.green(`✓ ${devCommand}`) : chalk.red("✗ Not found on PATH")
  );

  const portFree = await isPortAvailable(config.port);
  console.log(
    chalk.gray(`  Port ${config.port}:`),
    portFree ? chalk.green("✓ Available") : chalk.red("✗ In use")
  );

  console.log(chalk.gray("  Platform:"), process.platform);

  // Configuration
  console.log(chalk.cyan("\n⚙️  Configuration:"));
  console.log(chalk.gray("  Package server:"), config.baseUrl);
  console.log(chalk.gray("  Index platform:"), config.platform);
  console.log(chalk.gray("  Work directory:"), config.workDir);
  console.log(chalk.gray("  Migration timeout:"), `${config.migrationTimeoutMs / 1000}s`);
  console.log(chalk.gray("  Fixture databases:"), config.fixtureDatabases.join(", "));

  if (!devCommand) {
    console.log(chalk.yellow("\n💡 Install the current release in development mode so"));
    console.log(chalk.yellow(`   "${config.devCommand}" is on PATH, or set UPGRADE_HARNESS_DEV_COMMAND.`));
  }

  console.log("");
}
