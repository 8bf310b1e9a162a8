/**
 * matrix command - Compute the upgrade-test matrix for a branch
 *
 * Prints the matrix JSON on stdout and, in CI, appends it to the step output
 * file so the test jobs can fan out over it.
 */

import chalk from "chalk";
import ora from "ora";
import { resolveConfig, type Env, type HarnessConfig } from "../config.js";
import type { MatrixEntry, MatrixOptions, VersionRecord } from "../types.js";
import { fetchVersionRecords, type FetchLike } from "../utils/index-fetcher.js";
import { expandMatrix, toWorkflowMatrix, writeMatrixOutput } from "../utils/matrix.js";
import { filterAdmissible, parseTargetMajor, resolveBranch } from "../utils/version-filter.js";

export interface ComputedMatrix {
  branch: string;
  major: number;
  admissible: VersionRecord[];
  entries: MatrixEntry[];
}

/**
 * Fetch both indexes, keep the admissible releases for the branch's major
 * version and expand them into entries
 */
export async function computeMatrix(
  config: HarnessConfig,
  options: { branch?: string; env?: Env; fetchImpl?: FetchLike } = {}
): Promise<ComputedMatrix> {
  const branch = resolveBranch(options.branch, options.env);
  const major = parseTargetMajor(branch);

  const spinner = ora(`Fetching release indexes for ${config.platform}...`).start();
  let records: VersionRecord[];
  try {
    records = await fetchVersionRecords(config.platform, {
      baseUrl: config.baseUrl,
      timeout: config.fetchTimeoutMs,
      fetchImpl: options.fetchImpl,
    });
  } catch (error) {
    spinner.fail("Failed to fetch release indexes");
    throw error;
  }
  spinner.succeed(`Fetched ${records.length} releases`);

  const admissible = filterAdmissible(records, major);
  return { branch, major, admissible, entries: expandMatrix(admissible) };
}

export async function matrix(options: MatrixOptions): Promise<void> {
  const config = resolveConfig({
    baseUrl: options.baseUrl,
    platform: options.platform,
  });

  const computed = await computeMatrix(config, { branch: options.branch });

  // stdout carries only the matrix JSON
  console.error(chalk.gray(`Branch: ${computed.branch} (major ${computed.major})`));
  if (computed.admissible.length === 0) {
    console.error(chalk.yellow(`⚠️  No released versions of ${computed.major}.x to upgrade from`));
  } else {
    console.error(chalk.gray("Versions:"));
    for (const record of computed.admissible) {
      console.error(chalk.gray(`  • ${record.version}`));
    }
  }

  const workflowMatrix = toWorkflowMatrix(computed.entries);
  console.log(JSON.stringify(workflowMatrix));

  const output = options.output ?? process.env.GITHUB_OUTPUT;
  if (output) {
    await writeMatrixOutput(workflowMatrix, output);
    console.error(chalk.gray(`Matrix written to ${output}`));
  }
}
