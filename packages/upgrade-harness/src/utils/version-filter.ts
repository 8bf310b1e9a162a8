/**
 * Version selection: which published releases are upgrade-test sources for a
 * development branch.
 */

import { BranchParseError } from "../errors.js";
import type { Env } from "../config.js";
import type { PrereleasePhase, VersionRecord } from "../types.js";

const ADMISSIBLE_PRERELEASE_PHASES: ReadonlySet<PrereleasePhase> = new Set(["beta", "rc"]);

/**
 * Target major version: the first run of digits in the branch name
 * ("stable/3" -> 3, "release-12.x" -> 12)
 */
export function parseTargetMajor(branch: string): number {
  const match = branch.match(/\d+/);
  if (!match) {
    throw new BranchParseError(branch);
  }
  return parseInt(match[0], 10);
}

/**
 * Branch under test in CI: the pull request base if there is one, otherwise
 * the branch being pushed
 */
export function resolveBranch(explicit: string | undefined, env: Env = process.env): string {
  const branch = explicit || env.GITHUB_BASE_REF || env.GITHUB_REF_NAME;
  if (!branch) {
    throw new BranchParseError("");
  }
  return branch;
}

export function isAdmissible(record: VersionRecord, targetMajor: number): boolean {
  return (
    record.major === targetMajor &&
    (record.prereleasePhase === "none" ||
      ADMISSIBLE_PRERELEASE_PHASES.has(record.prereleasePhase))
  );
}

export function filterAdmissible(
  records: readonly VersionRecord[],
  targetMajor: number
): VersionRecord[] {
  return records.filter((record) => isAdmissible(record, targetMajor));
}
