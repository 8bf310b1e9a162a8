/**
 * Upgrade harness library entry point
 */

export * from "./types.js";
export * from "./errors.js";
export { DEFAULT_CONFIG, resolveConfig } from "./config.js";
export type { ConfigOverrides, Env, HarnessConfig } from "./config.js";

export {
  fetchChannel,
  fetchVersionRecords,
  getIndexUrl,
  parseReleaseIndex,
} from "./utils/index-fetcher.js";
export type { FetchLike, IndexFetchOptions } from "./utils/index-fetcher.js";
export {
  filterAdmissible,
  isAdmissible,
  parseTargetMajor,
  resolveBranch,
} from "./utils/version-filter.js";
export {
  expandMatrix,
  fromWorkflowMatrix,
  toWorkflowMatrix,
  writeMatrixOutput,
} from "./utils/matrix.js";
export {
  buildServerArgs,
  buildTestArgs,
  buildUpgradeArgs,
} from "./utils/server-command.js";
export type { SecurityMode, ServerInvocation } from "./utils/server-command.js";
export { createDatabaseClient } from "./utils/db-client.js";
export type { ClientFactory, ConnectOptions, DatabaseClient } from "./utils/db-client.js";

export { RunningServer, ServerInstance } from "./orchestrator/instance.js";
export type { InstanceState, ServerExit, ServerInstanceOptions } from "./orchestrator/instance.js";
export { seedFixtureDatabases } from "./phases/data-seeder.js";
export { runUpgrade, upgradeDataDir } from "./phases/upgrade-runner.js";
export type { UpgradeOptions } from "./phases/upgrade-runner.js";
export {
  DEFAULT_DOWNGRADE_CHECK,
  shouldVerifyDowngrade,
  verifyDowngrade,
} from "./phases/downgrade-verifier.js";
export type { DowngradeCheck } from "./phases/downgrade-verifier.js";
export { describeEntry, printEntryReport, runMatrixEntry } from "./harness/entry-runner.js";
export type { EntryRunOptions } from "./harness/entry-runner.js";
export { runMatrixEntries, summarizeReports } from "./harness/fan-out.js";
export type { FanOutOptions } from "./harness/fan-out.js";
export { computeMatrix } from "./commands/matrix.js";
