/**
 * Harness configuration: defaults, overridden by environment variables,
 * overridden by CLI flags.
 */

import path from "path";
import os from "os";
import type { ReadinessOptions } from "./types.js";

export interface HarnessConfig {
  /** Package server root; index and archive refs are relative to it */
  baseUrl: string;

  /** Target platform identifier used to pick the index documents */
  platform: string;

  /** Local port the old release serves on */
  port: number;

  /** Root under which each entry gets its own work directory */
  workDir: string;

  /** Current-release developer command (runs the upgrade and the tests) */
  devCommand: string;

  /** Upper bound for the upgrade-triggering bootstrap */
  migrationTimeoutMs: number;

  readiness: ReadinessOptions;

  fixtureDatabases: string[];
  testFiles: string[];
  testJobs: number;

  /** Index request timeout */
  fetchTimeoutMs: number;
}

export const DEFAULT_CONFIG: HarnessConfig = {
  baseUrl: "https://packages.edgedb.com",
  platform: "x86_64-unknown-linux-gnu",
  port: 10000,
  workDir: path.join(os.tmpdir(), "upgrade-harness"),
  devCommand: "edb",
  migrationTimeoutMs: 30 * 60_000,
  readiness: {
    timeoutMs: 120_000,
    intervalMs: 250,
    maxIntervalMs: 5_000,
  },
  fixtureDatabases: ["json", "functions", "expressions", "casts", "policies"],
  testFiles: [
    "tests/test_edgeql_json.py",
    "tests/test_edgeql_casts.py",
    "tests/test_edgeql_functions.py",
    "tests/test_edgeql_expressions.py",
    "tests/test_edgeql_policies.py",
  ],
  testJobs: 2,
  fetchTimeoutMs: 30_000,
};

export type Env = Record<string, string | undefined>;

export interface ConfigOverrides {
  baseUrl?: string;
  platform?: string;
  port?: number;
  workDir?: string;
  devCommand?: string;
  migrationTimeoutMs?: number;
}

/**
 * Merge CLI overrides over environment variables over defaults
 */
export function resolveConfig(
  overrides: ConfigOverrides = {},
  env: Env = process.env
): HarnessConfig {
  const envMigrationTimeout = parseInteger(env.UPGRADE_HARNESS_MIGRATION_TIMEOUT);

  // Nested values are copied so a resolved config never aliases the defaults
  return {
    ...DEFAULT_CONFIG,
    readiness: { ...DEFAULT_CONFIG.readiness },
    fixtureDatabases: [...DEFAULT_CONFIG.fixtureDatabases],
    testFiles: [...DEFAULT_CONFIG.testFiles],
    baseUrl:
      overrides.baseUrl ?? (env.UPGRADE_HARNESS_BASE_URL || DEFAULT_CONFIG.baseUrl),
    platform:
      overrides.platform ?? (env.UPGRADE_HARNESS_PLATFORM || DEFAULT_CONFIG.platform),
    port: overrides.port ?? parseInteger(env.UPGRADE_HARNESS_PORT) ?? DEFAULT_CONFIG.port,
    workDir: overrides.workDir ?? DEFAULT_CONFIG.workDir,
    devCommand:
      overrides.devCommand ??
      (env.UPGRADE_HARNESS_DEV_COMMAND || DEFAULT_CONFIG.devCommand),
    migrationTimeoutMs:
      overrides.migrationTimeoutMs ??
      (envMigrationTimeout !== undefined
        ? envMigrationTimeout * 1000
        : DEFAULT_CONFIG.migrationTimeoutMs),
  };
}

/**
 * Parse a non-negative integer option, e.g. "--port 10000"
 */
export function parseInteger(value: string | undefined): number | undefined {
  if (value === undefined || !/^\d+$/.test(value.trim())) {
    return undefined;
  }
  return parseInt(value, 10);
}

/**
 * Parse a boolean environment flag such as EDGEDB_MAKE_DBS=true
 */
export function parseBoolean(value: string | undefined): boolean | undefined {
  switch (value?.trim().toLowerCase()) {
    case "1":
    case "true":
    case "yes":
      return true;
    case "":
    case "0":
    case "false":
    case "no":
      return false;
    default:
      return undefined;
  }
}
