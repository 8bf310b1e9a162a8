/**
 * Shared types for the upgrade harness
 */

export type PrereleasePhase = "none" | "dev" | "alpha" | "beta" | "rc";

export type ReleaseChannel = "stable" | "testing";

export interface VersionRecord {
  /** Version string as published (e.g. "3.0-rc.1") */
  readonly version: string;

  /** Leading release-number component */
  readonly major: number;

  /** Phase of the first prerelease element, or 'none' for final releases */
  readonly prereleasePhase: PrereleasePhase;

  /** Absolute URL of the release archive */
  readonly downloadUrl: string;
}

export interface MatrixEntry {
  readonly version: string;
  readonly downloadUrl: string;

  /** Whether the old release should create the fixture databases */
  readonly seedFixtureDbs: boolean;
}

/**
 * Wire form of the matrix, consumed by the CI fan-out scheduler.
 */
export interface WorkflowMatrix {
  include: Array<{
    "edgedb-version": string;
    "edgedb-url": string;
    "make-dbs": boolean;
  }>;
}

export type EntryPhase =
  | "fetch"
  | "bootstrap"
  | "seed"
  | "upgrade"
  | "test"
  | "downgrade";

export interface TestResult {
  file: string;
  passed: boolean;
  exitCode: number;
  stderr: string;
}

export interface EntryReport {
  entry: MatrixEntry;
  status: "passed" | "failed";

  /** Phase that failed, when status is 'failed' */
  phase?: EntryPhase;
  error?: Error;

  tests: TestResult[];
  downgradeVerified: boolean;
  durationMs: number;
}

export interface ReadinessOptions {
  timeoutMs: number;
  intervalMs: number;
  maxIntervalMs: number;
}

export interface MatrixOptions {
  branch?: string;
  platform?: string;
  baseUrl?: string;
  output?: string;
}

export interface RunOptions {
  edgedbVersion?: string;
  edgedbUrl?: string;
  makeDbs?: boolean;
  workDir?: string;
  port?: string;
  migrationTimeout?: string;
  keepWorkDir?: boolean;
  verbose?: boolean;
}

export interface RunAllOptions {
  branch?: string;
  platform?: string;
  baseUrl?: string;
  matrix?: string;
  jobs?: string;
  workDir?: string;
  port?: string;
  migrationTimeout?: string;
  keepWorkDir?: boolean;
  verbose?: boolean;
}
