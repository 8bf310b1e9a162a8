/**
 * Command-line builders for the server binaries.
 *
 * Arguments are arrays built from named fields and handed to execa without a
 * shell.
 */

export type SecurityMode = "strict" | "insecure_dev_mode";

export type ServerInvocation =
  | { mode: "bootstrap"; dataDir: string }
  | { mode: "serve"; dataDir: string; port: number; security: SecurityMode };

/**
 * Arguments for a released server binary (`edgedb-server`)
 */
export function buildServerArgs(invocation: ServerInvocation): string[] {
  const args = ["-D", invocation.dataDir];

  if (invocation.mode === "bootstrap") {
    args.push("--bootstrap-only", "--testmode");
    return args;
  }

  args.push(
    "--testmode",
    "--security",
    invocation.security,
    "--port",
    String(invocation.port)
  );
  return args;
}

/**
 * Arguments for the current release's dev command that bring a data
 * directory up to the current format and exit
 */
export function buildUpgradeArgs(dataDir: string): string[] {
  return ["server", "--bootstrap-only", "--data-dir", dataDir];
}

/**
 * Arguments for running test files of the current release against a data
 * directory
 */
export function buildTestArgs(options: {
  dataDir: string;
  jobs: number;
  files: string[];
  verbose?: boolean;
}): string[] {
  const args = ["test", `-j${options.jobs}`];
  if (options.verbose ?? true) {
    args.push("-v");
  }
  args.push("--data-dir", options.dataDir, ...options.files);
  return args;
}
