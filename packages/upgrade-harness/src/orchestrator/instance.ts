/**
 * Server instance lifecycle for one matrix entry.
 *
 *   fetched -> bootstrapped -> running -> terminated
 *                                 ^           |
 *                                 +-----------+   (downgrade re-provisioning)
 *
 * A running server is an owned resource: every successful spawn is paired
 * with exactly one terminate, on every exit path, through withRunning().
 */

import path from "path";
import chalk from "chalk";
import ora from "ora";
import { execa, type ResultPromise } from "execa";
import { BootstrapError, InvalidTransitionError, SpawnError } from "../errors.js";
import type { MatrixEntry, ReadinessOptions } from "../types.js";
import { formatDuration, isPortAvailable, waitFor } from "../utils.js";
import { buildServerArgs } from "../utils/server-command.js";
import { createDatabaseClient, type ClientFactory, type DatabaseClient } from "../utils/db-client.js";
import { fetchRelease } from "../utils/release-archive.js";
import type { FetchLike } from "../utils/index-fetcher.js";

export type InstanceState = "fetched" | "bootstrapped" | "running" | "terminated";

const TRANSITIONS: Record<InstanceState, InstanceState[]> = {
  fetched: ["bootstrapped"],
  bootstrapped: ["running"],
  running: ["terminated"],
  terminated: ["running"],
};

const SERVE_OPTIONS = { reject: false, stdout: "inherit" } as const;

type ServeProcess = ResultPromise<typeof SERVE_OPTIONS>;

export interface ServerExit {
  exitCode?: number;
  signal?: string;
  stderr: string;
}

export interface ServerInstanceOptions {
  port: number;
  host?: string;
  readiness: ReadinessOptions;
  clientFactory?: ClientFactory;
  verbose?: boolean;
}

/**
 * Handle to a spawned server process
 */
export class RunningServer {
  readonly exit: Promise<ServerExit>;
  private exited = false;
  private terminated = false;

  constructor(
    private subprocess: ServeProcess,
    readonly port: number,
    private onTerminate: () => void
  ) {
    this.exit = subprocess.then((result) => {
      this.exited = true;
      return {
        exitCode: result.exitCode,
        signal: result.signal,
        stderr: result.stderr,
      };
    });
  }

  get hasExited(): boolean {
    return this.exited;
  }

  get pid(): number | undefined {
    return this.subprocess.pid;
  }

  /**
   * Send SIGTERM and wait for the process to exit. Safe to call more than once.
   */
  async terminate(): Promise<ServerExit> {
    if (!this.terminated) {
      this.terminated = true;
      this.onTerminate();
      if (!this.exited) {
        this.subprocess.kill("SIGTERM");
      }
    }
    return this.exit;
  }
}

export class ServerInstance {
  private _state: InstanceState = "fetched";
  private current: RunningServer | null = null;
  private _spawnCount = 0;
  private _terminateCount = 0;

  constructor(
    readonly version: string,
    readonly binary: string,
    readonly dataDir: string,
    private options: ServerInstanceOptions
  ) {}

  /**
   * Download and extract the entry's release into `workDir`. The data
   * directory is `<workDir>/test-dir`.
   */
  static async fetch(
    entry: MatrixEntry,
    workDir: string,
    options: ServerInstanceOptions & { fetchImpl?: FetchLike }
  ): Promise<ServerInstance> {
    const { fetchImpl, ...instanceOptions } = options;
    const release = await fetchRelease(entry.version, entry.downloadUrl, workDir, fetchImpl);
    return new ServerInstance(
      entry.version,
      release.binary,
      path.join(workDir, "test-dir"),
      instanceOptions
    );
  }

  get state(): InstanceState {
    return this._state;
  }

  get spawnCount(): number {
    return this._spawnCount;
  }

  get terminateCount(): number {
    return this._terminateCount;
  }

  get port(): number {
    return this.options.port;
  }

  /**
   * Initialize a fresh data directory with this release, without serving
   */
  async bootstrap(): Promise<void> {
    this.assertTransition("bootstrapped");

    const args = buildServerArgs({ mode: "bootstrap", dataDir: this.dataDir });
    this.log(args);

    const result = await execa(this.binary, args, { reject: false });
    if (result.failed) {
      throw new BootstrapError(
        `Bootstrap of ${this.version} failed (exit code ${result.exitCode ?? "none"})`,
        result.stderr
      );
    }

    this._state = "bootstrapped";
  }

  /**
   * Spawn the server and block until it accepts connections
   */
  async start(): Promise<RunningServer> {
    this.assertTransition("running");

    if (!(await isPortAvailable(this.port))) {
      throw new SpawnError(
        `Port ${this.port} is already in use`,
        undefined,
        "Stop the process holding the port or pass --port"
      );
    }

    const args = buildServerArgs({
      mode: "serve",
      dataDir: this.dataDir,
      port: this.port,
      security: "insecure_dev_mode",
    });
    this.log(args);

    const subprocess = execa(this.binary, args, SERVE_OPTIONS);
    this._spawnCount++;

    const server = new RunningServer(subprocess, this.port, () => {
      this._terminateCount++;
    });
    this.current = server;
    this._state = "running";

    try {
      await this.waitUntilReady(server);
    } catch (error) {
      await this.stop();
      throw error;
    }

    return server;
  }

  /**
   * Terminate the running server, if any
   */
  async stop(): Promise<void> {
    const server = this.current;
    if (!server) {
      return;
    }
    this.current = null;
    this._state = "terminated";
    await server.terminate();
  }

  /**
   * Run `fn` against a started server; the server is terminated afterwards
   * whether `fn` succeeds or throws
   */
  async withRunning<T>(fn: (server: RunningServer) => Promise<T>): Promise<T> {
    const server = await this.start();
    try {
      return await fn(server);
    } finally {
      await this.stop();
    }
  }

  connect(database?: string): DatabaseClient {
    const factory = this.options.clientFactory ?? createDatabaseClient;
    return factory({
      host: this.options.host ?? "localhost",
      port: this.port,
      database,
    });
  }

  private async waitUntilReady(server: RunningServer): Promise<void> {
    const { timeoutMs, intervalMs, maxIntervalMs } = this.options.readiness;
    const waiting = `Waiting for ${this.version} to accept connections...`;
    const spinner = ora(waiting).start();

    const ready = await waitFor(
      async () => server.hasExited || (await this.tryConnect()),
      {
        timeoutMs,
        intervalMs,
        backoff: 2,
        maxIntervalMs,
        onProgress: (elapsed) => {
          spinner.text = `${waiting} (${formatDuration(elapsed)})`;
        },
      }
    );

    if (server.hasExited) {
      const exit = await server.exit;
      spinner.fail(`${this.version} exited during startup`);
      throw new SpawnError(
        `Server ${this.version} exited before accepting connections (exit code ${exit.exitCode ?? "none"})`,
        exit.stderr
      );
    }

    if (!ready) {
      spinner.fail(`${this.version} is not accepting connections`);
      throw new SpawnError(
        `Server ${this.version} did not accept connections within ${formatDuration(timeoutMs)}`
      );
    }

    spinner.succeed(`${this.version} accepting connections on port ${this.port}`);
  }

  private async tryConnect(): Promise<boolean> {
    const client = this.connect();
    try {
      await client.ensureConnected();
      return true;
    } catch {
      return false;
    } finally {
      await client.close();
    }
  }

  private assertTransition(to: InstanceState): void {
    if (!TRANSITIONS[this._state].includes(to)) {
      throw new InvalidTransitionError(this._state, to);
    }
  }

  private log(args: string[]): void {
    if (this.options.verbose) {
      console.log(chalk.gray(`$ ${this.binary} ${args.join(" ")}`));
    }
  }
}
