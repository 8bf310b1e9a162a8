import { describe, test, expect, beforeAll, afterAll, beforeEach, afterEach, vi, type Mock } from "vitest";
import fs from "fs-extra";
import path from "path";
import os from "os";
import { create } from "tar";
import which from "which";
import { describeEntry, getEntryDirName, runMatrixEntry, type EntryRunOptions } from "../entry-runner.js";
import { DEFAULT_CONFIG, type HarnessConfig } from "../../config.js";
import {
  BootstrapError,
  FetchError,
  SeedError,
  TestFailure,
  VerificationMismatch,
} from "../../errors.js";
import type { MatrixEntry } from "../../types.js";
import type { FetchLike } from "../../utils/index-fetcher.js";
import {
  fakeClientFactory,
  fakeServerState,
  fakeSubprocess,
  mockExeca,
  result,
  type FakeServerState,
  type FakeSubprocess,
} from "../../__tests__/fakes.js";

vi.mock("execa");
vi.mock("which");

vi.mock("../../utils.js", async (importOriginal) => {
  const actual = await importOriginal<typeof import("../../utils.js")>();
  return { ...actual, isPortAvailable: vi.fn(async () => true) };
});

const EDB = "/opt/edgedb/bin/edb";
const EXPECTED_ISSUES = '[{"name":"Release EdgeDB","number":"1","watchers":[{"name":"Yury"}]}]';

const config: HarnessConfig = {
  ...DEFAULT_CONFIG,
  readiness: { timeoutMs: 500, intervalMs: 5, maxIntervalMs: 20 },
  testFiles: ["tests/test_edgeql_json.py", "tests/test_edgeql_policies.py"],
};

function entry(version: string, seedFixtureDbs: boolean): MatrixEntry {
  return {
    version,
    downloadUrl: `https://packages.test/archive/edgedb-server-${version}.tar.gz`,
    seedFixtureDbs,
  };
}

describe("describeEntry", () => {
  test("labels the version and seed flag", () => {
    expect(describeEntry(entry("3.0", true))).toBe("3.0 (with fixture databases)");
    expect(describeEntry(entry("3.0-rc.1", false))).toBe("3.0-rc.1 (without fixture databases)");
  });
});

describe("getEntryDirName", () => {
  test("is unique per version and seed flag", () => {
    expect(getEntryDirName(entry("3.0", true))).toBe("3.0-dbs");
    expect(getEntryDirName(entry("3.0", false))).toBe("3.0-nodbs");
    expect(getEntryDirName(entry("3.0+local/1", false))).toBe("3.0_local_1-nodbs");
  });
});

describe("runMatrixEntry", () => {
  const whichMock = vi.mocked(which) as unknown as Mock<(cmd: string) => Promise<string | null>>;
  const archives = new Map<string, Uint8Array>();
  let archiveDir: string;
  let testDir: string;
  let workDir: string;
  let server: FakeServerState;
  let processes: FakeSubprocess[];
  let failingTestFile: string | undefined;
  let fetchImpl: Mock<FetchLike>;

  function options(overrides: Partial<EntryRunOptions> = {}): EntryRunOptions {
    return {
      config,
      workDir,
      clientFactory: fakeClientFactory(server),
      fetchImpl,
      ...overrides,
    };
  }

  beforeAll(async () => {
    archiveDir = await fs.mkdtemp(path.join(os.tmpdir(), "entry-runner-archives-"));
    for (const version of ["3.0", "3.0-rc.1"]) {
      const root = `edgedb-server-${version}`;
      await fs.ensureDir(path.join(archiveDir, root, "bin"));
      await fs.writeFile(path.join(archiveDir, root, "bin", "edgedb-server"), "", { mode: 0o755 });
      const file = path.join(archiveDir, `${root}.tar.gz`);
      await create({ gzip: true, file, cwd: archiveDir }, [root]);
      archives.set(entry(version, true).downloadUrl, new Uint8Array(await fs.readFile(file)));
    }
  });

  afterAll(async () => {
    await fs.remove(archiveDir);
  });

  beforeEach(async () => {
    testDir = await fs.mkdtemp(path.join(os.tmpdir(), "entry-runner-test-"));
    workDir = path.join(testDir, "3.0-dbs");
    server = fakeServerState({ queryResults: { policies: EXPECTED_ISSUES } });
    processes = [];
    failingTestFile = undefined;

    vi.spyOn(console, "log").mockImplementation(() => {});
    whichMock.mockResolvedValue(EDB);
    fetchImpl = vi.fn<FetchLike>(async (url) => {
      const body = archives.get(String(url));
      return body
        ? new Response(body, { status: 200 })
        : new Response("not found", { status: 404, statusText: "Not Found" });
    });

    mockExeca((file, args) => {
      if (file === EDB) {
        const failed = failingTestFile !== undefined && args.includes(failingTestFile);
        return Promise.resolve(
          failed ? result({ failed: true, exitCode: 1, stderr: "FAILED" }) : result()
        );
      }
      if (args.includes("--bootstrap-only")) {
        return Promise.resolve(result());
      }
      const subprocess = fakeSubprocess();
      processes.push(subprocess);
      return subprocess;
    });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    vi.clearAllMocks();
    await fs.remove(testDir);
  });

  function everyServerTerminated(): boolean {
    return processes.every((p) => p.kill.mock.calls.length === 1);
  }

  test("passes a seeded final release end to end", async () => {
    const report = await runMatrixEntry(entry("3.0", true), options());

    expect(report.status).toBe("passed");
    expect(report.phase).toBeUndefined();
    expect(report.downgradeVerified).toBe(true);
    expect(report.tests.map((t) => [t.file, t.passed])).toEqual([
      ["tests/test_edgeql_json.py", true],
      ["tests/test_edgeql_policies.py", true],
    ]);
    expect(server.databases).toEqual(["json", "functions", "expressions", "casts", "policies"]);
    // One server for seeding, one for the downgrade check
    expect(processes).toHaveLength(2);
    expect(everyServerTerminated()).toBe(true);
    expect(await fs.pathExists(workDir)).toBe(false);
  });

  test("keeps the work directory of a passing entry when asked to", async () => {
    const report = await runMatrixEntry(entry("3.0", true), options({ keepWorkDir: true }));

    expect(report.status).toBe("passed");
    expect(await fs.pathExists(path.join(workDir, "edgedb-server-3.0", "bin", "edgedb-server"))).toBe(true);
  });

  test("bootstraps into an empty data directory when an earlier run left one behind", async () => {
    await fs.outputFile(path.join(workDir, "test-dir", "UPGRADED_BY_CURRENT_RELEASE"), "");
    let leftoverAtBootstrap: boolean | undefined;
    mockExeca((file, args) => {
      if (file !== EDB && args.includes("--bootstrap-only")) {
        leftoverAtBootstrap = fs.pathExistsSync(path.join(args[1], "UPGRADED_BY_CURRENT_RELEASE"));
      }
      return Promise.resolve(result());
    });

    const report = await runMatrixEntry(entry("3.0-rc.1", false), options({ keepWorkDir: true }));

    expect(report.status).toBe("passed");
    expect(leftoverAtBootstrap).toBe(false);
    expect(await fs.pathExists(path.join(workDir, "edgedb-server-3.0-rc.1", "bin", "edgedb-server"))).toBe(true);
  });

  test("skips seeding and the downgrade check for an unseeded rc", async () => {
    const report = await runMatrixEntry(entry("3.0-rc.1", false), options());

    expect(report.status).toBe("passed");
    expect(report.downgradeVerified).toBe(false);
    expect(server.databases).toEqual([]);
    expect(processes).toHaveLength(0);
  });

  test("reports a failed download as a fetch failure", async () => {
    const report = await runMatrixEntry(entry("2.9", true), options());

    expect(report.status).toBe("failed");
    expect(report.phase).toBe("fetch");
    expect(report.error).toBeInstanceOf(FetchError);
    expect(report.error?.message).toBe("Failed to download release archive: 404 Not Found");
  });

  test("reports a seeding failure and terminates the seeding server", async () => {
    server.failStatement = "create database casts;";

    const report = await runMatrixEntry(entry("3.0", true), options());

    expect(report.status).toBe("failed");
    expect(report.phase).toBe("seed");
    expect(report.error).toBeInstanceOf(SeedError);
    expect(processes).toHaveLength(1);
    expect(everyServerTerminated()).toBe(true);
    expect(await fs.pathExists(workDir)).toBe(true);
  });

  test("reports a missing dev command as an upgrade failure", async () => {
    whichMock.mockResolvedValue(null);

    const report = await runMatrixEntry(entry("3.0", false), options());

    expect(report.phase).toBe("upgrade");
    expect(report.error).toBeInstanceOf(BootstrapError);
  });

  test("reports failing test files after running all of them", async () => {
    failingTestFile = "tests/test_edgeql_json.py";

    const report = await runMatrixEntry(entry("3.0", true), options());

    expect(report.status).toBe("failed");
    expect(report.phase).toBe("test");
    expect(report.error).toBeInstanceOf(TestFailure);
    expect(report.tests.map((t) => t.passed)).toEqual([false, true]);
    expect(report.downgradeVerified).toBe(false);
    expect(everyServerTerminated()).toBe(true);
  });

  test("reports a downgrade mismatch and terminates the old release", async () => {
    server.queryResults.policies = "[]";

    const report = await runMatrixEntry(entry("3.0", true), options());

    expect(report.status).toBe("failed");
    expect(report.phase).toBe("downgrade");
    expect(report.error).toBeInstanceOf(VerificationMismatch);
    expect(processes).toHaveLength(2);
    expect(everyServerTerminated()).toBe(true);
  });
});
