import { describe, test, expect, beforeEach, afterEach, vi } from "vitest";
import {
  DEFAULT_DOWNGRADE_CHECK,
  shouldVerifyDowngrade,
  verifyDowngrade,
} from "../downgrade-verifier.js";
import { ServerInstance } from "../../orchestrator/instance.js";
import { VerificationMismatch } from "../../errors.js";
import {
  fakeClientFactory,
  fakeServerState,
  fakeSubprocess,
  mockExeca,
  result,
  type FakeServerState,
} from "../../__tests__/fakes.js";

vi.mock("execa");

vi.mock("../../utils.js", async (importOriginal) => {
  const actual = await importOriginal<typeof import("../../utils.js")>();
  return { ...actual, isPortAvailable: vi.fn(async () => true) };
});

describe("shouldVerifyDowngrade", () => {
  test("verifies final releases", () => {
    expect(shouldVerifyDowngrade("3.0")).toBe(true);
    expect(shouldVerifyDowngrade("2.14")).toBe(true);
  });

  test("skips beta and rc releases", () => {
    expect(shouldVerifyDowngrade("3.0-rc.1")).toBe(false);
    expect(shouldVerifyDowngrade("3.0-beta.2")).toBe(false);
  });
});

describe("verifyDowngrade", () => {
  let server: FakeServerState;
  let instance: ServerInstance;

  beforeEach(async () => {
    server = fakeServerState();
    mockExeca((_file, args) =>
      args.includes("--bootstrap-only") ? Promise.resolve(result()) : fakeSubprocess()
    );

    instance = new ServerInstance("3.0", "/tmp/work/bin/edgedb-server", "/tmp/work/test-dir", {
      port: 10000,
      readiness: { timeoutMs: 500, intervalMs: 5, maxIntervalMs: 20 },
      clientFactory: fakeClientFactory(server),
    });

    // Seeded and upgraded earlier in the entry's lifecycle
    await instance.bootstrap();
    await instance.withRunning(async () => undefined);
  });

  afterEach(() => {
    vi.clearAllMocks();
  });

  test("passes when the old release returns the expected watchers", async () => {
    server.queryResults.policies =
      '[{"name":"Release EdgeDB","number":"1","watchers":[{"name":"Yury"}]}]';

    await verifyDowngrade(instance);

    expect(instance.state).toBe("terminated");
    expect(instance.spawnCount).toBe(2);
    expect(instance.terminateCount).toBe(2);
    expect(server.connects.at(-1)).toEqual({ host: "localhost", port: 10000, database: "policies" });
    // Every readiness client and the query client were closed
    expect(server.closed).toBe(server.connects.length);
  });

  test("compares structurally, ignoring key order", async () => {
    server.queryResults.policies =
      '[{"watchers":[{"name":"Yury"}],"number":"1","name":"Release EdgeDB"}]';

    await expect(verifyDowngrade(instance)).resolves.toBeUndefined();
  });

  test("throws VerificationMismatch and still terminates the instance", async () => {
    server.queryResults.policies = '[{"name":"Release EdgeDB","number":"1","watchers":[]}]';

    const error = await verifyDowngrade(instance).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(VerificationMismatch);
    expect(error).toMatchObject({
      actual: [{ name: "Release EdgeDB", number: "1", watchers: [] }],
      expected: DEFAULT_DOWNGRADE_CHECK.expected,
    });
    expect(instance.state).toBe("terminated");
    expect(instance.spawnCount).toBe(instance.terminateCount);
  });

  test("runs a custom check against its own database", async () => {
    server.queryResults.inventory = '{"count":3}';

    await verifyDowngrade(instance, {
      database: "inventory",
      query: "select { count := count(Item) }",
      expected: { count: 3 },
    });

    expect(server.connects.at(-1)?.database).toBe("inventory");
  });
});
