import { describe, test, expect, beforeEach, afterEach } from "vitest";
import fs from "fs-extra";
import path from "path";
import os from "os";
import {
  expandMatrix,
  fromWorkflowMatrix,
  toWorkflowMatrix,
  writeMatrixOutput,
} from "../matrix.js";
import { ParseError } from "../../errors.js";
import type { VersionRecord } from "../../types.js";

const records: VersionRecord[] = [
  {
    version: "3.0",
    major: 3,
    prereleasePhase: "none",
    downloadUrl: "https://packages.test/archive/3.0.tar.gz",
  },
  {
    version: "3.0-rc.1",
    major: 3,
    prereleasePhase: "rc",
    downloadUrl: "https://packages.test/archive/3.0-rc.1.tar.gz",
  },
];

describe("expandMatrix", () => {
  test("crosses every record with both seed flags", () => {
    expect(expandMatrix(records)).toEqual([
      { version: "3.0", downloadUrl: "https://packages.test/archive/3.0.tar.gz", seedFixtureDbs: true },
      { version: "3.0", downloadUrl: "https://packages.test/archive/3.0.tar.gz", seedFixtureDbs: false },
      { version: "3.0-rc.1", downloadUrl: "https://packages.test/archive/3.0-rc.1.tar.gz", seedFixtureDbs: true },
      { version: "3.0-rc.1", downloadUrl: "https://packages.test/archive/3.0-rc.1.tar.gz", seedFixtureDbs: false },
    ]);
  });

  test("produces twice as many entries as records", () => {
    const many = Array.from({ length: 7 }, (_, i): VersionRecord => ({
      version: `3.${i}`,
      major: 3,
      prereleasePhase: "none",
      downloadUrl: `https://packages.test/3.${i}.tar.gz`,
    }));
    expect(expandMatrix(many)).toHaveLength(14);
  });

  test("collapses a version listed in both channels", () => {
    expect(expandMatrix([...records, records[0]])).toHaveLength(4);
  });

  test("returns no entries for no records", () => {
    expect(expandMatrix([])).toEqual([]);
  });
});

describe("workflow matrix wire form", () => {
  test("uses the scheduler keys", () => {
    expect(toWorkflowMatrix(expandMatrix([records[0]]))).toEqual({
      include: [
        { "edgedb-version": "3.0", "edgedb-url": "https://packages.test/archive/3.0.tar.gz", "make-dbs": true },
        { "edgedb-version": "3.0", "edgedb-url": "https://packages.test/archive/3.0.tar.gz", "make-dbs": false },
      ],
    });
  });

  test("parses a saved matrix back into entries", () => {
    const json = JSON.stringify({
      include: [{ "edgedb-version": "3.0", "edgedb-url": "https://packages.test/3.0.tar.gz", "make-dbs": true }],
    });
    expect(fromWorkflowMatrix(json)).toEqual([
      { version: "3.0", downloadUrl: "https://packages.test/3.0.tar.gz", seedFixtureDbs: true },
    ]);
  });

  test("rejects malformed matrices", () => {
    expect(() => fromWorkflowMatrix("not json")).toThrow(ParseError);
    expect(() => fromWorkflowMatrix('{"include":[{"edgedb-version":"3.0"}]}')).toThrow(
      "Matrix does not have the { include: [...] } shape"
    );
  });
});

describe("writeMatrixOutput", () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await fs.mkdtemp(path.join(os.tmpdir(), "matrix-output-test-"));
  });

  afterEach(async () => {
    await fs.remove(testDir);
  });

  test("appends a matrix= line to the output file", async () => {
    const outputFile = path.join(testDir, "github_output");
    await fs.writeFile(outputFile, "other=1\n", "utf-8");

    await writeMatrixOutput({ include: [] }, outputFile);

    expect(await fs.readFile(outputFile, "utf-8")).toBe('other=1\nmatrix={"include":[]}\n');
  });
});
