/**
 * Test matrix expansion and its CI wire form.
 */

import fs from "fs-extra";
import { ParseError } from "../errors.js";
import type { MatrixEntry, VersionRecord, WorkflowMatrix } from "../types.js";

/**
 * Cross every admissible record with both values of the seed flag.
 * A version listed in both channels contributes one pair of entries.
 */
export function expandMatrix(records: readonly VersionRecord[]): MatrixEntry[] {
  const seen = new Set<string>();
  const entries: MatrixEntry[] = [];

  for (const record of records) {
    if (seen.has(record.version)) {
      continue;
    }
    seen.add(record.version);

    for (const seedFixtureDbs of [true, false]) {
      entries.push({
        version: record.version,
        downloadUrl: record.downloadUrl,
        seedFixtureDbs,
      });
    }
  }

  return entries;
}

export function toWorkflowMatrix(entries: readonly MatrixEntry[]): WorkflowMatrix {
  return {
    include: entries.map((entry) => ({
      "edgedb-version": entry.version,
      "edgedb-url": entry.downloadUrl,
      "make-dbs": entry.seedFixtureDbs,
    })),
  };
}

/**
 * Parse the wire form back into entries (e.g. a matrix saved by an earlier
 * `matrix` run)
 */
export function fromWorkflowMatrix(json: string): MatrixEntry[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    throw new ParseError(
      "Matrix is not valid JSON",
      error instanceof Error ? error.message : String(error)
    );
  }

  if (!isWorkflowMatrix(parsed)) {
    throw new ParseError("Matrix does not have the { include: [...] } shape");
  }

  return parsed.include.map((item) => ({
    version: item["edgedb-version"],
    downloadUrl: item["edgedb-url"],
    seedFixtureDbs: item["make-dbs"],
  }));
}

/**
 * Append `matrix=<json>` to the CI step output file
 */
export async function writeMatrixOutput(
  matrix: WorkflowMatrix,
  outputFile: string
): Promise<void> {
  await fs.appendFile(outputFile, `matrix=${JSON.stringify(matrix)}\n`, "utf-8");
}

function isWorkflowMatrix(value: unknown): value is WorkflowMatrix {
  if (typeof value !== "object" || value === null || !("include" in value)) {
    return false;
  }
  const { include } = value;
  return (
    Array.isArray(include) &&
    include.every(
      (item: unknown) =>
        typeof item === "object" &&
        item !== null &&
        "edgedb-version" in item &&
        typeof item["edgedb-version"] === "string" &&
        "edgedb-url" in item &&
        typeof item["edgedb-url"] === "string" &&
        "make-dbs" in item &&
        typeof item["make-dbs"] === "boolean"
    )
  );
}
