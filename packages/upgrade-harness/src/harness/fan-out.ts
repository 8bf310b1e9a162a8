/**
 * Local fan-out: runs matrix entries on a fixed number of workers, the way the
 * CI scheduler runs one job per entry. Workers share nothing: each has its own
 * port and each entry its own work directory.
 */

import path from "path";
import type { EntryReport, MatrixEntry } from "../types.js";
import { getEntryDirName, printEntryReport, runMatrixEntry, type EntryRunOptions } from "./entry-runner.js";

export interface FanOutOptions extends Omit<EntryRunOptions, "workDir"> {
  /** Number of entries run at once (default: 1) */
  jobs?: number;
  /** Root under which every entry gets its own directory */
  workRoot: string;
}

/**
 * Run every entry and return the reports in input order
 */
export async function runMatrixEntries(
  entries: readonly MatrixEntry[],
  options: FanOutOptions
): Promise<EntryReport[]> {
  const { jobs = 1, workRoot, ...entryOptions } = options;
  const workerCount = Math.max(1, Math.min(jobs, entries.length));
  const reports: EntryReport[] = new Array(entries.length);
  let next = 0;

  const worker = async (workerIndex: number): Promise<void> => {
    const config = {
      ...entryOptions.config,
      port: entryOptions.config.port + workerIndex,
    };

    while (next < entries.length) {
      const index = next++;
      const entry = entries[index];
      const workDir = path.join(workRoot, getEntryDirName(entry));

      const report = await runMatrixEntry(entry, { ...entryOptions, config, workDir });
      printEntryReport(report, report.status === "failed" ? workDir : undefined);
      reports[index] = report;
    }
  };

  await Promise.all(Array.from({ length: workerCount }, (_, i) => worker(i)));
  return reports;
}

export function summarizeReports(reports: readonly EntryReport[]): {
  passed: number;
  failed: number;
} {
  const failed = reports.filter((r) => r.status === "failed").length;
  return { passed: reports.length - failed, failed };
}
