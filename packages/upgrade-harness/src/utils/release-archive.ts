/**
 * Release Archive
 *
 * Downloads a released server tarball and extracts it into an entry's work
 * directory. Archives are named `edgedb-server-<version>.tar.gz` and contain a
 * single `edgedb-server-<version>/` directory with the binary under `bin/`.
 */

import fs from "fs-extra";
import path from "path";
import { Readable } from "stream";
import { pipeline } from "stream/promises";
import { extract } from "tar";
import { BootstrapError, FetchError } from "../errors.js";
import type { FetchLike } from "./index-fetcher.js";

export interface ExtractedRelease {
  /** Directory the archive was extracted to */
  root: string;
  /** Absolute path of the server binary */
  binary: string;
}

export function getArchiveName(version: string): string {
  return `edgedb-server-${version}.tar.gz`;
}

/**
 * Download the archive at `url` into `workDir` and extract it there
 */
export async function fetchRelease(
  version: string,
  url: string,
  workDir: string,
  fetchImpl: FetchLike = fetch
): Promise<ExtractedRelease> {
  await fs.ensureDir(workDir);
  const archivePath = path.join(workDir, getArchiveName(version));

  await downloadArchive(url, archivePath, fetchImpl);
  return extractRelease(version, archivePath, workDir);
}

async function downloadArchive(
  url: string,
  archivePath: string,
  fetchImpl: FetchLike
): Promise<void> {
  let response: Response;
  try {
    response = await fetchImpl(url);
  } catch (error) {
    throw new FetchError(
      "Failed to download release archive",
      error instanceof Error ? error.message : String(error)
    );
  }

  if (!response.ok) {
    throw new FetchError(
      `Failed to download release archive: ${response.status} ${response.statusText}`,
      url
    );
  }

  if (!response.body) {
    throw new FetchError("Failed to download release archive: empty response body", url);
  }

  // Never leave a partial download under the archive name
  const tempPath = `${archivePath}.partial`;
  try {
    await pipeline(Readable.fromWeb(response.body), fs.createWriteStream(tempPath));
    await fs.move(tempPath, archivePath, { overwrite: true });
  } catch (error) {
    await fs.remove(tempPath);
    throw new FetchError(
      "Failed to save release archive",
      error instanceof Error ? error.message : String(error)
    );
  }
}

/**
 * Extract a downloaded archive and locate the server binary
 */
export async function extractRelease(
  version: string,
  archivePath: string,
  workDir: string
): Promise<ExtractedRelease> {
  try {
    await extract({ file: archivePath, cwd: workDir });
  } catch (error) {
    throw new BootstrapError(
      `Failed to extract ${path.basename(archivePath)}`,
      error instanceof Error ? error.message : String(error)
    );
  }

  const root = path.join(workDir, `edgedb-server-${version}`);
  const binary = path.join(root, "bin", "edgedb-server");

  if (!(await fs.pathExists(binary))) {
    throw new BootstrapError(
      `Server binary not found in ${path.basename(archivePath)}`,
      `Expected ${binary}`
    );
  }

  return { root, binary };
}
