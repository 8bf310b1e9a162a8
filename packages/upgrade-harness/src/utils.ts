/**
 * Utility functions for the upgrade harness
 */

import fs from "fs-extra";
import path from "path";
import { fileURLToPath } from "url";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

/**
 * Read package.json version
 */
export function getCliVersion(): string {
  const packagePath = path.join(__dirname, "../package.json");
  const packageJson: unknown = fs.readJsonSync(packagePath);
  if (
    typeof packageJson === "object" &&
    packageJson !== null &&
    "version" in packageJson &&
    typeof packageJson.version === "string"
  ) {
    return packageJson.version;
  }
  return "0.0.0";
}

/**
 * Wait for a condition with timeout.
 *
 * The delay between attempts starts at `intervalMs` and is multiplied by
 * `backoff` after each failed attempt, capped at `maxIntervalMs`.
 */
export async function waitFor(
  condition: () => Promise<boolean>,
  options: {
    timeoutMs: number;
    intervalMs?: number;
    backoff?: number;
    maxIntervalMs?: number;
    onProgress?: (elapsed: number) => void;
  }
): Promise<boolean> {
  const {
    timeoutMs,
    intervalMs = 1000,
    backoff = 1,
    maxIntervalMs = intervalMs,
    onProgress,
  } = options;
  const startTime = Date.now();
  let delay = intervalMs;

  while (Date.now() - startTime < timeoutMs) {
    if (await condition()) {
      return true;
    }

    if (onProgress) {
      onProgress(Date.now() - startTime);
    }

    await sleep(delay);
    delay = Math.min(delay * backoff, Math.max(maxIntervalMs, intervalMs));
  }

  return false;
}

/**
 * Check if a port is available
 */
export async function isPortAvailable(port: number): Promise<boolean> {
  const { createServer } = await import("net");
  return new Promise((resolve) => {
    const server = createServer();
    server.once("error", () => resolve(false));
    server.once("listening", () => {
      server.close(() => resolve(true));
    });
    server.listen(port);
  });
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Format a duration for progress output (e.g. "1m 05s", "42s", "250ms")
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${Math.round(ms)}ms`;
  }
  const totalSeconds = Math.floor(ms / 1000);
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  if (minutes === 0) {
    return `${seconds}s`;
  }
  return `${minutes}m ${String(seconds).padStart(2, "0")}s`;
}
