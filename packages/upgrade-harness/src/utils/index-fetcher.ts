/**
 * Release Index Fetcher
 *
 * Downloads the stable and testing package indexes for a platform, validates
 * them against the index schema and parses every package into a VersionRecord.
 * A failure here is fatal to the whole run; there are no retries.
 */

import { Ajv } from "ajv";
import type { ReleaseIndex, ReleaseIndexPackage } from "../types/release-index.js";
import type { PrereleasePhase, ReleaseChannel, VersionRecord } from "../types.js";
import { FetchError, ParseError } from "../errors.js";
import releaseIndexSchema from "../schemas/release-index.schema.json" with { type: "json" };

const ajv = new Ajv({ strict: false, allErrors: true });
const validateIndex = ajv.compile<ReleaseIndex>(releaseIndexSchema);

/** Transport port; the global fetch unless a test substitutes one */
export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export interface IndexFetchOptions {
  /** Package server root (e.g. "https://packages.edgedb.com") */
  baseUrl: string;
  /** Timeout in milliseconds per index request (default: 30000) */
  timeout?: number;
  fetchImpl?: FetchLike;
}

/**
 * Get the index URL for a platform and channel
 */
export function getIndexUrl(
  baseUrl: string,
  platform: string,
  channel: ReleaseChannel
): string {
  const suffix = channel === "testing" ? ".testing.json" : ".json";
  return `${trimBase(baseUrl)}/archive/.jsonindexes/${platform}${suffix}`;
}

/**
 * Fetch both channels and return their records concatenated, stable first
 */
export async function fetchVersionRecords(
  platform: string,
  options: IndexFetchOptions
): Promise<VersionRecord[]> {
  const stable = await fetchChannel(platform, "stable", options);
  const testing = await fetchChannel(platform, "testing", options);
  return [...stable, ...testing];
}

/**
 * Fetch and parse a single channel index
 */
export async function fetchChannel(
  platform: string,
  channel: ReleaseChannel,
  options: IndexFetchOptions
): Promise<VersionRecord[]> {
  const { baseUrl, timeout = 30_000, fetchImpl = fetch } = options;
  const url = getIndexUrl(baseUrl, platform, channel);

  let response: Response;
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeout);

  try {
    response = await fetchImpl(url, {
      signal: controller.signal,
      headers: {
        "Accept": "application/json",
      },
    });
  } catch (error) {
    if (error instanceof Error && error.name === "AbortError") {
      throw new FetchError(`Timeout fetching ${channel} index`, url);
    }
    throw new FetchError(
      `Failed to fetch ${channel} index`,
      error instanceof Error ? error.message : String(error),
      "Check your internet connection and the --base-url setting"
    );
  } finally {
    clearTimeout(timeoutId);
  }

  if (!response.ok) {
    throw new FetchError(
      `Failed to fetch ${channel} index: ${response.status} ${response.statusText}`,
      url,
      response.status === 404 ? `Check that "${platform}" is a published platform` : undefined
    );
  }

  let body: unknown;
  try {
    body = await response.json();
  } catch (error) {
    throw new ParseError(
      `The ${channel} index is not valid JSON`,
      error instanceof Error ? error.message : String(error)
    );
  }

  return parseReleaseIndex(body, baseUrl, channel);
}

/**
 * Validate an index document and convert its packages to VersionRecords
 */
export function parseReleaseIndex(
  body: unknown,
  baseUrl: string,
  channel: ReleaseChannel = "stable"
): VersionRecord[] {
  if (!validateIndex(body)) {
    throw new ParseError(
      `Invalid ${channel} index schema`,
      ajv.errorsText(validateIndex.errors)
    );
  }

  return body.packages.map((pkg) => toVersionRecord(pkg, baseUrl));
}

function toVersionRecord(pkg: ReleaseIndexPackage, baseUrl: string): VersionRecord {
  return Object.freeze({
    version: pkg.version,
    major: pkg.version_details.major,
    prereleasePhase: getPrereleasePhase(pkg),
    downloadUrl: trimBase(baseUrl) + pkg.installrefs[0].ref,
  });
}

/**
 * A missing prerelease array means the same as an empty one: a final release
 */
function getPrereleasePhase(pkg: ReleaseIndexPackage): PrereleasePhase {
  const prerelease = pkg.version_details.prerelease ?? [];
  return prerelease.length > 0 ? prerelease[0].phase : "none";
}

function trimBase(baseUrl: string): string {
  return baseUrl.replace(/\/+$/, "");
}
