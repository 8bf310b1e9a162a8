/**
 * Release Index
 *
 * Shape of the JSON package indexes published per platform and channel
 * (`{base}/archive/.jsonindexes/{platform}.json` and `.testing.json`).
 * Only the fields the harness reads are described; the documents carry more.
 */

export interface ReleaseIndex {
  packages: ReleaseIndexPackage[];
}

export interface ReleaseIndexPackage {
  /** Published version string (e.g. "3.0-rc.1") */
  version: string;

  version_details: {
    major: number;

    /** Absent or empty for final releases */
    prerelease?: Array<{
      phase: "dev" | "alpha" | "beta" | "rc";
    }>;
  };

  /** Archive locations relative to the package server root */
  installrefs: Array<{
    ref: string;
  }>;
}
