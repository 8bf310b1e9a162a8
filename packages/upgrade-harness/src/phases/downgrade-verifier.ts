/**
 * Downgrade verification: the original release must still read a data
 * directory after the current release has upgraded it.
 */

import _ from "lodash";
import { VerificationMismatch } from "../errors.js";
import type { ServerInstance } from "../orchestrator/instance.js";

export interface DowngradeCheck {
  database: string;
  query: string;
  expected: unknown;
}

export const DEFAULT_DOWNGRADE_CHECK: DowngradeCheck = {
  database: "policies",
  query: `
    select Issue { name, number, watchers: {name} }
    filter .number = "1"
  `,
  expected: [
    {
      name: "Release EdgeDB",
      number: "1",
      watchers: [{ name: "Yury" }],
    },
  ],
};

/**
 * Pre-releases are not downgrade sources: going back from an upgraded
 * directory to a beta or rc is unsupported.
 */
export function shouldVerifyDowngrade(version: string): boolean {
  return !version.includes("-rc") && !version.includes("-beta");
}

/**
 * Restart the original release on the upgraded data directory and compare
 * one query result against the expected value. The instance is terminated
 * whatever the outcome.
 */
export async function verifyDowngrade(
  instance: ServerInstance,
  check: DowngradeCheck = DEFAULT_DOWNGRADE_CHECK
): Promise<void> {
  await instance.withRunning(async () => {
    const client = instance.connect(check.database);
    let actual: unknown;
    try {
      actual = JSON.parse(await client.queryJSON(check.query));
    } finally {
      await client.close();
    }

    if (!_.isEqual(actual, check.expected)) {
      throw new VerificationMismatch(actual, check.expected);
    }
  });
}
