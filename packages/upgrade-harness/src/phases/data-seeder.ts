/**
 * Creates the fixture databases inside an old-release instance. They persist
 * in the data directory after the instance terminates and are picked up by the
 * test suite of the current release.
 */

import { SeedError } from "../errors.js";
import type { DatabaseClient } from "../utils/db-client.js";

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

export async function seedFixtureDatabases(
  client: DatabaseClient,
  names: readonly string[]
): Promise<void> {
  // Reject the whole set before touching the server
  const invalid = names.find((name) => !IDENTIFIER.test(name));
  if (invalid !== undefined) {
    throw new SeedError(invalid, "Fixture database names must be plain identifiers");
  }

  for (const name of names) {
    try {
      await client.execute(`create database ${name};`);
    } catch (error) {
      throw new SeedError(name, error instanceof Error ? error.message : String(error));
    }
  }
}
